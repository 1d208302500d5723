import type { PipelineState } from "../types/state.js";
import type { LedgerAnchor } from "../types/ledger.js";
import { CertificationPipeline } from "../core/pipeline.js";
import { createLedgerClient, loadContext, type CommandOptions } from "./context.js";
import { failure, type CommandResult } from "./diagnostic.js";
import { fromPipeline } from "./certify.js";

export type AnchorOutput = {
  state: PipelineState;
  anchor: LedgerAnchor | null;
};

/** Retry anchoring of the stored receipt; earlier stages are not re-run. */
export async function anchor(opts: CommandOptions): Promise<CommandResult<AnchorOutput>> {
  try {
    const ctx = await loadContext(opts);
    const pipeline = new CertificationPipeline({
      config: ctx.config,
      locations: ctx.locations,
      ledger: createLedgerClient(ctx, opts.ledger),
      policy: ctx.policy,
      registry: ctx.registry,
    });
    const result = await pipeline.retryAnchor();
    return fromPipeline(result, { state: result.state, anchor: result.anchor ?? null });
  } catch (e) {
    return failure(e, "ANCHORED");
  }
}
