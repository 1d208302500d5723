import type { PipelineState } from "../types/state.js";
import type { LocalVerificationStatus } from "../types/verification.js";
import { readPipelineState } from "../core/pipeline.js";
import { failedStage } from "../core/state-machine.js";
import { loadContext, type CommandOptions } from "./context.js";
import { loadBaseline, currentAgainst } from "./verify.js";
import { failure, warnings, type CommandResult } from "./diagnostic.js";
import { EXIT } from "./exit-codes.js";

export type StatusOutput = {
  current_master_fingerprint: string | null;
  baseline_master_fingerprint: string | null;
  match: boolean;
  verification: LocalVerificationStatus | null;
  pipeline: PipelineState | null;
  /** Stage named by a failed pipeline status. */
  failed_stage: string | null;
};

/** Current vs baseline master fingerprint, plus the last pipeline state. Read-only. */
export async function status(opts: CommandOptions): Promise<CommandResult<StatusOutput>> {
  try {
    const ctx = await loadContext(opts);
    const pipeline = readPipelineState(ctx.locations.statePath);

    const baseline = await loadBaseline(ctx);
    const notes: string[] = [];
    let output: StatusOutput = {
      current_master_fingerprint: null,
      baseline_master_fingerprint: null,
      match: false,
      verification: null,
      pipeline,
      failed_stage: pipeline ? failedStage(pipeline.current) : null,
    };

    if (!baseline) {
      notes.push("No baseline found. Run compute first.");
    } else {
      const result = await currentAgainst(ctx, baseline);
      output = {
        ...output,
        current_master_fingerprint: result.current_master,
        baseline_master_fingerprint: result.baseline_master,
        match: result.current_master === result.baseline_master,
        verification: result.status,
      };
    }
    if (pipeline?.anchor_pending) notes.push("anchoring pending; run anchor to retry");

    return { ok: true, value: output, exitCode: EXIT.SUCCESS, warnings: warnings(notes) };
  } catch (e) {
    return failure(e);
  }
}
