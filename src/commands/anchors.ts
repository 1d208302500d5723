import type { LedgerAnchor } from "../types/ledger.js";
import { AnchorLog } from "../ledger/anchor-log.js";
import { dedupeByContentHash, type CertifiedFact } from "../ledger/client.js";
import { loadContext, type CommandOptions } from "./context.js";
import { failure, type CommandResult } from "./diagnostic.js";
import { EXIT } from "./exit-codes.js";

export type AnchorsOutput = {
  anchors: LedgerAnchor[];
  /** One entry per content hash, however many transactions anchor it. */
  facts: CertifiedFact[];
};

export async function listAnchors(opts: CommandOptions): Promise<CommandResult<AnchorsOutput>> {
  try {
    const ctx = await loadContext(opts);
    const anchors = await new AnchorLog(ctx.locations.anchorsPath).list();
    return { ok: true, value: { anchors, facts: dedupeByContentHash(anchors) }, exitCode: EXIT.SUCCESS, warnings: [] };
  } catch (e) {
    return failure(e);
  }
}
