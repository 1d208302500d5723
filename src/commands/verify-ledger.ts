import type { LedgerVerificationResult } from "../types/verification.js";
import type { CertificationReceipt } from "../types/receipt.js";
import { ReceiptStore, readReceiptFile } from "../receipt/receipt-store.js";
import { AnchorLog } from "../ledger/anchor-log.js";
import { verifyLedger as verifyAgainstLedger } from "../verify/ledger.js";
import { createLedgerClient, loadContext, type CommandContext, type CommandOptions } from "./context.js";
import { diag, failure, type CommandResult } from "./diagnostic.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type VerifyLedgerOptions = CommandOptions & {
  /** Defaults to the latest anchor of the receipt's content hash. */
  transactionId?: string;
  /** Receipt to check; defaults to <state_dir>/receipt.json. */
  receiptPath?: string;
};

const STATUS_EXIT: Record<LedgerVerificationResult["status"], ExitCode> = {
  AUTHENTIC: EXIT.SUCCESS,
  TAMPERED: EXIT.TAMPERED,
  NOT_FOUND: EXIT.VERIFICATION_FAILED,
};

async function loadReceipt(ctx: CommandContext, receiptPath?: string): Promise<CertificationReceipt | null> {
  if (receiptPath) return readReceiptFile(receiptPath);
  return new ReceiptStore(ctx.locations.receiptPath).read();
}

/** Ledger-mode verification of a locally held receipt. Read-only. */
export async function verifyLedger(opts: VerifyLedgerOptions): Promise<CommandResult<LedgerVerificationResult>> {
  try {
    const ctx = await loadContext(opts);
    const receipt = await loadReceipt(ctx, opts.receiptPath);
    if (!receipt) {
      return {
        ok: false,
        error: diag("error", "RECEIPT_MISSING", "No receipt found. Run certify first.", { path: ctx.locations.receiptPath }),
        exitCode: EXIT.INVALID_ARGS,
      };
    }

    const transactionId =
      opts.transactionId ?? (await new AnchorLog(ctx.locations.anchorsPath).latestFor(receipt.content_hash))?.transaction_id;
    if (!transactionId) {
      return {
        ok: false,
        error: diag("error", "ANCHOR_MISSING", `No anchor recorded for content hash ${receipt.content_hash}`),
        exitCode: EXIT.INVALID_ARGS,
      };
    }

    const result = await verifyAgainstLedger(createLedgerClient(ctx, opts.ledger), transactionId, receipt, ctx.policy);
    return { ok: true, value: result, exitCode: STATUS_EXIT[result.status], warnings: [] };
  } catch (e) {
    return failure(e);
  }
}
