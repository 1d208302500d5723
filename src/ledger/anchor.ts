import type { CertificationReceipt } from "../types/receipt.js";
import type { LedgerAnchor, OnChainRecord, RetryPolicy } from "../types/ledger.js";
import { toAnchorMetadata } from "../receipt/receipt.js";
import type { LedgerClient } from "./client.js";
import { DEFAULT_RETRY_POLICY, retryLedgerCall, type RetryOutcome } from "./retry.js";

/**
 * Anchor a receipt's content hash. A failure leaves the receipt valid; the caller
 * records the anchor as pending and may retry later.
 */
export async function anchorReceipt(
  client: LedgerClient,
  receipt: CertificationReceipt,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  now: () => Date = () => new Date(),
): Promise<RetryOutcome<LedgerAnchor>> {
  const metadata = toAnchorMetadata(receipt);
  const outcome = await retryLedgerCall(
    (signal) => client.anchor(receipt.content_hash, metadata, signal),
    "ledger anchor",
    policy,
  );
  if (!outcome.ok) return outcome;

  return {
    ok: true,
    attempts: outcome.attempts,
    value: {
      content_hash: receipt.content_hash,
      metadata,
      transaction_id: outcome.value,
      anchored_at: now().toISOString(),
    },
  };
}

/** Reads are idempotent and retried freely. */
export async function fetchRecord(
  client: LedgerClient,
  transactionId: string,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<RetryOutcome<OnChainRecord | null>> {
  return retryLedgerCall((signal) => client.fetch(transactionId, signal), `ledger fetch ${transactionId}`, policy);
}
