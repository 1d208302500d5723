import type { CertificationReceipt } from "../types/receipt.js";
import type { OnChainRecord, RetryPolicy } from "../types/ledger.js";
import type { LedgerVerificationResult } from "../types/verification.js";
import { computeContentHash, toAnchorMetadata } from "../receipt/receipt.js";
import type { LedgerClient } from "../ledger/client.js";
import { fetchRecord } from "../ledger/anchor.js";
import { DEFAULT_RETRY_POLICY } from "../ledger/retry.js";

function metadataDisagreements(record: OnChainRecord, receipt: CertificationReceipt): string[] {
  const expected = toAnchorMetadata(receipt);
  const reasons: string[] = [];
  if (record.metadata.engine_version !== expected.engine_version) {
    reasons.push(`on-chain engine_version ${record.metadata.engine_version} != receipt ${expected.engine_version}`);
  }
  if (record.metadata.validation_passed !== expected.validation_passed) {
    reasons.push(`on-chain validation_passed ${record.metadata.validation_passed} != receipt ${expected.validation_passed}`);
  }
  if (record.metadata.fingerprint !== expected.fingerprint) {
    reasons.push("on-chain fingerprint differs from receipt master_fingerprint");
  }
  return reasons;
}

/**
 * Ledger-mode verification: fetch the on-chain record and compare it with the
 * content hash recomputed from a locally held receipt. Read-only.
 *
 * Throws LedgerUnavailableError when the ledger cannot be reached within the
 * retry policy; no verdict is possible then.
 */
export async function verifyLedger(
  client: LedgerClient,
  transactionId: string,
  receipt: CertificationReceipt,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<LedgerVerificationResult> {
  const recomputed = computeContentHash(receipt);
  const outcome = await fetchRecord(client, transactionId, policy);
  if (!outcome.ok) throw outcome.error;

  const record = outcome.value;
  const result: LedgerVerificationResult = {
    status: "NOT_FOUND",
    transaction_id: transactionId,
    recomputed_hash: recomputed,
    receipt_hash: receipt.content_hash,
    on_chain_hash: record?.content_hash ?? null,
    block_timestamp: record?.block_timestamp ?? null,
    reasons: [],
  };
  if (!record) return result;

  if (record.content_hash !== recomputed) {
    result.reasons.push("on-chain content_hash differs from the hash recomputed from the receipt");
  }
  if (receipt.content_hash !== recomputed) {
    result.reasons.push("receipt content_hash field does not match its own fields");
  }
  result.reasons.push(...metadataDisagreements(record, receipt));

  result.status = result.reasons.length > 0 ? "TAMPERED" : "AUTHENTIC";
  return result;
}
