import type { OnChainRecord } from "../types/ledger.js";
import { SHA256_PATTERN } from "../fingerprint/checksum.js";
import { LedgerError } from "../errors.js";

function asObject(value: unknown): Record<string, unknown> | null {
  return value !== null && typeof value === "object" && !Array.isArray(value) ? (value as Record<string, unknown>) : null;
}

/** Narrow an untrusted ledger payload to an OnChainRecord, keeping only known fields. */
export function parseOnChainRecord(data: unknown, source: string): OnChainRecord {
  const record = asObject(data);
  const meta = asObject(record?.metadata);
  if (!record || !meta) throw new LedgerError(`Malformed ledger record from ${source}`);

  const contentHash = record.content_hash;
  const blockTimestamp = record.block_timestamp;
  const engineVersion = meta.engine_version;
  const validationPassed = meta.validation_passed;
  const fingerprint = meta.fingerprint;

  if (
    typeof contentHash !== "string" ||
    !SHA256_PATTERN.test(contentHash) ||
    typeof blockTimestamp !== "string" ||
    typeof engineVersion !== "string" ||
    typeof validationPassed !== "boolean" ||
    typeof fingerprint !== "string"
  ) {
    throw new LedgerError(`Malformed ledger record from ${source}`);
  }

  return {
    content_hash: contentHash,
    metadata: { engine_version: engineVersion, validation_passed: validationPassed, fingerprint },
    block_timestamp: blockTimestamp,
  };
}
