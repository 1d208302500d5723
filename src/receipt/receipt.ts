import type { MasterFingerprint } from "../types/fingerprint.js";
import type {
  CertificationReceipt,
  EngineIdentity,
  UnsignedReceipt,
  ValidationResults,
} from "../types/receipt.js";
import type { AnchorMetadata } from "../types/ledger.js";
import { InvalidReceiptInputError } from "../errors.js";
import { canonicalSerialize } from "../core/canonical.js";
import { deepFreeze } from "../core/freeze.js";
import { sha256Hex } from "../fingerprint/checksum.js";

export const PROBLEM_CLASS_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.:-]*$/;

export type ReceiptInput = {
  master: MasterFingerprint;
  /** Supplied by the external test harness; checked value by value. */
  validation: Record<string, unknown>;
  engine: EngineIdentity;
  timestamp?: Date | string;
};

/**
 * Build the receipt from an explicit whitelist of fields. Nothing from the input
 * objects is spread into the receipt, so extra properties (parameters, energies,
 * timings, source text) cannot ride along.
 */
export function generateReceipt(input: ReceiptInput): Readonly<CertificationReceipt> {
  const unsigned: UnsignedReceipt = {
    engine: {
      name: requireText(input.engine.name, "engine.name"),
      version: requireText(input.engine.version, "engine.version"),
    },
    validation: copyValidation(input.validation),
    integrity: {
      master_fingerprint: input.master.hash,
      algorithm_version: input.master.algorithm_version,
    },
    timestamp: toUtcTimestamp(input.timestamp ?? new Date()),
  };

  return deepFreeze<CertificationReceipt>({ ...unsigned, content_hash: hashUnsigned(unsigned) });
}

/** Recompute the content hash from every field except content_hash itself. */
export function computeContentHash(receipt: UnsignedReceipt | CertificationReceipt): string {
  return hashUnsigned({
    engine: { name: receipt.engine.name, version: receipt.engine.version },
    validation: { ...receipt.validation },
    integrity: {
      master_fingerprint: receipt.integrity.master_fingerprint,
      algorithm_version: receipt.integrity.algorithm_version,
    },
    timestamp: receipt.timestamp,
  });
}

export type ReceiptIntegrityCheck = {
  consistent: boolean;
  stored: string;
  recomputed: string;
};

/** Does the stored content_hash still match the receipt's own fields? */
export function checkReceiptIntegrity(receipt: CertificationReceipt): ReceiptIntegrityCheck {
  const recomputed = computeContentHash(receipt);
  return { consistent: recomputed === receipt.content_hash, stored: receipt.content_hash, recomputed };
}

/** PASS overall only if at least one class ran and every class passed. */
export function isValidationPassed(validation: ValidationResults): boolean {
  const values = Object.values(validation);
  return values.length > 0 && values.every((v) => v);
}

/** Minimal metadata published next to the content hash. */
export function toAnchorMetadata(receipt: CertificationReceipt): AnchorMetadata {
  return {
    engine_version: receipt.engine.version,
    validation_passed: isValidationPassed(receipt.validation),
    fingerprint: receipt.integrity.master_fingerprint,
  };
}

function hashUnsigned(unsigned: UnsignedReceipt): string {
  return sha256Hex(canonicalSerialize(unsigned));
}

function copyValidation(validation: Record<string, unknown>): ValidationResults {
  const out: ValidationResults = {};
  for (const [problemClass, outcome] of Object.entries(validation)) {
    if (!PROBLEM_CLASS_PATTERN.test(problemClass)) {
      throw new InvalidReceiptInputError(`Invalid problem class name: ${JSON.stringify(problemClass)}`);
    }
    if (typeof outcome !== "boolean") {
      throw new InvalidReceiptInputError(`Validation outcome for '${problemClass}' must be a boolean, got ${typeof outcome}`);
    }
    out[problemClass] = outcome;
  }
  return out;
}

function requireText(value: unknown, field: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new InvalidReceiptInputError(`${field} must be a non-empty string`);
  }
  return value;
}

function toUtcTimestamp(value: Date | string): string {
  const date = typeof value === "string" ? new Date(value) : value;
  if (Number.isNaN(date.getTime())) {
    throw new InvalidReceiptInputError(`Invalid timestamp: ${String(value)}`);
  }
  return date.toISOString();
}
