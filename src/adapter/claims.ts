import type { ValidationResults } from "../types/receipt.js";
import { InvalidReceiptInputError } from "../errors.js";
import type { ValidationMatrix } from "./junit-xml.js";
import { asArray, asRecord, toProblemClass } from "./values.js";

/**
 * Claim-verification results: a list of `{ claim_id, verified }` entries (bare or
 * under "results"). `verified: null` means the claim was skipped, e.g. because
 * the engine API was unreachable; skipped claims carry no verdict.
 */
export function parseClaimResults(data: unknown, source: string): ValidationMatrix {
  const entries: unknown[] = Array.isArray(data) ? data : asArray(asRecord(data).results);
  const validation: ValidationResults = {};
  const skipped = new Set<string>();

  for (const raw of entries) {
    const entry = asRecord(raw);
    const claimId = entry.claim_id;
    const verified = entry.verified;
    if (typeof claimId !== "string" || claimId.length === 0) {
      throw new InvalidReceiptInputError(`Claim result without claim_id in ${source}`);
    }
    const problemClass = toProblemClass(claimId);

    if (verified === null || verified === undefined) {
      if (!(problemClass in validation)) skipped.add(problemClass);
    } else if (typeof verified === "boolean") {
      skipped.delete(problemClass);
      validation[problemClass] = (validation[problemClass] ?? true) && verified;
    } else {
      throw new InvalidReceiptInputError(`Claim '${claimId}' has non-boolean verified in ${source}`);
    }
  }

  return { validation, skipped: [...skipped].sort() };
}

/** Looks like claim results rather than a flat outcome map. */
export function isClaimResults(data: unknown): boolean {
  if (Array.isArray(data)) return true;
  return Array.isArray(asRecord(data).results);
}
