import type { ValidationResults } from "../types/receipt.js";
import { InvalidReceiptInputError } from "../errors.js";
import type { ValidationMatrix } from "./junit-xml.js";
import { asRecord } from "./values.js";

/**
 * Passthrough adapter: a JSON map of problem class → outcome, either flat or
 * under a "validation" key. Outcomes are booleans or "PASS"/"FAIL".
 */
export function passthroughJson(data: unknown, source: string): ValidationMatrix {
  const root = asRecord(data);
  const map = "validation" in root ? asRecord(root.validation) : root;

  const validation: ValidationResults = {};
  for (const [problemClass, outcome] of Object.entries(map)) {
    if (typeof outcome === "boolean") {
      validation[problemClass] = outcome;
    } else if (outcome === "PASS" || outcome === "FAIL") {
      validation[problemClass] = outcome === "PASS";
    } else {
      throw new InvalidReceiptInputError(`Invalid validation outcome for '${problemClass}' in ${source}: ${JSON.stringify(outcome)}`);
    }
  }

  if (Object.keys(validation).length === 0) {
    throw new InvalidReceiptInputError(`No validation outcomes found in ${source}`);
  }
  return { validation, skipped: [] };
}
