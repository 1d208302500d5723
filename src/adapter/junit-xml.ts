import { XMLParser } from "fast-xml-parser";
import fs from "node:fs";
import type { ValidationResults } from "../types/receipt.js";
import { InvalidReceiptInputError, errorMessage } from "../errors.js";
import { asArray, asRecord, toProblemClass } from "./values.js";

export type ValidationMatrix = {
  validation: ValidationResults;
  skipped: string[];
};

/**
 * Parse JUnit XML into a problem-class matrix: one class per <testsuite name>.
 * A class passes when none of its cases failed or errored; a suite whose cases
 * were all skipped produces no verdict.
 */
export function parseJunitXml(xmlContent: string): ValidationMatrix {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    isArray: (name) => name === "testsuite" || name === "testcase" || name === "failure" || name === "error",
  });

  const parsed = asRecord(parser.parse(xmlContent));
  const wrapper = asRecord(parsed.testsuites);
  // Handle both <testsuites> wrapper and single <testsuite>
  const suites = asArray(wrapper.testsuite ?? parsed.testsuite).map(asRecord);

  const validation: ValidationResults = {};
  const skipped = new Set<string>();

  for (const suite of suites) {
    const name = toProblemClass(String(suite["@_name"] ?? "unnamed"));
    const cases = asArray(suite.testcase).map(asRecord);

    const declaredTests = parseInt(String(suite["@_tests"] ?? cases.length), 10);
    const declaredSkipped = parseInt(String(suite["@_skipped"] ?? "0"), 10);
    const declaredFailures =
      parseInt(String(suite["@_failures"] ?? "0"), 10) + parseInt(String(suite["@_errors"] ?? "0"), 10);

    const caseFailures = cases.filter((tc) => tc.failure !== undefined || tc.error !== undefined).length;
    const caseSkipped = cases.filter((tc) => tc.skipped !== undefined).length;

    const failed = Math.max(declaredFailures, caseFailures);
    const executed = Math.max(declaredTests, cases.length) - Math.max(declaredSkipped, caseSkipped);

    if (executed <= 0 && failed === 0) {
      if (!(name in validation)) skipped.add(name);
      continue;
    }

    skipped.delete(name);
    validation[name] = (validation[name] ?? true) && failed === 0;
  }

  return { validation, skipped: [...skipped].sort() };
}

/** Read a JUnit XML file and return its validation matrix. */
export function parseJunitXmlFile(filePath: string): ValidationMatrix {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    throw new InvalidReceiptInputError(`Cannot read validation results ${filePath}: ${errorMessage(e)}`);
  }
  return parseJunitXml(content);
}
