import fs from "node:fs";
import path from "node:path";
import { parseJunitXmlFile, type ValidationMatrix } from "./junit-xml.js";
import { passthroughJson } from "./passthrough.js";
import { isClaimResults, parseClaimResults } from "./claims.js";
import type { AdapterOutput, SourceFormat } from "../types/adapter-output.js";
import { InvalidReceiptInputError, errorMessage } from "../errors.js";

const ADAPTER_VERSION = "1.0.0";

/** Detect source format from extension, and for JSON from its shape. */
function detectFormat(filePath: string, data: unknown): SourceFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".xml") return "junit_xml";
  if (ext === ".json") return isClaimResults(data) ? "claims" : "json";
  throw new InvalidReceiptInputError(`Cannot detect validation result format for ${filePath}`);
}

function readJson(filePath: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new InvalidReceiptInputError(`Cannot read validation results ${filePath}: ${errorMessage(e)}`);
  }
}

/**
 * Adapter entry point: turns test-harness output into a problem-class → PASS/FAIL matrix.
 *
 * @param filePath - Path to the harness output.
 * @param format - Explicit format override. Auto-detected if omitted.
 */
export function adaptValidationResults(filePath: string, format?: SourceFormat): AdapterOutput {
  const isJson = format === "json" || format === "claims" || (!format && path.extname(filePath).toLowerCase() === ".json");
  const data: unknown = isJson ? readJson(filePath) : undefined;
  const sourceFormat = format ?? detectFormat(filePath, data);
  let matrix: ValidationMatrix;

  switch (sourceFormat) {
    case "junit_xml":
      matrix = parseJunitXmlFile(filePath);
      break;
    case "json":
      matrix = passthroughJson(data, filePath);
      break;
    case "claims":
      matrix = parseClaimResults(data, filePath);
      break;
    default:
      throw new InvalidReceiptInputError(`Unsupported adapter format: ${String(sourceFormat)}`);
  }

  return {
    adapter_version: ADAPTER_VERSION,
    source_format: sourceFormat,
    source_file: path.basename(filePath),
    validation: matrix.validation,
    skipped: matrix.skipped,
  };
}
