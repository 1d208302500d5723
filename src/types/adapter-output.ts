import type { ValidationResults } from "./receipt.js";

/** Adapter output: validation outcome matrix normalized from a test harness. */
export type SourceFormat = "junit_xml" | "json" | "claims";

export type AdapterOutput = {
  adapter_version: string;
  source_format: SourceFormat;
  source_file: string;
  validation: ValidationResults;
  /** Problem classes that were present but produced no verdict. */
  skipped: string[];
};
