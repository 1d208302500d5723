/**
 * Error kinds raised by the certification pipeline.
 * Each carries a stable `code` so commands can map it to diagnostics and exit codes.
 */
export type ErrorCode =
  | "PARSE_ERROR"
  | "MISSING_CRITICAL_FILE"
  | "LEDGER_UNAVAILABLE"
  | "LEDGER_ERROR"
  | "LEDGER_MISMATCH"
  | "INVALID_RECEIPT_INPUT"
  | "BASELINE_CORRUPT"
  | "CONFIG_INVALID";

export class CertError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Content cannot be parsed for its declared kind. Recoverable: fall back to raw hashing. */
export class ParseError extends CertError {
  constructor(
    readonly filePath: string,
    detail: string,
  ) {
    super("PARSE_ERROR", `${filePath}: ${detail}`);
  }
}

export class MissingCriticalFileError extends CertError {
  constructor(
    readonly layer: string,
    readonly filePath: string,
  ) {
    super("MISSING_CRITICAL_FILE", `Critical file missing from layer '${layer}': ${filePath}`);
  }
}

/** Timeout or network failure talking to the ledger. Retriable. */
export class LedgerUnavailableError extends CertError {
  constructor(message: string) {
    super("LEDGER_UNAVAILABLE", message);
  }
}

export class LedgerError extends CertError {
  constructor(message: string) {
    super("LEDGER_ERROR", message);
  }
}

/** On-chain record and local receipt disagree. */
export class LedgerMismatchError extends CertError {
  constructor(readonly reasons: string[]) {
    super("LEDGER_MISMATCH", `Ledger record does not match the receipt: ${reasons.join("; ")}`);
  }
}

export class InvalidReceiptInputError extends CertError {
  constructor(message: string) {
    super("INVALID_RECEIPT_INPUT", message);
  }
}

export class BaselineCorruptError extends CertError {
  constructor(message: string) {
    super("BASELINE_CORRUPT", message);
  }
}

export class ConfigError extends CertError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
