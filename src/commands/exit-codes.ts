import { CertError } from "../errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  VERIFICATION_FAILED: 1,
  TAMPERED: 2,
  INVALID_ARGS: 3,
  LEDGER_UNAVAILABLE: 4,
  MISSING_CRITICAL: 5,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(err: unknown): ExitCode {
  return err instanceof CertError ? exitCodeForCode(err.code) : EXIT.VERIFICATION_FAILED;
}

export function exitCodeForCode(code: string): ExitCode {
  switch (code) {
    case "MISSING_CRITICAL_FILE":
      return EXIT.MISSING_CRITICAL;
    case "LEDGER_UNAVAILABLE":
      return EXIT.LEDGER_UNAVAILABLE;
    case "LEDGER_MISMATCH":
      return EXIT.TAMPERED;
    case "CONFIG_INVALID":
    case "INVALID_RECEIPT_INPUT":
      return EXIT.INVALID_ARGS;
    default:
      return EXIT.VERIFICATION_FAILED;
  }
}
