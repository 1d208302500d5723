/** Verification results: local (files vs baseline) and ledger (receipt vs on-chain record). */
export type LocalVerificationStatus =
  | "MATCH"
  | "MISMATCH"
  | "MISSING_FILE"
  | "PARSE_FALLBACK_PRESENT"
  | "INCOMPARABLE";

export type FileChange = {
  path: string;
  change: "added" | "removed" | "modified";
  layers: string[];
};

export type NormalizerChange = {
  path: string;
  from: string;
  to: string;
};

export type LocalVerificationResult = {
  status: LocalVerificationStatus;
  baseline_master: string;
  /** Null when no manifest could be built from the current files. */
  current_master: string | null;
  baseline_algorithm_version: string;
  current_algorithm_version: string | null;
  diverging_layers: string[];
  missing_files: string[];
  file_changes: FileChange[];
  /** Structured-kind files hashed from raw bytes. */
  fallback_files: string[];
  /** Raw bytes changed while the semantic hash did not. */
  cosmetic_changes: string[];
  normalizer_changes: NormalizerChange[];
  warnings: string[];
};

export type LedgerVerificationStatus = "AUTHENTIC" | "TAMPERED" | "NOT_FOUND";

export type LedgerVerificationResult = {
  status: LedgerVerificationStatus;
  transaction_id: string;
  recomputed_hash: string;
  receipt_hash: string;
  on_chain_hash: string | null;
  block_timestamp: string | null;
  /** Every check that failed; empty unless TAMPERED. */
  reasons: string[];
};
