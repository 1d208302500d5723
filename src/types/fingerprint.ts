/** Fingerprint types: per-file hashes, manifests and the master fingerprint. */
export type FileKind = "typescript" | "javascript" | "python" | "json" | "yaml" | "unstructured";

export type FingerprintMode = "SEMANTIC" | "RAW_FALLBACK";

export type SourceFile = {
  /** Canonical POSIX path relative to the project root. */
  path: string;
  content: Buffer;
  kind: FileKind;
  layers: string[];
  /** Layers for which this file is critical. */
  critical: string[];
};

export type FileFingerprint = {
  path: string;
  hash: string;
  mode: FingerprintMode;
  kind: FileKind;
  /** Normalizer version tag, or "raw". */
  normalizer: string;
  /** sha256 of the bytes; cross-check only, never part of a layer hash. */
  raw_hash: string;
  fallback_reason?: string;
};

export type MissingFile = {
  layer: string;
  path: string;
};

export type Manifest = {
  algorithm_version: string;
  layers: Record<string, string>;
  members: Record<string, string[]>;
  files: FileFingerprint[];
  missing: MissingFile[];
};

export type MasterFingerprint = {
  algorithm_version: string;
  layers: Record<string, string>;
  hash: string;
};
