import type { FileKind } from "./fingerprint.js";

/** Configuration types: layered config system. */
export type LayerConfig = {
  /** Glob patterns selecting member files. */
  include?: string[];
  exclude?: string[];
  /** Declared members; absence is recorded but not fatal. */
  files?: string[];
  /** Declared members whose absence halts the manifest build. */
  critical?: string[];
};

export type LayersConfig = Record<string, LayerConfig>;

export type LedgerConfig = {
  kind: "file" | "http";
  /** Ledger file for kind "file", relative to state_dir unless absolute. */
  path?: string;
  /** Gateway base URL for kind "http". */
  endpoint?: string;
  timeout_ms?: number;
  max_attempts?: number;
  base_delay_ms?: number;
  max_delay_ms?: number;
};

export type CertConfig = {
  schema_version: string;
  state_dir: string;
  /** Project root the layer globs are resolved against. */
  root?: string;
  discovery?: "fs" | "git";
  concurrency?: number;
  engine: {
    name: string;
    version?: string;
  };
  layers: LayersConfig;
  /** Glob → file kind overrides, applied before extension detection. */
  kinds?: Record<string, FileKind>;
  ledger: LedgerConfig;
};
