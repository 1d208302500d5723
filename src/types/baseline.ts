import type { Manifest, MasterFingerprint } from "./fingerprint.js";

/** Trusted baseline: written by compute, loaded by verify. */
export type Baseline = {
  schema_version: string;
  created_at: string;
  master: MasterFingerprint;
  manifest: Manifest;
};
