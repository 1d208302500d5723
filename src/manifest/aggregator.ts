import type { Manifest, MasterFingerprint } from "../types/fingerprint.js";
import { deepFreeze } from "../core/freeze.js";
import { sha256Hex } from "../fingerprint/checksum.js";
import { compareCodeUnits } from "../fingerprint/discovery.js";

/** Bump whenever hashing, layer composition or aggregation changes. */
export const ALGORITHM_VERSION = "layered-sha256/1";

/**
 * Master hash over the algorithm version followed by `layer NUL hash LF` for
 * layers sorted by name. The version is part of the hash input, not only stored
 * next to it.
 */
export function computeMasterHash(algorithmVersion: string, layers: Record<string, string>): string {
  const lines = Object.keys(layers)
    .sort(compareCodeUnits)
    .map((name) => `${name}\0${layers[name]}\n`);
  return sha256Hex(`${algorithmVersion}\n${lines.join("")}`);
}

/** Aggregate a manifest into its versioned master fingerprint. */
export function aggregate(manifest: Manifest): Readonly<MasterFingerprint> {
  return deepFreeze<MasterFingerprint>({
    algorithm_version: manifest.algorithm_version,
    layers: { ...manifest.layers },
    hash: computeMasterHash(manifest.algorithm_version, manifest.layers),
  });
}

/** Fingerprints under different algorithm versions are never compared. */
export function isComparable(a: MasterFingerprint, b: MasterFingerprint): boolean {
  return a.algorithm_version === b.algorithm_version;
}
