import type { FileFingerprint, Manifest, MissingFile } from "../types/fingerprint.js";
import type { LayersConfig } from "../types/config.js";
import { MissingCriticalFileError } from "../errors.js";
import { deepFreeze } from "../core/freeze.js";
import { sha256Hex } from "../fingerprint/checksum.js";
import { compareCodeUnits, toCanonicalPath, type LayerAssignment } from "../fingerprint/discovery.js";
import { ALGORITHM_VERSION } from "./aggregator.js";

export type ManifestBuildInput = {
  layers: LayersConfig;
  assignments: LayerAssignment[];
  fingerprints: FileFingerprint[];
};

/**
 * Layer hash: sha256 over `path NUL hash LF` for every member, members sorted
 * by canonical path.
 */
export function hashLayer(members: FileFingerprint[]): string {
  const sorted = [...members].sort((a, b) => compareCodeUnits(a.path, b.path));
  return sha256Hex(sorted.map((f) => `${f.path}\0${f.hash}\n`).join(""));
}

/**
 * Build a manifest covering exactly the configured layers.
 *
 * Throws MissingCriticalFileError when a file declared critical for a layer has
 * no fingerprint. Other declared files that are absent are recorded in `missing`.
 */
export function buildManifest(input: ManifestBuildInput): Readonly<Manifest> {
  const byPath = new Map(input.fingerprints.map((f) => [f.path, f]));
  const assigned = new Map(input.assignments.map((a) => [a.path, new Set(a.layers)]));
  const layerNames = Object.keys(input.layers).sort(compareCodeUnits);

  const layers: Record<string, string> = {};
  const members: Record<string, string[]> = {};
  const missing: MissingFile[] = [];
  const used = new Set<string>();

  for (const name of layerNames) {
    const config = input.layers[name];
    const critical = (config.critical ?? []).map(toCanonicalPath);
    const declared = [...critical, ...(config.files ?? []).map(toCanonicalPath)];

    for (const p of critical) {
      if (!byPath.has(p)) throw new MissingCriticalFileError(name, p);
    }

    const paths = new Set<string>();
    for (const [p, layerSet] of assigned) {
      if (layerSet.has(name) && byPath.has(p)) paths.add(p);
    }
    for (const p of declared) {
      if (byPath.has(p)) paths.add(p);
      else if (!missing.some((m) => m.layer === name && m.path === p)) missing.push({ layer: name, path: p });
    }

    const sorted = [...paths].sort(compareCodeUnits);
    const fingerprints = sorted.flatMap((p) => byPath.get(p) ?? []);
    members[name] = sorted;
    layers[name] = hashLayer(fingerprints);
    for (const p of sorted) used.add(p);
  }

  return deepFreeze<Manifest>({
    algorithm_version: ALGORITHM_VERSION,
    layers,
    members,
    files: input.fingerprints
      .filter((f) => used.has(f.path))
      .sort((a, b) => compareCodeUnits(a.path, b.path)),
    missing,
  });
}
