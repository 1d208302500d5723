import type { FileFingerprint, Manifest, MasterFingerprint } from "../types/fingerprint.js";
import type { LayersConfig } from "../types/config.js";
import { NormalizerRegistry } from "../normalizer/normalizer.js";
import { assignLayers, listCandidateFiles, type DiscoverySource, type LayerAssignment } from "../fingerprint/discovery.js";
import type { GitOperations } from "../git/operations.js";
import { DEFAULT_CONCURRENCY, fingerprintAssigned } from "../fingerprint/pool.js";
import { buildManifest } from "./manifest-builder.js";
import { aggregate } from "./aggregator.js";

export type ComputeOptions = {
  root: string;
  layers: LayersConfig;
  discovery?: DiscoverySource;
  /** Directories left out of discovery, typically the state directory. */
  excludeDirs?: string[];
  git?: GitOperations;
  concurrency?: number;
  registry?: NormalizerRegistry;
};

export type FingerprintRun = {
  assignments: LayerAssignment[];
  fingerprints: FileFingerprint[];
};

export type ManifestComputation = {
  manifest: Readonly<Manifest>;
  master: Readonly<MasterFingerprint>;
};

/** Discover, assign and fingerprint every file of the configured layers. */
export async function fingerprintProject(opts: ComputeOptions): Promise<FingerprintRun> {
  const candidates = await listCandidateFiles(opts.root, opts.discovery ?? "fs", {
    excludeDirs: opts.excludeDirs,
    git: opts.git,
  });
  const assignments = assignLayers(candidates, opts.layers);
  const fingerprints = await fingerprintAssigned(
    opts.root,
    assignments,
    opts.registry ?? new NormalizerRegistry(),
    opts.concurrency ?? DEFAULT_CONCURRENCY,
  );
  return { assignments, fingerprints };
}

/** Throws MissingCriticalFileError when a critical file has no fingerprint. */
export function manifestFromRun(layers: LayersConfig, run: FingerprintRun): ManifestComputation {
  const manifest = buildManifest({ layers, assignments: run.assignments, fingerprints: run.fingerprints });
  return { manifest, master: aggregate(manifest) };
}

export async function computeManifest(opts: ComputeOptions): Promise<ManifestComputation> {
  return manifestFromRun(opts.layers, await fingerprintProject(opts));
}
