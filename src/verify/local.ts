import type { Baseline } from "../types/baseline.js";
import type { FileFingerprint, Manifest } from "../types/fingerprint.js";
import type {
  FileChange,
  LocalVerificationResult,
  LocalVerificationStatus,
  NormalizerChange,
} from "../types/verification.js";
import { MissingCriticalFileError } from "../errors.js";
import { aggregate, isComparable } from "../manifest/aggregator.js";
import { compareCodeUnits } from "../fingerprint/discovery.js";

function layersOf(filePath: string, ...manifests: Manifest[]): string[] {
  const layers = new Set<string>();
  for (const manifest of manifests) {
    for (const [layer, members] of Object.entries(manifest.members)) {
      if (members.includes(filePath)) layers.add(layer);
    }
  }
  return [...layers].sort(compareCodeUnits);
}

function isStructuredFallback(f: FileFingerprint): boolean {
  return f.mode === "RAW_FALLBACK" && f.kind !== "unstructured";
}

/**
 * Compare current files against a trusted baseline, layer by layer and then in aggregate.
 * Read-only: neither the baseline nor the current manifest is touched.
 *
 * Passing the MissingCriticalFileError raised while building the current
 * manifest reports MISSING_FILE for that file.
 */
export function verifyLocal(baseline: Baseline, current: Manifest | MissingCriticalFileError): LocalVerificationResult {
  const base: LocalVerificationResult = {
    status: "MATCH",
    baseline_master: baseline.master.hash,
    current_master: null,
    baseline_algorithm_version: baseline.master.algorithm_version,
    current_algorithm_version: null,
    diverging_layers: [],
    missing_files: [],
    file_changes: [],
    fallback_files: [],
    cosmetic_changes: [],
    normalizer_changes: [],
    warnings: [],
  };

  if (current instanceof MissingCriticalFileError) {
    return {
      ...base,
      status: "MISSING_FILE",
      missing_files: [current.filePath],
      warnings: [current.message],
    };
  }

  const master = aggregate(current);
  const result: LocalVerificationResult = {
    ...base,
    current_master: master.hash,
    current_algorithm_version: master.algorithm_version,
  };

  if (!isComparable(master, baseline.master)) {
    result.status = "INCOMPARABLE";
    result.warnings.push(
      `algorithm version ${master.algorithm_version} cannot be compared with baseline ${baseline.master.algorithm_version}`,
    );
    return result;
  }

  const layerNames = new Set([...Object.keys(baseline.master.layers), ...Object.keys(master.layers)]);
  result.diverging_layers = [...layerNames]
    .filter((name) => baseline.master.layers[name] !== master.layers[name])
    .sort(compareCodeUnits);

  const before = new Map(baseline.manifest.files.map((f) => [f.path, f]));
  const after = new Map(current.files.map((f) => [f.path, f]));
  const changes: FileChange[] = [];
  const normalizerChanges: NormalizerChange[] = [];

  for (const [filePath, old] of before) {
    const now = after.get(filePath);
    if (!now) {
      changes.push({ path: filePath, change: "removed", layers: layersOf(filePath, baseline.manifest) });
      continue;
    }
    if (now.hash !== old.hash) {
      changes.push({ path: filePath, change: "modified", layers: layersOf(filePath, baseline.manifest, current) });
    } else if (now.raw_hash !== old.raw_hash) {
      result.cosmetic_changes.push(filePath);
    }
    if (now.normalizer !== old.normalizer) {
      normalizerChanges.push({ path: filePath, from: old.normalizer, to: now.normalizer });
    }
  }
  for (const filePath of after.keys()) {
    if (!before.has(filePath)) {
      changes.push({ path: filePath, change: "added", layers: layersOf(filePath, current) });
    }
  }

  result.file_changes = changes.sort((a, b) => compareCodeUnits(a.path, b.path));
  result.normalizer_changes = normalizerChanges;
  result.missing_files = result.file_changes.filter((c) => c.change === "removed").map((c) => c.path);
  result.fallback_files = current.files.filter(isStructuredFallback).map((f) => f.path);
  result.cosmetic_changes.sort(compareCodeUnits);

  for (const f of current.files.filter(isStructuredFallback)) {
    result.warnings.push(`${f.path} hashed from raw bytes: ${f.fallback_reason ?? "parse failed"}`);
  }
  for (const m of current.missing) {
    result.warnings.push(`declared file missing from layer '${m.layer}': ${m.path}`);
  }

  result.status = decideStatus(result, master.hash);
  return result;
}

function decideStatus(result: LocalVerificationResult, currentHash: string): LocalVerificationStatus {
  if (result.missing_files.length > 0) return "MISSING_FILE";
  if (result.diverging_layers.length > 0 || currentHash !== result.baseline_master) return "MISMATCH";
  if (result.fallback_files.length > 0) return "PARSE_FALLBACK_PRESENT";
  return "MATCH";
}
