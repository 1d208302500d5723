import fsp from "node:fs/promises";
import path from "node:path";
import pLimit from "p-limit";
import type { FileFingerprint, SourceFile } from "../types/fingerprint.js";
import type { NormalizerRegistry } from "../normalizer/normalizer.js";
import { fingerprintFile } from "./fingerprinter.js";
import { compareCodeUnits, type LayerAssignment } from "./discovery.js";

export const DEFAULT_CONCURRENCY = 8;

/**
 * Fingerprint in-memory files on independent workers. Each worker returns a frozen
 * fingerprint; the merge is a sort by path, so completion order never shows.
 */
export async function fingerprintFiles(
  files: SourceFile[],
  registry: NormalizerRegistry,
  concurrency: number = DEFAULT_CONCURRENCY,
): Promise<FileFingerprint[]> {
  const limit = pLimit(concurrency);
  const results = await Promise.all(files.map((file) => limit(async () => fingerprintFile(file, registry))));
  return sortByPath(results);
}

/** Read and fingerprint assigned files from disk, bounded by `concurrency` open files. */
export async function fingerprintAssigned(
  root: string,
  assignments: LayerAssignment[],
  registry: NormalizerRegistry,
  concurrency: number = DEFAULT_CONCURRENCY,
): Promise<FileFingerprint[]> {
  const limit = pLimit(concurrency);
  const results = await Promise.all(
    assignments.map((a) =>
      limit(async () => {
        const content = await fsp.readFile(path.join(root, a.path));
        return fingerprintFile(
          { path: a.path, content, kind: registry.detectKind(a.path), layers: a.layers, critical: a.critical },
          registry,
        );
      }),
    ),
  );
  return sortByPath(results);
}

export function sortByPath(fingerprints: FileFingerprint[]): FileFingerprint[] {
  return [...fingerprints].sort((a, b) => compareCodeUnits(a.path, b.path));
}
