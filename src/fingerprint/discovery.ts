import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import { GitOperations } from "../git/operations.js";
import type { LayersConfig } from "../types/config.js";

export type DiscoverySource = "fs" | "git";

/** Where a discovered file belongs. */
export type LayerAssignment = {
  path: string;
  layers: string[];
  critical: string[];
};

const SKIPPED_DIRS = new Set([".git", "node_modules"]);

/** Canonical, layer-independent path: POSIX separators, normalized, no leading "./". */
export function toCanonicalPath(p: string): string {
  const normalized = path.posix.normalize(p.replace(/\\/g, "/"));
  return normalized.startsWith("./") ? normalized.slice(2) : normalized;
}

export type CandidateOptions = {
  /** Directories never fingerprinted, such as the state directory. */
  excludeDirs?: string[];
  /** Git wrapper for "git" discovery; one over `root` by default. */
  git?: GitOperations;
};

/**
 * List candidate files under root, as canonical relative paths sorted by code unit.
 * "git" lists tracked files still present in the working tree; "fs" walks the tree.
 */
export async function listCandidateFiles(
  root: string,
  source: DiscoverySource = "fs",
  opts: CandidateOptions = {},
): Promise<string[]> {
  let files: string[];
  if (source === "git") {
    const tracked = await (opts.git ?? new GitOperations(root)).listTrackedFiles();
    // ls-files keeps listing tracked files deleted from the working tree
    files = tracked.filter((f) => fs.existsSync(path.join(root, f)));
  } else {
    files = [];
    collectFiles(root, root, files);
  }

  const excluded = (opts.excludeDirs ?? [])
    .map((dir) => toCanonicalPath(path.relative(root, dir)))
    .filter((rel) => rel !== "." && rel !== "" && !rel.startsWith("../") && !path.isAbsolute(rel));

  return files
    .map(toCanonicalPath)
    .filter((f) => !excluded.some((dir) => f === dir || f.startsWith(`${dir}/`)))
    .sort(compareCodeUnits);
}

function collectFiles(baseDir: string, currentDir: string, out: string[]): void {
  const entries = fs.readdirSync(currentDir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = path.join(currentDir, entry.name);
    if (entry.isDirectory()) {
      if (SKIPPED_DIRS.has(entry.name)) continue;
      collectFiles(baseDir, fullPath, out);
    } else if (entry.isFile()) {
      out.push(path.relative(baseDir, fullPath));
    }
  }
}

/**
 * Assign candidate paths to layers. A path joins a layer when it matches an
 * include glob and no exclude glob, or when the layer declares it explicitly.
 * Paths that join no layer are dropped.
 */
export function assignLayers(candidates: string[], layers: LayersConfig): LayerAssignment[] {
  const out: LayerAssignment[] = [];
  const layerNames = Object.keys(layers).sort(compareCodeUnits);

  for (const candidate of candidates) {
    const p = toCanonicalPath(candidate);
    const assignment: LayerAssignment = { path: p, layers: [], critical: [] };

    for (const name of layerNames) {
      const layer = layers[name];
      const critical = (layer.critical ?? []).map(toCanonicalPath);
      const declared = (layer.files ?? []).map(toCanonicalPath);
      const included =
        (layer.include ?? []).some((g) => minimatch(p, g, { dot: true })) &&
        !(layer.exclude ?? []).some((g) => minimatch(p, g, { dot: true }));

      if (critical.includes(p)) {
        assignment.layers.push(name);
        assignment.critical.push(name);
      } else if (declared.includes(p) || included) {
        assignment.layers.push(name);
      }
    }

    if (assignment.layers.length > 0) out.push(assignment);
  }

  return out.sort((a, b) => compareCodeUnits(a.path, b.path));
}

/** Locale-independent ordering. */
export function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
