import fs from "node:fs";
import path from "node:path";
import type { Baseline } from "../types/baseline.js";
import type { Manifest, MasterFingerprint } from "../types/fingerprint.js";
import { BaselineCorruptError, errorMessage } from "../errors.js";
import { DocumentSchemas } from "../schema/documents.js";
import { hashLayer } from "./manifest-builder.js";
import { computeMasterHash } from "./aggregator.js";

export const BASELINE_SCHEMA_VERSION = "1.0.0";

/**
 * Baseline Manager: explicit load/save of one trusted baseline file.
 * Each instance is bound to a single path, so several baselines can be used side by side.
 */
export class BaselineManager {
  constructor(
    private readonly baselinePath: string,
    private schemas?: DocumentSchemas,
  ) {}

  get path(): string {
    return this.baselinePath;
  }

  exists(): boolean {
    return fs.existsSync(this.baselinePath);
  }

  /**
   * Read the baseline. Returns null if none has been written yet.
   * Throws BaselineCorruptError when the file fails its schema or its hashes do not add up.
   */
  async load(): Promise<Baseline | null> {
    if (!this.exists()) return null;

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(this.baselinePath, "utf8"));
    } catch (e) {
      throw new BaselineCorruptError(`${this.baselinePath}: ${errorMessage(e)}`);
    }

    this.schemas ??= DocumentSchemas.load();
    const { valid, errors } = this.schemas.check("baseline", data);
    if (!valid) {
      throw new BaselineCorruptError(`${this.baselinePath}: ${errors}`);
    }

    const baseline = data as Baseline;
    checkSelfConsistency(baseline);
    return baseline;
  }

  /** Write a new baseline, replacing the previous one. */
  save(baseline: Baseline): void {
    fs.mkdirSync(path.dirname(this.baselinePath), { recursive: true });
    const tmp = `${this.baselinePath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(baseline, null, 2) + "\n", "utf8");
    fs.renameSync(tmp, this.baselinePath);
  }

  /** Create a baseline record from a freshly computed manifest. */
  static create(manifest: Manifest, master: MasterFingerprint, createdAt: Date = new Date()): Baseline {
    return {
      schema_version: BASELINE_SCHEMA_VERSION,
      created_at: createdAt.toISOString(),
      master: { algorithm_version: master.algorithm_version, layers: { ...master.layers }, hash: master.hash },
      manifest: {
        algorithm_version: manifest.algorithm_version,
        layers: { ...manifest.layers },
        members: Object.fromEntries(Object.entries(manifest.members).map(([k, v]) => [k, [...v]])),
        files: manifest.files.map((f) => ({ ...f })),
        missing: manifest.missing.map((m) => ({ ...m })),
      },
    };
  }
}

/** Layer hashes must follow from the stored fingerprints, and the master hash from the layers. */
function checkSelfConsistency(baseline: Baseline): void {
  const { manifest, master } = baseline;
  const byPath = new Map(manifest.files.map((f) => [f.path, f]));

  if (manifest.algorithm_version !== master.algorithm_version) {
    throw new BaselineCorruptError("manifest and master fingerprint disagree on algorithm_version");
  }

  const names = new Set([...Object.keys(manifest.layers), ...Object.keys(master.layers)]);
  for (const name of names) {
    const memberPaths = manifest.members[name] ?? [];
    const fingerprints = memberPaths.flatMap((p) => byPath.get(p) ?? []);
    if (fingerprints.length !== memberPaths.length) {
      throw new BaselineCorruptError(`layer '${name}' lists members without fingerprints`);
    }
    const recomputed = hashLayer(fingerprints);
    if (manifest.layers[name] !== recomputed || master.layers[name] !== recomputed) {
      throw new BaselineCorruptError(`layer '${name}' hash does not match its fingerprints`);
    }
  }

  if (computeMasterHash(master.algorithm_version, master.layers) !== master.hash) {
    throw new BaselineCorruptError("master hash does not match its layers");
  }
}
