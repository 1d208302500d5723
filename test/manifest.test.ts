import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { FileFingerprint } from "../src/types/fingerprint.js";
import type { LayerAssignment } from "../src/fingerprint/discovery.js";
import { buildManifest, hashLayer } from "../src/manifest/manifest-builder.js";
import { ALGORITHM_VERSION, aggregate, computeMasterHash, isComparable } from "../src/manifest/aggregator.js";
import { BaselineManager } from "../src/manifest/baseline-manager.js";
import { sha256Hex } from "../src/fingerprint/checksum.js";
import { BaselineCorruptError, MissingCriticalFileError } from "../src/errors.js";

function fp(filePath: string, digit: string): FileFingerprint {
  return {
    path: filePath,
    hash: digit.repeat(64),
    mode: "SEMANTIC",
    kind: "python",
    normalizer: "py-tokens/1",
    raw_hash: "f".repeat(64),
  };
}

function assigned(filePath: string, layers: string[], critical: string[] = []): LayerAssignment {
  return { path: filePath, layers, critical };
}

const LAYERS = {
  source: { include: ["src/**"], critical: ["src/b.py"], files: ["src/extra.py"] },
  config: { files: ["cfg.yaml"] },
};

const ASSIGNMENTS = [assigned("src/a.py", ["source"]), assigned("src/b.py", ["source"], ["source"])];
const FINGERPRINTS = [fp("src/b.py", "b"), fp("tools/x.py", "c"), fp("src/a.py", "a")];

describe("hashLayer", () => {
  it("hashes path NUL hash LF entries in path order", () => {
    const expected = sha256Hex(`src/a.py\0${"a".repeat(64)}\nsrc/b.py\0${"b".repeat(64)}\n`);
    expect(hashLayer([fp("src/b.py", "b"), fp("src/a.py", "a")])).toBe(expected);
  });

  it("hashes an empty layer as the digest of nothing", () => {
    expect(hashLayer([])).toBe(sha256Hex(""));
  });
});

describe("buildManifest", () => {
  it("covers exactly the configured layers", () => {
    const manifest = buildManifest({ layers: LAYERS, assignments: ASSIGNMENTS, fingerprints: FINGERPRINTS });
    expect(Object.keys(manifest.layers)).toEqual(["config", "source"]);
    expect(manifest.members).toEqual({ config: [], source: ["src/a.py", "src/b.py"] });
    expect(manifest.layers.source).toBe(hashLayer([fp("src/a.py", "a"), fp("src/b.py", "b")]));
    expect(manifest.layers.config).toBe(sha256Hex(""));
    expect(manifest.algorithm_version).toBe(ALGORITHM_VERSION);
  });

  it("ignores fingerprints assigned to no configured layer", () => {
    const manifest = buildManifest({ layers: LAYERS, assignments: ASSIGNMENTS, fingerprints: FINGERPRINTS });
    expect(manifest.files.map((f) => f.path)).toEqual(["src/a.py", "src/b.py"]);
  });

  it("records absent non-critical declared files", () => {
    const manifest = buildManifest({ layers: LAYERS, assignments: ASSIGNMENTS, fingerprints: FINGERPRINTS });
    expect(manifest.missing).toEqual([
      { layer: "config", path: "cfg.yaml" },
      { layer: "source", path: "src/extra.py" },
    ]);
  });

  it("throws MissingCriticalFileError naming layer and path", () => {
    const build = () =>
      buildManifest({
        layers: LAYERS,
        assignments: [assigned("src/a.py", ["source"])],
        fingerprints: [fp("src/a.py", "a")],
      });
    expect(build).toThrow(MissingCriticalFileError);
    expect(build).toThrow("Critical file missing from layer 'source': src/b.py");
  });

  it("does not depend on input order", () => {
    const a = buildManifest({ layers: LAYERS, assignments: ASSIGNMENTS, fingerprints: FINGERPRINTS });
    const b = buildManifest({
      layers: { config: LAYERS.config, source: LAYERS.source },
      assignments: [...ASSIGNMENTS].reverse(),
      fingerprints: [...FINGERPRINTS].reverse(),
    });
    expect(b).toEqual(a);
  });

  it("is frozen", () => {
    const manifest = buildManifest({ layers: LAYERS, assignments: ASSIGNMENTS, fingerprints: FINGERPRINTS });
    expect(Object.isFrozen(manifest)).toBe(true);
    expect(Object.isFrozen(manifest.layers)).toBe(true);
    expect(Object.isFrozen(manifest.files[0])).toBe(true);
  });
});

describe("aggregate", () => {
  const layers = { source: "1".repeat(64), config: "2".repeat(64) };

  it("hashes the version followed by sorted layer entries", () => {
    const expected = sha256Hex(`${ALGORITHM_VERSION}\nconfig\0${"2".repeat(64)}\nsource\0${"1".repeat(64)}\n`);
    expect(computeMasterHash(ALGORITHM_VERSION, layers)).toBe(expected);
  });

  it("is independent of layer enumeration order", () => {
    const reordered = { config: layers.config, source: layers.source };
    expect(computeMasterHash(ALGORITHM_VERSION, reordered)).toBe(computeMasterHash(ALGORITHM_VERSION, layers));
  });

  it("embeds the algorithm version in the hash input", () => {
    expect(computeMasterHash("layered-sha256/2", layers)).not.toBe(computeMasterHash(ALGORITHM_VERSION, layers));
  });

  it("aggregates a manifest into a frozen master fingerprint", () => {
    const manifest = buildManifest({ layers: LAYERS, assignments: ASSIGNMENTS, fingerprints: FINGERPRINTS });
    const master = aggregate(manifest);
    expect(master.algorithm_version).toBe(ALGORITHM_VERSION);
    expect(master.layers).toEqual(manifest.layers);
    expect(master.hash).toBe(computeMasterHash(ALGORITHM_VERSION, manifest.layers));
    expect(Object.isFrozen(master)).toBe(true);
  });

  it("only compares fingerprints of the same algorithm version", () => {
    const a = { algorithm_version: ALGORITHM_VERSION, layers, hash: "0".repeat(64) };
    expect(isComparable(a, { ...a })).toBe(true);
    expect(isComparable(a, { ...a, algorithm_version: "layered-sha256/2" })).toBe(false);
  });
});

describe("BaselineManager", () => {
  let tmpDir: string;
  const manifest = buildManifest({ layers: LAYERS, assignments: ASSIGNMENTS, fingerprints: FINGERPRINTS });
  const master = aggregate(manifest);
  const createdAt = new Date("2026-03-01T12:00:00.000Z");

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "certctl-baseline-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("returns null before anything is saved", async () => {
    const manager = new BaselineManager(path.join(tmpDir, "baseline.json"));
    expect(manager.exists()).toBe(false);
    expect(await manager.load()).toBeNull();
  });

  it("round-trips a saved baseline", async () => {
    const manager = new BaselineManager(path.join(tmpDir, "nested", "baseline.json"));
    const baseline = BaselineManager.create(manifest, master, createdAt);
    manager.save(baseline);
    const loaded = await manager.load();
    expect(loaded).toEqual(baseline);
    expect(loaded?.created_at).toBe("2026-03-01T12:00:00.000Z");
    expect(fs.existsSync(`${manager.path}.tmp`)).toBe(false);
  });

  it("keeps baselines at different paths independent", async () => {
    const first = new BaselineManager(path.join(tmpDir, "a.json"));
    const second = new BaselineManager(path.join(tmpDir, "b.json"));
    first.save(BaselineManager.create(manifest, master, createdAt));
    expect(await second.load()).toBeNull();
    expect((await first.load())?.master.hash).toBe(master.hash);
  });

  it("rejects unparseable files", async () => {
    const file = path.join(tmpDir, "baseline.json");
    fs.writeFileSync(file, "{ truncated");
    await expect(new BaselineManager(file).load()).rejects.toThrow(BaselineCorruptError);
  });

  it("rejects files that fail the schema", async () => {
    const file = path.join(tmpDir, "baseline.json");
    fs.writeFileSync(file, JSON.stringify({ schema_version: "1.0.0" }));
    await expect(new BaselineManager(file).load()).rejects.toThrow(BaselineCorruptError);
  });

  it("rejects a layer hash that does not follow from its fingerprints", async () => {
    const file = path.join(tmpDir, "baseline.json");
    const baseline = BaselineManager.create(manifest, master, createdAt);
    baseline.manifest.files[0].hash = "9".repeat(64);
    new BaselineManager(file).save(baseline);
    await expect(new BaselineManager(file).load()).rejects.toThrow("layer 'source' hash does not match its fingerprints");
  });

  it("rejects a master hash that does not follow from its layers", async () => {
    const file = path.join(tmpDir, "baseline.json");
    const baseline = BaselineManager.create(manifest, master, createdAt);
    baseline.master.hash = "9".repeat(64);
    new BaselineManager(file).save(baseline);
    await expect(new BaselineManager(file).load()).rejects.toThrow("master hash does not match its layers");
  });
});
