import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { SimpleGit } from "simple-git";
import type { SourceFile } from "../src/types/fingerprint.js";
import { fingerprintFile } from "../src/fingerprint/fingerprinter.js";
import { fingerprintAssigned, fingerprintFiles } from "../src/fingerprint/pool.js";
import { assignLayers, listCandidateFiles, toCanonicalPath } from "../src/fingerprint/discovery.js";
import { NormalizerRegistry } from "../src/normalizer/normalizer.js";
import { typescriptNormalizer } from "../src/normalizer/typescript.js";
import { sha256Hex, sha256Parts } from "../src/fingerprint/checksum.js";
import { GitOperations } from "../src/git/operations.js";
import { computeManifest } from "../src/manifest/compute.js";
import { MissingCriticalFileError } from "../src/errors.js";

const registry = new NormalizerRegistry();

function source(filePath: string, content: string | Buffer): SourceFile {
  return {
    path: filePath,
    content: typeof content === "string" ? Buffer.from(content, "utf8") : content,
    kind: registry.detectKind(filePath),
    layers: ["source"],
    critical: [],
  };
}

describe("fingerprintFile", () => {
  it("hashes the canonical form under the normalizer version", () => {
    const content = "const a = 1;\n";
    const fp = fingerprintFile(source("src/a.ts", content), registry);
    expect(fp.mode).toBe("SEMANTIC");
    expect(fp.kind).toBe("typescript");
    expect(fp.normalizer).toBe(typescriptNormalizer.version);
    expect(fp.hash).toBe(sha256Parts("semantic", typescriptNormalizer.version, typescriptNormalizer.normalize(content, "src/a.ts")));
    expect(fp.raw_hash).toBe(sha256Hex(Buffer.from(content, "utf8")));
    expect(fp.fallback_reason).toBeUndefined();
  });

  it("is insensitive to comments but records the raw change", () => {
    const a = fingerprintFile(source("src/a.ts", "const a = 1;\n"), registry);
    const b = fingerprintFile(source("src/a.ts", "// seed\nconst a = 1; // one\n"), registry);
    expect(b.hash).toBe(a.hash);
    expect(b.raw_hash).not.toBe(a.raw_hash);
  });

  it("treats CRLF line endings and a BOM as cosmetic", () => {
    const lf = fingerprintFile(source("solver/run.py", "x = 1\ny = 2\n"), registry);
    const crlf = fingerprintFile(source("solver/run.py", "\uFEFFx = 1\r\ny = 2\r\n"), registry);
    expect(crlf.hash).toBe(lf.hash);
  });

  it("falls back to raw bytes on a parse error", () => {
    const content = Buffer.from("const = ;", "utf8");
    const fp = fingerprintFile(source("src/bad.ts", content), registry);
    expect(fp.mode).toBe("RAW_FALLBACK");
    expect(fp.normalizer).toBe("raw");
    expect(fp.hash).toBe(sha256Parts("raw", content));
    expect(fp.fallback_reason).toMatch(/^src\/bad\.ts: /);
  });

  it("always takes the raw path for unstructured files", () => {
    const fp = fingerprintFile(source("README.md", "# Engine\n"), registry);
    expect(fp.mode).toBe("RAW_FALLBACK");
    expect(fp.kind).toBe("unstructured");
    expect(fp.fallback_reason).toBe("no normalizer for kind 'unstructured'");
  });

  it("returns a frozen fingerprint", () => {
    const fp = fingerprintFile(source("src/a.ts", "const a = 1;"), registry);
    expect(Object.isFrozen(fp)).toBe(true);
  });

  it("does not swallow normalizer bugs", () => {
    const broken = new NormalizerRegistry([
      {
        kind: "json",
        version: "custom/1",
        normalize: () => {
          throw new Error("boom");
        },
      },
    ]);
    expect(() => fingerprintFile(source("data.json", "{}"), broken)).toThrow("Normalizer custom/1 failed on data.json: boom");
  });
});

describe("fingerprint pool", () => {
  const files = [
    source("src/z.ts", "export const z = 26;"),
    source("src/a.py", "a = 1\n"),
    source("config/app.json", '{"threads": 4}'),
    source("src/m.ts", "export const m = 13;"),
  ];

  it("returns fingerprints sorted by path whatever the input order", async () => {
    const forward = await fingerprintFiles(files, registry, 1);
    const backward = await fingerprintFiles([...files].reverse(), registry, 3);
    expect(forward.map((f) => f.path)).toEqual(["config/app.json", "src/a.py", "src/m.ts", "src/z.ts"]);
    expect(backward).toEqual(forward);
  });

  describe("from disk", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "certctl-pool-"));
      fs.mkdirSync(path.join(tmpDir, "src"));
      fs.writeFileSync(path.join(tmpDir, "src", "a.py"), "a = 1\n");
      fs.writeFileSync(path.join(tmpDir, "src", "b.ts"), "export const b = 2;\n");
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("reads assigned files and detects their kind", async () => {
      const fps = await fingerprintAssigned(
        tmpDir,
        [
          { path: "src/b.ts", layers: ["source"], critical: [] },
          { path: "src/a.py", layers: ["source"], critical: ["source"] },
        ],
        registry,
        2,
      );
      expect(fps.map((f) => [f.path, f.kind, f.mode])).toEqual([
        ["src/a.py", "python", "SEMANTIC"],
        ["src/b.ts", "typescript", "SEMANTIC"],
      ]);
      expect(fps[0].hash).toBe(fingerprintFile(source("src/a.py", "a = 1\n"), registry).hash);
    });
  });
});

describe("discovery", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "certctl-discovery-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("canonicalizes paths", () => {
    expect(toCanonicalPath("./src\\a.ts")).toBe("src/a.ts");
    expect(toCanonicalPath("src/../lib/b.ts")).toBe("lib/b.ts");
  });

  it("walks the tree in code-unit order, skipping .git and node_modules", async () => {
    for (const rel of ["a.ts", "B.ts", "src/x.py", "node_modules/dep/index.js", ".git/HEAD", ".github/ci.yml"]) {
      fs.mkdirSync(path.dirname(path.join(tmpDir, rel)), { recursive: true });
      fs.writeFileSync(path.join(tmpDir, rel), "x");
    }
    expect(await listCandidateFiles(tmpDir, "fs")).toEqual([".github/ci.yml", "B.ts", "a.ts", "src/x.py"]);
  });

  it("leaves out excluded directories such as the state directory", async () => {
    for (const rel of ["src/a.py", ".certctl/state.json", ".certctl/baseline.json", ".certctl-notes.txt"]) {
      fs.mkdirSync(path.dirname(path.join(tmpDir, rel)), { recursive: true });
      fs.writeFileSync(path.join(tmpDir, rel), "x");
    }
    const files = await listCandidateFiles(tmpDir, "fs", { excludeDirs: [path.join(tmpDir, ".certctl")] });
    expect(files).toEqual([".certctl-notes.txt", "src/a.py"]);
  });

  it("drops tracked files deleted from the working tree in git mode", async () => {
    fs.mkdirSync(path.join(tmpDir, "src"));
    fs.writeFileSync(path.join(tmpDir, "src", "a.py"), "a = 1\n");
    fs.writeFileSync(path.join(tmpDir, "src", "c.py"), "c = 3\n");
    const raw = vi.fn().mockResolvedValue("src/a.py\0src/b.py\0src/c.py\0");
    const git = new GitOperations(tmpDir, { raw } as unknown as SimpleGit);

    expect(await listCandidateFiles(tmpDir, "git", { git })).toEqual(["src/a.py", "src/c.py"]);
    await expect(
      computeManifest({
        root: tmpDir,
        discovery: "git",
        git,
        layers: { source: { include: ["src/**/*.py"], critical: ["src/b.py"] } },
      }),
    ).rejects.toBeInstanceOf(MissingCriticalFileError);
  });

  it("assigns layers from globs, declared files and critical files", () => {
    const assignments = assignLayers(
      ["src/util.py", "notes.txt", "src/core.py", "src/test_util.py", "settings.yaml"],
      {
        source: { include: ["src/**/*.py"], exclude: ["src/**/test_*.py"], critical: ["src/core.py"] },
        config: { files: ["settings.yaml"] },
      },
    );
    expect(assignments).toEqual([
      { path: "settings.yaml", layers: ["config"], critical: [] },
      { path: "src/core.py", layers: ["source"], critical: ["source"] },
      { path: "src/util.py", layers: ["source"], critical: [] },
    ]);
  });

  it("lets one file join several layers", () => {
    const assignments = assignLayers(["src/core.py"], {
      source: { include: ["src/**"] },
      critical_core: { critical: ["src/core.py"] },
    });
    expect(assignments).toEqual([{ path: "src/core.py", layers: ["critical_core", "source"], critical: ["critical_core"] }]);
  });
});

describe("git operations", () => {
  it("lists tracked files from ls-files -z", async () => {
    const raw = vi.fn().mockResolvedValue("src/a.ts\0src/b c.py\0");
    const git = new GitOperations("/repo", { raw } as unknown as SimpleGit);
    expect(await git.listTrackedFiles()).toEqual(["src/a.ts", "src/b c.py"]);
    expect(raw).toHaveBeenCalledWith(["ls-files", "-z"]);
  });

  it("describes HEAD for the engine version", async () => {
    const raw = vi.fn().mockResolvedValue("v1.4.0-3-gabc1234\n");
    const git = new GitOperations("/repo", { raw } as unknown as SimpleGit);
    expect(await git.describe()).toBe("v1.4.0-3-gabc1234");
    expect(raw).toHaveBeenCalledWith(["describe", "--tags", "--always", "--dirty"]);
  });
});
