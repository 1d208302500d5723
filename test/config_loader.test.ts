import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import type { CertConfig } from "../src/types/config.js";
import { loadConfig, resolveLocations } from "../src/config/loader.js";
import { loadValidatedConfig, retryPolicyFrom, validateConfig } from "../src/config/validator.js";
import { ConfigError } from "../src/errors.js";

describe("loadConfig", () => {
  it("loads the shipped base config", () => {
    const config = loadConfig(undefined, undefined, {});
    expect(config.state_dir).toBe(".certctl");
    expect(config.ledger).toEqual({
      kind: "file",
      path: "ledger.jsonl",
      timeout_ms: 10000,
      max_attempts: 4,
      base_delay_ms: 500,
      max_delay_ms: 8000,
    });
  });

  it("layers the environment file over the base", () => {
    const config = loadConfig("ci", undefined, {});
    expect(config.state_dir).toBe(".certctl/ci");
    expect(config.discovery).toBe("git");
    expect(config.ledger).toEqual({
      kind: "file",
      path: "ledger.jsonl",
      timeout_ms: 5000,
      max_attempts: 2,
      base_delay_ms: 100,
      max_delay_ms: 8000,
    });
  });

  it("applies prefixed environment variables last, keeping scalar types", () => {
    const config = loadConfig("ci", undefined, {
      CERTCTL_STATE_DIR: "/var/lib/certctl",
      CERTCTL_LEDGER__TIMEOUT_MS: "2500",
      HOME: "/root",
    });
    expect(config.state_dir).toBe("/var/lib/certctl");
    expect(config.ledger).toMatchObject({ timeout_ms: 2500, max_attempts: 2 });
    expect(config).not.toHaveProperty("home");
  });
});

describe("loadValidatedConfig", () => {
  let tmpDir: string;

  function writeBase(value: unknown): void {
    fs.writeFileSync(path.join(tmpDir, "base.yaml"), YAML.stringify(value));
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "certctl-config-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("accepts the shipped configs", async () => {
    await expect(loadValidatedConfig(undefined, undefined, {})).resolves.toMatchObject({ engine: { name: "engine" } });
    await expect(loadValidatedConfig("ci", undefined, {})).resolves.toMatchObject({ discovery: "git" });
  });

  it("rejects a config without a ledger section", async () => {
    writeBase({ schema_version: "1.0.0", state_dir: ".certctl", engine: { name: "e" }, layers: { src: {} } });
    await expect(loadValidatedConfig(undefined, tmpDir, {})).rejects.toThrow(
      "Invalid config: data must have required property 'ledger'",
    );
  });

  it("rejects unknown layer keys", async () => {
    writeBase({
      schema_version: "1.0.0",
      state_dir: ".certctl",
      engine: { name: "e" },
      layers: { src: { includes: ["src/**"] } },
      ledger: { kind: "file" },
    });
    await expect(loadValidatedConfig(undefined, tmpDir, {})).rejects.toThrow(ConfigError);
  });

  it("requires an endpoint for the http ledger", async () => {
    const result = await validateConfig({
      schema_version: "1.0.0",
      state_dir: ".certctl",
      engine: { name: "e" },
      layers: { src: {} },
      ledger: { kind: "http" },
    });
    expect(result).toEqual({ valid: false, errors: "ledger.endpoint is required when ledger.kind is http" });
  });

  it("switches to the http ledger through the environment", async () => {
    const config = await loadValidatedConfig(undefined, undefined, {
      CERTCTL_LEDGER__KIND: "http",
      CERTCTL_LEDGER__ENDPOINT: "https://ledger.test/api",
    });
    expect(config.ledger.kind).toBe("http");
    expect(config.ledger.endpoint).toBe("https://ledger.test/api");
  });

  it("rejects a config file whose top level is not a mapping", async () => {
    fs.writeFileSync(path.join(tmpDir, "base.yaml"), "- a\n- b\n");
    expect(() => loadConfig(undefined, tmpDir, {})).toThrow(
      `${path.join(tmpDir, "base.yaml")}: top level must be a mapping`,
    );
  });
});

describe("resolveLocations", () => {
  const base: CertConfig = {
    schema_version: "1.0.0",
    state_dir: ".certctl",
    root: "engine",
    engine: { name: "e" },
    layers: { src: {} },
    ledger: { kind: "file" },
  };

  it("resolves state files under state_dir and the root against cwd", () => {
    const loc = resolveLocations(base, "/work");
    expect(loc).toEqual({
      root: "/work/engine",
      stateDir: "/work/.certctl",
      baselinePath: "/work/.certctl/baseline.json",
      receiptPath: "/work/.certctl/receipt.json",
      anchorsPath: "/work/.certctl/anchors.json",
      statePath: "/work/.certctl/state.json",
      ledgerPath: "/work/.certctl/ledger.jsonl",
    });
  });

  it("keeps an absolute ledger path and has none for the http ledger", () => {
    expect(resolveLocations({ ...base, ledger: { kind: "file", path: "/srv/ledger.jsonl" } }, "/work").ledgerPath).toBe(
      "/srv/ledger.jsonl",
    );
    expect(resolveLocations({ ...base, ledger: { kind: "http", endpoint: "https://ledger.test" } }, "/work").ledgerPath).toBeNull();
  });
});

describe("retryPolicyFrom", () => {
  it("fills in defaults for unset fields", () => {
    const config: CertConfig = {
      schema_version: "1.0.0",
      state_dir: ".certctl",
      engine: { name: "e" },
      layers: { src: {} },
      ledger: { kind: "file", max_attempts: 2 },
    };
    expect(retryPolicyFrom(config)).toEqual({ timeout_ms: 10000, max_attempts: 2, base_delay_ms: 500, max_delay_ms: 8000 });
  });
});
