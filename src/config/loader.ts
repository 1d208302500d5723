import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { CertConfig } from "../types/config.js";
import { ConfigError, errorMessage } from "../errors.js";

export const DEFAULT_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "CERTCTL_";

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isRecord(val) && isRecord(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigRecord {
  if (!fs.existsSync(filePath)) return {};
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConfigError(`${filePath}: ${errorMessage(e)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) throw new ConfigError(`${filePath}: top level must be a mapping`);
  return parsed;
}

/**
 * Apply CERTCTL_ prefixed environment variable overrides.
 * CERTCTL_STATE_DIR → state_dir, CERTCTL_LEDGER__TIMEOUT_MS → ledger.timeout_ms.
 * Values are read as YAML scalars, so numbers and booleans keep their type.
 */
function applyEnvOverrides(config: ConfigRecord, env: NodeJS.ProcessEnv): ConfigRecord {
  let result = config;
  for (const key of Object.keys(env).sort()) {
    const value = env[key];
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;

    let override: unknown = YAML.parse(value);
    for (const segment of [...segments].reverse()) override = { [segment]: override };
    if (isRecord(override)) result = deepMerge(result, override);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← env.yaml ← environment variables.
 *
 * @param envName - Optional environment name (e.g., "ci"). Loads `config/{envName}.yaml` as override layer.
 * @param configDir - Optional config directory path override.
 */
export function loadConfig(
  envName?: string,
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env,
): ConfigRecord {
  const dir = configDir ?? DEFAULT_CONFIG_DIR;

  // Layer 1: base.yaml
  let merged = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: environment-specific override
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  // Layer 3: environment variables
  return applyEnvOverrides(merged, env);
}

export type ResolvedLocations = {
  root: string;
  stateDir: string;
  baselinePath: string;
  receiptPath: string;
  anchorsPath: string;
  statePath: string;
  /** Only for the file-backed ledger. */
  ledgerPath: string | null;
};

/** Absolute locations of everything the pipeline reads or writes. Relative paths resolve against `cwd`. */
export function resolveLocations(config: CertConfig, cwd: string = process.cwd()): ResolvedLocations {
  const root = path.resolve(cwd, config.root ?? ".");
  const stateDir = path.resolve(cwd, config.state_dir);
  return {
    root,
    stateDir,
    baselinePath: path.join(stateDir, "baseline.json"),
    receiptPath: path.join(stateDir, "receipt.json"),
    anchorsPath: path.join(stateDir, "anchors.json"),
    statePath: path.join(stateDir, "state.json"),
    ledgerPath: config.ledger.kind === "file" ? path.resolve(stateDir, config.ledger.path ?? "ledger.jsonl") : null,
  };
}
