import type { CertConfig } from "../types/config.js";
import type { EngineIdentity } from "../types/receipt.js";
import type { RetryPolicy } from "../types/ledger.js";
import { ConfigError, errorMessage } from "../errors.js";
import { resolveLocations, type ResolvedLocations } from "../config/loader.js";
import { loadValidatedConfig, retryPolicyFrom } from "../config/validator.js";
import type { LedgerClient } from "../ledger/client.js";
import { FileLedger } from "../ledger/file-ledger.js";
import { HttpLedgerClient } from "../ledger/http-ledger.js";
import { GitOperations } from "../git/operations.js";
import { NormalizerRegistry } from "../normalizer/normalizer.js";

/** Options every command accepts. */
export type CommandOptions = {
  /** Config directory holding base.yaml and <env>.yaml. */
  configDir?: string;
  env?: string;
  /** Base for relative paths in the config. */
  cwd?: string;
  environ?: NodeJS.ProcessEnv;
  /** Replaces the configured ledger client. */
  ledger?: LedgerClient;
};

export type CommandContext = {
  config: CertConfig;
  locations: ResolvedLocations;
  policy: RetryPolicy;
  registry: NormalizerRegistry;
};

export async function loadContext(opts: CommandOptions): Promise<CommandContext> {
  const config = await loadValidatedConfig(opts.env, opts.configDir, opts.environ ?? process.env);
  return {
    config,
    locations: resolveLocations(config, opts.cwd),
    policy: retryPolicyFrom(config),
    registry: new NormalizerRegistry(undefined, config.kinds ?? {}),
  };
}

export function createLedgerClient(ctx: CommandContext, override?: LedgerClient): LedgerClient {
  if (override) return override;
  const { ledger } = ctx.config;
  if (ledger.kind === "http") {
    if (!ledger.endpoint) throw new ConfigError("ledger.endpoint is required when ledger.kind is http");
    return new HttpLedgerClient(ledger.endpoint);
  }
  if (!ctx.locations.ledgerPath) throw new ConfigError("ledger.path could not be resolved");
  return new FileLedger(ctx.locations.ledgerPath);
}

/** Engine identity from the command line, the config, or `git describe` of the project root. */
export async function resolveEngine(ctx: CommandContext, versionOverride?: string): Promise<EngineIdentity> {
  const version = versionOverride ?? ctx.config.engine.version;
  if (version) return { name: ctx.config.engine.name, version };
  try {
    return { name: ctx.config.engine.name, version: await new GitOperations(ctx.locations.root).describe() };
  } catch (e) {
    throw new ConfigError(`engine.version is not configured and git describe failed: ${errorMessage(e)}`);
  }
}
