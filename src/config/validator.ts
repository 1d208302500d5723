import { createSchemaCompiler } from "../schema/compiler.js";
import type { CertConfig } from "../types/config.js";
import type { RetryPolicy } from "../types/ledger.js";
import { ConfigError } from "../errors.js";
import { DEFAULT_RETRY_POLICY } from "../ledger/retry.js";
import { loadConfig } from "./loader.js";

const stringList = { type: "array", items: { type: "string", minLength: 1 } };

/** Config schema: required fields, layer shape and ledger settings. */
const CONFIG_SCHEMA = {
  type: "object",
  additionalProperties: false,
  required: ["schema_version", "state_dir", "engine", "layers", "ledger"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    state_dir: { type: "string", minLength: 1 },
    root: { type: "string", minLength: 1 },
    discovery: { enum: ["fs", "git"] },
    concurrency: { type: "integer", minimum: 1 },
    engine: {
      type: "object",
      additionalProperties: false,
      required: ["name"],
      properties: {
        name: { type: "string", minLength: 1 },
        version: { type: "string", minLength: 1 },
      },
    },
    layers: {
      type: "object",
      minProperties: 1,
      propertyNames: { type: "string", pattern: "^[A-Za-z0-9][A-Za-z0-9_.-]*$" },
      additionalProperties: {
        type: "object",
        additionalProperties: false,
        properties: {
          include: stringList,
          exclude: stringList,
          files: stringList,
          critical: stringList,
        },
      },
    },
    kinds: {
      type: "object",
      additionalProperties: { enum: ["typescript", "javascript", "python", "json", "yaml", "unstructured"] },
    },
    ledger: {
      type: "object",
      additionalProperties: false,
      required: ["kind"],
      properties: {
        kind: { enum: ["file", "http"] },
        path: { type: "string", minLength: 1 },
        endpoint: { type: "string", format: "uri" },
        timeout_ms: { type: "integer", minimum: 1 },
        max_attempts: { type: "integer", minimum: 1 },
        base_delay_ms: { type: "integer", minimum: 0 },
        max_delay_ms: { type: "integer", minimum: 0 },
      },
    },
  },
};

export type ConfigValidationResult = {
  valid: boolean;
  errors: string | null;
};

/** Validate a loaded config against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const ajv = createSchemaCompiler();
  const validate = ajv.compile(CONFIG_SCHEMA);
  const valid = validate(config);
  if (!valid) return { valid, errors: ajv.errorsText(validate.errors) };

  const ledger = (config as CertConfig).ledger;
  if (ledger.kind === "http" && !ledger.endpoint) {
    return { valid: false, errors: "ledger.endpoint is required when ledger.kind is http" };
  }
  return { valid: true, errors: null };
}

/** Load, merge and validate. Throws ConfigError when the result fails the schema. */
export async function loadValidatedConfig(
  envName?: string,
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<CertConfig> {
  const config = loadConfig(envName, configDir, env);
  const { valid, errors } = await validateConfig(config);
  if (!valid) throw new ConfigError(`Invalid config: ${errors}`);
  return config as unknown as CertConfig;
}

/** Retry policy for ledger calls, defaults filled in. */
export function retryPolicyFrom(config: CertConfig): RetryPolicy {
  return {
    timeout_ms: config.ledger.timeout_ms ?? DEFAULT_RETRY_POLICY.timeout_ms,
    max_attempts: config.ledger.max_attempts ?? DEFAULT_RETRY_POLICY.max_attempts,
    base_delay_ms: config.ledger.base_delay_ms ?? DEFAULT_RETRY_POLICY.base_delay_ms,
    max_delay_ms: config.ledger.max_delay_ms ?? DEFAULT_RETRY_POLICY.max_delay_ms,
  };
}
