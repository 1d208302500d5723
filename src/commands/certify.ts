import type { AdapterOutput, SourceFormat } from "../types/adapter-output.js";
import type { PipelineState } from "../types/state.js";
import type { CertificationReceipt } from "../types/receipt.js";
import type { LedgerAnchor } from "../types/ledger.js";
import { InvalidReceiptInputError } from "../errors.js";
import { adaptValidationResults } from "../adapter/adapter.js";
import { DocumentSchemas } from "../schema/documents.js";
import { CertificationPipeline, type PipelineResult } from "../core/pipeline.js";
import { failedStage } from "../core/state-machine.js";
import { createLedgerClient, loadContext, resolveEngine, type CommandOptions } from "./context.js";
import { diag, failure, warnings, type CommandResult } from "./diagnostic.js";
import { EXIT, exitCodeForCode } from "./exit-codes.js";

export type CertifyOptions = CommandOptions & {
  /** Test-harness output: JUnit XML, a JSON map or claim results. */
  resultsPath: string;
  resultsFormat?: SourceFormat;
  engineVersion?: string;
};

export type CertifyOutput = {
  state: PipelineState;
  receipt: CertificationReceipt | null;
  anchor: LedgerAnchor | null;
  validation: AdapterOutput;
};

/** Turn a finished pipeline run into a command result, keeping its warnings. */
export function fromPipeline<T>(result: PipelineResult, value: T): CommandResult<T> {
  const { state } = result;
  if (!result.success) {
    const stage = failedStage(state.current);
    return {
      ok: false,
      error: diag("error", state.error_code ?? "INTERNAL", state.error ?? `pipeline ${state.current}`, {
        details: { stage, run_id: state.run_id },
      }),
      exitCode: exitCodeForCode(state.error_code ?? "INTERNAL"),
    };
  }
  return { ok: true, value, exitCode: EXIT.SUCCESS, warnings: warnings(state.warnings) };
}

/**
 * Run the full pipeline: fingerprint, manifest (new baseline), receipt, anchor.
 * An unreachable ledger still yields a valid receipt with the anchor pending.
 */
export async function certify(opts: CertifyOptions): Promise<CommandResult<CertifyOutput>> {
  try {
    const ctx = await loadContext(opts);

    const validation = adaptValidationResults(opts.resultsPath, opts.resultsFormat);
    const schemas = DocumentSchemas.load();
    const checked = schemas.check("adapter-output", validation);
    if (!checked.valid) throw new InvalidReceiptInputError(`${opts.resultsPath}: ${checked.errors}`);

    const pipeline = new CertificationPipeline({
      config: ctx.config,
      locations: ctx.locations,
      ledger: createLedgerClient(ctx, opts.ledger),
      policy: ctx.policy,
      registry: ctx.registry,
      schemas,
    });
    const result = await pipeline.run({
      validation: validation.validation,
      engine: await resolveEngine(ctx, opts.engineVersion),
    });

    const outcome = fromPipeline(result, {
      state: result.state,
      receipt: result.receipt ?? null,
      anchor: result.anchor ?? null,
      validation,
    });
    if (outcome.ok && validation.skipped.length > 0) {
      outcome.warnings.push(diag("warn", "VALIDATION_SKIPPED", `no verdict for: ${validation.skipped.join(", ")}`));
    }
    return outcome;
  } catch (e) {
    return failure(e, "CERTIFIED");
  }
}
