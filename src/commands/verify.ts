import type { Baseline } from "../types/baseline.js";
import type { LocalVerificationResult } from "../types/verification.js";
import { MissingCriticalFileError } from "../errors.js";
import { computeManifest } from "../manifest/compute.js";
import { BaselineManager } from "../manifest/baseline-manager.js";
import { verifyLocal } from "../verify/local.js";
import { loadContext, type CommandContext, type CommandOptions } from "./context.js";
import { diag, failure, warnings, type CommandResult } from "./diagnostic.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type VerifyOptions = CommandOptions & {
  /** Baseline file to compare against; defaults to <state_dir>/baseline.json. */
  baselinePath?: string;
};

const STATUS_EXIT: Record<LocalVerificationResult["status"], ExitCode> = {
  MATCH: EXIT.SUCCESS,
  PARSE_FALLBACK_PRESENT: EXIT.SUCCESS,
  MISMATCH: EXIT.VERIFICATION_FAILED,
  INCOMPARABLE: EXIT.VERIFICATION_FAILED,
  MISSING_FILE: EXIT.MISSING_CRITICAL,
};

export async function loadBaseline(ctx: CommandContext, baselinePath?: string): Promise<Baseline | null> {
  return new BaselineManager(baselinePath ?? ctx.locations.baselinePath).load();
}

/** Recompute the current manifest and compare it against the baseline. Never writes. */
export async function currentAgainst(ctx: CommandContext, baseline: Baseline): Promise<LocalVerificationResult> {
  try {
    const { manifest } = await computeManifest({
      root: ctx.locations.root,
      layers: ctx.config.layers,
      discovery: ctx.config.discovery,
      excludeDirs: [ctx.locations.stateDir],
      concurrency: ctx.config.concurrency,
      registry: ctx.registry,
    });
    return verifyLocal(baseline, manifest);
  } catch (e) {
    if (e instanceof MissingCriticalFileError) return verifyLocal(baseline, e);
    throw e;
  }
}

export async function verify(opts: VerifyOptions): Promise<CommandResult<LocalVerificationResult>> {
  try {
    const ctx = await loadContext(opts);
    const baseline = await loadBaseline(ctx, opts.baselinePath);
    if (!baseline) {
      return {
        ok: false,
        error: diag("error", "BASELINE_MISSING", "No baseline found. Run compute first.", {
          path: opts.baselinePath ?? ctx.locations.baselinePath,
        }),
        exitCode: EXIT.INVALID_ARGS,
      };
    }

    const result = await currentAgainst(ctx, baseline);
    return { ok: true, value: result, exitCode: STATUS_EXIT[result.status], warnings: warnings(result.warnings) };
  } catch (e) {
    return failure(e);
  }
}
