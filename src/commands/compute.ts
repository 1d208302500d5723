import type { Manifest, MasterFingerprint } from "../types/fingerprint.js";
import { computeManifest } from "../manifest/compute.js";
import { BaselineManager } from "../manifest/baseline-manager.js";
import { loadContext, type CommandOptions } from "./context.js";
import { failure, warnings, type CommandResult } from "./diagnostic.js";
import { EXIT } from "./exit-codes.js";

export type ComputeOutput = {
  manifest: Manifest;
  master: MasterFingerprint;
  baselinePath: string;
};

/**
 * Fingerprint the configured layers and write a new trusted baseline.
 * A missing critical file halts before anything is written.
 */
export async function compute(opts: CommandOptions): Promise<CommandResult<ComputeOutput>> {
  try {
    const ctx = await loadContext(opts);
    const { manifest, master } = await computeManifest({
      root: ctx.locations.root,
      layers: ctx.config.layers,
      discovery: ctx.config.discovery,
      excludeDirs: [ctx.locations.stateDir],
      concurrency: ctx.config.concurrency,
      registry: ctx.registry,
    });

    const baseline = new BaselineManager(ctx.locations.baselinePath);
    baseline.save(BaselineManager.create(manifest, master));

    const notes = [
      ...manifest.files
        .filter((f) => f.mode === "RAW_FALLBACK" && f.kind !== "unstructured")
        .map((f) => `${f.path} hashed from raw bytes: ${f.fallback_reason ?? "parse failed"}`),
      ...manifest.missing.map((m) => `declared file missing from layer '${m.layer}': ${m.path}`),
    ];

    return {
      ok: true,
      value: { manifest, master, baselinePath: baseline.path },
      exitCode: EXIT.SUCCESS,
      warnings: warnings(notes),
    };
  } catch (e) {
    return failure(e, "MANIFESTED");
  }
}
