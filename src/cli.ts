#!/usr/bin/env node

import { Command } from "commander";
import type { SourceFormat } from "./types/adapter-output.js";
import { compute } from "./commands/compute.js";
import { verify } from "./commands/verify.js";
import { status } from "./commands/status.js";
import { certify } from "./commands/certify.js";
import { anchor } from "./commands/anchor.js";
import { verifyLedger } from "./commands/verify-ledger.js";
import { listAnchors } from "./commands/anchors.js";
import { diag, emit, type CommandResult, type OutputFormat } from "./commands/diagnostic.js";
import { EXIT } from "./commands/exit-codes.js";

type GlobalOpts = { config: string; env?: string; format: OutputFormat };

const program = new Command();

program
  .name("certctl")
  .description("Engine source certification: fingerprints, receipts and ledger anchors")
  .version("0.1.0")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config overlay: loads <config>/<name>.yaml over base.yaml")
  .option("--format <format>", "Output format: human|jsonl", "human");

function globals(): GlobalOpts {
  const opts = program.opts<{ config: string; env?: string; format: string }>();
  if (opts.format !== "human" && opts.format !== "jsonl") {
    process.stderr.write(`Unknown format: ${opts.format}\n`);
    process.exit(EXIT.INVALID_ARGS);
  }
  return { config: opts.config, env: opts.env, format: opts.format };
}

/** Print a command result and exit with its code. */
function report<T>(res: CommandResult<T>, format: OutputFormat, code: string, human: (value: T) => string[]): never {
  if (!res.ok) {
    emit(res.error, format);
    process.exit(res.exitCode);
  }
  for (const w of res.warnings) emit(w, format);
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "info", code, message: code, details: res.value }) + "\n");
  } else {
    for (const line of human(res.value)) process.stdout.write(line + "\n");
  }
  process.exit(res.exitCode);
}

program
  .command("compute")
  .description("Fingerprint the configured layers and write a new baseline")
  .action(async () => {
    const g = globals();
    const res = await compute({ configDir: g.config, env: g.env });
    report(res, g.format, "COMPUTED", (v) => [
      `master ${v.master.hash} (${v.master.algorithm_version})`,
      ...Object.entries(v.master.layers).map(([layer, hash]) => `  ${layer}  ${hash}`),
      `baseline written to ${v.baselinePath}`,
    ]);
  });

program
  .command("verify")
  .description("Compare current files against the baseline")
  .option("--baseline <path>", "Baseline file (default: <state_dir>/baseline.json)")
  .action(async (opts: { baseline?: string }) => {
    const g = globals();
    const res = await verify({ configDir: g.config, env: g.env, baselinePath: opts.baseline });
    report(res, g.format, "VERIFIED", (v) => [
      v.status,
      ...v.diverging_layers.map((l) => `  diverging layer: ${l}`),
      ...v.file_changes.map((c) => `  ${c.change}: ${c.path}`),
      ...v.cosmetic_changes.map((p) => `  cosmetic change: ${p}`),
    ]);
  });

program
  .command("status")
  .description("Show current and baseline master fingerprints and the last pipeline state")
  .action(async () => {
    const g = globals();
    const res = await status({ configDir: g.config, env: g.env });
    report(res, g.format, "STATUS", (v) => [
      `current:  ${v.current_master_fingerprint ?? "-"}`,
      `baseline: ${v.baseline_master_fingerprint ?? "-"}`,
      `match:    ${v.match}`,
      `pipeline: ${v.pipeline?.current ?? "-"}`,
    ]);
  });

program
  .command("certify")
  .description("Fingerprint, certify with test results, and anchor the receipt")
  .requiredOption("--results <path>", "Test-harness output (JUnit XML, JSON map or claim results)")
  .option("--results-format <format>", "junit_xml|json|claims (default: detected)")
  .option("--engine-version <version>", "Engine version (default: config, then git describe)")
  .action(async (opts: { results: string; resultsFormat?: string; engineVersion?: string }) => {
    const g = globals();
    const resultsFormat = parseSourceFormat(opts.resultsFormat, g.format);
    const res = await certify({
      configDir: g.config,
      env: g.env,
      resultsPath: opts.results,
      resultsFormat,
      engineVersion: opts.engineVersion,
    });
    report(res, g.format, "CERTIFIED", (v) => [
      `state: ${v.state.current}${v.state.anchor_pending ? " (anchor pending)" : ""}`,
      `content_hash: ${v.receipt?.content_hash ?? "-"}`,
      `transaction: ${v.anchor?.transaction_id ?? "-"}`,
    ]);
  });

program
  .command("anchor")
  .description("Retry anchoring the stored receipt")
  .action(async () => {
    const g = globals();
    const res = await anchor({ configDir: g.config, env: g.env });
    report(res, g.format, "ANCHORED", (v) => [
      `state: ${v.state.current}${v.state.anchor_pending ? " (anchor pending)" : ""}`,
      `transaction: ${v.anchor?.transaction_id ?? v.state.transaction_id ?? "-"}`,
    ]);
  });

program
  .command("verify-ledger")
  .description("Check a receipt against its on-chain record")
  .option("--tx <id>", "Transaction id (default: latest anchor of the receipt)")
  .option("--receipt <path>", "Receipt file (default: <state_dir>/receipt.json)")
  .action(async (opts: { tx?: string; receipt?: string }) => {
    const g = globals();
    const res = await verifyLedger({ configDir: g.config, env: g.env, transactionId: opts.tx, receiptPath: opts.receipt });
    report(res, g.format, "LEDGER_VERIFIED", (v) => [
      `${v.status}  ${v.transaction_id}`,
      ...v.reasons.map((r) => `  ${r}`),
    ]);
  });

program
  .command("anchors")
  .description("List local anchors, grouped by content hash")
  .action(async () => {
    const g = globals();
    const res = await listAnchors({ configDir: g.config, env: g.env });
    report(res, g.format, "ANCHORS", (v) =>
      v.facts.length === 0
        ? ["No anchors recorded."]
        : v.facts.map((f) => `${f.content_hash}  ${f.first_anchored_at}  ${f.transaction_ids.length} tx`),
    );
  });

function parseSourceFormat(value: string | undefined, format: OutputFormat): SourceFormat | undefined {
  if (value === undefined || value === "junit_xml" || value === "json" || value === "claims") return value;
  emit(diag("error", "INVALID_ARGS", `Unknown results format: ${value}`), format);
  process.exit(EXIT.INVALID_ARGS);
}

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
