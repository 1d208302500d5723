import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import type { CertConfig } from "../types/config.js";
import type { Manifest, MasterFingerprint } from "../types/fingerprint.js";
import type { CertificationReceipt, EngineIdentity } from "../types/receipt.js";
import type { LedgerAnchor, RetryPolicy } from "../types/ledger.js";
import type { PipelineStage, PipelineState } from "../types/state.js";
import type { LedgerVerificationResult } from "../types/verification.js";
import type { ResolvedLocations } from "../config/loader.js";
import type { LedgerClient } from "../ledger/client.js";
import type { DocumentSchemas } from "../schema/documents.js";
import { CertError, LedgerMismatchError, LedgerUnavailableError, errorMessage } from "../errors.js";
import { NormalizerRegistry } from "../normalizer/normalizer.js";
import { fingerprintProject, manifestFromRun, type FingerprintRun } from "../manifest/compute.js";
import { BaselineManager } from "../manifest/baseline-manager.js";
import { checkReceiptIntegrity, generateReceipt } from "../receipt/receipt.js";
import { ReceiptStore } from "../receipt/receipt-store.js";
import { anchorReceipt } from "../ledger/anchor.js";
import { AnchorLog } from "../ledger/anchor-log.js";
import { DEFAULT_RETRY_POLICY } from "../ledger/retry.js";
import { verifyLedger } from "../verify/ledger.js";
import { canRetryAnchor, nextStage, nextState } from "./state-machine.js";

export type PipelineDeps = {
  config: CertConfig;
  locations: ResolvedLocations;
  ledger: LedgerClient;
  policy?: RetryPolicy;
  registry?: NormalizerRegistry;
  schemas?: DocumentSchemas;
  now?: () => Date;
};

export type CertifyInput = {
  /** Problem class → PASS/FAIL from the external test harness. */
  validation: Record<string, unknown>;
  engine: EngineIdentity;
};

export type PipelineResult = {
  /** False when a stage failed; a deferred anchor is still a success. */
  success: boolean;
  state: PipelineState;
  manifest?: Readonly<Manifest>;
  master?: Readonly<MasterFingerprint>;
  receipt?: CertificationReceipt;
  anchor?: LedgerAnchor;
  verification?: LedgerVerificationResult;
};

/** Last persisted state, or null before the first run. */
export function readPipelineState(statePath: string): PipelineState | null {
  if (!fs.existsSync(statePath)) return null;
  return JSON.parse(fs.readFileSync(statePath, "utf8")) as PipelineState;
}

type StageOutcome<T> = { ok: true; value: T } | { ok: false };

/**
 * Certification pipeline: INIT → FINGERPRINTED → MANIFESTED → CERTIFIED → ANCHORED → VERIFIABLE.
 *
 * State is written to <state_dir>/state.json after every transition. The
 * manifest and receipt are complete before the ledger is contacted; an
 * unreachable ledger leaves the run CERTIFIED with the anchor pending.
 */
export class CertificationPipeline {
  private readonly policy: RetryPolicy;
  private readonly registry: NormalizerRegistry;
  private readonly now: () => Date;
  private readonly receipts: ReceiptStore;
  private readonly anchors: AnchorLog;

  constructor(private readonly deps: PipelineDeps) {
    this.policy = deps.policy ?? DEFAULT_RETRY_POLICY;
    this.registry = deps.registry ?? new NormalizerRegistry(undefined, deps.config.kinds ?? {});
    this.now = deps.now ?? (() => new Date());
    this.receipts = new ReceiptStore(deps.locations.receiptPath, deps.schemas);
    this.anchors = new AnchorLog(deps.locations.anchorsPath, deps.schemas);
  }

  readState(): PipelineState | null {
    return readPipelineState(this.deps.locations.statePath);
  }

  async run(input: CertifyInput): Promise<PipelineResult> {
    const { config, locations } = this.deps;
    const state = this.initialState();
    this.saveState(state);

    const fingerprinted = await this.stage(state, "INIT", async () => {
      const run = await fingerprintProject({
        root: locations.root,
        layers: config.layers,
        discovery: config.discovery,
        excludeDirs: [locations.stateDir],
        concurrency: config.concurrency,
        registry: this.registry,
      });
      for (const f of run.fingerprints) {
        if (f.mode === "RAW_FALLBACK" && f.kind !== "unstructured") {
          state.warnings.push(`${f.path} hashed from raw bytes: ${f.fallback_reason ?? "parse failed"}`);
        }
      }
      return run;
    });
    if (!fingerprinted.ok) return { success: false, state };

    const manifested = await this.stage(state, "FINGERPRINTED", async () => this.buildAndStore(fingerprinted.value));
    if (!manifested.ok) return { success: false, state };
    const { manifest, master } = manifested.value;
    state.master_fingerprint = master.hash;
    for (const m of manifest.missing) state.warnings.push(`declared file missing from layer '${m.layer}': ${m.path}`);
    this.saveState(state);

    const certified = await this.stage(state, "MANIFESTED", async () => {
      const receipt = generateReceipt({
        master,
        validation: input.validation,
        engine: input.engine,
        timestamp: this.now(),
      });
      await this.receipts.write(receipt);
      return receipt;
    });
    if (!certified.ok) return { success: false, state, manifest, master };
    state.content_hash = certified.value.content_hash;
    this.saveState(state);

    const anchored = await this.anchorAndConfirm(state, certified.value);
    return { ...anchored, manifest, master, receipt: certified.value };
  }

  /**
   * Resume anchoring from the stored receipt without re-running earlier stages.
   * From ANCHORED only the confirmation fetch is repeated.
   */
  async retryAnchor(): Promise<PipelineResult> {
    const state = this.readState();
    if (!state) throw new Error(`No pipeline state at ${this.deps.locations.statePath}; run certify first`);
    if (!canRetryAnchor(state.current)) {
      throw new Error(`Cannot retry anchoring from state ${state.current}`);
    }

    const receipt = await this.receipts.read();
    if (!receipt) throw new Error(`No receipt at ${this.receipts.path}; run certify first`);
    const integrity = checkReceiptIntegrity(receipt);
    if (!integrity.consistent) {
      throw new Error(`Stored receipt content_hash ${integrity.stored} does not match its fields (${integrity.recomputed})`);
    }

    if (state.current === "ANCHORED" && state.transaction_id) {
      const confirmed = await this.confirm(state, receipt, state.transaction_id);
      return { ...confirmed, receipt };
    }

    state.current = "CERTIFIED";
    state.error = null;
    state.error_code = null;
    const anchored = await this.anchorAndConfirm(state, receipt);
    return { ...anchored, receipt };
  }

  private async anchorAndConfirm(state: PipelineState, receipt: CertificationReceipt): Promise<PipelineResult> {
    const started = Date.now();
    let anchor: LedgerAnchor;
    try {
      const outcome = await anchorReceipt(this.deps.ledger, receipt, this.policy, this.now);
      if (!outcome.ok) {
        state.anchor_pending = true;
        state.stage_results.ANCHORED = { status: "deferred", duration_ms: Date.now() - started, error: outcome.error.message };
        state.warnings.push(`anchoring deferred, receipt remains valid: ${outcome.error.message}`);
        this.saveState(state);
        return { success: true, state };
      }
      anchor = outcome.value;
      await this.anchors.append(anchor);
    } catch (e) {
      state.anchor_pending = true;
      this.fail(state, "ANCHORED", Date.now() - started, e);
      return { success: false, state };
    }

    state.current = "ANCHORED";
    state.anchor_pending = false;
    state.transaction_id = anchor.transaction_id;
    state.stage_results.ANCHORED = { status: "success", duration_ms: Date.now() - started };
    this.saveState(state);

    return { ...(await this.confirm(state, receipt, anchor.transaction_id)), anchor };
  }

  /** VERIFIABLE once the new transaction reads back AUTHENTIC. */
  private async confirm(state: PipelineState, receipt: CertificationReceipt, transactionId: string): Promise<PipelineResult> {
    const started = Date.now();
    let verification: LedgerVerificationResult;
    try {
      verification = await verifyLedger(this.deps.ledger, transactionId, receipt, this.policy);
    } catch (e) {
      if (!(e instanceof LedgerUnavailableError)) {
        this.fail(state, "VERIFIABLE", Date.now() - started, e);
        return { success: false, state };
      }
      this.defer(state, started, `confirmation deferred: ${e.message}`);
      return { success: true, state };
    }

    if (verification.status === "NOT_FOUND") {
      this.defer(state, started, `transaction ${transactionId} not yet visible on the ledger`);
      return { success: true, state, verification };
    }
    if (verification.status === "TAMPERED") {
      this.fail(state, "VERIFIABLE", Date.now() - started, new LedgerMismatchError(verification.reasons));
      return { success: false, state, verification };
    }

    state.current = "VERIFIABLE";
    state.error = null;
    state.error_code = null;
    state.stage_results.VERIFIABLE = { status: "success", duration_ms: Date.now() - started };
    this.saveState(state);
    return { success: true, state, verification };
  }

  private buildAndStore(run: FingerprintRun): { manifest: Readonly<Manifest>; master: Readonly<MasterFingerprint> } {
    const computed = manifestFromRun(this.deps.config.layers, run);
    const baseline = new BaselineManager(this.deps.locations.baselinePath, this.deps.schemas);
    baseline.save(BaselineManager.create(computed.manifest, computed.master, this.now()));
    return computed;
  }

  /** Run the work that moves `from` to the next stage; record its result either way. */
  private async stage<T>(state: PipelineState, from: PipelineStage, work: () => Promise<T>): Promise<StageOutcome<T>> {
    const attempted = nextStage(from);
    if (!attempted) throw new Error(`No stage follows ${from}`);
    const started = Date.now();
    try {
      const value = await work();
      state.current = nextState(from, "success");
      state.stage_results[attempted] = { status: "success", duration_ms: Date.now() - started };
      this.saveState(state);
      return { ok: true, value };
    } catch (e) {
      this.fail(state, attempted, Date.now() - started, e);
      return { ok: false };
    }
  }

  private fail(state: PipelineState, stage: PipelineStage, durationMs: number, err: unknown): void {
    const message = errorMessage(err);
    state.current = `failed_${stage}`;
    state.error = `${stage}: ${message}`;
    state.error_code = err instanceof CertError ? err.code : "INTERNAL";
    state.stage_results[stage] = { status: "failed", duration_ms: durationMs, error: message };
    this.saveState(state);
  }

  private defer(state: PipelineState, started: number, warning: string): void {
    state.stage_results.VERIFIABLE = { status: "deferred", duration_ms: Date.now() - started, error: warning };
    state.warnings.push(warning);
    this.saveState(state);
  }

  private initialState(): PipelineState {
    const now = this.now().toISOString();
    return {
      run_id: `${now.slice(0, 10).replace(/-/g, "")}-${crypto.randomBytes(4).toString("hex")}`,
      current: "INIT",
      started_at: now,
      updated_at: now,
      stage_results: {},
      master_fingerprint: null,
      content_hash: null,
      transaction_id: null,
      anchor_pending: false,
      warnings: [],
      error: null,
      error_code: null,
    };
  }

  private saveState(state: PipelineState): void {
    state.updated_at = this.now().toISOString();
    const statePath = this.deps.locations.statePath;
    fs.mkdirSync(path.dirname(statePath), { recursive: true });
    fs.writeFileSync(statePath, JSON.stringify(state, null, 2) + "\n", "utf8");
  }
}
