/** Pipeline state: persisted to <state_dir>/state.json after every transition. */
export type PipelineStage =
  | "INIT"
  | "FINGERPRINTED"
  | "MANIFESTED"
  | "CERTIFIED"
  | "ANCHORED"
  | "VERIFIABLE";

export type PipelineStatus = PipelineStage | `failed_${PipelineStage}`;

export type StageResult = {
  status: "success" | "failed" | "deferred";
  duration_ms: number;
  error?: string;
};

export type PipelineState = {
  run_id: string;
  current: PipelineStatus;
  started_at: string;
  updated_at: string;
  stage_results: Partial<Record<PipelineStage, StageResult>>;
  master_fingerprint: string | null;
  content_hash: string | null;
  transaction_id: string | null;
  anchor_pending: boolean;
  warnings: string[];
  error: string | null;
  /** Error code of the failure, e.g. MISSING_CRITICAL_FILE; "INTERNAL" for unexpected errors. */
  error_code: string | null;
};
