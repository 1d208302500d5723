import type { PipelineStage, PipelineStatus } from "../types/state.js";

/**
 * All pipeline stages in order. Each names the state reached once the stage's
 * work has succeeded.
 */
export const ALL_STAGES = [
  "INIT",
  "FINGERPRINTED",
  "MANIFESTED",
  "CERTIFIED",
  "ANCHORED",
  "VERIFIABLE",
] as const satisfies readonly PipelineStage[];

export type TransitionEvent = "success" | "failure";

/** The stage after `current`, or null at the end of the pipeline. */
export function nextStage(current: PipelineStage): PipelineStage | null {
  const idx = ALL_STAGES.indexOf(current);
  return idx >= 0 && idx < ALL_STAGES.length - 1 ? ALL_STAGES[idx + 1] : null;
}

/**
 * Pure function: given the last reached stage and the outcome of attempting the
 * next one, return the new status. A failure is named after the stage that failed.
 */
export function nextState(current: PipelineStage, event: TransitionEvent): PipelineStatus {
  const attempted = nextStage(current);
  if (!attempted) return current;
  return event === "success" ? attempted : `failed_${attempted}`;
}

export function isFailed(status: PipelineStatus): status is `failed_${PipelineStage}` {
  return status.startsWith("failed_");
}

/** Stage that failed, or null for a non-failed status. */
export function failedStage(status: PipelineStatus): PipelineStage | null {
  if (!isFailed(status)) return null;
  const stage = status.slice("failed_".length);
  return ALL_STAGES.find((s) => s === stage) ?? null;
}

/**
 * Anchoring may be retried on its own once a receipt exists: a failed or
 * deferred anchor never invalidates it.
 */
export function canRetryAnchor(status: PipelineStatus): boolean {
  return status === "CERTIFIED" || status === "failed_ANCHORED" || status === "ANCHORED";
}
