import type { RetryPolicy } from "../types/ledger.js";
import { LedgerUnavailableError, errorMessage } from "../errors.js";

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  timeout_ms: 10_000,
  max_attempts: 4,
  base_delay_ms: 500,
  max_delay_ms: 8_000,
};

export type AttemptReport = {
  attempt: number;
  error: string;
};

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: LedgerUnavailableError; attempts: AttemptReport[] };

/** Backoff before attempt n+1: base · 2^(n-1), capped. */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.max_delay_ms, policy.base_delay_ms * 2 ** (attempt - 1));
}

/**
 * Race one attempt against a timer. On timeout the attempt's signal is aborted,
 * so a client that honours it drops the request; the timer is always cleared.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new LedgerUnavailableError(`${label} timed out after ${ms}ms`);
      controller.abort(error);
      reject(error);
    }, ms);
  });
  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run a ledger call under a bounded timeout with capped exponential backoff.
 * Only LedgerUnavailableError is retried; anything else propagates at once.
 */
export async function retryLedgerCall<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  label: string,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<RetryOutcome<T>> {
  const attempts: AttemptReport[] = [];
  const maxAttempts = Math.max(1, policy.max_attempts);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await withTimeout(operation, policy.timeout_ms, label);
      return { ok: true, value, attempts: attempt };
    } catch (e) {
      if (!(e instanceof LedgerUnavailableError)) throw e;
      attempts.push({ attempt, error: errorMessage(e) });
      if (attempt < maxAttempts) await sleep(backoffDelay(attempt, policy));
    }
  }

  return {
    ok: false,
    error: new LedgerUnavailableError(`${label} failed after ${attempts.length} attempt(s): ${attempts[attempts.length - 1].error}`),
    attempts,
  };
}
