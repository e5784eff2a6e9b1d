export type AttemptOutcome<T> =
  | { kind: "success"; value: T }
  | { kind: "retryable"; error: unknown }
  | { kind: "fatal"; error: unknown };

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; reason: "fatal" | "exhausted"; error: unknown; attempts: number };

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Bounded retry loop. The operation classifies its own outcome; only
 * `retryable` outcomes are attempted again, after an exponential delay.
 */
export async function runWithRetry<T>(
  operation: (attempt: number) => Promise<AttemptOutcome<T>>,
  policy: RetryPolicy,
  hooks: {
    sleep?: Sleep;
    onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
  } = {},
): Promise<RetryResult<T>> {
  const sleep = hooks.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const outcome = await operation(attempt);
    if (outcome.kind === "success") {
      return { ok: true, value: outcome.value, attempts: attempt };
    }
    if (outcome.kind === "fatal") {
      return { ok: false, reason: "fatal", error: outcome.error, attempts: attempt };
    }

    lastError = outcome.error;
    if (attempt < maxAttempts) {
      const delayMs = backoffDelay(policy, attempt);
      hooks.onRetry?.(attempt, delayMs, outcome.error);
      await sleep(delayMs);
    }
  }

  return { ok: false, reason: "exhausted", error: lastError, attempts: maxAttempts };
}
