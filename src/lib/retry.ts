import type { Clock, RandomSource } from "./clock.js";
import type { RetrySettings } from "./config/schema.js";

export interface RetryPolicy {
  /** Attempts including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the computed delay spread uniformly either side of it (0..1). */
  jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  jitter: 0.2,
};

export function retryPolicyFromSettings(settings: RetrySettings): RetryPolicy {
  return {
    maxAttempts: settings.max_attempts,
    baseDelayMs: settings.base_delay_ms,
    maxDelayMs: settings.max_delay_ms,
    jitter: settings.jitter,
  };
}

/**
 * Delay before the retry that follows failed attempt number `attempt` (1-based).
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: RandomSource = Math.random): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const spread = exponential * policy.jitter;
  const jittered = exponential - spread + random() * 2 * spread;
  return Math.max(0, Math.round(jittered));
}

export interface RetryContext {
  policy: RetryPolicy;
  clock: Clock;
  random?: RandomSource;
  signal?: AbortSignal;
  onRetry?: (attempt: number, delayMs: number) => void;
}

/**
 * Run `op` until it yields a result `shouldRetry` rejects, the attempt ceiling is
 * reached, or the signal aborts. Returns the last result either way.
 */
export async function retryWhile<T>(
  op: (attempt: number) => Promise<T>,
  shouldRetry: (result: T) => boolean,
  ctx: RetryContext
): Promise<{ result: T; attempts: number }> {
  let attempt = 1;
  for (;;) {
    const result = await op(attempt);
    if (!shouldRetry(result) || attempt >= ctx.policy.maxAttempts || ctx.signal?.aborted) {
      return { result, attempts: attempt };
    }
    const delayMs = backoffDelay(ctx.policy, attempt, ctx.random);
    ctx.onRetry?.(attempt, delayMs);
    await ctx.clock.sleep(delayMs, ctx.signal);
    attempt++;
  }
}

/**
 * Throwing variant: retries while `retryIf(error)` holds, rethrowing the last error.
 */
export async function retry<T>(
  op: (attempt: number) => Promise<T>,
  retryIf: (error: unknown) => boolean,
  ctx: RetryContext
): Promise<T> {
  const { result } = await retryWhile<{ ok: true; value: T } | { ok: false; error: unknown }>(
    async (attempt) => {
      try {
        return { ok: true, value: await op(attempt) };
      } catch (error) {
        return { ok: false, error };
      }
    },
    (outcome) => !outcome.ok && retryIf(outcome.error),
    ctx
  );
  if (!result.ok) throw result.error;
  return result.value;
}
