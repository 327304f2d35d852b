/**
 * Step runner: executes one named operation under a retry policy.
 *
 * Sync and async operations are treated alike. Every attempt is reported
 * as a `step-attempt` progress event. When the budget runs out, or the
 * failure is not retryable, a "step" PipelineError wraps the last cause.
 */

import type { RetryPolicy } from "./core/types";
import {
  gatewayError,
  isPipelineError,
  messageOf,
  stepError,
  type PipelineError,
} from "./core/errors";
import { nullProgress, type Progress } from "./runner/types";

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  baseDelayMs: 1000,
  backoffMultiplier: 2,
});

export function retryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return Object.freeze({ ...DEFAULT_RETRY_POLICY, ...overrides });
}

/** Wait before attempt `attempt + 1`, where `attempt` is 1-based. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
}

/**
 * Authentication failures, provider errors marked non-retryable,
 * boundary violations, bad dimensions and cancellations end the step
 * immediately. So does a fan-out whose tasks already used up their own
 * retries.
 */
export function isRetryable(err: unknown): boolean {
  // A nested step that gave up is judged by what made it give up.
  if (isPipelineError(err, "step")) return isRetryable(err.cause);
  if (isPipelineError(err, "gateway")) return err.detail.retryable;
  if (isPipelineError(err, "resource-boundary")) return false;
  if (isPipelineError(err, "invalid-dimension")) return false;
  if (isPipelineError(err, "aggregate-task")) return false;
  if (isPipelineError(err, "cancelled")) return false;
  return true;
}

export interface StepOptions {
  progress?: Progress;
  sleep?: (ms: number) => Promise<void>;
  isRetryable?: (err: unknown) => boolean;
  context?: Record<string, unknown>;
  /**
   * Wait for the work of a timed-out attempt to settle before the next
   * attempt starts, or before the step gives up.
   */
  settleAbandoned?: boolean;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export type StepOperation<A, T> = (args: A, signal: AbortSignal) => T | Promise<T>;

/**
 * Run `operation(args, signal)` until it succeeds or the policy gives up.
 * The signal aborts when the per-attempt timeout fires.
 */
export async function runStep<A, T>(
  name: string,
  operation: StepOperation<A, T>,
  args: A,
  policy: RetryPolicy,
  options: StepOptions = {}
): Promise<T> {
  const progress = options.progress ?? nullProgress;
  const sleep = options.sleep ?? defaultSleep;
  const retryable = options.isRetryable ?? isRetryable;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    const t0 = Date.now();
    let abandoned: Promise<unknown> | undefined;
    try {
      const result = await attemptOnce(name, operation, args, policy.timeoutMs, (running) => {
        abandoned = running;
      });
      progress.emit({
        type: "step-attempt",
        step: name,
        attempt,
        maxAttempts,
        outcome: "success",
        durationMs: Date.now() - t0,
      });
      return result;
    } catch (err) {
      progress.emit({
        type: "step-attempt",
        step: name,
        attempt,
        maxAttempts,
        outcome: "failure",
        durationMs: Date.now() - t0,
        error: messageOf(err),
      });
      if (options.settleAbandoned && abandoned) {
        await Promise.allSettled([abandoned]);
      }
      if (attempt >= maxAttempts || !retryable(err)) {
        throw stepError(name, attempt, err, {
          ...options.context,
          maxAttempts,
          retryable: retryable(err),
        });
      }
      await sleep(backoffDelay(policy, attempt));
    }
  }
}

async function attemptOnce<A, T>(
  name: string,
  operation: StepOperation<A, T>,
  args: A,
  timeoutMs: number | undefined,
  onTimeout: (running: Promise<T>) => void
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs === undefined) {
    return await operation(args, controller.signal);
  }

  const running = Promise.resolve().then(() => operation(args, controller.signal));
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onTimeout(running);
      const err: PipelineError<"gateway"> = gatewayError(
        "timeout",
        `${name} timed out after ${timeoutMs}ms`
      );
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([running, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
