/**
 * Concurrency coordinator.
 *
 * Runs independent sub-tasks with at most `bound` in flight and collects
 * one result per task id. The coordinator never retries; workers that
 * want retries run their own steps through runStep.
 */

import { defer, from, lastValueFrom, mergeMap, toArray } from "rxjs";
import type { SettledTaskResult, TaskRequest } from "./core/types";
import {
  aggregateTaskError,
  cancelledError,
  isPipelineError,
  messageOf,
  validationError,
} from "./core/errors";
import { nullProgress, type Progress } from "./runner/types";

export const DEFAULT_CONCURRENCY = 3;

export interface RunAllOptions {
  /** Maximum tasks in flight (default 3) */
  bound?: number;
  /** Caller-side cancellation; stops dispatch of queued tasks */
  signal?: AbortSignal;
  /** A task error that should stop further dispatch (default: auth failures) */
  isFatal?: (err: unknown) => boolean;
  /**
   * Fraction of tasks that must succeed for the batch to count as
   * degraded rather than failed. 0 means any single success suffices.
   */
  minSuccessRatio?: number;
  progress?: Progress;
  /** Label used in task progress events */
  stage?: string;
}

export type TaskWorker<P, R> = (payload: P, id: string) => Promise<R>;

export type TaskResults<R> = Map<string, SettledTaskResult<R>>;

export function isFatalTaskError(err: unknown): boolean {
  if (isPipelineError(err, "step")) return isFatalTaskError(err.cause);
  return isPipelineError(err, "gateway") && err.detail.failure === "authentication";
}

/**
 * Run every task through `worker`, at most `bound` at a time.
 *
 * Resolves with a map keyed by task id, in input order, when at least
 * one task succeeded. Rejects with an "aggregate-task" error when all of
 * them failed, and with the fatal error or abort reason when dispatch
 * was stopped early.
 */
export async function runAll<P, R>(
  tasks: readonly TaskRequest<P>[],
  worker: TaskWorker<P, R>,
  options: RunAllOptions = {}
): Promise<TaskResults<R>> {
  const bound = options.bound ?? DEFAULT_CONCURRENCY;
  const progress = options.progress ?? nullProgress;
  const stage = options.stage ?? "tasks";
  const isFatal = options.isFatal ?? isFatalTaskError;

  if (!Number.isInteger(bound) || bound < 1) {
    throw validationError([`concurrency bound must be an integer >= 1, got ${bound}`]);
  }
  const seen = new Set<string>();
  for (const task of tasks) {
    if (seen.has(task.id)) throw validationError([`duplicate task id "${task.id}"`]);
    seen.add(task.id);
  }

  const results: TaskResults<R> = new Map();
  if (tasks.length === 0) return results;

  let fatal: unknown;
  let completed = 0;

  const settle = (result: SettledTaskResult<R>): SettledTaskResult<R> => {
    const frozen = Object.freeze(result);
    results.set(result.id, frozen);
    return frozen;
  };

  const execute = async (task: TaskRequest<P>): Promise<SettledTaskResult<R>> => {
    if (fatal !== undefined || options.signal?.aborted) {
      return settle({
        id: task.id,
        status: "failed",
        error: cancelledError(`task ${task.id} was not dispatched`),
      });
    }
    try {
      const value = await worker(task.payload, task.id);
      completed++;
      progress.emit({
        type: "task-complete",
        stage,
        taskId: task.id,
        completed,
        total: tasks.length,
      });
      return settle({ id: task.id, status: "success", value });
    } catch (err) {
      if (fatal === undefined && isFatal(err)) fatal = err;
      progress.emit({ type: "task-error", stage, taskId: task.id, error: messageOf(err) });
      return settle({
        id: task.id,
        status: "failed",
        error: err instanceof Error ? err : new Error(String(err)),
      });
    }
  };

  // mergeMap subscribes to at most `bound` inner observables at once;
  // the rest wait in its buffer until a slot frees up.
  await lastValueFrom(
    from(tasks).pipe(
      mergeMap((task) => defer(() => execute(task)), bound),
      toArray()
    )
  );

  if (fatal !== undefined) throw fatal;
  if (options.signal?.aborted) {
    throw options.signal.reason ?? cancelledError("aborted");
  }

  // Re-key in input order; completion order is irrelevant downstream.
  const ordered: TaskResults<R> = new Map();
  for (const task of tasks) {
    const result = results.get(task.id);
    if (result) ordered.set(task.id, result);
  }

  const failures = [...ordered.values()].filter((r) => r.status === "failed");
  const successCount = ordered.size - failures.length;
  const ratio = options.minSuccessRatio ?? 0;
  if (successCount === 0 || successCount / ordered.size < ratio) {
    throw aggregateTaskError(
      failures.map((r) => ({
        id: r.id,
        message: r.status === "failed" ? messageOf(r.error) : "",
      })),
      ordered.size
    );
  }
  return ordered;
}

/** Successful values keyed by id, in input order. */
export function successes<R>(results: TaskResults<R>): Map<string, R> {
  const out = new Map<string, R>();
  for (const [id, result] of results) {
    if (result.status === "success") out.set(id, result.value);
  }
  return out;
}
