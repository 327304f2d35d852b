/**
 * Pipeline state machine.
 *
 * A pipeline runs a fixed sequence of stages (ingest, describe, enrich,
 * merge, finalize), each through the step runner with its own retry
 * policy. Variants supply ingest, describe and enrich; merge and
 * finalize are shared.
 *
 *   idle -> running(stage) -> ... -> completed
 *                 \-> failed(stage, ErrorRecord)
 */

import type {
  AssetLocation,
  AssetStore,
  DeckSettings,
  DocumentRenderer,
  PageArtifact,
  RenderedDocument,
  RetryPolicy,
} from "./core/types";
import {
  cancelledError,
  describeError,
  isPipelineError,
  stepError,
  toErrorRecord,
  validationError,
  type ErrorRecord,
  type PipelineError,
} from "./core/errors";
import { DEFAULT_RETRY_POLICY, isRetryable, retryPolicy, runStep } from "./step-runner";
import { DEFAULT_CONCURRENCY } from "./coordinator";
import { assemble } from "./assembler";
import {
  nullProgress,
  STAGES,
  type PipelineKind,
  type Progress,
  type StageName,
} from "./runner/types";
import { createRunId, createStagingArea, type StagingArea } from "../storage/asset-store";

// ============================================================================
// Variant contract
// ============================================================================

/** Everything a stage may use during one run. */
export interface StageContext {
  readonly runId: string;
  readonly stagingDir: string;
  readonly store: AssetStore;
  readonly progress: Progress;
  /** Caller-side cancellation, if any */
  readonly signal?: AbortSignal;
  /** Retry policy for per-unit steps inside a stage */
  readonly taskPolicy: RetryPolicy;
  readonly concurrency: number;
  readonly minSuccessRatio: number;
  readonly sleep?: (ms: number) => Promise<void>;
}

export interface DescribeResult {
  pages: PageArtifact[];
  settings?: Partial<DeckSettings>;
}

export interface PipelineVariant<TInput, TUnit> {
  readonly kind: PipelineKind;
  ingest(input: TInput, ctx: StageContext, signal: AbortSignal): Promise<TUnit[]>;
  describe(units: TUnit[], ctx: StageContext, signal: AbortSignal): Promise<DescribeResult>;
  /** Reason to skip enrichment for this run, or null to run it */
  skipEnrich(pages: PageArtifact[], units: TUnit[]): string | null;
  enrich(
    pages: PageArtifact[],
    units: TUnit[],
    ctx: StageContext,
    signal: AbortSignal
  ): Promise<Map<string, AssetLocation>>;
}

// ============================================================================
// Pipeline configuration
// ============================================================================

export interface PipelineDeps {
  renderer: DocumentRenderer;
  settings: DeckSettings;
  /** Each run stages its assets in a fresh directory below this root */
  stagingRoot: string;
  assetLimits?: { maxAssetBytes?: number; maxAssets?: number };
  /** Keep the staging directory after a failed run */
  keepStaging?: boolean;
  /** Policy for stages without an entry in stagePolicies */
  stagePolicy?: RetryPolicy;
  stagePolicies?: Partial<Record<StageName, RetryPolicy>>;
  taskPolicy?: RetryPolicy;
  concurrency?: number;
  minSuccessRatio?: number;
  progress?: Progress;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunOptions {
  signal?: AbortSignal;
  runId?: string;
}

export type PipelineState =
  | { status: "idle" }
  | { status: "running"; stage: StageName; index: number }
  | { status: "completed"; document: RenderedDocument }
  | { status: "failed"; stage: StageName; index: number; error: ErrorRecord };

/** Working data handed from stage to stage within one run. */
interface RunData<TInput, TUnit> {
  readonly input: TInput;
  units: TUnit[];
  pages: PageArtifact[];
  settings: DeckSettings;
  assets: Map<string, AssetLocation>;
  document?: RenderedDocument;
}

export interface PipelineStep<TInput, TUnit> {
  readonly name: StageName;
  readonly policy: RetryPolicy;
  readonly optional: boolean;
  run(data: RunData<TInput, TUnit>, ctx: StageContext, signal: AbortSignal): Promise<void>;
}

/** Merge and finalize are local work; a second attempt would not help. */
const SINGLE_ATTEMPT = retryPolicy({ maxAttempts: 1 });

// ============================================================================
// Pipeline
// ============================================================================

export class Pipeline<TInput, TUnit> {
  readonly steps: readonly PipelineStep<TInput, TUnit>[];
  private current: PipelineState = { status: "idle" };

  constructor(
    private readonly variant: PipelineVariant<TInput, TUnit>,
    private readonly deps: PipelineDeps
  ) {
    const policyFor = (stage: StageName, fallback: RetryPolicy): RetryPolicy =>
      deps.stagePolicies?.[stage] ?? fallback;
    const stagePolicy = deps.stagePolicy ?? DEFAULT_RETRY_POLICY;

    const steps = STAGES.map((name): PipelineStep<TInput, TUnit> => {
      switch (name) {
        case "ingest":
          return {
            name,
            policy: policyFor(name, stagePolicy),
            optional: false,
            run: async (data, ctx, signal) => {
              data.units = await variant.ingest(data.input, ctx, signal);
            },
          };
        case "describe":
          return {
            name,
            policy: policyFor(name, stagePolicy),
            optional: false,
            run: async (data, ctx, signal) => {
              const result = await variant.describe(data.units, ctx, signal);
              data.pages = result.pages;
              data.settings = { ...data.settings, ...result.settings };
            },
          };
        case "enrich":
          return {
            name,
            policy: policyFor(name, stagePolicy),
            optional: true,
            run: async (data, ctx, signal) => {
              data.assets = await variant.enrich(data.pages, data.units, ctx, signal);
            },
          };
        case "merge":
          return {
            name,
            policy: policyFor(name, SINGLE_ATTEMPT),
            optional: false,
            run: async (data) => {
              assemble(data.pages, data.assets);
            },
          };
        case "finalize":
          return {
            name,
            policy: policyFor(name, SINGLE_ATTEMPT),
            optional: false,
            run: async (data) => {
              data.document = await deps.renderer.render(data.pages, data.settings);
            },
          };
      }
    });
    this.steps = Object.freeze(steps.map((step) => Object.freeze(step)));
  }

  get kind(): PipelineKind {
    return this.variant.kind;
  }

  get state(): PipelineState {
    return this.current;
  }

  /**
   * Run every stage in order. Resolves with the rendered document, or
   * rejects with the "step" error of the stage that gave up.
   */
  async run(input: TInput, options: RunOptions = {}): Promise<RenderedDocument> {
    if (this.current.status === "running") {
      throw cancelledError(`${this.kind} pipeline is already running`);
    }
    this.current = { status: "running", stage: "ingest", index: 0 };

    const progress = this.deps.progress ?? nullProgress;
    const runId = options.runId ?? createRunId();
    const context = { pipeline: this.kind, runId };
    progress.emit({ type: "pipeline-start", pipeline: this.kind, runId });

    let staging: StagingArea;
    try {
      staging = await createStagingArea(this.deps.stagingRoot, runId, this.deps.assetLimits);
    } catch (err) {
      throw this.fail("ingest", 0, stepError("ingest", 1, err, context), progress);
    }
    const ctx: StageContext = {
      runId,
      stagingDir: staging.dir,
      store: staging.store,
      progress,
      signal: options.signal,
      taskPolicy: this.deps.taskPolicy ?? DEFAULT_RETRY_POLICY,
      concurrency: this.deps.concurrency ?? DEFAULT_CONCURRENCY,
      minSuccessRatio: this.deps.minSuccessRatio ?? 0,
      sleep: this.deps.sleep,
    };
    const data: RunData<TInput, TUnit> = {
      input,
      units: [],
      pages: [],
      settings: { ...this.deps.settings },
      assets: new Map(),
    };

    let document: RenderedDocument;
    try {
      for (const [index, step] of this.steps.entries()) {
        if (step.optional) {
          const reason = this.variant.skipEnrich(data.pages, data.units);
          if (reason !== null) {
            progress.emit({ type: "stage-skipped", stage: step.name, reason });
            continue;
          }
        }
        await this.runStage(step, index, data, ctx);
      }
      if (!data.document) {
        const cause = validationError(["renderer returned no document"]);
        throw this.fail(
          "finalize",
          this.steps.length - 1,
          stepError("finalize", 1, cause, context),
          progress
        );
      }
      document = data.document;
    } catch (err) {
      if (!this.deps.keepStaging) {
        await disposeQuietly(staging.dispose, progress);
      }
      throw err;
    }

    this.current = { status: "completed", document };
    progress.emit({
      type: "pipeline-complete",
      pipeline: this.kind,
      path: document.path,
      pageCount: document.pageCount,
    });
    return document;
  }

  private async runStage(
    step: PipelineStep<TInput, TUnit>,
    index: number,
    data: RunData<TInput, TUnit>,
    ctx: StageContext
  ): Promise<void> {
    const progress = ctx.progress;
    this.current = { status: "running", stage: step.name, index };
    progress.emit({ type: "stage-start", stage: step.name });

    try {
      if (ctx.signal?.aborted) {
        throw stepError(step.name, 0, ctx.signal.reason ?? cancelledError("aborted"), {
          pipeline: this.kind,
          runId: ctx.runId,
        });
      }
      await runStep(
        step.name,
        (_args: undefined, signal) => step.run(data, ctx, combineSignals(signal, ctx.signal)),
        undefined,
        step.policy,
        {
          progress,
          sleep: ctx.sleep,
          isRetryable: (err) => !ctx.signal?.aborted && isRetryable(err),
          settleAbandoned: true,
          context: { pipeline: this.kind, runId: ctx.runId },
        }
      );
    } catch (err) {
      const failure: PipelineError<"step"> = isPipelineError(err, "step")
        ? err
        : stepError(step.name, 1, err);
      throw this.fail(step.name, index, failure, progress);
    }

    progress.emit({ type: "stage-complete", stage: step.name });
  }

  /** Record a failed run and report it; returns the error for the caller to throw. */
  private fail(
    stage: StageName,
    index: number,
    failure: PipelineError<"step">,
    progress: Progress
  ): PipelineError<"step"> {
    this.current = { status: "failed", stage, index, error: toErrorRecord(failure) };
    const message = describeError(failure);
    progress.emit({ type: "stage-error", stage, error: message });
    progress.emit({ type: "pipeline-failed", pipeline: this.kind, stage, error: message });
    return failure;
  }
}

function combineSignals(attempt: AbortSignal, caller: AbortSignal | undefined): AbortSignal {
  return caller ? AbortSignal.any([attempt, caller]) : attempt;
}

async function disposeQuietly(dispose: () => Promise<void>, progress: Progress): Promise<void> {
  try {
    await dispose();
  } catch (err) {
    progress.emit({
      type: "stage-progress",
      stage: "finalize",
      message: `staging cleanup failed: ${describeError(err)}`,
    });
  }
}
