/**
 * Runner layer types.
 *
 * Progress is the pipeline's telemetry seam: every stage transition,
 * step attempt and sub-task outcome is emitted as a ProgressEvent.
 */

// ============================================================================
// Stage names
// ============================================================================

export const STAGES = ["ingest", "describe", "enrich", "merge", "finalize"] as const;

export type StageName = (typeof STAGES)[number];

export type PipelineKind = "create" | "convert";

// ============================================================================
// Progress Interface
// ============================================================================

export type ProgressEvent =
  // Pipeline-level events
  | { type: "pipeline-start"; pipeline: PipelineKind; runId: string }
  | { type: "pipeline-complete"; pipeline: PipelineKind; path: string; pageCount: number }
  | { type: "pipeline-failed"; pipeline: PipelineKind; stage: StageName; error: string }
  // Stage-level events
  | { type: "stage-start"; stage: StageName }
  | { type: "stage-progress"; stage: StageName; message: string }
  | { type: "stage-complete"; stage: StageName }
  | { type: "stage-skipped"; stage: StageName; reason: string }
  | { type: "stage-error"; stage: StageName; error: string }
  // One record per step attempt
  | {
      type: "step-attempt";
      step: string;
      attempt: number;
      maxAttempts: number;
      outcome: "success" | "failure";
      durationMs: number;
      error?: string;
    }
  // Fan-out sub-tasks
  | { type: "task-complete"; stage: string; taskId: string; completed: number; total: number }
  | { type: "task-error"; stage: string; taskId: string; error: string };

/**
 * Progress emitter interface.
 *
 * Implementations can log to console, forward to a callback, etc.
 */
export interface Progress {
  emit(event: ProgressEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

/**
 * Console-based progress emitter for CLI usage.
 */
export function createConsoleProgress(options: { verbose?: boolean } = {}): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "pipeline-start":
          console.log(`Starting ${event.pipeline} pipeline (run ${event.runId})`);
          break;
        case "pipeline-complete":
          console.log(`Wrote ${event.pageCount} slides to ${event.path}`);
          break;
        case "pipeline-failed":
          console.error(`Pipeline failed in ${formatStageName(event.stage)}: ${event.error}`);
          break;
        case "stage-start":
          console.log(`Starting ${formatStageName(event.stage)}...`);
          break;
        case "stage-progress":
          console.log(`${formatStageName(event.stage)}: ${event.message}`);
          break;
        case "stage-complete":
          console.log(`Completed ${formatStageName(event.stage)}`);
          break;
        case "stage-skipped":
          console.log(`Skipped ${formatStageName(event.stage)} (${event.reason})`);
          break;
        case "stage-error":
          console.error(`Error in ${formatStageName(event.stage)}: ${event.error}`);
          break;
        case "step-attempt":
          if (event.outcome === "failure") {
            console.warn(
              `[${event.step}] attempt ${event.attempt}/${event.maxAttempts} failed: ${event.error}`
            );
          } else if (options.verbose) {
            console.log(`[${event.step}] ok in ${event.durationMs}ms`);
          }
          break;
        case "task-complete":
          console.log(`[${event.stage}] ${event.taskId} done (${event.completed}/${event.total})`);
          break;
        case "task-error":
          console.warn(`[${event.stage}] ${event.taskId} failed: ${event.error}`);
          break;
      }
    },
  };
}

/**
 * Callback-based progress emitter that flattens events into messages.
 */
export function createCallbackProgress(callback: (message: string) => void): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "pipeline-start":
          callback(`Starting ${event.pipeline}`);
          break;
        case "pipeline-complete":
          callback(`Completed ${event.pipeline}`);
          break;
        case "pipeline-failed":
          callback(`Error: ${event.error}`);
          break;
        case "stage-start":
          callback(`Starting ${formatStageName(event.stage)}`);
          break;
        case "stage-progress":
          callback(event.message);
          break;
        case "stage-complete":
          callback(`Completed ${formatStageName(event.stage)}`);
          break;
        case "stage-skipped":
          callback(`Skipped ${formatStageName(event.stage)}`);
          break;
        case "stage-error":
          callback(`Error: ${event.error}`);
          break;
        case "task-complete":
          callback(`${event.taskId} (${event.completed}/${event.total})`);
          break;
        case "task-error":
          callback(`Error in ${event.taskId}: ${event.error}`);
          break;
        case "step-attempt":
          break;
      }
    },
  };
}

export function formatStageName(stage: StageName): string {
  switch (stage) {
    case "ingest":
      return "input loading";
    case "describe":
      return "slide description";
    case "enrich":
      return "image processing";
    case "merge":
      return "assembly";
    case "finalize":
      return "rendering";
  }
}
