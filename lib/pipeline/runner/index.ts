/**
 * Pipeline Runner Module
 *
 * Builds configured pipelines and provides progress tracking.
 */

export {
  type Progress,
  type ProgressEvent,
  type StageName,
  type PipelineKind,
  STAGES,
  nullProgress,
  createConsoleProgress,
  createCallbackProgress,
  formatStageName,
} from "./types";

export {
  createDeckPipeline,
  createConvertPipeline,
  type CreatePipelineOptions,
  type PipelineSetup,
} from "./factory";
