/**
 * Public entry point.
 */

export * from "./pipeline/core/types";
export {
  PipelineError,
  isPipelineError,
  describeError,
  type ErrorKind,
  type ErrorDetail,
  type ErrorRecord,
  type GatewayFailure,
  type ResourceBoundaryReason,
} from "./pipeline/core/errors";
export { createModelGateway, classifyGatewayError, type LLMProvider } from "./pipeline/core/llm";

export {
  DEFAULT_SPACE,
  aspectSpace,
  coordinateSpace,
  normalize,
  normalizePage,
} from "./pipeline/coordinates";
export {
  parseComposition,
  parsePage,
  parsePages,
  parseColor,
  validatorFor,
  type ParseOptions,
} from "./pipeline/parser";
export { assemble } from "./pipeline/assembler";
export { runStep, retryPolicy, DEFAULT_RETRY_POLICY } from "./pipeline/step-runner";
export { runAll, successes, type RunAllOptions } from "./pipeline/coordinator";
export {
  Pipeline,
  type PipelineVariant,
  type PipelineDeps,
  type PipelineState,
  type StageContext,
} from "./pipeline/pipeline";
export { createDeckVariant, type CreateInput } from "./pipeline/create/create-pipeline";
export { createConvertVariant, type ConvertInput } from "./pipeline/convert/convert-pipeline";
export * from "./pipeline/runner";

export { createInputLoader } from "./input/loader";
export { readOutline } from "./input/outline";
export { createAssetStore, createStagingArea } from "./storage/asset-store";
export { createJsonRenderer } from "./render/json-renderer";
export { loadConfig, type AppConfig } from "./config";
