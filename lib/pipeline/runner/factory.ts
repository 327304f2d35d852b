/**
 * Runner Factory
 *
 * Builds fully configured create and convert pipelines from config.yaml.
 * This is the main entry point for setting up a run.
 */

import path from "node:path";
import type { InputUnit, ModelGateway, RetryPolicy } from "../core/types";
import type { Progress, StageName } from "./types";
import { nullProgress } from "./types";
import { createModelGateway } from "../core/llm";
import { createLlmLogWriter } from "../llm-log";
import { Pipeline, type PipelineDeps } from "../pipeline";
import { retryPolicy } from "../step-runner";
import {
  createDeckVariant,
  type CreateInput,
  type OutlineUnit,
} from "../create/create-pipeline";
import { createConvertVariant, type ConvertInput } from "../convert/convert-pipeline";
import type { ParseDefaults } from "../parser";
import { createInputLoader } from "../../input/loader";
import { createJsonRenderer } from "../../render/json-renderer";
import {
  loadConfig,
  getCanonicalSpace,
  getDeckSettings,
  getModels,
  getProvider,
  getRetryPolicy,
  type AppConfig,
} from "@/lib/config";

// ============================================================================
// Factory options
// ============================================================================

export interface CreatePipelineOptions {
  /** Where the rendered deck is written */
  outputPath: string;
  configPath?: string;
  /** Applied on top of the loaded file, same shape as config.yaml */
  overrides?: Record<string, unknown>;
  progress?: Progress;
  skipCache?: boolean;
  /** Use this gateway instead of one built from the config */
  gateway?: ModelGateway;
}

export interface PipelineSetup<TInput, TUnit> {
  config: AppConfig;
  pipeline: Pipeline<TInput, TUnit>;
}

// ============================================================================
// Factory functions
// ============================================================================

export function createDeckPipeline(
  options: CreatePipelineOptions
): PipelineSetup<CreateInput, OutlineUnit> {
  const config = loadConfig(options.configPath, options.overrides);
  const models = getModels(config);
  const gateway =
    options.gateway ??
    buildGateway(config, { modelId: models.composition, imageModelId: models.image }, options);

  const variant = createDeckVariant({
    gateway,
    space: getCanonicalSpace(config),
    slideSize: config.slide.size,
    theme: config.slide.theme,
    generateImages: config.pipeline.generate_images,
    defaults: parseDefaults(config),
    maxOutlineBytes: config.input.max_file_bytes,
  });
  // describe is one composition call, so the call timeout bounds the stage
  return {
    config,
    pipeline: new Pipeline(variant, pipelineDeps(config, options, ["describe"])),
  };
}

export function createConvertPipeline(
  options: CreatePipelineOptions
): PipelineSetup<ConvertInput, InputUnit> {
  const config = loadConfig(options.configPath, options.overrides);
  const models = getModels(config);
  const gateway =
    options.gateway ??
    buildGateway(config, { modelId: models.analysis, imageModelId: models.image }, options);

  const variant = createConvertVariant({
    gateway,
    loader: createInputLoader({
      dpi: config.input.dpi,
      maxFileBytes: config.input.max_file_bytes,
      maxPages: config.input.max_pages,
    }),
    space: getCanonicalSpace(config),
    defaults: parseDefaults(config),
  });
  return { config, pipeline: new Pipeline(variant, pipelineDeps(config, options)) };
}

// ============================================================================
// Helpers
// ============================================================================

function buildGateway(
  config: AppConfig,
  models: { modelId?: string; imageModelId?: string },
  options: CreatePipelineOptions
): ModelGateway {
  const logFile = config.cache.llm_log;
  return createModelGateway({
    provider: getProvider(config),
    modelId: models.modelId,
    imageModelId: models.imageModelId,
    cacheDir: config.cache.dir ? path.resolve(config.cache.dir) : undefined,
    skipCache: options.skipCache,
    onLog: logFile ? createLlmLogWriter(path.resolve(logFile)) : undefined,
  });
}

/**
 * `timeoutMs` bounds a single model call. Stages that fan out run
 * untimed and leave the timeout to their per-unit steps; only stages
 * listed in `timedStages` keep it.
 */
function pipelineDeps(
  config: AppConfig,
  options: CreatePipelineOptions,
  timedStages: readonly StageName[] = []
): PipelineDeps {
  const policy = getRetryPolicy(config);
  const { timeoutMs, ...untimed } = policy;
  const stage = (name: StageName, maxAttempts = policy.maxAttempts): RetryPolicy =>
    retryPolicy(
      timedStages.includes(name)
        ? { ...untimed, maxAttempts, timeoutMs }
        : { ...untimed, maxAttempts }
    );
  return {
    renderer: createJsonRenderer(options.outputPath),
    settings: getDeckSettings(config),
    stagingRoot: path.resolve(config.assets.root),
    assetLimits: {
      maxAssetBytes: config.assets.max_asset_bytes,
      maxAssets: config.assets.max_assets,
    },
    keepStaging: config.assets.keep_staging,
    stagePolicy: retryPolicy(untimed),
    // Per-unit steps already retry; one more round at stage level is enough.
    stagePolicies: {
      ingest: stage("ingest"),
      describe: stage("describe", Math.min(policy.maxAttempts, 2)),
      enrich: stage("enrich", 1),
    },
    taskPolicy: policy,
    concurrency: config.pipeline.concurrency,
    minSuccessRatio: config.pipeline.min_success_ratio,
    progress: options.progress ?? nullProgress,
  };
}

function parseDefaults(config: AppConfig): Partial<ParseDefaults> {
  return {
    fontFamily: config.slide.default_font_family,
    fontSize: config.slide.default_font_size,
    background: config.slide.background,
  };
}
