/**
 * Model gateway backed by the Vercel AI SDK.
 *
 * - Resolves provider/model ids, including the "provider:model" form
 * - Caches structured responses on disk, keyed by the request; only
 *   responses that pass the caller's validate() are written
 * - Leaves retries to the step runner (SDK retries are disabled)
 * - Classifies provider failures into gateway error kinds
 * - Logs every call through onLog
 */

import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import {
  APICallError,
  NoObjectGeneratedError,
  experimental_generateImage as generateImage,
  generateObject,
  type ImageModel,
  type LanguageModel,
  type ModelMessage,
  type UserContent,
} from "ai";
import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import type {
  ContentPart,
  GenerateObjectResult,
  Message,
  ModelGateway,
} from "./types";
import {
  gatewayError,
  isPipelineError,
  messageOf,
  validationError,
  type PipelineError,
} from "./errors";
import { sanitizeMessages, type LlmLogEntry } from "../llm-log";

// ============================================================================
// Provider types and model resolution
// ============================================================================

export const PROVIDERS = ["openai", "anthropic", "google"] as const;

export type LLMProvider = (typeof PROVIDERS)[number];

export function isProvider(value: string): value is LLMProvider {
  return PROVIDERS.some((p) => p === value);
}

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openai: "gpt-4o",
  anthropic: "claude-sonnet-4-20250514",
  google: "gemini-2.0-flash",
};

const DEFAULT_IMAGE_MODELS: Partial<Record<LLMProvider, string>> = {
  openai: "gpt-image-1",
  google: "imagen-3.0-generate-002",
};

const MODEL_FACTORIES: Record<LLMProvider, (id: string) => LanguageModel> = {
  openai: (id) => openai(id),
  anthropic: (id) => anthropic(id),
  google: (id) => google(id),
};

const IMAGE_MODEL_FACTORIES: Partial<Record<LLMProvider, (id: string) => ImageModel>> = {
  openai: (id) => openai.image(id),
  google: (id) => google.image(id),
};

/**
 * Split "provider:model-id" overrides; plain ids use the given provider.
 */
export function parseModelId(
  provider: LLMProvider,
  modelId?: string
): { provider: LLMProvider; modelId?: string } {
  if (modelId?.includes(":")) {
    const [p, m] = modelId.split(":", 2);
    if (!isProvider(p)) {
      throw gatewayError("provider", `Unknown provider "${p}" in model id "${modelId}"`, {
        retryable: false,
      });
    }
    return { provider: p, modelId: m };
  }
  return { provider, modelId };
}

export function resolveLanguageModel(
  provider: LLMProvider,
  modelId?: string
): { model: LanguageModel; modelId: string } {
  const resolved = parseModelId(provider, modelId);
  const id = resolved.modelId ?? DEFAULT_MODELS[resolved.provider];
  return { model: MODEL_FACTORIES[resolved.provider](id), modelId: id };
}

export function resolveImageModel(
  provider: LLMProvider,
  modelId?: string
): { model: ImageModel; modelId: string } {
  const resolved = parseModelId(provider, modelId);
  const factory = IMAGE_MODEL_FACTORIES[resolved.provider];
  const id = resolved.modelId ?? DEFAULT_IMAGE_MODELS[resolved.provider];
  if (!factory || !id) {
    throw gatewayError("provider", `Provider "${resolved.provider}" cannot generate images`, {
      retryable: false,
    });
  }
  return { model: factory(id), modelId: id };
}

// ============================================================================
// Error classification
// ============================================================================

/**
 * Map anything thrown by the SDK to a pipeline error. Authentication
 * failures are fatal; rate limits and timeouts are retryable.
 */
export function classifyGatewayError(err: unknown): PipelineError {
  if (isPipelineError(err)) return err;

  if (APICallError.isInstance(err)) {
    const status = err.statusCode;
    if (status === 401 || status === 403) {
      return gatewayError("authentication", err.message, { statusCode: status, cause: err });
    }
    if (status === 429) {
      return gatewayError("rate-limit", err.message, { statusCode: status, cause: err });
    }
    if (status === 408 || status === 504) {
      return gatewayError("timeout", err.message, { statusCode: status, cause: err });
    }
    return gatewayError("provider", err.message, {
      statusCode: status,
      retryable: err.isRetryable,
      cause: err,
    });
  }

  if (NoObjectGeneratedError.isInstance(err)) {
    return validationError(["model response was not a JSON object"], err);
  }

  if (err instanceof Error) {
    if (err.name === "AbortError" || err.name === "TimeoutError") {
      return gatewayError("timeout", err.message, { cause: err });
    }
    if (err.name === "AI_LoadAPIKeyError") {
      return gatewayError("authentication", err.message, { cause: err });
    }
  }
  return gatewayError("provider", messageOf(err), { cause: err });
}

// ============================================================================
// Gateway factory
// ============================================================================

export interface CreateModelGatewayOptions {
  provider: LLMProvider;
  modelId?: string;
  imageModelId?: string;
  cacheDir?: string;
  skipCache?: boolean;
  onLog?: (entry: LlmLogEntry) => void;
}

export function createModelGateway(options: CreateModelGatewayOptions): ModelGateway {
  const { model, modelId } = resolveLanguageModel(options.provider, options.modelId);

  return {
    async generateObject(opts): Promise<GenerateObjectResult> {
      const t0 = Date.now();
      const cacheFile = options.cacheDir
        ? path.join(
            options.cacheDir,
            `${computeHash({ modelId, system: opts.system, messages: opts.messages })}.json`
          )
        : null;

      const log = (fields: Partial<LlmLogEntry>) => {
        if (!opts.log) return;
        options.onLog?.({
          timestamp: new Date().toISOString(),
          taskType: opts.log.taskType,
          pageId: opts.log.pageId,
          promptName: opts.log.promptName,
          modelId,
          cacheHit: false,
          durationMs: Date.now() - t0,
          system: opts.system,
          messages: sanitizeMessages(opts.messages),
          ...fields,
        });
      };

      const issues = (object: unknown): string[] => {
        const check = opts.validate?.(object);
        return check && !check.valid ? check.errors : [];
      };

      if (cacheFile && !options.skipCache && fs.existsSync(cacheFile)) {
        const object: unknown = JSON.parse(fs.readFileSync(cacheFile, "utf-8"));
        if (issues(object).length === 0) {
          log({ cacheHit: true });
          return { object, cached: true };
        }
        bustCache(cacheFile);
      }

      try {
        const generated = await generateObject({
          model,
          output: "no-schema",
          system: opts.system,
          messages: opts.messages.map(toModelMessage),
          abortSignal: opts.abortSignal,
          maxRetries: 0,
        });
        const usage = {
          inputTokens: generated.usage.inputTokens ?? 0,
          outputTokens: generated.usage.outputTokens ?? 0,
        };
        const problems = issues(generated.object);
        if (problems.length > 0) throw validationError(problems);
        if (cacheFile) {
          fs.mkdirSync(path.dirname(cacheFile), { recursive: true });
          fs.writeFileSync(cacheFile, JSON.stringify(generated.object, null, 2) + "\n");
        }
        log({ usage });
        return { object: generated.object, usage, cached: false };
      } catch (err) {
        const classified = classifyGatewayError(err);
        log({ error: classified.message });
        throw classified;
      }
    },

    async generateImage(opts) {
      const image = resolveImageModel(options.provider, options.imageModelId);
      const t0 = Date.now();
      const log = (error?: string) =>
        options.onLog?.({
          timestamp: new Date().toISOString(),
          taskType: opts.log?.taskType ?? "image-generation",
          pageId: opts.log?.pageId,
          promptName: "image_generation",
          modelId: image.modelId,
          cacheHit: false,
          durationMs: Date.now() - t0,
          error,
          messages: [{ role: "user", content: [{ type: "text", text: opts.prompt }] }],
        });

      try {
        const size = opts.size;
        const result = await generateImage({
          model: image.model,
          prompt: opts.prompt,
          size: size !== undefined && isImageSize(size) ? size : undefined,
          abortSignal: opts.abortSignal,
          maxRetries: 0,
        });
        log();
        return { bytes: result.image.uint8Array, mediaType: result.image.mediaType };
      } catch (err) {
        const classified = classifyGatewayError(err);
        log(classified.message);
        throw classified;
      }
    },
  };
}

// ============================================================================
// Internal helpers
// ============================================================================

function bustCache(cacheFile: string): void {
  fs.rmSync(cacheFile, { force: true });
}

function isImageSize(value: string): value is `${number}x${number}` {
  return /^\d+x\d+$/.test(value);
}

function computeHash(data: { modelId: string; system?: string; messages: Message[] }): string {
  return crypto.createHash("sha256").update(JSON.stringify(data)).digest("hex");
}

function toModelMessage(message: Message): ModelMessage {
  if (message.role === "assistant") {
    return {
      role: "assistant",
      content:
        typeof message.content === "string"
          ? message.content
          : message.content.map((p) => (p.type === "text" ? p.text : "")).join("\n"),
    };
  }
  return {
    role: "user",
    content: typeof message.content === "string" ? message.content : toUserContent(message.content),
  };
}

function toUserContent(parts: ContentPart[]): UserContent {
  return parts.map((p) =>
    p.type === "text"
      ? { type: "text" as const, text: p.text }
      : { type: "image" as const, image: p.image, mediaType: p.mediaType ?? "image/png" }
  );
}
