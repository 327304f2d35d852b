import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";
import type { CoordinateSpace, DeckSettings, RetryPolicy } from "./pipeline/core/types";
import { aspectSpace, coordinateSpace, DEFAULT_SPACE } from "./pipeline/coordinates";
import { PROVIDERS, type LLMProvider } from "./pipeline/core/llm";
import { validationError } from "./pipeline/core/errors";

const positiveInt = z.number().int().min(1);

const configSchema = z.object({
  provider: z.enum(PROVIDERS).default("openai"),
  models: z
    .object({
      composition: z.string().optional(),
      analysis: z.string().optional(),
      image: z.string().optional(),
    })
    .default({}),
  slide: z
    .object({
      size: z.string().default("16:9"),
      width: positiveInt.optional(),
      height: positiveInt.optional(),
      theme: z.string().default("default"),
      background: z.string().default("#FFFFFF"),
      default_font_family: z.string().default("Arial"),
      default_font_size: z.number().min(1).max(200).default(18),
    })
    .prefault({}),
  pipeline: z
    .object({
      concurrency: positiveInt.default(3),
      max_attempts: positiveInt.default(3),
      base_delay_ms: z.number().min(0).default(1000),
      backoff_multiplier: z.number().min(1).default(2),
      timeout_ms: positiveInt.optional(),
      generate_images: z.boolean().default(true),
      min_success_ratio: z.number().min(0).max(1).default(0),
    })
    .prefault({}),
  assets: z
    .object({
      root: z.string().default(".slidesmith/staging"),
      max_asset_bytes: positiveInt.default(10 * 1024 * 1024),
      max_assets: positiveInt.default(500),
      keep_staging: z.boolean().default(false),
    })
    .prefault({}),
  input: z
    .object({
      dpi: positiveInt.default(200),
      max_file_bytes: positiveInt.default(50 * 1024 * 1024),
      max_pages: positiveInt.default(50),
    })
    .prefault({}),
  cache: z
    .object({
      dir: z.string().optional(),
      llm_log: z.string().optional(),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof configSchema>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins.
 */
export function deepMerge(
  base: Record<string, unknown>,
  overrides: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, overVal] of Object.entries(overrides)) {
    const baseVal = result[key];
    result[key] =
      isPlainObject(baseVal) && isPlainObject(overVal) ? deepMerge(baseVal, overVal) : overVal;
  }
  return result;
}

/**
 * Replace `${VAR}` in every string value. Unset variables expand to "".
 */
export function expandEnv(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => env[name] ?? "");
  }
  if (Array.isArray(value)) return value.map((v) => expandEnv(v, env));
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, expandEnv(v, env)]));
  }
  return value;
}

/**
 * Load config.yaml (or `configPath`), apply overrides and validate.
 * A missing default file yields the built-in defaults; a missing
 * explicit path is an error.
 */
export function loadConfig(
  configPath?: string,
  overrides: Record<string, unknown> = {}
): AppConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), "config.yaml");
  let raw: unknown = {};
  if (fs.existsSync(resolved)) {
    raw = expandEnv(yaml.load(fs.readFileSync(resolved, "utf-8")) ?? {});
  } else if (configPath) {
    throw validationError([`config file not found: ${configPath}`]);
  }
  if (!isPlainObject(raw)) {
    throw validationError([`${resolved}: top level must be a mapping`]);
  }

  const parsed = configSchema.safeParse(deepMerge(raw, overrides));
  if (!parsed.success) {
    throw validationError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
      parsed.error
    );
  }
  return parsed.data;
}

export function getProvider(cfg: AppConfig): LLMProvider {
  return cfg.provider;
}

export function getModels(cfg: AppConfig): {
  composition?: string;
  analysis?: string;
  image?: string;
} {
  return cfg.models;
}

export function getRetryPolicy(cfg: AppConfig): RetryPolicy {
  return Object.freeze({
    maxAttempts: cfg.pipeline.max_attempts,
    baseDelayMs: cfg.pipeline.base_delay_ms,
    backoffMultiplier: cfg.pipeline.backoff_multiplier,
    timeoutMs: cfg.pipeline.timeout_ms,
  });
}

/**
 * Explicit width and height win over the named size; unknown names fall
 * back to 1920x1080.
 */
export function getCanonicalSpace(cfg: AppConfig): CoordinateSpace {
  const { width, height, size } = cfg.slide;
  if (width !== undefined && height !== undefined) return coordinateSpace(width, height);
  return aspectSpace(size) ?? DEFAULT_SPACE;
}

export function getDeckSettings(cfg: AppConfig): DeckSettings {
  return {
    size: getCanonicalSpace(cfg),
    theme: cfg.slide.theme,
    background: cfg.slide.background,
    defaultFontFamily: cfg.slide.default_font_family,
    defaultFontSize: cfg.slide.default_font_size,
  };
}
