import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  deepMerge,
  expandEnv,
  getCanonicalSpace,
  getDeckSettings,
  getModels,
  getRetryPolicy,
  loadConfig,
} from "../config";
import { isPipelineError } from "../pipeline/core/errors";

const ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../..");

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "config-"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeConfig(yaml: string): string {
  const file = path.join(tmpDir, "config.yaml");
  fs.writeFileSync(file, yaml);
  return file;
}

describe("config", () => {
  it("loads the repository config.yaml", () => {
    const config = loadConfig(path.join(ROOT, "config.yaml"));
    expect(config.provider).toBe("openai");
    expect(getCanonicalSpace(config)).toEqual({ width: 1920, height: 1080 });
    expect(config.pipeline.concurrency).toBe(3);
  });

  it("fills defaults for omitted sections", () => {
    const config = loadConfig(writeConfig("provider: anthropic\n"));
    expect(config.provider).toBe("anthropic");
    expect(config.slide.size).toBe("16:9");
    expect(config.pipeline.generate_images).toBe(true);
    expect(config.assets.max_assets).toBe(500);
    expect(config.input.dpi).toBe(200);
    expect(getModels(config)).toEqual({});
    expect(getRetryPolicy(config)).toEqual({
      maxAttempts: 3,
      baseDelayMs: 1000,
      backoffMultiplier: 2,
      timeoutMs: undefined,
    });
  });

  it("applies overrides over the file", () => {
    const file = writeConfig("pipeline:\n  concurrency: 2\n  max_attempts: 5\n");
    const config = loadConfig(file, { pipeline: { concurrency: 8 }, slide: { theme: "dark" } });
    expect(config.pipeline.concurrency).toBe(8);
    expect(config.pipeline.max_attempts).toBe(5);
    expect(config.slide.theme).toBe("dark");
  });

  it("derives the canonical space from size or explicit dimensions", () => {
    expect(getCanonicalSpace(loadConfig(writeConfig('slide:\n  size: "4:3"\n')))).toEqual({
      width: 1024,
      height: 768,
    });
    expect(
      getCanonicalSpace(loadConfig(writeConfig("slide:\n  width: 1280\n  height: 720\n")))
    ).toEqual({ width: 1280, height: 720 });
    expect(getCanonicalSpace(loadConfig(writeConfig("slide:\n  size: poster\n")))).toEqual({
      width: 1920,
      height: 1080,
    });
  });

  it("builds deck settings", () => {
    const config = loadConfig(
      writeConfig("slide:\n  theme: corporate\n  background: '#101010'\n  default_font_size: 20\n")
    );
    expect(getDeckSettings(config)).toEqual({
      size: { width: 1920, height: 1080 },
      theme: "corporate",
      background: "#101010",
      defaultFontFamily: "Arial",
      defaultFontSize: 20,
    });
  });

  it("expands environment variables in string values", () => {
    process.env.SLIDES_TEST_CACHE = "/tmp/slides-cache";
    try {
      const config = loadConfig(writeConfig("cache:\n  dir: ${SLIDES_TEST_CACHE}/llm\n"));
      expect(config.cache.dir).toBe("/tmp/slides-cache/llm");
    } finally {
      delete process.env.SLIDES_TEST_CACHE;
    }
  });

  it("reports invalid values as validation errors", () => {
    const file = writeConfig("provider: mistral\npipeline:\n  concurrency: 0\n");
    let caught: unknown;
    try {
      loadConfig(file);
    } catch (err) {
      caught = err;
    }
    expect(isPipelineError(caught, "validation")).toBe(true);
    if (!isPipelineError(caught, "validation")) return;
    expect(caught.detail.issues.map((i) => i.split(":")[0])).toEqual([
      "provider",
      "pipeline.concurrency",
    ]);
  });

  it("fails on a missing explicit config file", () => {
    expect(() => loadConfig(path.join(tmpDir, "nope.yaml"))).toThrow("config file not found");
  });
});

describe("deepMerge", () => {
  it("recurses into objects and replaces everything else", () => {
    expect(
      deepMerge(
        { a: { b: 1, c: [1, 2] }, d: "x" },
        { a: { c: [3] }, d: null, e: true }
      )
    ).toEqual({ a: { b: 1, c: [3] }, d: null, e: true });
  });
});

describe("expandEnv", () => {
  it("replaces unset variables with an empty string", () => {
    expect(expandEnv({ list: ["${NOPE_UNSET}x"], n: 3 }, {})).toEqual({ list: ["x"], n: 3 });
  });
});
