import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { createConvertPipeline, createDeckPipeline } from "../factory";
import type { RenderedDeck } from "../../../render/json-renderer";
import { createFakeGateway, delay, gradientPng } from "../../__tests__/fakes";
import { createTestPdf } from "../../../input/__tests__/create-test-pdf";

let tmpDir: string;
let configPath: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "factory-"));
  configPath = path.join(tmpDir, "config.yaml");
  fs.writeFileSync(
    configPath,
    [
      "slide:",
      "  width: 400",
      "  height: 200",
      "  theme: paper",
      "pipeline:",
      "  max_attempts: 1",
      "  base_delay_ms: 0",
      "assets:",
      `  root: ${path.join(tmpDir, "staging")}`,
      "",
    ].join("\n")
  );
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function readDeck(file: string): RenderedDeck {
  return JSON.parse(fs.readFileSync(file, "utf-8"));
}

describe("createConvertPipeline", () => {
  it("converts an image into a deck file with relative asset paths", async () => {
    const input = path.join(tmpDir, "scan.png");
    fs.writeFileSync(input, gradientPng(20, 10));
    const outputPath = path.join(tmpDir, "out", "deck.json");
    const gateway = createFakeGateway({
      object: () => ({
        title: "Scan",
        elements: [{ type: "image", position: { x: 0, y: 0 }, size: { width: 10, height: 5 } }],
      }),
    });

    const { config, pipeline } = createConvertPipeline({ outputPath, configPath, gateway });
    const doc = await pipeline.run({ source: input }, { runId: "run-1" });

    expect(config.slide.theme).toBe("paper");
    expect(doc).toEqual({ path: outputPath, pageCount: 1 });

    const deck = readDeck(outputPath);
    expect(deck.settings.size).toEqual({ width: 400, height: 200 });
    expect(deck.pages[0].title).toBe("Scan");
    const [image] = deck.pages[0].elements;
    expect(image.type === "image" && image.source).toBe(
      "../staging/run-1/images/pg001_el001.png"
    );
    expect(image.size).toEqual({ width: 200, height: 100 });
  });

  it("bounds each page analysis, not the whole describe stage, by the call timeout", async () => {
    const input = path.join(tmpDir, "handout.pdf");
    fs.writeFileSync(input, createTestPdf(8));
    const outputPath = path.join(tmpDir, "handout.json");
    let inFlight = 0;
    let peak = 0;
    const gateway = createFakeGateway({
      object: async (opts) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await delay(50);
        inFlight--;
        return { title: opts.log?.pageId ?? "" };
      },
    });

    const { pipeline } = createConvertPipeline({
      outputPath,
      configPath,
      gateway,
      overrides: { pipeline: { timeout_ms: 150, concurrency: 2 } },
    });
    expect(pipeline.steps.map((s) => s.policy.timeoutMs)).toEqual([
      undefined,
      undefined,
      undefined,
      undefined,
      undefined,
    ]);

    const doc = await pipeline.run({ source: input });

    expect(doc.pageCount).toBe(8);
    expect(gateway.objectCalls).toHaveLength(8);
    expect(peak).toBe(2);
    expect(readDeck(outputPath).pages.map((p) => p.title)).toEqual([
      "pg001",
      "pg002",
      "pg003",
      "pg004",
      "pg005",
      "pg006",
      "pg007",
      "pg008",
    ]);
  });
});

describe("createDeckPipeline", () => {
  it("keeps the call timeout on the single composition stage only", () => {
    const { pipeline } = createDeckPipeline({
      outputPath: path.join(tmpDir, "talk.json"),
      configPath,
      gateway: createFakeGateway({}),
      overrides: { pipeline: { timeout_ms: 150 } },
    });

    expect(pipeline.steps.map((s) => [s.name, s.policy.timeoutMs])).toEqual([
      ["ingest", undefined],
      ["describe", 150],
      ["enrich", undefined],
      ["merge", undefined],
      ["finalize", undefined],
    ]);
  });

  it("applies overrides on top of the config file", async () => {
    const outline = path.join(tmpDir, "talk.md");
    fs.writeFileSync(outline, "# Harbors\n\n## Tides\n");
    const outputPath = path.join(tmpDir, "talk.json");
    const gateway = createFakeGateway({
      object: () => ({
        pages: [
          {
            title: "Tides",
            elements: [
              {
                type: "image",
                id: "tide",
                position: { x: 0, y: 0 },
                generate: true,
                prompt: "tide pools",
              },
            ],
          },
        ],
      }),
    });

    const { config, pipeline } = createDeckPipeline({
      outputPath,
      configPath,
      gateway,
      overrides: { pipeline: { generate_images: false }, slide: { theme: "night" } },
    });
    await pipeline.run({ outlinePath: outline });

    expect(config.pipeline.generate_images).toBe(false);
    expect(gateway.imageCalls).toHaveLength(0);
    const deck = readDeck(outputPath);
    expect(deck.settings).toMatchObject({ theme: "night", title: "Harbors" });
    expect(deck.pages.map((p) => p.title)).toEqual(["Tides"]);
  });
});
