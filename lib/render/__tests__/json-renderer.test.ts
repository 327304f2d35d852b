import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { createJsonRenderer, type RenderedDeck } from "../json-renderer";
import type { DeckSettings, PageArtifact } from "../../pipeline/core/types";
import { DEFAULT_SPACE } from "../../pipeline/coordinates";

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "json-renderer-"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

const settings: DeckSettings = {
  size: DEFAULT_SPACE,
  theme: "default",
  background: "#FFFFFF",
  defaultFontFamily: "Arial",
  defaultFontSize: 18,
};

function deckPage(source: string): PageArtifact {
  return {
    id: "pg001",
    pageNumber: 1,
    title: "One",
    elements: [
      {
        id: "pg001_el001",
        type: "image",
        assetId: "hero",
        source,
        fitMode: "contain",
        altText: "",
        position: { x: 0, y: 0 },
        size: { width: 10, height: 10 },
        zIndex: 0,
        opacity: 1,
      },
    ],
    background: { type: "none" },
    size: DEFAULT_SPACE,
  };
}

function readDeck(file: string): RenderedDeck {
  return JSON.parse(fs.readFileSync(file, "utf-8"));
}

function firstSource(deck: RenderedDeck): string {
  const el = deck.pages[0].elements[0];
  return el.type === "image" ? el.source : "";
}

describe("createJsonRenderer", () => {
  it("writes settings and pages, creating directories", async () => {
    const output = path.join(tmpDir, "out", "deck.json");
    const renderer = createJsonRenderer(output);
    const assetPath = path.join(tmpDir, "out", "staging", "images", "hero.png");

    const doc = await renderer.render([deckPage(assetPath)], settings);

    expect(doc).toEqual({ path: output, pageCount: 1 });
    const deck = readDeck(output);
    expect(deck.settings).toEqual(settings);
    expect(deck.pages.map((p) => p.id)).toEqual(["pg001"]);
    expect(firstSource(deck)).toBe("staging/images/hero.png");
  });

  it("can keep absolute asset paths", async () => {
    const output = path.join(tmpDir, "deck.json");
    const assetPath = path.join(tmpDir, "images", "hero.png");
    await createJsonRenderer(output, { relativeAssets: false }).render([deckPage(assetPath)], settings);
    expect(firstSource(readDeck(output))).toBe(assetPath);
  });

  it("rewrites background image paths too", async () => {
    const output = path.join(tmpDir, "deck.json");
    const page = deckPage("logo.png");
    page.background = {
      type: "image",
      source: path.join(tmpDir, "images", "sky.png"),
      assetId: "sky",
    };
    await createJsonRenderer(output).render([page], settings);
    expect(readDeck(output).pages[0].background).toEqual({
      type: "image",
      source: "images/sky.png",
      assetId: "sky",
    });
  });

  it("leaves relative sources alone", async () => {
    const output = path.join(tmpDir, "deck.json");
    await createJsonRenderer(output).render([deckPage("logo.png")], settings);
    expect(firstSource(readDeck(output))).toBe("logo.png");
  });
});
