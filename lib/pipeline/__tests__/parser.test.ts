import { describe, it, expect } from "vitest";
import {
  formatPageId,
  parseColor,
  parseComposition,
  parsePage,
  parsePages,
  type ParseDefect,
} from "../parser";
import { isPipelineError } from "../core/errors";
import { coordinateSpace, DEFAULT_SPACE } from "../coordinates";
import type { ElementRecord, ImageElement, TextElement } from "../core/types";

function textAt(elements: ElementRecord[], i: number): TextElement {
  const el = elements[i];
  if (el?.type !== "text") throw new Error(`element ${i} is not text`);
  return el;
}

function imageAt(elements: ElementRecord[], i: number): ImageElement {
  const el = elements[i];
  if (el?.type !== "image") throw new Error(`element ${i} is not an image`);
  return el;
}

function validationIssues(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (isPipelineError(err, "validation")) return err.detail.issues;
    throw err;
  }
  throw new Error("expected a validation error");
}

describe("parseComposition", () => {
  it("parses pages with text and image elements", () => {
    const { slideConfig, pages } = parseComposition({
      slide_config: { theme: "dark", size: "16:9" },
      pages: [
        {
          title: "Intro",
          notes: "say hello",
          background_color: "#112233",
          elements: [
            {
              type: "text",
              content: "Welcome",
              position: { x: 100, y: 80 },
              size: { width: 800, height: 120 },
              font: { family: "Inter", size: 44, color: "#fff", bold: true },
              alignment: "Center",
            },
            {
              type: "image",
              id: "hero",
              position: { x: 1000, y: 200 },
              size: { width: 600, height: 400 },
              fit_mode: "cover",
              alt_text: "a mountain",
              generate: true,
              prompt: "a mountain at dawn",
              image_size: "1536x1024",
            },
          ],
        },
      ],
    });

    expect(slideConfig).toEqual({ theme: "dark", size: "16:9" });
    expect(pages).toHaveLength(1);
    const [page] = pages;
    expect(page.id).toBe("pg001");
    expect(page.title).toBe("Intro");
    expect(page.notes).toBe("say hello");
    expect(page.background).toEqual({ type: "color", color: "#112233" });
    expect(page.size).toBe(DEFAULT_SPACE);

    const text = textAt(page.elements, 0);
    expect(text.id).toBe("pg001_el001");
    expect(text.content).toBe("Welcome");
    expect(text.font).toEqual({
      family: "Inter",
      size: 44,
      color: "#FFFFFF",
      bold: true,
      italic: false,
      underline: false,
    });
    expect(text.alignment).toBe("center");

    const image = imageAt(page.elements, 1);
    expect(image.id).toBe("pg001_el002");
    expect(image.assetId).toBe("hero");
    expect(image.fitMode).toBe("cover");
    expect(image.generation).toEqual({ prompt: "a mountain at dawn", size: "1536x1024" });
  });

  it("drops unknown element types and keeps the rest", () => {
    const defects: ParseDefect[] = [];
    const pages = parsePages(
      {
        pages: [
          {
            elements: [
              { type: "video", position: { x: 0, y: 0 } },
              { type: "text", content: "kept", position: { x: 5, y: 5 } },
            ],
          },
        ],
      },
      { onDefect: (d) => defects.push(d) }
    );

    expect(pages[0].elements).toHaveLength(1);
    // Ids follow the position in the raw list
    expect(pages[0].elements[0].id).toBe("pg001_el002");
    expect(defects).toEqual([
      { pageNumber: 1, elementIndex: 0, reason: 'unknown element type "video"' },
    ]);
  });

  it("fills defaults for missing optional fields", () => {
    const [page] = parsePages({
      pages: [{ elements: [{ type: "text", position: { x: 1, y: 2 } }] }],
    });
    const text = textAt(page.elements, 0);
    expect(page.title).toBe("");
    expect(page.background).toEqual({ type: "color", color: "#FFFFFF" });
    expect(text.size).toEqual({ width: 100, height: 50 });
    expect(text.content).toBe("");
    expect(text.font).toEqual({
      family: "Arial",
      size: 18,
      color: "#000000",
      bold: false,
      italic: false,
      underline: false,
    });
    expect(text.alignment).toBe("left");
    expect(text.lineSpacing).toBe(1);
    expect(text.zIndex).toBe(0);
    expect(text.opacity).toBe(1);
  });

  it("applies caller defaults", () => {
    const [page] = parsePages(
      { pages: [{ elements: [{ type: "text", position: { x: 0, y: 0 } }] }] },
      { defaults: { fontFamily: "Roboto", fontSize: 24, background: "#EEEEEE" } }
    );
    const text = textAt(page.elements, 0);
    expect(text.font.family).toBe("Roboto");
    expect(text.font.size).toBe(24);
    expect(page.background).toEqual({ type: "color", color: "#EEEEEE" });
  });

  it("accepts numeric strings and clamps font size", () => {
    const [page] = parsePages({
      pages: [
        {
          elements: [
            {
              type: "text",
              position: { x: "12", y: "34.5" },
              size: { width: "300", height: 40 },
              font: { size: 999 },
            },
            { type: "text", position: { x: 0, y: 0 }, font: { size: 0 } },
          ],
        },
      ],
    });
    const first = textAt(page.elements, 0);
    expect(first.position).toEqual({ x: 12, y: 34.5 });
    expect(first.size).toEqual({ width: 300, height: 40 });
    expect(first.font.size).toBe(200);
    expect(textAt(page.elements, 1).font.size).toBe(1);
  });

  it("drops elements with malformed numeric fields", () => {
    const defects: ParseDefect[] = [];
    const [page] = parsePages(
      {
        pages: [
          {
            elements: [
              { type: "text" },
              { type: "text", position: { x: "left", y: 0 } },
              { type: "text", position: { x: 0, y: 0 }, size: { width: -5, height: 10 } },
              { type: "text", position: { x: 0, y: 0 }, z_index: "top" },
              { type: "text", position: { x: 0, y: 0 }, font: { size: "big" } },
              { type: "text", position: { x: 0, y: 0 }, line_spacing: 0 },
              "not an element",
            ],
          },
        ],
      },
      { onDefect: (d) => defects.push(d) }
    );
    expect(page.elements).toEqual([]);
    expect(defects.map((d) => d.reason)).toEqual([
      "missing position",
      "malformed position",
      "malformed size",
      "malformed z_index",
      "malformed font size",
      "malformed line_spacing",
      "element is string, not an object",
    ]);
  });

  it("does not request generation without a prompt", () => {
    const [page] = parsePages({
      pages: [{ elements: [{ type: "image", position: { x: 0, y: 0 }, generate: true }] }],
    });
    const image = imageAt(page.elements, 0);
    expect(image.generation).toBeUndefined();
    expect(image.assetId).toBe("pg001_el001");
    expect(image.fitMode).toBe("contain");
  });

  it("ignores a malformed slide_config", () => {
    const { slideConfig } = parseComposition({ slide_config: { theme: 7 }, pages: [] });
    expect(slideConfig).toEqual({ theme: undefined });
  });

  it("strips a markdown code fence around JSON text", () => {
    const pages = parsePages('```json\n{"pages": [{"title": "Fenced"}]}\n```');
    expect(pages.map((p) => p.title)).toEqual(["Fenced"]);
  });

  it("raises ValidationError for structural problems", () => {
    expect(validationIssues(() => parsePages("{not json"))).toEqual(["output is not valid JSON"]);
    expect(validationIssues(() => parsePages([]))).toEqual([
      "composition must be an object, got array",
    ]);
    expect(validationIssues(() => parsePages({}))).toEqual([
      'composition is missing required field "pages"',
    ]);
    expect(validationIssues(() => parsePages({ pages: {} }))).toEqual([
      '"pages" must be an array, got object',
    ]);
    expect(validationIssues(() => parsePages({ pages: [null] }))).toEqual([
      "pages[0] must be an object, got null",
    ]);
    expect(validationIssues(() => parsePages({ pages: [{ elements: "none" }] }))).toEqual([
      'page 1: "elements" must be an array, got string',
    ]);
  });
});

describe("parsePage", () => {
  it("uses the given page number and space", () => {
    const space = coordinateSpace(800, 600);
    const page = parsePage(
      {
        title: "Scanned",
        background: { type: "color", value: { red: 300, green: -4, blue: 127.6 } },
        elements: [
          {
            type: "text",
            content: "Hi",
            position: { x: 10, y: 10 },
            style: { font_name: "Georgia", font_size: 20, color: { red: 0, green: 128, blue: 255 } },
          },
          { type: "image", id: "model-id", position: { x: 0, y: 0 } },
        ],
      },
      3,
      { space, useOutputIds: false }
    );

    expect(page.id).toBe("pg003");
    expect(page.pageNumber).toBe(3);
    expect(page.size).toBe(space);
    expect(page.background).toEqual({ type: "color", color: "#FF0080" });
    const text = textAt(page.elements, 0);
    expect(text.font.family).toBe("Georgia");
    expect(text.font.color).toBe("#0080FF");
    expect(imageAt(page.elements, 1).assetId).toBe("pg003_el002");
  });

  it("reads background images", () => {
    const page = parsePage({ background: { type: "image", value: "bg.png" } }, 1);
    expect(page.background).toEqual({ type: "image", source: "bg.png", assetId: "pg001_bg" });

    const named = parsePage({ background: { type: "image", value: "sky.png", id: "sky" } }, 2);
    expect(named.background).toEqual({ type: "image", source: "sky.png", assetId: "sky" });
  });
});

describe("parseColor", () => {
  it("normalizes hex colors", () => {
    expect(parseColor("#abc")).toBe("#AABBCC");
    expect(parseColor("1a2b3c")).toBe("#1A2B3C");
    expect(parseColor(" #FFFFFF ")).toBe("#FFFFFF");
  });

  it("clamps and rounds channel objects", () => {
    expect(parseColor({ r: 256, g: 15.5, b: "-1" })).toBe("#FF1000");
  });

  it("returns undefined for anything else", () => {
    expect(parseColor("red")).toBeUndefined();
    expect(parseColor("#12345")).toBeUndefined();
    expect(parseColor(42)).toBeUndefined();
  });
});

describe("formatPageId", () => {
  it("pads to three digits", () => {
    expect(formatPageId(1)).toBe("pg001");
    expect(formatPageId(42)).toBe("pg042");
    expect(formatPageId(1234)).toBe("pg1234");
  });
});
