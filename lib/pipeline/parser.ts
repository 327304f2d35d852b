/**
 * Structured output parser.
 *
 * Turns untrusted model output into PageArtifacts. Only a missing or
 * misshapen top-level structure raises; every other defect is handled
 * per element (dropped) or per field (defaulted) and reported through
 * the optional onDefect callback.
 */

import type {
  BackgroundDescriptor,
  CoordinateSpace,
  ElementRecord,
  FontStyle,
  ImageElement,
  PageArtifact,
  TextElement,
  ValidationResult,
} from "./core/types";
import {
  alignmentSchema,
  elementTypeSchema,
  fitModeSchema,
  hexColorSchema,
  imageSizeSchema,
  numericSchema,
  pointSchema,
  positiveNumericSchema,
  rgbColorSchema,
  sizeSchema,
  slideConfigSchema,
  type SlideConfigOutput,
} from "./core/schemas";
import { isPipelineError, validationError } from "./core/errors";
import { DEFAULT_SPACE } from "./coordinates";

// ============================================================================
// Options
// ============================================================================

export interface ParseDefaults {
  fontFamily: string;
  fontSize: number;
  fontColor: string;
  background: string;
  elementSize: { width: number; height: number };
  imageSize: string;
}

export const DEFAULT_PARSE_DEFAULTS: ParseDefaults = {
  fontFamily: "Arial",
  fontSize: 18,
  fontColor: "#000000",
  background: "#FFFFFF",
  elementSize: { width: 100, height: 50 },
  imageSize: "1024x1024",
};

export interface ParseDefect {
  pageNumber: number;
  elementIndex: number;
  reason: string;
}

export interface ParseOptions {
  /** Space the coordinates were described in */
  space?: CoordinateSpace;
  defaults?: Partial<ParseDefaults>;
  /** Take image asset ids from the output's "id" fields (default true) */
  useOutputIds?: boolean;
  onDefect?: (defect: ParseDefect) => void;
}

export interface ParsedComposition {
  slideConfig: SlideConfigOutput;
  pages: PageArtifact[];
}

const MIN_FONT_SIZE = 1;
const MAX_FONT_SIZE = 200;

// ============================================================================
// Entry points
// ============================================================================

/**
 * Parse a multi-page composition: `{ slide_config?, pages: [...] }`.
 */
export function parseComposition(raw: unknown, options: ParseOptions = {}): ParsedComposition {
  const root = requireRecord(decode(raw), "composition");
  if (!("pages" in root) || root.pages === undefined || root.pages === null) {
    throw validationError(["composition is missing required field \"pages\""]);
  }
  if (!Array.isArray(root.pages)) {
    throw validationError([`"pages" must be an array, got ${describeType(root.pages)}`]);
  }

  const slideConfig = slideConfigSchema.safeParse(root.slide_config ?? {});
  const pages = root.pages.map((entry, i) =>
    buildPage(requireRecord(entry, `pages[${i}]`), i + 1, options)
  );
  return {
    slideConfig: slideConfig.success ? slideConfig.data : {},
    pages,
  };
}

export function parsePages(raw: unknown, options: ParseOptions = {}): PageArtifact[] {
  return parseComposition(raw, options).pages;
}

/**
 * Parse a single page description, such as the analysis of one scanned
 * page.
 */
export function parsePage(
  raw: unknown,
  pageNumber: number,
  options: ParseOptions = {}
): PageArtifact {
  return buildPage(requireRecord(decode(raw), "page"), pageNumber, options);
}

/**
 * Wrap a parse function as a gateway validator: structural failures
 * become validation issues, anything else still throws.
 */
export function validatorFor(
  parse: (raw: unknown) => unknown
): (raw: unknown) => ValidationResult {
  return (raw) => {
    try {
      parse(raw);
      return { valid: true, errors: [] };
    } catch (err) {
      if (isPipelineError(err, "validation")) {
        return { valid: false, errors: err.detail.issues };
      }
      throw err;
    }
  };
}

// ============================================================================
// Pages
// ============================================================================

export function formatPageId(pageNumber: number): string {
  return `pg${String(pageNumber).padStart(3, "0")}`;
}

function buildPage(
  raw: Record<string, unknown>,
  pageNumber: number,
  options: ParseOptions
): PageArtifact {
  const defaults = { ...DEFAULT_PARSE_DEFAULTS, ...options.defaults };
  const id = formatPageId(pageNumber);

  const rawElements = raw.elements ?? [];
  if (!Array.isArray(rawElements)) {
    throw validationError([
      `page ${pageNumber}: "elements" must be an array, got ${describeType(rawElements)}`,
    ]);
  }

  const elements: ElementRecord[] = [];
  rawElements.forEach((entry, index) => {
    const parsed = parseElement(
      entry,
      `${id}_el${String(index + 1).padStart(3, "0")}`,
      defaults,
      options.useOutputIds ?? true
    );
    if (typeof parsed === "string") {
      options.onDefect?.({ pageNumber, elementIndex: index, reason: parsed });
    } else {
      elements.push(parsed);
    }
  });

  return {
    id,
    pageNumber,
    title: optionalText(raw.title) ?? "",
    notes: optionalText(raw.notes),
    layout: optionalText(raw.layout),
    elements,
    background: parseBackground(raw, id, defaults, options.useOutputIds ?? true),
    size: options.space ?? DEFAULT_SPACE,
  };
}

function parseBackground(
  raw: Record<string, unknown>,
  pageId: string,
  defaults: ParseDefaults,
  useOutputIds: boolean
): BackgroundDescriptor {
  const bg = raw.background;
  const assetId = (useOutputIds && isRecord(bg) && optionalText(bg.id)) || `${pageId}_bg`;
  if (isRecord(bg)) {
    if (bg.type === "image" && typeof bg.value === "string" && bg.value !== "") {
      return { type: "image", source: bg.value, assetId };
    }
    if (bg.type === "none") return { type: "none" };
    return { type: "color", color: parseColor(bg.value) ?? defaults.background };
  }
  if (typeof raw.background_image === "string" && raw.background_image !== "") {
    return { type: "image", source: raw.background_image, assetId };
  }
  return {
    type: "color",
    color: parseColor(raw.background_color ?? bg) ?? defaults.background,
  };
}

// ============================================================================
// Elements
// ============================================================================

/** Returns the element, or the reason it was dropped. */
function parseElement(
  raw: unknown,
  id: string,
  defaults: ParseDefaults,
  useOutputIds: boolean
): ElementRecord | string {
  if (!isRecord(raw)) return `element is ${describeType(raw)}, not an object`;

  const type = elementTypeSchema.safeParse(
    typeof raw.type === "string" ? raw.type.trim().toLowerCase() : raw.type
  );
  if (!type.success) return `unknown element type ${JSON.stringify(raw.type)}`;

  if (raw.position === undefined) return "missing position";
  const position = pointSchema.safeParse(raw.position);
  if (!position.success) return "malformed position";

  let size = { ...defaults.elementSize };
  if (raw.size !== undefined) {
    const parsedSize = sizeSchema.safeParse(raw.size);
    if (!parsedSize.success) return "malformed size";
    size = parsedSize.data;
  }

  const zIndex = optionalNumber(raw.z_index ?? raw.zIndex, 0);
  if (zIndex === null) return "malformed z_index";
  const opacity = optionalNumber(raw.opacity, 1);
  if (opacity === null) return "malformed opacity";

  const base = {
    id,
    position: position.data,
    size,
    zIndex: Math.round(zIndex),
    opacity: Math.min(Math.max(opacity, 0), 1),
  };

  switch (type.data) {
    case "text":
      return parseTextElement(raw, base, defaults);
    case "image":
      return parseImageElement(raw, base, defaults, useOutputIds);
  }
}

type ElementBase = Omit<TextElement, "type" | "content" | "font" | "alignment" | "lineSpacing">;

function parseTextElement(
  raw: Record<string, unknown>,
  base: ElementBase,
  defaults: ParseDefaults
): TextElement | string {
  const style: Record<string, unknown> = isRecord(raw.font)
    ? raw.font
    : isRecord(raw.style)
      ? raw.style
      : {};

  const fontSize = optionalNumber(style.size ?? style.font_size, defaults.fontSize);
  if (fontSize === null) return "malformed font size";

  const lineSpacing = raw.line_spacing ?? style.line_spacing;
  let spacing = 1;
  if (lineSpacing !== undefined) {
    const parsed = positiveNumericSchema.safeParse(lineSpacing);
    if (!parsed.success) return "malformed line_spacing";
    spacing = parsed.data;
  }

  const font: FontStyle = {
    family:
      optionalText(style.family ?? style.font_family ?? style.font_name) || defaults.fontFamily,
    size: Math.min(Math.max(fontSize, MIN_FONT_SIZE), MAX_FONT_SIZE),
    color: parseColor(style.color) ?? defaults.fontColor,
    bold: style.bold === true,
    italic: style.italic === true,
    underline: style.underline === true,
  };

  const alignment = alignmentSchema.safeParse(
    lowerText(raw.alignment ?? style.alignment)
  );

  return {
    ...base,
    type: "text",
    content: optionalText(raw.content ?? raw.text) ?? "",
    font,
    alignment: alignment.success ? alignment.data : "left",
    lineSpacing: spacing,
  };
}

function parseImageElement(
  raw: Record<string, unknown>,
  base: ElementBase,
  defaults: ParseDefaults,
  useOutputIds: boolean
): ImageElement {
  const fitMode = fitModeSchema.safeParse(lowerText(raw.fit_mode ?? raw.fitMode));
  const assetId = useOutputIds ? optionalText(raw.id) : undefined;
  const prompt = optionalText(raw.prompt);
  const imageSize = imageSizeSchema.safeParse(raw.image_size);

  const element: ImageElement = {
    ...base,
    type: "image",
    assetId: assetId || base.id,
    source: optionalText(raw.source ?? raw.image_path) ?? "",
    fitMode: fitMode.success ? fitMode.data : "contain",
    altText: optionalText(raw.alt_text ?? raw.description) ?? "",
  };
  if (raw.generate === true && prompt) {
    element.generation = {
      prompt,
      size: imageSize.success ? imageSize.data : defaults.imageSize,
    };
  }
  return element;
}

// ============================================================================
// Field helpers
// ============================================================================

/**
 * Normalize a color to "#RRGGBB". Accepts hex strings (3 or 6 digits)
 * and channel objects, whose channels are clamped to 0..255.
 */
export function parseColor(value: unknown): string | undefined {
  const hex = hexColorSchema.safeParse(value);
  if (hex.success) {
    let digits = hex.data.replace(/^#/, "");
    if (digits.length === 3) {
      digits = digits
        .split("")
        .map((d) => d + d)
        .join("");
    }
    return `#${digits.toUpperCase()}`;
  }

  const rgb = rgbColorSchema.safeParse(value);
  if (!rgb.success) return undefined;
  const channels =
    "red" in rgb.data
      ? [rgb.data.red, rgb.data.green, rgb.data.blue]
      : [rgb.data.r, rgb.data.g, rgb.data.b];
  return (
    "#" +
    channels
      .map((c) => Math.min(Math.max(Math.round(c), 0), 255))
      .map((c) => c.toString(16).padStart(2, "0").toUpperCase())
      .join("")
  );
}

/** undefined -> fallback; unparsable -> null */
function optionalNumber(value: unknown, fallback: number): number | null {
  if (value === undefined || value === null) return fallback;
  const parsed = numericSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function optionalText(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

function lowerText(value: unknown): unknown {
  return typeof value === "string" ? value.trim().toLowerCase() : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw validationError([`${label} must be an object, got ${describeType(value)}`]);
  }
  return value;
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Accept already-decoded values or JSON text, optionally wrapped in a
 * markdown code fence.
 */
function decode(raw: unknown): unknown {
  if (typeof raw !== "string") return raw;
  const text = raw
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");
  try {
    return JSON.parse(text);
  } catch (err) {
    throw validationError(["output is not valid JSON"], err);
  }
}
