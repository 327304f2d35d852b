/**
 * Raw input loader.
 *
 * Expands a source document into page units, each a PNG raster with its
 * own pixel dimensions. PDFs are rendered page by page with mupdf as the
 * sequence is consumed; single images are normalized to PNG with sharp.
 */

import fs from "node:fs";
import path from "node:path";
import mupdf, { type Document as MupdfDocument } from "mupdf";
import sharp from "sharp";
import type { InputUnit, RawInputLoader } from "../pipeline/core/types";
import { resourceBoundaryError, validationError } from "../pipeline/core/errors";
import { formatPageId } from "../pipeline/parser";
import { getPngMetadata } from "../images/png-utils";

// ============================================================================
// Options
// ============================================================================

export interface InputLoaderOptions {
  /** Render resolution for PDF pages */
  dpi?: number;
  maxFileBytes?: number;
  maxPages?: number;
}

export const DEFAULT_DPI = 200;
export const DEFAULT_MAX_FILE_BYTES = 10 * 1024 * 1024;
export const DEFAULT_MAX_PAGES = 50;

export const PDF_EXTENSIONS = [".pdf"];
export const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".gif", ".webp", ".tif", ".tiff"];

export function isSupportedInput(source: string): boolean {
  const ext = path.extname(source).toLowerCase();
  return PDF_EXTENSIONS.includes(ext) || IMAGE_EXTENSIONS.includes(ext);
}

// ============================================================================
// Loader
// ============================================================================

export function createInputLoader(options: InputLoaderOptions = {}): RawInputLoader {
  const dpi = options.dpi ?? DEFAULT_DPI;
  const maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;

  return {
    load(source) {
      return loadUnits(source, { dpi, maxFileBytes, maxPages });
    },
  };
}

async function* loadUnits(
  source: string,
  limits: Required<InputLoaderOptions>
): AsyncGenerator<InputUnit> {
  const ext = path.extname(source).toLowerCase();
  if (!isSupportedInput(source)) {
    throw validationError([
      `unsupported input type "${ext || source}"; expected one of ${[
        ...PDF_EXTENSIONS,
        ...IMAGE_EXTENSIONS,
      ].join(", ")}`,
    ]);
  }
  if (!fs.existsSync(source)) {
    throw validationError([`input not found: ${source}`]);
  }

  const { size } = await fs.promises.stat(source);
  if (size > limits.maxFileBytes) {
    throw resourceBoundaryError(
      "size-ceiling",
      source,
      `Input is ${size} bytes (limit ${limits.maxFileBytes})`
    );
  }
  const buffer = await fs.promises.readFile(source);

  if (PDF_EXTENSIONS.includes(ext)) {
    yield* renderPdfPages(buffer, source, limits);
  } else {
    yield await loadImage(buffer);
  }
}

async function* renderPdfPages(
  buffer: Buffer,
  source: string,
  limits: Required<InputLoaderOptions>
): AsyncGenerator<InputUnit> {
  const doc = openPdfFromBuffer(buffer);
  const total = doc.countPages();
  if (total > limits.maxPages) {
    throw resourceBoundaryError(
      "count-ceiling",
      source,
      `PDF has ${total} pages (limit ${limits.maxPages})`
    );
  }

  const scale = limits.dpi / 72;
  const matrix = mupdf.Matrix.scale(scale, scale);
  for (let i = 0; i < total; i++) {
    const page = doc.loadPage(i);
    const pixmap = page.toPixmap(matrix, mupdf.ColorSpace.DeviceRGB, false);
    const image = Buffer.from(pixmap.asPNG());
    const { width, height } = getPngMetadata(image);
    yield { id: formatPageId(i + 1), index: i, image, width, height };
    await tick();
  }
}

async function loadImage(buffer: Buffer): Promise<InputUnit> {
  const { data, info } = await sharp(buffer).png().toBuffer({ resolveWithObject: true });
  return {
    id: formatPageId(1),
    index: 0,
    image: data,
    width: info.width,
    height: info.height,
  };
}

// ============================================================================
// Internal helpers
// ============================================================================

const tick = () => new Promise<void>((r) => setImmediate(r));

function openPdfFromBuffer(buffer: Buffer): MupdfDocument {
  // Suppress mupdf stderr warnings
  const origWrite = process.stderr.write;
  process.stderr.write = () => true;
  try {
    return mupdf.Document.openDocument(buffer, "application/pdf");
  } finally {
    process.stderr.write = origWrite;
  }
}
