import fs from "node:fs";
import path from "node:path";
import { resourceBoundaryError, validationError } from "../pipeline/core/errors";

export const OUTLINE_EXTENSIONS = [".md", ".markdown", ".txt"];

export interface Outline {
  source: string;
  text: string;
  /** First level-one heading, when there is one */
  title?: string;
}

export async function readOutline(
  source: string,
  options: { maxFileBytes?: number } = {}
): Promise<Outline> {
  const ext = path.extname(source).toLowerCase();
  if (!OUTLINE_EXTENSIONS.includes(ext)) {
    throw validationError([`outline must be one of ${OUTLINE_EXTENSIONS.join(", ")}, got "${ext}"`]);
  }
  if (!fs.existsSync(source)) {
    throw validationError([`outline not found: ${source}`]);
  }

  const { size } = await fs.promises.stat(source);
  if (options.maxFileBytes !== undefined && size > options.maxFileBytes) {
    throw resourceBoundaryError(
      "size-ceiling",
      source,
      `Outline is ${size} bytes (limit ${options.maxFileBytes})`
    );
  }

  const text = await fs.promises.readFile(source, "utf-8");
  if (text.trim() === "") {
    throw validationError([`outline is empty: ${source}`]);
  }
  return { source, text, title: extractTitle(text) };
}

export function extractTitle(markdown: string): string | undefined {
  const match = markdown.match(/^#\s+(.+?)\s*#*\s*$/m);
  return match ? match[1] : undefined;
}
