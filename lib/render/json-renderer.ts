/**
 * JSON deck renderer.
 *
 * Writes `{ settings, pages }` as a single document. Image sources are
 * rewritten relative to the output file when they point at local files.
 */

import fs from "node:fs";
import path from "node:path";
import type {
  DeckSettings,
  DocumentRenderer,
  PageArtifact,
  RenderedDocument,
} from "../pipeline/core/types";

export interface JsonRendererOptions {
  /** Rewrite absolute asset paths relative to the output directory (default true) */
  relativeAssets?: boolean;
  indent?: number;
}

export interface RenderedDeck {
  settings: DeckSettings;
  pages: PageArtifact[];
}

export function createJsonRenderer(
  outputPath: string,
  options: JsonRendererOptions = {}
): DocumentRenderer {
  const { relativeAssets = true, indent = 2 } = options;
  const target = path.resolve(outputPath);

  return {
    async render(pages, settings): Promise<RenderedDocument> {
      const deck: RenderedDeck = {
        settings,
        pages: relativeAssets ? pages.map((p) => relativizePage(p, path.dirname(target))) : pages,
      };
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(target, JSON.stringify(deck, null, indent) + "\n");
      return { path: target, pageCount: pages.length };
    },
  };
}

function relativizePage(page: PageArtifact, dir: string): PageArtifact {
  const relative = (source: string) =>
    path.isAbsolute(source) ? path.relative(dir, source).split(path.sep).join("/") : source;
  const bg = page.background;
  return {
    ...page,
    background: bg.type === "image" ? { ...bg, source: relative(bg.source) } : bg,
    elements: page.elements.map((el) =>
      el.type === "image" ? { ...el, source: relative(el.source) } : el
    ),
  };
}
