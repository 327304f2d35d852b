/**
 * "create" variant: markdown outline -> composed deck.
 *
 * ingest    read the outline (one unit)
 * describe  one composition call, parsed and normalized
 * enrich    generate requested images, at most `concurrency` at a time
 */

import type {
  AssetLocation,
  CoordinateSpace,
  ImageGenerationRequest,
  ModelGateway,
  PageArtifact,
} from "../core/types";
import type { DescribeResult, PipelineVariant, StageContext } from "../pipeline";
import type { ParseDefaults } from "../parser";
import { parseComposition, validatorFor } from "../parser";
import { normalizePage } from "../coordinates";
import { renderPrompt } from "../prompt";
import { runAll, successes } from "../coordinator";
import { runStep } from "../step-runner";
import { readOutline } from "../../input/outline";

// ============================================================================
// Types
// ============================================================================

export type CreateInput =
  | { outlinePath: string }
  | { text: string; title?: string };

export interface OutlineUnit {
  id: string;
  text: string;
  title?: string;
}

export interface CreateVariantOptions {
  gateway: ModelGateway;
  /** Canonical deck space; also the canvas the model lays out on */
  space: CoordinateSpace;
  slideSize: string;
  theme: string;
  generateImages: boolean;
  defaults?: Partial<ParseDefaults>;
  maxOutlineBytes?: number;
  promptName?: string;
}

interface ImageTask {
  pageId: string;
  request: ImageGenerationRequest;
}

const MEDIA_EXTENSIONS: Record<string, string> = {
  "image/png": "png",
  "image/jpeg": "jpg",
  "image/webp": "webp",
};

// ============================================================================
// Variant
// ============================================================================

export function createDeckVariant(
  options: CreateVariantOptions
): PipelineVariant<CreateInput, OutlineUnit> {
  const promptName = options.promptName ?? "composition";

  return {
    kind: "create",

    async ingest(input, ctx) {
      if ("text" in input) {
        return [{ id: "outline", text: input.text, title: input.title }];
      }
      const outline = await readOutline(input.outlinePath, {
        maxFileBytes: options.maxOutlineBytes,
      });
      ctx.progress.emit({
        type: "stage-progress",
        stage: "ingest",
        message: `read ${outline.text.length} characters from ${outline.source}`,
      });
      return [{ id: "outline", text: outline.text, title: outline.title }];
    },

    async describe(units, ctx, signal): Promise<DescribeResult> {
      const [outline] = units;
      const prompt = await renderPrompt(promptName, {
        content: outline.text,
        width: options.space.width,
        height: options.space.height,
        slide_size: options.slideSize,
        theme: options.theme,
        font_family: options.defaults?.fontFamily ?? "Arial",
        font_size: options.defaults?.fontSize ?? 18,
        generate_images: options.generateImages,
      });
      const result = await options.gateway.generateObject({
        system: prompt.system,
        messages: prompt.messages,
        abortSignal: signal,
        validate: validatorFor((raw) => parseComposition(raw)),
        log: { taskType: "composition", promptName },
      });

      const composition = parseComposition(result.object, {
        space: options.space,
        defaults: options.defaults,
        onDefect: (defect) =>
          ctx.progress.emit({
            type: "stage-progress",
            stage: "describe",
            message: `slide ${defect.pageNumber}, element ${defect.elementIndex + 1} dropped: ${defect.reason}`,
          }),
      });
      for (const page of composition.pages) {
        normalizePage(page, options.space, options.space);
      }

      return {
        pages: composition.pages,
        settings: {
          theme: composition.slideConfig.theme ?? options.theme,
          title: outline.title,
        },
      };
    },

    skipEnrich(pages) {
      if (!options.generateImages) return "image generation disabled";
      return collectImageTasks(pages).size === 0 ? "no images requested" : null;
    },

    async enrich(pages, _units, ctx, signal): Promise<Map<string, AssetLocation>> {
      const tasks = [...collectImageTasks(pages)].map(([id, payload]) => ({ id, payload }));
      const results = await runAll(
        tasks,
        (task, id) => generateAsset(id, task, ctx),
        {
          bound: ctx.concurrency,
          signal,
          minSuccessRatio: ctx.minSuccessRatio,
          progress: ctx.progress,
          stage: "enrich",
        }
      );
      return successes(results);
    },
  };

  async function generateAsset(
    assetId: string,
    task: ImageTask,
    ctx: StageContext
  ): Promise<AssetLocation> {
    const image = await runStep(
      `enrich:${assetId}`,
      (request: ImageGenerationRequest, signal) =>
        options.gateway.generateImage({
          prompt: request.prompt,
          size: request.size,
          abortSignal: signal,
          log: { taskType: "image-generation", pageId: task.pageId },
        }),
      task.request,
      ctx.taskPolicy,
      { progress: ctx.progress, sleep: ctx.sleep, context: { pageId: task.pageId } }
    );

    const ext = MEDIA_EXTENSIONS[image.mediaType] ?? "png";
    const written = await ctx.store.write(image.bytes, `images/${safeFileName(assetId)}.${ext}`);
    if (!written.ok) throw written.error;
    return written.location;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * One generation task per distinct asset id, in page order. Elements
 * sharing an id share the generated image.
 */
export function collectImageTasks(pages: PageArtifact[]): Map<string, ImageTask> {
  const tasks = new Map<string, ImageTask>();
  for (const page of pages) {
    for (const element of page.elements) {
      if (element.type !== "image" || !element.generation) continue;
      if (tasks.has(element.assetId)) continue;
      tasks.set(element.assetId, { pageId: page.id, request: element.generation });
    }
  }
  return tasks;
}

export function safeFileName(id: string): string {
  return id.replace(/[^A-Za-z0-9_-]/g, "_");
}
