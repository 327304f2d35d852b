/**
 * "convert" variant: PDF or page images -> editable deck.
 *
 * ingest    expand the source into page rasters
 * describe  one vision analysis per page, fanned out through runAll;
 *           pages whose analysis failed fall back to the raster itself
 * enrich    crop every image element out of its page raster
 */

import type {
  AssetLocation,
  CoordinateSpace,
  ImageElement,
  InputUnit,
  ModelGateway,
  PageArtifact,
  RawInputLoader,
} from "../core/types";
import type { DescribeResult, PipelineVariant, StageContext } from "../pipeline";
import type { ParseDefaults } from "../parser";
import { formatPageId, parsePage, validatorFor } from "../parser";
import { coordinateSpace, normalizePage } from "../coordinates";
import { renderPrompt } from "../prompt";
import { runAll, successes } from "../coordinator";
import { runStep } from "../step-runner";
import { validationError } from "../core/errors";
import { clipRegion, cropPng } from "../../images/png-utils";

// ============================================================================
// Types
// ============================================================================

export interface ConvertInput {
  source: string;
}

export interface ConvertVariantOptions {
  gateway: ModelGateway;
  loader: RawInputLoader;
  /** Canonical deck space every page is normalized into */
  space: CoordinateSpace;
  defaults?: Partial<ParseDefaults>;
  promptName?: string;
}

interface CropTask {
  unit: InputUnit;
  element: ImageElement;
}

// ============================================================================
// Variant
// ============================================================================

export function createConvertVariant(
  options: ConvertVariantOptions
): PipelineVariant<ConvertInput, InputUnit> {
  const promptName = options.promptName ?? "slide_analysis";

  return {
    kind: "convert",

    async ingest(input, ctx, signal) {
      const units: InputUnit[] = [];
      for await (const unit of options.loader.load(input.source)) {
        signal.throwIfAborted();
        units.push(unit);
        ctx.progress.emit({
          type: "stage-progress",
          stage: "ingest",
          message: `loaded ${unit.id} (${unit.width}x${unit.height})`,
        });
      }
      if (units.length === 0) {
        throw validationError([`no pages found in ${input.source}`]);
      }
      return units;
    },

    async describe(units, ctx, signal): Promise<DescribeResult> {
      const results = await runAll(
        units.map((unit) => ({ id: unit.id, payload: unit })),
        (unit) => describeUnit(unit, ctx),
        {
          bound: ctx.concurrency,
          signal,
          minSuccessRatio: ctx.minSuccessRatio,
          progress: ctx.progress,
          stage: "describe",
        }
      );
      const described = successes(results);
      return {
        pages: units.map((unit) => described.get(unit.id) ?? fallbackPage(unit, options.space)),
      };
    },

    skipEnrich(pages) {
      return pages.some((page) => page.elements.some((e) => e.type === "image" && e.origin))
        ? null
        : "no image regions";
    },

    async enrich(pages, units, ctx, signal): Promise<Map<string, AssetLocation>> {
      // describe emits exactly one page per unit, in unit order
      const tasks: { id: string; payload: CropTask }[] = [];
      for (const [i, page] of pages.entries()) {
        const unit = units[i];
        if (!unit) continue;
        for (const element of page.elements) {
          if (element.type === "image" && element.origin) {
            tasks.push({ id: element.assetId, payload: { unit, element } });
          }
        }
      }

      const results = await runAll(tasks, (task, id) => cropAsset(id, task, ctx), {
        bound: ctx.concurrency,
        signal,
        minSuccessRatio: ctx.minSuccessRatio,
        progress: ctx.progress,
        stage: "enrich",
      });
      return successes(results);
    },
  };

  async function describeUnit(unit: InputUnit, ctx: StageContext): Promise<PageArtifact> {
    const source = coordinateSpace(unit.width, unit.height);
    return runStep(
      `describe:${unit.id}`,
      async (u: InputUnit, signal) => {
        const prompt = await renderPrompt(promptName, {
          page_number: u.index + 1,
          width: u.width,
          height: u.height,
          image_base64: u.image.toString("base64"),
        });
        const result = await options.gateway.generateObject({
          system: prompt.system,
          messages: prompt.messages,
          abortSignal: signal,
          validate: validatorFor((raw) => parsePage(raw, u.index + 1)),
          log: { taskType: "slide-analysis", pageId: u.id, promptName },
        });
        const page = parsePage(result.object, u.index + 1, {
          space: source,
          defaults: options.defaults,
          useOutputIds: false,
          onDefect: (defect) =>
            ctx.progress.emit({
              type: "stage-progress",
              stage: "describe",
              message: `${u.id} element ${defect.elementIndex + 1} dropped: ${defect.reason}`,
            }),
        });
        return normalizePage(page, source, options.space);
      },
      unit,
      ctx.taskPolicy,
      { progress: ctx.progress, sleep: ctx.sleep, context: { pageId: unit.id } }
    );
  }

  async function cropAsset(
    assetId: string,
    task: CropTask,
    ctx: StageContext
  ): Promise<AssetLocation> {
    return runStep(
      `enrich:${assetId}`,
      async ({ unit, element }: CropTask) => {
        const box = element.origin?.box;
        const region = box ? clipRegion(box, unit.width, unit.height) : null;
        if (!region) {
          throw validationError([`${assetId} lies outside its page image`]);
        }
        const written = await ctx.store.write(
          cropPng(unit.image, region),
          `images/${assetId}.png`
        );
        if (!written.ok) throw written.error;
        return written.location;
      },
      task,
      ctx.taskPolicy,
      { progress: ctx.progress, sleep: ctx.sleep, context: { pageId: task.unit.id } }
    );
  }
}

/**
 * Stand-in for a page whose analysis failed: the whole raster as one
 * full-bleed image, so the deck keeps its page count and order.
 */
export function fallbackPage(unit: InputUnit, space: CoordinateSpace): PageArtifact {
  const pageNumber = unit.index + 1;
  const id = formatPageId(pageNumber);
  return {
    id,
    pageNumber,
    title: "",
    elements: [
      {
        type: "image",
        id: `${id}_el001`,
        assetId: `${id}_page`,
        position: { x: 0, y: 0 },
        size: { width: space.width, height: space.height },
        zIndex: 0,
        opacity: 1,
        source: "",
        fitMode: "fill",
        altText: `Page ${pageNumber}`,
        origin: {
          space: coordinateSpace(unit.width, unit.height),
          box: { x: 0, y: 0, width: unit.width, height: unit.height },
        },
      },
    ],
    background: { type: "color", color: "#FFFFFF" },
    size: space,
  };
}
