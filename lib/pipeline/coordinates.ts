import type { Box, CoordinateSpace, PageArtifact, Point, Size } from "./core/types";
import { invalidDimensionError, validationError } from "./core/errors";

export const DEFAULT_SPACE: CoordinateSpace = Object.freeze({ width: 1920, height: 1080 });

const NAMED_SPACES: Record<string, CoordinateSpace> = {
  "16:9": DEFAULT_SPACE,
  "4:3": Object.freeze({ width: 1024, height: 768 }),
  A4: Object.freeze({ width: 1754, height: 1240 }),
  letter: Object.freeze({ width: 1650, height: 1275 }),
};

export function coordinateSpace(width: number, height: number): CoordinateSpace {
  return Object.freeze({ width, height });
}

/**
 * Canonical space for a named slide size, or undefined for unknown names.
 */
export function aspectSpace(name: string): CoordinateSpace | undefined {
  return NAMED_SPACES[name];
}

function assertSpace(space: CoordinateSpace, minimum: number): void {
  const { width, height } = space;
  if (
    !Number.isFinite(width) ||
    !Number.isFinite(height) ||
    width < minimum ||
    height < minimum ||
    width <= 0 ||
    height <= 0
  ) {
    throw invalidDimensionError(width, height);
  }
}

function assertFinite(label: string, ...values: number[]): void {
  if (!values.every(Number.isFinite)) {
    throw validationError([`${label} must be finite, got (${values.join(", ")})`]);
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Map a point from one coordinate space into another.
 *
 * One-way: normalizing back with the spaces swapped does not in general
 * return the original point, since both rounding and clamping lose
 * information.
 */
export function normalize(
  x: number,
  y: number,
  source: CoordinateSpace,
  target: CoordinateSpace
): Point {
  assertSpace(source, 0);
  assertSpace(target, 1);
  assertFinite("point", x, y);
  return {
    x: clamp(Math.round((x * target.width) / source.width), 0, target.width - 1),
    y: clamp(Math.round((y * target.height) / source.height), 0, target.height - 1),
  };
}

/** Scale a size, keeping each side within [1, target dimension]. */
export function normalizeSize(
  width: number,
  height: number,
  source: CoordinateSpace,
  target: CoordinateSpace
): Size {
  assertSpace(source, 0);
  assertSpace(target, 1);
  assertFinite("size", width, height);
  return {
    width: clamp(Math.round((width * target.width) / source.width), 1, target.width),
    height: clamp(Math.round((height * target.height) / source.height), 1, target.height),
  };
}

/**
 * Normalize every element of a page in place and adopt the target size.
 * Image elements remember the box they were described with so later
 * stages can locate them in the source raster.
 */
export function normalizePage(
  page: PageArtifact,
  source: CoordinateSpace,
  target: CoordinateSpace
): PageArtifact {
  for (const element of page.elements) {
    if (element.type === "image") {
      const box: Box = { ...element.position, ...element.size };
      element.origin = { space: source, box };
    }
    element.position = normalize(element.position.x, element.position.y, source, target);
    element.size = normalizeSize(element.size.width, element.size.height, source, target);
  }
  page.size = target;
  return page;
}
