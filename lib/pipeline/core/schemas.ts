/**
 * Field-level schemas for generated page descriptions.
 *
 * Generated output is checked one field group at a time so that a bad
 * field only costs its element, never the whole page. See parser.ts.
 */

import { z } from "zod/v4";

// ============================================================================
// Primitives
// ============================================================================

function coerceNumeric(value: unknown): unknown {
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return value;
}

/** Finite number, also accepting numeric strings such as "120". */
export const numericSchema = z.preprocess(coerceNumeric, z.number());

export const positiveNumericSchema = z.preprocess(coerceNumeric, z.number().positive());

export const pointSchema = z.object({
  x: numericSchema,
  y: numericSchema,
});

export const sizeSchema = z.object({
  width: positiveNumericSchema,
  height: positiveNumericSchema,
});

// ============================================================================
// Enumerations
// ============================================================================

export const elementTypeSchema = z.enum(["text", "image"]);

export const alignmentSchema = z.enum(["left", "center", "right", "justify"]);

export const fitModeSchema = z.enum(["contain", "cover", "fill"]);

export const imageSizeSchema = z.string().regex(/^\d+x\d+$/);

// ============================================================================
// Colors
// ============================================================================

export const hexColorSchema = z
  .string()
  .trim()
  .regex(/^#?([0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/);

const channelSchema = z.preprocess(coerceNumeric, z.number());

export const rgbColorSchema = z.union([
  z.object({ red: channelSchema, green: channelSchema, blue: channelSchema }),
  z.object({ r: channelSchema, g: channelSchema, b: channelSchema }),
]);

// ============================================================================
// Deck settings emitted alongside composed pages
// ============================================================================

export const slideConfigSchema = z.object({
  theme: z.string().optional().catch(undefined),
  size: z.string().optional().catch(undefined),
});

export type SlideConfigOutput = z.infer<typeof slideConfigSchema>;
