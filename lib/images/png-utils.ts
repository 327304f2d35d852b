import { PNG } from "pngjs";
import type { Box } from "../pipeline/core/types";

export interface PngMetadata {
  width: number;
  height: number;
}

/**
 * Read width and height from the IHDR chunk without decoding pixels.
 * Width is at byte offset 16, height at 20 (both big-endian uint32).
 */
export function getPngMetadata(pngBuffer: Buffer): PngMetadata {
  if (pngBuffer.length < 24) {
    throw new Error(`PNG too short (${pngBuffer.length} bytes)`);
  }
  return {
    width: pngBuffer.readUInt32BE(16),
    height: pngBuffer.readUInt32BE(20),
  };
}

export function decodePng(pngBuffer: Buffer): {
  data: Buffer;
  width: number;
  height: number;
} {
  const png = PNG.sync.read(pngBuffer);
  return { data: png.data, width: png.width, height: png.height };
}

export interface CropRegion {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * Pixel-aligned crop region for a box, clipped to the image bounds.
 * Returns null when nothing of the box lies inside the image.
 */
export function clipRegion(box: Box, width: number, height: number): CropRegion | null {
  const left = Math.max(0, Math.floor(box.x));
  const top = Math.max(0, Math.floor(box.y));
  const right = Math.min(width, Math.ceil(box.x + box.width));
  const bottom = Math.min(height, Math.ceil(box.y + box.height));
  if (right <= left || bottom <= top) return null;
  return { left, top, width: right - left, height: bottom - top };
}

export function cropPng(pngBuffer: Buffer, region: CropRegion): Buffer {
  const { data, width } = decodePng(pngBuffer);
  const { left, top, width: cropW, height: cropH } = region;
  const cropData = Buffer.alloc(cropW * cropH * 4);

  for (let y = 0; y < cropH; y++) {
    const srcOffset = ((top + y) * width + left) * 4;
    data.copy(cropData, y * cropW * 4, srcOffset, srcOffset + cropW * 4);
  }

  const png = new PNG({ width: cropW, height: cropH });
  png.data = cropData;
  return PNG.sync.write(png);
}
