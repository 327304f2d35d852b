/**
 * Filesystem asset store.
 *
 * Every write is confined to `root` and counted against size and count
 * ceilings. Policy violations come back as `{ ok: false }` results; only
 * genuine I/O errors throw.
 */

import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import type { AssetStore, WriteResult } from "../pipeline/core/types";
import { resourceBoundaryError } from "../pipeline/core/errors";

export interface AssetStoreOptions {
  root: string;
  /** Largest single asset in bytes */
  maxAssetBytes?: number;
  /** Most assets one store will accept */
  maxAssets?: number;
}

export const DEFAULT_MAX_ASSET_BYTES = 10 * 1024 * 1024;
export const DEFAULT_MAX_ASSETS = 500;

/**
 * Resolve `destination` against `root`, or return null when the result
 * would land outside of it.
 */
export function resolveWithin(root: string, destination: string): string | null {
  const base = path.resolve(root);
  const resolved = path.resolve(base, destination);
  const rel = path.relative(base, resolved);
  if (rel === "" || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    return null;
  }
  return resolved;
}

export function createAssetStore(options: AssetStoreOptions): AssetStore {
  const root = path.resolve(options.root);
  const maxAssetBytes = options.maxAssetBytes ?? DEFAULT_MAX_ASSET_BYTES;
  const maxAssets = options.maxAssets ?? DEFAULT_MAX_ASSETS;
  const written = new Set<string>();
  let reserved = 0;

  return {
    root,
    get count() {
      return written.size;
    },
    async write(bytes, destination): Promise<WriteResult> {
      const target = resolveWithin(root, destination);
      if (target === null) {
        return {
          ok: false,
          error: resourceBoundaryError(
            "outside-root",
            destination,
            `Asset destination "${destination}" escapes ${root}`
          ),
        };
      }
      if (bytes.byteLength > maxAssetBytes) {
        return {
          ok: false,
          error: resourceBoundaryError(
            "size-ceiling",
            destination,
            `Asset "${destination}" is ${bytes.byteLength} bytes (limit ${maxAssetBytes})`
          ),
        };
      }
      const isNew = !written.has(target);
      if (isNew && written.size + reserved >= maxAssets) {
        return {
          ok: false,
          error: resourceBoundaryError(
            "count-ceiling",
            destination,
            `Asset limit of ${maxAssets} reached`
          ),
        };
      }

      if (isNew) reserved++;
      try {
        await fs.promises.mkdir(path.dirname(target), { recursive: true });
        await fs.promises.writeFile(target, bytes);
      } finally {
        if (isNew) reserved--;
      }
      written.add(target);
      return { ok: true, location: { path: target, byteLength: bytes.byteLength } };
    },
  };
}

// ============================================================================
// Per-run staging
// ============================================================================

export interface StagingArea {
  dir: string;
  store: AssetStore;
  dispose(): Promise<void>;
}

export function createRunId(): string {
  const stamp = new Date().toISOString().replace(/[-:]/g, "").replace(/\..*$/, "");
  return `${stamp}-${crypto.randomBytes(3).toString("hex")}`;
}

/**
 * Create an isolated directory for one pipeline run under `root`.
 */
export async function createStagingArea(
  root: string,
  runId: string,
  limits: Omit<AssetStoreOptions, "root"> = {}
): Promise<StagingArea> {
  const dir = resolveWithin(root, runId);
  if (dir === null) {
    throw resourceBoundaryError("outside-root", runId, `Invalid run id "${runId}"`);
  }
  await fs.promises.mkdir(dir, { recursive: true });
  return {
    dir,
    store: createAssetStore({ ...limits, root: dir }),
    async dispose() {
      await fs.promises.rm(dir, { recursive: true, force: true });
    },
  };
}
