import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { createAssetStore, createStagingArea, resolveWithin } from "../asset-store";

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "asset-store-"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

const bytes = (n: number) => new Uint8Array(n).fill(7);

describe("resolveWithin", () => {
  it("accepts nested relative paths", () => {
    expect(resolveWithin("/data/run", "images/a.png")).toBe(path.resolve("/data/run/images/a.png"));
    expect(resolveWithin("/data/run", "images/../b.png")).toBe(path.resolve("/data/run/b.png"));
  });

  it("rejects paths that leave the root", () => {
    expect(resolveWithin("/data/run", "../other/a.png")).toBeNull();
    expect(resolveWithin("/data/run", "/etc/passwd")).toBeNull();
    expect(resolveWithin("/data/run", "")).toBeNull();
    expect(resolveWithin("/data/run", "images/../..")).toBeNull();
  });

  it("allows names that merely start with two dots", () => {
    expect(resolveWithin("/data/run", "..hidden.png")).toBe(path.resolve("/data/run/..hidden.png"));
  });
});

describe("createAssetStore", () => {
  it("writes inside the root", async () => {
    const store = createAssetStore({ root: tmpDir });
    const result = await store.write(bytes(4), "images/a.png");

    expect(result).toEqual({
      ok: true,
      location: { path: path.join(tmpDir, "images", "a.png"), byteLength: 4 },
    });
    expect(fs.readFileSync(path.join(tmpDir, "images", "a.png"))).toHaveLength(4);
    expect(store.count).toBe(1);
  });

  it("refuses destinations outside the root", async () => {
    const store = createAssetStore({ root: tmpDir });
    const result = await store.write(bytes(4), "../escape.png");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.detail).toEqual({
      kind: "resource-boundary",
      reason: "outside-root",
      destination: "../escape.png",
    });
    expect(fs.existsSync(path.join(tmpDir, "..", "escape.png"))).toBe(false);
    expect(store.count).toBe(0);
  });

  it("enforces the size ceiling", async () => {
    const store = createAssetStore({ root: tmpDir, maxAssetBytes: 8 });
    expect((await store.write(bytes(8), "ok.bin")).ok).toBe(true);

    const result = await store.write(bytes(9), "big.bin");
    expect(!result.ok && result.error.detail.reason).toBe("size-ceiling");
    expect(fs.existsSync(path.join(tmpDir, "big.bin"))).toBe(false);
  });

  it("enforces the count ceiling on distinct assets", async () => {
    const store = createAssetStore({ root: tmpDir, maxAssets: 2 });
    expect((await store.write(bytes(1), "a")).ok).toBe(true);
    expect((await store.write(bytes(1), "b")).ok).toBe(true);
    // Overwriting an existing asset does not count again
    expect((await store.write(bytes(2), "a")).ok).toBe(true);

    const result = await store.write(bytes(1), "c");
    expect(!result.ok && result.error.detail.reason).toBe("count-ceiling");
    expect(store.count).toBe(2);
  });

  it("counts concurrent writes against the ceiling", async () => {
    const store = createAssetStore({ root: tmpDir, maxAssets: 2 });
    const results = await Promise.all(
      ["a", "b", "c", "d"].map((name) => store.write(bytes(1), name))
    );
    expect(results.filter((r) => r.ok)).toHaveLength(2);
    expect(store.count).toBe(2);
  });
});

describe("createStagingArea", () => {
  it("creates a per-run directory and removes it on dispose", async () => {
    const staging = await createStagingArea(tmpDir, "run-1", { maxAssets: 1 });
    expect(staging.dir).toBe(path.join(tmpDir, "run-1"));
    expect(fs.statSync(staging.dir).isDirectory()).toBe(true);

    const written = await staging.store.write(bytes(3), "images/x.png");
    expect(written.ok && written.location.path).toBe(path.join(tmpDir, "run-1", "images", "x.png"));
    expect((await staging.store.write(bytes(3), "images/y.png")).ok).toBe(false);

    await staging.dispose();
    expect(fs.existsSync(staging.dir)).toBe(false);
  });

  it("rejects run ids that escape the root", async () => {
    await expect(createStagingArea(tmpDir, "../elsewhere")).rejects.toThrow('Invalid run id "../elsewhere"');
  });
});
