import type { AssetLocation, PageArtifact } from "./core/types";

/**
 * Point image references (elements and backgrounds) at the assets
 * produced for them.
 *
 * Pages and elements are updated in place and keep their order. Anything
 * without a matching asset is left untouched.
 */
export function assemble(
  pages: PageArtifact[],
  assets: ReadonlyMap<string, AssetLocation>
): PageArtifact[] {
  if (assets.size === 0) return pages;

  for (const page of pages) {
    const bg = page.background;
    if (bg.type === "image") {
      const location = assets.get(bg.assetId);
      if (location) bg.source = location.path;
    }
    for (const element of page.elements) {
      if (element.type !== "image") continue;
      const location = assets.get(element.assetId);
      if (location) element.source = location.path;
    }
  }
  return pages;
}
