// Wellness Retention Engine - Content catalog
// Loads the wellness content library that goal matching searches over.

import type { ModelLoader } from "./model-loader.js";
import { isContentCatalog } from "./model-loader.js";
import type { ContentItem } from "./types.js";

export const CONTENT_CATALOG_FILE = "content_catalog.json";

export async function loadContentCatalog(loader: ModelLoader): Promise<ContentItem[]> {
  const catalog = await loader.loadJson(CONTENT_CATALOG_FILE, isContentCatalog);
  if (catalog === null) {
    throw new Error("Failed to load content catalog");
  }
  validateCatalog(catalog.content);
  return catalog.content;
}

export function validateCatalog(items: readonly ContentItem[]): void {
  if (items.length === 0) {
    throw new Error("Content catalog is empty");
  }
  const seen = new Set<string>();
  for (const item of items) {
    if (seen.has(item.id)) {
      throw new Error(`Duplicate content id "${item.id}" in catalog`);
    }
    seen.add(item.id);
  }
}

/** Text sent to the embedding model for a catalog item. */
export function embeddingText(item: ContentItem): string {
  return `${item.title} ${item.description} ${(item.tags ?? []).join(" ")}`;
}
