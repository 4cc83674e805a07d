import type { ApiRecord, ApiResponse, QueryParams } from "./types";
import { parseNextPageQuery } from "./utils/link-header";

/**
 * A paginated Admin REST collection.
 */
export interface ResourceType<T = ApiRecord> {
  /** Registry name, e.g. `"products"`. */
  readonly name: string;
  /** Collection path relative to the versioned Admin API root. */
  readonly path: string;
  /** Largest `limit` the collection endpoint accepts. */
  readonly maxPageSize: number;
  decodePage(body: ApiRecord): T[];
  /** Query for the following page, or `null` on the last page. */
  nextPageQuery(response: ApiResponse): QueryParams | null;
}

export const MAX_PAGE_SIZE = 250;

/**
 * Defines a collection whose page body holds its items under `rootKey` and
 * whose continuation is carried by the `Link` response header.
 */
export function defineResource(definition: {
  name: string;
  path?: string;
  rootKey?: string;
  maxPageSize?: number;
}): ResourceType {
  const rootKey = definition.rootKey ?? definition.name;
  return {
    name: definition.name,
    path: definition.path ?? definition.name,
    maxPageSize: definition.maxPageSize ?? MAX_PAGE_SIZE,
    decodePage(body) {
      const items = body[rootKey];
      if (!Array.isArray(items)) return [];
      return items.filter(
        (item): item is ApiRecord =>
          typeof item === "object" && item !== null && !Array.isArray(item)
      );
    },
    nextPageQuery(response) {
      return parseNextPageQuery(response.headers.get("Link"));
    },
  };
}

export const resourceTypes = {
  products: defineResource({ name: "products" }),
  variants: defineResource({ name: "variants" }),
  metafields: defineResource({ name: "metafields" }),
  custom_collections: defineResource({ name: "custom_collections" }),
  smart_collections: defineResource({ name: "smart_collections" }),
} as const satisfies Record<string, ResourceType>;

export type ResourceName = keyof typeof resourceTypes;

export function isResourceName(value: string): value is ResourceName {
  return Object.prototype.hasOwnProperty.call(resourceTypes, value);
}

export function resourceByName(name: string): ResourceType {
  if (!isResourceName(name)) {
    throw new Error(`Unknown resource type: ${name}`);
  }
  return resourceTypes[name];
}
