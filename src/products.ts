import { decodeList, decodeProduct, decodeVariant } from "./dto/admin.mapped";
import { resourceTypes, type ResourceType } from "./resources";
import type {
  ApiRecord,
  Product,
  ProductVariant,
  QueryParams,
} from "./types";

/**
 * Interface for product operations
 */
export interface ProductOperations {
  /**
   * Fetches every product in the shop across all pages.
   */
  all(params?: QueryParams): Promise<Product[]>;

  /**
   * Finds a product by its Shopify id. Resolves `null` when the response
   * carries no product.
   */
  find(id: number): Promise<Product | null>;

  /**
   * Resolves the product id owning the variant of an inventory item.
   */
  idByInventoryItemId(inventoryItemId: number): Promise<number | null>;
}

/**
 * Interface for variant operations
 */
export interface VariantOperations {
  byProductId(productId: number): Promise<ProductVariant[]>;
}

export type ResourceFetchers = {
  fetchOne: (path: string, query?: QueryParams) => Promise<ApiRecord>;
  fetchAll: (
    resourceType: ResourceType,
    params?: QueryParams
  ) => Promise<ApiRecord[]>;
};

/**
 * Creates product operations for a client instance
 */
export function createProductOperations(
  fetchers: ResourceFetchers
): ProductOperations {
  return {
    async all(params = {}) {
      const records = await fetchers.fetchAll(resourceTypes.products, params);
      return decodeList(records, decodeProduct);
    },

    async find(id) {
      const body = await fetchers.fetchOne(`products/${id}`);
      return body.product ? decodeProduct(body.product) : null;
    },

    async idByInventoryItemId(inventoryItemId) {
      const body = await fetchers.fetchOne("variants", {
        inventory_item_id: inventoryItemId,
      });
      const [first] = decodeList(body.variants, decodeVariant);
      return first ? first.productId : null;
    },
  };
}

export function createVariantOperations(
  fetchers: Pick<ResourceFetchers, "fetchOne">
): VariantOperations {
  return {
    async byProductId(productId) {
      const body = await fetchers.fetchOne(`products/${productId}/variants`);
      return decodeList(body.variants, decodeVariant);
    },
  };
}
