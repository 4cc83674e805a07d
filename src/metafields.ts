import { decodeList, decodeMetafield } from "./dto/admin.mapped";
import type { ResourceFetchers } from "./products";
import type { Metafield, MetafieldOwnerResource } from "./types";

export interface MetafieldOperations {
  /**
   * Metafields of a product. Empty without a request when product metafield
   * sync is disabled.
   */
  byProductId(id: number): Promise<Metafield[]>;

  /**
   * Metafields of a variant. Empty without a request when variant metafield
   * sync is disabled.
   */
  byVariantId(id: number): Promise<Metafield[]>;

  byOwner(id: number, ownerResource: MetafieldOwnerResource): Promise<Metafield[]>;
}

export function createMetafieldOperations(
  fetchers: Pick<ResourceFetchers, "fetchOne">,
  flags: () => { syncProductMetafields: boolean; syncVariantMetafields: boolean }
): MetafieldOperations {
  const byOwner = async (
    id: number,
    ownerResource: MetafieldOwnerResource
  ): Promise<Metafield[]> => {
    const body = await fetchers.fetchOne(`${ownerResource}/${id}/metafields`, {
      metafield: {
        owner_id: id,
        owner_resource: ownerResource,
      },
    });
    return decodeList(body.metafields, decodeMetafield);
  };

  return {
    async byProductId(id) {
      if (!flags().syncProductMetafields) return [];
      return byOwner(id, "products");
    },

    async byVariantId(id) {
      if (!flags().syncVariantMetafields) return [];
      return byOwner(id, "variants");
    },

    byOwner,
  };
}
