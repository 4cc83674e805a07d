import { filter, isNonNullish } from "remeda";
import type * as z from "zod";
import {
  shopifyAdminMetafieldSchema,
  shopifyAdminProductSchema,
  shopifyAdminVariantSchema,
} from "../schemas";
import type {
  Metafield,
  Product,
  ProductVariant,
  ShopifyAdminImage,
  ShopifyAdminMetafield,
  ShopifyAdminOption,
  ShopifyAdminProduct,
  ShopifyAdminVariant,
} from "../types";
import { safeParseDate, splitTags } from "../utils/func";

export function mapVariantDto(variant: ShopifyAdminVariant): ProductVariant {
  return {
    id: variant.id,
    productId: variant.product_id,
    title: variant.title,
    sku: variant.sku || null,
    price: variant.price,
    compareAtPrice: variant.compare_at_price || null,
    position: variant.position,
    option1: variant.option1 || null,
    option2: variant.option2 || null,
    option3: variant.option3 || null,
    inventoryItemId: variant.inventory_item_id ?? null,
    inventoryQuantity: variant.inventory_quantity ?? null,
    createdAt: safeParseDate(variant.created_at),
    updatedAt: safeParseDate(variant.updated_at),
  };
}

function mapOptions(options: ShopifyAdminOption[]): Product["options"] {
  return options.map((option) => ({
    id: option.id,
    name: option.name,
    position: option.position,
    values: option.values,
  }));
}

function mapImages(images: ShopifyAdminImage[]): Product["images"] {
  return images.map((image) => ({
    id: image.id,
    productId: image.product_id,
    position: image.position,
    src: image.src.startsWith("//") ? `https:${image.src}` : image.src,
    alt: image.alt || null,
    width: image.width ?? 0,
    height: image.height ?? 0,
    variantIds: image.variant_ids ?? [],
  }));
}

export function mapProductDto(product: ShopifyAdminProduct): Product {
  return {
    id: product.id,
    title: product.title,
    handle: product.handle,
    bodyHtml: product.body_html ?? null,
    vendor: product.vendor ?? "",
    productType: product.product_type ?? "",
    status: product.status ?? null,
    tags: splitTags(product.tags),
    createdAt: safeParseDate(product.created_at),
    updatedAt: safeParseDate(product.updated_at),
    publishedAt: safeParseDate(product.published_at),
    variants: (product.variants ?? []).map(mapVariantDto),
    options: mapOptions(product.options ?? []),
    images: mapImages(product.images ?? []),
  };
}

export function mapMetafieldDto(metafield: ShopifyAdminMetafield): Metafield {
  return {
    id: metafield.id,
    namespace: metafield.namespace,
    key: metafield.key,
    value: metafield.value,
    type: metafield.type,
    description: metafield.description ?? null,
    ownerId: metafield.owner_id,
    ownerResource: metafield.owner_resource,
    createdAt: safeParseDate(metafield.created_at),
    updatedAt: safeParseDate(metafield.updated_at),
  };
}

/**
 * Validate and map one raw record; `null` when it does not match the schema.
 */
function decodeOne<T, R>(
  kind: string,
  schema: z.ZodType<T>,
  map: (value: T) => R,
  raw: unknown
): R | null {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    console.error(
      `Skipping malformed ${kind}:`,
      parsed.error.issues.map((issue) => issue.message).join("; ")
    );
    return null;
  }
  return map(parsed.data);
}

export const decodeProduct = (raw: unknown): Product | null =>
  decodeOne("product", shopifyAdminProductSchema, mapProductDto, raw);

export const decodeVariant = (raw: unknown): ProductVariant | null =>
  decodeOne("variant", shopifyAdminVariantSchema, mapVariantDto, raw);

export const decodeMetafield = (raw: unknown): Metafield | null =>
  decodeOne("metafield", shopifyAdminMetafieldSchema, mapMetafieldDto, raw);

export function decodeList<R>(
  raw: unknown,
  decode: (item: unknown) => R | null
): R[] {
  if (!Array.isArray(raw)) return [];
  return filter(raw.map(decode), isNonNullish);
}
