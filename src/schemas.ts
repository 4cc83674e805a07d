import * as z from "zod";
import type * as Types from "./types";

type Assert<T extends true> = T;
type IsEqual<A, B> = [A] extends [B] ? ([B] extends [A] ? true : false) : false;

const nullableString = z.optional(z.nullable(z.string()));
const nullableNumber = z.optional(z.nullable(z.number()));

export const adminSettingsSchema = z.object({
  apiKey: z.optional(z.string()),
  apiSecretKey: z.optional(z.string()),
  hostName: z.optional(z.string()),
  accessToken: z.optional(z.string()),
  syncProductMetafields: z.optional(z.boolean()),
  syncVariantMetafields: z.optional(z.boolean()),
  sessionStoragePath: z.optional(z.string()),
});
export type AdminSettings = z.infer<typeof adminSettingsSchema>;
type _AdminSettingsMatches = Assert<
  IsEqual<AdminSettings, Types.AdminSettings>
>;

export const sessionSchema = z.object({
  id: z.string(),
  shop: z.string(),
  accessToken: z.string(),
  isOnline: z.literal(false),
  state: z.string(),
});

export const shopifyAdminVariantSchema = z.object({
  id: z.number(),
  product_id: z.number(),
  title: z.string(),
  sku: nullableString,
  price: z.string(),
  compare_at_price: nullableString,
  position: z.number(),
  option1: nullableString,
  option2: nullableString,
  option3: nullableString,
  inventory_item_id: nullableNumber,
  inventory_quantity: nullableNumber,
  created_at: nullableString,
  updated_at: nullableString,
});
export type ShopifyAdminVariant = z.infer<typeof shopifyAdminVariantSchema>;
type _ShopifyAdminVariantMatches = Assert<
  IsEqual<ShopifyAdminVariant, Types.ShopifyAdminVariant>
>;

export const shopifyAdminImageSchema = z.object({
  id: z.number(),
  product_id: z.number(),
  position: z.number(),
  src: z.string(),
  alt: nullableString,
  width: nullableNumber,
  height: nullableNumber,
  variant_ids: z.optional(z.nullable(z.array(z.number()))),
});
export type ShopifyAdminImage = z.infer<typeof shopifyAdminImageSchema>;
type _ShopifyAdminImageMatches = Assert<
  IsEqual<ShopifyAdminImage, Types.ShopifyAdminImage>
>;

export const shopifyAdminOptionSchema = z.object({
  id: z.number(),
  name: z.string(),
  position: z.number(),
  values: z.array(z.string()),
});
export type ShopifyAdminOption = z.infer<typeof shopifyAdminOptionSchema>;
type _ShopifyAdminOptionMatches = Assert<
  IsEqual<ShopifyAdminOption, Types.ShopifyAdminOption>
>;

export const shopifyAdminProductSchema = z.object({
  id: z.number(),
  title: z.string(),
  handle: z.string(),
  body_html: nullableString,
  vendor: nullableString,
  product_type: nullableString,
  status: nullableString,
  tags: nullableString,
  created_at: nullableString,
  updated_at: nullableString,
  published_at: nullableString,
  variants: z.optional(z.nullable(z.array(shopifyAdminVariantSchema))),
  options: z.optional(z.nullable(z.array(shopifyAdminOptionSchema))),
  images: z.optional(z.nullable(z.array(shopifyAdminImageSchema))),
});
export type ShopifyAdminProduct = z.infer<typeof shopifyAdminProductSchema>;
type _ShopifyAdminProductMatches = Assert<
  IsEqual<ShopifyAdminProduct, Types.ShopifyAdminProduct>
>;

export const shopifyAdminMetafieldSchema = z.object({
  id: z.number(),
  namespace: z.string(),
  key: z.string(),
  value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
  type: z.string(),
  description: nullableString,
  owner_id: z.number(),
  owner_resource: z.string(),
  created_at: nullableString,
  updated_at: nullableString,
});
export type ShopifyAdminMetafield = z.infer<
  typeof shopifyAdminMetafieldSchema
>;
type _ShopifyAdminMetafieldMatches = Assert<
  IsEqual<ShopifyAdminMetafield, Types.ShopifyAdminMetafield>
>;
