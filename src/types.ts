/**
 * A scalar query value as the Admin REST client serializes it.
 */
export type QueryField = string | number;

export type QueryValue =
  | QueryField
  | QueryField[]
  | Record<string, QueryField | QueryField[]>;

/**
 * Query parameters for a single Admin REST GET.
 * Nested records are sent as `key[sub]=value`, arrays as `key[]=value`.
 */
export type QueryParams = Record<string, QueryValue>;

/**
 * A decoded JSON object as returned by the Admin REST API.
 */
export type ApiRecord = Record<string, unknown>;

/**
 * One decoded Admin REST response.
 */
export type ApiResponse = {
  status: number;
  headers: Headers;
  body: ApiRecord;
};

/**
 * Binds a shop identity to an access token. Frozen once built.
 */
export type Session = Readonly<{
  id: string;
  shop: string;
  accessToken: string;
  isOnline: false;
  state: string;
}>;

export type MetafieldOwnerResource = "products" | "variants";

export type AdminSettings = {
  apiKey?: string;
  apiSecretKey?: string;
  /** Target shop hostname, e.g. `example.myshopify.com`. */
  hostName?: string;
  /** Pre-issued offline Admin API access token. */
  accessToken?: string;
  syncProductMetafields?: boolean;
  syncVariantMetafields?: boolean;
  sessionStoragePath?: string;
};

export type ProductImage = {
  id: number;
  productId: number;
  position: number;
  src: string;
  alt: string | null;
  width: number;
  height: number;
  variantIds: number[];
};

export type ProductOption = {
  id: number;
  name: string;
  position: number;
  values: string[];
};

export type ProductVariant = {
  id: number;
  productId: number;
  title: string;
  sku: string | null;
  price: string;
  compareAtPrice: string | null;
  position: number;
  option1: string | null;
  option2: string | null;
  option3: string | null;
  inventoryItemId: number | null;
  inventoryQuantity: number | null;
  createdAt: Date | null;
  updatedAt: Date | null;
};

export type Product = {
  id: number;
  title: string;
  handle: string;
  bodyHtml: string | null;
  vendor: string;
  productType: string;
  status: string | null;
  tags: string[];
  createdAt: Date | null;
  updatedAt: Date | null;
  publishedAt: Date | null;
  variants: ProductVariant[];
  options: ProductOption[];
  images: ProductImage[];
};

export type Metafield = {
  id: number;
  namespace: string;
  key: string;
  value: string | number | boolean | null;
  type: string;
  description: string | null;
  ownerId: number;
  ownerResource: string;
  createdAt: Date | null;
  updatedAt: Date | null;
};

/**
 * Raw Admin REST payloads (snake_case), as validated by `schemas.ts`.
 */
export type ShopifyAdminVariant = {
  id: number;
  product_id: number;
  title: string;
  sku?: string | null;
  price: string;
  compare_at_price?: string | null;
  position: number;
  option1?: string | null;
  option2?: string | null;
  option3?: string | null;
  inventory_item_id?: number | null;
  inventory_quantity?: number | null;
  created_at?: string | null;
  updated_at?: string | null;
};

export type ShopifyAdminImage = {
  id: number;
  product_id: number;
  position: number;
  src: string;
  alt?: string | null;
  width?: number | null;
  height?: number | null;
  variant_ids?: number[] | null;
};

export type ShopifyAdminOption = {
  id: number;
  name: string;
  position: number;
  values: string[];
};

export type ShopifyAdminProduct = {
  id: number;
  title: string;
  handle: string;
  body_html?: string | null;
  vendor?: string | null;
  product_type?: string | null;
  status?: string | null;
  tags?: string | null;
  created_at?: string | null;
  updated_at?: string | null;
  published_at?: string | null;
  variants?: ShopifyAdminVariant[] | null;
  options?: ShopifyAdminOption[] | null;
  images?: ShopifyAdminImage[] | null;
};

export type ShopifyAdminMetafield = {
  id: number;
  namespace: string;
  key: string;
  value: string | number | boolean | null;
  type: string;
  description?: string | null;
  owner_id: number;
  owner_resource: string;
  created_at?: string | null;
  updated_at?: string | null;
};
