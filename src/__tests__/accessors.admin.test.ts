import {
  jsonResponse,
  linkHeader,
  makeClient,
  makeFetch,
  requestedUrl,
  settings,
} from "./fixtures";

function makeRawVariant(id: number, productId: number) {
  return {
    id,
    product_id: productId,
    title: "Small",
    sku: "",
    price: "19.00",
    compare_at_price: null,
    position: 1,
    option1: "Small",
    option2: null,
    option3: null,
    inventory_item_id: id * 10,
    inventory_quantity: 4,
    created_at: "2024-01-01T00:00:00Z",
    updated_at: "2024-02-01T00:00:00Z",
  };
}

function makeRawProduct(id: number, title: string) {
  return {
    id,
    title,
    handle: title.toLowerCase().replace(/\s+/g, "-"),
    body_html: "<p>Body</p>",
    vendor: "Vendor",
    product_type: "Shirts",
    status: "active",
    tags: "cotton, summer , ",
    created_at: "2024-01-01T00:00:00Z",
    updated_at: "2024-02-01T00:00:00Z",
    published_at: null,
    variants: [makeRawVariant(id * 100, id)],
    options: [{ id: 1, name: "Size", position: 1, values: ["Small"] }],
    images: [
      {
        id: 5,
        product_id: id,
        position: 1,
        src: "//cdn.example.com/shirt.jpg",
        alt: null,
        width: 800,
        height: 600,
        variant_ids: [],
      },
    ],
  };
}

function makeRawMetafield(id: number, ownerId: number, ownerResource: string) {
  return {
    id,
    namespace: "custom",
    key: "fabric",
    value: "linen",
    type: "single_line_text_field",
    description: null,
    owner_id: ownerId,
    owner_resource: ownerResource === "products" ? "product" : "variant",
    created_at: "2024-01-01T00:00:00Z",
    updated_at: "2024-01-01T00:00:00Z",
  };
}

describe("resource accessors", () => {
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    error = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
    error.mockRestore();
  });

  test("products.find maps the product payload", async () => {
    const fetchApi = makeFetch(() =>
      jsonResponse({ product: makeRawProduct(42, "Linen Shirt") })
    );
    const { admin } = makeClient(fetchApi);

    const product = await admin.products.find(42);

    expect(requestedUrl(fetchApi, 0).pathname).toBe(
      "/admin/api/2025-10/products/42.json"
    );
    expect(product).not.toBeNull();
    if (!product) return;
    expect(product.id).toBe(42);
    expect(product.handle).toBe("linen-shirt");
    expect(product.bodyHtml).toBe("<p>Body</p>");
    expect(product.productType).toBe("Shirts");
    expect(product.tags).toEqual(["cotton", "summer"]);
    expect(product.createdAt?.toISOString()).toBe("2024-01-01T00:00:00.000Z");
    expect(product.publishedAt).toBeNull();
    expect(product.options).toEqual([
      { id: 1, name: "Size", position: 1, values: ["Small"] },
    ]);
    expect(product.images[0]?.src).toBe("https://cdn.example.com/shirt.jpg");
    expect(product.variants[0]).toMatchObject({
      id: 4200,
      productId: 42,
      sku: null,
      price: "19.00",
      compareAtPrice: null,
      option1: "Small",
      option2: null,
      inventoryItemId: 42000,
      inventoryQuantity: 4,
    });
  });

  test("products.find resolves null without a product", async () => {
    const fetchApi = makeFetch(() => jsonResponse({}));
    const { admin } = makeClient(fetchApi);

    await expect(admin.products.find(7)).resolves.toBeNull();
  });

  test("products.all pages through the catalog and skips malformed records", async () => {
    const fetchApi = makeFetch((url) =>
      url.searchParams.get("page_info") === "p2"
        ? jsonResponse({ products: [makeRawProduct(3, "Third")] })
        : jsonResponse(
            {
              products: [
                makeRawProduct(1, "First"),
                { id: 2, title: "Missing handle" },
              ],
            },
            200,
            { Link: linkHeader([{ pageInfo: "p2", rel: "next" }]) }
          )
    );
    const { admin } = makeClient(fetchApi);

    const products = await admin.products.all();

    expect(products.map((p) => p.id)).toEqual([1, 3]);
    expect(error).toHaveBeenCalledTimes(1);
    expect(requestedUrl(fetchApi, 0).searchParams.get("limit")).toBe("250");
  });

  test("products.idByInventoryItemId returns the owning product id", async () => {
    const fetchApi = makeFetch(() =>
      jsonResponse({ variants: [makeRawVariant(900, 31)] })
    );
    const { admin } = makeClient(fetchApi);

    await expect(admin.products.idByInventoryItemId(9000)).resolves.toBe(31);
    const url = requestedUrl(fetchApi, 0);
    expect(url.pathname).toBe("/admin/api/2025-10/variants.json");
    expect(url.searchParams.get("inventory_item_id")).toBe("9000");
  });

  test("products.idByInventoryItemId resolves null when nothing matches", async () => {
    const fetchApi = makeFetch(() => jsonResponse({ variants: [] }));
    const { admin } = makeClient(fetchApi);

    await expect(admin.products.idByInventoryItemId(1)).resolves.toBeNull();
  });

  test("variants.byProductId lists the product's variants", async () => {
    const fetchApi = makeFetch(() =>
      jsonResponse({ variants: [makeRawVariant(1, 8), makeRawVariant(2, 8)] })
    );
    const { admin } = makeClient(fetchApi);

    const variants = await admin.variants.byProductId(8);

    expect(variants.map((v) => v.id)).toEqual([1, 2]);
    expect(requestedUrl(fetchApi, 0).pathname).toBe(
      "/admin/api/2025-10/products/8/variants.json"
    );
  });

  test("variants.byProductId is empty when the payload has no variants", async () => {
    const fetchApi = makeFetch(() => jsonResponse({}));
    const { admin } = makeClient(fetchApi);

    await expect(admin.variants.byProductId(8)).resolves.toEqual([]);
  });

  test("metafields.byProductId reads product metafields by default", async () => {
    const fetchApi = makeFetch(() =>
      jsonResponse({ metafields: [makeRawMetafield(1, 5, "products")] })
    );
    const { admin } = makeClient(fetchApi);

    const metafields = await admin.metafields.byProductId(5);

    expect(metafields).toEqual([
      {
        id: 1,
        namespace: "custom",
        key: "fabric",
        value: "linen",
        type: "single_line_text_field",
        description: null,
        ownerId: 5,
        ownerResource: "product",
        createdAt: new Date("2024-01-01T00:00:00Z"),
        updatedAt: new Date("2024-01-01T00:00:00Z"),
      },
    ]);
    const url = requestedUrl(fetchApi, 0);
    expect(url.pathname).toBe("/admin/api/2025-10/products/5/metafields.json");
  });

  test("metafields.byVariantId short-circuits while variant sync is off", async () => {
    const fetchApi = makeFetch(() => jsonResponse({ metafields: [] }));
    const { admin } = makeClient(fetchApi);

    await expect(admin.metafields.byVariantId(9)).resolves.toEqual([]);
    expect(fetchApi).not.toHaveBeenCalled();
  });

  test("metafield flags gate each owner independently", async () => {
    const fetchApi = makeFetch(() =>
      jsonResponse({ metafields: [makeRawMetafield(2, 9, "variants")] })
    );
    const { admin } = makeClient(fetchApi, {
      settings: {
        ...settings,
        syncProductMetafields: false,
        syncVariantMetafields: true,
      },
    });

    await expect(admin.metafields.byProductId(5)).resolves.toEqual([]);
    expect(fetchApi).not.toHaveBeenCalled();

    const metafields = await admin.metafields.byVariantId(9);
    expect(metafields.map((m) => m.ownerId)).toEqual([9]);
    expect(requestedUrl(fetchApi, 0).pathname).toBe(
      "/admin/api/2025-10/variants/9/metafields.json"
    );
  });

  test("metafields.byOwner is empty without a metafields list", async () => {
    const fetchApi = makeFetch(() => jsonResponse({ metafield: {} }));
    const { admin } = makeClient(fetchApi);

    await expect(admin.metafields.byOwner(5, "products")).resolves.toEqual([]);
  });
});
