import { createAdminRestApiClient } from "@shopify/admin-api-client";
import {
  ADMIN_API_VERSION,
  FALLBACK_APP_HOST_NAME,
  parseSettings,
  resolveEnvValue,
  resolveSessionStoragePath,
  settingsFromEnv,
} from "./config";
import { AdminApiConfigError, describeError } from "./errors";
import { executeRequest, type RestGet } from "./executor";
import type { MetafieldOperations } from "./metafields";
import { createMetafieldOperations } from "./metafields";
import { paginate } from "./paginator";
import type { ProductOperations, VariantOperations } from "./products";
import { createProductOperations, createVariantOperations } from "./products";
import { type ResourceName, type ResourceType, resourceByName } from "./resources";
import { type ApiContext, createApiContext, createOfflineSession } from "./session";
import { FileSessionStorage } from "./session-storage";
import type {
  AdminSettings,
  ApiRecord,
  ApiResponse,
  QueryParams,
  Session,
} from "./types";
import { normalizeShopHost, sleep } from "./utils/func";

export type AdminRestClient = ReturnType<typeof createAdminRestApiClient>;

type AdminRestClientOptions = Parameters<typeof createAdminRestApiClient>[0];

export type FetchApi = NonNullable<AdminRestClientOptions["customFetchApi"]>;

export type AdminClientOptions = {
  /**
   * Name of the host initiating connections. Background jobs leave it unset
   * and report `localhost`.
   */
  appHostName?: string;
  apiVersion?: string;
  fetchApi?: FetchApi;
  sleep?: (ms: number) => Promise<void>;
  /** Environment used to resolve `$NAME` settings. Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
};

/**
 * Read-only client for the Shopify Admin REST API.
 *
 * Builds its session and REST client on first use, paces every successful
 * request and absorbs 429 throttling with the server-directed delay.
 *
 * @example
 * ```typescript
 * import { AdminClient } from 'shopify-admin-reader';
 *
 * const admin = new AdminClient({
 *   apiKey: '$SHOPIFY_API_KEY',
 *   apiSecretKey: '$SHOPIFY_API_SECRET',
 *   hostName: 'example.myshopify.com',
 *   accessToken: '$SHOPIFY_ACCESS_TOKEN',
 * });
 *
 * const products = await admin.products.all();
 * const body = await admin.fetchOne('shop');
 * ```
 */
export class AdminClient {
  private settings: AdminSettings;
  private apiVersion: string;
  private appHostName: string;
  private fetchApi?: FetchApi;
  private sleep: (ms: number) => Promise<void>;
  private env: Record<string, string | undefined>;
  private context?: ApiContext;
  private session?: Session;
  private client?: AdminRestClient;

  // Public operations interfaces
  public products: ProductOperations;
  public variants: VariantOperations;
  public metafields: MetafieldOperations;

  /**
   * @param settings - Credentials and sync flags; string values may be
   * `$NAME` references resolved when the session is first built.
   *
   * @throws {AdminApiConfigError} When settings have the wrong shape
   */
  constructor(settings: AdminSettings = settingsFromEnv(), options?: AdminClientOptions) {
    this.settings = parseSettings(settings);
    this.apiVersion = options?.apiVersion?.trim() || ADMIN_API_VERSION;
    this.appHostName = options?.appHostName?.trim() || FALLBACK_APP_HOST_NAME;
    this.fetchApi = options?.fetchApi;
    this.sleep = options?.sleep ?? sleep;
    this.env = options?.env ?? process.env;

    const fetchers = {
      fetchOne: (path: string, query?: QueryParams) => this.fetchOne(path, query),
      fetchAll: (resourceType: ResourceType, params?: QueryParams) =>
        this.fetchAll(resourceType, params),
    };

    this.products = createProductOperations(fetchers);
    this.variants = createVariantOperations(fetchers);
    this.metafields = createMetafieldOperations(fetchers, () => ({
      syncProductMetafields: this.settings.syncProductMetafields ?? true,
      syncVariantMetafields: this.settings.syncVariantMetafields ?? false,
    }));
  }

  /**
   * The authentication context, once `getSession()` has built it.
   */
  getContext(): ApiContext | null {
    return this.context ?? null;
  }

  /**
   * Returns the offline session, building it on first call.
   *
   * Resolves `null` while the API key or secret is not configured; this is
   * not an error and nothing is cached, so a later call may still succeed.
   *
   * @throws {AdminApiConfigError} When credentials are present but the shop
   * host or access token is missing or invalid
   */
  getSession(): Session | null {
    if (this.session) return this.session;

    const apiKey = resolveEnvValue(this.settings.apiKey, this.env);
    const apiSecretKey = resolveEnvValue(this.settings.apiSecretKey, this.env);
    if (!apiKey || !apiSecretKey) return null;

    if (!this.context) {
      this.context = createApiContext({
        apiKey,
        apiSecretKey,
        hostName: this.appHostName,
        apiVersion: this.apiVersion,
        sessionStorage: new FileSessionStorage(
          resolveSessionStoragePath(this.settings, this.env)
        ),
      });
    }

    const hostName = resolveEnvValue(this.settings.hostName, this.env);
    const accessToken = resolveEnvValue(this.settings.accessToken, this.env);
    if (!hostName) {
      throw new AdminApiConfigError("Shop host name is not configured");
    }
    if (!accessToken) {
      throw new AdminApiConfigError("Admin API access token is not configured");
    }

    let shop: string;
    try {
      shop = normalizeShopHost(hostName);
    } catch (error) {
      throw new AdminApiConfigError(describeError(error));
    }

    this.session = createOfflineSession(shop, accessToken);
    return this.session;
  }

  /**
   * Returns the Admin REST client bound to the session, building it on first
   * call.
   *
   * @throws {AdminApiConfigError} When no session can be built
   */
  getClient(): AdminRestClient {
    if (this.client) return this.client;

    const session = this.getSession();
    if (!session) {
      throw new AdminApiConfigError(
        "Admin API credentials are not configured (apiKey / apiSecretKey)"
      );
    }

    this.client = createAdminRestApiClient({
      storeDomain: session.shop,
      apiVersion: this.apiVersion,
      accessToken: session.accessToken,
      retries: 0,
      ...(this.fetchApi ? { customFetchApi: this.fetchApi } : {}),
    });
    return this.client;
  }

  /**
   * Shortcut for retrieving arbitrary API resources. The decoded response body
   * is returned as-is; unpacking it is up to the caller.
   */
  async fetchOne(path: string, query: QueryParams = {}): Promise<ApiRecord> {
    const response = await this.fetchResponse(path, query);
    return response.body;
  }

  /**
   * Fetches every page of a collection, forcing the maximum page size.
   */
  fetchAll<T>(resourceType: ResourceType<T>, params?: QueryParams): Promise<T[]>;
  fetchAll(resourceType: ResourceName, params?: QueryParams): Promise<ApiRecord[]>;
  fetchAll<T>(
    resourceType: ResourceType<T> | ResourceName,
    params: QueryParams = {}
  ): Promise<Array<T | ApiRecord>> {
    const resource =
      typeof resourceType === "string" ? resourceByName(resourceType) : resourceType;
    return paginate<T | ApiRecord>(resource, params, (path, query) =>
      this.fetchResponse(path, query)
    );
  }

  private async fetchResponse(
    path: string,
    query: QueryParams
  ): Promise<ApiResponse> {
    const client = this.getClient();
    const get: RestGet = (requestPath, searchParams) =>
      client.get(requestPath, { searchParams });
    return executeRequest(get, path, query, { sleep: this.sleep });
  }
}

export { ADMIN_API_SCOPES, ADMIN_API_VERSION, resolveEnvValue, settingsFromEnv } from "./config";
export { AdminApiConfigError, AdminApiError } from "./errors";
export { MAX_RATE_LIMIT_RETRIES, parseRetryAfter, SUCCESS_PAUSE_MS } from "./executor";
export type { MetafieldOperations } from "./metafields";
export type { ProductOperations, VariantOperations } from "./products";
export {
  defineResource,
  MAX_PAGE_SIZE,
  type ResourceName,
  type ResourceType,
  resourceTypes,
} from "./resources";
export type { ApiContext } from "./session";
export { FileSessionStorage, type SessionStorage } from "./session-storage";
export type {
  AdminSettings,
  ApiRecord,
  ApiResponse,
  Metafield,
  MetafieldOwnerResource,
  Product,
  ProductImage,
  ProductOption,
  ProductVariant,
  QueryParams,
  Session,
} from "./types";
export { normalizeShopHost } from "./utils/func";
