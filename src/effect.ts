import { Context, Data, Effect, Layer, Option, Schedule } from "effect";
import type {
  AdminClientOptions,
  MetafieldOperations,
  ProductOperations,
  ResourceType,
  VariantOperations,
} from "./index";
import { AdminClient } from "./index";
import type { AdminSettings, ApiRecord, QueryParams, Session } from "./types";

export class AdminClientMakeError extends Data.TaggedError(
  "AdminClientMakeError"
)<{ cause: unknown }> {}

export class AdminClientOperationError extends Data.TaggedError(
  "AdminClientOperationError"
)<{ operation: string; cause: unknown }> {}

export type AdminClientError = AdminClientMakeError | AdminClientOperationError;

export type AdminClientCallOptions = {
  readonly timeoutMs?: number;
  readonly retry?: {
    readonly maxRetries?: number;
    readonly baseDelayMs?: number;
  };
};

type ProductOperationsEffect = {
  readonly all: (
    params?: QueryParams,
    policy?: AdminClientCallOptions
  ) => Effect.Effect<
    Awaited<ReturnType<ProductOperations["all"]>>,
    AdminClientOperationError
  >;
  readonly find: (
    id: number,
    policy?: AdminClientCallOptions
  ) => Effect.Effect<
    Awaited<ReturnType<ProductOperations["find"]>>,
    AdminClientOperationError
  >;
  readonly idByInventoryItemId: (
    inventoryItemId: number,
    policy?: AdminClientCallOptions
  ) => Effect.Effect<
    Awaited<ReturnType<ProductOperations["idByInventoryItemId"]>>,
    AdminClientOperationError
  >;
};

type VariantOperationsEffect = {
  readonly byProductId: (
    productId: number,
    policy?: AdminClientCallOptions
  ) => Effect.Effect<
    Awaited<ReturnType<VariantOperations["byProductId"]>>,
    AdminClientOperationError
  >;
};

type MetafieldOperationsEffect = {
  readonly byProductId: (
    id: number,
    policy?: AdminClientCallOptions
  ) => Effect.Effect<
    Awaited<ReturnType<MetafieldOperations["byProductId"]>>,
    AdminClientOperationError
  >;
  readonly byVariantId: (
    id: number,
    policy?: AdminClientCallOptions
  ) => Effect.Effect<
    Awaited<ReturnType<MetafieldOperations["byVariantId"]>>,
    AdminClientOperationError
  >;
  readonly byOwner: (
    id: number,
    ownerResource: Parameters<MetafieldOperations["byOwner"]>[1],
    policy?: AdminClientCallOptions
  ) => Effect.Effect<
    Awaited<ReturnType<MetafieldOperations["byOwner"]>>,
    AdminClientOperationError
  >;
};

export type AdminClientEffect = {
  readonly products: ProductOperationsEffect;
  readonly variants: VariantOperationsEffect;
  readonly metafields: MetafieldOperationsEffect;
  readonly getSession: () => Effect.Effect<
    Option.Option<Session>,
    AdminClientOperationError
  >;
  readonly fetchOne: (
    path: string,
    query?: QueryParams,
    policy?: AdminClientCallOptions
  ) => Effect.Effect<ApiRecord, AdminClientOperationError>;
  readonly fetchAll: <T>(
    resourceType: ResourceType<T>,
    params?: QueryParams,
    policy?: AdminClientCallOptions
  ) => Effect.Effect<T[], AdminClientOperationError>;
};

export class AdminClientTag extends Context.Tag("AdminClient")<
  AdminClientTag,
  AdminClientEffect
>() {}

export function makeAdminClient(
  settings?: AdminSettings,
  options?: AdminClientOptions
): Effect.Effect<AdminClientEffect, AdminClientMakeError> {
  return Effect.try({
    try: () => new AdminClient(settings, options),
    catch: (cause: unknown) => new AdminClientMakeError({ cause }),
  }).pipe(Effect.map(wrapAdminClient));
}

export function adminClientLayer(
  settings?: AdminSettings,
  options?: AdminClientOptions
): Layer.Layer<AdminClientTag, AdminClientMakeError> {
  return Layer.effect(AdminClientTag, makeAdminClient(settings, options));
}

function withPolicy<A, R>(
  operation: string,
  effect: Effect.Effect<A, AdminClientOperationError, R>,
  options?: AdminClientCallOptions
): Effect.Effect<A, AdminClientOperationError, R> {
  const timeoutMs =
    typeof options?.timeoutMs === "number" && options.timeoutMs > 0
      ? options.timeoutMs
      : undefined;

  const withTimeout =
    typeof timeoutMs === "number"
      ? effect.pipe(
          Effect.timeoutFail({
            duration: timeoutMs,
            onTimeout: () =>
              new AdminClientOperationError({
                operation: `${operation}.timeout`,
                cause: { timeoutMs },
              }),
          })
        )
      : effect;

  const maxRetries = Math.max(0, options?.retry?.maxRetries ?? 0);
  if (maxRetries === 0) return withTimeout;

  const baseDelayMs = Math.max(0, options?.retry?.baseDelayMs ?? 200);
  const schedule = Schedule.exponential(baseDelayMs).pipe(
    Schedule.jittered,
    Schedule.intersect(Schedule.recurs(maxRetries))
  );
  return withTimeout.pipe(Effect.retry(schedule));
}

function toOperationEffect<A>(
  operation: string,
  f: () => Promise<A>,
  policy?: AdminClientCallOptions
): Effect.Effect<A, AdminClientOperationError> {
  return withPolicy(
    operation,
    Effect.tryPromise({
      try: () => f(),
      catch: (cause: unknown) =>
        new AdminClientOperationError({ operation, cause }),
    }),
    policy
  );
}

function wrapAdminClient(admin: AdminClient): AdminClientEffect {
  const products: ProductOperationsEffect = {
    all: (params, policy) =>
      toOperationEffect("products.all", () => admin.products.all(params), policy),
    find: (id, policy) =>
      toOperationEffect("products.find", () => admin.products.find(id), policy),
    idByInventoryItemId: (inventoryItemId, policy) =>
      toOperationEffect(
        "products.idByInventoryItemId",
        () => admin.products.idByInventoryItemId(inventoryItemId),
        policy
      ),
  };

  const variants: VariantOperationsEffect = {
    byProductId: (productId, policy) =>
      toOperationEffect(
        "variants.byProductId",
        () => admin.variants.byProductId(productId),
        policy
      ),
  };

  const metafields: MetafieldOperationsEffect = {
    byProductId: (id, policy) =>
      toOperationEffect(
        "metafields.byProductId",
        () => admin.metafields.byProductId(id),
        policy
      ),
    byVariantId: (id, policy) =>
      toOperationEffect(
        "metafields.byVariantId",
        () => admin.metafields.byVariantId(id),
        policy
      ),
    byOwner: (id, ownerResource, policy) =>
      toOperationEffect(
        "metafields.byOwner",
        () => admin.metafields.byOwner(id, ownerResource),
        policy
      ),
  };

  return {
    products,
    variants,
    metafields,
    getSession: () =>
      Effect.try({
        try: () => Option.fromNullable(admin.getSession()),
        catch: (cause: unknown) =>
          new AdminClientOperationError({ operation: "getSession", cause }),
      }),
    fetchOne: (path, query, policy) =>
      toOperationEffect("fetchOne", () => admin.fetchOne(path, query), policy),
    fetchAll: (resourceType, params, policy) =>
      toOperationEffect(
        "fetchAll",
        () => admin.fetchAll(resourceType, params),
        policy
      ),
  };
}
