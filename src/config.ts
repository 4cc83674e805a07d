import path from "node:path";
import { AdminApiConfigError } from "./errors";
import { adminSettingsSchema } from "./schemas";
import type { AdminSettings } from "./types";

export const ADMIN_API_VERSION = "2025-10";

export const ADMIN_API_SCOPES = [
  "write_products",
  "read_products",
  "read_inventory",
] as const;

/** Host name used when the caller has no request context of its own. */
export const FALLBACK_APP_HOST_NAME = "localhost";

export const DEFAULT_SESSION_STORAGE_DIR = "shopify_api_sessions";

const ENV_REFERENCE_PATTERN = /^\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))$/;

type Env = Record<string, string | undefined>;

/**
 * Resolve a `$NAME` or `${NAME}` setting against the environment. Plain
 * values are returned trimmed; unknown references resolve to `""`.
 */
export function resolveEnvValue(
  value: string | undefined,
  env: Env = process.env
): string {
  if (!value) return "";
  const trimmed = value.trim();
  const match = trimmed.match(ENV_REFERENCE_PATTERN);
  if (!match) return trimmed;
  const name = match[1] ?? match[2] ?? "";
  return (env[name] ?? "").trim();
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || !value.trim()) return undefined;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

/**
 * Build settings from `SHOPIFY_*` environment variables.
 */
export function settingsFromEnv(env: Env = process.env): AdminSettings {
  return {
    apiKey: env.SHOPIFY_API_KEY,
    apiSecretKey: env.SHOPIFY_API_SECRET,
    hostName: env.SHOPIFY_SHOP,
    accessToken: env.SHOPIFY_ACCESS_TOKEN,
    syncProductMetafields: parseFlag(env.SHOPIFY_SYNC_PRODUCT_METAFIELDS),
    syncVariantMetafields: parseFlag(env.SHOPIFY_SYNC_VARIANT_METAFIELDS),
    sessionStoragePath: env.SHOPIFY_SESSION_STORAGE_PATH,
  };
}

export function parseSettings(input: unknown): AdminSettings {
  const result = adminSettingsSchema.safeParse(input);
  if (!result.success) {
    const fields = result.error.issues
      .map((issue) => issue.path.map(String).join(".") || "(root)")
      .join(", ");
    throw new AdminApiConfigError(`Invalid admin settings: ${fields}`);
  }
  return result.data;
}

export function resolveSessionStoragePath(
  settings: AdminSettings,
  env: Env = process.env
): string {
  const configured = resolveEnvValue(settings.sessionStoragePath, env);
  return configured
    ? path.resolve(configured)
    : path.resolve(process.cwd(), "storage", DEFAULT_SESSION_STORAGE_DIR);
}
