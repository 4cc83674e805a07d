import { parse } from "tldts";

/**
 * Normalize a shop hostname for the Admin API.
 *
 * Accepts bare hostnames or full URLs and returns the lower-cased host without
 * protocol, port, path, query or fragment.
 *
 * Examples:
 *  - "https://Example.myshopify.com/admin" -> "example.myshopify.com"
 *  - "example.myshopify.com:443" -> "example.myshopify.com"
 */
export function normalizeShopHost(input: string): string {
  if (typeof input !== "string") {
    throw new Error("normalizeShopHost: input must be a string");
  }
  const hostname = input
    .trim()
    .toLowerCase()
    .replace(/^[a-z]+:\/\//, "")
    .replace(/^\/\//, "")
    .replace(/[/:#?].*$/, "");
  if (!hostname) {
    throw new Error("normalizeShopHost: input cannot be empty");
  }
  if (
    !hostname.includes(".") ||
    hostname.startsWith(".") ||
    hostname.endsWith(".") ||
    hostname.includes("..")
  ) {
    throw new Error(`normalizeShopHost: invalid shop host "${input}"`);
  }
  const parsed = parse(hostname);
  if (parsed.isIp || !parsed.publicSuffix || parsed.hostname !== hostname) {
    throw new Error(`normalizeShopHost: invalid shop host "${input}"`);
  }
  return hostname;
}

/**
 * Safely parse a date string into a Date object.
 *
 * Returns `null` when input is falsy or cannot be parsed into a valid date.
 */
export function safeParseDate(input?: string | null): Date | null {
  if (!input || typeof input !== "string") return null;
  const d = new Date(input);
  return Number.isNaN(d.getTime()) ? null : d;
}

export function splitTags(tags?: string | null): string[] {
  if (!tags) return [];
  return tags
    .split(",")
    .map((t) => t.trim())
    .filter(Boolean);
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));
