import type { QueryParams } from "../types";

const LINK_PART_PATTERN = /<([^>]+)>\s*;\s*rel="?([^";]+)"?/i;

/**
 * Extract the `rel="next"` target of an RFC 8288 `Link` header as a query
 * object, e.g. `{ limit: "250", page_info: "abc" }`. Returns `null` on the
 * last page.
 */
export function parseNextPageQuery(
  linkHeader: string | null | undefined
): QueryParams | null {
  if (!linkHeader) return null;

  for (const part of linkHeader.split(",")) {
    const match = part.match(LINK_PART_PATTERN);
    if (!match) continue;
    const [, target, rel] = match;
    if (!target || rel?.trim().toLowerCase() !== "next") continue;

    let url: URL;
    try {
      url = new URL(target);
    } catch {
      continue;
    }
    const query: QueryParams = {};
    url.searchParams.forEach((value, key) => {
      query[key] = value;
    });
    return Object.keys(query).length ? query : null;
  }

  return null;
}
