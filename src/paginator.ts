import type { ResourceType } from "./resources";
import type { ApiResponse, QueryParams } from "./types";

/**
 * Fetches every page of a collection in order.
 *
 * The first page is requested with `params` and `limit` forced to the
 * resource's page-size ceiling. Each later page is requested with the cursor
 * query alone, since the cursor already carries the original filters.
 *
 * There is no page cap: a server that never stops sending a next-page cursor
 * keeps this loop running.
 */
export async function paginate<T>(
  resource: ResourceType<T>,
  params: QueryParams,
  fetchPage: (path: string, query: QueryParams) => Promise<ApiResponse>
): Promise<T[]> {
  const firstQuery: QueryParams = { ...params, limit: resource.maxPageSize };
  const resources: T[] = [];

  let cursor: QueryParams | null = null;
  do {
    const response: ApiResponse = await fetchPage(
      resource.path,
      cursor ?? firstQuery
    );
    resources.push(...resource.decodePage(response.body));
    cursor = resource.nextPageQuery(response);
  } while (cursor);

  return resources;
}
