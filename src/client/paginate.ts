/**
 * paginate.ts — Pagination driver for the provider's list endpoints.
 *
 * List responses carry their elements under a resource-specific key and a
 * link to the next page:
 *
 *   { "kubernetes_clusters": [...], "links": { "pages": { "next": "https://…?page=2" } }, "meta": {...} }
 *
 * Pages are fetched strictly in sequence because the next link is only known
 * once the previous page has been parsed. A failure on any page aborts the
 * whole call; partial results are never returned.
 */

import { z } from 'zod';
import { classifyResponse, unexpectedResponse } from './classify.js';
import type { CloudClient } from './CloudClient.js';
import type { ApiRequest, ApiResponse, CallOptions, QueryParams } from './types.js';

// The maximum number of entries a page may hold
export const MAX_ENTRIES_PER_PAGE = 200;

const PageLinksSchema = z.object({
  links: z
    .object({
      pages: z.object({ next: z.string().url().optional() }).optional(),
    })
    .optional(),
});

export interface PageQuery<T> {
  // Property of the response body holding the array, e.g. 'kubernetes_clusters'
  key: string;
  // Converts one raw element; typically a zod schema's parse
  map: (element: unknown) => T;
  // Keeps every element when omitted
  predicate?: (candidate: T) => boolean;
}

type PageClient = Pick<CloudClient, 'createRequest' | 'send' | 'logger'>;

interface Page<T> {
  matches: T[];
  next: string | null;
}

function getNextPage(request: ApiRequest, response: ApiResponse): string | null {
  const parsed = PageLinksSchema.safeParse(response.body);
  if (!parsed.success) throw unexpectedResponse(request, response, parsed.error);
  return parsed.data.links?.pages?.next ?? null;
}

async function requestSinglePage<T>(
  client: PageClient,
  url: string,
  query: QueryParams | undefined,
  page: PageQuery<T>,
  options: CallOptions,
): Promise<Page<T>> {
  const request = client.createRequest(url, { query });
  const response = await client.send(request, options);
  const elements = classifyResponse<unknown[] | undefined>(request, response, {
    success: {
      200: (r) => {
        const body = r.body;
        if (typeof body !== 'object' || body === null) return undefined;
        const value: unknown = Reflect.get(body, page.key);
        return Array.isArray(value) ? value : undefined;
      },
    },
  });
  if (elements === undefined) throw unexpectedResponse(request, response);

  const matches: T[] = [];
  for (const element of elements) {
    let candidate: T;
    try {
      candidate = page.map(element);
    } catch (error) {
      client.logger.warn({ err: error, body: response.text }, 'Failed to map a list element');
      throw unexpectedResponse(request, response, error);
    }
    if (!page.predicate || page.predicate(candidate)) matches.push(candidate);
  }
  return { matches, next: getNextPage(request, response) };
}

// Only the first request carries the caller's parameters; next links already embed them.
function firstPageQuery(query: QueryParams): QueryParams {
  return { per_page: MAX_ENTRIES_PER_PAGE, ...query };
}

/**
 * getElements — follows every page and returns all matching elements in the
 * order the server delivered them.
 */
export async function getElements<T>(
  client: PageClient,
  url: string,
  query: QueryParams,
  page: PageQuery<T>,
  options: CallOptions = {},
): Promise<T[]> {
  const elements: T[] = [];
  let next: string | null = url;
  let pageQuery: QueryParams | undefined = firstPageQuery(query);
  while (next !== null) {
    const result: Page<T> = await requestSinglePage(client, next, pageQuery, page, options);
    elements.push(...result.matches);
    next = result.next;
    pageQuery = undefined;
  }
  return elements;
}

/**
 * getElement — returns the first matching element, or undefined if no page has one.
 * Stops fetching as soon as a page contains a match.
 */
export async function getElement<T>(
  client: PageClient,
  url: string,
  query: QueryParams,
  page: PageQuery<T>,
  options: CallOptions = {},
): Promise<T | undefined> {
  let next: string | null = url;
  let pageQuery: QueryParams | undefined = firstPageQuery(query);
  while (next !== null) {
    const result: Page<T> = await requestSinglePage(client, next, pageQuery, page, options);
    if (result.matches.length > 0) return result.matches[0];
    next = result.next;
    pageQuery = undefined;
  }
  return undefined;
}
