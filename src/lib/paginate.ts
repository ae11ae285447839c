import { UpstreamResponseError } from "./errors.js";
import type { Transport } from "./transport.js";
import type { HostCollection, InventoryRecord, ServiceLocation } from "./types.js";

type Headers = Record<string, string> | undefined;

export function isRecord(value: unknown): value is InventoryRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Join URL parts with single slashes, skipping empty parts.
 */
export function joinUrl(host: string, ...parts: string[]): string {
  const segments = parts.map((p) => p.replace(/^\/+|\/+$/g, "")).filter(Boolean);
  return [host.replace(/\/+$/, ""), ...segments].filter(Boolean).join("/");
}

async function getJson(transport: Transport, url: string, headers: Headers): Promise<unknown> {
  const response = await transport.execute("GET", url, { headers });
  try {
    return await response.json();
  } catch {
    throw new UpstreamResponseError(url, "body is not valid JSON");
  }
}

function toRecords(url: string, items: unknown[]): InventoryRecord[] {
  return items.map((item) => {
    if (!isRecord(item)) throw new UpstreamResponseError(url, "collection item is not an object");
    return item;
  });
}

/* ── Count-based pagination: { results, total, per_page } ── */

function pageUrl(baseUrl: string, page: number): string {
  const url = new URL(baseUrl);
  url.searchParams.set("page", String(page));
  return url.toString();
}

function readCountPage(url: string, body: unknown): { results: InventoryRecord[]; total: number; perPage: number } {
  if (!isRecord(body) || !Array.isArray(body.results)) {
    throw new UpstreamResponseError(url, "missing 'results' list");
  }
  const perPage = body.per_page ?? body.perPage;
  if (typeof body.total !== "number" || typeof perPage !== "number" || perPage <= 0) {
    throw new UpstreamResponseError(url, "missing 'total' or 'per_page'");
  }
  return { results: toRecords(url, body.results), total: body.total, perPage };
}

/**
 * Fetch page 1, derive the page count from total/per_page and fetch the
 * remaining pages in order. The last page is included.
 */
export async function fetchCountPaged(
  transport: Transport,
  baseUrl: string,
  headers?: Record<string, string>,
): Promise<HostCollection> {
  const firstUrl = pageUrl(baseUrl, 1);
  const first = readCountPage(firstUrl, await getJson(transport, firstUrl, headers));
  const results = [...first.results];
  const pageCount = Math.ceil(first.total / first.perPage);

  for (let page = 2; page <= pageCount; page++) {
    const url = pageUrl(baseUrl, page);
    const next = readCountPage(url, await getJson(transport, url, headers));
    results.push(...next.results);
  }

  return { results, total: first.total };
}

/* ── Link-based pagination: { data, links: { next } } ── */

function nextUrl(service: ServiceLocation, next: unknown): string | null {
  if (typeof next !== "string" || next === "") return null;
  if (/^https?:\/\//.test(next)) return next;
  return joinUrl(service.host, next);
}

/**
 * Collect a whole collection by following `links.next` until it is absent.
 * A bare JSON array is a complete, unpaginated collection. A `next` link
 * back to a page already fetched fails the collection.
 */
export async function fetchLinkPaged(
  transport: Transport,
  service: ServiceLocation,
  collectionPath: string,
  headers?: Record<string, string>,
): Promise<InventoryRecord[]> {
  const records: InventoryRecord[] = [];
  const visited = new Set<string>();
  let url: string | null = joinUrl(service.host, service.path, collectionPath);

  while (url) {
    if (visited.has(url)) throw new UpstreamResponseError(url, "'links.next' points to a page already fetched");
    visited.add(url);

    const body = await getJson(transport, url, headers);

    if (Array.isArray(body)) {
      records.push(...toRecords(url, body));
      break;
    }
    if (!isRecord(body) || !Array.isArray(body.data)) {
      throw new UpstreamResponseError(url, "missing 'data' list");
    }

    records.push(...toRecords(url, body.data));
    url = isRecord(body.links) ? nextUrl(service, body.links.next) : null;
  }

  return records;
}
