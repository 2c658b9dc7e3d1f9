import { ParseError } from "./errors";
import type { AuditRecord } from "./models";
import type { PageResponse } from "./transport";

/** Returns the URL of the page after `response`, or `null` on the last page. */
export type NextPageExtractor = (response: PageResponse) => string | null;

const LINK_PATTERN = /<([^>]*)>((?:\s*;\s*[^;,]+)*)/g;

// Keys GitHub wraps around list results on some endpoints.
const ENVELOPE_KEYS = new Set(["incomplete_results", "repository_selection", "total_count"]);

/**
 * Parses an RFC 8288 `Link` header into a map of relation to target.
 * The first link wins when a relation repeats.
 */
export function parseLinkHeader(header: string | null | undefined): Map<string, string> {
  const links = new Map<string, string>();
  if (!header) return links;

  for (const [, target, params] of header.matchAll(LINK_PATTERN)) {
    for (const param of params.split(";")) {
      const eq = param.indexOf("=");
      if (eq === -1) continue;
      if (param.slice(0, eq).trim().toLowerCase() !== "rel") continue;

      const value = param.slice(eq + 1).trim().replace(/^"|"$/g, "");
      for (const rel of value.toLowerCase().split(/\s+/)) {
        if (rel && !links.has(rel)) links.set(rel, target.trim());
      }
    }
  }
  return links;
}

export const nextPageUrl: NextPageExtractor = (response) => {
  const next = parseLinkHeader(response.headers.get("link")).get("next");
  if (!next) return null;
  if (URL.canParse(next)) return next;

  try {
    return new URL(next, response.url).href;
  } catch {
    throw new ParseError(`Invalid next-page link "${next}"`, response.url);
  }
};

function isRecord(value: unknown): value is AuditRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRecords(items: unknown[], url: string | null): AuditRecord[] {
  return items.map((item, index) => {
    if (!isRecord(item)) {
      throw new ParseError(`Item ${index} of the page is not a JSON object`, url);
    }
    return item;
  });
}

/**
 * Pulls the records out of a page body. Bare arrays are returned as-is;
 * an enveloped list (`{ total_count, items: [...] }`) yields its list.
 */
export function extractRecords(body: unknown, url: string | null = null): AuditRecord[] {
  if (body === null || body === undefined) return [];
  if (Array.isArray(body)) return toRecords(body, url);
  if (!isRecord(body)) {
    throw new ParseError("Expected a JSON array of records", url);
  }

  const keys = Object.keys(body).filter((key) => !ENVELOPE_KEYS.has(key));
  if (keys.length === 0) return [];

  const list = body[keys[0]];
  if (!Array.isArray(list)) {
    throw new ParseError(`Expected "${keys[0]}" to hold a JSON array of records`, url);
  }
  return toRecords(list, url);
}
