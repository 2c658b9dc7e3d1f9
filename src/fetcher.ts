import { AuthError, FetchError, ParseError } from "./errors";
import type { Page, ResultSet } from "./models";
import type { NextPageExtractor } from "./pagination";
import { extractRecords, nextPageUrl } from "./pagination";
import type { Transport } from "./transport";

export interface PaginatedFetcherOptions {
  /** Defaults to the `Link: <...>; rel="next"` header. */
  nextPage?: NextPageExtractor;
  /** Called once per page, in order, after its records are parsed. */
  onPage?: (page: Page, index: number) => void;
}

function assertHttpUrl(url: string): void {
  let protocol: string;
  try {
    protocol = new URL(url).protocol;
  } catch {
    throw new FetchError(`Invalid URL: ${url}`);
  }
  if (protocol !== "http:" && protocol !== "https:") {
    throw new FetchError(`Unsupported URL scheme "${protocol}" in ${url}`);
  }
}

/**
 * Follows next-page links from `baseUrl` until a page has none, one request
 * at a time.
 */
export class PaginatedFetcher {
  private readonly transport: Transport;
  private readonly nextPage: NextPageExtractor;
  private readonly onPage?: (page: Page, index: number) => void;

  constructor(transport: Transport, options: PaginatedFetcherOptions = {}) {
    this.transport = transport;
    this.nextPage = options.nextPage ?? nextPageUrl;
    this.onPage = options.onPage;
  }

  async *pages(baseUrl: string, credential: string): AsyncGenerator<Page> {
    if (credential.trim() === "") {
      throw new AuthError("API token is empty");
    }
    assertHttpUrl(baseUrl);

    const origin = new URL(baseUrl).origin;
    const headers = { Authorization: `Bearer ${credential}` };
    const visited = new Set<string>();
    let currentUrl: string | null = baseUrl;
    let index = 0;

    while (currentUrl !== null) {
      visited.add(currentUrl);
      const response = await this.transport.get(currentUrl, { headers });
      const nextUrl = this.nextPage(response);

      if (nextUrl !== null) {
        if (visited.has(nextUrl)) {
          throw new ParseError(`Next-page link loops back to ${nextUrl}`, currentUrl);
        }
        assertHttpUrl(nextUrl);
        if (new URL(nextUrl).origin !== origin) {
          throw new ParseError(
            `Next-page link ${nextUrl} leaves ${origin}; not sending the token there`,
            currentUrl,
          );
        }
      }

      const page: Page = {
        url: currentUrl,
        records: extractRecords(response.body, currentUrl),
        nextUrl,
      };
      this.onPage?.(page, index);
      yield page;

      currentUrl = nextUrl;
      index++;
    }
  }

  async fetch(baseUrl: string, credential: string): Promise<ResultSet> {
    const results: ResultSet = [];
    for await (const page of this.pages(baseUrl, credential)) {
      results.push(...page.records);
    }
    return results;
  }
}
