import type { ClientConfig } from "./config";
import { DEFAULT_CONFIG } from "./config";
import { FetchError, ParseError, errorFromStatus } from "./errors";

export interface PageResponse {
  /** The URL the request was sent to. */
  url: string;
  status: number;
  headers: Headers;
  /** Parsed JSON body, `null` for an empty body. */
  body: unknown;
}

export class Transport {
  private config: ClientConfig;

  constructor(config: ClientConfig) {
    this.config = config;
  }

  /**
   * Issues a single GET. There is no retry: any failure is final for the
   * caller.
   */
  async get(
    url: string,
    options?: { headers?: Record<string, string> },
  ): Promise<PageResponse> {
    const method = "GET";
    const headers: Record<string, string> = {
      Accept: "application/json",
      ...this.config.headers,
      ...options?.headers,
    };

    // Run request interceptors (e.g., request logging)
    if (this.config.onRequest) {
      for (const interceptor of this.config.onRequest) {
        await interceptor({ method, url, headers });
      }
    }

    const timeout = this.config.timeout ?? DEFAULT_CONFIG.timeout;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);

    // The timer stays armed until the body has been read.
    const failure = (e: unknown): FetchError => {
      if (timedOut) {
        return new FetchError(`Request timed out after ${timeout}ms: ${url}`, {
          timedOut: true,
        });
      }
      const reason = e instanceof Error ? e.message : String(e);
      return new FetchError(`Request failed: ${reason}`);
    };

    try {
      let response: Response;
      try {
        response = await fetch(url, { method, headers, signal: controller.signal });
      } catch (e) {
        throw failure(e);
      }

      // Run response interceptors (e.g., logging, rate-limit reporting)
      if (this.config.onResponse) {
        for (const interceptor of this.config.onResponse) {
          await interceptor(response, { method, url });
        }
      }

      let text: string;
      try {
        text = await response.text();
      } catch (e) {
        throw failure(e);
      }

      return this.handleResponse(url, response, text);
    } finally {
      clearTimeout(timer);
    }
  }

  private handleResponse(url: string, response: Response, text: string): PageResponse {
    if (response.status < 200 || response.status >= 300) {
      throw errorFromStatus(response.status, response.statusText, text);
    }

    let body: unknown = null;
    if (text.trim() !== "") {
      try {
        body = JSON.parse(text);
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ParseError(`Malformed JSON in response from ${url}: ${reason}`, url);
      }
    }

    return {
      url,
      status: response.status,
      headers: response.headers ?? new Headers(),
      body,
    };
  }
}
