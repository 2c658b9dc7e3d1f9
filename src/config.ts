/** Interceptor called before each request. Can modify headers. */
export interface RequestInterceptor {
  (request: { method: string; url: string; headers: Record<string, string> }): void | Promise<void>;
}

/** Interceptor called after each response, before the status is checked. */
export interface ResponseInterceptor {
  (response: Response, request: { method: string; url: string }): void | Promise<void>;
}

export interface ClientConfig {
  apiUrl: string;
  /** Bearer token. Resolved by the caller; never read from the environment here. */
  token?: string;
  timeout?: number;
  headers?: Record<string, string>;
  /** Interceptors called before each outgoing request. */
  onRequest?: RequestInterceptor[];
  /** Interceptors called after each response (before error handling). */
  onResponse?: ResponseInterceptor[];
}

export const GITHUB_API_URL = "https://api.github.com";

export const DEFAULT_HEADERS: Record<string, string> = {
  Accept: "application/vnd.github+json",
  "X-GitHub-Api-Version": "2022-11-28",
};

export const DEFAULT_CONFIG: Required<Pick<ClientConfig, "timeout">> & {
  perPage: number;
} = {
  timeout: 30_000,
  perPage: 100,
};
