import type { ClientConfig } from "./config";
import { DEFAULT_HEADERS, GITHUB_API_URL } from "./config";
import type { PaginatedFetcherOptions } from "./fetcher";
import { AuditLogResource } from "./resources/audit-log";
import { Transport } from "./transport";

/**
 * All fields optional -- apiUrl defaults to https://api.github.com.
 * `headers` are merged over the GitHub defaults.
 */
export type AuditLogClientOptions = Partial<ClientConfig> & PaginatedFetcherOptions;

export class AuditLogClient {
  public readonly auditLog: AuditLogResource;

  private readonly _config: ClientConfig;
  private readonly _transport: Transport;

  constructor(options: AuditLogClientOptions = {}) {
    this._config = {
      apiUrl: options.apiUrl ?? GITHUB_API_URL,
      token: options.token,
      timeout: options.timeout,
      headers: { ...DEFAULT_HEADERS, ...options.headers },
      onRequest: options.onRequest,
      onResponse: options.onResponse,
    };

    this._transport = new Transport(this._config);

    this.auditLog = new AuditLogResource(
      this._transport,
      this._config,
      { nextPage: options.nextPage, onPage: options.onPage },
    );
  }

  get config(): ClientConfig {
    return this._config;
  }
}
