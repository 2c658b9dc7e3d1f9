import type { ClientConfig } from "../config";
import { FetchError } from "../errors";
import { exportAuditLog } from "../export";
import type { PaginatedFetcherOptions } from "../fetcher";
import { PaginatedFetcher } from "../fetcher";
import type {
  AuditLogQuery,
  ExportResult,
  OutputTarget,
  Page,
  ResultSet,
  WriteOptions,
} from "../models";
import { buildAuditLogUrl, parseAuditLogQuery } from "../query";
import type { Transport } from "../transport";
import { BaseResource } from "./base";

export class AuditLogResource extends BaseResource {
  private readonly fetcher: PaginatedFetcher;

  constructor(
    transport: Transport,
    config: Pick<ClientConfig, "apiUrl" | "token">,
    options: PaginatedFetcherOptions = {},
  ) {
    super(transport, config);
    this.fetcher = new PaginatedFetcher(this.transport, options);
  }

  url(query: AuditLogQuery): string {
    return buildAuditLogUrl(this.config.apiUrl, parseAuditLogQuery(query));
  }

  /** First page only, with its next-page link. */
  async page(query: AuditLogQuery): Promise<Page> {
    for await (const page of this.fetcher.pages(this.url(query), this.credential())) {
      return page;
    }
    throw new FetchError("No page was returned");
  }

  async all(query: AuditLogQuery): Promise<ResultSet> {
    return this.fetcher.fetch(this.url(query), this.credential());
  }

  async export(
    query: AuditLogQuery,
    outputs: OutputTarget[],
    options?: WriteOptions,
  ): Promise<ExportResult> {
    return exportAuditLog({
      fetcher: this.fetcher,
      url: this.url(query),
      credential: this.credential(),
      outputs,
      writeOptions: options,
    });
  }
}
