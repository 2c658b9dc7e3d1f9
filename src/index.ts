export { AuditLogClient } from "./client";
export type { AuditLogClientOptions } from "./client";
export type { ClientConfig, RequestInterceptor, ResponseInterceptor } from "./config";
export { DEFAULT_CONFIG, DEFAULT_HEADERS, GITHUB_API_URL } from "./config";
export {
  AuditLogError,
  AuthError,
  ConfigError,
  FetchError,
  ParseError,
  WriteError,
  errorFromStatus,
} from "./errors";
export { exportAuditLog } from "./export";
export type { ExportRequest } from "./export";
export { PaginatedFetcher } from "./fetcher";
export type { PaginatedFetcherOptions } from "./fetcher";
export { extractRecords, nextPageUrl, parseLinkHeader } from "./pagination";
export type { NextPageExtractor } from "./pagination";
export { auditLogQuerySchema, buildAuditLogUrl, buildPhrase, parseAuditLogQuery } from "./query";
export { Transport } from "./transport";
export type { PageResponse } from "./transport";
export { defaultOutputPath, serialize, toCsv, toJson, write } from "./writer";
export * from "./models";
