export type {
  AuditRecord,
  ResultSet,
  Page,
  AuditLogScope,
  IncludeFilter,
  AuditLogQuery,
} from "./audit";
export type {
  OutputFormat,
  CsvColumns,
  OutputTarget,
  WriteOptions,
  ExportResult,
} from "./output";
