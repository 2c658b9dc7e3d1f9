/**
 * One audit-log event. The schema belongs to the remote service, so fields
 * are kept as received and in the order received.
 */
export type AuditRecord = Record<string, unknown>;

/** Every record of every page, first page first. */
export type ResultSet = AuditRecord[];

export interface Page {
  url: string;
  records: AuditRecord[];
  nextUrl: string | null;
}

export type AuditLogScope = "enterprise" | "organization";

export type IncludeFilter = "web" | "git" | "all";

export interface AuditLogQuery {
  scope: AuditLogScope;
  name: string;
  /** `YYYY-MM-DD` or a full ISO-8601 timestamp. */
  since?: string;
  action?: string;
  include?: IncludeFilter;
  perPage?: number;
}
