import { z } from "zod";
import { DEFAULT_CONFIG } from "./config";
import { ConfigError } from "./errors";
import type { AuditLogQuery } from "./models";

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const auditLogQuerySchema = z.object({
  scope: z.enum(["enterprise", "organization"]),
  name: z
    .string()
    .trim()
    .min(1, "name is required")
    .regex(/^[A-Za-z0-9_.-]+$/, "name may only contain letters, digits, '.', '_' and '-'"),
  since: z
    .string()
    .trim()
    .refine(
      (value) => !Number.isNaN(Date.parse(value)),
      "since must be a YYYY-MM-DD date or an ISO-8601 timestamp",
    )
    .optional(),
  action: z
    .string()
    .trim()
    .min(1)
    .regex(/^\S+$/, "action must not contain whitespace")
    .optional(),
  include: z.enum(["web", "git", "all"]).optional(),
  perPage: z.number().int().min(1).max(100).optional(),
});

export function parseAuditLogQuery(input: unknown): AuditLogQuery {
  const result = auditLogQuerySchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "query"}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid audit-log query: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/** `created:>=` search term; a bare date is taken as midnight UTC. */
function sinceTerm(since: string): string {
  const timestamp = DATE_PATTERN.test(since) ? `${since}T00:00:00+00:00` : since;
  return `created:>=${timestamp}`;
}

export function buildPhrase(query: Pick<AuditLogQuery, "since" | "action">): string {
  const terms: string[] = [];
  if (query.since) terms.push(sinceTerm(query.since));
  if (query.action) terms.push(`action:${query.action}`);
  return terms.join(" ");
}

export function buildAuditLogUrl(apiUrl: string, query: AuditLogQuery): string {
  const segment = query.scope === "enterprise" ? "enterprises" : "orgs";
  const base = apiUrl.replace(/\/+$/, "");
  const url = new URL(`${base}/${segment}/${encodeURIComponent(query.name)}/audit-log`);

  const phrase = buildPhrase(query);
  if (phrase) url.searchParams.set("phrase", phrase);
  if (query.include) url.searchParams.set("include", query.include);
  url.searchParams.set("per_page", String(query.perPage ?? DEFAULT_CONFIG.perPage));

  return url.href;
}
