import { parseArgs } from "node:util";
import { z } from "zod";
import { ConfigError } from "../errors";
import type { AuditLogQuery, CsvColumns, OutputFormat } from "../models";
import { parseAuditLogQuery } from "../query";

export const USAGE = `Usage: audit-log-export (--enterprise <name> | --org <name>) [options]

Downloads every audit-log entry and writes them to CSV or JSON.

Options:
  --enterprise <name>   Enterprise slug
  --org <name>          Organization login
  --since <date>        Only entries created on or after this date (YYYY-MM-DD or ISO-8601)
  --action <filter>     Action filter, e.g. git.clone or repo.*
  --include <events>    web, git or all
  --format <format>     csv, json or both (default: json)
  --output <path>       Output file (default: audit_log_<timestamp>.<format>)
  --columns <mode>      CSV columns from the "first" record (default) or the "union" of all
  --per-page <n>        Page size, 1-100 (default: 100)
  --api-url <url>       API base URL (default: https://api.github.com)
  --timeout <ms>        Per-request timeout in milliseconds (default: 30000)
  --verbose             Log every request
  --quiet               Only log errors
  -h, --help            Show this help

The token is read from GITHUB_TOKEN (or AUDIT_LOG_TOKEN), a .env file,
or prompted for when running in a terminal.
`;

export interface CliOptions {
  query: AuditLogQuery;
  formats: OutputFormat[];
  output?: string;
  columns: CsvColumns;
  apiUrl?: string;
  timeout?: number;
  verbose: boolean;
  quiet: boolean;
}

export type ParsedArgs = { kind: "help" } | { kind: "run"; options: CliOptions };

const flagsSchema = z
  .object({
    enterprise: z.string().optional(),
    org: z.string().optional(),
    format: z.enum(["csv", "json", "both"]).default("json"),
    output: z.string().min(1).optional(),
    columns: z.enum(["first", "union"]).default("first"),
    "per-page": z.coerce.number().int().optional(),
    "api-url": z.string().url().optional(),
    timeout: z.coerce.number().int().positive().optional(),
  })
  .refine((flags) => (flags.enterprise === undefined) !== (flags.org === undefined), {
    message: "pass exactly one of --enterprise or --org",
    path: ["enterprise"],
  })
  .refine((flags) => !(flags.format === "both" && flags.output !== undefined), {
    message: "--output names a single file and cannot be combined with --format both",
    path: ["output"],
  });

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: false,
      strict: true,
      options: {
        enterprise: { type: "string" },
        org: { type: "string" },
        since: { type: "string" },
        action: { type: "string" },
        include: { type: "string" },
        format: { type: "string" },
        output: { type: "string", short: "o" },
        columns: { type: "string" },
        "per-page": { type: "string" },
        "api-url": { type: "string" },
        timeout: { type: "string" },
        verbose: { type: "boolean", short: "v", default: false },
        quiet: { type: "boolean", short: "q", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    }).values;
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigError(reason);
  }
}

export function parseCliArgs(argv: string[]): ParsedArgs {
  const values = parseFlags(argv);
  if (values.help) return { kind: "help" };

  const result = flagsSchema.safeParse(values);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `--${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new ConfigError(issues.join("; "), issues);
  }
  const flags = result.data;

  const query = parseAuditLogQuery({
    scope: flags.org !== undefined ? "organization" : "enterprise",
    name: flags.org ?? flags.enterprise,
    since: values.since,
    action: values.action,
    include: values.include,
    perPage: flags["per-page"],
  });

  return {
    kind: "run",
    options: {
      query,
      formats: flags.format === "both" ? ["json", "csv"] : [flags.format],
      output: flags.output,
      columns: flags.columns,
      apiUrl: flags["api-url"],
      timeout: flags.timeout,
      verbose: values.verbose ?? false,
      quiet: values.quiet ?? false,
    },
  };
}
