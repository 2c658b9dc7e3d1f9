import { rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { WriteError } from "./errors";
import type { AuditRecord, CsvColumns, OutputFormat, ResultSet, WriteOptions } from "./models";

type FlatRecord = Record<string, unknown>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Flattens nested objects into `parent_child` keys. Arrays stay whole and
 * are written as JSON text. When two paths flatten to the same key (`a_b`
 * next to `a: { b }`) the one that comes later in the record wins.
 */
export function flattenRecord(record: AuditRecord, prefix = ""): FlatRecord {
  // No prototype, so a `__proto__` key is stored like any other.
  const flat: FlatRecord = Object.create(null);
  for (const [key, value] of Object.entries(record)) {
    const name = prefix ? `${prefix}_${key}` : key;
    if (isPlainObject(value)) {
      Object.assign(flat, flattenRecord(value, name));
    } else {
      flat[name] = value;
    }
  }
  return flat;
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  return JSON.stringify(value);
}

export function escapeCsvField(field: string): string {
  return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

export function csvColumns(rows: FlatRecord[], mode: CsvColumns): string[] {
  if (rows.length === 0) return [];
  if (mode === "first") return Object.keys(rows[0]);

  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key);
  }
  return [...columns];
}

/**
 * Serializes records as CSV. With `columns: "first"` (the default) keys that
 * the first record lacks are dropped from every row.
 */
export function toCsv(results: ResultSet, options: WriteOptions = {}): string {
  if (results.length === 0) return "";

  const rows = results.map((record) => flattenRecord(record));
  const columns = csvColumns(rows, options.columns ?? "first");
  const lines = [columns.map(escapeCsvField).join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsvField(formatCell(row[column]))).join(","));
  }
  return `${lines.join("\n")}\n`;
}

export function toJson(results: ResultSet): string {
  return `${JSON.stringify(results, null, 2)}\n`;
}

export function serialize(results: ResultSet, format: OutputFormat, options: WriteOptions = {}): string {
  return format === "csv" ? toCsv(results, options) : toJson(results);
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `audit_log_YYYYMMDD_HHMMSS.<format>` in local time. */
export function defaultOutputPath(format: OutputFormat, now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `audit_log_${date}_${time}.${format}`;
}

/** Output serialized to a temporary sibling of `path`, not yet in place. */
export interface StagedFile {
  path: string;
  tmp: string;
}

let stageCounter = 0;

function failure(path: string, e: unknown): WriteError {
  const reason = e instanceof Error ? e.message : String(e);
  return new WriteError(`Could not write ${path}: ${reason}`, path, e);
}

export async function stage(
  results: ResultSet,
  format: OutputFormat,
  path: string,
  options: WriteOptions = {},
): Promise<StagedFile> {
  const content = serialize(results, format, options);
  stageCounter++;
  const tmp = join(
    dirname(path),
    `.${basename(path)}.${process.pid}.${Date.now()}.${stageCounter}.tmp`,
  );

  try {
    await writeFile(tmp, content, "utf8");
  } catch (e) {
    await rm(tmp, { force: true });
    throw failure(path, e);
  }
  return { path, tmp };
}

/** Renames a staged file over its target. */
export async function commit(file: StagedFile): Promise<string> {
  try {
    await rename(file.tmp, file.path);
  } catch (e) {
    await discard(file);
    throw failure(file.path, e);
  }
  return file.path;
}

export async function discard(file: StagedFile): Promise<void> {
  await rm(file.tmp, { force: true });
}

/**
 * Writes to a temporary sibling first and renames it over `path`, so a
 * failed write never leaves a truncated file behind.
 */
export async function write(
  results: ResultSet,
  format: OutputFormat,
  path: string,
  options: WriteOptions = {},
): Promise<string> {
  return commit(await stage(results, format, path, options));
}
