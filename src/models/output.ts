export type OutputFormat = "csv" | "json";

/**
 * `first` takes CSV columns from the first record only, dropping keys that
 * appear later. `union` collects every key across all records.
 */
export type CsvColumns = "first" | "union";

export interface OutputTarget {
  format: OutputFormat;
  path: string;
}

export interface WriteOptions {
  columns?: CsvColumns;
}

export interface ExportResult {
  count: number;
  files: string[];
}
