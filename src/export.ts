import { rm } from "node:fs/promises";
import type { PaginatedFetcher } from "./fetcher";
import type { ExportResult, OutputTarget, WriteOptions } from "./models";
import type { StagedFile } from "./writer";
import { commit, discard, stage } from "./writer";

export interface ExportRequest {
  fetcher: PaginatedFetcher;
  url: string;
  credential: string;
  outputs: OutputTarget[];
  writeOptions?: WriteOptions;
}

/**
 * Collects every page before touching the filesystem, then stages every
 * output before renaming any into place. On failure no output is left.
 */
export async function exportAuditLog(request: ExportRequest): Promise<ExportResult> {
  const results = await request.fetcher.fetch(request.url, request.credential);

  const staged: StagedFile[] = [];
  try {
    for (const output of request.outputs) {
      staged.push(await stage(results, output.format, output.path, request.writeOptions));
    }
  } catch (e) {
    await Promise.all(staged.map(discard));
    throw e;
  }

  const files: string[] = [];
  for (const [index, file] of staged.entries()) {
    try {
      files.push(await commit(file));
    } catch (e) {
      await Promise.all(staged.slice(index + 1).map(discard));
      await Promise.all(files.map((path) => rm(path, { force: true })));
      throw e;
    }
  }
  return { count: results.length, files };
}
