import { SessionManifest } from "../types/sessionManifest";
import { readPageBody, readPageHeaders, readStagedFile } from "../io/stagedFiles";
import { ChildUrlInsert, FileInsert, RunMetadataInsert } from "./schema";
import { RunStore } from "./repository";

export interface PersistResult {
  runId: number;
  childUrlsInserted: number;
  childUrlsSkipped: number;
  filesInserted: number;
}

function toDate(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid timestamp in session manifest: ${value}`);
  }
  return date;
}

async function buildRunRow(manifest: SessionManifest, runDirPath: string): Promise<RunMetadataInsert> {
  const row: RunMetadataInsert = {
    url: manifest.source_url,
    uuid: manifest.run_id,
    timestamp: toDate(manifest.started_at)
  };
  if (manifest.page) {
    row.bodyContent = await readPageBody(runDirPath, manifest.page);
    row.bodySha256 = manifest.page.content_hash_sha256;
    row.headers = await readPageHeaders(runDirPath, manifest.page);
  }
  return row;
}

async function buildFileRows(manifest: SessionManifest, runDirPath: string): Promise<FileInsert[]> {
  const rows: FileInsert[] = [];
  for (const file of manifest.files) {
    rows.push({
      fileContents: await readStagedFile(runDirPath, file),
      filename: file.filename,
      fileSha256: file.content_hash_sha256,
      comments: file.comments,
      timestamp: toDate(file.recorded_at)
    });
  }
  return rows;
}

/**
 * Writes a staged run into the ingestion tables. Everything is read and
 * hash-checked from disk before the transaction opens.
 */
export async function persistSession(
  store: RunStore,
  manifest: SessionManifest,
  runDirPath: string
): Promise<PersistResult> {
  const runRow = await buildRunRow(manifest, runDirPath);
  const fileRows = await buildFileRows(manifest, runDirPath);
  const urlRows: ChildUrlInsert[] = manifest.child_urls.map((entry) => ({
    url: entry.url,
    timestamp: toDate(entry.recorded_at)
  }));

  return store.transaction(async (repository) => {
    const runId = await repository.insertRun(runRow);
    const childUrlsInserted = await repository.insertChildUrls(runId, urlRows);
    await repository.insertFiles(runId, fileRows);
    return {
      runId,
      childUrlsInserted,
      childUrlsSkipped: urlRows.length - childUrlsInserted,
      filesInserted: fileRows.length
    };
  });
}
