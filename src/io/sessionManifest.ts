import { SessionSnapshot } from "../types/session";
import { SessionManifest } from "../types/sessionManifest";
import { pageBodyPath, pageHeadersPath, sessionManifestPath, stagedFilePath } from "./paths";
import { readJson, writeJson } from "../utils/fs";
import { assertValidSessionManifest } from "../validation/jsonSchema";

export function buildSessionManifest(session: SessionSnapshot, endedAt: string): SessionManifest {
  const page = session.page;
  return {
    schema_version: "1.0",
    run_id: session.runId,
    source_url: session.url,
    started_at: session.startedAt,
    ended_at: endedAt,
    page: page
      ? {
          status_code: page.statusCode,
          final_url: page.finalUrl,
          content_type: page.contentType,
          content_hash_sha256: page.contentHash,
          size_bytes: page.body.length,
          captured_at: page.capturedAt,
          body_path: pageBodyPath(page),
          headers_path: pageHeadersPath()
        }
      : null,
    child_urls: session.urls.map((entry) => ({ url: entry.url, recorded_at: entry.recordedAt })),
    files: session.files.map((file) => ({
      filename: file.filename,
      stored_path: stagedFilePath(file.contentHash, file.filename),
      content_hash_sha256: file.contentHash,
      size_bytes: file.sizeBytes,
      comments: file.comments,
      recorded_at: file.recordedAt
    }))
  };
}

export async function writeSessionManifest(outDir: string, manifest: SessionManifest): Promise<string> {
  const filePath = sessionManifestPath(outDir, manifest.run_id);
  await writeJson(filePath, manifest);
  return filePath;
}

export async function readSessionManifest(filePath: string): Promise<SessionManifest> {
  const data = await readJson(filePath);
  return assertValidSessionManifest(data, filePath);
}
