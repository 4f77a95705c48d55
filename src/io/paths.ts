import path from "path";
import { fallbackFilename, storageName } from "../archiver/filename";
import { PageCapture } from "../types/session";
import { InvalidInputError } from "../errors";

export const SESSION_MANIFEST_NAME = "session_manifest.json";

// The run id names a single directory directly under the output directory.
export function assertRunIdSegment(runId: string): void {
  if (!runId || runId === "." || runId === ".." || /[\\/\0]/.test(runId)) {
    throw new InvalidInputError(`Run id ${JSON.stringify(runId)} cannot be used as a directory name`);
  }
}

export function runDir(outDir: string, runId: string): string {
  assertRunIdSegment(runId);
  return path.join(outDir, runId);
}

export function sessionManifestPath(outDir: string, runId: string): string {
  return path.join(runDir(outDir, runId), SESSION_MANIFEST_NAME);
}

// Paths below are relative to the run directory and always use "/" so the
// manifest reads the same on every platform.

export function stagedFilePath(contentHash: string, filename: string): string {
  return ["files", contentHash, storageName(filename)].join("/");
}

export function pageBodyPath(page: PageCapture): string {
  return ["page", fallbackFilename(page.body, page.contentHash, page.contentType)].join("/");
}

export function pageHeadersPath(): string {
  return "page/headers.json";
}

export function resolveInRun(runDirPath: string, relativePath: string): string {
  return path.resolve(runDirPath, ...relativePath.split("/"));
}
