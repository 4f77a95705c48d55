export { Archiver, DEFAULT_BUFFER_SIZE } from "./archiver/archiver";
export type { ArchiverOptions, OpenArchiverOptions } from "./archiver/archiver";
export { fallbackFilename, sniffExtension, storageName } from "./archiver/filename";
export { capturePage } from "./capture/pageCapture";
export type { FetchFn, PageCaptureOptions } from "./capture/pageCapture";
export { loadConfig, requireApiKey, requireDatabaseUrl } from "./config/env";
export type { ArchiverConfig } from "./config/env";
export { InvalidInputError, ConfigError, PipelineError } from "./errors";
export { buildSessionManifest, readSessionManifest, writeSessionManifest } from "./io/sessionManifest";
export { stageSession } from "./io/stageSession";
export type { StagedSession, StageSessionOptions } from "./io/stageSession";
export { commitRun } from "./pipeline/commit";
export type { CommitOptions, CommitResult } from "./pipeline/commit";
export { persistSession, DrizzleRunStore } from "./db";
export type { RunRepository, RunStore, PersistResult } from "./db";
export { sha256, sha256File, readFileWithHash } from "./utils/hash";
export type { FileContent, PageCapture, RecordedUrl, StagedFile } from "./types/session";
export type { SessionManifest } from "./types/sessionManifest";
