import { FileContent, PageCapture, RecordedUrl, SessionSnapshot, StagedFile } from "../types/session";
import { SessionManifest } from "../types/sessionManifest";
import { capturePage, FetchFn } from "../capture/pageCapture";
import { buildSessionManifest } from "../io/sessionManifest";
import { InvalidInputError, errorMessage } from "../errors";
import { HashedFile, readFileWithHash, sha256 } from "../utils/hash";
import { toUtcIsoSeconds } from "../utils/time";
import { fallbackFilename } from "./filename";

export const DEFAULT_BUFFER_SIZE = 65536;

export interface ArchiverOptions {
  now?: () => Date;
}

export interface OpenArchiverOptions extends ArchiverOptions {
  fetchFn?: FetchFn;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function toBuffer(content: unknown): Buffer {
  if (typeof content === "string") return Buffer.from(content, "utf8");
  if (content instanceof Uint8Array) return Buffer.from(content);
  throw new InvalidInputError(
    `File content must be a Buffer, Uint8Array or string, got ${describeValue(content)}`
  );
}

// Callers get their own bytes; the session's copy only ever matches its hash.
function copyFile(file: StagedFile): StagedFile {
  return Object.freeze({ ...file, content: Buffer.from(file.content) });
}

function copyPage(page: PageCapture): PageCapture {
  return Object.freeze({ ...page, headers: { ...page.headers }, body: Buffer.from(page.body) });
}

function normalizeFilename(filename: string | null | undefined): string | null {
  if (typeof filename !== "string") return null;
  return filename.trim() ? filename : null;
}

/**
 * One scrape session: the page it started from plus every child URL and file
 * the scraper registered, in registration order.
 */
export class Archiver {
  readonly url: string;
  readonly runId: string;
  readonly startedAt: string;

  private readonly now: () => Date;
  private readonly recordedUrls: RecordedUrl[] = [];
  private readonly stagedFiles: StagedFile[] = [];
  private pageCapture: PageCapture | null = null;

  constructor(url: string, runId: string, options: ArchiverOptions = {}) {
    this.url = url;
    this.runId = runId;
    this.now = options.now ?? (() => new Date());
    this.startedAt = this.timestamp();
  }

  static async open(url: string, runId: string, options: OpenArchiverOptions = {}): Promise<Archiver> {
    const archiver = new Archiver(url, runId, options);
    await archiver.capturePage(options.fetchFn);
    return archiver;
  }

  get urls(): readonly RecordedUrl[] {
    return this.recordedUrls;
  }

  get files(): readonly StagedFile[] {
    return this.stagedFiles.map(copyFile);
  }

  get page(): PageCapture | null {
    return this.pageCapture ? copyPage(this.pageCapture) : null;
  }

  async capturePage(fetchFn?: FetchFn): Promise<PageCapture> {
    const page = await capturePage({
      url: this.url,
      fetchFn,
      capturedAt: this.timestamp()
    });
    this.pageCapture = copyPage(page);
    return page;
  }

  addURL(url: string): void {
    this.recordedUrls.push(Object.freeze({ url, recordedAt: this.timestamp() }));
  }

  addFile(content: FileContent, filename?: string | null, comments?: string | null): StagedFile {
    const bytes = toBuffer(content);
    const contentHash = sha256(bytes);
    return this.stage(bytes, contentHash, normalizeFilename(filename), comments);
  }

  async addFileFromPath(
    filePath: string,
    comments?: string | null,
    bufferSize: number = DEFAULT_BUFFER_SIZE
  ): Promise<StagedFile> {
    if (!Number.isInteger(bufferSize) || bufferSize < 0) {
      throw new InvalidInputError(`bufferSize must be a non-negative integer, got ${bufferSize}`);
    }
    let read: HashedFile;
    try {
      read = await readFileWithHash(filePath, bufferSize);
    } catch (error) {
      throw new InvalidInputError(`Cannot read file ${filePath}: ${errorMessage(error)}`);
    }
    return this.stage(read.content, read.contentHash, normalizeFilename(filePath), comments);
  }

  snapshot(): SessionSnapshot {
    return {
      url: this.url,
      runId: this.runId,
      startedAt: this.startedAt,
      page: this.page,
      urls: [...this.recordedUrls],
      files: this.files
    };
  }

  toManifest(): SessionManifest {
    return buildSessionManifest(this.snapshot(), this.timestamp());
  }

  private stage(
    bytes: Buffer,
    contentHash: string,
    filename: string | null,
    comments: string | null | undefined
  ): StagedFile {
    const file: StagedFile = Object.freeze({
      filename: filename ?? fallbackFilename(bytes, contentHash),
      contentHash,
      content: bytes,
      sizeBytes: bytes.length,
      comments: comments ?? null,
      recordedAt: this.timestamp()
    });
    this.stagedFiles.push(file);
    return copyFile(file);
  }

  private timestamp(): string {
    return toUtcIsoSeconds(this.now());
  }
}
