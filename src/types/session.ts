export type FileContent = Buffer | Uint8Array | string;

export interface RecordedUrl {
  readonly url: string;
  readonly recordedAt: string;
}

export interface StagedFile {
  readonly filename: string;
  readonly contentHash: string;
  readonly content: Buffer;
  readonly sizeBytes: number;
  readonly comments: string | null;
  readonly recordedAt: string;
}

export interface PageCapture {
  readonly statusCode: number;
  readonly finalUrl: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: Buffer;
  readonly contentHash: string;
  readonly contentType: string | null;
  readonly capturedAt: string;
}

export interface SessionSnapshot {
  url: string;
  runId: string;
  startedAt: string;
  page: PageCapture | null;
  urls: readonly RecordedUrl[];
  files: readonly StagedFile[];
}
