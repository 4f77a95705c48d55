import { PageCapture } from "../types/session";
import { PipelineError } from "../errors";
import { nowUtcIsoSeconds } from "../utils/time";
import { sha256 } from "../utils/hash";

export type FetchFn = typeof fetch;

export interface PageCaptureOptions {
  url: string;
  fetchFn?: FetchFn;
  capturedAt?: string;
}

export async function capturePage(options: PageCaptureOptions): Promise<PageCapture> {
  const fetchFn = options.fetchFn ?? fetch;
  const response = await fetchFn(options.url);
  if (!response.ok) {
    throw new PipelineError(
      `Page fetch failed (${response.status}) for ${options.url}`,
      response.status
    );
  }

  const body = Buffer.from(await response.arrayBuffer());
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });

  return {
    statusCode: response.status,
    finalUrl: response.url || options.url,
    headers,
    body,
    contentHash: sha256(body),
    contentType: response.headers.get("content-type"),
    capturedAt: options.capturedAt ?? nowUtcIsoSeconds()
  };
}
