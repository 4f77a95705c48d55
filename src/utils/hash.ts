import { createHash } from "crypto";
import { createReadStream, promises as fs } from "fs";

export function sha256(content: string | Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Streams a file through SHA-256 in `bufferSize` chunks so large downloads
 * never sit in memory twice. A `bufferSize` of 0 hashes the file in one read.
 */
export async function sha256File(filePath: string, bufferSize: number): Promise<string> {
  if (bufferSize === 0) {
    return sha256(await fs.readFile(filePath));
  }
  const hasher = createHash("sha256");
  const stream = createReadStream(filePath, { highWaterMark: bufferSize });
  return await new Promise<string>((resolve, reject) => {
    stream.on("data", (chunk) => hasher.update(chunk));
    stream.on("error", reject);
    stream.on("end", () => resolve(hasher.digest("hex")));
  });
}

export interface HashedFile {
  content: Buffer;
  contentHash: string;
}

/**
 * Reads a file once in `bufferSize` chunks, hashing exactly the bytes it
 * returns. A `bufferSize` of 0 reads the file in one go.
 */
export async function readFileWithHash(filePath: string, bufferSize: number): Promise<HashedFile> {
  if (bufferSize === 0) {
    const content = await fs.readFile(filePath);
    return { content, contentHash: sha256(content) };
  }
  const hasher = createHash("sha256");
  const chunks: Buffer[] = [];
  const stream = createReadStream(filePath, { highWaterMark: bufferSize });
  return await new Promise<HashedFile>((resolve, reject) => {
    stream.on("data", (chunk) => {
      const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
      hasher.update(bytes);
      chunks.push(bytes);
    });
    stream.on("error", reject);
    stream.on("end", () => resolve({ content: Buffer.concat(chunks), contentHash: hasher.digest("hex") }));
  });
}
