import { promises as fs } from "fs";
import { z } from "zod";
import { SessionManifestFile, SessionManifestPage } from "../types/sessionManifest";
import { InvalidInputError } from "../errors";
import { sha256 } from "../utils/hash";
import { readJson } from "../utils/fs";
import { resolveInRun } from "./paths";

const HeadersSchema = z.record(z.string());

async function readVerified(runDirPath: string, relativePath: string, expectedHash: string): Promise<Buffer> {
  const content = await fs.readFile(resolveInRun(runDirPath, relativePath));
  const actual = sha256(content);
  if (actual !== expectedHash) {
    throw new InvalidInputError(
      `Hash mismatch for ${relativePath}: manifest has ${expectedHash}, file hashes to ${actual}`
    );
  }
  return content;
}

export async function readStagedFile(runDirPath: string, file: SessionManifestFile): Promise<Buffer> {
  return readVerified(runDirPath, file.stored_path, file.content_hash_sha256);
}

export async function readPageBody(runDirPath: string, page: SessionManifestPage): Promise<Buffer> {
  return readVerified(runDirPath, page.body_path, page.content_hash_sha256);
}

export async function readPageHeaders(
  runDirPath: string,
  page: SessionManifestPage
): Promise<Record<string, string>> {
  const data = await readJson(resolveInRun(runDirPath, page.headers_path));
  return HeadersSchema.parse(data);
}
