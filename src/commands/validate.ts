import path from "path";
import { SESSION_MANIFEST_NAME } from "../io/paths";
import { readSessionManifest } from "../io/sessionManifest";
import { readPageBody, readStagedFile } from "../io/stagedFiles";
import { SessionManifest } from "../types/sessionManifest";

export interface ValidateOptions {
  runDir: string;
}

export async function validateRun(options: ValidateOptions): Promise<SessionManifest> {
  const runDir = path.resolve(options.runDir);
  const manifest = await readSessionManifest(path.join(runDir, SESSION_MANIFEST_NAME));

  if (manifest.page) {
    await readPageBody(runDir, manifest.page);
  }
  for (const file of manifest.files) {
    await readStagedFile(runDir, file);
  }
  return manifest;
}

export async function runValidate(options: ValidateOptions): Promise<void> {
  const manifest = await validateRun(options);
  console.log(`Run ${manifest.run_id} is valid (${manifest.files.length} files verified).`);
}
