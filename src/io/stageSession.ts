import { Archiver } from "../archiver/archiver";
import { SessionManifest } from "../types/sessionManifest";
import { resolveInRun, runDir } from "./paths";
import { writeSessionManifest } from "./sessionManifest";
import { ensureDir, writeBinary, writeJson } from "../utils/fs";
import { assertValidSessionManifest } from "../validation/jsonSchema";

export interface StageSessionOptions {
  outDir: string;
}

export interface StagedSession {
  runDir: string;
  manifestPath: string;
  manifest: SessionManifest;
}

export async function stageSession(
  archiver: Archiver,
  options: StageSessionOptions
): Promise<StagedSession> {
  const manifest = assertValidSessionManifest(archiver.toManifest(), `Session ${archiver.runId}`);
  const runRoot = runDir(options.outDir, manifest.run_id);
  await ensureDir(runRoot);

  const page = archiver.page;
  if (page && manifest.page) {
    await writeBinary(resolveInRun(runRoot, manifest.page.body_path), page.body);
    await writeJson(resolveInRun(runRoot, manifest.page.headers_path), page.headers);
  }

  // Same hash and name map to the same stored path; writing it twice is harmless.
  for (const [index, file] of archiver.files.entries()) {
    await writeBinary(resolveInRun(runRoot, manifest.files[index].stored_path), file.content);
  }

  const manifestPath = await writeSessionManifest(options.outDir, manifest);
  return { runDir: runRoot, manifestPath, manifest };
}
