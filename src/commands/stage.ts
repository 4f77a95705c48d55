import path from "path";
import { Archiver } from "../archiver/archiver";
import { stageSession, StagedSession } from "../io/stageSession";

export interface StageOptions {
  url: string;
  runId: string;
  outDir: string;
  childUrls: string[];
  filePaths: string[];
  comments?: string;
  capture: boolean;
}

export async function runStage(options: StageOptions): Promise<StagedSession> {
  const archiver = new Archiver(options.url, options.runId);
  if (options.capture) {
    await archiver.capturePage();
  }
  for (const url of options.childUrls) {
    archiver.addURL(url);
  }
  for (const filePath of options.filePaths) {
    await archiver.addFileFromPath(filePath, options.comments ?? null);
  }

  const staged = await stageSession(archiver, { outDir: path.resolve(options.outDir) });
  console.log(
    `Staged run ${options.runId}: ${staged.manifest.child_urls.length} URLs, ${staged.manifest.files.length} files -> ${staged.manifestPath}`
  );
  return staged;
}
