import path from "path";
import { ArchiverConfig, requireDatabaseUrl } from "../config/env";
import { closePool, getDb, DrizzleRunStore, persistSession } from "../db";
import { SESSION_MANIFEST_NAME } from "../io/paths";
import { readSessionManifest } from "../io/sessionManifest";

export interface PersistOptions {
  runDir: string;
  config: ArchiverConfig;
}

export async function runPersistCommand(options: PersistOptions): Promise<void> {
  const runDir = path.resolve(options.runDir);
  const manifest = await readSessionManifest(path.join(runDir, SESSION_MANIFEST_NAME));
  const db = getDb(requireDatabaseUrl(options.config));
  try {
    const result = await persistSession(new DrizzleRunStore(db), manifest, runDir);
    console.log(
      `Persisted run ${manifest.run_id} as runs_metadata.run_id=${result.runId} ` +
        `(${result.filesInserted} files, ${result.childUrlsInserted} child URLs, ${result.childUrlsSkipped} duplicates skipped).`
    );
  } finally {
    await closePool();
  }
}
