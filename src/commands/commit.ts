import { ArchiverConfig, requireApiKey } from "../config/env";
import { commitRun } from "../pipeline/commit";

export interface CommitCommandOptions {
  config: ArchiverConfig;
}

export async function runCommitCommand(options: CommitCommandOptions): Promise<void> {
  await commitRun({
    apiKey: requireApiKey(options.config),
    identUrl: options.config.ARCHIVER_IDENT_URL
  });
}
