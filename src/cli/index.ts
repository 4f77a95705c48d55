#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { loadConfig } from "../config/env";
import { runStage } from "../commands/stage";
import { runValidate } from "../commands/validate";
import { runPersistCommand } from "../commands/persist";
import { runCommitCommand } from "../commands/commit";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.ARCHIVER_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

async function main(): Promise<void> {
  const config = loadConfig();
  const program = new Command();

  program
    .name("archivertools")
    .description("Stage scraped URLs and files for the Data Together ingestion pipeline")
    .version(pkg.version);

  program.option(
    "--env-file <path>",
    "Path to .env file (overrides ARCHIVER_ENV_FILE/DOTENV_CONFIG_PATH)",
    envPath
  );

  program
    .command("stage")
    .description("Record a scrape session and write it to a run directory")
    .requiredOption("--url <url>", "Page URL the scrape started from")
    .requiredOption("--run-id <id>", "Run identifier")
    .option("--out <dir>", "Output directory", config.ARCHIVER_OUT_DIR)
    .option("--child <url>", "Child URL to queue for crawling (repeatable)", collect, [])
    .option("--file <path>", "Local file to stage (repeatable)", collect, [])
    .option("--comments <text>", "Comments stored with every staged file")
    .option("--capture", "Fetch the page URL and store its body and headers", false)
    .action(async (opts) => {
      await runStage({
        url: opts.url,
        runId: opts.runId,
        outDir: opts.out,
        childUrls: opts.child,
        filePaths: opts.file,
        comments: opts.comments,
        capture: opts.capture
      });
    });

  program
    .command("validate")
    .description("Check a run directory against its manifest")
    .requiredOption("--run <path>", "Run directory to validate")
    .action(async (opts) => {
      await runValidate({ runDir: opts.run });
    });

  program
    .command("persist")
    .description("Write a staged run to the database")
    .requiredOption("--run <path>", "Run directory to persist")
    .action(async (opts) => {
      await runPersistCommand({ runDir: opts.run, config });
    });

  program
    .command("commit")
    .description("Notify Data Together that the scrape has completed")
    .action(async () => {
      await runCommitCommand({ config });
    });

  await program.parseAsync();
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
