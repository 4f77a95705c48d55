import { z } from "zod";
import { ConfigError } from "../errors";

export const DEFAULT_IDENT_URL = "https://ident.archivers.space";
export const DEFAULT_OUT_DIR = "./data/archiver";

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  // Checked by requireDatabaseUrl so commands that never connect ignore it.
  DATABASE_URL: optionalText,
  MORPH_DT_API_KEY: optionalText,
  ARCHIVER_IDENT_URL: optionalText.pipe(z.string().url().default(DEFAULT_IDENT_URL)),
  ARCHIVER_OUT_DIR: optionalText.pipe(z.string().default(DEFAULT_OUT_DIR))
});

export type ArchiverConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ArchiverConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

export function requireDatabaseUrl(config: ArchiverConfig): string {
  if (!config.DATABASE_URL) {
    throw new ConfigError("DATABASE_URL is not set in the environment.");
  }
  if (!z.string().url().safeParse(config.DATABASE_URL).success) {
    throw new ConfigError("DATABASE_URL is not a valid URL.");
  }
  return config.DATABASE_URL;
}

export function requireApiKey(config: ArchiverConfig): string {
  if (!config.MORPH_DT_API_KEY) {
    throw new ConfigError(
      "Data Together API key not set. Set the environment variable MORPH_DT_API_KEY to your Data Together API key."
    );
  }
  return config.MORPH_DT_API_KEY;
}
