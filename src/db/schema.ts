import {
  pgTable,
  text,
  timestamp,
  jsonb,
  integer,
  serial,
  index,
  uniqueIndex,
  customType
} from "drizzle-orm/pg-core";

const bytea = customType<{ data: Buffer; driverData: Buffer }>({
  dataType() {
    return "bytea";
  }
});

export const runsMetadata = pgTable("runs_metadata", {
  runId: serial("run_id").primaryKey(),
  url: text("url").notNull(),
  uuid: text("uuid").notNull(),
  timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),
  bodyContent: bytea("body_content"),
  bodySha256: text("body_sha256"),
  headers: jsonb("headers").$type<Record<string, string>>()
});

export const files = pgTable(
  "files",
  {
    fileId: serial("file_id").primaryKey(),
    runId: integer("run_id")
      .notNull()
      .references(() => runsMetadata.runId),
    fileContents: bytea("file_contents").notNull(),
    filename: text("filename").notNull(),
    fileSha256: text("file_sha256").notNull(),
    comments: text("comments"),
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull()
  },
  (table) => ({
    filesRunIdx: index("files_run_idx").on(table.runId)
  })
);

export const childUrls = pgTable(
  "child_urls",
  {
    urlId: serial("url_id").primaryKey(),
    url: text("url").notNull(),
    runId: integer("run_id")
      .notNull()
      .references(() => runsMetadata.runId),
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull()
  },
  (table) => ({
    childUrlsUrlUnique: uniqueIndex("child_urls_url_idx").on(table.url),
    childUrlsRunIdx: index("child_urls_run_idx").on(table.runId)
  })
);

export type RunMetadataInsert = typeof runsMetadata.$inferInsert;
export type FileInsert = Omit<typeof files.$inferInsert, "runId">;
export type ChildUrlInsert = Omit<typeof childUrls.$inferInsert, "runId">;
