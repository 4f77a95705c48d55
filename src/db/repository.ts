import { NodePgDatabase } from "drizzle-orm/node-postgres";
import * as schema from "./schema";
import { ChildUrlInsert, FileInsert, RunMetadataInsert } from "./schema";

export interface RunRepository {
  insertRun(row: RunMetadataInsert): Promise<number>;
  /** Returns how many rows were new; a URL already queued by any run is skipped. */
  insertChildUrls(runId: number, rows: ChildUrlInsert[]): Promise<number>;
  insertFiles(runId: number, rows: FileInsert[]): Promise<void>;
}

export interface RunStore {
  transaction<T>(work: (repository: RunRepository) => Promise<T>): Promise<T>;
}

type DbExecutor = Pick<NodePgDatabase, "insert">;

export class DrizzleRunRepository implements RunRepository {
  constructor(private readonly db: DbExecutor) {}

  async insertRun(row: RunMetadataInsert): Promise<number> {
    const [inserted] = await this.db
      .insert(schema.runsMetadata)
      .values(row)
      .returning({ runId: schema.runsMetadata.runId });
    if (!inserted) {
      throw new Error(`Insert into runs_metadata returned no row for ${row.url}`);
    }
    return inserted.runId;
  }

  async insertChildUrls(runId: number, rows: ChildUrlInsert[]): Promise<number> {
    if (rows.length === 0) return 0;
    const inserted = await this.db
      .insert(schema.childUrls)
      .values(rows.map((row) => ({ ...row, runId })))
      .onConflictDoNothing({ target: schema.childUrls.url })
      .returning({ urlId: schema.childUrls.urlId });
    return inserted.length;
  }

  async insertFiles(runId: number, rows: FileInsert[]): Promise<void> {
    if (rows.length === 0) return;
    await this.db.insert(schema.files).values(rows.map((row) => ({ ...row, runId })));
  }
}

export class DrizzleRunStore implements RunStore {
  constructor(private readonly db: NodePgDatabase) {}

  async transaction<T>(work: (repository: RunRepository) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => work(new DrizzleRunRepository(tx)));
  }
}
