export { getDb, getPool, closePool } from "./client";
export * as schema from "./schema";
export { DrizzleRunRepository, DrizzleRunStore } from "./repository";
export type { RunRepository, RunStore } from "./repository";
export { persistSession } from "./persistSession";
export type { PersistResult } from "./persistSession";
