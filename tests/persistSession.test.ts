import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { Archiver } from "../src/archiver/archiver";
import { stageSession } from "../src/io/stageSession";
import { persistSession } from "../src/db/persistSession";
import { RunRepository, RunStore } from "../src/db/repository";
import { ChildUrlInsert, FileInsert, RunMetadataInsert } from "../src/db/schema";
import { sha256 } from "../src/utils/hash";

interface StoredChildUrl extends ChildUrlInsert {
  runId: number;
}

interface StoredFile extends FileInsert {
  runId: number;
}

class MemoryRunStore implements RunStore, RunRepository {
  runs: RunMetadataInsert[] = [];
  childUrls: StoredChildUrl[] = [];
  files: StoredFile[] = [];
  transactions = 0;

  async transaction<T>(work: (repository: RunRepository) => Promise<T>): Promise<T> {
    this.transactions += 1;
    return work(this);
  }

  async insertRun(row: RunMetadataInsert): Promise<number> {
    this.runs.push(row);
    return this.runs.length;
  }

  async insertChildUrls(runId: number, rows: ChildUrlInsert[]): Promise<number> {
    let inserted = 0;
    for (const row of rows) {
      if (this.childUrls.some((existing) => existing.url === row.url)) continue;
      this.childUrls.push({ ...row, runId });
      inserted += 1;
    }
    return inserted;
  }

  async insertFiles(runId: number, rows: FileInsert[]): Promise<void> {
    this.files.push(...rows.map((row) => ({ ...row, runId })));
  }
}

const fixedClock = () => new Date("2026-01-05T10:00:00Z");
let outDir: string;

beforeEach(async () => {
  outDir = await fs.mkdtemp(path.join(os.tmpdir(), "archiver-persist-"));
});

afterEach(async () => {
  await fs.rm(outDir, { recursive: true, force: true });
});

describe("persistSession", () => {
  it("writes the run, its child URLs and its files in one transaction", async () => {
    const fetchFn = vi.fn(
      async (_input: Parameters<typeof fetch>[0]) =>
        new Response("<html>start</html>", { status: 200, headers: { "content-type": "text/html" } })
    );
    const archiver = await Archiver.open("http://example.org/page1", "run-001", { now: fixedClock, fetchFn });
    archiver.addURL("http://example.org/page2");
    archiver.addURL("http://example.org/page3");
    archiver.addURL("http://example.org/page2");
    archiver.addFile("hello", "a.txt", "greeting");
    const staged = await stageSession(archiver, { outDir });

    const store = new MemoryRunStore();
    const result = await persistSession(store, staged.manifest, staged.runDir);

    expect(result).toEqual({ runId: 1, childUrlsInserted: 2, childUrlsSkipped: 1, filesInserted: 1 });
    expect(store.transactions).toBe(1);
    expect(store.runs).toEqual([
      {
        url: "http://example.org/page1",
        uuid: "run-001",
        timestamp: new Date("2026-01-05T10:00:00Z"),
        bodyContent: Buffer.from("<html>start</html>"),
        bodySha256: sha256("<html>start</html>"),
        headers: { "content-type": "text/html" }
      }
    ]);
    expect(store.childUrls.map((row) => row.url)).toEqual([
      "http://example.org/page2",
      "http://example.org/page3"
    ]);
    expect(store.files).toEqual([
      {
        runId: 1,
        fileContents: Buffer.from("hello"),
        filename: "a.txt",
        fileSha256: sha256("hello"),
        comments: "greeting",
        timestamp: new Date("2026-01-05T10:00:00Z")
      }
    ]);
  });

  it("leaves page columns unset when no page was captured", async () => {
    const archiver = new Archiver("http://example.org/page1", "run-002", { now: fixedClock });
    const staged = await stageSession(archiver, { outDir });

    const store = new MemoryRunStore();
    await persistSession(store, staged.manifest, staged.runDir);

    expect(store.runs).toEqual([
      { url: "http://example.org/page1", uuid: "run-002", timestamp: new Date("2026-01-05T10:00:00Z") }
    ]);
  });

  it("skips child URLs an earlier run already queued", async () => {
    const store = new MemoryRunStore();

    const first = new Archiver("http://example.org/page1", "run-010", { now: fixedClock });
    first.addURL("http://example.org/page2");
    const firstStaged = await stageSession(first, { outDir });
    const firstResult = await persistSession(store, firstStaged.manifest, firstStaged.runDir);

    const second = new Archiver("http://example.org/page1", "run-011", { now: fixedClock });
    second.addURL("http://example.org/page2");
    second.addURL("http://example.org/page4");
    const secondStaged = await stageSession(second, { outDir });
    const secondResult = await persistSession(store, secondStaged.manifest, secondStaged.runDir);

    expect(firstResult).toEqual({ runId: 1, childUrlsInserted: 1, childUrlsSkipped: 0, filesInserted: 0 });
    expect(secondResult).toEqual({ runId: 2, childUrlsInserted: 1, childUrlsSkipped: 1, filesInserted: 0 });
    expect(store.childUrls.map((row) => [row.runId, row.url])).toEqual([
      [1, "http://example.org/page2"],
      [2, "http://example.org/page4"]
    ]);
  });

  it("does not open a transaction when a staged file fails its hash check", async () => {
    const archiver = new Archiver("http://example.org/page1", "run-003", { now: fixedClock });
    archiver.addFile("hello", "a.txt");
    const staged = await stageSession(archiver, { outDir });
    await fs.writeFile(path.join(staged.runDir, "files", sha256("hello"), "a.txt"), "changed");

    const store = new MemoryRunStore();
    await expect(persistSession(store, staged.manifest, staged.runDir)).rejects.toThrow(/Hash mismatch/);
    expect(store.transactions).toBe(0);
  });
});
