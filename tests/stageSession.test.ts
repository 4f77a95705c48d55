import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { Archiver } from "../src/archiver/archiver";
import { stageSession } from "../src/io/stageSession";
import { readSessionManifest } from "../src/io/sessionManifest";
import { validateRun } from "../src/commands/validate";
import { InvalidInputError } from "../src/errors";
import { sha256 } from "../src/utils/hash";

const fixedClock = () => new Date("2026-01-05T10:00:00Z");
const PAGE_HTML = "<!doctype html><html><a href='/page2'>next</a></html>";

let outDir: string;

beforeEach(async () => {
  outDir = await fs.mkdtemp(path.join(os.tmpdir(), "archiver-stage-"));
});

afterEach(async () => {
  await fs.rm(outDir, { recursive: true, force: true });
});

async function buildSession(): Promise<Archiver> {
  const fetchFn = vi.fn(
    async (_input: Parameters<typeof fetch>[0]) =>
      new Response(PAGE_HTML, { status: 200, headers: { "content-type": "text/html; charset=utf-8" } })
  );
  const archiver = await Archiver.open("http://example.org/page1", "run-001", {
    now: fixedClock,
    fetchFn
  });
  archiver.addURL("http://example.org/page2");
  archiver.addFile("hello", "a.txt");
  archiver.addFile("hello", "a.txt", "same bytes, same name");
  archiver.addFile(Buffer.from("%PDF-1.4\n"), undefined, "fare table");
  return archiver;
}

describe("stageSession", () => {
  it("writes page, files and manifest under the run directory", async () => {
    const staged = await stageSession(await buildSession(), { outDir });
    const runDir = path.join(outDir, "run-001");
    const pageHash = sha256(PAGE_HTML);
    const pdfHash = sha256("%PDF-1.4\n");

    expect(staged.runDir).toBe(runDir);
    expect(staged.manifestPath).toBe(path.join(runDir, "session_manifest.json"));
    expect(staged.manifest.page?.body_path).toBe(`page/file-${pageHash.slice(0, 12)}.html`);
    expect(staged.manifest.files.map((file) => file.stored_path)).toEqual([
      `files/${sha256("hello")}/a.txt`,
      `files/${sha256("hello")}/a.txt`,
      `files/${pdfHash}/file-${pdfHash.slice(0, 12)}.pdf`
    ]);

    const body = await fs.readFile(path.join(runDir, "page", `file-${pageHash.slice(0, 12)}.html`), "utf8");
    expect(body).toBe(PAGE_HTML);
    const headers = JSON.parse(await fs.readFile(path.join(runDir, "page", "headers.json"), "utf8"));
    expect(headers).toEqual({ "content-type": "text/html; charset=utf-8" });
    const stored = await fs.readFile(path.join(runDir, "files", sha256("hello"), "a.txt"), "utf8");
    expect(stored).toBe("hello");

    expect(await readSessionManifest(staged.manifestPath)).toEqual(staged.manifest);
  });

  it("stages a session without a page capture", async () => {
    const archiver = new Archiver("http://example.org/page1", "run-002", { now: fixedClock });
    archiver.addURL("http://example.org/page9");

    const staged = await stageSession(archiver, { outDir });
    expect(staged.manifest.page).toBeNull();
    expect(staged.manifest.child_urls).toEqual([
      { url: "http://example.org/page9", recorded_at: "2026-01-05T10:00:00Z" }
    ]);
    expect((await validateRun({ runDir: staged.runDir })).run_id).toBe("run-002");
  });

  it("rejects an empty run id before writing anything", async () => {
    const archiver = new Archiver("http://example.org/page1", "", { now: fixedClock });

    const failure = stageSession(archiver, { outDir });
    await expect(failure).rejects.toBeInstanceOf(InvalidInputError);
    await expect(failure).rejects.toThrow("/run_id must NOT have fewer than 1 characters");
    expect(await fs.readdir(outDir)).toEqual([]);
  });

  it("rejects run ids that would leave the output directory", async () => {
    const nestedOut = path.join(outDir, "out");
    for (const runId of ["../escaped", "a/b", "..", "."]) {
      const archiver = new Archiver("http://example.org/page1", runId, { now: fixedClock });
      await expect(stageSession(archiver, { outDir: nestedOut })).rejects.toThrow(
        `Run id ${JSON.stringify(runId)} cannot be used as a directory name`
      );
    }
    expect(await fs.readdir(outDir)).toEqual([]);
  });

  it("stages the registered bytes even if the caller edits returned content", async () => {
    const archiver = new Archiver("http://example.org/page1", "run-004", { now: fixedClock });
    const returned = archiver.addFile("hello", "a.txt");
    returned.content[0] = 0x4a;
    archiver.files[0].content[1] = 0x4a;

    const staged = await stageSession(archiver, { outDir });
    const stored = await fs.readFile(path.join(staged.runDir, "files", sha256("hello"), "a.txt"), "utf8");
    expect(stored).toBe("hello");
    expect((await validateRun({ runDir: staged.runDir })).files[0].content_hash_sha256).toBe(sha256("hello"));
  });
});

describe("validateRun", () => {
  it("accepts an untouched run", async () => {
    const staged = await stageSession(await buildSession(), { outDir });
    const manifest = await validateRun({ runDir: staged.runDir });
    expect(manifest.files).toHaveLength(3);
  });

  it("reports a staged file whose bytes changed", async () => {
    const staged = await stageSession(await buildSession(), { outDir });
    await fs.writeFile(path.join(staged.runDir, "files", sha256("hello"), "a.txt"), "tampered");

    await expect(validateRun({ runDir: staged.runDir })).rejects.toThrow(
      `Hash mismatch for files/${sha256("hello")}/a.txt`
    );
  });

  it("rejects a manifest that does not match the schema", async () => {
    const staged = await stageSession(await buildSession(), { outDir });
    const manifest = JSON.parse(await fs.readFile(staged.manifestPath, "utf8"));
    manifest.files[0].content_hash_sha256 = "not-a-hash";
    delete manifest.child_urls;
    await fs.writeFile(staged.manifestPath, JSON.stringify(manifest));

    const failure = validateRun({ runDir: staged.runDir });
    await expect(failure).rejects.toBeInstanceOf(InvalidInputError);
    await expect(failure).rejects.toThrow(/failed schema validation/);
  });
});
