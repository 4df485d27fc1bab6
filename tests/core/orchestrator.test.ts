import { existsSync } from "node:fs";
import { mkdir, mkdtemp, realpath, rm, utimes, writeFile } from "node:fs/promises";
import { createServer, type Server } from "node:net";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { ensureRepository, runBackup } from "../../src/core/index.js";
import { decodeMetadata } from "../../src/store/index.js";
import type { ResolvedRepository } from "../../src/types/index.js";
import { computePathHash } from "../../src/utils/index.js";
import { MemoryArchiveStore } from "../helpers/memory-store.js";

const T1 = new Date("2024-06-01T12:00:00Z");
const T2 = new Date("2024-06-02T12:00:00Z");
const T3 = new Date("2024-06-03T12:00:00Z");
const FIXED_MTIME = new Date("2024-05-01T00:00:00Z");

function makeRepository(sourceDir: string, overrides: Partial<ResolvedRepository> = {}): ResolvedRepository {
  return {
    name: "docs",
    path: "/backups/docs",
    retentionMode: "per_file",
    paranoid: false,
    compression: "lz4",
    encryption: "repokey",
    autoInit: false,
    allowRemoveSource: false,
    sources: [{ path: sourceDir }],
    retention: { keepDaily: 7 },
    exclude: [],
    ...overrides,
  };
}

async function listenOnSocket(socketPath: string): Promise<Server> {
  const server = createServer();
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(socketPath, () => resolve());
  });
  return server;
}

async function closeServer(server: Server): Promise<void> {
  await new Promise<void>((resolve) => server.close(() => resolve()));
}

describe("runBackup", () => {
  let tempDir: string;
  let sourceDir: string;
  let store: MemoryArchiveStore;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});

    tempDir = await mkdtemp(path.join(os.tmpdir(), "borgkeep-backup-test-"));
    sourceDir = path.join(tempDir, "docs");
    await mkdir(sourceDir, { recursive: true });
    await writeFile(path.join(sourceDir, "a.txt"), "alpha");
    await writeFile(path.join(sourceDir, "b.txt"), "bravo");

    store = new MemoryArchiveStore();
    store.now = () => T1;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("per_file mode", () => {
    test("creates one archive per file with encoded metadata", async () => {
      const fileA = path.join(sourceDir, "a.txt");
      const result = await runBackup(store, makeRepository(sourceDir), { now: T1 });

      expect(result.created).toBe(2);
      expect(result.versioned).toBe(0);
      expect(result.skipped).toBe(0);
      expect(result.failures).toEqual([]);
      expect(store.names()[0]).toBe(`docs-a.txt-${computePathHash(fileA)}-2024-06-01_12-00-00`);

      const comment = store.archives[0]?.comment ?? "";
      expect(decodeMetadata(comment)).toEqual({ sourcePath: fileA, size: 5, sourceDir });
      expect(store.archives[0]?.paths).toEqual([fileA]);
    });

    test("a second run over unchanged files creates nothing", async () => {
      const repository = makeRepository(sourceDir);
      await runBackup(store, repository, { now: T1 });

      store.now = () => T2;
      const second = await runBackup(store, repository, { now: T2 });

      expect(second.created).toBe(0);
      expect(second.versioned).toBe(0);
      expect(second.skipped).toBe(2);
      expect(store.archives).toHaveLength(2);
      expect(second.outcomes.map((o) => o.decision.action)).toEqual(["skip", "skip"]);
    });

    test("a changed file gets a versioned archive", async () => {
      const repository = makeRepository(sourceDir);
      const fileA = path.join(sourceDir, "a.txt");
      await runBackup(store, repository, { now: T1 });

      await writeFile(fileA, "alpha, revised");
      store.now = () => T2;
      const second = await runBackup(store, repository, { now: T2 });

      expect(second.versioned).toBe(1);
      expect(second.skipped).toBe(1);
      expect(second.archives).toEqual([
        `docs-a.txt-${computePathHash(fileA)}-2024-06-02_12-00-00-v2`,
      ]);
    });

    test("versions keep rising across runs in the same second", async () => {
      const repository = makeRepository(sourceDir);
      const fileA = path.join(sourceDir, "a.txt");
      const base = `docs-a.txt-${computePathHash(fileA)}-2024-06-01_12-00-00`;

      await runBackup(store, repository, { now: T1 });
      await writeFile(fileA, "alpha 2");
      await runBackup(store, repository, { now: T1 });
      await writeFile(fileA, "alpha 33");
      const third = await runBackup(store, repository, { now: T1 });

      expect(third.archives).toEqual([`${base}-v3`]);
      expect(store.names().filter((n) => n.startsWith(base))).toEqual([
        base,
        `${base}-v2`,
        `${base}-v3`,
      ]);
    });

    test("paranoid mode catches a same-size edit with the same mtime", async () => {
      const fileA = path.join(sourceDir, "a.txt");
      await utimes(fileA, FIXED_MTIME, FIXED_MTIME);
      await runBackup(store, makeRepository(sourceDir, { paranoid: true }), { now: T1 });

      await writeFile(fileA, "ALPHA");
      await utimes(fileA, FIXED_MTIME, FIXED_MTIME);

      const relaxed = await runBackup(store, makeRepository(sourceDir), { now: T2 });
      expect(relaxed.versioned).toBe(0);

      const paranoid = await runBackup(store, makeRepository(sourceDir, { paranoid: true }), {
        now: T3,
      });
      expect(paranoid.versioned).toBe(1);
      expect(paranoid.archives).toEqual([
        `docs-a.txt-${computePathHash(fileA)}-2024-06-03_12-00-00-v2`,
      ]);
    });

    test("an archive with a bare-path comment forces a new archive", async () => {
      const fileA = path.join(sourceDir, "a.txt");
      store.seed({
        name: `docs-a.txt-${computePathHash(fileA)}-2024-01-01_00-00-00`,
        createdAt: new Date("2024-01-01T00:00:00Z"),
        comment: fileA,
        fileMtime: new Date(),
      });

      const result = await runBackup(store, makeRepository(sourceDir), { now: T1 });

      expect(result.versioned).toBe(1);
      expect(result.created).toBe(1);
    });

    test("dry run decides without creating archives", async () => {
      const result = await runBackup(store, makeRepository(sourceDir), { now: T1, dryRun: true });

      expect(result.dryRun).toBe(true);
      expect(result.created).toBe(2);
      expect(store.archives).toEqual([]);
    });

    test("a failing file is recorded and the rest continue", async () => {
      const fileA = path.join(sourceDir, "a.txt");
      store.failingCreates.add(fileA);

      const result = await runBackup(store, makeRepository(sourceDir), { now: T1 });

      expect(result.created).toBe(1);
      expect(result.failures).toHaveLength(1);
      expect(result.failures[0]?.path).toBe(fileA);
      expect(result.failures[0]?.error).toContain(`cannot read ${fileA}`);
    });

    test("throws when no files are found", async () => {
      const emptyDir = path.join(tempDir, "empty");
      await mkdir(emptyDir);

      await expect(runBackup(store, makeRepository(emptyDir), { now: T1 })).rejects.toThrow(
        "No files found to backup",
      );
    });

    test("skips a source that is neither a file nor a directory", async () => {
      const socketPath = path.join(tempDir, "agent.sock");
      const server = await listenOnSocket(socketPath);

      try {
        const repository = makeRepository(sourceDir, {
          sources: [{ path: sourceDir }, { path: socketPath }],
        });
        const result = await runBackup(store, repository, { now: T1 });

        expect(result.created).toBe(2);
        expect(result.failures).toEqual([]);
        expect(store.archives).toHaveLength(2);
      } finally {
        await closeServer(server);
      }
    });
  });

  describe("source removal", () => {
    test("removes the sources after every file is archived", async () => {
      const realSource = await realpath(sourceDir);

      const result = await runBackup(store, makeRepository(sourceDir), {
        now: T1,
        removeSource: true,
      });

      expect(store.archives).toHaveLength(2);
      expect(result.removedSources).toEqual([realSource]);
      expect(existsSync(sourceDir)).toBe(false);
    });

    test("keeps the sources when a file fails", async () => {
      store.failingCreates.add(path.join(sourceDir, "a.txt"));

      const result = await runBackup(store, makeRepository(sourceDir), {
        now: T1,
        removeSource: true,
      });

      expect(result.failures).toHaveLength(1);
      expect(result.removedSources).toEqual([]);
      expect(existsSync(path.join(sourceDir, "a.txt"))).toBe(true);
    });

    test("a dry run removes nothing", async () => {
      const result = await runBackup(store, makeRepository(sourceDir), {
        now: T1,
        dryRun: true,
        removeSource: true,
      });

      expect(result.removedSources).toEqual([]);
      expect(existsSync(sourceDir)).toBe(true);
    });

    test("removes a standard-mode source after its archive is written", async () => {
      const realSource = await realpath(sourceDir);
      const repository = makeRepository(sourceDir, { retentionMode: "standard" });
      const result = await runBackup(store, repository, { now: T1, removeSource: true });

      expect(store.archives).toHaveLength(1);
      expect(result.removedSources).toEqual([realSource]);
      expect(existsSync(sourceDir)).toBe(false);
    });
  });

  describe("standard mode", () => {
    test("creates one archive of every source", async () => {
      const repository = makeRepository(sourceDir, {
        retentionMode: "standard",
        exclude: ["*.tmp"],
        sources: [{ path: sourceDir, exclude: ["*.bak"] }],
      });

      const result = await runBackup(store, repository, { now: T1 });

      expect(result.archives).toEqual(["docs-2024-06-01_12-00-00"]);
      expect(result.created).toBe(1);
      expect(store.archives[0]?.paths).toEqual([sourceDir]);
      expect(store.archives[0]?.comment).toBe("");
    });

    test("honours an explicit archive name", async () => {
      const repository = makeRepository(sourceDir, { retentionMode: "standard" });
      const result = await runBackup(store, repository, { archiveName: "manual-1" });

      expect(store.names()).toEqual(["manual-1"]);
      expect(result.archives).toEqual(["manual-1"]);
    });
  });

  describe("ensureRepository", () => {
    test("initialises a missing repository when autoInit is set", async () => {
      const missing = new MemoryArchiveStore("/backups/new", false);
      await ensureRepository(missing, makeRepository(sourceDir, { autoInit: true, encryption: "none" }));

      expect(missing.initialized).toBe(true);
      expect(missing.initEncryption).toBe("none");
    });

    test("leaves a missing repository alone without autoInit", async () => {
      const missing = new MemoryArchiveStore("/backups/new", false);
      await ensureRepository(missing, makeRepository(sourceDir));

      expect(missing.initialized).toBe(false);
      expect(missing.initEncryption).toBeNull();
    });

    test("backup runs it before creating archives", async () => {
      const missing = new MemoryArchiveStore("/backups/new", false);
      await runBackup(missing, makeRepository(sourceDir, { autoInit: true }), { now: T1 });

      expect(missing.initEncryption).toBe("repokey");
      expect(missing.archives).toHaveLength(2);
    });
  });
});
