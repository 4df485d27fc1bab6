import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  ArchiveStoreUnavailableError,
  EmptyRetentionPolicyError,
  pruneArchives,
  runPrune,
} from "../../src/core/index.js";
import { loadArchiveRecords } from "../../src/store/index.js";
import type { ResolvedRepository, RetentionConfig } from "../../src/types/index.js";
import { MemoryArchiveStore } from "../helpers/memory-store.js";

const NOW = new Date("2024-06-20T12:00:00Z");

/**
 * 20 daily archives from /data/a (June 1-20 at 00:00) and
 * 5 from /data/b (June 16-20 at 06:00)
 */
function seedTwoDirectories(store: MemoryArchiveStore): void {
  for (let day = 1; day <= 20; day++) {
    const dd = day.toString().padStart(2, "0");
    store.seed({
      name: `a-${dd}`,
      createdAt: new Date(`2024-06-${dd}T00:00:00Z`),
      comment: `/data/a/file.txt|||10|||h|||/data/a`,
    });
  }
  for (let day = 16; day <= 20; day++) {
    store.seed({
      name: `b-${day}`,
      createdAt: new Date(`2024-06-${day}T06:00:00Z`),
      comment: `/data/b/other.txt|||10|||h|||/data/b`,
    });
  }
}

function makeRepository(overrides: Partial<ResolvedRepository> = {}): ResolvedRepository {
  return {
    name: "docs",
    path: "/backups/docs",
    retentionMode: "per_file",
    paranoid: false,
    compression: "lz4",
    encryption: "repokey",
    autoInit: false,
    allowRemoveSource: false,
    sources: [{ path: "/data" }],
    retention: { keepDaily: 7 },
    exclude: [],
    ...overrides,
  };
}

describe("pruneArchives", () => {
  let store: MemoryArchiveStore;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    store = new MemoryArchiveStore();
    seedTwoDirectories(store);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("evaluates each source directory on its own", async () => {
    const records = await loadArchiveRecords(store);
    const result = await pruneArchives(store, records, { keepDaily: 7 }, { mode: "per_file", now: NOW });

    expect(result.totalChecked).toBe(25);
    expect(result.totalKept).toBe(12);
    expect(result.totalDeleted).toBe(13);
    expect(result.groups).toEqual([
      { sourceDir: "/data/a", total: 20, kept: 7, deleted: 13 },
      { sourceDir: "/data/b", total: 5, kept: 5, deleted: 0 },
    ]);
    expect(store.deleted).toEqual([
      "a-13", "a-12", "a-11", "a-10", "a-09", "a-08", "a-07",
      "a-06", "a-05", "a-04", "a-03", "a-02", "a-01",
    ]);
    expect(store.names().filter((n) => n.startsWith("b-"))).toHaveLength(5);
  });

  test("standard mode evaluates the repository as one group", async () => {
    const records = await loadArchiveRecords(store);
    const result = await pruneArchives(store, records, { keepDaily: 7 }, { mode: "standard", now: NOW });

    expect(result.groups).toEqual([{ sourceDir: null, total: 25, kept: 7, deleted: 18 }]);
    expect(store.names()).toEqual(["a-14", "a-15", "b-16", "b-17", "b-18", "b-19", "b-20"]);
  });

  test("dry run lists deletions without deleting", async () => {
    const records = await loadArchiveRecords(store);
    const result = await pruneArchives(store, records, { keepDaily: 7 }, {
      mode: "per_file",
      now: NOW,
      dryRun: true,
    });

    expect(result.dryRun).toBe(true);
    expect(result.totalDeleted).toBe(0);
    expect(result.deletions).toHaveLength(13);
    expect(result.deletions[0]).toEqual({
      record: records[12],
      reason: "not matched by any retention rule",
    });
    expect(store.archives).toHaveLength(25);
  });

  test("a failed delete is recorded and the rest continue", async () => {
    store.failingDeletes.add("a-05");
    const records = await loadArchiveRecords(store);

    const result = await pruneArchives(store, records, { keepDaily: 7 }, { mode: "per_file", now: NOW });

    expect(result.totalDeleted).toBe(12);
    expect(result.errors).toEqual([
      {
        archiveName: "a-05",
        error: "Archive store command failed (exit 2): delete a-05 - lock timeout",
      },
    ]);
    expect(store.names()).toContain("a-05");
    expect(store.names()).not.toContain("a-04");
  });

  test("an unavailable store stops the prune", async () => {
    const records = await loadArchiveRecords(store);
    vi.spyOn(store, "delete").mockRejectedValue(new ArchiveStoreUnavailableError("gone"));

    await expect(
      pruneArchives(store, records, { keepDaily: 7 }, { mode: "per_file", now: NOW }),
    ).rejects.toThrow(ArchiveStoreUnavailableError);
  });

  test("archives without a source directory form their own group", async () => {
    store.seed({ name: "legacy-1", createdAt: new Date("2024-01-01T00:00:00Z"), comment: "/data/a/file.txt" });
    store.seed({ name: "legacy-2", createdAt: new Date("2024-01-02T00:00:00Z"), comment: "" });
    const records = await loadArchiveRecords(store);

    const result = await pruneArchives(store, records, { keepDaily: 7 }, { mode: "per_file", now: NOW });

    expect(result.groups[2]).toEqual({ sourceDir: null, total: 2, kept: 2, deleted: 0 });
  });

  test("unreadable archives are never deleted", async () => {
    store.unreadableComments.add("a-01");
    const records = await loadArchiveRecords(store);

    const result = await pruneArchives(store, records, { keepWithin: "1d" }, {
      mode: "per_file",
      now: NOW,
    });

    expect(store.names()).toContain("a-01");
    expect(result.groups.find((g) => g.sourceDir === null)).toEqual({
      sourceDir: null,
      total: 1,
      kept: 1,
      deleted: 0,
    });
  });
});

describe("pruneArchives by file modification time", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("reads mtimes from the store and keeps recent files", async () => {
    const store = new MemoryArchiveStore()
      .seed({
        name: "stale",
        createdAt: new Date("2024-06-19T00:00:00Z"),
        comment: "/data/a/stale.txt|||10||||||/data/a",
        fileMtime: new Date("2024-04-01T00:00:00Z"),
      })
      .seed({
        name: "fresh",
        createdAt: new Date("2024-06-10T00:00:00Z"),
        comment: "/data/a/fresh.txt|||10||||||/data/a",
        fileMtime: new Date("2024-06-10T00:00:00Z"),
      })
      .seed({
        name: "unknown",
        createdAt: new Date("2024-01-01T00:00:00Z"),
        comment: "/data/a/unknown.txt|||10||||||/data/a",
        fileMtime: new Date("2023-01-01T00:00:00Z"),
      });
    store.unreadableEntries.add("unknown");
    const records = await loadArchiveRecords(store);

    const result = await pruneArchives(store, records, { keepFilesModifiedWithin: "30d" }, {
      mode: "per_file",
      now: NOW,
    });

    expect(store.deleted).toEqual(["stale"]);
    expect(result.deletions[0]?.reason).toBe("file modified more than 30d ago");
    expect(result.totalKept).toBe(2);
  });
});

describe("runPrune", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("prunes with the repository's policy and mode", async () => {
    const store = new MemoryArchiveStore();
    seedTwoDirectories(store);

    const result = await runPrune(store, makeRepository(), { now: NOW });

    expect(result.totalDeleted).toBe(13);
  });

  test("rejects an empty policy before reading the store", async () => {
    const store = new MemoryArchiveStore();
    const listSpy = vi.spyOn(store, "listArchives");
    const retention: RetentionConfig = { keepDaily: 0 };

    await expect(runPrune(store, makeRepository({ retention }), { now: NOW })).rejects.toThrow(
      EmptyRetentionPolicyError,
    );
    expect(listSpy).not.toHaveBeenCalled();
  });

  test("initialises a missing repository when autoInit is set", async () => {
    const store = new MemoryArchiveStore("/backups/new", false);

    const result = await runPrune(store, makeRepository({ autoInit: true }), { now: NOW });

    expect(store.initialized).toBe(true);
    expect(result.totalChecked).toBe(0);
  });
});
