import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { StateIOError } from "./errors.js";
import { COUNT_FILE, JsonStateStore, TOP_JOBS_FILE } from "./state-store.js";
import { EMPTY_SNAPSHOT, type JobSnapshot } from "./types.js";

const TEST_DIR = join(process.cwd(), "tmp", "test-state-store");
const FIXED_NOW = new Date("2026-03-02T08:30:00.000Z");

const SNAPSHOT: JobSnapshot = {
  totalCount: 150,
  topJobs: [
    { id: "101", title: "Data Engineer", link: "https://jobs.example.com/jobs/101" },
    { id: "102", title: "BI Engineer", link: "https://jobs.example.com/jobs/102" },
  ],
};

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

describe("JsonStateStore", () => {
  beforeEach(() => {
    cleanup();
    mkdirSync(TEST_DIR, { recursive: true });
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanup();
  });

  it("returns the empty snapshot when nothing was saved yet", () => {
    const store = new JsonStateStore(TEST_DIR);

    expect(store.load()).toBe(EMPTY_SNAPSHOT);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("save and load round-trip", () => {
    const store = new JsonStateStore(TEST_DIR, () => FIXED_NOW);
    store.save(SNAPSHOT);

    expect(new JsonStateStore(TEST_DIR).load()).toEqual(SNAPSHOT);
  });

  it("writes the two documented files", () => {
    new JsonStateStore(TEST_DIR, () => FIXED_NOW).save(SNAPSHOT);

    expect(JSON.parse(readFileSync(join(TEST_DIR, COUNT_FILE), "utf-8"))).toEqual({
      total_count: 150,
      updated_at: "2026-03-02T08:30:00.000Z",
    });
    expect(JSON.parse(readFileSync(join(TEST_DIR, TOP_JOBS_FILE), "utf-8"))).toEqual({
      top_jobs: [
        { id: "101", title: "Data Engineer", link: "https://jobs.example.com/jobs/101" },
        { id: "102", title: "BI Engineer", link: "https://jobs.example.com/jobs/102" },
      ],
      updated_at: "2026-03-02T08:30:00.000Z",
    });
  });

  it("overwrites the previous state and leaves no temp files", () => {
    const store = new JsonStateStore(TEST_DIR);
    store.save(SNAPSHOT);
    store.save({ totalCount: 3, topJobs: [] });

    expect(store.load()).toEqual({ totalCount: 3, topJobs: [] });
    expect(readdirSync(TEST_DIR).sort()).toEqual([COUNT_FILE, TOP_JOBS_FILE]);
  });

  it("creates the state directory", () => {
    const nested = join(TEST_DIR, "deep", "state");
    new JsonStateStore(nested).save(SNAPSHOT);

    expect(existsSync(join(nested, COUNT_FILE))).toBe(true);
  });

  it("degrades to the empty snapshot when a file is corrupt", () => {
    writeFileSync(join(TEST_DIR, COUNT_FILE), "{ not json");
    writeFileSync(join(TEST_DIR, TOP_JOBS_FILE), JSON.stringify({ top_jobs: [] }));

    expect(new JsonStateStore(TEST_DIR).load()).toBe(EMPTY_SNAPSHOT);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("degrades to the empty snapshot when a file has the wrong shape", () => {
    writeFileSync(join(TEST_DIR, COUNT_FILE), JSON.stringify({ total_count: "many" }));

    expect(new JsonStateStore(TEST_DIR).load()).toBe(EMPTY_SNAPSHOT);
  });

  it("treats a single missing file as its empty half", () => {
    writeFileSync(join(TEST_DIR, COUNT_FILE), JSON.stringify({ total_count: 42 }));

    expect(new JsonStateStore(TEST_DIR).load()).toEqual({ totalCount: 42, topJobs: [] });
  });

  it("loads a saved zero-job baseline as its own snapshot, not the first-run one", () => {
    const store = new JsonStateStore(TEST_DIR);
    store.save({ totalCount: 0, topJobs: [] });

    const loaded = store.load();

    expect(loaded).not.toBe(EMPTY_SNAPSHOT);
    expect(loaded).toEqual({ totalCount: 0, topJobs: [] });
  });

  it("keeps the old count when the top jobs file cannot be replaced", () => {
    const store = new JsonStateStore(TEST_DIR, () => FIXED_NOW);
    store.save(SNAPSHOT);
    rmSync(join(TEST_DIR, TOP_JOBS_FILE));
    mkdirSync(join(TEST_DIR, TOP_JOBS_FILE, "occupied"), { recursive: true });

    expect(() => store.save({ totalCount: 200, topJobs: [] })).toThrow(StateIOError);
    expect(JSON.parse(readFileSync(join(TEST_DIR, COUNT_FILE), "utf-8"))).toEqual({
      total_count: 150,
      updated_at: "2026-03-02T08:30:00.000Z",
    });
    expect(readdirSync(TEST_DIR).sort()).toEqual([COUNT_FILE, TOP_JOBS_FILE]);
  });

  it("throws StateIOError when the state cannot be written", () => {
    const blocker = join(TEST_DIR, "blocker");
    writeFileSync(blocker, "");
    const store = new JsonStateStore(join(blocker, "state"));

    expect(() => store.save(SNAPSHOT)).toThrow(StateIOError);
  });
});
