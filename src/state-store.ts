import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { StateIOError, describeError } from "./errors.js";
import { EMPTY_SNAPSHOT, type JobSnapshot } from "./types.js";

export const COUNT_FILE = "known_job_count.json";
export const TOP_JOBS_FILE = "known_top_jobs.json";

const CountFileSchema = z.object({
  total_count: z.number().int().min(0),
  updated_at: z.string().optional(),
});

const TopJobsFileSchema = z.object({
  top_jobs: z.array(
    z.object({
      id: z.string().min(1),
      title: z.string(),
      link: z.string(),
    })
  ),
  updated_at: z.string().optional(),
});

export interface SnapshotStore {
  load(): JobSnapshot;
  save(snapshot: JobSnapshot): void;
}

// Baseline lives in two JSON files, both replaced on every save
export class JsonStateStore implements SnapshotStore {
  readonly countPath: string;
  readonly topJobsPath: string;

  constructor(
    private readonly stateDir: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.countPath = path.join(stateDir, COUNT_FILE);
    this.topJobsPath = path.join(stateDir, TOP_JOBS_FILE);
  }

  load(): JobSnapshot {
    if (!fs.existsSync(this.countPath) && !fs.existsSync(this.topJobsPath)) {
      return EMPTY_SNAPSHOT;
    }

    try {
      const count = readJsonFile(this.countPath, CountFileSchema);
      const topJobs = readJsonFile(this.topJobsPath, TopJobsFileSchema);
      return Object.freeze({
        totalCount: count?.total_count ?? 0,
        topJobs: Object.freeze(topJobs?.top_jobs ?? []),
      });
    } catch (error) {
      console.warn(`Failed to load previous state, starting fresh: ${describeError(error)}`);
      return EMPTY_SNAPSHOT;
    }
  }

  save(snapshot: JobSnapshot): void {
    const updatedAt = this.now().toISOString();

    try {
      fs.mkdirSync(this.stateDir, { recursive: true });
    } catch (error) {
      throw new StateIOError(this.stateDir, "write", error);
    }

    // Stage both files, then rename top jobs before the count: if anything fails
    // midway the old count stays, and the next run sees the change again
    const staged: StagedFile[] = [];
    let target = this.topJobsPath;
    try {
      stageJson(staged, this.topJobsPath, {
        top_jobs: snapshot.topJobs.map(({ id, title, link }) => ({ id, title, link })),
        updated_at: updatedAt,
      });
      target = this.countPath;
      stageJson(staged, this.countPath, {
        total_count: snapshot.totalCount,
        updated_at: updatedAt,
      });

      for (const file of [...staged]) {
        target = file.target;
        fs.renameSync(file.temp, file.target);
        staged.shift();
      }
    } catch (error) {
      for (const file of staged) {
        fs.rmSync(file.temp, { force: true });
      }
      throw new StateIOError(target, "write", error);
    }
  }
}

function readJsonFile<T>(filePath: string, schema: z.ZodType<T>): T | null {
  if (!fs.existsSync(filePath)) return null;

  try {
    return schema.parse(JSON.parse(fs.readFileSync(filePath, "utf-8")));
  } catch (error) {
    throw new StateIOError(filePath, "read", error);
  }
}

interface StagedFile {
  target: string;
  temp: string;
}

function stageJson(staged: StagedFile[], target: string, data: unknown): void {
  const temp = `${target}.${process.pid}.tmp`;
  staged.push({ target, temp });
  fs.writeFileSync(temp, JSON.stringify(data, null, 2) + "\n");
}
