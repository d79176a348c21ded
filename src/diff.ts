import type { ChangeReport, JobSnapshot, PositionChange } from "./types.js";

export function diffSnapshots(previous: JobSnapshot, current: JobSnapshot): ChangeReport {
  const previousIds = previous.topJobs.map((job) => job.id);
  const currentIds = current.topJobs.map((job) => job.id);

  const added = current.topJobs.filter((job) => !previousIds.includes(job.id));
  const removed = previous.topJobs.filter((job) => !currentIds.includes(job.id));

  const moved: PositionChange[] = [];
  current.topJobs.forEach((job, index) => {
    const previousIndex = previousIds.indexOf(job.id);
    if (previousIndex !== -1 && previousIndex !== index) {
      moved.push({ posting: job, from: previousIndex + 1, to: index + 1 });
    }
  });

  const sameOrder =
    previousIds.length === currentIds.length &&
    previousIds.every((id, index) => id === currentIds[index]);

  return {
    countDelta: current.totalCount - previous.totalCount,
    added,
    removed,
    reordered: added.length === 0 && removed.length === 0 && !sameOrder,
    moved,
  };
}

// Reordering alone is not worth an email
export function isNotable(report: ChangeReport): boolean {
  return report.countDelta !== 0 || report.added.length > 0 || report.removed.length > 0;
}
