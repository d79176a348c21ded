import * as path from "path";
import { diffSnapshots, isNotable } from "./diff.js";
import { ExtractionError, NotificationError, StateIOError } from "./errors.js";
import { extractSnapshot } from "./extractor.js";
import {
  composeMessage,
  formatDelta,
  sendNotification,
  type MailTransport,
  type MessageInput,
} from "./notifier.js";
import { DEBUG_SCREENSHOT, PAGE_SCREENSHOT, captureScreenshot, type PageFetcher } from "./scraper.js";
import type { SnapshotStore } from "./state-store.js";
import { EMPTY_SNAPSHOT, type ChangeReport, type JobSnapshot, type MonitorConfig } from "./types.js";

export interface MonitorDeps {
  config: MonitorConfig;
  store: SnapshotStore;
  fetcher: PageFetcher;
  // null when mail is not configured
  transport: MailTransport | null;
  now?: () => Date;
}

export type RunResult =
  | { status: "failed"; exitCode: 1; error: Error; report?: ChangeReport; notified: boolean }
  | { status: "unchanged" | "changed"; exitCode: 0; report: ChangeReport; notified: boolean };

// One check cycle. The baseline is only replaced after a successful fetch and extraction.
export async function runCheck(deps: MonitorDeps): Promise<RunResult> {
  const { config, store, fetcher, transport } = deps;
  const now = deps.now ?? (() => new Date());

  console.log(`=== ${config.sourceName} ===`);
  console.log(`Time: ${now().toISOString()}`);
  console.log(`URL: ${config.targetUrl}`);

  const previous = store.load();
  // load() hands back the shared empty snapshot only when there is no usable state
  const baseline = previous === EMPTY_SNAPSHOT;
  if (baseline) {
    console.log("No previous state found, this run sets the baseline");
  } else {
    console.log(`Previous count: ${previous.totalCount}, top jobs: ${previous.topJobs.length}`);
  }

  let current: JobSnapshot;
  try {
    current = await scrapeSnapshot(deps);
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(String(error));
    console.error(`${failure.name}: ${failure.message}`);
    console.error("Baseline left unchanged");
    return { status: "failed", exitCode: 1, error: failure, notified: false };
  } finally {
    await fetcher.close();
  }

  console.log(`Current count: ${current.totalCount}`);
  current.topJobs.forEach((job, index) => {
    console.log(`  ${index + 1}. ${job.title} (${job.link})`);
  });

  const report = diffSnapshots(previous, current);
  logReport(report, previous, current);

  let notified = false;
  const notable = isNotable(report);
  if (notable) {
    notified = await notify(transport, {
      report,
      snapshot: current,
      previousCount: previous.totalCount,
      sourceName: config.sourceName,
      sourceUrl: config.targetUrl,
      sentAt: now(),
      baseline,
    });
  } else {
    console.log("No notable changes, no email sent");
  }

  try {
    store.save(current);
    console.log(`Saved count ${current.totalCount} and ${current.topJobs.length} top jobs`);
  } catch (error) {
    if (!(error instanceof StateIOError)) throw error;
    console.error(`${error.name}: ${error.message}`);
    console.error("The next run will compare against the old baseline again");
    return { status: "failed", exitCode: 1, error, report, notified };
  }

  console.log("\n=== Done ===");
  return { status: notable ? "changed" : "unchanged", exitCode: 0, report, notified };
}

async function scrapeSnapshot({ config, fetcher }: MonitorDeps): Promise<JobSnapshot> {
  const page = await fetcher.open(config.targetUrl);
  await captureScreenshot(page, path.join(config.screenshotDir, PAGE_SCREENSHOT));

  try {
    return extractSnapshot(page.html, page.url, config.topJobsLimit);
  } catch (error) {
    if (error instanceof ExtractionError) {
      await captureScreenshot(page, path.join(config.screenshotDir, DEBUG_SCREENSHOT));
    }
    throw error;
  }
}

async function notify(
  transport: MailTransport | null,
  input: MessageInput
): Promise<boolean> {
  if (!transport) {
    console.warn("Email is not configured, skipping notification");
    return false;
  }

  const message = composeMessage(input);
  console.log(`Sending "${message.subject}" via ${transport.description}...`);

  try {
    await sendNotification(transport, message);
    console.log("Notification sent successfully");
    return true;
  } catch (error) {
    if (!(error instanceof NotificationError)) throw error;
    console.warn(`${error.name}: ${error.message}`);
    console.warn("Continuing, the new baseline is still saved");
    return false;
  }
}

function logReport(report: ChangeReport, previous: JobSnapshot, current: JobSnapshot): void {
  if (report.countDelta !== 0) {
    console.log(
      `Job count changed! ${previous.totalCount} → ${current.totalCount} (${formatDelta(report.countDelta)})`
    );
  }
  for (const job of report.added) {
    console.log(`  🆕 New: ${job.title}`);
  }
  for (const job of report.removed) {
    console.log(`  ❌ Removed: ${job.title}`);
  }
  for (const change of report.moved) {
    console.log(`  🔄 Moved: ${change.posting.title} (#${change.from} → #${change.to})`);
  }
  if (report.reordered) {
    console.log("Top jobs reordered only");
  }
}
