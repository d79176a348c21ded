import * as path from "path";
import { loadConfig } from "../src/config.js";
import { extractSnapshot } from "../src/extractor.js";
import { BrowserPageFetcher, PAGE_SCREENSHOT, captureScreenshot } from "../src/scraper.js";

// Prints what the extractor sees on the live page. Touches neither state nor mail.
async function checkPage() {
  const config = loadConfig(process.env);
  const fetcher = new BrowserPageFetcher({
    navigationTimeoutMs: config.navigationTimeoutMs,
    settleDelayMs: config.settleDelayMs,
    chromiumPath: config.chromiumPath,
  });

  try {
    const page = await fetcher.open(config.targetUrl);
    console.log("URL:", page.url);
    console.log("HTML length:", page.html.length);
    await captureScreenshot(page, path.join(config.screenshotDir, PAGE_SCREENSHOT));

    const snapshot = extractSnapshot(page.html, page.url, config.topJobsLimit);
    console.log("Job count:", snapshot.totalCount);
    console.log("Top jobs:");
    for (const job of snapshot.topJobs) {
      console.log(`  [${job.id}] ${job.title}\n      ${job.link}`);
    }
  } finally {
    await fetcher.close();
  }
}

checkPage().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
