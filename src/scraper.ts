import * as fs from "fs";
import * as path from "path";
import { chromium, type Browser, type Page } from "playwright-core";
import { FetchError, describeError } from "./errors.js";

const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export const PAGE_SCREENSHOT = "career_page.png";
export const DEBUG_SCREENSHOT = "career_page_debug.png";

export interface RenderedPage {
  // final URL after redirects
  readonly url: string;
  readonly html: string;
  screenshot(filePath: string): Promise<void>;
}

export interface PageFetcher {
  open(url: string): Promise<RenderedPage>;
  close(): Promise<void>;
}

export interface BrowserFetcherOptions {
  navigationTimeoutMs: number;
  settleDelayMs: number;
  chromiumPath?: string;
}

export class BrowserPageFetcher implements PageFetcher {
  private browser: Browser | null = null;

  constructor(private readonly options: BrowserFetcherOptions) {}

  async open(url: string): Promise<RenderedPage> {
    try {
      if (!this.browser) {
        console.log("Launching browser...");
        this.browser = await chromium.launch({
          headless: true,
          executablePath: this.options.chromiumPath,
        });
      }

      const context = await this.browser.newContext({ userAgent: USER_AGENT });
      const page = await context.newPage();
      page.setDefaultTimeout(this.options.navigationTimeoutMs);

      console.log(`Navigating to ${url}...`);
      await page.goto(url, {
        waitUntil: "networkidle",
        timeout: this.options.navigationTimeoutMs,
      });

      // Wait for listings rendered after the network settles
      await page.waitForTimeout(this.options.settleDelayMs);

      return await renderedPage(page);
    } catch (error) {
      throw new FetchError(url, error);
    }
  }

  async close(): Promise<void> {
    if (this.browser) {
      const browser = this.browser;
      this.browser = null;
      await browser.close();
    }
  }
}

async function renderedPage(page: Page): Promise<RenderedPage> {
  const html = await page.content();
  return {
    url: page.url(),
    html,
    async screenshot(filePath: string): Promise<void> {
      await page.screenshot({ path: filePath, fullPage: true });
    },
  };
}

// Best-effort: returns false instead of throwing
export async function captureScreenshot(page: RenderedPage, filePath: string): Promise<boolean> {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    await page.screenshot(filePath);
    console.log(`Screenshot saved as ${filePath}`);
    return true;
  } catch (error) {
    console.warn(`Could not save screenshot ${filePath}: ${describeError(error)}`);
    return false;
  }
}
