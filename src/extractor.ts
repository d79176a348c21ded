import * as cheerio from "cheerio";
import { MAX_TOP_JOBS } from "./config.js";
import { ExtractionError } from "./errors.js";
import type { JobPosting, JobSnapshot } from "./types.js";

const COUNT_SELECTORS = [
  '[data-testid="job-count"]',
  '[data-test="job-count"]',
  '[data-testid*="job-count"]',
  ".job-count",
  '[role="status"]',
];

const COUNT_TEXT_ELEMENTS = "span, p, div, strong, h1, h2, h3, h4";
const COUNT_TEXT_PATTERN = /(\d[\d,.\s]*\d|\d)\s+(?:jobs?|openings?|positions?|results?)\b/i;
const MAX_COUNT_TEXT_LENGTH = 120;

const POSTING_SELECTORS = [
  '[data-testid*="job-title"] a[href]',
  'a[data-testid*="job-title"][href]',
  '[role="listitem"] h3 a[href]',
  "h3.job-title a[href]",
  "a.job-title[href]",
  'a[href*="/jobs/"]',
];

// Whole words of link texts that sit next to job cards but are not postings
const NON_JOB_TEXT = /\b(?:search|filter|sort|apply now|browse|view all)\b/i;

export function extractSnapshot(
  html: string,
  pageUrl: string,
  limit: number = MAX_TOP_JOBS
): JobSnapshot {
  const $ = cheerio.load(html);

  const totalCount = extractJobCount($);
  if (totalCount === null) {
    throw new ExtractionError("Could not locate the job count on the page", pageUrl);
  }

  const topJobs = extractTopJobs($, pageUrl, Math.min(limit, MAX_TOP_JOBS));

  return Object.freeze({
    totalCount,
    topJobs: Object.freeze(topJobs.map((job) => Object.freeze(job))),
  });
}

function extractJobCount($: cheerio.CheerioAPI): number | null {
  for (const selector of COUNT_SELECTORS) {
    const text = collapse($(selector).first().text());
    if (!text) continue;
    const count = parseCountText(text);
    if (count !== null) return count;
  }

  // Fall back to the first short element whose own text reads like "150 jobs"
  let found: number | null = null;
  $(COUNT_TEXT_ELEMENTS).each((_, el) => {
    const node = $(el);
    if (node.children().length > 0) return;
    const text = collapse(node.text());
    if (text.length === 0 || text.length >= MAX_COUNT_TEXT_LENGTH) return;
    if (!COUNT_TEXT_PATTERN.test(text)) return;
    const count = parseCountText(text);
    if (count !== null) {
      found = count;
      return false;
    }
  });
  return found;
}

// "of 150" wins, then the number in front of "jobs", then the first number
export function parseCountText(text: string): number | null {
  const digits =
    text.match(/\bof\s+(\d[\d,.\s]*\d|\d)/i)?.[1] ??
    text.match(COUNT_TEXT_PATTERN)?.[1] ??
    text.match(/\d[\d,.\s]*\d|\d/)?.[0];
  if (digits === undefined) return null;

  const count = Number.parseInt(digits.replace(/[,.\s]/g, ""), 10);
  return Number.isNaN(count) ? null : count;
}

function extractTopJobs($: cheerio.CheerioAPI, pageUrl: string, limit: number): JobPosting[] {
  for (const selector of POSTING_SELECTORS) {
    const jobs: JobPosting[] = [];
    const seen = new Set<string>();

    $(selector).each((_, el) => {
      const anchor = $(el);
      const title = collapse(anchor.text());
      if (!isJobTitle(title)) return;

      const link = resolveLink(anchor.attr("href"), pageUrl);
      if (!link) return;

      const id = jobIdFromLink(link) ?? slugify(title);
      if (!id || seen.has(id)) return;
      seen.add(id);

      jobs.push({ id, title, link });
      if (jobs.length >= limit) return false;
    });

    if (jobs.length > 0) return jobs;
  }

  return [];
}

function isJobTitle(title: string): boolean {
  if (title.length <= 5 || title.length >= 200) return false;
  return !NON_JOB_TEXT.test(title);
}

function resolveLink(href: string | undefined, pageUrl: string): string | null {
  if (!href) return null;
  try {
    const url = new URL(href, pageUrl);
    return url.protocol.startsWith("http") ? url.toString() : null;
  } catch {
    return null;
  }
}

export function jobIdFromLink(link: string): string | null {
  const { pathname } = new URL(link);
  const match = pathname.match(/\/jobs?\/([A-Za-z0-9_-]+)/);
  return match ? match[1] : null;
}

export function slugify(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .substring(0, 80);
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
