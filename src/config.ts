import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { MailConfig, MonitorConfig } from "./types.js";

export const DEFAULT_TARGET_URL =
  "https://amazon.jobs/content/en/job-categories/business-intelligence-data-engineering?country%5B%5D=US&employment-type%5B%5D=Full+time&role-type%5B%5D=0";
export const DEFAULT_SOURCE_NAME = "Amazon Business Intelligence & Data Engineering Jobs";
export const DEFAULT_RESEND_SENDER = "Careers Watch <onboarding@resend.dev>";
export const MAX_TOP_JOBS = 5;

const EnvSchema = z.object({
  TARGET_URL: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), "must be an http(s) URL")
    .default(DEFAULT_TARGET_URL),
  SOURCE_NAME: z.string().default(DEFAULT_SOURCE_NAME),
  STATE_DIR: z.string().default("data"),
  SCREENSHOT_DIR: z.string().default("screenshots"),
  TOP_JOBS_LIMIT: z.coerce.number().int().min(1).max(MAX_TOP_JOBS).default(MAX_TOP_JOBS),
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(45000),
  SETTLE_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  CHROMIUM_PATH: z.string().optional(),
  SENDER_EMAIL: z.string().optional(),
  SENDER_PASSWORD: z.string().optional(),
  RECIPIENT_EMAILS: z.string().optional(),
  SMTP_SERVER: z.string().default("smtp.gmail.com"),
  SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
  RESEND_API_KEY: z.string().optional(),
});

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env): MonitorConfig {
  // CI secrets that are not set expand to "", which means "use the default"
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      present[key] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    targetUrl: vars.TARGET_URL,
    sourceName: vars.SOURCE_NAME,
    stateDir: vars.STATE_DIR,
    screenshotDir: vars.SCREENSHOT_DIR,
    topJobsLimit: vars.TOP_JOBS_LIMIT,
    navigationTimeoutMs: vars.NAVIGATION_TIMEOUT_MS,
    settleDelayMs: vars.SETTLE_DELAY_MS,
    chromiumPath: vars.CHROMIUM_PATH,
    mail: resolveMailConfig(vars),
  };
}

function resolveMailConfig(vars: z.infer<typeof EnvSchema>): MailConfig {
  const recipients = parseRecipients(vars.RECIPIENT_EMAILS);
  if (recipients.length === 0) {
    return { kind: "disabled", reason: "RECIPIENT_EMAILS is not set" };
  }

  if (vars.SENDER_EMAIL && vars.SENDER_PASSWORD) {
    return {
      kind: "smtp",
      host: vars.SMTP_SERVER,
      port: vars.SMTP_PORT,
      sender: vars.SENDER_EMAIL,
      password: vars.SENDER_PASSWORD,
      recipients,
    };
  }

  if (vars.RESEND_API_KEY) {
    return {
      kind: "resend",
      apiKey: vars.RESEND_API_KEY,
      sender: vars.SENDER_EMAIL ?? DEFAULT_RESEND_SENDER,
      recipients,
    };
  }

  return {
    kind: "disabled",
    reason: "neither SENDER_EMAIL/SENDER_PASSWORD nor RESEND_API_KEY is set",
  };
}

export function parseRecipients(value: string | undefined): string[] {
  if (!value) return [];
  const recipients: string[] = [];
  for (const part of value.split(",")) {
    const email = part.trim();
    if (email && !recipients.includes(email)) {
      recipients.push(email);
    }
  }
  return recipients;
}
