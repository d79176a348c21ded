import { describe, it, expect } from "vitest";
import {
  DEFAULT_RESEND_SENDER,
  DEFAULT_SOURCE_NAME,
  DEFAULT_TARGET_URL,
  loadConfig,
  parseRecipients,
} from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      targetUrl: DEFAULT_TARGET_URL,
      sourceName: DEFAULT_SOURCE_NAME,
      stateDir: "data",
      screenshotDir: "screenshots",
      topJobsLimit: 5,
      navigationTimeoutMs: 45000,
      settleDelayMs: 2000,
      chromiumPath: undefined,
      mail: { kind: "disabled", reason: "RECIPIENT_EMAILS is not set" },
    });
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ TARGET_URL: "", SMTP_PORT: "  ", TOP_JOBS_LIMIT: "" });

    expect(config.targetUrl).toBe(DEFAULT_TARGET_URL);
    expect(config.topJobsLimit).toBe(5);
  });

  it("builds an SMTP mail config from sender credentials", () => {
    const config = loadConfig({
      SENDER_EMAIL: "alerts@example.com",
      SENDER_PASSWORD: "test-secret",
      RECIPIENT_EMAILS: "a@example.com, b@example.com",
      SMTP_SERVER: "smtp.example.com",
      SMTP_PORT: "465",
    });

    expect(config.mail).toEqual({
      kind: "smtp",
      host: "smtp.example.com",
      port: 465,
      sender: "alerts@example.com",
      password: "test-secret",
      recipients: ["a@example.com", "b@example.com"],
    });
  });

  it("defaults the SMTP server to gmail on 587", () => {
    const config = loadConfig({
      SENDER_EMAIL: "alerts@example.com",
      SENDER_PASSWORD: "test-secret",
      RECIPIENT_EMAILS: "a@example.com",
    });

    expect(config.mail).toMatchObject({ kind: "smtp", host: "smtp.gmail.com", port: 587 });
  });

  it("falls back to Resend when only an API key is configured", () => {
    const config = loadConfig({
      RESEND_API_KEY: "test-key",
      RECIPIENT_EMAILS: "a@example.com",
    });

    expect(config.mail).toEqual({
      kind: "resend",
      apiKey: "test-key",
      sender: DEFAULT_RESEND_SENDER,
      recipients: ["a@example.com"],
    });
  });

  it("disables mail when recipients exist but no transport credentials", () => {
    const config = loadConfig({ RECIPIENT_EMAILS: "a@example.com", SENDER_EMAIL: "x@example.com" });

    expect(config.mail).toEqual({
      kind: "disabled",
      reason: "neither SENDER_EMAIL/SENDER_PASSWORD nor RESEND_API_KEY is set",
    });
  });

  it("reports every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ TARGET_URL: "ftp://example.com/jobs", SMTP_PORT: "abc", TOP_JOBS_LIMIT: "9" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues).toHaveLength(3);
    expect(caught.issues.map((issue) => issue.split(":")[0])).toEqual([
      "TARGET_URL",
      "TOP_JOBS_LIMIT",
      "SMTP_PORT",
    ]);
  });
});

describe("parseRecipients", () => {
  it("splits, trims and de-duplicates", () => {
    expect(parseRecipients(" a@example.com,,b@example.com , a@example.com ")).toEqual([
      "a@example.com",
      "b@example.com",
    ]);
  });

  it("returns an empty list for a missing value", () => {
    expect(parseRecipients(undefined)).toEqual([]);
  });
});
