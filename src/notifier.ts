import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import { Resend } from "resend";
import { NotificationError } from "./errors.js";
import type { ChangeReport, JobPosting, JobSnapshot, MailConfig, MailMessage } from "./types.js";

const SMTP_TIMEOUT_MS = 30000;

export interface MailTransport {
  readonly description: string;
  send(message: MailMessage): Promise<void>;
}

export class SmtpMailTransport implements MailTransport {
  readonly description: string;
  private readonly transporter: Transporter;

  constructor(private readonly config: Extract<MailConfig, { kind: "smtp" }>) {
    this.description = `SMTP ${config.host}:${config.port}`;
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.port === 465,
      requireTLS: config.port !== 465,
      auth: { user: config.sender, pass: config.password },
      connectionTimeout: SMTP_TIMEOUT_MS,
      greetingTimeout: SMTP_TIMEOUT_MS,
      socketTimeout: SMTP_TIMEOUT_MS,
    });
  }

  async send(message: MailMessage): Promise<void> {
    try {
      await this.transporter.sendMail({
        from: this.config.sender,
        to: this.config.recipients.join(", "),
        subject: message.subject,
        text: message.text,
        html: message.html,
      });
    } finally {
      this.transporter.close();
    }
  }
}

export class ResendMailTransport implements MailTransport {
  readonly description = "Resend API";
  private readonly resend: Resend;

  constructor(private readonly config: Extract<MailConfig, { kind: "resend" }>) {
    this.resend = new Resend(config.apiKey);
  }

  async send(message: MailMessage): Promise<void> {
    const { error } = await this.resend.emails.send({
      from: this.config.sender,
      to: this.config.recipients,
      subject: message.subject,
      html: message.html,
      text: message.text,
    });

    if (error) {
      throw new Error(error.message);
    }
  }
}

export function createMailTransport(config: MailConfig): MailTransport | null {
  switch (config.kind) {
    case "smtp":
      return new SmtpMailTransport(config);
    case "resend":
      return new ResendMailTransport(config);
    case "disabled":
      return null;
  }
}

export async function sendNotification(
  transport: MailTransport,
  message: MailMessage
): Promise<void> {
  try {
    await transport.send(message);
  } catch (error) {
    throw new NotificationError(`Failed to send email via ${transport.description}`, error);
  }
}

export interface MessageInput {
  report: ChangeReport;
  snapshot: JobSnapshot;
  previousCount: number;
  sourceName: string;
  sourceUrl: string;
  sentAt: Date;
  // first run: there is nothing to compare against, so nothing is "new"
  baseline: boolean;
}

export function composeMessage(input: MessageInput): MailMessage {
  return {
    subject: composeSubject(input),
    text: composeText(input),
    html: composeHtml(input),
  };
}

function composeSubject({ report, snapshot, sourceName, baseline }: MessageInput): string {
  if (baseline) {
    return `📋 ${sourceName}: now tracking ${snapshot.totalCount} jobs`;
  }
  const delta = report.countDelta;
  if (delta > 0) {
    return `🚨 ${sourceName}: ${delta} new job${delta === 1 ? "" : "s"} posted!`;
  }
  if (delta < 0) {
    const removed = Math.abs(delta);
    return `📉 ${sourceName}: ${removed} job${removed === 1 ? "" : "s"} removed`;
  }
  return `🆕 ${sourceName}: top listings changed`;
}

function composeText(input: MessageInput): string {
  const { report, snapshot, baseline } = input;
  const lines: string[] = [input.sourceName, "=".repeat(50), ""];

  lines.push(`Time: ${formatTimestamp(input.sentAt)}`);
  if (baseline) {
    lines.push(`Jobs: ${snapshot.totalCount} (baseline)`);
  } else {
    lines.push(
      `Jobs: ${input.previousCount} → ${snapshot.totalCount} (${formatDelta(report.countDelta)})`
    );
  }

  if (!baseline && report.added.length > 0) {
    lines.push("", "New postings:");
    for (const job of report.added) {
      lines.push(`  + ${job.title}`, `    ${job.link}`);
    }
  }

  if (!baseline && report.removed.length > 0) {
    lines.push("", "No longer listed:");
    for (const job of report.removed) {
      lines.push(`  - ${job.title}`);
    }
  }

  lines.push("", `Current top ${snapshot.topJobs.length}:`);
  if (snapshot.topJobs.length === 0) {
    lines.push("  (no postings found)");
  }
  snapshot.topJobs.forEach((job, index) => {
    lines.push(`  ${index + 1}. ${job.title}`, `     ${job.link}`);
  });

  lines.push("", `View all jobs: ${input.sourceUrl}`);
  return lines.join("\n");
}

function composeHtml(input: MessageInput): string {
  const { report, snapshot, baseline } = input;

  const countLine = baseline
    ? `${snapshot.totalCount} jobs (baseline)`
    : `${input.previousCount} → ${snapshot.totalCount} (${formatDelta(report.countDelta)})`;

  const addedHtml =
    !baseline && report.added.length > 0
      ? `
        <h2 style="font-size: 16px; margin: 20px 20px 8px;">New postings</h2>
        <table style="width: 100%; border-collapse: collapse;">${report.added.map(jobRow).join("")}</table>`
      : "";

  const removedHtml =
    !baseline && report.removed.length > 0
      ? `
        <h2 style="font-size: 16px; margin: 20px 20px 8px;">No longer listed</h2>
        <ul style="color: #666;">${report.removed
          .map((job) => `<li>${escapeHtml(job.title)}</li>`)
          .join("")}</ul>`
      : "";

  const topHtml =
    snapshot.topJobs.length > 0
      ? `<table style="width: 100%; border-collapse: collapse;">${snapshot.topJobs
          .map(jobRow)
          .join("")}</table>`
      : `<p style="padding: 0 20px; color: #666;">No postings found</p>`;

  return `
    <!DOCTYPE html>
    <html>
    <head>
      <meta charset="utf-8">
      <meta name="viewport" content="width=device-width, initial-scale=1">
    </head>
    <body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; margin: 0; padding: 20px; background: #f5f5f5;">
      <div style="max-width: 600px; margin: 0 auto; background: white; border-radius: 8px; overflow: hidden; box-shadow: 0 1px 3px rgba(0,0,0,0.1);">
        <div style="background: #2563eb; color: white; padding: 20px;">
          <h1 style="margin: 0; font-size: 20px;">${escapeHtml(input.sourceName)}</h1>
          <p style="margin: 8px 0 0; opacity: 0.9; font-size: 14px;">${escapeHtml(countLine)}</p>
          <p style="margin: 4px 0 0; opacity: 0.9; font-size: 12px;">${formatTimestamp(input.sentAt)}</p>
        </div>
        ${addedHtml}
        ${removedHtml}
        <h2 style="font-size: 16px; margin: 20px 20px 8px;">Current top ${snapshot.topJobs.length}</h2>
        ${topHtml}
        <div style="padding: 16px; background: #f9fafb; text-align: center; color: #666; font-size: 12px;">
          <a href="${escapeHtml(input.sourceUrl)}" style="color: #2563eb; text-decoration: none;">
            View all jobs →
          </a>
        </div>
      </div>
    </body>
    </html>
  `;
}

function jobRow(job: JobPosting): string {
  return `
      <tr>
        <td style="padding: 12px; border-bottom: 1px solid #eee;">
          <a href="${escapeHtml(job.link)}" style="color: #2563eb; text-decoration: none; font-weight: 500;">
            ${escapeHtml(job.title)}
          </a>
        </td>
      </tr>`;
}

export function formatDelta(delta: number): string {
  return delta > 0 ? `+${delta}` : String(delta);
}

export function formatTimestamp(date: Date): string {
  return `${date.toISOString().replace("T", " ").slice(0, 19)} UTC`;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
