export interface JobPosting {
  id: string;
  title: string;
  link: string;
}

export interface JobSnapshot {
  readonly totalCount: number;
  readonly topJobs: readonly JobPosting[];
}

export interface PositionChange {
  posting: JobPosting;
  from: number;
  to: number;
}

export interface ChangeReport {
  countDelta: number;
  added: JobPosting[];
  removed: JobPosting[];
  reordered: boolean;
  // 1-based positions, informational only
  moved: PositionChange[];
}

export interface MailMessage {
  subject: string;
  text: string;
  html: string;
}

export type MailConfig =
  | {
      kind: "smtp";
      host: string;
      port: number;
      sender: string;
      password: string;
      recipients: string[];
    }
  | {
      kind: "resend";
      apiKey: string;
      sender: string;
      recipients: string[];
    }
  | {
      kind: "disabled";
      reason: string;
    };

export interface MonitorConfig {
  targetUrl: string;
  sourceName: string;
  stateDir: string;
  screenshotDir: string;
  topJobsLimit: number;
  navigationTimeoutMs: number;
  settleDelayMs: number;
  chromiumPath?: string;
  mail: MailConfig;
}

export const EMPTY_SNAPSHOT: JobSnapshot = Object.freeze({
  totalCount: 0,
  topJobs: Object.freeze([]),
});
