export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Browser launch, navigation or timeout failure
export class FetchError extends MonitorError {
  constructor(
    public readonly url: string,
    cause: unknown
  ) {
    super(`Failed to load ${url}: ${describeError(cause)}`, { cause });
  }
}

// Page rendered but the expected elements are gone
export class ExtractionError extends MonitorError {
  constructor(
    message: string,
    public readonly url: string
  ) {
    super(`${message} (${url})`);
  }
}

export class NotificationError extends MonitorError {
  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${describeError(cause)}`, { cause });
  }
}

export class StateIOError extends MonitorError {
  constructor(
    public readonly path: string,
    public readonly operation: "read" | "write",
    cause: unknown
  ) {
    super(`Failed to ${operation} ${path}: ${describeError(cause)}`, { cause });
  }
}

export class ConfigError extends MonitorError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
