export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Leaders or target URLs were not provided; the run stops before any work. */
export class ConfigurationMissingError extends MonitorError {
  constructor(readonly missing: string[]) {
    super(`Missing required configuration: ${missing.join(", ")}`);
  }
}

export class ConfigurationInvalidError extends MonitorError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}

export class FetchError extends MonitorError {
  constructor(readonly url: string, message: string, readonly status?: number) {
    super(message);
  }
}

export class ClassificationError extends MonitorError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
