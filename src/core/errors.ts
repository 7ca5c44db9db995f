/**
 * Raised at startup when a required setting is missing or invalid.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * The issue catalog file exists but cannot be read as a list of issues.
 * The run stops instead of replacing the file with an empty catalog.
 */
export class CatalogLoadError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    cause?: Error
  ) {
    super(message, { cause });
    this.name = "CatalogLoadError";
  }
}

export class ConversationFileError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    cause?: Error
  ) {
    super(message, { cause });
    this.name = "ConversationFileError";
  }
}

/**
 * Helpdesk API failure. `statusCode` is undefined for connection errors and timeouts.
 */
export class HelpdeskError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly url?: string,
    cause?: Error
  ) {
    super(message, { cause });
    this.name = "HelpdeskError";
  }

  get retryable(): boolean {
    return this.statusCode === undefined || this.statusCode >= 500;
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
