// src/errors.ts

/** The standings source could not be reached or returned something unusable. */
export class SourceUnavailableError extends Error {
  constructor(
    message: string,
    readonly source: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SourceUnavailableError";
  }
}

/** A required setting or file is absent; the run cannot proceed. */
export class ConfigurationMissingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationMissingError";
  }
}

/** A setting is present but invalid. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
