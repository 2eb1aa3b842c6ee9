export class SourceNotFoundError extends Error {
  constructor(message = "No CSV source found") {
    super(message);
    this.name = "SourceNotFoundError";
  }
}

export class ColumnResolutionError extends Error {
  constructor(
    readonly missing: string[],
    readonly headers: string[],
  ) {
    super(
      `Required CSV column(s) not found: ${missing.join(", ")} (headers: ${
        headers.length > 0 ? headers.join(", ") : "<none>"
      })`,
    );
    this.name = "ColumnResolutionError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type LookupFailureKind = "not_found" | "http" | "network" | "timeout" | "invalid_response";

export class LookupError extends Error {
  constructor(
    message: string,
    readonly kind: LookupFailureKind,
    readonly status?: number,
  ) {
    super(message);
    this.name = "LookupError";
  }
}

/** Errors that abort a run before any row is processed. */
export const isFatalRunError = (error: unknown): error is SourceNotFoundError | ColumnResolutionError | ConfigError =>
  error instanceof SourceNotFoundError ||
  error instanceof ColumnResolutionError ||
  error instanceof ConfigError;
