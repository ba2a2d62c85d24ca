export type TracepackErrorCode =
  | "ConfigError"
  | "MissingReferenceUnit"
  | "TracerState"
  | "DestinationCollision"
  | "CopyError";

export interface TracepackErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

/**
 * Base class for every error tracepack throws. Resolution and snapshot
 * failures are not thrown; they are returned or logged where they happen.
 */
export class TracepackError extends Error {
  public readonly code: TracepackErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: TracepackErrorCode, message: string, options: TracepackErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
  }
}

export class ConfigError extends TracepackError {
  constructor(message: string, options: TracepackErrorOptions = {}) {
    super("ConfigError", message, options);
  }
}

/**
 * The unit used to locate the distribution's own packages is not indexed,
 * so built-in and third-party units cannot be told apart.
 */
export class MissingReferenceUnitError extends TracepackError {
  constructor(public readonly reference: string) {
    super(
      "MissingReferenceUnit",
      `Reference unit "${reference}" is not installed; cannot tell built-in units from third-party ones`,
      { details: { reference } }
    );
  }
}

export class TracerStateError extends TracepackError {
  constructor(message: string, options: TracepackErrorOptions = {}) {
    super("TracerState", message, options);
  }
}

export class DestinationCollisionError extends TracepackError {
  constructor(
    public readonly destination: string,
    public readonly sources: string[]
  ) {
    super(
      "DestinationCollision",
      `${sources.length} different files map to ${destination}: ${sources.join(", ")}`,
      { details: { destination, sources } }
    );
  }
}

export class CopyError extends TracepackError {
  constructor(
    public readonly source: string,
    public readonly destination: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("CopyError", `Failed to copy ${source} to ${destination}: ${reason}`, {
      cause,
      details: { source, destination },
    });
  }
}
