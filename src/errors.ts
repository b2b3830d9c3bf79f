/**
 * Error types raised by the metrics engine and its collaborators.
 *
 * Every error carries a stable `code` so the CLI (or any other caller) can decide
 * whether to abort or degrade without matching on message text.
 */

export type MetricsErrorCode =
  | "EMPTY_DATASET"
  | "INVALID_WINDOW_SPEC"
  | "AMBIGUOUS_LOOKUP"
  | "UNDEFINED_RATIO"
  | "COHORT_INVARIANT"
  | "INVALID_MAPPING"
  | "DUMP_FORMAT";

export class MetricsError extends Error {
  public readonly code: MetricsErrorCode;

  public override readonly cause?: Error;

  constructor(message: string, code: MetricsErrorCode, cause?: Error) {
    super(message);
    this.name = "MetricsError";
    this.code = code;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Raised when an aggregation receives no records with a usable timestamp.
 * A dataset with records but an empty window yields a zero count instead.
 */
export class EmptyDatasetError extends MetricsError {
  constructor(operation: string) {
    super(`${operation}: dataset has no records with a valid timestamp`, "EMPTY_DATASET");
    this.name = "EmptyDatasetError";
  }
}

/**
 * Raised for non-positive periods and widths, and for thresholds below their minimum.
 */
export class InvalidWindowSpecError extends MetricsError {
  public readonly parameter: string;

  constructor(parameter: string, value: unknown, requirement: string) {
    super(`Invalid ${parameter} (${String(value)}): ${requirement}`, "INVALID_WINDOW_SPEC");
    this.name = "InvalidWindowSpecError";
    this.parameter = parameter;
  }
}

/**
 * Raised when more than one user-info entry resolves the same identifier.
 */
export class AmbiguousLookupError extends MetricsError {
  public readonly key: string;
  public readonly matches: number;

  constructor(key: string, matches: number) {
    super(`Multiple (${matches}) user entries share account number ${key}`, "AMBIGUOUS_LOOKUP");
    this.name = "AmbiguousLookupError";
    this.key = key;
    this.matches = matches;
  }
}

export class UndefinedRatioError extends MetricsError {
  public readonly at: Date;

  constructor(what: string, at: Date) {
    super(`${what} is undefined at ${at.toISOString()}: denominator is zero`, "UNDEFINED_RATIO");
    this.name = "UndefinedRatioError";
    this.at = at;
  }
}

/**
 * New-organization counts exceeded total counts for a bucket. Points at a bug in
 * first-seen tracking, never at bad input.
 */
export class CohortInvariantError extends MetricsError {
  constructor(bucketStart: Date, total: number, fresh: number) {
    super(
      `Cohort invariant violated for bucket ${bucketStart.toISOString()}: ${fresh} new of ${total} total`,
      "COHORT_INVARIANT"
    );
    this.name = "CohortInvariantError";
  }
}

export class InvalidMappingError extends MetricsError {
  constructor(message: string) {
    super(message, "INVALID_MAPPING");
    this.name = "InvalidMappingError";
  }
}

export class DumpFormatError extends MetricsError {
  constructor(message: string, cause?: Error) {
    super(message, "DUMP_FORMAT", cause);
    this.name = "DumpFormatError";
  }
}
