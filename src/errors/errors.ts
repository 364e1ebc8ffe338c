/**
 * Error taxonomy
 *
 * Every failure the sync tooling raises on purpose is one of these classes.
 * The class decides the blast radius:
 * - ValidationError: the item is skipped, the run continues
 * - AmbiguousReferenceError / UnresolvedReferenceError: the reference is left as-is
 * - RemoteOperationError: the current stage aborts
 * - ArchiveFormatError: the whole import aborts before any local write
 * - ResourceDecodeError: the resource is skipped and reported in the summary
 */

/**
 * Base class carrying structured context for log output.
 */
export class CourseSyncError extends Error {
  constructor(
    message: string,
    public readonly context: Record<string, unknown> = {},
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CourseSyncError';
  }
}

/** Malformed or missing required source fields */
export class ValidationError extends CourseSyncError {
  constructor(
    message: string,
    public readonly sourcePath: string,
    public readonly issues: string[] = [],
    cause?: Error
  ) {
    super(message, { sourcePath, issues }, cause);
    this.name = 'ValidationError';
  }
}

/** A bare filename matched more than one file in the shared assets tree */
export class AmbiguousReferenceError extends CourseSyncError {
  constructor(
    public readonly reference: string,
    public readonly candidates: string[]
  ) {
    super(
      `Ambiguous asset reference "${reference}" matches ${candidates.length} files: ${candidates.join(', ')}`,
      { reference, candidates }
    );
    this.name = 'AmbiguousReferenceError';
  }
}

/** An asset reference that matched nothing */
export class UnresolvedReferenceError extends CourseSyncError {
  constructor(
    public readonly reference: string,
    public readonly searched: string[] = []
  ) {
    super(`Cannot resolve asset reference "${reference}"`, { reference, searched });
    this.name = 'UnresolvedReferenceError';
  }
}

/** The remote platform rejected or failed a request */
export class RemoteOperationError extends CourseSyncError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly status?: number,
    cause?: Error
  ) {
    super(message, { operation, status }, cause);
    this.name = 'RemoteOperationError';
  }
}

/** Archive missing its manifest or a required top-level file, or not a zip at all */
export class ArchiveFormatError extends CourseSyncError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: Error) {
    super(message, context, cause);
    this.name = 'ArchiveFormatError';
  }
}

/** A single package resource that could not be decoded */
export class ResourceDecodeError extends CourseSyncError {
  constructor(
    message: string,
    public readonly resourceId: string,
    cause?: Error
  ) {
    super(message, { resourceId }, cause);
    this.name = 'ResourceDecodeError';
  }
}

/**
 * Coerce an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
