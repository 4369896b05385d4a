/**
 * Error types for record store operations
 *
 * Invariants:
 * - Storage errors include the absolute backing file path in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

import type { ValidationIssue } from "./types.js";

export type RecordStoreErrorCode =
  | "VALIDATION_FAILED"
  | "DUPLICATE_ID"
  | "NOT_FOUND"
  | "STORAGE_UNAVAILABLE"
  | "CORRUPT_STATE";

/**
 * Base class for all record store errors
 */
export abstract class RecordStoreError extends Error {
  abstract readonly code: RecordStoreErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a record is missing required attributes or has malformed ones
 */
export class ValidationFailedError extends RecordStoreError {
  readonly code = "VALIDATION_FAILED";

  constructor(
    public readonly issues: ValidationIssue[],
    options?: ErrorOptions
  ) {
    super(
      `Record failed validation: ${issues.map((issue) => `${issue.pointer || "/"} ${issue.message}`).join("; ")}`,
      options
    );
  }
}

/**
 * Thrown when a create collides with an existing identifier
 */
export class DuplicateIdentifierError extends RecordStoreError {
  readonly code = "DUPLICATE_ID";

  constructor(
    public readonly id: string,
    options?: ErrorOptions
  ) {
    super(`Record already exists: ${id}`, options);
  }
}

/**
 * Thrown when a delete targets an identifier that is not stored
 */
export class NotFoundError extends RecordStoreError {
  readonly code = "NOT_FOUND";

  constructor(
    public readonly id: string,
    options?: ErrorOptions
  ) {
    super(`Record not found: ${id}`, options);
  }
}

/**
 * Thrown when the backing file cannot be read, written or locked
 */
export class StorageUnavailableError extends RecordStoreError {
  readonly code = "STORAGE_UNAVAILABLE";

  constructor(
    public readonly path: string,
    public readonly reason?: string,
    options?: ErrorOptions
  ) {
    super(`Storage unavailable: ${path}${reason ? ` (${reason})` : ""}`, options);
  }
}

/**
 * Thrown when the backing file holds content that does not decode to a valid snapshot.
 * The store never overwrites a file in this state.
 */
export class CorruptStateError extends RecordStoreError {
  readonly code = "CORRUPT_STATE";

  constructor(
    public readonly path: string,
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`Corrupt snapshot in ${path}: ${reason}`, options);
  }
}

export function isRecordStoreError(err: unknown): err is RecordStoreError {
  return err instanceof RecordStoreError;
}
