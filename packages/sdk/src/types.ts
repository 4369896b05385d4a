/**
 * Core types for the record store
 */

import type { z } from "zod";

/**
 * Caller-defined attributes of a record (everything except `id`)
 */
export type Attributes = Record<string, unknown>;

/**
 * A persisted record: attributes plus the store-assigned identifier
 */
export type StoredRecord<T extends Attributes> = T & { id: string };

/**
 * Input to create(); an empty or missing `id` asks the store to generate one
 */
export type NewRecord<T extends Attributes> = T & { id?: string };

/**
 * Zod schema describing the attributes of one entity type.
 * Required fields are plain; optional fields use `.optional()`.
 */
export type AttributeSchema<T extends Attributes> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Validation issue codes
 */
export type ValidationIssueCode =
  | "required"
  | "type"
  | "enum"
  | "format"
  | "additional"
  | "pattern"
  | "minimum"
  | "maximum"
  | "minLength"
  | "maxLength"
  | "custom";

/**
 * Validation issue with JSON Pointer path
 */
export interface ValidationIssue {
  /** Issue code categorizing the type of validation failure */
  code: ValidationIssueCode;
  /** JSON Pointer path to the failing field (e.g., "/email"), "" for the record itself */
  pointer: string;
  /** Human-readable message */
  message: string;
}

/**
 * Canonical JSON formatting options
 */
export interface CanonicalOptions {
  /** Spaces per indent level; 0 writes one line */
  indent: number;
  /** Keys written first, in this order; the rest follow in code point order */
  leadingKeys: readonly string[];
}

/**
 * Serialize/deserialize pair for the whole snapshot.
 * deserialize may throw; the store reports that as corrupt state.
 */
export interface SnapshotCodec {
  serialize(records: readonly Readonly<Attributes>[]): string;
  deserialize(raw: string): unknown;
}

export interface CrossProcessLockOptions {
  /** Maximum time to wait for the lock file (default: 10000ms) */
  timeoutMs?: number;
  /** Time between acquisition attempts (default: 25ms) */
  retryIntervalMs?: number;
}

export interface StoreOptions<T extends Attributes> {
  /** Backing file path; resolved to an absolute path */
  file: string;
  /** Attribute schema; must not declare `id` */
  schema: AttributeSchema<T>;
  /** Snapshot codec (default: canonical JSON array) */
  codec?: SnapshotCodec;
  /** Identifier generator (default: crypto.randomUUID) */
  generateId?: () => string;
  /**
   * Hold `<file>.lock` around every operation so several processes can share the file.
   * Disables snapshot caching.
   */
  crossProcessLock?: boolean | CrossProcessLockOptions;
}

/**
 * Concurrency-safe, file-persisted CRUD store for one entity type
 */
export interface RecordStore<T extends Attributes> {
  /** Absolute path of the backing file */
  readonly file: string;

  /**
   * Ensure the backing file exists, writing an empty collection when absent
   * @throws {CorruptStateError} If an existing file does not decode
   */
  init(): Promise<void>;

  /**
   * All records in insertion order; the returned array and records are copies
   */
  list(): Promise<StoredRecord<T>[]>;

  /**
   * One record by identifier, or null
   */
  get(id: string): Promise<StoredRecord<T> | null>;

  /**
   * Validate, assign an identifier if needed, append and persist
   * @throws {ValidationFailedError} If attributes are missing or malformed
   * @throws {DuplicateIdentifierError} If the identifier is already stored
   */
  create(input: NewRecord<T>): Promise<StoredRecord<T>>;

  /**
   * Remove a record and persist
   * @throws {NotFoundError} If no record has the identifier
   */
  delete(id: string): Promise<void>;

  /**
   * Validate an untrusted payload into a create input
   * @throws {ValidationFailedError}
   */
  parseInput(value: unknown): NewRecord<T>;

  /**
   * Drop the cached snapshot; the next operation re-reads the file
   */
  reload(): Promise<void>;

  /**
   * Wait for in-flight operations and release resources.
   * Later calls reject with StorageUnavailableError.
   */
  close(): Promise<void>;
}
