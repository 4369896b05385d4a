/**
 * Record store SDK
 *
 * A concurrency-safe, file-persisted CRUD store for one entity type
 */

// Re-export types
export type {
  Attributes,
  StoredRecord,
  NewRecord,
  AttributeSchema,
  ValidationIssue,
  ValidationIssueCode,
  CanonicalOptions,
  SnapshotCodec,
  CrossProcessLockOptions,
  StoreOptions,
  RecordStore,
} from "./types.js";

// Store
export { openRecordStore } from "./store.js";

// Codec and formatting
export { jsonCodec, DEFAULT_CANONICAL_OPTIONS } from "./codec.js";
export { canonicalize } from "./format/canonical.js";

// Validation
export {
  validateInput,
  normalizeIssues,
  toPointer,
  hasSurroundingWhitespace,
  ID_WHITESPACE_MESSAGE,
} from "./validation.js";

// I/O and locking
export { atomicWrite, readSnapshotFile, ensureDirectory, sweepTempFiles } from "./io.js";
export { Mutex, FileLock } from "./lock.js";

// Errors
export {
  RecordStoreError,
  ValidationFailedError,
  DuplicateIdentifierError,
  NotFoundError,
  StorageUnavailableError,
  CorruptStateError,
  isRecordStoreError,
} from "./errors.js";
export type { RecordStoreErrorCode } from "./errors.js";

// User entity
export { UserAttributesSchema, openUserStore } from "./entities/user.js";
export type { UserAttributes, User, UserStore } from "./entities/user.js";
