/**
 * Main store implementation
 */

import { randomUUID } from "node:crypto";
import * as path from "node:path";
import { z } from "zod";
import type {
  Attributes,
  AttributeSchema,
  NewRecord,
  RecordStore,
  SnapshotCodec,
  StoreOptions,
  StoredRecord,
} from "./types.js";
import { jsonCodec } from "./codec.js";
import { atomicWrite, readSnapshotFile, sweepTempFiles } from "./io.js";
import { FileLock, Mutex } from "./lock.js";
import {
  hasSurroundingWhitespace,
  isPlainObject,
  normalizeIssues,
  validateInput,
} from "./validation.js";
import {
  CorruptStateError,
  DuplicateIdentifierError,
  NotFoundError,
  StorageUnavailableError,
} from "./errors.js";

/** Attempts at drawing an unused identifier from the generator */
const MAX_ID_ATTEMPTS = 8;

/**
 * File-backed record store
 *
 * Every operation runs under one exclusive lock covering the whole
 * read-modify-write cycle. Mutations are applied to a copy of the snapshot,
 * persisted with an atomic rename, and only then become the cached snapshot,
 * so a failed write leaves both disk and memory at the previous state.
 *
 * @example
 * ```typescript
 * const store = openRecordStore({
 *   file: './data/users.json',
 *   schema: z.object({ name: z.string(), email: z.string().email().optional() }),
 * });
 *
 * const ada = await store.create({ name: 'Ada' });
 * await store.list();          // [{ id: '…', name: 'Ada' }]
 * await store.delete(ada.id);
 * ```
 */
class FileRecordStore<T extends Attributes> implements RecordStore<T> {
  #file: string;
  #schema: AttributeSchema<T>;
  #codec: SnapshotCodec;
  #generateId: () => string;
  #mutex = new Mutex();
  #fileLock: FileLock | null;
  #snapshot: StoredRecord<T>[] | null = null;
  #swept = false;
  #closed = false;

  constructor(options: StoreOptions<T>) {
    if (options.schema instanceof z.ZodObject && "id" in options.schema.shape) {
      throw new TypeError("Attribute schema must not declare an id field");
    }

    this.#file = path.resolve(options.file);
    this.#schema = options.schema;
    this.#codec = options.codec ?? jsonCodec();
    this.#generateId = options.generateId ?? randomUUID;

    const lockOptions = options.crossProcessLock;
    this.#fileLock = lockOptions
      ? new FileLock(`${this.#file}.lock`, lockOptions === true ? {} : lockOptions)
      : null;
  }

  get file(): string {
    return this.#file;
  }

  async init(): Promise<void> {
    await this.#withExclusive(async () => {
      const raw = await readSnapshotFile(this.#file);
      if (raw === null) {
        await this.#persist([]);
        return;
      }
      // Decoding rejects corrupt content before anything is written
      this.#snapshot = this.#decode(raw);
    });
  }

  async list(): Promise<StoredRecord<T>[]> {
    return this.#withExclusive(async () => structuredClone(await this.#load()));
  }

  async get(id: string): Promise<StoredRecord<T> | null> {
    return this.#withExclusive(async () => {
      const record = (await this.#load()).find((candidate) => candidate.id === id);
      return record ? structuredClone(record) : null;
    });
  }

  async create(input: NewRecord<T>): Promise<StoredRecord<T>> {
    this.#assertOpen();
    // Validation needs no lock; keep it out of the critical section
    const { id: requestedId, attributes } = validateInput(this.#schema, input);

    return this.#withExclusive(async () => {
      const current = await this.#load();
      const id = requestedId ?? this.#nextId(current);

      if (current.some((record) => record.id === id)) {
        throw new DuplicateIdentifierError(id);
      }

      const record: StoredRecord<T> = { ...attributes, id };
      const next = [...current, record];
      await this.#persist(next);

      return structuredClone(record);
    });
  }

  async delete(id: string): Promise<void> {
    await this.#withExclusive(async () => {
      const current = await this.#load();
      const next = current.filter((record) => record.id !== id);

      if (next.length === current.length) {
        throw new NotFoundError(id);
      }

      await this.#persist(next);
    });
  }

  parseInput(value: unknown): NewRecord<T> {
    const { id, attributes } = validateInput(this.#schema, value);
    return { ...attributes, id };
  }

  async reload(): Promise<void> {
    await this.#withExclusive(async () => {
      this.#snapshot = null;
    });
  }

  async close(): Promise<void> {
    if (this.#closed) {
      return;
    }
    // Queued behind in-flight operations
    await this.#mutex.runExclusive(async () => {
      this.#closed = true;
      this.#snapshot = null;
    });
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new StorageUnavailableError(this.#file, "store is closed");
    }
  }

  async #withExclusive<R>(fn: () => Promise<R>): Promise<R> {
    this.#assertOpen();

    return this.#mutex.runExclusive(async () => {
      // close() may have run while this call was queued
      this.#assertOpen();

      const fileLock = this.#fileLock;
      if (!fileLock) {
        return fn();
      }

      // Another process may have written since the last operation
      this.#snapshot = null;
      return fileLock.withLock(fn);
    });
  }

  async #load(): Promise<StoredRecord<T>[]> {
    if (this.#snapshot) {
      return this.#snapshot;
    }

    if (!this.#swept) {
      await sweepTempFiles(this.#file);
      this.#swept = true;
    }

    const raw = await readSnapshotFile(this.#file);
    if (raw === null) {
      // Never leave the file absent once the store has touched it
      const empty: StoredRecord<T>[] = [];
      await this.#persist(empty);
      return empty;
    }

    this.#snapshot = this.#decode(raw);
    return this.#snapshot;
  }

  async #persist(records: StoredRecord<T>[]): Promise<void> {
    await atomicWrite(this.#file, this.#codec.serialize(records));
    this.#snapshot = records;
  }

  #decode(raw: string): StoredRecord<T>[] {
    let decoded: unknown;
    try {
      decoded = this.#codec.deserialize(raw);
    } catch (err) {
      throw new CorruptStateError(this.#file, "content does not parse", { cause: err });
    }

    if (!Array.isArray(decoded)) {
      throw new CorruptStateError(this.#file, "expected an array of records");
    }

    const entries: unknown[] = decoded;
    const seen = new Set<string>();
    const records: StoredRecord<T>[] = [];

    for (const [index, entry] of entries.entries()) {
      if (!isPlainObject(entry)) {
        throw new CorruptStateError(this.#file, `record ${index} is not an object`);
      }

      const { id, ...rest } = entry;
      if (typeof id !== "string" || id === "") {
        throw new CorruptStateError(this.#file, `record ${index} has no identifier`);
      }
      if (seen.has(id)) {
        throw new CorruptStateError(this.#file, `identifier ${id} appears more than once`);
      }
      seen.add(id);

      const parsed = this.#schema.safeParse(rest);
      if (!parsed.success) {
        const detail = normalizeIssues(parsed.error.issues)
          .map((issue) => `${issue.pointer || "/"} ${issue.message}`)
          .join("; ");
        throw new CorruptStateError(this.#file, `record ${id} is invalid: ${detail}`);
      }

      records.push({ ...parsed.data, id });
    }

    return records;
  }

  #nextId(current: readonly StoredRecord<T>[]): string {
    const taken = new Set(current.map((record) => record.id));
    let candidate = "";

    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      candidate = this.#generateId();
      if (candidate === "" || hasSurroundingWhitespace(candidate)) {
        throw new TypeError(`Identifier generator produced an unusable id: ${JSON.stringify(candidate)}`);
      }
      if (!taken.has(candidate)) {
        return candidate;
      }
    }

    throw new DuplicateIdentifierError(candidate);
  }
}

/**
 * Open a record store on a backing file.
 * Nothing is read until the first operation.
 */
export function openRecordStore<T extends Attributes>(options: StoreOptions<T>): RecordStore<T> {
  return new FileRecordStore(options);
}
