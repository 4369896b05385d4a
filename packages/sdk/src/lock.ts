/**
 * Locks serializing access to a backing file
 *
 * - Mutex: in-process FIFO queue, one holder at a time
 * - FileLock: cross-process lock using exclusive create of a lock file
 */

import * as fs from "node:fs/promises";
import { StorageUnavailableError } from "./errors.js";
import { errnoCode } from "./io.js";

const settle = (): void => undefined;

/**
 * Async mutex. Callers run strictly one after another in arrival order;
 * a rejected holder does not block the queue.
 */
export class Mutex {
  #tail: Promise<void> = Promise.resolve();

  /**
   * Run fn once every earlier holder has settled
   */
  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.#tail.then(fn);
    this.#tail = run.then(settle, settle);
    return run;
  }
}

/**
 * File-based lock using exclusive open (`wx`)
 */
export class FileLock {
  #lockPath: string;
  #timeoutMs: number;
  #retryIntervalMs: number;
  #fd?: fs.FileHandle;
  #acquired = false;

  constructor(lockPath: string, options: { timeoutMs?: number; retryIntervalMs?: number } = {}) {
    this.#lockPath = lockPath;
    this.#timeoutMs = options.timeoutMs ?? 10000;
    this.#retryIntervalMs = options.retryIntervalMs ?? 25;
  }

  /**
   * Acquire the lock (blocking with retries)
   * @throws {StorageUnavailableError} On timeout or an unexpected filesystem error
   */
  async acquire(): Promise<void> {
    if (this.#acquired) {
      throw new Error("Lock already acquired");
    }

    const startTime = Date.now();

    while (true) {
      try {
        // Fails with EEXIST while another holder has the file
        this.#fd = await fs.open(this.#lockPath, "wx");
        this.#acquired = true;

        // PID and timestamp for diagnosing stale locks
        const lockInfo = {
          pid: process.pid,
          acquiredAt: new Date().toISOString(),
        };
        await this.#fd.writeFile(JSON.stringify(lockInfo, null, 2));

        return;
      } catch (err) {
        if (this.#acquired) {
          await this.release();
        }

        if (errnoCode(err) !== "EEXIST") {
          throw new StorageUnavailableError(this.#lockPath, "cannot create lock file", {
            cause: err,
          });
        }

        if (Date.now() - startTime > this.#timeoutMs) {
          throw new StorageUnavailableError(
            this.#lockPath,
            `lock not acquired after ${this.#timeoutMs}ms; delete the lock file if its owner crashed`
          );
        }

        await new Promise((resolve) => setTimeout(resolve, this.#retryIntervalMs));
      }
    }
  }

  /**
   * Release the lock; no-op when not held
   */
  async release(): Promise<void> {
    if (!this.#acquired) {
      return;
    }

    try {
      if (this.#fd) {
        await this.#fd.close();
        this.#fd = undefined;
      }

      await fs.unlink(this.#lockPath);
    } catch (err) {
      // Already cleaned up
      if (errnoCode(err) !== "ENOENT") {
        throw new StorageUnavailableError(this.#lockPath, "cannot release lock file", {
          cause: err,
        });
      }
    } finally {
      this.#acquired = false;
    }
  }

  /**
   * Execute a function with the lock held
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }
}
