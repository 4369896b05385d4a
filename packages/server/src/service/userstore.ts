/**
 * User store service adapter
 * Wraps the SDK store with payload limits and logging
 */

import { openUserStore, ValidationFailedError, type User, type UserStore } from "@userstore/sdk";
import type { Logger } from "../observability/logger.js";

// Maximum create payload size in bytes (64KB)
const MAX_PAYLOAD_SIZE = 64 * 1024;

export class UserStoreService {
  #store: UserStore;
  #logger: Logger;

  constructor(store: UserStore, logger: Logger) {
    this.#store = store;
    this.#logger = logger;
    logger.info("service.init", { data_file: store.file });
  }

  /**
   * Open the service on a data file other processes (the CLI) may write too.
   * The cross-process lock makes every call re-read the file under `<file>.lock`.
   */
  static open(file: string, logger: Logger): UserStoreService {
    return new UserStoreService(openUserStore(file, { crossProcessLock: true }), logger);
  }

  get file(): string {
    return this.#store.file;
  }

  async list(): Promise<User[]> {
    return this.#store.list();
  }

  /**
   * Returns null if not found (not an error)
   */
  async get(id: string): Promise<User | null> {
    return this.#store.get(id);
  }

  /**
   * Validate an untrusted payload and create the user
   * @throws {ValidationFailedError} On oversized or malformed payloads
   */
  async create(payload: unknown): Promise<User> {
    const byteLength = Buffer.byteLength(JSON.stringify(payload) ?? "", "utf8");
    if (byteLength > MAX_PAYLOAD_SIZE) {
      throw new ValidationFailedError([
        {
          code: "maxLength",
          pointer: "",
          message: `payload of ${byteLength} bytes exceeds limit of ${MAX_PAYLOAD_SIZE} bytes`,
        },
      ]);
    }

    const user = await this.#store.create(this.#store.parseInput(payload));
    this.#logger.debug("service.create", { id: user.id });
    return user;
  }

  /**
   * @throws {NotFoundError} When no user has the id
   */
  async delete(id: string): Promise<void> {
    await this.#store.delete(id);
    this.#logger.debug("service.delete", { id });
  }

  async close(): Promise<void> {
    await this.#store.close();
  }
}
