/**
 * Store adapter for CLI: one store per invocation, closed afterwards
 */

import * as path from "node:path";
import { ensureDirectory, openUserStore, type UserStore } from "@userstore/sdk";

/**
 * Run fn against a freshly opened store.
 * The file may be shared with a running server, so `<file>.lock` is held per operation.
 */
export async function withCliStore<T>(file: string, fn: (store: UserStore) => Promise<T>): Promise<T> {
  const store = openUserStore(file, { crossProcessLock: true });
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}

/**
 * Create the data directory and an empty collection if absent
 */
export async function initDataFile(file: string): Promise<void> {
  await ensureDirectory(path.dirname(file));
  await withCliStore(file, (store) => store.init());
}
