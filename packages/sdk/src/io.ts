/**
 * Atomic file I/O operations for crash-safe snapshot writes
 *
 * Invariants:
 * - Writes are atomic: readers never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only; a missing file reads as null
 * - Parent directories are never created implicitly by writes
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { StorageUnavailableError } from "./errors.js";

/**
 * Extract the errno code from an unknown thrown value
 */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Temp file name for a target: `.<base>.<uuid>.tmp` beside it
 */
export function tempPathFor(filePath: string): string {
  return join(dirname(filePath), `.${basename(filePath)}.${randomUUID()}.tmp`);
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new StorageUnavailableError(dirPath, "cannot create directory", { cause: err });
  }
}

/**
 * Atomically replace a file's content using the write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 * @throws {StorageUnavailableError} On any failure; the target keeps its previous content
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = tempPathFor(filePath);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content, "utf-8");

    // Prefer datasync, fall back to full sync
    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      const code = errnoCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    try {
      await fs.rename(tmp, filePath);
    } catch (err) {
      // On Windows, rename may fail transiently when antivirus or indexing grabs the file
      const code = errnoCode(err);
      if (
        (code === "EPERM" || code === "EACCES" || code === "EBUSY") &&
        process.platform === "win32"
      ) {
        await new Promise((resolve) => setTimeout(resolve, 10));
        await fs.rename(tmp, filePath);
      } else {
        throw err;
      }
    }

    await syncDirectory(dir);
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }

    // Temp file may not exist if open() failed
    await fs.unlink(tmp).catch(() => undefined);

    throw new StorageUnavailableError(filePath, "write failed", { cause: err });
  }
}

/**
 * Best-effort fsync of a directory so the rename itself is durable.
 * Platforms without directory fsync (Windows) fail here; the rename has already landed.
 */
async function syncDirectory(dir: string): Promise<void> {
  let dirHandle: fs.FileHandle | null = null;
  try {
    dirHandle = await fs.open(dir, "r");
    await dirHandle.sync();
  } catch {
    // Directory entry durability is not guaranteed on this platform
  } finally {
    await dirHandle?.close().catch(() => undefined);
  }
}

/**
 * Read a snapshot file
 * @param filePath - File path to read
 * @returns File contents as UTF-8 string, or null if the file does not exist
 * @throws {StorageUnavailableError} For other read failures
 */
export async function readSnapshotFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return null;
    }
    throw new StorageUnavailableError(filePath, "read failed", { cause: err });
  }
}

/**
 * List files in a directory, optionally filtering by name prefix and suffix
 * @returns Sorted array of filenames (not full paths); empty if the directory doesn't exist
 */
export async function listFiles(
  dirPath: string,
  filter: { prefix?: string; suffix?: string } = {}
): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    return entries
      .filter((entry) => entry.isFile() && !entry.isSymbolicLink())
      .map((entry) => entry.name)
      .filter((name) => !filter.prefix || name.startsWith(filter.prefix))
      .filter((name) => !filter.suffix || name.endsWith(filter.suffix))
      .sort();
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return [];
    }
    throw new StorageUnavailableError(dirPath, "cannot list directory", { cause: err });
  }
}

/**
 * Remove temp files a crashed writer left beside the target
 * @returns Number of files removed
 */
export async function sweepTempFiles(filePath: string): Promise<number> {
  const dir = dirname(filePath);
  const orphans = await listFiles(dir, { prefix: `.${basename(filePath)}.`, suffix: ".tmp" });

  for (const name of orphans) {
    try {
      await fs.unlink(join(dir, name));
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        throw new StorageUnavailableError(join(dir, name), "cannot remove temp file", {
          cause: err,
        });
      }
    }
  }

  return orphans.length;
}
