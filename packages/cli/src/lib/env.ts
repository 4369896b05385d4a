/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

export const DEFAULT_DATA_FILE = "./data/users.json";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" is left to the shell
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the backing data file
 * Priority: CLI option > USERSTORE_FILE env var > default "./data/users.json"
 */
export function resolveDataFile(cliFile?: string): string {
  const file = cliFile || process.env.USERSTORE_FILE || DEFAULT_DATA_FILE;
  return path.resolve(expandTilde(file));
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.USERSTORE_CLI_DEBUG === "1";
}
