/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { isRecordStoreError } from "@userstore/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map store errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/storage/unknown error
 * - 2: user not found
 * - 3: duplicate identifier
 * - 4: corrupt data file
 */
export function mapStoreErrorToExitCode(error: unknown): number {
  if (error instanceof CliError || error instanceof CommanderError) {
    return error.exitCode;
  }

  if (isRecordStoreError(error)) {
    switch (error.code) {
      case "NOT_FOUND":
        return 2;
      case "DUPLICATE_ID":
        return 3;
      case "CORRUPT_STATE":
        return 4;
      default:
        return 1;
    }
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause !== undefined) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
