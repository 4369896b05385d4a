/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { hasSurroundingWhitespace, ID_WHITESPACE_MESSAGE } from "@userstore/sdk";

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Check an identifier given on the command line; the store's id rule applies
 */
export function parseId(value: string): string {
  if (value.trim() === "") {
    throw new InvalidArgumentError("id must not be empty");
  }
  if (hasSurroundingWhitespace(value)) {
    throw new InvalidArgumentError(ID_WHITESPACE_MESSAGE);
  }

  return value;
}

/**
 * Collect the attribute flags that were actually given
 */
export function pickDefined(fields: Record<string, string | undefined>): Record<string, string> {
  const picked: Record<string, string> = {};

  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      picked[key] = value;
    }
  }

  return picked;
}
