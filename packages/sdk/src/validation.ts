/**
 * Record validation: zod issues normalized to JSON Pointer issues
 */

import type { ZodIssue } from "zod";
import type { Attributes, AttributeSchema, ValidationIssue, ValidationIssueCode } from "./types.js";
import { ValidationFailedError } from "./errors.js";

/**
 * Plain object check (excludes null and arrays)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Build a JSON Pointer from a zod path
 */
export function toPointer(path: ReadonlyArray<string | number>): string {
  return path.map((segment) => `/${String(segment).replace(/~/g, "~0").replace(/\//g, "~1")}`).join("");
}

export const ID_WHITESPACE_MESSAGE = "id must not have leading or trailing whitespace";

/**
 * True when an identifier has leading or trailing whitespace; such ids are never stored
 */
export function hasSurroundingWhitespace(id: string): boolean {
  return id !== id.trim();
}

function mapIssueCode(issue: ZodIssue): ValidationIssueCode {
  switch (issue.code) {
    case "invalid_type":
      return issue.received === "undefined" ? "required" : "type";
    case "invalid_literal":
    case "invalid_enum_value":
      return "enum";
    case "invalid_string":
      return issue.validation === "regex" ? "pattern" : "format";
    case "unrecognized_keys":
      return "additional";
    case "too_small":
      return issue.type === "string" ? "minLength" : "minimum";
    case "too_big":
      return issue.type === "string" ? "maxLength" : "maximum";
    default:
      return "custom";
  }
}

/**
 * Normalize zod issues; unrecognized keys become one issue per key
 */
export function normalizeIssues(issues: readonly ZodIssue[]): ValidationIssue[] {
  return issues.flatMap((issue): ValidationIssue[] => {
    if (issue.code === "unrecognized_keys") {
      return issue.keys.map((key) => ({
        code: "additional",
        pointer: toPointer([...issue.path, key]),
        message: `unknown attribute "${key}"`,
      }));
    }

    return [{ code: mapIssueCode(issue), pointer: toPointer(issue.path), message: issue.message }];
  });
}

/**
 * Validate an untrusted create payload
 * @returns Requested identifier ("" and undefined both mean "generate") and parsed attributes
 * @throws {ValidationFailedError}
 */
export function validateInput<T extends Attributes>(
  schema: AttributeSchema<T>,
  value: unknown
): { id: string | undefined; attributes: T } {
  if (!isPlainObject(value)) {
    throw new ValidationFailedError([
      { code: "type", pointer: "", message: "record must be an object" },
    ]);
  }

  const { id, ...rest } = value;
  const issues: ValidationIssue[] = [];

  if (id !== undefined && typeof id !== "string") {
    issues.push({ code: "type", pointer: "/id", message: "id must be a string" });
  } else if (typeof id === "string" && hasSurroundingWhitespace(id)) {
    issues.push({ code: "pattern", pointer: "/id", message: ID_WHITESPACE_MESSAGE });
  }

  const parsed = schema.safeParse(rest);
  if (!parsed.success) {
    issues.push(...normalizeIssues(parsed.error.issues));
  }

  if (!parsed.success || issues.length > 0) {
    throw new ValidationFailedError(issues);
  }

  return { id: typeof id === "string" && id !== "" ? id : undefined, attributes: parsed.data };
}
