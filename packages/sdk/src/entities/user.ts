/**
 * User entity: the records managed by the CLI and the MCP server
 */

import { z } from "zod";
import type { RecordStore, StoreOptions, StoredRecord } from "../types.js";
import { openRecordStore } from "../store.js";

export const UserAttributesSchema = z
  .object({
    name: z
      .string({ required_error: "name is required", invalid_type_error: "name must be a string" })
      .trim()
      .min(1, "name must not be empty")
      .max(200, "name must be at most 200 characters"),
    email: z
      .string({ invalid_type_error: "email must be a string" })
      .email("email must be a valid e-mail address")
      .optional(),
    phone: z
      .string({ invalid_type_error: "phone must be a string" })
      .max(40, "phone must be at most 40 characters")
      .optional(),
  })
  .strict();

export type UserAttributes = z.infer<typeof UserAttributesSchema>;

export type User = StoredRecord<UserAttributes>;

export type UserStore = RecordStore<UserAttributes>;

/**
 * Open the user store on a backing file
 */
export function openUserStore(
  file: string,
  options: Omit<StoreOptions<UserAttributes>, "file" | "schema"> = {}
): UserStore {
  return openRecordStore<UserAttributes>({ ...options, file, schema: UserAttributesSchema });
}
