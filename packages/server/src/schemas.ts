/**
 * Zod schemas for validating tool inputs
 * Attribute rules live in the SDK; these only shape the arguments
 */

import { z } from "zod";
import { hasSurroundingWhitespace, ID_WHITESPACE_MESSAGE } from "@userstore/sdk";

// Same id rule as the store applies on create
const IdSchema = z
  .string({ required_error: "id is required" })
  .min(1, "id must be non-empty")
  .max(200, "id must be at most 200 characters")
  .refine((id) => !hasSurroundingWhitespace(id), ID_WHITESPACE_MESSAGE);

export const ListUsersInputSchema = z.object({}).strict();

export const GetUserInputSchema = z.object({ id: IdSchema }).strict();

// Attributes are passed through to the store, which validates them
export const CreateUserInputSchema = z
  .object({
    id: z.string().optional(),
  })
  .passthrough();

export const DeleteUserInputSchema = z.object({ id: IdSchema }).strict();

export type GetUserInput = z.infer<typeof GetUserInputSchema>;
export type CreateUserInput = z.infer<typeof CreateUserInputSchema>;
export type DeleteUserInput = z.infer<typeof DeleteUserInputSchema>;
