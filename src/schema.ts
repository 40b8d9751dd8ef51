import * as v from "valibot";
import { RegistryError, err, ok, type Result } from "./errors";
import type { Command } from "./types";
import { addressSchema, tokenIdSchema } from "./types/brands";

export const mintSchema = v.object({
  type: v.literal("mint"),
  to: addressSchema,
  tokenId: tokenIdSchema,
  uri: v.string(),
});

export const approveSchema = v.object({
  type: v.literal("approve"),
  caller: addressSchema,
  delegate: addressSchema,
  tokenId: tokenIdSchema,
});

export const approvalForAllSchema = v.object({
  type: v.literal("setApprovalForAll"),
  caller: addressSchema,
  operator: addressSchema,
  approved: v.boolean(),
});

export const transferSchema = v.object({
  type: v.literal("transfer"),
  caller: addressSchema,
  from: addressSchema,
  to: addressSchema,
  tokenId: tokenIdSchema,
});

export const commandSchema = v.variant("type", [
  mintSchema,
  approveSchema,
  approvalForAllSchema,
  transferSchema,
]);

/** Validates an untrusted (e.g. JSON-decoded) command. */
export const parseCommand = (raw: unknown): Result<Command> => {
  const parsed = v.safeParse(commandSchema, raw);
  if (!parsed.success) {
    return err(new RegistryError("MalformedInput", v.summarize(parsed.issues)));
  }
  return ok(parsed.output);
};
