import * as v from "valibot";
import { RegistryError } from "../errors";

// Branded primitives. Values only exist after passing their schema.

const MAX_U256 = 2n ** 256n - 1n;

export const addressSchema = v.pipe(
  v.string(),
  v.regex(/^0x[0-9a-fA-F]{40}$/, "address must be 0x followed by 40 hex digits"),
  v.toLowerCase(),
  v.brand("Address"),
);

export const tokenIdSchema = v.pipe(
  v.union([
    v.bigint(),
    v.pipe(v.number(), v.safeInteger()),
    v.pipe(v.string(), v.regex(/^(0x[0-9a-fA-F]+|\d+)$/, "token id must be a decimal or 0x-hex integer")),
  ]),
  v.transform((raw) => BigInt(raw)),
  v.minValue(0n, "token id must not be negative"),
  v.maxValue(MAX_U256, "token id must fit in 256 bits"),
  v.brand("TokenId"),
);

export type Hex = `0x${string}`;
export type Address = v.InferOutput<typeof addressSchema>;
export type TokenId = v.InferOutput<typeof tokenIdSchema>;

export const toAddress = (raw: string): Address => {
  const parsed = v.safeParse(addressSchema, raw);
  if (!parsed.success) {
    throw new RegistryError("MalformedInput", `invalid address ${JSON.stringify(raw)}`);
  }
  return parsed.output;
};

export const toTokenId = (raw: bigint | number | string): TokenId => {
  const parsed = v.safeParse(tokenIdSchema, raw);
  if (!parsed.success) {
    throw new RegistryError("MalformedInput", `invalid token id ${String(raw)}: ${v.summarize(parsed.issues)}`);
  }
  return parsed.output;
};

/** The "no account" sentinel. Never an owner, recipient or operator. */
export const NULL_ADDRESS: Address = toAddress(`0x${"0".repeat(40)}`);

export const isNull = (a: Address): boolean => a === NULL_ADDRESS;
