// RLP encode/decode for registry events and the canonical state.

import * as rlp from "rlp";
import { bytesToHex, hexToBytes, utf8ToBytes } from "@noble/hashes/utils";
import { RegistryError } from "../errors";
import { toAddress, toTokenId } from "../types/brands";
import type {
  Address,
  RegistryEvent,
  RegistryState,
  TokenId,
} from "../types";

type Item = Uint8Array | Item[];

/* — helpers — */
const addrToBuf = (a: Address): Uint8Array => hexToBytes(a.slice(2));
const bufToAddr = (b: Uint8Array): Address => toAddress(`0x${bytesToHex(b)}`);
const bufToBn = (b: Uint8Array): bigint =>
  b.length === 0 ? 0n : BigInt(`0x${bytesToHex(b)}`);
const bufToText = (b: Uint8Array): string => new TextDecoder().decode(b);

const bufToBool = (b: Uint8Array): boolean => {
  if (b.length === 0) return false;
  if (b.length === 1 && b[0] === 1) return true;
  throw new RegistryError("MalformedInput", "boolean field must be 0 or 1");
};

const fields = (item: Item, arity: number): Uint8Array[] => {
  if (!Array.isArray(item) || item.length !== arity) {
    throw new RegistryError("MalformedInput", `expected a list of ${arity} fields`);
  }
  return item.map((f) => {
    if (Array.isArray(f)) {
      throw new RegistryError("MalformedInput", "nested list where a field was expected");
    }
    return f;
  });
};

const byId = ([a]: [TokenId, unknown], [b]: [TokenId, unknown]) =>
  a < b ? -1 : a > b ? 1 : 0;

/* — events — */
export const encEvent = (e: RegistryEvent): Uint8Array => {
  switch (e.type) {
    case "Transfer":
      return rlp.encode([utf8ToBytes(e.type), addrToBuf(e.from), addrToBuf(e.to), e.tokenId]);
    case "Approval":
      return rlp.encode([utf8ToBytes(e.type), addrToBuf(e.owner), addrToBuf(e.approved), e.tokenId]);
    case "ApprovalForAll":
      return rlp.encode([
        utf8ToBytes(e.type),
        addrToBuf(e.owner),
        addrToBuf(e.operator),
        e.approved ? 1 : 0,
      ]);
  }
};

const decodeItem = (b: Uint8Array): Item => {
  try {
    return rlp.decode(b);
  } catch (e) {
    throw new RegistryError(
      "MalformedInput",
      `undecodable event bytes: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
};

export const decEvent = (b: Uint8Array): RegistryEvent => {
  const [tag, x, y, z] = fields(decodeItem(b), 4);
  const type = bufToText(tag);
  switch (type) {
    case "Transfer":
      return { type: "Transfer", from: bufToAddr(x), to: bufToAddr(y), tokenId: toTokenId(bufToBn(z)) };
    case "Approval":
      return { type: "Approval", owner: bufToAddr(x), approved: bufToAddr(y), tokenId: toTokenId(bufToBn(z)) };
    case "ApprovalForAll":
      return { type: "ApprovalForAll", owner: bufToAddr(x), operator: bufToAddr(y), approved: bufToBool(z) };
    default:
      throw new RegistryError("MalformedInput", `unknown event tag ${JSON.stringify(type)}`);
  }
};

/* — canonical state (sorted, so equal contents encode equally) — */
export const encState = (s: RegistryState): Uint8Array =>
  rlp.encode([
    [...s.tokens]
      .sort(byId)
      .map(([id, t]) => [id, addrToBuf(t.owner), addrToBuf(t.approved), utf8ToBytes(t.uri)]),
    [...s.balances]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([a, n]) => [addrToBuf(a), n]),
    [...s.operators].sort().map((key) => utf8ToBytes(key)),
  ]);
