import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex, concatBytes } from "@noble/hashes/utils";
import { encEvent, encState } from "../codec/rlp";
import type { Hex, RegistryEvent, RegistryState } from "../types";

const toHex = (b: Uint8Array): Hex => `0x${bytesToHex(b)}`;

/* ── Merkle helper ───────────────────────────────────────── */
export const merkle = (leaves: Uint8Array[]): Uint8Array => {
  if (leaves.length === 0) return keccak_256(new Uint8Array(0));
  if (leaves.length === 1) return leaves[0];
  const next: Uint8Array[] = [];
  for (let i = 0; i < leaves.length; i += 2) {
    const left = leaves[i];
    const right = i + 1 < leaves.length ? leaves[i + 1] : left;
    next.push(keccak_256(concatBytes(left, right)));
  }
  return merkle(next);
};

/* ── state root: keccak256(RLP(canonical state)) ─────────── */
export const computeStateRoot = (state: RegistryState): Hex =>
  toHex(keccak_256(encState(state)));

/* ── events root, leaves kept in emission order ──────────── */
export const computeEventsRoot = (events: readonly RegistryEvent[]): Hex =>
  toHex(merkle(events.map((e) => keccak_256(encEvent(e)))));
