/* ─── Registry data model ─── */
import type { RegistryError, RegistryErrorCode } from "./errors";
import type { Address, Hex, TokenId } from "./types/brands";

export type { Address, Hex, TokenId } from "./types/brands";

/* ─── Token record ─── */
export interface TokenRecord {
  readonly owner: Address; // never NULL_ADDRESS
  readonly approved: Address; // single delegate, NULL_ADDRESS when none
  readonly uri: string;
}

/* ─── Aggregate root ─── */
export interface RegistryState {
  readonly tokens: ReadonlyMap<TokenId, TokenRecord>;
  readonly balances: ReadonlyMap<Address, bigint>; // zero balances are absent
  readonly operators: ReadonlySet<OperatorKey>; // only granted pairs are present
}

export type OperatorKey = `${string}:${string}`;

/* ─── Mutating commands (caller is always explicit) ─── */
export type Command =
  | { type: "mint"; to: Address; tokenId: TokenId; uri: string }
  | { type: "approve"; caller: Address; delegate: Address; tokenId: TokenId }
  | {
      type: "setApprovalForAll";
      caller: Address;
      operator: Address;
      approved: boolean;
    }
  | {
      type: "transfer";
      caller: Address;
      from: Address;
      to: Address;
      tokenId: TokenId;
    };

/* ─── Notifications ─── */
export type RegistryEvent =
  | { type: "Transfer"; from: Address; to: Address; tokenId: TokenId }
  | { type: "Approval"; owner: Address; approved: Address; tokenId: TokenId }
  | {
      type: "ApprovalForAll";
      owner: Address;
      operator: Address;
      approved: boolean;
    };

/* ─── Reducer output ─── */
export type Outcome =
  | { ok: true; state: RegistryState; events: RegistryEvent[] }
  | { ok: false; error: RegistryError };

export type Receipt =
  | { index: number; ok: true }
  | { index: number; ok: false; error: RegistryErrorCode };

export interface BatchResult {
  next: RegistryState;
  receipts: Receipt[];
  events: RegistryEvent[];
  root: Hex; // state root after the batch
  eventsRoot: Hex; // Merkle root of the emitted events
}
