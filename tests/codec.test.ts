import { describe, it, expect } from "vitest";
import * as rlp from "rlp";
import { utf8ToBytes } from "@noble/hashes/utils";
import { decEvent, encEvent } from "../src/codec/rlp";
import { computeEventsRoot, computeStateRoot, merkle } from "../src/core/hash";
import { applyBatch, emptyState } from "../src/core/reducer";
import { RegistryError } from "../src/errors";
import { NULL_ADDRESS } from "../src/types/brands";
import type { RegistryEvent } from "../src/types";
import { EventLog, Registry, toTokenId } from "../src";
import { ALICE, BOB, id } from "./helpers/accounts";

const KECCAK_EMPTY =
  "0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470";

describe("Event codec", () => {
  it("decodes what it encodes", () => {
    const events: RegistryEvent[] = [
      { type: "Transfer", from: NULL_ADDRESS, to: ALICE, tokenId: id(0) },
      { type: "Approval", owner: ALICE, approved: BOB, tokenId: id(2n ** 200n) },
      { type: "ApprovalForAll", owner: ALICE, operator: BOB, approved: false },
    ];
    expect(events.map((e) => decEvent(encEvent(e)))).toEqual(events);
  });

  it("lays a transfer out as [tag, from, to, tokenId]", () => {
    const decoded = rlp.decode(
      encEvent({ type: "Transfer", from: ALICE, to: BOB, tokenId: id(258) }),
    );
    expect(decoded).toEqual([
      utf8ToBytes("Transfer"),
      Uint8Array.from(Buffer.from(ALICE.slice(2), "hex")),
      Uint8Array.from(Buffer.from(BOB.slice(2), "hex")),
      Uint8Array.from([1, 2]),
    ]);
  });

  it("rejects unknown tags", () => {
    const bytes = rlp.encode([utf8ToBytes("Burn"), new Uint8Array(20), new Uint8Array(20), 1]);
    expect(() => decEvent(bytes)).toThrow(RegistryError);
    expect(() => decEvent(bytes)).toThrow('unknown event tag "Burn"');
  });

  it("rejects a short address field", () => {
    const bytes = rlp.encode([utf8ToBytes("Transfer"), new Uint8Array(19), new Uint8Array(20), 1]);
    expect(() => decEvent(bytes)).toThrow(RegistryError);
  });

  it("rejects truncated bytes", () => {
    const bytes = encEvent({ type: "Transfer", from: ALICE, to: BOB, tokenId: id(1) });
    const cut = bytes.slice(0, bytes.length - 5);
    expect(() => decEvent(cut)).toThrow(RegistryError);
    expect(() => decEvent(cut)).toThrow("undecodable event bytes");
  });

  it("rejects the wrong arity", () => {
    const bytes = rlp.encode([utf8ToBytes("Transfer")]);
    expect(() => decEvent(bytes)).toThrow("expected a list of 4 fields");
  });
});

describe("State root", () => {
  it("depends on contents, not on insertion order", () => {
    const a = applyBatch(emptyState(), [
      { type: "mint", to: ALICE, tokenId: id(1), uri: "one" },
      { type: "mint", to: BOB, tokenId: id(2), uri: "two" },
    ]);
    const b = applyBatch(emptyState(), [
      { type: "mint", to: BOB, tokenId: id(2), uri: "two" },
      { type: "mint", to: ALICE, tokenId: id(1), uri: "one" },
    ]);
    expect(a.root).toBe(b.root);
    expect(a.eventsRoot).not.toBe(b.eventsRoot);
  });

  it("is the same before a grant and after its revocation", () => {
    const before = computeStateRoot(emptyState());
    const after = applyBatch(emptyState(), [
      { type: "setApprovalForAll", caller: ALICE, operator: BOB, approved: true },
      { type: "setApprovalForAll", caller: ALICE, operator: BOB, approved: false },
    ]);
    expect(after.root).toBe(before);
  });

  it("changes when a delegate is set", () => {
    const minted = applyBatch(emptyState(), [
      { type: "mint", to: ALICE, tokenId: id(1), uri: "one" },
    ]);
    const approved = applyBatch(minted.next, [
      { type: "approve", caller: ALICE, delegate: BOB, tokenId: id(1) },
    ]);
    expect(approved.root).not.toBe(minted.root);
  });
});

describe("Events root", () => {
  it("hashes the empty list to keccak256 of nothing", () => {
    expect(computeEventsRoot([])).toBe(KECCAK_EMPTY);
  });

  it("pairs leaves and duplicates the odd one out", () => {
    const leaf = (n: number) => new Uint8Array(32).fill(n);
    expect(merkle([leaf(1)])).toEqual(leaf(1));
    expect(merkle([leaf(1), leaf(2), leaf(3)])).toEqual(
      merkle([merkle([leaf(1), leaf(2)]), merkle([leaf(3), leaf(3)])]),
    );
  });
});

describe("Indexer export", () => {
  it("exports the event log as decodable RLP records", () => {
    const events = new EventLog();
    const registry = new Registry({ sink: events, logLevel: "silent" });
    registry.mint(ALICE, toTokenId(1), "one");
    registry.setApprovalForAll(ALICE, BOB, true);

    expect(events.encoded(1).map((b) => decEvent(b))).toEqual([
      { type: "ApprovalForAll", owner: ALICE, operator: BOB, approved: true },
    ]);
    expect(events.encoded().length).toBe(2);
  });
});
