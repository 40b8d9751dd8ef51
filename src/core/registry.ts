import type pino from "pino";
import { REGISTRY_CONFIG } from "../config";
import { err, ok, type Result } from "../errors";
import { type ILogger, makeLogger } from "../logging";
import { parseCommand } from "../schema";
import type {
  Address,
  BatchResult,
  Command,
  Hex,
  RegistryEvent,
  RegistryState,
  TokenId,
} from "../types";
import { EventLog, type EventSink } from "./events";
import { computeStateRoot } from "./hash";
import { supportsInterface } from "./interfaces";
import * as query from "./queries";
import { applyBatch, applyCommand, emptyState } from "./reducer";

export interface RegistryOptions {
  name?: string;
  symbol?: string;
  state?: RegistryState;
  sink?: EventSink;
  logger?: ILogger;
  logLevel?: pino.LevelWithSilent;
}

const summary = (cmd: Command) => ({
  command: cmd.type,
  ...("tokenId" in cmd ? { tokenId: cmd.tokenId.toString() } : {}),
});

/* ──────────── registry shell ──────────── */
/**
 * Holds the one authoritative state value. Every mutation runs the pure
 * reducer and swaps the reference in a single assignment, so a reader sees
 * either the whole transition or none of it.
 */
export class Registry {
  private state: RegistryState;
  private readonly log: ILogger;
  readonly sink: EventSink;
  private readonly meta: { name: string; symbol: string };

  constructor(opts: RegistryOptions = {}) {
    this.log = opts.logger ?? makeLogger(opts.logLevel);
    this.sink = opts.sink ?? new EventLog(this.log);
    this.state = opts.state ?? emptyState();
    this.meta = {
      name: opts.name ?? REGISTRY_CONFIG.name,
      symbol: opts.symbol ?? REGISTRY_CONFIG.symbol,
    };
  }

  static fromSnapshot(state: RegistryState, opts: Omit<RegistryOptions, "state"> = {}): Registry {
    return new Registry({ ...opts, state });
  }

  /* ── mutations ── */

  mint(to: Address, tokenId: TokenId, uri: string): Result<void> {
    return this.execute({ type: "mint", to, tokenId, uri });
  }

  approve(caller: Address, delegate: Address, tokenId: TokenId): Result<void> {
    return this.execute({ type: "approve", caller, delegate, tokenId });
  }

  setApprovalForAll(caller: Address, operator: Address, approved: boolean): Result<void> {
    return this.execute({ type: "setApprovalForAll", caller, operator, approved });
  }

  transfer(caller: Address, from: Address, to: Address, tokenId: TokenId): Result<void> {
    return this.execute({ type: "transfer", caller, from, to, tokenId });
  }

  execute(cmd: Command): Result<void> {
    const outcome = applyCommand(this.state, cmd);
    if (!outcome.ok) {
      this.log.warn({ ...summary(cmd), code: outcome.error.code }, "command rejected");
      return err(outcome.error);
    }
    this.state = outcome.state;
    this.publish(outcome.events);
    this.log.debug(summary(cmd), "command applied");
    return ok(undefined);
  }

  /** Untrusted input: validated first, then executed. */
  dispatch(raw: unknown): Result<void> {
    const cmd = parseCommand(raw);
    if (!cmd.ok) {
      this.log.warn({ code: cmd.error.code, reason: cmd.error.message }, "malformed command");
      return cmd;
    }
    return this.execute(cmd.value);
  }

  /** Applies commands in order as one serialized step. */
  commit(commands: readonly Command[]): BatchResult {
    const result = applyBatch(this.state, commands);
    this.state = result.next;
    this.publish(result.events);
    this.log.info(
      {
        size: commands.length,
        rejected: result.receipts.filter((r) => !r.ok).length,
        root: result.root,
      },
      "batch committed",
    );
    return result;
  }

  // The state is already swapped; a failing sink is logged and the rest still go out.
  private publish(events: readonly RegistryEvent[]): void {
    for (const event of events) {
      try {
        this.sink.append(event);
      } catch (e) {
        this.log.error({ err: e, event: event.type }, "event sink failed");
      }
    }
  }

  /* ── queries ── */

  ownerOf(tokenId: TokenId): Result<Address> {
    return query.ownerOf(this.state, tokenId);
  }

  balanceOf(account: Address): Result<bigint> {
    return query.balanceOf(this.state, account);
  }

  getApproved(tokenId: TokenId): Result<Address> {
    return query.getApproved(this.state, tokenId);
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return query.isApprovedForAll(this.state, owner, operator);
  }

  totalSupply(): number {
    return query.totalSupply(this.state);
  }

  /* ── metadata & discovery ── */

  name(): string {
    return this.meta.name;
  }

  symbol(): string {
    return this.meta.symbol;
  }

  tokenURI(tokenId: TokenId): Result<string> {
    return query.tokenURI(this.state, tokenId);
  }

  supportsInterface(interfaceId: string): boolean {
    return supportsInterface(interfaceId);
  }

  /* ── snapshots ── */

  snapshot(): RegistryState {
    return this.state;
  }

  stateRoot(): Hex {
    return computeStateRoot(this.state);
  }
}
