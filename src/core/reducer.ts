import { RegistryError, type RegistryErrorCode } from "../errors";
import { NULL_ADDRESS, isNull } from "../types/brands";
import type {
  Address,
  BatchResult,
  Command,
  Outcome,
  Receipt,
  RegistryEvent,
  RegistryState,
  TokenId,
  TokenRecord,
} from "../types";
import { computeEventsRoot, computeStateRoot } from "./hash";
import { isApprovedForAll, operatorKey, unknownToken } from "./queries";

export const emptyState = (): RegistryState => ({
  tokens: new Map(),
  balances: new Map(),
  operators: new Set(),
});

/* ── helpers ─────────────────────────────────────────────── */

const rejected = (
  code: RegistryErrorCode,
  message: string,
  tokenId?: TokenId,
): Outcome => ({ ok: false, error: new RegistryError(code, message, tokenId) });

const applied = (state: RegistryState, ...events: RegistryEvent[]): Outcome => ({
  ok: true,
  state,
  events,
});

// Mutates a fresh copy only; zero balances are dropped to keep the state canonical.
const adjust = (balances: Map<Address, bigint>, who: Address, delta: bigint) => {
  const value = (balances.get(who) ?? 0n) + delta;
  if (value === 0n) balances.delete(who);
  else balances.set(who, value);
};

// Owner, or an operator of the owner. The null address never qualifies.
const hasOwnerStanding = (
  state: RegistryState,
  caller: Address,
  owner: Address,
): boolean =>
  !isNull(caller) && (caller === owner || isApprovedForAll(state, owner, caller));

const mayTransfer = (
  state: RegistryState,
  caller: Address,
  token: TokenRecord,
): boolean =>
  hasOwnerStanding(state, caller, token.owner) ||
  (!isNull(caller) && caller === token.approved);

/* ── command-level reducer ───────────────────────────────── */
export const applyCommand = (state: RegistryState, cmd: Command): Outcome => {
  switch (cmd.type) {
    /* ---------- mint ---------------------------------------------- */
    case "mint": {
      if (isNull(cmd.to))
        return rejected("InvalidRecipient", "cannot mint to the null address", cmd.tokenId);
      if (state.tokens.has(cmd.tokenId))
        return rejected("AlreadyMinted", `token ${cmd.tokenId} already minted`, cmd.tokenId);

      const tokens = new Map(state.tokens);
      tokens.set(cmd.tokenId, { owner: cmd.to, approved: NULL_ADDRESS, uri: cmd.uri });
      const balances = new Map(state.balances);
      adjust(balances, cmd.to, 1n);

      return applied(
        { ...state, tokens, balances },
        { type: "Transfer", from: NULL_ADDRESS, to: cmd.to, tokenId: cmd.tokenId },
      );
    }

    /* ---------- single-token delegate ----------------------------- */
    case "approve": {
      const token = state.tokens.get(cmd.tokenId);
      if (!token) return { ok: false, error: unknownToken(cmd.tokenId) };
      if (!hasOwnerStanding(state, cmd.caller, token.owner))
        return rejected(
          "NotAuthorized",
          `${cmd.caller} is neither owner nor operator of token ${cmd.tokenId}`,
          cmd.tokenId,
        );

      const tokens = new Map(state.tokens);
      tokens.set(cmd.tokenId, { ...token, approved: cmd.delegate });

      return applied(
        { ...state, tokens },
        { type: "Approval", owner: token.owner, approved: cmd.delegate, tokenId: cmd.tokenId },
      );
    }

    /* ---------- blanket operator ---------------------------------- */
    case "setApprovalForAll": {
      if (cmd.operator === cmd.caller)
        return rejected("InvalidOperator", `${cmd.caller} cannot be its own operator`);

      const operators = new Set(state.operators);
      const key = operatorKey(cmd.caller, cmd.operator);
      if (cmd.approved) operators.add(key);
      else operators.delete(key);

      return applied(
        { ...state, operators },
        {
          type: "ApprovalForAll",
          owner: cmd.caller,
          operator: cmd.operator,
          approved: cmd.approved,
        },
      );
    }

    /* ---------- transfer ------------------------------------------ */
    case "transfer": {
      const token = state.tokens.get(cmd.tokenId);
      if (!token) return { ok: false, error: unknownToken(cmd.tokenId) };
      if (cmd.from !== token.owner)
        return rejected("OwnerMismatch", `token ${cmd.tokenId} is not owned by ${cmd.from}`, cmd.tokenId);
      if (cmd.from === cmd.to)
        return rejected("NoSelfTransfer", `token ${cmd.tokenId} sent to its own owner`, cmd.tokenId);
      if (isNull(cmd.to))
        return rejected("InvalidRecipient", "cannot transfer to the null address", cmd.tokenId);
      if (!mayTransfer(state, cmd.caller, token))
        return rejected(
          "NotAuthorized",
          `${cmd.caller} may not transfer token ${cmd.tokenId}`,
          cmd.tokenId,
        );

      const tokens = new Map(state.tokens);
      tokens.set(cmd.tokenId, { ...token, owner: cmd.to, approved: NULL_ADDRESS });
      const balances = new Map(state.balances);
      adjust(balances, cmd.from, -1n);
      adjust(balances, cmd.to, 1n);

      return applied(
        { ...state, tokens, balances },
        { type: "Transfer", from: cmd.from, to: cmd.to, tokenId: cmd.tokenId },
      );
    }
  }
};

/* ── batch reducer: commands applied in order, failures skipped ── */
export const applyBatch = (
  state: RegistryState,
  commands: readonly Command[],
): BatchResult => {
  let next = state;
  const receipts: Receipt[] = [];
  const events: RegistryEvent[] = [];

  commands.forEach((cmd, index) => {
    const outcome = applyCommand(next, cmd);
    if (outcome.ok) {
      next = outcome.state;
      events.push(...outcome.events);
      receipts.push({ index, ok: true });
    } else {
      receipts.push({ index, ok: false, error: outcome.error.code });
    }
  });

  return {
    next,
    receipts,
    events,
    root: computeStateRoot(next),
    eventsRoot: computeEventsRoot(events),
  };
};
