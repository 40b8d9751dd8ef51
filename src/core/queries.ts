import { RegistryError, err, ok, type Result } from "../errors";
import { isNull } from "../types/brands";
import type {
  Address,
  OperatorKey,
  RegistryState,
  TokenId,
  TokenRecord,
} from "../types";

export const operatorKey = (owner: Address, operator: Address): OperatorKey =>
  `${owner}:${operator}`;

export const unknownToken = (tokenId: TokenId) =>
  new RegistryError("UnknownToken", `token ${tokenId} does not exist`, tokenId);

const lookup = (state: RegistryState, tokenId: TokenId): Result<TokenRecord> => {
  const token = state.tokens.get(tokenId);
  return token ? ok(token) : err(unknownToken(tokenId));
};

export const ownerOf = (state: RegistryState, tokenId: TokenId): Result<Address> => {
  const token = lookup(state, tokenId);
  return token.ok ? ok(token.value.owner) : token;
};

/** Returns NULL_ADDRESS when the token exists but has no delegate. */
export const getApproved = (state: RegistryState, tokenId: TokenId): Result<Address> => {
  const token = lookup(state, tokenId);
  return token.ok ? ok(token.value.approved) : token;
};

export const tokenURI = (state: RegistryState, tokenId: TokenId): Result<string> => {
  const token = lookup(state, tokenId);
  return token.ok ? ok(token.value.uri) : token;
};

export const balanceOf = (state: RegistryState, account: Address): Result<bigint> => {
  if (isNull(account)) {
    return err(new RegistryError("InvalidAccount", "balance query for the null address"));
  }
  return ok(state.balances.get(account) ?? 0n);
};

export const isApprovedForAll = (
  state: RegistryState,
  owner: Address,
  operator: Address,
): boolean => state.operators.has(operatorKey(owner, operator));

export const totalSupply = (state: RegistryState): number => state.tokens.size;
