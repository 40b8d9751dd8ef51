import type { TokenId } from "./types/brands";

export type RegistryErrorCode =
  | "UnknownToken"
  | "AlreadyMinted"
  | "InvalidRecipient"
  | "InvalidAccount"
  | "InvalidOperator"
  | "OwnerMismatch"
  | "NoSelfTransfer"
  | "NotAuthorized"
  | "MalformedInput";

export class RegistryError extends Error {
  readonly code: RegistryErrorCode;
  readonly tokenId?: TokenId;

  constructor(code: RegistryErrorCode, message: string, tokenId?: TokenId) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
    this.tokenId = tokenId;
  }
}

/* ── result envelope ─────────────────────────────────────── */
export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: RegistryError };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const err = <T = never>(error: RegistryError): Result<T> => ({
  ok: false,
  error,
});
