import { keccak_256 } from "@noble/hashes/sha3";
import { utf8ToBytes } from "@noble/hashes/utils";
import type { Hex } from "../types";

/**
 * ERC-165 interface discovery. An interface id is the XOR of the 4-byte
 * selectors of every function in the interface.
 */

export const ERC165_FUNCTIONS = ["supportsInterface(bytes4)"] as const;

export const ERC721_FUNCTIONS = [
  "balanceOf(address)",
  "ownerOf(uint256)",
  "approve(address,uint256)",
  "getApproved(uint256)",
  "setApprovalForAll(address,bool)",
  "isApprovedForAll(address,address)",
  "transferFrom(address,address,uint256)",
  "safeTransferFrom(address,address,uint256)",
  "safeTransferFrom(address,address,uint256,bytes)",
] as const;

export const ERC721_METADATA_FUNCTIONS = [
  "name()",
  "symbol()",
  "tokenURI(uint256)",
] as const;

/** First four bytes of keccak256(signature), big-endian. */
export const selector = (signature: string): number => {
  const h = keccak_256(utf8ToBytes(signature));
  return ((h[0] << 24) | (h[1] << 16) | (h[2] << 8) | h[3]) >>> 0;
};

export const interfaceId = (signatures: readonly string[]): Hex => {
  const id = signatures.reduce((acc, sig) => (acc ^ selector(sig)) >>> 0, 0);
  return `0x${id.toString(16).padStart(8, "0")}`;
};

export const INTERFACE_IDS = {
  erc165: interfaceId(ERC165_FUNCTIONS),
  erc721: interfaceId(ERC721_FUNCTIONS),
  erc721Metadata: interfaceId(ERC721_METADATA_FUNCTIONS),
} as const;

const SUPPORTED: ReadonlySet<string> = new Set(Object.values(INTERFACE_IDS));

// 0xffffffff is reserved as "invalid" by ERC-165 and is never in SUPPORTED.
export const supportsInterface = (id: string): boolean =>
  SUPPORTED.has(id.toLowerCase());
