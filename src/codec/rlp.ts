// Pure RLP encode/decode helpers (no external deps except rlp).

import * as rlp from "rlp";
import { bytesToHex, hexToBytes, utf8ToBytes } from "@noble/hashes/utils";
import type { Hex } from "../types/brands";

/* — helpers — */
export const hexBytes = (h: Hex): Uint8Array => hexToBytes(h.slice(2));
export const toHex = (b: Uint8Array): Hex => `0x${bytesToHex(b)}`;
const bytesToBn = (b: Uint8Array): bigint =>
  b.length === 0 ? 0n : BigInt("0x" + bytesToHex(b));

/* — commitment preimage: handles ‖ instance — */
export const encCommitment = (handles: readonly Hex[], instanceId: Hex): Uint8Array =>
  rlp.encode([...handles, instanceId].map(hexBytes));

/* — derived ciphertext handle — */
export const encHandleDerivation = (
  op: string,
  operands: readonly (Hex | bigint)[],
): Uint8Array =>
  rlp.encode([
    utf8ToBytes(op),
    ...operands.map((o) => (typeof o === "bigint" ? o : hexBytes(o))),
  ]);

/* — cleartexts — */
export const encCleartexts = (values: readonly bigint[]): Uint8Array =>
  rlp.encode([...values]);

/** Returns null when the bytes are not a flat RLP list of integers. */
export const decCleartexts = (b: Uint8Array): bigint[] | null => {
  let decoded: Uint8Array | rlp.NestedUint8Array;
  try {
    decoded = rlp.decode(b);
  } catch {
    return null;
  }
  if (!Array.isArray(decoded)) return null;
  const out: bigint[] = [];
  for (const item of decoded) {
    if (!(item instanceof Uint8Array)) return null;
    out.push(bytesToBn(item));
  }
  return out;
};

/* — message the oracle signs: requestId ‖ cleartexts — */
export const encDecryptionResult = (requestId: bigint, cleartexts: Uint8Array): Uint8Array =>
  rlp.encode([requestId, cleartexts]);
