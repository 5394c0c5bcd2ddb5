import type { Ciphertext, Hex } from "../types/brands";

export type DecryptionCallback = (
  requestId: bigint,
  cleartexts: Uint8Array,
  proof: Hex,
) => void;

/**
 * Homomorphic capability consumed by the core. Implementations wrap whatever
 * handle their library produces; the core never branches on handle bytes.
 */
export interface FheBackend {
  zero(): Ciphertext;
  add(a: Ciphertext, b: Ciphertext): Ciphertext;
  /** Schedules decryption of `handles` and returns the oracle-assigned request id. */
  requestDecryption(handles: readonly Ciphertext[], callback: DecryptionCallback): bigint;
  /** Must return false (never throw) for a proof that does not authenticate the payload. */
  verifyDecryptionProof(requestId: bigint, cleartexts: Uint8Array, proof: Hex): boolean;
}

export class FheError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FheError";
  }
}
