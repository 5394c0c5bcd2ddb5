import { keccak_256 } from "@noble/hashes/sha3";
import { randomBytes } from "@noble/hashes/utils";
import {
  encCleartexts,
  encDecryptionResult,
  encHandleDerivation,
  toHex,
} from "../codec/rlp";
import { pub, randomPriv, sign, verifySync, type PrivKey, type PubKey } from "../crypto/bls";
import { asCiphertext, type Ciphertext, type Hex } from "../types/brands";
import { FheError, type DecryptionCallback, type FheBackend } from "./types";

type PendingDecryption = {
  handles: readonly Ciphertext[];
  callback: DecryptionCallback;
  deliveries: number;
};

export type DecryptionPayload = {
  requestId: bigint;
  cleartexts: Uint8Array;
  proof: Hex;
};

/**
 * In-process stand-in for a homomorphic coprocessor plus its decryption
 * oracle. Plaintexts live in a handle table; results are attested with a
 * BLS12-381 oracle key.
 */
export class LocalFhe implements FheBackend {
  private readonly plain = new Map<Ciphertext, bigint>();
  private readonly queue = new Map<bigint, PendingDecryption>();
  // per-instance salt keeps handle spaces of distinct backends disjoint
  private readonly salt: Hex = toHex(randomBytes(32));
  private nonce = 0n;
  private nextRequestId = 1n;
  private readonly oracleKey: PrivKey;
  readonly oraclePublicKey: PubKey;

  constructor(opts: { oracleKey?: PrivKey } = {}) {
    this.oracleKey = opts.oracleKey ?? randomPriv();
    this.oraclePublicKey = pub(this.oracleKey);
  }

  /* ── ciphertext arithmetic ─────────────────────────────── */

  encrypt(value: bigint): Ciphertext {
    if (value < 0n) throw new FheError("plaintext must be unsigned");
    const handle = asCiphertext(
      toHex(keccak_256(encHandleDerivation("enc", [this.salt, this.nonce++]))),
    );
    this.plain.set(handle, value);
    return handle;
  }

  zero(): Ciphertext {
    return this.encrypt(0n);
  }

  add(a: Ciphertext, b: Ciphertext): Ciphertext {
    const sum = this.reveal(a) + this.reveal(b);
    const handle = asCiphertext(toHex(keccak_256(encHandleDerivation("add", [a, b]))));
    this.plain.set(handle, sum);
    return handle;
  }

  /** Test-side peek at a handle's plaintext. */
  reveal(handle: Ciphertext): bigint {
    const value = this.plain.get(handle);
    if (value === undefined) throw new FheError(`unknown ciphertext handle ${handle}`);
    return value;
  }

  /* ── decryption oracle ─────────────────────────────────── */

  requestDecryption(handles: readonly Ciphertext[], callback: DecryptionCallback): bigint {
    handles.forEach((h) => this.reveal(h));
    const requestId = this.nextRequestId++;
    this.queue.set(requestId, { handles: [...handles], callback, deliveries: 0 });
    return requestId;
  }

  /** Ids of requests that have never been delivered. */
  pending(): bigint[] {
    return [...this.queue.entries()]
      .filter(([, p]) => p.deliveries === 0)
      .map(([id]) => id);
  }

  /**
   * Decrypts the queued handles and invokes the stored callback. Calling it
   * again redelivers the identical payload.
   */
  fulfill(requestId: bigint): DecryptionPayload {
    const pending = this.queue.get(requestId);
    if (!pending) throw new FheError(`no decryption request ${requestId}`);
    const cleartexts = encCleartexts(pending.handles.map((h) => this.reveal(h)));
    const proof = this.attest(requestId, cleartexts);
    pending.deliveries += 1;
    pending.callback(requestId, cleartexts, proof);
    return { requestId, cleartexts, proof };
  }

  attest(requestId: bigint, cleartexts: Uint8Array): Hex {
    return sign(keccak_256(encDecryptionResult(requestId, cleartexts)), this.oracleKey);
  }

  verifyDecryptionProof(requestId: bigint, cleartexts: Uint8Array, proof: Hex): boolean {
    return verifySync(
      keccak_256(encDecryptionResult(requestId, cleartexts)),
      proof,
      this.oraclePublicKey,
    );
  }
}
