import { bls12_381 as bls } from "@noble/curves/bls12-381";
import { hexBytes, toHex } from "../codec/rlp";
import type { Hex } from "../types/brands";

export type PrivKey = Uint8Array;
export type PubKey = Uint8Array;

export const randomPriv = (): PrivKey => bls.utils.randomPrivateKey();

export const pub = (priv: PrivKey): PubKey => bls.getPublicKey(priv);

export const sign = (msg: Uint8Array, priv: PrivKey): Hex =>
  toHex(bls.sign(msg, priv));

/** Fails closed: malformed signatures or points verify as false. */
export const verifySync = (msg: Uint8Array, sigHex: Hex, pubKey: PubKey): boolean => {
  try {
    return bls.verify(hexBytes(sigHex), msg, pubKey);
  } catch {
    return false;
  }
};
