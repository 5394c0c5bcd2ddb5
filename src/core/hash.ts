import { keccak_256 } from "@noble/hashes/sha3";
import { encCommitment, toHex } from "../codec/rlp";
import type { Address, Batch, Hex } from "./types";

/* ── decryption commitment: keccak256(rlp(premium ‖ payout ‖ risk ‖ instance)) ── */
export const computeCommitment = (
  batch: Pick<Batch, "premiumAcc" | "payoutAcc" | "riskAcc">,
  instanceId: Address,
): Hex =>
  toHex(
    keccak_256(
      encCommitment([batch.premiumAcc, batch.payoutAcc, batch.riskAcc], instanceId),
    ),
  );
