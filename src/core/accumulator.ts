import { requireCooldown, requireNotPaused, requireProvider, stampCooldown } from "./access";
import { putBatch, requireBatch } from "./batch";
import { fail } from "./errors";
import type {
  Address,
  BatchId,
  Ciphertext,
  ExecContext,
  ProtocolState,
  RiskModel,
  Transition,
} from "./types";

/** Risk score tracks the payout accumulator unchanged. */
export const mirrorPayout: RiskModel = (_fhe, acc) => acc.payoutAcc;

/**
 * Folds one encrypted premium/payout pair into an open batch. Homomorphic
 * addition is associative and commutative, so the decrypted aggregate does
 * not depend on submission order.
 */
export const submitData = (
  s: ProtocolState,
  caller: Address,
  batchId: BatchId,
  encPremium: Ciphertext,
  encPayout: Ciphertext,
  ctx: ExecContext,
): Transition => {
  requireProvider(s, caller);
  requireNotPaused(s);
  requireCooldown(s, "submit", caller, ctx.now);
  const batch = requireBatch(s, batchId);
  if (!batch.isOpen) fail("InvalidBatch", `batch ${batchId} is closed`);

  const premiumAcc = ctx.fhe.add(batch.premiumAcc, encPremium);
  const payoutAcc = ctx.fhe.add(batch.payoutAcc, encPayout);
  const riskAcc = ctx.riskModel(ctx.fhe, { premiumAcc, payoutAcc });

  return {
    next: {
      ...s,
      cooldowns: stampCooldown(s, "submit", caller, ctx.now),
      batches: putBatch(s, {
        ...batch,
        premiumAcc,
        payoutAcc,
        riskAcc,
        submissions: batch.submissions + 1,
      }),
    },
    events: [{ type: "DataSubmitted", batchId, provider: caller, encPremium, encPayout }],
  };
};
