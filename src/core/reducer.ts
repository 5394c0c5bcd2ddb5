import { submitData } from "./accumulator";
import { applyAdmin } from "./access";
import { closeBatch, openBatch } from "./batch";
import { onDecryptionCallback, requestBatchDecryption } from "./decryption";
import type { Address, ExecContext, Input, ProtocolState, Transition } from "./types";

/* ── genesis snapshot ────────────────────────────────────── */
export const genesis = (opts: {
  owner: Address;
  instanceId: Address;
  cooldownSeconds: bigint;
}): ProtocolState => ({
  instanceId: opts.instanceId,
  owner: opts.owner,
  // owner starts out as a provider
  providers: new Set([opts.owner]),
  paused: false,
  cooldownSeconds: opts.cooldownSeconds,
  cooldowns: new Map(),
  currentBatchId: 0n,
  batches: new Map(),
  requests: new Map(),
});

/**
 * Applies one caller action to a snapshot. Rejections throw ProtocolError;
 * the input snapshot is never mutated, so a throw leaves no partial state.
 */
export const applyInput = (
  s: ProtocolState,
  { caller, action }: Input,
  ctx: ExecContext,
): Transition => {
  switch (action.type) {
    case "transferOwnership":
    case "addProvider":
    case "removeProvider":
    case "setPaused":
    case "setCooldown":
      return applyAdmin(s, caller, action);

    case "openBatch":
      return openBatch(s, caller, ctx);
    case "closeBatch":
      return closeBatch(s, caller, action.batchId, ctx);

    case "submitData":
      return submitData(s, caller, action.batchId, action.encPremium, action.encPayout, ctx);

    case "requestBatchDecryption":
      return requestBatchDecryption(s, caller, action.batchId, ctx);
    case "decryptionCallback":
      return onDecryptionCallback(s, action.requestId, action.cleartexts, action.proof, ctx);
  }
};
