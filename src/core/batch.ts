import { requireNotPaused, requireOwner } from "./access";
import { fail } from "./errors";
import type { Address, Batch, BatchId, ExecContext, ProtocolState, Transition } from "./types";

/** Looks up an allocated batch; ids run 1..currentBatchId. */
export const requireBatch = (s: ProtocolState, id: BatchId): Batch => {
  if (id === 0n || id > s.currentBatchId) fail("InvalidBatch", `batch ${id} does not exist`);
  const batch = s.batches.get(id);
  if (!batch) return fail("InvalidBatch", `batch ${id} does not exist`);
  return batch;
};

/** Stored records are frozen; snapshots handed out by the runtime share them. */
export const putBatch = (s: ProtocolState, batch: Batch): ProtocolState["batches"] =>
  new Map(s.batches).set(batch.id, Object.freeze(batch));

export const openBatch = (s: ProtocolState, caller: Address, ctx: ExecContext): Transition => {
  requireOwner(s, caller);
  requireNotPaused(s);

  const id = s.currentBatchId + 1n;
  const batch: Batch = {
    id,
    isOpen: true,
    premiumAcc: ctx.fhe.zero(),
    payoutAcc: ctx.fhe.zero(),
    riskAcc: ctx.fhe.zero(),
    submissions: 0,
    openedAt: ctx.now,
  };
  return {
    next: { ...s, currentBatchId: id, batches: putBatch(s, batch) },
    events: [{ type: "BatchOpened", batchId: id }],
  };
};

// Open → Closed is one-way; nothing reopens a batch.
export const closeBatch = (
  s: ProtocolState,
  caller: Address,
  id: BatchId,
  ctx: ExecContext,
): Transition => {
  requireOwner(s, caller);
  requireNotPaused(s);
  const batch = requireBatch(s, id);
  if (!batch.isOpen) fail("InvalidBatch", `batch ${id} is already closed`);

  return {
    next: { ...s, batches: putBatch(s, { ...batch, isOpen: false, closedAt: ctx.now }) },
    events: [{ type: "BatchClosed", batchId: id }],
  };
};
