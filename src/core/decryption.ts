import { decCleartexts } from "../codec/rlp";
import { requireCooldown, requireNotPaused, requireProvider, stampCooldown } from "./access";
import { requireBatch } from "./batch";
import { fail } from "./errors";
import { computeCommitment } from "./hash";
import type {
  Address,
  AggregateResult,
  BatchId,
  DecryptionRequest,
  ExecContext,
  Hex,
  ProtocolState,
  RequestId,
  Transition,
} from "./types";

const putRequest = (s: ProtocolState, request: DecryptionRequest): ProtocolState["requests"] =>
  new Map(s.requests).set(request.requestId, Object.freeze(request));

/* ── request: snapshot commitment, hand ciphertexts to the oracle ── */
export const requestBatchDecryption = (
  s: ProtocolState,
  caller: Address,
  batchId: BatchId,
  ctx: ExecContext,
): Transition => {
  requireProvider(s, caller);
  requireNotPaused(s);
  requireCooldown(s, "decrypt", caller, ctx.now);
  const batch = requireBatch(s, batchId);
  if (batch.isOpen) fail("InvalidBatch", `batch ${batchId} is still open`);

  const commitmentHash = computeCommitment(batch, s.instanceId);
  // Last fallible step before the transition. The oracle has already queued the
  // request when this returns, so a rollback after it (a reissued id, or a
  // delivery made inside this call) leaves an entry the protocol never
  // recorded; any later delivery of it fails with UnknownRequest.
  const requestId = ctx.fhe.requestDecryption(
    [batch.premiumAcc, batch.payoutAcc, batch.riskAcc],
    ctx.callback,
  );
  if (s.requests.has(requestId))
    throw new Error(`oracle reissued request id ${requestId}`);

  const request: DecryptionRequest = {
    requestId,
    batchId,
    commitmentHash,
    settled: false,
    requestedBy: caller,
    requestedAt: ctx.now,
  };
  return {
    next: {
      ...s,
      cooldowns: stampCooldown(s, "decrypt", caller, ctx.now),
      requests: putRequest(s, request),
    },
    events: [{ type: "DecryptionRequested", requestId, batchId, commitmentHash }],
  };
};

/* ── permissionless callback; each step is a hard gate ─────── */
export const onDecryptionCallback = (
  s: ProtocolState,
  requestId: RequestId,
  cleartexts: Uint8Array,
  proof: Hex,
  ctx: ExecContext,
): Transition => {
  const request = s.requests.get(requestId);
  if (!request) return fail("UnknownRequest", `no decryption request ${requestId}`);
  if (request.settled) fail("AlreadySettled", `request ${requestId} already settled`);

  const batch = requireBatch(s, request.batchId);
  if (computeCommitment(batch, s.instanceId) !== request.commitmentHash)
    fail("StateMismatch", `batch ${request.batchId} changed since request ${requestId}`);

  if (!ctx.fhe.verifyDecryptionProof(requestId, cleartexts, proof))
    fail("InvalidProof", `proof does not authenticate request ${requestId}`);

  const values = decCleartexts(cleartexts);
  if (!values || values.length !== 3)
    return fail("InvalidArgument", "cleartexts must decode to three integers");
  const [totalPremiums, totalPayouts, riskScore] = values;
  const result: AggregateResult = Object.freeze({ totalPremiums, totalPayouts, riskScore });

  return {
    next: {
      ...s,
      requests: putRequest(s, { ...request, settled: true, result }),
    },
    events: [
      { type: "DecryptionCompleted", requestId, batchId: request.batchId, ...result },
    ],
  };
};
