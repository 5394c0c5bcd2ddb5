import type { Ciphertext, Hex } from "../types/brands";
import type { DecryptionCallback, FheBackend } from "../fhe/types";

export type { Ciphertext, Hex };
export type Address = Hex;
export type BatchId = bigint;
export type RequestId = bigint;

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/* ── rate-limited action kinds ───────────────────────────── */
export type ActionKind = "submit" | "decrypt";
export type CooldownKey = `${ActionKind}:${Address}`;

/* ── batch + decryption records ──────────────────────────── */
export interface Batch {
  readonly id: BatchId;
  readonly isOpen: boolean;
  readonly premiumAcc: Ciphertext;
  readonly payoutAcc: Ciphertext;
  readonly riskAcc: Ciphertext;
  readonly submissions: number;
  readonly openedAt: bigint;
  readonly closedAt?: bigint;
}

export interface AggregateResult {
  readonly totalPremiums: bigint;
  readonly totalPayouts: bigint;
  readonly riskScore: bigint;
}

export interface DecryptionRequest {
  readonly requestId: RequestId;
  readonly batchId: BatchId;
  readonly commitmentHash: Hex;
  readonly settled: boolean;
  readonly requestedBy: Address;
  readonly requestedAt: bigint;
  readonly result?: AggregateResult;
}

/* ── global protocol snapshot ────────────────────────────── */
export interface ProtocolState {
  readonly instanceId: Address;
  readonly owner: Address;
  readonly providers: ReadonlySet<Address>;
  readonly paused: boolean;
  readonly cooldownSeconds: bigint;
  readonly cooldowns: ReadonlyMap<CooldownKey, bigint>;
  readonly currentBatchId: BatchId;
  readonly batches: ReadonlyMap<BatchId, Batch>;
  readonly requests: ReadonlyMap<RequestId, DecryptionRequest>;
}

/* ── actions ─────────────────────────────────────────────── */
export type AdminAction =
  | { type: "transferOwnership"; newOwner: Address }
  | { type: "addProvider"; provider: Address }
  | { type: "removeProvider"; provider: Address }
  | { type: "setPaused"; paused: boolean }
  | { type: "setCooldown"; seconds: bigint };

export type Action =
  | AdminAction
  | { type: "openBatch" }
  | { type: "closeBatch"; batchId: BatchId }
  | {
      type: "submitData";
      batchId: BatchId;
      encPremium: Ciphertext;
      encPayout: Ciphertext;
    }
  | { type: "requestBatchDecryption"; batchId: BatchId }
  // permissionless: caller identity is never consulted
  | {
      type: "decryptionCallback";
      requestId: RequestId;
      cleartexts: Uint8Array;
      proof: Hex;
    };

export type Input = { caller: Address; action: Action };

/* ── audit events ────────────────────────────────────────── */
export type ProtocolEvent =
  | {
      type: "Initialized";
      owner: Address;
      instanceId: Address;
      cooldownSeconds: bigint;
    }
  | { type: "OwnershipTransferred"; previousOwner: Address; newOwner: Address }
  | { type: "ProviderAdded"; provider: Address }
  | { type: "ProviderRemoved"; provider: Address }
  | { type: "PauseChanged"; paused: boolean }
  | { type: "CooldownUpdated"; previousSeconds: bigint; newSeconds: bigint }
  | { type: "BatchOpened"; batchId: BatchId }
  | { type: "BatchClosed"; batchId: BatchId }
  | {
      type: "DataSubmitted";
      batchId: BatchId;
      provider: Address;
      encPremium: Ciphertext;
      encPayout: Ciphertext;
    }
  | {
      type: "DecryptionRequested";
      requestId: RequestId;
      batchId: BatchId;
      commitmentHash: Hex;
    }
  | ({
      type: "DecryptionCompleted";
      requestId: RequestId;
      batchId: BatchId;
    } & AggregateResult);

export type LoggedEvent = {
  seq: number;
  timestamp: bigint;
  event: ProtocolEvent;
};

export type Transition = { next: ProtocolState; events: ProtocolEvent[] };

/* ── per-dispatch execution context ──────────────────────── */
export type RiskModel = (
  fhe: FheBackend,
  acc: { premiumAcc: Ciphertext; payoutAcc: Ciphertext },
) => Ciphertext;

export interface ExecContext {
  now: bigint;
  fhe: FheBackend;
  riskModel: RiskModel;
  /** Handed to the oracle as the callback reference for new decryption requests. */
  callback: DecryptionCallback;
}
