import type { Config } from "../config";
import type { FheBackend } from "../fhe/types";
import { makeLogger, type ILogger } from "../logging";
import {
  addressSchema,
  bytesSchema,
  check,
  flagSchema,
  handleSchema,
  idSchema,
  secondsSchema,
} from "../model/validation";
import { asCiphertext } from "../types/brands";
import { mirrorPayout } from "./accumulator";
import { cooldownKey } from "./access";
import { ProtocolError } from "./errors";
import { applyInput, genesis } from "./reducer";
import {
  ZERO_ADDRESS,
  type Action,
  type ActionKind,
  type Address,
  type Batch,
  type BatchId,
  type DecryptionRequest,
  type ExecContext,
  type Hex,
  type LoggedEvent,
  type ProtocolEvent,
  type ProtocolState,
  type RequestId,
  type RiskModel,
} from "./types";

export const DEFAULT_COOLDOWN_SECONDS = 60n;

const wallClock = (): bigint => BigInt(Math.floor(Date.now() / 1000));

export interface RuntimeOptions {
  owner: Address;
  fhe: FheBackend;
  instanceId?: Address;
  cooldownSeconds?: bigint;
  riskModel?: RiskModel;
  /** Whole seconds. */
  clock?: () => bigint;
  logger?: ILogger;
}

/* ──────────── runtime shell ──────────── */
export class BatchRuntime {
  private state: ProtocolState;
  private readonly log: LoggedEvent[] = [];
  private readonly fhe: FheBackend;
  private readonly riskModel: RiskModel;
  private readonly clock: () => bigint;
  private readonly logger: ILogger;
  private dispatching = false;

  constructor(opts: RuntimeOptions) {
    const owner = check(addressSchema, opts.owner, "owner");
    const instanceId = check(addressSchema, opts.instanceId ?? ZERO_ADDRESS, "instanceId");
    const cooldownSeconds = opts.cooldownSeconds ?? DEFAULT_COOLDOWN_SECONDS;
    if (cooldownSeconds <= 0n) throw new ProtocolError("InvalidArgument", "cooldown must be positive");

    this.fhe = opts.fhe;
    this.riskModel = opts.riskModel ?? mirrorPayout;
    this.clock = opts.clock ?? wallClock;
    this.logger = opts.logger ?? makeLogger("info");
    this.state = genesis({ owner, instanceId, cooldownSeconds });
    this.append(
      [{ type: "Initialized", owner, instanceId, cooldownSeconds }],
      this.clock(),
    );
  }

  static fromConfig(
    config: Config,
    deps: Pick<RuntimeOptions, "owner" | "fhe" | "riskModel" | "clock">,
  ): BatchRuntime {
    return new BatchRuntime({
      ...deps,
      instanceId: config.instanceId,
      cooldownSeconds: config.cooldownSeconds,
      logger: makeLogger(config.logLevel, config.logPretty),
    });
  }

  /* ── owner actions ─────────────────────────────────────── */

  transferOwnership(caller: Address, newOwner: Address): ProtocolEvent[] {
    return this.dispatch(caller, "transferOwnership", () => ({
      type: "transferOwnership",
      newOwner: check(addressSchema, newOwner, "newOwner"),
    }));
  }

  addProvider(caller: Address, provider: Address): ProtocolEvent[] {
    return this.dispatch(caller, "addProvider", () => ({
      type: "addProvider",
      provider: check(addressSchema, provider, "provider"),
    }));
  }

  removeProvider(caller: Address, provider: Address): ProtocolEvent[] {
    return this.dispatch(caller, "removeProvider", () => ({
      type: "removeProvider",
      provider: check(addressSchema, provider, "provider"),
    }));
  }

  setPaused(caller: Address, paused: boolean): ProtocolEvent[] {
    return this.dispatch(caller, "setPaused", () => ({
      type: "setPaused",
      paused: check(flagSchema, paused, "paused"),
    }));
  }

  setCooldown(caller: Address, seconds: bigint): ProtocolEvent[] {
    return this.dispatch(caller, "setCooldown", () => ({
      type: "setCooldown",
      seconds: check(secondsSchema, seconds, "seconds"),
    }));
  }

  openBatch(caller: Address): BatchId {
    this.dispatch(caller, "openBatch", () => ({ type: "openBatch" }));
    return this.state.currentBatchId;
  }

  closeBatch(caller: Address, batchId: BatchId): ProtocolEvent[] {
    return this.dispatch(caller, "closeBatch", () => ({
      type: "closeBatch",
      batchId: check(idSchema, batchId, "batchId"),
    }));
  }

  /* ── provider actions ──────────────────────────────────── */

  submitData(caller: Address, batchId: BatchId, encPremium: Hex, encPayout: Hex): ProtocolEvent[] {
    return this.dispatch(caller, "submitData", () => ({
      type: "submitData",
      batchId: check(idSchema, batchId, "batchId"),
      encPremium: asCiphertext(check(handleSchema, encPremium, "encPremium")),
      encPayout: asCiphertext(check(handleSchema, encPayout, "encPayout")),
    }));
  }

  requestBatchDecryption(caller: Address, batchId: BatchId): RequestId {
    const events = this.dispatch(caller, "requestBatchDecryption", () => ({
      type: "requestBatchDecryption",
      batchId: check(idSchema, batchId, "batchId"),
    }));
    for (const e of events) if (e.type === "DecryptionRequested") return e.requestId;
    throw new Error("decryption request produced no DecryptionRequested event");
  }

  /* ── oracle entry point (permissionless) ───────────────── */

  onDecryptionCallback(
    requestId: RequestId,
    cleartexts: Uint8Array,
    proof: Hex,
    relayer: Address = ZERO_ADDRESS,
  ): ProtocolEvent[] {
    return this.dispatch(relayer, "decryptionCallback", () => ({
      type: "decryptionCallback",
      requestId: check(idSchema, requestId, "requestId"),
      cleartexts: check(bytesSchema, cleartexts, "cleartexts"),
      proof,
    }));
  }

  /* ── read access ───────────────────────────────────────── */

  get owner(): Address {
    return this.state.owner;
  }

  get paused(): boolean {
    return this.state.paused;
  }

  get cooldownSeconds(): bigint {
    return this.state.cooldownSeconds;
  }

  get currentBatchId(): BatchId {
    return this.state.currentBatchId;
  }

  get instanceId(): Address {
    return this.state.instanceId;
  }

  getBatch(id: BatchId): Batch | undefined {
    return this.state.batches.get(id);
  }

  getRequest(requestId: RequestId): DecryptionRequest | undefined {
    return this.state.requests.get(requestId);
  }

  isProvider(who: Address): boolean {
    return this.state.providers.has(check(addressSchema, who, "address"));
  }

  providers(): Address[] {
    return [...this.state.providers].sort();
  }

  lastActionAt(kind: ActionKind, who: Address): bigint | undefined {
    return this.state.cooldowns.get(cooldownKey(kind, check(addressSchema, who, "address")));
  }

  snapshot(): ProtocolState {
    return this.state;
  }

  /** Audit log from `fromSeq` onwards. */
  events(fromSeq = 0): LoggedEvent[] {
    return this.log.slice(fromSeq);
  }

  /* ── internals ─────────────────────────────────────────── */

  private context(now: bigint): ExecContext {
    return {
      now,
      fhe: this.fhe,
      riskModel: this.riskModel,
      callback: (requestId, cleartexts, proof) => {
        this.onDecryptionCallback(requestId, cleartexts, proof);
      },
    };
  }

  /** Arguments are validated inside `build`, so boundary rejections are logged like any other. */
  private dispatch<T extends Action["type"]>(
    caller: Address,
    type: T,
    build: () => Extract<Action, { type: T }>,
  ): ProtocolEvent[] {
    // callbacks must arrive as their own call, never nested inside another action
    if (this.dispatching) throw new Error(`re-entrant ${type} while another action is in flight`);
    this.dispatching = true;
    const now = this.clock();
    try {
      const from = check(addressSchema, caller, "caller");
      const action = build();
      const { next, events } = applyInput(this.state, { caller: from, action }, this.context(now));
      this.state = next;
      this.append(events, now);
      this.logger.info({ action: type, caller, events: events.map((e) => e.type) }, "accepted");
      return events;
    } catch (err) {
      if (err instanceof ProtocolError)
        this.logger.warn({ action: type, caller, code: err.code }, err.message);
      else this.logger.error({ action: type, caller, err }, "action failed");
      throw err;
    } finally {
      this.dispatching = false;
    }
  }

  private append(events: ProtocolEvent[], timestamp: bigint): void {
    for (const event of events) this.log.push({ seq: this.log.length, timestamp, event });
  }
}
