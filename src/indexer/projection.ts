import type {
  Address,
  AggregateResult,
  BatchId,
  Hex,
  LoggedEvent,
  ProtocolEvent,
  RequestId,
} from "../core/types";

export interface IndexedBatch {
  id: BatchId;
  isOpen: boolean;
  submissions: number;
  requests: RequestId[];
  result?: AggregateResult;
}

export interface IndexedRequest {
  requestId: RequestId;
  batchId: BatchId;
  commitmentHash: Hex;
  settled: boolean;
  result?: AggregateResult;
}

/**
 * Read model rebuilt purely from the audit log. Entries are keyed by `seq`,
 * so redelivered events are dropped.
 */
export class BatchIndex {
  private readonly seen = new Set<number>();
  private readonly roster = new Set<Address>();
  private readonly batchMap = new Map<BatchId, IndexedBatch>();
  private readonly requestMap = new Map<RequestId, IndexedRequest>();
  private ownerAddr: Address | undefined;
  private pausedFlag = false;
  private cooldown = 0n;
  private next = 0;

  /** Returns false when the entry was already applied. */
  ingest(entry: LoggedEvent): boolean {
    if (this.seen.has(entry.seq)) return false;
    this.seen.add(entry.seq);
    this.next = Math.max(this.next, entry.seq + 1);
    this.apply(entry.event);
    return true;
  }

  ingestAll(entries: Iterable<LoggedEvent>): number {
    let applied = 0;
    for (const e of entries) if (this.ingest(e)) applied++;
    return applied;
  }

  /** Cursor to poll the runtime log from. */
  get cursor(): number {
    return this.next;
  }

  get owner(): Address | undefined {
    return this.ownerAddr;
  }

  get paused(): boolean {
    return this.pausedFlag;
  }

  get cooldownSeconds(): bigint {
    return this.cooldown;
  }

  providers(): Address[] {
    return [...this.roster].sort();
  }

  batch(id: BatchId): IndexedBatch | undefined {
    return this.batchMap.get(id);
  }

  request(id: RequestId): IndexedRequest | undefined {
    return this.requestMap.get(id);
  }

  private batchOf(id: BatchId): IndexedBatch {
    let b = this.batchMap.get(id);
    if (!b) {
      b = { id, isOpen: true, submissions: 0, requests: [] };
      this.batchMap.set(id, b);
    }
    return b;
  }

  private apply(e: ProtocolEvent): void {
    switch (e.type) {
      case "Initialized":
        this.ownerAddr = e.owner;
        this.cooldown = e.cooldownSeconds;
        this.roster.add(e.owner);
        return;
      case "OwnershipTransferred":
        this.ownerAddr = e.newOwner;
        return;
      case "ProviderAdded":
        this.roster.add(e.provider);
        return;
      case "ProviderRemoved":
        this.roster.delete(e.provider);
        return;
      case "PauseChanged":
        this.pausedFlag = e.paused;
        return;
      case "CooldownUpdated":
        this.cooldown = e.newSeconds;
        return;
      case "BatchOpened":
        this.batchOf(e.batchId);
        return;
      case "BatchClosed":
        this.batchOf(e.batchId).isOpen = false;
        return;
      case "DataSubmitted":
        this.batchOf(e.batchId).submissions += 1;
        return;
      case "DecryptionRequested":
        this.batchOf(e.batchId).requests.push(e.requestId);
        this.requestMap.set(e.requestId, {
          requestId: e.requestId,
          batchId: e.batchId,
          commitmentHash: e.commitmentHash,
          settled: false,
        });
        return;
      case "DecryptionCompleted": {
        const result: AggregateResult = {
          totalPremiums: e.totalPremiums,
          totalPayouts: e.totalPayouts,
          riskScore: e.riskScore,
        };
        this.batchOf(e.batchId).result = result;
        const req = this.requestMap.get(e.requestId);
        this.requestMap.set(e.requestId, {
          requestId: e.requestId,
          batchId: e.batchId,
          commitmentHash: req?.commitmentHash ?? "0x",
          settled: true,
          result,
        });
        return;
      }
    }
  }
}
