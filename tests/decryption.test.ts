import { describe, it, expect, beforeAll } from "vitest";
import fc from "fast-check";
import { encCleartexts } from "../src/codec/rlp";
import { mirrorPayout } from "../src/core/accumulator";
import { ProtocolError } from "../src/core/errors";
import { applyInput } from "../src/core/reducer";
import type { ExecContext, Hex, ProtocolState } from "../src/core/types";
import { LocalFhe } from "../src/fhe/local";
import { OUTSIDER, OWNER, PROVIDER_A, PROVIDER_B, expectCode, setup } from "./helpers/runtime";

/** Opens batch 1, takes the two sample submissions and closes it. */
const closedBatch = (opts: { fhe?: LocalFhe } = {}) => {
  const env = setup(opts);
  const { rt, fhe } = env;
  rt.openBatch(OWNER);
  rt.submitData(PROVIDER_A, 1n, fhe.encrypt(100n), fhe.encrypt(10n));
  rt.submitData(PROVIDER_B, 1n, fhe.encrypt(50n), fhe.encrypt(5n));
  rt.closeBatch(OWNER, 1n);
  return env;
};

describe("Decryption commitment protocol", () => {
  it("settles the sample batch exactly once", () => {
    const { rt, fhe } = closedBatch();
    const requestId = rt.requestBatchDecryption(PROVIDER_A, 1n);
    expect(requestId).toBe(1n);

    const request = rt.getRequest(requestId);
    expect(request?.settled).toBe(false);
    expect(request?.batchId).toBe(1n);
    expect(request?.requestedBy).toBe(PROVIDER_A);
    expect(rt.events().at(-1)?.event).toEqual({
      type: "DecryptionRequested",
      requestId: 1n,
      batchId: 1n,
      commitmentHash: request?.commitmentHash,
    });
    expect(fhe.pending()).toEqual([1n]);

    fhe.fulfill(requestId);
    expect(rt.events().at(-1)?.event).toEqual({
      type: "DecryptionCompleted",
      requestId: 1n,
      batchId: 1n,
      totalPremiums: 150n,
      totalPayouts: 15n,
      riskScore: 15n,
    });
    expect(rt.getRequest(requestId)?.settled).toBe(true);
    expect(rt.getRequest(requestId)?.result).toEqual({
      totalPremiums: 150n,
      totalPayouts: 15n,
      riskScore: 15n,
    });

    const logged = rt.events().length;
    expectCode(() => fhe.fulfill(requestId), "AlreadySettled");
    expect(rt.events()).toHaveLength(logged);
  });

  it("only decrypts closed batches", () => {
    const { rt } = setup();
    rt.openBatch(OWNER);
    expectCode(() => rt.requestBatchDecryption(PROVIDER_A, 1n), "InvalidBatch");
    expectCode(() => rt.requestBatchDecryption(PROVIDER_A, 0n), "InvalidBatch");
    expectCode(() => rt.requestBatchDecryption(PROVIDER_A, 9n), "InvalidBatch");
  });

  it("requires an active provider and an unpaused system", () => {
    const { rt } = closedBatch();
    expectCode(() => rt.requestBatchDecryption(OUTSIDER, 1n), "Unauthorized");
    rt.setPaused(OWNER, true);
    expectCode(() => rt.requestBatchDecryption(PROVIDER_A, 1n), "SystemPaused");
  });

  it("rate-limits decryption requests independently of submissions", () => {
    const { rt, clock } = closedBatch();
    expect(rt.requestBatchDecryption(PROVIDER_A, 1n)).toBe(1n);
    expect(rt.lastActionAt("decrypt", PROVIDER_A)).toBe(1_000n);
    expect(rt.lastActionAt("submit", PROVIDER_A)).toBe(1_000n);

    clock.advance(30n);
    expectCode(() => rt.requestBatchDecryption(PROVIDER_A, 1n), "RateLimited");
    expect(rt.requestBatchDecryption(PROVIDER_B, 1n)).toBe(2n);

    clock.advance(30n);
    expect(rt.requestBatchDecryption(PROVIDER_A, 1n)).toBe(3n);
  });

  it("fails unknown request ids", () => {
    const { rt } = closedBatch();
    expectCode(() => rt.onDecryptionCallback(42n, encCleartexts([1n, 2n, 3n]), "0x00"), "UnknownRequest");
  });

  it("rejects proofs that do not authenticate the payload", () => {
    const { rt, fhe } = closedBatch();
    const requestId = rt.requestBatchDecryption(PROVIDER_A, 1n);
    const genuine = encCleartexts([150n, 15n, 15n]);
    const inflated = encCleartexts([151n, 15n, 15n]);

    expectCode(() => rt.onDecryptionCallback(requestId, inflated, fhe.attest(requestId, genuine)), "InvalidProof");
    expectCode(() => rt.onDecryptionCallback(requestId, genuine, fhe.attest(2n, genuine)), "InvalidProof");
    expectCode(() => rt.onDecryptionCallback(requestId, genuine, new LocalFhe().attest(requestId, genuine)), "InvalidProof");
    expectCode(() => rt.onDecryptionCallback(requestId, genuine, "0xdeadbeef"), "InvalidProof");
    expect(rt.getRequest(requestId)?.settled).toBe(false);

    // a corrected resubmission still goes through
    rt.onDecryptionCallback(requestId, genuine, fhe.attest(requestId, genuine));
    expect(rt.getRequest(requestId)?.settled).toBe(true);
  });

  it("rejects attested cleartexts that are not three integers", () => {
    const { rt, fhe } = closedBatch();
    const requestId = rt.requestBatchDecryption(PROVIDER_A, 1n);
    const short = encCleartexts([150n, 15n]);
    expectCode(() => rt.onDecryptionCallback(requestId, short, fhe.attest(requestId, short)), "InvalidArgument");
    expect(rt.getRequest(requestId)?.settled).toBe(false);
  });

  it("accepts the callback from any relayer, even while paused", () => {
    const { rt, fhe } = closedBatch();
    const requestId = rt.requestBatchDecryption(PROVIDER_A, 1n);
    rt.setPaused(OWNER, true);
    const cleartexts = encCleartexts([150n, 15n, 15n]);
    const events = rt.onDecryptionCallback(requestId, cleartexts, fhe.attest(requestId, cleartexts), OUTSIDER);
    expect(events.map((e) => e.type)).toEqual(["DecryptionCompleted"]);
  });

  it("refuses a callback delivered inside another action", () => {
    class EagerFhe extends LocalFhe {
      requestDecryption(...args: Parameters<LocalFhe["requestDecryption"]>): bigint {
        const id = super.requestDecryption(...args);
        this.fulfill(id);
        return id;
      }
    }
    const { rt, fhe } = closedBatch({ fhe: new EagerFhe() });
    expect(() => rt.requestBatchDecryption(PROVIDER_A, 1n)).toThrow(/re-entrant/);
    expect(rt.getRequest(1n)).toBeUndefined();
    expect(rt.lastActionAt("decrypt", PROVIDER_A)).toBeUndefined();
    // the oracle still holds the rolled-back request; delivering it later is unknown
    const logged = rt.events().length;
    expectCode(() => fhe.fulfill(1n), "UnknownRequest");
    expect(rt.events()).toHaveLength(logged);
  });

  it("hands out records that callers cannot rewrite", () => {
    const { rt, fhe, clock } = closedBatch();
    const batch = rt.getBatch(1n);
    if (!batch) throw new Error("batch 1 missing");
    expect(Object.isFrozen(batch)).toBe(true);
    expect(Reflect.set(batch, "isOpen", true)).toBe(false);
    clock.advance(60n);
    expectCode(() => rt.submitData(PROVIDER_A, 1n, fhe.encrypt(1n), fhe.encrypt(1n)), "InvalidBatch");

    const requestId = rt.requestBatchDecryption(PROVIDER_A, 1n);
    fhe.fulfill(requestId);
    const request = rt.getRequest(requestId);
    if (!request?.result) throw new Error(`request ${requestId} not settled`);
    expect(Reflect.set(request, "settled", false)).toBe(false);
    expect(Reflect.set(request.result, "totalPremiums", 0n)).toBe(false);
    expectCode(() => fhe.fulfill(requestId), "AlreadySettled");
    expect(rt.events().filter((e) => e.event.type === "DecryptionCompleted")).toHaveLength(1);
    expect(rt.getRequest(requestId)?.result?.totalPremiums).toBe(150n);
  });
});

describe("Decryption callback invariants", () => {
  let fhe: LocalFhe;
  let requested: ProtocolState;
  let ctx: ExecContext;
  const cleartexts = encCleartexts([150n, 15n, 15n]);
  let proof: Hex;

  beforeAll(() => {
    const env = closedBatch();
    fhe = env.fhe;
    env.rt.requestBatchDecryption(PROVIDER_A, 1n);
    requested = env.rt.snapshot();
    ctx = { now: 2_000n, fhe, riskModel: mirrorPayout, callback: () => {} };
    proof = fhe.attest(1n, cleartexts);
  });

  const callback = (s: ProtocolState, c: Uint8Array, p: Hex) =>
    applyInput(
      s,
      { caller: OUTSIDER, action: { type: "decryptionCallback", requestId: 1n, cleartexts: c, proof: p } },
      ctx,
    );

  it("binds the result to the committed accumulators", () => {
    const batch = requested.batches.get(1n);
    if (!batch) throw new Error("batch 1 missing");
    const altered: ProtocolState = {
      ...requested,
      batches: new Map(requested.batches).set(1n, { ...batch, premiumAcc: fhe.encrypt(999n) }),
    };
    expectCode(() => callback(altered, cleartexts, proof), "StateMismatch");
    expect(callback(requested, cleartexts, proof).next.requests.get(1n)?.settled).toBe(true);
  });

  it("settles at most once across any sequence of deliveries", () => {
    type Delivery = { kind: "genuine" | "foreign" | "tampered" } | { kind: "garbage"; bytes: Uint8Array };
    const foreignProof = new LocalFhe().attest(1n, cleartexts);
    const tampered = encCleartexts([1n, 1n, 1n]);
    const toPayload = (d: Delivery): [Uint8Array, Hex] => {
      switch (d.kind) {
        case "genuine":
          return [cleartexts, proof];
        case "foreign":
          return [cleartexts, foreignProof];
        case "tampered":
          return [tampered, proof];
        case "garbage":
          return [d.bytes, "0x"];
      }
    };
    const delivery = fc.oneof(
      fc.constantFrom("genuine" as const, "foreign" as const, "tampered" as const).map((kind): Delivery => ({ kind })),
      fc.uint8Array({ maxLength: 8 }).map((bytes): Delivery => ({ kind: "garbage", bytes })),
    );

    fc.assert(
      fc.property(fc.array(delivery, { maxLength: 6 }), (deliveries) => {
        let s = requested;
        let completed = 0;
        for (const d of deliveries) {
          try {
            const t = callback(s, ...toPayload(d));
            s = t.next;
            completed += t.events.length;
          } catch (err) {
            if (!(err instanceof ProtocolError)) throw err;
          }
        }
        const delivered = deliveries.some((d) => d.kind === "genuine");
        expect(completed).toBe(delivered ? 1 : 0);
        expect(s.requests.get(1n)?.settled).toBe(delivered);
      }),
      { numRuns: 25 },
    );
  }, 60_000);
});
