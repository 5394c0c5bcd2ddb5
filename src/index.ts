export { BatchRuntime, DEFAULT_COOLDOWN_SECONDS, type RuntimeOptions } from "./core/runtime";
export { applyInput, genesis } from "./core/reducer";
export { mirrorPayout } from "./core/accumulator";
export { computeCommitment } from "./core/hash";
export { ProtocolError, type ProtocolErrorCode } from "./core/errors";
export type * from "./core/types";
export { ZERO_ADDRESS } from "./core/types";
export { LocalFhe, type DecryptionPayload } from "./fhe/local";
export { FheError, type DecryptionCallback, type FheBackend } from "./fhe/types";
export { encCleartexts, decCleartexts } from "./codec/rlp";
export { BatchIndex, type IndexedBatch, type IndexedRequest } from "./indexer/projection";
export { loadConfig, type Config } from "./config";
export { makeLogger, type ILogger } from "./logging";
