export type ProtocolErrorCode =
  | "Unauthorized"
  | "SystemPaused"
  | "RateLimited"
  | "InvalidBatch"
  | "UnknownRequest"
  | "AlreadySettled"
  | "StateMismatch"
  | "InvalidProof"
  | "InvalidArgument";

export class ProtocolError extends Error {
  constructor(
    public readonly code: ProtocolErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ProtocolError";
  }
}

export function fail(code: ProtocolErrorCode, message: string): never {
  throw new ProtocolError(code, message);
}
