import {
  bigint,
  boolean,
  custom,
  instance,
  pipe,
  safeParse,
  transform,
  type GenericSchema,
  type InferOutput,
} from "valibot";
import { fail } from "../core/errors";
import type { Address } from "../core/types";
import type { Hex } from "../types/brands";

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;
const HANDLE_RE = /^0x[0-9a-fA-F]{64}$/;

// addresses compare lower-cased
export const addressSchema = pipe(
  custom<Address>(
    (x) => typeof x === "string" && ADDRESS_RE.test(x),
    "expected a 0x-prefixed 20-byte address",
  ),
  transform((a): Address => `0x${a.slice(2).toLowerCase()}`),
);

export const handleSchema = custom<Hex>(
  (x) => typeof x === "string" && HANDLE_RE.test(x),
  "expected a 0x-prefixed 32-byte ciphertext handle",
);

export const idSchema = bigint("expected a bigint id");
export const secondsSchema = bigint("expected seconds as bigint");
export const flagSchema = boolean("expected a boolean");
export const bytesSchema = instance(Uint8Array, "expected a Uint8Array");

/** Parses an externally supplied argument; violations become InvalidArgument. */
export const check = <S extends GenericSchema>(
  schema: S,
  value: unknown,
  what: string,
): InferOutput<S> => {
  const result = safeParse(schema, value);
  if (!result.success) fail("InvalidArgument", `${what}: ${result.issues[0].message}`);
  return result.output;
};
