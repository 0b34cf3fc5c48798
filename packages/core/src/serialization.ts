/**
 * JSON forms of keys, ciphertexts and count tables.
 *
 * Every bit is kept exactly: pads as bit strings, matrices as arrays of row
 * bit strings, theta as a string with 0 = computational, 1 = Hadamard.
 * Parameters serialize through SchemeParameters.toJSON / fromJSON.
 *
 * @module serialization
 */
import { z } from "zod";
import { BitMatrix, BitVector } from "./bits.js";
import type { MeasurementCounts } from "./counts.js";
import type { ClassicalCiphertext } from "./decryption.js";
import { LengthMismatchError, SerializationError } from "./errors.js";
import { Basis, createKey } from "./key.js";
import type { Key } from "./key.js";
import type { SchemeParameters } from "./scheme-parameters.js";

const bitString = z.string().regex(/^[01]*$/, "Invalid bit string");

export const keySchema = z.object({
  theta: bitString.min(1),
  rBar: bitString,
  u: bitString,
  d: bitString,
  e: bitString,
  privacyAmplificationMatrix: z.array(bitString),
  errorCorrectionMatrix: z.array(bitString),
});

export const ciphertextSchema = z.object({
  c: bitString,
  p: bitString,
  q: bitString,
});

export const countsSchema = z.record(z.string(), z.number().int().nonnegative());

export type KeyJson = z.infer<typeof keySchema>;
export type CiphertextJson = z.infer<typeof ciphertextSchema>;

function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.infer<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new SerializationError(
      what,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function serializeKey(key: Key): KeyJson {
  return {
    theta: key.theta.map((basis) => (basis === Basis.HADAMARD ? "1" : "0")).join(""),
    rBar: key.rBar.toString(),
    u: key.u.toString(),
    d: key.d.toString(),
    e: key.e.toString(),
    privacyAmplificationMatrix: key.privacyAmplificationMatrix.toRows(),
    errorCorrectionMatrix: key.errorCorrectionMatrix.toRows(),
  };
}

/**
 * Rebuild a key and check it against the scheme dimensions.
 * @throws SerializationError for a malformed value.
 */
export function parseKey(value: unknown, params: SchemeParameters): Key {
  const json = parseWith(keySchema, value, "key");
  return createKey(
    {
      theta: [...json.theta].map((tag) => (tag === "1" ? Basis.HADAMARD : Basis.COMPUTATIONAL)),
      rBar: BitVector.fromString(json.rBar),
      u: BitVector.fromString(json.u),
      d: BitVector.fromString(json.d),
      e: BitVector.fromString(json.e),
      privacyAmplificationMatrix: BitMatrix.fromRows(json.privacyAmplificationMatrix, params.n),
      errorCorrectionMatrix: BitMatrix.fromRows(json.errorCorrectionMatrix, params.tau),
    },
    params,
  );
}

/** The classical part of a ciphertext. The backend handle is not serialized. */
export function serializeCiphertext(ciphertext: ClassicalCiphertext): CiphertextJson {
  return {
    c: ciphertext.c.toString(),
    p: ciphertext.p.toString(),
    q: ciphertext.q.toString(),
  };
}

export function parseCiphertext(value: unknown, params: SchemeParameters): ClassicalCiphertext {
  const json = parseWith(ciphertextSchema, value, "ciphertext");
  const ciphertext = {
    c: BitVector.fromString(json.c),
    p: BitVector.fromString(json.p),
    q: BitVector.fromString(json.q),
  };
  if (ciphertext.c.length !== params.n) throw new LengthMismatchError("c", params.n, ciphertext.c.length);
  if (ciphertext.p.length !== params.tau) throw new LengthMismatchError("p", params.tau, ciphertext.p.length);
  if (ciphertext.q.length !== params.mu) throw new LengthMismatchError("q", params.mu, ciphertext.q.length);
  return Object.freeze(ciphertext);
}

/** Validate a count table read from JSON. Keys are checked later, per entry. */
export function parseCounts(value: unknown): MeasurementCounts {
  return parseWith(countsSchema, value, "measurement counts");
}
