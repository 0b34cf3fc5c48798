/**
 * Encryption: message + key → ciphertext.
 *
 * The quantum part of the ciphertext is prepared by an external backend.
 * This module only decides the classical value and basis of every position
 * and hands that request over; the backend returns an opaque handle.
 *
 * @module encryption
 */
import type { Bit, BitVector } from "./bits.js";
import type { MeasurementCounts } from "./counts.js";
import { LengthMismatchError } from "./errors.js";
import { matVecMod2, xor } from "./gf2.js";
import { Basis } from "./key.js";
import type { Key } from "./key.js";
import { randomBits } from "./random.js";
import type { RandomSource } from "./random.js";
import type { SchemeParameters } from "./scheme-parameters.js";

/** One position to prepare: a classical bit encoded in the given basis. */
export interface PreparedPosition {
  readonly basis: Basis;
  readonly bit: Bit;
}

export type PreparationRequest = readonly PreparedPosition[];

/** Prepares the m positions of a ciphertext. */
export interface QuantumBackend<THandle> {
  prepare(request: PreparationRequest): THandle;
}

/** A backend that can also measure what it prepared. */
export interface MeasuringBackend<THandle> extends QuantumBackend<THandle> {
  /** Measure every position in the given basis, `shots` times. */
  measure(handle: THandle, bases: readonly Basis[], shots: number): MeasurementCounts;
}

/** Keeps the preparation request itself as the handle. */
export const localPreparation: QuantumBackend<PreparationRequest> = {
  prepare: (request) => Object.freeze([...request]),
};

export interface Ciphertext<THandle = PreparationRequest> {
  /** Message ⊕ privacy-amplified pad ⊕ u (n). */
  readonly c: BitVector;
  /** Error-correction verification hash ⊕ d (tau). */
  readonly p: BitVector;
  /** Syndrome ⊕ e (mu). */
  readonly q: BitVector;
  /** Backend reference to the prepared positions. */
  readonly handle: THandle;
}

export interface EncryptionContext<THandle> {
  random: RandomSource;
  backend: QuantumBackend<THandle>;
}

/**
 * The preparation request for key + computational bits r: computational
 * positions take successive bits of r, Hadamard positions successive bits
 * of r̄.
 */
export function preparationRequest(key: Key, r: BitVector): PreparationRequest {
  let nextComputational = 0;
  let nextHadamard = 0;
  return key.theta.map((basis) => ({
    basis,
    bit:
      basis === Basis.HADAMARD
        ? key.rBar.get(nextHadamard++)
        : r.get(nextComputational++),
  }));
}

/**
 * Encrypt with caller-supplied computational bits r. Deterministic given r
 * and the key.
 *
 * @throws LengthMismatchError if the message is not n bits or r is not s bits.
 */
export function encryptWithBits<THandle>(
  message: BitVector,
  key: Key,
  params: SchemeParameters,
  r: BitVector,
  backend: QuantumBackend<THandle>,
): Ciphertext<THandle> {
  if (message.length !== params.n) {
    throw new LengthMismatchError("message", params.n, message.length);
  }
  if (r.length !== params.s) {
    throw new LengthMismatchError("computational bits", params.s, r.length);
  }

  const x = matVecMod2(r, key.privacyAmplificationMatrix);
  const p = xor(matVecMod2(r, key.errorCorrectionMatrix), key.d);
  const q = xor(params.synd(r), key.e);
  const c = xor(message, x, key.u);
  const handle = backend.prepare(preparationRequest(key, r));

  return Object.freeze({ c, p, q, handle });
}

/** Encrypt a message under a fresh sample of computational bits. */
export function encrypt<THandle>(
  message: BitVector,
  key: Key,
  params: SchemeParameters,
  context: EncryptionContext<THandle>,
): Ciphertext<THandle> {
  const r = randomBits(context.random, params.s);
  return encryptWithBits(message, key, params, r, context.backend);
}
