/**
 * The shared secret of one encryption.
 *
 * A key is generated fresh for every message and never reused: the pads u,
 * d, e and both hash matrices are one-time material. It is revealed to the
 * receiver to allow decryption, which is why deletion must be certified
 * before that happens.
 *
 * @module key
 */
import type { BitMatrix, BitVector } from "./bits.js";
import { ConfigurationError, LengthMismatchError } from "./errors.js";
import { randomBits, randomMatrix } from "./random.js";
import type { RandomSource } from "./random.js";
import type { SchemeParameters } from "./scheme-parameters.js";

/** Encoding basis of one position. */
export enum Basis {
  COMPUTATIONAL = "COMPUTATIONAL",
  HADAMARD = "HADAMARD",
}

export interface Key {
  /** Basis of each of the m positions; exactly k are HADAMARD. */
  readonly theta: readonly Basis[];
  /** Expected certificate bits at the Hadamard positions (k). */
  readonly rBar: BitVector;
  /** Message pad (n). */
  readonly u: BitVector;
  /** Verification-hash pad (tau). */
  readonly d: BitVector;
  /** Syndrome pad (mu). */
  readonly e: BitVector;
  /** s × n privacy-amplification hash. */
  readonly privacyAmplificationMatrix: BitMatrix;
  /** s × tau error-correction verification hash. */
  readonly errorCorrectionMatrix: BitMatrix;
}

function positionsOf(theta: readonly Basis[], basis: Basis): number[] {
  const positions: number[] = [];
  theta.forEach((b, i) => {
    if (b === basis) positions.push(i);
  });
  return positions;
}

export function computationalPositions(theta: readonly Basis[]): number[] {
  return positionsOf(theta, Basis.COMPUTATIONAL);
}

export function hadamardPositions(theta: readonly Basis[]): number[] {
  return positionsOf(theta, Basis.HADAMARD);
}

function requireLength(what: string, actual: number, expected: number): void {
  if (actual !== expected) throw new LengthMismatchError(what, expected, actual);
}

/**
 * Validate key material against the scheme dimensions and freeze it.
 *
 * @throws ConfigurationError if theta does not have exactly k Hadamard positions.
 * @throws LengthMismatchError for any pad or matrix of the wrong size.
 */
export function createKey(fields: Key, params: SchemeParameters): Key {
  requireLength("theta", fields.theta.length, params.m);
  const hadamardCount = hadamardPositions(fields.theta).length;
  if (hadamardCount !== params.k) {
    throw new ConfigurationError(
      `theta must have exactly ${params.k} Hadamard positions, got ${hadamardCount}`,
      { expected: params.k, actual: hadamardCount },
    );
  }
  requireLength("rBar", fields.rBar.length, params.k);
  requireLength("u", fields.u.length, params.n);
  requireLength("d", fields.d.length, params.tau);
  requireLength("e", fields.e.length, params.mu);
  requireLength("privacy amplification matrix rows", fields.privacyAmplificationMatrix.rows, params.s);
  requireLength("privacy amplification matrix columns", fields.privacyAmplificationMatrix.cols, params.n);
  requireLength("error correction matrix rows", fields.errorCorrectionMatrix.rows, params.s);
  requireLength("error correction matrix columns", fields.errorCorrectionMatrix.cols, params.tau);
  return Object.freeze({ ...fields, theta: Object.freeze([...fields.theta]) });
}

/**
 * Sample exactly k distinct Hadamard positions out of m by rejection:
 * draw uniform positions until the set reaches size k.
 */
function sampleTheta(params: SchemeParameters, random: RandomSource): Basis[] {
  const hadamard = new Set<number>();
  while (hadamard.size < params.k) {
    hadamard.add(random.uniform(params.m));
  }
  return Array.from({ length: params.m }, (_, i) =>
    hadamard.has(i) ? Basis.HADAMARD : Basis.COMPUTATIONAL,
  );
}

/** Generate a fresh key. Every component is sampled independently. */
export function generateKey(params: SchemeParameters, random: RandomSource): Key {
  return createKey(
    {
      theta: sampleTheta(params, random),
      rBar: randomBits(random, params.k),
      u: randomBits(random, params.n),
      d: randomBits(random, params.tau),
      e: randomBits(random, params.mu),
      privacyAmplificationMatrix: randomMatrix(random, params.s, params.n),
      errorCorrectionMatrix: randomMatrix(random, params.s, params.tau),
    },
    params,
  );
}
