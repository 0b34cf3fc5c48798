/**
 * GF(2) linear algebra used by the universal hash families and the
 * syndrome computations.
 *
 * @module gf2
 */
import { BitMatrix, BitVector } from "./bits.js";
import { ConfigurationError, LengthMismatchError } from "./errors.js";

/**
 * Position-wise XOR of one or more equal-length vectors.
 * @throws LengthMismatchError if the lengths differ.
 */
export function xor(...vectors: BitVector[]): BitVector {
  const [head] = vectors;
  if (head === undefined) {
    throw new ConfigurationError("xor requires at least one operand");
  }
  return BitVector.sum(head.length, vectors);
}

/**
 * Multiply a 1×len row vector by a len×w matrix over GF(2).
 *
 * Entry j of the result is the parity of `vector AND column j`, computed as
 * the XOR of the matrix rows selected by the vector's set bits.
 */
export function matVecMod2(vector: BitVector, matrix: BitMatrix): BitVector {
  if (vector.length !== matrix.rows) {
    throw new LengthMismatchError("matrix-vector product", matrix.rows, vector.length);
  }
  return BitVector.sum(matrix.cols, matrix.selectRows(vector));
}

export function hammingWeight(vector: BitVector): number {
  return vector.weight();
}

export function hammingDistance(a: BitVector, b: BitVector): number {
  return hammingWeight(xor(a, b));
}
