/**
 * A five-position scheme small enough to trace by hand.
 *
 *   theta  H C C H C     Hadamard positions 0, 3; computational 1, 2, 4
 *   rBar   "10"          u "01"   d "1"   e "11"
 *   PA     rows 10 / 01 / 11       x = (r0 ⊕ r2, r1 ⊕ r2)
 *   EC     rows 1 / 1 / 1          parity of r
 *   code   repetition_3            synd("101") = "11"
 *
 * Encrypting "10" with r = "101" gives c = "10", p = "1", q = "00".
 */
import { BitMatrix, BitVector } from "../../src/bits.js";
import { encryptWithBits, localPreparation } from "../../src/encryption.js";
import { Basis, createKey } from "../../src/key.js";
import { SchemeParameters } from "../../src/scheme-parameters.js";

export const H = Basis.HADAMARD;
export const C = Basis.COMPUTATIONAL;

export function smallParams(): SchemeParameters {
  return new SchemeParameters({
    lambda: 1,
    n: 2,
    k: 2,
    s: 3,
    tau: 1,
    mu: 2,
    delta: 0.5,
    code: "repetition_3",
  });
}

export function smallKey(params: SchemeParameters = smallParams()) {
  return createKey(
    {
      theta: [H, C, C, H, C],
      rBar: BitVector.fromString("10"),
      u: BitVector.fromString("01"),
      d: BitVector.fromString("1"),
      e: BitVector.fromString("11"),
      privacyAmplificationMatrix: BitMatrix.fromRows(["10", "01", "11"]),
      errorCorrectionMatrix: BitMatrix.fromRows(["1", "1", "1"]),
    },
    params,
  );
}

export const SMALL_MESSAGE = "10";
export const SMALL_R = "101";

export function smallSetup() {
  const params = smallParams();
  const key = smallKey(params);
  const message = BitVector.fromString(SMALL_MESSAGE);
  const ciphertext = encryptWithBits(
    message,
    key,
    params,
    BitVector.fromString(SMALL_R),
    localPreparation,
  );
  return { params, key, message, ciphertext };
}

/** `vector` with bit `index` inverted. */
export function flip(vector: BitVector, index: number): BitVector {
  return vector.xor(BitVector.fromBits(Array.from({ length: vector.length }, (_, i) => (i === index ? 1 : 0))));
}
