/**
 * Decryption and error correction.
 *
 * Once the key is revealed, the receiver measures every position in the
 * basis given by theta. The computational-basis results r' are optionally
 * corrected with the padded syndrome q, checked against the padded hash p,
 * and hashed into the pad that unlocks c.
 *
 * A hash mismatch raises a flag but never blocks decryption, so the
 * outcome has four cases: correct or not, flagged or not.
 *
 * @module decryption
 */
import { BitVector } from "./bits.js";
import { forEachEntry } from "./counts.js";
import type { MeasurementCounts } from "./counts.js";
import type { Ciphertext } from "./encryption.js";
import { LengthMismatchError, MalformedMeasurementError } from "./errors.js";
import type { EntryError } from "./errors.js";
import { matVecMod2, xor } from "./gf2.js";
import { computationalPositions } from "./key.js";
import type { Key } from "./key.js";
import type { SchemeParameters } from "./scheme-parameters.js";

export enum DecryptionOutcome {
  CORRECT_UNFLAGGED = "CORRECT_UNFLAGGED",
  CORRECT_FLAGGED = "CORRECT_FLAGGED",
  INCORRECT_UNFLAGGED = "INCORRECT_UNFLAGGED",
  INCORRECT_FLAGGED = "INCORRECT_FLAGGED",
}

export interface DecryptionOptions {
  /** Apply syndrome correction before hashing. Default false. */
  errorCorrect?: boolean;
}

export interface DecryptionResult {
  plaintext: BitVector;
  /** plaintext equals the expected message. */
  correct: boolean;
  /** The verification hash did not match p. */
  flagged: boolean;
  outcome: DecryptionOutcome;
}

/** The ciphertext fields decryption reads; the backend handle is not needed. */
export type ClassicalCiphertext = Pick<Ciphertext<unknown>, "c" | "p" | "q">;

export function classifyDecryption(correct: boolean, flagged: boolean): DecryptionOutcome {
  if (correct) {
    return flagged ? DecryptionOutcome.CORRECT_FLAGGED : DecryptionOutcome.CORRECT_UNFLAGGED;
  }
  return flagged ? DecryptionOutcome.INCORRECT_FLAGGED : DecryptionOutcome.INCORRECT_UNFLAGGED;
}

/**
 * r': the computational-basis bits of a measurement.
 *
 * Backends report either all m positions or only the s computational ones;
 * the length tells which. Batch callers pass the computational positions of
 * theta once instead of having them recomputed per measurement.
 *
 * @throws MalformedMeasurementError for any other length.
 */
export function computationalBits(
  measured: BitVector,
  key: Key,
  params: SchemeParameters,
  positions?: readonly number[],
): BitVector {
  if (measured.length === params.m) {
    return measured.select(positions ?? computationalPositions(key.theta));
  }
  if (measured.length === params.s) {
    return measured;
  }
  throw new MalformedMeasurementError(
    measured.toString(),
    `expected ${params.m} or ${params.s} bits, got ${measured.length}`,
  );
}

/**
 * Recover a candidate plaintext from the computational-basis bits.
 * Does not compare against any expected message.
 */
export function recoverPlaintext(
  rPrime: BitVector,
  key: Key,
  ciphertext: ClassicalCiphertext,
  params: SchemeParameters,
  options: DecryptionOptions = {},
): { plaintext: BitVector; flagged: boolean } {
  const bits = options.errorCorrect
    ? params.corr(rPrime, xor(ciphertext.q, key.e))
    : rPrime;
  const pPrime = xor(matVecMod2(bits, key.errorCorrectionMatrix), key.d);
  const xPrime = matVecMod2(bits, key.privacyAmplificationMatrix);
  return {
    plaintext: xor(ciphertext.c, xPrime, key.u),
    flagged: !pPrime.equals(ciphertext.p),
  };
}

/**
 * Decrypt one measured string and classify the result against the
 * message that was encrypted.
 *
 * @throws MalformedMeasurementError if the measurement has neither m nor s bits.
 * @throws LengthMismatchError if the expected message is not n bits.
 */
export function decrypt(
  measured: BitVector,
  key: Key,
  ciphertext: ClassicalCiphertext,
  expected: BitVector,
  params: SchemeParameters,
  options: DecryptionOptions = {},
): DecryptionResult {
  if (expected.length !== params.n) {
    throw new LengthMismatchError("expected message", params.n, expected.length);
  }
  return classify(computationalBits(measured, key, params), key, ciphertext, expected, params, options);
}

function classify(
  rPrime: BitVector,
  key: Key,
  ciphertext: ClassicalCiphertext,
  expected: BitVector,
  params: SchemeParameters,
  options: DecryptionOptions,
): DecryptionResult {
  const { plaintext, flagged } = recoverPlaintext(rPrime, key, ciphertext, params, options);
  const correct = plaintext.equals(expected);
  return { plaintext, correct, flagged, outcome: classifyDecryption(correct, flagged) };
}

/** Shots per decryption outcome for a count table. */
export interface DecryptionTally {
  correctUnflagged: number;
  correctFlagged: number;
  incorrectUnflagged: number;
  incorrectFlagged: number;
  /** Entries that could not be decrypted; their shots are in no bucket. */
  errors: EntryError[];
}

const TALLY_FIELD = {
  [DecryptionOutcome.CORRECT_UNFLAGGED]: "correctUnflagged",
  [DecryptionOutcome.CORRECT_FLAGGED]: "correctFlagged",
  [DecryptionOutcome.INCORRECT_UNFLAGGED]: "incorrectUnflagged",
  [DecryptionOutcome.INCORRECT_FLAGGED]: "incorrectFlagged",
} as const satisfies Record<DecryptionOutcome, keyof Omit<DecryptionTally, "errors">>;

export function emptyDecryptionTally(): DecryptionTally {
  return {
    correctUnflagged: 0,
    correctFlagged: 0,
    incorrectUnflagged: 0,
    incorrectFlagged: 0,
    errors: [],
  };
}

/**
 * Decrypt every distinct measured string of a count table, weighting each
 * outcome by its shot count. Malformed entries are reported in `errors`
 * while the rest of the table is still processed.
 */
export function decryptResults(
  counts: MeasurementCounts,
  key: Key,
  ciphertext: ClassicalCiphertext,
  expected: BitVector,
  params: SchemeParameters,
  options: DecryptionOptions = {},
): DecryptionTally {
  if (expected.length !== params.n) {
    throw new LengthMismatchError("expected message", params.n, expected.length);
  }
  const tally = emptyDecryptionTally();
  const positions = computationalPositions(key.theta);
  forEachEntry(counts, tally.errors, (entry, count) => {
    const rPrime = computationalBits(BitVector.fromString(entry), key, params, positions);
    const { outcome } = classify(rPrime, key, ciphertext, expected, params, options);
    tally[TALLY_FIELD[outcome]] += count;
  });
  return tally;
}

export function correctCount(tally: DecryptionTally): number {
  return tally.correctUnflagged + tally.correctFlagged;
}

export function incorrectCount(tally: DecryptionTally): number {
  return tally.incorrectUnflagged + tally.incorrectFlagged;
}

export function flaggedCount(tally: DecryptionTally): number {
  return tally.correctFlagged + tally.incorrectFlagged;
}

/** Shots classified into one of the four buckets. */
export function tallyTotal(tally: DecryptionTally): number {
  return correctCount(tally) + incorrectCount(tally);
}
