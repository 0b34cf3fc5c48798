/**
 * Deletion certificate verification.
 *
 * An honest deletion measures every position in the Hadamard basis; at the
 * k Hadamard positions of theta this reproduces r̄ up to noise. The sender
 * accepts when the Hamming distance to r̄ is below delta·k. Calibrating
 * delta so that an attacker's distance (concentrated near k·sin²(π/8)) is
 * rejected is the caller's job; see SchemeParameters.falseAcceptProbability.
 *
 * @module verification
 */
import { BitVector } from "./bits.js";
import { forEachEntry } from "./counts.js";
import type { MeasurementCounts } from "./counts.js";
import { LengthMismatchError } from "./errors.js";
import type { EntryError } from "./errors.js";
import { hammingDistance } from "./gf2.js";
import { hadamardPositions } from "./key.js";
import type { Key } from "./key.js";
import type { SchemeParameters } from "./scheme-parameters.js";

export interface VerificationResult {
  accepted: boolean;
  /** Hamming distance between r̄ and the certificate's Hadamard bits. */
  distance: number;
}

/**
 * Verify a single certificate (a measurement of all m positions).
 * @throws LengthMismatchError if the certificate does not cover theta.
 */
export function verify(key: Key, certificate: BitVector, delta: number): VerificationResult {
  return verifyAt(key, certificate, delta, hadamardPositions(key.theta));
}

function verifyAt(
  key: Key,
  certificate: BitVector,
  delta: number,
  positions: readonly number[],
): VerificationResult {
  if (certificate.length !== key.theta.length) {
    throw new LengthMismatchError("deletion certificate", key.theta.length, certificate.length);
  }
  const distance = hammingDistance(key.rBar, certificate.select(positions));
  return { accepted: distance < delta * positions.length, distance };
}

export interface DeletionTally {
  accepted: number;
  rejected: number;
  /** Hamming distance → shots, for rejected certificates only. */
  rejectedDistances: Map<number, number>;
  /** The accepted certificate strings, verbatim. */
  acceptedCertificates: Set<string>;
  errors: EntryError[];
}

/** Verify every distinct certificate of a count table. */
export function verifyCounts(
  certificates: MeasurementCounts,
  key: Key,
  params: SchemeParameters,
): DeletionTally {
  const tally: DeletionTally = {
    accepted: 0,
    rejected: 0,
    rejectedDistances: new Map(),
    acceptedCertificates: new Set(),
    errors: [],
  };
  const positions = hadamardPositions(key.theta);
  forEachEntry(certificates, tally.errors, (entry, count) => {
    const { accepted, distance } = verifyAt(key, BitVector.fromString(entry), params.delta, positions);
    if (accepted) {
      tally.accepted += count;
      tally.acceptedCertificates.add(entry);
    } else {
      tally.rejected += count;
      tally.rejectedDistances.set(distance, (tally.rejectedDistances.get(distance) ?? 0) + count);
    }
  });
  return tally;
}
