/**
 * Randomness for key generation and encryption.
 *
 * Everything is drawn from libsodium. A RandomSource is created once
 * (asynchronously, since libsodium must finish loading) and is then used
 * synchronously by the protocol functions.
 *
 * Seeded sources exist for reproducible experiments and tests. They expand a
 * 32-byte seed with randombytes_buf_deterministic, deriving a fresh sub-seed
 * for every request so that no output block is ever repeated.
 *
 * @module random
 */
import sodium from "libsodium-wrappers-sumo";
import { BitMatrix, BitVector } from "./bits.js";
import { ConfigurationError } from "./errors.js";

let initialized = false;

/** Wait for libsodium to load. Idempotent. */
export async function initSodium(): Promise<typeof sodium> {
  if (!initialized) {
    await sodium.ready;
    initialized = true;
  }
  return sodium;
}

export interface RandomSource {
  /** `length` uniformly random bytes. */
  bytes(length: number): Uint8Array;
  /** A uniformly random integer in [0, upperBound). */
  uniform(upperBound: number): number;
}

const UINT32_RANGE = 0x1_0000_0000;

/** Seed length of randombytes_buf_deterministic. */
export const SEED_BYTES = 32;

function assertUpperBound(upperBound: number): void {
  if (!Number.isInteger(upperBound) || upperBound < 1 || upperBound > 0xffff_ffff) {
    throw new ConfigurationError(`Invalid upper bound for uniform sampling: ${upperBound}`);
  }
}

class SodiumRandomSource implements RandomSource {
  bytes(length: number): Uint8Array {
    return length === 0 ? new Uint8Array(0) : sodium.randombytes_buf(length);
  }

  uniform(upperBound: number): number {
    assertUpperBound(upperBound);
    return sodium.randombytes_uniform(upperBound);
  }
}

class SeededRandomSource implements RandomSource {
  private counter = 0n;

  constructor(private readonly seed: Uint8Array) {}

  bytes(length: number): Uint8Array {
    if (length === 0) return new Uint8Array(0);
    const block = new Uint8Array(8);
    new DataView(block.buffer).setBigUint64(0, this.counter++, true);
    const subSeed = sodium.crypto_generichash(SEED_BYTES, block, this.seed);
    return sodium.randombytes_buf_deterministic(length, subSeed);
  }

  uniform(upperBound: number): number {
    assertUpperBound(upperBound);
    // Rejection sampling keeps the result unbiased for any bound.
    const limit = UINT32_RANGE - (UINT32_RANGE % upperBound);
    for (;;) {
      const word = this.bytes(4);
      const value = new DataView(word.buffer, word.byteOffset, 4).getUint32(0, true);
      if (value < limit) return value % upperBound;
    }
  }
}

/**
 * Create a random source.
 *
 * @param seed - Optional 32-byte seed for a reproducible stream. Omit it for
 *   the system CSPRNG.
 * @throws ConfigurationError if the seed has the wrong length.
 */
export async function createRandomSource(seed?: Uint8Array): Promise<RandomSource> {
  await initSodium();
  if (seed === undefined) return new SodiumRandomSource();
  if (seed.length !== SEED_BYTES) {
    throw new ConfigurationError(
      `Random seed must be ${SEED_BYTES} bytes, got ${seed.length}`,
    );
  }
  return new SeededRandomSource(Uint8Array.from(seed));
}

export function randomBits(random: RandomSource, length: number): BitVector {
  return BitVector.fromBytes(random.bytes(Math.ceil(length / 8)), length);
}

export function randomMatrix(random: RandomSource, rows: number, cols: number): BitMatrix {
  return BitMatrix.fromRows(
    Array.from({ length: rows }, () => randomBits(random, cols)),
    cols,
  );
}
