/**
 * Static configuration of one certified-deletion scheme instance.
 *
 *   m = k + s positions are encoded per message:
 *   - k "Hadamard" positions carry the deletion certificate,
 *   - s "computational" positions carry the bits that are hashed into the
 *     one-time pad for the n-bit message.
 *
 * Construction resolves the error-correcting code, whose syndromes (mu bits)
 * cover every complete codeword block of the s computational bits.
 *
 * @module scheme-parameters
 */
import { z } from "zod";
import { BitVector } from "./bits.js";
import { blockSyndrome, defaultCodeResolver } from "./codes.js";
import type { CodeResolver, ErrorCorrectingCode } from "./codes.js";
import { ConfigurationError, LengthMismatchError, SerializationError } from "./errors.js";
import { xor } from "./gf2.js";
import { log } from "./log.js";
import { BREIDBART_ERROR_RATE, binomialCdf, binomialPmf } from "./statistics.js";

export interface SchemeParametersInit {
  /** Security parameter. */
  lambda: number;
  /** Message length. */
  n: number;
  /** Positions reserved for the deletion certificate. */
  k: number;
  /** Positions whose values feed the message pad. */
  s: number;
  /** Length of the error-correction verification hash. */
  tau: number;
  /** Length of the error syndrome. */
  mu: number;
  /** Acceptance threshold fraction, 0 < delta < 1. */
  delta: number;
  /** Error-correcting code name, e.g. "hamming_4". */
  code: string;
  /** Total positions. Derived when omitted; must equal k + s when given. */
  m?: number;
}

export const schemeParametersSchema = z.object({
  lambda: z.number(),
  n: z.number().int(),
  m: z.number().int().optional(),
  k: z.number().int(),
  s: z.number().int(),
  tau: z.number().int(),
  mu: z.number().int(),
  delta: z.number(),
  code: z.string(),
});

export type SchemeParametersJson = Required<z.infer<typeof schemeParametersSchema>>;

/** Expected success rate of a two-stage test, as fractions. */
export interface CombinedExpectation {
  deletion: number;
  decryption: readonly [number, number];
}

function requireInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer ≥ ${min}, got ${value}`, {
      [name]: value,
    });
  }
}

export class SchemeParameters {
  readonly lambda: number;
  readonly n: number;
  readonly m: number;
  readonly k: number;
  readonly s: number;
  readonly tau: number;
  readonly mu: number;
  readonly delta: number;
  readonly codeName: string;
  readonly code: ErrorCorrectingCode;

  /**
   * @throws ConfigurationError for out-of-range values, m ≠ k + s, or a
   *   syndrome length that does not match the code.
   * @throws UnknownCodeError if the code cannot be resolved.
   */
  constructor(init: SchemeParametersInit, resolveCode: CodeResolver = defaultCodeResolver) {
    if (!(init.lambda > 0)) {
      throw new ConfigurationError(`lambda must be positive, got ${init.lambda}`);
    }
    requireInteger("n", init.n, 1);
    requireInteger("k", init.k, 1);
    requireInteger("s", init.s, 1);
    requireInteger("tau", init.tau, 0);
    requireInteger("mu", init.mu, 0);
    if (!(init.delta > 0 && init.delta < 1)) {
      throw new ConfigurationError(`delta must lie in (0, 1), got ${init.delta}`, {
        delta: init.delta,
      });
    }
    const m = init.k + init.s;
    if (init.m !== undefined && init.m !== m) {
      throw new ConfigurationError(`m must equal k + s = ${m}, got ${init.m}`, { m: init.m });
    }

    const code = resolveCode(init.code);
    const expectedMu = Math.floor(init.s / code.codeLength) * code.syndromeLength;
    if (init.mu !== expectedMu) {
      throw new ConfigurationError(
        `mu must be ${expectedMu} for s=${init.s} with code ${code.name}, got ${init.mu}`,
        { mu: init.mu, expectedMu },
      );
    }

    this.lambda = init.lambda;
    this.n = init.n;
    this.m = m;
    this.k = init.k;
    this.s = init.s;
    this.tau = init.tau;
    this.mu = init.mu;
    this.delta = init.delta;
    this.codeName = init.code;
    this.code = code;
    Object.freeze(this);
  }

  /** Largest certificate Hamming distance still accepted (distance < delta·k). */
  get maxAcceptedDistance(): number {
    return Math.ceil(this.delta * this.k) - 1;
  }

  /** Syndrome of every complete codeword block of `bits`, concatenated. */
  synd(bits: BitVector): BitVector {
    const { codeLength } = this.code;
    const blocks: BitVector[] = [];
    for (let start = 0; start + codeLength <= bits.length; start += codeLength) {
      blocks.push(blockSyndrome(this.code, bits.slice(start, start + codeLength)));
    }
    return BitVector.concat(blocks);
  }

  /**
   * Correct `bits` towards the codeword whose syndrome is `syndrome`.
   *
   * Each complete block is XORed with the table's error vector for
   * `synd(block) ⊕ target`. A block whose syndrome difference is not in the
   * table is returned unchanged. Bits after the last complete block pass
   * through.
   *
   * @throws LengthMismatchError if `syndrome` does not have one
   *   syndromeLength slice per complete block.
   */
  corr(bits: BitVector, syndrome: BitVector): BitVector {
    const { codeLength, syndromeLength, syndromeTable } = this.code;
    const blockCount = Math.floor(bits.length / codeLength);
    if (syndrome.length !== blockCount * syndromeLength) {
      throw new LengthMismatchError("target syndrome", blockCount * syndromeLength, syndrome.length);
    }
    const parts: BitVector[] = [];
    let uncorrectable = 0;
    for (let b = 0; b < blockCount; b++) {
      const block = bits.slice(b * codeLength, (b + 1) * codeLength);
      const target = syndrome.slice(b * syndromeLength, (b + 1) * syndromeLength);
      const difference = xor(blockSyndrome(this.code, block), target);
      const error = syndromeTable.get(difference.toString());
      if (error) {
        parts.push(xor(block, error));
      } else {
        uncorrectable++;
        parts.push(block);
      }
    }
    parts.push(bits.slice(blockCount * codeLength));
    if (uncorrectable > 0) {
      log("debug", `Syndrome correction left ${uncorrectable}/${blockCount} blocks uncorrected`);
    }
    return BitVector.concat(parts);
  }

  /**
   * Probability that an honest deletion certificate is accepted when every
   * certificate bit is flipped independently with `errorRate`.
   */
  expectedDeletionSuccessRate(errorRate = 0): number {
    return binomialCdf(this.maxAcceptedDistance, this.k, errorRate);
  }

  /**
   * Range of the probability of a correct decryption when every
   * computational bit is flipped independently with `errorRate`.
   *
   * The lower bound counts only error-free measurements. The upper bound
   * adds the chance that an erroneous string hashes to the right pad.
   */
  expectedDecryptionSuccessRange(errorRate = 0): readonly [number, number] {
    const lower = binomialPmf(this.s, this.s, 1 - errorRate);
    const collisions = binomialCdf(this.s - 1, this.s, 1 - errorRate) / 2 ** this.n;
    return [lower, lower + collisions];
  }

  /** Honest deletion, then decryption of the residual state. */
  expectedHonestDeletionThenDecryption(): CombinedExpectation {
    return {
      deletion: this.expectedDeletionSuccessRate(),
      decryption: this.expectedDecryptionSuccessRange(0.5),
    };
  }

  /** Breidbart measurement, then decryption. */
  expectedMaliciousDeletionThenDecryption(): CombinedExpectation {
    return {
      deletion: this.expectedDeletionSuccessRate(BREIDBART_ERROR_RATE),
      decryption: this.expectedDecryptionSuccessRange(BREIDBART_ERROR_RATE),
    };
  }

  /** Decryption first, then the deletion measurement as a tamper check. */
  expectedTamperDetection(): CombinedExpectation {
    return {
      deletion: this.expectedDeletionSuccessRate(),
      decryption: this.expectedDecryptionSuccessRange(),
    };
  }

  /**
   * Probability of accepting a certificate whose bits are wrong independently
   * with `errorRate`. With the default rate this is the acceptance
   * probability of the best single-position attack.
   */
  falseAcceptProbability(errorRate: number = BREIDBART_ERROR_RATE): number {
    return this.expectedDeletionSuccessRate(errorRate);
  }

  toJSON(): SchemeParametersJson {
    return {
      lambda: this.lambda,
      n: this.n,
      m: this.m,
      k: this.k,
      s: this.s,
      tau: this.tau,
      mu: this.mu,
      delta: this.delta,
      code: this.codeName,
    };
  }

  /**
   * Rebuild parameters from their JSON form.
   * @throws SerializationError if the value does not have the expected shape.
   */
  static fromJSON(value: unknown, resolveCode: CodeResolver = defaultCodeResolver): SchemeParameters {
    const parsed = schemeParametersSchema.safeParse(value);
    if (!parsed.success) {
      throw new SerializationError(
        "scheme parameters",
        parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      );
    }
    return new SchemeParameters(parsed.data, resolveCode);
  }
}

/** Parameter sets used in the published experiments. */
export const presets = {
  /** One byte per message, [15,11] Hamming correction over 10 blocks. */
  byteHamming4: (resolveCode?: CodeResolver): SchemeParameters =>
    new SchemeParameters(
      { lambda: 1, n: 8, k: 714, s: 150, tau: 0, mu: 40, delta: 0.05, code: "hamming_4" },
      resolveCode,
    ),
  /** One byte per message, [7,4] Hamming correction over 21 blocks. */
  byteHamming3: (resolveCode?: CodeResolver): SchemeParameters =>
    new SchemeParameters(
      { lambda: 1, n: 8, k: 717, s: 147, tau: 8, mu: 63, delta: 0.05, code: "hamming_3" },
      resolveCode,
    ),
};
