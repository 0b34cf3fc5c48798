import { describe, it, expect, beforeAll } from "vitest";
import fc from "fast-check";
import { BitMatrix, BitVector } from "../src/bits.js";
import {
  DecryptionOutcome,
  computationalBits,
  decrypt,
  decryptResults,
  flaggedCount,
  tallyTotal,
} from "../src/decryption.js";
import {
  encrypt,
  encryptWithBits,
  localPreparation,
  preparationRequest,
} from "../src/encryption.js";
import type { QuantumBackend } from "../src/encryption.js";
import {
  ConfigurationError,
  LengthMismatchError,
  MalformedMeasurementError,
} from "../src/errors.js";
import {
  Basis,
  computationalPositions,
  createKey,
  generateKey,
  hadamardPositions,
} from "../src/key.js";
import { SEED_BYTES, createRandomSource, initSodium, randomBits } from "../src/random.js";
import type { RandomSource } from "../src/random.js";
import { SchemeParameters, presets } from "../src/scheme-parameters.js";
import { serializeKey } from "../src/serialization.js";
import { verify, verifyCounts } from "../src/verification.js";
import { C, H, SMALL_R, flip, smallKey, smallParams, smallSetup } from "./helpers/fixtures.js";
import { IdealBackend } from "./helpers/ideal-backend.js";

function seed(fill: number): Uint8Array {
  return new Uint8Array(32).fill(fill);
}

beforeAll(async () => {
  await initSodium();
});

// ============================================================================
// Randomness
// ============================================================================
describe("Random sources", () => {
  it("should reproduce a seeded stream", async () => {
    const a = await createRandomSource(seed(7));
    const b = await createRandomSource(seed(7));
    expect(a.bytes(40)).toEqual(b.bytes(40));
    expect(a.uniform(1000)).toBe(b.uniform(1000));
  });

  it("should never repeat a block within one seeded stream", async () => {
    const random = await createRandomSource(seed(7));
    expect(random.bytes(16)).not.toEqual(random.bytes(16));
  });

  it("should stay below the uniform bound", async () => {
    for (const random of [await createRandomSource(), await createRandomSource(seed(3))]) {
      for (let i = 0; i < 200; i++) {
        const value = random.uniform(7);
        expect(Number.isInteger(value)).toBe(true);
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(7);
      }
      expect(random.uniform(1)).toBe(0);
      expect(() => random.uniform(0)).toThrow(ConfigurationError);
    }
  });

  it("should reject a seed of the wrong size", async () => {
    await expect(createRandomSource(new Uint8Array(16))).rejects.toThrow(ConfigurationError);
    await expect(createRandomSource(new Uint8Array(16))).rejects.toThrow(
      "Random seed must be 32 bytes, got 16",
    );
  });

  it("should build a seeded source from a 32-byte seed", async () => {
    expect(SEED_BYTES).toBe(32);
    const random = await createRandomSource(new Uint8Array(SEED_BYTES).fill(5));
    expect(random.bytes(48)).toHaveLength(48);
    expect(random.uniform(10)).toBeLessThan(10);
  });

  it("should draw exactly the requested number of bits", async () => {
    const random = await createRandomSource();
    expect(randomBits(random, 13).length).toBe(13);
    expect(randomBits(random, 0).length).toBe(0);
  });
});

// ============================================================================
// Key generation
// ============================================================================
describe("Key generation", () => {
  it("should produce material of the scheme dimensions", async () => {
    const params = presets.byteHamming3();
    const key = generateKey(params, await createRandomSource());
    expect(key.theta).toHaveLength(864);
    expect(hadamardPositions(key.theta)).toHaveLength(717);
    expect(computationalPositions(key.theta)).toHaveLength(147);
    expect(key.rBar.length).toBe(717);
    expect(key.u.length).toBe(8);
    expect(key.d.length).toBe(8);
    expect(key.e.length).toBe(63);
    expect([key.privacyAmplificationMatrix.rows, key.privacyAmplificationMatrix.cols]).toEqual([147, 8]);
    expect([key.errorCorrectionMatrix.rows, key.errorCorrectionMatrix.cols]).toEqual([147, 8]);
    expect(Object.isFrozen(key)).toBe(true);
    expect(Object.isFrozen(key.theta)).toBe(true);
  });

  it("should be reproducible from a seed", async () => {
    const params = presets.byteHamming4();
    const a = generateKey(params, await createRandomSource(seed(9)));
    const b = generateKey(params, await createRandomSource(seed(9)));
    const c = generateKey(params, await createRandomSource(seed(10)));
    expect(serializeKey(a)).toEqual(serializeKey(b));
    expect(serializeKey(a)).not.toEqual(serializeKey(c));
  });

  it("should draw a fresh key for every message", async () => {
    const params = presets.byteHamming4();
    const random = await createRandomSource(seed(9));
    expect(serializeKey(generateKey(params, random))).not.toEqual(
      serializeKey(generateKey(params, random)),
    );
  });

  it("should list basis positions in order", () => {
    const theta = [H, C, C, H, C];
    expect(hadamardPositions(theta)).toEqual([0, 3]);
    expect(computationalPositions(theta)).toEqual([1, 2, 4]);
  });

  it("should require exactly k Hadamard positions", () => {
    const params = smallParams();
    const key = smallKey(params);
    expect(() => createKey({ ...key, theta: [H, C, C, C, C] }, params)).toThrow(
      "theta must have exactly 2 Hadamard positions, got 1",
    );
    expect(() => createKey({ ...key, theta: [H, C, C, H] }, params)).toThrow(
      "Length mismatch for theta: expected 5, got 4",
    );
  });

  it("should check every pad and matrix against the dimensions", () => {
    const params = smallParams();
    const key = smallKey(params);
    expect(() => createKey({ ...key, rBar: BitVector.fromString("101") }, params)).toThrow(
      "Length mismatch for rBar: expected 2, got 3",
    );
    expect(() => createKey({ ...key, d: BitVector.zeros(0) }, params)).toThrow(LengthMismatchError);
    expect(() =>
      createKey({ ...key, privacyAmplificationMatrix: BitMatrix.fromRows(["10", "01"]) }, params),
    ).toThrow("Length mismatch for privacy amplification matrix rows: expected 3, got 2");
    expect(() =>
      createKey({ ...key, errorCorrectionMatrix: BitMatrix.fromRows(["10", "01", "11"]) }, params),
    ).toThrow("Length mismatch for error correction matrix columns: expected 1, got 2");
  });
});

// ============================================================================
// Encryption
// ============================================================================
describe("Encryption", () => {
  it("should compute c, p and q from the computational bits", () => {
    const { ciphertext } = smallSetup();
    expect(ciphertext.c.toString()).toBe("10");
    expect(ciphertext.p.toString()).toBe("1");
    expect(ciphertext.q.toString()).toBe("00");
    expect(Object.isFrozen(ciphertext)).toBe(true);
  });

  it("should prepare rBar at Hadamard positions and r at computational ones", () => {
    const { key, ciphertext } = smallSetup();
    expect(ciphertext.handle).toEqual([
      { basis: Basis.HADAMARD, bit: 1 },
      { basis: Basis.COMPUTATIONAL, bit: 1 },
      { basis: Basis.COMPUTATIONAL, bit: 0 },
      { basis: Basis.HADAMARD, bit: 0 },
      { basis: Basis.COMPUTATIONAL, bit: 1 },
    ]);
    expect(preparationRequest(key, BitVector.fromString(SMALL_R))).toEqual(ciphertext.handle);
  });

  it("should check message and computational-bit lengths", () => {
    const params = smallParams();
    const key = smallKey(params);
    expect(() =>
      encryptWithBits(BitVector.fromString("101"), key, params, BitVector.fromString(SMALL_R), localPreparation),
    ).toThrow("Length mismatch for message: expected 2, got 3");
    expect(() =>
      encryptWithBits(BitVector.fromString("10"), key, params, BitVector.fromString("10"), localPreparation),
    ).toThrow("Length mismatch for computational bits: expected 3, got 2");
  });

  it("should hand the request to the backend and keep its handle", async () => {
    const params = smallParams();
    const key = smallKey(params);
    const requests: number[] = [];
    const backend: QuantumBackend<number> = {
      prepare: (request) => {
        requests.push(request.length);
        return 42;
      },
    };
    const ciphertext = encrypt(BitVector.fromString("01"), key, params, {
      random: await createRandomSource(),
      backend,
    });
    expect(ciphertext.handle).toBe(42);
    expect(requests).toEqual([5]);
  });
});

// ============================================================================
// Decryption
// ============================================================================
describe("Decryption", () => {
  it("should extract the computational bits of a full measurement", () => {
    const { params, key } = smallSetup();
    expect(computationalBits(BitVector.fromString("01001"), key, params).toString()).toBe("101");
    expect(computationalBits(BitVector.fromString("011"), key, params).toString()).toBe("011");
    expect(() => computationalBits(BitVector.fromString("0100"), key, params)).toThrow(
      MalformedMeasurementError,
    );
  });

  it("should select the positions passed in by a batch caller", () => {
    const { params, key } = smallSetup();
    const measured = BitVector.fromString("01100");
    expect(computationalBits(measured, key, params).toString()).toBe("110");
    expect(computationalBits(measured, key, params, [4, 2, 1]).toString()).toBe("011");
    expect(computationalBits(BitVector.fromString("011"), key, params, [4, 2, 1]).toString()).toBe("011");
  });

  it("should tally a table the same way as decrypting entry by entry", () => {
    const { params, key, ciphertext, message } = smallSetup();
    fc.assert(
      fc.property(
        fc.dictionary(
          fc.array(fc.constantFrom("0", "1"), { minLength: 5, maxLength: 5 }).map((b) => b.join("")),
          fc.integer({ min: 1, max: 50 }),
        ),
        (counts) => {
          const tally = decryptResults(counts, key, ciphertext, message, params);
          let correct = 0;
          for (const [entry, count] of Object.entries(counts)) {
            if (decrypt(BitVector.fromString(entry), key, ciphertext, message, params).correct) correct += count;
          }
          expect(tally.correctUnflagged + tally.correctFlagged).toBe(correct);
          expect(tallyTotal(tally)).toBe(Object.values(counts).reduce((a, b) => a + b, 0));
        },
      ),
      { numRuns: 100 },
    );
  });

  it("should classify all four outcomes", () => {
    const { params, key, ciphertext, message } = smallSetup();
    const outcome = (measured: string) =>
      decrypt(BitVector.fromString(measured), key, ciphertext, message, params).outcome;
    expect(outcome("101")).toBe(DecryptionOutcome.CORRECT_UNFLAGGED);
    expect(outcome("010")).toBe(DecryptionOutcome.CORRECT_FLAGGED);
    expect(outcome("011")).toBe(DecryptionOutcome.INCORRECT_UNFLAGGED);
    expect(outcome("100")).toBe(DecryptionOutcome.INCORRECT_FLAGGED);
  });

  it("should recover the message from a single-error measurement with correction", () => {
    const { params, key, ciphertext, message } = smallSetup();
    const measured = BitVector.fromString("01000");
    const plain = decrypt(measured, key, ciphertext, message, params);
    expect(plain.plaintext.toString()).toBe("01");
    expect(plain.flagged).toBe(true);

    const corrected = decrypt(measured, key, ciphertext, message, params, { errorCorrect: true });
    expect(corrected).toMatchObject({
      correct: true,
      flagged: false,
      outcome: DecryptionOutcome.CORRECT_UNFLAGGED,
    });
    expect(corrected.plaintext.toString()).toBe("10");
  });

  it("should round-trip any message under any computational bits", () => {
    const { params, key } = smallSetup();
    const bits = (length: number) =>
      fc.array(fc.integer({ min: 0, max: 1 }), { minLength: length, maxLength: length }).map((b) => BitVector.fromBits(b));
    fc.assert(
      fc.property(bits(params.n), bits(params.s), (message, r) => {
        const ciphertext = encryptWithBits(message, key, params, r, localPreparation);
        const result = decrypt(r, key, ciphertext, message, params, { errorCorrect: true });
        expect(result.outcome).toBe(DecryptionOutcome.CORRECT_UNFLAGGED);
      }),
      { numRuns: 64 },
    );
  });

  it("should reject an expected message of the wrong length", () => {
    const { params, key, ciphertext } = smallSetup();
    expect(() =>
      decrypt(BitVector.fromString("101"), key, ciphertext, BitVector.fromString("1"), params),
    ).toThrow(LengthMismatchError);
  });

  it("should weight a count table and isolate malformed entries", () => {
    const { params, key, ciphertext, message } = smallSetup();
    const tally = decryptResults(
      { "101": 5, "010": 2, "011": 3, "100": 1, "10": 4 },
      key,
      ciphertext,
      message,
      params,
    );
    expect(tally).toMatchObject({
      correctUnflagged: 5,
      correctFlagged: 2,
      incorrectUnflagged: 3,
      incorrectFlagged: 1,
    });
    expect(tallyTotal(tally)).toBe(11);
    expect(flaggedCount(tally)).toBe(3);
    expect(tally.errors).toHaveLength(1);
    expect(tally.errors[0]).toMatchObject({ entry: "10", count: 4 });
    expect(tally.errors[0]?.error).toBeInstanceOf(MalformedMeasurementError);
  });
});

// ============================================================================
// Deletion verification
// ============================================================================
describe("Deletion verification", () => {
  it("should compare the Hadamard positions against rBar", () => {
    const { params, key } = smallSetup();
    expect(verify(key, BitVector.fromString("10000"), params.delta)).toEqual({ accepted: true, distance: 0 });
    expect(verify(key, BitVector.fromString("11101"), params.delta)).toEqual({ accepted: true, distance: 0 });
    expect(verify(key, BitVector.fromString("00000"), params.delta)).toEqual({ accepted: false, distance: 1 });
    expect(verify(key, BitVector.fromString("01010"), params.delta)).toEqual({ accepted: false, distance: 2 });
  });

  it("should accept strictly below delta·k", () => {
    const { key } = smallSetup();
    const certificate = BitVector.fromString("00000");
    expect(verify(key, certificate, 0.5).accepted).toBe(false);
    expect(verify(key, certificate, 0.51).accepted).toBe(true);
  });

  it("should accept exactly the distances below delta·k", () => {
    const { key } = smallSetup();
    fc.assert(
      fc.property(
        fc.array(fc.integer({ min: 0, max: 1 }), { minLength: 5, maxLength: 5 }),
        fc.double({ min: 0.01, max: 0.99, noNaN: true }),
        (bits, delta) => {
          const { accepted, distance } = verify(key, BitVector.fromBits(bits), delta);
          expect(accepted).toBe(distance < delta * 2);
        },
      ),
      { numRuns: 200 },
    );
  });

  it("should tally a certificate table the same way as verifying entry by entry", () => {
    const { params, key } = smallSetup();
    fc.assert(
      fc.property(
        fc.dictionary(
          fc.array(fc.constantFrom("0", "1"), { minLength: 5, maxLength: 5 }).map((b) => b.join("")),
          fc.integer({ min: 1, max: 50 }),
        ),
        (counts) => {
          const tally = verifyCounts(counts, key, params);
          let accepted = 0;
          for (const [entry, count] of Object.entries(counts)) {
            if (verify(key, BitVector.fromString(entry), params.delta).accepted) accepted += count;
          }
          expect(tally.accepted).toBe(accepted);
          expect(tally.accepted + tally.rejected).toBe(Object.values(counts).reduce((a, b) => a + b, 0));
        },
      ),
      { numRuns: 100 },
    );
  });

  it("should reject a certificate that does not cover every position", () => {
    const { params, key } = smallSetup();
    expect(() => verify(key, BitVector.fromString("1000"), params.delta)).toThrow(
      "Length mismatch for deletion certificate: expected 5, got 4",
    );
  });

  it("should tally a certificate table with a distance histogram", () => {
    const { params, key } = smallSetup();
    const tally = verifyCounts(
      { "10000": 4, "11101": 1, "00000": 2, "01010": 3, "1x000": 1, "1000": 2 },
      key,
      params,
    );
    expect(tally.accepted).toBe(5);
    expect(tally.rejected).toBe(5);
    expect(tally.rejectedDistances).toEqual(
      new Map([
        [1, 2],
        [2, 3],
      ]),
    );
    expect(tally.acceptedCertificates).toEqual(new Set(["10000", "11101"]));
    // Integer-like keys come first in property order.
    expect(tally.errors.map((e) => [e.entry, e.error.name])).toEqual([
      ["1000", "LengthMismatchError"],
      ["1x000", "MalformedMeasurementError"],
    ]);
  });
});

// ============================================================================
// End to end
// ============================================================================
describe("End to end", () => {
  let random: RandomSource;
  const params = () =>
    new SchemeParameters({ lambda: 1, n: 4, k: 6, s: 6, tau: 0, mu: 0, delta: 0.1, code: "hamming_3" });

  beforeAll(async () => {
    random = await createRandomSource(seed(1));
  });

  it("should decrypt a noiseless measurement and accept the honest certificate", () => {
    const p = params();
    const key = generateKey(p, random);
    expect(hadamardPositions(key.theta)).toHaveLength(6);

    const message = BitVector.fromString("1011");
    const ciphertext = encrypt(message, key, p, { random, backend: localPreparation });
    const prepared = BitVector.fromBits(ciphertext.handle.map((position) => position.bit));

    const result = decrypt(prepared, key, ciphertext, message, p);
    expect(result.plaintext.toString()).toBe("1011");
    expect(result.correct).toBe(true);
    expect(result.flagged).toBe(false);

    expect(verify(key, prepared, p.delta)).toEqual({ accepted: true, distance: 0 });
  });

  it("should reject a certificate one position away from rBar", () => {
    const p = params();
    const key = generateKey(p, random);
    const ciphertext = encrypt(BitVector.fromString("1011"), key, p, { random, backend: localPreparation });
    const prepared = BitVector.fromBits(ciphertext.handle.map((position) => position.bit));
    const [firstHadamard = 0] = hadamardPositions(key.theta);
    const certificate = flip(prepared, firstHadamard);

    expect(verify(key, certificate, p.delta)).toEqual({ accepted: false, distance: 1 });
    const tally = verifyCounts({ [certificate.toString()]: 1 }, key, p);
    expect(tally.rejected).toBe(1);
    expect(tally.rejectedDistances).toEqual(new Map([[1, 1]]));
  });

  it("should run both tests against an ideal backend", async () => {
    const p = presets.byteHamming3();
    const noise = await createRandomSource();
    const backend = new IdealBackend(noise);
    const key = generateKey(p, noise);
    const message = BitVector.fromString("11000101");
    const ciphertext = encrypt(message, key, p, { random: noise, backend });

    const decryption = decryptResults(
      backend.measure(ciphertext.handle, key.theta, 20),
      key,
      ciphertext,
      message,
      p,
      { errorCorrect: true },
    );
    expect(decryption.correctUnflagged).toBe(20);

    const allHadamard = key.theta.map(() => Basis.HADAMARD);
    const deletion = verifyCounts(backend.measure(ciphertext.handle, allHadamard, 20), key, p);
    expect(deletion.accepted).toBe(20);
    expect(deletion.rejected).toBe(0);
  });
});
