/**
 * Bit-packed GF(2) vectors and matrices.
 *
 * Bits are stored little-endian in 32-bit words: bit i lives in word i >>> 5
 * at position i & 31. Unused high bits of the last word are always zero, so
 * word-wise equality and popcount need no masking.
 *
 * The string form lists bit 0 first: BitVector.fromString("100").get(0) === 1.
 *
 * @module bits
 */
import { LengthMismatchError, MalformedMeasurementError } from "./errors.js";

export type Bit = 0 | 1;

const WORD_BITS = 32;
const CHAR_0 = 48;
const CHAR_1 = 49;

function wordCount(length: number): number {
  return Math.ceil(length / WORD_BITS);
}

function setBit(words: Uint32Array, index: number): void {
  const w = index >>> 5;
  words[w] = (words[w] ?? 0) | (1 << (index & 31));
}

function readBit(words: Uint32Array, index: number): Bit {
  return ((words[index >>> 5] ?? 0) >>> (index & 31)) & 1 ? 1 : 0;
}

function popcount32(word: number): number {
  let x = word - ((word >>> 1) & 0x55555555);
  x = (x & 0x33333333) + ((x >>> 2) & 0x33333333);
  x = (x + (x >>> 4)) & 0x0f0f0f0f;
  return Math.imul(x, 0x01010101) >>> 24;
}

function assertLength(length: number): void {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Bit length must be a non-negative integer, got ${length}`);
  }
}

/** Immutable GF(2) row vector. */
export class BitVector {
  private constructor(
    readonly length: number,
    private readonly words: Uint32Array,
  ) {}

  static zeros(length: number): BitVector {
    assertLength(length);
    return new BitVector(length, new Uint32Array(wordCount(length)));
  }

  /**
   * Parse a string of '0' and '1' characters.
   * @throws MalformedMeasurementError on any other character.
   */
  static fromString(bits: string): BitVector {
    const words = new Uint32Array(wordCount(bits.length));
    for (let i = 0; i < bits.length; i++) {
      const ch = bits.charCodeAt(i);
      if (ch === CHAR_1) {
        setBit(words, i);
      } else if (ch !== CHAR_0) {
        throw new MalformedMeasurementError(
          bits,
          `invalid character "${bits[i]}" at position ${i}`,
        );
      }
    }
    return new BitVector(bits.length, words);
  }

  static fromBits(bits: ArrayLike<number>): BitVector {
    const words = new Uint32Array(wordCount(bits.length));
    for (let i = 0; i < bits.length; i++) {
      if (bits[i]) setBit(words, i);
    }
    return new BitVector(bits.length, words);
  }

  /** Take the first `length` bits of a byte array, bit 0 = LSB of byte 0. */
  static fromBytes(bytes: Uint8Array, length: number): BitVector {
    assertLength(length);
    if (bytes.length * 8 < length) {
      throw new LengthMismatchError("random bytes", Math.ceil(length / 8), bytes.length);
    }
    const words = new Uint32Array(wordCount(length));
    for (let i = 0; i < length; i++) {
      if (((bytes[i >>> 3] ?? 0) >>> (i & 7)) & 1) setBit(words, i);
    }
    return new BitVector(length, words);
  }

  /**
   * XOR of a collection of vectors that all have `length` bits.
   * An empty collection yields the zero vector.
   */
  static sum(length: number, vectors: Iterable<BitVector>): BitVector {
    assertLength(length);
    const acc = new Uint32Array(wordCount(length));
    for (const v of vectors) {
      if (v.length !== length) {
        throw new LengthMismatchError("xor operand", length, v.length);
      }
      for (let w = 0; w < acc.length; w++) {
        acc[w] = (acc[w] ?? 0) ^ (v.words[w] ?? 0);
      }
    }
    return new BitVector(length, acc);
  }

  get(index: number): Bit {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new RangeError(`Bit index ${index} out of range [0, ${this.length})`);
    }
    return readBit(this.words, index);
  }

  /** Number of set bits. */
  weight(): number {
    let total = 0;
    for (const word of this.words) total += popcount32(word);
    return total;
  }

  xor(other: BitVector): BitVector {
    return BitVector.sum(this.length, [this, other]);
  }

  equals(other: BitVector): boolean {
    if (this.length !== other.length) return false;
    for (let w = 0; w < this.words.length; w++) {
      if (this.words[w] !== other.words[w]) return false;
    }
    return true;
  }

  /** The bits at the given positions, in the order given. */
  select(indices: readonly number[]): BitVector {
    const words = new Uint32Array(wordCount(indices.length));
    indices.forEach((index, i) => {
      if (this.get(index)) setBit(words, i);
    });
    return new BitVector(indices.length, words);
  }

  slice(start: number, end: number = this.length): BitVector {
    const from = Math.max(0, Math.min(start, this.length));
    const to = Math.max(from, Math.min(end, this.length));
    const words = new Uint32Array(wordCount(to - from));
    for (let i = from; i < to; i++) {
      if (readBit(this.words, i)) setBit(words, i - from);
    }
    return new BitVector(to - from, words);
  }

  static concat(parts: readonly BitVector[]): BitVector {
    const length = parts.reduce((n, part) => n + part.length, 0);
    const words = new Uint32Array(wordCount(length));
    let offset = 0;
    for (const part of parts) {
      for (let i = 0; i < part.length; i++) {
        if (readBit(part.words, i)) setBit(words, offset + i);
      }
      offset += part.length;
    }
    return new BitVector(length, words);
  }

  toBits(): Bit[] {
    const bits: Bit[] = [];
    for (let i = 0; i < this.length; i++) bits.push(readBit(this.words, i));
    return bits;
  }

  toString(): string {
    let out = "";
    for (let i = 0; i < this.length; i++) out += readBit(this.words, i) ? "1" : "0";
    return out;
  }

  toJSON(): string {
    return this.toString();
  }
}

/** Immutable GF(2) matrix stored as bit-packed rows. */
export class BitMatrix {
  private constructor(
    readonly rows: number,
    readonly cols: number,
    private readonly data: readonly BitVector[],
  ) {}

  /**
   * Build a matrix from its rows. `cols` is required only when there are no
   * rows to infer it from.
   */
  static fromRows(rows: readonly (BitVector | string)[], cols?: number): BitMatrix {
    const parsed = rows.map((row) =>
      typeof row === "string" ? BitVector.fromString(row) : row,
    );
    const width = cols ?? parsed[0]?.length ?? 0;
    assertLength(width);
    for (const row of parsed) {
      if (row.length !== width) {
        throw new LengthMismatchError("matrix row", width, row.length);
      }
    }
    return new BitMatrix(parsed.length, width, parsed);
  }

  static zeros(rows: number, cols: number): BitMatrix {
    assertLength(rows);
    return BitMatrix.fromRows(
      Array.from({ length: rows }, () => BitVector.zeros(cols)),
      cols,
    );
  }

  row(index: number): BitVector {
    const row = this.data[index];
    if (row === undefined) {
      throw new RangeError(`Row ${index} out of range [0, ${this.rows})`);
    }
    return row;
  }

  column(index: number): BitVector {
    if (!Number.isInteger(index) || index < 0 || index >= this.cols) {
      throw new RangeError(`Column ${index} out of range [0, ${this.cols})`);
    }
    return BitVector.fromBits(this.data.map((row) => row.get(index)));
  }

  transpose(): BitMatrix {
    const columns: BitVector[] = [];
    for (let j = 0; j < this.cols; j++) columns.push(this.column(j));
    return BitMatrix.fromRows(columns, this.rows);
  }

  /** The rows selected by the set bits of `selector` (one bit per row). */
  selectRows(selector: BitVector): BitVector[] {
    if (selector.length !== this.rows) {
      throw new LengthMismatchError("row selector", this.rows, selector.length);
    }
    return this.data.filter((_, i) => selector.get(i) === 1);
  }

  equals(other: BitMatrix): boolean {
    return (
      this.rows === other.rows &&
      this.cols === other.cols &&
      this.data.every((row, i) => row.equals(other.row(i)))
    );
  }

  toRows(): string[] {
    return this.data.map((row) => row.toString());
  }

  toJSON(): string[] {
    return this.toRows();
  }
}
