/**
 * Measurement count tables and two-stage aggregation.
 *
 * Some tests measure the same prepared state twice (deletion then
 * decryption, or the reverse). The backend returns one table keyed by
 * "<first stage><separator><second stage>". splitCounts separates the
 * stages; correlate keeps only trials whose first stage was accepted.
 * Both preserve the number of shots they consume.
 *
 * @module counts
 */
import {
  CertifiedDeletionError,
  ConfigurationError,
  LengthMismatchError,
  MalformedMeasurementError,
} from "./errors.js";
import type { EntryError } from "./errors.js";
import { log } from "./log.js";

/** Measured string → number of shots that produced it. */
export type MeasurementCounts = Readonly<Record<string, number>>;

export const DEFAULT_STAGE_SEPARATOR = " ";

const BIT_STRING = /^[01]*$/;

/** Validate a shot count; returns it unchanged. */
export function checkCount(entry: string, count: number): number {
  if (!Number.isInteger(count) || count < 0) {
    throw new MalformedMeasurementError(entry, `count must be a non-negative integer, got ${count}`);
  }
  return count;
}

/**
 * Visit every entry of a table. A CertifiedDeletionError thrown for one
 * entry is recorded in `errors` and the remaining entries are still visited.
 * Any other error propagates.
 */
export function forEachEntry(
  counts: MeasurementCounts,
  errors: EntryError[],
  visit: (entry: string, count: number) => void,
): void {
  for (const [entry, count] of Object.entries(counts)) {
    try {
      visit(entry, checkCount(entry, count));
    } catch (err) {
      if (!(err instanceof CertifiedDeletionError)) throw err;
      errors.push({ entry, count, error: err });
      log("warn", `Skipped count-table entry (${count} shots): ${err.code}`);
    }
  }
}

function addTo(target: Record<string, number>, key: string, count: number): void {
  target[key] = (target[key] ?? 0) + count;
}

export function totalShots(counts: MeasurementCounts): number {
  return Object.values(counts).reduce((sum, count) => sum + count, 0);
}

/** Sum several tables entry by entry. */
export function mergeCounts(...tables: MeasurementCounts[]): Record<string, number> {
  const merged: Record<string, number> = {};
  for (const table of tables) {
    for (const [entry, count] of Object.entries(table)) {
      addTo(merged, entry, checkCount(entry, count));
    }
  }
  return merged;
}

function requireSeparator(separator: string): void {
  if (separator === "") {
    throw new ConfigurationError("Stage separator must not be empty");
  }
}

/**
 * Split one two-stage key into its halves.
 * @throws ConfigurationError if the separator is empty.
 * @throws MalformedMeasurementError unless the key is two bit strings joined
 *   by exactly one separator.
 */
export function splitStages(
  entry: string,
  separator: string = DEFAULT_STAGE_SEPARATOR,
): [first: string, second: string] {
  requireSeparator(separator);
  const parts = entry.split(separator);
  const [first, second] = parts;
  if (parts.length !== 2 || first === undefined || second === undefined) {
    throw new MalformedMeasurementError(entry, `expected exactly one "${separator}" separator`);
  }
  if (!BIT_STRING.test(first) || !BIT_STRING.test(second)) {
    throw new MalformedMeasurementError(entry, "stages must be bit strings");
  }
  return [first, second];
}

export interface StageSplit {
  first: Record<string, number>;
  second: Record<string, number>;
  errors: EntryError[];
}

/** Partition a two-stage table into one table per stage. */
export function splitCounts(
  raw: MeasurementCounts,
  separator: string = DEFAULT_STAGE_SEPARATOR,
): StageSplit {
  requireSeparator(separator);
  const split: StageSplit = { first: {}, second: {}, errors: [] };
  forEachEntry(raw, split.errors, (entry, count) => {
    const [first, second] = splitStages(entry, separator);
    addTo(split.first, first, count);
    addTo(split.second, second, count);
  });
  return split;
}

export interface CorrelatedCounts {
  /** Second-stage table restricted to accepted first stages. */
  counts: Record<string, number>;
  errors: EntryError[];
}

/**
 * Second-stage outcomes of the trials whose first-stage string is in
 * `acceptedFirstStageKeys`, e.g. "given that deletion was accepted, what
 * did decryption produce?".
 */
export function correlate(
  raw: MeasurementCounts,
  acceptedFirstStageKeys: ReadonlySet<string>,
  separator: string = DEFAULT_STAGE_SEPARATOR,
): CorrelatedCounts {
  requireSeparator(separator);
  const result: CorrelatedCounts = { counts: {}, errors: [] };
  forEachEntry(raw, result.errors, (entry, count) => {
    const [first, second] = splitStages(entry, separator);
    if (acceptedFirstStageKeys.has(first)) addTo(result.counts, second, count);
  });
  return result;
}

export interface ShotMemoryOptions {
  /**
   * Reverse every per-circuit string before joining. Backends that number
   * bits right-to-left need this to yield position 0 first. Default true.
   */
  reverseBits?: boolean;
}

/**
 * Build a count table from per-shot memory of a state split over several
 * circuits. `memory[c][shot]` is circuit c's result for that shot; one key
 * is the concatenation of every circuit's string for the same shot.
 *
 * @throws LengthMismatchError if a circuit reported fewer than `shots` results.
 */
export function assembleShotCounts(
  memory: readonly (readonly string[])[],
  shots: number,
  options: ShotMemoryOptions = {},
): Record<string, number> {
  const reverseBits = options.reverseBits ?? true;
  for (const circuit of memory) {
    if (circuit.length < shots) throw new LengthMismatchError("shot memory", shots, circuit.length);
  }
  const counts: Record<string, number> = {};
  for (let shot = 0; shot < shots; shot++) {
    const key = memory
      .map((circuit) => {
        const result = circuit[shot] ?? "";
        return reverseBits ? [...result].reverse().join("") : result;
      })
      .join("");
    if (!BIT_STRING.test(key)) {
      throw new MalformedMeasurementError(key, "shot results must be bit strings");
    }
    addTo(counts, key, 1);
  }
  return counts;
}
