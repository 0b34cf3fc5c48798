/**
 * Evaluation of one experiment: a key, a ciphertext and the count tables the
 * backend returned for the five protocol tests.
 *
 *   1. honest deletion
 *   2. decryption
 *   3. honest deletion, then decryption of the residual state
 *   4. malicious (Breidbart) deletion, then decryption
 *   5. decryption, then deletion as a tamper check
 *
 * Tests 3–5 measure the same state twice; their tables are keyed by both
 * measurements joined with a separator, first measurement first.
 *
 * @module experiment
 */
import type { BitVector } from "./bits.js";
import { DEFAULT_STAGE_SEPARATOR, correlate, splitCounts } from "./counts.js";
import type { MeasurementCounts } from "./counts.js";
import {
  correctCount,
  decryptResults,
  flaggedCount,
  incorrectCount,
} from "./decryption.js";
import type { ClassicalCiphertext, DecryptionTally } from "./decryption.js";
import type { EntryError } from "./errors.js";
import type { Key } from "./key.js";
import { log } from "./log.js";
import type { CombinedExpectation, SchemeParameters } from "./scheme-parameters.js";
import { verifyCounts } from "./verification.js";
import type { DeletionTally } from "./verification.js";

export interface ExperimentData {
  params: SchemeParameters;
  key: Key;
  ciphertext: ClassicalCiphertext;
  /** The plaintext that was encrypted. */
  message: BitVector;
  /** Shots per test. */
  shots: number;
  honestDeletionCounts?: MeasurementCounts;
  decryptionCounts?: MeasurementCounts;
  honestCombinedCounts?: MeasurementCounts;
  maliciousCombinedCounts?: MeasurementCounts;
  tamperDetectionCounts?: MeasurementCounts;
  /** Separator of two-stage keys. Default " ". */
  separator?: string;
  /** Apply syndrome correction when decrypting. Default false. */
  errorCorrect?: boolean;
}

export interface DeletionReport {
  kind: "deletion";
  title: string;
  tally: DeletionTally;
  total: number;
  expected: number;
}

export interface DecryptionReport {
  kind: "decryption";
  title: string;
  tally: DecryptionTally;
  total: number;
  expected: readonly [number, number];
}

export interface CombinedReport {
  kind: "combined";
  title: string;
  /** Which measurement happened first. */
  order: "deletion-first" | "decryption-first";
  deletion: DeletionTally;
  decryption: DecryptionTally;
  /**
   * Decryption outcomes restricted to shots whose deletion certificate was
   * accepted. Null when the decryption came first or nothing was accepted.
   */
  decryptionGivenAccepted: DecryptionTally | null;
  total: number;
  expected: CombinedExpectation;
  /** Two-stage keys that could not be split. */
  errors: EntryError[];
}

export type TestReport = DeletionReport | DecryptionReport | CombinedReport;

function percent(count: number, total: number): string {
  return `${total === 0 ? "0.00" : ((count / total) * 100).toFixed(2)}%`;
}

function ratio(label: string, count: number, total: number): string {
  return `${label}: ${count}/${total} (${percent(count, total)})`;
}

function range([low, high]: readonly [number, number]): string {
  return `${(low * 100).toFixed(2)}%–${(high * 100).toFixed(2)}%`;
}

export function formatDeletionStats(tally: DeletionTally, total: number): string {
  const lines = [
    ratio("Accepted proof of deletion", tally.accepted, total),
    ratio("Rejected proof of deletion", tally.rejected, total),
  ];
  if (tally.rejectedDistances.size > 0) {
    lines.push(`Hamming distances of the ${tally.rejected} rejected certificates:`);
    const sorted = [...tally.rejectedDistances.entries()].sort(([a], [b]) => a - b);
    for (const [distance, count] of sorted) {
      lines.push(`  distance ${distance}: ${count}`);
    }
  }
  return lines.join("\n");
}

export function formatDecryptionStats(tally: DecryptionTally, total: number): string {
  return [
    ratio("Correct message decrypted", correctCount(tally), total),
    ratio("Incorrect message decrypted", incorrectCount(tally), total),
    ratio("Hash mismatch flagged", flaggedCount(tally), total),
  ].join("\n");
}

export function formatTestReport(report: TestReport): string {
  const header = `----- ${report.title} -----`;
  if (report.kind === "combined") {
    const deletion = formatDeletionStats(report.deletion, report.total);
    const decryption = formatDecryptionStats(report.decryption, report.total);
    const sections =
      report.order === "deletion-first" ? [deletion, decryption] : [decryption, deletion];
    if (report.decryptionGivenAccepted) {
      sections.push(
        "Decryption where the proof of deletion was accepted:\n" +
          formatDecryptionStats(report.decryptionGivenAccepted, report.deletion.accepted),
      );
    }
    sections.push(
      `Expected deletion success: ${percent(report.expected.deletion, 1)}\n` +
        `Expected decryption success: ${range(report.expected.decryption)}`,
    );
    return [header, ...sections].join("\n\n");
  }
  if (report.kind === "deletion") {
    return [
      header,
      formatDeletionStats(report.tally, report.total),
      `Expected success: ${percent(report.expected, 1)}`,
    ].join("\n\n");
  }
  return [
    header,
    formatDecryptionStats(report.tally, report.total),
    `Expected success: ${range(report.expected)}`,
  ].join("\n\n");
}

export class Experiment {
  private readonly separator: string;

  constructor(private readonly data: ExperimentData) {
    this.separator = data.separator ?? DEFAULT_STAGE_SEPARATOR;
  }

  /** Verify a table of deletion certificates. */
  runDeletionTest(counts: MeasurementCounts, title = "HONEST DELETION"): DeletionReport {
    const { key, params, shots } = this.data;
    return {
      kind: "deletion",
      title,
      tally: verifyCounts(counts, key, params),
      total: shots,
      expected: params.expectedDeletionSuccessRate(),
    };
  }

  /** Decrypt a table of decryption measurements. */
  runDecryptionTest(counts: MeasurementCounts, title = "DECRYPTION"): DecryptionReport {
    const { params, shots } = this.data;
    return {
      kind: "decryption",
      title,
      tally: this.decrypt(counts),
      total: shots,
      expected: params.expectedDecryptionSuccessRange(),
    };
  }

  /**
   * Deletion first, then decryption on the same state. Also reports the
   * decryption outcomes of the shots whose certificate was accepted.
   */
  runCombinedTest(
    raw: MeasurementCounts,
    expected: CombinedExpectation,
    title: string,
  ): CombinedReport {
    const { key, params, shots } = this.data;
    const split = splitCounts(raw, this.separator);
    const deletion = verifyCounts(split.first, key, params);
    const decryption = this.decrypt(split.second);
    let decryptionGivenAccepted: DecryptionTally | null = null;
    if (deletion.accepted > 0) {
      const correlated = correlate(raw, deletion.acceptedCertificates, this.separator);
      decryptionGivenAccepted = this.decrypt(correlated.counts);
    }
    return {
      kind: "combined",
      title,
      order: "deletion-first",
      deletion,
      decryption,
      decryptionGivenAccepted,
      total: shots,
      expected,
      errors: split.errors,
    };
  }

  /**
   * Decryption first, then the deletion measurement. An accepted
   * certificate means the ciphertext arrived untampered.
   */
  runTamperDetectionTest(raw: MeasurementCounts, title = "TAMPER DETECTION"): CombinedReport {
    const { key, params, shots } = this.data;
    const split = splitCounts(raw, this.separator);
    return {
      kind: "combined",
      title,
      order: "decryption-first",
      deletion: verifyCounts(split.second, key, params),
      decryption: this.decrypt(split.first),
      decryptionGivenAccepted: null,
      total: shots,
      expected: params.expectedTamperDetection(),
      errors: split.errors,
    };
  }

  /** Run every test whose table is present, in test order. */
  runAll(): TestReport[] {
    const { params } = this.data;
    const reports: TestReport[] = [];
    if (this.data.honestDeletionCounts) {
      reports.push(this.runDeletionTest(this.data.honestDeletionCounts, "TEST 1: HONEST DELETION"));
    }
    if (this.data.decryptionCounts) {
      reports.push(this.runDecryptionTest(this.data.decryptionCounts, "TEST 2: DECRYPTION"));
    }
    if (this.data.honestCombinedCounts) {
      reports.push(
        this.runCombinedTest(
          this.data.honestCombinedCounts,
          params.expectedHonestDeletionThenDecryption(),
          "TEST 3: HONEST DELETION, THEN DECRYPTION",
        ),
      );
    }
    if (this.data.maliciousCombinedCounts) {
      reports.push(
        this.runCombinedTest(
          this.data.maliciousCombinedCounts,
          params.expectedMaliciousDeletionThenDecryption(),
          "TEST 4: MALICIOUS DELETION, THEN DECRYPTION",
        ),
      );
    }
    if (this.data.tamperDetectionCounts) {
      reports.push(
        this.runTamperDetectionTest(this.data.tamperDetectionCounts, "TEST 5: TAMPER DETECTION"),
      );
    }
    return reports;
  }

  /** Scheme summary followed by every available test report. */
  formatReport(): string {
    const { params } = this.data;
    const info = [
      `Message length: ${params.n}`,
      `Total positions: ${params.m}`,
      `Positions for deletion: ${params.k}`,
      `Positions for message encryption: ${params.s}`,
      `Error-correcting code: ${params.codeName}`,
    ].join("\n");
    const reports = this.runAll();
    log("info", `Evaluated ${reports.length} tests over ${this.data.shots} shots each`);
    return [info, ...reports.map(formatTestReport)].join("\n\n");
  }

  private decrypt(counts: MeasurementCounts): DecryptionTally {
    const { key, ciphertext, message, params, errorCorrect } = this.data;
    return decryptResults(counts, key, ciphertext, message, params, { errorCorrect });
  }
}
