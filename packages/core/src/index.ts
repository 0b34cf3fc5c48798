/**
 * @certdel/core: classical engine of a certified-deletion encryption scheme.
 *
 * A sender encrypts a message into classical values (c, p, q) plus m
 * conjugate-basis encoded positions prepared by an external quantum backend.
 * The receiver can either decrypt, once the key is revealed, or delete and
 * return a certificate that the sender verifies.
 *
 * - GF(2) bit vectors, matrices and universal hashing
 * - Scheme parameters with syndrome tables of linear codes
 * - Key generation, encryption, decryption with error correction
 * - Thresholded deletion-certificate verification
 * - Aggregation of multi-shot and two-stage measurement tables
 * - Experiment reports and JSON serialization
 *
 * @license MIT
 */

// --- Errors ---
export {
  ErrorCode,
  CertifiedDeletionError,
  ConfigurationError,
  UnknownCodeError,
  LengthMismatchError,
  MalformedMeasurementError,
  SerializationError,
} from "./errors.js";
export type { EntryError } from "./errors.js";

// --- Configuration & logging ---
export { loadConfig, BUNDLED_CODES_DIR } from "./config.js";
export type { CoreConfig, LogLevel } from "./config.js";
export { log, setLogLevel } from "./log.js";

// --- GF(2) ---
export { BitVector, BitMatrix } from "./bits.js";
export type { Bit } from "./bits.js";
export { xor, matVecMod2, hammingWeight, hammingDistance } from "./gf2.js";

// --- Randomness ---
export { SEED_BYTES, initSodium, createRandomSource, randomBits, randomMatrix } from "./random.js";
export type { RandomSource } from "./random.js";

// --- Codes & parameters ---
export {
  codeDefinitionSchema,
  codeFromDefinition,
  blockSyndrome,
  loadCode,
  createCodeResolver,
  defaultCodeResolver,
} from "./codes.js";
export type { CodeDefinition, ErrorCorrectingCode, CodeResolver } from "./codes.js";
export { SchemeParameters, schemeParametersSchema, presets } from "./scheme-parameters.js";
export type {
  SchemeParametersInit,
  SchemeParametersJson,
  CombinedExpectation,
} from "./scheme-parameters.js";
export { BREIDBART_ERROR_RATE, binomialPmf, binomialCdf } from "./statistics.js";

// --- Key & encryption ---
export {
  Basis,
  createKey,
  generateKey,
  computationalPositions,
  hadamardPositions,
} from "./key.js";
export type { Key } from "./key.js";
export {
  localPreparation,
  preparationRequest,
  encrypt,
  encryptWithBits,
} from "./encryption.js";
export type {
  PreparedPosition,
  PreparationRequest,
  QuantumBackend,
  MeasuringBackend,
  Ciphertext,
  EncryptionContext,
} from "./encryption.js";

// --- Decryption & verification ---
export {
  DecryptionOutcome,
  classifyDecryption,
  computationalBits,
  recoverPlaintext,
  decrypt,
  decryptResults,
  emptyDecryptionTally,
  correctCount,
  incorrectCount,
  flaggedCount,
  tallyTotal,
} from "./decryption.js";
export type {
  DecryptionOptions,
  DecryptionResult,
  DecryptionTally,
  ClassicalCiphertext,
} from "./decryption.js";
export { verify, verifyCounts } from "./verification.js";
export type { VerificationResult, DeletionTally } from "./verification.js";

// --- Count tables ---
export {
  DEFAULT_STAGE_SEPARATOR,
  checkCount,
  forEachEntry,
  totalShots,
  mergeCounts,
  splitStages,
  splitCounts,
  correlate,
  assembleShotCounts,
} from "./counts.js";
export type {
  MeasurementCounts,
  StageSplit,
  CorrelatedCounts,
  ShotMemoryOptions,
} from "./counts.js";

// --- Experiments ---
export {
  Experiment,
  formatDeletionStats,
  formatDecryptionStats,
  formatTestReport,
} from "./experiment.js";
export type {
  ExperimentData,
  DeletionReport,
  DecryptionReport,
  CombinedReport,
  TestReport,
} from "./experiment.js";

// --- Serialization ---
export {
  keySchema,
  ciphertextSchema,
  countsSchema,
  serializeKey,
  parseKey,
  serializeCiphertext,
  parseCiphertext,
  parseCounts,
} from "./serialization.js";
export type { KeyJson, CiphertextJson } from "./serialization.js";
