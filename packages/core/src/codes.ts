/**
 * Linear error-correcting codes: parity-check matrix and syndrome table.
 *
 * Tables are JSON files named `<code>.json`. The parity-check matrix is
 * stored the conventional way (syndromeLength rows of codeLength bits) and
 * kept transposed in memory, so that the syndrome of a codeword block is the
 * row-vector product `block · Hᵀ`.
 *
 * @module codes
 */
import { readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import { BitMatrix, BitVector } from "./bits.js";
import { loadConfig } from "./config.js";
import { ConfigurationError, UnknownCodeError } from "./errors.js";
import { matVecMod2 } from "./gf2.js";
import { log } from "./log.js";

const bitString = z.string().regex(/^[01]*$/, "Invalid bit string");
const codeName = z.string().regex(/^[A-Za-z0-9_-]+$/, "Invalid code name");

export const codeDefinitionSchema = z.object({
  name: codeName,
  codeLength: z.number().int().positive(),
  syndromeLength: z.number().int().positive(),
  parityCheckMatrix: z.array(bitString).min(1),
  syndromeTable: z.record(bitString, bitString),
});

export type CodeDefinition = z.infer<typeof codeDefinitionSchema>;

export interface ErrorCorrectingCode {
  readonly name: string;
  readonly codeLength: number;
  readonly syndromeLength: number;
  /** Hᵀ: codeLength rows × syndromeLength columns. */
  readonly parityCheckTranspose: BitMatrix;
  /** Syndrome string → most likely error vector. */
  readonly syndromeTable: ReadonlyMap<string, BitVector>;
}

/** Resolves a code name to its tables. */
export type CodeResolver = (name: string) => ErrorCorrectingCode;

/**
 * Build a code from an in-memory definition.
 * @throws ConfigurationError if the matrix or table dimensions disagree.
 */
export function codeFromDefinition(definition: CodeDefinition): ErrorCorrectingCode {
  const { name, codeLength, syndromeLength } = definition;
  if (definition.parityCheckMatrix.length !== syndromeLength) {
    throw new ConfigurationError(
      `Code ${name}: parity-check matrix has ${definition.parityCheckMatrix.length} rows, expected ${syndromeLength}`,
    );
  }
  if (definition.parityCheckMatrix.some((row) => row.length !== codeLength)) {
    throw new ConfigurationError(
      `Code ${name}: every parity-check row must have ${codeLength} bits`,
    );
  }
  const parityCheckTranspose = BitMatrix.fromRows(definition.parityCheckMatrix).transpose();
  const syndromeTable = new Map<string, BitVector>();
  for (const [syndrome, entry] of Object.entries(definition.syndromeTable)) {
    if (syndrome.length !== syndromeLength || entry.length !== codeLength) {
      throw new ConfigurationError(
        `Code ${name}: table entry ${syndrome} has wrong dimensions`,
      );
    }
    const error = BitVector.fromString(entry);
    const actual = matVecMod2(error, parityCheckTranspose).toString();
    if (actual !== syndrome) {
      throw new ConfigurationError(
        `Code ${name}: table entry ${syndrome} maps to an error with syndrome ${actual}`,
        { syndrome, actual },
      );
    }
    syndromeTable.set(syndrome, error);
  }
  return { name, codeLength, syndromeLength, parityCheckTranspose, syndromeTable };
}

/** Syndrome of a single codeword block. */
export function blockSyndrome(code: ErrorCorrectingCode, block: BitVector): BitVector {
  return matVecMod2(block, code.parityCheckTranspose);
}

/**
 * Read `<dir>/<name>.json`.
 * @throws UnknownCodeError if the file is missing or invalid.
 */
export function loadCode(name: string, dir: string): ErrorCorrectingCode {
  if (!codeName.safeParse(name).success) {
    throw new UnknownCodeError(name, "invalid code name");
  }
  const file = path.join(dir, `${name}.json`);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf8"));
  } catch (err) {
    throw new UnknownCodeError(name, err instanceof Error ? err.message : String(err));
  }
  const parsed = codeDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UnknownCodeError(
      name,
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
    );
  }
  if (parsed.data.name !== name) {
    throw new UnknownCodeError(name, `file declares code "${parsed.data.name}"`);
  }
  const code = codeFromDefinition(parsed.data);
  log("debug", `Loaded code ${name} [${code.codeLength}, syndrome ${code.syndromeLength}, ${code.syndromeTable.size} table entries]`);
  return code;
}

/**
 * A resolver that loads each code once from `dir` and caches it.
 * In-memory definitions take precedence over files.
 */
export function createCodeResolver(
  dir: string = loadConfig().codesDir,
  definitions: readonly CodeDefinition[] = [],
): CodeResolver {
  const cache = new Map<string, ErrorCorrectingCode>(
    definitions.map((definition) => [definition.name, codeFromDefinition(definition)]),
  );
  return (name) => {
    const cached = cache.get(name);
    if (cached) return cached;
    const code = loadCode(name, dir);
    cache.set(name, code);
    return code;
  };
}

let defaultResolver: CodeResolver | undefined;

/** The process-wide resolver over the configured code directory. */
export function defaultCodeResolver(name: string): ErrorCorrectingCode {
  defaultResolver ??= createCodeResolver();
  return defaultResolver(name);
}
