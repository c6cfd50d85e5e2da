import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import type { CodePointSequence } from "./codePoints.js";
import { CanonicalTextError, type CanonicalTextErrorCode } from "./errors.js";

/** Locale-independent default case folding. */
export interface CaseFolder {
  fold(input: CodePointSequence): CodePointSequence;
}

export type CaseFoldingTable = ReadonlyMap<number, readonly number[]>;

const DATA_ERROR: CanonicalTextErrorCode = "CASE_FOLDING_DATA";

export const caseFoldingDataPath = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  "../data/case-folding.json"
);

function isCodePointList(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((v) => typeof v === "number" && Number.isInteger(v))
  );
}

/**
 * Parses the bundled table: `{ mappings: [[from, [to, ...]], ...] }`,
 * covering the C and F statuses of CaseFolding.txt.
 */
export function parseCaseFoldingTable(raw: unknown): CaseFoldingTable {
  if (!raw || typeof raw !== "object" || !("mappings" in raw)) {
    throw new CanonicalTextError("Case folding data has no mappings", DATA_ERROR);
  }
  const { mappings } = raw;
  if (!Array.isArray(mappings) || mappings.length === 0) {
    throw new CanonicalTextError("Case folding mappings must be a non-empty array", DATA_ERROR);
  }
  const table = new Map<number, readonly number[]>();
  mappings.forEach((entry: unknown, index: number) => {
    if (!Array.isArray(entry) || entry.length !== 2) {
      throw new CanonicalTextError("Malformed case folding entry", DATA_ERROR, { index });
    }
    const [from, to]: unknown[] = entry;
    if (typeof from !== "number" || !isCodePointList(to)) {
      throw new CanonicalTextError("Malformed case folding entry", DATA_ERROR, { index });
    }
    table.set(from, to);
  });
  return table;
}

export function loadCaseFoldingTable(file: string = caseFoldingDataPath): CaseFoldingTable {
  const raw: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  return parseCaseFoldingTable(raw);
}

export function createCaseFolder(table: CaseFoldingTable): CaseFolder {
  return {
    *fold(input) {
      for (const cp of input) {
        const mapped = table.get(cp);
        if (mapped) {
          yield* mapped;
        } else {
          yield cp;
        }
      }
    }
  };
}

let defaultTable: CaseFoldingTable | null = null;

/** Full default case folding; the table is read on first use. */
export const defaultCaseFolder: CaseFolder = {
  fold(input) {
    if (!defaultTable) defaultTable = loadCaseFoldingTable();
    return createCaseFolder(defaultTable).fold(input);
  }
};
