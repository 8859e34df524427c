/**
 * Cell address helpers (0-indexed) and output file naming
 */

import { colCache } from "./col-cache.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Cell address object (0-indexed)
 */
export interface CellAddress {
  /** 0-indexed column number */
  c: number;
  /** 0-indexed row number */
  r: number;
}

// =============================================================================
// Cell Address Encoding/Decoding
// =============================================================================

/**
 * Decode column string to 0-indexed number
 * @example decodeCol("A") => 0, decodeCol("Z") => 25, decodeCol("AA") => 26
 */
export function decodeCol(colstr: string): number {
  const n = colCache.l2n(colstr);
  if (n === undefined) {
    throw new RangeError(`Invalid column letters: ${JSON.stringify(colstr)}`);
  }
  return n - 1;
}

/**
 * Encode 0-indexed column number to string
 * @example encodeCol(0) => "A", encodeCol(25) => "Z", encodeCol(26) => "AA"
 */
export function encodeCol(col: number): string {
  return colCache.n2l(col + 1);
}

/**
 * Decode cell address string, `undefined` when it is not one
 * @example tryDecodeCell("B2") => {c: 1, r: 1}, tryDecodeCell("2B") => undefined
 */
export function tryDecodeCell(cstr: string): CellAddress | undefined {
  const addr = colCache.decodeAddress(cstr);
  return addr ? { c: addr.col - 1, r: addr.row - 1 } : undefined;
}

/**
 * Decode cell address string to CellAddress object
 * @example decodeCell("A1") => {c: 0, r: 0}, decodeCell("B2") => {c: 1, r: 1}
 */
export function decodeCell(cstr: string): CellAddress {
  const addr = tryDecodeCell(cstr);
  if (!addr) {
    throw new RangeError(`Invalid cell address: ${JSON.stringify(cstr)}`);
  }
  return addr;
}

/**
 * Encode CellAddress object to cell address string
 * @example encodeCell({c: 0, r: 0}) => "A1", encodeCell({c: 1, r: 1}) => "B2"
 */
export function encodeCell(cell: CellAddress): string {
  return colCache.encodeAddress(cell.r + 1, cell.c + 1);
}

// =============================================================================
// Output file naming
// =============================================================================

/**
 * CSV file name for a sheet: lowercase, `&` spelled out, every run of other
 * characters outside [a-z0-9] collapsed to one underscore, edges trimmed.
 * @example sheetFileName("Financial Sheet & Stuff (Top Secret)") => "financial_sheet_and_stuff_top_secret.csv"
 */
export function sheetFileName(sheetName: string): string {
  const stem = sheetName
    .toLowerCase()
    .replace(/&/g, " and ")
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return `${stem || "sheet"}.csv`;
}

/**
 * File names for a list of sheets, suffixing `_2`, `_3`, ... where two sheet
 * names reduce to the same file name.
 */
export function sheetFileNames(sheetNames: readonly string[]): string[] {
  const taken = new Set<string>();
  return sheetNames.map(name => {
    const base = sheetFileName(name);
    let candidate = base;
    for (let n = 2; taken.has(candidate); n++) {
      candidate = base.replace(/\.csv$/, `_${n}.csv`);
    }
    taken.add(candidate);
    return candidate;
  });
}
