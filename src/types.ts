/**
 * Type definitions shared across the conversion engine
 */

// ============================================================================
// Workbook metadata
// ============================================================================
export type SheetState = "visible" | "hidden" | "veryHidden";

export interface SheetDescriptor {
  /** Display name as shown on the sheet tab */
  readonly name: string;
  /** 0-based position in workbook declaration order */
  readonly index: number;
  /** Relationship id linking the sheet to its part, e.g. `rId1` */
  readonly relId: string;
  /** Archive entry holding the worksheet XML */
  readonly path: string;
  readonly sheetId?: number;
  readonly state?: SheetState;
}

/** A sheet is addressed by display name or by 0-based declaration index */
export type SheetReference = string | number;

// ============================================================================
// Number formats
// ============================================================================
export type NumberFormatCategory = "Date" | "Other";

// ============================================================================
// Cells
// ============================================================================
export enum CellType {
  SharedString = "SharedString",
  InlineString = "InlineString",
  Boolean = "Boolean",
  FormulaString = "FormulaString",
  Error = "Error",
  /** `t="d"`: ISO 8601 text, written as found */
  IsoDate = "IsoDate",
  Number = "Number",
  Blank = "Blank"
}

/** Transient cell record, alive only while its row is being assembled */
export interface CellRecord {
  /** 0-based column index */
  col: number;
  /** 1-based row number */
  row: number;
  type: CellType;
  raw: string;
  style?: number;
  /** Coordinate text as found in the file, kept for error messages */
  address: string;
}

/** One CSV record: fields in column order, width varies per row */
export type CsvRecord = string[];

// ============================================================================
// Options
// ============================================================================
export type Delimiter = "," | ";";

/**
 * - `auto`: date styles convert; unstyled numbers go through the serial heuristic
 * - `style`: only date styles convert
 * - `none`: numbers are always written as found
 */
export type DateMode = "auto" | "style" | "none";
