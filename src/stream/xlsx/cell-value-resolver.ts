import { MalformedXmlError, isConversionError } from "../../errors.js";
import { excelToIsoString } from "../../utils/utils.js";
import { CellType, type CellRecord, type DateMode } from "../../types.js";
import type { SharedStringTable } from "../../xlsx/shared-string-table.js";
import type { StyleTable } from "../../xlsx/style-table.js";

/** Read-only workbook state every sheet export borrows */
export interface WorkbookTables {
  sharedStrings: SharedStringTable;
  styles: StyleTable;
  date1904: boolean;
}

export interface ResolveOptions {
  dates: DateMode;
}

const NUMERIC_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_RE = /^-?\d+$/;

const SERIAL_THRESHOLD = 1000;

/**
 * Whether an unstyled number should be read as a serial date. Small values
 * (counts, coordinates, percentages) stay numeric. Year-like values with a
 * time of day (2024.5) are covered by the threshold.
 */
export function looksLikeSerialDate(value: number): boolean {
  return value >= SERIAL_THRESHOLD;
}

function shouldConvertDate(
  value: number,
  style: number | undefined,
  tables: WorkbookTables,
  mode: DateMode
): boolean {
  if (mode === "none") {
    return false;
  }
  const category = style === undefined ? undefined : tables.styles.category(style);
  if (category !== undefined) {
    return category === "Date";
  }
  return mode === "auto" && looksLikeSerialDate(value);
}

function resolveNumber(cell: CellRecord, tables: WorkbookTables, options: ResolveOptions): string {
  const text = cell.raw.trim();
  if (text === "") {
    return "";
  }
  if (!NUMERIC_RE.test(text)) {
    return cell.raw;
  }
  const value = Number(text);
  if (!shouldConvertDate(value, cell.style, tables, options.dates)) {
    return cell.raw;
  }
  return excelToIsoString(value, tables.date1904) ?? cell.raw;
}

function resolveSharedString(cell: CellRecord, tables: WorkbookTables): string {
  const text = cell.raw.trim();
  if (!INTEGER_RE.test(text)) {
    throw new MalformedXmlError(`Shared string reference ${JSON.stringify(cell.raw)} is not an index`, {
      cell: cell.address
    });
  }
  const index = parseInt(text, 10);
  try {
    return tables.sharedStrings.get(index);
  } catch (error) {
    if (isConversionError(error)) {
      throw error.withContext({ cell: cell.address });
    }
    throw error;
  }
}

/**
 * Display text of one cell. Throws `MalformedXmlError` for values that do not
 * fit their declared type and `BadReferenceError` for dangling shared strings.
 */
export function resolveCellValue(
  cell: CellRecord,
  tables: WorkbookTables,
  options: ResolveOptions
): string {
  switch (cell.type) {
    case CellType.SharedString:
      return resolveSharedString(cell, tables);
    case CellType.InlineString:
    case CellType.FormulaString:
      return cell.raw;
    case CellType.Boolean:
      switch (cell.raw.trim()) {
        case "1":
          return "TRUE";
        case "0":
          return "FALSE";
        default:
          throw new MalformedXmlError(`Boolean cell holds ${JSON.stringify(cell.raw)}`, {
            cell: cell.address
          });
      }
    case CellType.Error:
    case CellType.IsoDate:
      return cell.raw;
    case CellType.Number:
      return resolveNumber(cell, tables, options);
    case CellType.Blank:
      return "";
  }
}
