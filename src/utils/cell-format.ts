/**
 * Number format classification
 * Decides whether a numFmt renders its number as a date/time. Display
 * formatting itself is out of scope: the converter only needs Date vs Other.
 */

import type { NumberFormatCategory } from "../types.js";

// =============================================================================
// Built-in formats
// =============================================================================

/**
 * Built-in numFmtId ranges that Excel renders as dates or times.
 * 14-22: standard dates and times, 27-36 and 50-58: CJK dates,
 * 45-47: mm:ss / [h]:mm:ss / mmss.0, 67-71 and 75-81: Thai dates and times.
 */
const BUILTIN_DATE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [14, 22],
  [27, 36],
  [45, 47],
  [50, 58],
  [67, 71],
  [75, 81]
];

export function isBuiltinDateFormat(numFmtId: number): boolean {
  return BUILTIN_DATE_RANGES.some(([lo, hi]) => numFmtId >= lo && numFmtId <= hi);
}

// =============================================================================
// Format Detection
// =============================================================================

/**
 * Check if format is "General"
 */
function isGeneral(fmt: string): boolean {
  return /^General$/i.test(fmt.trim());
}

/**
 * Strip the parts of a format code that never carry date tokens:
 * quoted literals, backslash escapes, `_x` padding, `*x` fill and
 * bracketed sections (colours, conditions, locales, elapsed markers).
 */
function stripLiterals(fmt: string): string {
  return fmt
    .replace(/"[^"]*"/g, "")
    .replace(/\\./g, "")
    .replace(/[_*]./g, "")
    .replace(/\[[^\]]*\]/g, "");
}

/**
 * Check if a custom format code is a date/time format.
 *
 * Heuristic: after stripping literals the code must contain a date or time
 * token (y, m, d, h, s or an AM/PM marker) and must not be made of numeric
 * placeholders only. Elapsed-time codes such as `[h]:mm:ss` count as times.
 */
export function isDateFormat(fmt: string): boolean {
  if (isGeneral(fmt)) {
    return false;
  }
  const elapsed = /\[[hms]+\]/i.test(fmt.replace(/"[^"]*"/g, ""));
  const cleaned = stripLiterals(fmt);
  if (/^[#0?.,E%$\s()\-+/@;]*$/i.test(cleaned)) {
    return elapsed;
  }
  return elapsed || /[ymdhs]/i.test(cleaned) || /AM\/PM|A\/P/i.test(cleaned);
}

/**
 * Category for a cell format: custom codes win over the built-in table since
 * a workbook may redefine a built-in id.
 */
export function classifyNumberFormat(
  numFmtId: number | undefined,
  customFormats: ReadonlyMap<number, string>
): NumberFormatCategory {
  if (numFmtId === undefined) {
    return "Other";
  }
  const custom = customFormats.get(numFmtId);
  if (custom !== undefined) {
    return isDateFormat(custom) ? "Date" : "Other";
  }
  return isBuiltinDateFormat(numFmtId) ? "Date" : "Other";
}
