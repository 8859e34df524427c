// Engine API
export {
  listSheets,
  exportSheet,
  exportAll,
  exportWorkbookSheet,
  openWorkbook
} from "./converter.js";
export type { ExportResult, ExportAllReport, SheetExportReport } from "./converter.js";

export { WorkbookReader } from "./stream/xlsx/workbook-reader.js";
export { WorksheetReader } from "./stream/xlsx/worksheet-reader.js";
export type { WorksheetReaderOptions } from "./stream/xlsx/worksheet-reader.js";
export { resolveCellValue } from "./stream/xlsx/cell-value-resolver.js";
export type { WorkbookTables, ResolveOptions } from "./stream/xlsx/cell-value-resolver.js";
export { SharedStringTable } from "./xlsx/shared-string-table.js";
export { StyleTable } from "./xlsx/style-table.js";
export { ZipArchive } from "./utils/unzip/zip-archive.js";

export { formatCsvRecord, writeCsvFile } from "./csv/csv.js";

// Options, errors, logging
export * from "./options.js";
export * from "./errors.js";
export { createLogger } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";

// Export all type definitions
export * from "./types.js";

export {
  decodeCol,
  encodeCol,
  decodeCell,
  encodeCell,
  sheetFileName,
  sheetFileNames
} from "./utils/sheet-utils.js";
export { excelToDate, excelToIsoString } from "./utils/utils.js";
export { isDateFormat, classifyNumberFormat } from "./utils/cell-format.js";
