import { mkdir } from "fs/promises";
import { dirname, join } from "path";
import { WorkbookReader } from "./stream/xlsx/workbook-reader.js";
import { writeCsvFile } from "./csv/csv.js";
import { sheetFileNames } from "./utils/sheet-utils.js";
import { toConversionError, type ConversionError } from "./errors.js";
import type { ConverterOptions } from "./options.js";
import type { SheetDescriptor, SheetReference } from "./types.js";

export interface ExportResult {
  sheet: SheetDescriptor;
  outputPath: string;
  /** Records written, gap rows included */
  records: number;
}

export type SheetExportReport =
  | ({ status: "exported" } & ExportResult)
  | { status: "failed"; sheet: SheetDescriptor; outputPath: string; error: ConversionError };

export interface ExportAllReport {
  workbookPath: string;
  outputDirectory: string;
  sheets: SheetExportReport[];
  /** Number of sheets that failed */
  failed: number;
}

/** Open a workbook session. The caller must `close()` it. */
export function openWorkbook(
  workbookPath: string,
  options: ConverterOptions = {}
): Promise<WorkbookReader> {
  return WorkbookReader.open(workbookPath, options);
}

async function withWorkbook<T>(
  workbookPath: string,
  options: ConverterOptions,
  fn: (workbook: WorkbookReader) => Promise<T>
): Promise<T> {
  const workbook = await openWorkbook(workbookPath, options);
  try {
    return await fn(workbook);
  } finally {
    await workbook.close();
  }
}

/** Sheet display names in declaration order */
export function listSheets(workbookPath: string, options: ConverterOptions = {}): Promise<string[]> {
  return withWorkbook(workbookPath, options, async workbook => workbook.sheetNames);
}

/**
 * Export one sheet of an open workbook. Nothing is written when the sheet's
 * part is missing.
 */
export async function exportWorkbookSheet(
  workbook: WorkbookReader,
  sheet: SheetDescriptor,
  outputPath: string
): Promise<ExportResult> {
  const { logger, delimiter } = workbook.options;
  const rows = workbook.rows(sheet);
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    const records = await writeCsvFile(rows, outputPath, delimiter);
    logger.info({ sheet: sheet.name, outputPath, records }, "Exported sheet");
    return { sheet, outputPath, records };
  } catch (error) {
    await rows.return();
    throw toConversionError(error, { archivePath: workbook.path, sheet: sheet.name });
  }
}

/**
 * Export a single sheet, addressed by display name or 0-based index, to
 * `outputPath`.
 */
export function exportSheet(
  workbookPath: string,
  sheetRef: SheetReference,
  outputPath: string,
  options: ConverterOptions = {}
): Promise<ExportResult> {
  return withWorkbook(workbookPath, options, workbook =>
    exportWorkbookSheet(workbook, workbook.findSheet(sheetRef), outputPath)
  );
}

/**
 * Export every sheet, one after another, into `outputDirectory`. A failing
 * sheet is reported and the remaining sheets still run; failures that affect
 * the whole workbook are thrown.
 */
export function exportAll(
  workbookPath: string,
  outputDirectory: string,
  options: ConverterOptions = {}
): Promise<ExportAllReport> {
  return withWorkbook(workbookPath, options, async workbook => {
    const { logger } = workbook.options;
    try {
      await mkdir(outputDirectory, { recursive: true });
    } catch (error) {
      throw toConversionError(error, { archivePath: workbookPath });
    }

    const fileNames = sheetFileNames(workbook.sheetNames);
    const sheets: SheetExportReport[] = [];
    let failed = 0;

    for (const [i, sheet] of workbook.sheets.entries()) {
      const outputPath = join(outputDirectory, fileNames[i]);
      try {
        const result = await exportWorkbookSheet(workbook, sheet, outputPath);
        sheets.push({ status: "exported", ...result });
      } catch (err) {
        const error = toConversionError(err, { archivePath: workbookPath, sheet: sheet.name });
        logger.error({ err: error, sheet: sheet.name }, "Failed to export sheet");
        sheets.push({ status: "failed", sheet, outputPath, error });
        failed++;
      }
    }

    return { workbookPath, outputDirectory, sheets, failed };
  });
}
