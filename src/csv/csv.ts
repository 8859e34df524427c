import { createWriteStream } from "fs";
import { rename, rm } from "fs/promises";
import { basename, dirname, join } from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { toConversionError } from "../errors.js";
import type { CsvRecord, Delimiter } from "../types.js";

const RECORD_SEPARATOR = "\n";

export function formatCsvField(value: string, delimiter: Delimiter): string {
  // Quote if necessary
  const needsQuote =
    value.includes(delimiter) ||
    value.includes('"') ||
    value.includes("\n") ||
    value.includes("\r");

  return needsQuote ? `"${value.replace(/"/g, '""')}"` : value;
}

/** One record as a line, terminator included. `[""]` becomes an empty line. */
export function formatCsvRecord(fields: readonly string[], delimiter: Delimiter): string {
  return fields.map(field => formatCsvField(field, delimiter)).join(delimiter) + RECORD_SEPARATOR;
}

export function tempPathFor(outputPath: string): string {
  return join(dirname(outputPath), `.${basename(outputPath)}.${process.pid}.${Date.now()}.tmp`);
}

/**
 * Write records to `outputPath`. Data goes to a hidden sibling file first
 * and is renamed into place once every record is written; on failure the
 * sibling is removed and `outputPath` is left untouched.
 *
 * @returns the number of records written
 */
export async function writeCsvFile(
  records: AsyncIterable<CsvRecord>,
  outputPath: string,
  delimiter: Delimiter
): Promise<number> {
  const tmpPath = tempPathFor(outputPath);
  let count = 0;

  async function* lines(): AsyncGenerator<string, void, undefined> {
    for await (const record of records) {
      count++;
      yield formatCsvRecord(record, delimiter);
    }
  }

  try {
    await pipeline(Readable.from(lines()), createWriteStream(tmpPath, { encoding: "utf8" }));
    await rename(tmpPath, outputPath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw toConversionError(error);
  }
  return count;
}
