import { join } from "path";
import { Command, CommanderError } from "@commander-js/extra-typings";
import { exportAll, exportWorkbookSheet, listSheets, openWorkbook } from "./converter.js";
import { InvalidOptionError } from "./errors.js";
import { parseDateMode, parseDelimiter, ConverterOptionValues } from "./options.js";
import { createLogger, isLogLevel, LOG_LEVELS, type Logger, type LogLevel } from "./utils/logger.js";
import { sheetFileName } from "./utils/sheet-utils.js";

export const LOG_LEVEL_ENV = "XLSX2CSV_LOG_LEVEL";

export interface CliOutput {
  write(chunk: string): void;
}

export interface CliIo {
  stdout: CliOutput;
  stderr: CliOutput;
  env: Record<string, string | undefined>;
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidOptionError(
      `Unsupported log level ${JSON.stringify(value)}: expected one of ${LOG_LEVELS.join(", ")}`
    );
  }
  return value;
}

function buildProgram(io: CliIo, setExitCode: (code: number) => void): Command {
  const defaultLogLevel = io.env[LOG_LEVEL_ENV] ?? "info";
  const makeLogger = (level: string): Logger => createLogger(parseLogLevel(level), io.stderr);

  const program = new Command()
    .name("xlsx2csv")
    .description("Stream the worksheets of an .xlsx workbook into CSV files")
    .exitOverride()
    .configureOutput({
      writeOut: str => io.stdout.write(str),
      writeErr: str => io.stderr.write(str)
    });

  program
    .command("list")
    .description("Print the sheet names of a workbook, one per line")
    .argument("<workbook>", "path to the .xlsx file")
    .option("--log-level <level>", `log level (${LOG_LEVELS.join(", ")})`, defaultLogLevel)
    .action(async (workbook, options) => {
      const logger = makeLogger(options.logLevel);
      for (const name of await listSheets(workbook, { logger })) {
        io.stdout.write(`${name}\n`);
      }
    });

  program
    .command("export")
    .description("Write one sheet, or every sheet, as CSV")
    .argument("<workbook>", "path to the .xlsx file")
    .option("-o, --out-dir <dir>", "directory for the CSV files", ".")
    .option("-s, --sheet <name>", "export only this sheet")
    .option(
      "-d, --delimiter <char>",
      `field delimiter (${ConverterOptionValues.delimiter.join(" or ")})`,
      ","
    )
    .option("--dates <mode>", `date conversion (${ConverterOptionValues.dates.join(", ")})`, "auto")
    .option("--no-fill-row-gaps", "do not emit empty records for missing rows")
    .option("--log-level <level>", `log level (${LOG_LEVELS.join(", ")})`, defaultLogLevel)
    .action(async (workbook, options) => {
      const converterOptions = {
        delimiter: parseDelimiter(options.delimiter),
        dates: parseDateMode(options.dates),
        fillRowGaps: options.fillRowGaps,
        logger: makeLogger(options.logLevel)
      };

      if (options.sheet !== undefined) {
        const session = await openWorkbook(workbook, converterOptions);
        try {
          const sheet = session.findSheet(options.sheet);
          const result = await exportWorkbookSheet(
            session,
            sheet,
            join(options.outDir, sheetFileName(sheet.name))
          );
          io.stdout.write(`${result.outputPath}\n`);
        } finally {
          await session.close();
        }
        return;
      }

      const report = await exportAll(workbook, options.outDir, converterOptions);
      for (const entry of report.sheets) {
        if (entry.status === "exported") {
          io.stdout.write(`${entry.outputPath}\n`);
        } else {
          io.stderr.write(`error: sheet ${JSON.stringify(entry.sheet.name)}: ${entry.error.message}\n`);
        }
      }
      if (report.failed > 0) {
        setExitCode(1);
      }
    });

  return program;
}

/**
 * Run the command line against `argv` (as in `process.argv`) and resolve
 * with the exit code.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(io, code => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and usage errors; commander has already printed the message
      return error.exitCode;
    }
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`error: ${message}\n`);
    return 1;
  }
  return exitCode;
}
