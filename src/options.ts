import { InvalidOptionError } from "./errors.js";
import { silentLogger, type Logger } from "./utils/logger.js";
import type { DateMode, Delimiter } from "./types.js";

export interface ConverterOptions {
  /** Field separator for CSV output (default: ",") */
  delimiter?: Delimiter;
  /** How numeric cells are turned into timestamps (default: "auto") */
  dates?: DateMode;
  /** Emit an empty record for every row number missing from the sheet (default: true) */
  fillRowGaps?: boolean;
  logger?: Logger;
}

export type ResolvedConverterOptions = Required<ConverterOptions>;

// Accepted values, used for validation and by the CLI help text
const ConverterOptionValues = {
  delimiter: [",", ";"],
  dates: ["auto", "style", "none"]
} as const;

export function parseDelimiter(value: string): Delimiter {
  const match = ConverterOptionValues.delimiter.find(d => d === value);
  if (match === undefined) {
    throw new InvalidOptionError(
      `Unsupported delimiter ${JSON.stringify(value)}: expected one of ${ConverterOptionValues.delimiter.map(d => `"${d}"`).join(", ")}`
    );
  }
  return match;
}

export function parseDateMode(value: string): DateMode {
  const match = ConverterOptionValues.dates.find(d => d === value);
  if (match === undefined) {
    throw new InvalidOptionError(
      `Unsupported date mode ${JSON.stringify(value)}: expected one of ${ConverterOptionValues.dates.join(", ")}`
    );
  }
  return match;
}

export function resolveConverterOptions(options: ConverterOptions = {}): ResolvedConverterOptions {
  const resolved: ResolvedConverterOptions = {
    delimiter: ",",
    dates: "auto",
    fillRowGaps: true,
    logger: silentLogger,
    ...stripUndefined(options)
  };

  // Options may arrive from untyped callers; re-check the enumerations.
  parseDelimiter(resolved.delimiter);
  parseDateMode(resolved.dates);
  return resolved;
}

function stripUndefined(options: ConverterOptions): ConverterOptions {
  const result: ConverterOptions = {};
  if (options.delimiter !== undefined) {
    result.delimiter = options.delimiter;
  }
  if (options.dates !== undefined) {
    result.dates = options.dates;
  }
  if (options.fillRowGaps !== undefined) {
    result.fillRowGaps = options.fillRowGaps;
  }
  if (options.logger !== undefined) {
    result.logger = options.logger;
  }
  return result;
}

export { ConverterOptionValues };
