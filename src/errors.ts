/**
 * Error taxonomy for the conversion engine.
 *
 * Every failure surfaced by the library is a {@link ConversionError}; the
 * `code` tells callers which kind it is without `instanceof` chains, and
 * `context` carries whatever location data was known at the throw site.
 */

export type ConversionErrorCode =
  | "IO_ERROR"
  | "NOT_AN_ARCHIVE"
  | "MALFORMED_XML"
  | "MISSING_REQUIRED_PART"
  | "REFERENCE_ERROR"
  | "INVALID_OPTION";

export interface ErrorContext {
  /** Workbook file on disk */
  archivePath?: string;
  /** Entry inside the archive, e.g. `xl/worksheets/sheet1.xml` */
  entry?: string;
  /** Sheet display name */
  sheet?: string;
  /** Cell coordinate as written in the file */
  cell?: string;
  /** Offending table index (shared string or style) */
  index?: number;
}

function describeContext(context: ErrorContext): string {
  const parts: string[] = [];
  if (context.archivePath !== undefined) {
    parts.push(`archive=${context.archivePath}`);
  }
  if (context.sheet !== undefined) {
    parts.push(`sheet=${JSON.stringify(context.sheet)}`);
  }
  if (context.entry !== undefined) {
    parts.push(`entry=${context.entry}`);
  }
  if (context.cell !== undefined) {
    parts.push(`cell=${context.cell}`);
  }
  if (context.index !== undefined) {
    parts.push(`index=${context.index}`);
  }
  return parts.length ? ` (${parts.join(", ")})` : "";
}

export class ConversionError extends Error {
  readonly code: ConversionErrorCode;
  readonly context: ErrorContext;
  /** Message without the appended context, used when re-wrapping */
  readonly detail: string;

  constructor(
    code: ConversionErrorCode,
    detail: string,
    context: ErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(detail + describeContext(context), options);
    this.name = "ConversionError";
    this.code = code;
    this.detail = detail;
    this.context = context;
  }

  /**
   * Copy of this error with extra context merged in. Context already present
   * wins, so the innermost throw site keeps its location.
   */
  withContext(extra: ErrorContext): ConversionError {
    return this.rebuild({ ...extra, ...this.context });
  }

  protected rebuild(context: ErrorContext): ConversionError {
    return new ConversionError(this.code, this.detail, context, { cause: this.cause });
  }
}

export class IoError extends ConversionError {
  constructor(
    detail: string,
    context: ErrorContext = {},
    options?: { cause?: unknown },
    code: ConversionErrorCode = "IO_ERROR"
  ) {
    super(code, detail, context, options);
    this.name = "IoError";
  }

  protected rebuild(context: ErrorContext): ConversionError {
    return new IoError(this.detail, context, { cause: this.cause }, this.code);
  }
}

export class NotAnArchiveError extends IoError {
  constructor(detail: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(detail, context, options, "NOT_AN_ARCHIVE");
    this.name = "NotAnArchiveError";
  }

  protected rebuild(context: ErrorContext): ConversionError {
    return new NotAnArchiveError(this.detail, context, { cause: this.cause });
  }
}

export class MalformedXmlError extends ConversionError {
  constructor(detail: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super("MALFORMED_XML", detail, context, options);
    this.name = "MalformedXmlError";
  }

  protected rebuild(context: ErrorContext): ConversionError {
    return new MalformedXmlError(this.detail, context, { cause: this.cause });
  }
}

export class MissingPartError extends ConversionError {
  constructor(detail: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super("MISSING_REQUIRED_PART", detail, context, options);
    this.name = "MissingPartError";
  }

  protected rebuild(context: ErrorContext): ConversionError {
    return new MissingPartError(this.detail, context, { cause: this.cause });
  }
}

/** Shared-string index out of bounds, or a sheet that is not in the workbook */
export class BadReferenceError extends ConversionError {
  constructor(detail: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super("REFERENCE_ERROR", detail, context, options);
    this.name = "BadReferenceError";
  }

  protected rebuild(context: ErrorContext): ConversionError {
    return new BadReferenceError(this.detail, context, { cause: this.cause });
  }
}

export class InvalidOptionError extends ConversionError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super("INVALID_OPTION", detail, {}, options);
    this.name = "InvalidOptionError";
  }

  protected rebuild(): ConversionError {
    return this;
  }
}

export function isConversionError(value: unknown): value is ConversionError {
  return value instanceof ConversionError;
}

/**
 * Normalise anything thrown while touching the file system into an IoError.
 * Conversion errors pass through with the extra context attached.
 */
export function toConversionError(error: unknown, context: ErrorContext = {}): ConversionError {
  if (error instanceof ConversionError) {
    return error.withContext(context);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new IoError(message, context, { cause: error });
}
