import { localName, parseSax } from "../../utils/parse-sax.js";
import { colCache, MAX_COLUMN, MAX_ROW } from "../../utils/col-cache.js";
import {
  ConversionError,
  MalformedXmlError,
  isConversionError,
  type ErrorContext
} from "../../errors.js";
import { resolveCellValue, type WorkbookTables } from "./cell-value-resolver.js";
import { CellType, type CellRecord, type CsvRecord, type DateMode } from "../../types.js";

export interface WorksheetReaderOptions {
  /** Worksheet XML bytes */
  entry: AsyncIterable<Uint8Array | string>;
  tables: WorkbookTables;
  options: {
    dates: DateMode;
    fillRowGaps: boolean;
  };
  /** Location attached to every error raised while reading */
  context?: ErrorContext;
}

type ReaderState = "Idle" | "InRow" | "InCell" | "InValue" | "Done";

const CELL_TYPES: ReadonlyMap<string, CellType> = new Map([
  ["s", CellType.SharedString],
  ["inlineStr", CellType.InlineString],
  ["b", CellType.Boolean],
  ["str", CellType.FormulaString],
  ["e", CellType.Error],
  ["d", CellType.IsoDate],
  ["n", CellType.Number]
]);

interface PendingCell {
  col: number;
  type: CellType;
  style?: number;
  address: string;
  hasValue: boolean;
  text: string[];
}

/**
 * Streams one worksheet as CSV records, one per `<row>`.
 *
 * Only `<sheetData>` is interpreted. A row is held until its closing tag and
 * flattened from column 0 to the highest column seen, so records have the
 * width of their own row.
 */
class WorksheetReader {
  private readonly entry: AsyncIterable<Uint8Array | string>;
  private readonly tables: WorkbookTables;
  private readonly dates: DateMode;
  private readonly fillRowGaps: boolean;
  private readonly context: ErrorContext;
  private started = false;

  // row state
  private state: ReaderState = "Idle";
  private inSheetData = false;
  private rowNumber = 0;
  private cells = new Map<number, string>();
  private maxCol = -1;
  private prevCol = -1;

  // cell state
  private cell: PendingCell | undefined;
  private inInlineString = false;
  private phoneticDepth = 0;

  constructor({ entry, tables, options, context = {} }: WorksheetReaderOptions) {
    this.entry = entry;
    this.tables = tables;
    this.dates = options.dates;
    this.fillRowGaps = options.fillRowGaps;
    this.context = context;
  }

  /** Lazy record sequence. Can only be iterated once. */
  rows(): AsyncGenerator<CsvRecord, void, undefined> {
    if (this.started) {
      throw new Error("WorksheetReader.rows() can only be called once");
    }
    this.started = true;
    return this.parse();
  }

  private async *parse(): AsyncGenerator<CsvRecord, void, undefined> {
    try {
      for await (const events of parseSax(this.entry)) {
        if (this.state === "Done") {
          continue;
        }
        for (const { eventType, value } of events) {
          switch (eventType) {
            case "opentag":
              yield* this.onOpen(localName(value.name), value.attributes);
              break;
            case "text":
              if (this.state === "InValue" && this.cell) {
                this.cell.text.push(value);
              }
              break;
            case "closetag": {
              const record = this.onClose(localName(value.name));
              if (record) {
                yield record;
              }
              break;
            }
          }
        }
      }
      this.state = "Done";
    } catch (error) {
      throw this.wrapError(error);
    }
  }

  private *onOpen(name: string, attributes: Record<string, string>): Generator<CsvRecord> {
    if (!this.inSheetData) {
      if (name === "sheetData" && this.state === "Idle") {
        this.inSheetData = true;
      }
      return;
    }

    switch (this.state) {
      case "Idle":
        if (name === "row") {
          yield* this.startRow(attributes.r);
        }
        break;
      case "InRow":
        if (name === "c") {
          this.startCell(attributes);
        }
        break;
      case "InCell":
        if (!this.cell) {
          break;
        }
        switch (name) {
          case "v":
            this.cell.hasValue = true;
            this.state = "InValue";
            break;
          case "is":
            this.cell.hasValue = true;
            this.inInlineString = true;
            break;
          case "rPh":
            if (this.inInlineString) {
              this.phoneticDepth++;
            }
            break;
          case "t":
            if (this.inInlineString && this.phoneticDepth === 0) {
              this.state = "InValue";
            }
            break;
        }
        break;
    }
  }

  private onClose(name: string): CsvRecord | undefined {
    if (!this.inSheetData) {
      return undefined;
    }

    switch (name) {
      case "sheetData":
        this.inSheetData = false;
        this.state = "Done";
        return undefined;
      case "v":
      case "t":
        if (this.state === "InValue") {
          this.state = "InCell";
        }
        return undefined;
      case "rPh":
        if (this.phoneticDepth > 0) {
          this.phoneticDepth--;
        }
        return undefined;
      case "is":
        this.inInlineString = false;
        return undefined;
      case "c":
        if (this.state === "InCell") {
          this.endCell();
        }
        return undefined;
      case "row":
        if (this.state === "InRow") {
          return this.endRow();
        }
        return undefined;
      default:
        return undefined;
    }
  }

  private *startRow(r: string | undefined): Generator<CsvRecord> {
    let rowNumber = this.rowNumber + 1;
    if (r !== undefined) {
      if (!/^\s*\d+\s*$/.test(r)) {
        throw new MalformedXmlError(`Invalid row number ${JSON.stringify(r)}`);
      }
      rowNumber = parseInt(r, 10);
    }
    if (rowNumber < 1 || rowNumber > MAX_ROW) {
      throw new MalformedXmlError(`Row number ${rowNumber} is outside 1..${MAX_ROW}`);
    }

    if (this.fillRowGaps) {
      for (let n = this.rowNumber + 1; n < rowNumber; n++) {
        yield [""];
      }
    }

    this.rowNumber = rowNumber;
    this.cells = new Map();
    this.maxCol = -1;
    this.prevCol = -1;
    this.state = "InRow";
  }

  private startCell(attributes: Record<string, string>): void {
    const { r, t, s } = attributes;

    let col: number;
    let address: string;
    if (r === undefined) {
      col = this.prevCol + 1;
      if (col >= MAX_COLUMN) {
        throw new MalformedXmlError("Too many cells in row", { cell: `row ${this.rowNumber}` });
      }
      address = colCache.encodeAddress(this.rowNumber, col + 1);
    } else {
      const decoded = colCache.decodeAddress(r);
      if (!decoded) {
        throw new MalformedXmlError(`Invalid cell coordinate ${JSON.stringify(r)}`, { cell: r });
      }
      col = decoded.col - 1;
      address = r;
    }

    const type = t === undefined ? CellType.Number : CELL_TYPES.get(t);
    if (type === undefined) {
      throw new MalformedXmlError(`Unknown cell type ${JSON.stringify(t)}`, { cell: address });
    }

    let style: number | undefined;
    if (s !== undefined) {
      if (!/^\s*\d+\s*$/.test(s)) {
        throw new MalformedXmlError(`Invalid style index ${JSON.stringify(s)}`, { cell: address });
      }
      style = parseInt(s, 10);
    }

    this.cell = { col, type, address, hasValue: false, text: [] };
    if (style !== undefined) {
      this.cell.style = style;
    }
    this.inInlineString = false;
    this.phoneticDepth = 0;
    this.state = "InCell";
  }

  private endCell(): void {
    const pending = this.cell;
    this.cell = undefined;
    this.state = "InRow";
    if (!pending) {
      return;
    }

    const record: CellRecord = {
      col: pending.col,
      row: this.rowNumber,
      type: pending.hasValue ? pending.type : CellType.Blank,
      raw: pending.text.join(""),
      address: pending.address
    };
    if (pending.style !== undefined) {
      record.style = pending.style;
    }

    this.cells.set(record.col, resolveCellValue(record, this.tables, { dates: this.dates }));
    this.maxCol = Math.max(this.maxCol, record.col);
    this.prevCol = record.col;
  }

  private endRow(): CsvRecord {
    this.state = "Idle";
    if (this.maxCol < 0) {
      return [""];
    }
    const record: CsvRecord = [];
    for (let col = 0; col <= this.maxCol; col++) {
      record.push(this.cells.get(col) ?? "");
    }
    this.cells = new Map();
    return record;
  }

  private wrapError(error: unknown): ConversionError {
    if (isConversionError(error)) {
      return error.withContext(this.context);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new MalformedXmlError(message, this.context, { cause: error });
  }
}

export { WorksheetReader };
