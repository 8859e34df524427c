import { posix } from "path";
import { ZipArchive } from "../../utils/unzip/zip-archive.js";
import { WorkbookXform, type WorkbookModel } from "../../xlsx/xform/book/workbook-xform.js";
import {
  RelationshipsXform,
  type Relationship
} from "../../xlsx/xform/core/relationships-xform.js";
import { SharedStringTable } from "../../xlsx/shared-string-table.js";
import { StyleTable } from "../../xlsx/style-table.js";
import { WorksheetReader } from "./worksheet-reader.js";
import {
  BadReferenceError,
  MalformedXmlError,
  MissingPartError,
  toConversionError
} from "../../errors.js";
import {
  resolveConverterOptions,
  type ConverterOptions,
  type ResolvedConverterOptions
} from "../../options.js";
import type { WorkbookTables } from "./cell-value-resolver.js";
import type { CsvRecord, SheetDescriptor, SheetReference } from "../../types.js";

const PACKAGE_RELS = "_rels/.rels";
const DEFAULT_WORKBOOK = "xl/workbook.xml";
const DEFAULT_SHARED_STRINGS = "xl/sharedStrings.xml";
const DEFAULT_STYLES = "xl/styles.xml";

// Relationship types are matched on their last segment so that both the
// transitional and the strict namespaces are accepted.
const REL_OFFICE_DOCUMENT = "officeDocument";
const REL_SHARED_STRINGS = "sharedStrings";
const REL_STYLES = "styles";

function relType(rel: Relationship): string {
  return rel.Type.slice(rel.Type.lastIndexOf("/") + 1);
}

/**
 * Archive path of a relationship target. Relative targets resolve against
 * the source part's directory, absolute ones against the archive root.
 */
export function resolveTarget(baseDir: string, target: string): string {
  if (target.startsWith("/")) {
    return posix.normalize(target.slice(1));
  }
  return posix.join(baseDir, target).replace(/^\/+/, "");
}

/** `xl/workbook.xml` → `xl/_rels/workbook.xml.rels` */
export function relsPathFor(partPath: string): string {
  return posix.join(posix.dirname(partPath), "_rels", `${posix.basename(partPath)}.rels`);
}

/**
 * One open workbook: the archive, its sheet list and the tables every sheet
 * export shares. Tables are loaded once at open time and never change.
 */
class WorkbookReader {
  readonly path: string;
  readonly sheets: readonly SheetDescriptor[];
  readonly tables: WorkbookTables;
  readonly options: ResolvedConverterOptions;
  private readonly archive: ZipArchive;

  private constructor(
    path: string,
    archive: ZipArchive,
    sheets: readonly SheetDescriptor[],
    tables: WorkbookTables,
    options: ResolvedConverterOptions
  ) {
    this.path = path;
    this.archive = archive;
    this.sheets = sheets;
    this.tables = tables;
    this.options = options;
  }

  static async open(path: string, options: ConverterOptions = {}): Promise<WorkbookReader> {
    const resolved = resolveConverterOptions(options);
    const logger = resolved.logger;
    const archive = await ZipArchive.open(path);

    try {
      const workbookPath = await locateWorkbook(archive);
      const relsPath = relsPathFor(workbookPath);
      if (!archive.has(relsPath)) {
        throw new MissingPartError("Workbook relationships part not found", {
          archivePath: path,
          entry: relsPath
        });
      }

      const model = await parsePart(archive, workbookPath, new WorkbookXform());
      const rels = await parsePart(archive, relsPath, new RelationshipsXform());
      const baseDir = posix.dirname(workbookPath);
      const sheets = describeSheets(model, rels, baseDir);
      logger.debug(
        { workbook: workbookPath, sheets: sheets.length, date1904: model.date1904 },
        "Parsed workbook metadata"
      );

      const sharedStringsPath = findPart(rels, REL_SHARED_STRINGS, baseDir, DEFAULT_SHARED_STRINGS);
      const sharedStrings = archive.has(sharedStringsPath)
        ? await loadPart(archive, sharedStringsPath, stream => SharedStringTable.fromStream(stream))
        : new SharedStringTable();
      logger.debug({ entry: sharedStringsPath, count: sharedStrings.size }, "Loaded shared strings");

      const stylesPath = findPart(rels, REL_STYLES, baseDir, DEFAULT_STYLES);
      const styles = archive.has(stylesPath)
        ? await loadPart(archive, stylesPath, stream => StyleTable.fromStream(stream))
        : new StyleTable();
      logger.debug({ entry: stylesPath, count: styles.size }, "Loaded cell styles");

      const tables: WorkbookTables = Object.freeze({
        sharedStrings,
        styles,
        date1904: model.date1904
      });
      return new WorkbookReader(path, archive, sheets, tables, resolved);
    } catch (error) {
      await archive.close();
      throw toConversionError(error, { archivePath: path });
    }
  }

  get sheetNames(): string[] {
    return this.sheets.map(sheet => sheet.name);
  }

  /** Sheet by display name or 0-based declaration index */
  findSheet(ref: SheetReference): SheetDescriptor {
    const sheet =
      typeof ref === "number" ? this.sheets[ref] : this.sheets.find(s => s.name === ref);
    if (!sheet) {
      throw new BadReferenceError(`Sheet ${JSON.stringify(ref)} not found`, {
        archivePath: this.path
      });
    }
    return sheet;
  }

  /**
   * Records of one sheet, read lazily from the archive. Throws
   * `MissingPartError` right away when the sheet's part is absent.
   */
  rows(ref: SheetDescriptor | SheetReference): AsyncGenerator<CsvRecord, void, undefined> {
    const sheet = typeof ref === "object" ? ref : this.findSheet(ref);
    const context = { archivePath: this.path, sheet: sheet.name, entry: sheet.path };
    let entry: AsyncIterable<Uint8Array>;
    try {
      entry = this.archive.entry(sheet.path);
    } catch (error) {
      throw toConversionError(error, context);
    }
    const reader = new WorksheetReader({
      entry,
      tables: this.tables,
      options: this.options,
      context
    });
    return reader.rows();
  }

  async close(): Promise<void> {
    await this.archive.close();
  }
}

async function locateWorkbook(archive: ZipArchive): Promise<string> {
  let workbookPath = DEFAULT_WORKBOOK;
  if (archive.has(PACKAGE_RELS)) {
    const rels = await parsePart(archive, PACKAGE_RELS, new RelationshipsXform());
    const officeDocument = rels.find(rel => relType(rel) === REL_OFFICE_DOCUMENT);
    if (officeDocument) {
      workbookPath = resolveTarget("", officeDocument.Target);
    }
  }
  if (!archive.has(workbookPath)) {
    throw new MissingPartError("Workbook part not found", {
      archivePath: archive.path,
      entry: workbookPath
    });
  }
  return workbookPath;
}

function describeSheets(
  model: WorkbookModel,
  rels: Relationship[],
  baseDir: string
): SheetDescriptor[] {
  const targets = new Map(rels.map(rel => [rel.Id, rel.Target]));
  return model.sheets.map((sheet, index) => {
    const target = targets.get(sheet.rId);
    if (target === undefined) {
      throw new MalformedXmlError(`Relationship ${sheet.rId} not found`, {
        sheet: sheet.name
      });
    }
    const descriptor: SheetDescriptor = {
      name: sheet.name,
      index,
      relId: sheet.rId,
      path: resolveTarget(baseDir, target),
      ...(sheet.sheetId !== undefined ? { sheetId: sheet.sheetId } : {}),
      ...(sheet.state !== undefined ? { state: sheet.state } : {})
    };
    return Object.freeze(descriptor);
  });
}

function findPart(rels: Relationship[], type: string, baseDir: string, fallback: string): string {
  const rel = rels.find(r => relType(r) === type);
  return rel ? resolveTarget(baseDir, rel.Target) : fallback;
}

async function parsePart<TModel>(
  archive: ZipArchive,
  entry: string,
  xform: { parseStream(stream: AsyncIterable<Uint8Array>): Promise<TModel> }
): Promise<TModel> {
  return loadPart(archive, entry, stream => xform.parseStream(stream));
}

async function loadPart<T>(
  archive: ZipArchive,
  entry: string,
  load: (stream: AsyncIterable<Uint8Array>) => Promise<T>
): Promise<T> {
  try {
    return await load(archive.entry(entry));
  } catch (error) {
    throw toConversionError(error, { archivePath: archive.path, entry });
  }
}

export { WorkbookReader };
