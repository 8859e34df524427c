import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { strToU8, zipSync, type Zippable } from "fflate";

const MAIN_NS = "http://schemas.openxmlformats.org/spreadsheetml/2006/main";
const REL_NS = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";
const PKG_REL_NS = "http://schemas.openxmlformats.org/package/2006/relationships";

export const REL_TYPES = {
  officeDocument: `${REL_NS}/officeDocument`,
  worksheet: `${REL_NS}/worksheet`,
  sharedStrings: `${REL_NS}/sharedStrings`,
  styles: `${REL_NS}/styles`
};

export interface TestSheet {
  name: string;
  /** Inner XML of `<sheetData>` */
  rows?: string;
  /** Whole worksheet part, replaces `rows` */
  xml?: string;
  state?: string;
}

export interface TestWorkbook {
  sheets: TestSheet[];
  sharedStrings?: string[];
  /** Inner XML of `<styleSheet>` */
  styles?: string;
  date1904?: boolean;
  /** Entries added or replaced after the defaults are laid out */
  entries?: Record<string, string>;
  /** Entries to leave out of the archive */
  omit?: string[];
  /** 0 stores entries uncompressed */
  level?: 0 | 6 | 9;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function worksheetXml(rows: string): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<worksheet xmlns="${MAIN_NS}" xmlns:r="${REL_NS}"><dimension ref="A1"/><sheetData>${rows}</sheetData></worksheet>`;
}

export function sharedStringsXml(strings: string[]): string {
  const items = strings.map(s => `<si><t xml:space="preserve">${escapeXml(s)}</t></si>`).join("");
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<sst xmlns="${MAIN_NS}" count="${strings.length}" uniqueCount="${strings.length}">${items}</sst>`;
}

export function stylesXml(numFmts: Record<number, string>, cellXfs: Array<number | undefined>): string {
  const fmts = Object.entries(numFmts)
    .map(([id, code]) => `<numFmt numFmtId="${id}" formatCode="${escapeXml(code)}"/>`)
    .join("");
  const xfs = cellXfs
    .map(id => (id === undefined ? "<xf/>" : `<xf numFmtId="${id}" applyNumberFormat="1"/>`))
    .join("");
  return `<numFmts count="${Object.keys(numFmts).length}">${fmts}</numFmts><cellStyleXfs count="1"><xf numFmtId="14"/></cellStyleXfs><cellXfs count="${cellXfs.length}">${xfs}</cellXfs>`;
}

export function workbookEntries(workbook: TestWorkbook): Record<string, string> {
  const { sheets } = workbook;
  const entries: Record<string, string> = {};

  entries["[Content_Types].xml"] = `<?xml version="1.0" encoding="UTF-8"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"><Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/><Default Extension="xml" ContentType="application/xml"/></Types>`;

  entries["_rels/.rels"] = `<?xml version="1.0" encoding="UTF-8"?>
<Relationships xmlns="${PKG_REL_NS}"><Relationship Id="rId1" Type="${REL_TYPES.officeDocument}" Target="xl/workbook.xml"/></Relationships>`;

  const sheetElements = sheets
    .map(
      (sheet, i) =>
        `<sheet name="${escapeXml(sheet.name)}" sheetId="${i + 1}"${sheet.state ? ` state="${sheet.state}"` : ""} r:id="rId${i + 1}"/>`
    )
    .join("");
  const workbookPr = workbook.date1904 ? `<workbookPr date1904="1"/>` : "<workbookPr/>";
  entries["xl/workbook.xml"] = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<workbook xmlns="${MAIN_NS}" xmlns:r="${REL_NS}">${workbookPr}<bookViews><workbookView/></bookViews><sheets>${sheetElements}</sheets></workbook>`;

  const rels = sheets.map(
    (_sheet, i) =>
      `<Relationship Id="rId${i + 1}" Type="${REL_TYPES.worksheet}" Target="worksheets/sheet${i + 1}.xml"/>`
  );
  rels.push(
    `<Relationship Id="rId${sheets.length + 1}" Type="${REL_TYPES.sharedStrings}" Target="sharedStrings.xml"/>`,
    `<Relationship Id="rId${sheets.length + 2}" Type="${REL_TYPES.styles}" Target="styles.xml"/>`
  );
  entries["xl/_rels/workbook.xml.rels"] = `<?xml version="1.0" encoding="UTF-8"?>
<Relationships xmlns="${PKG_REL_NS}">${rels.join("")}</Relationships>`;

  sheets.forEach((sheet, i) => {
    entries[`xl/worksheets/sheet${i + 1}.xml`] = sheet.xml ?? worksheetXml(sheet.rows ?? "");
  });

  entries["xl/sharedStrings.xml"] = sharedStringsXml(workbook.sharedStrings ?? []);
  entries["xl/styles.xml"] = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<styleSheet xmlns="${MAIN_NS}">${workbook.styles ?? stylesXml({}, [0])}</styleSheet>`;

  Object.assign(entries, workbook.entries ?? {});
  for (const name of workbook.omit ?? []) {
    delete entries[name];
  }
  return entries;
}

export function zipEntries(entries: Record<string, string | Uint8Array>, level: 0 | 6 | 9 = 6): Uint8Array {
  const files: Zippable = {};
  for (const [name, content] of Object.entries(entries)) {
    files[name] = typeof content === "string" ? strToU8(content) : content;
  }
  return zipSync(files, { level });
}

export function buildXlsx(workbook: TestWorkbook): Uint8Array {
  return zipEntries(workbookEntries(workbook), workbook.level ?? 6);
}

export interface TempDir {
  path: string;
  file(name: string): string;
  cleanup(): Promise<void>;
}

export async function createTempDir(): Promise<TempDir> {
  const path = await mkdtemp(join(tmpdir(), "xlsx2csv-test-"));
  return {
    path,
    file: name => join(path, name),
    cleanup: () => rm(path, { recursive: true, force: true })
  };
}

export async function writeXlsx(dir: TempDir, name: string, workbook: TestWorkbook): Promise<string> {
  const filePath = dir.file(name);
  await writeFile(filePath, buildXlsx(workbook));
  return filePath;
}

/** Byte source yielding each string as its own chunk */
export async function* chunksOf(...parts: Array<string | Uint8Array>): AsyncGenerator<Uint8Array> {
  const encoder = new TextEncoder();
  for (const part of parts) {
    yield typeof part === "string" ? encoder.encode(part) : part;
  }
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
