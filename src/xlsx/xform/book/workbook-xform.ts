import { BaseXform, getAttribute, parseIntAttribute, type XformNode } from "../base-xform.js";
import { localName } from "../../../utils/parse-sax.js";
import { MalformedXmlError } from "../../../errors.js";
import type { SheetState } from "../../../types.js";

export interface WorkbookSheetModel {
  name: string;
  /** Relationship id (`r:id`) */
  rId: string;
  sheetId?: number;
  state?: SheetState;
}

export interface WorkbookModel {
  sheets: WorkbookSheetModel[];
  date1904: boolean;
}

function parseSheetState(value: string | undefined): SheetState | undefined {
  switch (value) {
    case "visible":
    case "hidden":
    case "veryHidden":
      return value;
    default:
      return undefined;
  }
}

// r:id, whatever the relationships namespace is bound to
function relationshipId(node: XformNode): string | undefined {
  for (const [key, value] of Object.entries(node.attributes)) {
    if (key !== localName(key) && localName(key) === "id") {
      return value;
    }
  }
  return undefined;
}

/**
 * `xl/workbook.xml`: the sheet list in declaration order and the date system.
 * Defined names, views and calculation properties are skipped.
 */
class WorkbookXform extends BaseXform<WorkbookModel> {
  private inSheets = false;

  constructor() {
    super({ sheets: [], date1904: false });
  }

  parseOpen(node: XformNode): void {
    switch (node.name) {
      case "workbook":
        this.model = { sheets: [], date1904: false };
        break;
      case "workbookPr": {
        const date1904 = getAttribute(node, "date1904");
        this.model.date1904 = date1904 === "1" || date1904 === "true";
        break;
      }
      case "sheets":
        this.inSheets = true;
        break;
      case "sheet":
        if (this.inSheets) {
          this.model.sheets.push(this.parseSheet(node));
        }
        break;
    }
  }

  parseClose(name: string): boolean {
    switch (name) {
      case "sheets":
        this.inSheets = false;
        return true;
      case "workbook":
        return false;
      default:
        return true;
    }
  }

  private parseSheet(node: XformNode): WorkbookSheetModel {
    const name = getAttribute(node, "name");
    const rId = relationshipId(node);
    if (name === undefined || rId === undefined) {
      throw new MalformedXmlError(
        `<sheet> #${this.model.sheets.length + 1} lacks a ${name === undefined ? "name" : "relationship id"}`
      );
    }
    const sheet: WorkbookSheetModel = { name, rId };
    const sheetId = parseIntAttribute(getAttribute(node, "sheetId"));
    if (sheetId !== undefined) {
      sheet.sheetId = sheetId;
    }
    const state = parseSheetState(getAttribute(node, "state"));
    if (state !== undefined) {
      sheet.state = state;
    }
    return sheet;
  }
}

export { WorkbookXform };
