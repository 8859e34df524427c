import { BaseXform, getAttribute, parseIntAttribute, type XformNode } from "../base-xform.js";

export interface StylesModel {
  /** Custom number formats declared under `<numFmts>` */
  numFmts: Map<number, string>;
  /** `numFmtId` of each `<cellXfs>` entry, in index order */
  cellXfs: Array<number | undefined>;
}

/**
 * `xl/styles.xml`, reduced to what date detection needs. Fonts, fills,
 * borders and `cellStyleXfs` are skipped.
 */
class StylesXform extends BaseXform<StylesModel> {
  private inNumFmts = false;
  private inCellXfs = false;

  constructor() {
    super({ numFmts: new Map(), cellXfs: [] });
  }

  parseOpen(node: XformNode): void {
    switch (node.name) {
      case "styleSheet":
        this.model = { numFmts: new Map(), cellXfs: [] };
        break;
      case "numFmts":
        this.inNumFmts = true;
        break;
      case "numFmt":
        if (this.inNumFmts) {
          const id = parseIntAttribute(getAttribute(node, "numFmtId"));
          const formatCode = getAttribute(node, "formatCode");
          if (id !== undefined && formatCode !== undefined) {
            this.model.numFmts.set(id, formatCode);
          }
        }
        break;
      case "cellXfs":
        this.inCellXfs = true;
        break;
      case "xf":
        // only direct children of <cellXfs>; <cellStyleXfs> holds xfs too
        if (this.inCellXfs) {
          this.model.cellXfs.push(parseIntAttribute(getAttribute(node, "numFmtId")));
        }
        break;
    }
  }

  parseClose(name: string): boolean {
    switch (name) {
      case "numFmts":
        this.inNumFmts = false;
        return true;
      case "cellXfs":
        this.inCellXfs = false;
        return true;
      case "styleSheet":
        return false;
      default:
        return true;
    }
  }
}

export { StylesXform };
