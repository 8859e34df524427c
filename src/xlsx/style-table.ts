import { classifyNumberFormat } from "../utils/cell-format.js";
import { StylesXform, type StylesModel } from "./xform/style/styles-xform.js";
import type { NumberFormatCategory } from "../types.js";

/** Cell style index (`s` attribute) to number format category */
export class StyleTable {
  private readonly categories: readonly NumberFormatCategory[];

  constructor(categories: readonly NumberFormatCategory[] = []) {
    this.categories = Object.freeze([...categories]);
  }

  static fromModel(model: StylesModel): StyleTable {
    return new StyleTable(model.cellXfs.map(id => classifyNumberFormat(id, model.numFmts)));
  }

  static async fromStream(stream: AsyncIterable<Uint8Array | string>): Promise<StyleTable> {
    const xform = new StylesXform();
    return StyleTable.fromModel(await xform.parseStream(stream));
  }

  get size(): number {
    return this.categories.length;
  }

  /** `undefined` when the index is outside the table */
  category(index: number): NumberFormatCategory | undefined {
    return this.categories[index];
  }
}
