import { BadReferenceError } from "../errors.js";
import { SharedStringsXform } from "./xform/strings/shared-strings-xform.js";

/** Workbook-wide string pool, 0-indexed and read-only once built */
export class SharedStringTable {
  private readonly strings: readonly string[];

  constructor(strings: readonly string[] = []) {
    this.strings = Object.freeze([...strings]);
  }

  static async fromStream(stream: AsyncIterable<Uint8Array | string>): Promise<SharedStringTable> {
    const xform = new SharedStringsXform();
    return new SharedStringTable(await xform.parseStream(stream));
  }

  get size(): number {
    return this.strings.length;
  }

  get(index: number): string {
    const value = this.strings[index];
    if (value === undefined) {
      throw new BadReferenceError(
        `Shared string index out of range (table holds ${this.strings.length})`,
        { index }
      );
    }
    return value;
  }
}
