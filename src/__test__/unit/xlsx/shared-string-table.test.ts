import { describe, it, expect } from "vitest";
import { SharedStringTable } from "../../../xlsx/shared-string-table.js";
import { BadReferenceError } from "../../../errors.js";
import { chunksOf, sharedStringsXml } from "../../utils/xlsx-builder.js";

describe("SharedStringTable", () => {
  it("should look strings up by index", async () => {
    const table = await SharedStringTable.fromStream(chunksOf(sharedStringsXml(["a", "b", "c"])));
    expect(table.size).toBe(3);
    expect(table.get(0)).toBe("a");
    expect(table.get(2)).toBe("c");
  });

  it("should throw BadReferenceError for out-of-range indices", () => {
    const table = new SharedStringTable(["only"]);
    expect(() => table.get(1)).toThrow(BadReferenceError);
    expect(() => table.get(-1)).toThrow(BadReferenceError);
    try {
      table.get(7);
    } catch (error) {
      expect(error).toMatchObject({ code: "REFERENCE_ERROR", context: { index: 7 } });
    }
  });

  it("should be empty by default", () => {
    expect(new SharedStringTable().size).toBe(0);
  });
});
