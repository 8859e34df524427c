import { describe, it, expect } from "vitest";
import {
  classifyNumberFormat,
  isBuiltinDateFormat,
  isDateFormat
} from "../../../utils/cell-format.js";

describe("cell-format", () => {
  describe("isDateFormat", () => {
    it("should detect common date formats", () => {
      expect(isDateFormat("yyyy-mm-dd")).toBe(true);
      expect(isDateFormat("dd/mm/yyyy")).toBe(true);
      expect(isDateFormat("mmm d, yyyy")).toBe(true);
      expect(isDateFormat("d-mmm-yy")).toBe(true);
    });

    it("should detect time formats", () => {
      expect(isDateFormat("hh:mm:ss")).toBe(true);
      expect(isDateFormat("h:mm AM/PM")).toBe(true);
      expect(isDateFormat("[h]:mm:ss")).toBe(true);
      expect(isDateFormat("[mm]:ss")).toBe(true);
    });

    it("should ignore colour and locale sections", () => {
      expect(isDateFormat("[$-409]mmmm d, yyyy")).toBe(true);
      expect(isDateFormat("[Red]0.00")).toBe(false);
    });

    it("should not treat numeric formats as dates", () => {
      expect(isDateFormat("General")).toBe(false);
      expect(isDateFormat("0")).toBe(false);
      expect(isDateFormat("0.00")).toBe(false);
      expect(isDateFormat("#,##0.00")).toBe(false);
      expect(isDateFormat("0%")).toBe(false);
      expect(isDateFormat("0.00E+00")).toBe(false);
      expect(isDateFormat("$#,##0.00_);($#,##0.00)")).toBe(false);
      expect(isDateFormat("@")).toBe(false);
    });

    it("should ignore letters inside quoted literals and escapes", () => {
      expect(isDateFormat('0.00 "days"')).toBe(false);
      expect(isDateFormat("0\\h")).toBe(false);
      expect(isDateFormat('"Year" yyyy')).toBe(true);
    });
  });

  describe("isBuiltinDateFormat", () => {
    it("should follow the built-in date id ranges", () => {
      for (const id of [14, 18, 22, 27, 36, 45, 47, 50, 58, 67, 71, 75, 81]) {
        expect(isBuiltinDateFormat(id)).toBe(true);
      }
      for (const id of [0, 1, 4, 9, 13, 23, 26, 37, 44, 48, 49, 59, 66, 72, 74, 82, 164]) {
        expect(isBuiltinDateFormat(id)).toBe(false);
      }
    });
  });

  describe("classifyNumberFormat", () => {
    const custom = new Map([
      [164, "yyyy-mm-dd hh:mm"],
      [165, "0.000"],
      [14, "0.0"]
    ]);

    it("should classify custom codes", () => {
      expect(classifyNumberFormat(164, custom)).toBe("Date");
      expect(classifyNumberFormat(165, custom)).toBe("Other");
    });

    it("should let a custom code override a built-in id", () => {
      expect(classifyNumberFormat(14, custom)).toBe("Other");
      expect(classifyNumberFormat(14, new Map())).toBe("Date");
    });

    it("should treat a missing format id as Other", () => {
      expect(classifyNumberFormat(undefined, custom)).toBe("Other");
      expect(classifyNumberFormat(0, custom)).toBe("Other");
      expect(classifyNumberFormat(200, custom)).toBe("Other");
    });
  });
});
