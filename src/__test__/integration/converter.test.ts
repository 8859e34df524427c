import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { readFile, readdir } from "fs/promises";
import { Writable } from "stream";
import { exportAll, exportSheet, listSheets, openWorkbook } from "../../converter.js";
import { createLogger } from "../../utils/logger.js";
import { createTempDir, stylesXml, writeXlsx, type TempDir, type TestWorkbook } from "../utils/xlsx-builder.js";

const SALES: TestWorkbook = {
  sheets: [
    {
      name: "Sheet 1",
      rows:
        `<row r="1"><c r="A1" t="s"><v>0</v></c><c r="B1" t="s"><v>1</v></c><c r="C1" t="s"><v>2</v></c></row>` +
        `<row r="2"><c r="A2" t="s"><v>3</v></c><c r="B2" s="1"><v>44927</v></c><c r="C2"><v>19.5</v></c></row>` +
        `<row r="3"><c r="A3" t="inlineStr"><is><t>Bolt; M6, steel</t></is></c><c r="B3" s="1"><v>44927.5</v></c><c r="C3"><v>0.25</v></c></row>`
    },
    {
      name: "Q3!Totals",
      rows: `<row r="1"><c r="B1" t="b"><v>1</v></c><c r="D1" t="b"><v>0</v></c></row><row r="2"/>`
    },
    {
      name: "Financial Sheet & Stuff (Top Secret)",
      rows: `<row r="1"><c r="A1" t="e"><v>#N/A</v></c></row>`
    }
  ],
  sharedStrings: ["item", "date", "price", 'Widget "XL"'],
  styles: stylesXml({}, [0, 14])
};

describe("converter", () => {
  let dir: TempDir;
  let workbookPath: string;

  beforeEach(async () => {
    dir = await createTempDir();
    workbookPath = await writeXlsx(dir, "sales.xlsx", SALES);
  });

  afterEach(async () => {
    await dir.cleanup();
  });

  describe("listSheets", () => {
    it("should list every sheet in declaration order, every time", async () => {
      const expected = ["Sheet 1", "Q3!Totals", "Financial Sheet & Stuff (Top Secret)"];
      expect(await listSheets(workbookPath)).toEqual(expected);
      expect(await listSheets(workbookPath)).toEqual(expected);
    });

    it("should fail with an IO error on a missing file", async () => {
      await expect(listSheets(dir.file("nothing-here.xlsx"))).rejects.toMatchObject({
        code: "IO_ERROR"
      });
    });
  });

  describe("exportSheet", () => {
    it("should export a sheet by name", async () => {
      const output = dir.file("out/sheet_1.csv");
      const result = await exportSheet(workbookPath, "Sheet 1", output);
      expect(result.records).toBe(3);
      expect(result.sheet.name).toBe("Sheet 1");
      expect(result.outputPath).toBe(output);
      expect(await readFile(output, "utf8")).toBe(
        "item,date,price\n" +
          'Widget "XL",2023-01-01T00:00:00.000Z,19.5\n' +
          '"Bolt; M6, steel",2023-01-01T12:00:00.000Z,0.25\n'
      );
    });

    it("should export a sheet by index and keep sparse rows", async () => {
      const output = dir.file("totals.csv");
      await exportSheet(workbookPath, 1, output);
      expect(await readFile(output, "utf8")).toBe(",TRUE,,FALSE\n\n");
    });

    it("should differ only in separator and quoting between delimiters", async () => {
      const commaPath = dir.file("comma.csv");
      const semicolonPath = dir.file("semicolon.csv");
      await exportSheet(workbookPath, "Sheet 1", commaPath, { delimiter: "," });
      await exportSheet(workbookPath, "Sheet 1", semicolonPath, { delimiter: ";" });

      const comma = (await readFile(commaPath, "utf8")).split("\n");
      const semicolon = (await readFile(semicolonPath, "utf8")).split("\n");
      expect(semicolon.length).toBe(comma.length);
      expect(semicolon[0]).toBe("item;date;price");
      expect(semicolon[1]).toBe('"Widget ""XL""";2023-01-01T00:00:00.000Z;19.5');
      expect(comma[1]).toBe('"Widget ""XL""",2023-01-01T00:00:00.000Z,19.5');
      expect(semicolon[2]).toBe('"Bolt; M6, steel";2023-01-01T12:00:00.000Z;0.25');
    });

    it("should honour the date mode", async () => {
      const output = dir.file("raw-dates.csv");
      await exportSheet(workbookPath, "Sheet 1", output, { dates: "none" });
      expect((await readFile(output, "utf8")).split("\n")[1]).toBe('"Widget ""XL""",44927,19.5');
    });

    it("should fail with a reference error and create nothing for an unknown sheet", async () => {
      const output = dir.file("missing.csv");
      await expect(exportSheet(workbookPath, "No Such Sheet", output)).rejects.toMatchObject({
        code: "REFERENCE_ERROR"
      });
      expect(await readdir(dir.path)).toEqual(["sales.xlsx"]);
    });

    it("should leave no output when the sheet fails halfway", async () => {
      const broken = await writeXlsx(dir, "broken.xlsx", {
        sheets: [
          {
            name: "Broken",
            rows: `<row r="1"><c r="A1"><v>1</v></c></row><row r="2"><c r="A2" t="s"><v>42</v></c></row>`
          }
        ]
      });
      const output = dir.file("broken.csv");
      await expect(exportSheet(broken, "Broken", output)).rejects.toMatchObject({
        code: "REFERENCE_ERROR",
        context: { archivePath: broken, sheet: "Broken", cell: "A2", index: 42 }
      });
      expect((await readdir(dir.path)).sort()).toEqual(["broken.xlsx", "sales.xlsx"]);
    });

    it("should report a missing worksheet part", async () => {
      const partial = await writeXlsx(dir, "partial.xlsx", {
        sheets: [{ name: "Here" }, { name: "Gone" }],
        omit: ["xl/worksheets/sheet2.xml"]
      });
      await expect(exportSheet(partial, "Gone", dir.file("gone.csv"))).rejects.toMatchObject({
        code: "MISSING_REQUIRED_PART",
        context: { sheet: "Gone" }
      });
    });
  });

  describe("exportAll", () => {
    it("should export every sheet under its derived file name", async () => {
      const outDir = dir.file("csv");
      const report = await exportAll(workbookPath, outDir);

      expect(report.failed).toBe(0);
      expect(report.sheets.map(s => [s.status, s.sheet.name, s.outputPath])).toEqual([
        ["exported", "Sheet 1", `${outDir}/sheet_1.csv`],
        ["exported", "Q3!Totals", `${outDir}/q3_totals.csv`],
        [
          "exported",
          "Financial Sheet & Stuff (Top Secret)",
          `${outDir}/financial_sheet_and_stuff_top_secret.csv`
        ]
      ]);
      expect((await readdir(outDir)).sort()).toEqual([
        "financial_sheet_and_stuff_top_secret.csv",
        "q3_totals.csv",
        "sheet_1.csv"
      ]);
      expect(await readFile(`${outDir}/financial_sheet_and_stuff_top_secret.csv`, "utf8")).toBe(
        "#N/A\n"
      );
    });

    it("should keep going after a sheet fails and report it", async () => {
      const mixed = await writeXlsx(dir, "mixed.xlsx", {
        sheets: [
          { name: "Good", rows: `<row r="1"><c r="A1"><v>1</v></c></row>` },
          { name: "Bad", rows: `<row r="1"><c r="A1" t="b"><v>maybe</v></c></row>` },
          { name: "Also Good", rows: `<row r="1"><c r="A1"><v>3</v></c></row>` }
        ]
      });
      const outDir = dir.file("mixed");
      const lines: string[] = [];
      const logger = createLogger(
        "info",
        new Writable({
          write(chunk, _encoding, callback) {
            lines.push(String(chunk));
            callback();
          }
        })
      );

      const report = await exportAll(mixed, outDir, { logger });

      expect(report.failed).toBe(1);
      expect(report.sheets.map(s => s.status)).toEqual(["exported", "failed", "exported"]);
      const failed = report.sheets[1];
      expect(failed.status === "failed" && failed.error.code).toBe("MALFORMED_XML");
      expect((await readdir(outDir)).sort()).toEqual(["also_good.csv", "good.csv"]);

      const logged = lines.map(line => JSON.parse(line));
      expect(logged.filter(entry => entry.msg === "Exported sheet").map(entry => entry.sheet)).toEqual([
        "Good",
        "Also Good"
      ]);
      expect(logged.filter(entry => entry.msg === "Failed to export sheet").map(entry => entry.sheet)).toEqual([
        "Bad"
      ]);
    });

    it("should suffix colliding file names", async () => {
      const clash = await writeXlsx(dir, "clash.xlsx", {
        sheets: [{ name: "Data" }, { name: "data" }, { name: "DATA!" }]
      });
      const outDir = dir.file("clash");
      const report = await exportAll(clash, outDir);
      expect(report.sheets.map(s => s.outputPath)).toEqual([
        `${outDir}/data.csv`,
        `${outDir}/data_2.csv`,
        `${outDir}/data_3.csv`
      ]);
    });

    it("should fail the whole run when metadata is broken", async () => {
      const broken = await writeXlsx(dir, "no-rels.xlsx", {
        sheets: [{ name: "S" }],
        omit: ["xl/_rels/workbook.xml.rels"]
      });
      await expect(exportAll(broken, dir.file("never"))).rejects.toMatchObject({
        code: "MISSING_REQUIRED_PART"
      });
      expect((await readdir(dir.path)).sort()).toEqual(["no-rels.xlsx", "sales.xlsx"]);
    });
  });

  describe("openWorkbook", () => {
    it("should let callers pull rows themselves and stop early", async () => {
      const workbook = await openWorkbook(workbookPath);
      try {
        const rows = workbook.rows("Sheet 1");
        const first = await rows.next();
        expect(first.value).toEqual(["item", "date", "price"]);
        await rows.return();
        expect(await rows.next()).toEqual({ done: true, value: undefined });
      } finally {
        await workbook.close();
      }
    });
  });
});
