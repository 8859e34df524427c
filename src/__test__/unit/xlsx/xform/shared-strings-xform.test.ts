import { describe, it, expect } from "vitest";
import { SharedStringsXform } from "../../../../xlsx/xform/strings/shared-strings-xform.js";
import { chunksOf } from "../../../utils/xlsx-builder.js";

const NS = `xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main"`;

describe("SharedStringsXform", () => {
  it("should read plain strings", async () => {
    const xml = `<sst ${NS} count="3"><si><t>alpha</t></si><si><t xml:space="preserve"> spaced </t></si><si><t/></si></sst>`;
    expect(await new SharedStringsXform().parseStream(chunksOf(xml))).toEqual([
      "alpha",
      " spaced ",
      ""
    ]);
  });

  it("should concatenate rich text runs and drop their formatting", async () => {
    const xml = `<sst ${NS}><si>
      <r><rPr><b/><sz val="11"/></rPr><t>Bold</t></r>
      <r><t xml:space="preserve"> and plain</t></r>
    </si></sst>`;
    expect(await new SharedStringsXform().parseStream(chunksOf(xml))).toEqual(["Bold and plain"]);
  });

  it("should skip phonetic runs", async () => {
    const xml = `<sst ${NS}><si><t>東京</t><rPh sb="0" eb="2"><t>トウキョウ</t></rPh><phoneticPr fontId="1"/></si></sst>`;
    expect(await new SharedStringsXform().parseStream(chunksOf(xml))).toEqual(["東京"]);
  });

  it("should unescape entities", async () => {
    const xml = `<sst ${NS}><si><t>a &lt;b&gt; &amp; "c"</t></si></sst>`;
    expect(await new SharedStringsXform().parseStream(chunksOf(xml))).toEqual(['a <b> & "c"']);
  });
});
