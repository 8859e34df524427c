import { describe, it, expect } from "vitest";
import { deflateSync, strToU8, strFromU8 } from "fflate";
import { inflateChunks } from "../../../utils/unzip/inflate-stream.js";
import { chunksOf, collect } from "../../utils/xlsx-builder.js";

function concat(parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

describe("inflateChunks", () => {
  it("should inflate a raw deflate stream fed in small pieces", async () => {
    const text = "row,".repeat(5000);
    const compressed = deflateSync(strToU8(text));
    const pieces: Uint8Array[] = [];
    for (let i = 0; i < compressed.length; i += 7) {
      pieces.push(compressed.subarray(i, i + 7));
    }

    const output = await collect(inflateChunks(chunksOf(...pieces)));
    expect(strFromU8(concat(output))).toBe(text);
  });

  it("should yield nothing for an empty stream", async () => {
    const output = await collect(inflateChunks(chunksOf(deflateSync(new Uint8Array(0)))));
    expect(concat(output).length).toBe(0);
  });

  it("should throw on corrupt data", async () => {
    await expect(collect(inflateChunks(chunksOf(new Uint8Array([0xff, 0xff, 0xff, 0xff]))))).rejects.toThrow();
  });
});
