import { Inflate } from "fflate";

/**
 * Inflate a raw DEFLATE stream chunk by chunk.
 * Output is handed on as soon as fflate produces it, so at most one input
 * chunk's expansion is buffered here.
 */
export async function* inflateChunks(
  source: AsyncIterable<Uint8Array>
): AsyncGenerator<Uint8Array, void, undefined> {
  const pending: Uint8Array[] = [];
  const inflater = new Inflate((data: Uint8Array) => {
    if (data.length) {
      pending.push(data);
    }
  });

  for await (const chunk of source) {
    inflater.push(chunk, false);
    yield* pending.splice(0);
  }

  inflater.push(new Uint8Array(0), true);
  yield* pending.splice(0);
}
