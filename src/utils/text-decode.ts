/**
 * Incremental UTF-8 decoding for chunked entry data.
 *
 * A multi-byte character may straddle two inflated chunks, so one decoder is
 * kept per stream and fed in `stream` mode; `flush` releases whatever bytes
 * are still held back at the end.
 */
export interface ChunkDecoder {
  decode(chunk: Uint8Array | string): string;
  flush(): string;
}

export function createChunkDecoder(): ChunkDecoder {
  const textDecoder = new TextDecoder("utf-8");
  return {
    decode(chunk) {
      if (typeof chunk === "string") {
        return chunk;
      }
      return textDecoder.decode(chunk, { stream: true });
    },
    flush() {
      return textDecoder.decode();
    }
  };
}
