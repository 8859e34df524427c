import { SaxesParser, type SaxesTagPlain } from "saxes";
import { createChunkDecoder } from "./text-decode.js";

export type SaxEvent =
  | { eventType: "opentag"; value: SaxesTagPlain }
  | { eventType: "text"; value: string }
  | { eventType: "closetag"; value: SaxesTagPlain };

/**
 * Feed a chunked byte source through saxes and yield the events produced by
 * each chunk as one batch. Only one chunk's worth of events is ever held.
 *
 * CDATA sections are reported as text. Parser errors are rethrown as-is; the
 * caller decides how to label them.
 */
export async function* parseSax(
  iterable: AsyncIterable<Uint8Array | string>
): AsyncGenerator<SaxEvent[], void, undefined> {
  const saxesParser = new SaxesParser();
  let error: Error | undefined;
  saxesParser.on("error", err => {
    // keep the first one, later errors are usually fallout
    error = error ?? err;
  });
  let events: SaxEvent[] = [];
  saxesParser.on("opentag", value => events.push({ eventType: "opentag", value }));
  saxesParser.on("text", value => events.push({ eventType: "text", value }));
  saxesParser.on("cdata", value => events.push({ eventType: "text", value }));
  saxesParser.on("closetag", value => events.push({ eventType: "closetag", value }));

  const decoder = createChunkDecoder();
  for await (const chunk of iterable) {
    saxesParser.write(decoder.decode(chunk));
    if (error) {
      throw error;
    }
    yield events;
    events = [];
  }

  const tail = decoder.flush();
  if (tail) {
    saxesParser.write(tail);
  }
  saxesParser.close();
  if (error) {
    throw error;
  }
  if (events.length) {
    yield events;
  }
}

/** Element name without its namespace prefix (`x:row` → `row`) */
export function localName(name: string): string {
  const idx = name.indexOf(":");
  return idx === -1 ? name : name.slice(idx + 1);
}
