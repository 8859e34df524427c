import { localName, parseSax } from "../../utils/parse-sax.js";
import { MalformedXmlError, isConversionError } from "../../errors.js";

/** Element as handed to the parse callbacks, with its namespace prefix removed */
export interface XformNode {
  name: string;
  attributes: Record<string, string>;
}

/**
 * Base class for the part parsers.
 *
 * Subclasses react to `parseOpen` / `parseText` / `parseClose` and build
 * `model` as they go; `parseClose` returns false once the root element is
 * closed. `parseStream` drives the callbacks from an entry byte stream.
 */
export abstract class BaseXform<TModel> {
  model: TModel;

  constructor(model: TModel) {
    this.model = model;
  }

  abstract parseOpen(node: XformNode): void;

  parseText(_text: string): void {
    // most parts carry no text
  }

  abstract parseClose(name: string): boolean;

  async parseStream(stream: AsyncIterable<Uint8Array | string>): Promise<TModel> {
    let done = false;
    try {
      for await (const events of parseSax(stream)) {
        if (done) {
          // keep draining so the whole part is still checked for well-formedness
          continue;
        }
        for (const { eventType, value } of events) {
          if (eventType === "opentag") {
            this.parseOpen({ name: localName(value.name), attributes: value.attributes });
          } else if (eventType === "text") {
            this.parseText(value);
          } else if (!this.parseClose(localName(value.name))) {
            done = true;
            break;
          }
        }
      }
    } catch (error) {
      if (isConversionError(error)) {
        throw error;
      }
      throw new MalformedXmlError(error instanceof Error ? error.message : String(error), {}, {
        cause: error
      });
    }
    return this.model;
  }
}

/** Attribute value looked up by local name, whatever prefix the file used */
export function getAttribute(node: XformNode, name: string): string | undefined {
  const direct = node.attributes[name];
  if (direct !== undefined) {
    return direct;
  }
  for (const [key, value] of Object.entries(node.attributes)) {
    if (localName(key) === name) {
      return value;
    }
  }
  return undefined;
}

export function parseIntAttribute(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*-?\d+\s*$/.test(value)) {
    return undefined;
  }
  return parseInt(value, 10);
}
