/**
 * Event source backed by the `sax` parser.
 *
 * Parses a complete XML string and reports it to a handler as document
 * events, so an XmlWriter can act as a filter:
 *
 * @example
 * ```ts
 * const writer = new XmlWriter({ parent: new SaxEventSource(), prettyPrint: true });
 * writer.parse(input);
 * ```
 *
 * The XML declaration is not reported (the writer produces its own), and
 * neither is text outside the root element. Namespace declarations are
 * reported through element and attribute URIs rather than as attributes.
 */

import sax, { type QualifiedAttribute } from "sax";

import { type Attribute, CDATA_TYPE } from "#src/attributes/xml-attributes";
import { XmlConfigError, XmlParseError } from "#src/writer/errors";

import type { QualifiedName, WarningCallback, XmlEventHandler, XmlEventSource } from "./types";

export interface SaxEventSourceOptions {
  /** Callback for parts of the input that cannot be reported */
  onWarning?: WarningCallback;
}

/**
 * Parts of a DOCTYPE declaration body, as reported by sax.
 */
export interface DoctypeParts {
  name: string;
  publicId: string | null;
  systemId: string | null;
  /** Internal subset including brackets, when present */
  internalSubset: string | null;
}

const QUOTED = `("[^"]*"|'[^']*')`;

const DOCTYPE_PATTERN = new RegExp(
  `^\\s*([^\\s\\[>]+)(?:\\s+(?:SYSTEM\\s+${QUOTED}|PUBLIC\\s+${QUOTED}(?:\\s+${QUOTED})?))?\\s*(\\[[\\s\\S]*\\])?\\s*$`,
);

function unquote(value: string | undefined): string | null {
  return value === undefined ? null : value.slice(1, -1);
}

/**
 * Split the body of a DOCTYPE declaration into its parts.
 *
 * @returns null if the body is not a well-formed declaration
 */
export function parseDoctype(body: string): DoctypeParts | null {
  const match = DOCTYPE_PATTERN.exec(body);

  if (match === null) {
    return null;
  }

  const [, name = "", system, publicId, publicSystem, internalSubset] = match;

  return {
    name,
    publicId: unquote(publicId),
    systemId: unquote(system ?? publicSystem),
    internalSubset: internalSubset ?? null,
  };
}

function isNamespaceDeclaration(attr: QualifiedAttribute): boolean {
  return attr.name === "xmlns" || attr.prefix === "xmlns";
}

export class SaxEventSource implements XmlEventSource {
  private handler: XmlEventHandler | null = null;

  onWarning: WarningCallback | null;

  constructor(options: SaxEventSourceOptions = {}) {
    this.onWarning = options.onWarning ?? null;
  }

  setHandler(handler: XmlEventHandler): void {
    this.handler = handler;
  }

  /**
   * Parse a complete document.
   *
   * @throws {XmlConfigError} if no handler is set
   * @throws {XmlParseError} if the input is not well-formed
   */
  parse(input: string): void {
    const handler = this.handler;

    if (handler === null) {
      throw new XmlConfigError("No handler to report events to");
    }

    const parser = sax.parser(true, { xmlns: true, position: true });
    const open: QualifiedName[] = [];

    parser.onerror = error => {
      const [message = "Malformed XML"] = error.message.split("\n");

      throw new XmlParseError(message, parser.line + 1, parser.column + 1, { cause: error });
    };

    parser.ondoctype = body => {
      const parts = parseDoctype(body);

      if (parts === null) {
        this.warn(`Skipping unrecognized DOCTYPE declaration: ${body.trim()}`);

        return;
      }

      if (parts.internalSubset !== null) {
        this.warn(`Dropping the internal DTD subset of ${parts.name}`);
      }

      handler.startDtd?.(parts.name, parts.publicId, parts.systemId);
      handler.endDtd?.();
    };

    parser.onprocessinginstruction = ({ name, body }) => {
      if (name === "xml") {
        return;
      }

      handler.processingInstruction(name, body);
    };

    parser.onopentag = tag => {
      if (!("ns" in tag)) {
        throw new XmlParseError(`Element ${tag.name} was reported without namespace information`);
      }

      const name: QualifiedName = { uri: tag.uri, localName: tag.local, qName: tag.name };
      const attrs: Attribute[] = [];

      for (const attr of Object.values(tag.attributes)) {
        if (isNamespaceDeclaration(attr)) {
          continue;
        }

        attrs.push({
          uri: attr.uri,
          localName: attr.local,
          qName: attr.name,
          type: CDATA_TYPE,
          value: attr.value,
          specified: true,
        });
      }

      open.push(name);
      handler.startElement(name, attrs);
    };

    parser.onclosetag = () => {
      const name = open.pop();

      if (name !== undefined) {
        handler.endElement(name);
      }
    };

    parser.ontext = text => {
      if (open.length > 0) {
        handler.characters(text);
      }
    };

    parser.onopencdata = () => handler.startCdata?.();
    parser.oncdata = text => handler.characters(text);
    parser.onclosecdata = () => handler.endCdata?.();
    parser.oncomment = text => handler.comment?.(text);
    parser.onend = () => handler.endDocument();

    handler.startDocument();
    parser.write(input).close();
  }

  private warn(message: string): void {
    this.onWarning?.(message);
  }
}
