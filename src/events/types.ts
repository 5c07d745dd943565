/**
 * Event interfaces connecting parsers, filters and the writer.
 *
 * A source drives a handler synchronously; the writer is a handler that
 * can sit between a source and another handler, writing every event it
 * relays.
 */

import type { Attribute } from "#src/attributes/xml-attributes";

/**
 * Fully qualified element or attribute name.
 */
export interface QualifiedName {
  /** Namespace URI, empty for none */
  uri: string;
  /** Local name, may be empty when only the qualified name is known */
  localName: string;
  /** Qualified name as written in the source, may be empty */
  qName: string;
}

/**
 * Structural document events.
 */
export interface XmlContentHandler {
  startDocument(): void;
  endDocument(): void;
  startElement(name: QualifiedName, attributes: Iterable<Attribute>): void;
  endElement(name: QualifiedName): void;
  characters(text: string): void;
  ignorableWhitespace?(text: string): void;
  processingInstruction(target: string, data: string): void;
}

/**
 * Lexical events: markup that carries no structure of its own.
 */
export interface XmlLexicalHandler {
  comment(text: string): void;
  startCdata(): void;
  endCdata(): void;
  startDtd(name: string, publicId: string | null, systemId: string | null): void;
  endDtd(): void;
}

export type XmlEventHandler = XmlContentHandler & Partial<XmlLexicalHandler>;

/**
 * Callback for non-fatal diagnostics.
 */
export type WarningCallback = (message: string) => void;

/**
 * Something that produces events from input, such as a parser.
 */
export interface XmlEventSource {
  setHandler(handler: XmlEventHandler): void;

  /**
   * Process the whole input, calling the handler for every event.
   * Returns once the input is exhausted.
   */
  parse(input: string): void;
}
