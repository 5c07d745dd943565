/**
 * Test utilities for xml-event-writer
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import type { Attribute } from "#src/attributes/xml-attributes";
import type { QualifiedName, XmlContentHandler, XmlLexicalHandler } from "#src/events/types";

/**
 * Base path for test fixtures.
 */
const FIXTURES_URL = new URL("../fixtures/", import.meta.url);

/**
 * Load an XML fixture file as text.
 *
 * @example
 * ```ts
 * const xml = await loadFixture("catalog.xml");
 * ```
 */
export async function loadFixture(filename: string): Promise<string> {
  return readFile(fileURLToPath(new URL(filename, FIXTURES_URL)), "utf8");
}

function describeName(name: QualifiedName): string {
  return name.uri === "" ? name.qName || name.localName : `{${name.uri}}${name.localName}`;
}

/**
 * Handler that records every event it receives as a short string.
 */
export class RecordingHandler implements XmlContentHandler, XmlLexicalHandler {
  readonly events: string[] = [];

  startDocument(): void {
    this.events.push("startDocument");
  }

  endDocument(): void {
    this.events.push("endDocument");
  }

  startElement(name: QualifiedName, attributes: Iterable<Attribute>): void {
    const attrs = [...attributes].map(attr => ` ${attr.qName || attr.localName}=${attr.value}`).join("");

    this.events.push(`startElement ${describeName(name)}${attrs}`);
  }

  endElement(name: QualifiedName): void {
    this.events.push(`endElement ${describeName(name)}`);
  }

  characters(text: string): void {
    this.events.push(`characters ${text}`);
  }

  ignorableWhitespace(text: string): void {
    this.events.push(`ignorableWhitespace ${JSON.stringify(text)}`);
  }

  processingInstruction(target: string, data: string): void {
    this.events.push(`processingInstruction ${target} ${data}`);
  }

  comment(text: string): void {
    this.events.push(`comment ${text}`);
  }

  startCdata(): void {
    this.events.push("startCdata");
  }

  endCdata(): void {
    this.events.push("endCdata");
  }

  startDtd(name: string, publicId: string | null, systemId: string | null): void {
    this.events.push(`startDtd ${name} ${publicId ?? "-"} ${systemId ?? "-"}`);
  }

  endDtd(): void {
    this.events.push("endDtd");
  }
}
