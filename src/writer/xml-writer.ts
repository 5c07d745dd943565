/**
 * Incremental XML writer.
 *
 * Turns a sequence of document events into well-formed XML text, written
 * to the sink as each event arrives. Only the stack of open elements is
 * kept in memory.
 *
 * The writer also works as a filter: give it an upstream event source
 * and a downstream handler, and it writes every event it relays.
 *
 * @example
 * ```ts
 * const out = new StringSink();
 * const writer = new XmlWriter({ output: out, prettyPrint: true });
 *
 * writer.startDocument();
 * writer.startElement("root").addAttribute("id", 1);
 * writer.startElement("child").characters("a < b").endElement();
 * writer.endElement();
 * writer.endDocument();
 * ```
 */

import {
  type AttributeInit,
  type AttributeValue,
  CDATA_TYPE,
  toAttribute,
} from "#src/attributes/xml-attributes";
import type {
  QualifiedName,
  WarningCallback,
  XmlContentHandler,
  XmlEventHandler,
  XmlEventSource,
  XmlLexicalHandler,
} from "#src/events/types";
import { StringSink, type XmlSink } from "#src/io/xml-sink";
import { NamespaceResolver } from "#src/namespaces/namespace-resolver";

import {
  type EntityDeclaration,
  formatDoctypeOpen,
  formatEntityDecl,
  formatNotationDecl,
  type NotationDeclaration,
} from "./dtd";
import { ElementStack } from "./element-stack";
import { XmlConfigError, XmlWriterFault } from "./errors";
import { Escaper } from "./escaper";
import {
  afterNewline,
  aroundBlockRef,
  beforeAttribute,
  beforeEndTag,
  beforeStartTag,
  beforeTagClose,
  type LayoutSettings,
} from "./layout";
import {
  DEFAULT_WRITER_OPTIONS,
  type LineSeparator,
  LineSeparatorSchema,
  parseWriterOptions,
  XmlVersionSchema,
  type XmlWriterOptions,
} from "./options";
import {
  FormattingStateMachine,
  type TransitionAction,
  type TransitionHost,
  type WriterEvent,
  type WriterState,
} from "./state-machine";

/**
 * How an entity reference is laid out when pretty printing.
 *
 * - inline: written in the flow of the text
 * - block: written on its own line
 */
export type FormattingHint = "inline" | "block";

/**
 * Element name: a local name without namespace, or a full name.
 */
export type ElementName = string | { uri?: string; localName: string; qName?: string };

/**
 * Attribute name: a local name without namespace, or a full name.
 */
export type AttributeName = string | { uri?: string; localName?: string; qName?: string };

export interface XmlWriterInit extends XmlWriterOptions {
  /** Destination for the XML text (default: a new StringSink) */
  output?: XmlSink;
  /** Upstream event source used by parse() */
  parent?: XmlEventSource;
  /** Downstream handler that receives every relayed event */
  handler?: XmlEventHandler;
  /** Callback for non-fatal diagnostics */
  onWarning?: WarningCallback;
}

function toQualifiedName(name: ElementName): QualifiedName {
  if (typeof name === "string") {
    return { uri: "", localName: name, qName: "" };
  }

  return { uri: name.uri ?? "", localName: name.localName, qName: name.qName ?? "" };
}

/**
 * Part of a qualified name after the prefix.
 */
function localPart(qName: string): string {
  return qName.slice(qName.indexOf(":") + 1);
}

export class XmlWriter implements XmlContentHandler, XmlLexicalHandler {
  private out: XmlSink;
  private parent: XmlEventSource | null;
  private handler: XmlEventHandler | null;

  private readonly layout: LayoutSettings;
  private readonly escaper: Escaper;
  private minimize: boolean;
  private specifiedOnly: boolean;
  private xmlVersion: string;
  private standalone: boolean;

  private readonly machine = new FormattingStateMachine();
  private readonly elements = new ElementStack();
  private readonly namespaces = new NamespaceResolver();

  private readonly host: TransitionHost = {
    perform: action => this.perform(action),
    depth: () => this.elements.depth,
    closesRoot: () => this.elements.depth === 1 && this.elements.peek().isEmpty,
  };

  /**
   * Optional callback for warnings while writing.
   */
  onWarning: WarningCallback | null;

  /**
   * @throws {XmlConfigError} if any option is invalid
   */
  constructor(init: XmlWriterInit = {}) {
    const { output, parent, handler, onWarning, ...rest } = init;
    const options = { ...DEFAULT_WRITER_OPTIONS, ...parseWriterOptions(rest) };

    this.out = output ?? new StringSink();
    this.parent = parent ?? null;
    this.handler = handler ?? null;
    this.onWarning = onWarning ?? null;

    this.layout = {
      prettyPrint: options.prettyPrint,
      indent: options.indent,
      offset: options.offset,
      attrPerLine: options.attrPerLine,
      lineSeparator: options.lineSeparator,
    };
    this.escaper = new Escaper({
      escapeNonAscii: options.escapeNonAscii,
      useDecimal: options.useDecimal,
      enabled: options.escaping,
    });
    this.minimize = options.minimizeEmpty;
    this.specifiedOnly = options.specifiedAttributesOnly;
    this.xmlVersion = options.xmlVersion;
    this.standalone = options.standalone;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Prepare for a new document. Configuration, preferred prefixes and
   * root declarations are kept; the output sink is not replaced.
   */
  reset(): void {
    this.elements.clear();
    this.namespaces.reset();
    this.machine.reset();
  }

  /**
   * Flush the output sink.
   *
   * @throws {XmlWriterFault} if the sink fails
   */
  flush(): void {
    try {
      this.out.flush?.();
    } catch (error) {
      throw new XmlWriterFault(error);
    }
  }

  /**
   * Replace the output sink. Without an argument a new StringSink is used.
   */
  setOutput(sink?: XmlSink): XmlSink {
    this.out = sink ?? new StringSink();

    return this.out;
  }

  getOutput(): XmlSink {
    return this.out;
  }

  getState(): WriterState {
    return this.machine.state;
  }

  /** Number of open elements, 0 outside the root element */
  getElementLevel(): number {
    return this.elements.depth;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Filter plumbing
  // ─────────────────────────────────────────────────────────────────────────────

  setParent(parent: XmlEventSource | null): void {
    this.parent = parent;
  }

  getParent(): XmlEventSource | null {
    return this.parent;
  }

  /**
   * Set the downstream handler that receives every event after it is written.
   */
  setHandler(handler: XmlEventHandler | null): void {
    this.handler = handler;
  }

  getHandler(): XmlEventHandler | null {
    return this.handler;
  }

  /**
   * Run the parent event source over `input`, writing every event.
   *
   * @throws {XmlConfigError} if no parent source is set
   */
  parse(input: string): void {
    if (this.parent === null) {
      throw new XmlConfigError("No parent event source to parse with");
    }

    this.parent.setHandler(this);
    this.parent.parse(input);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Namespaces
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Prefer `prefix` whenever `uri` has to be declared.
   * An empty prefix makes the URI the default namespace where possible.
   */
  addNSPrefix(prefix: string, uri: string): this {
    this.namespaces.addPreferredPrefix(prefix, uri);

    return this;
  }

  /**
   * Declare a namespace on the root element, optionally with a preferred prefix.
   */
  addNSRootDecl(uri: string): this;
  addNSRootDecl(prefix: string, uri: string): this;
  addNSRootDecl(prefixOrUri: string, uri?: string): this {
    if (uri === undefined) {
      this.namespaces.addRootDeclaration(prefixOrUri);
    } else {
      this.addNSPrefix(prefixOrUri, uri);
      this.namespaces.addRootDeclaration(uri);
    }

    return this;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Configuration
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Apply several options at once.
   *
   * @throws {XmlConfigError} if any option is invalid; nothing is applied then
   */
  configure(options: XmlWriterOptions): void {
    const valid = parseWriterOptions(options);

    if (valid.prettyPrint !== undefined) this.setPrettyPrint(valid.prettyPrint);
    if (valid.indent !== undefined) this.layout.indent = valid.indent;
    if (valid.offset !== undefined) this.layout.offset = valid.offset;
    if (valid.attrPerLine !== undefined) this.setAttrPerLine(valid.attrPerLine);
    if (valid.minimizeEmpty !== undefined) this.setMinimizeEmpty(valid.minimizeEmpty);
    if (valid.specifiedAttributesOnly !== undefined) this.setSpecifiedAttributes(valid.specifiedAttributesOnly);
    if (valid.escapeNonAscii !== undefined) this.setEscapeNonAscii(valid.escapeNonAscii);
    if (valid.useDecimal !== undefined) this.setUseDecimal(valid.useDecimal);
    if (valid.xmlVersion !== undefined) this.xmlVersion = valid.xmlVersion;
    if (valid.standalone !== undefined) this.setStandalone(valid.standalone);
    if (valid.escaping !== undefined) this.setEscaping(valid.escaping);
    if (valid.lineSeparator !== undefined) this.layout.lineSeparator = valid.lineSeparator;
  }

  setPrettyPrint(enable: boolean): void {
    this.layout.prettyPrint = enable;
  }

  getPrettyPrint(): boolean {
    return this.layout.prettyPrint;
  }

  setEscapeNonAscii(enable: boolean): void {
    this.escaper.escapeNonAscii = enable;
  }

  getEscapeNonAscii(): boolean {
    return this.escaper.escapeNonAscii;
  }

  setUseDecimal(enable: boolean): void {
    this.escaper.useDecimal = enable;
  }

  getUseDecimal(): boolean {
    return this.escaper.useDecimal;
  }

  setEscaping(enable: boolean): void {
    this.escaper.enabled = enable;
  }

  getEscaping(): boolean {
    return this.escaper.enabled;
  }

  /**
   * Set the indentation string, and optionally the constant line offset.
   * A null offset restores the default (none).
   */
  setIndentString(indent: string | null): void;
  setIndentString(offset: string | null, indent: string | null): void;
  setIndentString(first: string | null, second?: string | null): void {
    if (second === undefined) {
      this.layout.indent = first ?? "";

      return;
    }

    this.layout.offset = first ?? DEFAULT_WRITER_OPTIONS.offset;
    this.layout.indent = second ?? "";
  }

  getIndentString(): string {
    return this.layout.indent;
  }

  getOffsetString(): string {
    return this.layout.offset;
  }

  setMinimizeEmpty(minimize: boolean): void {
    this.minimize = minimize;
  }

  getMinimizeEmpty(): boolean {
    return this.minimize;
  }

  setAttrPerLine(separateLine: boolean): void {
    this.layout.attrPerLine = separateLine;
  }

  getAttrPerLine(): boolean {
    return this.layout.attrPerLine;
  }

  /**
   * When enabled, attributes defaulted from a DTD are not written.
   */
  setSpecifiedAttributes(specified: boolean): void {
    this.specifiedOnly = specified;
  }

  getSpecifiedAttributes(): boolean {
    return this.specifiedOnly;
  }

  /**
   * @throws {XmlConfigError} if the version is not of the form 1.x
   */
  setXmlVersion(version: string): void {
    const result = XmlVersionSchema.safeParse(version);

    if (!result.success) {
      throw new XmlConfigError(`Invalid XML version: ${JSON.stringify(version)}`);
    }

    this.xmlVersion = result.data;
  }

  getXmlVersion(): string {
    return this.xmlVersion;
  }

  setStandalone(standalone: boolean): void {
    this.standalone = standalone;
  }

  getStandalone(): boolean {
    return this.standalone;
  }

  /**
   * @throws {XmlConfigError} for anything other than LF, CRLF or CR
   */
  setLineSeparator(separator: string): void {
    const result = LineSeparatorSchema.safeParse(separator);

    if (!result.success) {
      throw new XmlConfigError(`Unsupported line separator: ${JSON.stringify(separator)}`);
    }

    this.layout.lineSeparator = result.data;
  }

  getLineSeparator(): LineSeparator {
    return this.layout.lineSeparator;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Document
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Begin the document, writing the XML declaration unless this is a fragment.
   *
   * @param encoding - Encoding named in the declaration, omitted when null
   * @param standalone - Standalone flag (default: the configured value)
   * @param isFragment - Skip the XML declaration
   */
  startDocument(encoding: string | null = null, standalone = this.standalone, isFragment = false): this {
    this.handle("start-document");

    if (!isFragment) {
      this.writeRaw("<?xml version=");
      this.writeQuoted(this.xmlVersion);

      if (encoding !== null) {
        this.writeRaw(" encoding=");
        this.writeQuoted(encoding);
      }

      this.writeRaw(" standalone=");
      this.writeQuoted(standalone ? "yes" : "no");
      this.writeRaw("?>");
      this.writeNewline();
    }

    this.handler?.startDocument();

    return this;
  }

  /**
   * Finish the document and flush the sink. The sink is not closed.
   */
  endDocument(): this {
    this.handle("end-document");

    if (this.elements.depth > 0) {
      this.warn(`Document ended with ${this.elements.depth} unclosed element(s)`);
    }

    this.writeNewline();
    this.flush();
    this.handler?.endDocument();

    return this;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Document type declaration
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Write a complete DOCTYPE declaration, with an internal subset when
   * entities or notations are given.
   */
  doctype(
    name: string,
    publicId: string | null,
    systemId: string | null,
    entities: readonly EntityDeclaration[] = [],
    notations: readonly NotationDeclaration[] = [],
  ): this {
    this.startDtd(name, publicId, systemId);

    if (entities.length > 0 || notations.length > 0) {
      const lead = this.layout.offset + this.layout.indent;

      this.writeRaw(" [");

      for (const entity of entities) {
        this.writeNewline();
        this.writeRaw(lead + formatEntityDecl(entity));
      }

      for (const notation of notations) {
        this.writeNewline();
        this.writeRaw(lead + formatNotationDecl(notation));
      }

      this.writeNewline();
      this.writeRaw("]");
    }

    return this.endDtd();
  }

  startDtd(name: string, publicId: string | null, systemId: string | null): this {
    this.handle("start-dtd");
    this.writeRaw(formatDoctypeOpen(name, publicId, systemId));
    this.handler?.startDtd?.(name, publicId, systemId);

    return this;
  }

  endDtd(): this {
    this.handle("end-dtd");
    this.writeRaw(">");
    this.writeNewline();
    this.writeNewline();
    this.handler?.endDtd?.();

    return this;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Elements and attributes
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Open an element. Its start tag is written once the next event shows
   * whether it has content.
   */
  startElement(name: ElementName, attrs?: Iterable<AttributeInit>): this {
    return this.openElement(name, attrs, false);
  }

  /**
   * Close the innermost open element. The name argument is ignored; it
   * exists so the writer can receive parser events directly.
   */
  endElement(_name?: QualifiedName): this {
    this.handle("end-element");

    return this;
  }

  /**
   * Write an element that has no content. Attributes can still be added
   * until the next event; no endElement() call is needed.
   */
  emptyElement(name: ElementName, attrs?: Iterable<AttributeInit>): this {
    return this.openElement(name, attrs, true);
  }

  /**
   * Replace the attributes of the element whose start tag is pending.
   */
  setAttributes(attrs: Iterable<AttributeInit>): this {
    const list = [...attrs].map(toAttribute);

    this.handle("attribute");
    this.elements.peek().attrs.setAttributes(list);

    return this;
  }

  /**
   * Add attributes to the element whose start tag is pending.
   */
  addAttributes(attrs: Iterable<AttributeInit>): this {
    const list = [...attrs].map(toAttribute);

    this.handle("attribute");

    const target = this.elements.peek().attrs;

    for (const attr of list) {
      target.add(attr);
    }

    return this;
  }

  /**
   * Add one attribute to the element whose start tag is pending.
   */
  addAttribute(name: AttributeName, value: AttributeValue, type: string = CDATA_TYPE): this {
    const attr = toAttribute(typeof name === "string" ? { localName: name, value, type } : { ...name, value, type });

    this.handle("attribute");
    this.elements.peek().attrs.add(attr);

    return this;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Content
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Write character data, escaped (or verbatim inside a CDATA section).
   * Null or undefined text is ignored.
   */
  characters(text: string | null | undefined): this {
    if (text === null || text === undefined) {
      return this;
    }

    this.handle("characters");

    if (this.machine.state === "in-cdata") {
      if (text.includes("]]>")) {
        this.warn("CDATA text contains ']]>', which ends the section early");
      }

      this.writeRaw(text);
    } else {
      this.writeEscaped(text);
    }

    this.handler?.characters(text);

    return this;
  }

  /**
   * Write whitespace that a validating parser reported as ignorable.
   */
  ignorableWhitespace(text: string): this {
    this.handle("characters");
    this.writeEscaped(text);
    this.handler?.ignorableWhitespace?.(text);

    return this;
  }

  /**
   * Write text verbatim, with no escaping at all.
   */
  data(text: string): this {
    this.handle("characters");
    this.writeRaw(text);

    return this;
  }

  startCdata(): this {
    this.handle("start-cdata");
    this.writeRaw("<![CDATA[");
    this.handler?.startCdata?.();

    return this;
  }

  endCdata(): this {
    this.handle("end-cdata");
    this.writeRaw("]]>");
    this.handler?.endCdata?.();

    return this;
  }

  /**
   * Write a complete CDATA section.
   */
  cdataSection(text: string): this {
    return this.startCdata().characters(text).endCdata();
  }

  /**
   * Write a comment. Comments inside a DTD are accepted but not written.
   */
  comment(text: string): this {
    this.handle("comment");

    if (this.machine.state !== "in-dtd") {
      if (text.includes("--") || text.endsWith("-")) {
        this.warn("Comment text contains '--' or ends with '-'");
      }

      this.writeRaw(`<!--${text}-->`);
    }

    this.handler?.comment?.(text);

    return this;
  }

  processingInstruction(target: string, data: string): this {
    this.handle("processing-instruction");
    this.writeRaw(data.length > 0 ? `<?${target} ${data}?>` : `<?${target}?>`);
    this.handler?.processingInstruction(target, data);

    return this;
  }

  /**
   * Write an entity reference (`&name;`). A block reference goes on its
   * own line when pretty printing.
   */
  entityRef(name: string, hint: FormattingHint = "inline"): this {
    const block = hint === "block";

    this.handle(block ? "block-ref" : "inline-ref");

    const padding = block ? aroundBlockRef(this.layout, this.elements.depth) : "";

    this.writeRaw(`${padding}&${name};${padding}`);

    return this;
  }

  /**
   * Write a decimal character reference (`&#N;`).
   */
  characterRef(char: number | string): this {
    const codePoint = typeof char === "number" ? char : char.codePointAt(0);

    if (codePoint === undefined || !Number.isInteger(codePoint) || codePoint < 0 || codePoint > 0x10ffff) {
      throw new XmlConfigError(`Invalid character for a reference: ${String(char)}`);
    }

    this.handle("inline-ref");
    this.writeRaw(`&#${codePoint};`);

    return this;
  }

  /**
   * Write a line break. When pretty printing, the next line is indented
   * to the level of the current element's children.
   */
  newline(): this {
    this.handle("newline");
    this.writeNewline();
    this.writeRaw(afterNewline(this.layout, this.elements.depth, this.machine.state));

    return this;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // State machine actions
  // ─────────────────────────────────────────────────────────────────────────────

  private handle(event: WriterEvent): WriterState {
    return this.machine.handle(event, this.host);
  }

  private perform(action: TransitionAction): void {
    switch (action) {
      case "write-start-tag":
        this.writeStartTag(false);
        break;

      case "close-start-tag": {
        // An empty element closes itself, so the end tag belongs to its parent
        const isEmpty = this.elements.peek().isEmpty;

        this.writeStartTag(this.minimize);

        if (isEmpty || !this.minimize) {
          this.writeEndTag();
        }
        break;
      }

      case "write-end-tag":
        this.writeEndTag();
        break;

      case "finish-start-tag": {
        const isEmpty = this.elements.peek().isEmpty;

        this.writeStartTag(this.minimize);

        if (!isEmpty && !this.minimize) {
          this.writeEndTag();
        }
        break;
      }
    }
  }

  private openElement(name: ElementName, attrs: Iterable<AttributeInit> | undefined, isEmpty: boolean): this {
    const qualified = toQualifiedName(name);

    if (qualified.localName === "" && qualified.qName === "") {
      throw new XmlConfigError("Element requires a local name or a qualified name");
    }

    const list = attrs === undefined ? [] : [...attrs].map(toAttribute);
    const previous = this.handle("start-element");

    this.namespaces.context.pushContext();

    this.elements.push({ ...qualified, attrs: list, isEmpty, containingState: previous });

    if (this.elements.depth === 1) {
      this.namespaces.declareRootNamespaces();
    }

    this.handler?.startElement(qualified, list);

    return this;
  }

  private writeStartTag(isEmpty: boolean): void {
    const frame = this.elements.peek();
    const depth = this.elements.depth;

    this.writeRaw(beforeStartTag(this.layout, depth, frame.containingState));
    this.writeRaw("<");
    this.writeName(frame.uri, frame.localName, frame.qName, true);

    let count = 0;

    for (const attr of frame.attrs) {
      if (this.specifiedOnly && !attr.specified) {
        continue;
      }

      this.writeRaw(beforeAttribute(this.layout, depth));
      this.writeName(attr.uri, attr.localName, attr.qName, false);
      this.writeRaw("=");
      this.writeQuoted(attr.value);
      count++;
    }

    count += this.writeNamespaceDeclarations(depth);

    const selfClosing = frame.isEmpty || isEmpty;

    this.writeRaw(beforeTagClose(this.layout, depth, count));
    this.writeRaw(selfClosing ? "/>" : ">");

    if (selfClosing) {
      this.closeElement();
    }
  }

  private writeEndTag(): void {
    const frame = this.elements.peek();

    this.writeRaw(beforeEndTag(this.layout, this.elements.depth, this.machine.state));
    this.writeRaw("</");
    this.writeName(frame.uri, frame.localName, frame.qName, true);
    this.writeRaw(">");
    this.closeElement();
  }

  private closeElement(): void {
    const frame = this.elements.pop();

    this.namespaces.context.popContext();
    this.handler?.endElement({ uri: frame.uri, localName: frame.localName, qName: frame.qName });
  }

  private writeName(uri: string, localName: string, qName: string, isElement: boolean): void {
    const prefix = this.namespaces.resolve(uri, qName === "" ? null : qName, isElement);
    let local = localName;

    if (local === "") {
      local = uri === "" ? qName : localPart(qName);
    }

    this.writeRaw(prefix === "" ? local : `${prefix}:${local}`);
  }

  /**
   * Write the namespaces declared on the innermost element.
   *
   * @returns The number of declarations written
   */
  private writeNamespaceDeclarations(depth: number): number {
    const prefixes = this.namespaces.context.getDeclaredPrefixes();

    for (const prefix of prefixes) {
      this.writeRaw(beforeAttribute(this.layout, depth));
      this.writeRaw(prefix === "" ? "xmlns=" : `xmlns:${prefix}=`);
      this.writeQuoted(this.namespaces.context.getURI(prefix) ?? "");
    }

    return prefixes.length;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Output
  // ─────────────────────────────────────────────────────────────────────────────

  private warn(message: string): void {
    this.onWarning?.(message);
  }

  private writeNewline(): void {
    this.writeRaw(this.layout.lineSeparator);
  }

  private writeEscaped(text: string): void {
    this.writeRaw(this.escaper.escape(text));
  }

  private writeQuoted(text: string): void {
    this.writeRaw(this.escaper.quote(text));
  }

  private writeRaw(text: string): void {
    if (text.length === 0) {
      return;
    }

    try {
      this.out.write(text);
    } catch (error) {
      throw new XmlWriterFault(error);
    }
  }
}
