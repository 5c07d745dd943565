/**
 * xml-event-writer
 *
 * Incremental, event-driven XML writer with namespace resolution and
 * pretty printing.
 */

export { version } from "../package.json";

// ─────────────────────────────────────────────────────────────────────────────
// Writer
// ─────────────────────────────────────────────────────────────────────────────

export {
  type AttributeName,
  type ElementName,
  type FormattingHint,
  XmlWriter,
  type XmlWriterInit,
} from "./writer/xml-writer";
export {
  DEFAULT_WRITER_OPTIONS,
  type LineSeparator,
  type ResolvedWriterOptions,
  type XmlWriterOptions,
  XmlWriterOptionsSchema,
} from "./writer/options";
export type { WriterEvent, WriterState } from "./writer/state-machine";
export {
  type EntityDeclaration,
  type ExternalEntity,
  externalEntity,
  type InternalEntity,
  internalEntity,
  type NotationDeclaration,
} from "./writer/dtd";
export { Escaper, type EscaperOptions, numericReference } from "./writer/escaper";

// ─────────────────────────────────────────────────────────────────────────────
// Attributes and Namespaces
// ─────────────────────────────────────────────────────────────────────────────

export {
  type Attribute,
  type AttributeInit,
  type AttributeValue,
  CDATA_TYPE,
  XmlAttributes,
} from "./attributes/xml-attributes";
export { XML_NS, XMLNS_NS } from "./namespaces/namespace-context";

// ─────────────────────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────────────────────

export { ByteSink, type ByteSinkOptions } from "./io/byte-sink";
export { StringSink, type XmlSink } from "./io/xml-sink";

// ─────────────────────────────────────────────────────────────────────────────
// Events and Filtering
// ─────────────────────────────────────────────────────────────────────────────

export type {
  QualifiedName,
  WarningCallback,
  XmlContentHandler,
  XmlEventHandler,
  XmlEventSource,
  XmlLexicalHandler,
} from "./events/types";
export { parseDoctype, SaxEventSource, type SaxEventSourceOptions } from "./events/sax-event-source";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  IllegalEventError,
  XmlConfigError,
  XmlParseError,
  XmlWriterError,
  XmlWriterFault,
} from "./writer/errors";
