/**
 * Error classes for XML writing operations.
 *
 * The hierarchy mirrors the three ways a document can fail:
 * - IllegalEventError: an event arrived in a state that does not accept it
 * - XmlWriterFault: the output sink rejected a write
 * - XmlConfigError: bad configuration or helper arguments
 *
 * None of these are recoverable for the document in progress. The writer
 * must be reset (and usually given a fresh sink) before it is used again.
 */

import type { WriterEvent, WriterState } from "./state-machine";

/**
 * Base class for every error raised by the writer.
 */
export class XmlWriterError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "XmlWriterError";
  }
}

/**
 * Error when an event is not permitted in the current state.
 *
 * Examples:
 * - Writing an attribute after character data
 * - Opening a second root element
 * - Any event after the document has ended
 */
export class IllegalEventError extends XmlWriterError {
  readonly event: WriterEvent;
  readonly state: WriterState;

  constructor(event: WriterEvent, state: WriterState) {
    super(`Event ${event} not allowed in state ${state}`);
    this.name = "IllegalEventError";
    this.event = event;
    this.state = state;
  }
}

/**
 * Error when the output sink fails.
 *
 * The original error is available as `cause`. Output written before the
 * failure is left as is.
 */
export class XmlWriterFault extends XmlWriterError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);

    super(`Failed to write XML output: ${detail}`, { cause });
    this.name = "XmlWriterFault";
  }
}

/**
 * Error for invalid writer options or helper arguments.
 */
export class XmlConfigError extends XmlWriterError {
  constructor(message: string) {
    super(message);
    this.name = "XmlConfigError";
  }
}

/**
 * Error reported by an upstream event source for malformed input.
 */
export class XmlParseError extends XmlWriterError {
  /** 1-based line number, when the source knows it */
  readonly line: number | undefined;
  /** 1-based column number, when the source knows it */
  readonly column: number | undefined;

  constructor(message: string, line?: number, column?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = "XmlParseError";
    this.line = line;
    this.column = column;
  }
}
