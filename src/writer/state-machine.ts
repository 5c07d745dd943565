/**
 * Event ordering rules for the XML writer.
 *
 * Every public writer operation maps to one event. The transition table
 * says which events each state accepts, which formatting action runs
 * before the state changes, and where the writer goes next. Anything
 * missing from the table is illegal.
 */

import { IllegalEventError } from "./errors";

export type WriterState =
  | "before-document"
  | "before-root"
  | "in-start-tag"
  | "in-cdata"
  | "in-dtd"
  | "after-tag"
  | "after-data"
  | "after-root"
  | "after-document";

export type WriterEvent =
  | "attribute"
  | "inline-ref"
  | "block-ref"
  | "characters"
  | "comment"
  | "end-cdata"
  | "end-document"
  | "end-dtd"
  | "end-element"
  | "newline"
  | "processing-instruction"
  | "start-cdata"
  | "start-document"
  | "start-dtd"
  | "start-element";

export const WRITER_STATES: readonly WriterState[] = [
  "before-document",
  "before-root",
  "in-start-tag",
  "in-cdata",
  "in-dtd",
  "after-tag",
  "after-data",
  "after-root",
  "after-document",
];

export const WRITER_EVENTS: readonly WriterEvent[] = [
  "attribute",
  "inline-ref",
  "block-ref",
  "characters",
  "comment",
  "end-cdata",
  "end-document",
  "end-dtd",
  "end-element",
  "newline",
  "processing-instruction",
  "start-cdata",
  "start-document",
  "start-dtd",
  "start-element",
];

/**
 * Formatting work done while leaving a state.
 *
 * - write-start-tag: flush the pending start tag as an open tag
 * - close-start-tag: flush the pending start tag, then minimize or close it
 * - write-end-tag: write the end tag of the innermost element
 * - finish-start-tag: flush the pending start tag at the end of the document
 */
export type TransitionAction = "write-start-tag" | "close-start-tag" | "write-end-tag" | "finish-start-tag";

/**
 * `by-depth` goes to after-tag while elements remain open, after-root otherwise.
 */
export type NextState = WriterState | "by-depth";

export interface Transition {
  readonly next: NextState;
  readonly action?: TransitionAction;
}

type TransitionRow = Readonly<Partial<Record<WriterEvent, Transition>>>;

const stay = (state: WriterState): Transition => ({ next: state });

/**
 * Rows shared by the two "inside an element" states.
 */
const CONTENT_ROW: TransitionRow = {
  "inline-ref": stay("after-data"),
  characters: stay("after-data"),
  "start-cdata": stay("in-cdata"),
  "start-element": stay("in-start-tag"),
  "end-element": { next: "by-depth", action: "write-end-tag" },
};

export const TRANSITIONS: Readonly<Record<WriterState, TransitionRow>> = {
  "before-document": {
    "start-document": stay("before-root"),
  },
  "before-root": {
    characters: stay("before-root"),
    comment: stay("before-root"),
    "inline-ref": stay("before-root"),
    "block-ref": stay("before-root"),
    newline: stay("before-root"),
    "processing-instruction": stay("before-root"),
    "start-dtd": stay("in-dtd"),
    "start-element": stay("in-start-tag"),
    "end-document": stay("after-document"),
  },
  "in-start-tag": {
    attribute: stay("in-start-tag"),
    characters: { next: "after-data", action: "write-start-tag" },
    "inline-ref": { next: "after-data", action: "write-start-tag" },
    newline: { next: "after-tag", action: "write-start-tag" },
    "processing-instruction": { next: "after-tag", action: "write-start-tag" },
    "block-ref": { next: "after-tag", action: "write-start-tag" },
    comment: { next: "after-tag", action: "write-start-tag" },
    "start-element": { next: "in-start-tag", action: "write-start-tag" },
    "start-cdata": { next: "in-cdata", action: "write-start-tag" },
    "end-element": { next: "by-depth", action: "close-start-tag" },
    "end-document": { next: "after-document", action: "finish-start-tag" },
  },
  "in-cdata": {
    characters: stay("in-cdata"),
    comment: stay("in-cdata"),
    "inline-ref": stay("in-cdata"),
    "block-ref": stay("in-cdata"),
    newline: stay("in-cdata"),
    "end-cdata": stay("after-data"),
  },
  "in-dtd": {
    characters: stay("in-dtd"),
    comment: stay("in-dtd"),
    newline: stay("in-dtd"),
    "end-dtd": stay("before-root"),
  },
  "after-tag": {
    ...CONTENT_ROW,
    "block-ref": stay("after-tag"),
    comment: stay("after-tag"),
    newline: stay("after-tag"),
    "processing-instruction": stay("after-tag"),
  },
  "after-data": {
    ...CONTENT_ROW,
    "block-ref": stay("after-data"),
    comment: stay("after-data"),
    newline: stay("after-data"),
    "processing-instruction": stay("after-data"),
  },
  "after-root": {
    characters: stay("after-root"),
    comment: stay("after-root"),
    "inline-ref": stay("after-root"),
    "block-ref": stay("after-root"),
    newline: stay("after-root"),
    "processing-instruction": stay("after-root"),
    "end-document": stay("after-document"),
  },
  "after-document": {},
};

/**
 * Look up the transition for an event, or undefined if it is illegal.
 */
export function transitionFor(state: WriterState, event: WriterEvent): Transition | undefined {
  return TRANSITIONS[state][event];
}

/**
 * Callbacks the state machine uses while moving between states.
 */
export interface TransitionHost {
  /** Perform the formatting work for a transition. */
  perform(action: TransitionAction): void;
  /** Number of open elements, after the action has run. */
  depth(): number;
  /** True when the pending start tag is an empty root element, which closes as soon as it is written. */
  closesRoot(): boolean;
}

export class FormattingStateMachine {
  private current: WriterState = "before-document";

  get state(): WriterState {
    return this.current;
  }

  /**
   * Validate an event and move to the next state.
   *
   * The action runs while the old state is still current, so formatting
   * code can see where it came from.
   *
   * @returns The state before the event
   * @throws {IllegalEventError} if the event is not accepted in the current state
   */
  handle(event: WriterEvent, host: TransitionHost): WriterState {
    const previous = this.current;
    let transition = transitionFor(previous, event);

    if (transition === undefined) {
      throw new IllegalEventError(event, previous);
    }

    // Writing an empty root's start tag ends the root element, so the
    // event must also make sense after the root.
    if ((transition.action === "write-start-tag" || transition.action === "close-start-tag") && host.closesRoot()) {
      const afterRoot = transitionFor("after-root", event);

      if (afterRoot === undefined) {
        throw new IllegalEventError(event, previous);
      }

      transition = { next: afterRoot.next, action: transition.action };
    }

    if (transition.action !== undefined) {
      host.perform(transition.action);
    }

    if (transition.next === "by-depth") {
      this.current = host.depth() === 0 ? "after-root" : "after-tag";
    } else {
      this.current = transition.next;
    }

    return previous;
  }

  reset(): void {
    this.current = "before-document";
  }
}
