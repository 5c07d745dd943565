/**
 * Stack of currently open elements.
 *
 * Frames live in an array that only grows; popping just lowers the depth,
 * and a later push reuses the frame (and its attribute list) in that slot.
 */

import { type AttributeInit, XmlAttributes } from "#src/attributes/xml-attributes";

import type { WriterState } from "./state-machine";

/**
 * An open element.
 */
export interface ElementFrame {
  uri: string;
  localName: string;
  qName: string;
  /** Attributes buffered until the start tag is written */
  readonly attrs: XmlAttributes;
  /** Opened with emptyElement(): closes as soon as its start tag is written */
  isEmpty: boolean;
  /** Writer state when the element was opened */
  containingState: WriterState;
}

export interface ElementInit {
  uri: string;
  localName: string;
  qName: string;
  attrs?: Iterable<AttributeInit>;
  isEmpty: boolean;
  containingState: WriterState;
}

export class ElementStack {
  private readonly frames: ElementFrame[] = [];
  private size = 0;

  /** Number of open elements (0 outside the root element) */
  get depth(): number {
    return this.size;
  }

  /**
   * Open an element. The attribute input is copied.
   */
  push(init: ElementInit): ElementFrame {
    let frame = this.frames[this.size];

    if (frame === undefined) {
      frame = {
        uri: "",
        localName: "",
        qName: "",
        attrs: new XmlAttributes(),
        isEmpty: false,
        containingState: init.containingState,
      };
      this.frames.push(frame);
    }

    frame.uri = init.uri;
    frame.localName = init.localName;
    frame.qName = init.qName;
    frame.isEmpty = init.isEmpty;
    frame.containingState = init.containingState;
    frame.attrs.setAttributes(init.attrs ?? []);

    this.size++;

    return frame;
  }

  /**
   * The innermost open element.
   *
   * @throws {Error} if no element is open
   */
  peek(): ElementFrame {
    const frame = this.size > 0 ? this.frames[this.size - 1] : undefined;

    if (frame === undefined) {
      throw new Error("No element is open");
    }

    return frame;
  }

  /**
   * Close the innermost element.
   *
   * @throws {Error} if no element is open
   */
  pop(): ElementFrame {
    const frame = this.peek();

    this.size--;

    return frame;
  }

  clear(): void {
    this.size = 0;
  }
}
