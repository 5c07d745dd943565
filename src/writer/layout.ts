/**
 * Whitespace placement for pretty-printed output.
 *
 * Pure functions of the layout settings and the current nesting depth.
 * Depth counts open elements, so the root element is at depth 1 and
 * content directly inside it at depth 2.
 */

import type { LineSeparator } from "./options";
import type { WriterState } from "./state-machine";

export interface LayoutSettings {
  prettyPrint: boolean;
  /** One level of indentation */
  indent: string;
  /** Constant prefix of every indented line */
  offset: string;
  /** Put each attribute and namespace declaration on its own line */
  attrPerLine: boolean;
  lineSeparator: LineSeparator;
}

/**
 * Indentation for a line at `depth`: `offset + indent × (depth − 1 + levelAdjust)`.
 */
export function indentation(settings: LayoutSettings, depth: number, levelAdjust = 0): string {
  const level = Math.max(0, depth - 1 + levelAdjust);

  return settings.offset + settings.indent.repeat(level);
}

/**
 * Line break and indentation for a line at `depth`.
 */
export function lineBreak(settings: LayoutSettings, depth: number, levelAdjust = 0): string {
  return settings.lineSeparator + indentation(settings, depth, levelAdjust);
}

/**
 * Whitespace before a start tag.
 *
 * Nested elements start on their own line unless they follow character
 * data, which would change the text content.
 */
export function beforeStartTag(settings: LayoutSettings, depth: number, containingState: WriterState): string {
  if (settings.prettyPrint && containingState !== "after-data" && depth > 1) {
    return lineBreak(settings, depth);
  }

  return "";
}

/**
 * Whitespace before an end tag, given the state the writer is leaving.
 */
export function beforeEndTag(settings: LayoutSettings, depth: number, state: WriterState): string {
  if (settings.prettyPrint && state !== "after-data") {
    return lineBreak(settings, depth);
  }

  return "";
}

/**
 * Separator written before each attribute or namespace declaration.
 */
export function beforeAttribute(settings: LayoutSettings, depth: number): string {
  return settings.attrPerLine ? lineBreak(settings, depth) + settings.indent : " ";
}

/**
 * Whitespace before the `>` or `/>` that ends a start tag.
 */
export function beforeTagClose(settings: LayoutSettings, depth: number, attributeCount: number): string {
  return settings.attrPerLine && attributeCount > 0 ? lineBreak(settings, depth) : "";
}

/**
 * Indentation following an explicit newline, one level deeper than the
 * current element so the next content lines up with its children.
 * CDATA content is never indented.
 */
export function afterNewline(settings: LayoutSettings, depth: number, state: WriterState): string {
  return settings.prettyPrint && state !== "in-cdata" ? indentation(settings, depth, 1) : "";
}

/**
 * Padding around a block-level entity reference.
 */
export function aroundBlockRef(settings: LayoutSettings, depth: number): string {
  return settings.prettyPrint ? lineBreak(settings, depth, 1) : "";
}
