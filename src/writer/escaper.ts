/**
 * XML character escaping.
 *
 * Markup characters become predefined entities, restricted control
 * characters (and, on request, everything past printable ASCII) become
 * numeric character references. Tab, CR and LF always pass through so
 * that formatting survives.
 *
 * Characters outside the Basic Multilingual Plane are written as one
 * reference to the full code point, never as two surrogate references.
 */

import {
  APOSTROPHE,
  DOUBLE_QUOTE,
  isHighSurrogate,
  isLowSurrogate,
  isRestrictedControl,
  LAST_PRINTABLE_ASCII,
  NAMED_ENTITIES,
} from "#src/helpers/chars";

export interface EscaperOptions {
  /** Escape every character above 0x7E (default: false) */
  escapeNonAscii?: boolean;
  /** Write `&#N;` instead of `&#xH;` (default: false) */
  useDecimal?: boolean;
  /** When false, text passes through untouched (default: true) */
  enabled?: boolean;
}

/**
 * Format a numeric character reference.
 *
 * @example
 * ```ts
 * numericReference(0x1f600); // "&#x1F600;"
 * numericReference(0x1f600, true); // "&#128512;"
 * ```
 */
export function numericReference(codePoint: number, useDecimal = false): string {
  return useDecimal ? `&#${codePoint};` : `&#x${codePoint.toString(16).toUpperCase()};`;
}

export class Escaper {
  escapeNonAscii: boolean;
  useDecimal: boolean;
  enabled: boolean;

  constructor(options: EscaperOptions = {}) {
    this.escapeNonAscii = options.escapeNonAscii ?? false;
    this.useDecimal = options.useDecimal ?? false;
    this.enabled = options.enabled ?? true;
  }

  /**
   * Escape character data. Quote characters are left alone.
   */
  escape(text: string): string {
    return this.enabled ? this.run(text, false) : text;
  }

  /**
   * Escape a value and surround it with double quotes.
   * Both quote characters are escaped inside the value.
   */
  quote(text: string): string {
    return `"${this.enabled ? this.run(text, true) : text}"`;
  }

  private run(text: string, inQuotes: boolean): string {
    let out = "";
    let start = 0;

    for (let i = 0; i < text.length; i++) {
      const code = text.charCodeAt(i);
      let replacement: string | undefined;
      let width = 1;

      if (code === DOUBLE_QUOTE || code === APOSTROPHE) {
        replacement = inQuotes ? NAMED_ENTITIES.get(code) : undefined;
      } else if (NAMED_ENTITIES.has(code)) {
        replacement = NAMED_ENTITIES.get(code);
      } else if (isRestrictedControl(code)) {
        replacement = numericReference(code, this.useDecimal);
      } else if (this.escapeNonAscii && code > LAST_PRINTABLE_ASCII) {
        const next = i + 1 < text.length ? text.charCodeAt(i + 1) : -1;

        if (isHighSurrogate(code) && isLowSurrogate(next)) {
          const codePoint = text.codePointAt(i) ?? code;

          replacement = numericReference(codePoint, this.useDecimal);
          width = 2;
        } else {
          replacement = numericReference(code, this.useDecimal);
        }
      }

      if (replacement !== undefined) {
        out += text.slice(start, i) + replacement;
        i += width - 1;
        start = i + 1;
      }
    }

    return start === 0 ? text : out + text.slice(start);
  }
}
