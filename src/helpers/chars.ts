/**
 * XML character constants (XML 1.0 §2.2, §2.4)
 *
 * Code unit values used by the escaper and the layout code.
 */

// Line endings
export const LF = 0x0a; // Line Feed
export const CR = 0x0d; // Carriage Return

// Whitespace
export const SPACE = 0x20; // Space
export const TAB = 0x09; // Tab

// Markup
export const AMPERSAND = 0x26; // &
export const LESS_THAN = 0x3c; // <
export const GREATER_THAN = 0x3e; // >
export const DOUBLE_QUOTE = 0x22; // "
export const APOSTROPHE = 0x27; // '

/** Last printable ASCII character (~) */
export const LAST_PRINTABLE_ASCII = 0x7e;

// UTF-16 surrogates
export const HIGH_SURROGATE_START = 0xd800;
export const HIGH_SURROGATE_END = 0xdbff;
export const LOW_SURROGATE_START = 0xdc00;
export const LOW_SURROGATE_END = 0xdfff;

/**
 * Predefined entity references for the markup characters.
 */
export const NAMED_ENTITIES: ReadonlyMap<number, string> = new Map([
  [AMPERSAND, "&amp;"],
  [LESS_THAN, "&lt;"],
  [GREATER_THAN, "&gt;"],
  [DOUBLE_QUOTE, "&quot;"],
  [APOSTROPHE, "&apos;"],
]);

/**
 * Control characters that XML allows verbatim in content.
 */
export const ALLOWED_CONTROLS = new Set([TAB, LF, CR]);

/**
 * Check if a code unit is a control character that must not appear
 * verbatim (C0 range, excluding tab, LF and CR).
 */
export function isRestrictedControl(code: number): boolean {
  return code < SPACE && !ALLOWED_CONTROLS.has(code);
}

/**
 * Check if a code unit starts a surrogate pair.
 */
export function isHighSurrogate(code: number): boolean {
  return code >= HIGH_SURROGATE_START && code <= HIGH_SURROGATE_END;
}

/**
 * Check if a code unit ends a surrogate pair.
 */
export function isLowSurrogate(code: number): boolean {
  return code >= LOW_SURROGATE_START && code <= LOW_SURROGATE_END;
}
