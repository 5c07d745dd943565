/**
 * Ordered attribute lists.
 *
 * Attributes are buffered on the open element until its start tag is
 * written, so the list stays mutable until then.
 */

import { XmlConfigError } from "#src/writer/errors";

/** Attribute type used when none is given (XML 1.0 §3.3.1) */
export const CDATA_TYPE = "CDATA";

export type AttributeValue = string | number | boolean;

/**
 * A single buffered attribute.
 */
export interface Attribute {
  /** Namespace URI, empty for none */
  uri: string;
  /** Local name, may be empty when only the qualified name is known */
  localName: string;
  /** Qualified name, may be empty when only the local name is known */
  qName: string;
  /** Attribute type (CDATA, ID, NMTOKEN, ...) */
  type: string;
  value: string;
  /** False when the value was defaulted from a DTD rather than written */
  specified: boolean;
}

/**
 * Input accepted wherever an attribute is added.
 */
export interface AttributeInit {
  uri?: string;
  localName?: string;
  qName?: string;
  type?: string;
  value: AttributeValue;
  specified?: boolean;
}

/**
 * Normalize attribute input, filling in defaults.
 *
 * @throws {XmlConfigError} if the attribute has no name
 */
export function toAttribute(init: AttributeInit): Attribute {
  const localName = init.localName ?? "";
  const qName = init.qName ?? "";

  if (localName === "" && qName === "") {
    throw new XmlConfigError("Attribute requires a local name or a qualified name");
  }

  return {
    uri: init.uri ?? "",
    localName,
    qName,
    type: init.type ?? CDATA_TYPE,
    value: String(init.value),
    specified: init.specified ?? true,
  };
}

/**
 * The name an attribute is written under when it has no namespace.
 */
export function attributeName(attr: Pick<Attribute, "localName" | "qName">): string {
  return attr.qName !== "" ? attr.qName : attr.localName;
}

/**
 * Mutable, ordered list of attributes.
 *
 * @example
 * ```ts
 * const attrs = new XmlAttributes("id", "main", "class", "wide");
 * attrs.addAttribute("width", 80);
 * writer.startElement("div", attrs);
 * ```
 */
export class XmlAttributes implements Iterable<Attribute> {
  private items: Attribute[] = [];

  /**
   * Create a list from alternating name/value arguments.
   *
   * @throws {XmlConfigError} if an odd number of arguments is given
   */
  constructor(...nameValuePairs: string[]) {
    if (nameValuePairs.length % 2 !== 0) {
      throw new XmlConfigError("An even number of arguments must be specified (i.e. name, value)");
    }

    for (let i = 0; i < nameValuePairs.length; i += 2) {
      this.addAttribute(nameValuePairs[i] ?? "", nameValuePairs[i + 1] ?? "");
    }
  }

  /**
   * Build a list from any iterable of attribute input.
   */
  static from(attrs: Iterable<AttributeInit>): XmlAttributes {
    const list = new XmlAttributes();

    for (const attr of attrs) {
      list.add(attr);
    }

    return list;
  }

  get length(): number {
    return this.items.length;
  }

  /**
   * Get the attribute at an index, or undefined if out of range.
   */
  at(index: number): Attribute | undefined {
    return this.items[index];
  }

  /**
   * Index of the first attribute written under `name`, or -1.
   */
  indexOf(name: string): number {
    return this.items.findIndex(attr => attributeName(attr) === name);
  }

  /**
   * Append an attribute.
   */
  add(init: AttributeInit): this {
    this.items.push(toAttribute(init));

    return this;
  }

  /**
   * Append an attribute that has no namespace.
   */
  addAttribute(name: string, value: AttributeValue): this {
    return this.add({ qName: name, value });
  }

  /**
   * Replace the whole list with copies of `attrs`.
   */
  setAttributes(attrs: Iterable<AttributeInit>): this {
    const replacement = [...attrs].map(toAttribute);

    this.items = replacement;

    return this;
  }

  clear(): void {
    this.items = [];
  }

  [Symbol.iterator](): Iterator<Attribute> {
    return this.items[Symbol.iterator]();
  }
}
