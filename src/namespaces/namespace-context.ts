/**
 * Scoped namespace prefix bindings.
 *
 * Each open element gets its own context. A context only records the
 * prefixes declared on that element; lookups walk outwards through the
 * enclosing contexts, so an inner declaration shadows an outer one.
 *
 * The `xml` prefix is permanently bound to the XML namespace, as XML
 * Namespaces §3 requires.
 */

export const XML_NS = "http://www.w3.org/XML/1998/namespace";
export const XMLNS_NS = "http://www.w3.org/2000/xmlns/";

/** The empty prefix, used for the default namespace. */
export const DEFAULT_PREFIX = "";

const RESERVED_PREFIXES = new Set(["xml", "xmlns"]);

export class NamespaceContext {
  private contexts: Map<string, string>[] = [new Map([["xml", XML_NS]])];

  /** Number of contexts pushed on top of the base context */
  get depth(): number {
    return this.contexts.length - 1;
  }

  /** Open a new context for an element. */
  pushContext(): void {
    this.contexts.push(new Map());
  }

  /**
   * Close the innermost context, discarding its declarations.
   * The base context is never removed.
   */
  popContext(): void {
    if (this.contexts.length > 1) {
      this.contexts.pop();
    }
  }

  /** Drop every context except the base one. */
  reset(): void {
    this.contexts.length = 1;
  }

  /**
   * Bind a prefix in the innermost context.
   *
   * @returns false if the prefix is reserved and was not bound
   */
  declarePrefix(prefix: string, uri: string): boolean {
    if (RESERVED_PREFIXES.has(prefix)) {
      return false;
    }

    this.current().set(prefix, uri);

    return true;
  }

  /**
   * Look up the URI bound to a prefix, or undefined if the prefix is unbound.
   */
  getURI(prefix: string): string | undefined {
    for (let i = this.contexts.length - 1; i >= 0; i--) {
      const uri = this.contexts[i]?.get(prefix);

      if (uri !== undefined) {
        return uri;
      }
    }

    return undefined;
  }

  /**
   * Look up a prefix in the innermost context only.
   */
  getLocalURI(prefix: string): string | undefined {
    return this.current().get(prefix);
  }

  /**
   * Find a non-empty prefix currently bound to `uri`.
   *
   * The default namespace is never returned here; callers check it
   * separately because it only applies to elements. A prefix that is
   * shadowed by an inner declaration for another URI does not count.
   */
  getPrefix(uri: string): string | undefined {
    for (let i = this.contexts.length - 1; i >= 0; i--) {
      const context = this.contexts[i];

      if (context === undefined) {
        continue;
      }

      for (const [prefix, boundUri] of context) {
        if (prefix !== DEFAULT_PREFIX && boundUri === uri && this.getURI(prefix) === uri) {
          return prefix;
        }
      }
    }

    return undefined;
  }

  /**
   * Prefixes declared in the innermost context, in code unit order.
   */
  getDeclaredPrefixes(): string[] {
    if (this.contexts.length === 1) {
      return [];
    }

    return [...this.current().keys()].sort();
  }

  private current(): Map<string, string> {
    const context = this.contexts[this.contexts.length - 1];

    if (context === undefined) {
      throw new Error("Namespace context stack is empty");
    }

    return context;
  }
}
