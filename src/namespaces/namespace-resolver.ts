/**
 * Namespace prefix resolution.
 *
 * Picks the prefix an element or attribute is written with, declaring it
 * in the innermost namespace context when it is not already in scope.
 * Resolution never fails: when nothing else applies a prefix of the form
 * `__NS<n>` is synthesized.
 *
 * Candidates are tried in this order:
 * 1. No namespace URI: no prefix
 * 2. Element in the active default namespace: no prefix
 * 3. A prefix already bound to the URI in scope
 * 4. The prefix last used for the URI in this document
 * 5. The caller's preferred prefix for the URI
 * 6. The prefix of the qualified name (or the default namespace for an
 *    unprefixed element when none is active)
 * 7. A synthesized prefix
 */

import { DEFAULT_PREFIX, NamespaceContext } from "./namespace-context";

export const SYNTHETIC_PREFIX = "__NS";

export class NamespaceResolver {
  readonly context = new NamespaceContext();

  /** URI -> prefix last resolved for it */
  private readonly resolved = new Map<string, string>();
  /** URI -> prefix requested by the caller */
  private readonly preferred = new Map<string, string>();
  /** URIs declared on the root element, in insertion order */
  private readonly rootDeclarations = new Set<string>();

  private counter = 0;

  /**
   * Record the prefix to use for a namespace URI.
   * An empty prefix asks for the URI to be the default namespace.
   */
  addPreferredPrefix(prefix: string, uri: string): void {
    this.preferred.set(uri, prefix);
  }

  /**
   * Request that a namespace URI is declared on the root element.
   */
  addRootDeclaration(uri: string): void {
    this.rootDeclarations.add(uri);
  }

  /**
   * Resolve every root declaration into the innermost context.
   * Called once, right after the root element's context is pushed.
   */
  declareRootNamespaces(): void {
    for (const uri of this.rootDeclarations) {
      this.resolve(uri, null, true);
    }
  }

  /**
   * Find (and declare if needed) the prefix for a name.
   *
   * @param uri - Namespace URI, empty for no namespace
   * @param qName - Qualified name supplied by the caller, if any
   * @param isElement - Resolving an element name rather than an attribute
   * @returns The prefix, empty for none
   */
  resolve(uri: string, qName: string | null, isElement: boolean): string {
    if (uri === "") {
      return DEFAULT_PREFIX;
    }

    const defaultNS = this.context.getURI(DEFAULT_PREFIX);
    const haveDefaultNS = defaultNS !== undefined && defaultNS !== "";

    if (isElement && haveDefaultNS && uri === defaultNS) {
      return DEFAULT_PREFIX;
    }

    const inScope = this.context.getPrefix(uri);

    if (inScope !== undefined) {
      return inScope;
    }

    const usable = (prefix: string | undefined): boolean => {
      if (prefix === undefined) {
        return false;
      }

      // The default namespace can't name an attribute, and an active
      // default namespace can't be rebound.
      if (prefix === DEFAULT_PREFIX && (!isElement || haveDefaultNS)) {
        return false;
      }

      return this.context.getURI(prefix) === undefined;
    };

    let prefix = this.resolved.get(uri);

    if (!usable(prefix)) {
      prefix = this.preferred.get(uri);
    }

    if (!usable(prefix)) {
      prefix = qName ? this.prefixFromQName(qName, isElement, haveDefaultNS) : undefined;

      // Never rebind a prefix declared on this same element
      const local = prefix === undefined ? undefined : this.context.getLocalURI(prefix);

      if (local !== undefined && local !== uri) {
        prefix = undefined;
      }
    }

    // Reserved prefixes (xml, xmlns) can't be rebound
    if (prefix === undefined || !this.context.declarePrefix(prefix, uri)) {
      prefix = this.synthesize();
      this.context.declarePrefix(prefix, uri);
    }

    this.resolved.set(uri, prefix);

    return prefix;
  }

  /**
   * Forget everything tied to the current document.
   * Preferred prefixes and root declarations are configuration and stay.
   */
  reset(): void {
    this.context.reset();
    this.resolved.clear();
    this.counter = 0;
  }

  private prefixFromQName(qName: string, isElement: boolean, haveDefaultNS: boolean): string | undefined {
    const colon = qName.indexOf(":");

    if (colon === -1) {
      return isElement && !haveDefaultNS ? DEFAULT_PREFIX : undefined;
    }

    return qName.slice(0, colon);
  }

  private synthesize(): string {
    let prefix: string;

    do {
      prefix = `${SYNTHETIC_PREFIX}${++this.counter}`;
    } while (this.context.getURI(prefix) !== undefined);

    return prefix;
  }
}
