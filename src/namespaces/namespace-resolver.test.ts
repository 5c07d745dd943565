import { describe, expect, it } from "vitest";
import { XML_NS } from "./namespace-context";
import { NamespaceResolver } from "./namespace-resolver";

/**
 * Open an element scope the way the writer does.
 */
function enter(resolver: NamespaceResolver): void {
  resolver.context.pushContext();
}

function leave(resolver: NamespaceResolver): void {
  resolver.context.popContext();
}

describe("NamespaceResolver", () => {
  describe("without a namespace", () => {
    it("returns no prefix for an empty URI", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);

      expect(resolver.resolve("", "ns:foo", true)).toBe("");
      expect(resolver.resolve("", null, false)).toBe("");
      expect(resolver.context.getDeclaredPrefixes()).toEqual([]);
    });
  });

  describe("default namespace", () => {
    it("uses the default namespace for an element in it", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);
      resolver.context.declarePrefix("", "urn:d");
      enter(resolver);

      expect(resolver.resolve("urn:d", null, true)).toBe("");
      expect(resolver.context.getDeclaredPrefixes()).toEqual([]);
    });

    it("does not use the default namespace for an attribute", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);
      resolver.context.declarePrefix("", "urn:d");

      expect(resolver.resolve("urn:d", null, false)).toBe("__NS1");
    });

    it("declares the default namespace for an unprefixed element name", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);

      expect(resolver.resolve("urn:d", "elem", true)).toBe("");
      expect(resolver.context.getURI("")).toBe("urn:d");
    });

    it("does not rebind an active default namespace", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);
      resolver.resolve("urn:d", "elem", true);
      enter(resolver);

      expect(resolver.resolve("urn:other", "elem", true)).toBe("__NS1");
    });
  });

  describe("prefixes in scope", () => {
    it("reuses a prefix bound in an enclosing element", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);
      resolver.resolve("urn:a", "a:root", true);
      enter(resolver);

      expect(resolver.resolve("urn:a", "b:child", true)).toBe("a");
      expect(resolver.context.getDeclaredPrefixes()).toEqual([]);
    });

    it("resolves the xml namespace to the xml prefix", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);

      expect(resolver.resolve(XML_NS, "xml:lang", false)).toBe("xml");
      expect(resolver.context.getDeclaredPrefixes()).toEqual([]);
    });

    it("returns the same prefix twice within one scope", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);

      const first = resolver.resolve("urn:a", null, true);
      const second = resolver.resolve("urn:a", null, false);

      expect(first).toBe("__NS1");
      expect(second).toBe(first);
    });
  });

  describe("previously resolved prefixes", () => {
    it("reuses the prefix a URI was resolved to in a closed sibling", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);
      enter(resolver);
      expect(resolver.resolve("urn:a", "t1:one", true)).toBe("t1");
      leave(resolver);
      enter(resolver);

      expect(resolver.resolve("urn:a", null, true)).toBe("t1");
      expect(resolver.context.getDeclaredPrefixes()).toEqual(["t1"]);
    });

    it("skips a cached prefix that is now bound to another URI", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);
      enter(resolver);
      resolver.resolve("urn:a", "p:one", true);
      leave(resolver);
      resolver.context.declarePrefix("p", "urn:b");
      enter(resolver);

      expect(resolver.resolve("urn:a", null, true)).toBe("__NS1");
    });
  });

  describe("preferred prefixes", () => {
    it("uses the preferred prefix", () => {
      const resolver = new NamespaceResolver();
      resolver.addPreferredPrefix("t1", "urn:a");
      enter(resolver);

      expect(resolver.resolve("urn:a", "x:elem", true)).toBe("t1");
    });

    it("uses an empty preferred prefix as the default namespace for elements", () => {
      const resolver = new NamespaceResolver();
      resolver.addPreferredPrefix("", "urn:a");
      enter(resolver);

      expect(resolver.resolve("urn:a", null, true)).toBe("");
    });

    it("rejects an empty preferred prefix for attributes", () => {
      const resolver = new NamespaceResolver();
      resolver.addPreferredPrefix("", "urn:a");
      enter(resolver);

      expect(resolver.resolve("urn:a", "attr", false)).toBe("__NS1");
    });

    it("rejects a preferred prefix bound to a different URI", () => {
      const resolver = new NamespaceResolver();
      resolver.addPreferredPrefix("t1", "urn:a");
      enter(resolver);
      resolver.context.declarePrefix("t1", "urn:other");

      expect(resolver.resolve("urn:a", "q:name", true)).toBe("q");
    });
  });

  describe("qualified name prefixes", () => {
    it("uses the prefix of the qualified name", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);

      expect(resolver.resolve("urn:a", "A3:a3", false)).toBe("A3");
    });

    it("does not use the default namespace for an unprefixed attribute", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);

      expect(resolver.resolve("urn:a", "attr", false)).toBe("__NS1");
    });

    it("does not rebind a prefix already declared on the same element", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);
      resolver.resolve("urn:one", "p:x", false);

      expect(resolver.resolve("urn:two", "p:y", false)).toBe("__NS1");
    });

    it("does not rebind the xml prefix", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);

      expect(resolver.resolve("urn:a", "xml:bad", false)).toBe("__NS1");
    });
  });

  describe("synthesized prefixes", () => {
    it("numbers synthesized prefixes in increasing order", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);

      expect(resolver.resolve("urn:1", null, true)).toBe("__NS1");
      expect(resolver.resolve("urn:2", null, true)).toBe("__NS2");
      expect(resolver.resolve("urn:3", null, false)).toBe("__NS3");
    });

    it("skips numbers whose prefix is already declared", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);
      resolver.context.declarePrefix("__NS1", "urn:taken");

      expect(resolver.resolve("urn:a", null, true)).toBe("__NS2");
    });
  });

  describe("root declarations", () => {
    it("declares every root namespace in insertion order", () => {
      const resolver = new NamespaceResolver();
      resolver.addPreferredPrefix("t1", "urn:t1");
      resolver.addRootDeclaration("urn:t1");
      resolver.addRootDeclaration("urn:anon");
      enter(resolver);

      resolver.declareRootNamespaces();

      expect(resolver.context.getURI("t1")).toBe("urn:t1");
      expect(resolver.context.getURI("__NS1")).toBe("urn:anon");
    });
  });

  describe("reset()", () => {
    it("restarts numbering and forgets resolved prefixes", () => {
      const resolver = new NamespaceResolver();
      enter(resolver);
      resolver.resolve("urn:a", null, true);
      resolver.resolve("urn:b", "b:x", true);

      resolver.reset();
      enter(resolver);

      expect(resolver.resolve("urn:b", null, true)).toBe("__NS1");
    });

    it("keeps preferred prefixes", () => {
      const resolver = new NamespaceResolver();
      resolver.addPreferredPrefix("t1", "urn:a");

      resolver.reset();
      enter(resolver);

      expect(resolver.resolve("urn:a", null, true)).toBe("t1");
    });
  });
});
