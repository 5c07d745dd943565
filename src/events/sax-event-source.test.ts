import type { Attribute } from "#src/attributes/xml-attributes";
import { StringSink } from "#src/io/xml-sink";
import { loadFixture, RecordingHandler } from "#src/test-utils";
import { XmlConfigError, XmlParseError } from "#src/writer/errors";
import { XmlWriter } from "#src/writer/xml-writer";
import { describe, expect, it, vi } from "vitest";
import { parseDoctype, SaxEventSource } from "./sax-event-source";

describe("parseDoctype", () => {
  it("parses a bare name", () => {
    expect(parseDoctype(" html")).toEqual({ name: "html", publicId: null, systemId: null, internalSubset: null });
  });

  it("parses a public identifier", () => {
    expect(parseDoctype(` doc PUBLIC "-//Example//DTD Doc//EN" "doc.dtd"`)).toEqual({
      name: "doc",
      publicId: "-//Example//DTD Doc//EN",
      systemId: "doc.dtd",
      internalSubset: null,
    });
  });

  it("parses a system identifier and internal subset", () => {
    expect(parseDoctype(` doc SYSTEM 'doc.dtd' [<!ENTITY e "v">]`)).toEqual({
      name: "doc",
      publicId: null,
      systemId: "doc.dtd",
      internalSubset: `[<!ENTITY e "v">]`,
    });
  });

  it("returns null without a name", () => {
    expect(parseDoctype("  ")).toBeNull();
  });
});

describe("SaxEventSource", () => {
  it("reports events to its handler", () => {
    const source = new SaxEventSource();
    const handler = new RecordingHandler();

    source.setHandler(handler);
    source.parse(`<?xml version="1.0"?><r a="1">hi<!--c--><![CDATA[x]]><?go now?></r>`);

    expect(handler.events).toEqual([
      "startDocument",
      "startElement r a=1",
      "characters hi",
      "comment c",
      "startCdata",
      "characters x",
      "endCdata",
      "processingInstruction go now",
      "endElement r",
      "endDocument",
    ]);
  });

  it("reports namespaces through URIs instead of attributes", () => {
    const source = new SaxEventSource();
    const handler = new RecordingHandler();

    source.setHandler(handler);
    source.parse(`<a:root xmlns:a="urn:example:a" a:id="7"/>`);

    expect(handler.events).toEqual([
      "startDocument",
      "startElement {urn:example:a}root a:id=7",
      "endElement {urn:example:a}root",
      "endDocument",
    ]);
  });

  it("reports a DOCTYPE and warns about a dropped internal subset", () => {
    const onWarning = vi.fn();
    const source = new SaxEventSource({ onWarning });
    const handler = new RecordingHandler();

    source.setHandler(handler);
    source.parse(`<!DOCTYPE doc [<!ELEMENT doc EMPTY>]><doc/>`);

    expect(handler.events).toContain("startDtd doc - -");
    expect(onWarning).toHaveBeenCalledWith("Dropping the internal DTD subset of doc");
  });

  it("throws XmlParseError for malformed input", () => {
    const source = new SaxEventSource();

    source.setHandler(new RecordingHandler());

    expect(() => source.parse("<root><b></root>")).toThrow(XmlParseError);
  });

  it("requires a handler", () => {
    expect(() => new SaxEventSource().parse("<r/>")).toThrow(XmlConfigError);
  });
});

describe("XmlWriter as a filter", () => {
  it("rewrites a parsed document", async () => {
    const out = new StringSink();
    const writer = new XmlWriter({ output: out, parent: new SaxEventSource() });

    writer.parse(await loadFixture("catalog.xml"));

    expect(out.toString()).toBe(
      `<?xml version="1.0" standalone="yes"?>\n` +
        `<!DOCTYPE catalog SYSTEM "catalog.dtd">\n\n` +
        `<catalog xmlns="urn:example:catalog"><!-- sample -->` +
        `<item id="1" x:tag="new" xmlns:x="urn:example:extra">` +
        `<name>Widget &amp; Co</name><note><![CDATA[<fragile>]]></note></item>` +
        `<?render fast?><item id="2"/></catalog>\n`,
    );
  });

  it("relays every event downstream once", () => {
    const handler = new RecordingHandler();
    const writer = new XmlWriter({ parent: new SaxEventSource(), handler });

    writer.parse(`<r a="1">hi<!--c--></r>`);

    expect(handler.events).toEqual([
      "startDocument",
      "startElement r a=1",
      "characters hi",
      "comment c",
      "endElement r",
      "endDocument",
    ]);
    expect(String(writer.getOutput())).toBe(`<?xml version="1.0" standalone="yes"?>\n<r a="1">hi<!--c--></r>\n`);
  });

  it("gives the downstream handler attributes it can keep", () => {
    const kept: Iterable<Attribute>[] = [];
    const handler = new RecordingHandler();
    const writer = new XmlWriter({ parent: new SaxEventSource(), handler });

    handler.startElement = (_name, attributes) => {
      kept.push(attributes);
    };
    writer.parse(`<r><a x="1"/><b y="2"/></r>`);

    expect(kept.map(attrs => [...attrs].map(attr => `${attr.qName}=${attr.value}`))).toEqual([[], ["x=1"], ["y=2"]]);
  });

  it("does not show attributes added after the start event to the handler", () => {
    let kept: Iterable<Attribute> = [];
    const handler = new RecordingHandler();
    const writer = new XmlWriter({ handler });

    handler.startElement = (_name, attributes) => {
      kept = attributes;
    };
    writer.startDocument(null, true, true).startElement("e", [{ localName: "first", value: "1" }]);
    writer.addAttribute("second", "2").endElement();

    expect([...kept].map(attr => attr.localName)).toEqual(["first"]);
    expect(String(writer.getOutput())).toBe(`<e first="1" second="2"/>`);
  });

  it("relays events written directly", () => {
    const handler = new RecordingHandler();
    const writer = new XmlWriter();

    writer.setHandler(handler);
    writer.startDocument(null, true, true).emptyElement("e").endDocument();

    expect(handler.events).toEqual(["startDocument", "startElement e", "endElement e", "endDocument"]);
  });

  it("requires a parent source to parse", () => {
    expect(() => new XmlWriter().parse("<r/>")).toThrow(XmlConfigError);
  });
});
