import { describe, expect, it } from "vitest";
import { XmlConfigError } from "./errors";
import { DEFAULT_WRITER_OPTIONS, parseWriterOptions } from "./options";

describe("parseWriterOptions", () => {
  it("accepts an empty object", () => {
    expect(parseWriterOptions({})).toEqual({});
  });

  it("treats undefined as no options", () => {
    expect(parseWriterOptions(undefined)).toEqual({});
  });

  it("accepts valid options", () => {
    const options = parseWriterOptions({
      prettyPrint: true,
      indent: "\t",
      xmlVersion: "1.1",
      lineSeparator: "\r\n",
    });

    expect(options).toEqual({ prettyPrint: true, indent: "\t", xmlVersion: "1.1", lineSeparator: "\r\n" });
  });

  it("rejects a malformed XML version", () => {
    expect(() => parseWriterOptions({ xmlVersion: "2" })).toThrow(XmlConfigError);
    expect(() => parseWriterOptions({ xmlVersion: "2" })).toThrow(
      "Invalid writer options: xmlVersion: XML version must look like 1.x",
    );
  });

  it("rejects wrong types", () => {
    expect(() => parseWriterOptions({ prettyPrint: "yes" })).toThrow(/prettyPrint/);
  });

  it("rejects unknown options", () => {
    expect(() => parseWriterOptions({ pretty: true })).toThrow(XmlConfigError);
  });

  it("rejects unsupported line separators", () => {
    expect(() => parseWriterOptions({ lineSeparator: "\n\n" })).toThrow(/lineSeparator/);
  });
});

describe("DEFAULT_WRITER_OPTIONS", () => {
  it("minimizes empty elements and indents with four spaces", () => {
    expect(DEFAULT_WRITER_OPTIONS.minimizeEmpty).toBe(true);
    expect(DEFAULT_WRITER_OPTIONS.indent).toBe("    ");
    expect(DEFAULT_WRITER_OPTIONS.standalone).toBe(true);
  });
});
