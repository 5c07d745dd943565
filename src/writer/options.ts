/**
 * Zod schema for writer configuration.
 *
 * Every option can also be changed later through the writer's setters;
 * changes apply from the next write onwards.
 */

import { z } from "zod";

import { XmlConfigError } from "./errors";

/**
 * Line separators the writer can emit.
 */
export const LineSeparatorSchema = z.enum(["\n", "\r\n", "\r"]);
export type LineSeparator = z.infer<typeof LineSeparatorSchema>;

/**
 * XML version numbers (XML 1.0 §2.8 VersionNum).
 */
export const XmlVersionSchema = z.string().regex(/^1\.[0-9]+$/, "XML version must look like 1.x");

export const XmlWriterOptionsSchema = z
  .object({
    /** Indent nested elements and put them on their own lines (default: false) */
    prettyPrint: z.boolean().optional(),
    /** One level of indentation (default: four spaces) */
    indent: z.string().optional(),
    /** Constant prefix for every indented line (default: "") */
    offset: z.string().optional(),
    /** One attribute per line (default: false) */
    attrPerLine: z.boolean().optional(),
    /** Write `<e/>` instead of `<e></e>` (default: true) */
    minimizeEmpty: z.boolean().optional(),
    /** Skip attributes defaulted from a DTD (default: true) */
    specifiedAttributesOnly: z.boolean().optional(),
    /** Write non-ASCII characters as references (default: false) */
    escapeNonAscii: z.boolean().optional(),
    /** Decimal rather than hexadecimal references (default: false) */
    useDecimal: z.boolean().optional(),
    /** Version in the XML declaration (default: "1.0") */
    xmlVersion: XmlVersionSchema.optional(),
    /** Standalone flag used by startDocument() without arguments (default: true) */
    standalone: z.boolean().optional(),
    /** Escape text and attribute values at all (default: true) */
    escaping: z.boolean().optional(),
    /** Newline sequence (default: "\n") */
    lineSeparator: LineSeparatorSchema.optional(),
  })
  .strict();

export type XmlWriterOptions = z.infer<typeof XmlWriterOptionsSchema>;

export type ResolvedWriterOptions = Required<XmlWriterOptions>;

export const DEFAULT_WRITER_OPTIONS: Readonly<ResolvedWriterOptions> = {
  prettyPrint: false,
  indent: "    ",
  offset: "",
  attrPerLine: false,
  minimizeEmpty: true,
  specifiedAttributesOnly: true,
  escapeNonAscii: false,
  useDecimal: false,
  xmlVersion: "1.0",
  standalone: true,
  escaping: true,
  lineSeparator: "\n",
};

/**
 * Validate writer options.
 *
 * @throws {XmlConfigError} describing every invalid option
 */
export function parseWriterOptions(input: unknown): XmlWriterOptions {
  const result = XmlWriterOptionsSchema.safeParse(input ?? {});

  if (!result.success) {
    const details = result.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");

    throw new XmlConfigError(`Invalid writer options: ${details}`);
  }

  return result.data;
}
