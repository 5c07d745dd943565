/**
 * Document type declaration markup.
 *
 * Entity and notation declarations are plain value objects; the
 * formatting functions turn them into internal-subset markup.
 */

/**
 * Internal (parsed) entity: `<!ENTITY name "value">`.
 */
export interface InternalEntity {
  readonly name: string;
  readonly value: string;
}

/**
 * External entity: `<!ENTITY name SYSTEM "sys">` or
 * `<!ENTITY name PUBLIC "pub" "sys">`, optionally unparsed (`NDATA`).
 */
export interface ExternalEntity {
  readonly name: string;
  readonly publicId?: string | null;
  readonly systemId: string | null;
  /** Notation of an unparsed entity */
  readonly notationName?: string | null;
}

export type EntityDeclaration = InternalEntity | ExternalEntity;

export interface NotationDeclaration {
  readonly name: string;
  readonly publicId?: string | null;
  readonly systemId?: string | null;
}

export function isInternalEntity(entity: EntityDeclaration): entity is InternalEntity {
  return "value" in entity;
}

/**
 * Create an internal entity declaration.
 */
export function internalEntity(name: string, value: string): InternalEntity {
  return { name, value };
}

/**
 * Create an external entity declaration.
 */
export function externalEntity(
  name: string,
  publicId: string | null,
  systemId: string | null,
  notationName: string | null = null,
): ExternalEntity {
  return { name, publicId, systemId, notationName };
}

/**
 * Opening of a DOCTYPE declaration, without the closing `>`.
 *
 * @example
 * ```ts
 * formatDoctypeOpen("html", "-//W3C//DTD XHTML 1.0 Strict//EN", "xhtml1-strict.dtd");
 * // '<!DOCTYPE html PUBLIC "-//W3C//DTD XHTML 1.0 Strict//EN" "xhtml1-strict.dtd"'
 * ```
 */
export function formatDoctypeOpen(name: string, publicId: string | null, systemId: string | null): string {
  let out = `<!DOCTYPE ${name}`;

  if (publicId !== null) {
    out += ` PUBLIC "${publicId}"`;
  } else if (systemId !== null) {
    out += " SYSTEM";
  }

  if (systemId !== null) {
    out += ` "${systemId}"`;
  }

  return out;
}

export function formatEntityDecl(entity: EntityDeclaration): string {
  if (isInternalEntity(entity)) {
    return `<!ENTITY ${entity.name} "${entity.value}">`;
  }

  const systemId = entity.systemId ?? "";
  let out = `<!ENTITY ${entity.name}`;

  out +=
    entity.publicId != null
      ? ` PUBLIC "${entity.publicId}" "${systemId}"`
      : ` SYSTEM "${systemId}"`;

  if (entity.notationName != null) {
    out += ` NDATA ${entity.notationName}`;
  }

  return `${out}>`;
}

export function formatNotationDecl(notation: NotationDeclaration): string {
  const { publicId, systemId } = notation;
  let out = `<!NOTATION ${notation.name}`;

  if (publicId != null && systemId != null) {
    out += ` PUBLIC "${publicId}" "${systemId}"`;
  } else if (publicId != null) {
    out += ` PUBLIC "${publicId}"`;
  } else if (systemId != null) {
    out += ` SYSTEM "${systemId}"`;
  }

  return `${out}>`;
}
