// Character escaping for text content of XML parts.

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

const ENTITY_RE = /&(?:#(\d+)|#x([0-9a-fA-F]+)|([a-z]+));/g;

export function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

/**
 * Decode the predefined entities and character references. One pass, so
 * `&amp;lt;` becomes `&lt;` and not `<`. Anything that is not a known
 * entity or a valid code point is left as written.
 */
export function unescapeXml(text: string): string {
  return text.replace(ENTITY_RE, (entity, dec: string | undefined, hex: string | undefined, name: string | undefined) => {
    if (name !== undefined) {
      return Object.prototype.hasOwnProperty.call(NAMED_ENTITIES, name) ? NAMED_ENTITIES[name] : entity;
    }
    const codePoint = dec !== undefined ? parseInt(dec, 10) : parseInt(hex ?? '', 16);
    return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : entity;
  });
}
