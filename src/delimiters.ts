/** Single code points that open and close a placeholder. */
export interface Delimiters {
  open: string;
  close: string;
}

export const DEFAULT_DELIMITERS: Readonly<Delimiters> = Object.freeze({
  open: '{',
  close: '}',
});

// Word always writes these as entities, so they never appear literally in run text
const ESCAPED_IN_TEXT = new Set(['<', '>', '&']);

function isSingleCodePoint(s: string): boolean {
  return Array.from(s).length === 1;
}

/**
 * Build a delimiter pair, rejecting anything that is not exactly one
 * code point per side or that XML text escapes.
 */
export function createDelimiters(open: string, close: string): Readonly<Delimiters> {
  if (!isSingleCodePoint(open)) {
    throw new Error(`Open delimiter must be a single character, got "${open}"`);
  }
  if (!isSingleCodePoint(close)) {
    throw new Error(`Close delimiter must be a single character, got "${close}"`);
  }
  for (const d of [open, close]) {
    if (ESCAPED_IN_TEXT.has(d)) {
      throw new Error(`Delimiter "${d}" is escaped in document text and cannot be used`);
    }
  }
  if (open === close) {
    throw new Error(`Open and close delimiters must differ, got "${open}" for both`);
  }
  return Object.freeze({ open, close });
}

export function isDelimited(s: string, delimiters: Delimiters = DEFAULT_DELIMITERS): boolean {
  const chars = Array.from(s);
  if (chars.length === 0) return false;
  return chars[0] === delimiters.open && chars[chars.length - 1] === delimiters.close;
}

/** Wrap `s` in the delimiters unless it already is. */
export function addDelimiters(s: string, delimiters: Delimiters = DEFAULT_DELIMITERS): string {
  if (isDelimited(s, delimiters)) return s;
  return delimiters.open + s + delimiters.close;
}

/**
 * Strip delimiters from a delimited placeholder. Any run of delimiter
 * characters at either end is removed, so `{{key}}` becomes `key`.
 */
export function removeDelimiters(s: string, delimiters: Delimiters = DEFAULT_DELIMITERS): string {
  if (!isDelimited(s, delimiters)) return s;
  const chars = Array.from(s);
  const isDelimiterChar = (c: string) => c === delimiters.open || c === delimiters.close;
  let start = 0;
  let end = chars.length;
  while (start < end && isDelimiterChar(chars[start])) start++;
  while (end > start && isDelimiterChar(chars[end - 1])) end--;
  return chars.slice(start, end).join('');
}
