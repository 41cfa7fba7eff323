import { DEFAULT_DELIMITERS, Delimiters } from './delimiters';
import { Placeholder } from './placeholder';
import { escapeXml } from './xml';

export type PlaceholderValue = string | number | boolean;

/** Replacement values keyed by placeholder key, without delimiters. */
export type PlaceholderMap = Record<string, PlaceholderValue>;

export interface ReplaceResult {
  bytes: Uint8Array;
  /** Keys that were substituted, once per placeholder occurrence. */
  replaced: string[];
  warnings: string[];
}

interface Edit {
  start: number;
  end: number;
  text: string;
}

const PRESERVE_SPACE = ' xml:space="preserve"';

/**
 * Zero-length edit that adds `xml:space="preserve"` to the `<w:t>` open
 * tag ending at `textStart`, or undefined when the tag already has an
 * `xml:space` attribute. Attribute values cannot hold a literal `<`, so
 * the tag starts at the last `<` before the text.
 */
function preserveSpaceEdit(docBytes: Uint8Array, textStart: number): Edit | undefined {
  if (textStart <= 0) return undefined;
  const tagStart = docBytes.lastIndexOf(0x3c, textStart - 1);
  if (tagStart < 0) return undefined;
  const tag = Buffer.from(docBytes.buffer, docBytes.byteOffset + tagStart, textStart - tagStart).toString('latin1');
  if (/\sxml:space\s*=/.test(tag)) return undefined;
  const at = textStart - 1;
  return { start: at, end: at, text: PRESERVE_SPACE };
}

function overlaps(a: Edit, b: Edit): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Substitute values into the part bytes. The first fragment of each
 * placeholder receives the value and the remaining fragments are emptied,
 * which keeps the first run's formatting for the whole value.
 */
export function replacePlaceholders(
  docBytes: Uint8Array,
  placeholders: readonly Placeholder[],
  values: PlaceholderMap,
  delimiters: Delimiters = DEFAULT_DELIMITERS
): ReplaceResult {
  const edits: Edit[] = [];
  const replaced: string[] = [];
  const warnings: string[] = [];
  const preserved = new Set<number>();

  for (const placeholder of placeholders) {
    const text = placeholder.text(docBytes);
    if (!placeholder.valid()) {
      warnings.push(`Skipping placeholder ${text}: fragment positions are out of range`);
      continue;
    }
    const key = placeholder.key(docBytes, delimiters);
    if (!Object.prototype.hasOwnProperty.call(values, key)) continue;

    const value = String(values[key]);
    const pending = placeholder.fragments.map((f, i): Edit => ({
      start: f.run.textStart + f.position.start,
      end: f.run.textStart + f.position.end,
      text: i === 0 ? escapeXml(value) : '',
    }));
    // Nested pairs close inner first, so the inner placeholder wins
    if (pending.some(p => edits.some(e => overlaps(e, p)))) {
      warnings.push(`Skipping placeholder ${text}: it overlaps a placeholder that was already replaced`);
      continue;
    }
    edits.push(...pending);
    replaced.push(key);

    // Word drops leading and trailing spaces from text without xml:space="preserve"
    const textStart = placeholder.fragments[0].run.textStart;
    if (/^\s|\s$/.test(value) && !preserved.has(textStart)) {
      preserved.add(textStart);
      const edit = preserveSpaceEdit(docBytes, textStart);
      if (edit) edits.push(edit);
    }
  }

  return { bytes: applyEdits(docBytes, edits), replaced, warnings };
}

function applyEdits(docBytes: Uint8Array, edits: Edit[]): Uint8Array {
  if (edits.length === 0) return docBytes;
  const encoder = new TextEncoder();
  const sorted = [...edits].sort((a, b) => a.start - b.start || a.end - b.end);
  const chunks: Uint8Array[] = [];
  let cursor = 0;
  for (const edit of sorted) {
    chunks.push(docBytes.subarray(cursor, edit.start), encoder.encode(edit.text));
    cursor = edit.end;
  }
  chunks.push(docBytes.subarray(cursor));
  return Buffer.concat(chunks);
}
