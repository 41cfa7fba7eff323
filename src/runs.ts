// Run tokenizer for WordprocessingML parts.
//
// Works directly on the raw part bytes so that every tag position is an
// absolute byte offset usable for in-place edits later on. Tags are ASCII,
// so a latin1 view of the bytes maps one character to one byte.

/** Absolute byte range of a tag, end exclusive. */
export interface TagPosition {
  start: number;
  end: number;
}

/** The `<w:t>` element of a run. */
export interface RunText {
  open: TagPosition;
  close: TagPosition;
}

export interface Run {
  id: number;
  open: TagPosition;
  /** Same as `open` for a self-closing `<w:r/>`. */
  close: TagPosition;
  text?: RunText;
  /** Number of `<w:t>` elements after the first one. Their text is not tracked. */
  untrackedTexts?: number;
}

export type TextRun = Run & { text: RunText };

export type DocumentRuns = Run[];

// Matches <w:r>, <w:r ...>, <w:r/>, </w:r> and the same for w:t, but not
// w:rPr, w:rFonts, w:tab, w:tbl and friends.
const RUN_OR_TEXT_TAG_RE = /<(\/?)w:(r|t)(?=[\s/>])([^>]*)>/g;

interface OpenRun {
  id: number;
  open: TagPosition;
  textOpen?: TagPosition;
  text?: RunText;
  untrackedTexts: number;
}

function latin1View(docBytes: Uint8Array): string {
  return Buffer.from(docBytes.buffer, docBytes.byteOffset, docBytes.byteLength).toString('latin1');
}

function closeRun(run: OpenRun, close: TagPosition): Run {
  if (run.textOpen && !run.text) {
    throw new Error(`Unclosed <w:t> in run ${run.id} opened at byte ${run.textOpen.start}`);
  }
  const closed: Run = { id: run.id, open: run.open, close, text: run.text };
  if (run.untrackedTexts > 0) closed.untrackedTexts = run.untrackedTexts;
  return closed;
}

/**
 * Tokenize a WordprocessingML part into its runs, ordered by where each
 * run opens.
 *
 * Runs may nest: a text box (`w:txbxContent`) sits inside a drawing that
 * is itself inside a run. Every inner run becomes a run of its own and
 * text elements belong to the innermost open run.
 *
 * Only the first `<w:t>` of a run is tracked. Word splits a run's text
 * around `<w:br/>`, `<w:tab/>` and similar elements, and the text after
 * such a break is invisible to the matcher. `untrackedTexts` counts those
 * elements so that callers can report placeholders that run through them.
 */
export function parseRuns(docBytes: Uint8Array): DocumentRuns {
  const xml = latin1View(docBytes);
  const runs: DocumentRuns = [];
  const open: OpenRun[] = [];
  let nextId = 0;

  for (const match of xml.matchAll(RUN_OR_TEXT_TAG_RE)) {
    const start = match.index ?? 0;
    const pos: TagPosition = { start, end: start + match[0].length };
    const closing = match[1] === '/';
    const selfClosing = !closing && match[3].trimEnd().endsWith('/');

    if (match[2] === 'r') {
      if (closing) {
        const current = open.pop();
        if (!current) {
          throw new Error(`Unexpected </w:r> at byte ${start}: no run is open`);
        }
        runs.push(closeRun(current, pos));
      } else if (selfClosing) {
        runs.push({ id: nextId++, open: pos, close: pos });
      } else {
        open.push({ id: nextId++, open: pos, untrackedTexts: 0 });
      }
      continue;
    }

    const current = open[open.length - 1];
    // w:t outside a run (should not happen in valid documents) is ignored
    if (!current || selfClosing) continue;
    if (closing) {
      if (current.textOpen && !current.text) {
        current.text = { open: current.textOpen, close: pos };
      }
    } else if (!current.textOpen) {
      current.textOpen = pos;
    } else {
      current.untrackedTexts++;
    }
  }

  if (open.length > 0) {
    const unclosed = open[0];
    throw new Error(`Run ${unclosed.id} opened at byte ${unclosed.open.start} is never closed`);
  }
  // Inner runs close before the run around them
  return runs.sort((a, b) => a.id - b.id);
}

export function hasText(run: Run): run is TextRun {
  return run.text !== undefined;
}

/** Runs that carry a text element. */
export function withText(runs: readonly Run[]): TextRun[] {
  return runs.filter(hasText);
}

/** Absolute byte offset where the run's text payload begins. */
export function runTextStart(run: TextRun): number {
  return run.text.open.end;
}

export function runTextEnd(run: TextRun): number {
  return run.text.close.start;
}

const utf8 = new TextDecoder();

export function runText(run: TextRun, docBytes: Uint8Array): string {
  return utf8.decode(docBytes.subarray(runTextStart(run), runTextEnd(run)));
}
