import { DEFAULT_DELIMITERS, Delimiters, removeDelimiters } from './delimiters';
import { Run, TextRun, hasText, runText, runTextEnd, runTextStart } from './runs';
import { unescapeXml } from './xml';

// Types

/** Byte offsets relative to the start of one run's text, end exclusive. */
export interface Position {
  start: number;
  end: number;
}

/**
 * Handle on a run: its index in the run sequence passed to
 * parsePlaceholders plus the offsets needed to read its text back.
 */
export interface RunRef {
  index: number;
  id: number;
  textStart: number;
  textLength: number;
}

/** The part of a placeholder's literal text that lives in one run. */
export interface Fragment {
  readonly run: RunRef;
  readonly position: Readonly<Position>;
}

export type DiagnosticKind = 'unmatched-open' | 'unmatched-close' | 'untracked-text';

/**
 * A delimiter that could not be paired and was left as literal text, or
 * (`untracked-text`) a placeholder that runs past a run's untracked text
 * elements. For the latter `index` and `offset` mark the end of the
 * tracked text.
 */
export interface Diagnostic {
  kind: DiagnosticKind;
  runId: number;
  runText: string;
  /** Code point index of the delimiter within the run text. */
  index: number;
  /** Byte offset of the delimiter within the run text. */
  offset: number;
}

export interface ParseResult {
  /** In the order their close delimiter was found, so inner before outer. */
  placeholders: Placeholder[];
  diagnostics: Diagnostic[];
}

export function fragmentValid(fragment: Fragment): boolean {
  const { start, end } = fragment.position;
  return start >= 0 && start <= end && end <= fragment.run.textLength;
}

const utf8 = new TextDecoder();

/**
 * One logical placeholder, possibly reassembled from fragments in
 * several runs.
 */
export class Placeholder {
  readonly fragments: readonly Fragment[];

  constructor(fragments: readonly Fragment[]) {
    if (fragments.length === 0) {
      throw new Error('A placeholder needs at least one fragment');
    }
    this.fragments = Object.freeze([...fragments]);
  }

  /** The literal placeholder text, delimiters included. */
  text(docBytes: Uint8Array): string {
    return this.fragments
      .map(f => utf8.decode(docBytes.subarray(f.run.textStart + f.position.start, f.run.textStart + f.position.end)))
      .join('');
  }

  /**
   * Placeholder text with its delimiters removed and XML entities decoded,
   * so `{R&amp;D}` has the key `R&D`.
   */
  key(docBytes: Uint8Array, delimiters: Delimiters = DEFAULT_DELIMITERS): string {
    return unescapeXml(removeDelimiters(this.text(docBytes), delimiters));
  }

  /** Absolute byte offset of the open delimiter. */
  get startPos(): number {
    const first = this.fragments[0];
    return first.run.textStart + first.position.start;
  }

  /** Absolute byte offset just past the close delimiter. */
  get endPos(): number {
    const last = this.fragments[this.fragments.length - 1];
    return last.run.textStart + last.position.end;
  }

  valid(): boolean {
    return this.fragments.every(fragmentValid);
  }
}

// Matching

interface OpenFragment {
  run: RunRef;
  runText: string;
  start: number;
  index: number;
  /** Runs passed over entirely while this fragment was open. */
  spanRuns: RunRef[];
}

function utf8Length(codePoint: string): number {
  return Buffer.byteLength(codePoint, 'utf8');
}

function runRef(run: TextRun, index: number): RunRef {
  const textStart = runTextStart(run);
  return { index, id: run.id, textStart, textLength: runTextEnd(run) - textStart };
}

function closeFragment(open: OpenFragment, current: RunRef, end: number): Placeholder {
  if (open.run.index === current.index) {
    return new Placeholder([{ run: current, position: { start: open.start, end } }]);
  }
  return new Placeholder([
    { run: open.run, position: { start: open.start, end: open.run.textLength } },
    ...open.spanRuns.map(run => ({ run, position: { start: 0, end: run.textLength } })),
    { run: current, position: { start: 0, end } },
  ]);
}

/**
 * Find every placeholder in the given runs with a single left-to-right
 * pass, pairing delimiters like brackets. Runs without text are skipped.
 *
 * Unpaired delimiters never fail the parse: they are reported in
 * `diagnostics` and stay literal text.
 */
export function parsePlaceholders(
  runs: readonly Run[],
  docBytes: Uint8Array,
  delimiters: Delimiters = DEFAULT_DELIMITERS
): ParseResult {
  const placeholders: Placeholder[] = [];
  const diagnostics: Diagnostic[] = [];
  const stack: OpenFragment[] = [];
  const reportedUntracked = new Set<number>();

  // Text elements after the first one in a run are not tracked, so a
  // placeholder that continues past such a run misses their text
  const checkUntracked = (ref: RunRef): void => {
    const run = runs[ref.index];
    if (!run.untrackedTexts || !hasText(run) || reportedUntracked.has(run.id)) return;
    reportedUntracked.add(run.id);
    const text = runText(run, docBytes);
    diagnostics.push({
      kind: 'untracked-text',
      runId: run.id,
      runText: text,
      index: Array.from(text).length,
      offset: ref.textLength,
    });
  };

  for (let r = 0; r < runs.length; r++) {
    const run = runs[r];
    if (!hasText(run)) continue;

    const ref = runRef(run, r);
    const text = runText(run, docBytes);
    let index = 0;
    let offset = 0;

    for (const ch of text) {
      const width = utf8Length(ch);
      if (ch === delimiters.open) {
        stack.push({ run: ref, runText: text, start: offset, index, spanRuns: [] });
      } else if (ch === delimiters.close) {
        const open = stack.pop();
        if (open) {
          if (open.run.index !== ref.index) {
            checkUntracked(open.run);
            open.spanRuns.forEach(checkUntracked);
          }
          placeholders.push(closeFragment(open, ref, offset + width));
        } else {
          diagnostics.push({ kind: 'unmatched-close', runId: run.id, runText: text, index, offset });
        }
      }
      index++;
      offset += width;
    }

    // Every fragment still open from an earlier run spans this one, even
    // when this run holds delimiters of nested placeholders
    for (const open of stack) {
      if (open.run.index !== ref.index) {
        open.spanRuns.push(ref);
      }
    }
  }

  for (const open of stack) {
    diagnostics.push({
      kind: 'unmatched-open',
      runId: open.run.id,
      runText: open.runText,
      index: open.index,
      offset: open.start,
    });
  }

  return { placeholders, diagnostics };
}

export function formatDiagnostic(d: Diagnostic): string {
  if (d.kind === 'untracked-text') {
    return `placeholder continues past untracked text after index ${d.index} of run ${d.runId} "${d.runText}", its key may be incomplete`;
  }
  const which = d.kind === 'unmatched-open' ? 'open' : 'close';
  return `detected unmatched ${which} delimiter in run ${d.runId} "${d.runText}", index ${d.index}, skipping`;
}
