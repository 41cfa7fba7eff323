import JSZip from 'jszip';
import { XMLValidator } from 'fast-xml-parser';
import { DEFAULT_DELIMITERS, Delimiters } from './delimiters';
import { Diagnostic, formatDiagnostic, parsePlaceholders } from './placeholder';
import { PlaceholderMap, replacePlaceholders } from './replace';
import { parseRuns } from './runs';

const DOCUMENT_PART = 'word/document.xml';

/** Parts of a Word archive that may contain placeholders. */
const TEMPLATE_PART_RE = /^word\/(?:document|header\d*|footer\d*|footnotes|endnotes)\.xml$/;

export interface TemplateOptions {
  delimiters?: Delimiters;
}

export interface PartPlaceholders {
  path: string;
  /** Placeholder keys in the order they were found. */
  keys: string[];
  diagnostics: Diagnostic[];
}

export interface FindResult {
  parts: PartPlaceholders[];
}

export interface FillResult {
  docx: Uint8Array;
  warnings: string[];
}

async function loadWordZip(data: Uint8Array): Promise<JSZip> {
  const zip = await JSZip.loadAsync(data);
  if (!zip.file(DOCUMENT_PART)) {
    throw new Error(`Not a Word document: ${DOCUMENT_PART} is missing`);
  }
  return zip;
}

/** Template part paths, main document first, the rest sorted. */
export function templatePartPaths(zip: JSZip): string[] {
  const others = Object.keys(zip.files)
    .filter(p => p !== DOCUMENT_PART && !zip.files[p].dir && TEMPLATE_PART_RE.test(p))
    .sort();
  return [DOCUMENT_PART, ...others];
}

async function readPart(zip: JSZip, path: string): Promise<Uint8Array> {
  const file = zip.file(path);
  if (!file) {
    throw new Error(`Missing archive entry: ${path}`);
  }
  return file.async('uint8array');
}

export async function findPlaceholders(data: Uint8Array, options: TemplateOptions = {}): Promise<FindResult> {
  const delimiters = options.delimiters ?? DEFAULT_DELIMITERS;
  const zip = await loadWordZip(data);
  const parts: PartPlaceholders[] = [];

  for (const path of templatePartPaths(zip)) {
    const bytes = await readPart(zip, path);
    const { placeholders, diagnostics } = parsePlaceholders(parseRuns(bytes), bytes, delimiters);
    parts.push({
      path,
      keys: placeholders.map(p => p.key(bytes, delimiters)),
      diagnostics,
    });
  }

  return { parts };
}

/**
 * Replace placeholders in every template part of a .docx archive and
 * return the rewritten archive.
 */
export async function fillTemplate(
  data: Uint8Array,
  values: PlaceholderMap,
  options: TemplateOptions = {}
): Promise<FillResult> {
  const delimiters = options.delimiters ?? DEFAULT_DELIMITERS;
  const zip = await loadWordZip(data);
  const warnings: string[] = [];
  const used = new Set<string>();

  for (const path of templatePartPaths(zip)) {
    const bytes = await readPart(zip, path);
    const { placeholders, diagnostics } = parsePlaceholders(parseRuns(bytes), bytes, delimiters);
    for (const d of diagnostics) {
      warnings.push(`${path}: ${formatDiagnostic(d)}`);
    }

    const result = replacePlaceholders(bytes, placeholders, values, delimiters);
    for (const w of result.warnings) {
      warnings.push(`${path}: ${w}`);
    }
    if (result.replaced.length === 0) continue;
    result.replaced.forEach(k => used.add(k));

    const xml = new TextDecoder().decode(result.bytes);
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      throw new Error(`Replacing placeholders left ${path} malformed: ${validation.err.msg} (line ${validation.err.line})`);
    }
    zip.file(path, result.bytes);
  }

  for (const key of Object.keys(values)) {
    if (!used.has(key)) {
      warnings.push(`No placeholder found for key "${key}"`);
    }
  }

  const docx = await zip.generateAsync({ type: 'uint8array' });
  return { docx, warnings };
}
