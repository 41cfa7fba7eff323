import * as fs from 'fs';
import * as path from 'path';
import JSZip from 'jszip';
import { DEFAULT_DELIMITERS, Delimiters } from './delimiters';
import { ParseResult, parsePlaceholders } from './placeholder';
import { DocumentRuns, parseRuns, runText, withText } from './runs';

const W = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';

/** One `<w:r>` per text, all in a single paragraph. Texts are not escaped. */
export function documentXml(runTexts: string[]): string {
  const runs = runTexts.map(t => '<w:r><w:t xml:space="preserve">' + t + '</w:t></w:r>').join('');
  return '<?xml version="1.0" encoding="UTF-8"?>'
    + '<w:document xmlns:w="' + W + '"><w:body><w:p>' + runs + '</w:p></w:body></w:document>';
}

export function encode(xml: string): Uint8Array {
  return new TextEncoder().encode(xml);
}

export interface ParsedTexts extends ParseResult {
  bytes: Uint8Array;
  runs: DocumentRuns;
}

/** Build a document from run texts and parse its placeholders. */
export function parseTexts(runTexts: string[], delimiters: Delimiters = DEFAULT_DELIMITERS): ParsedTexts {
  return parseXml(documentXml(runTexts), delimiters);
}

export function parseXml(xml: string, delimiters: Delimiters = DEFAULT_DELIMITERS): ParsedTexts {
  const bytes = encode(xml);
  const runs = parseRuns(bytes);
  return { bytes, runs, ...parsePlaceholders(runs, bytes, delimiters) };
}

/** Text of every run that has one, in order. */
export function runTexts(bytes: Uint8Array): string[] {
  return withText(parseRuns(bytes)).map(r => runText(r, bytes));
}

export function readFixture(name: string): Uint8Array {
  return new Uint8Array(fs.readFileSync(path.join(__dirname, '..', 'test', 'fixtures', name)));
}

export async function buildSyntheticDocx(docXml: string, extraParts?: Record<string, string>): Promise<Uint8Array> {
  const zip = new JSZip();
  zip.file('[Content_Types].xml', '<?xml version="1.0"?><Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"></Types>');
  zip.file('_rels/.rels', '<?xml version="1.0"?><Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"></Relationships>');
  zip.file('word/document.xml', docXml);
  if (extraParts) {
    for (const [partPath, content] of Object.entries(extraParts)) {
      zip.file(partPath, content);
    }
  }
  return zip.generateAsync({ type: 'uint8array' });
}

export async function readPartBytes(docx: Uint8Array, partPath: string): Promise<Uint8Array> {
  const zip = await JSZip.loadAsync(docx);
  const file = zip.file(partPath);
  if (!file) {
    throw new Error(`Missing archive entry: ${partPath}`);
  }
  return file.async('uint8array');
}
