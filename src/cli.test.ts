import { test, expect } from '@jest/globals';
import fc from 'fast-check';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  parseArgs,
  parseDelimitersFlag,
  parseValuesJson,
  deriveOutputPath,
  assertNoOutputConflict,
} from './cli';

test('Property 1: Argument parser preserves all flag values', () => {
  fc.assert(
    fc.property(
      fc.stringMatching(/^[a-zA-Z][a-zA-Z0-9._-]{0,9}$/),
      fc.option(fc.stringMatching(/^[a-zA-Z][a-zA-Z0-9._-]{0,9}$/)),
      fc.option(fc.stringMatching(/^[a-zA-Z][a-zA-Z0-9._-]{0,9}$/)),
      fc.boolean(),
      fc.boolean(),
      (inputPath, valuesPath, outputPath, force, list) => {
        fc.pre(list || valuesPath !== null);
        const args = ['node', 'cli.js', inputPath];
        if (valuesPath) args.push('--values', valuesPath);
        if (outputPath) args.push('--output', outputPath);
        if (force) args.push('--force');
        if (list) args.push('--list');

        const result = parseArgs(args);

        expect(result.inputPath).toBe(inputPath);
        expect(result.valuesPath).toBe(valuesPath || undefined);
        expect(result.outputPath).toBe(outputPath || undefined);
        expect(result.force).toBe(force);
        expect(result.list).toBe(list);
        expect(result.delimiters).toBeUndefined();
      }
    ),
    { numRuns: 100 }
  );
});

test('parseArgs parses --delimiters', () => {
  const result = parseArgs(['node', 'cli.js', 'in.docx', '--list', '--delimiters', '[]']);
  expect(result.delimiters).toEqual({ open: '[', close: ']' });
});

test('parseArgs allows --help and --version without input', () => {
  expect(parseArgs(['node', 'cli.js', '--help']).help).toBe(true);
  expect(parseArgs(['node', 'cli.js', '--version']).version).toBe(true);
});

test('parseArgs throws on unknown flags', () => {
  expect(() => parseArgs(['node', 'cli.js', '--unknown'])).toThrow('Unknown option "--unknown"');
});

test('parseArgs throws on a missing flag value', () => {
  expect(() => parseArgs(['node', 'cli.js', 'in.docx', '--values'])).toThrow('--values requires a value');
  expect(() => parseArgs(['node', 'cli.js', 'in.docx', '--output', '--force'])).toThrow('--output requires a value');
});

test('parseArgs requires an input file', () => {
  expect(() => parseArgs(['node', 'cli.js', '--list'])).toThrow('No input file specified');
});

test('parseArgs requires something to do', () => {
  expect(() => parseArgs(['node', 'cli.js', 'in.docx'])).toThrow('Nothing to do: pass --list or --values <file>');
});

test('parseDelimitersFlag takes exactly two characters', () => {
  expect(parseDelimitersFlag('«»')).toEqual({ open: '«', close: '»' });
  expect(() => parseDelimitersFlag('{')).toThrow('Invalid delimiters "{". Give the open and close characters together, e.g. "{}"');
  expect(() => parseDelimitersFlag('{{}}')).toThrow('Invalid delimiters "{{}}"');
  expect(() => parseDelimitersFlag('||')).toThrow('Open and close delimiters must differ, got "|" for both');
  expect(() => parseDelimitersFlag('<>')).toThrow('Delimiter "<" is escaped in document text and cannot be used');
});

test('parseValuesJson accepts a flat object of scalars', () => {
  expect(parseValuesJson('{"name": "Ada", "count": 3, "ok": false}')).toEqual({ name: 'Ada', count: 3, ok: false });
});

test('parseValuesJson rejects other shapes', () => {
  expect(() => parseValuesJson('[1, 2]')).toThrow('Values file must contain a JSON object');
  expect(() => parseValuesJson('null')).toThrow('Values file must contain a JSON object');
  expect(() => parseValuesJson('{"a": {"b": 1}}')).toThrow('Value for "a" must be a string, number or boolean');
  expect(() => parseValuesJson('{"a": null}')).toThrow('Value for "a" must be a string, number or boolean');
  expect(() => parseValuesJson('{oops')).toThrow('Values file is not valid JSON');
});

test('deriveOutputPath appends -filled before the extension', () => {
  expect(deriveOutputPath('/tmp/letter.docx')).toBe('/tmp/letter-filled.docx');
  expect(deriveOutputPath('/tmp/letter.docx', '/tmp/out.docx')).toBe('/tmp/out.docx');
});

test('Property 2: Conflict detection respects --force', () => {
  const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-test-'));

  try {
    fc.assert(
      fc.property(
        fc.stringMatching(/^[a-zA-Z][a-zA-Z0-9._-]{0,9}$/),
        fc.boolean(),
        (basename, force) => {
          const outputPath = deriveOutputPath(path.join(tempDir, basename + '.docx'));
          fs.writeFileSync(outputPath, 'test');

          if (force) {
            expect(() => assertNoOutputConflict(outputPath, force)).not.toThrow();
          } else {
            expect(() => assertNoOutputConflict(outputPath, force))
              .toThrow(/Output file already exists:.*-filled\.docx/);
          }

          fs.unlinkSync(outputPath);
        }
      ),
      { numRuns: 50 }
    );
  } finally {
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
});
