#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { createDelimiters, Delimiters } from './delimiters';
import { PlaceholderMap } from './replace';

export interface CliOptions {
  help: boolean;
  version: boolean;
  list: boolean;
  inputPath: string;
  valuesPath?: string;
  outputPath?: string;
  force: boolean;
  delimiters?: Delimiters;
}

export function parseDelimitersFlag(value: string): Delimiters {
  const chars = Array.from(value);
  if (chars.length !== 2) {
    throw new Error(`Invalid delimiters "${value}". Give the open and close characters together, e.g. "{}"`);
  }
  return createDelimiters(chars[0], chars[1]);
}

export function parseArgs(argv: string[]): CliOptions {
  const args = argv.slice(2);
  const options: CliOptions = {
    help: false,
    version: false,
    list: false,
    inputPath: '',
    force: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const requireValue = (flag: string): string => {
      if (i + 1 >= args.length || args[i + 1].startsWith('--')) {
        throw new Error(`${flag} requires a value`);
      }
      i++;
      return args[i];
    };

    if (arg === '--help') {
      options.help = true;
    } else if (arg === '--version') {
      options.version = true;
    } else if (arg === '--list') {
      options.list = true;
    } else if (arg === '--force') {
      options.force = true;
    } else if (arg === '--values') {
      options.valuesPath = requireValue('--values');
    } else if (arg === '--output') {
      options.outputPath = requireValue('--output');
    } else if (arg === '--delimiters') {
      options.delimiters = parseDelimitersFlag(requireValue('--delimiters'));
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option "${arg}"`);
    } else if (!options.inputPath) {
      options.inputPath = arg;
    }
  }

  if (options.help || options.version) return options;
  if (!options.inputPath) {
    throw new Error('No input file specified');
  }
  if (!options.list && !options.valuesPath) {
    throw new Error('Nothing to do: pass --list or --values <file>');
  }
  return options;
}

/** Parse a values file: a flat JSON object of strings, numbers and booleans. */
export function parseValuesJson(text: string): PlaceholderMap {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new Error(`Values file is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Values file must contain a JSON object');
  }
  const values: PlaceholderMap = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
      throw new Error(`Value for "${key}" must be a string, number or boolean`);
    }
    values[key] = value;
  }
  return values;
}

export function deriveOutputPath(inputPath: string, outputPath?: string): string {
  if (outputPath) return outputPath;
  const ext = path.extname(inputPath);
  const inputBase = path.basename(inputPath, ext);
  return path.join(path.dirname(inputPath), inputBase + '-filled' + ext);
}

export function assertNoOutputConflict(outputPath: string, force: boolean) {
  if (!force && fs.existsSync(outputPath)) {
    throw new Error(`Output file already exists: ${outputPath}\nUse --force to overwrite`);
  }
}

function showHelp() {
  console.log(`Usage: docx-placeholders <input.docx> [options]

List or fill {placeholders} in a Word document.

Options:
  --help                 Show this help message
  --version              Show version number
  --list                 Print the placeholders found in each document part
  --values <path>        JSON object mapping placeholder keys to values
  --output <path>        Output file path (default: <input>-filled.docx)
  --force                Overwrite an existing output file
  --delimiters <oc>      Open and close delimiter characters (default: {})`);
}

function showVersion() {
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
  const version = typeof pkg === 'object' && pkg !== null && 'version' in pkg ? String(pkg.version) : 'unknown';
  console.log(version);
}

async function runList(options: CliOptions, data: Uint8Array) {
  const { findPlaceholders } = await import('./docx');
  const { formatDiagnostic } = await import('./placeholder');
  const result = await findPlaceholders(data, { delimiters: options.delimiters });
  for (const part of result.parts) {
    if (part.keys.length === 0 && part.diagnostics.length === 0) continue;
    console.log(part.path);
    for (const key of part.keys) {
      console.log('  ' + key);
    }
    for (const d of part.diagnostics) {
      console.error(`Warning: ${part.path}: ${formatDiagnostic(d)}`);
    }
  }
}

async function runFill(options: CliOptions, data: Uint8Array, valuesPath: string) {
  const { fillTemplate } = await import('./docx');
  if (!fs.existsSync(valuesPath)) {
    throw new Error(`Values file not found: ${valuesPath}`);
  }
  const values = parseValuesJson(fs.readFileSync(valuesPath, 'utf8'));

  const outputPath = deriveOutputPath(options.inputPath, options.outputPath);
  assertNoOutputConflict(outputPath, options.force);

  const result = await fillTemplate(data, values, { delimiters: options.delimiters });
  fs.writeFileSync(outputPath, result.docx);
  console.log(outputPath);

  for (const warning of result.warnings) {
    console.error(`Warning: ${warning}`);
  }
}

export async function main() {
  const options = parseArgs(process.argv);

  if (options.help) {
    showHelp();
    return;
  }

  if (options.version) {
    showVersion();
    return;
  }

  if (!fs.existsSync(options.inputPath)) {
    throw new Error(`File not found: ${options.inputPath}`);
  }
  const data = new Uint8Array(fs.readFileSync(options.inputPath));

  if (options.list) {
    await runList(options, data);
  }
  if (options.valuesPath) {
    await runFill(options, data, options.valuesPath);
  }
}

if (require.main === module) {
  main().catch(e => {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  });
}
