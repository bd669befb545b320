#!/usr/bin/env node

import { realpathSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { Command } from 'commander';
import { InteractiveModeError } from './errors.js';
import { resolveLanguage, supportedLanguages } from './languages/registry.js';
import { segmentText } from './segment/boundaries.js';

const CRLF = '\r\n';

export interface SegmentationOptions {
  language: string;
  inputFile?: string;
  outputFile?: string;
  interactive?: boolean;
  verbose?: boolean;
}

export interface CliStreams {
  stdin: Readable;
  stdout: Writable;
}

interface ProgramOptions {
  language: string;
  inputFile?: string;
  outputFile?: string;
  interactive?: boolean;
  verbose?: boolean;
  listLanguages?: boolean;
}

/**
 * Sentences of one unit of input, CRLF-joined and CRLF-terminated
 */
export function formatSegments(language: string, text: string): string {
  return segmentText(resolveLanguage(language), text).join(CRLF) + CRLF;
}

/**
 * Lines without their terminators; a trailing newline does not start a new line
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Interactive mode is implied when no file is named, and refused when one is
 */
export function resolveInteractive(options: SegmentationOptions): boolean {
  const usesFiles = options.inputFile !== undefined || options.outputFile !== undefined;
  if (usesFiles) {
    if (options.interactive) {
      throw new InteractiveModeError();
    }
    return false;
  }
  return true;
}

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function writeLine(stdout: Writable, text: string): void {
  stdout.write(`${text}\n`);
}

/**
 * Segment stdin line by line until it ends, printing each result as it is ready
 */
export async function runInteractive(language: string, streams: CliStreams): Promise<number> {
  const lines = createInterface({ input: streams.stdin, crlfDelay: Infinity });
  let count = 0;

  for await (const line of lines) {
    if (!line.trim()) {
      continue;
    }
    writeLine(streams.stdout, formatSegments(language, line));
    count++;
  }

  return count;
}

/**
 * Segment each line of `inputFile` separately.
 * Without an output file, results go to stdout line by line.
 */
async function runInputFile(
  options: SegmentationOptions & { inputFile: string },
  streams: CliStreams,
): Promise<number> {
  const text = await readFile(options.inputFile, 'utf-8');
  const lines = splitLines(text);
  let output = '';

  for (const line of lines) {
    const sentences = segmentText(resolveLanguage(options.language), line).join(CRLF);
    if (options.outputFile === undefined) {
      writeLine(streams.stdout, sentences);
    } else {
      output += sentences + CRLF;
    }
  }

  if (options.outputFile !== undefined) {
    await writeFile(options.outputFile, output, 'utf-8');
  }
  return lines.length;
}

/**
 * Run one segmentation session and return the number of input units processed
 */
export async function runSegmentation(
  options: SegmentationOptions,
  streams: CliStreams,
): Promise<number> {
  // Fail before touching any input when the language cannot be resolved
  const language = resolveLanguage(options.language);
  if (options.verbose) {
    console.error(`Language: ${options.language} (rules: ${language.code})`);
  }

  if (resolveInteractive(options)) {
    return runInteractive(options.language, streams);
  }

  const { inputFile } = options;
  if (inputFile !== undefined) {
    const count = await runInputFile({ ...options, inputFile }, streams);
    if (options.verbose) {
      console.error(`Segmented ${count} line${count === 1 ? '' : 's'} from ${inputFile}`);
    }
    return count;
  }

  const text = await readAll(streams.stdin);
  const output = formatSegments(options.language, text);
  if (options.outputFile !== undefined) {
    await writeFile(options.outputFile, output, 'utf-8');
  }
  return 1;
}

export function createProgram(streams: CliStreams): Command {
  const program = new Command();

  program
    .name('segmark')
    .description('Split text into sentences using language-specific rules')
    .version('0.1.0')
    .option('-f, --input-file <path>', 'Input file (default: stdin)')
    .option('-o, --output-file <path>', 'Output file (default: stdout)')
    .option('-l, --language <code>', 'Language code', process.env.SEGMARK_LANGUAGE ?? 'en')
    .option('-i, --interactive', 'Segment stdin line by line (useful for testing)')
    .option('-v, --verbose', 'Log the resolved language and counts to stderr')
    .option('--list-languages', 'Print the supported language codes and exit')
    .action(async (options: ProgramOptions) => {
      try {
        if (options.listLanguages) {
          writeLine(streams.stdout, supportedLanguages().join('\n'));
          return;
        }
        await runSegmentation(options, streams);
      } catch (err) {
        console.error('Segmentation failed:', err);
        process.exit(1);
      }
    });

  return program;
}

/**
 * Whether the script named in argv is this module, following symlinks such as
 * the npm bin wrapper.
 */
export function isCliEntrypoint(argv: readonly string[], moduleUrl: string): boolean {
  const entrypointArg = argv[1];
  if (!entrypointArg) {
    return false;
  }

  try {
    return realpathSync(entrypointArg) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return moduleUrl === pathToFileURL(entrypointArg).href;
  }
}

if (isCliEntrypoint(process.argv, import.meta.url)) {
  await createProgram({ stdin: process.stdin, stdout: process.stdout }).parseAsync();
}
