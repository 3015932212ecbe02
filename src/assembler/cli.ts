#!/usr/bin/env node
/**
 * Tablet Assembler CLI
 *
 * Usage: tablet-asm <input.asm> [-o output.bin] [--hex] [--disasm] [--word-relative]
 */

import { readFileSync, writeFileSync } from 'fs';
import { Assembler, RelativeUnit } from './assembler.js';
import { encodeImage } from '../emulator/image.js';
import { disassembleWords, formatListingLine } from '../emulator/disassembler.js';
import { isEntryPoint, errorCode, errorMessage } from '../util/cli-support.js';

interface CliOptions {
  inputFile: string;
  outputFile: string;
  hexDump: boolean;
  listing: boolean;
  relativeUnit: RelativeUnit;
}

function parseArgs(args: string[]): CliOptions | null {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.length === 0) {
    return null;
  }

  let inputFile = '';
  let outputFile = '';
  let hexDump = false;
  let listing = false;
  let relativeUnit: RelativeUnit = 'instruction';

  for (let i = 0; i < cliArgs.length; i++) {
    const arg = cliArgs[i];

    if (arg === '-o' || arg === '--output') {
      if (i + 1 >= cliArgs.length) {
        console.error('Error: -o requires an output filename');
        return null;
      }
      outputFile = cliArgs[++i];
    } else if (arg === '--hex') {
      hexDump = true;
    } else if (arg === '--disasm') {
      listing = true;
    } else if (arg === '--word-relative') {
      relativeUnit = 'word';
    } else if (arg === '-h' || arg === '--help') {
      return null;
    } else if (!arg.startsWith('-')) {
      inputFile = arg;
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      return null;
    }
  }

  if (!inputFile) {
    console.error('Error: No input file specified');
    return null;
  }

  // Default output file
  if (!outputFile) {
    outputFile = inputFile.replace(/\.(asm|s)$/i, '') + '.bin';
  }

  return { inputFile, outputFile, hexDump, listing, relativeUnit };
}

function printUsage(): void {
  console.log(`Tablet Assembler

Usage: tablet-asm <input.asm> [-o output.bin] [--hex] [--disasm] [--word-relative]

Options:
  -o, --output <file>  Output file (default: <input>.bin)
  --hex                Print hex dump of output
  --disasm             Print a disassembly listing of output
  --word-relative      Count /n offsets in words instead of instructions
  -h, --help           Show this help message

Examples:
  tablet-asm program.asm
  tablet-asm program.asm -o rom.bin
  tablet-asm program.asm --disasm`);
}

/**
 * Four words per line, prefixed by the address of the first
 */
export function formatHexDump(words: Uint32Array): string {
  const lines: string[] = [];

  for (let offset = 0; offset < words.length; offset += 4) {
    const row = Array.from(words.subarray(offset, offset + 4), (word) => word.toString(16).padStart(8, '0'));
    lines.push(`${offset.toString(16).padStart(8, '0')}: ${row.join(' ')}`);
  }

  return lines.join('\n');
}

export function main(args: string[] = process.argv): number {
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return args.some(a => a === '-h' || a === '--help') ? 0 : 1;
  }

  // Read input file
  let source: string;
  try {
    source = readFileSync(options.inputFile, 'utf-8');
  } catch (e) {
    if (errorCode(e) === 'ENOENT') {
      console.error(`Error: File not found: ${options.inputFile}`);
    } else {
      console.error(`Error: Cannot read file: ${options.inputFile}`);
    }
    return 1;
  }

  // Assemble
  const assembler = new Assembler(source, { relativeUnit: options.relativeUnit });
  const result = assembler.assemble();

  // Check for errors
  if (result.errors.length > 0) {
    for (const error of result.errors) {
      console.error(`${options.inputFile}:${error.line}:${error.column}: ${error.message}`);
    }
    return 1;
  }

  // Write output
  try {
    writeFileSync(options.outputFile, encodeImage(result.words));
    console.log(`Assembled ${result.words.length} words to ${options.outputFile}`);
  } catch (e) {
    console.error(`Error: Cannot write file: ${options.outputFile}: ${errorMessage(e)}`);
    return 1;
  }

  // Print hex dump if requested
  if (options.hexDump) {
    console.log('\nHex dump:');
    console.log(formatHexDump(result.words));
  }

  if (options.listing) {
    console.log('\nDisassembly:');
    for (const instruction of disassembleWords(result.words)) {
      console.log(formatListingLine(instruction));
    }
  }

  // Print symbol table summary
  if (result.symbols.size > 0) {
    console.log(`\nSymbols: ${result.symbols.size}`);
  }

  return 0;
}

// Run if executed directly
if (isEntryPoint(import.meta.url)) {
  process.exit(main());
}
