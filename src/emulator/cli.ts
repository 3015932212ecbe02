#!/usr/bin/env node
/**
 * Tablet Runner CLI
 *
 * Assembles (or loads) a program and runs it against the terminal:
 * keys typed on stdin feed `key`, `drw` writes sixel frames to stdout.
 *
 * Usage: tablet-run <program.asm|program.bin> [options]
 */

import { readFileSync } from 'fs';
import { Assembler, RelativeUnit } from '../assembler/assembler.js';
import { TabletCpu, CpuState } from './cpu.js';
import { KeyboardController, KeySource } from './keyboard.js';
import {
  SixelDisplay,
  FrameSink,
  checkFrameBuffer,
  DEFAULT_DISPLAY_ADDRESS,
  DEFAULT_DISPLAY_WIDTH,
  DEFAULT_DISPLAY_HEIGHT,
} from './display.js';
import { CLEAR_SCREEN } from './sixel.js';
import { decodeImage } from './image.js';
import { formatListingLine } from './disassembler.js';
import { parseHex } from '../assembler/parser.js';
import { isEntryPoint, errorCode, errorMessage } from '../util/cli-support.js';

/** Instructions executed between event loop turns */
export const BATCH_SIZE = 10000;

export const EXIT_HALTED = 0;
export const EXIT_ERROR = 1;
export const EXIT_STEP_LIMIT = 2;

interface RunnerOptions {
  inputFile: string;
  maxSteps: number;
  trace: boolean;
  relativeUnit: RelativeUnit;
  displayAddress: number;
  displayWidth: number;
  displayHeight: number;
}

/** The parts of process.stdin the runner uses */
export interface TerminalInput extends KeySource {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  pause(): unknown;
}

/** The parts of process.stdout the runner uses */
export interface TerminalOutput extends FrameSink {
  isTTY?: boolean;
}

export interface RunnerIo {
  stdin: TerminalInput;
  stdout: TerminalOutput;
}

function parseArgs(args: string[]): RunnerOptions | null {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.length === 0) {
    return null;
  }

  const options: RunnerOptions = {
    inputFile: '',
    maxSteps: Infinity,
    trace: false,
    relativeUnit: 'instruction',
    displayAddress: DEFAULT_DISPLAY_ADDRESS,
    displayWidth: DEFAULT_DISPLAY_WIDTH,
    displayHeight: DEFAULT_DISPLAY_HEIGHT,
  };

  for (let i = 0; i < cliArgs.length; i++) {
    const arg = cliArgs[i];

    if (arg === '--max-steps' || arg === '--display-address' || arg === '--display-size') {
      if (i + 1 >= cliArgs.length) {
        console.error(`Error: ${arg} requires a value`);
        return null;
      }
      const value = cliArgs[++i];

      if (arg === '--max-steps') {
        const steps = Number(value);
        if (!Number.isInteger(steps) || steps <= 0) {
          console.error(`Error: Invalid step count '${value}'`);
          return null;
        }
        options.maxSteps = steps;
      } else if (arg === '--display-address') {
        const address = parseHex(value);
        if (address === undefined) {
          console.error(`Error: Invalid display address '${value}'`);
          return null;
        }
        options.displayAddress = address;
      } else {
        const match = /^(\d+)x(\d+)$/.exec(value);
        if (!match || Number(match[1]) === 0 || Number(match[2]) === 0) {
          console.error(`Error: Invalid display size '${value}', expected WIDTHxHEIGHT`);
          return null;
        }
        options.displayWidth = Number(match[1]);
        options.displayHeight = Number(match[2]);
      }
    } else if (arg === '--trace') {
      options.trace = true;
    } else if (arg === '--word-relative') {
      options.relativeUnit = 'word';
    } else if (arg === '-h' || arg === '--help') {
      return null;
    } else if (!arg.startsWith('-')) {
      options.inputFile = arg;
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      return null;
    }
  }

  if (!options.inputFile) {
    console.error('Error: No input file specified');
    return null;
  }

  try {
    checkFrameBuffer(options.displayAddress, options.displayWidth, options.displayHeight);
  } catch (e) {
    console.error(`Error: ${errorMessage(e)}`);
    return null;
  }

  return options;
}

function printUsage(): void {
  console.log(`Tablet Runner

Usage: tablet-run <program.asm|program.bin> [options]

Options:
  --max-steps <n>            Stop after n instructions
  --trace                    Print each instruction to stderr before it runs
  --word-relative            Count /n offsets in words instead of instructions
  --display-address <hex>    First word of the frame buffer (default ${DEFAULT_DISPLAY_ADDRESS.toString(16)})
  --display-size <WxH>       Frame buffer size in pixels (default ${DEFAULT_DISPLAY_WIDTH}x${DEFAULT_DISPLAY_HEIGHT})
  -h, --help                 Show this help message

Exit status: 0 on brk, 1 on a fault or error, 2 when --max-steps is reached.`);
}

/**
 * Read the program: .bin files are word images, anything else is source
 */
function loadProgram(options: RunnerOptions): Uint32Array | null {
  let raw: Buffer;
  try {
    raw = readFileSync(options.inputFile);
  } catch (e) {
    if (errorCode(e) === 'ENOENT') {
      console.error(`Error: File not found: ${options.inputFile}`);
    } else {
      console.error(`Error: Cannot read file: ${options.inputFile}: ${errorMessage(e)}`);
    }
    return null;
  }

  if (/\.bin$/i.test(options.inputFile)) {
    try {
      return decodeImage(raw);
    } catch (e) {
      console.error(`Error: ${options.inputFile}: ${errorMessage(e)}`);
      return null;
    }
  }

  const result = new Assembler(raw.toString('utf-8'), { relativeUnit: options.relativeUnit }).assemble();
  if (result.errors.length > 0) {
    for (const error of result.errors) {
      console.error(`${options.inputFile}:${error.line}:${error.column}: ${error.message}`);
    }
    return null;
  }
  return result.words;
}

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Run until halt, fault or the step limit, yielding to the event loop
 * between batches so key presses can arrive
 */
export async function runCpu(cpu: TabletCpu, maxSteps: number = Infinity): Promise<CpuState> {
  let executed = 0;
  while (cpu.running && executed < maxSteps) {
    const before = cpu.cycles;
    cpu.run(Math.min(BATCH_SIZE, maxSteps - executed));
    executed += cpu.cycles - before;
    if (cpu.running) {
      await nextTurn();
    }
  }
  return cpu.state;
}

export async function main(
  args: string[] = process.argv,
  io: RunnerIo = { stdin: process.stdin, stdout: process.stdout }
): Promise<number> {
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return args.some(a => a === '-h' || a === '--help') ? 0 : 1;
  }

  const program = loadProgram(options);
  if (!program) {
    return EXIT_ERROR;
  }

  const keyboard = new KeyboardController();
  const display = new SixelDisplay({
    address: options.displayAddress,
    width: options.displayWidth,
    height: options.displayHeight,
    output: io.stdout,
  });
  const cpu = new TabletCpu({
    keyboard,
    display,
    trace: options.trace ? (instruction) => console.error(formatListingLine(instruction)) : undefined,
  });
  cpu.loadProgram(program);

  const raw = io.stdin.isTTY === true && io.stdin.setRawMode !== undefined;
  if (raw) {
    io.stdin.setRawMode?.(true);
  }
  keyboard.attach(io.stdin);

  if (io.stdout.isTTY === true) {
    io.stdout.write(CLEAR_SCREEN);
  }

  let state: CpuState;
  try {
    state = await runCpu(cpu, options.maxSteps);
  } finally {
    keyboard.detach();
    if (raw) {
      io.stdin.setRawMode?.(false);
    }
    io.stdin.pause();
  }

  switch (state) {
    case CpuState.HALTED:
      console.error(`Halted at pc 0x${cpu.pc.toString(16)} after ${cpu.cycles} instructions`);
      return EXIT_HALTED;
    case CpuState.FAULTED:
      console.error(`Fault: ${cpu.fault?.message ?? 'unknown'}`);
      return EXIT_ERROR;
    case CpuState.RUNNING:
      console.error(`Stopped after ${cpu.cycles} instructions (step limit)`);
      return EXIT_STEP_LIMIT;
  }
}

// Run if executed directly
if (isEntryPoint(import.meta.url)) {
  main().then(
    (code) => process.exit(code),
    (e: unknown) => {
      console.error(`Error: ${errorMessage(e)}`);
      process.exit(EXIT_ERROR);
    }
  );
}
