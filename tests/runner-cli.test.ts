import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'fs';
import { PassThrough } from 'stream';
import { tmpdir } from 'os';
import { join } from 'path';
import { main, runCpu, RunnerIo, BATCH_SIZE } from '../src/emulator/cli.js';
import { TabletCpu, CpuState } from '../src/emulator/cpu.js';
import { OPCODE } from '../src/emulator/opcodes.js';
import { encodeImage } from '../src/emulator/image.js';
import { CURSOR_HOME, SIXEL_BEGIN, SIXEL_END, CLEAR_SCREEN } from '../src/emulator/sixel.js';

const WAIT_FOR_Q = `
wait:
  key k
  sub k k target
  jez k done
  jmp wait
done:
  brk
k:
  0
target:
  71      ; 'q'
`;

describe('Runner CLI', () => {
  const testDir = join(tmpdir(), 'tablet-run-test-' + Date.now());
  let consoleLogs: string[] = [];
  let consoleErrors: string[] = [];
  let originalLog: typeof console.log;
  let originalError: typeof console.error;
  let stdin: PassThrough;
  let frames: string[];
  let io: RunnerIo;

  function program(name: string, contents: string | Uint8Array): string {
    const path = join(testDir, name);
    writeFileSync(path, contents);
    return path;
  }

  beforeEach(() => {
    mkdirSync(testDir, { recursive: true });
    consoleLogs = [];
    consoleErrors = [];
    originalLog = console.log;
    originalError = console.error;
    console.log = (...args) => consoleLogs.push(args.join(' '));
    console.error = (...args) => consoleErrors.push(args.join(' '));
    stdin = new PassThrough();
    frames = [];
    io = { stdin, stdout: { write: (frame: string) => frames.push(frame) } };
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('argument parsing', () => {
    it('should show help with no arguments', async () => {
      expect(await main(['node', 'cli.js'], io)).toBe(1);
      expect(consoleLogs.some(l => l.includes('Usage'))).toBe(true);
    });

    it('should show help with --help', async () => {
      expect(await main(['node', 'cli.js', '--help'], io)).toBe(0);
    });

    it('should reject a bad step count', async () => {
      expect(await main(['node', 'cli.js', 'x.asm', '--max-steps', '0'], io)).toBe(1);
      expect(consoleErrors).toContain("Error: Invalid step count '0'");
    });

    it('should reject a bad display size', async () => {
      expect(await main(['node', 'cli.js', 'x.asm', '--display-size', '0x5'], io)).toBe(1);
      expect(consoleErrors).toContain("Error: Invalid display size '0x5', expected WIDTHxHEIGHT");
    });

    it('should reject a frame buffer past the end of memory', async () => {
      const path = program('draw.asm', 'drw\nbrk');
      const args = ['node', 'cli.js', path, '--display-address', 'ffffff00'];
      expect(await main(args, io)).toBe(1);
      expect(consoleErrors).toEqual(['Error: Frame buffer of 512x684 at 0xffffff00 runs past the end of memory']);
      expect(frames).toEqual([]);
    });

    it('should reject an oversized display', async () => {
      const path = program('draw.asm', 'drw\nbrk');
      expect(await main(['node', 'cli.js', path, '--display-size', '100000x100000'], io)).toBe(1);
      expect(consoleErrors).toEqual(['Error: Invalid display size 100000x100000, expected 1 to 4096 per side']);
    });

    it('should error on missing input file', async () => {
      const path = join(testDir, 'missing.asm');
      expect(await main(['node', 'cli.js', path], io)).toBe(1);
      expect(consoleErrors).toContain(`Error: File not found: ${path}`);
    });
  });

  describe('exit status', () => {
    it('should exit 0 on brk', async () => {
      const path = program('halt.asm', 'brk');
      expect(await main(['node', 'cli.js', path], io)).toBe(0);
      expect(consoleErrors).toEqual(['Halted at pc 0x0 after 1 instructions']);
    });

    it('should exit 1 on a fault', async () => {
      const path = program('fault.asm', 'div 10 11 12');
      expect(await main(['node', 'cli.js', path], io)).toBe(1);
      expect(consoleErrors).toEqual(['Fault: Division by zero at pc 0x0 (div 10 11 12)']);
    });

    it('should exit 2 at the step limit', async () => {
      const path = program('loop.asm', 'loop:\njmp loop');
      expect(await main(['node', 'cli.js', path, '--max-steps', '50'], io)).toBe(2);
      expect(consoleErrors).toEqual(['Stopped after 50 instructions (step limit)']);
    });

    it('should exit 1 on assembly errors', async () => {
      const path = program('bad.asm', 'mov');
      expect(await main(['node', 'cli.js', path], io)).toBe(1);
      expect(consoleErrors).toEqual([`${path}:1:1: Unknown mnemonic 'mov' at line 1, column 1`]);
    });
  });

  describe('program images', () => {
    it('should run a .bin image', async () => {
      const path = program('nop.bin', encodeImage([OPCODE.NOP, 0, 0, 0]));
      expect(await main(['node', 'cli.js', path], io)).toBe(0);
      expect(consoleErrors).toEqual(['Halted at pc 0x4 after 2 instructions']);
    });

    it('should reject a truncated image', async () => {
      const path = program('short.bin', Uint8Array.from([1, 2, 3]));
      expect(await main(['node', 'cli.js', path], io)).toBe(1);
      expect(consoleErrors).toEqual([`Error: ${path}: Invalid image: 3 bytes is not a whole number of words`]);
    });
  });

  describe('devices', () => {
    it('should write frames to stdout on drw', async () => {
      const path = program('draw.asm', 'drw\nbrk');
      const args = ['node', 'cli.js', path, '--display-address', '100', '--display-size', '1x6'];
      expect(await main(args, io)).toBe(0);
      expect(frames).toEqual([CURSOR_HOME + SIXEL_BEGIN + '?$-' + SIXEL_END]);
    });

    it('should clear a terminal before the first frame', async () => {
      const path = program('draw.asm', 'drw\nbrk');
      const terminal = { isTTY: true, write: (frame: string) => frames.push(frame) };
      const args = ['node', 'cli.js', path, '--display-address', '100', '--display-size', '1x6'];
      expect(await main(args, { stdin, stdout: terminal })).toBe(0);
      expect(frames).toEqual([CLEAR_SCREEN, CURSOR_HOME + SIXEL_BEGIN + '?$-' + SIXEL_END]);
    });

    it('should feed stdin to key', async () => {
      const path = program('wait.asm', WAIT_FOR_Q);
      const run = main(['node', 'cli.js', path, '--max-steps', '1000000'], io);
      stdin.write('q');
      expect(await run).toBe(0);
      expect(consoleErrors).toHaveLength(1);
      expect(consoleErrors[0]).toMatch(/^Halted at pc 0x10 after \d+ instructions$/);
      expect(stdin.listenerCount('data')).toBe(0);
    });

    it('should put a terminal into raw mode while running', async () => {
      const setRawMode = vi.fn();
      const terminal = Object.assign(new PassThrough(), { isTTY: true, setRawMode });
      const path = program('halt.asm', 'brk');

      await main(['node', 'cli.js', path], { stdin: terminal, stdout: io.stdout });

      expect(setRawMode.mock.calls).toEqual([[true], [false]]);
    });
  });

  it('should trace instructions to stderr', async () => {
    const path = program('trace.asm', 'nop\nbrk');
    expect(await main(['node', 'cli.js', path, '--trace'], io)).toBe(0);
    expect(consoleErrors).toEqual([
      '00000000: 00000010 00000000 00000000 00000000  nop 0 0 0',
      '00000004: 00000000 00000000 00000000 00000000  brk 0 0 0',
      'Halted at pc 0x4 after 2 instructions',
    ]);
  });
});

describe('runCpu', () => {
  it('should run across several batches up to the limit', async () => {
    const cpu = new TabletCpu();
    cpu.loadProgram([OPCODE.LPC, 2, 0, 0]);
    const limit = BATCH_SIZE * 2 + 5;
    expect(await runCpu(cpu, limit)).toBe(CpuState.RUNNING);
    expect(cpu.cycles).toBe(limit);
  });

  it('should stop as soon as the program halts', async () => {
    const cpu = new TabletCpu();
    expect(await runCpu(cpu)).toBe(CpuState.HALTED);
    expect(cpu.cycles).toBe(1);
  });
});
