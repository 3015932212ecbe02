import { describe, it, expect } from 'vitest';
import {
  SixelDisplay,
  DEFAULT_DISPLAY_ADDRESS,
  DEFAULT_DISPLAY_WIDTH,
  DEFAULT_DISPLAY_HEIGHT,
  MAX_DISPLAY_SIZE,
  checkFrameBuffer,
} from '../src/emulator/display.js';
import { CURSOR_HOME, SIXEL_BEGIN, SIXEL_END } from '../src/emulator/sixel.js';
import { SparseMemory } from '../src/emulator/memory.js';
import { TabletCpu } from '../src/emulator/cpu.js';
import { OPCODE } from '../src/emulator/opcodes.js';

function collector(): { frames: string[]; write(frame: string): void } {
  const frames: string[] = [];
  return { frames, write: (frame: string) => frames.push(frame) };
}

describe('SixelDisplay', () => {
  it('should use the default frame buffer', () => {
    const display = new SixelDisplay();
    expect(display.address).toBe(DEFAULT_DISPLAY_ADDRESS);
    expect(display.width).toBe(DEFAULT_DISPLAY_WIDTH);
    expect(display.height).toBe(DEFAULT_DISPLAY_HEIGHT);
    expect(display.getLastFrame()).toBe('');
    expect(display.getFrameCount()).toBe(0);
  });

  it('should reject an empty frame buffer', () => {
    expect(() => new SixelDisplay({ width: 0 })).toThrow(RangeError);
    expect(() => new SixelDisplay({ height: 2.5 })).toThrow(RangeError);
  });

  it('should reject a frame buffer that runs past the end of memory', () => {
    expect(() => new SixelDisplay({ address: 0xffffff00 })).toThrow(
      'Frame buffer of 512x684 at 0xffffff00 runs past the end of memory'
    );
    expect(() => checkFrameBuffer(0xfffffffa, 1, 7)).toThrow(RangeError);
  });

  it('should accept a frame buffer ending on the last word', () => {
    const display = new SixelDisplay({ address: 0xfffffffa, width: 1, height: 6 });
    display.refresh(new SparseMemory());
    expect(display.getLastFrame()).toBe(CURSOR_HOME + SIXEL_BEGIN + '?$-' + SIXEL_END);
  });

  it('should reject oversized frame buffers', () => {
    expect(() => new SixelDisplay({ address: 0, width: MAX_DISPLAY_SIZE + 1, height: 1 })).toThrow(
      `Invalid display size 4097x1, expected 1 to 4096 per side`
    );
  });

  it('should render the frame buffer row by row', () => {
    const sink = collector();
    const display = new SixelDisplay({ address: 0x10, width: 2, height: 6, output: sink });
    const memory = new SparseMemory();
    memory.write(0x10, 1); // x=0, y=0
    memory.write(0x10 + 2 * 5 + 1, 1); // x=1, y=5

    display.refresh(memory);

    const expected = CURSOR_HOME + SIXEL_BEGIN + '@_$-' + SIXEL_END;
    expect(sink.frames).toEqual([expected]);
    expect(display.getLastFrame()).toBe(expected);
    expect(display.getFrameCount()).toBe(1);
  });

  it('should render with a border', () => {
    const display = new SixelDisplay({ address: 0, width: 1, height: 6, border: true });
    display.refresh(new SparseMemory());
    expect(display.getLastFrame()).toBe(CURSOR_HOME + SIXEL_BEGIN + '___$-~?~$-@@@$-' + SIXEL_END);
  });

  it('should be refreshed by drw', () => {
    const sink = collector();
    const display = new SixelDisplay({ address: 0x100, width: 1, height: 6, output: sink });
    const cpu = new TabletCpu({ display });
    cpu.loadProgram([OPCODE.DRW, 0, 0, 0, OPCODE.DRW, 0, 0, 0]);
    cpu.memory.load([1, 1, 1, 1, 1, 1], 0x100);

    cpu.run();

    expect(sink.frames).toHaveLength(2);
    expect(sink.frames[1]).toBe(CURSOR_HOME + SIXEL_BEGIN + '~$-' + SIXEL_END);
  });
});
