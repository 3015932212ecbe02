/**
 * Sixel Display
 *
 * Frame buffer display for terminals that understand sixel graphics.
 * The frame buffer is a width x height block of words in main memory;
 * `drw` asks the display to render it.
 */

import { SparseMemory, MAX_ADDRESS } from './memory.js';
import { renderFrame } from './sixel.js';

export const DEFAULT_DISPLAY_ADDRESS = 0x100000;
export const DEFAULT_DISPLAY_WIDTH = 512;
export const DEFAULT_DISPLAY_HEIGHT = 684;

/** Largest width or height in pixels */
export const MAX_DISPLAY_SIZE = 4096;

/**
 * Throw RangeError unless a width x height frame buffer at `address` fits
 * in memory
 */
export function checkFrameBuffer(address: number, width: number, height: number): void {
  if (
    !Number.isInteger(width) || width <= 0 || width > MAX_DISPLAY_SIZE ||
    !Number.isInteger(height) || height <= 0 || height > MAX_DISPLAY_SIZE
  ) {
    throw new RangeError(`Invalid display size ${width}x${height}, expected 1 to ${MAX_DISPLAY_SIZE} per side`);
  }
  if (!Number.isInteger(address) || address < 0 || address + width * height - 1 > MAX_ADDRESS) {
    throw new RangeError(
      `Frame buffer of ${width}x${height} at 0x${address.toString(16)} runs past the end of memory`
    );
  }
}

/**
 * Receiver of the `drw` instruction
 */
export interface DisplayDevice {
  refresh(memory: SparseMemory): void;
}

/** Anything frames can be written to (e.g. process.stdout) */
export interface FrameSink {
  write(frame: string): unknown;
}

export interface SixelDisplayConfig {
  /** First word of the frame buffer (default 0x100000) */
  address?: number;
  /** Width in pixels (default 512) */
  width?: number;
  /** Height in pixels (default 684) */
  height?: number;
  /** Draw a one-pixel border around the image */
  border?: boolean;
  /** Where rendered frames go; frames are only kept in memory without one */
  output?: FrameSink;
}

export class SixelDisplay implements DisplayDevice {
  readonly address: number;
  readonly width: number;
  readonly height: number;
  private readonly border: boolean;
  private readonly output: FrameSink | null;
  private lastFrame: string = '';
  private frames: number = 0;

  constructor(config: SixelDisplayConfig = {}) {
    this.address = config.address ?? DEFAULT_DISPLAY_ADDRESS;
    this.width = config.width ?? DEFAULT_DISPLAY_WIDTH;
    this.height = config.height ?? DEFAULT_DISPLAY_HEIGHT;
    this.border = config.border ?? false;
    this.output = config.output ?? null;

    checkFrameBuffer(this.address, this.width, this.height);
  }

  refresh(memory: SparseMemory): void {
    const pixels = memory.dump(this.address, this.width * this.height);
    this.lastFrame = renderFrame(pixels, this.width, this.height, this.border);
    this.frames++;
    this.output?.write(this.lastFrame);
  }

  /**
   * The most recently rendered frame, or '' before the first refresh
   */
  getLastFrame(): string {
    return this.lastFrame;
  }

  getFrameCount(): number {
    return this.frames;
  }
}
