/**
 * Keyboard Controller
 *
 * Latches the most recent key press. The CPU polls it with the `key`
 * instruction; a poll returns the latched code and clears it, so a second
 * poll with no key pressed in between returns 0.
 */

/**
 * Source of key codes for the `key` instruction
 */
export interface InputDevice {
  /** Most recent key code since the last call, or 0 */
  readKey(): number;
}

/** Minimal byte stream the controller can listen to (e.g. process.stdin) */
export interface KeySource {
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
}

export class KeyboardController implements InputDevice {
  private latched: number = 0;
  private source: KeySource | null = null;
  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
    if (bytes.length > 0) {
      // Only the last key in a burst is kept
      this.keyPress(bytes[bytes.length - 1]);
    }
  };

  /**
   * Press a key, replacing any key not yet read
   */
  keyPress(code: number): void {
    this.latched = code >>> 0;
  }

  /**
   * Read and consume the latched key
   * Returns 0 if no key was pressed since the last read
   */
  readKey(): number {
    const code = this.latched;
    this.latched = 0;
    return code;
  }

  /**
   * Drop any latched key
   */
  clear(): void {
    this.latched = 0;
  }

  /**
   * Feed the controller from a byte stream until detached
   */
  attach(source: KeySource): void {
    this.detach();
    this.source = source;
    source.on('data', this.onData);
  }

  detach(): void {
    if (this.source) {
      this.source.off('data', this.onData);
      this.source = null;
    }
  }
}
