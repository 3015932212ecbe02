import { describe, it, expect } from 'vitest';
import { encodeImage, decodeImage } from '../src/emulator/image.js';

describe('Program images', () => {
  it('should store words little-endian', () => {
    expect(Array.from(encodeImage([1, 0x12345678]))).toEqual([1, 0, 0, 0, 0x78, 0x56, 0x34, 0x12]);
  });

  it('should decode words', () => {
    const words = decodeImage(Uint8Array.from([0x10, 0, 0, 0, 0xff, 0xff, 0xff, 0xff]));
    expect(Array.from(words)).toEqual([0x10, 0xffffffff]);
  });

  it('should decode a Buffer slice', () => {
    const buffer = Buffer.from([0xaa, 7, 0, 0, 0]);
    expect(Array.from(decodeImage(buffer.subarray(1)))).toEqual([7]);
  });

  it('should reject a partial word', () => {
    expect(() => decodeImage(new Uint8Array(3))).toThrow(
      'Invalid image: 3 bytes is not a whole number of words'
    );
  });
});
