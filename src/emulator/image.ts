/**
 * Binary program images
 *
 * A flat sequence of words, each stored as 4 little-endian bytes,
 * loaded at address 0.
 */

export const WORD_BYTES = 4;

export function encodeImage(words: ArrayLike<number>): Uint8Array {
  const bytes = new Uint8Array(words.length * WORD_BYTES);
  const view = new DataView(bytes.buffer);
  for (let i = 0; i < words.length; i++) {
    view.setUint32(i * WORD_BYTES, words[i] >>> 0, true);
  }
  return bytes;
}

export function decodeImage(bytes: Uint8Array): Uint32Array {
  if (bytes.length % WORD_BYTES !== 0) {
    throw new Error(`Invalid image: ${bytes.length} bytes is not a whole number of words`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const words = new Uint32Array(bytes.length / WORD_BYTES);
  for (let i = 0; i < words.length; i++) {
    words[i] = view.getUint32(i * WORD_BYTES, true);
  }
  return words;
}
