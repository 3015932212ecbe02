/**
 * Sixel Encoder
 *
 * Converts a monochrome frame buffer (one word per pixel, nonzero = lit)
 * into DEC sixel graphics. Each output character covers a column of six
 * pixels: the top pixel is bit 0, the character is 63 + bits.
 */

export const SIXEL_BEGIN = '\x1bPq';
export const SIXEL_END = '\x1b\\';
export const CURSOR_HOME = '\x1b[1;1H';
export const CLEAR_SCREEN = '\x1b[2J';

const SIXEL_OFFSET = 63;
const BAND_HEIGHT = 6;
const NEXT_BAND = '$-';

// Border characters
const TOP_EDGE = String.fromCharCode(SIXEL_OFFSET + (1 << 5)); // '_', bottom pixel lit
const BOTTOM_EDGE = String.fromCharCode(SIXEL_OFFSET + 1); // '@', top pixel lit
const SIDE_EDGE = String.fromCharCode(SIXEL_OFFSET + 0x3f); // '~', full column

/**
 * Encode pixels into sixel data (without the begin/end sequences)
 */
export function encodeSixels(
  pixels: ArrayLike<number>,
  width: number,
  height: number,
  border: boolean = false
): string {
  const out: string[] = [];

  if (border) {
    out.push(TOP_EDGE.repeat(width + 2), NEXT_BAND);
  }

  for (let row = 0; row < height; row += BAND_HEIGHT) {
    if (border) {
      out.push(SIDE_EDGE);
    }

    for (let x = 0; x < width; x++) {
      let bits = 0;
      for (let y = 0; y < BAND_HEIGHT; y++) {
        const offset = x + (row + y) * width;
        if (row + y < height && offset < pixels.length && pixels[offset] !== 0) {
          bits |= 1 << y;
        }
      }
      out.push(String.fromCharCode(SIXEL_OFFSET + bits));
    }

    if (border) {
      out.push(SIDE_EDGE);
    }
    out.push(NEXT_BAND);
  }

  if (border) {
    out.push(BOTTOM_EDGE.repeat(width + 2), NEXT_BAND);
  }

  return out.join('');
}

/**
 * Full terminal frame: home the cursor, then the sixel image
 */
export function renderFrame(
  pixels: ArrayLike<number>,
  width: number,
  height: number,
  border: boolean = false
): string {
  return CURSOR_HOME + SIXEL_BEGIN + encodeSixels(pixels, width, height, border) + SIXEL_END;
}
