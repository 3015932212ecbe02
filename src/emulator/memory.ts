/**
 * Sparse Word Memory
 *
 * 2^32 addressable 32-bit words. Backing storage is split into fixed-size
 * pages that are only allocated when first written, so untouched addresses
 * cost nothing and always read as 0.
 */

export const MAX_ADDRESS = 0xffffffff;

/** Words per page (16 KiB of backing storage) */
export const PAGE_WORDS = 4096;
const PAGE_MASK = PAGE_WORDS - 1;

function checkAddress(address: number): void {
  if (!Number.isInteger(address) || address < 0 || address > MAX_ADDRESS) {
    throw new RangeError(`Address out of range: ${address}`);
  }
}

export class SparseMemory {
  private pages: Map<number, Uint32Array> = new Map();

  /**
   * Read a word. Never-written addresses read as 0.
   */
  read(address: number): number {
    const page = this.pages.get(SparseMemory.pageOf(address));
    return page ? page[address & PAGE_MASK] : 0;
  }

  /**
   * Write a word, truncated to 32 bits
   */
  write(address: number, value: number): void {
    const pageNumber = SparseMemory.pageOf(address);
    let page = this.pages.get(pageNumber);
    if (!page) {
      page = new Uint32Array(PAGE_WORDS);
      this.pages.set(pageNumber, page);
    }
    page[address & PAGE_MASK] = value >>> 0;
  }

  /**
   * Copy a block of words into memory starting at `base`
   */
  load(words: ArrayLike<number>, base: number = 0): void {
    checkAddress(base);
    if (words.length > 0) {
      checkAddress(base + words.length - 1);
    }
    for (let i = 0; i < words.length; i++) {
      this.write(base + i, words[i]);
    }
  }

  /**
   * Copy `length` words starting at `start` out of memory
   */
  dump(start: number, length: number): Uint32Array {
    checkAddress(start);
    if (length > 0) {
      checkAddress(start + length - 1);
    }
    const out = new Uint32Array(length);
    for (let i = 0; i < length; i++) {
      out[i] = this.read(start + i);
    }
    return out;
  }

  clear(): void {
    this.pages.clear();
  }

  /**
   * Number of pages that currently have backing storage
   */
  get allocatedPages(): number {
    return this.pages.size;
  }

  /**
   * Page number that holds the given address. Throws RangeError outside
   * the 32-bit address space.
   */
  static pageOf(address: number): number {
    checkAddress(address);
    return Math.floor(address / PAGE_WORDS);
  }
}
