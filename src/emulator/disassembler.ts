/**
 * Disassembler
 *
 * Decodes four-word instructions and formats them as assembler source.
 * Formatted output reassembles to the same words.
 */

import { SparseMemory } from './memory.js';
import { INSTRUCTION_WORDS, Mnemonic, mnemonicOf } from './opcodes.js';

export interface DecodedInstruction {
  address: number;
  opcode: number;
  a: number;
  b: number;
  c: number;
  /** undefined when the opcode is outside the instruction set */
  mnemonic: Mnemonic | undefined;
}

function hex(value: number): string {
  return value.toString(16);
}

/**
 * Decode the instruction whose opcode word is at `address`
 */
export function decodeInstruction(memory: SparseMemory, address: number): DecodedInstruction {
  const opcode = memory.read(address);
  return {
    address,
    opcode,
    a: memory.read((address + 1) >>> 0),
    b: memory.read((address + 2) >>> 0),
    c: memory.read((address + 3) >>> 0),
    mnemonic: mnemonicOf(opcode),
  };
}

/**
 * Decode `count` consecutive instructions starting at `start`
 */
export function disassemble(memory: SparseMemory, start: number, count: number): DecodedInstruction[] {
  const instructions: DecodedInstruction[] = [];
  for (let i = 0; i < count; i++) {
    instructions.push(decodeInstruction(memory, (start + i * INSTRUCTION_WORDS) >>> 0));
  }
  return instructions;
}

/**
 * Decode a flat word array (such as assembler output) from address 0
 */
export function disassembleWords(words: ArrayLike<number>): DecodedInstruction[] {
  const memory = new SparseMemory();
  memory.load(words);
  return disassemble(memory, 0, Math.ceil(words.length / INSTRUCTION_WORDS));
}

/**
 * Format as `mnemonic a b c` in lowercase hex. Opcodes outside the
 * instruction set are written as 0x-prefixed data words, since some of
 * them (0xadd) would otherwise read back as mnemonics.
 */
export function formatInstruction(instruction: DecodedInstruction): string {
  const name = instruction.mnemonic ?? `0x${hex(instruction.opcode)}`;
  return `${name} ${hex(instruction.a)} ${hex(instruction.b)} ${hex(instruction.c)}`;
}

/**
 * Listing line: address, raw words, source form
 */
export function formatListingLine(instruction: DecodedInstruction): string {
  const words = [instruction.opcode, instruction.a, instruction.b, instruction.c]
    .map((word) => hex(word).padStart(8, '0'))
    .join(' ');
  return `${hex(instruction.address).padStart(8, '0')}: ${words}  ${formatInstruction(instruction)}`;
}
