/**
 * Instruction Set
 *
 * Every instruction is four words: opcode, A, B, C.
 * M[x] below is the word at address x.
 */

export const OPCODE = {
  BRK: 0, // Halt
  LPC: 1, // PC <- M[A]
  BEQ: 2, // If M[B] = 0, PC <- M[A]
  SPC: 3, // M[A] <- PC
  LEA: 4, // M[A] <- M[B]
  LRA: 5, // M[A] <- M[M[B]]
  SRA: 6, // M[M[B]] <- M[A]
  ADD: 7, // M[A] <- M[B] + M[C]
  SUB: 8, // M[A] <- M[B] - M[C]
  MUL: 9, // M[A] <- M[B] * M[C]
  DIV: 10, // M[A] <- M[B] / M[C]
  MOD: 11, // M[A] <- M[B] % M[C]
  CMP: 12, // M[A] <- M[B] < M[C] ? 1 : 0
  NAD: 13, // M[A] <- NOT(M[B] AND M[C])
  DRW: 14, // Refresh the display
  KEY: 15, // M[A] <- last key pressed
  NOP: 16, // Nothing
} as const;

export type Mnemonic = Lowercase<keyof typeof OPCODE>;
export type Opcode = (typeof OPCODE)[keyof typeof OPCODE];

export const INSTRUCTION_WORDS = 4;

/** Mnemonics indexed by opcode */
export const MNEMONICS: readonly Mnemonic[] = [
  'brk', 'lpc', 'beq', 'spc', 'lea', 'lra', 'sra', 'add', 'sub',
  'mul', 'div', 'mod', 'cmp', 'nad', 'drw', 'key', 'nop',
];

export function isOpcode(value: number): value is Opcode {
  return Number.isInteger(value) && value >= OPCODE.BRK && value <= OPCODE.NOP;
}

export function mnemonicOf(opcode: number): Mnemonic | undefined {
  return isOpcode(opcode) ? MNEMONICS[opcode] : undefined;
}

/**
 * Look up an opcode by name (case-insensitive)
 */
export function opcodeOf(name: string): Opcode | undefined {
  const lower = name.toLowerCase();
  const index = MNEMONICS.findIndex((mnemonic) => mnemonic === lower);
  return index >= 0 && isOpcode(index) ? index : undefined;
}
