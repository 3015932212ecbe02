/**
 * Assembler Macros
 *
 * Conditional and unconditional jumps built from base instructions.
 * Each macro has a fixed size so pass 1 can lay out addresses before any
 * operand is resolved. Expansions refer to their own operand cells by
 * address: `lpc k+2 T` jumps through its own B word, and the compare
 * macros park M[X] - M[Y] (or M[X] < M[Y]) in the B word of their `beq`.
 */

import { OPCODE, INSTRUCTION_WORDS } from '../emulator/opcodes.js';

export type MacroName = 'jmp' | 'jez' | 'jnz' | 'jeq' | 'jne' | 'jlt';

export interface MacroDefinition {
  name: MacroName;
  /** Operand names, in source order */
  operands: readonly string[];
  /** Number of base instructions in the expansion */
  size: number;
  /** Base instructions [opcode, a, b, c] for a macro placed at `address` */
  expand(address: number, args: readonly number[]): number[][];
}

const at = (address: number, offset: number): number => (address + offset) >>> 0;

/** Three-instruction "branch if nonzero": skip the jump when the cell is 0 */
function branchIfSet(opcode: number, k: number, x: number, y: number, target: number): number[][] {
  const end = at(k, 3 * INSTRUCTION_WORDS);
  return [
    [opcode, at(k, 6), x, y],
    [OPCODE.BEQ, at(k, 7), at(k, 6), end],
    [OPCODE.LPC, at(k, 10), target, 0],
  ];
}

const DEFINITIONS: MacroDefinition[] = [
  {
    name: 'jmp',
    operands: ['target'],
    size: 1,
    expand: (k, [target]) => [[OPCODE.LPC, at(k, 2), target, 0]],
  },
  {
    name: 'jez',
    operands: ['cell', 'target'],
    size: 1,
    expand: (k, [cell, target]) => [[OPCODE.BEQ, at(k, 3), cell, target]],
  },
  {
    name: 'jnz',
    operands: ['cell', 'target'],
    size: 2,
    expand: (k, [cell, target]) => [
      [OPCODE.BEQ, at(k, 3), cell, at(k, 2 * INSTRUCTION_WORDS)],
      [OPCODE.LPC, at(k, 6), target, 0],
    ],
  },
  {
    name: 'jeq',
    operands: ['x', 'y', 'target'],
    size: 2,
    expand: (k, [x, y, target]) => [
      [OPCODE.SUB, at(k, 6), x, y],
      [OPCODE.BEQ, at(k, 7), at(k, 6), target],
    ],
  },
  {
    name: 'jne',
    operands: ['x', 'y', 'target'],
    size: 3,
    expand: (k, [x, y, target]) => branchIfSet(OPCODE.SUB, k, x, y, target),
  },
  {
    name: 'jlt',
    operands: ['x', 'y', 'target'],
    size: 3,
    expand: (k, [x, y, target]) => branchIfSet(OPCODE.CMP, k, x, y, target),
  },
];

export const MACROS: ReadonlyMap<string, MacroDefinition> = new Map(
  DEFINITIONS.map((definition) => [definition.name, definition])
);

/**
 * Look up a macro by name (case-insensitive)
 */
export function macroOf(name: string): MacroDefinition | undefined {
  return MACROS.get(name.toLowerCase());
}
