/**
 * Tablet Assembler
 *
 * Two-pass assembler that converts assembly source to a word image loaded
 * at address 0. Every instruction is four words: opcode, A, B, C.
 */

import {
  Parser,
  AST,
  NodeType,
  InstructionNode,
  MacroNode,
  LabelNode,
  OperandNode,
  OperandType,
  ParserError,
  MAX_OPERANDS,
  isHexText,
} from './parser.js';
import { LexerError } from './lexer.js';
import { INSTRUCTION_WORDS } from '../emulator/opcodes.js';
import { SparseMemory } from '../emulator/memory.js';

/**
 * What a relative operand `/n` counts:
 * - 'instruction': n instructions, resolving to address + 4n
 * - 'word': n words, resolving to address + n (a cell inside the instruction)
 */
export type RelativeUnit = 'instruction' | 'word';

export interface AssemblerOptions {
  /** Default 'instruction' */
  relativeUnit?: RelativeUnit;
}

export interface AssemblerError {
  message: string;
  line: number;
  column: number;
}

export interface AssemblerResult {
  words: Uint32Array;
  symbols: Map<string, number>;
  errors: AssemblerError[];
}

/**
 * Thrown by assembleProgram when the source has errors
 */
export class AssemblyError extends Error {
  constructor(public errors: AssemblerError[]) {
    super(errors.map((e) => `line ${e.line}, column ${e.column}: ${e.message}`).join('\n'));
    this.name = 'AssemblyError';
  }
}

export class Assembler {
  private source: string;
  private relativeScale: number;
  private symbols: Map<string, number> = new Map();
  private output: number[] = [];
  private address: number = 0;
  private errors: AssemblerError[] = [];

  constructor(source: string, options: AssemblerOptions = {}) {
    this.source = source;
    this.relativeScale = (options.relativeUnit ?? 'instruction') === 'instruction' ? INSTRUCTION_WORDS : 1;
  }

  assemble(): AssemblerResult {
    this.symbols = new Map();
    this.output = [];
    this.address = 0;
    this.errors = [];

    // Parse source
    const parser = new Parser(this.source);
    let ast: AST;
    try {
      ast = parser.parse();
    } catch (e: unknown) {
      if (!(e instanceof LexerError || e instanceof ParserError)) {
        throw e;
      }
      this.errors.push({
        message: e.message,
        line: e.line,
        column: e.column,
      });
      return this.result(false);
    }

    // Pass 1: Collect labels and calculate addresses
    this.pass1(ast);

    if (this.errors.length > 0) {
      return this.result(false);
    }

    // Pass 2: Generate words
    this.pass2(ast);

    return this.result(this.errors.length === 0);
  }

  /**
   * Assemble and write the image into memory at address 0
   */
  assembleInto(memory: SparseMemory): AssemblerResult {
    const result = this.assemble();
    if (result.errors.length === 0) {
      memory.load(result.words);
    }
    return result;
  }

  private result(ok: boolean): AssemblerResult {
    return {
      words: ok ? Uint32Array.from(this.output) : new Uint32Array(),
      symbols: this.symbols,
      errors: this.errors,
    };
  }

  private pass1(ast: AST): void {
    this.address = 0;

    for (const stmt of ast.statements) {
      switch (stmt.type) {
        case NodeType.LABEL:
          this.pass1Label(stmt);
          break;
        case NodeType.INSTRUCTION:
          this.address += INSTRUCTION_WORDS;
          break;
        case NodeType.MACRO:
          this.address += stmt.macro.size * INSTRUCTION_WORDS;
          break;
      }
    }
  }

  private pass1Label(node: LabelNode): void {
    if (this.symbols.has(node.name)) {
      this.errors.push({
        message: `Duplicate label '${node.name}'`,
        line: node.line,
        column: node.column,
      });
      return;
    }
    this.symbols.set(node.name, this.address);
  }

  private pass2(ast: AST): void {
    this.address = 0;

    for (const stmt of ast.statements) {
      switch (stmt.type) {
        case NodeType.LABEL:
          // Labels don't emit words
          break;
        case NodeType.INSTRUCTION:
          this.pass2Instruction(stmt);
          break;
        case NodeType.MACRO:
          this.pass2Macro(stmt);
          break;
      }
    }
  }

  private pass2Instruction(node: InstructionNode): void {
    const operands = this.resolveOperands(node.operands, MAX_OPERANDS);
    this.emit([node.opcode, ...operands]);
  }

  private pass2Macro(node: MacroNode): void {
    const { macro } = node;
    const args = this.resolveOperands(node.operands, macro.operands.length);
    const start = this.address;
    for (const instruction of macro.expand(start, args)) {
      this.emit(instruction);
    }
  }

  /**
   * Resolve operands, padding missing trailing ones with 0
   */
  private resolveOperands(operands: OperandNode[], count: number): number[] {
    const values: number[] = [];
    for (let i = 0; i < count; i++) {
      const operand = operands[i];
      values.push(operand ? this.resolveOperand(operand) : 0);
    }
    return values;
  }

  private resolveOperand(operand: OperandNode): number {
    switch (operand.type) {
      case OperandType.NUMBER:
        return operand.value;

      case OperandType.RELATIVE:
        return (this.address + operand.offset * this.relativeScale) >>> 0;

      case OperandType.SYMBOL: {
        // A label shadows the hex reading of the same name
        const value = this.symbols.get(operand.name) ?? operand.literal;
        if (value === undefined) {
          this.errors.push({
            message: isHexText(operand.name)
              ? `Malformed operand '${operand.name}'`
              : `Undefined label '${operand.name}'`,
            line: operand.line,
            column: operand.column,
          });
          return 0;
        }
        return value;
      }
    }
  }

  private emit(words: number[]): void {
    for (const word of words) {
      this.output.push(word >>> 0);
    }
    this.address += INSTRUCTION_WORDS;
  }
}

/**
 * Assemble source, throwing AssemblyError if it has errors
 */
export function assembleProgram(source: string, options: AssemblerOptions = {}): AssemblerResult {
  const result = new Assembler(source, options).assemble();
  if (result.errors.length > 0) {
    throw new AssemblyError(result.errors);
  }
  return result;
}
