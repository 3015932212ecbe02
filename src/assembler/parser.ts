/**
 * Tablet Assembler Parser
 *
 * Parses tokens into an AST of label definitions, instructions and macro
 * invocations. One statement per line.
 */

import { Lexer, Token, TokenType } from './lexer.js';
import { MacroDefinition, macroOf } from './macros.js';
import { opcodeOf } from '../emulator/opcodes.js';

export enum NodeType {
  INSTRUCTION = 'INSTRUCTION',
  MACRO = 'MACRO',
  LABEL = 'LABEL',
}

export enum OperandType {
  /** Hex literal that cannot be a label name (starts with a digit) */
  NUMBER = 'NUMBER',
  /**
   * Label reference; `literal` is set when the name is also valid hex.
   * Names written as hex but too wide for a word have no literal.
   */
  SYMBOL = 'SYMBOL',
  /** `/n`, counted from the current instruction */
  RELATIVE = 'RELATIVE',
}

export type OperandNode =
  | { type: OperandType.NUMBER; value: number; line: number; column: number }
  | { type: OperandType.SYMBOL; name: string; literal?: number; line: number; column: number }
  | { type: OperandType.RELATIVE; offset: number; line: number; column: number };

export interface InstructionNode {
  type: NodeType.INSTRUCTION;
  mnemonic: string;
  /** Opcode word; values above 16 are data */
  opcode: number;
  operands: OperandNode[];
  line: number;
  column: number;
}

export interface MacroNode {
  type: NodeType.MACRO;
  macro: MacroDefinition;
  operands: OperandNode[];
  line: number;
  column: number;
}

export interface LabelNode {
  type: NodeType.LABEL;
  name: string;
  line: number;
  column: number;
}

export type ASTNode = InstructionNode | MacroNode | LabelNode;

export interface AST {
  statements: ASTNode[];
}

export const MAX_OPERANDS = 3;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_.-]*$/;
const HEX = /^(0[xX])?([0-9A-Fa-f]+)$/;

/**
 * Parse a hex number, or return undefined if the text is not one or does
 * not fit in 32 bits
 */
export function parseHex(text: string): number | undefined {
  const match = HEX.exec(text);
  if (!match) {
    return undefined;
  }
  const value = parseInt(match[2], 16);
  return value <= 0xffffffff ? value : undefined;
}

/**
 * True when the text is written as hex, whether or not it fits in 32 bits
 */
export function isHexText(text: string): boolean {
  return HEX.test(text);
}

export function isIdentifier(text: string): boolean {
  return IDENTIFIER.test(text);
}

export class ParserError extends Error {
  constructor(message: string, public line: number, public column: number) {
    super(`${message} at line ${line}, column ${column}`);
    this.name = 'ParserError';
  }
}

export class Parser {
  private tokens: Token[] = [];
  private pos: number = 0;
  private source: string;

  constructor(source: string) {
    this.source = source;
  }

  parse(): AST {
    const lexer = new Lexer(this.source);
    this.tokens = lexer.tokenize();
    this.pos = 0;

    const statements: ASTNode[] = [];

    while (!this.isAtEnd()) {
      // Skip newlines
      while (this.check(TokenType.NEWLINE)) {
        this.advance();
      }

      if (this.isAtEnd()) break;

      statements.push(this.parseStatement());
      this.expectEndOfStatement();
    }

    return { statements };
  }

  private parseStatement(): ASTNode {
    const token = this.peek();

    if (token.type === TokenType.LABEL_DEF) {
      return this.parseLabelDefinition();
    }

    if (token.type === TokenType.WORD) {
      return this.parseInstruction();
    }

    throw new ParserError(`Unexpected token '${token.value}'`, token.line, token.column);
  }

  private parseLabelDefinition(): LabelNode {
    const token = this.advance();
    if (!isIdentifier(token.value)) {
      throw new ParserError(`Invalid label name '${token.value}'`, token.line, token.column);
    }
    return {
      type: NodeType.LABEL,
      name: token.value,
      line: token.line,
      column: token.column,
    };
  }

  private parseInstruction(): InstructionNode | MacroNode {
    const token = this.advance();
    const mnemonic = token.value;

    const operands: OperandNode[] = [];
    while (!this.checkEndOfStatement()) {
      operands.push(this.parseOperand());
    }

    // Names win over hex: `add` is the opcode, never 0xADD
    const opcode = opcodeOf(mnemonic);
    if (opcode !== undefined) {
      this.checkOperandCount(mnemonic, operands, MAX_OPERANDS, token);
      return { type: NodeType.INSTRUCTION, mnemonic, opcode, operands, line: token.line, column: token.column };
    }

    const macro = macroOf(mnemonic);
    if (macro) {
      this.checkOperandCount(mnemonic, operands, macro.operands.length, token);
      return { type: NodeType.MACRO, macro, operands, line: token.line, column: token.column };
    }

    const word = parseHex(mnemonic);
    if (word !== undefined) {
      this.checkOperandCount(mnemonic, operands, MAX_OPERANDS, token);
      return { type: NodeType.INSTRUCTION, mnemonic, opcode: word, operands, line: token.line, column: token.column };
    }

    throw new ParserError(`Unknown mnemonic '${mnemonic}'`, token.line, token.column);
  }

  private checkOperandCount(mnemonic: string, operands: OperandNode[], max: number, token: Token): void {
    if (operands.length > max) {
      throw new ParserError(
        `'${mnemonic}' takes at most ${max} operand${max === 1 ? '' : 's'}, got ${operands.length}`,
        token.line,
        token.column
      );
    }
  }

  private parseOperand(): OperandNode {
    const token = this.advance();
    const { line, column } = token;

    if (token.type === TokenType.RELATIVE) {
      const offset = parseHex(token.value);
      if (offset === undefined) {
        throw new ParserError(`Malformed relative operand '/${token.value}'`, line, column);
      }
      return { type: OperandType.RELATIVE, offset, line, column };
    }

    if (token.type === TokenType.WORD) {
      if (isIdentifier(token.value)) {
        const literal = parseHex(token.value);
        return literal === undefined
          ? { type: OperandType.SYMBOL, name: token.value, line, column }
          : { type: OperandType.SYMBOL, name: token.value, literal, line, column };
      }
      const value = parseHex(token.value);
      if (value === undefined) {
        throw new ParserError(`Malformed operand '${token.value}'`, line, column);
      }
      return { type: OperandType.NUMBER, value, line, column };
    }

    throw new ParserError(`Unexpected token '${token.value}'`, line, column);
  }

  private expectEndOfStatement(): void {
    if (!this.checkEndOfStatement()) {
      const token = this.peek();
      throw new ParserError(`Unexpected '${token.value}' after statement`, token.line, token.column);
    }
  }

  private checkEndOfStatement(): boolean {
    return this.check(TokenType.NEWLINE) || this.check(TokenType.EOF);
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private advance(): Token {
    const token = this.tokens[this.pos];
    if (!this.isAtEnd()) {
      this.pos++;
    }
    return token;
  }
}
