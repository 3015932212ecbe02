/**
 * Tablet Assembler Lexer
 *
 * Tokenizes assembly source into words, label definitions, relative
 * references and line breaks. Whether a word is a mnemonic, a label
 * reference or a hex number is decided later, by position and by the
 * symbol table.
 */

export enum TokenType {
  // Names and numbers; classified by the parser
  WORD = 'WORD',
  LABEL_DEF = 'LABEL_DEF',

  // `/n` offset from the current instruction
  RELATIVE = 'RELATIVE',

  NEWLINE = 'NEWLINE',

  // End of file
  EOF = 'EOF',
}

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}

// LF, VT, FF, NEL, LS, PS. CR is handled separately so CRLF is one break.
const LINE_BREAKS = new Set(['\n', '\u000b', '\u000c', '\u0085', '\u2028', '\u2029']);

export class LexerError extends Error {
  constructor(message: string, public line: number, public column: number) {
    super(`${message} at line ${line}, column ${column}`);
    this.name = 'LexerError';
  }
}

export class Lexer {
  private source: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;
  private tokens: Token[] = [];

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;
    this.line = 1;
    this.column = 1;

    while (!this.isAtEnd()) {
      this.scanToken();
    }

    this.tokens.push({
      type: TokenType.EOF,
      value: '',
      line: this.line,
      column: this.column,
    });

    return this.tokens;
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.source[this.pos];
  }

  private advance(): string {
    const char = this.source[this.pos++];
    this.column++;
    return char;
  }

  private newline(startLine: number, startColumn: number): void {
    this.tokens.push({
      type: TokenType.NEWLINE,
      value: '\n',
      line: startLine,
      column: startColumn,
    });
    this.line++;
    this.column = 1;
  }

  private scanToken(): void {
    const startLine = this.line;
    const startColumn = this.column;
    const char = this.advance();

    if (LINE_BREAKS.has(char)) {
      this.newline(startLine, startColumn);
      return;
    }

    switch (char) {
      case ' ':
      case '\t':
        break;

      case '\r':
        if (this.peek() === '\n') {
          this.pos++;
        }
        this.newline(startLine, startColumn);
        break;

      case ';':
        // Skip comment until end of line
        while (!this.isAtEnd() && !this.isLineBreak(this.peek())) {
          this.advance();
        }
        break;

      case '/':
        this.scanRelative(startLine, startColumn);
        break;

      default:
        if (this.isWordChar(char)) {
          this.pos--; // Put back the character
          this.column--;
          this.scanWord(startLine, startColumn);
        } else {
          throw new LexerError(`Unexpected character '${char}'`, startLine, startColumn);
        }
    }
  }

  private isLineBreak(char: string): boolean {
    return char === '\r' || LINE_BREAKS.has(char);
  }

  private isWordChar(char: string): boolean {
    return /^[A-Za-z0-9_.-]$/.test(char);
  }

  private scanRelative(startLine: number, startColumn: number): void {
    let digits = '';
    while (!this.isAtEnd() && this.isWordChar(this.peek())) {
      digits += this.advance();
    }

    if (digits === '') {
      throw new LexerError(`Expected offset after '/'`, startLine, startColumn);
    }

    this.tokens.push({
      type: TokenType.RELATIVE,
      value: digits,
      line: startLine,
      column: startColumn,
    });
  }

  private scanWord(startLine: number, startColumn: number): void {
    let text = '';
    while (!this.isAtEnd() && this.isWordChar(this.peek())) {
      text += this.advance();
    }

    // Label definition (followed by colon)
    if (this.peek() === ':') {
      this.advance(); // consume colon
      this.tokens.push({
        type: TokenType.LABEL_DEF,
        value: text,
        line: startLine,
        column: startColumn,
      });
      return;
    }

    this.tokens.push({
      type: TokenType.WORD,
      value: text,
      line: startLine,
      column: startColumn,
    });
  }
}
