// Lexer for stub files

import { Position, SourceLocation, ParseError } from '../types';
import { Result, ok, error } from '../result';

export enum TokenType {
  // Literals
  NAME = 'NAME',
  NUMBER = 'NUMBER',
  STRING = 'STRING',

  // `# type:` opens a type comment; what follows is lexed as ordinary tokens
  TYPECOMMENT = 'TYPECOMMENT',

  // Keywords
  DEF = 'def',
  CLASS = 'class',
  IF = 'if',
  ELIF = 'elif',
  ELSE = 'else',
  AND = 'and',
  OR = 'or',
  IMPORT = 'import',
  FROM = 'from',
  AS = 'as',
  PASS = 'pass',
  RAISE = 'raise',
  PYTHONCODE = 'PYTHONCODE',

  // Operators
  ARROW = '->',
  COLON_ASSIGN = ':=',
  ASSIGN = '=',
  STAR = '*',
  DOUBLE_STAR = '**',
  MINUS = '-',
  QUESTION = '?',
  AT = '@',
  ELLIPSIS = '...',

  // Comparison
  EQUAL = '==',
  NOT_EQUAL = '!=',
  LESS_THAN = '<',
  LESS_EQUAL = '<=',
  GREATER_THAN = '>',
  GREATER_EQUAL = '>=',

  // Punctuation
  COMMA = ',',
  DOT = '.',
  COLON = ':',

  // Brackets
  LEFT_PAREN = '(',
  RIGHT_PAREN = ')',
  LEFT_BRACKET = '[',
  RIGHT_BRACKET = ']',

  // Layout
  NEWLINE = 'NEWLINE',
  INDENT = 'INDENT',
  DEDENT = 'DEDENT',
  EOF = 'EOF'
}

export interface Token {
  type: TokenType;
  value: string;
  location: SourceLocation;
}

// Use a Map for keywords to avoid prototype collisions (e.g. toString)
const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ['def', TokenType.DEF],
  ['class', TokenType.CLASS],
  ['if', TokenType.IF],
  ['elif', TokenType.ELIF],
  ['else', TokenType.ELSE],
  ['and', TokenType.AND],
  ['or', TokenType.OR],
  ['import', TokenType.IMPORT],
  ['from', TokenType.FROM],
  ['as', TokenType.AS],
  ['pass', TokenType.PASS],
  ['raise', TokenType.RAISE],
  ['PYTHONCODE', TokenType.PYTHONCODE]
]);

const TWO_CHAR_OPERATORS: ReadonlyMap<string, TokenType> = new Map([
  ['->', TokenType.ARROW],
  [':=', TokenType.COLON_ASSIGN],
  ['**', TokenType.DOUBLE_STAR],
  ['==', TokenType.EQUAL],
  ['!=', TokenType.NOT_EQUAL],
  ['<=', TokenType.LESS_EQUAL],
  ['>=', TokenType.GREATER_EQUAL]
]);

const SINGLE_CHAR_TOKENS: ReadonlyMap<string, TokenType> = new Map([
  ['(', TokenType.LEFT_PAREN],
  [')', TokenType.RIGHT_PAREN],
  ['[', TokenType.LEFT_BRACKET],
  [']', TokenType.RIGHT_BRACKET],
  [',', TokenType.COMMA],
  ['.', TokenType.DOT],
  [':', TokenType.COLON],
  ['=', TokenType.ASSIGN],
  ['*', TokenType.STAR],
  ['-', TokenType.MINUS],
  ['?', TokenType.QUESTION],
  ['@', TokenType.AT],
  ['<', TokenType.LESS_THAN],
  ['>', TokenType.GREATER_THAN]
]);

const TYPE_COMMENT = /^#[ \t]*type[ \t]*:/;
const TAB_WIDTH = 8;

export class Lexer {
  private readonly input: string;
  private readonly filename?: string;
  private position: number = 0;
  private line: number = 1;
  private column: number = 1;
  private tokens: Token[] = [];
  private indentStack: number[] = [0];
  private bracketDepth = 0;

  constructor(input: string, filename?: string) {
    this.input = input;
    this.filename = filename;
  }

  private current(): string {
    return this.input[this.position] || '';
  }

  private peek(offset: number = 1): string {
    return this.input[this.position + offset] || '';
  }

  private advance(): string {
    const char = this.current();
    this.position++;
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private createPosition(): Position {
    return { line: this.line, column: this.column };
  }

  private createLocation(start: Position): SourceLocation {
    return {
      start,
      end: this.createPosition(),
      filename: this.filename
    };
  }

  private push(type: TokenType, value: string, start: Position): void {
    this.tokens.push({ type, value, location: this.createLocation(start) });
  }

  private fail(message: string, start: Position): Result<never, ParseError> {
    return error(ParseError.at(message, this.createLocation(start)));
  }

  private lastTokenType(): TokenType | undefined {
    return this.tokens.length > 0 ? this.tokens[this.tokens.length - 1].type : undefined;
  }

  private isTypeComment(): boolean {
    return TYPE_COMMENT.test(this.input.slice(this.position, this.position + 64));
  }

  private skipComment(): void {
    while (this.current() !== '\n' && this.current() !== '') {
      this.advance();
    }
  }

  /**
   * Measures the indentation of a new physical line and emits INDENT/DEDENT
   * tokens. Returns false when the line is blank or a plain comment.
   */
  private readIndentation(): Result<boolean, ParseError> {
    const start = this.createPosition();
    let width = 0;
    while (this.current() === ' ' || this.current() === '\t' || this.current() === '\f') {
      width = this.current() === '\t' ? width + TAB_WIDTH - (width % TAB_WIDTH) : width + 1;
      this.advance();
    }

    const char = this.current();
    if (char === '\n' || char === '\r' || char === '') {
      return ok(false);
    }
    if (char === '#') {
      if (this.isTypeComment() && this.lastTokenType() === TokenType.NEWLINE) {
        // A type comment on its own line belongs to the statement above it.
        this.tokens.pop();
        return ok(true);
      }
      this.skipComment();
      return ok(false);
    }

    const top = this.indentStack[this.indentStack.length - 1];
    if (width > top) {
      this.indentStack.push(width);
      this.push(TokenType.INDENT, '', start);
    } else if (width < top) {
      while (width < this.indentStack[this.indentStack.length - 1]) {
        this.indentStack.pop();
        this.push(TokenType.DEDENT, '', this.createPosition());
      }
      if (width !== this.indentStack[this.indentStack.length - 1]) {
        return this.fail('Invalid indentation', this.createPosition());
      }
    }
    return ok(true);
  }

  private readString(start: Position): Result<string, ParseError> {
    const quote = this.current();
    const triple = this.peek() === quote && this.peek(2) === quote;
    const delimiter = triple ? quote.repeat(3) : quote;
    for (let i = 0; i < delimiter.length; i++) {
      this.advance();
    }

    let value = '';
    while (!this.input.startsWith(delimiter, this.position)) {
      const char = this.current();
      if (char === '' || (char === '\n' && !triple)) {
        return this.fail('Unterminated string literal', start);
      }
      if (char === '\\') {
        this.advance();
        value += this.advance();
        continue;
      }
      value += this.advance();
    }
    for (let i = 0; i < delimiter.length; i++) {
      this.advance();
    }
    return ok(value);
  }

  private readNumber(): string {
    let value = '';
    while (/\d/.test(this.current())) {
      value += this.advance();
    }
    if (this.current() === '.' && this.peek() !== '.') {
      value += this.advance();
      while (/\d/.test(this.current())) {
        value += this.advance();
      }
    }
    if ((this.current() === 'e' || this.current() === 'E') && /[\d+-]/.test(this.peek())) {
      value += this.advance();
      if (this.current() === '+' || this.current() === '-') {
        value += this.advance();
      }
      while (/\d/.test(this.current())) {
        value += this.advance();
      }
    }
    return value;
  }

  private readIdentifier(): string {
    let value = '';
    while (/[a-zA-Z0-9_]/.test(this.current())) {
      value += this.advance();
    }
    return value;
  }

  private readQuotedName(start: Position): Result<string, ParseError> {
    const end = this.input.indexOf('`', this.position + 1);
    const newline = this.input.indexOf('\n', this.position + 1);
    if (end < 0 || (newline >= 0 && newline < end) || end === this.position + 1) {
      return this.fail("Illegal character '`'", start);
    }
    let value = '';
    while (this.position <= end) {
      value += this.advance();
    }
    return ok(value);
  }

  tokenize(): Result<Token[], ParseError> {
    this.tokens = [];
    this.indentStack = [0];
    this.bracketDepth = 0;
    let atLineStart = true;

    while (this.position < this.input.length) {
      if (atLineStart && this.bracketDepth === 0) {
        const indentation = this.readIndentation();
        if (!indentation.ok) {
          return indentation;
        }
        if (!indentation.value) {
          if (this.current() === '\r') {
            this.advance();
          }
          if (this.current() === '\n') {
            this.advance();
          }
          continue;
        }
        atLineStart = false;
      }

      const start = this.createPosition();
      const char = this.current();

      // Skip whitespace (except newlines)
      if (char === ' ' || char === '\t' || char === '\r' || char === '\f') {
        this.advance();
        continue;
      }

      if (char === '\\' && (this.peek() === '\n' || (this.peek() === '\r' && this.peek(2) === '\n'))) {
        while (this.current() !== '\n') {
          this.advance();
        }
        this.advance();
        continue;
      }

      // Newlines
      if (char === '\n') {
        this.advance();
        if (this.bracketDepth === 0) {
          this.push(TokenType.NEWLINE, '\n', start);
          atLineStart = true;
        }
        continue;
      }

      // Comments
      if (char === '#') {
        if (this.isTypeComment()) {
          const match = TYPE_COMMENT.exec(this.input.slice(this.position, this.position + 64));
          const length = match ? match[0].length : 1;
          for (let i = 0; i < length; i++) {
            this.advance();
          }
          this.push(TokenType.TYPECOMMENT, '# type:', start);
        } else {
          this.skipComment();
        }
        continue;
      }

      // Strings
      if (char === '"' || char === '\'') {
        const value = this.readString(start);
        if (!value.ok) {
          return value;
        }
        this.push(TokenType.STRING, value.value, start);
        continue;
      }

      // Numbers
      if (/\d/.test(char)) {
        this.push(TokenType.NUMBER, this.readNumber(), start);
        continue;
      }

      // Identifiers and keywords
      if (/[a-zA-Z_]/.test(char)) {
        const value = this.readIdentifier();
        this.push(KEYWORDS.get(value) ?? TokenType.NAME, value, start);
        continue;
      }

      if (char === '`') {
        const value = this.readQuotedName(start);
        if (!value.ok) {
          return value;
        }
        this.push(TokenType.NAME, value.value, start);
        continue;
      }

      if (this.input.startsWith('...', this.position)) {
        this.advance();
        this.advance();
        this.advance();
        this.push(TokenType.ELLIPSIS, '...', start);
        continue;
      }

      const twoChar = char + this.peek();
      const twoCharType = TWO_CHAR_OPERATORS.get(twoChar);
      if (twoCharType) {
        this.advance();
        this.advance();
        this.push(twoCharType, twoChar, start);
        continue;
      }

      const singleCharType = SINGLE_CHAR_TOKENS.get(char);
      if (!singleCharType) {
        return this.fail(`Illegal character '${char}'`, start);
      }
      this.advance();
      if (singleCharType === TokenType.LEFT_PAREN || singleCharType === TokenType.LEFT_BRACKET) {
        this.bracketDepth++;
      } else if (singleCharType === TokenType.RIGHT_PAREN || singleCharType === TokenType.RIGHT_BRACKET) {
        this.bracketDepth = Math.max(0, this.bracketDepth - 1);
      }
      this.push(singleCharType, char, start);
    }

    const end = this.createPosition();
    const last = this.lastTokenType();
    if (last !== undefined && last !== TokenType.NEWLINE) {
      this.push(TokenType.NEWLINE, '', end);
    }
    while (this.indentStack.length > 1) {
      this.indentStack.pop();
      this.push(TokenType.DEDENT, '', end);
    }
    this.push(TokenType.EOF, '', end);

    return ok(this.tokens);
  }
}
