// Parser for stub files

import { Token, TokenType } from './lexer';
import { SourceLocation, ParseError, Statement, StubFile } from '../types';
import { Result, ok, error } from '../result';
import { parseStatement } from './parser-statements';

const MAX_NESTING_DEPTH = 100;

// Tokens whose text does not describe them well get a symbolic name.
const TOKEN_NAMES: ReadonlyMap<TokenType, string> = new Map([
  [TokenType.NAME, 'NAME'],
  [TokenType.NUMBER, 'NUMBER'],
  [TokenType.STRING, 'STRING'],
  [TokenType.TYPECOMMENT, 'TYPECOMMENT'],
  [TokenType.NEWLINE, 'NEWLINE'],
  [TokenType.INDENT, 'INDENT'],
  [TokenType.DEDENT, 'DEDENT'],
  [TokenType.EOF, 'end of file'],
  [TokenType.ARROW, 'ARROW'],
  [TokenType.COLON_ASSIGN, 'COLONEQUALS'],
  [TokenType.DOUBLE_STAR, "'**'"],
  [TokenType.ELLIPSIS, 'ELLIPSIS'],
  [TokenType.EQUAL, 'EQ'],
  [TokenType.NOT_EQUAL, 'NE'],
  [TokenType.LESS_EQUAL, 'LE'],
  [TokenType.GREATER_EQUAL, 'GE']
]);

export function describeToken(type: TokenType): string {
  const name = TOKEN_NAMES.get(type);
  if (name) {
    return name;
  }
  // Keywords are spelled in upper case, punctuation is quoted.
  return /^[a-zA-Z]+$/.test(type) ? type.toUpperCase() : `'${type}'`;
}

export class Parser {
  public readonly tokens: Token[];
  public current: number = 0;
  public readonly filename?: string;
  private depth = 0;

  constructor(tokens: Token[], filename?: string) {
    this.tokens = tokens;
    this.filename = filename;
  }

  parse(): Result<StubFile, ParseError> {
    const location = this.getLocation();
    const body: Statement[] = [];

    while (!this.isAtEnd()) {
      if (this.match(TokenType.NEWLINE)) {
        continue;
      }
      const statement = parseStatement(this);
      if (!statement.ok) {
        return statement;
      }
      if (statement.value) {
        body.push(statement.value);
      }
    }

    return ok({ kind: 'stubFile', body, location });
  }

  public match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  public check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  /** True when the token after the current one has the given type. */
  public checkNext(type: TokenType): boolean {
    return this.peek(1).type === type;
  }

  public advance(): Token {
    const token = this.peek();
    if (!this.isAtEnd()) {
      this.current++;
    }
    return token;
  }

  public isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  public peek(offset: number = 0): Token {
    return this.tokens[Math.min(this.current + offset, this.tokens.length - 1)];
  }

  /**
   * Consumes a token of the given type or fails with a syntax error.
   * `expecting` describes the alternatives when more than one would do.
   */
  public consume(type: TokenType, expecting?: string): Result<Token, ParseError> {
    if (this.check(type)) {
      return ok(this.advance());
    }
    return this.unexpected(expecting ?? describeToken(type));
  }

  /** Syntax error at the current token. */
  public unexpected(expecting?: string): Result<never, ParseError> {
    const token = this.peek();
    const message = `syntax error, unexpected ${describeToken(token.type)}` +
      (expecting ? `, expecting ${expecting}` : '');
    return error(ParseError.at(message, token.location));
  }

  public errorAt(message: string, location: SourceLocation): Result<never, ParseError> {
    return error(ParseError.at(message, location));
  }

  /**
   * Runs a recursive production, failing once nesting exceeds a fixed depth.
   */
  public nested<T>(production: () => Result<T, ParseError>): Result<T, ParseError> {
    if (this.depth >= MAX_NESTING_DEPTH) {
      return this.errorAt('Maximum nesting depth exceeded', this.getLocation());
    }
    this.depth++;
    try {
      return production();
    } finally {
      this.depth--;
    }
  }

  public getLocation(): SourceLocation {
    const token = this.peek();
    return {
      ...token.location,
      filename: this.filename
    };
  }
}
