// Core type definitions for the stub parser: locations, errors and the raw syntax tree

export interface Position {
  line: number;
  column: number;
}

export interface SourceLocation {
  start: Position;
  end: Position;
  filename?: string;
}

export interface ParseErrorDetails {
  line?: number;
  column?: number;
  filename?: string;
  text?: string;
}

const EXCERPT_INDENT = 4;

export class ParseError extends Error {
  readonly line?: number;
  readonly column?: number;
  readonly filename?: string;
  readonly text?: string;

  constructor(message: string, details: ParseErrorDetails = {}) {
    super(message);
    this.name = 'ParseError';
    this.line = details.line;
    this.column = details.column;
    this.filename = details.filename;
    this.text = details.text;
  }

  static at(message: string, location?: SourceLocation): ParseError {
    if (!location) {
      return new ParseError(message);
    }
    return new ParseError(message, {
      line: location.start.line,
      column: location.start.column,
      filename: location.filename,
    });
  }

  /**
   * Attaches the offending source line and the filename. Errors without a
   * line (module-wide checks) are returned unchanged.
   */
  withSource(source: string, filename?: string): ParseError {
    if (this.line === undefined) {
      return this;
    }
    const text = source.split(/\r?\n/)[this.line - 1];
    return new ParseError(this.message, {
      line: this.line,
      column: this.column,
      filename: filename ?? this.filename,
      text,
    });
  }

  format(): string {
    const lines: string[] = [];
    if (this.filename !== undefined || this.line !== undefined) {
      lines.push(`  File: "${this.filename ?? 'None'}", line ${this.line ?? 'None'}`);
    }
    if (this.text !== undefined && this.column !== undefined) {
      const stripped = this.text.trimStart();
      lines.push(' '.repeat(EXCERPT_INDENT) + stripped);
      // Columns are 1-based; shift left by the whitespace removed above.
      const caret = EXCERPT_INDENT + (this.column - 1) - (this.text.length - stripped.length);
      lines.push(' '.repeat(Math.max(0, caret)) + '^');
    }
    lines.push(`${this.name}: ${this.message}`);
    return lines.join('\n');
  }

  override toString(): string {
    return this.format();
  }
}

export interface ASTNode {
  kind: string;
  location: SourceLocation;
}

// Type expressions, as written

export type TypeExpression =
  | NameTypeExpression
  | GenericTypeExpression
  | ListTypeExpression
  | UnionTypeExpression
  | AnythingTypeExpression
  | NamedTupleTypeExpression;

export interface NameTypeExpression extends ASTNode {
  kind: 'name';
  name: string;
}

export interface EllipsisExpression extends ASTNode {
  kind: 'ellipsis';
}

export type TypeArgument = TypeExpression | EllipsisExpression;

export interface GenericTypeExpression extends ASTNode {
  kind: 'generic';
  base: NameTypeExpression;
  parameters: TypeArgument[];
}

/** `[A, B]` shorthand, also the argument list of `Callable[[A, B], R]`. */
export interface ListTypeExpression extends ASTNode {
  kind: 'list';
  items: TypeExpression[];
}

export interface UnionTypeExpression extends ASTNode {
  kind: 'union';
  members: TypeExpression[];
}

/** `?` */
export interface AnythingTypeExpression extends ASTNode {
  kind: 'anything';
}

export interface NamedTupleField {
  name: string;
  type: TypeExpression;
  location: SourceLocation;
}

export interface NamedTupleTypeExpression extends ASTNode {
  kind: 'namedTuple';
  name: string;
  fields: NamedTupleField[];
}

// Conditions of `if` statements

export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';

export interface SliceKey {
  kind: 'slice';
  start?: number;
  stop?: number;
  step?: number;
}

export interface IndexKey {
  kind: 'index';
  index: number;
}

export type ConditionLiteral =
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'tuple'; items: ConditionLiteral[] };

export interface ComparisonCondition extends ASTNode {
  kind: 'comparison';
  subject: string;
  key?: IndexKey | SliceKey;
  operator: ComparisonOperator;
  value: ConditionLiteral;
}

/** A flat `or`/`and` chain; always holds at least two operands. */
export interface LogicalCondition extends ASTNode {
  kind: 'or' | 'and';
  operands: Condition[];
}

export type Condition = ComparisonCondition | LogicalCondition;

// Statements

export type Statement =
  | ImportStatement
  | FromImportStatement
  | ConstantDeclaration
  | AliasDeclaration
  | TypeVarDeclaration
  | FunctionDeclaration
  | ClassDeclaration
  | IfStatement<Statement>;

export type ClassMember =
  | ConstantDeclaration
  | AliasDeclaration
  | FunctionDeclaration
  | IfStatement<ClassMember>;

export interface ImportedModule {
  name: string;
  asName?: string;
  location: SourceLocation;
}

export interface ImportStatement extends ASTNode {
  kind: 'import';
  modules: ImportedModule[];
}

export interface ImportedName {
  name: string;
  asName?: string;
}

export interface FromImportStatement extends ASTNode {
  kind: 'fromImport';
  module: string;
  names: ImportedName[];
  wildcard: boolean;
}

export type NumberLiteral = { kind: 'number'; value: number; isFloat: boolean; text: string };

export interface ConstantDeclaration extends ASTNode {
  kind: 'constant';
  name: string;
  /** From a `# type:` comment or a `name: T` annotation. */
  type?: TypeExpression;
  literal?: NumberLiteral;
}

/** `name = T`; `True`/`False` values become `bool` constants. */
export interface AliasDeclaration extends ASTNode {
  kind: 'alias';
  name: string;
  value: TypeExpression;
}

export interface TypeVarDeclaration extends ASTNode {
  kind: 'typeVar';
  name: string;
  nameArgument: string;
  constraints: TypeExpression[];
}

export interface Decorator {
  text: string;
  location: SourceLocation;
}

export type DefaultValue =
  | NumberLiteral
  | { kind: 'name'; name: string }
  | { kind: 'ellipsis' };

export type ParameterDeclaration =
  | { kind: 'parameter'; name: string; type?: TypeExpression; defaultValue?: DefaultValue; location: SourceLocation }
  | { kind: 'star'; name?: string; type?: TypeExpression; location: SourceLocation }
  | { kind: 'starStar'; name: string; type?: TypeExpression; location: SourceLocation }
  | { kind: 'ellipsis'; location: SourceLocation };

export type BodyStatement =
  | { kind: 'mutator'; name: string; type: TypeExpression; location: SourceLocation }
  | { kind: 'raise'; type: TypeExpression; location: SourceLocation };

export interface FunctionDeclaration extends ASTNode {
  kind: 'function';
  name: string;
  decorators: Decorator[];
  parameters: ParameterDeclaration[];
  returnType?: TypeExpression;
  body: BodyStatement[];
  /** `def f PYTHONCODE` */
  external: boolean;
}

export type ParentArgument =
  | { kind: 'parent'; type: TypeExpression; location: SourceLocation }
  | { kind: 'keyword'; keyword: string; value: TypeExpression; location: SourceLocation };

export interface ClassDeclaration extends ASTNode {
  kind: 'class';
  name: string;
  parents: ParentArgument[];
  body: ClassMember[];
}

export interface IfBranch<T> {
  /** Absent for `else`. */
  condition?: Condition;
  body: T[];
  location: SourceLocation;
}

export interface IfStatement<T extends ASTNode> extends ASTNode {
  kind: 'if';
  branches: IfBranch<T>[];
}

export interface StubFile {
  kind: 'stubFile';
  body: Statement[];
  location: SourceLocation;
}
