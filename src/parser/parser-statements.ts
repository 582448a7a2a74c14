import {
    ASTNode, Statement, ClassMember, ConstantDeclaration, AliasDeclaration, TypeVarDeclaration,
    IfStatement, IfBranch, TypeExpression, NumberLiteral, ParseError
} from '../types';
import { Result, ok } from '../result';
import { TokenType } from './lexer';
import { Parser } from './parser';
import { parseType } from './parser-types';
import { parseCondition } from './parser-conditions';
import { parseImportStatement, parseFromImportStatement } from './parser-imports';
import { parseFunctionDeclaration, parseClassDeclaration } from './parser-declarations';

export type ItemParser<T> = (parser: Parser) => Result<T | null, ParseError>;

/**
 * Parses one module-level statement. `pass` yields null.
 */
export function parseStatement(parser: Parser): Result<Statement | null, ParseError> {
    switch (parser.peek().type) {
        case TokenType.IMPORT:
            return parseImportStatement(parser);
        case TokenType.FROM:
            return parseFromImportStatement(parser);
        case TokenType.AT:
        case TokenType.DEF:
            return parseFunctionDeclaration(parser);
        case TokenType.CLASS:
            return parseClassDeclaration(parser);
        case TokenType.IF:
            return parseIfStatement<Statement>(parser, parseStatement);
        case TokenType.PASS:
            parser.advance();
            return endStatementWith(parser, null);
        case TokenType.NAME:
            if (isTypeVarDeclaration(parser)) {
                return parseTypeVarDeclaration(parser);
            }
            return parseAssignment(parser);
        default:
            return parser.unexpected();
    }
}

/**
 * Parses one class-body member. `pass`, `...` and docstrings yield null.
 */
export function parseClassMember(parser: Parser): Result<ClassMember | null, ParseError> {
    switch (parser.peek().type) {
        case TokenType.AT:
        case TokenType.DEF:
            return parseFunctionDeclaration(parser);
        case TokenType.IF:
            return parseIfStatement<ClassMember>(parser, parseClassMember);
        case TokenType.PASS:
        case TokenType.ELLIPSIS:
        case TokenType.STRING:
            parser.advance();
            return endStatementWith(parser, null);
        case TokenType.NAME:
            return parseAssignment(parser);
        default:
            return parser.unexpected();
    }
}

/** Skips a trailing `# type: ignore`. */
export function skipTypeIgnore(parser: Parser): void {
    if (parser.check(TokenType.TYPECOMMENT) && parser.peek(1).type === TokenType.NAME && parser.peek(1).value === 'ignore') {
        parser.advance();
        parser.advance();
    }
}

export function endStatement(parser: Parser): Result<true, ParseError> {
    skipTypeIgnore(parser);
    const newline = parser.consume(TokenType.NEWLINE);
    return newline.ok ? ok(true) : newline;
}

export function endStatementWith<T>(parser: Parser, value: T): Result<T, ParseError> {
    const end = endStatement(parser);
    return end.ok ? ok(value) : end;
}

/**
 * Parses the block after a ':': either an indented block or a single item on
 * the same line.
 */
export function parseSuite<T>(parser: Parser, parseItem: ItemParser<T>): Result<T[], ParseError> {
    return parser.nested<T[]>(() => {
        const items: T[] = [];
        skipTypeIgnore(parser);

        if (!parser.match(TokenType.NEWLINE)) {
            const item = parseItem(parser);
            if (!item.ok) {
                return item;
            }
            if (item.value !== null) {
                items.push(item.value);
            }
            return ok(items);
        }

        const indent = parser.consume(TokenType.INDENT);
        if (!indent.ok) {
            return indent;
        }
        while (!parser.match(TokenType.DEDENT)) {
            if (parser.match(TokenType.NEWLINE)) {
                continue;
            }
            if (parser.isAtEnd()) {
                return parser.unexpected();
            }
            const item = parseItem(parser);
            if (!item.ok) {
                return item;
            }
            if (item.value !== null) {
                items.push(item.value);
            }
        }
        return ok(items);
    });
}

/**
 * if_stmt: 'if' condition ':' suite ('elif' condition ':' suite)* ['else' ':' suite]
 */
export function parseIfStatement<T extends ASTNode>(parser: Parser, parseItem: ItemParser<T>): Result<IfStatement<T>, ParseError> {
    const location = parser.getLocation();
    const branches: IfBranch<T>[] = [];
    let branchLocation = location;
    parser.advance();

    for (;;) {
        const condition = parseCondition(parser);
        if (!condition.ok) {
            return condition;
        }
        const colon = parser.consume(TokenType.COLON);
        if (!colon.ok) {
            return colon;
        }
        const body = parseSuite(parser, parseItem);
        if (!body.ok) {
            return body;
        }
        branches.push({ condition: condition.value, body: body.value, location: branchLocation });

        branchLocation = parser.getLocation();
        if (!parser.match(TokenType.ELIF)) {
            break;
        }
    }

    if (parser.match(TokenType.ELSE)) {
        const colon = parser.consume(TokenType.COLON);
        if (!colon.ok) {
            return colon;
        }
        const body = parseSuite(parser, parseItem);
        if (!body.ok) {
            return body;
        }
        branches.push({ body: body.value, location: branchLocation });
    }

    return ok({ kind: 'if', branches, location });
}

function isTypeVarDeclaration(parser: Parser): boolean {
    return parser.checkNext(TokenType.ASSIGN) &&
        parser.peek(2).type === TokenType.NAME &&
        parser.peek(2).value === 'TypeVar' &&
        parser.peek(3).type === TokenType.LEFT_PAREN;
}

/**
 * T = TypeVar('T', constraint, ..., keyword=value, ...)
 */
function parseTypeVarDeclaration(parser: Parser): Result<TypeVarDeclaration, ParseError> {
    const location = parser.getLocation();
    const name = parser.advance().value;
    parser.advance();
    parser.advance();
    parser.advance();

    const nameArgument = parser.consume(TokenType.STRING);
    if (!nameArgument.ok) {
        return nameArgument;
    }

    const constraints: TypeExpression[] = [];
    let sawKeyword = false;
    while (parser.match(TokenType.COMMA)) {
        if (parser.check(TokenType.RIGHT_PAREN)) {
            break;
        }
        if (parser.check(TokenType.NAME) && parser.checkNext(TokenType.ASSIGN)) {
            // Keyword arguments such as bound= are accepted and dropped.
            parser.advance();
            parser.advance();
            sawKeyword = true;
            const value = parseType(parser);
            if (!value.ok) {
                return value;
            }
            continue;
        }
        if (sawKeyword) {
            return parser.unexpected();
        }
        const constraint = parseType(parser);
        if (!constraint.ok) {
            return constraint;
        }
        constraints.push(constraint.value);
    }

    const close = parser.consume(TokenType.RIGHT_PAREN);
    if (!close.ok) {
        return close;
    }
    return endStatementWith<TypeVarDeclaration>(parser, {
        kind: 'typeVar',
        name,
        nameArgument: nameArgument.value.value,
        constraints,
        location
    });
}

/** An optional `# type: T` comment; `# type: ignore` yields undefined. */
function parseTypeComment(parser: Parser): Result<TypeExpression | undefined, ParseError> {
    if (!parser.check(TokenType.TYPECOMMENT)) {
        return ok(undefined);
    }
    const next = parser.peek(1);
    if (next.type === TokenType.NAME && next.value === 'ignore' && parser.peek(2).type === TokenType.NEWLINE) {
        return ok(undefined);
    }
    parser.advance();
    return parseType(parser);
}

function parseNumberLiteral(parser: Parser): Result<NumberLiteral, ParseError> {
    const token = parser.advance();
    const isFloat = !/^\d+$/.test(token.value);
    const value = Number(token.value);
    if (value !== 0) {
        const message = isFloat ? "Only '0.0' allowed as float literal" : "Only '0' allowed as int literal";
        return parser.errorAt(message, token.location);
    }
    return ok({ kind: 'number', value, isFloat, text: token.value });
}

/**
 * Constants and aliases:
 *   x: T [= ...]
 *   x = ...  [# type: T]
 *   x = 0 | 0.0 | True | False
 *   x = T
 */
function parseAssignment(parser: Parser): Result<ConstantDeclaration | AliasDeclaration, ParseError> {
    const location = parser.getLocation();
    const name = parser.advance().value;

    if (parser.match(TokenType.COLON)) {
        const type = parseType(parser);
        if (!type.ok) {
            return type;
        }
        if (parser.match(TokenType.ASSIGN)) {
            const value = parser.consume(TokenType.ELLIPSIS);
            if (!value.ok) {
                return value;
            }
        }
        return endStatementWith<ConstantDeclaration>(parser, { kind: 'constant', name, type: type.value, location });
    }

    if (!parser.match(TokenType.ASSIGN)) {
        return parser.unexpected("':' or '='");
    }

    if (parser.match(TokenType.ELLIPSIS)) {
        const type = parseTypeComment(parser);
        if (!type.ok) {
            return type;
        }
        return endStatementWith<ConstantDeclaration>(parser, { kind: 'constant', name, type: type.value, location });
    }

    if (parser.check(TokenType.NUMBER)) {
        const literal = parseNumberLiteral(parser);
        if (!literal.ok) {
            return literal;
        }
        const type = parseTypeComment(parser);
        if (!type.ok) {
            return type;
        }
        return endStatementWith<ConstantDeclaration>(parser, {
            kind: 'constant', name, type: type.value, literal: literal.value, location
        });
    }

    const value = parser.peek();
    if (value.type === TokenType.NAME && (value.value === 'True' || value.value === 'False') &&
        !parser.checkNext(TokenType.DOT) && !parser.checkNext(TokenType.LEFT_BRACKET)) {
        parser.advance();
        const type: TypeExpression = { kind: 'name', name: 'bool', location: value.location };
        return endStatementWith<ConstantDeclaration>(parser, { kind: 'constant', name, type, location });
    }

    const type = parseType(parser);
    if (!type.ok) {
        return type;
    }
    return endStatementWith<AliasDeclaration>(parser, { kind: 'alias', name, value: type.value, location });
}
