import {
    FunctionDeclaration, ClassDeclaration, Decorator, BodyStatement, ParentArgument, ParseError
} from '../types';
import { Result, ok } from '../result';
import { TokenType } from './lexer';
import { Parser } from './parser';
import { parseType, parseDottedName } from './parser-types';
import { parseParameterList } from './parser-parameters';
import { parseSuite, parseClassMember, endStatementWith } from './parser-statements';

function parseDecorators(parser: Parser): Result<Decorator[], ParseError> {
    const decorators: Decorator[] = [];
    while (parser.check(TokenType.AT)) {
        const location = parser.getLocation();
        parser.advance();
        const name = parseDottedName(parser);
        if (!name.ok) {
            return name;
        }
        const newline = parser.consume(TokenType.NEWLINE);
        if (!newline.ok) {
            return newline;
        }
        decorators.push({ text: name.value, location });
    }
    return ok(decorators);
}

/**
 * [decorators] 'def' NAME ( PYTHONCODE | '(' params ')' ['->' type] [':' body] )
 */
export function parseFunctionDeclaration(parser: Parser): Result<FunctionDeclaration, ParseError> {
    const decorators = parseDecorators(parser);
    if (!decorators.ok) {
        return decorators;
    }

    const location = parser.getLocation();
    const def = parser.consume(TokenType.DEF);
    if (!def.ok) {
        return def;
    }
    const name = parser.consume(TokenType.NAME);
    if (!name.ok) {
        return name;
    }

    const declaration: FunctionDeclaration = {
        kind: 'function',
        name: name.value.value,
        decorators: decorators.value,
        parameters: [],
        body: [],
        external: false,
        location
    };

    if (parser.match(TokenType.PYTHONCODE)) {
        declaration.external = true;
        return endStatementWith(parser, declaration);
    }

    const open = parser.consume(TokenType.LEFT_PAREN);
    if (!open.ok) {
        return open;
    }
    const parameters = parseParameterList(parser);
    if (!parameters.ok) {
        return parameters;
    }
    declaration.parameters = parameters.value;
    const close = parser.consume(TokenType.RIGHT_PAREN);
    if (!close.ok) {
        return close;
    }

    if (parser.match(TokenType.ARROW)) {
        const returnType = parseType(parser);
        if (!returnType.ok) {
            return returnType;
        }
        declaration.returnType = returnType.value;
    }

    if (!parser.match(TokenType.COLON)) {
        return endStatementWith(parser, declaration);
    }

    const body = parseSuite(parser, parseBodyStatement);
    if (!body.ok) {
        return body;
    }
    declaration.body = body.value;
    return ok(declaration);
}

/**
 * Function bodies hold only mutators (`x := T`) and `raise` statements;
 * `pass`, `...` and docstrings are empty.
 */
function parseBodyStatement(parser: Parser): Result<BodyStatement | null, ParseError> {
    const location = parser.getLocation();

    if (parser.check(TokenType.PASS) || parser.check(TokenType.ELLIPSIS) || parser.check(TokenType.STRING)) {
        parser.advance();
        return endStatementWith(parser, null);
    }

    if (parser.match(TokenType.RAISE)) {
        const type = parseType(parser);
        if (!type.ok) {
            return type;
        }
        if (parser.match(TokenType.LEFT_PAREN)) {
            const close = parser.consume(TokenType.RIGHT_PAREN);
            if (!close.ok) {
                return close;
            }
        }
        return endStatementWith<BodyStatement>(parser, { kind: 'raise', type: type.value, location });
    }

    if (parser.check(TokenType.NAME) && parser.checkNext(TokenType.COLON_ASSIGN)) {
        const name = parser.advance().value;
        parser.advance();
        const type = parseType(parser);
        if (!type.ok) {
            return type;
        }
        return endStatementWith<BodyStatement>(parser, { kind: 'mutator', name, type: type.value, location });
    }

    return parser.unexpected();
}

/**
 * 'class' NAME ['(' parents ')'] ':' body
 */
export function parseClassDeclaration(parser: Parser): Result<ClassDeclaration, ParseError> {
    const location = parser.getLocation();
    parser.advance();
    const name = parser.consume(TokenType.NAME);
    if (!name.ok) {
        return name;
    }

    const parents: ParentArgument[] = [];
    if (parser.match(TokenType.LEFT_PAREN)) {
        while (!parser.check(TokenType.RIGHT_PAREN)) {
            const parent = parseParentArgument(parser);
            if (!parent.ok) {
                return parent;
            }
            parents.push(parent.value);
            if (!parser.match(TokenType.COMMA)) {
                break;
            }
        }
        const close = parser.consume(TokenType.RIGHT_PAREN);
        if (!close.ok) {
            return close;
        }
    }

    const colon = parser.consume(TokenType.COLON);
    if (!colon.ok) {
        return colon;
    }
    const body = parseSuite(parser, parseClassMember);
    if (!body.ok) {
        return body;
    }

    return ok({ kind: 'class', name: name.value.value, parents, body: body.value, location });
}

function parseParentArgument(parser: Parser): Result<ParentArgument, ParseError> {
    const location = parser.getLocation();
    if (parser.check(TokenType.NAME) && parser.checkNext(TokenType.ASSIGN)) {
        const keyword = parser.advance().value;
        parser.advance();
        const value = parseType(parser);
        if (!value.ok) {
            return value;
        }
        return ok({ kind: 'keyword', keyword, value: value.value, location });
    }
    const type = parseType(parser);
    if (!type.ok) {
        return type;
    }
    return ok({ kind: 'parent', type: type.value, location });
}
