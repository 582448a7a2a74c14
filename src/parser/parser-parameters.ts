import {
    ParameterDeclaration, DefaultValue, TypeExpression, ParseError
} from '../types';
import { Result, ok } from '../result';
import { TokenType } from './lexer';
import { Parser } from './parser';
import { parseType, parseDottedName } from './parser-types';

/**
 * Parses the parameters between '(' and ')'. Ordering rules are checked
 * later, when the signature is built.
 */
export function parseParameterList(parser: Parser): Result<ParameterDeclaration[], ParseError> {
    const parameters: ParameterDeclaration[] = [];

    while (!parser.check(TokenType.RIGHT_PAREN)) {
        const parameter = parseParameter(parser);
        if (!parameter.ok) {
            return parameter;
        }
        parameters.push(parameter.value);
        if (!parser.match(TokenType.COMMA)) {
            break;
        }
    }

    return ok(parameters);
}

function parseAnnotation(parser: Parser): Result<TypeExpression | undefined, ParseError> {
    if (!parser.match(TokenType.COLON)) {
        return ok(undefined);
    }
    return parseType(parser);
}

function parseParameter(parser: Parser): Result<ParameterDeclaration, ParseError> {
    const location = parser.getLocation();

    if (parser.match(TokenType.ELLIPSIS)) {
        return ok({ kind: 'ellipsis', location });
    }

    if (parser.match(TokenType.STAR)) {
        if (!parser.check(TokenType.NAME)) {
            return ok({ kind: 'star', location });
        }
        const name = parser.advance().value;
        const type = parseAnnotation(parser);
        if (!type.ok) {
            return type;
        }
        return ok({ kind: 'star', name, type: type.value, location });
    }

    if (parser.match(TokenType.DOUBLE_STAR)) {
        const name = parser.consume(TokenType.NAME);
        if (!name.ok) {
            return name;
        }
        const type = parseAnnotation(parser);
        if (!type.ok) {
            return type;
        }
        return ok({ kind: 'starStar', name: name.value.value, type: type.value, location });
    }

    const name = parser.consume(TokenType.NAME);
    if (!name.ok) {
        return name;
    }
    const type = parseAnnotation(parser);
    if (!type.ok) {
        return type;
    }

    let defaultValue: DefaultValue | undefined;
    if (parser.match(TokenType.ASSIGN)) {
        const parsed = parseDefaultValue(parser);
        if (!parsed.ok) {
            return parsed;
        }
        defaultValue = parsed.value;
    }

    return ok({ kind: 'parameter', name: name.value.value, type: type.value, defaultValue, location });
}

/**
 * default: NUMBER | '-' NUMBER | dotted_name | '...'
 */
function parseDefaultValue(parser: Parser): Result<DefaultValue, ParseError> {
    if (parser.match(TokenType.ELLIPSIS)) {
        return ok({ kind: 'ellipsis' });
    }

    const negative = parser.match(TokenType.MINUS);
    if (parser.check(TokenType.NUMBER)) {
        const token = parser.advance();
        const magnitude = Number(token.value);
        return ok({
            kind: 'number',
            value: negative ? -magnitude : magnitude,
            isFloat: !/^\d+$/.test(token.value),
            text: (negative ? '-' : '') + token.value
        });
    }
    if (negative) {
        return parser.unexpected('NUMBER');
    }

    if (!parser.check(TokenType.NAME)) {
        return parser.unexpected();
    }
    const name = parseDottedName(parser);
    if (!name.ok) {
        return name;
    }
    return ok({ kind: 'name', name: name.value });
}
