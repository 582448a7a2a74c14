import {
    TypeExpression, TypeArgument, NameTypeExpression, NamedTupleField, ParseError
} from '../types';
import { Result, ok } from '../result';
import { TokenType } from './lexer';
import { Parser } from './parser';

/**
 * type: primary ('or' primary)*
 */
export function parseType(parser: Parser): Result<TypeExpression, ParseError> {
    return parser.nested<TypeExpression>(() => {
        const location = parser.getLocation();
        const first = parsePrimaryType(parser);
        if (!first.ok) {
            return first;
        }
        const members: TypeExpression[] = [first.value];
        while (parser.match(TokenType.OR)) {
            const next = parsePrimaryType(parser);
            if (!next.ok) {
                return next;
            }
            members.push(next.value);
        }
        if (members.length === 1) {
            return ok(members[0]);
        }
        return ok({ kind: 'union', members, location });
    });
}

export function parseDottedName(parser: Parser): Result<string, ParseError> {
    const first = parser.consume(TokenType.NAME);
    if (!first.ok) {
        return first;
    }
    let name = first.value.value;
    while (parser.check(TokenType.DOT) && parser.checkNext(TokenType.NAME)) {
        parser.advance();
        name += '.' + parser.advance().value;
    }
    return ok(name);
}

function parsePrimaryType(parser: Parser): Result<TypeExpression, ParseError> {
    const location = parser.getLocation();

    if (parser.match(TokenType.QUESTION)) {
        return ok({ kind: 'anything', location });
    }

    if (parser.match(TokenType.LEFT_PAREN)) {
        const inner = parseType(parser);
        if (!inner.ok) {
            return inner;
        }
        const close = parser.consume(TokenType.RIGHT_PAREN);
        return close.ok ? inner : close;
    }

    if (parser.match(TokenType.LEFT_BRACKET)) {
        const items: TypeExpression[] = [];
        while (!parser.check(TokenType.RIGHT_BRACKET)) {
            const item = parseType(parser);
            if (!item.ok) {
                return item;
            }
            items.push(item.value);
            if (!parser.match(TokenType.COMMA)) {
                break;
            }
        }
        const close = parser.consume(TokenType.RIGHT_BRACKET);
        if (!close.ok) {
            return close;
        }
        return ok({ kind: 'list', items, location });
    }

    if (!parser.check(TokenType.NAME)) {
        return parser.unexpected();
    }

    if (parser.peek().value === 'NamedTuple' && parser.checkNext(TokenType.LEFT_PAREN)) {
        return parseNamedTuple(parser);
    }

    const name = parseDottedName(parser);
    if (!name.ok) {
        return name;
    }
    const base: NameTypeExpression = { kind: 'name', name: name.value, location };

    if (!parser.match(TokenType.LEFT_BRACKET)) {
        return ok(base);
    }

    const parameters: TypeArgument[] = [];
    do {
        if (parser.check(TokenType.RIGHT_BRACKET)) {
            break;
        }
        const argumentLocation = parser.getLocation();
        if (parser.match(TokenType.ELLIPSIS)) {
            parameters.push({ kind: 'ellipsis', location: argumentLocation });
            continue;
        }
        const parameter = parseType(parser);
        if (!parameter.ok) {
            return parameter;
        }
        parameters.push(parameter.value);
    } while (parser.match(TokenType.COMMA));

    const close = parser.consume(TokenType.RIGHT_BRACKET);
    if (!close.ok) {
        return close;
    }
    if (parameters.length === 0) {
        return parser.errorAt('syntax error, unexpected \']\'', close.value.location);
    }
    return ok({ kind: 'generic', base, parameters, location });
}

/**
 * NamedTuple(name, [(field, type), ...])
 */
function parseNamedTuple(parser: Parser): Result<TypeExpression, ParseError> {
    const location = parser.getLocation();
    parser.advance();
    parser.advance();

    let name: string;
    if (parser.check(TokenType.NAME) || parser.check(TokenType.STRING)) {
        name = parser.advance().value;
    } else {
        return parser.unexpected('NAME');
    }

    const comma = parser.consume(TokenType.COMMA);
    if (!comma.ok) {
        return comma;
    }
    const open = parser.consume(TokenType.LEFT_BRACKET);
    if (!open.ok) {
        return open;
    }

    const fields: NamedTupleField[] = [];
    while (parser.check(TokenType.LEFT_PAREN)) {
        const fieldLocation = parser.getLocation();
        parser.advance();
        if (!parser.check(TokenType.NAME) && !parser.check(TokenType.STRING)) {
            return parser.unexpected('NAME');
        }
        const fieldName = parser.advance().value;
        const separator = parser.consume(TokenType.COMMA);
        if (!separator.ok) {
            return separator;
        }
        const type = parseType(parser);
        if (!type.ok) {
            return type;
        }
        parser.match(TokenType.COMMA);
        const close = parser.consume(TokenType.RIGHT_PAREN);
        if (!close.ok) {
            return close;
        }
        fields.push({ name: fieldName, type: type.value, location: fieldLocation });
        if (!parser.match(TokenType.COMMA)) {
            break;
        }
    }

    const closeList = parser.consume(TokenType.RIGHT_BRACKET);
    if (!closeList.ok) {
        return closeList;
    }
    parser.match(TokenType.COMMA);
    const close = parser.consume(TokenType.RIGHT_PAREN);
    if (!close.ok) {
        return close;
    }
    return ok({ kind: 'namedTuple', name, fields, location });
}
