import {
    Condition, ComparisonOperator, ConditionLiteral, IndexKey, SliceKey, ParseError
} from '../types';
import { Result, ok } from '../result';
import { TokenType } from './lexer';
import { Parser } from './parser';
import { parseDottedName } from './parser-types';

const COMPARISON_OPERATORS: ReadonlyMap<TokenType, ComparisonOperator> = new Map<TokenType, ComparisonOperator>([
    [TokenType.EQUAL, '=='],
    [TokenType.NOT_EQUAL, '!='],
    [TokenType.LESS_THAN, '<'],
    [TokenType.LESS_EQUAL, '<='],
    [TokenType.GREATER_THAN, '>'],
    [TokenType.GREATER_EQUAL, '>=']
]);

/**
 * condition: conjunction ('or' conjunction)*
 */
export function parseCondition(parser: Parser): Result<Condition, ParseError> {
    return parser.nested<Condition>(() => parseChain(parser, 'or', TokenType.OR, parseConjunction));
}

function parseConjunction(parser: Parser): Result<Condition, ParseError> {
    return parseChain(parser, 'and', TokenType.AND, parseConditionAtom);
}

function parseChain(
    parser: Parser,
    kind: 'or' | 'and',
    separator: TokenType,
    parseOperand: (parser: Parser) => Result<Condition, ParseError>
): Result<Condition, ParseError> {
    const location = parser.getLocation();
    const first = parseOperand(parser);
    if (!first.ok) {
        return first;
    }
    const operands: Condition[] = [first.value];
    while (parser.match(separator)) {
        const next = parseOperand(parser);
        if (!next.ok) {
            return next;
        }
        operands.push(next.value);
    }
    if (operands.length === 1) {
        return ok(operands[0]);
    }
    return ok({ kind, operands, location });
}

function parseConditionAtom(parser: Parser): Result<Condition, ParseError> {
    if (parser.match(TokenType.LEFT_PAREN)) {
        const inner = parseCondition(parser);
        if (!inner.ok) {
            return inner;
        }
        const close = parser.consume(TokenType.RIGHT_PAREN);
        return close.ok ? inner : close;
    }

    const location = parser.getLocation();
    const subject = parseDottedName(parser);
    if (!subject.ok) {
        return subject;
    }

    let key: IndexKey | SliceKey | undefined;
    if (parser.match(TokenType.LEFT_BRACKET)) {
        const parsedKey = parseKey(parser);
        if (!parsedKey.ok) {
            return parsedKey;
        }
        key = parsedKey.value;
        const close = parser.consume(TokenType.RIGHT_BRACKET);
        if (!close.ok) {
            return close;
        }
    }

    const operator = COMPARISON_OPERATORS.get(parser.peek().type);
    if (!operator) {
        return parser.unexpected();
    }
    parser.advance();

    const value = parseLiteral(parser);
    if (!value.ok) {
        return value;
    }
    return ok({ kind: 'comparison', subject: subject.value, key, operator, value: value.value, location });
}

function parseInteger(parser: Parser): Result<number | undefined, ParseError> {
    const negative = parser.match(TokenType.MINUS);
    if (!parser.check(TokenType.NUMBER)) {
        return negative ? parser.unexpected('NUMBER') : ok(undefined);
    }
    const token = parser.advance();
    if (!/^\d+$/.test(token.value)) {
        return parser.errorAt('syntax error, unexpected NUMBER', token.location);
    }
    const value = parseInt(token.value, 10);
    return ok(negative ? -value : value);
}

/**
 * key: INT | [INT] ':' [INT] [':' [INT]]
 */
function parseKey(parser: Parser): Result<IndexKey | SliceKey, ParseError> {
    const start = parseInteger(parser);
    if (!start.ok) {
        return start;
    }
    if (!parser.match(TokenType.COLON)) {
        if (start.value === undefined) {
            return parser.unexpected('NUMBER');
        }
        return ok({ kind: 'index', index: start.value });
    }

    const stop = parseInteger(parser);
    if (!stop.ok) {
        return stop;
    }
    let step: number | undefined;
    if (parser.match(TokenType.COLON)) {
        const parsedStep = parseInteger(parser);
        if (!parsedStep.ok) {
            return parsedStep;
        }
        step = parsedStep.value;
    }
    return ok({ kind: 'slice', start: start.value, stop: stop.value, step });
}

function parseLiteral(parser: Parser): Result<ConditionLiteral, ParseError> {
    return parser.nested<ConditionLiteral>(() => {
        if (parser.check(TokenType.STRING)) {
            return ok({ kind: 'string', value: parser.advance().value });
        }

        if (parser.match(TokenType.LEFT_PAREN)) {
            const items: ConditionLiteral[] = [];
            let sawComma = false;
            while (!parser.check(TokenType.RIGHT_PAREN)) {
                const item = parseLiteral(parser);
                if (!item.ok) {
                    return item;
                }
                items.push(item.value);
                if (!parser.match(TokenType.COMMA)) {
                    break;
                }
                sawComma = true;
            }
            const close = parser.consume(TokenType.RIGHT_PAREN);
            if (!close.ok) {
                return close;
            }
            // A parenthesized value without a comma is not a tuple.
            if (items.length === 1 && !sawComma) {
                return ok(items[0]);
            }
            return ok({ kind: 'tuple', items });
        }

        const negative = parser.match(TokenType.MINUS);
        if (!parser.check(TokenType.NUMBER)) {
            return parser.unexpected();
        }
        const token = parser.advance();
        const magnitude = Number(token.value);
        const value = negative ? -magnitude : magnitude;
        return ok(/^\d+$/.test(token.value) ? { kind: 'int', value } : { kind: 'float', value });
    });
}
