import {
    ImportStatement, FromImportStatement, ImportedModule, ImportedName, ParseError
} from '../types';
import { Result, ok } from '../result';
import { TokenType } from './lexer';
import { Parser } from './parser';
import { parseDottedName } from './parser-types';
import { endStatementWith } from './parser-statements';

/**
 * import a.b.c [as d], ...
 */
export function parseImportStatement(parser: Parser): Result<ImportStatement, ParseError> {
    const location = parser.getLocation();
    parser.advance();

    const modules: ImportedModule[] = [];
    do {
        const moduleLocation = parser.getLocation();
        const name = parseDottedName(parser);
        if (!name.ok) {
            return name;
        }
        let asName: string | undefined;
        if (parser.match(TokenType.AS)) {
            const alias = parser.consume(TokenType.NAME);
            if (!alias.ok) {
                return alias;
            }
            asName = alias.value.value;
        }
        modules.push({ name: name.value, asName, location: moduleLocation });
    } while (parser.match(TokenType.COMMA));

    return endStatementWith<ImportStatement>(parser, { kind: 'import', modules, location });
}

/**
 * from [.]*module import (name [as alias], ... [,]) | *
 */
export function parseFromImportStatement(parser: Parser): Result<FromImportStatement, ParseError> {
    const location = parser.getLocation();
    parser.advance();

    let module = '';
    while (parser.check(TokenType.DOT) || parser.check(TokenType.ELLIPSIS)) {
        module += parser.advance().value;
    }
    if (parser.check(TokenType.NAME) || module === '') {
        const name = parseDottedName(parser);
        if (!name.ok) {
            return name;
        }
        module += name.value;
    }

    const keyword = parser.consume(TokenType.IMPORT);
    if (!keyword.ok) {
        return keyword;
    }

    if (parser.match(TokenType.STAR)) {
        return endStatementWith<FromImportStatement>(parser, {
            kind: 'fromImport', module, names: [], wildcard: true, location
        });
    }

    const parenthesized = parser.match(TokenType.LEFT_PAREN);
    const names: ImportedName[] = [];
    do {
        if (parenthesized && parser.check(TokenType.RIGHT_PAREN)) {
            break;
        }
        const name = parser.consume(TokenType.NAME);
        if (!name.ok) {
            return name;
        }
        let asName: string | undefined;
        if (parser.match(TokenType.AS)) {
            const alias = parser.consume(TokenType.NAME);
            if (!alias.ok) {
                return alias;
            }
            asName = alias.value.value;
        }
        names.push({ name: name.value.value, asName });
    } while (parser.match(TokenType.COMMA));

    if (parenthesized) {
        const close = parser.consume(TokenType.RIGHT_PAREN);
        if (!close.ok) {
            return close;
        }
    }

    return endStatementWith<FromImportStatement>(parser, {
        kind: 'fromImport', module, names, wildcard: false, location
    });
}
