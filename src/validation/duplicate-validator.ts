// Identifier uniqueness checks for a finished module and its classes

import { ParseError, SourceLocation } from '../types';
import { ClassDecl } from '../model';
import { Result, ok, error } from '../result';

/** Names that occur more than once, sorted and listed once each. */
export function findDuplicates(names: Iterable<string>): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      duplicates.add(name);
    }
    seen.add(name);
  }
  return [...duplicates].sort();
}

/**
 * Top-level names must be unique across constants, functions, classes,
 * aliases and type variables. The error carries no location.
 */
export function checkTopLevelIdentifiers(names: Iterable<string>): Result<void, ParseError> {
  const duplicates = findDuplicates(names);
  if (duplicates.length > 0) {
    return error(new ParseError(`Duplicate top-level identifier(s): ${duplicates.join(', ')}`));
  }
  return ok(undefined);
}

/** Constants and methods of one class share a namespace. */
export function checkClassIdentifiers(cls: ClassDecl, location: SourceLocation): Result<void, ParseError> {
  const names = [...cls.constants.map(c => c.name), ...cls.methods.map(m => m.name)];
  const duplicates = findDuplicates(names);
  if (duplicates.length > 0) {
    return error(ParseError.at(`Duplicate identifier(s): ${duplicates.join(', ')}`, location));
  }
  return ok(undefined);
}
