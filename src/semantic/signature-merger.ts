// Groups same-named definitions into functions and property attributes

import { FunctionDeclaration, SourceLocation, ParseError } from '../types';
import { Type, Signature, FunctionDecl, FunctionKind, Constant, ANYTHING } from '../model';
import { Result, ok, error } from '../result';
import { TypeNormalizer } from './type-normalizer';
import { buildSignature } from './signatures';

export type DecoratorTag =
  | { kind: 'property' }
  | { kind: 'setter'; name: string }
  | { kind: 'deleter'; name: string }
  | { kind: 'classmethod' }
  | { kind: 'staticmethod' }
  | { kind: 'overload' }
  | { kind: 'abstractmethod' }
  | { kind: 'unrecognized'; text: string };

const SIMPLE_DECORATORS: ReadonlyMap<string, DecoratorTag> = new Map<string, DecoratorTag>([
  ['property', { kind: 'property' }],
  ['classmethod', { kind: 'classmethod' }],
  ['staticmethod', { kind: 'staticmethod' }],
  ['overload', { kind: 'overload' }],
  ['typing.overload', { kind: 'overload' }],
  ['abstractmethod', { kind: 'abstractmethod' }],
  ['abc.abstractmethod', { kind: 'abstractmethod' }]
]);

export function recognizeDecorator(text: string): DecoratorTag {
  const simple = SIMPLE_DECORATORS.get(text);
  if (simple) {
    return simple;
  }
  const match = /^([A-Za-z_][A-Za-z0-9_]*)\.(setter|deleter)$/.exec(text);
  if (match) {
    return { kind: match[2] === 'setter' ? 'setter' : 'deleter', name: match[1] };
  }
  return { kind: 'unrecognized', text };
}

/** One `def`, with its decorator recognized and its signature built. */
export interface FunctionDefinition {
  readonly name: string;
  readonly decorator?: DecoratorTag;
  readonly decoratorText?: string;
  /** Absent for a `PYTHONCODE` body. */
  readonly signature?: Signature;
  readonly location: SourceLocation;
}

export interface MergedDefinitions {
  readonly functions: FunctionDecl[];
  readonly properties: Constant[];
}

export function toDefinition(
  declaration: FunctionDeclaration,
  normalizer: TypeNormalizer
): Result<FunctionDefinition, ParseError> {
  if (declaration.decorators.length > 1) {
    return error(ParseError.at(`Too many decorators for ${declaration.name}`, declaration.location));
  }
  const decoratorText = declaration.decorators.length > 0 ? declaration.decorators[0].text : undefined;
  const decorator = decoratorText === undefined ? undefined : recognizeDecorator(decoratorText);

  if (declaration.external) {
    return ok({ name: declaration.name, decorator, decoratorText, location: declaration.location });
  }
  const signature = buildSignature(declaration, normalizer);
  if (!signature.ok) {
    return signature;
  }
  return ok({
    name: declaration.name,
    decorator,
    decoratorText,
    signature: signature.value,
    location: declaration.location
  });
}

function isPropertyFamily(tag: DecoratorTag | undefined): boolean {
  return tag?.kind === 'property' || tag?.kind === 'setter' || tag?.kind === 'deleter';
}

function functionKind(definition: FunctionDefinition): FunctionKind {
  if (definition.name === '__new__') {
    return 'staticmethod';
  }
  switch (definition.decorator?.kind) {
    case 'classmethod':
      return 'classmethod';
    case 'staticmethod':
      return 'staticmethod';
    default:
      return 'method';
  }
}

/**
 * Checks the decorator of one definition: unknown decorators, accessors named
 * after another attribute, and accessors with the wrong number of parameters.
 */
function checkDecorator(definition: FunctionDefinition): string | undefined {
  const tag = definition.decorator;
  const unhandled = `Unhandled decorator: ${definition.decoratorText ?? ''}`;
  const arity = definition.signature?.params.length ?? 0;
  switch (tag?.kind) {
    case undefined:
    case 'classmethod':
    case 'staticmethod':
    case 'overload':
    case 'abstractmethod':
      return undefined;
    case 'unrecognized':
      return unhandled;
    case 'property':
      return arity === 1 ? undefined : unhandled;
    case 'setter':
      return tag.name === definition.name && arity === 2 ? undefined : unhandled;
    case 'deleter':
      return tag.name === definition.name && arity === 1 ? undefined : unhandled;
  }
}

/** The last explicitly typed accessor wins; Any when none is typed. */
function propertyType(definitions: readonly FunctionDefinition[]): Type {
  let type: Type = ANYTHING;
  for (const definition of definitions) {
    const signature = definition.signature;
    if (!signature) {
      continue;
    }
    let candidate: Type | undefined;
    if (definition.decorator?.kind === 'property') {
      candidate = signature.returnType;
    } else if (definition.decorator?.kind === 'setter') {
      candidate = signature.params[1].type;
    }
    if (candidate && candidate.kind !== 'anything') {
      type = candidate;
    }
  }
  return type;
}

function mergeGroup(
  name: string,
  group: readonly FunctionDefinition[],
  fail: (message: string) => Result<never, ParseError>
): Result<FunctionDecl | Constant, ParseError> {
  const external = group.filter(definition => !definition.signature);
  if (external.length > 1) {
    return fail(`Multiple PYTHONCODEs for ${name}`);
  }
  if (external.length === 1) {
    if (group.length > 1) {
      return fail(`Mixed pytd and PYTHONCODEs for ${name}`);
    }
    return ok({ name, signatures: [], kind: 'method' });
  }

  for (const definition of group) {
    const problem = checkDecorator(definition);
    if (problem) {
      return fail(problem);
    }
  }

  const accessors = group.filter(definition => isPropertyFamily(definition.decorator));
  if (accessors.length > 0) {
    if (accessors.length !== group.length) {
      return fail(`Incompatible signatures for ${name}`);
    }
    return ok({ name, type: propertyType(group) });
  }

  const kind = functionKind(group[0]);
  if (group.some(definition => functionKind(definition) !== kind)) {
    return fail(`Overloaded signatures for ${name} disagree on decorators`);
  }
  const signatures: Signature[] = [];
  for (const definition of group) {
    if (definition.signature) {
      signatures.push(definition.signature);
    }
  }
  return ok({ name, signatures, kind });
}

/**
 * Merges the definitions of one scope in first-occurrence order. Errors are
 * reported at `location`, the enclosing class, or without a location at
 * module level.
 */
export function mergeDefinitions(
  definitions: readonly FunctionDefinition[],
  location?: SourceLocation
): Result<MergedDefinitions, ParseError> {
  const fail = (message: string) => error(ParseError.at(message, location));
  const groups = new Map<string, FunctionDefinition[]>();
  for (const definition of definitions) {
    const group = groups.get(definition.name);
    if (group) {
      group.push(definition);
    } else {
      groups.set(definition.name, [definition]);
    }
  }

  const functions: FunctionDecl[] = [];
  const properties: Constant[] = [];
  for (const [name, group] of groups) {
    const merged = mergeGroup(name, group, fail);
    if (!merged.ok) {
      return merged;
    }
    if ('signatures' in merged.value) {
      functions.push(merged.value);
    } else {
      properties.push(merged.value);
    }
  }
  return ok({ functions, properties });
}
