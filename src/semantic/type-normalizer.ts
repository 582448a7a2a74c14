// Turns written type expressions into canonical model types

import {
  TypeExpression, TypeArgument, GenericTypeExpression, ListTypeExpression, NamedTupleTypeExpression,
  SourceLocation, ParseError
} from '../types';
import {
  Type, NamedType, ClassDecl, Constant, ANYTHING, NOTHING, namedType, typeKey
} from '../model';
import { Result, ok, error, mapAll } from '../result';
import { NameRegistry, NONE_TYPE } from './name-registry';

const TUPLE = 'tuple';
const CALLABLE = 'typing.Callable';
const UNION = 'typing.Union';
const OPTIONAL = 'typing.Optional';

/**
 * Flattens nested unions, drops `nothing`, removes duplicates keeping the first
 * occurrence and collapses a single member.
 */
export function makeUnion(members: readonly Type[]): Type {
  const seen = new Set<string>();
  const flat: Type[] = [];
  const add = (type: Type): void => {
    if (type.kind === 'union') {
      type.members.forEach(add);
      return;
    }
    if (type.kind === 'nothing') {
      return;
    }
    const key = typeKey(type);
    if (!seen.has(key)) {
      seen.add(key);
      flat.push(type);
    }
  };
  members.forEach(add);

  if (flat.length === 0) {
    return NOTHING;
  }
  if (flat.length === 1) {
    return flat[0];
  }
  return { kind: 'union', members: flat };
}

export function makeOptional(type: Type): Type {
  return makeUnion([type, namedType(NONE_TYPE)]);
}

function fail(message: string, location: SourceLocation): Result<never, ParseError> {
  return error(ParseError.at(message, location));
}

/**
 * Resolves type expressions for one parse. Classes synthesized from
 * `NamedTuple(...)` are collected in `generatedClasses`.
 */
export class TypeNormalizer {
  readonly generatedClasses: ClassDecl[] = [];
  private readonly namedTupleCounts = new Map<string, number>();

  constructor(private readonly registry: NameRegistry) {}

  resolve(expression: TypeExpression): Result<Type, ParseError> {
    switch (expression.kind) {
      case 'name': {
        const type = this.registry.resolve(expression.name);
        if (type.kind === 'named' && (type.name === UNION || type.name === OPTIONAL)) {
          return fail(`Missing options to ${type.name}`, expression.location);
        }
        return ok(type);
      }
      case 'anything':
        return ok(ANYTHING);
      case 'union': {
        const members = mapAll(expression.members, member => this.resolve(member));
        return members.ok ? ok(makeUnion(members.value)) : members;
      }
      case 'list':
        return this.resolveTupleShorthand(expression);
      case 'namedTuple':
        return this.synthesizeNamedTuple(expression);
      case 'generic':
        return this.resolveGeneric(expression);
    }
  }

  /** `...` stands for the open type wherever it is not special. */
  private resolveArgument(argument: TypeArgument): Result<Type, ParseError> {
    return argument.kind === 'ellipsis' ? ok(ANYTHING) : this.resolve(argument);
  }

  /** `[]` is `Tuple[nothing, ...]`; `[A, B]` is `Tuple[A, B]`. */
  private resolveTupleShorthand(expression: ListTypeExpression): Result<Type, ParseError> {
    const items = mapAll(expression.items, item => this.resolve(item));
    if (!items.ok) {
      return items;
    }
    const base = namedType(TUPLE);
    if (items.value.length === 0) {
      return ok({ kind: 'generic', base, parameters: [NOTHING] });
    }
    return ok({ kind: 'tuple', base, parameters: items.value });
  }

  private resolveGeneric(expression: GenericTypeExpression): Result<Type, ParseError> {
    const base = this.registry.resolve(expression.base.name);
    if (base.kind === 'anything' || base.kind === 'nothing') {
      return ok(base);
    }
    if (base.kind !== 'named') {
      return fail(`Illegal generic base: ${expression.base.name}`, expression.location);
    }

    const parameters = expression.parameters;
    switch (base.name) {
      case CALLABLE:
        return this.resolveCallable(base, parameters, expression.location);
      case UNION: {
        const members = mapAll(parameters, parameter => this.resolveArgument(parameter));
        return members.ok ? ok(makeUnion(members.value)) : members;
      }
      case OPTIONAL: {
        const members = mapAll(parameters, parameter => this.resolveArgument(parameter));
        return members.ok ? ok(makeOptional(makeUnion(members.value))) : members;
      }
    }

    // X[T, ...] is the homogeneous X[T].
    if (parameters.length === 2 && parameters[1].kind === 'ellipsis') {
      const first = parameters[0];
      if (first.kind === 'ellipsis') {
        return fail('[..., ...] not supported', expression.location);
      }
      const element = this.resolve(first);
      if (!element.ok) {
        return element;
      }
      return ok({ kind: 'generic', base, parameters: [element.value] });
    }
    if (parameters.slice(0, -1).some(parameter => parameter.kind === 'ellipsis')) {
      return fail('ellipsis (...) must be the last type parameter', expression.location);
    }

    const resolved = mapAll(parameters, parameter => this.resolveArgument(parameter));
    if (!resolved.ok) {
      return resolved;
    }
    if (base.name === TUPLE) {
      return ok({ kind: 'tuple', base, parameters: resolved.value });
    }
    return ok({ kind: 'generic', base, parameters: resolved.value });
  }

  /**
   * Callable[[A, B], R]; Callable[..., R] and Callable[Any, R] take any
   * arguments. A missing return type is Any.
   */
  private resolveCallable(
    base: NamedType,
    parameters: readonly TypeArgument[],
    location: SourceLocation
  ): Result<Type, ParseError> {
    const [first, ...rest] = parameters;

    if (first.kind === 'list') {
      if (parameters.length > 2) {
        return fail(`Expected 2 parameters to Callable, got ${parameters.length}`, location);
      }
      const args = mapAll(first.items, item => this.resolve(item));
      if (!args.ok) {
        return args;
      }
      const argumentTypes = args.value.length === 1 && args.value[0].kind === 'nothing' ? [] : args.value;
      const returnType = rest.length > 0 ? this.resolveArgument(rest[0]) : ok(ANYTHING);
      if (!returnType.ok) {
        return returnType;
      }
      return ok({ kind: 'callable', base, parameters: [...argumentTypes, returnType.value] });
    }

    const firstType = this.resolveArgument(first);
    if (!firstType.ok) {
      return firstType;
    }
    if (firstType.value.kind !== 'anything') {
      return fail('First argument to Callable must be a list of argument types', location);
    }
    if (parameters.length > 2) {
      return fail(`Expected 2 parameters to Callable, got ${parameters.length}`, location);
    }
    const others = mapAll(rest, parameter => this.resolveArgument(parameter));
    if (!others.ok) {
      return others;
    }
    return ok({ kind: 'generic', base, parameters: [firstType.value, ...others.value] });
  }

  /**
   * NamedTuple(name, [(field, T), ...]) becomes a class named `` `name` ``,
   * or `` `name~N` `` for the N-th repeat of the same name.
   */
  private synthesizeNamedTuple(expression: NamedTupleTypeExpression): Result<Type, ParseError> {
    const fieldTypes = mapAll(expression.fields, field => this.resolve(field.type));
    if (!fieldTypes.ok) {
      return fieldTypes;
    }

    const count = this.namedTupleCounts.get(expression.name) ?? 0;
    this.namedTupleCounts.set(expression.name, count + 1);
    const suffix = count === 0 ? '' : `~${count}`;
    const name = this.registry.qualify(`\`${expression.name}${suffix}\``);

    const base = namedType(TUPLE);
    const parent: Type = fieldTypes.value.length === 0
      ? { kind: 'generic', base, parameters: [NOTHING] }
      : { kind: 'tuple', base, parameters: fieldTypes.value };
    const constants: Constant[] = expression.fields.map((field, i) => ({
      name: field.name,
      type: fieldTypes.value[i]
    }));

    this.generatedClasses.push({ name, parents: [parent], constants, methods: [] });
    return ok(namedType(name));
  }
}
