// Declaration model produced by the parser and consumed by the printer

export type Type =
  | NamedType
  | AnythingType
  | NothingType
  | TypeParameter
  | GenericType
  | TupleType
  | CallableType
  | UnionType;

export interface NamedType {
  readonly kind: 'named';
  /** Fully qualified: `int`, `typing.Callable`, `foo.bar.Baz`, `` `foo~1` ``. */
  readonly name: string;
}

export interface AnythingType {
  readonly kind: 'anything';
}

/** The bottom type, written `nothing`. */
export interface NothingType {
  readonly kind: 'nothing';
}

export interface TypeParameter {
  readonly kind: 'typeParameter';
  readonly name: string;
}

/** Homogeneous container: `List[int]`, `Tuple[int, ...]`, `Dict[str, int]`. */
export interface GenericType {
  readonly kind: 'generic';
  readonly base: NamedType;
  readonly parameters: readonly Type[];
}

/** Fixed-arity tuple: `Tuple[int, str]`. */
export interface TupleType {
  readonly kind: 'tuple';
  readonly base: NamedType;
  readonly parameters: readonly Type[];
}

/** `Callable[[A, B], R]`; `parameters` holds the arguments followed by the return type. */
export interface CallableType {
  readonly kind: 'callable';
  readonly base: NamedType;
  readonly parameters: readonly Type[];
}

export interface UnionType {
  readonly kind: 'union';
  readonly members: readonly Type[];
}

export type FunctionKind = 'method' | 'classmethod' | 'staticmethod';

export interface Parameter {
  readonly name: string;
  readonly type?: Type;
  /** Has a default value (printed as `= ...`). */
  readonly optional: boolean;
  readonly kwOnly: boolean;
  /** Type re-declared in the body with `name := T`. */
  readonly mutatedType?: Type;
}

export interface StarParameter {
  readonly name: string;
  readonly type?: Type;
}

export interface Signature {
  readonly params: readonly Parameter[];
  readonly starArgs?: StarParameter;
  readonly starStarArgs?: StarParameter;
  readonly returnType: Type;
  readonly exceptions: readonly Type[];
}

/** A function with no signatures stands for an external (`PYTHONCODE`) body. */
export interface FunctionDecl {
  readonly name: string;
  readonly signatures: readonly Signature[];
  readonly kind: FunctionKind;
}

export interface Constant {
  readonly name: string;
  readonly type: Type;
}

export interface Alias {
  readonly name: string;
  readonly type: Type;
}

export interface TypeVariable {
  readonly name: string;
  readonly constraints: readonly Type[];
}

export interface ClassDecl {
  readonly name: string;
  readonly parents: readonly Type[];
  readonly metaclass?: Type;
  readonly constants: readonly Constant[];
  readonly methods: readonly FunctionDecl[];
}

export interface Module {
  readonly name: string;
  readonly constants: readonly Constant[];
  readonly typeVariables: readonly TypeVariable[];
  readonly functions: readonly FunctionDecl[];
  readonly classes: readonly ClassDecl[];
  readonly aliases: readonly Alias[];
}

export const ANYTHING: AnythingType = Object.freeze({ kind: 'anything' });
export const NOTHING: NothingType = Object.freeze({ kind: 'nothing' });

export function namedType(name: string): NamedType {
  return { kind: 'named', name };
}

/**
 * Structural key of a type; equal keys mean equal types.
 */
export function typeKey(type: Type): string {
  switch (type.kind) {
    case 'named':
      return type.name;
    case 'anything':
      return '?';
    case 'nothing':
      return 'nothing';
    case 'typeParameter':
      return `~${type.name}`;
    case 'generic':
    case 'tuple':
    case 'callable':
      return `${type.kind}:${type.base.name}[${type.parameters.map(typeKey).join(',')}]`;
    case 'union':
      return `union(${type.members.map(typeKey).join('|')})`;
  }
}

/**
 * Rebuilds a type bottom-up, letting `fn` replace any node after its children
 * have been mapped.
 */
export function mapType(type: Type, fn: (type: Type) => Type): Type {
  switch (type.kind) {
    case 'generic':
    case 'tuple':
    case 'callable':
      return fn({ ...type, parameters: type.parameters.map(p => mapType(p, fn)) });
    case 'union':
      return fn({ kind: 'union', members: type.members.map(m => mapType(m, fn)) });
    default:
      return fn(type);
  }
}
