// Builds the declaration model from a parsed stub file

import {
  ASTNode, IfStatement, StubFile, Statement, ClassMember, ClassDeclaration, ConstantDeclaration, FromImportStatement,
  ImportStatement, TypeVarDeclaration, ParseError
} from '../types';
import {
  Type, Module, Constant, Alias, TypeVariable, FunctionDecl, ClassDecl, Signature, Parameter,
  StarParameter, ANYTHING, namedType, mapType
} from '../model';
import { Result, ok, error, mapAll } from '../result';
import { logger } from '../logger';
import { Target, selectLiveBranch } from './condition-evaluator';
import { NameRegistry } from './name-registry';
import { TypeNormalizer } from './type-normalizer';
import { FunctionDefinition, toDefinition, mergeDefinitions } from './signature-merger';
import { checkTopLevelIdentifiers, checkClassIdentifiers } from '../validation/duplicate-validator';

const TYPING_MODULE = 'typing';
const METACLASS = 'metaclass';

export interface BuildOptions {
  readonly moduleName: string;
  /** Prefix top-level names with the module name. */
  readonly prefixNames: boolean;
  readonly target: Target;
}

/** A statement or member, possibly wrapped in nested `if` chains. */
type Conditional<T extends ASTNode> = T | IfStatement<Conditional<T>>;

type FlatStatement = Exclude<Statement, { kind: 'if' }>;
type LiveStatement = Exclude<FlatStatement, { kind: 'class' }>;
type LiveMember = Exclude<ClassMember, { kind: 'if' }>;

function isIfStatement<T extends ASTNode>(item: Conditional<T>): item is IfStatement<Conditional<T>> {
  return item.kind === 'if';
}

/**
 * Replaces every `if` chain by the body of its live branch. Used for both
 * module statements and class members.
 */
function flatten<T extends ASTNode>(items: readonly Conditional<T>[], target: Target): Result<T[], ParseError> {
  const flat: T[] = [];
  for (const item of items) {
    if (!isIfStatement(item)) {
      flat.push(item);
      continue;
    }
    const live = selectLiveBranch(item, target);
    if (!live.ok) {
      return live;
    }
    const nested = flatten(live.value, target);
    if (!nested.ok) {
      return nested;
    }
    flat.push(...nested.value);
  }
  return ok(flat);
}

/** A class declaration whose body has been pruned to its live members. */
interface LiveClass {
  readonly declaration: ClassDeclaration;
  readonly members: LiveMember[];
}

/**
 * One-shot builder. The first phase prunes dead branches and registers the
 * live class names; the second builds every live declaration in order.
 */
export class ModuleBuilder {
  private readonly registry: NameRegistry;
  private readonly normalizer: TypeNormalizer;
  private readonly constants: Constant[] = [];
  private readonly aliases: Alias[] = [];
  private readonly typeVariables: TypeVariable[] = [];
  private readonly classes: ClassDecl[] = [];
  private readonly definitions: FunctionDefinition[] = [];

  constructor(private readonly options: BuildOptions) {
    this.registry = new NameRegistry(options.moduleName, options.prefixNames);
    this.normalizer = new TypeNormalizer(this.registry);
  }

  build(file: StubFile): Result<Module, ParseError> {
    const live = this.collectLive(file.body);
    if (!live.ok) {
      return live;
    }
    logger.debug('Pruned conditional branches', { statements: live.value.length });

    for (const item of live.value) {
      const result = 'declaration' in item ? this.addClass(item) : this.addStatement(item);
      if (!result.ok) {
        return result;
      }
    }
    return this.finish();
  }

  private collectLive(body: readonly Statement[]): Result<(LiveStatement | LiveClass)[], ParseError> {
    const statements = flatten<FlatStatement>(body, this.options.target);
    if (!statements.ok) {
      return statements;
    }
    const items: (LiveStatement | LiveClass)[] = [];
    for (const statement of statements.value) {
      if (statement.kind !== 'class') {
        items.push(statement);
        continue;
      }
      const members = flatten<LiveMember>(statement.body, this.options.target);
      if (!members.ok) {
        return members;
      }
      this.registry.registerClass(statement.name);
      items.push({ declaration: statement, members: members.value });
    }
    return ok(items);
  }

  private addStatement(statement: LiveStatement): Result<void, ParseError> {
    switch (statement.kind) {
      case 'import':
        return this.addImport(statement);
      case 'fromImport':
        this.addFromImport(statement);
        return ok(undefined);
      case 'constant': {
        const constant = this.buildConstant(statement);
        if (!constant.ok) {
          return constant;
        }
        this.constants.push({ ...constant.value, name: this.registry.qualify(statement.name) });
        return ok(undefined);
      }
      case 'alias': {
        const type = this.normalizer.resolve(statement.value);
        if (!type.ok) {
          return type;
        }
        const name = this.registry.qualify(statement.name);
        this.aliases.push({ name, type: type.value });
        this.registry.bind(statement.name, namedType(name));
        return ok(undefined);
      }
      case 'typeVar':
        return this.addTypeVar(statement);
      case 'function': {
        const definition = toDefinition(statement, this.normalizer);
        if (!definition.ok) {
          return definition;
        }
        this.definitions.push(definition.value);
        return ok(undefined);
      }
    }
  }

  private addImport(statement: ImportStatement): Result<void, ParseError> {
    if (statement.modules.some(module => module.asName !== undefined)) {
      return error(ParseError.at('Renaming of modules not supported', statement.location));
    }
    return ok(undefined);
  }

  private addFromImport(statement: FromImportStatement): void {
    if (statement.module === TYPING_MODULE || statement.wildcard) {
      return;
    }
    for (const imported of statement.names) {
      const localName = imported.asName ?? imported.name;
      const type = namedType(`${statement.module}.${imported.name}`);
      this.registry.bind(localName, type);
      this.aliases.push({ name: this.registry.qualify(localName), type });
    }
  }

  private addTypeVar(statement: TypeVarDeclaration): Result<void, ParseError> {
    if (statement.nameArgument !== statement.name) {
      return error(ParseError.at(
        `TypeVar name needs to be '${statement.nameArgument}' (not '${statement.name}')`,
        statement.location
      ));
    }
    const constraints = mapAll(statement.constraints, constraint => this.normalizer.resolve(constraint));
    if (!constraints.ok) {
      return constraints;
    }
    this.typeVariables.push({ name: statement.name, constraints: constraints.value });
    return ok(undefined);
  }

  /** Unannotated constants take the type of their `0` / `0.0` literal, else Any. */
  private buildConstant(declaration: ConstantDeclaration): Result<Constant, ParseError> {
    if (declaration.type) {
      const type = this.normalizer.resolve(declaration.type);
      return type.ok ? ok({ name: declaration.name, type: type.value }) : type;
    }
    if (declaration.literal) {
      return ok({ name: declaration.name, type: namedType(declaration.literal.isFloat ? 'float' : 'int') });
    }
    return ok({ name: declaration.name, type: ANYTHING });
  }

  private buildParents(declaration: ClassDeclaration): Result<{ parents: Type[]; metaclass?: Type }, ParseError> {
    const fail = (message: string) => error(ParseError.at(message, declaration.location));
    const parents: Type[] = [];
    let metaclass: Type | undefined;
    for (let i = 0; i < declaration.parents.length; i++) {
      const argument = declaration.parents[i];
      if (argument.kind === 'keyword') {
        if (argument.keyword !== METACLASS) {
          return fail(`Only '${METACLASS}' allowed as classdef kwarg`);
        }
        if (i !== declaration.parents.length - 1) {
          return fail(`${METACLASS} must be last argument`);
        }
        const type = this.normalizer.resolve(argument.value);
        if (!type.ok) {
          return type;
        }
        metaclass = type.value;
        continue;
      }
      const type = this.normalizer.resolve(argument.type);
      if (!type.ok) {
        return type;
      }
      if (type.value.kind !== 'nothing') {
        parents.push(type.value);
      }
    }
    return ok({ parents, metaclass });
  }

  private addClass({ declaration, members }: LiveClass): Result<void, ParseError> {
    const header = this.buildParents(declaration);
    if (!header.ok) {
      return header;
    }

    const constants: Constant[] = [];
    const definitions: FunctionDefinition[] = [];
    for (const member of members) {
      switch (member.kind) {
        case 'constant': {
          const constant = this.buildConstant(member);
          if (!constant.ok) {
            return constant;
          }
          constants.push(constant.value);
          break;
        }
        case 'alias': {
          // A class-level alias names an earlier attribute of the same class.
          const value = member.value;
          const target = value.kind === 'name' ? constants.find(c => c.name === value.name) : undefined;
          if (!target) {
            return error(ParseError.at(`Illegal value for alias '${member.name}'`, declaration.location));
          }
          constants.push({ name: member.name, type: target.type });
          break;
        }
        case 'function': {
          const definition = toDefinition(member, this.normalizer);
          if (!definition.ok) {
            return definition;
          }
          definitions.push(definition.value);
          break;
        }
      }
    }

    const merged = mergeDefinitions(definitions, declaration.location);
    if (!merged.ok) {
      return merged;
    }
    const cls: ClassDecl = {
      name: this.registry.qualify(declaration.name),
      parents: header.value.parents,
      metaclass: header.value.metaclass,
      constants: [...constants, ...merged.value.properties],
      methods: merged.value.functions
    };
    const unique = checkClassIdentifiers(cls, declaration.location);
    if (!unique.ok) {
      return unique;
    }
    this.classes.push(cls);
    return ok(undefined);
  }

  private finish(): Result<Module, ParseError> {
    const merged = mergeDefinitions(this.definitions);
    if (!merged.ok) {
      return merged;
    }
    const functions = merged.value.functions.map(fn => ({ ...fn, name: this.registry.qualify(fn.name) }));

    const unique = checkTopLevelIdentifiers([
      ...this.constants.map(c => c.name),
      ...functions.map(f => f.name),
      ...this.classes.map(c => c.name),
      ...this.aliases.map(a => a.name),
      ...this.typeVariables.map(t => this.registry.qualify(t.name))
    ]);
    if (!unique.ok) {
      return unique;
    }
    if (merged.value.properties.length > 0) {
      const names = merged.value.properties.map(p => p.name).join(', ');
      return error(new ParseError(`Module-level functions with property decorators: ${names}`));
    }

    const module: Module = {
      name: this.options.moduleName,
      constants: this.constants,
      typeVariables: this.typeVariables,
      functions,
      classes: [...this.normalizer.generatedClasses, ...this.classes],
      aliases: this.aliases
    };
    logger.debug('Built module', {
      name: module.name,
      constants: module.constants.length,
      functions: module.functions.length,
      classes: module.classes.length
    });
    return ok(bindTypeParameters(module));
  }
}

/** Turns references to declared type variables into type parameters. */
export function bindTypeParameters(module: Module): Module {
  const names = new Set(module.typeVariables.map(t => t.name));
  if (names.size === 0) {
    return module;
  }
  const bind = (type: Type): Type => mapType(type, node =>
    node.kind === 'named' && names.has(node.name) ? { kind: 'typeParameter', name: node.name } : node
  );
  const bindOptional = (type: Type | undefined): Type | undefined => type && bind(type);
  const bindStar = (star: StarParameter | undefined): StarParameter | undefined =>
    star && { ...star, type: bindOptional(star.type) };
  const bindParameter = (param: Parameter): Parameter => ({
    ...param,
    type: bindOptional(param.type),
    mutatedType: bindOptional(param.mutatedType)
  });
  const bindSignature = (signature: Signature): Signature => ({
    params: signature.params.map(bindParameter),
    starArgs: bindStar(signature.starArgs),
    starStarArgs: bindStar(signature.starStarArgs),
    returnType: bind(signature.returnType),
    exceptions: signature.exceptions.map(bind)
  });
  const bindFunction = (fn: FunctionDecl): FunctionDecl => ({ ...fn, signatures: fn.signatures.map(bindSignature) });
  const bindConstant = <T extends Constant | Alias>(item: T): T => ({ ...item, type: bind(item.type) });

  return {
    ...module,
    constants: module.constants.map(bindConstant),
    aliases: module.aliases.map(bindConstant),
    functions: module.functions.map(bindFunction),
    classes: module.classes.map(cls => ({
      ...cls,
      parents: cls.parents.map(bind),
      metaclass: bindOptional(cls.metaclass),
      constants: cls.constants.map(bindConstant),
      methods: cls.methods.map(bindFunction)
    }))
  };
}

export function buildModule(file: StubFile, options: BuildOptions): Result<Module, ParseError> {
  return new ModuleBuilder(options).build(file);
}
