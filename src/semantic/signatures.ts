// Builds one signature from a function definition

import { FunctionDeclaration, ParameterDeclaration, DefaultValue, ParseError } from '../types';
import { Type, Parameter, StarParameter, Signature, ANYTHING, namedType } from '../model';
import { Result, ok, error } from '../result';
import { TypeNormalizer, makeOptional } from './type-normalizer';

interface ParameterLayout {
  params: Parameter[];
  starArgs?: StarParameter;
  starStarArgs?: StarParameter;
}

/** The type a default value implies for an unannotated parameter. */
function inferDefaultType(value: DefaultValue): Type | undefined {
  switch (value.kind) {
    case 'number':
      return namedType(value.isFloat ? 'float' : 'int');
    case 'name':
      return value.name === 'True' || value.name === 'False' ? namedType('bool') : undefined;
    case 'ellipsis':
      return undefined;
  }
}

function isNoneDefault(value: DefaultValue | undefined): boolean {
  return value?.kind === 'name' && value.name === 'None';
}

function resolveOptional(
  normalizer: TypeNormalizer,
  declared: Extract<ParameterDeclaration, { kind: 'star' | 'starStar' }>
): Result<StarParameter, ParseError> {
  const name = declared.name ?? '';
  if (!declared.type) {
    return ok({ name });
  }
  const type = normalizer.resolve(declared.type);
  return type.ok ? ok({ name, type: type.value }) : type;
}

/**
 * Checks parameter order and resolves parameter types. `...` as a parameter
 * stands for `*args, **kwargs`; parameters after `*` are keyword-only.
 */
function layoutParameters(
  declaration: FunctionDeclaration,
  normalizer: TypeNormalizer
): Result<ParameterLayout, ParseError> {
  const fail = (message: string) => error(ParseError.at(message, declaration.location));
  const layout: ParameterLayout = { params: [] };
  let sawStar = false;
  let bareStar = false;
  let namedAfterBareStar = false;
  let sawEllipsis = false;

  for (const declared of declaration.parameters) {
    if (sawEllipsis) {
      return fail('ellipsis (...) must be last parameter');
    }
    if (layout.starStarArgs) {
      return fail(`**${layout.starStarArgs.name} must be last parameter`);
    }

    switch (declared.kind) {
      case 'ellipsis':
        if (bareStar) {
          return fail('ellipsis (...) not compatible with bare *');
        }
        if (sawStar) {
          return fail('Unexpected second *');
        }
        sawEllipsis = true;
        layout.starArgs = { name: 'args' };
        layout.starStarArgs = { name: 'kwargs' };
        break;
      case 'star': {
        if (sawStar) {
          return fail('Unexpected second *');
        }
        sawStar = true;
        if (declared.name === undefined) {
          bareStar = true;
          break;
        }
        const star = resolveOptional(normalizer, declared);
        if (!star.ok) {
          return star;
        }
        layout.starArgs = star.value;
        break;
      }
      case 'starStar': {
        const starStar = resolveOptional(normalizer, declared);
        if (!starStar.ok) {
          return starStar;
        }
        layout.starStarArgs = starStar.value;
        break;
      }
      case 'parameter': {
        let type: Type | undefined;
        if (declared.type) {
          const resolved = normalizer.resolve(declared.type);
          if (!resolved.ok) {
            return resolved;
          }
          type = isNoneDefault(declared.defaultValue) ? makeOptional(resolved.value) : resolved.value;
        } else if (declared.defaultValue) {
          type = inferDefaultType(declared.defaultValue);
        }
        if (bareStar) {
          namedAfterBareStar = true;
        }
        layout.params.push({
          name: declared.name,
          type,
          optional: declared.defaultValue !== undefined,
          kwOnly: sawStar
        });
        break;
      }
    }
  }

  if (bareStar && !namedAfterBareStar) {
    return fail('Named arguments must follow bare *');
  }
  return ok(layout);
}

/**
 * Builds the signature of a pytd-bodied definition: parameters, return type
 * (Any when absent), mutators and raised exceptions.
 */
export function buildSignature(
  declaration: FunctionDeclaration,
  normalizer: TypeNormalizer
): Result<Signature, ParseError> {
  const layout = layoutParameters(declaration, normalizer);
  if (!layout.ok) {
    return layout;
  }
  const params = layout.value.params;

  let returnType: Type = ANYTHING;
  if (declaration.returnType) {
    const resolved = normalizer.resolve(declaration.returnType);
    if (!resolved.ok) {
      return resolved;
    }
    returnType = resolved.value;
  }

  const exceptions: Type[] = [];
  for (const statement of declaration.body) {
    const type = normalizer.resolve(statement.type);
    if (!type.ok) {
      return type;
    }
    if (statement.kind === 'raise') {
      exceptions.push(type.value);
      continue;
    }
    const index = params.findIndex(param => param.name === statement.name);
    if (index < 0) {
      return error(ParseError.at(`No parameter named ${statement.name}`, declaration.location));
    }
    params[index] = { ...params[index], mutatedType: type.value };
  }

  return ok({
    params,
    starArgs: layout.value.starArgs,
    starStarArgs: layout.value.starStarArgs,
    returnType,
    exceptions
  });
}
