// Evaluates `if` conditions against the target version and platform

import {
  Condition, ComparisonCondition, ComparisonOperator, ConditionLiteral, SliceKey,
  ASTNode, IfStatement, SourceLocation, ParseError
} from '../types';
import { Result, ok, error } from '../result';

export interface Target {
  readonly version: readonly number[];
  readonly platform: string;
}

const VERSION_LENGTH = 3;

/** Pads with zeros or truncates to three elements. */
export function normalizeVersion(version: readonly number[]): number[] {
  return [...version, 0, 0, 0].slice(0, VERSION_LENGTH);
}

function compareTuples(left: readonly number[], right: readonly number[]): number {
  for (let i = 0; i < Math.min(left.length, right.length); i++) {
    if (left[i] !== right[i]) {
      return left[i] < right[i] ? -1 : 1;
    }
  }
  return left.length - right.length;
}

function applyOperator(operator: ComparisonOperator, order: number): boolean {
  switch (operator) {
    case '==': return order === 0;
    case '!=': return order !== 0;
    case '<': return order < 0;
    case '<=': return order <= 0;
    case '>': return order > 0;
    case '>=': return order >= 0;
  }
}

function clampIndex(index: number, length: number, lower: number, upper: number): number {
  const absolute = index < 0 ? index + length : index;
  return Math.min(Math.max(absolute, lower), upper);
}

/** Slices with the semantics of the stub language, including negative steps. */
export function sliceVersion(version: readonly number[], key: SliceKey): Result<number[], string> {
  const step = key.step ?? 1;
  if (step === 0) {
    return error('slice step cannot be zero');
  }
  const length = version.length;
  const items: number[] = [];
  if (step > 0) {
    const start = key.start === undefined ? 0 : clampIndex(key.start, length, 0, length);
    const stop = key.stop === undefined ? length : clampIndex(key.stop, length, 0, length);
    for (let i = start; i < stop; i += step) {
      items.push(version[i]);
    }
  } else {
    const start = key.start === undefined ? length - 1 : clampIndex(key.start, length, -1, length - 1);
    const stop = key.stop === undefined ? -1 : clampIndex(key.stop, length, -1, length - 1);
    for (let i = start; i > stop; i += step) {
      items.push(version[i]);
    }
  }
  return ok(items);
}

function integerTuple(literal: ConditionLiteral): number[] | undefined {
  if (literal.kind !== 'tuple') {
    return undefined;
  }
  const values: number[] = [];
  for (const item of literal.items) {
    if (item.kind !== 'int') {
      return undefined;
    }
    values.push(item.value);
  }
  return values;
}

function evaluateVersion(condition: ComparisonCondition, target: Target): Result<boolean, string> {
  const version = normalizeVersion(target.version);
  const key = condition.key;

  if (key?.kind === 'index') {
    if (condition.value.kind !== 'int') {
      return error('an element of sys.version_info must be compared to an integer');
    }
    const index = key.index < 0 ? key.index + version.length : key.index;
    if (index < 0 || index >= version.length) {
      return error('tuple index out of range');
    }
    const actual = version[index];
    const expected = condition.value.value;
    return ok(applyOperator(condition.operator, actual === expected ? 0 : actual < expected ? -1 : 1));
  }

  const expected = integerTuple(condition.value);
  if (!expected) {
    return error('sys.version_info must be compared to a tuple of integers');
  }
  let actual = version;
  if (key) {
    const sliced = sliceVersion(version, key);
    if (!sliced.ok) {
      return sliced;
    }
    actual = sliced.value;
  }
  return ok(applyOperator(
    condition.operator,
    compareTuples(normalizeVersion(actual), normalizeVersion(expected))
  ));
}

function evaluatePlatform(condition: ComparisonCondition, target: Target): Result<boolean, string> {
  if (condition.value.kind !== 'string') {
    return error('sys.platform must be compared to a string');
  }
  if (condition.operator !== '==' && condition.operator !== '!=') {
    return error('sys.platform must be compared using == or !=');
  }
  const equal = target.platform === condition.value.value;
  return ok(condition.operator === '==' ? equal : !equal);
}

function evaluate(condition: Condition, target: Target): Result<boolean, string> {
  switch (condition.kind) {
    case 'or':
    case 'and': {
      // The chain is decided by the first operand that differs from the identity.
      const decisive = condition.kind === 'or';
      for (const operand of condition.operands) {
        const result = evaluate(operand, target);
        if (!result.ok || result.value === decisive) {
          return result;
        }
      }
      return ok(!decisive);
    }
    case 'comparison':
      if (condition.key && condition.subject !== 'sys.version_info') {
        return error(`Unsupported condition: '${condition.subject}'.`);
      }
      switch (condition.subject) {
        case 'sys.version_info':
          return evaluateVersion(condition, target);
        case 'sys.platform':
          return evaluatePlatform(condition, target);
        default:
          return error(`Unsupported condition: '${condition.subject}'.`);
      }
  }
}

/**
 * Evaluates a condition; failures are reported at `location`, the line of the
 * `if` or `elif` that holds it.
 */
export function evaluateCondition(
  condition: Condition,
  target: Target,
  location: SourceLocation
): Result<boolean, ParseError> {
  const result = evaluate(condition, target);
  return result.ok ? result : error(ParseError.at(result.error, location));
}

/**
 * Evaluates every condition of the chain and returns the body of the first
 * branch that holds, or an empty list.
 */
export function selectLiveBranch<T extends ASTNode>(
  statement: IfStatement<T>,
  target: Target
): Result<T[], ParseError> {
  let live: T[] | undefined;
  for (const branch of statement.branches) {
    let taken = true;
    if (branch.condition) {
      const result = evaluateCondition(branch.condition, target, branch.location);
      if (!result.ok) {
        return result;
      }
      taken = result.value;
    }
    if (taken && live === undefined) {
      live = branch.body;
    }
  }
  return ok(live ?? []);
}
