import { EvaluationError, ParseError } from '../../domain/errors.js';
import { readPath } from '../field-path.js';
import { parseCondition } from './parser.js';
import type { ComparisonOperator, Expression, LiteralValue } from './parser.js';

/** Named values a condition is evaluated against. */
export type EvaluationContext = Readonly<Record<string, unknown>>;

/**
 * Result of evaluating a condition.
 *
 * `missing` names the first unresolved path when the condition was forced
 * to `false` by the missing-field policy.
 */
export type EvaluationOutcome =
  | { readonly ok: true; readonly value: boolean; readonly missing: string | null }
  | { readonly ok: false; readonly error: EvaluationError | ParseError };

type Resolved =
  | { readonly kind: 'value'; readonly value: LiteralValue }
  | { readonly kind: 'missing'; readonly path: string };

function resolvePath(context: EvaluationContext, segments: readonly string[], text: string): Resolved {
  const lookup = readPath(context, segments);
  if (!lookup.found) return { kind: 'missing', path: text };

  const current = lookup.value;
  if (current === null || current === undefined) return { kind: 'missing', path: text };
  if (typeof current === 'number') {
    return Number.isNaN(current) ? { kind: 'missing', path: text } : { kind: 'value', value: current };
  }
  if (typeof current === 'string' || typeof current === 'boolean') {
    return { kind: 'value', value: current };
  }
  throw new EvaluationError(`Field "${text}" is not a number, string or boolean`);
}

function typeName(value: LiteralValue): string {
  return typeof value;
}

function compare(operator: ComparisonOperator, left: LiteralValue, right: LiteralValue): boolean {
  if (typeof left !== typeof right) {
    throw new EvaluationError(`Cannot compare ${typeName(left)} ${operator} ${typeName(right)}`);
  }

  if (operator === '==') return left === right;
  if (operator === '!=') return left !== right;

  let order: number;
  if (typeof left === 'number' && typeof right === 'number') {
    order = left === right ? 0 : left < right ? -1 : 1;
  } else if (typeof left === 'string' && typeof right === 'string') {
    order = left === right ? 0 : left < right ? -1 : 1;
  } else {
    throw new EvaluationError(`Operator "${operator}" is not defined for booleans`);
  }

  switch (operator) {
    case '>':  return order > 0;
    case '>=': return order >= 0;
    case '<':  return order < 0;
    case '<=': return order <= 0;
  }
}

function requireBoolean(resolved: Resolved, role: string): Resolved {
  if (resolved.kind === 'value' && typeof resolved.value !== 'boolean') {
    throw new EvaluationError(`${role} must be a boolean, got ${typeName(resolved.value)}`);
  }
  return resolved;
}

function evaluateNode(expr: Expression, context: EvaluationContext): Resolved {
  switch (expr.type) {
    case 'literal':
      return { kind: 'value', value: expr.value };

    case 'path':
      return resolvePath(context, expr.segments, expr.text);

    case 'not': {
      const operand = requireBoolean(evaluateNode(expr.operand, context), 'Operand of "not"');
      if (operand.kind === 'missing') return operand;
      return { kind: 'value', value: operand.value !== true };
    }

    case 'logical': {
      const left = requireBoolean(evaluateNode(expr.left, context), `Left side of "${expr.operator}"`);
      if (left.kind === 'missing') return left;
      if (expr.operator === 'and' && left.value === false) return left;
      if (expr.operator === 'or' && left.value === true) return left;
      return requireBoolean(evaluateNode(expr.right, context), `Right side of "${expr.operator}"`);
    }

    case 'comparison': {
      const left = evaluateNode(expr.left, context);
      if (left.kind === 'missing') return left;
      const right = evaluateNode(expr.right, context);
      if (right.kind === 'missing') return right;
      return { kind: 'value', value: compare(expr.operator, left.value, right.value) };
    }
  }
}

/**
 * Evaluates a parsed condition.
 *
 * Missing-field policy: when evaluation reaches a path that does not
 * resolve, the whole condition is `false` and no error is reported. Sparse
 * event data therefore never raises an alert and never flaps into errors.
 * `not` cannot turn an absent field into a match.
 */
export function evaluateCondition(expr: Expression, context: EvaluationContext): EvaluationOutcome {
  try {
    const result = evaluateNode(expr, context);
    if (result.kind === 'missing') {
      return { ok: true, value: false, missing: result.path };
    }
    if (typeof result.value !== 'boolean') {
      throw new EvaluationError(`Condition must evaluate to a boolean, got ${typeName(result.value)}`);
    }
    return { ok: true, value: result.value, missing: null };
  } catch (err: unknown) {
    if (err instanceof EvaluationError) return { ok: false, error: err };
    throw err;
  }
}

/** Parses and evaluates in one step. Parse failures are reported, not thrown. */
export function evaluate(condition: string, context: EvaluationContext): EvaluationOutcome {
  let expr: Expression;
  try {
    expr = parseCondition(condition);
  } catch (err: unknown) {
    if (err instanceof ParseError) return { ok: false, error: err };
    throw err;
  }
  return evaluateCondition(expr, context);
}
