import ts from 'typescript';

import { Capability } from './capability.js';
import { guestTypeError } from './extraction-error.js';

export type GuestTypeOf = 'undefined' | 'object' | 'boolean' | 'number' | 'bigint' | 'string' | 'symbol' | 'function';

const isPrimitive = (value: unknown): boolean =>
  value === null || (typeof value !== 'object' && typeof value !== 'function');

export function typeOf(value: unknown): GuestTypeOf {
  return value instanceof Capability ? 'function' : typeof value;
}

export function toPrimitive(value: unknown): unknown {
  if (isPrimitive(value)) {
    return value;
  }
  if (typeof value === 'object' && value !== null && !(value instanceof Date)) {
    const valueOf: unknown = Reflect.get(value, 'valueOf');
    if (typeof valueOf === 'function') {
      const result: unknown = Reflect.apply(valueOf, value, []);
      if (isPrimitive(result)) {
        return result;
      }
    }
  }
  return String(value);
}

export function toPropertyKey(value: unknown): string | symbol {
  return typeof value === 'symbol' ? value : String(value);
}

function add(left: unknown, right: unknown): unknown {
  const l = toPrimitive(left);
  const r = toPrimitive(right);
  if (typeof l === 'string' || typeof r === 'string') {
    return String(l) + String(r);
  }
  if (typeof l === 'bigint' && typeof r === 'bigint') {
    return l + r;
  }
  return Number(l) + Number(r);
}

function arithmetic(operator: ts.BinaryOperator, left: unknown, right: unknown): unknown {
  const l = toPrimitive(left);
  const r = toPrimitive(right);
  if (typeof l === 'bigint' && typeof r === 'bigint') {
    switch (operator) {
      case ts.SyntaxKind.MinusToken:
        return l - r;
      case ts.SyntaxKind.AsteriskToken:
        return l * r;
      case ts.SyntaxKind.SlashToken:
        return l / r;
      case ts.SyntaxKind.PercentToken:
        return l % r;
      case ts.SyntaxKind.AsteriskAsteriskToken:
        return l ** r;
      default:
        break;
    }
  }

  const a = Number(l);
  const b = Number(r);
  switch (operator) {
    case ts.SyntaxKind.MinusToken:
      return a - b;
    case ts.SyntaxKind.AsteriskToken:
      return a * b;
    case ts.SyntaxKind.SlashToken:
      return a / b;
    case ts.SyntaxKind.PercentToken:
      return a % b;
    case ts.SyntaxKind.AsteriskAsteriskToken:
      return a ** b;
    case ts.SyntaxKind.AmpersandToken:
      return a & b;
    case ts.SyntaxKind.BarToken:
      return a | b;
    case ts.SyntaxKind.CaretToken:
      return a ^ b;
    case ts.SyntaxKind.LessThanLessThanToken:
      return a << b;
    case ts.SyntaxKind.GreaterThanGreaterThanToken:
      return a >> b;
    case ts.SyntaxKind.GreaterThanGreaterThanGreaterThanToken:
      return a >>> b;
    default:
      throw guestTypeError(`Unsupported arithmetic operator ${ts.tokenToString(operator) ?? String(operator)}.`);
  }
}

function compare(operator: ts.BinaryOperator, left: unknown, right: unknown): boolean {
  const l = toPrimitive(left);
  const r = toPrimitive(right);
  if (typeof l === 'string' && typeof r === 'string') {
    switch (operator) {
      case ts.SyntaxKind.LessThanToken:
        return l < r;
      case ts.SyntaxKind.LessThanEqualsToken:
        return l <= r;
      case ts.SyntaxKind.GreaterThanToken:
        return l > r;
      default:
        return l >= r;
    }
  }

  const a = Number(l);
  const b = Number(r);
  switch (operator) {
    case ts.SyntaxKind.LessThanToken:
      return a < b;
    case ts.SyntaxKind.LessThanEqualsToken:
      return a <= b;
    case ts.SyntaxKind.GreaterThanToken:
      return a > b;
    default:
      return a >= b;
  }
}

function hasProperty(key: unknown, target: unknown): boolean {
  if (target instanceof Capability) {
    return true;
  }
  if ((typeof target !== 'object' && typeof target !== 'function') || target === null) {
    throw guestTypeError(`Cannot use 'in' operator to search for '${String(key)}' in ${String(target)}`);
  }
  return Reflect.has(target, toPropertyKey(key));
}

function instanceOf(value: unknown, constructor: unknown): boolean {
  if (constructor instanceof Capability) {
    return false;
  }
  if (typeof constructor !== 'function') {
    throw guestTypeError("Right-hand side of 'instanceof' is not callable");
  }
  return value instanceof constructor;
}

/** Non-short-circuiting binary operators, with the guest language's coercions. */
export function applyBinaryOperator(operator: ts.BinaryOperator, left: unknown, right: unknown): unknown {
  switch (operator) {
    case ts.SyntaxKind.PlusToken:
      return add(left, right);
    case ts.SyntaxKind.EqualsEqualsEqualsToken:
      return left === right;
    case ts.SyntaxKind.ExclamationEqualsEqualsToken:
      return left !== right;
    case ts.SyntaxKind.EqualsEqualsToken:
      // eslint-disable-next-line eqeqeq
      return left == right;
    case ts.SyntaxKind.ExclamationEqualsToken:
      // eslint-disable-next-line eqeqeq
      return left != right;
    case ts.SyntaxKind.LessThanToken:
    case ts.SyntaxKind.LessThanEqualsToken:
    case ts.SyntaxKind.GreaterThanToken:
    case ts.SyntaxKind.GreaterThanEqualsToken:
      return compare(operator, left, right);
    case ts.SyntaxKind.InKeyword:
      return hasProperty(left, right);
    case ts.SyntaxKind.InstanceOfKeyword:
      return instanceOf(left, right);
    default:
      return arithmetic(operator, left, right);
  }
}

const COMPOUND_ASSIGNMENT_OPERATORS: ReadonlyMap<ts.SyntaxKind, ts.BinaryOperator> = new Map<
  ts.SyntaxKind,
  ts.BinaryOperator
>([
  [ts.SyntaxKind.PlusEqualsToken, ts.SyntaxKind.PlusToken],
  [ts.SyntaxKind.MinusEqualsToken, ts.SyntaxKind.MinusToken],
  [ts.SyntaxKind.AsteriskEqualsToken, ts.SyntaxKind.AsteriskToken],
  [ts.SyntaxKind.SlashEqualsToken, ts.SyntaxKind.SlashToken],
  [ts.SyntaxKind.PercentEqualsToken, ts.SyntaxKind.PercentToken],
  [ts.SyntaxKind.AsteriskAsteriskEqualsToken, ts.SyntaxKind.AsteriskAsteriskToken],
  [ts.SyntaxKind.AmpersandEqualsToken, ts.SyntaxKind.AmpersandToken],
  [ts.SyntaxKind.BarEqualsToken, ts.SyntaxKind.BarToken],
  [ts.SyntaxKind.CaretEqualsToken, ts.SyntaxKind.CaretToken],
  [ts.SyntaxKind.LessThanLessThanEqualsToken, ts.SyntaxKind.LessThanLessThanToken],
  [ts.SyntaxKind.GreaterThanGreaterThanEqualsToken, ts.SyntaxKind.GreaterThanGreaterThanToken],
  [ts.SyntaxKind.GreaterThanGreaterThanGreaterThanEqualsToken, ts.SyntaxKind.GreaterThanGreaterThanGreaterThanToken],
]);

export function compoundAssignmentOperator(kind: ts.SyntaxKind): ts.BinaryOperator | undefined {
  return COMPOUND_ASSIGNMENT_OPERATORS.get(kind);
}

export function applyUnaryOperator(operator: ts.PrefixUnaryOperator, operand: unknown): unknown {
  switch (operator) {
    case ts.SyntaxKind.ExclamationToken:
      return !operand;
    case ts.SyntaxKind.MinusToken: {
      const value = toPrimitive(operand);
      return typeof value === 'bigint' ? -value : -Number(value);
    }
    case ts.SyntaxKind.PlusToken:
      return Number(toPrimitive(operand));
    case ts.SyntaxKind.TildeToken:
      return ~Number(toPrimitive(operand));
    default:
      throw guestTypeError(`Unsupported unary operator ${ts.tokenToString(operator) ?? String(operator)}.`);
  }
}

export function increment(value: unknown, delta: 1 | -1): number | bigint {
  const primitive = toPrimitive(value);
  if (typeof primitive === 'bigint') {
    return primitive + BigInt(delta);
  }
  return Number(primitive) + delta;
}
