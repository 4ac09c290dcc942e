/**
 * Numeric literal rendering.
 *
 * With folding on, a number that is an exact rational multiple of pi with a
 * denominator of at most 16 becomes a symbolic expression (`2*pi`, `-pi/2`,
 * `3*pi/4`). Everything else is a decimal literal, with negatives expressed as
 * a unary minus over a non-negative literal.
 */

import type { Expression, IntegerLiteral } from "../ast/nodes.ts";
import { MalformedInputError } from "../errors/index.ts";

export const MAX_PI_DENOMINATOR = 16;
export const PI_TOLERANCE = 1e-9;

const PI: Expression = { kind: "Identifier", name: "pi" };

/** `{ numerator, denominator }` with `value ≈ numerator * pi / denominator`, or null. */
export function piFraction(value: number): { numerator: number; denominator: number } | null {
  if (value === 0 || !Number.isFinite(value)) return null;
  const ratio = value / Math.PI;
  // Past 2^53 every float is an integer multiple of pi; such numerators are not integers in print.
  if (Math.abs(ratio) > Number.MAX_SAFE_INTEGER) return null;
  for (let denominator = 1; denominator <= MAX_PI_DENOMINATOR; denominator++) {
    const scaled = ratio * denominator;
    const numerator = Math.round(scaled);
    if (Math.abs(numerator) > Number.MAX_SAFE_INTEGER) return null;
    if (numerator !== 0 && Math.abs(scaled - numerator) < PI_TOLERANCE) {
      return { numerator, denominator };
    }
  }
  return null;
}

export function formatNumber(value: number, foldConstants: boolean, location: string | null = null): Expression {
  if (!Number.isFinite(value)) {
    throw new MalformedInputError(`parameter value ${value} is not finite`, location);
  }
  const fraction = foldConstants ? piFraction(value) : null;
  if (fraction === null) return decimal(value);

  const { numerator, denominator } = fraction;
  const multiple = piMultiple(numerator);
  if (denominator === 1) return multiple;
  return { kind: "BinaryExpr", left: multiple, operator: "/", right: integer(denominator) };
}

function piMultiple(numerator: number): Expression {
  if (numerator === 1) return PI;
  if (numerator === -1) return { kind: "UnaryExpr", operator: "-", operand: PI };
  const factor: Expression =
    numerator < 0
      ? { kind: "UnaryExpr", operator: "-", operand: integer(-numerator) }
      : integer(numerator);
  return { kind: "BinaryExpr", left: factor, operator: "*", right: PI };
}

function decimal(value: number): Expression {
  if (value < 0) {
    return { kind: "UnaryExpr", operator: "-", operand: { kind: "RealLiteral", value: -value } };
  }
  return { kind: "RealLiteral", value };
}

function integer(value: number): IntegerLiteral {
  return { kind: "IntegerLiteral", value };
}
