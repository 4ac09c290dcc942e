/**
 * AST construction shorthands for printer tests.
 */

import type {
  BinaryExpr,
  BinaryOperator,
  Expression,
  Identifier,
  IndexedIdentifier,
  IntegerLiteral,
  RealLiteral,
  UnaryExpr,
} from "../../src/ast/nodes.ts";

export function id(name: string): Identifier {
  return { kind: "Identifier", name };
}

export function int(value: number): IntegerLiteral {
  return { kind: "IntegerLiteral", value };
}

export function real(value: number): RealLiteral {
  return { kind: "RealLiteral", value };
}

export function neg(operand: Expression): UnaryExpr {
  return { kind: "UnaryExpr", operator: "-", operand };
}

export function bin(left: Expression, operator: BinaryOperator, right: Expression): BinaryExpr {
  return { kind: "BinaryExpr", left, operator, right };
}

/** `name[index]`, or the bare name when `index` is omitted. */
export function operand(name: string, index?: number): IndexedIdentifier {
  return { kind: "IndexedIdentifier", identifier: id(name), indices: index === undefined ? [] : [int(index)] };
}
