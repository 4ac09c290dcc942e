import type { BaseNode } from "./base.ts";

/** Bare name: a register, a flat qubit name, a parameter, `pi`, or `$n`. */
export interface Identifier extends BaseNode {
  kind: "Identifier";
  name: string;
}

/** `name[i, j]`; renders as the bare name when `indices` is empty. */
export interface IndexedIdentifier extends BaseNode {
  kind: "IndexedIdentifier";
  identifier: Identifier;
  indices: IntegerLiteral[];
}

export interface IntegerLiteral extends BaseNode {
  kind: "IntegerLiteral";
  value: number;
}

/** Non-negative decimal literal; negatives are wrapped in a `UnaryExpr`. */
export interface RealLiteral extends BaseNode {
  kind: "RealLiteral";
  value: number;
}

export interface UnaryExpr extends BaseNode {
  kind: "UnaryExpr";
  operator: "-";
  operand: Expression;
}

export type BinaryOperator = "+" | "-" | "*" | "/" | "==";

export interface BinaryExpr extends BaseNode {
  kind: "BinaryExpr";
  left: Expression;
  operator: BinaryOperator;
  right: Expression;
}

/** Union of all expression nodes. */
export type Expression =
  | Identifier
  | IndexedIdentifier
  | IntegerLiteral
  | RealLiteral
  | UnaryExpr
  | BinaryExpr;
