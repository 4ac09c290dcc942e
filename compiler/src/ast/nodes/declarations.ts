import type { BaseNode } from "./base.ts";
import type { Identifier, IntegerLiteral } from "./expressions.ts";

/** `bit[<size>] <name>;` */
export interface BitDeclaration extends BaseNode {
  kind: "BitDeclaration";
  identifier: Identifier;
  designator: IntegerLiteral;
}

/** `qubit[<size>] <name>;` */
export interface QubitDeclaration extends BaseNode {
  kind: "QubitDeclaration";
  identifier: Identifier;
  designator: IntegerLiteral;
}

/** `input float[<width>] <name>;` for an unbound circuit parameter. */
export interface InputDeclaration extends BaseNode {
  kind: "InputDeclaration";
  identifier: Identifier;
  width: number;
}

export type Declaration = BitDeclaration | QubitDeclaration | InputDeclaration;
