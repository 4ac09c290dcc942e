import type { BaseNode } from "./base.ts";
import type { Identifier, IntegerLiteral } from "./expressions.ts";
import type { QuantumStatement, ReturnStatement } from "./statements.ts";

/** `gate <name>(<params>) <q0>, <q1> { ... }` */
export interface GateDefinition extends BaseNode {
  kind: "GateDefinition";
  name: Identifier;
  params: Identifier[];
  qubits: Identifier[];
  body: QuantumStatement[];
}

/** Subroutine argument `qubit <name>` or `qubit[<size>] <name>`. */
export interface QuantumArgument extends BaseNode {
  kind: "QuantumArgument";
  identifier: Identifier;
  designator: IntegerLiteral | null;
}

/** `def <name> qubit <q0>, ... { ... return; }` */
export interface SubroutineDefinition extends BaseNode {
  kind: "SubroutineDefinition";
  name: Identifier;
  params: Identifier[];
  arguments: QuantumArgument[];
  body: QuantumStatement[];
  returnStatement: ReturnStatement;
}

/**
 * Body-less instruction whose implementation is supplied by calibrations;
 * rendered as an `opaque` declaration.
 */
export interface CalibrationDefinition extends BaseNode {
  kind: "CalibrationDefinition";
  name: Identifier;
  params: Identifier[];
  qubits: Identifier[];
}

export type Definition = GateDefinition | SubroutineDefinition | CalibrationDefinition;
