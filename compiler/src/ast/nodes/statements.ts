import type { BaseNode } from "./base.ts";
import type { Expression, IndexedIdentifier, Identifier } from "./expressions.ts";

/** `<name>(<params>) <qubits>;` */
export interface GateCall extends BaseNode {
  kind: "GateCall";
  name: Identifier;
  params: Expression[];
  qubits: IndexedIdentifier[];
}

/** Call of a `def` subroutine; same surface syntax as a gate call. */
export interface SubroutineCall extends BaseNode {
  kind: "SubroutineCall";
  name: Identifier;
  params: Expression[];
  qubits: IndexedIdentifier[];
}

/** `barrier <qubits>;` */
export interface Barrier extends BaseNode {
  kind: "Barrier";
  qubits: IndexedIdentifier[];
}

/** `measure <qubits>`, only ever rendered as the right side of an assignment. */
export interface Measurement extends BaseNode {
  kind: "Measurement";
  qubits: IndexedIdentifier[];
}

/** `<target> = measure <qubit>;` */
export interface MeasurementAssignment extends BaseNode {
  kind: "MeasurementAssignment";
  target: IndexedIdentifier;
  measurement: Measurement;
}

/** `{ ... }` */
export interface ProgramBlock extends BaseNode {
  kind: "ProgramBlock";
  statements: QuantumStatement[];
}

/** `if (<condition>){ ... }`, single branch, no else. */
export interface Branching extends BaseNode {
  kind: "Branching";
  condition: Expression;
  thenBlock: ProgramBlock;
}

export interface ReturnStatement extends BaseNode {
  kind: "ReturnStatement";
}

/** Statements that can appear at top level, inside definitions, or inside a branch. */
export type QuantumStatement =
  | GateCall
  | SubroutineCall
  | Barrier
  | MeasurementAssignment
  | Branching;
