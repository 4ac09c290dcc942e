/**
 * Circuit IR: the read contract the exporter consumes.
 * Uses discriminated unions with a `kind` field, matching AST conventions.
 *
 * Operations are identity-bearing: placing the same operation object twice
 * means "the same definition", and the exporter deduplicates on that identity.
 * Instructions are placements of an operation onto concrete bits.
 */

// ─── Bits & Registers ────────────────────────────────────────────────────────

/** A quantum bit. `register` is null for an anonymous physical qubit. */
export interface Qubit {
  readonly kind: "qubit";
  readonly register: QuantumRegister | null;
  /** Position inside `register`, or the physical index when register-less. */
  readonly index: number;
}

/** A classical bit. */
export interface Clbit {
  readonly kind: "clbit";
  readonly register: ClassicalRegister | null;
  readonly index: number;
}

export interface QuantumRegister {
  readonly kind: "qreg";
  readonly name: string;
  readonly bits: readonly Qubit[];
}

export interface ClassicalRegister {
  readonly kind: "creg";
  readonly name: string;
  readonly bits: readonly Clbit[];
}

// ─── Parameters ──────────────────────────────────────────────────────────────

/** A free symbolic parameter. Compared by identity, displayed by `name`. */
export interface Parameter {
  readonly kind: "parameter";
  readonly name: string;
}

export type BinaryOperator = "+" | "-" | "*" | "/";

export interface BinaryParameterExpression {
  readonly kind: "binary";
  readonly operator: BinaryOperator;
  readonly left: ParameterValue;
  readonly right: ParameterValue;
}

export interface NegatedParameterExpression {
  readonly kind: "negate";
  readonly operand: ParameterValue;
}

export type ParameterExpression = BinaryParameterExpression | NegatedParameterExpression;

/** Anything that can appear in an operation's parameter list. */
export type ParameterValue = number | Parameter | ParameterExpression;

// ─── Operations ──────────────────────────────────────────────────────────────

/**
 * Body of a composite operation. The formal qubit arguments are the qubits of
 * `qregs`, in register order.
 */
export interface Definition {
  readonly name: string;
  readonly qregs: readonly QuantumRegister[];
  readonly cregs: readonly ClassicalRegister[];
  /** Formal symbolic parameters the body refers to. */
  readonly parameters: readonly Parameter[];
  readonly body: readonly Instruction[];
}

/** Reversible unitary. Body-less gates are either standard gates or opaque. */
export interface GateOperation {
  readonly kind: "gate";
  readonly name: string;
  readonly params: readonly ParameterValue[];
  readonly definition: Definition | null;
}

/** Non-unitary composite instruction, emitted as a `def` subroutine. */
export interface SubroutineOperation {
  readonly kind: "subroutine";
  readonly name: string;
  readonly params: readonly ParameterValue[];
  readonly definition: Definition | null;
}

export interface BarrierOperation {
  readonly kind: "barrier";
  readonly name: "barrier";
}

export interface MeasureOperation {
  readonly kind: "measure";
  readonly name: "measure";
}

/** Operations that may need a definition block in the output. */
export type DefinableOperation = GateOperation | SubroutineOperation;

/** Union of every operation the exporter knows how to lower. */
export type Operation = GateOperation | SubroutineOperation | BarrierOperation | MeasureOperation;

// ─── Instructions ────────────────────────────────────────────────────────────

export type ConditionOperator = "==" | "!=" | "<" | "<=" | ">" | ">=";

/** Classical condition guarding an instruction. */
export interface Condition {
  readonly target: ClassicalRegister | Clbit;
  readonly operator: ConditionOperator;
  readonly value: number;
}

/** Placement of an operation onto concrete bits. */
export interface Instruction {
  readonly operation: Operation;
  readonly qubits: readonly Qubit[];
  readonly clbits: readonly Clbit[];
  readonly condition: Condition | null;
}

// ─── Circuit ─────────────────────────────────────────────────────────────────

export interface Circuit {
  readonly name: string;
  readonly qregs: readonly QuantumRegister[];
  readonly cregs: readonly ClassicalRegister[];
  readonly data: readonly Instruction[];
  /** Free (unbound) symbolic parameters, in declaration order. */
  readonly parameters: readonly Parameter[];
}
