/**
 * Construction helpers for the circuit IR.
 *
 * The exporter only reads circuits; these helpers exist so that callers (the
 * document loader, tests, embedding applications) can produce values that
 * satisfy the read contract without hand-wiring register/bit back references.
 */

import { freeParameters } from "./parameters.ts";
import type {
  BarrierOperation,
  Circuit,
  ClassicalRegister,
  Clbit,
  Condition,
  ConditionOperator,
  Definition,
  GateOperation,
  Instruction,
  MeasureOperation,
  Operation,
  Parameter,
  ParameterValue,
  QuantumRegister,
  Qubit,
  SubroutineOperation,
} from "./types.ts";

// ─── Registers & bits ────────────────────────────────────────────────────────

export function quantumRegister(name: string, size: number): QuantumRegister {
  const bits: Qubit[] = [];
  const register: QuantumRegister = { kind: "qreg", name, bits };
  for (let index = 0; index < size; index++) {
    bits.push({ kind: "qubit", register, index });
  }
  return register;
}

export function classicalRegister(name: string, size: number): ClassicalRegister {
  const bits: Clbit[] = [];
  const register: ClassicalRegister = { kind: "creg", name, bits };
  for (let index = 0; index < size; index++) {
    bits.push({ kind: "clbit", register, index });
  }
  return register;
}

/** A register-less qubit addressed by hardware index (`$n`). */
export function physicalQubit(index: number): Qubit {
  return { kind: "qubit", register: null, index };
}

// ─── Operations ──────────────────────────────────────────────────────────────

export const BARRIER: BarrierOperation = { kind: "barrier", name: "barrier" };
export const MEASURE: MeasureOperation = { kind: "measure", name: "measure" };

/**
 * A gate operation. Without a definition it is a standard gate when the name
 * is in the included vocabulary, an opaque gate otherwise.
 */
export function gate(
  name: string,
  params: readonly ParameterValue[] = [],
  definition: Definition | null = null
): GateOperation {
  return { kind: "gate", name, params, definition };
}

export function subroutine(
  name: string,
  definition: Definition | null,
  params: readonly ParameterValue[] = []
): SubroutineOperation {
  return { kind: "subroutine", name, params, definition };
}

/** Condition `target == value`, the only form the exporter lowers. */
export function cIf(target: ClassicalRegister | Clbit, value: number): Condition {
  return { target, operator: "==", value };
}

export function condition(
  target: ClassicalRegister | Clbit,
  operator: ConditionOperator,
  value: number
): Condition {
  return { target, operator, value };
}

// ─── Circuit builder ─────────────────────────────────────────────────────────

/**
 * Mutable accumulator producing an immutable `Circuit` or a `Definition`.
 *
 * Qubit arguments accept either a `Qubit` or an integer index into the
 * builder's flat qubit list (registers concatenated in the order they were
 * added), mirroring how circuits are usually written by hand.
 */
export class CircuitBuilder {
  readonly name: string;
  private readonly qregs: QuantumRegister[] = [];
  private readonly cregs: ClassicalRegister[] = [];
  private readonly data: Instruction[] = [];
  private readonly declaredParameters: Parameter[] = [];

  constructor(name = "circuit") {
    this.name = name;
  }

  addRegister(register: QuantumRegister | ClassicalRegister): this {
    if (register.kind === "qreg") {
      this.qregs.push(register);
    } else {
      this.cregs.push(register);
    }
    return this;
  }

  /** Declare parameters up front so their order does not depend on first use. */
  addParameters(...parameters: Parameter[]): this {
    this.declaredParameters.push(...parameters);
    return this;
  }

  get qubits(): Qubit[] {
    return this.qregs.flatMap((r) => r.bits);
  }

  get clbits(): Clbit[] {
    return this.cregs.flatMap((r) => r.bits);
  }

  append(
    operation: Operation,
    qubits: readonly (Qubit | number)[],
    clbits: readonly (Clbit | number)[] = [],
    condition: Condition | null = null
  ): this {
    this.data.push({
      operation,
      qubits: qubits.map((q) => this.resolveQubit(q)),
      clbits: clbits.map((c) => this.resolveClbit(c)),
      condition,
    });
    return this;
  }

  /** Append a body-less gate by name, e.g. `.gate("h", [0])`. */
  gate(
    name: string,
    qubits: readonly (Qubit | number)[],
    params: readonly ParameterValue[] = [],
    condition: Condition | null = null
  ): this {
    return this.append(gate(name, params), qubits, [], condition);
  }

  measure(qubit: Qubit | number, clbit: Clbit | number): this {
    return this.append(MEASURE, [qubit], [clbit]);
  }

  /** Barrier across the given qubits, or across every register qubit when none are given. */
  barrier(...qubits: (Qubit | number)[]): this {
    return this.append(BARRIER, qubits.length > 0 ? qubits : this.qubits);
  }

  build(): Circuit {
    return {
      name: this.name,
      qregs: [...this.qregs],
      cregs: [...this.cregs],
      data: [...this.data],
      parameters: this.collectParameters(),
    };
  }

  toDefinition(): Definition {
    return {
      name: this.name,
      qregs: [...this.qregs],
      cregs: [...this.cregs],
      parameters: this.collectParameters(),
      body: [...this.data],
    };
  }

  /**
   * Wrap the accumulated body as a reusable gate. Without `params`, the
   * placement passes the body's own parameters through, so `rot(a)` stays
   * bound to the enclosing circuit's `a`.
   */
  toGate(name: string = this.name, params?: readonly ParameterValue[]): GateOperation {
    const definition = this.toDefinition();
    return gate(name, params ?? definition.parameters, definition);
  }

  /** Wrap the accumulated body as a reusable subroutine; `params` defaults as for `toGate`. */
  toSubroutine(name: string = this.name, params?: readonly ParameterValue[]): SubroutineOperation {
    const definition = this.toDefinition();
    return subroutine(name, definition, params ?? definition.parameters);
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private collectParameters(): Parameter[] {
    const used = this.data.flatMap((inst) =>
      inst.operation.kind === "gate" || inst.operation.kind === "subroutine"
        ? inst.operation.params
        : []
    );
    return freeParameters([...this.declaredParameters, ...used]);
  }

  private resolveQubit(qubit: Qubit | number): Qubit {
    if (typeof qubit !== "number") return qubit;
    const resolved = this.qubits[qubit];
    if (!resolved) {
      throw new RangeError(`qubit index ${qubit} is out of range for circuit '${this.name}'`);
    }
    return resolved;
  }

  private resolveClbit(clbit: Clbit | number): Clbit {
    if (typeof clbit !== "number") return clbit;
    const resolved = this.clbits[clbit];
    if (!resolved) {
      throw new RangeError(`clbit index ${clbit} is out of range for circuit '${this.name}'`);
    }
    return resolved;
  }
}
