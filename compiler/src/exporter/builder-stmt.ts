/**
 * Instruction lowering for ProgramBuilder.
 *
 * A conditioned instruction is lowered without its condition and wrapped in a
 * single-branch `if`; only equality conditions are representable.
 */

import type {
  Barrier,
  BinaryExpr,
  Branching,
  GateCall,
  MeasurementAssignment,
  QuantumStatement,
  SubroutineCall,
} from "../ast/nodes.ts";
import type { Condition, DefinableOperation, Instruction } from "../circuit/types.ts";
import { MalformedInputError, UnsupportedConstructError } from "../errors/index.ts";
import type { LoweringScope, ProgramBuilder } from "./builder.ts";
import { identifier } from "./builder-expr.ts";
import { describeSite, type InstructionSite, siteOf } from "./location.ts";

export function lowerBody(
  this: ProgramBuilder,
  body: readonly Instruction[],
  scope: LoweringScope
): QuantumStatement[] {
  return body.map((instruction, index) =>
    this.lowerInstruction(instruction, siteOf(scope.parents, scope.owner, index), scope)
  );
}

export function lowerInstruction(
  this: ProgramBuilder,
  instruction: Instruction,
  site: InstructionSite,
  scope: LoweringScope
): QuantumStatement {
  const location = describeSite(site, instruction.operation);
  if (instruction.condition === null) {
    return this.lowerOperation(instruction, location, scope);
  }
  const branch: Branching = {
    kind: "Branching",
    condition: this.lowerCondition(instruction.condition, location, scope),
    thenBlock: { kind: "ProgramBlock", statements: [this.lowerOperation(instruction, location, scope)] },
  };
  return branch;
}

export function lowerOperation(
  this: ProgramBuilder,
  instruction: Instruction,
  location: string,
  scope: LoweringScope
): QuantumStatement {
  const op = instruction.operation;
  switch (op.kind) {
    case "gate":
    case "subroutine":
      return this.lowerCall(op, instruction, location, scope);
    case "barrier":
      return this.lowerBarrier(instruction, location, scope);
    case "measure":
      return this.lowerMeasurement(instruction, location, scope);
    default: {
      const unknown: never = op;
      throw new UnsupportedConstructError(`unsupported operation ${JSON.stringify(unknown)}`, location);
    }
  }
}

/** Gate and subroutine calls share one surface form: `name(params) operands;`. */
export function lowerCall(
  this: ProgramBuilder,
  op: DefinableOperation,
  instruction: Instruction,
  location: string,
  scope: LoweringScope
): GateCall | SubroutineCall {
  const call = {
    name: identifier(this.namespace.nameOf(op, location)),
    params: op.params.map((value) => this.lowerParameterValue(value, location, scope)),
    qubits: instruction.qubits.map((qubit) => this.lowerQubit(qubit, location, scope)),
  };
  return op.kind === "gate" ? { kind: "GateCall", ...call } : { kind: "SubroutineCall", ...call };
}

export function lowerBarrier(
  this: ProgramBuilder,
  instruction: Instruction,
  location: string,
  scope: LoweringScope
): Barrier {
  return {
    kind: "Barrier",
    qubits: instruction.qubits.map((qubit) => this.lowerQubit(qubit, location, scope)),
  };
}

/** `c = measure q;` with exactly one source qubit and one target bit. */
export function lowerMeasurement(
  this: ProgramBuilder,
  instruction: Instruction,
  location: string,
  scope: LoweringScope
): MeasurementAssignment {
  const [qubit] = instruction.qubits;
  const [clbit] = instruction.clbits;
  if (instruction.qubits.length !== 1 || instruction.clbits.length !== 1 || !qubit || !clbit) {
    throw new UnsupportedConstructError(
      `measurement needs exactly one qubit and one classical bit, ` +
        `got ${instruction.qubits.length} and ${instruction.clbits.length}`,
      location
    );
  }
  return {
    kind: "MeasurementAssignment",
    target: this.lowerClbit(clbit, location, scope),
    measurement: { kind: "Measurement", qubits: [this.lowerQubit(qubit, location, scope)] },
  };
}

/** `<register> == <value>` or `<bit> == <value>`. */
export function lowerCondition(
  this: ProgramBuilder,
  condition: Condition,
  location: string,
  scope: LoweringScope
): BinaryExpr {
  if (condition.operator !== "==") {
    throw new UnsupportedConstructError(
      `condition operator '${condition.operator}' is not supported, only '=='`,
      location
    );
  }
  if (!Number.isSafeInteger(condition.value) || condition.value < 0) {
    throw new MalformedInputError(
      `condition value ${condition.value} is not a non-negative integer`,
      location
    );
  }

  const target = condition.target;
  let left: BinaryExpr["left"];
  if (target.kind === "creg") {
    if (!scope.cregs.includes(target)) {
      throw new MalformedInputError(`classical register '${target.name}' is not declared`, location);
    }
    left = identifier(target.name);
  } else {
    left = this.lowerClbit(target, location, scope);
  }
  return {
    kind: "BinaryExpr",
    left,
    operator: "==",
    right: { kind: "IntegerLiteral", value: condition.value },
  };
}
