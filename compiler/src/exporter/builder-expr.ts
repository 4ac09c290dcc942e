/**
 * Operand and parameter expressions for ProgramBuilder.
 */

import type { Expression, Identifier, IndexedIdentifier } from "../ast/nodes.ts";
import { evaluate } from "../circuit/parameters.ts";
import type { ClassicalRegister, Clbit, ParameterValue, QuantumRegister, Qubit } from "../circuit/types.ts";
import { MalformedInputError } from "../errors/index.ts";
import type { LoweringScope, NamingMode, ProgramBuilder } from "./builder.ts";
import { formatNumber } from "./pi-format.ts";

export function identifier(name: string): Identifier {
  return { kind: "Identifier", name };
}

// ─── Bit operands ────────────────────────────────────────────────────────────

/**
 * `q[0]` at top level, `q_0` inside a definition. A qubit outside any
 * register is addressed physically (`$3`), which only makes sense at top level.
 */
export function lowerQubit(
  this: ProgramBuilder,
  qubit: Qubit,
  location: string,
  scope: LoweringScope
): IndexedIdentifier {
  if (qubit.register === null) {
    if (scope.mode === "flat") {
      throw new MalformedInputError(
        `qubit $${qubit.index} has no register and cannot be a formal argument of '${scope.owner}'`,
        location
      );
    }
    return { kind: "IndexedIdentifier", identifier: identifier(`$${qubit.index}`), indices: [] };
  }
  return registerOperand(qubit.register, scope.qregs, qubit.index, scope.mode, location);
}

export function lowerClbit(
  this: ProgramBuilder,
  clbit: Clbit,
  location: string,
  scope: LoweringScope
): IndexedIdentifier {
  if (clbit.register === null) {
    throw new MalformedInputError(`classical bit ${clbit.index} does not belong to a register`, location);
  }
  return registerOperand(clbit.register, scope.cregs, clbit.index, scope.mode, location);
}

function registerOperand<R extends QuantumRegister | ClassicalRegister>(
  register: R,
  declared: readonly R[],
  index: number,
  mode: NamingMode,
  location: string
): IndexedIdentifier {
  if (!declared.includes(register)) {
    const kind = register.kind === "qreg" ? "quantum" : "classical";
    throw new MalformedInputError(`${kind} register '${register.name}' is not declared`, location);
  }
  if (mode === "flat") {
    return { kind: "IndexedIdentifier", identifier: identifier(`${register.name}_${index}`), indices: [] };
  }
  return {
    kind: "IndexedIdentifier",
    identifier: identifier(register.name),
    indices: [{ kind: "IntegerLiteral", value: index }],
  };
}

// ─── Parameters ──────────────────────────────────────────────────────────────

/**
 * Constant sub-trees collapse to one number before formatting, so
 * `mul(2, Math.PI)` and `2 * Math.PI` both print `2*pi`.
 */
export function lowerParameterValue(
  this: ProgramBuilder,
  value: ParameterValue,
  location: string,
  scope: LoweringScope
): Expression {
  if (typeof value === "number") return formatNumber(value, this.options.foldConstants, location);
  const constant = evaluate(value);
  if (constant !== null) return formatNumber(constant, this.options.foldConstants, location);

  switch (value.kind) {
    case "parameter": {
      const name = scope.parameters.get(value);
      if (name === undefined) {
        throw new MalformedInputError(`parameter '${value.name}' is not declared in '${scope.owner}'`, location);
      }
      return identifier(name);
    }
    case "negate":
      return {
        kind: "UnaryExpr",
        operator: "-",
        operand: this.lowerParameterValue(value.operand, location, scope),
      };
    case "binary":
      return {
        kind: "BinaryExpr",
        left: this.lowerParameterValue(value.left, location, scope),
        operator: value.operator,
        right: this.lowerParameterValue(value.right, location, scope),
      };
  }
}
