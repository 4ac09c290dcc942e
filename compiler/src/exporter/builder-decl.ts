/**
 * Header, `input` and register declarations for ProgramBuilder.
 */

import type { BitDeclaration, Header, Include, InputDeclaration, QubitDeclaration } from "../ast/nodes.ts";
import { freeParameters } from "../circuit/parameters.ts";
import type { Parameter } from "../circuit/types.ts";
import type { ProgramBuilder } from "./builder.ts";
import { identifier } from "./builder-expr.ts";

export const OPENQASM_VERSION = "3";
/** Width of the `float` type unbound parameters are declared with. */
export const INPUT_FLOAT_WIDTH = 32;

export function buildHeader(this: ProgramBuilder): Header {
  return {
    kind: "Header",
    version: { kind: "Version", number: OPENQASM_VERSION },
    includes: this.options.includes.map((filename): Include => ({ kind: "Include", filename })),
  };
}

/**
 * Bind each free parameter of the circuit to a unique output name. Two
 * distinct parameters called `t` become `t` and `t_<index>`.
 */
export function bindInputs(this: ProgramBuilder): Map<Parameter, string> {
  const names = new Map<Parameter, string>();
  for (const parameter of freeParameters(this.circuit.parameters)) {
    names.set(parameter, this.namespace.bindParameter(parameter));
  }
  return names;
}

/** One `input float[32]` per bound parameter, in first-occurrence order. */
export function buildInputs(this: ProgramBuilder, names: ReadonlyMap<Parameter, string>): InputDeclaration[] {
  return [...names.values()].map((name): InputDeclaration => ({
    kind: "InputDeclaration",
    identifier: identifier(name),
    width: INPUT_FLOAT_WIDTH,
  }));
}

/** Classical registers first, then quantum registers, each in registration order. */
export function buildRegisterDeclarations(this: ProgramBuilder): (BitDeclaration | QubitDeclaration)[] {
  const bits: BitDeclaration[] = this.circuit.cregs.map((register) => ({
    kind: "BitDeclaration",
    identifier: identifier(register.name),
    designator: { kind: "IntegerLiteral", value: register.bits.length },
  }));
  const qubits: QubitDeclaration[] = this.circuit.qregs.map((register) => ({
    kind: "QubitDeclaration",
    identifier: identifier(register.name),
    designator: { kind: "IntegerLiteral", value: register.bits.length },
  }));
  return [...bits, ...qubits];
}
