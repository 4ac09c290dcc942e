/**
 * Definition blocks for ProgramBuilder: `gate`, `def` and `opaque`.
 *
 * Bodies are lowered in flat naming mode against the definition's own
 * registers, so `q[1]` inside a body becomes the formal argument `q_1`.
 */

import type {
  CalibrationDefinition,
  Definition as DefinitionNode,
  GateDefinition,
  Identifier,
  QuantumArgument,
  SubroutineDefinition,
} from "../ast/nodes.ts";
import type { DefinableOperation, Definition, Parameter } from "../circuit/types.ts";
import { MalformedInputError } from "../errors/index.ts";
import type { LoweringScope, ProgramBuilder } from "./builder.ts";
import { identifier } from "./builder-expr.ts";
import type { HoistedCalibration, HoistedDefinition, HoistedGate, HoistedSubroutine } from "./hoister.ts";

export function buildDefinition(this: ProgramBuilder, entry: HoistedDefinition): DefinitionNode {
  switch (entry.kind) {
    case "gate":
      return this.buildGateDefinition(entry);
    case "subroutine":
      return this.buildSubroutineDefinition(entry);
    case "calibration":
      return this.buildCalibrationDefinition(entry);
  }
}

export function buildGateDefinition(this: ProgramBuilder, entry: HoistedGate): GateDefinition {
  const scope = this.definitionScope(entry);
  return {
    kind: "GateDefinition",
    name: identifier(entry.name),
    params: this.definitionParams(entry.operation, entry.definition, scope),
    qubits: this.formalQubits(scope),
    body: this.lowerBody(entry.definition.body, scope),
  };
}

export function buildSubroutineDefinition(this: ProgramBuilder, entry: HoistedSubroutine): SubroutineDefinition {
  const scope = this.definitionScope(entry);
  return {
    kind: "SubroutineDefinition",
    name: identifier(entry.name),
    params: this.definitionParams(entry.operation, entry.definition, scope),
    arguments: this.formalQubits(scope).map((qubit): QuantumArgument => ({
      kind: "QuantumArgument",
      identifier: qubit,
      designator: null,
    })),
    body: this.lowerBody(entry.definition.body, scope),
    returnStatement: { kind: "ReturnStatement" },
  };
}

/** `opaque name(param_0, …) q_0, q_1, …;` sized from the first placement. */
export function buildCalibrationDefinition(this: ProgramBuilder, entry: HoistedCalibration): CalibrationDefinition {
  return {
    kind: "CalibrationDefinition",
    name: identifier(entry.name),
    params: positionalParams(entry.operation.params.length),
    qubits: Array.from({ length: entry.arity }, (_, i) => identifier(`q_${i}`)),
  };
}

export function definitionScope(this: ProgramBuilder, entry: HoistedGate | HoistedSubroutine): LoweringScope {
  return {
    mode: "flat",
    owner: entry.definition.name,
    parents: entry.site,
    qregs: entry.definition.qregs,
    cregs: entry.definition.cregs,
    parameters: this.formalParameterNames(entry.operation, entry.definition, entry.site.join(" > ")),
  };
}

/**
 * Formal parameters: `param_i` for each operation parameter the definition
 * does not name itself, then the definition's own parameters as named in
 * `scope`.
 */
export function definitionParams(
  this: ProgramBuilder,
  op: DefinableOperation,
  definition: Definition,
  scope: LoweringScope
): Identifier[] {
  return [
    ...positionalParams(unnamedCount(op, definition)),
    ...[...scope.parameters.values()].map(identifier),
  ];
}

/**
 * Local names for a definition's own parameters. A name that is taken by a
 * `param_i`, a formal bit, an earlier formal or a global definition gets the
 * parameter's position as a suffix.
 */
export function formalParameterNames(
  this: ProgramBuilder,
  op: DefinableOperation,
  definition: Definition,
  location: string
): Map<Parameter, string> {
  const taken = new Set<string>([
    ...positionalParams(unnamedCount(op, definition)).map((param) => param.name),
    ...[...definition.qregs, ...definition.cregs].flatMap((register) =>
      register.bits.map((_, index) => `${register.name}_${index}`)
    ),
  ]);
  const isTaken = (name: string): boolean => taken.has(name) || this.namespace.shadows(name);

  const names = new Map<Parameter, string>();
  definition.parameters.forEach((parameter, position) => {
    if (parameter.name.length === 0) {
      throw new MalformedInputError(`a parameter of '${definition.name}' has an empty name`, location);
    }
    let name = parameter.name;
    if (isTaken(name)) {
      const base = `${parameter.name}_${position}`;
      name = base;
      for (let n = 1; isTaken(name); n++) name = `${base}_${n}`;
    }
    taken.add(name);
    names.set(parameter, name);
  });
  return names;
}

/** One identifier per qubit of the definition's registers, in register order. */
export function formalQubits(this: ProgramBuilder, scope: LoweringScope): Identifier[] {
  const location = scope.parents.join(" > ");
  return scope.qregs.flatMap((register) =>
    register.bits.map((qubit) => this.lowerQubit(qubit, location, scope).identifier)
  );
}

function unnamedCount(op: DefinableOperation, definition: Definition): number {
  return Math.max(0, op.params.length - definition.parameters.length);
}

function positionalParams(count: number): Identifier[] {
  return Array.from({ length: count }, (_, i) => identifier(`param_${i}`));
}
