/**
 * Circuit → OpenQASM 3 AST.
 *
 * One `ProgramBuilder` per export: it owns the namespace, hoists every
 * definition the circuit needs, then assembles the program in emission order:
 * definitions, `input` declarations, `bit` then `qubit` registers, and the
 * lowered top-level instructions. Register names are claimed before hoisting
 * and parameters are bound after it, so neither can collide with the other
 * or with a definition.
 *
 * Method implementations are split across:
 *   - builder-decl.ts   (header, inputs and register declarations)
 *   - builder-defs.ts   (gate / def / opaque blocks)
 *   - builder-stmt.ts   (instruction and condition lowering)
 *   - builder-expr.ts   (bit operands and parameter expressions)
 */

import type { Program } from "../ast/nodes.ts";
import type { Circuit, ClassicalRegister, Parameter, QuantumRegister } from "../circuit/types.ts";
import { GlobalNamespace } from "../namespace/global-namespace.ts";
import * as declMethods from "./builder-decl.ts";
import * as defMethods from "./builder-defs.ts";
import * as exprMethods from "./builder-expr.ts";
import * as stmtMethods from "./builder-stmt.ts";
import { hoistDefinitions } from "./hoister.ts";
import type { InstructionSite } from "./location.ts";
import type { ResolvedExportOptions } from "./options.ts";

// ─── Lowering scope ──────────────────────────────────────────────────────────

/**
 * `indexed`: bits render as `reg[i]` (top level).
 * `flat`: bits render as `reg_i` (definition bodies, whose formal qubits are
 * single identifiers).
 */
export type NamingMode = "indexed" | "flat";

/** The body being lowered: how to name its bits and which registers they may belong to. */
export interface LoweringScope {
  readonly mode: NamingMode;
  /** Name of the circuit or definition that owns the body. */
  readonly owner: string;
  /** Path to the instruction whose body this is; empty at top level. */
  readonly parents: InstructionSite;
  readonly qregs: readonly QuantumRegister[];
  readonly cregs: readonly ClassicalRegister[];
  /** Output name of every parameter the body may refer to. */
  readonly parameters: ReadonlyMap<Parameter, string>;
}

// ─── Builder ─────────────────────────────────────────────────────────────────

export class ProgramBuilder {
  readonly circuit: Circuit;
  readonly options: ResolvedExportOptions;
  readonly namespace: GlobalNamespace;

  constructor(circuit: Circuit, options: ResolvedExportOptions) {
    this.circuit = circuit;
    this.options = options;
    this.namespace = new GlobalNamespace(options.includes);
  }

  build(): Program {
    for (const register of [...this.circuit.cregs, ...this.circuit.qregs]) {
      this.namespace.reserveRegister(register.name);
    }
    const definitions = hoistDefinitions(this.circuit, this.namespace).map((entry) =>
      this.buildDefinition(entry)
    );
    const inputs = this.bindInputs();
    const topLevel: LoweringScope = {
      mode: "indexed",
      owner: this.circuit.name,
      parents: [],
      qregs: this.circuit.qregs,
      cregs: this.circuit.cregs,
      parameters: inputs,
    };
    return {
      kind: "Program",
      header: this.buildHeader(),
      statements: [
        ...definitions,
        ...this.buildInputs(inputs),
        ...this.buildRegisterDeclarations(),
        ...this.lowerBody(this.circuit.data, topLevel),
      ],
    };
  }

  // ─── Declarations (from builder-decl.ts) ─────────────────────────────
  declare buildHeader: typeof declMethods.buildHeader;
  declare bindInputs: typeof declMethods.bindInputs;
  declare buildInputs: typeof declMethods.buildInputs;
  declare buildRegisterDeclarations: typeof declMethods.buildRegisterDeclarations;

  // ─── Definitions (from builder-defs.ts) ──────────────────────────────
  declare buildDefinition: typeof defMethods.buildDefinition;
  declare buildGateDefinition: typeof defMethods.buildGateDefinition;
  declare buildSubroutineDefinition: typeof defMethods.buildSubroutineDefinition;
  declare buildCalibrationDefinition: typeof defMethods.buildCalibrationDefinition;
  declare definitionScope: typeof defMethods.definitionScope;
  declare definitionParams: typeof defMethods.definitionParams;
  declare formalParameterNames: typeof defMethods.formalParameterNames;
  declare formalQubits: typeof defMethods.formalQubits;

  // ─── Statements (from builder-stmt.ts) ───────────────────────────────
  declare lowerBody: typeof stmtMethods.lowerBody;
  declare lowerInstruction: typeof stmtMethods.lowerInstruction;
  declare lowerOperation: typeof stmtMethods.lowerOperation;
  declare lowerCall: typeof stmtMethods.lowerCall;
  declare lowerBarrier: typeof stmtMethods.lowerBarrier;
  declare lowerMeasurement: typeof stmtMethods.lowerMeasurement;
  declare lowerCondition: typeof stmtMethods.lowerCondition;

  // ─── Expressions (from builder-expr.ts) ──────────────────────────────
  declare lowerQubit: typeof exprMethods.lowerQubit;
  declare lowerClbit: typeof exprMethods.lowerClbit;
  declare lowerParameterValue: typeof exprMethods.lowerParameterValue;
}

// ─── Attach extracted methods to ProgramBuilder prototype ─────────────────────

ProgramBuilder.prototype.buildHeader = declMethods.buildHeader;
ProgramBuilder.prototype.bindInputs = declMethods.bindInputs;
ProgramBuilder.prototype.buildInputs = declMethods.buildInputs;
ProgramBuilder.prototype.buildRegisterDeclarations = declMethods.buildRegisterDeclarations;

ProgramBuilder.prototype.buildDefinition = defMethods.buildDefinition;
ProgramBuilder.prototype.buildGateDefinition = defMethods.buildGateDefinition;
ProgramBuilder.prototype.buildSubroutineDefinition = defMethods.buildSubroutineDefinition;
ProgramBuilder.prototype.buildCalibrationDefinition = defMethods.buildCalibrationDefinition;
ProgramBuilder.prototype.definitionScope = defMethods.definitionScope;
ProgramBuilder.prototype.definitionParams = defMethods.definitionParams;
ProgramBuilder.prototype.formalParameterNames = defMethods.formalParameterNames;
ProgramBuilder.prototype.formalQubits = defMethods.formalQubits;

ProgramBuilder.prototype.lowerBody = stmtMethods.lowerBody;
ProgramBuilder.prototype.lowerInstruction = stmtMethods.lowerInstruction;
ProgramBuilder.prototype.lowerOperation = stmtMethods.lowerOperation;
ProgramBuilder.prototype.lowerCall = stmtMethods.lowerCall;
ProgramBuilder.prototype.lowerBarrier = stmtMethods.lowerBarrier;
ProgramBuilder.prototype.lowerMeasurement = stmtMethods.lowerMeasurement;
ProgramBuilder.prototype.lowerCondition = stmtMethods.lowerCondition;

ProgramBuilder.prototype.lowerQubit = exprMethods.lowerQubit;
ProgramBuilder.prototype.lowerClbit = exprMethods.lowerClbit;
ProgramBuilder.prototype.lowerParameterValue = exprMethods.lowerParameterValue;
