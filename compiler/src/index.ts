/**
 * OpenQASM 3 export for quantum circuits.
 *
 * Build a circuit with `CircuitBuilder` (or load one from a JSON document)
 * and serialize it with `dumps` / `dump` or an `Exporter`.
 */

export { Exporter, dump, dumps } from "./exporter/exporter.ts";
export { DEFAULT_INCLUDES, resolveExportOptions } from "./exporter/options.ts";
export type { ExportOptions, ResolvedExportOptions } from "./exporter/options.ts";
export { ProgramBuilder } from "./exporter/builder.ts";
export type { LoweringScope, NamingMode } from "./exporter/builder.ts";
export { hoistDefinitions } from "./exporter/hoister.ts";
export type { HoistedDefinition } from "./exporter/hoister.ts";
export { formatNumber, piFraction } from "./exporter/pi-format.ts";

export { GlobalNamespace, standardGates } from "./namespace/global-namespace.ts";

export {
  BARRIER,
  CircuitBuilder,
  MEASURE,
  cIf,
  classicalRegister,
  condition,
  gate,
  physicalQubit,
  quantumRegister,
  subroutine,
} from "./circuit/builder.ts";
export { add, div, evaluate, freeParameters, isParameter, mul, neg, parameter, sub } from "./circuit/parameters.ts";
export {
  circuitDocumentSchema,
  loadCircuitDocument,
  parseCircuitDocument,
  readCircuitFile,
} from "./circuit/document.ts";
export type { CircuitDocument, ParameterDocument } from "./circuit/document.ts";
export type * from "./circuit/types.ts";

export { emitProgram, printExpression, printProgram, writeProgram } from "./ast/printer.ts";
export type { TextSink } from "./ast/printer.ts";
export type * as ast from "./ast/nodes.ts";

export * from "./errors/index.ts";
