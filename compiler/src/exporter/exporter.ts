/**
 * Public entry points: build the whole program, then print it.
 *
 * Nothing is written before the AST is complete, so a failing export leaves
 * the sink untouched.
 */

import type { Program } from "../ast/nodes.ts";
import { printProgram, type TextSink, writeProgram } from "../ast/printer.ts";
import type { Circuit } from "../circuit/types.ts";
import { ProgramBuilder } from "./builder.ts";
import { type ExportOptions, type ResolvedExportOptions, resolveExportOptions } from "./options.ts";

export class Exporter {
  readonly options: ResolvedExportOptions;

  constructor(options: ExportOptions = {}) {
    this.options = resolveExportOptions(options);
  }

  /** Lower `circuit` to an OpenQASM 3 AST. Each call uses a fresh namespace. */
  buildProgram(circuit: Circuit): Program {
    return new ProgramBuilder(circuit, this.options).build();
  }

  dumps(circuit: Circuit): string {
    return printProgram(this.buildProgram(circuit));
  }

  dump(circuit: Circuit, sink: TextSink): void {
    writeProgram(this.buildProgram(circuit), sink);
  }
}

export function dumps(circuit: Circuit, options: ExportOptions = {}): string {
  return new Exporter(options).dumps(circuit);
}

export function dump(circuit: Circuit, sink: TextSink, options: ExportOptions = {}): void {
  new Exporter(options).dump(circuit, sink);
}
