/**
 * Test utilities for exporter tests.
 */

import { CircuitBuilder, classicalRegister, quantumRegister } from "../../src/circuit/builder.ts";
import type { ClassicalRegister, QuantumRegister } from "../../src/circuit/types.ts";
import { ExportError } from "../../src/errors/index.ts";

/** Header produced with the default options. */
export const HEADER = "OPENQASM 3;\ninclude stdgates.inc;\n";

/** Element `index` of `items`, failing the test when it is missing. */
export function at<T>(items: readonly T[], index: number): T {
  const item = items[index];
  if (item === undefined) throw new Error(`no element at index ${index}`);
  return item;
}

/** Builder with a quantum register `q` and, when `clbits > 0`, a classical register `c`. */
export function circuitWith(
  qubits: number,
  clbits = 0,
  name = "circuit"
): { builder: CircuitBuilder; q: QuantumRegister; c: ClassicalRegister } {
  const q = quantumRegister("q", qubits);
  const c = classicalRegister("c", clbits);
  const builder = new CircuitBuilder(name).addRegister(q);
  if (clbits > 0) builder.addRegister(c);
  return { builder, q, c };
}

/** Run `fn`, returning the ExportError it throws. */
export function catchExportError(fn: () => unknown): ExportError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ExportError) return error;
    throw error;
  }
  throw new Error("expected an ExportError to be thrown");
}
