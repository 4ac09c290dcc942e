import { describe, expect, test } from "vitest";
import { CircuitBuilder, quantumRegister } from "../../src/circuit/builder.ts";
import type { Circuit } from "../../src/circuit/types.ts";
import { dump, dumps, Exporter } from "../../src/exporter/exporter.ts";
import { DEFAULT_INCLUDES, resolveExportOptions } from "../../src/exporter/options.ts";
import { circuitWith, HEADER } from "./helpers.ts";

function duplicateNames(): Circuit {
  const first = new CircuitBuilder("my_gate").addRegister(quantumRegister("q", 1)).gate("h", [0]).toGate();
  const second = new CircuitBuilder("my_gate").addRegister(quantumRegister("q", 1)).gate("x", [0]).toGate();
  const { builder } = circuitWith(1);
  return builder.append(second, [0]).append(first, [0]).append(second, [0]).build();
}

describe("export options", () => {
  test("defaults", () => {
    expect(resolveExportOptions()).toEqual({ includes: ["stdgates.inc"], foldConstants: true });
    expect(DEFAULT_INCLUDES).toEqual(["stdgates.inc"]);
  });

  test("explicit values win", () => {
    expect(resolveExportOptions({ includes: ["a.inc"], foldConstants: false })).toEqual({
      includes: ["a.inc"],
      foldConstants: false,
    });
  });

  test("every include is emitted, known or not", () => {
    const { builder } = circuitWith(1);
    builder.gate("h", [0]);
    expect(dumps(builder.build(), { includes: ["stdgates.inc", "extra.inc"] })).toBe(
      "OPENQASM 3;\ninclude stdgates.inc;\ninclude extra.inc;\nqubit[1] q;\nh q[0];\n"
    );
  });
});

describe("Exporter", () => {
  test("output is deterministic across calls", () => {
    const circuit = duplicateNames();
    const exporter = new Exporter();
    const first = exporter.dumps(circuit);
    expect(exporter.dumps(circuit)).toBe(first);
    expect(dumps(circuit)).toBe(first);
  });

  test("names follow first definition order", () => {
    expect(dumps(duplicateNames())).toBe(
      HEADER +
        "gate my_gate q_0 {\nx q_0;\n}\n" +
        "gate my_gate_1 q_0 {\nh q_0;\n}\n" +
        "qubit[1] q;\n" +
        "my_gate q[0];\n" +
        "my_gate_1 q[0];\n" +
        "my_gate q[0];\n"
    );
  });

  test("dump streams the same text dumps returns", () => {
    const circuit = duplicateNames();
    const chunks: string[] = [];
    dump(circuit, { write: (chunk) => chunks.push(chunk) });
    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.join("")).toBe(dumps(circuit));
  });

  test("buildProgram returns the AST", () => {
    const { builder } = circuitWith(1, 1);
    builder.gate("h", [0]).measure(0, 0);
    const program = new Exporter().buildProgram(builder.build());
    expect(program.statements.map((s) => s.kind)).toEqual([
      "BitDeclaration",
      "QubitDeclaration",
      "GateCall",
      "MeasurementAssignment",
    ]);
  });
});
