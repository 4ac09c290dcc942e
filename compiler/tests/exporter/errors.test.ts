import { describe, expect, test } from "vitest";
import {
  BARRIER,
  CircuitBuilder,
  classicalRegister,
  condition,
  gate,
  MEASURE,
  physicalQubit,
  quantumRegister,
} from "../../src/circuit/builder.ts";
import { div, parameter } from "../../src/circuit/parameters.ts";
import type { Definition, Instruction } from "../../src/circuit/types.ts";
import { MalformedInputError, UnsupportedConstructError } from "../../src/errors/index.ts";
import { dump, dumps } from "../../src/exporter/exporter.ts";
import { at, catchExportError, circuitWith } from "./helpers.ts";

describe("exporter errors: unsupported constructs", () => {
  test("measurement with two qubits", () => {
    const { builder } = circuitWith(2, 2);
    builder.append(MEASURE, [0, 1], [0, 1]);

    const error = catchExportError(() => dumps(builder.build()));
    expect(error).toBeInstanceOf(UnsupportedConstructError);
    expect(error.code).toBe("unsupported-construct");
    expect(error.location).toBe("circuit.data[0] (measure)");
    expect(error.message).toBe(
      "measurement needs exactly one qubit and one classical bit, got 2 and 2 (at circuit.data[0] (measure))"
    );
  });

  test("measurement without a classical target", () => {
    const { builder } = circuitWith(1);
    builder.append(MEASURE, [0]);
    expect(catchExportError(() => dumps(builder.build()))).toBeInstanceOf(UnsupportedConstructError);
  });

  test("non-equality condition", () => {
    const { builder, c } = circuitWith(1, 1);
    builder.gate("x", [0], [], condition(c, "!=", 1));

    const error = catchExportError(() => dumps(builder.build()));
    expect(error).toBeInstanceOf(UnsupportedConstructError);
    expect(error.detail).toBe("condition operator '!=' is not supported, only '=='");
  });
});

describe("exporter errors: malformed input", () => {
  test("condition value must be a non-negative integer", () => {
    for (const value of [1.5, -1]) {
      const { builder, c } = circuitWith(1, 1);
      builder.gate("x", [0], [], condition(c, "==", value));
      const error = catchExportError(() => dumps(builder.build()));
      expect(error).toBeInstanceOf(MalformedInputError);
      expect(error.detail).toBe(`condition value ${value} is not a non-negative integer`);
    }
  });

  test("condition on an undeclared register", () => {
    const { builder } = circuitWith(1);
    builder.gate("x", [0], [], condition(classicalRegister("ghost", 1), "==", 1));

    const error = catchExportError(() => dumps(builder.build()));
    expect(error).toBeInstanceOf(MalformedInputError);
    expect(error.detail).toBe("classical register 'ghost' is not declared");
    expect(error.location).toBe("circuit.data[0] (x)");
  });

  test("qubit from an undeclared register", () => {
    const stray = quantumRegister("r", 1);
    const { builder } = circuitWith(1);
    builder.append(gate("h"), [at(stray.bits, 0)]);

    expect(catchExportError(() => dumps(builder.build())).detail).toBe("quantum register 'r' is not declared");
  });

  test("classical bit without a register", () => {
    const { builder } = circuitWith(1);
    builder.append(MEASURE, [0], [{ kind: "clbit", register: null, index: 0 }]);

    expect(catchExportError(() => dumps(builder.build())).detail).toBe(
      "classical bit 0 does not belong to a register"
    );
  });

  test("non-finite parameter", () => {
    const { builder } = circuitWith(1);
    builder.gate("rz", [0], [div(1, 0)]);

    const error = catchExportError(() => dumps(builder.build()));
    expect(error).toBeInstanceOf(MalformedInputError);
    expect(error.detail).toBe("parameter value Infinity is not finite");
  });

  test("physical qubit inside a definition", () => {
    const inner = new CircuitBuilder("phys")
      .addRegister(quantumRegister("q", 1))
      .append(gate("h"), [physicalQubit(0)])
      .toGate();
    const { builder } = circuitWith(1);
    builder.append(inner, [0]);

    const error = catchExportError(() => dumps(builder.build()));
    expect(error).toBeInstanceOf(MalformedInputError);
    expect(error.location).toBe("circuit.data[0] > phys.data[0] (h)");
  });

  test("placement with fewer parameters than its definition", () => {
    const rot = new CircuitBuilder("rot")
      .addRegister(quantumRegister("q", 1))
      .gate("rx", [0], [parameter("a")])
      .toGate("rot", []);
    const { builder } = circuitWith(1);
    builder.append(rot, [0]);

    const error = catchExportError(() => dumps(builder.build()));
    expect(error).toBeInstanceOf(MalformedInputError);
    expect(error.detail).toBe("gate 'rot' is placed with 0 parameter(s) but its definition takes 1");
    expect(error.location).toBe("circuit.data[0] (rot)");
  });

  test("placement on the wrong number of qubits", () => {
    const pair = new CircuitBuilder("pair").addRegister(quantumRegister("q", 2)).gate("cx", [0, 1]).toGate();
    const { builder } = circuitWith(2);
    builder.append(pair, [0, 1]).append(pair, [1]);

    const error = catchExportError(() => dumps(builder.build()));
    expect(error).toBeInstanceOf(MalformedInputError);
    expect(error.detail).toBe("gate 'pair' acts on 2 qubit(s) but is placed on 1");
    expect(error.location).toBe("circuit.data[1] (pair)");
  });

  test("opaque gate placed on a different number of qubits than first declared", () => {
    const pulse = gate("pulse");
    const { builder } = circuitWith(2);
    builder.append(pulse, [0, 1]).append(pulse, [0]);

    const error = catchExportError(() => dumps(builder.build()));
    expect(error).toBeInstanceOf(MalformedInputError);
    expect(error.detail).toBe("gate 'pulse' acts on 2 qubit(s) but is placed on 1");
    expect(error.location).toBe("circuit.data[1] (pulse)");
  });

  test("parameter missing from the circuit's parameter list", () => {
    const stray = parameter("stray");
    const circuit = {
      name: "circuit",
      qregs: [quantumRegister("q", 1)],
      cregs: [],
      parameters: [],
      data: [{ operation: gate("rz", [stray]), qubits: [], clbits: [], condition: null }],
    };

    const error = catchExportError(() => dumps(circuit));
    expect(error).toBeInstanceOf(MalformedInputError);
    expect(error.detail).toBe("parameter 'stray' is not declared in 'circuit'");
    expect(error.location).toBe("circuit.data[0] (rz)");
  });

  test("definition that contains itself", () => {
    const q = quantumRegister("q", 1);
    const body: Instruction[] = [];
    const definition: Definition = { name: "loop", qregs: [q], cregs: [], parameters: [], body };
    const loop = gate("loop", [], definition);
    body.push({ operation: loop, qubits: [at(q.bits, 0)], clbits: [], condition: null });

    const { builder } = circuitWith(1);
    builder.append(loop, [0]);

    const error = catchExportError(() => dumps(builder.build()));
    expect(error).toBeInstanceOf(MalformedInputError);
    expect(error.detail).toBe("gate 'loop' contains itself");
    expect(error.location).toBe("circuit.data[0] > loop.data[0] (loop)");
  });
});

describe("exporter errors: locations", () => {
  test("nested paths name every enclosing placement", () => {
    const inner = new CircuitBuilder("comp")
      .addRegister(quantumRegister("q", 2))
      .addRegister(classicalRegister("c", 1))
      .gate("h", [0]);
    inner.append(MEASURE, [0, 1], [0]);

    const { builder } = circuitWith(2);
    builder.append(BARRIER, [0, 1]).append(inner.toSubroutine(), [0, 1]);

    const error = catchExportError(() => dumps(builder.build()));
    expect(error.location).toBe("circuit.data[1] > comp.data[1] (measure)");
  });

  test("failed dump writes nothing", () => {
    const { builder } = circuitWith(2, 2);
    builder.gate("h", [0]).append(MEASURE, [0, 1], [0, 1]);
    const chunks: string[] = [];

    expect(() => dump(builder.build(), { write: (chunk) => chunks.push(chunk) })).toThrow(
      UnsupportedConstructError
    );
    expect(chunks).toEqual([]);
  });
});
