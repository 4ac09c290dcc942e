import { describe, expect, test } from "vitest";
import { loadCircuitDocument, parseCircuitDocument } from "../../src/circuit/document.ts";
import { DocumentError, ExportError, MalformedInputError } from "../../src/errors/index.ts";
import { dumps } from "../../src/exporter/exporter.ts";

const HEADER = "OPENQASM 3;\ninclude stdgates.inc;\n";

function loadError(input: unknown): ExportError {
  try {
    loadCircuitDocument(input);
  } catch (error) {
    if (error instanceof ExportError) return error;
    throw error;
  }
  throw new Error("expected the document to be rejected");
}

describe("circuit documents: loading", () => {
  test("bell pair", () => {
    const circuit = loadCircuitDocument({
      name: "bell",
      qregs: [{ name: "q", size: 2 }],
      cregs: [{ name: "c", size: 2 }],
      instructions: [
        { op: "h", qubits: ["q[0]"] },
        { op: "cx", qubits: ["q[0]", "q[1]"] },
        { op: "measure", qubits: ["q[0]"], clbits: ["c[0]"] },
        { op: "measure", qubits: ["q[1]"], clbits: ["c[1]"] },
      ],
    });

    expect(circuit.name).toBe("bell");
    expect(dumps(circuit)).toBe(
      HEADER +
        "bit[2] c;\nqubit[2] q;\nh q[0];\ncx q[0], q[1];\nc[0] = measure q[0];\nc[1] = measure q[1];\n"
    );
  });

  test("defaults for omitted fields", () => {
    const circuit = loadCircuitDocument({});
    expect(circuit.name).toBe("circuit");
    expect(circuit.data).toEqual([]);
    expect(dumps(circuit)).toBe(HEADER);
  });

  test("a definition placed twice is one operation", () => {
    const circuit = loadCircuitDocument({
      qregs: [{ name: "q", size: 2 }],
      definitions: {
        entangle: {
          kind: "subroutine",
          qregs: [{ name: "q", size: 2 }],
          body: [
            { op: "h", qubits: ["q[0]"] },
            { op: "cx", qubits: ["q[0]", "q[1]"] },
          ],
        },
      },
      instructions: [
        { op: "entangle", qubits: ["q[0]", "q[1]"] },
        { op: "entangle", qubits: ["q[1]", "q[0]"] },
      ],
    });

    expect(circuit.data[0]?.operation).toBe(circuit.data[1]?.operation);
    expect(dumps(circuit)).toBe(
      HEADER +
        "def entangle qubit q_0, qubit q_1 {\nh q_0;\ncx q_0, q_1;\nreturn;\n}\n" +
        "qubit[2] q;\nentangle q[0], q[1];\nentangle q[1], q[0];\n"
    );
  });

  test("parameters, pi and expressions", () => {
    const circuit = loadCircuitDocument({
      qregs: [{ name: "q", size: 1 }],
      parameters: ["theta"],
      instructions: [
        { op: "rz", params: [{ op: "/", left: "pi", right: 2 }], qubits: ["q[0]"] },
        { op: "rx", params: [{ op: "+", left: "theta", right: { neg: 1 } }], qubits: ["q[0]"] },
      ],
    });

    expect(dumps(circuit)).toBe(
      HEADER + "input float[32] theta;\nqubit[1] q;\nrz(pi/2) q[0];\nrx(theta + (-1)) q[0];\n"
    );
  });

  test("conditions on registers and bits", () => {
    const circuit = loadCircuitDocument({
      qregs: [{ name: "q", size: 1 }],
      cregs: [{ name: "c", size: 2 }],
      instructions: [
        { op: "x", qubits: ["q[0]"], condition: { target: "c", value: 3 } },
        { op: "z", qubits: ["q[0]"], condition: { target: "c[1]", value: 1 } },
      ],
    });

    expect(dumps(circuit)).toBe(
      HEADER + "bit[2] c;\nqubit[1] q;\nif (c == 3){\nx q[0];\n}\nif (c[1] == 1){\nz q[0];\n}\n"
    );
  });

  test("physical qubits", () => {
    const circuit = loadCircuitDocument({ instructions: [{ op: "h", qubits: ["$2"] }] });
    expect(dumps(circuit)).toBe(HEADER + "h $2;\n");
  });

  test("definition parameters are local to the definition", () => {
    const circuit = loadCircuitDocument({
      qregs: [{ name: "q", size: 1 }],
      definitions: {
        turn: {
          qregs: [{ name: "r", size: 1 }],
          parameters: ["a"],
          body: [{ op: "rz", params: ["a"], qubits: ["r[0]"] }],
        },
      },
      instructions: [{ op: "turn", params: [0.25], qubits: ["q[0]"] }],
    });

    expect(dumps(circuit)).toBe(HEADER + "gate turn(a) r_0 {\nrz(a) r_0;\n}\nqubit[1] q;\nturn(0.25) q[0];\n");
  });
});

describe("circuit documents: errors", () => {
  test("schema violations list every issue", () => {
    const error = loadError({ qregs: [{ name: "q", size: -1 }], instructions: [{ qubits: [] }] });
    expect(error).toBeInstanceOf(DocumentError);
    if (!(error instanceof DocumentError)) return;
    expect(error.issues.map((issue) => issue.path)).toEqual(["qregs.0.size", "instructions.0.op"]);
    expect(error.message).toBe("invalid circuit document: 2 issues");
  });

  test("malformed bit references fail validation", () => {
    const error = loadError({ qregs: [{ name: "q", size: 1 }], instructions: [{ op: "h", qubits: ["q0"] }] });
    expect(error).toBeInstanceOf(DocumentError);
  });

  test("unknown register", () => {
    const error = loadError({ qregs: [{ name: "q", size: 1 }], instructions: [{ op: "h", qubits: ["r[0]"] }] });
    expect(error).toBeInstanceOf(MalformedInputError);
    expect(error.detail).toBe("unknown quantum register 'r'");
    expect(error.location).toBe("instructions.0.qubits.0");
  });

  test("index out of range", () => {
    const error = loadError({ qregs: [{ name: "q", size: 1 }], instructions: [{ op: "h", qubits: ["q[1]"] }] });
    expect(error.detail).toBe("'q[1]' is out of range");
  });

  test("unknown parameter", () => {
    const error = loadError({
      qregs: [{ name: "q", size: 1 }],
      instructions: [{ op: "rz", params: ["phi"], qubits: ["q[0]"] }],
    });
    expect(error.detail).toBe("unknown parameter 'phi'");
    expect(error.location).toBe("instructions.0.params.0");
  });

  test("definitions that refer to themselves", () => {
    const error = loadError({
      qregs: [{ name: "q", size: 1 }],
      definitions: {
        ping: { qregs: [{ name: "q", size: 1 }], body: [{ op: "pong", qubits: ["q[0]"] }] },
        pong: { qregs: [{ name: "q", size: 1 }], body: [{ op: "ping", qubits: ["q[0]"] }] },
      },
      instructions: [{ op: "ping", qubits: ["q[0]"] }],
    });
    expect(error).toBeInstanceOf(MalformedInputError);
    expect(error.detail).toBe("definition 'ping' refers to itself");
    expect(error.location).toBe("definitions.pong.body.0");
  });

  test("duplicate register names", () => {
    const error = loadError({ qregs: [{ name: "q", size: 1 }], cregs: [{ name: "q", size: 1 }] });
    expect(error.detail).toBe("register 'q' is declared twice");
    expect(error.location).toBe("cregs.0");
  });

  test("invalid JSON text", () => {
    expect(() => parseCircuitDocument("{")).toThrow(DocumentError);
  });
});
