/**
 * JSON circuit documents.
 *
 * A document names its registers, free parameters, reusable definitions and
 * top-level instructions:
 *
 *     {
 *       "name": "bell",
 *       "qregs": [{ "name": "q", "size": 2 }],
 *       "cregs": [{ "name": "c", "size": 2 }],
 *       "instructions": [
 *         { "op": "h", "qubits": ["q[0]"] },
 *         { "op": "cx", "qubits": ["q[0]", "q[1]"] },
 *         { "op": "measure", "qubits": ["q[0]"], "clbits": ["c[0]"] }
 *       ]
 *     }
 *
 * Qubits are `reg[i]` or a physical `$n`; parameters are numbers, `"pi"`, a
 * declared parameter name, `{ "op": "*", "left": …, "right": … }` or
 * `{ "neg": … }`. An `op` naming an entry of `definitions` places that
 * definition; any other name is a body-less gate.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod/v4";
import { DocumentError, MalformedInputError } from "../errors/index.ts";
import { IdentityArena } from "../namespace/arena.ts";
import {
  BARRIER,
  CircuitBuilder,
  classicalRegister,
  condition,
  gate,
  MEASURE,
  physicalQubit,
  quantumRegister,
  subroutine,
} from "./builder.ts";
import { parameter } from "./parameters.ts";
import type {
  Circuit,
  ClassicalRegister,
  Clbit,
  Condition,
  Definition,
  GateOperation,
  Operation,
  Parameter,
  ParameterValue,
  QuantumRegister,
  Qubit,
  SubroutineOperation,
} from "./types.ts";

// ─── Schema ──────────────────────────────────────────────────────────────────

const IDENTIFIER = /^[A-Za-z_\u0080-\uffff][A-Za-z0-9_\u0080-\uffff]*$/;
const BIT_REFERENCE = /^(?:([A-Za-z_\u0080-\uffff][A-Za-z0-9_\u0080-\uffff]*)\[(\d+)\]|\$(\d+))$/;

const identifierSchema = z.string().regex(IDENTIFIER, "expected an identifier");
const bitReferenceSchema = z.string().regex(BIT_REFERENCE, "expected `reg[i]` or `$n`");

// Recursive shapes are typed by hand; z.infer cannot see through z.lazy.
export type ParameterDocument =
  | number
  | string
  | { op: "+" | "-" | "*" | "/"; left: ParameterDocument; right: ParameterDocument }
  | { neg: ParameterDocument };

export const parameterDocumentSchema: z.ZodType<ParameterDocument> = z.lazy(() =>
  z.union([
    z.number(),
    identifierSchema,
    z.object({
      op: z.enum(["+", "-", "*", "/"]),
      left: parameterDocumentSchema,
      right: parameterDocumentSchema,
    }),
    z.object({ neg: parameterDocumentSchema }),
  ])
);

const registerSchema = z.object({
  name: identifierSchema,
  size: z.number().int().nonnegative(),
});

const conditionSchema = z.object({
  /** Register name (`c`) or single bit (`c[0]`). */
  target: z.union([identifierSchema, bitReferenceSchema]),
  operator: z.enum(["==", "!=", "<", "<=", ">", ">="]).default("=="),
  value: z.number().int(),
});

const instructionSchema = z.object({
  op: identifierSchema,
  qubits: z.array(bitReferenceSchema).default([]),
  clbits: z.array(bitReferenceSchema).default([]),
  params: z.array(parameterDocumentSchema).default([]),
  condition: conditionSchema.optional(),
});

const definitionSchema = z.object({
  kind: z.enum(["gate", "subroutine"]).default("gate"),
  qregs: z.array(registerSchema).default([]),
  cregs: z.array(registerSchema).default([]),
  parameters: z.array(identifierSchema).default([]),
  body: z.array(instructionSchema).default([]),
});

export const circuitDocumentSchema = z.object({
  name: identifierSchema.default("circuit"),
  qregs: z.array(registerSchema).default([]),
  cregs: z.array(registerSchema).default([]),
  parameters: z.array(identifierSchema).default([]),
  definitions: z.record(identifierSchema, definitionSchema).default({}),
  instructions: z.array(instructionSchema).default([]),
});

export type CircuitDocument = z.infer<typeof circuitDocumentSchema>;
type InstructionDocument = z.infer<typeof instructionSchema>;
type DefinitionDocument = z.infer<typeof definitionSchema>;
type RegisterDocument = z.infer<typeof registerSchema>;

// ─── Entry points ────────────────────────────────────────────────────────────

/** Validate `input` and convert it into a circuit. */
export function loadCircuitDocument(input: unknown): Circuit {
  const parsed = circuitDocumentSchema.safeParse(input);
  if (!parsed.success) {
    throw new DocumentError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.map(String).join("."),
        message: issue.message,
      }))
    );
  }
  return new DocumentLoader(parsed.data).load();
}

/** Parse JSON text and load it. Syntax errors are reported as a document issue. */
export function parseCircuitDocument(text: string): Circuit {
  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DocumentError([{ path: "", message: `invalid JSON: ${message}` }]);
  }
  return loadCircuitDocument(input);
}

export async function readCircuitFile(path: string): Promise<Circuit> {
  return parseCircuitDocument(await readFile(path, "utf8"));
}

// ─── Loader ──────────────────────────────────────────────────────────────────

/** Registers and parameters visible from one body. */
interface DocumentScope {
  readonly qregs: ReadonlyMap<string, QuantumRegister>;
  readonly cregs: ReadonlyMap<string, ClassicalRegister>;
  readonly parameters: ReadonlyMap<string, Parameter>;
}

class DocumentLoader {
  private readonly document: CircuitDocument;
  /** Definitions already converted, by document name. */
  private readonly definitions = new Map<string, Definition>();
  /** Definitions whose bodies are being converted. */
  private readonly resolving = new Set<string>();
  /** Gate and subroutine operations shared between placements with equal parameters. */
  private readonly operations = new Map<string, GateOperation | SubroutineOperation>();
  private readonly parameterIds = new IdentityArena<Parameter>();
  private readonly physicalQubits = new Map<number, Qubit>();

  constructor(document: CircuitDocument) {
    this.document = document;
  }

  load(): Circuit {
    const doc = this.document;
    const builder = new CircuitBuilder(doc.name);
    const scope = this.createScope(builder, doc.qregs, doc.cregs, doc.parameters, "");
    this.appendAll(builder, doc.instructions, scope, "instructions");
    return builder.build();
  }

  private createScope(
    builder: CircuitBuilder,
    qregs: readonly RegisterDocument[],
    cregs: readonly RegisterDocument[],
    parameterNames: readonly string[],
    path: string
  ): DocumentScope {
    const scope = {
      qregs: new Map<string, QuantumRegister>(),
      cregs: new Map<string, ClassicalRegister>(),
      parameters: new Map<string, Parameter>(),
    };
    const prefix = path ? `${path}.` : "";
    qregs.forEach((entry, i) => {
      if (scope.qregs.has(entry.name) || scope.cregs.has(entry.name)) {
        throw new MalformedInputError(`register '${entry.name}' is declared twice`, `${prefix}qregs.${i}`);
      }
      const register = quantumRegister(entry.name, entry.size);
      scope.qregs.set(entry.name, register);
      builder.addRegister(register);
    });
    cregs.forEach((entry, i) => {
      if (scope.qregs.has(entry.name) || scope.cregs.has(entry.name)) {
        throw new MalformedInputError(`register '${entry.name}' is declared twice`, `${prefix}cregs.${i}`);
      }
      const register = classicalRegister(entry.name, entry.size);
      scope.cregs.set(entry.name, register);
      builder.addRegister(register);
    });
    const declared = parameterNames.map((name) => {
      const existing = scope.parameters.get(name);
      if (existing) return existing;
      const created = parameter(name);
      scope.parameters.set(name, created);
      return created;
    });
    builder.addParameters(...declared);
    return scope;
  }

  private appendAll(
    builder: CircuitBuilder,
    instructions: readonly InstructionDocument[],
    scope: DocumentScope,
    path: string
  ): void {
    instructions.forEach((instruction, i) => {
      const at = `${path}.${i}`;
      builder.append(
        this.resolveOperation(instruction, scope, at),
        instruction.qubits.map((ref, j) => this.resolveQubit(ref, scope, `${at}.qubits.${j}`)),
        instruction.clbits.map((ref, j) => this.resolveClbit(ref, scope, `${at}.clbits.${j}`)),
        instruction.condition ? this.resolveCondition(instruction.condition, scope, `${at}.condition`) : null
      );
    });
  }

  // ─── Operations ──────────────────────────────────────────────────────

  private resolveOperation(instruction: InstructionDocument, scope: DocumentScope, path: string): Operation {
    const name = instruction.op;
    const params = instruction.params.map((value, i) => this.resolveParameter(value, scope, `${path}.params.${i}`));

    const definitions = this.document.definitions;
    const entry = Object.hasOwn(definitions, name) ? definitions[name] : undefined;
    if (entry === undefined) {
      if (name === "measure") return MEASURE;
      if (name === "barrier") return BARRIER;
    }

    const key = `${name}(${params.map((p) => this.parameterKey(p)).join(",")})`;
    const cached = this.operations.get(key);
    if (cached) return cached;

    let operation: GateOperation | SubroutineOperation;
    if (entry === undefined) {
      operation = gate(name, params);
    } else {
      const definition = this.resolveDefinition(name, entry, path);
      operation =
        entry.kind === "gate" ? gate(name, params, definition) : subroutine(name, definition, params);
    }
    this.operations.set(key, operation);
    return operation;
  }

  private resolveDefinition(name: string, entry: DefinitionDocument, usedAt: string): Definition {
    const done = this.definitions.get(name);
    if (done) return done;
    if (this.resolving.has(name)) {
      throw new MalformedInputError(`definition '${name}' refers to itself`, usedAt);
    }
    this.resolving.add(name);
    const path = `definitions.${name}`;
    const builder = new CircuitBuilder(name);
    const scope = this.createScope(builder, entry.qregs, entry.cregs, entry.parameters, path);
    this.appendAll(builder, entry.body, scope, `${path}.body`);
    this.resolving.delete(name);

    const definition = builder.toDefinition();
    this.definitions.set(name, definition);
    return definition;
  }

  // ─── Bits ────────────────────────────────────────────────────────────

  private resolveQubit(ref: string, scope: DocumentScope, path: string): Qubit {
    const { register, index } = parseBitReference(ref);
    if (register === null) {
      let qubit = this.physicalQubits.get(index);
      if (!qubit) {
        qubit = physicalQubit(index);
        this.physicalQubits.set(index, qubit);
      }
      return qubit;
    }
    const qreg = scope.qregs.get(register);
    if (!qreg) throw new MalformedInputError(`unknown quantum register '${register}'`, path);
    return bitAt(qreg.bits, index, ref, path);
  }

  private resolveClbit(ref: string, scope: DocumentScope, path: string): Clbit {
    const { register, index } = parseBitReference(ref);
    if (register === null) {
      throw new MalformedInputError(`classical bits must be addressed through a register, got '${ref}'`, path);
    }
    const creg = scope.cregs.get(register);
    if (!creg) throw new MalformedInputError(`unknown classical register '${register}'`, path);
    return bitAt(creg.bits, index, ref, path);
  }

  private resolveCondition(
    entry: z.infer<typeof conditionSchema>,
    scope: DocumentScope,
    path: string
  ): Condition {
    if (IDENTIFIER.test(entry.target)) {
      const register = scope.cregs.get(entry.target);
      if (!register) throw new MalformedInputError(`unknown classical register '${entry.target}'`, `${path}.target`);
      return condition(register, entry.operator, entry.value);
    }
    return condition(this.resolveClbit(entry.target, scope, `${path}.target`), entry.operator, entry.value);
  }

  // ─── Parameters ──────────────────────────────────────────────────────

  private resolveParameter(value: ParameterDocument, scope: DocumentScope, path: string): ParameterValue {
    if (typeof value === "number") return value;
    if (typeof value === "string") {
      const declared = scope.parameters.get(value);
      if (declared) return declared;
      if (value === "pi") return Math.PI;
      throw new MalformedInputError(`unknown parameter '${value}'`, path);
    }
    if ("neg" in value) {
      return { kind: "negate", operand: this.resolveParameter(value.neg, scope, `${path}.neg`) };
    }
    return {
      kind: "binary",
      operator: value.op,
      left: this.resolveParameter(value.left, scope, `${path}.left`),
      right: this.resolveParameter(value.right, scope, `${path}.right`),
    };
  }

  /** Stable text for a resolved parameter; distinct Parameter objects never share a key. */
  private parameterKey(value: ParameterValue): string {
    if (typeof value === "number") return String(value);
    switch (value.kind) {
      case "parameter":
        return `%${this.parameterIds.idOf(value)}`;
      case "negate":
        return `-(${this.parameterKey(value.operand)})`;
      case "binary":
        return `(${this.parameterKey(value.left)}${value.operator}${this.parameterKey(value.right)})`;
    }
  }
}

function parseBitReference(ref: string): { register: string | null; index: number } {
  const match = BIT_REFERENCE.exec(ref);
  const [, register, registerIndex, physicalIndex] = match ?? [];
  if (register !== undefined && registerIndex !== undefined) {
    return { register, index: Number(registerIndex) };
  }
  return { register: null, index: Number(physicalIndex) };
}

function bitAt<T>(bits: readonly T[], index: number, ref: string, path: string): T {
  const bit = bits[index];
  if (bit === undefined) throw new MalformedInputError(`'${ref}' is out of range`, path);
  return bit;
}
