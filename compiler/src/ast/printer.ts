/**
 * OpenQASM 3 text printer.
 *
 * A structural fold over the AST: composite nodes yield their children's
 * fragments in order, leaf nodes yield their own text including the `;\n`
 * terminator. Fragments are not necessarily whole lines: a branch yields
 * `if (c == 1)` followed by its block's `{\n`.
 */

import type {
  BinaryOperator,
  Branching,
  CalibrationDefinition,
  Declaration,
  Definition,
  Expression,
  GateDefinition,
  GlobalStatement,
  Header,
  Identifier,
  IndexedIdentifier,
  ProgramBlock,
  Program,
  QuantumArgument,
  QuantumStatement,
  SubroutineDefinition,
} from "./nodes.ts";

/** Anything with a `write(chunk)` method: `process.stdout`, an fs write stream, a test buffer. */
export interface TextSink {
  write(chunk: string): unknown;
}

export function printProgram(program: Program): string {
  let text = "";
  for (const fragment of emitProgram(program)) {
    text += fragment;
  }
  return text;
}

/** Stream the program into `sink` fragment by fragment. */
export function writeProgram(program: Program, sink: TextSink): void {
  for (const fragment of emitProgram(program)) {
    sink.write(fragment);
  }
}

export function* emitProgram(program: Program): Generator<string> {
  yield* emitHeader(program.header);
  for (const statement of program.statements) {
    yield* emitGlobalStatement(statement);
  }
}

function* emitHeader(header: Header): Generator<string> {
  yield `OPENQASM ${header.version.number};\n`;
  for (const include of header.includes) {
    yield `include ${include.filename};\n`;
  }
}

function* emitGlobalStatement(statement: GlobalStatement): Generator<string> {
  switch (statement.kind) {
    case "BitDeclaration":
    case "QubitDeclaration":
    case "InputDeclaration":
      yield printDeclaration(statement);
      return;
    case "GateDefinition":
    case "SubroutineDefinition":
    case "CalibrationDefinition":
      yield* emitDefinition(statement);
      return;
    default:
      yield* emitStatement(statement);
  }
}

// ─── Declarations ────────────────────────────────────────────────────────────

function printDeclaration(decl: Declaration): string {
  switch (decl.kind) {
    case "BitDeclaration":
      return `bit[${decl.designator.value}] ${decl.identifier.name};\n`;
    case "QubitDeclaration":
      return `qubit[${decl.designator.value}] ${decl.identifier.name};\n`;
    case "InputDeclaration":
      return `input float[${decl.width}] ${decl.identifier.name};\n`;
  }
}

// ─── Definitions ─────────────────────────────────────────────────────────────

function* emitDefinition(def: Definition): Generator<string> {
  switch (def.kind) {
    case "GateDefinition":
      yield* emitGateDefinition(def);
      return;
    case "SubroutineDefinition":
      yield* emitSubroutineDefinition(def);
      return;
    case "CalibrationDefinition":
      yield printCalibrationDefinition(def);
      return;
  }
}

function* emitGateDefinition(def: GateDefinition): Generator<string> {
  const signature = joinWords([callee(def.name, def.params), identifierList(def.qubits)]);
  yield `gate ${signature} {\n`;
  for (const statement of def.body) {
    yield* emitStatement(statement);
  }
  yield "}\n";
}

function* emitSubroutineDefinition(def: SubroutineDefinition): Generator<string> {
  const args = def.arguments.map(printQuantumArgument).join(", ");
  yield `def ${joinWords([callee(def.name, def.params), args])} {\n`;
  for (const statement of def.body) {
    yield* emitStatement(statement);
  }
  yield "return;\n";
  yield "}\n";
}

function printCalibrationDefinition(def: CalibrationDefinition): string {
  return `opaque ${joinWords([callee(def.name, def.params), identifierList(def.qubits)])};\n`;
}

function printQuantumArgument(arg: QuantumArgument): string {
  if (arg.designator) return `qubit[${arg.designator.value}] ${arg.identifier.name}`;
  return `qubit ${arg.identifier.name}`;
}

// ─── Statements ──────────────────────────────────────────────────────────────

function* emitStatement(statement: QuantumStatement): Generator<string> {
  switch (statement.kind) {
    case "GateCall":
    case "SubroutineCall": {
      const operands = statement.qubits.map(printExpression).join(", ");
      yield `${joinWords([callee(statement.name, statement.params), operands])};\n`;
      return;
    }
    case "Barrier": {
      const operands = statement.qubits.map(printExpression).join(", ");
      yield `${joinWords(["barrier", operands])};\n`;
      return;
    }
    case "MeasurementAssignment": {
      const source = statement.measurement.qubits.map(printExpression).join(", ");
      yield `${printExpression(statement.target)} = measure ${source};\n`;
      return;
    }
    case "Branching":
      yield* emitBranching(statement);
      return;
  }
}

function* emitBranching(branch: Branching): Generator<string> {
  yield `if (${printExpression(branch.condition)})`;
  yield* emitProgramBlock(branch.thenBlock);
}

function* emitProgramBlock(block: ProgramBlock): Generator<string> {
  yield "{\n";
  for (const statement of block.statements) {
    yield* emitStatement(statement);
  }
  yield "}\n";
}

// ─── Expressions ─────────────────────────────────────────────────────────────

const UNARY_PRECEDENCE = 4;
const ATOM_PRECEDENCE = 5;

const BINARY_PRECEDENCE: Readonly<Record<BinaryOperator, number>> = {
  "==": 1,
  "+": 2,
  "-": 2,
  "*": 3,
  "/": 3,
};

function precedence(expr: Expression): number {
  if (expr.kind === "BinaryExpr") return BINARY_PRECEDENCE[expr.operator];
  if (expr.kind === "UnaryExpr") return UNARY_PRECEDENCE;
  return ATOM_PRECEDENCE;
}

export function printExpression(expr: Expression): string {
  switch (expr.kind) {
    case "Identifier":
      return expr.name;
    case "IndexedIdentifier":
      return printIndexedIdentifier(expr);
    case "IntegerLiteral":
      return String(expr.value);
    case "RealLiteral":
      return String(expr.value);
    case "UnaryExpr": {
      const operand = printExpression(expr.operand);
      return precedence(expr.operand) < UNARY_PRECEDENCE || expr.operand.kind === "UnaryExpr"
        ? `${expr.operator}(${operand})`
        : `${expr.operator}${operand}`;
    }
    case "BinaryExpr": {
      const own = precedence(expr);
      const leftText = printExpression(expr.left);
      const rightText = printExpression(expr.right);
      const left = precedence(expr.left) < own ? `(${leftText})` : leftText;
      const rightPrecedence = precedence(expr.right);
      const wrapRight =
        rightPrecedence < own ||
        (rightPrecedence === own && (expr.operator === "-" || expr.operator === "/")) ||
        (expr.right.kind === "UnaryExpr" && expr.operator !== "==");
      const right = wrapRight ? `(${rightText})` : rightText;
      if (expr.operator === "*" || expr.operator === "/") {
        return `${left}${expr.operator}${right}`;
      }
      return `${left} ${expr.operator} ${right}`;
    }
  }
}

function printIndexedIdentifier(expr: IndexedIdentifier): string {
  if (expr.indices.length === 0) return expr.identifier.name;
  return `${expr.identifier.name}[${expr.indices.map((i) => i.value).join(", ")}]`;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** `name` or `name(p0, p1)`. */
function callee(name: Identifier, params: readonly Expression[]): string {
  if (params.length === 0) return name.name;
  return `${name.name}(${params.map(printExpression).join(", ")})`;
}

function identifierList(ids: readonly Identifier[]): string {
  return ids.map((id) => id.name).join(", ");
}

/** Space-join, dropping empty pieces (a zero-qubit call has no operand list). */
function joinWords(words: readonly string[]): string {
  return words.filter((w) => w.length > 0).join(" ");
}
