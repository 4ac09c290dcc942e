export type { BaseNode } from "./base.ts";

export type {
  BinaryExpr,
  BinaryOperator,
  Expression,
  Identifier,
  IndexedIdentifier,
  IntegerLiteral,
  RealLiteral,
  UnaryExpr,
} from "./expressions.ts";

export type {
  BitDeclaration,
  Declaration,
  InputDeclaration,
  QubitDeclaration,
} from "./declarations.ts";

export type {
  CalibrationDefinition,
  Definition,
  GateDefinition,
  QuantumArgument,
  SubroutineDefinition,
} from "./definitions.ts";

export type {
  Barrier,
  Branching,
  GateCall,
  Measurement,
  MeasurementAssignment,
  ProgramBlock,
  QuantumStatement,
  ReturnStatement,
  SubroutineCall,
} from "./statements.ts";

export type { GlobalStatement, Header, Include, Program, Version } from "./program.ts";
