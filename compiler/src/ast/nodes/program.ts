import type { BaseNode } from "./base.ts";
import type { Declaration } from "./declarations.ts";
import type { Definition } from "./definitions.ts";
import type { QuantumStatement } from "./statements.ts";

/** `OPENQASM <number>;` */
export interface Version extends BaseNode {
  kind: "Version";
  number: string;
}

/** `include <filename>;` */
export interface Include extends BaseNode {
  kind: "Include";
  filename: string;
}

export interface Header extends BaseNode {
  kind: "Header";
  version: Version;
  includes: Include[];
}

/** Anything allowed at the top level after the header. */
export type GlobalStatement = Definition | Declaration | QuantumStatement;

/** Root node of an exported program. */
export interface Program extends BaseNode {
  kind: "Program";
  header: Header;
  statements: GlobalStatement[];
}
