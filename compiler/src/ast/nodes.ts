/**
 * AST node types for OpenQASM 3 output.
 * Uses discriminated unions with a `kind` field.
 *
 * The tree only models what the exporter produces; it is not a parser AST.
 * Nodes are plain data and are never mutated after the builder creates them.
 */

export * from "./nodes/index.ts";
