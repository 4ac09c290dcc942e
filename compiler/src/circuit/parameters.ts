/**
 * Symbolic parameter constructors and queries.
 */

import type {
  BinaryOperator,
  Parameter,
  ParameterExpression,
  ParameterValue,
} from "./types.ts";

// ─── Constructors ────────────────────────────────────────────────────────────

/** Create a fresh symbolic parameter. Two calls with the same name are distinct. */
export function parameter(name: string): Parameter {
  return { kind: "parameter", name };
}

function binary(operator: BinaryOperator, left: ParameterValue, right: ParameterValue): ParameterExpression {
  return { kind: "binary", operator, left, right };
}

export function add(left: ParameterValue, right: ParameterValue): ParameterExpression {
  return binary("+", left, right);
}

export function sub(left: ParameterValue, right: ParameterValue): ParameterExpression {
  return binary("-", left, right);
}

export function mul(left: ParameterValue, right: ParameterValue): ParameterExpression {
  return binary("*", left, right);
}

export function div(left: ParameterValue, right: ParameterValue): ParameterExpression {
  return binary("/", left, right);
}

export function neg(operand: ParameterValue): ParameterExpression {
  return { kind: "negate", operand };
}

// ─── Queries ─────────────────────────────────────────────────────────────────

export function isParameter(value: ParameterValue): value is Parameter {
  return typeof value !== "number" && value.kind === "parameter";
}

/**
 * Collect the symbolic parameters referenced by `values`, in first-use order,
 * each parameter object once.
 */
export function freeParameters(values: readonly ParameterValue[]): Parameter[] {
  const seen = new Set<Parameter>();
  const ordered: Parameter[] = [];
  const visit = (value: ParameterValue): void => {
    if (typeof value === "number") return;
    switch (value.kind) {
      case "parameter":
        if (!seen.has(value)) {
          seen.add(value);
          ordered.push(value);
        }
        return;
      case "binary":
        visit(value.left);
        visit(value.right);
        return;
      case "negate":
        visit(value.operand);
        return;
    }
  };
  for (const value of values) visit(value);
  return ordered;
}

/** Numeric value of `value`, or null if it depends on a free parameter. */
export function evaluate(value: ParameterValue): number | null {
  if (typeof value === "number") return value;
  switch (value.kind) {
    case "parameter":
      return null;
    case "negate": {
      const operand = evaluate(value.operand);
      return operand === null ? null : -operand;
    }
    case "binary": {
      const left = evaluate(value.left);
      const right = evaluate(value.right);
      if (left === null || right === null) return null;
      switch (value.operator) {
        case "+":
          return left + right;
        case "-":
          return left - right;
        case "*":
          return left * right;
        case "/":
          return left / right;
      }
    }
  }
}
