import { describe, expect, test } from "vitest";
import { add, div, evaluate, freeParameters, isParameter, mul, neg, parameter, sub } from "../../src/circuit/parameters.ts";

describe("parameters", () => {
  test("parameters with the same name are distinct", () => {
    const a = parameter("t");
    const b = parameter("t");
    expect(a).not.toBe(b);
    expect(freeParameters([a, b, a])).toEqual([a, b]);
    expect(freeParameters([a, b, a])[1]).toBe(b);
  });

  test("freeParameters walks expression trees in order", () => {
    const x = parameter("x");
    const y = parameter("y");
    expect(freeParameters([1, mul(neg(y), add(x, y))])).toEqual([y, x]);
    expect(freeParameters([2, 3])).toEqual([]);
  });

  test("evaluate folds constant trees", () => {
    expect(evaluate(4)).toBe(4);
    expect(evaluate(add(1, mul(2, 3)))).toBe(7);
    expect(evaluate(sub(1, div(1, 4)))).toBe(0.75);
    expect(evaluate(neg(2))).toBe(-2);
  });

  test("evaluate is null when a parameter is involved", () => {
    expect(evaluate(add(1, parameter("x")))).toBeNull();
    expect(evaluate(neg(parameter("x")))).toBeNull();
  });

  test("isParameter", () => {
    expect(isParameter(parameter("x"))).toBe(true);
    expect(isParameter(1)).toBe(false);
    expect(isParameter(neg(1))).toBe(false);
  });
});
