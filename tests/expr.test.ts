import { describe, expect, it } from "vitest";
import { InputError } from "../src/errors.js";
import { degreeIn, parseExpr, printExpr, renameSymbols, substitute, sym, symbols } from "../src/expr.js";

const print = (text: string): string => printExpr(parseExpr(text));

describe("parseExpr", () => {
  it("binds multiplication tighter than addition", () => {
    expect(parseExpr("a + b * c")).toEqual({
      kind: "binary",
      op: "+",
      left: sym("a"),
      right: { kind: "binary", op: "*", left: sym("b"), right: sym("c") },
    });
  });

  it("reads numbers with exponents and function calls", () => {
    expect(parseExpr("exp(-t / 1.5e2)")).toEqual({
      kind: "call",
      fn: "exp",
      args: [{ kind: "binary", op: "/", left: { kind: "unary", op: "-", arg: sym("t") }, right: { kind: "num", value: 150 } }],
    });
  });

  it("accepts ** and single-character boolean operators", () => {
    expect(print("a ** 2")).toBe("a ^ 2");
    expect(print("x & y | z")).toBe("x && y || z");
  });

  it("rejects malformed input", () => {
    expect(() => parseExpr("")).toThrow(InputError);
    expect(() => parseExpr("a +")).toThrow("unexpected end of expression");
    expect(() => parseExpr("a b")).toThrow("unexpected 'b'");
    expect(() => parseExpr("a $ b")).toThrow("unexpected character '$'");
    expect(() => parseExpr("f(a")).toThrow("expected ')'");
  });
});

describe("printExpr", () => {
  it("keeps only the parentheses precedence needs", () => {
    expect(print("(a + b) * c")).toBe("(a + b) * c");
    expect(print("a + (b + c)")).toBe("a + b + c");
    expect(print("a - (b - c)")).toBe("a - (b - c)");
    expect(print("-(a + b)")).toBe("-(a + b)");
    expect(print("2 ^ 3 ^ 2")).toBe("2 ^ 3 ^ 2");
    expect(print("(2 ^ 3) ^ 2")).toBe("(2 ^ 3) ^ 2");
    expect(print("v > v_thresh && !(u < 0)")).toBe("v > v_thresh && !(u < 0)");
  });
});

describe("symbols and substitution", () => {
  it("lists free symbols but not function names", () => {
    expect([...symbols(parseExpr("f(a, b) + a * c"))]).toEqual(["a", "b", "c"]);
  });

  it("substitutes symbols by expressions", () => {
    const e = substitute(parseExpr("x * y"), new Map([["x", parseExpr("a + b")]]));
    expect(printExpr(e)).toBe("(a + b) * y");
  });

  it("renames symbols", () => {
    expect(printExpr(renameSymbols(parseExpr("g * (E - v)"), (s) => `${s}__cell`))).toBe("g__cell * (E__cell - v__cell)");
  });
});

describe("degreeIn", () => {
  const states = new Set(["a", "b"]);
  const degree = (text: string): number => degreeIn(parseExpr(text), states);

  it("counts polynomial degree in the given variables", () => {
    expect(degree("3 * tau")).toBe(0);
    expect(degree("-a / tau")).toBe(1);
    expect(degree("a + weight")).toBe(1);
    expect(degree("a * b")).toBe(2);
    expect(degree("a ^ 2")).toBe(2);
    expect(degree("exp(-t / tau) * a")).toBe(1);
  });

  it("reports non-polynomial terms as infinite", () => {
    expect(degree("tau / a")).toBe(Infinity);
    expect(degree("exp(a)")).toBe(Infinity);
    expect(degree("a ^ 0.5")).toBe(Infinity);
    expect(degree("a > 1")).toBe(Infinity);
  });
});
