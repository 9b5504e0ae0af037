import { InputError } from "./errors.js";

export type BinaryOp = "+" | "-" | "*" | "/" | "^" | "<" | ">" | "<=" | ">=" | "==" | "!=" | "&&" | "||";

export type Expr =
  | { kind: "num"; value: number }
  | { kind: "sym"; name: string }
  | { kind: "unary"; op: "-" | "!"; arg: Expr }
  | { kind: "binary"; op: BinaryOp; left: Expr; right: Expr }
  | { kind: "call"; fn: string; args: Expr[] };

type Token =
  | { type: "num"; value: number; pos: number }
  | { type: "id"; value: string; pos: number }
  | { type: "op"; value: string; pos: number };

const OPERATORS = ["**", "<=", ">=", "==", "!=", "&&", "||", "+", "-", "*", "/", "^", "<", ">", "!", "&", "|", "(", ")", ","];

const BINDING: Record<BinaryOp, number> = {
  "||": 1,
  "&&": 2,
  "<": 3,
  ">": 3,
  "<=": 3,
  ">=": 3,
  "==": 3,
  "!=": 3,
  "+": 4,
  "-": 4,
  "*": 5,
  "/": 5,
  "^": 7,
};
const UNARY_BINDING = 6;

function normalizeOp(op: string): string {
  if (op === "**") return "^";
  if (op === "&") return "&&";
  if (op === "|") return "||";
  return op;
}

function isBinaryOp(op: string): op is BinaryOp {
  return op in BINDING;
}

function tokenize(text: string): Token[] {
  const out: Token[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }
    const num = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/.exec(text.slice(i));
    if (num) {
      out.push({ type: "num", value: Number(num[0]), pos: i });
      i += num[0].length;
      continue;
    }
    const id = /^[A-Za-z_][A-Za-z0-9_]*/.exec(text.slice(i));
    if (id) {
      out.push({ type: "id", value: id[0], pos: i });
      i += id[0].length;
      continue;
    }
    const op = OPERATORS.find((o) => text.startsWith(o, i));
    if (!op) throw new InputError(`unexpected character '${ch}' at ${i} in '${text}'`);
    out.push({ type: "op", value: normalizeOp(op), pos: i });
    i += op.length;
  }
  return out;
}

class Parser {
  private at = 0;

  constructor(private readonly tokens: Token[], private readonly text: string) {}

  parse(): Expr {
    const e = this.expr(0);
    const rest = this.tokens[this.at];
    if (rest) this.fail(`unexpected '${rest.value}'`, rest.pos);
    return e;
  }

  private fail(msg: string, pos: number): never {
    throw new InputError(`${msg} at ${pos} in '${this.text}'`);
  }

  private peekOp(): string | undefined {
    const t = this.tokens[this.at];
    return t?.type === "op" ? t.value : undefined;
  }

  private expect(op: string): void {
    const t = this.tokens[this.at];
    if (!t || t.type !== "op" || t.value !== op) this.fail(`expected '${op}'`, t?.pos ?? this.text.length);
    this.at += 1;
  }

  private expr(minBinding: number): Expr {
    let left = this.prefix();
    for (;;) {
      const op = this.peekOp();
      if (!op || !isBinaryOp(op)) break;
      const bp = BINDING[op];
      if (bp <= minBinding) break;
      this.at += 1;
      // ^ is right associative
      const right = this.expr(op === "^" ? bp - 1 : bp);
      left = { kind: "binary", op, left, right };
    }
    return left;
  }

  private prefix(): Expr {
    const t = this.tokens[this.at];
    if (!t) return this.fail("unexpected end of expression", this.text.length);
    this.at += 1;
    if (t.type === "num") return { kind: "num", value: t.value };
    if (t.type === "id") {
      if (this.peekOp() !== "(") return { kind: "sym", name: t.value };
      this.at += 1;
      const args: Expr[] = [];
      if (this.peekOp() !== ")") {
        args.push(this.expr(0));
        while (this.peekOp() === ",") {
          this.at += 1;
          args.push(this.expr(0));
        }
      }
      this.expect(")");
      return { kind: "call", fn: t.value, args };
    }
    if (t.value === "(") {
      const inner = this.expr(0);
      this.expect(")");
      return inner;
    }
    if (t.value === "-" || t.value === "!") {
      return { kind: "unary", op: t.value, arg: this.expr(UNARY_BINDING) };
    }
    if (t.value === "+") return this.expr(UNARY_BINDING);
    return this.fail(`unexpected '${t.value}'`, t.pos);
  }
}

export function parseExpr(text: string): Expr {
  const tokens = tokenize(text);
  if (tokens.length === 0) throw new InputError("empty expression");
  return new Parser(tokens, text).parse();
}

export function sym(name: string): Expr {
  return { kind: "sym", name };
}

export function symbols(e: Expr, into: Set<string> = new Set()): Set<string> {
  switch (e.kind) {
    case "num":
      break;
    case "sym":
      into.add(e.name);
      break;
    case "unary":
      symbols(e.arg, into);
      break;
    case "binary":
      symbols(e.left, into);
      symbols(e.right, into);
      break;
    case "call":
      for (const a of e.args) symbols(a, into);
      break;
  }
  return into;
}

export function substitute(e: Expr, map: ReadonlyMap<string, Expr>): Expr {
  switch (e.kind) {
    case "num":
      return e;
    case "sym":
      return map.get(e.name) ?? e;
    case "unary":
      return { ...e, arg: substitute(e.arg, map) };
    case "binary":
      return { ...e, left: substitute(e.left, map), right: substitute(e.right, map) };
    case "call":
      return { ...e, args: e.args.map((a) => substitute(a, map)) };
  }
}

export function renameSymbols(e: Expr, rename: (name: string) => string): Expr {
  const map = new Map<string, Expr>();
  for (const s of symbols(e)) {
    const to = rename(s);
    if (to !== s) map.set(s, sym(to));
  }
  return map.size > 0 ? substitute(e, map) : e;
}

function precedence(e: Expr): number {
  if (e.kind === "binary") return BINDING[e.op];
  if (e.kind === "unary") return UNARY_BINDING;
  return 10;
}

export function printExpr(e: Expr): string {
  switch (e.kind) {
    case "num":
      return String(e.value);
    case "sym":
      return e.name;
    case "call":
      return `${e.fn}(${e.args.map(printExpr).join(", ")})`;
    case "unary": {
      const inner = printExpr(e.arg);
      return precedence(e.arg) < UNARY_BINDING ? `${e.op}(${inner})` : `${e.op}${inner}`;
    }
    case "binary": {
      const p = BINDING[e.op];
      const rightAssoc = e.op === "^";
      const l = printExpr(e.left);
      const r = printExpr(e.right);
      const lp = precedence(e.left);
      const rp = precedence(e.right);
      const wrapL = rightAssoc ? lp <= p : lp < p;
      const wrapR = rightAssoc ? rp < p : rp <= p && !(rp === p && (e.op === "+" || e.op === "*"));
      return `${wrapL ? `(${l})` : l} ${e.op} ${wrapR ? `(${r})` : r}`;
    }
  }
}

/**
 * Polynomial degree of `e` in `vars`. Anything that is not a polynomial in
 * those variables (division by them, transcendental functions of them,
 * comparisons involving them) reports Infinity.
 */
export function degreeIn(e: Expr, vars: ReadonlySet<string>): number {
  switch (e.kind) {
    case "num":
      return 0;
    case "sym":
      return vars.has(e.name) ? 1 : 0;
    case "unary":
      return e.op === "-" ? degreeIn(e.arg, vars) : degreeIn(e.arg, vars) === 0 ? 0 : Infinity;
    case "call":
      return e.args.every((a) => degreeIn(a, vars) === 0) ? 0 : Infinity;
    case "binary": {
      const l = degreeIn(e.left, vars);
      const r = degreeIn(e.right, vars);
      switch (e.op) {
        case "+":
        case "-":
          return Math.max(l, r);
        case "*":
          return l + r;
        case "/":
          return r === 0 ? l : Infinity;
        case "^": {
          if (r !== 0) return Infinity;
          if (l === 0) return 0;
          const n = e.right.kind === "num" ? e.right.value : NaN;
          return Number.isInteger(n) && n >= 0 ? l * n : Infinity;
        }
        default:
          return l === 0 && r === 0 ? 0 : Infinity;
      }
    }
  }
}
