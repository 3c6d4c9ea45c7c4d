// src/core/arith.ts
// Tokenizer and evaluator for the arithmetic text embedded in recurrences
// (index expressions, compound coefficients, constraint operands)

import { DslSyntaxError, EvaluationError } from "./errors";

// ─────────────────────────────────────────────────────────────────
// Tokens
// ─────────────────────────────────────────────────────────────────

export type ArithOp = "+" | "-" | "*" | "/" | "(" | ")" | ",";

export type ArithToken =
  | { tag: "Num"; value: number }
  | { tag: "Ident"; name: string }
  | { tag: "Op"; op: ArithOp };

type MathFn = { arity: number; fn: (...args: number[]) => number };

const MATH_FUNCTIONS: ReadonlyMap<string, MathFn> = new Map<string, MathFn>([
  ["exp", { arity: 1, fn: Math.exp }],
  ["sqrt", { arity: 1, fn: Math.sqrt }],
  ["log", { arity: 1, fn: Math.log }],
  ["sin", { arity: 1, fn: Math.sin }],
  ["cos", { arity: 1, fn: Math.cos }],
  ["abs", { arity: 1, fn: Math.abs }],
  ["pow", { arity: 2, fn: Math.pow }],
]);

/** Function names that are never reported as unknown identifiers. */
export const KNOWN_FUNCTIONS: ReadonlySet<string> = new Set(MATH_FUNCTIONS.keys());

const NUMBER_RE = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*/;
const IDENT_TOKEN_RE = /(?<![\w.])[A-Za-z_]\w*/g;
const NUMBER_LITERAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function tokenizeArith(text: string): ArithToken[] {
  const tokens: ArithToken[] = [];
  let rest = text;

  while (rest.length > 0) {
    const ws = rest.match(/^\s+/);
    if (ws) {
      rest = rest.slice(ws[0].length);
      continue;
    }
    const num = rest.match(NUMBER_RE);
    if (num) {
      tokens.push({ tag: "Num", value: Number(num[0]) });
      rest = rest.slice(num[0].length);
      continue;
    }
    const ident = rest.match(IDENT_RE);
    if (ident) {
      tokens.push({ tag: "Ident", name: ident[0] });
      rest = rest.slice(ident[0].length);
      continue;
    }
    const ch = rest[0];
    if (ch === "+" || ch === "-" || ch === "*" || ch === "/" || ch === "(" || ch === ")" || ch === ",") {
      tokens.push({ tag: "Op", op: ch });
      rest = rest.slice(1);
      continue;
    }
    throw new DslSyntaxError("E0005", text);
  }

  return tokens;
}

// ─────────────────────────────────────────────────────────────────
// Text helpers
// ─────────────────────────────────────────────────────────────────

/**
 * Identifier tokens of `text` in first-occurrence order. Digits-led runs such
 * as the exponent in `1e5` are not identifiers.
 */
export function identifiersIn(text: string): string[] {
  const seen = new Set<string>();
  for (const m of text.matchAll(IDENT_TOKEN_RE)) {
    seen.add(m[0]);
  }
  return Array.from(seen);
}

export function mentions(text: string, name: string): boolean {
  return identifiersIn(text).includes(name);
}

/** Replace whole identifier tokens; other text is left untouched. */
export function substituteIdentifiers(text: string, replacements: ReadonlyMap<string, string>): string {
  return text.replace(IDENT_TOKEN_RE, (name) => replacements.get(name) ?? name);
}

export function isNumberLiteral(text: string): boolean {
  return NUMBER_LITERAL_RE.test(text.trim());
}

export function isIdentifier(text: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(text);
}

// ─────────────────────────────────────────────────────────────────
// Evaluation
// ─────────────────────────────────────────────────────────────────

/**
 * Evaluate arithmetic text against numeric bindings.
 *
 * Grammar: expr := term (('+'|'-') term)*, term := unary (('*'|'/') unary)*,
 * unary := '-' unary | primary, primary := NUMBER | IDENT | IDENT '(' args ')' | '(' expr ')'.
 * Division is floating point.
 */
export function evaluateArith(text: string, env: ReadonlyMap<string, number>): number {
  const tokens = tokenizeArith(text);
  let pos = 0;

  function peekOp(): ArithOp | undefined {
    const tok = tokens[pos];
    return tok !== undefined && tok.tag === "Op" ? tok.op : undefined;
  }

  function expectOp(op: ArithOp): void {
    if (peekOp() !== op) {
      throw new DslSyntaxError("E0005", text);
    }
    pos++;
  }

  function parseExpr(): number {
    let value = parseTerm();
    for (let op = peekOp(); op === "+" || op === "-"; op = peekOp()) {
      pos++;
      const rhs = parseTerm();
      value = op === "+" ? value + rhs : value - rhs;
    }
    return value;
  }

  function parseTerm(): number {
    let value = parseUnary();
    for (let op = peekOp(); op === "*" || op === "/"; op = peekOp()) {
      pos++;
      const rhs = parseUnary();
      value = op === "*" ? value * rhs : value / rhs;
    }
    return value;
  }

  function parseUnary(): number {
    const op = peekOp();
    if (op === "-") {
      pos++;
      return -parseUnary();
    }
    if (op === "+") {
      pos++;
      return parseUnary();
    }
    return parsePrimary();
  }

  function parsePrimary(): number {
    const tok = tokens[pos];
    if (tok === undefined) {
      throw new DslSyntaxError("E0005", text);
    }
    switch (tok.tag) {
      case "Num":
        pos++;
        return tok.value;
      case "Ident": {
        pos++;
        if (peekOp() === "(") {
          return callFunction(tok.name);
        }
        const bound = env.get(tok.name);
        if (bound === undefined) {
          throw new EvaluationError(`unbound identifier ${tok.name} in ${JSON.stringify(text)}`);
        }
        return bound;
      }
      case "Op": {
        if (tok.op !== "(") {
          throw new DslSyntaxError("E0005", text);
        }
        pos++;
        const inner = parseExpr();
        expectOp(")");
        return inner;
      }
    }
  }

  function callFunction(name: string): number {
    const def = MATH_FUNCTIONS.get(name);
    if (!def) {
      throw new EvaluationError(`unknown function ${name} in ${JSON.stringify(text)}`);
    }
    expectOp("(");
    const args: number[] = [parseExpr()];
    while (peekOp() === ",") {
      pos++;
      args.push(parseExpr());
    }
    expectOp(")");
    if (args.length !== def.arity) {
      throw new EvaluationError(`${name} expects ${def.arity} argument(s) in ${JSON.stringify(text)}`);
    }
    return def.fn(...args);
  }

  const result = parseExpr();
  if (pos !== tokens.length) {
    throw new DslSyntaxError("E0005", text);
  }
  return result;
}

/** Evaluate and require an integer result (index arithmetic). */
export function evaluateIndex(text: string, env: ReadonlyMap<string, number>): number {
  const value = evaluateArith(text, env);
  if (!Number.isInteger(value)) {
    throw new EvaluationError(`index expression ${JSON.stringify(text)} is not an integer (${value})`);
  }
  return value;
}
