// src/core/dsl/parser.ts
// Index-shift DSL: `coeff * E[i-1, j, t+1] + ...` → Expression AST

import {
  binop,
  call,
  constant,
  indexExpr,
  lookup,
  scaled,
  sum,
  term,
  variable,
  type CallExpr,
  type Expr,
  type SumExpr,
  type TermExpr,
} from "../ast";
import { KNOWN_FUNCTIONS, identifiersIn, isIdentifier, isNumberLiteral, tokenizeArith } from "../arith";
import { DslSyntaxError, type SyntaxCode } from "../errors";
import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";

export type ParseContext = {
  /** Recurrence being defined (also accepted as the self accessor). */
  name: string;
  indices: readonly string[];
  runtimeVars: readonly string[];
  arrayVars?: readonly string[];
  /** Accessor used for self calls, `E` by convention. */
  selfName: string;
  ruleIndex?: number;
};

export type ParseOutput<T extends Expr = Expr> = {
  expr: T;
  diagnostics: Diagnostic[];
};

type ParseState = {
  ctx: ParseContext;
  diagnostics: Diagnostic[];
};

// ─────────────────────────────────────────────────────────────────
// Public entry points
// ─────────────────────────────────────────────────────────────────

/** Parse a rule body into a Sum of Terms. */
export function parseRuleBody(text: string, ctx: ParseContext): ParseOutput<SumExpr> {
  const state: ParseState = { ctx, diagnostics: [] };
  return { expr: parseSum(text, state), diagnostics: state.diagnostics };
}

/**
 * Parse a rule body with an optional scale string. `1/<expr>` divides, any
 * other scale multiplies.
 */
export function parseRule(text: string, scale: string | undefined, ctx: ParseContext): ParseOutput {
  const state: ParseState = { ctx, diagnostics: [] };
  const body = parseSum(text, state);
  if (scale === undefined) {
    return { expr: body, diagnostics: state.diagnostics };
  }
  const { factor, isDivision } = parseScaleText(scale, state);
  return { expr: scaled(body, factor, isDivision), diagnostics: state.diagnostics };
}

export function parseScale(text: string, ctx: ParseContext): ParseOutput & { isDivision: boolean } {
  const state: ParseState = { ctx, diagnostics: [] };
  const { factor, isDivision } = parseScaleText(text, state);
  return { expr: factor, isDivision, diagnostics: state.diagnostics };
}

export function parseCoefficient(text: string, ctx: ParseContext): ParseOutput {
  const state: ParseState = { ctx, diagnostics: [] };
  return { expr: parseCoeff(text, state), diagnostics: state.diagnostics };
}

/**
 * Base-case value: a number, a runtime variable, a table lookup such as
 * `Boys[N]`, or verbatim runtime arithmetic.
 */
export function parseValue(value: number | string, ctx: ParseContext): ParseOutput {
  const state: ParseState = { ctx, diagnostics: [] };
  if (typeof value === "number") {
    return { expr: constant(value), diagnostics: [] };
  }
  const text = value.trim();
  if (!text) fail("E0001", value, state);
  if (isNumberLiteral(text)) {
    return { expr: constant(Number(text)), diagnostics: [] };
  }
  if (ctx.runtimeVars.includes(text)) {
    return { expr: variable(text), diagnostics: [] };
  }
  const table = text.match(/^([A-Za-z_]\w*)\s*\[(.+)\]$/);
  if (table && ctx.arrayVars?.includes(table[1])) {
    const index = table[2].trim();
    checkIdentifiers(index, state);
    return { expr: lookup(table[1], index), diagnostics: state.diagnostics };
  }
  return { expr: parseCoeff(text, state), diagnostics: state.diagnostics };
}

// ─────────────────────────────────────────────────────────────────
// Splitting
// ─────────────────────────────────────────────────────────────────

type Piece = { text: string; negated: boolean };

function fail(code: SyntaxCode, fragment: string, state: ParseState): never {
  throw new DslSyntaxError(code, fragment, state.ctx.name, state.ctx.ruleIndex);
}

/** Bracket depth check over `()` and `[]`. */
function checkBalanced(text: string, state: ParseState): void {
  const stack: string[] = [];
  for (const ch of text) {
    if (ch === "(" || ch === "[") stack.push(ch);
    if (ch === ")" || ch === "]") {
      const open = stack.pop();
      if (open === undefined || (open === "(") !== (ch === ")")) fail("E0002", text, state);
    }
  }
  if (stack.length > 0) fail("E0002", text, state);
}

/**
 * Split on top-level `+` and binary `-`. A `-` is binary when it follows an
 * operand; the exponent sign of a number literal is not a split point.
 */
function splitTerms(text: string): Piece[] {
  const pieces: Piece[] = [];
  let depth = 0;
  let start = 0;
  let negated = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "(" || ch === "[") depth++;
    else if (ch === ")" || ch === "]") depth--;
    else if (depth === 0 && (ch === "+" || ch === "-")) {
      const before = text.slice(0, i).trimEnd();
      const last = before[before.length - 1];
      const binary = last !== undefined && !"+-*/(,".includes(last);
      const exponent = /(?:^|[^\w.])\d+(?:\.\d*)?[eE]$/.test(text.slice(0, i));
      if (binary && !exponent) {
        pieces.push({ text: text.slice(start, i).trim(), negated });
        negated = ch === "-";
        start = i + 1;
      }
    }
  }
  pieces.push({ text: text.slice(start).trim(), negated });
  return pieces;
}

/** Split on a top-level separator character. */
function splitTopLevel(text: string, sep: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "(" || ch === "[") depth++;
    else if (ch === ")" || ch === "]") depth--;
    else if (depth === 0 && ch === sep) {
      parts.push(text.slice(start, i).trim());
      start = i + 1;
    }
  }
  parts.push(text.slice(start).trim());
  return parts;
}

/** True when one pair of parentheses encloses the whole text. */
function isWrapped(text: string): boolean {
  if (!text.startsWith("(") || !text.endsWith(")")) return false;
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    if (text[i] === "(") depth++;
    else if (text[i] === ")") depth--;
    if (depth === 0 && i < text.length - 1) return false;
  }
  return true;
}

function unwrap(text: string): string {
  let inner = text.trim();
  while (isWrapped(inner)) inner = inner.slice(1, -1).trim();
  return inner;
}

// ─────────────────────────────────────────────────────────────────
// Terms and calls
// ─────────────────────────────────────────────────────────────────

function parseSum(text: string, state: ParseState): SumExpr {
  const body = text.replace(/\s+/g, " ").trim();
  if (!body) fail("E0003", text, state);
  checkBalanced(body, state);

  const terms: TermExpr[] = [];
  for (const piece of splitTerms(body)) {
    if (!piece.text) fail("E0001", body, state);
    terms.push(parseTerm(piece, state));
  }
  return sum(terms);
}

function parseTerm(piece: Piece, state: ParseState): TermExpr {
  const text = piece.text;
  const open = text.indexOf("[");
  if (open < 0) fail("E0003", text, state);
  if (text.indexOf("[", open + 1) >= 0) fail("E0001", text, state);

  const close = text.indexOf("]", open);
  if (close < 0) fail("E0002", text, state);
  if (text.slice(close + 1).trim()) fail("E0001", text, state);

  const head = text.slice(0, open).match(/^(.*?)([A-Za-z_]\w*)\s*$/);
  if (!head) fail("E0001", text, state);

  const target = head[2];
  const c = parseCall(target, text.slice(open + 1, close), state);

  let prefix = head[1].trim();
  let coeff: Expr;
  if (!prefix) {
    coeff = constant(1);
  } else if (prefix === "-") {
    // leading bare call, as in `-E[n-1] + ...`
    coeff = constant(-1);
  } else {
    if (!prefix.endsWith("*")) fail("E0001", text, state);
    prefix = prefix.slice(0, -1).trim();
    if (!prefix) fail("E0001", text, state);
    coeff = parseCoeff(prefix, state);
  }

  return term(piece.negated ? negate(coeff) : coeff, c);
}

function negate(coeff: Expr): Expr {
  if (coeff.tag === "Const" && typeof coeff.value === "number") {
    return constant(-coeff.value);
  }
  return binop("*", constant(-1), coeff);
}

function parseCall(ident: string, shiftText: string, state: ParseState): CallExpr {
  const { indices, name, selfName } = state.ctx;
  const shifts = indices.map(() => 0);
  const seen = new Set<string>();

  if (!shiftText.trim()) fail("E0004", `${ident}[${shiftText}]`, state);

  for (const component of splitTopLevel(shiftText, ",")) {
    const m = component.match(/^([A-Za-z_]\w*)\s*(?:([+-])\s*(\d+))?$/);
    if (!m) fail("E0004", component, state);
    const slot = indices.indexOf(m[1]);
    if (slot < 0 || seen.has(m[1])) fail("E0004", component, state);
    seen.add(m[1]);
    if (m[2] !== undefined) {
      const amount = Number(m[3]);
      shifts[slot] = m[2] === "-" ? -amount : amount;
    }
  }

  const self = ident === name || ident === selfName;
  return call(shifts, self ? undefined : ident);
}

// ─────────────────────────────────────────────────────────────────
// Coefficients
// ─────────────────────────────────────────────────────────────────

function parseCoeff(text: string, state: ParseState): Expr {
  const factors = splitTopLevel(text.trim(), "*");
  let result: Expr | undefined;
  for (const f of factors) {
    if (!f) fail("E0001", text, state);
    const parsed = parseFactor(f, state);
    result = result === undefined ? parsed : binop("*", result, parsed);
  }
  if (result === undefined) fail("E0001", text, state);
  return result;
}

function parseFactor(text: string, state: ParseState): Expr {
  const { indices, runtimeVars } = state.ctx;

  if (isNumberLiteral(text)) {
    return constant(Number(text));
  }
  if (runtimeVars.includes(text)) {
    return variable(text);
  }

  const idents = identifiersIn(text);
  if (idents.some((id) => indices.includes(id))) {
    const inner = unwrap(text);
    checkArith(inner, state);
    checkIdentifiers(inner, state);
    return indexExpr(inner);
  }

  if (isWrapped(text)) {
    return parseCoeff(text.slice(1, -1), state);
  }

  if (text.startsWith("-")) {
    const rest = text.slice(1).trim();
    if (!rest) fail("E0001", text, state);
    const inner = parseFactor(rest, state);
    return inner.tag === "Const" && typeof inner.value === "number"
      ? constant(-inner.value)
      : binop("*", constant(-1), inner);
  }

  checkArith(text, state);
  checkIdentifiers(text, state);
  return isIdentifier(text) ? variable(text) : variable(`(${text})`);
}

function checkArith(text: string, state: ParseState): void {
  try {
    tokenizeArith(text);
  } catch {
    fail("E0005", text, state);
  }
}

/** Unknown identifiers are kept as runtime references and reported. */
function checkIdentifiers(text: string, state: ParseState): void {
  const { indices, runtimeVars, arrayVars, name, ruleIndex } = state.ctx;
  for (const id of identifiersIn(text)) {
    if (indices.includes(id) || runtimeVars.includes(id) || KNOWN_FUNCTIONS.has(id)) continue;
    if (arrayVars?.includes(id)) continue;
    const data: Record<string, string | number> = { recurrence: name, name: id };
    if (ruleIndex !== undefined) data.rule = ruleIndex;
    state.diagnostics.push(makeDiagnostic("W0101", { name: id }, data));
  }
}

function parseScaleText(text: string, state: ParseState): { factor: Expr; isDivision: boolean } {
  const trimmed = text.trim();
  const division = trimmed.match(/^1(?:\.0*)?\s*\/\s*(.+)$/s);
  if (division) {
    return { factor: parseCoeff(division[1], state), isDivision: true };
  }
  if (!trimmed) fail("E0001", text, state);
  return { factor: parseCoeff(trimmed, state), isDivision: false };
}
