// src/core/compiler/layered.ts
// Layered generator: one call computes the whole auxiliary range of a layer
//
// For fixed layer indices (every index except the auxiliary one) the output is
// written into an exactly sized buffer `out[0..N_VALUES)`. Rules read earlier
// layers from `prev` buffers filled once per layer, never recomputing values.

import { collectCalls, type CallExpr, type Expr } from "../ast";
import { evaluateIndex, mentions, substituteIdentifiers } from "../arith";
import { ConstraintSet, type CompareOp, type Constraint } from "../constraints";
import { GenerationError, RecurrenceError } from "../errors";
import { priorityKey, type BaseCase, type Recurrence, type RecurrenceRule } from "../recurrence";
import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import { renderBody, usedIdentifiers } from "./body";
import {
  callVars,
  coeffName,
  cppFooter,
  cppParam,
  cppPreamble,
  FORCEINLINE,
  moduleName,
  resolveConfig,
  wrapJsModule,
  crossDependencies,
} from "./perValue";
import { createDialect, indent, renderExpr, shiftedIndex, type Dialect, type RenderHooks } from "./render";
import type { CodegenConfig, GenerateOptions, GeneratedUnit, LayerBound, RecurrenceResolver, RuleStrategy } from "./types";

// ─────────────────────────────────────────────────────────────────
// Shape analysis
// ─────────────────────────────────────────────────────────────────

export type AuxRole =
  | { role: "zero" }
  | { role: "max"; expr: string }
  | { role: "general"; start: number };

export type LayerRule = { rule: RecurrenceRule; role: AuxRole };

export type LayerGroup = {
  /** Constraints on layer indices only; sorted render is the group key */
  constraints: ConstraintSet;
  rules: LayerRule[];
  firstIndex: number;
};

export type BaseLayer = {
  /** Layer index values, aligned with the layer index list */
  values: number[];
  bases: BaseCase[];
  nValues: number;
};

export type PrevBuffer = {
  name: string;
  target: string | undefined;
  /** Shifts aligned with the layer index list */
  layerShifts: number[];
};

export type LayerPlan = {
  aux: string;
  auxSlot: number;
  layerIndices: string[];
  bound: LayerBound;
  baseLayers: BaseLayer[];
  groups: LayerGroup[];
  diagnostics: Diagnostic[];
};

type AuxComparison = { op: CompareOp; rhs: string };

/** Normalize a constraint on the aux index to `aux op rhs`, or undefined when it is mixed. */
function auxComparison(c: Constraint, aux: string): AuxComparison | undefined {
  const flipped: Record<CompareOp, CompareOp> = { "==": "==", "!=": "!=", "<": ">", "<=": ">=", ">": "<", ">=": "<=" };
  if (c.left === aux && !mentions(c.right, aux)) return { op: c.op, rhs: c.right };
  if (c.right === aux && !mentions(c.left, aux)) return { op: flipped[c.op], rhs: c.left };
  return undefined;
}

export function layerBound(rec: Recurrence, aux: string, layerIndices: string[], tablePadding: number): LayerBound {
  for (const c of rec.validityGuard.constraints) {
    if (!mentions(c.left, aux) && !mentions(c.right, aux)) continue;
    const cmp = auxComparison(c, aux);
    if (cmp?.op === "<=") return { expr: `(${cmp.rhs}) + 1`, source: "validity" };
    if (cmp?.op === "<") return { expr: `(${cmp.rhs})`, source: "validity" };
  }

  const tabulated = rec.bases.some(
    (b) => b.value.tag === "Lookup" && rec.arrayVars.includes(b.value.table) && b.value.index.trim() === aux
  );
  if (tabulated) {
    // A layer at depth d = sum of layer indices must serve every deeper layer
    // up to the maxIndices corner, each step down reading `growth` more aux values.
    const depth = layerIndices.reduce((acc, idx) => acc + rec.maxIndices[idx], 0);
    const top = rec.maxIndices[aux] + 1 + tablePadding;
    const growth = auxGrowth(rec, aux, layerIndices);
    const expr = growth === 0 ? `${top}` : `(${depth} - (${layerIndices.join(" + ")})) * ${growth} + ${top}`;
    return { expr, source: "tabulated" };
  }
  return { expr: "1", source: "default" };
}

/** Aux values a layer must add per unit of depth so every self call lands inside its source layer. */
function auxGrowth(rec: Recurrence, aux: string, layerIndices: string[]): number {
  const auxSlot = rec.slotOf(aux);
  let growth = 0;
  for (const rule of rec.rules) {
    for (const c of collectCalls(rule.expr)) {
      if (c.target !== undefined && c.target !== rec.name) continue;
      const up = c.shifts[auxSlot] ?? 0;
      if (up <= 0) continue;
      const drop = -layerIndices.reduce((acc, idx) => acc + (c.shifts[rec.slotOf(idx)] ?? 0), 0);
      if (drop <= 0) {
        throw new GenerationError(rec.name, `rule ${rule.index} reads ${aux}+${up} without descending a layer, so no table size fits`);
      }
      growth = Math.max(growth, Math.ceil(up / drop));
    }
  }
  return growth;
}

function auxRole(rec: Recurrence, rule: RecurrenceRule, aux: string): AuxRole {
  let role: AuxRole | undefined;
  for (const c of rule.constraints.constraints) {
    if (!mentions(c.left, aux) && !mentions(c.right, aux)) continue;
    const cmp = auxComparison(c, aux);
    if (!cmp) {
      throw new GenerationError(rec.name, `rule ${rule.index} mixes ${aux} with other indices in ${c.left} ${c.op} ${c.right}`);
    }
    if (cmp.op === "<=") continue;

    let next: AuxRole;
    const integer = /^-?\d+$/.test(cmp.rhs) ? Number(cmp.rhs) : undefined;
    if (cmp.op === "==") {
      next = integer === 0 ? { role: "zero" } : { role: "max", expr: cmp.rhs };
    } else if ((cmp.op === ">" || cmp.op === ">=") && integer !== undefined) {
      next = { role: "general", start: Math.max(0, cmp.op === ">" ? integer + 1 : integer) };
    } else {
      throw new GenerationError(rec.name, `rule ${rule.index} constrains ${aux} with ${cmp.op} ${cmp.rhs}`);
    }
    if (role) {
      throw new GenerationError(rec.name, `rule ${rule.index} has more than one constraint on ${aux}`);
    }
    role = next;
  }
  return role ?? { role: "general", start: 0 };
}

/** Layer guard constraints must not involve the aux index at all. */
function layerConstraints(set: ConstraintSet, aux: string): ConstraintSet {
  return set.filter((c) => !mentions(c.left, aux) && !mentions(c.right, aux));
}

export function planLayers(rec: Recurrence, tablePadding: number): LayerPlan {
  const aux = rec.auxIndex;
  if (aux === undefined) {
    throw new GenerationError(rec.name, "no auxiliary index declared");
  }
  const auxSlot = rec.slotOf(aux);
  const layerIndices = rec.indices.filter((i) => i !== aux);
  if (layerIndices.length === 0) {
    throw new GenerationError(rec.name, `${aux} is the only index, so there are no layers`);
  }

  const diagnostics: Diagnostic[] = [];
  const bound = layerBound(rec, aux, layerIndices, tablePadding);
  if (bound.source === "default") {
    diagnostics.push(makeDiagnostic("W0201", { name: rec.name, aux }, { recurrence: rec.name, aux }));
  }

  // Base layers
  const byLayer = new Map<string, BaseLayer>();
  for (const base of rec.bases) {
    const values: number[] = [];
    for (const idx of layerIndices) {
      const v = base.at[rec.slotOf(idx)];
      if (v === null || v === undefined) {
        throw new GenerationError(rec.name, `base case leaves layer index ${idx} free`);
      }
      values.push(v);
    }
    const key = values.join(",");
    const layer: BaseLayer = byLayer.get(key) ?? { values, bases: [], nValues: 0 };
    layer.bases.push(base);
    byLayer.set(key, layer);
  }
  for (const layer of byLayer.values()) {
    if (bound.source === "default") {
      const auxValues = layer.bases.map((b) => b.at[auxSlot] ?? 0);
      layer.nValues = Math.max(...auxValues) + 1;
    } else {
      const env = new Map(layerIndices.map((idx, i): [string, number] => [idx, layer.values[i]]));
      try {
        layer.nValues = Math.max(0, evaluateIndex(bound.expr, env));
      } catch (e) {
        if (e instanceof RecurrenceError) {
          throw new GenerationError(rec.name, `cannot size base layer (${layer.values.join(", ")}): ${e.message}`);
        }
        throw e;
      }
    }
  }

  // Rule groups
  const groups = new Map<string, LayerGroup>();
  for (const rule of rec.sortedRules()) {
    const constraints = layerConstraints(rule.constraints, aux);
    const key = constraints.key();
    const group: LayerGroup = groups.get(key) ?? { constraints, rules: [], firstIndex: rule.index };
    const role = auxRole(rec, rule, aux);
    const clash = group.rules.find((r) => r.role.role === role.role);
    if (clash) {
      throw new GenerationError(rec.name, `rules ${clash.rule.index} and ${rule.index} both take the ${role.role} role`);
    }
    group.rules.push({ rule, role });
    groups.set(key, group);
  }

  const ordered = Array.from(groups.values()).sort((a, b) => {
    const [ea, ca] = priorityKey(a);
    const [eb, cb] = priorityKey(b);
    if (ea !== eb) return ea - eb;
    if (ca !== cb) return ca - cb;
    return a.firstIndex - b.firstIndex;
  });
  checkGroupOrder(rec, ordered);

  return { aux, auxSlot, layerIndices, bound, baseLayers: Array.from(byLayer.values()), groups: ordered, diagnostics };
}

/** Every aux value has a role in the group, so no later group is consulted for it. */
function coversAux(group: LayerGroup): boolean {
  const general = group.rules.find((r) => r.role.role === "general");
  if (!general || general.role.role !== "general") return false;
  const hasZero = group.rules.some((r) => r.role.role === "zero");
  return general.role.start === 0 || (hasZero && general.role.start <= 1);
}

/**
 * Layers pick the first group whose guard holds. Where two guards may hold at
 * once, that agrees with per-value selection only if every rule of the earlier
 * group outranks every rule of the later one and the earlier group handles all
 * aux values.
 */
function checkGroupOrder(rec: Recurrence, ordered: LayerGroup[]): void {
  const rank = new Map(rec.sortedRules().map((r, i): [number, number] => [r.index, i]));
  const ranks = (g: LayerGroup) => g.rules.map((r) => rank.get(r.rule.index) ?? 0);
  ordered.forEach((earlier, i) => {
    for (const later of ordered.slice(i + 1)) {
      if (earlier.constraints.provablyDisjoint(later.constraints)) continue;
      if (Math.min(...ranks(later)) < Math.max(...ranks(earlier))) {
        throw new GenerationError(
          rec.name,
          `layer groups of rules ${earlier.firstIndex} and ${later.firstIndex} overlap with interleaved priorities`
        );
      }
      if (!coversAux(earlier)) {
        throw new GenerationError(
          rec.name,
          `layer group of rule ${earlier.firstIndex} overlaps rule ${later.firstIndex} but does not cover every ${rec.auxIndex ?? "aux"} value`
        );
      }
    }
  });
}

/** One buffer per distinct (target, layer shifts), named in sorted signature order. */
export function prevBuffers(rec: Recurrence, plan: LayerPlan, group: LayerGroup): Map<string, PrevBuffer> {
  const found = new Map<string, Omit<PrevBuffer, "name">>();
  for (const { rule } of group.rules) {
    for (const c of collectCalls(rule.expr)) {
      const layerShifts = plan.layerIndices.map((idx) => c.shifts[rec.slotOf(idx)] ?? 0);
      const self = c.target === undefined || c.target === rec.name;
      if (self && layerShifts.every((s) => s === 0)) {
        throw new GenerationError(rec.name, `rule ${rule.index} reads its own layer`);
      }
      const target = self ? undefined : c.target;
      found.set(bufferSignature(target, layerShifts, plan), { target, layerShifts });
    }
  }

  const signatures = Array.from(found.keys()).sort();
  const buffers = new Map<string, PrevBuffer>();
  signatures.forEach((sig, i) => {
    const b = found.get(sig);
    if (b) buffers.set(sig, { ...b, name: signatures.length === 1 ? "prev" : `prev_${i}` });
  });
  return buffers;
}

function bufferSignature(target: string | undefined, layerShifts: number[], plan: LayerPlan): string {
  return `${target ?? ""}[${plan.layerIndices.map((idx, i) => shiftedIndex(idx, layerShifts[i])).join(", ")}]`;
}

function maxPositiveAuxShift(plan: LayerPlan, group: LayerGroup): number {
  let max = 0;
  for (const { rule } of group.rules) {
    for (const c of collectCalls(rule.expr)) {
      max = Math.max(max, c.shifts[plan.auxSlot] ?? 0);
    }
  }
  return max;
}

/** Rewrite index text so the given identifiers read as fixed values. */
export function substituteExpr(expr: Expr, values: ReadonlyMap<string, string>): Expr {
  switch (expr.tag) {
    case "IndexExpr":
      return { tag: "IndexExpr", text: substituteIdentifiers(expr.text, values) };
    case "Lookup":
      return { ...expr, index: substituteIdentifiers(expr.index, values) };
    case "BinOp":
      return { ...expr, left: substituteExpr(expr.left, values), right: substituteExpr(expr.right, values) };
    case "Term": {
      const c = expr.call;
      return { tag: "Term", coeff: substituteExpr(expr.coeff, values), call: c };
    }
    case "Sum":
      return { tag: "Sum", terms: expr.terms.map((t) => ({ ...t, coeff: substituteExpr(t.coeff, values) })) };
    case "Scaled":
      return { ...expr, inner: substituteExpr(expr.inner, values), scale: substituteExpr(expr.scale, values) };
    case "BranchAverage":
      return { ...expr, branches: expr.branches.map((b) => substituteExpr(b, values)), scale: substituteExpr(expr.scale, values) };
    case "Const":
    case "Var":
    case "Call":
    case "Ref":
      return expr;
  }
}

// ─────────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────────

type LayerEmitter = {
  rec: Recurrence;
  plan: LayerPlan;
  config: CodegenConfig;
  dialect: Dialect;
  resolve?: RecurrenceResolver;
  strategies: RuleStrategy[];
};

const layerName = (name: string) => `${coeffName(name)}Layer`;

/**
 * Read hook for one role. `auxAt` undefined means the loop variable; a number
 * means the aux value is known statically.
 */
function readHooks(e: LayerEmitter, buffers: Map<string, PrevBuffer>, auxAt: number | undefined): RenderHooks {
  const { rec, plan, dialect } = e;
  return {
    call: (c: CallExpr) => {
      const layerShifts = plan.layerIndices.map((idx) => c.shifts[rec.slotOf(idx)] ?? 0);
      const self = c.target === undefined || c.target === rec.name;
      const buffer = buffers.get(bufferSignature(self ? undefined : c.target, layerShifts, plan));
      if (!buffer) {
        throw new GenerationError(rec.name, "call without a previous-layer buffer");
      }
      const shift = c.shifts[plan.auxSlot] ?? 0;
      if (auxAt !== undefined) {
        const slot = auxAt + shift;
        return slot < 0 ? dialect.zero : `${buffer.name}[${slot}]`;
      }
      const index = shiftedIndex(plan.aux, shift);
      if (shift >= 0) return `${buffer.name}[${index}]`;
      return `(${index} >= 0 ? ${buffer.name}[${index}] : ${dialect.zero})`;
    },
  };
}

type RoleBlock = { opener: string[]; lines: string[]; closer: string[] };

/** Statements for every role of a group, in write order: zero, loop, max. */
function roleBlocks(e: LayerEmitter, group: LayerGroup, buffers: Map<string, PrevBuffer>): RoleBlock[] {
  const { plan, dialect, config } = e;
  const aux = plan.aux;
  const blocks: RoleBlock[] = [];
  const find = (role: AuxRole["role"]) => group.rules.find((r) => r.role.role === role);

  const zero = find("zero");
  const general = find("general");
  const max = find("max");

  if (zero) {
    const expr = substituteExpr(zero.rule.expr, new Map([[aux, "0"]]));
    const body = renderBody(expr, e.rec.indices, config, dialect, readHooks(e, buffers, 0));
    e.strategies.push(body.strategy);
    blocks.push({
      opener: [`// ${aux} = 0`, "if (N_VALUES > 0) {"],
      lines: [...body.statements, `out[0] = ${body.result};`],
      closer: ["}"],
    });
  }

  if (general && general.role.role === "general") {
    const start = zero ? Math.max(1, general.role.start) : general.role.start;
    const body = renderBody(general.rule.expr, e.rec.indices, config, dialect, readHooks(e, buffers, undefined));
    e.strategies.push(body.strategy);
    const loop =
      dialect.target === "cpp"
        ? `for (int ${aux} = ${start}; ${aux} < N_VALUES; ++${aux}) {`
        : `for (let ${aux} = ${start}; ${aux} < N_VALUES; ${aux}++) {`;
    blocks.push({ opener: [loop], lines: [...body.statements, `out[${aux}] = ${body.result};`], closer: ["}"] });
  }

  if (max && max.role.role === "max") {
    const body = renderBody(max.rule.expr, e.rec.indices, config, dialect, readHooks(e, buffers, undefined));
    e.strategies.push(body.strategy);
    const decl = dialect.target === "cpp" ? `const int ${aux} = ${max.role.expr};` : `const ${aux} = ${max.role.expr};`;
    blocks.push({
      opener: [`// ${aux} = ${max.role.expr}`, "{"],
      lines: [decl, `if (${aux} >= 0 && ${aux} < N_VALUES) {`, ...indent([...body.statements, `out[${aux}] = ${body.result};`], 1), "}"],
      closer: ["}"],
    });
  }
  return blocks;
}

function renderBlocks(blocks: RoleBlock[]): string[] {
  const lines: string[] = [];
  for (const b of blocks) {
    lines.push(...b.opener, ...indent(b.lines, 1), ...b.closer);
  }
  return lines;
}

function layerValues(plan: LayerPlan, layer: BaseLayer): Map<string, string> {
  return new Map(plan.layerIndices.map((idx, i): [string, string] => [idx, String(layer.values[i])]));
}

function baseLines(e: LayerEmitter, layer: BaseLayer, hooks: RenderHooks): string[] {
  const { plan, dialect } = e;
  const lines: string[] = [];
  for (const base of layer.bases) {
    const value = substituteExpr(base.value, layerValues(plan, layer));
    const auxValue = base.at[plan.auxSlot];
    if (auxValue === null || auxValue === undefined) {
      const loop =
        dialect.target === "cpp"
          ? `for (int ${plan.aux} = 0; ${plan.aux} < N_VALUES; ++${plan.aux}) {`
          : `for (let ${plan.aux} = 0; ${plan.aux} < N_VALUES; ${plan.aux}++) {`;
      lines.push(loop, `    out[${plan.aux}] = ${renderExpr(value, dialect, hooks)};`, "}");
    } else if (auxValue < layer.nValues) {
      const fixed = substituteExpr(value, new Map([[plan.aux, String(auxValue)]]));
      lines.push(`out[${auxValue}] = ${renderExpr(fixed, dialect, hooks)};`);
    }
  }
  return lines;
}

function noCalls(rec: Recurrence): RenderHooks {
  return {
    call: () => {
      throw new GenerationError(rec.name, "base case value cannot contain a call");
    },
  };
}

/** Layer-level guard and the earlier cases it must exclude. */
function groupGuards(rec: Recurrence, plan: LayerPlan): Array<{ group: LayerGroup; guard: ConstraintSet; exclusive: string }> {
  const validity = layerConstraints(rec.validityGuard, plan.aux);
  const earlier: ConstraintSet[] = plan.baseLayers.map(
    (l) => new ConstraintSet(plan.layerIndices.map((idx, i) => ({ left: idx, op: "==", right: String(l.values[i]) })))
  );
  return plan.groups.map((group) => {
    const guard = group.constraints.and(validity);
    const parts = guard.size > 0 ? [guard.render()] : [];
    for (const prior of earlier) {
      if (guard.provablyDisjoint(prior)) continue;
      const text = prior.render();
      parts.push(prior.size === 1 ? `!${text}` : `!(${text})`);
    }
    earlier.push(group.constraints);
    if (parts.length === 0) {
      throw new GenerationError(rec.name, `layer group of rule ${group.firstIndex} has no guard, so its recursion never terminates`);
    }
    return { group, guard, exclusive: parts.join(" && ") };
  });
}

function prevLines(e: LayerEmitter, group: LayerGroup, buffers: Map<string, PrevBuffer>): string[] {
  const { rec, plan, config, dialect } = e;
  const shift = maxPositiveAuxShift(plan, group);
  const lines: string[] = [];
  for (const b of buffers.values()) {
    const target = b.target ?? rec.name;
    const args = plan.layerIndices.map((idx, i) => shiftedIndex(idx, b.layerShifts[i])).join(", ");
    const vars = callVars(rec, b.target, e.resolve).join(", ");
    const size = b.name.toUpperCase() + "_SIZE";
    if (dialect.target === "cpp") {
      const prevN = `${layerName(target)}<${args}>::N_VALUES`;
      lines.push(
        `constexpr int ${size} = (${prevN} > N_VALUES ? ${prevN} : N_VALUES) + ${shift};`,
        `${config.vecType} ${b.name}[${size} > 0 ? ${size} : 1] = {};`,
        `${layerName(target)}<${args}>::compute(${[b.name, vars].filter(Boolean).join(", ")});`
      );
    } else {
      lines.push(
        `const ${b.name} = new Array(Math.max(${layerName(target)}Size(${args}), N_VALUES) + ${shift}).fill(0);`,
        `${layerName(target)}(${[args, b.name, vars].filter(Boolean).join(", ")});`
      );
    }
  }
  if (lines.length > 0) lines.push("");
  return lines;
}

// ─────────────────────────────────────────────────────────────────
// Entry point
// ─────────────────────────────────────────────────────────────────

export function generateLayered(rec: Recurrence, options: GenerateOptions = {}): GeneratedUnit {
  const config = resolveConfig(options);
  const plan = planLayers(rec, config.tablePadding);
  const emitter: LayerEmitter = {
    rec,
    plan,
    config,
    dialect: createDialect(config.target, config.vecType),
    resolve: options.resolve,
    strategies: [],
  };
  const code = config.target === "cpp" ? emitCpp(emitter) : emitJs(emitter);
  const name = coeffName(rec.name);

  return {
    recurrence: rec.name,
    kind: "layered",
    target: config.target,
    code,
    moduleName: moduleName(rec, "Layered"),
    exports: [name, layerName(rec.name), `${layerName(rec.name)}Size`],
    dependencies: config.target === "js" ? crossDependencies(rec).flatMap((d) => [`${d}Layer`, `${d}LayerSize`]) : [],
    diagnostics: [...rec.diagnostics, ...plan.diagnostics],
    strategies: emitter.strategies,
    layerBound: plan.bound,
  };
}

function emitCpp(e: LayerEmitter): string {
  const { rec, plan, config } = e;
  const layer = layerName(rec.name);
  const vt = config.vecType;
  const tparams = plan.layerIndices.map((i) => `int ${i}`).join(", ");
  const params = (used: (v: string) => boolean) => rec.runtimeVars.map((v) => cppParam(rec, v, config, used(v))).join(", ");
  const sig = (outUsed: boolean, used: (v: string) => boolean) =>
    [outUsed ? `${vt}* out` : `${vt}* /*out*/`, params(used)].filter(Boolean).join(", ");

  const includes = rec.dependencies().map((d) => `${d.toLowerCase()}_coeff_layered.hpp`);
  const blocks: string[] = [cppPreamble(rec, config, includes)];

  blocks.push(
    [
      `template<${tparams}, typename Enable = void>`,
      `struct ${layer} {`,
      "    static constexpr int N_VALUES = 0;",
      "",
      `    static ${FORCEINLINE} void compute(${sig(false, () => false)}) {`,
      "    }",
      "};",
    ].join("\n")
  );

  for (const base of plan.baseLayers) {
    const used = new Set<string>();
    for (const b of base.bases) usedIdentifiers(b.value).forEach((id) => used.add(id));
    blocks.push(
      [
        "template<>",
        `struct ${layer}<${base.values.join(", ")}, void> {`,
        `    static constexpr int N_VALUES = ${base.nValues};`,
        "",
        `    static ${FORCEINLINE} void compute(${sig(true, (v) => used.has(v))}) {`,
        ...indent(baseLines(e, base, noCalls(rec)), 2),
        "    }",
        "};",
      ].join("\n")
    );
  }

  for (const { group, exclusive } of groupGuards(rec, plan)) {
    const buffers = prevBuffers(rec, plan, group);
    blocks.push(
      [
        `template<${tparams}>`,
        `struct ${layer}<`,
        `    ${plan.layerIndices.join(", ")},`,
        `    typename std::enable_if<${exclusive}>::type`,
        "> {",
        `    static constexpr int N_VALUES = ${plan.bound.expr};`,
        "",
        `    static ${FORCEINLINE} void compute(${sig(true, () => true)}) {`,
        ...indent([...prevLines(e, group, buffers), ...renderBlocks(roleBlocks(e, group, buffers))], 2),
        "    }",
        "};",
      ].join("\n")
    );
  }

  const allVars = rec.runtimeVars.join(", ");
  const layerArgs = plan.layerIndices.join(", ");
  blocks.push(
    [
      `template<${rec.indices.map((i) => `int ${i}`).join(", ")}>`,
      `struct ${coeffName(rec.name)} {`,
      `    static ${FORCEINLINE} ${vt} compute(${params(() => true)}) {`,
      `        constexpr int SIZE = ${layer}<${layerArgs}>::N_VALUES;`,
      `        if (${plan.aux} < 0 || ${plan.aux} >= SIZE) return ${e.dialect.zero};`,
      `        ${vt} out[SIZE > 0 ? SIZE : 1] = {};`,
      `        ${layer}<${layerArgs}>::compute(${["out", allVars].filter(Boolean).join(", ")});`,
      `        return out[${plan.aux}];`,
      "    }",
      "};",
    ].join("\n")
  );

  const footer = cppFooter(rec);
  if (footer) blocks.push(footer);
  return blocks.join("\n\n") + "\n";
}

function emitJs(e: LayerEmitter): string {
  const { rec, plan } = e;
  const layer = layerName(rec.name);
  const layerArgs = plan.layerIndices.join(", ");
  const computeParams = [layerArgs, "out", ...rec.runtimeVars].join(", ");
  const fns: string[] = [];
  const selector: string[] = [];

  const caseObject = (id: string, nValues: string, body: string[]) =>
    [
      `const ${id} = {`,
      `    nValues(${layerArgs}) {`,
      `        return ${nValues};`,
      "    },",
      `    compute(${computeParams}) {`,
      ...indent(body.length > 0 ? [`const N_VALUES = ${id}.nValues(${layerArgs});`, ...body] : [], 2),
      "    },",
      "};",
    ].join("\n");

  fns.push(caseObject(`${layer}$primary`, "0", []));

  plan.baseLayers.forEach((base, i) => {
    const id = `${layer}$base${i}`;
    fns.push(caseObject(id, String(base.nValues), baseLines(e, base, noCalls(rec))));
    const guard = plan.layerIndices.map((idx, k) => `(${idx} == ${base.values[k]})`).join(" && ");
    selector.push(`if (${guard}) return ${id};`);
  });

  groupGuards(rec, plan).forEach(({ group, guard }, i) => {
    const id = `${layer}$layer${i}`;
    const buffers = prevBuffers(rec, plan, group);
    fns.push(caseObject(id, plan.bound.expr, [...prevLines(e, group, buffers), ...renderBlocks(roleBlocks(e, group, buffers))]));
    selector.push(`if (${guard.render()}) return ${id};`);
  });

  fns.push(
    [`function ${layer}$select(${layerArgs}) {`, ...indent([...selector, `return ${layer}$primary;`], 1), "}"].join("\n"),
    [`function ${layer}Size(${layerArgs}) {`, `    return ${layer}$select(${layerArgs}).nValues(${layerArgs});`, "}"].join("\n"),
    [`function ${layer}(${computeParams}) {`, `    ${layer}$select(${layerArgs}).compute(${computeParams});`, "}"].join("\n"),
    [
      `function ${coeffName(rec.name)}(${[...rec.indices, ...rec.runtimeVars].join(", ")}) {`,
      `    const size = ${layer}Size(${layerArgs});`,
      `    if (${plan.aux} < 0 || ${plan.aux} >= size) return 0;`,
      "    const out = new Array(size).fill(0);",
      `    ${layer}(${computeParams});`,
      `    return out[${plan.aux}];`,
      "}",
    ].join("\n")
  );

  return wrapJsModule(rec, moduleName(rec, "Layered"), fns, [coeffName(rec.name), layer, `${layer}Size`]);
}
