// src/catalog/builtin/mcmd.ts
// McMurchie-Davidson integral recurrences, both with layered output

import { Recurrence } from "../../core/recurrence";

/**
 * Hermite expansion coefficient E^{nA,nB}_t. Mixed indices increment the A
 * side only; the t = 0 rules keep the E_{t+1} term.
 */
export function hermiteE(): Recurrence {
  return new Recurrence("HermiteE", ["nA", "nB", "t"], ["PA", "PB", "aAB"], {
    namespace: "mcmd_hermite",
    maxIndices: { nA: 3, nB: 3, t: 6 },
    auxIndex: "t",
    layered: true,
    description: "Hermite expansion coefficients E^{nA,nB}_t",
  })
    .validity("nA >= 0", "nB >= 0", "t >= 0", "t <= nA + nB")
    .base({ nA: 0, nB: 0, t: 0 }, 1)
    .rule("nA > 0 && nB == 0 && t == 0", "PA * E[nA-1, nB, t] + (t + 1) * E[nA-1, nB, t+1]", { name: "A-side t=0" })
    .rule("nA > 0 && nB == 0 && t > 0", "aAB * E[nA-1, nB, t-1] + PA * E[nA-1, nB, t] + (t + 1) * E[nA-1, nB, t+1]", {
      name: "A-side t>0",
    })
    .rule("nA == 0 && nB > 0 && t == 0", "PB * E[nA, nB-1, t] + (t + 1) * E[nA, nB-1, t+1]", { name: "B-side t=0" })
    .rule("nA == 0 && nB > 0 && t > 0", "aAB * E[nA, nB-1, t-1] + PB * E[nA, nB-1, t] + (t + 1) * E[nA, nB-1, t+1]", {
      name: "B-side t>0",
    })
    .rule("nA > 0 && nB > 0 && t == 0", "PA * E[nA-1, nB, t] + (t + 1) * E[nA-1, nB, t+1]", { name: "General t=0" })
    .rule("nA > 0 && nB > 0 && t > 0", "aAB * E[nA-1, nB, t-1] + PA * E[nA-1, nB, t] + (t + 1) * E[nA-1, nB, t+1]", {
      name: "General t>0",
    });
}

/** Hermite Coulomb integrals R^{(N)}_{tuv}; Boys holds F_N(T). */
export function coulombR(): Recurrence {
  return new Recurrence("CoulombR", ["t", "u", "v", "N"], ["PCx", "PCy", "PCz", "Boys"], {
    namespace: "mcmd_coulomb",
    maxIndices: { t: 6, u: 6, v: 6, N: 6 },
    auxIndex: "N",
    arrayVars: ["Boys"],
    layered: true,
    description: "Hermite Coulomb auxiliary integrals R^{(N)}_{tuv}",
  })
    .validity("t >= 0", "u >= 0", "v >= 0", "N >= 0")
    .base({ t: 0, u: 0, v: 0 }, "Boys[N]")
    .rule("t > 0", "PCx * E[t-1, u, v, N+1] + (t - 1) * E[t-2, u, v, N+1]", { name: "X-recurrence" })
    .rule("t == 0 && u > 0", "PCy * E[t, u-1, v, N+1] + (u - 1) * E[t, u-2, v, N+1]", { name: "Y-recurrence" })
    .rule("t == 0 && u == 0 && v > 0", "PCz * E[t, u, v-1, N+1] + (v - 1) * E[t, u, v-2, N+1]", {
      name: "Z-recurrence",
    });
}

export const MCMD = [hermiteE, coulombR];
