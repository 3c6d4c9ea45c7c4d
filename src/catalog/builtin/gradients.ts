// src/catalog/builtin/gradients.ts
// Overlap expansion coefficients and their derivative with respect to A - B

import { Recurrence } from "../../core/recurrence";

const GRADIENT_VARS = ["a", "b", "p", "P_tau", "A_tau", "B_tau", "Delta_sq"];

export function overlapE(): Recurrence {
  return new Recurrence("E", ["i", "j", "t"], GRADIENT_VARS, {
    namespace: "mcmd",
    maxIndices: { i: 3, j: 3, t: 6 },
    description: "Overlap expansion coefficients E^{i,j}_t",
  })
    .base({ i: 0, j: 0, t: 0 }, "exp(-(a * b) / (a + b) * Delta_sq)")
    .rule(
      "i > 0 && t >= 0 && t <= i + j",
      "(0.5 / p) * E[i-1, j, t-1] + (P_tau - A_tau) * E[i-1, j, t] + (t + 1.0) * E[i-1, j, t+1]",
      { name: "Increment i" }
    )
    .rule(
      "j > 0 && t >= 0 && t <= i + j",
      "(0.5 / p) * E[i, j-1, t-1] + (P_tau - B_tau) * E[i, j-1, t] + (t + 1.0) * E[i, j-1, t+1]",
      { name: "Increment j" }
    );
}

/** First derivative coefficients; reads the plain coefficients through `E`. */
export function overlapEDeriv(): Recurrence {
  return new Recurrence("E_deriv", ["i", "j", "t"], GRADIENT_VARS, {
    namespace: "mcmd",
    maxIndices: { i: 3, j: 3, t: 7 },
    selfName: "E_deriv",
    description: "Derivative coefficients E^{i,j,1}_t",
  })
    .base({ i: 0, j: 0, t: 0 }, "2.0 * a * (P_tau - A_tau) * exp(-(a * b) / (a + b) * Delta_sq)")
    .rule(
      "i > 0 && t >= 0 && t <= i + j",
      `(0.5 / p) * E_deriv[i-1, j, t-1]
        - (b / (a + b)) * E[i-1, j, t]
        + (P_tau - A_tau) * E_deriv[i-1, j, t]
        + (t + 1.0) * E_deriv[i-1, j, t+1]`,
      { name: "Increment i" }
    )
    .rule(
      "j > 0 && t >= 0 && t <= i + j",
      `(0.5 / p) * E_deriv[i, j-1, t-1]
        + (a / (a + b)) * E[i, j-1, t]
        + (P_tau - B_tau) * E_deriv[i, j-1, t]
        + (t + 1.0) * E_deriv[i, j-1, t+1]`,
      { name: "Increment j" }
    );
}

export const GRADIENTS = [overlapE, overlapEDeriv];
