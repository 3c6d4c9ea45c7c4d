// src/catalog/builtin/combinatorics.ts

import { Recurrence } from "../../core/recurrence";

/** Pascal's triangle. */
export function binomial(): Recurrence {
  return new Recurrence("Binomial", ["n", "k"], [], {
    namespace: "combinatorics",
    maxIndices: { n: 10, k: 10 },
    description: "Binomial coefficients C(n,k)",
  })
    .validity("n >= 0", "k >= 0", "n >= k")
    .base({ n: 0, k: 0 }, 1)
    .rule("k == 0", "E[n-1, k]", { name: "k=0 edge" })
    .rule("n == k", "E[n-1, k-1]", { name: "n=k edge" })
    .rule("n > k && k > 0", "E[n-1, k-1] + E[n-1, k]", { name: "Pascal's rule" });
}

/** Fibonacci-like sequence F(n) = x F(n-1) + F(n-2), F(0) = 1, F(1) = x. */
export function fibonacci(): Recurrence {
  return new Recurrence("Fibonacci", ["n"], ["x"], {
    namespace: "sequences",
    maxIndices: { n: 20 },
    description: "Fibonacci-like sequence with parameter x",
  })
    .validity("n >= 0")
    .base({ n: 0 }, 1)
    .base({ n: 1 }, "x")
    .rule("n > 1", "x * E[n-1] + E[n-2]", { name: "Fibonacci-like" });
}

export const COMBINATORICS = [binomial, fibonacci];
