// src/catalog/builtin/orthogonal.ts
// Classical orthogonal polynomials (DLMF 18.9, 14.7)

import { Recurrence } from "../../core/recurrence";

/** McMurchie-Davidson Hermite coefficients, averaging the A- and B-side paths. */
export function hermite(): Recurrence {
  return new Recurrence("Hermite", ["nA", "nB", "N"], ["PA", "PB", "aAB"], {
    namespace: "hermite",
    maxIndices: { nA: 3, nB: 3, N: 6 },
    description: "Hermite expansion coefficients E^{nA,nB}_N",
  })
    .validity("nA >= 0", "nB >= 0", "N >= 0", "nA + nB >= N")
    .base({ nA: 0, nB: 0, N: 0 }, 1)
    .rule("nA == 0 && nB > 0", "aAB * E[nA, nB-1, N-1] + PB * E[nA, nB-1, N] + (N+1) * E[nA, nB-1, N+1]", {
      name: "B-side reduction",
    })
    .rule("nB == 0 && nA > 0", "aAB * E[nA-1, nB, N-1] + PA * E[nA-1, nB, N] + (N+1) * E[nA-1, nB, N+1]", {
      name: "A-side reduction",
    })
    .branchAverage(
      "nA > 0 && nB > 0",
      [
        "aAB * E[nA, nB-1, N-1] + PB * E[nA, nB-1, N] + (N+1) * E[nA, nB-1, N+1]",
        "aAB * E[nA-1, nB, N-1] + PA * E[nA-1, nB, N] + (N+1) * E[nA-1, nB, N+1]",
      ],
      { name: "Two-branch average" }
    );
}

export function legendre(): Recurrence {
  return new Recurrence("Legendre", ["n"], ["x"], {
    namespace: "legendre",
    maxIndices: { n: 15 },
    description: "Legendre polynomials P_n(x)",
  })
    .validity("n >= 0")
    .base({ n: 0 }, 1)
    .base({ n: 1 }, "x")
    .rule("n > 1", "(2*n-1) * x * E[n-1] + (-(n-1)) * E[n-2]", { scale: "1/n", name: "Three-term recurrence" });
}

export function chebyshevT(): Recurrence {
  return new Recurrence("ChebyshevT", ["n"], ["x"], {
    namespace: "chebyshev",
    maxIndices: { n: 15 },
    description: "Chebyshev polynomials of the first kind T_n(x)",
  })
    .validity("n >= 0")
    .base({ n: 0 }, 1)
    .base({ n: 1 }, "x")
    .rule("n > 1", "2 * x * E[n-1] - E[n-2]", { name: "Three-term" });
}

export function chebyshevU(): Recurrence {
  return new Recurrence("ChebyshevU", ["n"], ["x", "two_x"], {
    namespace: "chebyshev",
    maxIndices: { n: 15 },
    description: "Chebyshev polynomials of the second kind U_n(x)",
  })
    .validity("n >= 0")
    .base({ n: 0 }, 1)
    .base({ n: 1 }, "two_x")
    .rule("n > 1", "two_x * E[n-1] - E[n-2]", { name: "Three-term" });
}

/** Probabilists' Hermite polynomials. */
export function hermiteHe(): Recurrence {
  return new Recurrence("HermiteHe", ["n"], ["x"], {
    namespace: "hermite_poly",
    maxIndices: { n: 15 },
    description: "Probabilists' Hermite polynomials He_n(x)",
  })
    .validity("n >= 0")
    .base({ n: 0 }, 1)
    .base({ n: 1 }, "x")
    .rule("n > 1", "x * E[n-1] + (-(n-1)) * E[n-2]", { name: "Three-term" });
}

/** Physicists' Hermite polynomials. */
export function hermiteH(): Recurrence {
  return new Recurrence("HermiteH", ["n"], ["x", "two_x"], {
    namespace: "hermite_poly",
    maxIndices: { n: 15 },
    description: "Physicists' Hermite polynomials H_n(x)",
  })
    .validity("n >= 0")
    .base({ n: 0 }, 1)
    .base({ n: 1 }, "two_x")
    .rule("n > 1", "two_x * E[n-1] + (-2*(n-1)) * E[n-2]", { name: "Three-term" });
}

export function laguerre(): Recurrence {
  return new Recurrence("Laguerre", ["n"], ["x", "one_minus_x"], {
    namespace: "laguerre",
    maxIndices: { n: 15 },
    description: "Laguerre polynomials L_n(x)",
  })
    .validity("n >= 0")
    .base({ n: 0 }, 1)
    .base({ n: 1 }, "one_minus_x")
    .rule("n > 1", "(2*n-1-x) * E[n-1] + (-(n-1)) * E[n-2]", { scale: "1/n", name: "Three-term" });
}

export function assocLegendre(): Recurrence {
  return new Recurrence("AssocLegendre", ["l", "m"], ["x", "sqrt1mx2"], {
    namespace: "legendre",
    maxIndices: { l: 10, m: 10 },
    description: "Associated Legendre functions P_l^m(x)",
  })
    .validity("l >= 0", "m >= 0", "l >= m")
    .base({ l: 0, m: 0 }, 1)
    .rule("l == m && m > 0", "(-(2*m-1)) * sqrt1mx2 * E[l-1, m-1]", { name: "Diagonal" })
    .rule("l == m + 1", "(2*m+1) * x * E[l-1, m]", { name: "First off-diagonal" })
    .rule("l > m + 1", "(2*l-1) * x * E[l-1, m] + (-(l+m-1)) * E[l-2, m]", { scale: "1/(l-m)", name: "General" });
}

export const ORTHOGONAL = [hermite, legendre, chebyshevT, chebyshevU, hermiteHe, hermiteH, laguerre, assocLegendre];
