// src/core/artifacts/hash.ts
// Content digests for generated files

import { createHash } from "node:crypto";

export type Hash = string;

/** Deterministic SHA-256 digest for text. */
export function sha256Text(s: string): Hash {
  return createHash("sha256").update(s, "utf8").digest("hex");
}

/** Digest per file, keys sorted so the manifest is stable across runs. */
export function digestFiles(files: ReadonlyMap<string, string>): Record<string, Hash> {
  const out: Record<string, Hash> = {};
  for (const name of [...files.keys()].sort()) {
    const content = files.get(name);
    if (content !== undefined) out[name] = sha256Text(content);
  }
  return out;
}
