// test/catalog/definitions.spec.ts
// Tests for JSON definition files

import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { fileURLToPath } from "url";
import { DefinitionError } from "../../src/core/errors";
import { interpret } from "../../src/core/compiler/interpret";
import { RecurrenceCatalog } from "../../src/catalog/catalog";
import {
  definitionFromObject,
  loadDefinitionFile,
  loadDefinitionsDir,
  validateDefinition,
} from "../../src/catalog/definitions";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES = path.join(__dirname, "..", "fixtures", "definitions");

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}

describe("validateDefinition", () => {
  it("requires a name and indices", () => {
    expect(validateDefinition({}).problems).toEqual(["name: required", "indices: required"]);
    expect(validateDefinition(5).problems).toEqual([
      "definition: expected an object",
      "name: required",
      "indices: required",
    ]);
  });

  it("checks rule shapes", () => {
    const noBody = { name: "X", indices: ["n"], rules: [{ when: "n > 0" }] };
    expect(validateDefinition(noBody).problems).toEqual(["rules[0].give exactly one of expr and branches"]);

    const scaledBranches = {
      name: "X",
      indices: ["n"],
      rules: [{ when: "n > 0", branches: ["E[n-1]"], scale: "1/n" }],
    };
    expect(validateDefinition(scaledBranches).problems).toEqual(["rules[0].scale does not apply to branches"]);
  });

  it("checks base cases", () => {
    expect(validateDefinition({ name: "X", indices: ["n"], bases: [{ value: 1 }] }).problems).toEqual([
      "bases[0].at: required",
    ]);
    expect(validateDefinition({ name: "X", indices: ["n"], bases: [{ at: { n: 1.5 }, value: 1 }] }).problems).toEqual([
      "bases[0].at.n: expected an integer",
    ]);
  });

  it("fills in the user module", () => {
    expect(validateDefinition({ name: "X", indices: ["n"] }).definition.module).toBe("user");
  });
});

describe("definitionFromObject", () => {
  it("builds a recurrence", () => {
    const rec = definitionFromObject({
      name: "Twice",
      indices: ["n"],
      bases: [{ at: { n: 0 }, value: 1 }],
      rules: [{ when: "n > 0", expr: "2 * E[n-1]" }],
    });
    expect(interpret(rec, [4], {})).toBe(16);
  });

  it("collects problems raised while building", () => {
    const err = thrown(() =>
      definitionFromObject({ name: "A", indices: ["n"], rules: [{ when: "m > 0", expr: "E[n-1]" }] })
    );
    expect(err).toBeInstanceOf(DefinitionError);
    if (err instanceof DefinitionError) {
      expect(err.message).toBe("invalid definition A");
      expect(err.problems).toEqual(["rules[0]: A: constraint mentions unknown index m"]);
    }
  });
});

describe("loadDefinitionFile", () => {
  it("keeps the declared module", () => {
    const def = loadDefinitionFile(path.join(FIXTURES, "pell.json"));
    expect(def.module).toBe("fixtures");
    expect(def.recurrence.description).toBe("Pell numbers");
    expect(def.recurrence.maxIndices).toEqual({ n: 12 });
  });
});

describe("loadDefinitionsDir", () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = undefined;
  });

  it("registers every file in name order", () => {
    const catalog = new RecurrenceCatalog();
    const loaded = loadDefinitionsDir(FIXTURES, catalog);
    expect(loaded.map((d) => d.recurrence.name)).toEqual(["Avg", "Pell"]);
    expect(catalog.moduleOf("Pell")).toBe("fixtures");
    expect(interpret(catalog.require("Pell"), [5], {})).toBe(29);
    expect(interpret(catalog.require("Avg"), [3], {})).toBe(16);
  });

  it("reports failing files together", () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "recurforge-defs-"));
    fs.writeFileSync(path.join(tmpDir, "bad.json"), "{ not json");
    fs.copyFileSync(path.join(FIXTURES, "pell.json"), path.join(tmpDir, "good.json"));
    fs.writeFileSync(path.join(tmpDir, "notes.txt"), "ignored");

    const catalog = new RecurrenceCatalog();
    const err = thrown(() => loadDefinitionsDir(tmpDir ?? "", catalog));
    expect(err).toBeInstanceOf(DefinitionError);
    if (err instanceof DefinitionError) {
      expect(err.message).toBe(`${tmpDir}: 1 definition file(s) failed to load`);
      expect(err.problems[0]).toBe(`bad.json: ${path.join(tmpDir, "bad.json")}: not valid JSON`);
    }
    expect(catalog.has("Pell")).toBe(true);
  });
});
