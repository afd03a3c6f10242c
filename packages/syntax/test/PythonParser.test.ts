import { describe, it, expect, beforeAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { PythonParser } from "../src/infrastructure/parsers/PythonParser.js";
import type { ParseOutput } from "../src/core/ports/LanguageParser.js";
import type { Entity } from "../src/core/model.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const sources = path.join(__dirname, "fixtures", "sources");

function find(output: ParseOutput, kind: string, name: string): Entity {
  const entity = output.entities.find((e) => e.kind === kind && e.name === name);
  if (!entity) {
    throw new Error(`No ${kind} named ${name}`);
  }
  return entity;
}

describe("PythonParser", () => {
  const parser = new PythonParser();
  let output: ParseOutput;

  beforeAll(async () => {
    output = await parser.parse(path.join(sources, "sample.py"), { rootPath: sources });
  });

  it("claims Python extensions", () => {
    expect(parser.canParse("pkg/mod.py")).toBe(true);
    expect(parser.canParse("stubs/mod.PYI")).toBe(true);
    expect(parser.canParse("script.js")).toBe(false);
    expect(parser.supportedKinds().has("method")).toBe(true);
    expect(parser.supportedKinds().has("file")).toBe(true);
  });

  it("parses without errors or dropped entities", () => {
    expect(output.errors).toEqual([]);
    expect(output.dropped).toBe(0);
  });

  it("creates the file entity with module docstring and imports", () => {
    const file = find(output, "file", "sample.py");
    expect(file.id).toBe("file:sample.py:sample.py:1");
    expect(file.startLine).toBe(1);
    expect(file.endLine).toBe(42);
    expect(file.docstring).toBe("Inventory helpers.");
    expect(file.metadata.language).toBe("python");
    expect(file.metadata.imports).toEqual(["os", ".models"]);
  });

  it("extracts import entities", () => {
    const os = find(output, "import", "os");
    expect(os.startLine).toBe(3);
    const models = find(output, "import", ".models");
    expect(models.startLine).toBe(4);
    expect(models.metadata.names).toEqual(["Item", "Stock"]);
  });

  it("separates constants from variables", () => {
    expect(find(output, "constant", "MAX_ITEMS").startLine).toBe(6);
    expect(find(output, "variable", "registry").startLine).toBe(7);
  });

  it("extracts classes with bases and docstrings", () => {
    const base = find(output, "class", "Base");
    expect([base.startLine, base.endLine]).toEqual([10, 14]);
    expect(base.docstring).toBe("Base class.");
    expect(base.metadata.bases).toEqual([]);

    const inventory = find(output, "class", "Inventory");
    expect([inventory.startLine, inventory.endLine]).toEqual([17, 35]);
    expect(inventory.metadata.bases).toEqual(["Base"]);
    expect(inventory.docstring).toBe("Tracks items.\n\nKeeps counts per name.");
  });

  it("marks methods with their class", () => {
    const init = find(output, "method", "__init__");
    expect(init.metadata.parentClass).toBe("Inventory");
    expect(init.metadata.parameters).toEqual(["self", "owner"]);

    const describeMethod = find(output, "method", "describe");
    expect(describeMethod.metadata.parentClass).toBe("Base");

    const limit = find(output, "variable", "limit");
    expect(limit.startLine).toBe(23);
    expect(limit.metadata.parentClass).toBe("Inventory");
    expect(limit.metadata.annotation).toBe("int");
  });

  it("unwraps decorated definitions", () => {
    const size = find(output, "method", "size");
    expect(size.startLine).toBe(30);
    expect(size.metadata.decorators).toEqual(["property"]);
    expect(size.metadata.returns).toBe("int");
  });

  it("records async functions, parameters and calls", () => {
    const add = find(output, "method", "add");
    expect([add.startLine, add.endLine]).toEqual([33, 35]);
    expect(add.metadata.isAsync).toBe(true);
    expect(add.metadata.parameters).toEqual(["self", "item", "count"]);
    expect(add.metadata.calls).toEqual(["validate", "append"]);

    const validate = find(output, "function", "validate");
    expect([validate.startLine, validate.endLine]).toEqual([38, 42]);
    expect(validate.docstring).toBe("Check an item.");
    expect(validate.metadata.parentClass).toBeUndefined();
  });

  it("links inheritance and calls that resolve within the file", () => {
    const kinds = output.relationships.map((r) => `${r.source} ${r.kind} ${r.target}`).sort();
    expect(kinds).toEqual([
      "class:sample.py:Inventory:17 inherits class:sample.py:Base:10",
      "method:sample.py:add:33 calls function:sample.py:validate:38",
    ]);
  });

  it("uses repository-relative paths and deterministic ids", async () => {
    const again = await parser.parse(path.join(sources, "sample.py"), { rootPath: path.dirname(sources) });
    const inventory = find(again, "class", "Inventory");
    expect(inventory.path).toBe("sources/sample.py");
    expect(inventory.id).toBe("class:sources/sample.py:Inventory:17");

    const repeat = await parser.parse(path.join(sources, "sample.py"), { rootPath: sources });
    expect(repeat.entities.map((e) => e.id)).toEqual(output.entities.map((e) => e.id));
  });

  it("reports unreadable files instead of throwing", async () => {
    const missing = await parser.parse(path.join(sources, "missing.py"), { rootPath: sources });
    expect(missing.entities).toEqual([]);
    expect(missing.errors).toHaveLength(1);
  });

  describe("broken sources", () => {
    let scratch: string;

    beforeAll(async () => {
      scratch = await mkdtemp(path.join(os.tmpdir(), "repograph-python-"));
      return () => rm(scratch, { recursive: true, force: true });
    });

    it("fails the whole file on a syntax error", async () => {
      const broken = path.join(scratch, "broken.py");
      await writeFile(broken, "def broken(:\n    pass\n\n\nclass Foo(\n");
      const result = await parser.parse(broken, { rootPath: scratch });
      expect(result.entities).toEqual([]);
      expect(result.relationships).toEqual([]);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatch(/^Syntax error in broken\.py at line \d+$/);
    });

    it("rejects bytes that are not UTF-8", async () => {
      const latin = path.join(scratch, "latin.py");
      await writeFile(latin, Buffer.from([0x78, 0x20, 0x3d, 0x20, 0x22, 0xe9, 0xff, 0x22, 0x0a]));
      const result = await parser.parse(latin, { rootPath: scratch });
      expect(result.entities).toEqual([]);
      expect(result.errors).toEqual(["latin.py is not valid UTF-8"]);
    });
  });
});
