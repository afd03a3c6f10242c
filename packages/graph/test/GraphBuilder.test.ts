import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { BuildInProgressError, defaultConfig } from "@repograph/core";
import { createDefaultRegistry, createEntity } from "@repograph/syntax";

import { GraphBuilder, structuralParent } from "../src/infrastructure/GraphBuilder.js";
import type { GraphView } from "../src/core/model.js";
import { SCENARIO, createRepository, removeRepository, writeFiles } from "./support.js";

function nonContainment(graph: GraphView): string[] {
  return graph
    .relationshipList()
    .filter((r) => r.kind !== "contains")
    .map((r) => `${r.source} ${r.kind} ${r.target}`)
    .sort();
}

function containerCounts(graph: GraphView): Map<string, number> {
  const counts = new Map<string, number>();
  for (const entity of graph.entityList()) {
    counts.set(entity.id, graph.incomingOf(entity.id).filter((r) => r.kind === "contains").length);
  }
  return counts;
}

describe("structuralParent", () => {
  const fileId = "file:m.py:m.py:1";
  const outer = createEntity({ kind: "class", path: "m.py", name: "Node", startLine: 1, endLine: 30 });
  const inner = createEntity({ kind: "class", path: "m.py", name: "Node", startLine: 10, endLine: 20 });

  it("picks the innermost enclosing class with the recorded name", () => {
    const method = createEntity({
      kind: "method",
      path: "m.py",
      name: "walk",
      startLine: 12,
      endLine: 14,
      metadata: { parentClass: "Node" },
    });
    expect(structuralParent(method, fileId, [outer, inner])).toBe(inner.id);
  });

  it("falls back to the file", () => {
    const loose = createEntity({ kind: "function", path: "m.py", name: "main", startLine: 40, endLine: 41 });
    const orphan = createEntity({
      kind: "method",
      path: "m.py",
      name: "gone",
      startLine: 40,
      endLine: 41,
      metadata: { parentClass: "Node" },
    });
    expect(structuralParent(loose, fileId, [outer])).toBe(fileId);
    expect(structuralParent(orphan, fileId, [outer])).toBe(fileId);
  });
});

describe("GraphBuilder", () => {
  describe("a.py / b.py / c.md repository", () => {
    let root: string;

    beforeAll(async () => {
      root = await createRepository(SCENARIO);
    });

    afterAll(async () => {
      await removeRepository(root);
    });

    it("extracts entities from every file", async () => {
      const { graph, report } = await new GraphBuilder(createDefaultRegistry()).build(root);

      const ids = graph.entityList().map((e) => e.id).filter((id) => !id.startsWith("directory:"));
      expect(ids).toEqual([
        "file:a.py:a.py:1",
        "file:b.py:b.py:1",
        "file:c.md:c.md:1",
        "class:a.py:Foo:1",
        "method:a.py:bar:4",
        "function:a.py:helper:8",
        "import:b.py:a:1",
        "function:b.py:run:4",
        "heading:c.md:Notes:1",
      ]);
      expect(graph.isFrozen).toBe(true);
      expect(report.filesScanned).toBe(3);
      expect(report.filesParsed).toBe(3);
      expect(report.filesFailed).toBe(0);
    });

    it("discovers imports, documentation and cross-file calls", async () => {
      const { graph } = await new GraphBuilder(createDefaultRegistry()).build(root);

      expect(nonContainment(graph)).toEqual([
        "file:b.py:b.py:1 imports file:a.py:a.py:1",
        "file:c.md:c.md:1 documents file:a.py:a.py:1",
        "function:a.py:helper:8 calls class:a.py:Foo:1",
        "function:b.py:run:4 calls class:a.py:Foo:1",
        "function:b.py:run:4 calls method:a.py:bar:4",
      ]);
      const crossFile = graph.getRelationship("function:b.py:run:4 -calls-> method:a.py:bar:4");
      expect(crossFile?.confidence).toBe(0.8);
    });

    it("keeps the parser's file entity and the scanned size", async () => {
      const { graph } = await new GraphBuilder(createDefaultRegistry()).build(root);
      const a = graph.getEntity("file:a.py:a.py:1");
      expect(a?.endLine).toBe(9);
      expect(a?.metadata.language).toBe("python");
      expect(a?.metadata.size).toBe(SCENARIO["a.py"].length);
    });

    it("forms a containment forest rooted at the repository directory", async () => {
      const { graph } = await new GraphBuilder(createDefaultRegistry()).build(root);
      const counts = containerCounts(graph);
      const roots = [...counts].filter(([, count]) => count === 0).map(([id]) => id);

      expect(roots).toEqual([`directory:.:${path.basename(root)}:1`]);
      expect([...counts.values()].every((count) => count <= 1)).toBe(true);
      const barContainers = graph.incomingOf("method:a.py:bar:4").filter((r) => r.kind === "contains");
      expect(barContainers.map((r) => r.source)).toEqual(["class:a.py:Foo:1"]);
    });

    it("produces identical graphs for identical input", async () => {
      const builder = new GraphBuilder(createDefaultRegistry());
      const first = await builder.build(root);
      const second = await builder.build(root);
      expect(second.graph.toSnapshot()).toEqual(first.graph.toSnapshot());
      expect(builder.currentPhase).toBe("done");
    });

    it("records timings for every phase", async () => {
      const { report } = await new GraphBuilder(createDefaultRegistry()).build(root);
      expect(Object.keys(report.phaseTimings).sort()).toEqual([
        "discover_relationships",
        "materialize_graph",
        "parse_files",
        "scan_directory",
      ]);
      expect(report.durationMs).toBeGreaterThanOrEqual(0);
    });

    it("refuses a second build while one is running", async () => {
      const builder = new GraphBuilder(createDefaultRegistry());
      const running = builder.build(root);
      await expect(builder.build(root)).rejects.toBeInstanceOf(BuildInProgressError);
      await running;
      expect(builder.currentPhase).toBe("done");
    });
  });

  describe("filters", () => {
    let root: string;

    beforeAll(async () => {
      root = await createRepository({
        ".gitignore": "# generated code\ngenerated/\n",
        "small.py": `# ${"a".repeat(61)}\n`,
        "big.py": `# ${"a".repeat(62)}\n`,
        "notes.txt": "plain text\n",
        "node_modules/dep/index.js": "module.exports = 1;\n",
        "generated/out.py": "x = 1\n",
        "deep/top.py": "y = 2\n",
        "deep/er/bottom.py": "z = 3\n",
      });
    });

    afterAll(async () => {
      await removeRepository(root);
    });

    it("skips by pattern, gitignore, extension, size and depth", async () => {
      const config = { ...defaultConfig().graph, maxFileSize: 64, maxDepth: 1 };
      const { graph, report } = await new GraphBuilder(createDefaultRegistry(), config).build(root);

      const files = graph.entityList().filter((e) => e.kind === "file").map((e) => e.path);
      expect(files).toEqual(["deep/top.py", "small.py"]);
      const directories = graph.entityList().filter((e) => e.kind === "directory").map((e) => e.path);
      expect(directories).toEqual([".", "deep"]);
      expect(report.skipped).toEqual({ pattern: 1, gitignore: 1, extension: 2, size: 1, depth: 1, unreadable: 0 });
    });

    it("honours an extension allow-list", async () => {
      const config = { ...defaultConfig().graph, extensions: [".txt"] };
      const { graph, report } = await new GraphBuilder(createDefaultRegistry(), config).build(root);

      const files = graph.entityList().filter((e) => e.kind === "file").map((e) => e.path);
      expect(files).toEqual(["notes.txt"]);
      expect(report.filesParsed).toBe(0);
    });
  });

  describe("parse failures", () => {
    it("counts the failure and keeps the scanned file", async () => {
      const root = await createRepository({ "broken.css": "a { color: red", "ok.css": "a { color: red; }\n" });
      try {
        const { graph, report } = await new GraphBuilder(createDefaultRegistry()).build(root);
        expect(report.filesFailed).toBe(1);
        expect(report.failures.map((f) => f.path)).toEqual(["broken.css"]);
        expect(graph.hasEntity("file:broken.css:broken.css:1")).toBe(true);
        expect(graph.hasEntity("style_rule:ok.css:a:1")).toBe(true);
      } finally {
        await removeRepository(root);
      }
    });

    it("treats syntax and encoding errors in code as failures", async () => {
      const root = await createRepository({
        "broken.py": "def broken(:\n    pass\n\n\nclass Foo(\n",
        "ok.py": "def fine():\n    return 1\n",
      });
      await writeFile(path.join(root, "latin.py"), Buffer.from([0x78, 0x20, 0x3d, 0x20, 0x22, 0xe9, 0xff, 0x22, 0x0a]));
      try {
        const { graph, report } = await new GraphBuilder(createDefaultRegistry()).build(root);
        expect(report.filesFailed).toBe(2);
        expect(report.failures.map((f) => f.path).sort()).toEqual(["broken.py", "latin.py"]);
        expect(report.failures.find((f) => f.path === "latin.py")?.errors).toEqual(["latin.py is not valid UTF-8"]);
        expect(graph.entityList().filter((e) => e.path === "broken.py").map((e) => e.kind)).toEqual(["file"]);
        expect(graph.hasEntity("function:ok.py:fine:1")).toBe(true);
      } finally {
        await removeRepository(root);
      }
    });
  });

  describe("rebuildFile", () => {
    let root: string;

    beforeAll(async () => {
      root = await createRepository(SCENARIO);
    });

    afterAll(async () => {
      await removeRepository(root);
    });

    it("re-analyses one file and leaves the previous graph untouched", async () => {
      const builder = new GraphBuilder(createDefaultRegistry());
      const { graph: previous } = await builder.build(root);
      const before = previous.toSnapshot();

      await writeFile(path.join(root, "b.py"), "def run():\n    return 2\n");
      const { graph, report } = await builder.rebuildFile(previous, root, "b.py");

      expect(previous.toSnapshot()).toEqual(before);
      expect(report.filesParsed).toBe(1);
      expect(graph.hasEntity("function:b.py:run:1")).toBe(true);
      expect(graph.hasEntity("function:b.py:run:4")).toBe(false);
      expect(nonContainment(graph)).toEqual([
        "file:c.md:c.md:1 documents file:a.py:a.py:1",
        "function:a.py:helper:8 calls class:a.py:Foo:1",
      ]);
    });

    it("drops deleted files and attaches files in new directories", async () => {
      const builder = new GraphBuilder(createDefaultRegistry());
      const { graph: previous } = await builder.build(root);

      await unlink(path.join(root, "c.md"));
      const withoutDoc = await builder.rebuildFile(previous, root, path.join(root, "c.md"));
      expect(withoutDoc.graph.entityList().some((e) => e.path === "c.md")).toBe(false);
      expect(withoutDoc.report.skipped.unreadable).toBe(1);

      await writeFiles(root, { "pkg/d.py": "from a import Foo\n" });
      const { graph } = await builder.rebuildFile(withoutDoc.graph, root, "pkg/d.py");
      const rootId = `directory:.:${path.basename(root)}:1`;
      expect(graph.getRelationship(`${rootId} -contains-> directory:pkg:pkg:1`)).toBeDefined();
      expect(graph.getRelationship("directory:pkg:pkg:1 -contains-> file:pkg/d.py:d.py:1")).toBeDefined();
      expect(graph.getRelationship("file:pkg/d.py:d.py:1 -imports-> file:a.py:a.py:1")).toBeDefined();
    });
  });
});
