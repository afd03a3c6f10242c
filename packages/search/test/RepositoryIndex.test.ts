import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { access, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ConfigError, Result } from "@repograph/core";

import { RepositoryIndex } from "../src/infrastructure/RepositoryIndex.js";
import { BM25_FILE, GRAPH_FILE } from "../src/infrastructure/SnapshotStore.js";
import {
  BAR,
  FILE_A,
  FOO,
  HELPER,
  RUN,
  SCENARIO,
  createCacheDir,
  createRepository,
  removeDirectory,
  testConfig,
  writeFiles,
} from "./support.js";

function opened(result: Result<RepositoryIndex, ConfigError>): RepositoryIndex {
  if (!result.ok) throw result.error;
  return result.value;
}

describe("RepositoryIndex", () => {
  describe("a.py / b.py / c.md repository", () => {
    let root: string;
    let cacheDir: string;
    let index: RepositoryIndex;

    beforeAll(async () => {
      root = await createRepository(SCENARIO);
      cacheDir = await createCacheDir();
      index = opened(await RepositoryIndex.open(root, { config: testConfig(cacheDir) }));
    });

    afterAll(async () => {
      await removeDirectory(root);
      await removeDirectory(cacheDir);
    });

    it("ranks the Foo class first for a hybrid search", () => {
      const outcome = index.search("Foo", "hybrid", 5);
      expect(outcome.diagnostic).toBeUndefined();
      expect(outcome.results[0].entityId).toBe(FOO);
      expect(outcome.results[0].summary.docstring).toBe("A foo.");
      expect(outcome.results.length).toBeLessThanOrEqual(5);
    });

    it("lists the entities of a file by start line", () => {
      expect(index.entitiesInFile("a.py")).toEqual([FOO, BAR, HELPER]);
      expect(index.entitiesInFile(path.join(root, "a.py"))).toEqual([FOO, BAR, HELPER]);
      expect(index.entitiesInFile("missing.py")).toEqual([]);
    });

    it("describes an entity with its neighbourhood", () => {
      expect(index.entityDetails(FOO)).toEqual({
        attributes: index.entity(FOO),
        dependencies: {},
        dependents: { calls: [HELPER, RUN] },
        contained: [BAR],
        container: FILE_A,
      });
      expect(index.entityDetails("nope")).toBeUndefined();
    });

    it("finds related entities and entities by kind", () => {
      expect(index.relatedEntities(RUN, "dependencies").results.map((hit) => hit.entityId)).toEqual([FOO, BAR]);
      expect(index.searchByKind("method").results.map((hit) => hit.entityId)).toEqual([BAR]);
    });

    it("reports counts and the build", () => {
      const stats = index.stats();
      expect(stats.rootPath).toBe(root);
      expect(stats.files).toBe(3);
      expect(stats.entities).toBe(10);
      expect(stats.documents).toBe(10);
      expect(index.report()?.filesParsed).toBe(3);
    });

    it("writes both snapshots to the cache", async () => {
      const directory = await index.save();
      await expect(access(path.join(directory, GRAPH_FILE))).resolves.toBeUndefined();
      await expect(access(path.join(directory, BM25_FILE))).resolves.toBeUndefined();
    });

    it("reopens from the cache with identical results", async () => {
      const reopened = opened(await RepositoryIndex.open(root, { config: testConfig(cacheDir) }));
      expect(reopened.report()).toBeUndefined();
      expect(reopened.stats()).toEqual(index.stats());
      for (const mode of ["text", "graph", "structure", "hybrid"]) {
        expect(reopened.search("Foo bar", mode, 10)).toEqual(index.search("Foo bar", mode, 10));
      }
      for (const kind of ["function", "method", "class", "file"]) {
        expect(reopened.searchByKind(kind, undefined, 1)).toEqual(index.searchByKind(kind, undefined, 1));
      }
      for (const relation of ["all", "dependencies", "dependents", "contained", "container"]) {
        expect(reopened.relatedEntities(FILE_A, relation, 1)).toEqual(index.relatedEntities(FILE_A, relation, 1));
        expect(reopened.relatedEntities(FOO, relation)).toEqual(index.relatedEntities(FOO, relation));
      }
    });

    it("rebuilds when asked to ignore the cache", async () => {
      const rebuilt = opened(await RepositoryIndex.open(root, { config: testConfig(cacheDir), forceRebuild: true }));
      expect(rebuilt.report()?.filesScanned).toBe(3);
    });
  });

  describe("refreshFile", () => {
    let root: string;
    let cacheDir: string;
    let index: RepositoryIndex;

    beforeAll(async () => {
      root = await createRepository(SCENARIO);
      cacheDir = await createCacheDir();
      index = opened(await RepositoryIndex.open(root, { config: testConfig(cacheDir) }));
    });

    afterAll(async () => {
      await removeDirectory(root);
      await removeDirectory(cacheDir);
    });

    it("picks up a changed file", async () => {
      await writeFiles(root, {
        "b.py": ["from a import Foo", "", "", "def run():", "    return Foo().bar()", "", "", "def stop():", "    return None", ""].join("\n"),
      });
      const before = index.stats().entities;
      const report = await index.refreshFile("b.py");

      expect(report.filesParsed).toBe(1);
      expect(index.entitiesInFile("b.py")).toEqual(["import:b.py:a:1", RUN, "function:b.py:stop:8"]);
      expect(index.stats().entities).toBe(before + 1);
      expect(index.search("stop", "text").results.map((hit) => hit.entityId)).toContain("function:b.py:stop:8");
      expect(index.entityDetails(FOO)?.dependents).toEqual({ calls: [HELPER, RUN] });
    });

    it("drops a deleted file and its relationships", async () => {
      await rm(path.join(root, "c.md"));
      await index.refreshFile("c.md");

      expect(index.entitiesInFile("c.md")).toEqual([]);
      expect(index.entity("file:c.md:c.md:1")).toBeUndefined();
      expect(index.entityDetails(FILE_A)?.dependents).toEqual({ imports: ["file:b.py:b.py:1"] });
    });

    it("serves the refreshed state after a reopen", async () => {
      const reopened = opened(await RepositoryIndex.open(root, { config: testConfig(cacheDir) }));
      expect(reopened.entitiesInFile("b.py")).toEqual(["import:b.py:a:1", RUN, "function:b.py:stop:8"]);
      expect(reopened.entity("file:c.md:c.md:1")).toBeUndefined();
    });
  });

  describe("skipped files", () => {
    let root: string;
    let cacheDir: string;
    let index: RepositoryIndex;

    beforeAll(async () => {
      root = await createRepository({
        "small.py": "def tiny():\n    return 1\n",
        "big.py": "def huge():\n" + "    value = 1\n".repeat(20),
        "vendor/lib.py": "def vendored():\n    pass\n",
      });
      cacheDir = await createCacheDir();
      const config = testConfig(cacheDir, { maxFileSize: 64, skipPatterns: ["vendor"] });
      index = opened(await RepositoryIndex.open(root, { config }));
    });

    afterAll(async () => {
      await removeDirectory(root);
      await removeDirectory(cacheDir);
    });

    it("indexes nothing from oversized or skipped files", () => {
      expect(index.stats().files).toBe(1);
      expect(index.entitiesInFile("big.py")).toEqual([]);
      expect(index.entitiesInFile("vendor/lib.py")).toEqual([]);
      expect(index.search("huge", "text").results).toEqual([]);
      expect(index.search("vendored", "hybrid").results).toEqual([]);
      expect(index.searchByKind("function").results.map((hit) => hit.entityId)).toEqual(["function:small.py:tiny:1"]);
      expect(index.report()?.skipped.size).toBe(1);
      expect(index.report()?.skipped.pattern).toBe(1);
    });
  });

  describe("source order", () => {
    let root: string;
    let cacheDir: string;

    beforeAll(async () => {
      root = await createRepository({
        "m.py": ["def zeta():", "    return 1", "", "", "def alpha():", "    return zeta()", ""].join("\n"),
      });
      cacheDir = await createCacheDir();
    });

    afterAll(async () => {
      await removeDirectory(root);
      await removeDirectory(cacheDir);
    });

    it("truncates kind and relation lists the same way before and after a reload", async () => {
      const built = opened(await RepositoryIndex.open(root, { config: testConfig(cacheDir) }));
      const reloaded = opened(await RepositoryIndex.open(root, { config: testConfig(cacheDir) }));
      expect(reloaded.report()).toBeUndefined();

      const firstFunction = (repository: RepositoryIndex): string[] =>
        repository.searchByKind("function", undefined, 1).results.map((hit) => hit.entityId);
      expect(firstFunction(built)).toEqual(["function:m.py:zeta:1"]);
      expect(firstFunction(reloaded)).toEqual(["function:m.py:zeta:1"]);

      const firstContained = (repository: RepositoryIndex): string[] =>
        repository.relatedEntities("file:m.py:m.py:1", "contained", 1).results.map((hit) => hit.entityId);
      expect(firstContained(built)).toEqual(["function:m.py:zeta:1"]);
      expect(firstContained(reloaded)).toEqual(["function:m.py:zeta:1"]);
    });
  });

  describe("unwritable cache", () => {
    let root: string;
    let blocker: string;

    beforeAll(async () => {
      root = await createRepository(SCENARIO);
      blocker = await createCacheDir();
      await writeFile(path.join(blocker, "not-a-directory"), "");
    });

    afterAll(async () => {
      await removeDirectory(root);
      await removeDirectory(blocker);
    });

    it("still serves the built index when snapshots cannot be saved", async () => {
      const cacheDir = path.join(blocker, "not-a-directory", "cache");
      const index = opened(await RepositoryIndex.open(root, { config: testConfig(cacheDir) }));

      expect(index.stats().entities).toBe(10);
      expect(index.search("Foo", "hybrid", 5).results[0].entityId).toBe(FOO);
      await expect(index.save()).rejects.toThrow();

      await writeFiles(root, { "b.py": "def run():\n    return 2\n" });
      const report = await index.refreshFile("b.py");
      expect(report.filesParsed).toBe(1);
      expect(index.entitiesInFile("b.py")).toEqual(["function:b.py:run:1"]);
    });
  });
});
