import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { defaultConfig, type RepographConfig } from "@repograph/core";

export async function createRepository(files: Record<string, string>): Promise<string> {
  const root = await mkdtemp(path.join(os.tmpdir(), "repograph-search-"));
  await writeFiles(root, files);
  return root;
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, ...relativePath.split("/"));
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

export async function removeDirectory(directory: string): Promise<void> {
  await rm(directory, { recursive: true, force: true });
}

export async function createCacheDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "repograph-cache-"));
}

/** Default configuration with the cache redirected and graph limits overridden. */
export function testConfig(cacheDir: string, graph: Partial<RepographConfig["graph"]> = {}): RepographConfig {
  const defaults = defaultConfig();
  return { ...defaults, cacheDir, graph: { ...defaults.graph, ...graph } };
}

export const SCENARIO: Record<string, string> = {
  "a.py": [
    "class Foo:",
    '    """A foo."""',
    "",
    "    def bar(self):",
    "        return 1",
    "",
    "",
    "def helper():",
    "    return Foo()",
    "",
  ].join("\n"),
  "b.py": ["from a import Foo", "", "", "def run():", "    return Foo().bar()", ""].join("\n"),
  "c.md": ["# Notes", "", "See `a.py` for the Foo class.", ""].join("\n"),
};

export const FOO = "class:a.py:Foo:1";
export const BAR = "method:a.py:bar:4";
export const HELPER = "function:a.py:helper:8";
export const RUN = "function:b.py:run:4";
export const FILE_A = "file:a.py:a.py:1";
