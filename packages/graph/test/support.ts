import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

/**
 * Write `files` (repository-relative POSIX path to content) under a fresh
 * temporary directory and return its path.
 */
export async function createRepository(files: Record<string, string>): Promise<string> {
  const root = await mkdtemp(path.join(os.tmpdir(), "repograph-graph-"));
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

export async function removeRepository(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
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
