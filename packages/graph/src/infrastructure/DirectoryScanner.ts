/**
 * Walks a repository into directory and file entities joined by `contains`.
 */

import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { Minimatch } from "minimatch";
import { Err, Ok, createLogger, tryCatchAsync, type GraphConfig, type Result } from "@repograph/core";
import {
  createEntity,
  createRelationship,
  extensionOf,
  toRepoPath,
  type Entity,
  type Relationship,
} from "@repograph/syntax";

import { emptySkipCounts, type SkipReason } from "../core/model.js";

const log = createLogger("scanner");

export interface ScannerOptions {
  /** Allowed extensions, lower-case with the dot. */
  extensions: readonly string[];
  skipPatterns: readonly string[];
  respectGitignore: boolean;
  maxDepth: number;
  maxFileSize: number;
}

export interface ScannedFile {
  absolutePath: string;
  /** Repository-relative POSIX path. */
  path: string;
  size: number;
  entityId: string;
}

export interface ScanResult {
  entities: Entity[];
  relationships: Relationship[];
  files: ScannedFile[];
  skipped: Record<SkipReason, number>;
}

export function scannerOptions(config: GraphConfig, supportedExtensions: readonly string[]): ScannerOptions {
  return {
    extensions: (config.extensions ?? supportedExtensions).map((extension) => extension.toLowerCase()),
    skipPatterns: config.skipPatterns,
    respectGitignore: config.respectGitignore,
    maxDepth: config.maxDepth,
    maxFileSize: config.maxFileSize,
  };
}

export function directoryEntity(rootPath: string, relativeDir: string): Entity {
  const name = relativeDir === "." ? path.basename(path.resolve(rootPath)) || "." : path.posix.basename(relativeDir);
  return createEntity({ kind: "directory", path: relativeDir, name, startLine: 1, endLine: 1 });
}

export function fileEntity(relativePath: string, size: number): Entity {
  return createEntity({
    kind: "file",
    path: relativePath,
    name: path.posix.basename(relativePath),
    startLine: 1,
    endLine: 1,
    metadata: { size, extension: extensionOf(relativePath) },
  });
}

function compile(patterns: readonly string[]): Minimatch[] {
  return patterns
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern !== "")
    .map((pattern) => new Minimatch(pattern, { dot: true, matchBase: true }));
}

/**
 * Patterns from the root `.gitignore`. Negations are not supported and are
 * ignored.
 */
export async function readGitignore(rootPath: string): Promise<string[]> {
  const read = await tryCatchAsync(() => readFile(path.join(rootPath, ".gitignore"), "utf-8"));
  if (!read.ok) return [];
  return read.value
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#") && !line.startsWith("!"))
    .map((line) => line.replace(/^\//, "").replace(/\/$/, ""))
    .filter((line) => line !== "");
}

function depthOf(relativeDir: string): number {
  return relativeDir === "." ? 0 : relativeDir.split("/").length;
}

export class DirectoryScanner {
  private readonly skipMatchers: Minimatch[];
  private readonly extensions: ReadonlySet<string>;

  constructor(private readonly options: ScannerOptions) {
    this.skipMatchers = compile(options.skipPatterns);
    this.extensions = new Set(options.extensions);
  }

  /**
   * Walk `rootPath` depth-first in name order. Parents always precede their
   * children in the returned entity list.
   */
  async scan(rootPath: string): Promise<ScanResult> {
    const root = path.resolve(rootPath);
    const ignoreMatchers = this.options.respectGitignore ? compile(await readGitignore(root)) : [];
    const result: ScanResult = { entities: [], relationships: [], files: [], skipped: emptySkipCounts() };

    const rootEntity = directoryEntity(root, ".");
    result.entities.push(rootEntity);
    await this.walk(root, root, rootEntity, ignoreMatchers, result);

    log.debug(`Scanned ${result.files.length} files under ${root}`, { skipped: result.skipped });
    return result;
  }

  private async walk(
    root: string,
    directory: string,
    parent: Entity,
    ignoreMatchers: Minimatch[],
    result: ScanResult
  ): Promise<void> {
    const listing = await tryCatchAsync(() => readdir(directory, { withFileTypes: true }));
    if (!listing.ok) {
      log.warn(`Cannot read directory ${directory}: ${listing.error.message}`);
      result.skipped.unreadable++;
      return;
    }

    const entries = listing.value.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const absolutePath = path.join(directory, entry.name);
      const relativePath = toRepoPath(root, absolutePath);

      if (this.skipMatchers.some((matcher) => matcher.match(relativePath))) {
        result.skipped.pattern++;
        continue;
      }
      if (ignoreMatchers.some((matcher) => matcher.match(relativePath))) {
        result.skipped.gitignore++;
        continue;
      }

      if (entry.isDirectory()) {
        if (depthOf(relativePath) > this.options.maxDepth) {
          result.skipped.depth++;
          continue;
        }
        const child = directoryEntity(root, relativePath);
        result.entities.push(child);
        result.relationships.push(createRelationship(parent.id, "contains", child.id));
        await this.walk(root, absolutePath, child, ignoreMatchers, result);
        continue;
      }

      if (!entry.isFile()) continue;

      const checked = await this.checkFile(absolutePath, relativePath);
      if (!checked.ok) {
        result.skipped[checked.error]++;
        continue;
      }
      const file = fileEntity(relativePath, checked.value);
      result.entities.push(file);
      result.relationships.push(createRelationship(parent.id, "contains", file.id));
      result.files.push({ absolutePath, path: relativePath, size: checked.value, entityId: file.id });
    }
  }

  private async checkFile(absolutePath: string, relativePath: string): Promise<Result<number, SkipReason>> {
    if (!this.extensions.has(extensionOf(relativePath))) {
      return Err<SkipReason>("extension");
    }
    const info = await tryCatchAsync(() => stat(absolutePath));
    if (!info.ok) {
      return Err<SkipReason>("unreadable");
    }
    if (info.value.size > this.options.maxFileSize) {
      log.debug(`Skipping ${relativePath}: ${info.value.size} bytes`);
      return Err<SkipReason>("size");
    }
    return Ok(info.value.size);
  }

  /**
   * Apply the same filters a scan would to one file, including every
   * directory above it.
   */
  async inspect(rootPath: string, filePath: string): Promise<Result<ScannedFile, SkipReason>> {
    const root = path.resolve(rootPath);
    const absolutePath = path.resolve(root, filePath);
    const relativePath = toRepoPath(root, absolutePath);
    if (relativePath.startsWith("/") || relativePath === ".") {
      return Err<SkipReason>("unreadable");
    }

    const ignoreMatchers = this.options.respectGitignore ? compile(await readGitignore(root)) : [];
    const segments = relativePath.split("/");
    for (let i = 1; i <= segments.length; i++) {
      const prefix = segments.slice(0, i).join("/");
      if (this.skipMatchers.some((matcher) => matcher.match(prefix))) return Err<SkipReason>("pattern");
      if (ignoreMatchers.some((matcher) => matcher.match(prefix))) return Err<SkipReason>("gitignore");
    }
    if (segments.length - 1 > this.options.maxDepth) {
      return Err<SkipReason>("depth");
    }

    const checked = await this.checkFile(absolutePath, relativePath);
    if (!checked.ok) return checked;
    return Ok({
      absolutePath,
      path: relativePath,
      size: checked.value,
      entityId: fileEntity(relativePath, checked.value).id,
    });
  }
}
