import { readFile } from "node:fs/promises";
import path from "node:path";
import { createLogger, tryCatch, tryCatchAsync } from "@repograph/core";

import {
  createEntity,
  entityDefect,
  extensionOf,
  toRepoPath,
  type Entity,
  type EntityKind,
  type Metadata,
  type Relationship,
} from "../../core/model.js";
import {
  emptyOutput,
  type LanguageParser,
  type ParseOptions,
  type ParseOutput,
} from "../../core/ports/LanguageParser.js";

const log = createLogger("parser");

/** Characters of file content kept on the file entity. */
export const FILE_CONTENT_PREVIEW = 500;

const utf8 = new TextDecoder("utf-8", { fatal: true });

export interface SourceFile {
  absolutePath: string;
  /** Repository-relative POSIX path used on every entity of the file. */
  path: string;
  source: string;
}

/**
 * What a language extraction contributes on top of the file entity.
 */
export interface Extraction {
  entities: Entity[];
  relationships: Relationship[];
  /** Merged into the file entity's metadata (references, language facts). */
  fileMetadata?: Metadata;
  fileDocstring?: string;
}

export function countLines(source: string): number {
  if (source === "") return 1;
  const lines = source.split("\n").length;
  return Math.max(1, source.endsWith("\n") ? lines - 1 : lines);
}

/**
 * Shared parse pipeline: read, build the file entity, extract, validate.
 * Subclasses implement only `extract`.
 */
export abstract class BaseLanguageParser implements LanguageParser {
  abstract readonly language: string;
  abstract readonly extensions: readonly string[];
  protected abstract readonly kinds: readonly EntityKind[];

  canParse(filePath: string): boolean {
    return this.extensions.includes(extensionOf(filePath));
  }

  supportedKinds(): ReadonlySet<EntityKind> {
    return new Set<EntityKind>(["file", ...this.kinds]);
  }

  async parse(filePath: string, options: ParseOptions = {}): Promise<ParseOutput> {
    const absolutePath = path.resolve(filePath);
    const rootPath = options.rootPath ? path.resolve(options.rootPath) : path.dirname(absolutePath);
    const file: SourceFile = {
      absolutePath,
      path: toRepoPath(rootPath, absolutePath),
      source: "",
    };

    const read = await tryCatchAsync(() => readFile(absolutePath));
    if (!read.ok) {
      log.warn(`Cannot read ${file.path}: ${read.error.message}`);
      return emptyOutput([read.error.message]);
    }
    const decoded = tryCatch(() => utf8.decode(read.value));
    if (!decoded.ok) {
      const message = `${file.path} is not valid UTF-8`;
      log.warn(message);
      return emptyOutput([message]);
    }
    file.source = decoded.value;

    const extracted = await tryCatchAsync(async () => this.extract(file));
    if (!extracted.ok) {
      log.warn(`${this.language} parser failed on ${file.path}: ${extracted.error.message}`);
      return emptyOutput([extracted.error.message]);
    }

    const fileEntity = createEntity({
      kind: "file",
      path: file.path,
      name: path.posix.basename(file.path),
      startLine: 1,
      endLine: countLines(file.source),
      docstring: extracted.value.fileDocstring,
      content: file.source.slice(0, FILE_CONTENT_PREVIEW),
      metadata: { language: this.language, ...extracted.value.fileMetadata },
    });

    return this.validate(file, [fileEntity, ...extracted.value.entities], extracted.value.relationships);
  }

  protected abstract extract(file: SourceFile): Promise<Extraction> | Extraction;

  /**
   * Drop entities that break the location/name post-condition and
   * relationships left without an endpoint.
   */
  private validate(file: SourceFile, entities: Entity[], relationships: Relationship[]): ParseOutput {
    const kept = new Map<string, Entity>();
    let dropped = 0;

    for (const entity of entities) {
      const defect = entityDefect(entity);
      if (defect) {
        dropped++;
        log.debug(`Dropping ${entity.kind} in ${file.path}: ${defect}`);
        continue;
      }
      if (kept.has(entity.id)) {
        log.debug(`Duplicate entity ${entity.id} ignored`);
        continue;
      }
      kept.set(entity.id, entity);
    }

    const edges = new Map<string, Relationship>();
    for (const rel of relationships) {
      if (kept.has(rel.source) && kept.has(rel.target)) {
        edges.set(rel.id, rel);
      }
    }

    return { entities: [...kept.values()], relationships: [...edges.values()], errors: [], dropped };
  }
}
