/**
 * Text documents the lexical index is built from, one per entity.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import { tryCatchAsync } from "@repograph/core";
import { stringList, stringValue, type Entity } from "@repograph/syntax";

export interface TextDocument {
  id: string;
  text: string;
}

const COMMENT_PREFIXES = ["#", "//", "/*", "*", "<!--"];

/**
 * The first `maxLines` lines of a file, blank and comment lines removed,
 * joined with spaces.
 */
export function fileExcerpt(source: string, maxLines: number): string {
  return source
    .split(/\r?\n/)
    .slice(0, maxLines)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !COMMENT_PREFIXES.some((prefix) => line.startsWith(prefix)))
    .join(" ");
}

/**
 * Name, docstring and signature facts of an entity, plus `excerpt` for files.
 */
export function documentText(entity: Entity, excerpt?: string): string {
  const parts = [entity.name];
  if (entity.docstring) parts.push(entity.docstring);
  parts.push(...stringList(entity.metadata, "parameters"));
  const returns = stringValue(entity.metadata, "returns");
  if (returns) parts.push(returns);
  if (excerpt) parts.push(excerpt);
  return parts.join(" ");
}

export interface DocumentOptions {
  fileContentLines: number;
  /** Text to keep for an entity instead of recomputing it. */
  reuse?: (entity: Entity) => string | undefined;
}

/**
 * One document per entity, in entity order. File excerpts are read from
 * disk; a file that cannot be read falls back to the parser's content
 * snippet.
 */
export async function buildDocuments(
  entities: readonly Entity[],
  rootPath: string,
  options: DocumentOptions
): Promise<TextDocument[]> {
  const documents: TextDocument[] = [];
  for (const entity of entities) {
    const kept = options.reuse?.(entity);
    if (kept !== undefined) {
      documents.push({ id: entity.id, text: kept });
      continue;
    }
    if (entity.kind !== "file") {
      documents.push({ id: entity.id, text: documentText(entity) });
      continue;
    }
    const source = await tryCatchAsync(() => readFile(path.join(rootPath, entity.path), "utf-8"));
    const excerpt = fileExcerpt(source.ok ? source.value : entity.content ?? "", options.fileContentLines);
    documents.push({ id: entity.id, text: documentText(entity, excerpt) });
  }
  return documents;
}
