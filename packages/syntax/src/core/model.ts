/**
 * Entity and relationship model shared by every layer.
 */

import path from "node:path";

export const ENTITY_KINDS = [
  "directory",
  "file",
  "module",
  "class",
  "function",
  "method",
  "variable",
  "constant",
  "import",
  "interface",
  "enum",
  // Markup
  "heading",
  "link",
  "code_block",
  "element",
  "style_rule",
] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

export const RELATIONSHIP_KINDS = [
  "contains",
  "imports",
  "inherits",
  "implements",
  "calls",
  "uses",
  "references",
  "styles",
  "scripts",
  "documents",
  "depends_on",
] as const;

export type RelationshipKind = (typeof RELATIONSHIP_KINDS)[number];

const entityKindNames: ReadonlySet<string> = new Set(ENTITY_KINDS);

export function isEntityKind(value: string): value is EntityKind {
  return entityKindNames.has(value);
}

/** JSON-safe metadata values. */
export type MetadataValue = string | number | boolean | null | string[];
export type Metadata = Record<string, MetadataValue>;

/**
 * A located, typed piece of source structure.
 * Lines are 1-indexed and inclusive.
 */
export interface Entity {
  id: string;
  kind: EntityKind;
  /** Repository-relative POSIX path; "." for the repository root. */
  path: string;
  name: string;
  startLine: number;
  endLine: number;
  docstring?: string;
  content?: string;
  metadata: Metadata;
  /** Opaque vector carried through for callers that attach embeddings. */
  embedding?: number[];
}

export interface Relationship {
  id: string;
  kind: RelationshipKind;
  source: string;
  target: string;
  metadata: Metadata;
  /** 0..1 */
  confidence: number;
}

export function entityId(kind: EntityKind, filePath: string, name: string, startLine: number): string {
  return `${kind}:${filePath}:${name}:${startLine}`;
}

export function relationshipId(source: string, kind: RelationshipKind, target: string): string {
  return `${source} -${kind}-> ${target}`;
}

export interface EntityInit {
  kind: EntityKind;
  path: string;
  name: string;
  startLine: number;
  endLine: number;
  docstring?: string;
  content?: string;
  metadata?: Metadata;
}

export function createEntity(init: EntityInit): Entity {
  const entity: Entity = {
    id: entityId(init.kind, init.path, init.name, init.startLine),
    kind: init.kind,
    path: init.path,
    name: init.name,
    startLine: init.startLine,
    endLine: init.endLine,
    metadata: init.metadata ?? {},
  };
  if (init.docstring) entity.docstring = init.docstring;
  if (init.content) entity.content = init.content;
  return entity;
}

export function createRelationship(
  source: string,
  kind: RelationshipKind,
  target: string,
  options: { confidence?: number; metadata?: Metadata } = {}
): Relationship {
  return {
    id: relationshipId(source, kind, target),
    kind,
    source,
    target,
    metadata: options.metadata ?? {},
    confidence: options.confidence ?? 1,
  };
}

/**
 * Why an entity fails the parser post-condition, or null when it is valid.
 */
export function entityDefect(entity: Entity): string | null {
  if (entity.name.trim() === "") return "empty name";
  if (entity.path.trim() === "") return "empty path";
  if (!Number.isInteger(entity.startLine) || entity.startLine < 1) return "invalid start line";
  if (!Number.isInteger(entity.endLine) || entity.endLine < entity.startLine) return "end line before start line";
  return null;
}

export function stringList(metadata: Metadata, key: string): string[] {
  const value = metadata[key];
  return Array.isArray(value) ? value : [];
}

export function stringValue(metadata: Metadata, key: string): string | undefined {
  const value = metadata[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * Repository-relative POSIX path of a file. Paths outside the root are kept
 * absolute.
 */
export function toRepoPath(rootPath: string, filePath: string): string {
  const relative = path.relative(rootPath, filePath);
  if (relative === "") return ".";
  if (relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return filePath.split(path.sep).join("/");
  }
  return relative.split(path.sep).join("/");
}

/** Lower-cased extension including the dot, "" when there is none. */
export function extensionOf(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

/** Code symbol kinds that can own methods and be targets of calls. */
export const SYMBOL_KINDS: ReadonlySet<EntityKind> = new Set<EntityKind>([
  "class",
  "function",
  "method",
  "interface",
  "enum",
  "module",
]);

/**
 * Summary used in search results.
 */
export interface EntitySummary {
  name: string;
  kind: EntityKind;
  path: string;
  startLine: number;
  endLine: number;
  docstring?: string;
}

export function summarize(entity: Entity): EntitySummary {
  const summary: EntitySummary = {
    name: entity.name,
    kind: entity.kind,
    path: entity.path,
    startLine: entity.startLine,
    endLine: entity.endLine,
  };
  if (entity.docstring) summary.docstring = entity.docstring;
  return summary;
}
