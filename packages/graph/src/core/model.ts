/**
 * Graph-layer types: read-only graph view, snapshots, build phases and
 * reports.
 */

import type { Entity, EntityKind, Relationship, RelationshipKind } from "@repograph/syntax";

export type Direction = "outgoing" | "incoming" | "both";

/**
 * Read access shared by the draft graph and frozen snapshots.
 */
export interface GraphView {
  getEntity(id: string): Entity | undefined;
  hasEntity(id: string): boolean;
  getRelationship(id: string): Relationship | undefined;
  entityList(): Entity[];
  relationshipList(): Relationship[];
  outgoingOf(id: string): readonly Relationship[];
  incomingOf(id: string): readonly Relationship[];
  readonly entityCount: number;
  readonly relationshipCount: number;
}

/** Plain JSON form of a graph. */
export interface GraphSnapshot {
  version: 1;
  entities: Entity[];
  relationships: Relationship[];
}

export type BuildPhase =
  | "idle"
  | "scan_directory"
  | "parse_files"
  | "discover_relationships"
  | "materialize_graph"
  | "done";

export type SkipReason = "pattern" | "gitignore" | "extension" | "size" | "depth" | "unreadable";

export interface FileFailure {
  path: string;
  errors: string[];
}

export interface BuildReport {
  rootPath: string;
  filesScanned: number;
  filesParsed: number;
  filesFailed: number;
  failures: FileFailure[];
  skipped: Record<SkipReason, number>;
  /** Entities removed by parser post-validation. */
  entitiesDropped: number;
  /** Parser relationships whose endpoints were missing. */
  relationshipsRejected: number;
  relationshipsDiscovered: number;
  durationMs: number;
  phaseTimings: Partial<Record<BuildPhase, number>>;
}

export function emptySkipCounts(): Record<SkipReason, number> {
  return { pattern: 0, gitignore: 0, extension: 0, size: 0, depth: 0, unreadable: 0 };
}

export function emptyReport(rootPath: string): BuildReport {
  return {
    rootPath,
    filesScanned: 0,
    filesParsed: 0,
    filesFailed: 0,
    failures: [],
    skipped: emptySkipCounts(),
    entitiesDropped: 0,
    relationshipsRejected: 0,
    relationshipsDiscovered: 0,
    durationMs: 0,
    phaseTimings: {},
  };
}

export interface GraphStats {
  entities: number;
  relationships: number;
  files: number;
  entitiesByKind: Partial<Record<EntityKind, number>>;
  relationshipsByKind: Partial<Record<RelationshipKind, number>>;
}

/** An id with a relevance score in [0, 1]. */
export interface ScoredId {
  id: string;
  score: number;
}

/**
 * Descending by score, ties broken by id so equal inputs always rank the same.
 */
export function byScoreThenId(a: ScoredId, b: ScoredId): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Source order: path, then start line, then id. Lists the graph index hands
 * out use it, so a built graph and its reloaded snapshot agree.
 */
export function byLocation(a: Entity, b: Entity): number {
  if (a.path !== b.path) return a.path < b.path ? -1 : 1;
  if (a.startLine !== b.startLine) return a.startLine - b.startLine;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
