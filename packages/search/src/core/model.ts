/**
 * Query-side types: modes, hits and entity details.
 */

import type { Entity, EntitySummary } from "@repograph/syntax";
import type { GraphStats, RelationshipGroups } from "@repograph/graph";

export const SEARCH_MODES = ["text", "graph", "structure", "hybrid"] as const;
export type SearchMode = (typeof SEARCH_MODES)[number];

export const RELATION_FILTERS = ["all", "dependencies", "dependents", "contained", "container"] as const;
export type RelationFilter = (typeof RELATION_FILTERS)[number];

/** Where a hit came from: a search mode, a kind listing or a neighbourhood walk. */
export type HitSource = SearchMode | "kind" | "related";

const searchModeNames: ReadonlySet<string> = new Set(SEARCH_MODES);
const relationFilterNames: ReadonlySet<string> = new Set(RELATION_FILTERS);

export function isSearchMode(value: string): value is SearchMode {
  return searchModeNames.has(value);
}

export function isRelationFilter(value: string): value is RelationFilter {
  return relationFilterNames.has(value);
}

export interface SearchHit {
  entityId: string;
  score: number;
  mode: HitSource;
  summary: EntitySummary;
}

/**
 * Ranked hits. An unsupported mode, kind or relation yields no hits and a
 * diagnostic instead of an exception.
 */
export interface SearchOutcome {
  results: SearchHit[];
  diagnostic?: string;
}

export interface EntityDetails {
  attributes: Entity;
  dependencies: RelationshipGroups;
  dependents: RelationshipGroups;
  contained: string[];
  container: string | null;
}

export interface IndexStats extends GraphStats {
  rootPath: string;
  documents: number;
}

export function unsupported(diagnostic: string): SearchOutcome {
  return { results: [], diagnostic };
}
