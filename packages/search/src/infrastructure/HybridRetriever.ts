/**
 * One query surface over the graph index and the BM25 index.
 */

import { defaultConfig, type RetrievalConfig } from "@repograph/core";
import { byScoreThenId, type GraphIndex, type RelationshipGroups, type ScoredId } from "@repograph/graph";
import { ENTITY_KINDS, isEntityKind, summarize, type Entity, type EntityKind } from "@repograph/syntax";

import {
  RELATION_FILTERS,
  SEARCH_MODES,
  isRelationFilter,
  isSearchMode,
  unsupported,
  type HitSource,
  type RelationFilter,
  type SearchHit,
  type SearchMode,
  type SearchOutcome,
} from "../core/model.js";
import { nameSegments, tokenize } from "../core/tokenize.js";
import type { Bm25Index } from "./Bm25Index.js";

/** Query words that steer structure mode toward entity kinds. */
const STRUCTURE_KEYWORDS: ReadonlyMap<string, readonly EntityKind[]> = new Map<string, readonly EntityKind[]>([
  ["file", ["file"]],
  ["module", ["file"]],
  ["script", ["file"]],
  ["class", ["class", "interface"]],
  ["object", ["class", "interface"]],
  ["type", ["class", "interface"]],
  ["function", ["function", "method"]],
  ["method", ["function", "method"]],
  ["def", ["function", "method"]],
]);

/** Structure-mode weight when the query names no kind. */
const UNSTEERED_WEIGHT = 0.5;

function flatten(groups: RelationshipGroups): string[] {
  return Object.values(groups).flatMap((ids) => ids ?? []);
}

export class HybridRetriever {
  constructor(
    readonly graphIndex: GraphIndex,
    readonly textIndex: Bm25Index,
    private readonly config: RetrievalConfig = defaultConfig().retrieval
  ) {}

  search(query: string, mode: string = "hybrid", topK: number = this.config.topK): SearchOutcome {
    if (!isSearchMode(mode)) {
      return unsupported(`Unsupported search mode "${mode}"; expected one of ${SEARCH_MODES.join(", ")}`);
    }
    return { results: this.hits(this.rank(query, mode, topK), mode) };
  }

  /** Scored ids for one mode, without summaries. */
  rank(query: string, mode: SearchMode, topK: number): ScoredId[] {
    if (topK <= 0) return [];
    switch (mode) {
      case "text":
        return this.textIndex.search(query, topK);
      case "graph":
        return this.graphIndex.searchRelated(query, topK, this.config.fuzzyThreshold);
      case "structure":
        return this.structureSearch(query, topK);
      case "hybrid":
        return this.hybridSearch(query, topK);
    }
  }

  /**
   * Text and graph candidates fused by id. An id both found gets the
   * agreement bonus on top of its weighted scores.
   */
  private hybridSearch(query: string, topK: number): ScoredId[] {
    const { weights } = this.config;
    const candidates = topK * 2;
    const combined = new Map<string, number>();

    for (const { id, score } of this.textIndex.search(query, candidates)) {
      combined.set(id, score * weights.text);
    }
    for (const { id, score } of this.graphIndex.searchRelated(query, candidates, this.config.fuzzyThreshold)) {
      const text = combined.get(id);
      combined.set(id, text === undefined ? score * weights.graph : text + score * weights.graph + weights.agreementBonus);
    }

    return [...combined]
      .map(([id, score]) => ({ id, score }))
      .sort(byScoreThenId)
      .slice(0, topK);
  }

  /**
   * Keyword-to-kind heuristic. The terms left after removing kind keywords
   * are matched against entity names: all contained scores 1.0, some
   * contained scores the matched share.
   */
  private structureSearch(query: string, topK: number): ScoredId[] {
    const kinds = new Set<EntityKind>();
    const terms: string[] = [];
    for (const term of tokenize(query)) {
      const steered = STRUCTURE_KEYWORDS.get(term);
      if (steered) {
        for (const kind of steered) kinds.add(kind);
      } else {
        terms.push(term);
      }
    }
    if (kinds.size === 0 && terms.length === 0) return [];

    const weight = kinds.size === 0 ? UNSTEERED_WEIGHT : 1.0;
    const candidates =
      kinds.size === 0 ? this.graphIndex.graph.entityList() : [...kinds].flatMap((kind) => this.entitiesOfKind(kind));

    const results: ScoredId[] = [];
    for (const entity of candidates) {
      const name = entity.name.toLowerCase();
      const share = terms.length === 0 ? 1 : terms.filter((term) => name.includes(term)).length / terms.length;
      if (share > 0) results.push({ id: entity.id, score: share * weight });
    }
    return results.sort(byScoreThenId).slice(0, topK);
  }

  /**
   * Entities of one kind. With a name filter, each whitespace-separated term
   * scores 1.0 when the name contains it and 0.5 when it only overlaps a
   * name segment; entities scoring zero are left out.
   */
  searchByKind(kind: string, nameFilter?: string, topK: number = this.config.topK): SearchOutcome {
    if (!isEntityKind(kind)) {
      return unsupported(`Unsupported entity kind "${kind}"; expected one of ${ENTITY_KINDS.join(", ")}`);
    }
    if (topK <= 0) return { results: [] };

    const terms = (nameFilter ?? "").toLowerCase().split(/\s+/).filter(Boolean);
    if (terms.length === 0) {
      const ids = this.graphIndex.byKind(kind).slice(0, topK);
      return { results: this.hits(ids.map((id) => ({ id, score: 1.0 })), "kind") };
    }

    const scored: ScoredId[] = [];
    for (const entity of this.entitiesOfKind(kind)) {
      const name = entity.name.toLowerCase();
      const segments = nameSegments(entity.name);
      let score = 0;
      for (const term of terms) {
        if (name.includes(term)) {
          score += 1.0;
        } else if (segments.some((segment) => segment.length > 1 && term.includes(segment))) {
          score += 0.5;
        }
      }
      if (score > 0) scored.push({ id: entity.id, score });
    }
    return { results: this.hits(scored.sort(byScoreThenId).slice(0, topK), "kind") };
  }

  /**
   * Neighbours of an entity selected by relation, de-duplicated in the order
   * dependencies, dependents, contained, container.
   */
  relatedEntities(id: string, relation: string = "all", maxResults: number = this.config.topK): SearchOutcome {
    if (!isRelationFilter(relation)) {
      return unsupported(`Unsupported relation "${relation}"; expected one of ${RELATION_FILTERS.join(", ")}`);
    }
    if (!this.graphIndex.graph.hasEntity(id)) {
      return unsupported(`Unknown entity ${id}`);
    }

    const related = new Set<string>();
    const wants = (filter: RelationFilter): boolean => relation === "all" || relation === filter;
    if (wants("dependencies")) {
      flatten(this.graphIndex.dependencies(id)).forEach((other) => related.add(other));
    }
    if (wants("dependents")) {
      flatten(this.graphIndex.dependents(id)).forEach((other) => related.add(other));
    }
    if (wants("contained")) {
      this.graphIndex.contains(id).forEach((other) => related.add(other));
    }
    if (wants("container")) {
      this.graphIndex.containedBy(id).forEach((other) => related.add(other));
    }

    const ids = [...related].slice(0, Math.max(0, maxResults));
    return { results: this.hits(ids.map((other) => ({ id: other, score: 1.0 })), "related") };
  }

  private entitiesOfKind(kind: EntityKind): Entity[] {
    return this.graphIndex.byKind(kind).flatMap((id) => {
      const entity = this.graphIndex.entity(id);
      return entity ? [entity] : [];
    });
  }

  private hits(scored: readonly ScoredId[], mode: HitSource): SearchHit[] {
    return scored.flatMap(({ id, score }) => {
      const entity = this.graphIndex.entity(id);
      return entity ? [{ entityId: id, score, mode, summary: summarize(entity) }] : [];
    });
  }
}
