/**
 * Read-only lookup and traversal over a built graph.
 *
 * Built once per graph. Name, kind and path lookups are map reads; every
 * traversal keeps a visited set, so cycles terminate.
 */

import {
  SYMBOL_KINDS,
  type Entity,
  type EntityKind,
  type Relationship,
  type RelationshipKind,
} from "@repograph/syntax";

import { KnowledgeGraph } from "../core/KnowledgeGraph.js";
import { byLocation, byScoreThenId, type Direction, type GraphStats, type GraphView, type ScoredId } from "../core/model.js";
import { similarityRatio } from "../core/similarity.js";

export type RelationshipGroups = Partial<Record<RelationshipKind, string[]>>;

/** Name score given to a query contained in a longer name. */
const SUBSTRING_SCORE = 0.8;
/** Non-containment degree at which connectivity saturates. */
const CONNECTIVITY_SATURATION = 5;

function kindWeight(kind: EntityKind): number {
  if (SYMBOL_KINDS.has(kind)) return 1.0;
  if (kind === "file") return 0.9;
  return 0.7;
}

function push<K>(map: Map<K, string[]>, key: K, id: string): void {
  const list = map.get(key);
  if (list) {
    list.push(id);
  } else {
    map.set(key, [id]);
  }
}


export class GraphIndex {
  private readonly names = new Map<string, string[]>();
  private readonly kinds = new Map<EntityKind, string[]>();
  private readonly paths = new Map<string, string>();

  constructor(readonly graph: GraphView) {
    for (const entity of graph.entityList().sort(byLocation)) {
      push(this.names, entity.name, entity.id);
      push(this.kinds, entity.kind, entity.id);
      if (entity.kind === "file" || entity.kind === "directory") {
        this.paths.set(entity.path, entity.id);
      }
    }
  }

  entity(id: string): Entity | undefined {
    return this.graph.getEntity(id);
  }

  // --- Lookups ---

  /** Exact, case-sensitive name match. */
  byName(name: string): string[] {
    return [...(this.names.get(name) ?? [])];
  }

  byKind(kind: EntityKind): string[] {
    return [...(this.kinds.get(kind) ?? [])];
  }

  /** Directory or file entity at a repository-relative path. */
  byPath(filePath: string): string | undefined {
    return this.paths.get(filePath);
  }

  /**
   * Entities whose lower-cased name is at least `threshold` similar to the
   * lower-cased query, best first.
   */
  fuzzyByName(query: string, threshold = 0.8): ScoredId[] {
    const needle = query.toLowerCase();
    const results: ScoredId[] = [];
    for (const [name, ids] of this.names) {
      const score = similarityRatio(needle, name.toLowerCase());
      if (score < threshold) continue;
      for (const id of ids) results.push({ id, score });
    }
    return results.sort(byScoreThenId);
  }

  // --- Neighbourhood ---

  neighbors(id: string, kind?: RelationshipKind, direction: Direction = "both"): string[] {
    const found = new Set<string>();
    if (direction !== "incoming") {
      for (const relationship of this.graph.outgoingOf(id)) {
        if (!kind || relationship.kind === kind) found.add(relationship.target);
      }
    }
    if (direction !== "outgoing") {
      for (const relationship of this.graph.incomingOf(id)) {
        if (!kind || relationship.kind === kind) found.add(relationship.source);
      }
    }
    return this.inSourceOrder(found);
  }

  /** Outgoing non-containment neighbours grouped by relationship kind. */
  dependencies(id: string): RelationshipGroups {
    return this.groupByKind(this.graph.outgoingOf(id), "target");
  }

  /** Incoming non-containment neighbours grouped by relationship kind. */
  dependents(id: string): RelationshipGroups {
    return this.groupByKind(this.graph.incomingOf(id), "source");
  }

  contains(id: string): string[] {
    return this.neighbors(id, "contains", "outgoing");
  }

  containedBy(id: string): string[] {
    return this.neighbors(id, "contains", "incoming");
  }

  /**
   * Shortest chain of ids from `from` to `to` following outgoing edges, or
   * null when none has at most `maxLength` hops.
   */
  shortestPath(from: string, to: string, maxLength = 5): string[] | null {
    if (!this.graph.hasEntity(from) || !this.graph.hasEntity(to)) return null;
    if (from === to) return [from];

    const previous = new Map<string, string>();
    const visited = new Set<string>([from]);
    let frontier = [from];

    for (let depth = 1; depth <= maxLength && frontier.length > 0; depth++) {
      const next: string[] = [];
      for (const id of frontier) {
        for (const relationship of this.graph.outgoingOf(id)) {
          const target = relationship.target;
          if (visited.has(target)) continue;
          visited.add(target);
          previous.set(target, id);
          if (target === to) {
            const path = [to];
            let step = previous.get(to);
            while (step !== undefined) {
              path.unshift(step);
              step = previous.get(step);
            }
            return path;
          }
          next.push(target);
        }
      }
      frontier = next;
    }
    return null;
  }

  /**
   * Frozen graph of the selected entities and the relationships among them.
   * Unknown ids are ignored.
   */
  subgraph(ids: readonly string[], includeNeighbors = false): KnowledgeGraph {
    const selected = new Set(ids.filter((id) => this.graph.hasEntity(id)));
    if (includeNeighbors) {
      for (const id of [...selected]) {
        for (const neighbor of this.neighbors(id)) selected.add(neighbor);
      }
    }

    const graph = new KnowledgeGraph();
    for (const id of selected) {
      const entity = this.graph.getEntity(id);
      if (entity) graph.addEntity(entity);
    }
    for (const id of selected) {
      for (const relationship of this.graph.outgoingOf(id)) {
        if (selected.has(relationship.target)) graph.addRelationship(relationship);
      }
    }
    return graph.freeze();
  }

  /**
   * Every entity reached through `contains` from a file entity, ordered by
   * start line. Empty when the path is not an indexed file.
   */
  entitiesInFile(filePath: string): string[] {
    const fileId = this.paths.get(filePath);
    if (!fileId || this.graph.getEntity(fileId)?.kind !== "file") return [];

    const visited = new Set<string>([fileId]);
    const stack = [fileId];
    const found: Entity[] = [];
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      for (const child of this.contains(id)) {
        if (visited.has(child)) continue;
        visited.add(child);
        const entity = this.graph.getEntity(child);
        if (entity) found.push(entity);
        stack.push(child);
      }
    }

    return found
      .sort((a, b) => a.startLine - b.startLine || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map((entity) => entity.id);
  }

  private groupByKind(relationships: readonly Relationship[], endpoint: "source" | "target"): RelationshipGroups {
    const found = new Map<RelationshipKind, Set<string>>();
    for (const relationship of relationships) {
      if (relationship.kind === "contains") continue;
      const ids = found.get(relationship.kind) ?? new Set<string>();
      ids.add(relationship[endpoint]);
      found.set(relationship.kind, ids);
    }
    const groups: RelationshipGroups = {};
    for (const kind of [...found.keys()].sort()) {
      groups[kind] = this.inSourceOrder(found.get(kind) ?? []);
    }
    return groups;
  }

  private inSourceOrder(ids: Iterable<string>): string[] {
    const entities: Entity[] = [];
    for (const id of ids) {
      const entity = this.graph.getEntity(id);
      if (entity) entities.push(entity);
    }
    return entities.sort(byLocation).map((entity) => entity.id);
  }

  // --- Relevance ---

  /**
   * Graph-mode relevance: name match blended with kind and connectivity.
   */
  searchRelated(query: string, maxResults = 10, threshold = 0.6): ScoredId[] {
    const needle = query.trim().toLowerCase();
    if (needle === "" || maxResults <= 0) return [];

    const results: ScoredId[] = [];
    for (const [name, ids] of this.names) {
      const lower = name.toLowerCase();
      let nameScore: number;
      if (lower === needle) {
        nameScore = 1.0;
      } else if (lower.includes(needle)) {
        nameScore = Math.max(SUBSTRING_SCORE, similarityRatio(needle, lower));
      } else {
        const ratio = similarityRatio(needle, lower);
        if (ratio < threshold) continue;
        nameScore = ratio;
      }

      for (const id of ids) {
        const entity = this.graph.getEntity(id);
        if (!entity) continue;
        const structural = 0.5 * kindWeight(entity.kind) + 0.5 * this.connectivity(id);
        results.push({ id, score: 0.8 * nameScore + 0.2 * structural });
      }
    }
    return results.sort(byScoreThenId).slice(0, maxResults);
  }

  private connectivity(id: string): number {
    const degree =
      this.graph.outgoingOf(id).filter((r) => r.kind !== "contains").length +
      this.graph.incomingOf(id).filter((r) => r.kind !== "contains").length;
    return Math.min(1, degree / CONNECTIVITY_SATURATION);
  }

  stats(): GraphStats {
    const entitiesByKind: GraphStats["entitiesByKind"] = {};
    for (const [kind, ids] of this.kinds) entitiesByKind[kind] = ids.length;

    const relationshipsByKind: GraphStats["relationshipsByKind"] = {};
    for (const relationship of this.graph.relationshipList()) {
      relationshipsByKind[relationship.kind] = (relationshipsByKind[relationship.kind] ?? 0) + 1;
    }

    return {
      entities: this.graph.entityCount,
      relationships: this.graph.relationshipCount,
      files: this.kinds.get("file")?.length ?? 0,
      entitiesByKind,
      relationshipsByKind,
    };
  }
}
