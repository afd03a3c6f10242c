/**
 * Entity arena with outgoing and incoming adjacency lists.
 *
 * The graph is a multigraph: one pair of entities may be linked by several
 * relationships of different kinds. Relationship ids are deterministic, so
 * adding the same relationship twice keeps the first copy. After `freeze()`
 * every mutating call throws.
 */

import { Err, FrozenGraphError, GraphIntegrityError, Ok, type Result } from "@repograph/core";
import type { Entity, Relationship } from "@repograph/syntax";

import type { GraphSnapshot, GraphView } from "./model.js";

export class KnowledgeGraph implements GraphView {
  private readonly entities = new Map<string, Entity>();
  private readonly relationships = new Map<string, Relationship>();
  private readonly outgoing = new Map<string, Relationship[]>();
  private readonly incoming = new Map<string, Relationship[]>();
  private frozen = false;

  // --- Construction ---

  /**
   * Insert or replace an entity. Replacing keeps the relationships already
   * attached to the id.
   */
  addEntity(entity: Entity): void {
    this.assertMutable("add entity");
    this.entities.set(entity.id, entity);
    if (!this.outgoing.has(entity.id)) this.outgoing.set(entity.id, []);
    if (!this.incoming.has(entity.id)) this.incoming.set(entity.id, []);
  }

  /**
   * Link two existing entities. A missing endpoint yields an Err and leaves
   * the graph unchanged.
   */
  addRelationship(relationship: Relationship): Result<Relationship, GraphIntegrityError> {
    this.assertMutable("add relationship");
    for (const endpoint of [relationship.source, relationship.target]) {
      if (!this.entities.has(endpoint)) {
        return Err(new GraphIntegrityError(relationship.id, endpoint));
      }
    }

    const existing = this.relationships.get(relationship.id);
    if (existing) return Ok(existing);

    this.relationships.set(relationship.id, relationship);
    this.outgoing.get(relationship.source)?.push(relationship);
    this.incoming.get(relationship.target)?.push(relationship);
    return Ok(relationship);
  }

  /**
   * Remove every entity located in `filePath` and every relationship touching
   * them. Returns the removed entity ids.
   */
  removeFile(filePath: string): string[] {
    this.assertMutable("remove file");
    const removed = [...this.entities.values()]
      .filter((entity) => entity.kind !== "directory" && entity.path === filePath)
      .map((entity) => entity.id);

    for (const id of removed) {
      for (const relationship of [...(this.outgoing.get(id) ?? []), ...(this.incoming.get(id) ?? [])]) {
        this.detach(relationship);
      }
      this.outgoing.delete(id);
      this.incoming.delete(id);
      this.entities.delete(id);
    }
    return removed;
  }

  private detach(relationship: Relationship): void {
    if (!this.relationships.delete(relationship.id)) return;
    const out = this.outgoing.get(relationship.source);
    if (out) this.outgoing.set(relationship.source, out.filter((r) => r.id !== relationship.id));
    const into = this.incoming.get(relationship.target);
    if (into) this.incoming.set(relationship.target, into.filter((r) => r.id !== relationship.id));
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  private assertMutable(operation: string): void {
    if (this.frozen) {
      throw new FrozenGraphError(operation);
    }
  }

  // --- Reads ---

  getEntity(id: string): Entity | undefined {
    return this.entities.get(id);
  }

  hasEntity(id: string): boolean {
    return this.entities.has(id);
  }

  getRelationship(id: string): Relationship | undefined {
    return this.relationships.get(id);
  }

  entityList(): Entity[] {
    return [...this.entities.values()];
  }

  relationshipList(): Relationship[] {
    return [...this.relationships.values()];
  }

  outgoingOf(id: string): readonly Relationship[] {
    return this.outgoing.get(id) ?? [];
  }

  incomingOf(id: string): readonly Relationship[] {
    return this.incoming.get(id) ?? [];
  }

  get entityCount(): number {
    return this.entities.size;
  }

  get relationshipCount(): number {
    return this.relationships.size;
  }

  // --- Serialisation ---

  /** Entities and relationships sorted by id. */
  toSnapshot(): GraphSnapshot {
    const byId = (a: { id: string }, b: { id: string }) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
    return {
      version: 1,
      entities: this.entityList().sort(byId),
      relationships: this.relationshipList().sort(byId),
    };
  }

  /**
   * Rebuild an unfrozen graph from a snapshot. Fails on the first relationship
   * whose endpoint is missing.
   */
  static fromSnapshot(snapshot: Pick<GraphSnapshot, "entities" | "relationships">): Result<KnowledgeGraph, GraphIntegrityError> {
    const graph = new KnowledgeGraph();
    for (const entity of snapshot.entities) {
      graph.addEntity(entity);
    }
    for (const relationship of snapshot.relationships) {
      const added = graph.addRelationship(relationship);
      if (!added.ok) return added;
    }
    return Ok(graph);
  }

  /** Unfrozen copy of any graph view. */
  static copyOf(view: GraphView): KnowledgeGraph {
    const graph = new KnowledgeGraph();
    for (const entity of view.entityList()) {
      graph.addEntity(entity);
    }
    for (const relationship of view.relationshipList()) {
      graph.addRelationship(relationship);
    }
    return graph;
  }
}
