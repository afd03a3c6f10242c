/**
 * Facade over one indexed repository: graph, graph index, BM25 index and
 * hybrid retriever, built together and swapped together.
 *
 * Readers always see one complete state. `rebuild` and `refreshFile` build a
 * new state off to the side and replace the old one with a single
 * assignment.
 */

import path from "node:path";
import {
  Err,
  Ok,
  createLogger,
  loadConfig,
  tryCatchAsync,
  type ConfigError,
  type RepographConfig,
  type Result,
} from "@repograph/core";
import {
  GraphBuilder,
  GraphIndex,
  KnowledgeGraph,
  type BuildReport,
  type GraphSnapshot,
} from "@repograph/graph";
import { createDefaultRegistry, toRepoPath, type Entity, type ParserRegistry } from "@repograph/syntax";

import { buildDocuments } from "../core/documents.js";
import type { EntityDetails, IndexStats, SearchOutcome } from "../core/model.js";
import { Bm25Index, type Bm25Snapshot } from "./Bm25Index.js";
import { HybridRetriever } from "./HybridRetriever.js";
import { SnapshotStore } from "./SnapshotStore.js";

const log = createLogger("search");

export interface OpenOptions {
  /** Complete configuration; loaded from the repository when omitted. */
  config?: RepographConfig;
  registry?: ParserRegistry;
  /** Ignore any cached snapshot. */
  forceRebuild?: boolean;
}

interface IndexState {
  graph: KnowledgeGraph;
  graphIndex: GraphIndex;
  textIndex: Bm25Index;
  retriever: HybridRetriever;
  report?: BuildReport;
}

export class RepositoryIndex {
  private state: IndexState;

  private constructor(
    readonly rootPath: string,
    readonly config: RepographConfig,
    private readonly builder: GraphBuilder,
    private readonly store: SnapshotStore,
    state: IndexState
  ) {
    this.state = state;
  }

  /**
   * Load the cached snapshot of `rootPath`, or build the repository and
   * cache the result.
   */
  static async open(rootPath: string, options: OpenOptions = {}): Promise<Result<RepositoryIndex, ConfigError>> {
    const root = path.resolve(rootPath);
    let config = options.config;
    if (!config) {
      const loaded = await loadConfig(root);
      if (!loaded.ok) return loaded;
      config = loaded.value;
    }

    const builder = new GraphBuilder(options.registry ?? createDefaultRegistry(), config.graph);
    const store = new SnapshotStore(config.cacheDir);

    if (!options.forceRebuild) {
      const cached = await store.load(root);
      if (cached.ok) {
        const restored = restoreState(cached.value.graph, cached.value.bm25, config);
        if (restored.ok) {
          log.info(`Loaded cached index of ${root} (${restored.value.graph.entityCount} entities)`);
          return Ok(new RepositoryIndex(root, config, builder, store, restored.value));
        }
        log.warn(`Discarding cached index of ${root}: ${restored.error}`);
      } else {
        log.debug(`No usable cache for ${root}: ${cached.error}`);
      }
    }

    const repository = new RepositoryIndex(root, config, builder, store, emptyState(config));
    await repository.rebuild();
    return Ok(repository);
  }

  isRootOf(rootPath: string): boolean {
    return path.resolve(rootPath) === this.rootPath;
  }

  // --- Queries ---

  search(query: string, mode: string = "hybrid", topK: number = this.config.retrieval.topK): SearchOutcome {
    return this.state.retriever.search(query, mode, topK);
  }

  searchByKind(kind: string, nameFilter?: string, topK: number = this.config.retrieval.topK): SearchOutcome {
    return this.state.retriever.searchByKind(kind, nameFilter, topK);
  }

  relatedEntities(
    entityId: string,
    relation: string = "all",
    maxResults: number = this.config.retrieval.topK
  ): SearchOutcome {
    return this.state.retriever.relatedEntities(entityId, relation, maxResults);
  }

  entityDetails(entityId: string): EntityDetails | undefined {
    const { graphIndex } = this.state;
    const entity = graphIndex.entity(entityId);
    if (!entity) return undefined;
    return {
      attributes: entity,
      dependencies: graphIndex.dependencies(entityId),
      dependents: graphIndex.dependents(entityId),
      contained: graphIndex.contains(entityId),
      container: graphIndex.containedBy(entityId)[0] ?? null,
    };
  }

  /** Accepts a repository-relative path or an absolute path inside the root. */
  entitiesInFile(filePath: string): string[] {
    return this.state.graphIndex.entitiesInFile(this.relativePath(filePath));
  }

  entity(entityId: string): Entity | undefined {
    return this.state.graphIndex.entity(entityId);
  }

  stats(): IndexStats {
    const { graphIndex, textIndex } = this.state;
    return { ...graphIndex.stats(), rootPath: this.rootPath, documents: textIndex.size };
  }

  /** Report of the last build or refresh; absent after a cache load. */
  report(): BuildReport | undefined {
    return this.state.report;
  }

  // --- Updates ---

  /** Rebuild everything from disk and save the snapshots when the cache is writable. */
  async rebuild(): Promise<BuildReport> {
    const { graph, report } = await this.builder.build(this.rootPath);
    const textIndex = await this.textIndexFor(graph);
    this.state = assembleState(graph, textIndex, this.config, report);
    await this.persist();
    return report;
  }

  /**
   * Re-analyse one file against the current graph and save the snapshots.
   * Documents of entities in other files are reused.
   */
  async refreshFile(filePath: string): Promise<BuildReport> {
    const previous = this.state;
    const relative = this.relativePath(filePath);
    const { graph, report } = await this.builder.rebuildFile(previous.graph, this.rootPath, relative);
    const textIndex = await this.textIndexFor(graph, (entity) =>
      entity.path === relative ? undefined : previous.textIndex.document(entity.id)?.text
    );
    this.state = assembleState(graph, textIndex, this.config, report);
    await this.persist();
    return report;
  }

  async save(): Promise<string> {
    const { graph, textIndex } = this.state;
    return this.store.save(this.rootPath, { graph: graph.toSnapshot(), bm25: textIndex.toSnapshot() });
  }

  /** Save, but keep serving the new state when the cache cannot be written. */
  private async persist(): Promise<void> {
    const saved = await tryCatchAsync(() => this.save());
    if (!saved.ok) {
      log.warn(`Could not cache the index of ${this.rootPath}: ${saved.error.message}`);
    }
  }

  private async textIndexFor(graph: KnowledgeGraph, reuse?: (entity: Entity) => string | undefined): Promise<Bm25Index> {
    const { k1, b, fileContentLines } = this.config.retrieval;
    const documents = await buildDocuments(graph.toSnapshot().entities, this.rootPath, { fileContentLines, reuse });
    return new Bm25Index({ k1, b }).build(documents);
  }

  private relativePath(filePath: string): string {
    const absolute = path.resolve(this.rootPath, filePath);
    return toRepoPath(this.rootPath, absolute);
  }
}

function assembleState(
  graph: KnowledgeGraph,
  textIndex: Bm25Index,
  config: RepographConfig,
  report?: BuildReport
): IndexState {
  const graphIndex = new GraphIndex(graph);
  return {
    graph,
    graphIndex,
    textIndex,
    retriever: new HybridRetriever(graphIndex, textIndex, config.retrieval),
    report,
  };
}

function emptyState(config: RepographConfig): IndexState {
  const { k1, b } = config.retrieval;
  return assembleState(new KnowledgeGraph().freeze(), new Bm25Index({ k1, b }).build([]), config);
}

function restoreState(graph: GraphSnapshot, bm25: Bm25Snapshot, config: RepographConfig): Result<IndexState, string> {
  const restored = KnowledgeGraph.fromSnapshot(graph);
  if (!restored.ok) return Err(restored.error.message);
  for (const document of bm25.documents) {
    if (!restored.value.hasEntity(document.id)) {
      return Err(`BM25 document ${document.id} has no entity`);
    }
  }
  return Ok(assembleState(restored.value.freeze(), Bm25Index.fromSnapshot(bm25), config));
}
