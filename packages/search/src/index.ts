/**
 * @repograph/search
 * Lexical and hybrid retrieval over repository graphs, snapshot persistence
 * and the MCP tool surface.
 */

export { tokenize, nameSegments } from "./core/tokenize.js";
export { buildDocuments, documentText, fileExcerpt } from "./core/documents.js";
export type { TextDocument, DocumentOptions } from "./core/documents.js";
export { SEARCH_MODES, RELATION_FILTERS, isSearchMode, isRelationFilter, unsupported } from "./core/model.js";
export type {
  SearchMode,
  RelationFilter,
  HitSource,
  SearchHit,
  SearchOutcome,
  EntityDetails,
  IndexStats,
} from "./core/model.js";

export { Bm25Index } from "./infrastructure/Bm25Index.js";
export type { Bm25Options, Bm25Snapshot } from "./infrastructure/Bm25Index.js";
export { HybridRetriever } from "./infrastructure/HybridRetriever.js";
export {
  SnapshotStore,
  GraphSnapshotSchema,
  Bm25SnapshotSchema,
  GRAPH_FILE,
  BM25_FILE,
  repositoryKey,
} from "./infrastructure/SnapshotStore.js";
export type { StoredSnapshot } from "./infrastructure/SnapshotStore.js";
export { RepositoryIndex } from "./infrastructure/RepositoryIndex.js";
export type { OpenOptions } from "./infrastructure/RepositoryIndex.js";
export { IndexHolder, INDEX_MISSING } from "./infrastructure/IndexHolder.js";

export { registerAllTools } from "./tools/index.js";
export type { Services } from "./tools/index.js";
