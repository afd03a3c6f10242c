/**
 * @repograph/graph
 * Knowledge graph construction, cross-file relationship discovery and lookup.
 */

export { KnowledgeGraph } from "./core/KnowledgeGraph.js";
export { similarityRatio } from "./core/similarity.js";
export { emptyReport, emptySkipCounts, byLocation, byScoreThenId } from "./core/model.js";
export type {
  Direction,
  GraphView,
  GraphSnapshot,
  BuildPhase,
  SkipReason,
  FileFailure,
  BuildReport,
  GraphStats,
  ScoredId,
} from "./core/model.js";

export {
  DirectoryScanner,
  scannerOptions,
  directoryEntity,
  fileEntity,
  readGitignore,
} from "./infrastructure/DirectoryScanner.js";
export type { ScannerOptions, ScannedFile, ScanResult } from "./infrastructure/DirectoryScanner.js";
export {
  RelationshipConnector,
  pythonModulePath,
  IMPORTED_SYMBOL_CONFIDENCE,
} from "./infrastructure/RelationshipConnector.js";
export { GraphBuilder, structuralParent } from "./infrastructure/GraphBuilder.js";
export type { BuildResult } from "./infrastructure/GraphBuilder.js";
export { GraphIndex } from "./infrastructure/GraphIndex.js";
export type { RelationshipGroups } from "./infrastructure/GraphIndex.js";
