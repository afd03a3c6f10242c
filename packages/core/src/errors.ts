/**
 * Raised (inside an Err) when a relationship references an entity the graph
 * does not hold. The graph is left unchanged.
 */
export class GraphIntegrityError extends Error {
  constructor(
    readonly relationshipId: string,
    readonly missingEntityId: string
  ) {
    super(`Relationship ${relationshipId} references unknown entity ${missingEntityId}`);
    this.name = "GraphIntegrityError";
  }
}

/**
 * Thrown when an index is queried before it was built or loaded.
 */
export class IndexNotBuiltError extends Error {
  constructor(indexName: string) {
    super(`${indexName} has not been built; call build() or load a snapshot first`);
    this.name = "IndexNotBuiltError";
  }
}

export class FrozenGraphError extends Error {
  constructor(operation: string) {
    super(`Cannot ${operation}: graph is frozen`);
    this.name = "FrozenGraphError";
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

export class BuildInProgressError extends Error {
  constructor(rootPath: string) {
    super(`A build of ${rootPath} is already running`);
    this.name = "BuildInProgressError";
  }
}
