/**
 * Builds knowledge graphs in phases:
 * scan_directory -> parse_files -> discover_relationships -> materialize_graph.
 *
 * Every build works on a fresh draft graph and only hands it out frozen.
 */

import path from "node:path";
import pLimit from "p-limit";
import { BuildInProgressError, createLogger, defaultConfig, type GraphConfig } from "@repograph/core";
import {
  createRelationship,
  stringValue,
  type Entity,
  type ParseOutput,
  type ParserRegistry,
} from "@repograph/syntax";

import { KnowledgeGraph } from "../core/KnowledgeGraph.js";
import { emptyReport, type BuildPhase, type BuildReport, type GraphView } from "../core/model.js";
import { DirectoryScanner, directoryEntity, fileEntity, scannerOptions, type ScannedFile } from "./DirectoryScanner.js";
import { RelationshipConnector } from "./RelationshipConnector.js";

const log = createLogger("graph");

export interface BuildResult {
  graph: KnowledgeGraph;
  report: BuildReport;
}

/**
 * Structural parent of a parsed entity: the innermost class of the same file
 * named by its `parentClass` metadata that encloses it, else the file.
 */
export function structuralParent(entity: Entity, fileId: string, classes: readonly Entity[]): string {
  const parentClass = stringValue(entity.metadata, "parentClass");
  if (!parentClass) return fileId;

  let best: Entity | undefined;
  for (const candidate of classes) {
    if (candidate.id === entity.id || candidate.name !== parentClass) continue;
    if (candidate.startLine > entity.startLine || candidate.endLine < entity.endLine) continue;
    if (!best || candidate.endLine - candidate.startLine < best.endLine - best.startLine) {
      best = candidate;
    }
  }
  return best?.id ?? fileId;
}

export class GraphBuilder {
  private phase: BuildPhase = "idle";
  private readonly scanner: DirectoryScanner;
  private readonly connector: RelationshipConnector;
  private readonly concurrency: number;

  constructor(
    private readonly registry: ParserRegistry,
    config: GraphConfig = defaultConfig().graph
  ) {
    this.scanner = new DirectoryScanner(scannerOptions(config, registry.supportedExtensions()));
    this.connector = new RelationshipConnector(registry.supportedExtensions());
    this.concurrency = config.concurrency;
  }

  get currentPhase(): BuildPhase {
    return this.phase;
  }

  /**
   * Build a graph of every supported file under `rootPath`.
   */
  async build(rootPath: string): Promise<BuildResult> {
    const root = path.resolve(rootPath);
    return this.run(root, async (report, enter) => {
      const draft = new KnowledgeGraph();

      enter("scan_directory");
      const scan = await this.scanner.scan(root);
      for (const entity of scan.entities) draft.addEntity(entity);
      for (const relationship of scan.relationships) draft.addRelationship(relationship);
      report.filesScanned = scan.files.length;
      report.skipped = scan.skipped;

      enter("parse_files");
      await this.parseInto(draft, root, scan.files, report);

      enter("discover_relationships");
      this.discoverInto(draft, root, report);

      enter("materialize_graph");
      return draft.freeze();
    });
  }

  /**
   * New graph equal to `previous` with one file re-analysed. A file that no
   * longer exists, or that the scan filters would now skip, is dropped.
   * `previous` is not modified.
   */
  async rebuildFile(previous: GraphView, rootPath: string, filePath: string): Promise<BuildResult> {
    const root = path.resolve(rootPath);
    return this.run(root, async (report, enter) => {
      enter("scan_directory");
      const draft = KnowledgeGraph.copyOf(previous);
      const inspected = await this.scanner.inspect(root, filePath);
      const relativePath = path.relative(root, path.resolve(root, filePath)).split(path.sep).join("/");
      const removed = draft.removeFile(relativePath);
      log.debug(`Removed ${removed.length} entities of ${relativePath}`);

      const files: ScannedFile[] = [];
      if (inspected.ok) {
        this.attachFile(draft, root, inspected.value);
        files.push(inspected.value);
        report.filesScanned = 1;
      } else {
        report.skipped[inspected.error]++;
      }

      enter("parse_files");
      await this.parseInto(draft, root, files, report);

      enter("discover_relationships");
      this.discoverInto(draft, root, report);

      enter("materialize_graph");
      return draft.freeze();
    });
  }

  private async run(
    root: string,
    body: (report: BuildReport, enter: (phase: BuildPhase) => void) => Promise<KnowledgeGraph>
  ): Promise<BuildResult> {
    if (this.phase !== "idle" && this.phase !== "done") {
      throw new BuildInProgressError(root);
    }

    const report = emptyReport(root);
    const started = performance.now();
    let phaseStarted = started;
    const enter = (phase: BuildPhase): void => {
      const now = performance.now();
      if (this.phase !== "idle" && this.phase !== "done") {
        report.phaseTimings[this.phase] = now - phaseStarted;
      }
      this.phase = phase;
      phaseStarted = now;
    };

    try {
      const graph = await body(report, enter);
      enter("done");
      report.durationMs = performance.now() - started;
      log.info(
        `Built graph of ${root}: ${graph.entityCount} entities, ${graph.relationshipCount} relationships ` +
          `from ${report.filesParsed} files (${report.filesFailed} failed)`
      );
      return { graph, report };
    } catch (error) {
      this.phase = "idle";
      throw error;
    }
  }

  /** Add a file entity and any missing directories above it. */
  private attachFile(draft: KnowledgeGraph, root: string, file: ScannedFile): void {
    const entity = fileEntity(file.path, file.size);
    draft.addEntity(entity);

    let child = entity;
    let dir = path.posix.dirname(file.path);
    for (;;) {
      const parent = directoryEntity(root, dir);
      const known = draft.hasEntity(parent.id);
      if (!known) draft.addEntity(parent);
      draft.addRelationship(createRelationship(parent.id, "contains", child.id));
      if (known || dir === ".") break;
      child = parent;
      dir = path.posix.dirname(dir);
    }
  }

  private async parseInto(
    draft: KnowledgeGraph,
    root: string,
    files: readonly ScannedFile[],
    report: BuildReport
  ): Promise<void> {
    // Files no parser claims stay as bare file entities.
    const parseable = files.filter((file) => this.registry.parserFor(file.absolutePath) !== undefined);
    const limit = pLimit(this.concurrency);
    const outputs = await Promise.all(
      parseable.map((file) => limit(() => this.registry.parse(file.absolutePath, { rootPath: root })))
    );
    // Merged in scan order, whatever order the pool finished in.
    parseable.forEach((file, index) => this.merge(draft, file, outputs[index], report));
  }

  private merge(draft: KnowledgeGraph, file: ScannedFile, output: ParseOutput, report: BuildReport): void {
    if (output.errors.length > 0) {
      report.filesFailed++;
      report.failures.push({ path: file.path, errors: output.errors });
      return;
    }
    report.filesParsed++;
    report.entitiesDropped += output.dropped;

    const scanned = draft.getEntity(file.entityId);
    const classes = output.entities.filter((entity) => entity.kind === "class");

    for (const entity of output.entities) {
      if (entity.id === file.entityId) {
        draft.addEntity({ ...entity, metadata: { ...scanned?.metadata, ...entity.metadata } });
        continue;
      }
      draft.addEntity(entity);
      const parent = structuralParent(entity, file.entityId, classes);
      draft.addRelationship(createRelationship(parent, "contains", entity.id));
    }

    for (const relationship of output.relationships) {
      const added = draft.addRelationship(relationship);
      if (!added.ok) {
        report.relationshipsRejected++;
        log.debug(added.error.message);
      }
    }
  }

  private discoverInto(draft: KnowledgeGraph, root: string, report: BuildReport): void {
    const discovered = this.connector.discover(draft.entityList(), root);
    for (const relationship of discovered) {
      if (draft.addRelationship(relationship).ok) {
        report.relationshipsDiscovered++;
      }
    }
  }
}
