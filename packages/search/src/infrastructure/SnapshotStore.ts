/**
 * On-disk cache of graph and BM25 snapshots, one directory per repository.
 *
 * Layout: `<cacheDir>/<sha256(absolute root)[0..16]>/{graph.json,bm25.json}`.
 * Files are written to a temporary name and renamed into place.
 */

import { createHash } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { Err, Ok, createLogger, map, tryCatch, tryCatchAsync, type Result } from "@repograph/core";
import type { GraphSnapshot } from "@repograph/graph";
import { ENTITY_KINDS, RELATIONSHIP_KINDS } from "@repograph/syntax";

import type { Bm25Snapshot } from "./Bm25Index.js";

const log = createLogger("snapshots");

export const GRAPH_FILE = "graph.json";
export const BM25_FILE = "bm25.json";

const MetadataSchema = z.record(
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(z.string())])
);

const EntitySchema = z.object({
  id: z.string(),
  kind: z.enum(ENTITY_KINDS),
  path: z.string(),
  name: z.string(),
  startLine: z.number().int().min(1),
  endLine: z.number().int().min(1),
  docstring: z.string().optional(),
  content: z.string().optional(),
  metadata: MetadataSchema,
  embedding: z.array(z.number()).optional(),
});

const RelationshipSchema = z.object({
  id: z.string(),
  kind: z.enum(RELATIONSHIP_KINDS),
  source: z.string(),
  target: z.string(),
  metadata: MetadataSchema,
  confidence: z.number().min(0).max(1),
});

export const GraphSnapshotSchema = z.object({
  version: z.literal(1),
  entities: z.array(EntitySchema),
  relationships: z.array(RelationshipSchema),
});

export const Bm25SnapshotSchema = z
  .object({
    version: z.literal(1),
    k1: z.number().positive(),
    b: z.number().min(0).max(1),
    documents: z.array(z.object({ id: z.string(), text: z.string() })),
    lengths: z.array(z.number().int().min(0)),
    averageLength: z.number().min(0),
    df: z.record(z.number().int().min(1)),
    idf: z.record(z.number()),
  })
  .refine((snapshot) => snapshot.lengths.length === snapshot.documents.length, {
    message: "lengths must have one entry per document",
    path: ["lengths"],
  });

export interface StoredSnapshot {
  graph: GraphSnapshot;
  bm25: Bm25Snapshot;
}

export function repositoryKey(rootPath: string): string {
  return createHash("sha256").update(path.resolve(rootPath)).digest("hex").slice(0, 16);
}

async function writeAtomically(file: string, data: unknown): Promise<void> {
  const temporary = `${file}.tmp`;
  await writeFile(temporary, JSON.stringify(data), "utf-8");
  await rename(temporary, file);
}

async function readJson<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<Result<T, string>> {
  const raw = await tryCatchAsync(() => readFile(file, "utf-8"));
  if (!raw.ok) return Err(`cannot read ${path.basename(file)}`);

  const json = tryCatch((): unknown => JSON.parse(raw.value));
  if (!json.ok) return Err(`${path.basename(file)} is not valid JSON`);

  const parsed = schema.safeParse(json.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return Err(`${path.basename(file)} is invalid at ${issue?.path.join(".") || "(root)"}: ${issue?.message ?? "unknown"}`);
  }
  return Ok(parsed.data);
}

export class SnapshotStore {
  constructor(readonly cacheDir: string) {}

  directoryFor(rootPath: string): string {
    return path.join(this.cacheDir, repositoryKey(rootPath));
  }

  /** Write both snapshots; returns the directory they went to. */
  async save(rootPath: string, snapshot: StoredSnapshot): Promise<string> {
    const directory = this.directoryFor(rootPath);
    await mkdir(directory, { recursive: true });
    await writeAtomically(path.join(directory, GRAPH_FILE), snapshot.graph);
    await writeAtomically(path.join(directory, BM25_FILE), snapshot.bm25);
    log.debug(`Saved snapshots of ${path.resolve(rootPath)} to ${directory}`);
    return directory;
  }

  /**
   * Both snapshots, or the reason the cache missed. A missing, unreadable or
   * invalid file is a miss.
   */
  async load(rootPath: string): Promise<Result<StoredSnapshot, string>> {
    const directory = this.directoryFor(rootPath);
    const graph = await readJson(path.join(directory, GRAPH_FILE), GraphSnapshotSchema);
    if (!graph.ok) return graph;
    const bm25 = await readJson(path.join(directory, BM25_FILE), Bm25SnapshotSchema);
    return map(bm25, (value) => ({ graph: graph.value, bm25: value }));
  }
}
