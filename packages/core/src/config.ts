/**
 * Indexing and retrieval configuration.
 *
 * Values come from three layers, later ones winning: schema defaults, an
 * optional `repograph.config.json` in the repository root, and overrides
 * passed by the caller.
 */

import { readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { Err, Ok, type Result } from "./result.js";
import { ConfigError } from "./errors.js";

export const CONFIG_FILE_NAME = "repograph.config.json";

/**
 * Directory and file globs never indexed. Patterns without a slash match the
 * basename at any depth.
 */
export const DEFAULT_SKIP_PATTERNS: readonly string[] = [
  "node_modules",
  ".git",
  ".github",
  ".svn",
  ".hg",
  "dist",
  "build",
  "out",
  ".next",
  ".nuxt",
  "coverage",
  ".nyc_output",
  "__pycache__",
  ".pytest_cache",
  ".mypy_cache",
  ".tox",
  "venv",
  ".venv",
  ".idea",
  ".vscode",
  "*.min.js",
  "*.bundle.js",
  "*.min.css",
];

const GraphConfigSchema = z.object({
  /** Extension allow-list (".py", ".ts", ...). Omitted means every extension a parser claims. */
  extensions: z.array(z.string().regex(/^\.[A-Za-z0-9]+$/)).optional(),
  skipPatterns: z.array(z.string()).default([...DEFAULT_SKIP_PATTERNS]),
  respectGitignore: z.boolean().default(true),
  maxDepth: z.number().int().min(0).default(20),
  maxFileSize: z.number().int().positive().default(1024 * 1024),
  concurrency: z.number().int().min(1).max(64).default(8),
});

const WeightsSchema = z.object({
  text: z.number().min(0).default(0.6),
  graph: z.number().min(0).default(0.4),
  agreementBonus: z.number().min(0).default(0.2),
});

const RetrievalConfigSchema = z.object({
  k1: z.number().positive().default(1.2),
  b: z.number().min(0).max(1).default(0.75),
  topK: z.number().int().positive().default(10),
  fuzzyThreshold: z.number().min(0).max(1).default(0.6),
  fileContentLines: z.number().int().min(0).default(50),
  weights: WeightsSchema.default({}),
});

export const ConfigSchema = z.object({
  graph: GraphConfigSchema.default({}),
  retrieval: RetrievalConfigSchema.default({}),
  cacheDir: z.string().default(() => path.join(os.homedir(), ".cache", "repograph")),
});

export type RepographConfig = z.infer<typeof ConfigSchema>;
export type GraphConfig = RepographConfig["graph"];
export type RetrievalConfig = RepographConfig["retrieval"];
export type ConfigInput = z.input<typeof ConfigSchema>;

export function defaultConfig(): RepographConfig {
  return ConfigSchema.parse({});
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function mergeLayers(base: Record<string, unknown>, overlay: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeLayers(current, value) : value;
  }
  return merged;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Validate raw layers into a complete configuration.
 */
export function resolveConfig(...layers: Array<Record<string, unknown>>): Result<RepographConfig, ConfigError> {
  const merged = layers.reduce<Record<string, unknown>>((acc, layer) => mergeLayers(acc, layer), {});
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    return Err(new ConfigError("Invalid configuration", formatIssues(parsed.error)));
  }
  return Ok(parsed.data);
}

async function readConfigFile(rootPath: string): Promise<Result<Record<string, unknown>, ConfigError>> {
  const file = path.join(rootPath, CONFIG_FILE_NAME);
  let raw: string;
  try {
    raw = await readFile(file, "utf-8");
  } catch (e) {
    if (isPlainObject(e) && e.code === "ENOENT") {
      return Ok({});
    }
    return Err(new ConfigError(`Cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`));
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    return Err(new ConfigError(`Invalid JSON in ${file}: ${e instanceof Error ? e.message : String(e)}`));
  }
  if (!isPlainObject(data)) {
    return Err(new ConfigError(`${file} must contain a JSON object`));
  }
  return Ok(data);
}

/**
 * Load the configuration for a repository.
 */
export async function loadConfig(
  rootPath: string,
  overrides: ConfigInput = {}
): Promise<Result<RepographConfig, ConfigError>> {
  const fromFile = await readConfigFile(rootPath);
  if (!fromFile.ok) {
    return fromFile;
  }
  return resolveConfig(fromFile.value, overrides);
}
