import { Err, Ok, type ConfigError, type RepographConfig, type Result } from "@repograph/core";
import type { ParserRegistry } from "@repograph/syntax";

import { RepositoryIndex } from "./RepositoryIndex.js";

export const INDEX_MISSING = "Index not built. Call repograph_reindex first.";

/**
 * The repository index the MCP tools answer from. Empty until the first
 * successful open.
 */
export class IndexHolder {
  private current?: RepositoryIndex;

  constructor(
    private readonly options: { config?: RepographConfig; registry?: ParserRegistry } = {}
  ) {}

  get(): Result<RepositoryIndex, string> {
    return this.current ? Ok(this.current) : Err(INDEX_MISSING);
  }

  /** Open `rootPath` and make it the current index. */
  async open(rootPath: string, forceRebuild = false): Promise<Result<RepositoryIndex, ConfigError>> {
    const opened = await RepositoryIndex.open(rootPath, { ...this.options, forceRebuild });
    if (opened.ok) {
      this.current = opened.value;
    }
    return opened;
  }
}
