#!/usr/bin/env node
/**
 * MCP server over the repository index of the working directory.
 */

import { createLogger, runServer } from "@repograph/core";

import { IndexHolder } from "./infrastructure/IndexHolder.js";
import { registerAllTools, type Services } from "./tools/index.js";

const log = createLogger("server");

runServer<Services>({
  config: {
    name: "repograph",
    version: "0.1.0",
  },
  createServices: () => ({ holder: new IndexHolder() }),
  registerTools: registerAllTools,
  onStartup: async ({ holder }) => {
    const rootPath = process.env.REPOGRAPH_ROOT ?? process.cwd();
    log.info(`Indexing workspace: ${rootPath}`);
    try {
      const opened = await holder.open(rootPath);
      if (!opened.ok) {
        log.warn(`Could not index ${rootPath}: ${opened.error.message}`);
        return;
      }
      const stats = opened.value.stats();
      log.info(`Ready: ${stats.entities} entities, ${stats.relationships} relationships from ${stats.files} files`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn(`Could not index ${rootPath}: ${message}. Tools stay unavailable until repograph_reindex succeeds.`);
    }
  },
});
