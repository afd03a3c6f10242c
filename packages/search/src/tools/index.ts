/**
 * MCP tool registration.
 */

import type { McpServer } from "@repograph/core";
import type { IndexHolder } from "../infrastructure/IndexHolder.js";

import { registerSearch } from "./search.js";
import { registerEntityDetails } from "./entityDetails.js";
import { registerEntitiesInFile } from "./entitiesInFile.js";
import { registerRelatedEntities } from "./relatedEntities.js";
import { registerSearchByKind } from "./searchByKind.js";
import { registerReindex } from "./reindex.js";
import { registerStats } from "./stats.js";

export interface Services {
  holder: IndexHolder;
}

export function registerAllTools(server: McpServer, services: Services): void {
  const { holder } = services;

  registerSearch(server, holder);
  registerEntityDetails(server, holder);
  registerEntitiesInFile(server, holder);
  registerRelatedEntities(server, holder);
  registerSearchByKind(server, holder);
  registerReindex(server, holder);
  registerStats(server, holder);
}
