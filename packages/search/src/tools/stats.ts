/**
 * repograph_stats - Counts of the current index.
 */

import { resultToResponse, successResponse } from "@repograph/core";

import type { ToolRegistrar } from "./types.js";

export const registerStats: ToolRegistrar = (server, holder) => {
  server.registerTool(
    "repograph_stats",
    {
      title: "Index stats",
      description: "Entity, relationship and file counts of the current index, by kind.",
      inputSchema: {},
    },
    async () =>
      resultToResponse(holder.get(), (index) => {
        const stats = index.stats();
        const lines = [
          "## Index Statistics",
          "",
          `**Root:** ${stats.rootPath}`,
          `**Entities:** ${stats.entities}`,
          `**Relationships:** ${stats.relationships}`,
          `**Files:** ${stats.files}`,
          `**Documents:** ${stats.documents}`,
          "",
          "### Entities by kind",
          ...Object.entries(stats.entitiesByKind).map(([kind, count]) => `- ${kind}: ${count}`),
          "",
          "### Relationships by kind",
          ...Object.entries(stats.relationshipsByKind).map(([kind, count]) => `- ${kind}: ${count}`),
        ];
        return successResponse(lines.join("\n"), { stats });
      })
  );
};
