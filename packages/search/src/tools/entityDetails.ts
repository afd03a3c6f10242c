/**
 * repograph_entity_details - Attributes and neighbourhood of one entity.
 */

import { z } from "zod";
import { errorResponse, successResponse } from "@repograph/core";
import type { RelationshipGroups } from "@repograph/graph";

import type { ToolRegistrar } from "./types.js";

function formatGroups(title: string, groups: RelationshipGroups): string[] {
  const entries = Object.entries(groups);
  if (entries.length === 0) return [];
  const lines = [`### ${title}`];
  for (const [kind, ids] of entries) {
    for (const id of ids ?? []) lines.push(`- ${kind}: ${id}`);
  }
  lines.push("");
  return lines;
}

export const registerEntityDetails: ToolRegistrar = (server, holder) => {
  server.registerTool(
    "repograph_entity_details",
    {
      title: "Entity details",
      description: "Full attributes of an entity with its dependencies, dependents, children and container.",
      inputSchema: {
        entity_id: z.string().describe("Entity id, as returned by repograph_search"),
      },
    },
    async (input) => {
      const index = holder.get();
      if (!index.ok) return errorResponse(index.error);

      const details = index.value.entityDetails(input.entity_id);
      if (!details) return errorResponse(`Unknown entity ${input.entity_id}`);

      const { attributes } = details;
      const lines = [
        `## ${attributes.name} (${attributes.kind})`,
        "",
        `**Location:** ${attributes.path}:${attributes.startLine}-${attributes.endLine}`,
      ];
      if (attributes.docstring) lines.push("", attributes.docstring);
      lines.push("");
      if (details.container) lines.push(`**Container:** ${details.container}`, "");
      lines.push(...formatGroups("Dependencies", details.dependencies));
      lines.push(...formatGroups("Dependents", details.dependents));
      if (details.contained.length > 0) {
        lines.push(`### Contains (${details.contained.length})`, ...details.contained.map((id) => `- ${id}`));
      }

      return successResponse(lines.join("\n").trimEnd(), { entity: details });
    }
  );
};
