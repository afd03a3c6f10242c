/**
 * repograph_related_entities - Neighbours of an entity by relation.
 */

import { z } from "zod";
import { errorResponse, successResponse } from "@repograph/core";

import { RELATION_FILTERS } from "../core/model.js";
import { formatOutcome } from "./format.js";
import type { ToolRegistrar } from "./types.js";

export const registerRelatedEntities: ToolRegistrar = (server, holder) => {
  server.registerTool(
    "repograph_related_entities",
    {
      title: "Related entities",
      description: "Entities linked to the given one: what it depends on, what depends on it, its children, its container.",
      inputSchema: {
        entity_id: z.string().describe("Entity id"),
        relation: z.string().optional().describe(`One of ${RELATION_FILTERS.join(", ")} (default all)`),
        max_results: z.number().int().positive().optional().describe("Maximum results"),
      },
    },
    async (input) => {
      const index = holder.get();
      if (!index.ok) return errorResponse(index.error);

      const relation = input.relation ?? "all";
      const outcome = index.value.relatedEntities(input.entity_id, relation, input.max_results);
      return successResponse(formatOutcome(`Related to ${input.entity_id} (${relation})`, outcome), {
        results: outcome.results,
        diagnostic: outcome.diagnostic,
      });
    }
  );
};
