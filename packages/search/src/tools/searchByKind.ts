/**
 * repograph_search_by_kind - Entities of one kind, optionally name-filtered.
 */

import { z } from "zod";
import { errorResponse, successResponse } from "@repograph/core";

import { formatOutcome } from "./format.js";
import type { ToolRegistrar } from "./types.js";

export const registerSearchByKind: ToolRegistrar = (server, holder) => {
  server.registerTool(
    "repograph_search_by_kind",
    {
      title: "Search by kind",
      description: "List entities of a kind (file, class, function, method, heading, ...), ranked by name filter terms.",
      inputSchema: {
        kind: z.string().describe("Entity kind"),
        name_filter: z.string().optional().describe("Space-separated terms matched against names"),
        top_k: z.number().int().positive().optional().describe("Maximum results"),
      },
    },
    async (input) => {
      const index = holder.get();
      if (!index.ok) return errorResponse(index.error);

      const outcome = index.value.searchByKind(input.kind, input.name_filter, input.top_k);
      return successResponse(formatOutcome(`${input.kind} entities`, outcome), {
        results: outcome.results,
        diagnostic: outcome.diagnostic,
      });
    }
  );
};
