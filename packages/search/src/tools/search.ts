/**
 * repograph_search - Ranked entity search in one of four modes.
 */

import { z } from "zod";
import { errorResponse, successResponse } from "@repograph/core";

import { SEARCH_MODES } from "../core/model.js";
import { formatOutcome } from "./format.js";
import type { ToolRegistrar } from "./types.js";

export const registerSearch: ToolRegistrar = (server, holder) => {
  server.registerTool(
    "repograph_search",
    {
      title: "Search repository",
      description:
        "Search indexed entities. Modes: text (BM25 over names, docstrings and file heads), graph (fuzzy name " +
        "match weighted by structure), structure (words like 'class', 'function', 'file' pick the kind), " +
        "hybrid (text and graph fused, default).",
      inputSchema: {
        query: z.string().describe("Search query"),
        mode: z.string().optional().describe(`One of ${SEARCH_MODES.join(", ")}`),
        top_k: z.number().int().positive().optional().describe("Maximum results"),
      },
    },
    async (input) => {
      const index = holder.get();
      if (!index.ok) return errorResponse(index.error);

      const mode = input.mode ?? "hybrid";
      const outcome = index.value.search(input.query, mode, input.top_k);
      return successResponse(formatOutcome(`Results for "${input.query}" (${mode})`, outcome), {
        results: outcome.results,
        diagnostic: outcome.diagnostic,
      });
    }
  );
};
