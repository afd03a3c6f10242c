/**
 * repograph_entities_in_file - Entities located in one file.
 */

import { z } from "zod";
import { resultToResponse, successResponse } from "@repograph/core";

import type { ToolRegistrar } from "./types.js";

export const registerEntitiesInFile: ToolRegistrar = (server, holder) => {
  server.registerTool(
    "repograph_entities_in_file",
    {
      title: "Entities in file",
      description: "List entity ids defined in a file, ordered by start line. Empty for skipped or unknown files.",
      inputSchema: {
        path: z.string().describe("Repository-relative or absolute file path"),
      },
    },
    async (input) =>
      resultToResponse(holder.get(), (index) => {
        const ids = index.entitiesInFile(input.path);
        const text =
          ids.length === 0
            ? `No entities indexed in ${input.path}`
            : [`## ${input.path} (${ids.length})`, "", ...ids.map((id) => `- ${id}`)].join("\n");
        return successResponse(text, { path: input.path, entities: ids });
      })
  );
};
