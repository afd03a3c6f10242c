/**
 * repograph_reindex - Build, rebuild or refresh the index.
 */

import { z } from "zod";
import { errorResponse, successResponse, toError } from "@repograph/core";
import type { BuildReport } from "@repograph/graph";

import type { ToolRegistrar } from "./types.js";

function formatReport(title: string, report: BuildReport): string {
  const skipped = Object.entries(report.skipped)
    .filter(([, count]) => count > 0)
    .map(([reason, count]) => `${reason} ${count}`);
  return [
    `## ${title}`,
    "",
    `**Root:** ${report.rootPath}`,
    `**Files:** ${report.filesParsed} parsed, ${report.filesFailed} failed of ${report.filesScanned} scanned`,
    `**Skipped:** ${skipped.length > 0 ? skipped.join(", ") : "none"}`,
    `**Relationships discovered:** ${report.relationshipsDiscovered}`,
    `**Duration:** ${report.durationMs.toFixed(0)} ms`,
  ].join("\n");
}

export const registerReindex: ToolRegistrar = (server, holder) => {
  server.registerTool(
    "repograph_reindex",
    {
      title: "Reindex repository",
      description:
        "Index a repository, rebuild the current one, or re-analyse a single changed file. " +
        "Call this first when no index exists.",
      inputSchema: {
        root_path: z.string().optional().describe("Repository root; defaults to the current index's root"),
        file: z.string().optional().describe("Only re-analyse this file of the current index"),
        force: z.boolean().optional().describe("Ignore cached snapshots when opening a repository"),
      },
    },
    async (input) => {
      try {
        const current = holder.get();

        if (input.file !== undefined) {
          if (!current.ok) return errorResponse(current.error);
          const report = await current.value.refreshFile(input.file);
          return successResponse(formatReport(`Refreshed ${input.file}`, report), { report });
        }

        if (current.ok && (input.root_path === undefined || current.value.isRootOf(input.root_path))) {
          const report = await current.value.rebuild();
          return successResponse(formatReport("Index rebuilt", report), { report });
        }

        if (input.root_path === undefined) return errorResponse("root_path is required when no index exists");
        const opened = await holder.open(input.root_path, input.force ?? false);
        if (!opened.ok) return errorResponse(opened.error.message);

        const report = opened.value.report();
        const stats = opened.value.stats();
        const text = report
          ? formatReport("Index built", report)
          : `## Index loaded from cache\n\n**Root:** ${stats.rootPath}\n**Entities:** ${stats.entities}`;
        return successResponse(text, { report: report ?? null, stats });
      } catch (error) {
        return errorResponse(toError(error).message);
      }
    }
  );
};
