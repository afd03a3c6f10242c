import type { SearchHit, SearchOutcome } from "../core/model.js";

function formatHit(hit: SearchHit, rank: number): string {
  const { summary } = hit;
  const location = `${summary.path}:${summary.startLine}-${summary.endLine}`;
  return `${rank}. **${summary.name}** (${summary.kind}) ${location} score ${hit.score.toFixed(3)}\n   id: ${hit.entityId}`;
}

/** Markdown list of hits, or the diagnostic when there are none. */
export function formatOutcome(title: string, outcome: SearchOutcome): string {
  if (outcome.results.length === 0) {
    return outcome.diagnostic ?? `${title}: no results`;
  }
  const lines = [`## ${title} (${outcome.results.length})`, ""];
  outcome.results.forEach((hit, index) => lines.push(formatHit(hit, index + 1)));
  if (outcome.diagnostic) lines.push("", outcome.diagnostic);
  return lines.join("\n");
}
