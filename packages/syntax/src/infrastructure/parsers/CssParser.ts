import postcss, { type AtRule, type Declaration, type Node as CssNode, type Rule } from "postcss";

import { createEntity, type Entity, type EntityKind } from "../../core/model.js";
import { BaseLanguageParser, type Extraction, type SourceFile } from "./BaseLanguageParser.js";
import { linkTarget } from "./MarkdownParser.js";

// Block at-rules that become entities; @import is a reference, not an entity.
const BLOCK_AT_RULES = new Set(["media", "supports", "keyframes", "font-face", "layer", "container", "page"]);

function span(node: CssNode): { start: number; end: number } | null {
  const start = node.source?.start?.line;
  if (start === undefined) return null;
  return { start, end: node.source?.end?.line ?? start };
}

/**
 * `@import url("a.css") screen;` and `@import "a.css";` both yield `a.css`.
 */
export function importTarget(params: string): string | null {
  const match = /^\s*(?:url\(\s*)?["']?([^"')\s]+)["']?\s*\)?/.exec(params);
  return match?.[1] ? linkTarget(match[1]) : null;
}

/**
 * Stylesheets through postcss: rules, block at-rules and custom properties.
 */
export class CssParser extends BaseLanguageParser {
  readonly language = "css";
  readonly extensions = [".css"] as const;
  protected readonly kinds: readonly EntityKind[] = ["style_rule", "variable", "import"];

  protected extract(file: SourceFile): Extraction {
    const root = postcss.parse(file.source, { from: file.absolutePath });
    const entities: Entity[] = [];
    const imports: string[] = [];

    root.walkAtRules((atRule: AtRule) => {
      const lines = span(atRule);
      if (atRule.name === "import") {
        const target = importTarget(atRule.params);
        if (target && !imports.includes(target)) imports.push(target);
        if (lines && target) {
          entities.push(
            createEntity({
              kind: "import",
              path: file.path,
              name: target,
              startLine: lines.start,
              endLine: lines.end,
              metadata: { module: target },
            })
          );
        }
        return;
      }
      if (lines && BLOCK_AT_RULES.has(atRule.name.toLowerCase())) {
        entities.push(
          createEntity({
            kind: "style_rule",
            path: file.path,
            name: `@${atRule.name} ${atRule.params}`.trim(),
            startLine: lines.start,
            endLine: lines.end,
            metadata: { atRule: atRule.name },
          })
        );
      }
    });

    root.walkRules((rule: Rule) => {
      const lines = span(rule);
      if (!lines) return;
      const properties: string[] = [];
      rule.each((child) => {
        if (child.type === "decl") properties.push(child.prop);
      });
      entities.push(
        createEntity({
          kind: "style_rule",
          path: file.path,
          name: rule.selector,
          startLine: lines.start,
          endLine: lines.end,
          content: rule.toString().slice(0, 400),
          metadata: { selectors: rule.selectors, properties },
        })
      );
    });

    root.walkDecls(/^--/, (decl: Declaration) => {
      const lines = span(decl);
      if (!lines) return;
      entities.push(
        createEntity({
          kind: "variable",
          path: file.path,
          name: decl.prop,
          startLine: lines.start,
          endLine: lines.end,
          metadata: { value: decl.value },
        })
      );
    });

    return { entities, relationships: [], fileMetadata: { imports } };
  }
}
