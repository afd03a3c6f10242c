import { fromMarkdown } from "mdast-util-from-markdown";
import type { Nodes } from "mdast";

import { createEntity, type Entity, type EntityKind } from "../../core/model.js";
import { BaseLanguageParser, type Extraction, type SourceFile } from "./BaseLanguageParser.js";

// `path/to/file.ext` inside inline code
const CODE_PATH = /^[\w@~./-]*[\w-]\.[A-Za-z][A-Za-z0-9]{0,7}$/;
const EXTERNAL_URL = /^(?:[a-z][a-z0-9+.-]*:|\/\/|#)/i;

function textOf(node: Nodes): string {
  if ("value" in node && typeof node.value === "string") return node.value;
  let text = "";
  if ("children" in node) {
    for (const child of node.children) text += textOf(child);
  }
  return text;
}

function lines(node: Nodes): { start: number; end: number } | null {
  const position = node.position;
  if (!position) return null;
  return { start: position.start.line, end: position.end.line };
}

/**
 * Strip a query or fragment from a link target and decode it.
 */
export function linkTarget(url: string): string | null {
  if (EXTERNAL_URL.test(url)) return null;
  const bare = url.split(/[?#]/)[0] ?? "";
  if (bare === "") return null;
  try {
    return decodeURIComponent(bare);
  } catch {
    return bare;
  }
}

/**
 * Markdown documents: headings, fenced code blocks and links. Inline code
 * spans that look like file paths and relative link targets are recorded as
 * documentation references on the file.
 */
export class MarkdownParser extends BaseLanguageParser {
  readonly language = "markdown";
  readonly extensions = [".md", ".markdown", ".mdx"] as const;
  protected readonly kinds: readonly EntityKind[] = ["heading", "code_block", "link"];

  protected extract(file: SourceFile): Extraction {
    const tree = fromMarkdown(file.source);
    const entities: Entity[] = [];
    const references: string[] = [];
    const addReference = (target: string): void => {
      if (!references.includes(target)) references.push(target);
    };

    const visit = (node: Nodes): void => {
      const span = lines(node);
      switch (node.type) {
        case "heading": {
          const title = textOf(node).trim();
          if (span && title) {
            entities.push(
              createEntity({
                kind: "heading",
                path: file.path,
                name: title,
                startLine: span.start,
                endLine: span.end,
                metadata: { depth: node.depth },
              })
            );
          }
          break;
        }
        case "code": {
          if (span) {
            const language = node.lang ?? "";
            entities.push(
              createEntity({
                kind: "code_block",
                path: file.path,
                name: language ? `${language} code block` : "code block",
                startLine: span.start,
                endLine: span.end,
                content: node.value.slice(0, 400),
                metadata: { language },
              })
            );
          }
          break;
        }
        case "inlineCode": {
          const value = node.value.trim();
          if (CODE_PATH.test(value)) addReference(value);
          break;
        }
        case "link": {
          const target = linkTarget(node.url);
          if (target) addReference(target);
          if (span) {
            entities.push(
              createEntity({
                kind: "link",
                path: file.path,
                name: textOf(node).trim() || node.url,
                startLine: span.start,
                endLine: span.end,
                metadata: { url: node.url, external: target === null },
              })
            );
          }
          break;
        }
        default:
          break;
      }
      if ("children" in node) {
        for (const child of node.children) visit(child);
      }
    };
    visit(tree);

    const title = entities.find((entity) => entity.kind === "heading" && entity.metadata.depth === 1);
    return {
      entities,
      relationships: [],
      fileMetadata: { docReferences: references, title: title?.name ?? null },
    };
  }
}
