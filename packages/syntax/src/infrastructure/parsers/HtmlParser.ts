import { parse, type DefaultTreeAdapterMap } from "parse5";

import { createEntity, type Entity, type EntityKind, type Metadata } from "../../core/model.js";
import { BaseLanguageParser, type Extraction, type SourceFile } from "./BaseLanguageParser.js";
import { linkTarget } from "./MarkdownParser.js";

type Node = DefaultTreeAdapterMap["node"];
type Element = DefaultTreeAdapterMap["element"];
type Template = DefaultTreeAdapterMap["template"];

// Elements worth an entity even without an id.
const SIGNIFICANT_TAGS = new Set(["title", "script", "link", "style", "form", "template"]);

function isElement(node: Node): node is Element {
  return "tagName" in node;
}

function isTemplate(node: Node): node is Template {
  return isElement(node) && node.tagName === "template";
}

function childrenOf(node: Node): Node[] {
  if (isTemplate(node)) {
    return [...node.content.childNodes];
  }
  return "childNodes" in node ? [...node.childNodes] : [];
}

function attribute(element: Element, name: string): string | undefined {
  return element.attrs.find((attr) => attr.name === name)?.value;
}

function textContent(node: Node): string {
  if (node.nodeName === "#text" && "value" in node) return node.value;
  return childrenOf(node).map(textContent).join("");
}

function elementName(element: Element): string {
  const id = attribute(element, "id");
  if (id) return `${element.tagName}#${id}`;
  if (element.tagName === "title") return textContent(element).trim() || "title";
  const source = attribute(element, "src") ?? attribute(element, "href");
  return source ? `${element.tagName} ${source}` : element.tagName;
}

function isStylesheet(element: Element, href: string): boolean {
  const rel = (attribute(element, "rel") ?? "").toLowerCase().split(/\s+/);
  return rel.includes("stylesheet") || /\.css$/i.test(href);
}

/**
 * HTML documents through parse5 with source locations. Stylesheet links and
 * script sources become asset references on the file.
 */
export class HtmlParser extends BaseLanguageParser {
  readonly language = "html";
  readonly extensions = [".html", ".htm"] as const;
  protected readonly kinds: readonly EntityKind[] = ["element"];

  protected extract(file: SourceFile): Extraction {
    const document = parse(file.source, { sourceCodeLocationInfo: true });
    const entities: Entity[] = [];
    const stylesheets: string[] = [];
    const scripts: string[] = [];
    let title: string | null = null;

    const visit = (node: Node): void => {
      if (isElement(node)) {
        const href = attribute(node, "href");
        const src = attribute(node, "src");
        if (node.tagName === "link" && href && isStylesheet(node, href)) {
          const target = linkTarget(href);
          if (target && !stylesheets.includes(target)) stylesheets.push(target);
        }
        if (node.tagName === "script" && src) {
          const target = linkTarget(src);
          if (target && !scripts.includes(target)) scripts.push(target);
        }
        if (node.tagName === "title" && title === null) {
          title = textContent(node).trim() || null;
        }

        const location = node.sourceCodeLocation;
        if (location && (attribute(node, "id") || SIGNIFICANT_TAGS.has(node.tagName))) {
          const metadata: Metadata = { tag: node.tagName };
          const className = attribute(node, "class");
          if (className) metadata.classes = className.split(/\s+/).filter(Boolean);
          if (href) metadata.href = href;
          if (src) metadata.src = src;
          entities.push(
            createEntity({
              kind: "element",
              path: file.path,
              name: elementName(node),
              startLine: location.startLine,
              endLine: location.endLine,
              content: textContent(node).trim().slice(0, 200),
              metadata,
            })
          );
        }
      }
      for (const child of childrenOf(node)) visit(child);
    };
    visit(document);

    return {
      entities,
      relationships: [],
      fileMetadata: { stylesheets, scripts, title },
    };
  }
}
