import Parser from "tree-sitter";

import {
  createEntity,
  createRelationship,
  stringList,
  type Entity,
  type EntityKind,
  type Metadata,
  type Relationship,
  type RelationshipKind,
} from "../../core/model.js";
import { BaseLanguageParser, type Extraction, type SourceFile } from "./BaseLanguageParser.js";

export type SyntaxNode = Parser.SyntaxNode;

export type GrammarName = "python" | "javascript" | "typescript" | "tsx";

// Grammar modules type their language objects loosely.
type TreeSitterLanguage = unknown;

const GRAMMAR_LOADERS: Record<GrammarName, () => Promise<TreeSitterLanguage>> = {
  python: async () => {
    const mod = await import("tree-sitter-python");
    return mod.default;
  },
  javascript: async () => {
    const mod = await import("tree-sitter-javascript");
    return mod.default;
  },
  typescript: async () => {
    const mod = await import("tree-sitter-typescript");
    return mod.default.typescript;
  },
  tsx: async () => {
    const mod = await import("tree-sitter-typescript");
    return mod.default.tsx;
  },
};

const grammarCache = new Map<GrammarName, Promise<TreeSitterLanguage>>();

function loadGrammar(name: GrammarName): Promise<TreeSitterLanguage> {
  let pending = grammarCache.get(name);
  if (!pending) {
    pending = GRAMMAR_LOADERS[name]().catch((error: unknown) => {
      // Retry on the next file instead of caching the failure.
      grammarCache.delete(name);
      throw error;
    });
    grammarCache.set(name, pending);
  }
  return pending;
}

/** Characters of a symbol's source kept as its content snippet. */
export const SNIPPET_LIMIT = 400;

export const startLine = (node: SyntaxNode): number => node.startPosition.row + 1;
export const endLine = (node: SyntaxNode): number => node.endPosition.row + 1;

/** First `ERROR` or missing node in document order. */
export function firstSyntaxError(node: SyntaxNode): SyntaxNode | undefined {
  if (node.type === "ERROR" || node.isMissing) return node;
  for (const child of node.children) {
    if (!child.hasError && !child.isMissing) continue;
    const found = firstSyntaxError(child);
    if (found) return found;
  }
  return undefined;
}

/**
 * Collects the entities of one file while a subclass walks its tree.
 */
export class SymbolSink {
  readonly entities: Entity[] = [];
  readonly imports: string[] = [];

  constructor(readonly file: SourceFile) {}

  add(
    kind: EntityKind,
    name: string,
    node: SyntaxNode,
    options: { docstring?: string; metadata?: Metadata } = {}
  ): Entity {
    const entity = createEntity({
      kind,
      path: this.file.path,
      name,
      startLine: startLine(node),
      endLine: endLine(node),
      docstring: options.docstring,
      content: node.text.slice(0, SNIPPET_LIMIT),
      metadata: options.metadata ?? {},
    });
    this.entities.push(entity);
    return entity;
  }

  addImport(specifier: string): void {
    if (specifier && !this.imports.includes(specifier)) {
      this.imports.push(specifier);
    }
  }
}

/**
 * Strip comment markers from a JSDoc block.
 */
export function parseJSDoc(text: string): string {
  const body = text.replace(/^\/\*\*\s*/, "").replace(/\s*\*\/$/, "");
  return body
    .split("\n")
    .map((line) => line.replace(/^\s*\*\s?/, ""))
    .join("\n")
    .trim();
}

/**
 * JSDoc block directly above `node`, skipping decorators. A blank line
 * between comment and declaration detaches the comment.
 */
export function precedingDocComment(node: SyntaxNode): string | undefined {
  let anchor = node;
  let previous = node.previousNamedSibling;
  while (previous && previous.type === "decorator") {
    anchor = previous;
    previous = previous.previousNamedSibling;
  }
  if (!previous || previous.type !== "comment") return undefined;
  if (!previous.text.startsWith("/**") || previous.text.startsWith("/***")) return undefined;
  if (endLine(previous) < startLine(anchor) - 1) return undefined;
  return parseJSDoc(previous.text) || undefined;
}

/**
 * Unquote a string literal node's text.
 */
export function unquote(text: string): string {
  for (const quote of ['"""', "'''"]) {
    if (text.startsWith(quote) && text.endsWith(quote) && text.length >= 6) {
      return text.slice(3, -3);
    }
  }
  const first = text.charAt(0);
  if ((first === '"' || first === "'" || first === "`") && text.endsWith(first) && text.length >= 2) {
    return text.slice(1, -1);
  }
  return text;
}

/**
 * Names declared by a parameter list, in order.
 */
export function parameterNames(params: SyntaxNode | null): string[] {
  if (!params) return [];
  const names: string[] = [];
  for (const param of params.namedChildren) {
    if (param.type === "comment") continue;
    const identifier =
      param.type === "identifier" ? param : param.descendantsOfType("identifier")[0];
    if (identifier) {
      names.push(identifier.text);
    }
  }
  return names;
}

/**
 * Decorator source texts attached to a declaration, without the `@`.
 */
export function decoratorsOf(node: SyntaxNode): string[] {
  const own = node.namedChildren.filter((child) => child.type === "decorator");
  const preceding: SyntaxNode[] = [];
  let previous = node.previousNamedSibling;
  while (previous && previous.type === "decorator") {
    preceding.unshift(previous);
    previous = previous.previousNamedSibling;
  }
  return [...preceding, ...own].map((d) => d.text.replace(/^@/, "").trim());
}

/** Last segment of a dotted or member expression: `a.b.c` becomes `c`. */
export function simpleName(text: string): string {
  const cleaned = text.replace(/<.*$/s, "").replace(/\(.*$/s, "").trim();
  const parts = cleaned.split(".");
  return parts[parts.length - 1] ?? cleaned;
}

function uniqueSorted(values: string[]): string[] {
  return [...new Set(values)].sort();
}

/** Kinds a symbolic reference may resolve to. */
const REFERENCE_TARGETS: Record<"bases" | "implements" | "calls", { kind: RelationshipKind; targets: ReadonlySet<EntityKind> }> = {
  bases: { kind: "inherits", targets: new Set<EntityKind>(["class", "interface"]) },
  implements: { kind: "implements", targets: new Set<EntityKind>(["interface", "class"]) },
  calls: { kind: "calls", targets: new Set<EntityKind>(["function", "method", "class"]) },
};

export const REFERENCE_KEYS = ["bases", "implements", "calls"] as const;
export type ReferenceKey = (typeof REFERENCE_KEYS)[number];

export function referenceTarget(key: ReferenceKey): { kind: RelationshipKind; targets: ReadonlySet<EntityKind> } {
  return REFERENCE_TARGETS[key];
}

/**
 * Tree-sitter backed parser for programming languages. Subclasses walk the
 * syntax tree into a SymbolSink; this class loads grammars, links symbol
 * references that resolve inside the same file and records imports on the
 * file entity.
 */
export abstract class CodeParser extends BaseLanguageParser {
  private readonly parser = new Parser();

  protected abstract grammarFor(file: SourceFile): GrammarName;

  protected abstract collect(root: SyntaxNode, sink: SymbolSink): void;

  protected moduleDocstring(_root: SyntaxNode): string | undefined {
    return undefined;
  }

  protected async extract(file: SourceFile): Promise<Extraction> {
    const grammar = await loadGrammar(this.grammarFor(file));
    this.parser.setLanguage(grammar);
    const tree = this.parser.parse(file.source, undefined, {
      bufferSize: Math.max(32 * 1024, file.source.length * 2),
    });

    if (tree.rootNode.hasError) {
      const broken = firstSyntaxError(tree.rootNode);
      const where = broken ? ` at line ${startLine(broken)}` : "";
      throw new Error(`Syntax error in ${file.path}${where}`);
    }

    const sink = new SymbolSink(file);
    this.collect(tree.rootNode, sink);

    return {
      entities: sink.entities,
      relationships: this.linkLocalReferences(sink.entities),
      fileMetadata: { imports: sink.imports },
      fileDocstring: this.moduleDocstring(tree.rootNode),
    };
  }

  /**
   * Turn `bases`, `implements` and `calls` metadata into relationships when
   * the named symbol is defined in the same file.
   */
  private linkLocalReferences(entities: Entity[]): Relationship[] {
    const byName = new Map<string, Entity[]>();
    for (const entity of entities) {
      const list = byName.get(entity.name) ?? [];
      list.push(entity);
      byName.set(entity.name, list);
    }

    const relationships: Relationship[] = [];
    for (const entity of entities) {
      for (const key of REFERENCE_KEYS) {
        const { kind, targets } = REFERENCE_TARGETS[key];
        for (const name of uniqueSorted(stringList(entity.metadata, key))) {
          const target = (byName.get(name) ?? []).find(
            (candidate) => candidate.id !== entity.id && targets.has(candidate.kind)
          );
          if (target) {
            relationships.push(createRelationship(entity.id, kind, target.id));
          }
        }
      }
    }
    return relationships;
  }
}
