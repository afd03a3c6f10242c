import type { EntityKind } from "../../core/model.js";
import { extensionOf } from "../../core/model.js";
import type { SourceFile } from "./BaseLanguageParser.js";
import { precedingDocComment, simpleName, type GrammarName, type SymbolSink, type SyntaxNode } from "./CodeParser.js";
import { JavaScriptParser } from "./JavaScriptParser.js";

/**
 * TypeScript dialect: everything the JavaScript walk handles plus
 * interfaces, enums, namespaces and `implements`.
 */
export class TypeScriptParser extends JavaScriptParser {
  readonly language: string = "typescript";
  readonly extensions: readonly string[] = [".ts", ".tsx", ".mts", ".cts"];
  protected readonly kinds: readonly EntityKind[] = [
    "class",
    "function",
    "method",
    "variable",
    "constant",
    "import",
    "interface",
    "enum",
    "module",
  ];

  protected grammarFor(file: SourceFile): GrammarName {
    return extensionOf(file.absolutePath) === ".tsx" ? "tsx" : "typescript";
  }

  protected visitOther(node: SyntaxNode, sink: SymbolSink, anchor: SyntaxNode): void {
    switch (node.type) {
      case "interface_declaration":
        this.visitInterface(node, sink, anchor);
        return;
      case "enum_declaration":
        this.visitEnum(node, sink, anchor);
        return;
      case "internal_module":
      case "module":
        this.visitNamespace(node, sink, anchor);
        return;
      case "expression_statement": {
        // `namespace X {}` parses as an expression statement at top level
        const inner = node.namedChildren[0];
        if (inner && inner.type === "internal_module") this.visitNamespace(inner, sink, anchor);
        return;
      }
    }
  }

  private visitInterface(node: SyntaxNode, sink: SymbolSink, anchor: SyntaxNode): void {
    const name = node.childForFieldName("name")?.text;
    if (!name) return;
    const clause = node.namedChildren.find((child) => child.type === "extends_type_clause");
    const bases = (clause?.namedChildren ?? []).map((type) => simpleName(type.text));
    const body = node.childForFieldName("body");
    const members = (body?.namedChildren ?? [])
      .map((member) => member.childForFieldName("name")?.text)
      .filter((member): member is string => typeof member === "string");
    sink.add("interface", name, node, {
      docstring: precedingDocComment(anchor),
      metadata: { bases, members },
    });
  }

  private visitEnum(node: SyntaxNode, sink: SymbolSink, anchor: SyntaxNode): void {
    const name = node.childForFieldName("name")?.text;
    if (!name) return;
    const body = node.childForFieldName("body");
    const members = (body?.namedChildren ?? [])
      .map((member) => (member.type === "enum_assignment" ? member.childForFieldName("name")?.text : member.text))
      .filter((member): member is string => typeof member === "string" && member !== "" && !member.startsWith("/"));
    sink.add("enum", name, node, {
      docstring: precedingDocComment(anchor),
      metadata: { members, isConst: node.children.some((child) => child.type === "const") },
    });
  }

  private visitNamespace(node: SyntaxNode, sink: SymbolSink, anchor: SyntaxNode): void {
    const name = node.childForFieldName("name")?.text;
    if (!name) return;
    sink.add("module", name, node, { docstring: precedingDocComment(anchor), metadata: {} });
    const body = node.childForFieldName("body");
    for (const statement of body?.namedChildren ?? []) {
      this.visitStatement(statement, sink, statement);
    }
  }
}
