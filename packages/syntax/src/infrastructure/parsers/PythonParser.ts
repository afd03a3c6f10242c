import type { EntityKind, Metadata } from "../../core/model.js";
import type { SourceFile } from "./BaseLanguageParser.js";
import {
  CodeParser,
  parameterNames,
  simpleName,
  unquote,
  type GrammarName,
  type SymbolSink,
  type SyntaxNode,
} from "./CodeParser.js";

const CONSTANT_NAME = /^[A-Z][A-Z0-9_]*$/;

// Compound statements whose blocks may hold imports or definitions.
const TRANSPARENT = new Set([
  "if_statement",
  "elif_clause",
  "else_clause",
  "try_statement",
  "except_clause",
  "finally_clause",
  "with_statement",
  "block",
]);

/**
 * Docstring of a module, class or function body: the first statement when it
 * is a bare string literal.
 */
export function bodyDocstring(body: SyntaxNode | null): string | undefined {
  const first = body?.namedChildren[0];
  if (!first || first.type !== "expression_statement") return undefined;
  const literal = first.namedChildren[0];
  if (!literal || literal.type !== "string") return undefined;
  const text = unquote(literal.text.replace(/^[rRbBuUfF]+/, ""));
  const cleaned = text
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .trim();
  return cleaned || undefined;
}

function callNames(body: SyntaxNode | null): string[] {
  if (!body) return [];
  const names: string[] = [];
  for (const call of [body, ...body.descendantsOfType("call")]) {
    if (call.type !== "call") continue;
    const fn = call.childForFieldName("function");
    if (!fn) continue;
    if (fn.type === "identifier") {
      names.push(fn.text);
    } else if (fn.type === "attribute") {
      const attribute = fn.childForFieldName("attribute");
      if (attribute) names.push(attribute.text);
    }
  }
  return [...new Set(names)];
}

export class PythonParser extends CodeParser {
  readonly language = "python";
  readonly extensions = [".py", ".pyi"] as const;
  protected readonly kinds: readonly EntityKind[] = [
    "class",
    "function",
    "method",
    "variable",
    "constant",
    "import",
  ];

  protected grammarFor(_file: SourceFile): GrammarName {
    return "python";
  }

  protected moduleDocstring(root: SyntaxNode): string | undefined {
    return bodyDocstring(root);
  }

  protected collect(root: SyntaxNode, sink: SymbolSink): void {
    this.visitBlock(root, sink, undefined);
  }

  private visitBlock(block: SyntaxNode, sink: SymbolSink, parentClass: string | undefined): void {
    for (const statement of block.namedChildren) {
      this.visit(statement, sink, parentClass, []);
    }
  }

  private visit(node: SyntaxNode, sink: SymbolSink, parentClass: string | undefined, decorators: string[]): void {
    switch (node.type) {
      case "decorated_definition": {
        const definition = node.childForFieldName("definition");
        const names = node.namedChildren
          .filter((child) => child.type === "decorator")
          .map((d) => d.text.replace(/^@/, "").trim());
        if (definition) this.visit(definition, sink, parentClass, names);
        return;
      }
      case "class_definition":
        this.visitClass(node, sink, parentClass, decorators);
        return;
      case "function_definition":
        this.visitFunction(node, sink, parentClass, decorators);
        return;
      case "import_statement":
        this.visitImport(node, sink);
        return;
      case "import_from_statement":
        this.visitFromImport(node, sink);
        return;
      case "expression_statement":
        this.visitAssignment(node, sink, parentClass);
        return;
      case "block":
        this.visitBlock(node, sink, parentClass);
        return;
      default:
        if (TRANSPARENT.has(node.type)) {
          for (const child of node.namedChildren) {
            if (TRANSPARENT.has(child.type)) {
              this.visit(child, sink, parentClass, []);
            }
          }
        }
    }
  }

  private visitClass(node: SyntaxNode, sink: SymbolSink, parentClass: string | undefined, decorators: string[]): void {
    const name = node.childForFieldName("name")?.text;
    if (!name) return;

    const bases = (node.childForFieldName("superclasses")?.namedChildren ?? [])
      .filter((arg) => arg.type === "identifier" || arg.type === "attribute")
      .map((arg) => simpleName(arg.text));

    const metadata: Metadata = { bases, decorators };
    if (parentClass) metadata.parentClass = parentClass;

    const body = node.childForFieldName("body");
    sink.add("class", name, node, { docstring: bodyDocstring(body), metadata });
    if (body) this.visitBlock(body, sink, name);
  }

  private visitFunction(node: SyntaxNode, sink: SymbolSink, parentClass: string | undefined, decorators: string[]): void {
    const name = node.childForFieldName("name")?.text;
    if (!name) return;

    const body = node.childForFieldName("body");
    const metadata: Metadata = {
      parameters: parameterNames(node.childForFieldName("parameters")),
      decorators,
      calls: callNames(body),
      isAsync: node.children.some((child) => child.type === "async"),
    };
    const returns = node.childForFieldName("return_type")?.text;
    if (returns) metadata.returns = returns;
    if (parentClass) metadata.parentClass = parentClass;

    sink.add(parentClass ? "method" : "function", name, node, { docstring: bodyDocstring(body), metadata });
  }

  private visitImport(node: SyntaxNode, sink: SymbolSink): void {
    for (const child of node.namedChildren) {
      const target = child.type === "aliased_import" ? child.childForFieldName("name") : child;
      if (!target || target.type !== "dotted_name") continue;
      const metadata: Metadata = { module: target.text };
      const alias = child.type === "aliased_import" ? child.childForFieldName("alias")?.text : undefined;
      if (alias) metadata.alias = alias;
      sink.addImport(target.text);
      sink.add("import", target.text, node, { metadata });
    }
  }

  private visitFromImport(node: SyntaxNode, sink: SymbolSink): void {
    const moduleNode = node.childForFieldName("module_name");
    if (!moduleNode) return;
    const module = moduleNode.text;

    const names = node.namedChildren
      .filter((child) => child.startIndex !== moduleNode.startIndex)
      .map((child) => (child.type === "aliased_import" ? child.childForFieldName("name")?.text : child.text))
      .filter((name): name is string => typeof name === "string" && name !== "" && !name.startsWith("#"));

    // `from . import sibling` names modules, not attributes of a package.
    if (/^\.+$/.test(module)) {
      for (const name of names) sink.addImport(`${module}${name}`);
    } else {
      sink.addImport(module);
    }
    sink.add("import", module, node, { metadata: { module, names } });
  }

  private visitAssignment(node: SyntaxNode, sink: SymbolSink, parentClass: string | undefined): void {
    const assignment = node.namedChildren[0];
    if (!assignment || assignment.type !== "assignment") return;
    const left = assignment.childForFieldName("left");
    if (!left || left.type !== "identifier") return;

    const kind: EntityKind = CONSTANT_NAME.test(left.text) ? "constant" : "variable";
    const metadata: Metadata = {};
    const annotation = assignment.childForFieldName("type")?.text;
    if (annotation) metadata.annotation = annotation;
    if (parentClass) metadata.parentClass = parentClass;
    sink.add(kind, left.text, node, { metadata });
  }
}
