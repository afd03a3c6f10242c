import type { EntityKind, Metadata } from "../../core/model.js";
import type { SourceFile } from "./BaseLanguageParser.js";
import {
  CodeParser,
  decoratorsOf,
  parameterNames,
  precedingDocComment,
  simpleName,
  unquote,
  type GrammarName,
  type SymbolSink,
  type SyntaxNode,
} from "./CodeParser.js";

const CONSTANT_NAME = /^[A-Z][A-Z0-9_]*$/;

const FUNCTION_VALUES = new Set([
  "arrow_function",
  "function_expression",
  "function",
  "generator_function",
]);

const CLASS_DECLARATIONS = new Set(["class_declaration", "class", "abstract_class_declaration"]);

/**
 * Callee names of every call and `new` expression below `body`.
 */
export function jsCallNames(body: SyntaxNode | null): string[] {
  if (!body) return [];
  const names: string[] = [];
  // An expression-bodied arrow function may itself be the call.
  for (const call of [body, ...body.descendantsOfType(["call_expression", "new_expression"])]) {
    if (call.type !== "call_expression" && call.type !== "new_expression") continue;
    const callee = call.childForFieldName(call.type === "new_expression" ? "constructor" : "function");
    if (!callee) continue;
    if (callee.type === "identifier") {
      names.push(callee.text);
    } else if (callee.type === "member_expression") {
      const property = callee.childForFieldName("property");
      if (property) names.push(property.text);
    }
  }
  return [...new Set(names)];
}

function hasToken(node: SyntaxNode, token: string): boolean {
  return node.children.some((child) => child.type === token);
}

/**
 * Parser for JavaScript sources, including JSX and CommonJS `require`.
 */
export class JavaScriptParser extends CodeParser {
  readonly language: string = "javascript";
  readonly extensions: readonly string[] = [".js", ".jsx", ".mjs", ".cjs"];
  protected readonly kinds: readonly EntityKind[] = [
    "class",
    "function",
    "method",
    "variable",
    "constant",
    "import",
  ];

  protected grammarFor(_file: SourceFile): GrammarName {
    return "javascript";
  }

  protected collect(root: SyntaxNode, sink: SymbolSink): void {
    for (const statement of root.namedChildren) {
      this.visitStatement(statement, sink, statement);
    }
    this.collectRequires(root, sink);
  }

  /**
   * @param anchor node that carries the doc comment (the export statement for exported declarations)
   */
  protected visitStatement(node: SyntaxNode, sink: SymbolSink, anchor: SyntaxNode): void {
    switch (node.type) {
      case "export_statement": {
        const source = node.childForFieldName("source");
        if (source) sink.addImport(unquote(source.text));
        const declaration = node.childForFieldName("declaration");
        if (declaration) this.visitStatement(declaration, sink, node);
        return;
      }
      case "import_statement":
        this.visitImport(node, sink);
        return;
      case "function_declaration":
      case "generator_function_declaration":
        this.visitFunction(node, sink, anchor);
        return;
      case "lexical_declaration":
      case "variable_declaration":
        this.visitDeclarators(node, sink, anchor);
        return;
      default:
        if (CLASS_DECLARATIONS.has(node.type)) {
          this.visitClass(node, sink, anchor);
          return;
        }
        this.visitOther(node, sink, anchor);
    }
  }

  /** Hook for dialect-specific declarations. */
  protected visitOther(_node: SyntaxNode, _sink: SymbolSink, _anchor: SyntaxNode): void {}

  private visitImport(node: SyntaxNode, sink: SymbolSink): void {
    const source = node.childForFieldName("source");
    if (!source) return;
    const specifier = unquote(source.text);

    const names: string[] = [];
    const clause = node.namedChildren.find((child) => child.type === "import_clause");
    for (const identifier of clause?.descendantsOfType("identifier") ?? []) {
      names.push(identifier.text);
    }

    sink.addImport(specifier);
    sink.add("import", specifier, node, {
      metadata: { module: specifier, names, typeOnly: hasToken(node, "type") },
    });
  }

  private collectRequires(root: SyntaxNode, sink: SymbolSink): void {
    for (const call of root.descendantsOfType("call_expression")) {
      const fn = call.childForFieldName("function");
      if (fn?.type !== "identifier" || fn.text !== "require") continue;
      const argument = call.childForFieldName("arguments")?.namedChildren[0];
      if (argument?.type === "string") {
        sink.addImport(unquote(argument.text));
      }
    }
  }

  protected visitClass(node: SyntaxNode, sink: SymbolSink, anchor: SyntaxNode): void {
    const name = node.childForFieldName("name")?.text;
    if (!name) return;

    const bases: string[] = [];
    const implemented: string[] = [];
    const heritage = node.namedChildren.find((child) => child.type === "class_heritage");
    for (const clause of heritage?.namedChildren ?? []) {
      if (clause.type === "extends_clause") {
        const value = clause.childForFieldName("value") ?? clause.namedChildren[0];
        if (value) bases.push(simpleName(value.text));
      } else if (clause.type === "implements_clause") {
        for (const type of clause.namedChildren) implemented.push(simpleName(type.text));
      } else {
        bases.push(simpleName(clause.text));
      }
    }

    sink.add("class", name, node, {
      docstring: precedingDocComment(anchor),
      metadata: {
        bases,
        implements: implemented,
        decorators: decoratorsOf(node),
        isAbstract: node.type === "abstract_class_declaration",
      },
    });

    const body = node.childForFieldName("body");
    for (const member of body?.namedChildren ?? []) {
      this.visitMember(member, sink, name);
    }
  }

  private visitMember(member: SyntaxNode, sink: SymbolSink, className: string): void {
    const name = member.childForFieldName("name")?.text ?? member.childForFieldName("property")?.text;
    if (!name) return;

    const value = member.childForFieldName("value");
    const isMethod =
      member.type === "method_definition" ||
      member.type === "method_signature" ||
      member.type === "abstract_method_signature" ||
      (value !== null && FUNCTION_VALUES.has(value.type));
    const callable = member.type === "method_definition" || !value ? member : value;

    if (isMethod) {
      const metadata: Metadata = {
        parentClass: className,
        parameters: parameterNames(callable.childForFieldName("parameters")),
        decorators: decoratorsOf(member),
        calls: jsCallNames(callable.childForFieldName("body")),
        isAsync: hasToken(callable, "async"),
        isStatic: hasToken(member, "static"),
      };
      const accessor = member.children.find((child) => child.type === "get" || child.type === "set");
      if (accessor) metadata.accessor = accessor.type;
      sink.add("method", name, member, { docstring: precedingDocComment(member), metadata });
      return;
    }

    if (member.type === "field_definition" || member.type === "public_field_definition") {
      sink.add("variable", name, member, {
        docstring: precedingDocComment(member),
        metadata: { parentClass: className, isStatic: hasToken(member, "static") },
      });
    }
  }

  private visitFunction(node: SyntaxNode, sink: SymbolSink, anchor: SyntaxNode): void {
    const name = node.childForFieldName("name")?.text;
    if (!name) return;
    sink.add("function", name, node, {
      docstring: precedingDocComment(anchor),
      metadata: {
        parameters: parameterNames(node.childForFieldName("parameters")),
        calls: jsCallNames(node.childForFieldName("body")),
        isAsync: hasToken(node, "async"),
        isGenerator: node.type === "generator_function_declaration",
        exported: anchor.type === "export_statement",
      },
    });
  }

  private visitDeclarators(node: SyntaxNode, sink: SymbolSink, anchor: SyntaxNode): void {
    const isConst = hasToken(node, "const");
    const docstring = precedingDocComment(anchor);
    const exported = anchor.type === "export_statement";

    for (const declarator of node.namedChildren) {
      if (declarator.type !== "variable_declarator") continue;
      const nameNode = declarator.childForFieldName("name");
      if (!nameNode || nameNode.type !== "identifier") continue;
      const value = declarator.childForFieldName("value");

      if (value && FUNCTION_VALUES.has(value.type)) {
        const params = value.childForFieldName("parameters") ?? value.childForFieldName("parameter");
        sink.add("function", nameNode.text, declarator, {
          docstring,
          metadata: {
            parameters: params?.type === "identifier" ? [params.text] : parameterNames(params),
            calls: jsCallNames(value.childForFieldName("body")),
            isAsync: hasToken(value, "async"),
            exported,
          },
        });
        continue;
      }

      if (value && CLASS_DECLARATIONS.has(value.type)) {
        this.visitClass(value, sink, anchor);
        continue;
      }

      const kind: EntityKind = isConst && CONSTANT_NAME.test(nameNode.text) ? "constant" : "variable";
      sink.add(kind, nameNode.text, declarator, { docstring, metadata: { exported, isConst } });
    }
  }
}
