import { createLogger, tryCatchAsync } from "@repograph/core";

import { extensionOf } from "../core/model.js";
import { emptyOutput, type LanguageParser, type ParseOptions, type ParseOutput } from "../core/ports/LanguageParser.js";
import { CssParser } from "./parsers/CssParser.js";
import { HtmlParser } from "./parsers/HtmlParser.js";
import { JavaScriptParser } from "./parsers/JavaScriptParser.js";
import { MarkdownParser } from "./parsers/MarkdownParser.js";
import { PythonParser } from "./parsers/PythonParser.js";
import { TypeScriptParser } from "./parsers/TypeScriptParser.js";

const log = createLogger("registry");

/**
 * Maps languages and file extensions to parsers. Constructed explicitly and
 * handed to whoever needs it; there is no shared instance.
 */
export class ParserRegistry {
  private readonly byLanguage = new Map<string, LanguageParser>();
  private readonly byExtension = new Map<string, LanguageParser>();

  /**
   * Register a parser under a language name. An extension already claimed by
   * another parser moves to this one.
   */
  register(language: string, parser: LanguageParser): this {
    this.byLanguage.set(language, parser);
    for (const raw of parser.extensions) {
      const extension = raw.toLowerCase();
      const previous = this.byExtension.get(extension);
      if (previous && previous !== parser) {
        log.warn(`Extension ${extension} reassigned from ${previous.language} to ${parser.language}`);
      }
      this.byExtension.set(extension, parser);
    }
    return this;
  }

  /**
   * Exact extension match first, then each parser's own `canParse` in
   * registration order.
   */
  parserFor(filePath: string): LanguageParser | undefined {
    const exact = this.byExtension.get(extensionOf(filePath));
    if (exact) return exact;
    for (const parser of this.byLanguage.values()) {
      if (parser.canParse(filePath)) return parser;
    }
    return undefined;
  }

  parserForLanguage(language: string): LanguageParser | undefined {
    return this.byLanguage.get(language);
  }

  /**
   * Parse one file. Never rejects: an unknown extension or a parser that
   * throws anyway both yield an empty output.
   */
  async parse(filePath: string, options: ParseOptions = {}): Promise<ParseOutput> {
    const parser = this.parserFor(filePath);
    if (!parser) {
      log.debug(`No parser for ${filePath}`);
      return emptyOutput();
    }
    const result = await tryCatchAsync(() => parser.parse(filePath, options));
    if (!result.ok) {
      log.error(`${parser.language} parser threw on ${filePath}: ${result.error.message}`);
      return emptyOutput([result.error.message]);
    }
    return result.value;
  }

  supportedExtensions(): string[] {
    return [...this.byExtension.keys()].sort();
  }

  languages(): string[] {
    return [...this.byLanguage.keys()];
  }
}

/**
 * Registry with every built-in parser.
 */
export function createDefaultRegistry(): ParserRegistry {
  return new ParserRegistry()
    .register("python", new PythonParser())
    .register("javascript", new JavaScriptParser())
    .register("typescript", new TypeScriptParser())
    .register("markdown", new MarkdownParser())
    .register("html", new HtmlParser())
    .register("css", new CssParser());
}
