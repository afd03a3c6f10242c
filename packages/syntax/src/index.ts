export {
  ENTITY_KINDS,
  RELATIONSHIP_KINDS,
  SYMBOL_KINDS,
  isEntityKind,
  entityId,
  relationshipId,
  createEntity,
  createRelationship,
  entityDefect,
  stringList,
  stringValue,
  toRepoPath,
  extensionOf,
  summarize,
} from "./core/model.js";
export type {
  EntityKind,
  RelationshipKind,
  MetadataValue,
  Metadata,
  Entity,
  Relationship,
  EntityInit,
  EntitySummary,
} from "./core/model.js";

export { emptyOutput } from "./core/ports/LanguageParser.js";
export type { LanguageParser, ParseOptions, ParseOutput } from "./core/ports/LanguageParser.js";

export { BaseLanguageParser, countLines, FILE_CONTENT_PREVIEW } from "./infrastructure/parsers/BaseLanguageParser.js";
export type { Extraction, SourceFile } from "./infrastructure/parsers/BaseLanguageParser.js";
export { CodeParser, REFERENCE_KEYS, referenceTarget } from "./infrastructure/parsers/CodeParser.js";
export type { ReferenceKey } from "./infrastructure/parsers/CodeParser.js";
export { PythonParser } from "./infrastructure/parsers/PythonParser.js";
export { JavaScriptParser } from "./infrastructure/parsers/JavaScriptParser.js";
export { TypeScriptParser } from "./infrastructure/parsers/TypeScriptParser.js";
export { MarkdownParser } from "./infrastructure/parsers/MarkdownParser.js";
export { HtmlParser } from "./infrastructure/parsers/HtmlParser.js";
export { CssParser } from "./infrastructure/parsers/CssParser.js";
export { ParserRegistry, createDefaultRegistry } from "./infrastructure/ParserRegistry.js";
