import type { Entity, EntityKind, Relationship } from "../model.js";

export interface ParseOptions {
  /** Repository root; entity paths are made relative to it. Defaults to the file's directory. */
  rootPath?: string;
}

export interface ParseOutput {
  entities: Entity[];
  relationships: Relationship[];
  /** Failure messages. A non-empty list means the file produced no entities. */
  errors: string[];
  /** Entities removed by post-validation. */
  dropped: number;
}

/**
 * Port implemented by every language parser.
 *
 * `parse` never rejects: failures are logged and reported through
 * `errors` with empty entity and relationship lists.
 */
export interface LanguageParser {
  readonly language: string;
  readonly extensions: readonly string[];
  canParse(filePath: string): boolean;
  parse(filePath: string, options?: ParseOptions): Promise<ParseOutput>;
  supportedKinds(): ReadonlySet<EntityKind>;
}

export function emptyOutput(errors: string[] = []): ParseOutput {
  return { entities: [], relationships: [], errors, dropped: 0 };
}
