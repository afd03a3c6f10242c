/**
 * Cross-file relationship discovery.
 *
 * Parsers only see one file at a time. They leave raw references on the file
 * entity (`imports`, `stylesheets`, `scripts`, `docReferences`) and on symbols
 * (`bases`, `implements`, `calls`). The connector resolves them against the
 * complete entity set.
 */

import path from "node:path";
import {
  REFERENCE_KEYS,
  createRelationship,
  referenceTarget,
  stringList,
  stringValue,
  toRepoPath,
  type Entity,
  type Relationship,
  type RelationshipKind,
} from "@repograph/syntax";

const posix = path.posix;

/** File metadata key and the relationship its resolved references become. */
const FILE_REFERENCES: ReadonlyArray<readonly [string, RelationshipKind]> = [
  ["imports", "imports"],
  ["stylesheets", "styles"],
  ["scripts", "scripts"],
  ["docReferences", "documents"],
];

const SCRIPT_LANGUAGES = new Set(["javascript", "typescript"]);
const COMPILED_SCRIPT = /\.(m|c)?jsx?$/;
const SOURCE_SCRIPT_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts"];

/** Confidence of a symbol reference resolved through an import. */
export const IMPORTED_SYMBOL_CONFIDENCE = 0.8;

/**
 * Path-like form of a Python module specifier: `pkg.mod` becomes `pkg/mod`,
 * `.sibling` becomes `./sibling` and every further leading dot climbs one
 * directory.
 */
export function pythonModulePath(specifier: string): string {
  const dots = /^\.*/.exec(specifier)?.[0].length ?? 0;
  const rest = specifier.slice(dots).split(".").filter(Boolean).join("/");
  if (dots === 0) return rest;
  const prefix = dots === 1 ? "./" : "../".repeat(dots - 1);
  return rest === "" ? prefix : `${prefix}${rest}`;
}

function isWithinRoot(candidate: string): boolean {
  return candidate !== ".." && !candidate.startsWith("../") && !posix.isAbsolute(candidate);
}

function byId(a: Relationship, b: Relationship): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class RelationshipConnector {
  /**
   * @param extensions extensions tried when a reference omits one, in order
   */
  constructor(private readonly extensions: readonly string[]) {}

  /**
   * Resolve every recorded reference. Pure over `entities`; unresolvable
   * references are dropped. The result is de-duplicated and sorted by id.
   */
  discover(entities: readonly Entity[], rootPath: string): Relationship[] {
    const files = new Map<string, Entity>();
    const symbolsByFile = new Map<string, Entity[]>();
    for (const entity of entities) {
      if (entity.kind === "file") {
        files.set(entity.path, entity);
      } else if (entity.kind !== "directory") {
        const list = symbolsByFile.get(entity.path) ?? [];
        list.push(entity);
        symbolsByFile.set(entity.path, list);
      }
    }

    const found = new Map<string, Relationship>();
    const importedFiles = new Map<string, string[]>();

    for (const file of files.values()) {
      const language = stringValue(file.metadata, "language");
      for (const [key, kind] of FILE_REFERENCES) {
        for (const reference of stringList(file.metadata, key)) {
          const target = this.resolveReference(reference, file, language, files, rootPath);
          if (!target || target.id === file.id) continue;
          const relationship = createRelationship(file.id, kind, target.id, { metadata: { reference } });
          found.set(relationship.id, relationship);
          if (kind === "imports") {
            const list = importedFiles.get(file.path) ?? [];
            if (!list.includes(target.path)) list.push(target.path);
            importedFiles.set(file.path, list);
          }
        }
      }
    }

    for (const [filePath, symbols] of symbolsByFile) {
      const imported = importedFiles.get(filePath);
      if (!imported) continue;
      for (const relationship of this.resolveSymbols(symbols, imported, symbolsByFile)) {
        found.set(relationship.id, relationship);
      }
    }

    return [...found.values()].sort(byId);
  }

  private resolveReference(
    reference: string,
    from: Entity,
    language: string | undefined,
    files: ReadonlyMap<string, Entity>,
    rootPath: string
  ): Entity | undefined {
    let specifier = reference.trim();
    if (specifier === "") return undefined;

    if (language === "python") {
      specifier = pythonModulePath(specifier);
    } else if (language && SCRIPT_LANGUAGES.has(language) && !/^[./]/.test(specifier)) {
      // Bare specifiers name packages.
      return undefined;
    }

    const root = path.resolve(rootPath);
    if (path.isAbsolute(specifier) && specifier.startsWith(root + path.sep)) {
      specifier = toRepoPath(root, specifier);
    }

    for (const candidate of this.candidates(specifier, posix.dirname(from.path))) {
      const target = files.get(candidate);
      if (target) return target;
    }
    return undefined;
  }

  /**
   * Candidate repository paths in lookup order: relative to the referencing
   * file, from the root, with each extension appended, then index files.
   */
  candidates(specifier: string, fromDir: string): string[] {
    const bases = [posix.normalize(posix.join(fromDir, specifier))];
    if (!specifier.startsWith(".")) {
      bases.push(posix.normalize(specifier.replace(/^\/+/, "")));
    }
    const roots = [...new Set(bases.map((base) => base.replace(/\/+$/, "")))].filter(
      (base) => base !== "" && base !== "." && isWithinRoot(base)
    );

    const ordered: string[] = [...roots];
    for (const base of roots) {
      if (COMPILED_SCRIPT.test(base)) {
        const stem = base.replace(COMPILED_SCRIPT, "");
        ordered.push(...SOURCE_SCRIPT_EXTENSIONS.map((extension) => `${stem}${extension}`));
      }
    }
    for (const base of roots) {
      ordered.push(...this.extensions.map((extension) => `${base}${extension}`));
    }
    for (const base of roots) {
      ordered.push(...this.extensions.map((extension) => `${base}/index${extension}`));
      ordered.push(`${base}/__init__.py`);
    }
    return [...new Set(ordered)];
  }

  /**
   * `bases`, `implements` and `calls` naming a symbol that is not defined in
   * the same file, matched against the files it imports.
   */
  private resolveSymbols(
    symbols: readonly Entity[],
    imported: readonly string[],
    symbolsByFile: ReadonlyMap<string, Entity[]>
  ): Relationship[] {
    const localNames = new Set(
      symbols.filter((entity) => entity.kind !== "import").map((entity) => entity.name)
    );
    const relationships: Relationship[] = [];

    for (const entity of symbols) {
      for (const key of REFERENCE_KEYS) {
        const { kind, targets } = referenceTarget(key);
        for (const name of stringList(entity.metadata, key)) {
          if (localNames.has(name)) continue;
          const target = imported
            .flatMap((filePath) => symbolsByFile.get(filePath) ?? [])
            .find((candidate) => candidate.name === name && targets.has(candidate.kind));
          if (!target) continue;
          relationships.push(
            createRelationship(entity.id, kind, target.id, {
              confidence: IMPORTED_SYMBOL_CONFIDENCE,
              metadata: { reference: name },
            })
          );
        }
      }
    }
    return relationships;
  }
}
