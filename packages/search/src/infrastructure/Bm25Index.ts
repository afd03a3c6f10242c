/**
 * Okapi BM25 over entity documents.
 *
 * Corpus statistics (document frequency, idf, average length) are computed
 * once in `build` and carried in the snapshot, so a reloaded index scores
 * exactly like the one that was saved.
 */

import { IndexNotBuiltError } from "@repograph/core";
import { byScoreThenId, type ScoredId } from "@repograph/graph";

import type { TextDocument } from "../core/documents.js";
import { tokenize } from "../core/tokenize.js";

export interface Bm25Options {
  k1: number;
  b: number;
}

export interface Bm25Snapshot {
  version: 1;
  k1: number;
  b: number;
  documents: TextDocument[];
  lengths: number[];
  averageLength: number;
  df: Record<string, number>;
  idf: Record<string, number>;
}

interface Corpus {
  documents: TextDocument[];
  byId: Map<string, TextDocument>;
  frequencies: Array<Map<string, number>>;
  lengths: number[];
  averageLength: number;
  df: Map<string, number>;
  idf: Map<string, number>;
}

function termFrequencies(tokens: readonly string[]): Map<string, number> {
  const frequencies = new Map<string, number>();
  for (const token of tokens) {
    frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
  }
  return frequencies;
}

export class Bm25Index {
  private corpus?: Corpus;

  constructor(readonly options: Bm25Options = { k1: 1.2, b: 0.75 }) {}

  get isBuilt(): boolean {
    return this.corpus !== undefined;
  }

  get size(): number {
    return this.requireCorpus().documents.length;
  }

  /**
   * Replace the corpus. Documents keep their order; ids are expected to be
   * unique.
   */
  build(documents: readonly TextDocument[]): this {
    const copies = documents.map((document) => ({ ...document }));
    const frequencies: Array<Map<string, number>> = [];
    const lengths: number[] = [];
    const df = new Map<string, number>();

    for (const document of copies) {
      const tokens = tokenize(document.text);
      const tf = termFrequencies(tokens);
      frequencies.push(tf);
      lengths.push(tokens.length);
      for (const term of tf.keys()) {
        df.set(term, (df.get(term) ?? 0) + 1);
      }
    }

    const total = copies.length;
    const idf = new Map<string, number>();
    for (const [term, count] of df) {
      idf.set(term, Math.log((total - count + 0.5) / (count + 0.5)));
    }
    const averageLength = total === 0 ? 0 : lengths.reduce((sum, length) => sum + length, 0) / total;

    this.corpus = {
      documents: copies,
      byId: new Map(copies.map((document) => [document.id, document])),
      frequencies,
      lengths,
      averageLength,
      df,
      idf,
    };
    return this;
  }

  /**
   * Documents scoring above zero for `query`, best first, ties by id. A term
   * repeated in the query counts once per repetition.
   */
  search(query: string, topK: number): ScoredId[] {
    const corpus = this.requireCorpus();
    const terms = tokenize(query);
    if (terms.length === 0 || topK <= 0) return [];

    const { k1, b } = this.options;
    const results: ScoredId[] = [];
    corpus.documents.forEach((document, index) => {
      const tf = corpus.frequencies[index];
      const norm = k1 * (1 - b + (b * corpus.lengths[index]) / corpus.averageLength);
      let score = 0;
      for (const term of terms) {
        const count = tf.get(term);
        if (!count) continue;
        score += ((corpus.idf.get(term) ?? 0) * count * (k1 + 1)) / (count + norm);
      }
      if (score > 0) results.push({ id: document.id, score });
    });

    return results.sort(byScoreThenId).slice(0, topK);
  }

  document(id: string): TextDocument | undefined {
    return this.requireCorpus().byId.get(id);
  }

  toSnapshot(): Bm25Snapshot {
    const corpus = this.requireCorpus();
    return {
      version: 1,
      k1: this.options.k1,
      b: this.options.b,
      documents: corpus.documents.map((document) => ({ ...document })),
      lengths: [...corpus.lengths],
      averageLength: corpus.averageLength,
      df: Object.fromEntries(corpus.df),
      idf: Object.fromEntries(corpus.idf),
    };
  }

  /**
   * Restore an index from its snapshot. Term frequencies are re-derived from
   * the stored documents; the corpus statistics are taken as stored.
   */
  static fromSnapshot(snapshot: Bm25Snapshot): Bm25Index {
    const index = new Bm25Index({ k1: snapshot.k1, b: snapshot.b });
    const documents = snapshot.documents.map((document) => ({ ...document }));
    index.corpus = {
      documents,
      byId: new Map(documents.map((document) => [document.id, document])),
      frequencies: documents.map((document) => termFrequencies(tokenize(document.text))),
      lengths: [...snapshot.lengths],
      averageLength: snapshot.averageLength,
      df: new Map(Object.entries(snapshot.df)),
      idf: new Map(Object.entries(snapshot.idf)),
    };
    return index;
  }

  private requireCorpus(): Corpus {
    if (!this.corpus) {
      throw new IndexNotBuiltError("BM25 index");
    }
    return this.corpus;
  }
}
