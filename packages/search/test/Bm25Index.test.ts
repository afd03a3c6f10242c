import { describe, it, expect } from "vitest";
import { IndexNotBuiltError } from "@repograph/core";

import { Bm25Index } from "../src/infrastructure/Bm25Index.js";
import { Bm25SnapshotSchema } from "../src/infrastructure/SnapshotStore.js";

const CORPUS = [
  { id: "a", text: "foo baz" },
  { id: "b", text: "bar qux" },
  { id: "c", text: "hello world" },
];

describe("Bm25Index", () => {
  it("throws before it is built", () => {
    const index = new Bm25Index();
    expect(index.isBuilt).toBe(false);
    expect(() => index.search("bar", 5)).toThrow(IndexNotBuiltError);
    expect(() => index.toSnapshot()).toThrow(IndexNotBuiltError);
    expect(() => index.document("a")).toThrow(IndexNotBuiltError);
    expect(() => index.size).toThrow(IndexNotBuiltError);
  });

  it("returns only the document containing a rare term", () => {
    const index = new Bm25Index().build(CORPUS);
    // df = 1 of 3 documents, tf = 1 at average length: the score is the idf.
    const results = index.search("bar", 10);
    expect(results).toHaveLength(1);
    expect(results[0].id).toBe("b");
    expect(results[0].score).toBeCloseTo(Math.log(2.5 / 1.5), 12);
  });

  it("counts a repeated query term once per repetition", () => {
    const index = new Bm25Index().build(CORPUS);
    expect(index.search("bar bar", 10)[0].score).toBeCloseTo(2 * Math.log(2.5 / 1.5), 12);
  });

  it("excludes documents that score zero or less", () => {
    const index = new Bm25Index().build([
      { id: "a", text: "common alpha" },
      { id: "b", text: "common beta" },
      { id: "c", text: "common gamma" },
    ]);
    expect(index.search("common", 10)).toEqual([]);
    expect(index.search("missing", 10)).toEqual([]);
    expect(index.search("", 10)).toEqual([]);
  });

  it("breaks ties by id and truncates to topK", () => {
    const index = new Bm25Index().build([
      { id: "x", text: "alpha" },
      { id: "w", text: "alpha" },
      { id: "y", text: "beta" },
      { id: "z", text: "gamma" },
      { id: "v", text: "delta" },
    ]);
    expect(index.search("alpha", 10).map((r) => r.id)).toEqual(["w", "x"]);
    expect(index.search("alpha", 1).map((r) => r.id)).toEqual(["w"]);
    expect(index.search("alpha", 0)).toEqual([]);
  });

  it("is idempotent", () => {
    const index = new Bm25Index().build(CORPUS);
    expect(index.search("foo bar world", 10)).toEqual(index.search("foo bar world", 10));
  });

  it("handles an empty corpus", () => {
    const index = new Bm25Index().build([]);
    expect(index.size).toBe(0);
    expect(index.search("anything", 10)).toEqual([]);
  });

  it("reproduces scores after a JSON round trip", () => {
    const index = new Bm25Index({ k1: 1.5, b: 0.5 }).build([
      ...CORPUS,
      { id: "d", text: "bar bar foo and more words here" },
    ]);
    const snapshot = index.toSnapshot();
    expect(snapshot.k1).toBe(1.5);
    expect(snapshot.b).toBe(0.5);
    expect(snapshot.lengths).toEqual([2, 2, 2, 7]);
    expect(snapshot.df.bar).toBe(2);

    const restored = Bm25Index.fromSnapshot(Bm25SnapshotSchema.parse(JSON.parse(JSON.stringify(snapshot))));
    for (const query of ["bar", "foo", "words here", "bar foo qux"]) {
      expect(restored.search(query, 10)).toEqual(index.search(query, 10));
    }
    expect(restored.document("d")?.text).toBe("bar bar foo and more words here");
  });
});
