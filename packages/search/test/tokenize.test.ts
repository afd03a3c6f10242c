import { describe, it, expect } from "vitest";
import { createEntity } from "@repograph/syntax";

import { nameSegments, tokenize } from "../src/core/tokenize.js";
import { documentText, fileExcerpt } from "../src/core/documents.js";

describe("tokenize", () => {
  it("lower-cases, splits on punctuation and drops single characters", () => {
    expect(tokenize("Hello, World! a b2 x_y")).toEqual(["hello", "world", "b2"]);
  });

  it("keeps repeated terms", () => {
    expect(tokenize("foo Foo FOO")).toEqual(["foo", "foo", "foo"]);
  });

  it("returns nothing for blank input", () => {
    expect(tokenize("  -- ")).toEqual([]);
  });
});

describe("nameSegments", () => {
  it("splits snake case and camel case", () => {
    expect(nameSegments("parse_config")).toEqual(["parse", "config"]);
    expect(nameSegments("createUser")).toEqual(["create", "user"]);
    expect(nameSegments("parseHTTPResponse_v2")).toEqual(["parse", "http", "response", "v2"]);
  });
});

describe("documents", () => {
  it("drops blank and comment lines from file excerpts", () => {
    const source = ["#!/usr/bin/env python", "# comment", "import os", "", "// note", "  * star", "value = 1"].join("\n");
    expect(fileExcerpt(source, 50)).toBe("import os value = 1");
  });

  it("reads only the first lines", () => {
    expect(fileExcerpt("one\ntwo\nthree", 2)).toBe("one two");
    expect(fileExcerpt("one\ntwo", 0)).toBe("");
  });

  it("joins name, docstring, parameters and return type", () => {
    const entity = createEntity({
      kind: "function",
      path: "m.py",
      name: "scale",
      startLine: 1,
      endLine: 2,
      docstring: "Scale a value.",
      metadata: { parameters: ["value", "factor"], returns: "float" },
    });
    expect(documentText(entity)).toBe("scale Scale a value. value factor float");
  });

  it("appends the excerpt for files", () => {
    const file = createEntity({ kind: "file", path: "m.py", name: "m.py", startLine: 1, endLine: 3 });
    expect(documentText(file, "import os")).toBe("m.py import os");
  });
});
