import assert from "node:assert";
import { describe, it } from "node:test";
import { Document } from "./document.js";
import { ParseError } from "./errors.js";
import { Sequence } from "./sequence.js";
import { errorToSexp, toSexp } from "./sexp.js";

describe("toSexp", () => {
  it("dumps each value with its variant", () => {
    const tree = Document.parse(`{"a":1,"b":[true,null],"c":{}}`);
    assert.strictEqual(
      toSexp(tree),
      [
        "(document",
        '  (entry "a"',
        "    (int32 1))",
        '  (entry "b"',
        "    (sequence",
        "      (bool true)",
        "      (null)))",
        '  (entry "c"',
        "    (document)))",
      ].join("\n"),
    );
  });

  it("dumps empty containers on one line", () => {
    assert.strictEqual(toSexp(new Sequence()), "(sequence)");
    assert.strictEqual(toSexp(new Document()), "(document)");
  });

  it("shows doubles, wide integers and escaped strings", () => {
    const tree = Sequence.parse(`[2.0, 3000000000, "a\\"b"]`);
    assert.strictEqual(
      toSexp(tree),
      ["(sequence", "  (float64 2.0)", "  (int64 3000000000)", '  (string "a\\"b"))'].join("\n"),
    );
  });
});

describe("errorToSexp", () => {
  it("includes the span", () => {
    assert.strictEqual(errorToSexp(new ParseError("bad", { start: 1, end: 2 })), '(error [1, 2] "bad")');
  });

  it("marks a missing span", () => {
    assert.strictEqual(errorToSexp(new ParseError("too few tokens")), '(error [-1, -1] "too few tokens")');
  });
});
