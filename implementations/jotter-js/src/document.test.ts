import assert from "node:assert";
import { describe, it } from "node:test";
import { Document } from "./document.js";
import { ArgumentError, TypeMismatchError } from "./errors.js";
import { PrettyFormatter } from "./formatter.js";
import { Sequence } from "./sequence.js";
import { SortedStore } from "./store.js";

describe("put and get", () => {
  it("stores scalars under their canonical variant", () => {
    const document = new Document()
      .put("name", "Ada")
      .put("age", 36)
      .put("ratio", 1.5)
      .put("big", 2 ** 40)
      .put("small", 7n)
      .put("ok", true)
      .put("none", null);

    assert.strictEqual(document.typeOf("name"), "string");
    assert.strictEqual(document.typeOf("age"), "int32");
    assert.strictEqual(document.typeOf("ratio"), "float64");
    assert.strictEqual(document.typeOf("big"), "int64");
    assert.strictEqual(document.getLong("big"), 1099511627776n);
    assert.strictEqual(document.getInteger("small"), 7);
    assert.strictEqual(document.getBoolean("ok"), true);
    assert.strictEqual(document.typeOf("none"), "null");
    assert.strictEqual(document.length, 7);
  });

  it("tells a stored null apart from a missing key", () => {
    const document = new Document().put("gone", undefined);
    assert.strictEqual(document.has("gone"), true);
    assert.strictEqual(document.get("gone"), null);
    assert.strictEqual(document.has("missing"), false);
    assert.strictEqual(document.typeOf("missing"), null);
    assert.strictEqual(document.getString("missing"), null);
  });

  it("throws on a getter of the wrong variant", () => {
    const document = new Document().put("age", 25);
    assert.throws(
      () => document.getString("age"),
      (error: unknown) =>
        error instanceof TypeMismatchError &&
        error.message === `"age" holds int32, not string` &&
        error.expected === "string" &&
        error.actual === "int32",
    );
  });

  it("returns null from typed getters for a stored null", () => {
    assert.strictEqual(new Document().put("x", null).getDocument("x"), null);
  });

  it("rejects values that have no JSON form", () => {
    const document = new Document();
    assert.throws(() => document.put("n", Number.NaN), { name: "ArgumentError", message: "NaN cannot be represented" });
    assert.throws(() => document.put("f", () => 1), { message: "cannot store a function" });
    assert.strictEqual(document.length, 0);
  });

  it("rejects a null key", () => {
    assert.throws(() => new Document().put(JSON.parse("null"), 1), {
      name: "ArgumentError",
      message: "provided key is null",
    });
  });

  it("removes entries", () => {
    const document = new Document().put("a", 1).put("b", 2).remove("a");
    assert.deepStrictEqual(document.keys(), ["b"]);
  });

  it("converts arrays and nested objects", () => {
    const document = new Document().put("list", [1, "two", null]).put("inner", { deep: { flag: false } });
    assert.strictEqual(document.getSequence("list")?.length, 3);
    assert.strictEqual(document.getDocument("inner")?.getDocument("deep")?.getBoolean("flag"), false);
  });
});

describe("tree shape", () => {
  it("refuses to store a document inside itself", () => {
    const document = new Document();
    assert.throws(() => document.put("self", document), {
      name: "ArgumentError",
      message: "cannot store a container inside itself",
    });
  });

  it("refuses to store an ancestor inside a descendant", () => {
    const parent = new Document();
    const child = new Sequence();
    parent.put("child", child);
    assert.throws(() => child.append(parent), ArgumentError);
  });

  it("refuses circular arrays", () => {
    const loop: unknown[] = [];
    loop.push(loop);
    assert.throws(() => new Document().put("loop", loop), {
      message: "cannot store a circular structure",
    });
  });
});

describe("construction", () => {
  it("copies a map", () => {
    const document = Document.fromMap(new Map<string, unknown>([["a", 1], ["b", [true]]]));
    assert.strictEqual(document.getInteger("a"), 1);
    assert.strictEqual(document.getSequence("b")?.getBoolean(0), true);
  });

  it("copies a record", () => {
    assert.strictEqual(Document.fromMap({ a: { b: "c" } }).getDocument("a")?.getString("b"), "c");
  });

  it("rejects non-string map keys", () => {
    assert.throws(() => Document.fromMap(new Map<unknown, unknown>([[1, "x"]])), {
      name: "ArgumentError",
      message: "one of the map keys is not a string: 1",
    });
  });

  it("rejects a null map", () => {
    assert.throws(() => Document.fromMap(JSON.parse("null")), { message: "provided map is null" });
  });

  it("clears a store handed to the constructor", () => {
    const store = new SortedStore();
    store.set("stale", { type: "null" });
    const document = new Document({ store });
    assert.strictEqual(document.length, 0);
  });
});

describe("views", () => {
  it("lists entries in store order", () => {
    const document = Document.parse(`{"b":1,"a":"x"}`);
    assert.deepStrictEqual(document.keys(), ["b", "a"]);
    assert.deepStrictEqual(document.entries(), [
      ["b", 1],
      ["a", "x"],
    ]);
  });

  it("snapshots entries in raw()", () => {
    const document = new Document().put("a", 1);
    const snapshot = document.raw();
    document.put("b", 2);
    assert.deepStrictEqual([...snapshot.keys()], ["a"]);
  });

  it("copies the tree into plain objects", () => {
    const document = Document.parse(`{"a":[1,{"b":null}],"c":3000000000}`);
    assert.deepStrictEqual(document.toObject(), { a: [1, { b: null }], c: 3000000000n });
  });

  it("keeps a __proto__ key as data", () => {
    const object = Document.parse(`{"__proto__":1}`).toObject();
    assert.deepStrictEqual(Object.keys(object), ["__proto__"]);
    assert.strictEqual(Object.getPrototypeOf(object), Object.prototype);
  });
});

describe("marshal", () => {
  it("writes compact text", () => {
    const document = new Document().put("a", 1).put("b", "x").put("c", [true, null]).put("d", 2.5);
    assert.strictEqual(document.marshal(), `{"a":1,"b":"x","c":[true,null],"d":2.5}`);
    assert.strictEqual(String(document), document.marshal());
  });

  it("escapes strings", () => {
    const document = new Document().put("q", 'say "hi"\n');
    assert.strictEqual(document.marshal(), '{"q":"say \\"hi\\"\\n"}');
  });

  it("writes integral doubles with a decimal point", () => {
    assert.strictEqual(Document.parse(`{"x":2.0}`).marshal(), `{"x":2.0}`);
  });

  it("parses its own output back to the same tree", () => {
    const document = new Document()
      .put("s", "tab\there \\ \u0001")
      .put("i", -5)
      .put("l", 9007199254740991)
      .put("f", 0.1)
      .put("b", false)
      .put("n", null);
    const copy = Document.parse(document.marshal());
    assert.deepStrictEqual(copy.typedEntries(), document.typedEntries());
  });

  it("orders keys with a sorted store", () => {
    const document = new Document().put("b", 1).put("a", 2).useStore(new SortedStore());
    assert.strictEqual(document.marshal(), `{"a":2,"b":1}`);
  });

  it("uses the formatter it was given", () => {
    const document = new Document({ formatter: () => new PrettyFormatter() }).put("a", [1]);
    assert.strictEqual(document.marshal(), `{\n  "a": [\n    1\n  ]\n}`);
  });

  it("rejects a null formatter", () => {
    assert.throws(() => new Document().useFormatter(JSON.parse("null")), { message: "provided formatter is null" });
  });
});
