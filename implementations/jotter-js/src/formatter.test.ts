import assert from "node:assert";
import { describe, it } from "node:test";
import { Document } from "./document.js";
import { escapeString, formatDouble, PrettyFormatter, reindent, type Formatter } from "./formatter.js";
import type { Scalar } from "./types.js";

/** Records the walk instead of writing text. */
class Recorder implements Formatter {
  readonly events: string[] = [];

  startObject(): void {
    this.events.push("{");
  }

  endObject(): void {
    this.events.push("}");
  }

  startArray(): void {
    this.events.push("[");
  }

  endArray(): void {
    this.events.push("]");
  }

  comma(): void {
    this.events.push(",");
  }

  objectKey(key: string): void {
    this.events.push(`key ${key}`);
  }

  objectValue(value: Scalar): void {
    this.events.push(`value ${value.type}`);
  }

  arrayValue(value: Scalar): void {
    this.events.push(`element ${value.type}`);
  }

  result(): string {
    return this.events.join(" ");
  }
}

describe("escapeString", () => {
  it("escapes quotes, backslashes and control characters", () => {
    assert.strictEqual(escapeString('a"b\\c'), 'a\\"b\\\\c');
    assert.strictEqual(escapeString("\n\r\t\b\f"), "\\n\\r\\t\\b\\f");
    assert.strictEqual(escapeString("\u0001"), "\\u0001");
    assert.strictEqual(escapeString("é/"), "é/");
  });
});

describe("formatDouble", () => {
  it("always writes a decimal point", () => {
    assert.strictEqual(formatDouble(2), "2.0");
    assert.strictEqual(formatDouble(-0), "-0.0");
    assert.strictEqual(formatDouble(0.1), "0.1");
  });

  it("expands exponent notation", () => {
    assert.strictEqual(formatDouble(1e21), "1000000000000000000000.0");
    assert.strictEqual(formatDouble(1.5e-7), "0.00000015");
    assert.strictEqual(formatDouble(-2.5e-8), "-0.000000025");
  });
});

describe("reindent", () => {
  it("breaks lines after brackets and commas", () => {
    const text = reindent(`{"a":1,"b":[true,"x:y"],"c":{}}`);
    assert.strictEqual(text, `{\n  "a": 1,\n  "b": [\n    true,\n    "x:y"\n  ],\n  "c": {}\n}`);
  });

  it("leaves brackets and commas inside strings alone", () => {
    assert.strictEqual(reindent(`["a\\",[{"]`), `[\n  "a\\",[{"\n]`);
  });
});

describe("Formatter", () => {
  it("receives the whole tree through the root's formatter", () => {
    const document = Document.parse(`{"a":[1,{"b":null}],"c":"x"}`).useFormatter(() => new Recorder());
    assert.strictEqual(
      document.marshal(),
      "{ key a [ element int32 , { key b value null } ] , key c value string }",
    );
  });

  it("pretty prints with a custom newline", () => {
    const document = new Document({ formatter: () => new PrettyFormatter({ newline: "\r\n" }) }).put("k", "v");
    assert.strictEqual(document.marshal(), `{\r\n  "k": "v"\r\n}`);
  });
});
