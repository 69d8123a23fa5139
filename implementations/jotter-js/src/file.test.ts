import assert from "node:assert";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, before, describe, it } from "node:test";
import { readDocument, readSequence } from "./file.js";

describe("file entry points", () => {
  let dir = "";

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), "jotter-"));
    await writeFile(join(dir, "config.json"), `{"port": 8080, "hosts": ["a", "b"]}\n`);
    await writeFile(join(dir, "list.json"), "[1, 2, 3]");
    await writeFile(join(dir, "blank.json"), "  \n\t");
    await writeFile(join(dir, "broken.json"), "[1,");
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a document", async () => {
    const document = await readDocument(join(dir, "config.json"));
    assert.strictEqual(document.getInteger("port"), 8080);
    assert.strictEqual(document.getSequence("hosts")?.getString(1), "b");
  });

  it("reads a sequence", async () => {
    const sequence = await readSequence(join(dir, "list.json"));
    assert.deepStrictEqual(sequence.toArray(), [1, 2, 3]);
  });

  it("gives empty containers for missing files", async () => {
    assert.strictEqual((await readDocument(join(dir, "missing.json"))).length, 0);
    assert.strictEqual((await readSequence(join(dir, "missing.json"))).length, 0);
  });

  it("gives empty containers for blank files", async () => {
    assert.strictEqual((await readDocument(join(dir, "blank.json"))).length, 0);
  });

  it("passes on parse errors", async () => {
    await assert.rejects(readSequence(join(dir, "broken.json")), { name: "ParseError" });
  });

  it("passes on other read errors", async () => {
    await assert.rejects(readDocument(dir), { code: "EISDIR" });
  });
});
