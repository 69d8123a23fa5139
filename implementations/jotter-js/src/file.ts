import { readFile } from "node:fs/promises";
import { Document } from "./document.js";
import { parseDocument, parseSequence, type ParseOptions } from "./parser.js";
import { Sequence } from "./sequence.js";

/**
 * Read and parse a `{...}` file. A missing or blank file gives an empty
 * document; any other read failure is passed on.
 */
export async function readDocument(path: string, options: ParseOptions = {}): Promise<Document> {
  const text = await readText(path);
  return text === null ? new Document() : parseDocument(text, options);
}

/** Read and parse a `[...]` file, as {@link readDocument} does. */
export async function readSequence(path: string, options: ParseOptions = {}): Promise<Sequence> {
  const text = await readText(path);
  return text === null ? new Sequence() : parseSequence(text, options);
}

async function readText(path: string): Promise<string | null> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (isMissing(error)) return null;
    throw error;
  }
  return text.trim() === "" ? null : text;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
