import { readFile } from "node:fs/promises";
import { FileReadError } from "../errors.js";

// fatal: false swaps undecodable bytes for U+FFFD instead of throwing
const decoder = new TextDecoder("utf-8", { fatal: false });

export function decodeLines(content: Uint8Array | string): string[] {
  const text = typeof content === "string" ? content : decoder.decode(content);
  if (text === "") return [];
  const lines = text.split(/\r?\n/);
  // a trailing terminator closes the last line, it does not open a new one
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export async function readLogLines(path: string): Promise<string[]> {
  let content: Buffer;
  try {
    content = await readFile(path);
  } catch (err) {
    throw new FileReadError(path, err);
  }
  return decodeLines(content);
}
