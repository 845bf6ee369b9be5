import { readFile } from "node:fs/promises";
import { LoadError } from "../core/errors";
import type { KeywordSource } from "./keyword-source";

/** Splits a keyword file into phrases: one per line, `#` starts a comment line. */
export function parseKeywordLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith("#"));
}

/**
 * UTF-8 text file with one phrase per line. Read in full on every load so
 * edits show up on the next reload.
 */
export class FileKeywordSource implements KeywordSource {
  private readonly file: string;

  constructor(file: string) {
    this.file = file;
  }

  describe() { return this.file; }

  async load(): Promise<string[]> {
    let text: string;
    try {
      text = await readFile(this.file, "utf8");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new LoadError(this.file, reason, { cause: error });
    }
    return parseKeywordLines(text);
  }
}
