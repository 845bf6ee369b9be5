import type { KeywordSource } from "./keyword-source";

/**
 *  Fixed in-memory keyword list for tests and demos. `replace()` swaps the
 *  list the next load returns.
 */
export class MemoryKeywordSource implements KeywordSource {
  private keywords: string[];

  constructor(keywords: string[] = []) {
    this.keywords = [...keywords];
  }

  describe() { return "memory"; }

  replace(keywords: string[]): void {
    this.keywords = [...keywords];
  }

  async load(): Promise<string[]> {
    return [...this.keywords];
  }
}
