/**
 *  describe()  – where the keywords come from, for logs
 *  load()      – every keyword as authored; rejects with LoadError
 */
export interface KeywordSource {
  describe(): string;
  load(): Promise<string[]>;
}
