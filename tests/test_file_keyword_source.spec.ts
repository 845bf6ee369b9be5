import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { LoadError } from "../src/server/core/errors";
import { FileKeywordSource, parseKeywordLines } from "../src/server/storage/file-keyword-source";

describe("parseKeywordLines", () => {
  it("trims lines and drops blanks and comments", () => {
    expect(parseKeywordLines("# header\n their account \r\n\n  \nthere is\n#skip\n")).toEqual([
      "their account",
      "there is",
    ]);
  });
});

describe("FileKeywordSource", () => {
  let dir = "";

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "keywords-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads one phrase per line", async () => {
    const file = path.join(dir, "keywords.txt");
    await writeFile(file, "their account\nthey're going\n", "utf8");
    await expect(new FileKeywordSource(file).load()).resolves.toEqual(["their account", "they're going"]);
  });

  it("rejects with LoadError when the file cannot be read", async () => {
    const file = path.join(dir, "missing.txt");
    const source = new FileKeywordSource(file);
    await expect(source.load()).rejects.toBeInstanceOf(LoadError);
    expect(source.describe()).toBe(file);
  });
});
