import { describe, it, expect } from "vitest";
import { BoundedQueue } from "../src/server/core/bounded-queue";
import { TypingBuffer } from "../src/server/core/typing-buffer";

function typeWord(buffer: TypingBuffer, word: string) {
  for (const ch of word) buffer.type(ch);
  return buffer.commitWord();
}

describe("BoundedQueue", () => {
  it("evicts the oldest item once over capacity", () => {
    const queue = new BoundedQueue<string>(3);
    for (const word of ["a", "b", "c"]) queue.push(word);
    expect(queue.push("d")).toBe("a");
    expect(queue.toArray()).toEqual(["b", "c", "d"]);
    expect(queue.length).toBe(3);
  });

  it("returns the newest items oldest first", () => {
    const queue = new BoundedQueue<string>(5);
    for (const word of ["a", "b", "c"]) queue.push(word);
    expect(queue.last(2)).toEqual(["b", "c"]);
    expect(queue.last(0)).toEqual([]);
  });

  it("removes only the first occurrence", () => {
    const queue = new BoundedQueue<string>(5);
    for (const word of ["x", "y", "x"]) queue.push(word);
    expect(queue.remove("x")).toBe(true);
    expect(queue.toArray()).toEqual(["y", "x"]);
    expect(queue.remove("z")).toBe(false);
  });

  it("refuses a capacity below one", () => {
    expect(() => new BoundedQueue(0)).toThrow(RangeError);
  });
});

describe("TypingBuffer", () => {
  it("commits typed characters as a word", () => {
    const buffer = new TypingBuffer(4);
    expect(typeWord(buffer, "hello")).toBe("hello");
    expect(buffer.window.toArray()).toEqual(["hello"]);
    expect(buffer.pending).toBe("");
  });

  it("commits nothing for an empty buffer", () => {
    const buffer = new TypingBuffer(4);
    expect(buffer.commitWord()).toBeUndefined();
    expect(buffer.window.length).toBe(0);
  });

  it("removes the last character on backspace", () => {
    const buffer = new TypingBuffer(4);
    buffer.type("a");
    buffer.type("b");
    expect(buffer.backspace()).toBe(true);
    expect(buffer.pending).toBe("a");
    buffer.backspace();
    expect(buffer.backspace()).toBe(false);
  });

  it("keeps exactly capacity words in order", () => {
    const buffer = new TypingBuffer(3);
    for (const word of ["one", "two", "three", "four"]) typeWord(buffer, word);
    expect(buffer.window.toArray()).toEqual(["two", "three", "four"]);
  });

  it("forgets a phrase word by word", () => {
    const buffer = new TypingBuffer(6);
    for (const word of ["the", "quick", "brown", "fox", "quick"]) typeWord(buffer, word);
    expect(buffer.forget("quick brown dog")).toBe(2);
    expect(buffer.window.toArray()).toEqual(["the", "fox", "quick"]);
  });

  it("clears the word in progress and the window", () => {
    const buffer = new TypingBuffer(3);
    typeWord(buffer, "one");
    buffer.type("t");
    buffer.clear();
    expect(buffer.pending).toBe("");
    expect(buffer.window.length).toBe(0);
  });
});
