import { BoundedQueue } from "./bounded-queue";

const HAS_DIGIT = /\p{Nd}/u;

/**
 * The word being typed plus the window of recently completed words.
 */
export class TypingBuffer {
  private chars: string[] = [];
  readonly window: BoundedQueue<string>;

  constructor(windowSize: number) {
    this.window = new BoundedQueue(windowSize);
  }

  get pending(): string {
    return this.chars.join("");
  }

  type(ch: string): void {
    this.chars.push(ch);
  }

  /** Digits void the word in progress. */
  discardWord(): void {
    this.chars = [];
  }

  backspace(): boolean {
    return this.chars.pop() !== undefined;
  }

  /** Moves the word in progress onto the window; undefined when there is none. */
  commitWord(): string | undefined {
    const word = this.pending.trim();
    this.chars = [];
    if (!word || HAS_DIGIT.test(word)) return undefined;
    this.window.push(word);
    return word;
  }

  /** Best-effort removal of a phrase's words from the window. */
  forget(phrase: string): number {
    let removed = 0;
    for (const word of phrase.split(" ")) {
      if (word && this.window.remove(word)) removed++;
    }
    return removed;
  }

  clear(): void {
    this.chars = [];
    this.window.clear();
  }
}
