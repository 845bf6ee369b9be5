import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import {
  SuggestionSession,
  type ApplyCorrection,
  type CorrectionApplier,
  type SuggestionResolved,
} from "../src/server/core/suggestion-session";
import { TypingBuffer } from "../src/server/core/typing-buffer";

class RecordingApplier implements CorrectionApplier {
  readonly requests: ApplyCorrection[] = [];
  failWith?: Error;

  async apply(request: ApplyCorrection): Promise<void> {
    this.requests.push(request);
    if (this.failWith) throw this.failWith;
  }
}

function setup(timeoutMs = 8000) {
  const typing = new TypingBuffer(10);
  for (const word of ["the", "quick", "brown", "fox"]) {
    for (const ch of word) typing.type(ch);
    typing.commitWord();
  }
  const applier = new RecordingApplier();
  const session = new SuggestionSession(typing, applier, { timeoutMs });
  const resolved: SuggestionResolved[] = [];
  session.on("resolved", r => resolved.push(r));
  return { typing, applier, session, resolved };
}

const CONTEXT = { words: ["the", "quick", "brown", "fox"], target: "notes" };

describe("SuggestionSession", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("is idle until a suggestion is offered", () => {
    const { session } = setup();
    expect(session.state).toBe("idle");
    const suggestion = session.offer("quick brown", ["quick brown fox"], CONTEXT);
    expect(session.state).toBe("pending");
    expect(session.current).toBe(suggestion);
    expect(suggestion.id).toBe(1);
  });

  it("expires a pending suggestion after the timeout", () => {
    const { session, resolved, typing } = setup();
    const { id } = session.offer("quick brown", ["quick brown fox"], CONTEXT);

    vi.advanceTimersByTime(7999);
    expect(session.state).toBe("pending");
    vi.advanceTimersByTime(1);

    expect(session.state).toBe("idle");
    expect(resolved).toEqual([{ id, phrase: "quick brown", resolution: "timeout" }]);
    expect(typing.window.toArray()).toEqual(["the", "quick", "brown", "fox"]);
  });

  it("keeps suggestions until resolved when the timeout is 0", () => {
    const { session } = setup(0);
    session.offer("quick brown", ["quick brown fox"], CONTEXT);
    vi.advanceTimersByTime(60_000);
    expect(session.state).toBe("pending");
  });

  it("applies an accepted correction and clears the typing context", async () => {
    const { session, applier, typing, resolved } = setup();
    typing.type("j");
    const { id } = session.offer("quick brown", ["quick brown fox", "quick brawn"], CONTEXT);

    await expect(session.accept(id, "quick brawn")).resolves.toBe("applied");

    expect(applier.requests).toEqual([{ original: "quick brown", correction: "quick brawn", context: CONTEXT }]);
    expect(typing.window.length).toBe(0);
    expect(typing.pending).toBe("");
    expect(resolved).toEqual([{ id, phrase: "quick brown", resolution: "accepted" }]);
  });

  it("makes the timer a no-op once the suggestion is accepted", async () => {
    const { session, resolved } = setup();
    const { id } = session.offer("quick brown", ["quick brown fox"], CONTEXT);
    await session.accept(id, "quick brown fox");

    vi.advanceTimersByTime(10_000);
    expect(resolved.map(r => r.resolution)).toEqual(["accepted"]);
    expect(session.timeout(id)).toBe(false);
  });

  it("still clears the typing context when applying fails", async () => {
    const { session, applier, typing } = setup();
    applier.failWith = new Error("target window closed");
    const { id } = session.offer("quick brown", ["quick brown fox"], CONTEXT);

    await expect(session.accept(id, "quick brown fox")).resolves.toBe("failed");
    expect(applier.requests).toHaveLength(1);
    expect(typing.window.length).toBe(0);
    expect(session.state).toBe("idle");
  });

  it("ignores accepts for other suggestions", async () => {
    const { session, applier } = setup();
    const { id } = session.offer("quick brown", ["quick brown fox"], CONTEXT);

    await expect(session.accept(id + 1, "quick brown fox")).resolves.toBe("stale");
    expect(session.state).toBe("pending");
    expect(applier.requests).toHaveLength(0);
  });

  it("rejects corrections that were not offered", async () => {
    const { session, applier } = setup();
    const { id } = session.offer("quick brown", ["quick brown fox"], CONTEXT);

    await expect(session.accept(id, "something else")).resolves.toBe("rejected");
    expect(session.state).toBe("pending");
    expect(applier.requests).toHaveLength(0);
  });

  it("removes the ignored phrase's words from the window", () => {
    const { session, typing, resolved } = setup();
    const { id } = session.offer("quick brown", ["quick brown fox"], CONTEXT);

    expect(session.ignore(id)).toBe(true);
    expect(typing.window.toArray()).toEqual(["the", "fox"]);
    expect(resolved).toEqual([{ id, phrase: "quick brown", resolution: "ignored" }]);
    expect(session.ignore(id)).toBe(false);
  });

  it("allows only one resolution per suggestion", async () => {
    const { session, resolved } = setup();
    const { id } = session.offer("quick brown", ["quick brown fox"], CONTEXT);

    session.ignore(id);
    await expect(session.accept(id, "quick brown fox")).resolves.toBe("stale");
    expect(session.timeout(id)).toBe(false);
    expect(resolved).toHaveLength(1);
  });

  it("supersedes the outstanding suggestion when a new one is offered", () => {
    const { session, resolved } = setup();
    const first = session.offer("quick brown", ["quick brown fox"], CONTEXT);
    const second = session.offer("brown fox", ["brown fox jumps"], CONTEXT);

    expect(second.id).toBe(first.id + 1);
    expect(session.current).toBe(second);
    expect(resolved).toEqual([{ id: first.id, phrase: "quick brown", resolution: "superseded" }]);

    vi.advanceTimersByTime(8000);
    expect(resolved.map(r => r.id)).toEqual([first.id, second.id]);
  });

  it("grants a resubmission exactly once", () => {
    const { session } = setup();
    session.requestResubmit();
    expect(session.resubmitActive).toBe(true);
    expect(session.consumeResubmit()).toBe(true);
    expect(session.consumeResubmit()).toBe(false);
  });

  it("closes an outstanding suggestion on close", () => {
    const { session, resolved } = setup();
    session.offer("quick brown", ["quick brown fox"], CONTEXT);
    session.requestResubmit();
    session.close();
    expect(session.state).toBe("idle");
    expect(session.resubmitActive).toBe(false);
    expect(resolved.map(r => r.resolution)).toEqual(["superseded"]);
  });
});
