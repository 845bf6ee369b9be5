import { z } from "zod";

// ────────────────  client → server  ───────────────────────────────────────

export const keyPayload = z.object({
  name: z.string().min(1).max(32),
  target: z.string().max(512).optional(),
});

export const resolvePayload = z.discriminatedUnion("action", [
  z.object({ id: z.number().int().positive(), action: z.literal("accept"), correction: z.string().min(1) }),
  z.object({ id: z.number().int().positive(), action: z.literal("ignore") }),
  z.object({ id: z.number().int().positive(), action: z.literal("timeout") }),
]);

export const scoreRequest = z.object({
  query: z.string().max(1_000),
  minSimilarity: z.number().min(0).max(1).optional(),
  enablePartial: z.boolean().optional(),
});

/** Acknowledgement of an `apply-correction` event. */
export const applyAck = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
});

// ────────────────  server → client  ───────────────────────────────────────

export interface SuggestionMessage {
  id: number;
  phrase: string;
  ranked: string[];
}

export const EVENTS = {
  key: "key",
  resolve: "resolve",
  resubmit: "resubmit",
  reset: "reset",
  suggestion: "suggestion",
  resolved: "resolved",
  applyCorrection: "apply-correction",
} as const;
