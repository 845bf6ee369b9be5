import type { EngineConfig } from "./config";
import { SocketCorrectionApplier, type AckedSend } from "./correction-relay";
import type { MatchScorer } from "./core/match-scorer";
import { createTypingPipeline, type TypingPipeline } from "./core/pipeline";
import { EVENTS, keyPayload, resolvePayload, type SuggestionMessage } from "./protocol";
import { logError, wsLogger as logger } from "./utils/logger";

/** The slice of a socket the gateway talks to. */
export interface TypingClient {
  id: string;
  on(event: string, listener: (payload: unknown) => void): unknown;
  emit(event: string, payload?: unknown): unknown;
  sendWithAck: AckedSend;
}

export interface GatewayDeps {
  scorer: MatchScorer;
  config: EngineConfig;
}

export interface BoundClient {
  pipeline: TypingPipeline;
  close(reason: string): void;
}

/**
 * Gives one connected keystroke source its own assembler and session and
 * routes its events through them.
 */
export function bindTypingClient(client: TypingClient, deps: GatewayDeps): BoundClient {
  const pipeline = createTypingPipeline(deps.scorer, deps.config, new SocketCorrectionApplier(client.sendWithAck));
  const { assembler, session } = pipeline;
  const log = logger.child({ socketId: client.id });

  assembler.on("suggestion", ({ id, phrase, ranked }) => {
    client.emit(EVENTS.suggestion, { id, phrase, ranked } satisfies SuggestionMessage);
  });
  session.on("resolved", resolved => {
    client.emit(EVENTS.resolved, resolved);
  });

  client.on(EVENTS.key, payload => {
    const key = keyPayload.safeParse(payload);
    if (!key.success) {
      log.warn({ issues: key.error.issues.length }, 'Dropping malformed key event');
      return;
    }
    assembler.push(key.data);
  });

  client.on(EVENTS.resolve, payload => {
    const request = resolvePayload.safeParse(payload);
    if (!request.success) {
      log.warn({ issues: request.error.issues.length }, 'Dropping malformed resolution');
      return;
    }
    const resolution = request.data;
    if (resolution.action === "ignore") {
      session.ignore(resolution.id);
      return;
    }
    if (resolution.action === "timeout") {
      session.timeout(resolution.id);
      return;
    }
    session
      .accept(resolution.id, resolution.correction)
      .then(outcome => log.debug({ id: resolution.id, outcome }, 'Accept handled'))
      .catch(err => logError(log, err, { context: 'accept', id: resolution.id }));
  });

  client.on(EVENTS.resubmit, () => {
    const result = assembler.resubmit();
    log.debug({ status: result.status }, 'Forced resubmission');
  });

  client.on(EVENTS.reset, () => assembler.reset());

  return {
    pipeline,
    close(reason: string) {
      session.close();
      assembler.removeAllListeners();
      session.removeAllListeners();
      log.debug({ reason }, 'Typing client closed');
    },
  };
}
