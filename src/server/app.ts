// ===========================================================================
//  src/server/app.ts   (HTTP + WS façade around the phrase engine)
// ===========================================================================

import express from "express";
import helmet from "helmet";
import compression from "compression";
import { createServer } from "node:http";
import { Server as IOServer } from "socket.io";
import pinoHttp from "pino-http";

import { loadEngineConfig, readServerSettings } from "./config";
import { PhraseLibrary } from "./core/phrase-library";
import { createScorer } from "./core/pipeline";
import { FileKeywordSource } from "./storage/file-keyword-source";
import { EVENTS, scoreRequest } from "./protocol";
import { bindTypingClient, type BoundClient } from "./typing-gateway";
import {
  logger,
  httpLogger,
  wsLogger,
  startupLogger,
  logError,
  logPerformance
} from "./utils/logger";

const REST_ROOT = "/v1";
const WS_PATH = "/ws";

const settings = readServerSettings();

startupLogger.info({
  ...settings,
  REST_ROOT,
  WS_PATH,
  NODE_ENV: process.env.NODE_ENV,
}, 'Starting phrasewatch server');

const startTime = Date.now();

try {
  // ────────────────  Engine  ──────────────────────────────────────────────
  const config = await loadEngineConfig(settings.configFile);
  startupLogger.info({ config }, 'Engine configuration loaded');

  const keywords = new FileKeywordSource(settings.keywordsFile);
  const library = new PhraseLibrary();
  await library.reload(keywords);
  const scorer = createScorer(library, config);

  const clients = new Map<string, BoundClient>();

  // ────────────────  Express / REST  ────────────────────────────────────────
  const app = express();
  const http = createServer(app);

  app.use(pinoHttp({
    logger: httpLogger,
    customLogLevel: (_req, res, err) => {
      if (res.statusCode >= 400 && res.statusCode < 500) return 'warn';
      if (res.statusCode >= 500 || err) return 'error';
      return 'debug';
    },
    serializers: {
      req: (req: { method?: string; url?: string }) => ({
        method: req.method,
        url: req.url,
      }),
      res: (res: { statusCode?: number }) => ({
        statusCode: res.statusCode,
      }),
    },
  }));

  app
    .use(helmet())
    .use(compression())
    .use(express.json({ limit: "16kb" }));

  const router = express.Router();

  router.get("/status", (_req, res) => {
    res.json({
      phrases: library.current.size,
      clients: clients.size,
      config,
      uptimeSec: Math.floor(process.uptime()),
    });
  });

  // Debug scoring without a keystroke stream
  router.post("/score", (req, res) => {
    const parsed = scoreRequest.safeParse(req.body);
    if (!parsed.success) {
      httpLogger.warn({ issues: parsed.error.issues }, 'Invalid score request');
      res.status(400).json({ error: "Invalid score request" });
      return;
    }
    const { query, minSimilarity = config.minSimilarity, enablePartial = config.enablePartialMatching } = parsed.data;
    res.json({ query, candidates: scorer.rank(query, { minSimilarity, enablePartial }) });
  });

  router.post("/keywords/reload", async (_req, res) => {
    try {
      const result = await library.reload(keywords);
      res.status(result.ok ? 200 : 502).json(result);
    } catch (error) {
      logError(httpLogger, error, { context: 'keyword-reload' });
      res.status(500).json({ error: "Reload failed" });
    }
  });

  app.use(REST_ROOT, router);

  // ────────────────  WebSocket layer  ───────────────────────────────────────
  const io = new IOServer(http, {
    path: WS_PATH,
    cors: { origin: "*" },
    serveClient: false,
    pingInterval: 25_000,
    pingTimeout: 20_000
  });

  io.on("connection", socket => {
    const client = bindTypingClient({
      id: socket.id,
      on: (event, listener) => socket.on(event, listener),
      emit: (event, payload) => socket.emit(event, payload),
      sendWithAck: request => socket.timeout(settings.applyAckTimeoutMs).emitWithAck(EVENTS.applyCorrection, request),
    }, { scorer, config });
    clients.set(socket.id, client);

    wsLogger.info({
      socketId: socket.id,
      totalClients: clients.size,
      remoteAddress: socket.handshake.address,
    }, 'Keystroke source connected');

    socket.on("disconnect", (reason) => {
      client.close(reason);
      clients.delete(socket.id);
      wsLogger.info({
        socketId: socket.id,
        totalClients: clients.size,
        reason,
      }, 'Keystroke source disconnected');
    });
  });

  // ────────────────  Startup  ───────────────────────────────────────────────
  http.listen(settings.httpPort, () => {
    logPerformance(startupLogger, 'server-startup', startTime);
    startupLogger.info({
      port: settings.httpPort,
      wsPath: WS_PATH,
      restRoot: REST_ROOT,
      phrases: library.current.size,
    }, `Server listening on port ${settings.httpPort}`);
  });

  process.on('SIGHUP', () => {
    logger.info('SIGHUP received, reloading keywords');
    library.reload(keywords).catch(err => logError(logger, err, { context: 'keyword-reload' }));
  });

  process.on('SIGTERM', () => {
    logger.info('SIGTERM received, shutting down');
    for (const client of clients.values()) client.close('shutdown');
    io.close(err => {
      if (err) {
        logError(logger, err, { context: 'shutdown' });
        process.exit(1);
      }
      logger.info('Cleanup completed successfully');
      process.exit(0);
    });
  });

} catch (error) {
  logError(startupLogger, error, { context: 'startup-failure' });
  process.exit(1);
}
