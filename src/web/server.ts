/**
 * Bross Sequential Analysis - Web Server
 * =======================================
 * Express REST API with WebSocket progress for order checks
 */

import express, { NextFunction, Request, Response } from 'express';
import { createServer } from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import { AsyncOrderCheckOptions } from '../analysis/seqanalysis';
import { getConfig, initConfig } from '../core/config';
import { BusyError, SeqAnalysisError } from '../core/errors';
import { renderMap } from '../render/map-renderer';
import { AnalysisSession, createAnalysisSession } from '../session/manager';
import { OrderCheckStats, SequentialAnalysisResult } from '../types';
import { isRecord } from '../utils/guards';
import { getLogger, initLogger } from '../utils/logger';
import { progressInterval } from '../utils/progress';

// ============================================================================
// MESSAGE HELPERS
// ============================================================================

/** The part of a WebSocket the handlers use */
export interface SocketLike {
  send(data: string): void;
}

/** Controller of the order check currently running, if any */
export interface RunningCheck {
  controller: AbortController | null;
}

export interface SocketContext {
  session: AnalysisSession;
  broadcast: (data: object) => void;
  running: RunningCheck;
}

/** The part of an HTTP response that signals a dropped client */
export interface ClosableResponse {
  on(event: 'close', listener: () => void): unknown;
  readonly writableFinished: boolean;
}

function analysisPayload(result: SequentialAnalysisResult) {
  return {
    decision: result.decision,
    message: result.message,
    informative: result.informative,
    discarded: result.discarded,
    steps: result.traversal.steps,
    path: result.traversal.path,
    terminal: result.traversal.terminal,
  };
}

function orderCheckPayload(stats: OrderCheckStats) {
  return {
    iterations: stats.iterations,
    alpha: stats.alpha,
    seed: stats.seed,
    freq: stats.freq,
    pA: stats.pA,
    pB: stats.pB,
    pNoDiff: stats.pNoDiff,
    pTwilight: stats.pTwilight,
    pNone: stats.pNone,
  };
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function getState(session: AnalysisSession) {
  return {
    type: 'full_state',
    data: {
      pairs: session.getPairs(),
      summary: session.getSummary(),
    },
  };
}

// ============================================================================
// ORDER CHECK RUNS
// ============================================================================

/**
 * Run one order check at a time per session. `bind` receives the run's
 * controller before any work starts, so callers can cancel it.
 */
export async function runGuardedOrderCheck(
  session: AnalysisSession,
  running: RunningCheck,
  options: Omit<AsyncOrderCheckOptions, 'signal'>,
  bind?: (controller: AbortController) => void
): Promise<OrderCheckStats> {
  if (running.controller) {
    throw new BusyError();
  }

  const controller = new AbortController();
  running.controller = controller;
  bind?.(controller);

  try {
    return await session.orderCheckAsync({ ...options, signal: controller.signal });
  } finally {
    running.controller = null;
  }
}

/**
 * Abort when the client goes away before the response is written
 */
export function abortOnClose(res: ClosableResponse, controller: AbortController): void {
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
}

// ============================================================================
// WEBSOCKET HANDLER
// ============================================================================

async function runSocketOrderCheck(payload: Record<string, unknown>, ctx: SocketContext): Promise<void> {
  let every = 1;
  const stats = await runGuardedOrderCheck(ctx.session, ctx.running, {
    iterations: optionalNumber(payload.iterations),
    alpha: optionalNumber(payload.alpha),
    seed: optionalNumber(payload.seed),
    progress: {
      start: (total) => {
        every = progressInterval(total);
      },
      update: (done, total) => {
        if (done % every === 0 || done === total) {
          ctx.broadcast({ type: 'progress', data: { done, total } });
        }
      },
      finish: () => undefined,
    },
  });
  ctx.broadcast({ type: 'ordercheck_done', data: orderCheckPayload(stats) });
}

/**
 * Dispatch one parsed client message
 */
export async function handleSocketMessage(ws: SocketLike, data: unknown, ctx: SocketContext): Promise<void> {
  if (!isRecord(data) || typeof data.action !== 'string') {
    ws.send(JSON.stringify({ type: 'error', message: 'Message must have an action' }));
    return;
  }
  const payload = isRecord(data.payload) ? data.payload : {};

  try {
    switch (data.action) {
      case 'set_pairs': {
        ctx.session.setPairs(payload.pairs);
        ctx.broadcast(getState(ctx.session));
        break;
      }

      case 'analyze': {
        const result = ctx.session.analyze();
        ctx.broadcast({ type: 'analysis', data: analysisPayload(result) });
        break;
      }

      case 'ordercheck': {
        await runSocketOrderCheck(payload, ctx);
        break;
      }

      case 'cancel': {
        if (ctx.running.controller) {
          ctx.running.controller.abort();
        } else {
          ws.send(JSON.stringify({ type: 'error', message: 'No order check is running' }));
        }
        break;
      }

      case 'get_state': {
        ws.send(JSON.stringify(getState(ctx.session)));
        break;
      }

      default:
        ws.send(JSON.stringify({ type: 'error', message: `Unknown action: ${data.action}` }));
    }
  } catch (error) {
    if (!(error instanceof SeqAnalysisError)) {
      getLogger().error(`WebSocket action ${data.action} failed`, error);
    }
    ws.send(JSON.stringify({ type: 'error', message: errorMessage(error) }));
  }
}

// ============================================================================
// REST API
// ============================================================================

export function createApp(
  session: AnalysisSession,
  broadcast: (data: object) => void = () => undefined,
  running: RunningCheck = { controller: null }
) {
  const app = express();
  app.use(express.json());

  app.get('/api/state', (_req, res) => {
    res.json(getState(session).data);
  });

  app.get('/api/map', (_req, res) => {
    const result = session.getPairs().length > 0 ? session.analyze() : null;
    const grid = result?.traversal.grid ?? session.getMap().initialGrid();
    res.json({
      decision: result ? result.decision : null,
      grid,
      text: renderMap(grid, result ? result.decision : null),
    });
  });

  app.post('/api/pairs', (req, res) => {
    const pairs = session.setPairs(isRecord(req.body) ? req.body.pairs : undefined);
    broadcast(getState(session));
    res.json({ pairs });
  });

  app.post('/api/analyze', (req, res) => {
    if (isRecord(req.body) && req.body.pairs !== undefined) {
      session.setPairs(req.body.pairs);
    }
    const result = analysisPayload(session.analyze());
    broadcast({ type: 'analysis', data: result });
    res.json(result);
  });

  app.post('/api/ordercheck', (req, res, next) => {
    const body = isRecord(req.body) ? req.body : {};
    if (running.controller) {
      next(new BusyError());
      return;
    }
    if (body.pairs !== undefined) {
      session.setPairs(body.pairs);
    }
    runGuardedOrderCheck(
      session,
      running,
      {
        iterations: optionalNumber(body.iterations),
        alpha: optionalNumber(body.alpha),
        seed: optionalNumber(body.seed),
      },
      (controller) => abortOnClose(res, controller)
    )
      .then((stats) => {
        const result = orderCheckPayload(stats);
        broadcast({ type: 'ordercheck_done', data: result });
        res.json(result);
      })
      .catch(next);
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof BusyError) {
      res.status(409).json({ error: error.name, message: error.message });
      return;
    }
    if (error instanceof SeqAnalysisError) {
      res.status(400).json({ error: error.name, message: error.message });
      return;
    }
    getLogger().error('Request failed', error);
    res.status(500).json({ error: 'InternalError', message: errorMessage(error) });
  });

  return app;
}

// ============================================================================
// SERVER SETUP
// ============================================================================

export function startWebServer(port?: number, configPath?: string) {
  if (configPath) {
    initConfig(configPath);
  }

  const config = getConfig();
  const validation = config.validate();
  if (!validation.valid) {
    throw new Error(`Invalid configuration: ${validation.errors.join('; ')}`);
  }

  const logConfig = config.getLoggingConfig();
  const logger = initLogger(logConfig).child('web');
  const sessionConfig = config.getSessionConfig();

  const session = createAnalysisSession({
    defaults: config.getAnalysisConfig(),
    resultsDir: sessionConfig.resultsDir,
    autoSave: sessionConfig.autoSave,
  });

  const clients: Set<WebSocket> = new Set();

  function broadcast(data: object) {
    const message = JSON.stringify(data);
    clients.forEach(client => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    });
  }

  // REST and WebSocket runs share one guard
  const running: RunningCheck = { controller: null };
  const app = createApp(session, broadcast, running);
  const server = createServer(app);
  const wss = new WebSocketServer({ server });
  const ctx: SocketContext = { session, broadcast, running };

  wss.on('connection', (ws) => {
    logger.info('Client connected');
    clients.add(ws);
    ws.send(JSON.stringify(getState(session)));

    ws.on('message', (message) => {
      let data: unknown;
      try {
        data = JSON.parse(message.toString());
      } catch {
        ws.send(JSON.stringify({ type: 'error', message: 'Invalid JSON' }));
        return;
      }
      handleSocketMessage(ws, data, ctx).catch((error: unknown) => {
        logger.error('Unhandled WebSocket failure', error);
      });
    });

    ws.on('close', () => {
      logger.info('Client disconnected');
      clients.delete(ws);
    });

    ws.on('error', (error) => {
      logger.error('WebSocket error', error);
    });
  });

  const listenPort = port ?? config.getServerConfig().port;
  server.listen(listenPort, () => {
    logger.info(`Web server running at http://localhost:${listenPort}`);
  });

  return { app, server, wss, session };
}

if (require.main === module) {
  const port = process.argv[2] ? parseInt(process.argv[2], 10) : undefined;
  startWebServer(port, process.argv[3]);
}
