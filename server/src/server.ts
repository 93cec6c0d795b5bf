import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { WebSocket, WebSocketServer, type RawData } from 'ws';

import type { ServerConfig } from './config.js';
import type { EventChannel } from './dispatcher.js';
import { DuelEngine, type DuelEngineOptions } from './engine.js';
import { componentLogger } from './log.js';
import { activeClientsGauge, collectMetrics, eventsCounter, metricsContentType } from './metrics.js';
import { RateLimiter } from './rate_limit.js';
import { parseClientMsg } from './schema.js';
import type { StyleCatalog } from './styles.js';
import type { ClientMsg, ServerMsg } from './types.js';

const log = componentLogger('server');

export interface DuelServerOptions {
  config: ServerConfig;
  catalog: StyleCatalog;
  engine?: Omit<DuelEngineOptions, 'catalog' | 'channel' | 'config'>;
}

export interface DuelServer {
  port: number;
  engine: DuelEngine;
  close(): Promise<void>;
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString();
  if (Buffer.isBuffer(data)) return data.toString();
  return Buffer.from(data).toString();
}

function send(ws: WebSocket, msg: ServerMsg): boolean {
  if (ws.readyState !== WebSocket.OPEN) return false;
  ws.send(JSON.stringify(msg));
  return true;
}

export async function startServer(options: DuelServerOptions): Promise<DuelServer> {
  const { config } = options;
  const sockets = new Map<string, WebSocket>();

  const channel: EventChannel = {
    deliver(uid, event) {
      const ws = sockets.get(uid);
      return ws ? send(ws, event) : false;
    }
  };

  const engine = new DuelEngine({ ...options.engine, catalog: options.catalog, channel, config: config.engine });
  const limiter = new RateLimiter({ ...config.rateLimit, clock: options.engine?.clock });

  async function handleHttp(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (req.url === '/metrics') {
      const body = await collectMetrics();
      res.writeHead(200, { 'Content-Type': metricsContentType });
      res.end(body);
      return;
    }
    if (req.url === '/healthz') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ ok: true, clients: sockets.size }));
      return;
    }
    res.writeHead(404);
    res.end();
  }

  const http = createServer((req, res) => {
    handleHttp(req, res).catch((err: unknown) => {
      log.error({ err, url: req.url }, 'HTTP request failed');
      if (!res.headersSent) res.writeHead(500);
      res.end();
    });
  });

  async function handle(ws: WebSocket, uid: string, msg: Exclude<ClientMsg, { t: 'auth' }>): Promise<void> {
    switch (msg.t) {
      case 'ping':
        send(ws, { t: 'pong' });
        return;
      case 'challenge': {
        if (msg.opponent === uid) {
          send(ws, { t: 'error', message: 'bad_request' });
          return;
        }
        engine.createMatch({ participants: [uid, msg.opponent], clientSeed: msg.clientSeed });
        return;
      }
      case 'lock_style': {
        const result = await engine.lockStyle(msg.matchId, msg.roundNo, uid, msg.style);
        send(ws, { t: 'reply', reqId: msg.reqId, action: 'lock_style', result });
        return;
      }
      case 'swing': {
        const result = await engine.swing(msg.matchId, msg.roundNo, uid);
        send(ws, { t: 'reply', reqId: msg.reqId, action: 'swing', result });
        return;
      }
      case 'stop': {
        const result = await engine.stop(msg.matchId, msg.roundNo, uid);
        send(ws, { t: 'reply', reqId: msg.reqId, action: 'stop', result });
        return;
      }
      case 'state': {
        const result = engine.getRoundState(msg.matchId, msg.roundNo);
        send(ws, { t: 'reply', reqId: msg.reqId, action: 'state', result });
        return;
      }
      case 'matches': {
        const matches = engine.matchesOf(uid);
        send(ws, { t: 'reply', reqId: msg.reqId, action: 'matches', result: { ok: true, matches } });
        return;
      }
    }
  }

  const wss = new WebSocketServer({ server: http });

  wss.on('connection', (ws) => {
    let uid: string | undefined;
    activeClientsGauge.inc();

    ws.on('message', (data) => {
      const msg = parseClientMsg(rawToString(data));
      if (!msg) {
        log.warn({ uid }, 'Rejected malformed client frame');
        send(ws, { t: 'error', message: 'bad_request' });
        return;
      }
      eventsCounter.inc({ direction: 'in', event: msg.t });

      if (msg.t === 'auth') {
        const previous = uid;
        if (previous && sockets.get(previous) === ws) sockets.delete(previous);
        uid = msg.uid;
        sockets.set(uid, ws);
        log.info({ uid }, 'Client authenticated');
        send(ws, { t: 'hello', uid });
        return;
      }
      if (!uid) {
        send(ws, { t: 'error', message: 'not_authenticated' });
        return;
      }
      if (!limiter.consume(uid)) {
        send(ws, { t: 'error', message: 'rate_limit' });
        return;
      }

      const caller = uid;
      handle(ws, caller, msg).catch((err: unknown) => {
        log.error({ err, uid: caller, t: msg.t }, 'Client message failed');
        send(ws, { t: 'error', message: err instanceof Error ? err.message : 'internal_error' });
      });
    });

    ws.on('close', () => {
      activeClientsGauge.dec();
      if (uid && sockets.get(uid) === ws) {
        sockets.delete(uid);
      }
      limiter.prune();
      log.info({ uid }, 'Client disconnected');
    });
  });

  await new Promise<void>((resolve, reject) => {
    http.once('error', reject);
    http.listen(config.port, () => {
      http.off('error', reject);
      resolve();
    });
  });

  const address = http.address();
  const port = typeof address === 'object' && address !== null ? address.port : config.port;
  log.info({ port }, 'Duel server listening');

  return {
    port,
    engine,
    async close() {
      engine.shutdown();
      for (const ws of wss.clients) {
        ws.terminate();
      }
      await new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });
      await new Promise<void>((resolve, reject) => {
        http.close((err) => (err ? reject(err) : resolve()));
      });
    }
  };
}
