import 'dotenv/config';

import http from 'node:http';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { Duplex } from 'node:stream';
import { WebSocketServer } from 'ws';
import { loadConfig } from './config';
import { describeError } from './core/errors';
import { logger } from './core/logger';
import { ConversationOrchestrator } from './core/orchestrator';
import { SessionStore } from './core/sessionStore';
import { ToolRegistry } from './core/toolRegistry';
import { buildModelClient } from './providers';
import { bindConnection } from './services/connection';
import { createDocumentClient, DynamoAuditLog } from './services/dynamodb';
import { ConversationRelay } from './services/relay';
import { SocketNotificationSink } from './services/socketSink';
import { accountTools } from './tools/accountTools';

const SESSION_PATH = /^\/ws\/session\/([^/?#]+)\/?$/;

const config = loadConfig();

const sessions = new SessionStore();
const sink = new SocketNotificationSink();
const orchestrator = new ConversationOrchestrator(
  {
    sessions,
    tools: new ToolRegistry(accountTools),
    model: buildModelClient(config.provider),
    sink,
  },
  { systemPrompt: config.systemPrompt, maxRoundTrips: config.maxRoundTrips },
);

const auditLog = config.audit.enabled
  ? new DynamoAuditLog(createDocumentClient(config.audit.region), {
    sessions: config.audit.sessionsTable,
    eventLogs: config.audit.eventLogsTable,
  })
  : undefined;

const relay = new ConversationRelay(
  { sessions, orchestrator, sink, auditLog },
  { maxFrameBytes: config.maxFrameBytes, rateLimitPerMinute: config.rateLimitPerMinute },
);

// HTTP server serves the static client and a health probe, and upgrades /ws/session/:id.
const httpServer = http.createServer((req, res) => {
  handleHttp(req, res).catch((error: unknown) => {
    logger.error(`http handler failed: ${describeError(error)}`);
    if (!res.headersSent) {
      sendJson(res, 500, { error: 'internal_error' });
    }
  });
});

const wss = new WebSocketServer({ noServer: true, maxPayload: config.maxFrameBytes });

httpServer.on('upgrade', (request: http.IncomingMessage, socket: Duplex, head: Buffer) => {
  const sessionId = matchSessionPath(request.url);
  if (!sessionId) {
    socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
    socket.destroy();
    return;
  }

  wss.handleUpgrade(request, socket, head, (ws) => {
    bindConnection(ws, relay, sessionId, request.socket.remoteAddress ?? 'unknown');
  });
});

httpServer.listen(config.port, () => {
  logger.info(`Tool relay listening on port ${config.port} using provider=${config.provider.modelProvider}`);
});

async function handleHttp(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  if (req.method === 'GET' && (req.url === '/' || req.url === '/index.html')) {
    const page = await readFile(path.resolve(config.staticDir, 'index.html'));
    res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
    res.end(page);
    return;
  }

  if (req.method === 'GET' && req.url === '/health') {
    sendJson(res, 200, { status: 'ok', sessions: sessions.size });
    return;
  }

  sendJson(res, 404, { error: 'not_found' });
}

function matchSessionPath(url: string | undefined): string | null {
  const match = SESSION_PATH.exec(url ?? '');
  if (!match) {
    return null;
  }
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return null;
  }
}

function sendJson(res: http.ServerResponse, status: number, body: object): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function shutdown(signal: string): void {
  logger.info(`received ${signal}, shutting down`);
  for (const client of wss.clients) {
    client.close(1001, 'server_shutdown');
  }
  wss.close();
  httpServer.close(() => process.exit(0));
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
