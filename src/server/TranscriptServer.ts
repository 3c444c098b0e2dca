import http from 'node:http';
import type { SessionStorePort } from '../domain/ports/SessionStorePort.js';
import { SessionNotFoundError } from '../domain/errors/DomainErrors.js';
import { OutputFormatter } from '../cli/formatters/OutputFormatter.js';
import { Logger, errorMessage } from '../shared/Logger.js';

/**
 * 唯讀的 transcript HTTP 服務
 *
 * 只監聽 127.0.0.1，只接受 GET：
 * - /health
 * - /sessions
 * - /sessions/:id
 * - /sessions/:id/transcript
 */

const logger = new Logger('TranscriptServer');

const SESSION_ROUTE = /^\/sessions\/([^/]+)(\/transcript)?$/;
const VALID_ID = /^[\w-]+$/;

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

async function route(
  store: SessionStorePort,
  formatter: OutputFormatter,
  req: http.IncomingMessage,
  res: http.ServerResponse,
): Promise<void> {
  if (req.method !== 'GET') {
    sendJson(res, 404, { error: 'Not found' });
    return;
  }

  const url = new URL(req.url ?? '/', 'http://127.0.0.1');

  if (url.pathname === '/health') {
    sendJson(res, 200, { status: 'ok', name: 'clipchat' });
    return;
  }

  if (url.pathname === '/sessions') {
    const sessions = await store.list();
    sendJson(res, 200, { sessions, count: sessions.length });
    return;
  }

  const match = SESSION_ROUTE.exec(url.pathname);
  if (!match) {
    sendJson(res, 404, { error: 'Not found' });
    return;
  }

  const sessionId = decodeSegment(match[1]);
  if (sessionId === undefined || !VALID_ID.test(sessionId)) {
    sendJson(res, 400, { error: `Invalid session id "${sessionId ?? match[1]}"` });
    return;
  }

  try {
    const session = await store.load(sessionId);
    if (match[2]) {
      res.writeHead(200, { 'Content-Type': 'text/plain; charset=utf-8' });
      res.end(formatter.formatTranscript(session) + '\n');
    } else {
      sendJson(res, 200, session);
    }
  } catch (err) {
    if (err instanceof SessionNotFoundError) {
      sendJson(res, 404, { error: err.message });
      return;
    }
    throw err;
  }
}

/** 不合法的 % 跳脫回傳 undefined */
function decodeSegment(segment: string): string | undefined {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    if (err instanceof URIError) return undefined;
    throw err;
  }
}

export async function startTranscriptServer(
  store: SessionStorePort,
  port: number = 8085,
  host: string = '127.0.0.1',
): Promise<http.Server> {
  const formatter = new OutputFormatter();

  const httpServer = http.createServer((req, res) => {
    route(store, formatter, req, res).catch((err: unknown) => {
      logger.error('Request failed', { url: req.url, error: errorMessage(err) });
      if (!res.headersSent) {
        sendJson(res, 500, { error: errorMessage(err) });
      } else {
        res.end();
      }
    });
  });

  return new Promise((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(port, host, () => {
      httpServer.off('error', reject);
      logger.info(`Transcript server listening on http://${host}:${port}`);
      resolve(httpServer);
    });
  });
}
