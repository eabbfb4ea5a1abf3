import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import WebSocket, { RawData, WebSocketServer } from 'ws';
import { AudioChannel, type ChannelControlMessage, type MediaConnection } from './audio/audioChannel';
import type { SessionManager } from './calls/sessionManager';
import type { EventDispatcher } from './events/eventDispatcher';
import { log } from './log';
import { incInboundAudioChunksDropped, metricsHandler, metricsMiddleware } from './metrics';
import { createEventsRouter } from './routes/events';
import { createHealthRouter, type HealthProbe } from './routes/health';

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  res.locals.requestId = requestId;
  next();
}

function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'invalid_json' });
    return;
  }
  log.error({ err, requestId: res.locals.requestId, path: req.path }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

const MEDIA_PATH_PREFIX = '/v1/media/';

export interface MediaRequest {
  namespace: string;
  callId: string;
  token: string | null;
}

export function parseMediaRequest(rawUrl: string | undefined, host = 'localhost'): MediaRequest | null {
  if (!rawUrl) {
    return null;
  }

  let url: URL;
  try {
    url = new URL(rawUrl, `http://${host}`);
  } catch {
    return null;
  }
  if (!url.pathname.startsWith(MEDIA_PATH_PREFIX)) {
    return null;
  }

  const parts = url.pathname.slice(MEDIA_PATH_PREFIX.length).split('/');
  if (parts.length !== 2) {
    return null;
  }

  let namespace: string;
  let callId: string;
  try {
    [namespace, callId] = parts.map((part) => decodeURIComponent(part));
  } catch {
    return null;
  }
  if (!namespace || !callId) {
    return null;
  }

  return { namespace, callId, token: url.searchParams.get('token') };
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  return Array.isArray(data) ? Buffer.concat(data) : Buffer.from(data);
}

function parseControlType(data: RawData): string | null {
  try {
    const parsed: unknown = JSON.parse(toBuffer(data).toString('utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'type' in parsed && typeof parsed.type === 'string') {
      return parsed.type;
    }
  } catch {
    return null;
  }
  return null;
}

function wsConnection(ws: WebSocket): MediaConnection {
  const send = (data: Buffer | string, binary: boolean): Promise<void> =>
    new Promise((resolve, reject) => {
      if (ws.readyState !== WebSocket.OPEN) {
        reject(new Error('media websocket not open'));
        return;
      }
      ws.send(data, { binary }, (error) => (error ? reject(error) : resolve()));
    });

  return {
    sendAudio: (chunk: Buffer) => send(chunk, true),
    sendControl: (message: ChannelControlMessage) => send(JSON.stringify(message), false),
    close: (code?: number, reason?: string) => {
      if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.close(code, reason);
      }
    },
  };
}

export interface ServerDeps {
  dispatcher: EventDispatcher;
  sessionManager: SessionManager;
  health: HealthProbe;
  mediaStreamToken: string;
}

function attachMediaWebSocketServer(server: http.Server, deps: ServerDeps): WebSocketServer {
  const { dispatcher, sessionManager } = deps;
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (request, socket, head) => {
    const parsed = parseMediaRequest(request.url, request.headers.host);
    if (!parsed) {
      socket.destroy();
      return;
    }

    if (!parsed.token || parsed.token !== deps.mediaStreamToken) {
      log.warn({ event: 'media_auth_failed', call_id: parsed.callId, namespace: parsed.namespace }, 'media auth failed');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      onConnection(ws, parsed);
    });
  });

  function onConnection(ws: WebSocket, media: MediaRequest): void {
    const { namespace, callId } = media;
    const logContext = { call_id: callId, namespace };

    const channel = new AudioChannel({
      callId,
      namespace,
      connection: wsConnection(ws),
      onUtterance: (utterance, current) => dispatcher.handleUtterance(utterance, current),
      onClosed: (reason) => {
        // In-flight turn work for this call is abandoned with its connection.
        if (sessionManager.getChannel(callId) === channel) {
          sessionManager.teardown(callId, reason);
        }
      },
    });
    sessionManager.registerChannel(callId, channel);

    void dispatcher.openMediaCall(namespace, callId).catch((error: unknown) => {
      log.error({ err: error, event: 'media_call_open_failed', ...logContext }, 'media call open failed');
    });

    log.info({ event: 'media_connected', ...logContext }, 'media websocket connected');

    ws.on('message', (data, isBinary) => {
      sessionManager.touch(callId);

      if (isBinary) {
        channel.receive(toBuffer(data));
        return;
      }

      const type = parseControlType(data);
      if (type !== 'hangup') {
        incInboundAudioChunksDropped(type ? 'unknown_control' : 'invalid_control');
        log.warn({ event: 'media_control_ignored', control_type: type, ...logContext }, 'media control message ignored');
        return;
      }

      void dispatcher
        .endMediaCall(namespace, callId, 'customer-ended-call')
        .catch((error: unknown) => {
          log.error({ err: error, event: 'media_hangup_failed', ...logContext }, 'media hangup failed');
        })
        .finally(() => {
          sessionManager.teardown(callId, 'hangup');
        });
    });

    ws.on('close', () => {
      channel.close('media_closed');
      log.info({ event: 'media_disconnected', ...logContext }, 'media websocket closed');
    });

    ws.on('error', (error) => {
      log.error({ err: error, ...logContext }, 'media websocket error');
      channel.close('connection_error', 1011);
    });
  }

  return wss;
}

export function buildServer(deps: ServerDeps): { app: express.Express; server: http.Server; wss: WebSocketServer } {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);
  app.use(express.json({ limit: '1mb' }));

  app.use('/health', createHealthRouter(deps.health));
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/v1/events', createEventsRouter(deps.dispatcher));

  app.use(errorHandler);

  const server = http.createServer(app);
  const wss = attachMediaWebSocketServer(server, deps);

  return { app, server, wss };
}
