/**
 * WebSocket transport for live sentiment: `GET /ws/sentiment/:callId`.
 *
 * Upgrades are validated before the handshake completes (token, call,
 * session caps) and refused with a plain HTTP status. After the upgrade a
 * connection becomes a registry session; inbound frames go to the
 * controller in arrival order and the socket `close` event removes it.
 */

import http, { IncomingMessage, STATUS_CODES } from 'http';
import { Duplex } from 'stream';
import WebSocket, { RawData, WebSocketServer } from 'ws';
import { SessionRegistry } from './session-registry';
import { StreamController } from './stream-controller';
import { ServerMessage, Session, SessionConnection } from './types';
import { Identity, IdentityVerifier } from '../auth/types';
import { extractToken } from '../auth/identity-verifier';
import { AppError, isAppError, toErrorPayload, unauthorized } from '../errors/app-error';
import { logger, sessionLogger } from '../observability/logger';

const PATH_PATTERN = /^\/ws\/sentiment\/([^/]+)\/?$/;
const MAX_CLOSE_REASON_BYTES = 123;

export interface GatewayOptions {
  /** Interval of protocol-level pings; a client that misses one is dropped */
  heartbeatMs: number;
}

/** Adapts a `ws` socket to the registry's connection handle */
export class WsConnection implements SessionConnection {
  constructor(private readonly ws: WebSocket) {}

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  send(message: ServerMessage): void {
    this.ws.send(JSON.stringify(message));
  }

  close(code: number, reason: string): void {
    if (this.ws.readyState === WebSocket.CLOSING || this.ws.readyState === WebSocket.CLOSED) return;
    this.ws.close(code, closeReason(reason));
  }
}

export function matchCallId(pathname: string): string | null {
  const match = PATH_PATTERN.exec(pathname);
  if (!match) return null;
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return null;
  }
}

/** WebSocket close code for an admission error raised after the handshake */
export function closeCodeFor(err: unknown): number {
  if (isAppError(err) && err.status >= 400 && err.status < 500) return 4000 + err.status;
  return 1011;
}

/** Close frames carry at most 123 bytes of reason */
export function closeReason(message: string): string {
  const bytes = Buffer.from(message, 'utf8');
  if (bytes.length <= MAX_CLOSE_REASON_BYTES) return message;
  let end = MAX_CLOSE_REASON_BYTES - 3;
  // Back off to a character boundary
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) end--;
  return `${bytes.subarray(0, end).toString('utf8')}...`;
}

function decodeFrame(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export class SentimentGateway {
  private readonly wss = new WebSocketServer({ noServer: true, perMessageDeflate: false });
  private readonly heartbeats = new Set<NodeJS.Timeout>();
  private readonly log = logger.child({ component: 'ws-gateway' });
  private server?: http.Server;

  constructor(
    private readonly registry: SessionRegistry,
    private readonly controller: StreamController,
    private readonly verifier: IdentityVerifier,
    private readonly options: GatewayOptions,
  ) {}

  attach(server: http.Server): void {
    this.server = server;
    server.on('upgrade', this.onUpgrade);
  }

  /** Stop accepting upgrades and drop whatever sockets are still open */
  async close(): Promise<void> {
    this.server?.off('upgrade', this.onUpgrade);
    for (const timer of this.heartbeats) clearInterval(timer);
    this.heartbeats.clear();
    for (const ws of this.wss.clients) ws.terminate();
    await new Promise<void>((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  // ───── Handshake ─────

  private readonly onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    // Admission is async; the client may drop the socket meanwhile
    socket.on('error', (err) => this.log.debug({ err, url: req.url }, 'Upgrade socket error'));
    this.handleUpgrade(req, socket, head).catch((err: unknown) => {
      this.log.error({ err, url: req.url }, 'Upgrade handling failed');
      this.reject(socket, new AppError('Internal', 'Internal server error'));
    });
  };

  private async handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const callId = matchCallId(url.pathname);
    if (callId === null) {
      this.reject(socket, new AppError('NotFound', `No WebSocket endpoint at ${url.pathname}`));
      return;
    }
    if (this.controller.isShuttingDown) {
      this.reject(socket, new AppError('Unavailable', 'Server shutting down'));
      return;
    }

    const verified = this.verifier.verify(extractToken(req.headers, url.searchParams));
    if (!verified.ok) {
      this.log.info({ callId, reason: verified.reason }, 'WebSocket upgrade rejected');
      this.reject(socket, unauthorized(verified.message));
      return;
    }
    const identity = verified.identity;

    try {
      await this.registry.checkAdmission(callId, identity);
    } catch (err) {
      if (!isAppError(err)) throw err;
      this.log.info({ callId, subject: identity.subject, code: err.code }, 'WebSocket upgrade rejected');
      this.reject(socket, err);
      return;
    }

    this.wss.handleUpgrade(req, socket, head, (ws) => {
      this.onConnection(ws, callId, identity).catch((err: unknown) => {
        this.log.error({ err, callId }, 'Connection setup failed');
        ws.close(1011, 'Internal server error');
      });
    });
  }

  private reject(socket: Duplex, err: AppError): void {
    if (socket.destroyed) return;
    const status = err.status;
    const body = JSON.stringify({ error: err.toPayload() });
    socket.once('finish', () => socket.destroy());
    socket.end(
      `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? 'Error'}\r\n` +
        'Content-Type: application/json\r\n' +
        `Content-Length: ${Buffer.byteLength(body)}\r\n` +
        'Connection: close\r\n\r\n' +
        body,
    );
  }

  // ───── Connection ─────

  private async onConnection(ws: WebSocket, callId: string, identity: Identity): Promise<void> {
    let session: Session | undefined;
    let closed = false;
    let commands: Promise<void> = Promise.resolve();
    const pending: string[] = [];

    const dispatch = (active: Session, raw: string): void => {
      commands = commands
        .then(() => this.controller.handleCommand(active, raw))
        .catch((err: unknown) => this.log.error({ err, callId, sessionId: active.id }, 'Command failed'));
    };

    ws.on('message', (data) => {
      const raw = decodeFrame(data);
      if (session) dispatch(session, raw);
      else pending.push(raw);
    });

    let alive = true;
    ws.on('pong', () => {
      alive = true;
    });
    const heartbeat = setInterval(() => {
      if (!alive) {
        this.log.info({ callId, sessionId: session?.id }, 'Heartbeat missed; terminating connection');
        ws.terminate();
        return;
      }
      alive = false;
      ws.ping();
    }, this.options.heartbeatMs);
    this.heartbeats.add(heartbeat);

    ws.on('close', (code) => {
      closed = true;
      clearInterval(heartbeat);
      this.heartbeats.delete(heartbeat);
      if (!session) return;
      sessionLogger(callId, session.id, identity.subject).info({ code }, 'Client disconnected');
      this.registry.remove(session.id).catch((err: unknown) =>
        this.log.error({ err, callId }, 'Failed to remove session'),
      );
    });

    ws.on('error', (err) => {
      this.log.warn({ err, callId, sessionId: session?.id }, 'WebSocket error');
    });

    try {
      session = await this.registry.admit(callId, identity, new WsConnection(ws), (admitted, history) => {
        const welcome: ServerMessage[] = [{
          type: 'connection_established',
          call_id: callId,
          session_id: admitted.id,
          message: `Subscribed to live sentiment for call ${callId}`,
        }];
        // Late joiners catch up on the samples already published
        if (history.length > 0) welcome.push({ type: 'history', call_id: callId, data: history });
        return welcome;
      });
    } catch (err) {
      const payload = toErrorPayload(err);
      this.log.info({ callId, subject: identity.subject, code: payload.code }, 'Admission failed after upgrade');
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(JSON.stringify({ type: 'error', ...payload }));
        ws.close(closeCodeFor(err), closeReason(payload.message));
      }
      return;
    }

    if (closed) {
      await this.registry.remove(session.id);
      return;
    }

    sessionLogger(callId, session.id, identity.subject).info({ role: identity.role }, 'Client connected');
    for (const raw of pending.splice(0)) dispatch(session, raw);
  }
}
