import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import websocket from '@fastify/websocket';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { RawData } from 'ws';
import type { EventBus } from '../core/events.js';
import {
  CLOSE_GOING_AWAY,
  CLOSE_HEARTBEAT_TIMEOUT,
  CLOSE_PROTOCOL_ERROR,
  CLOSE_VERSION_MISMATCH,
  decodeClientMessage,
  encodeServerMessage,
  toSnapshot,
  type ClientMessage,
  type ServerMessage
} from '../core/protocol.js';
import { ProtocolError, type ProtocolErrorReason } from '../core/errors.js';
import type { Diagnostic, ProgramIr, StateDiff, StateSnapshot } from '../core/types.js';

/** The transport side of one client; a WebSocket in production. */
export interface ClientConnection {
  /** `done` fires once the frame has been handed to the OS, or failed. */
  send(data: string, done: (err?: Error) => void): void;
  close(code: number, reason: string): void;
}

export interface DevServerOptions {
  port: number;
  host: string;
  protocolVersion: number;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  rateLimitPerMinute?: number;
  onStateReport?: (snapshot: StateSnapshot, clientId: string) => void;
}

export interface ClientInfo {
  id: string;
  ready: boolean;
  awaitingAck: number | null;
  queued: number;
  connectedAt: number;
}

type ReloadMessage = Extract<ServerMessage, { type: 'reload' }>;

// Close frames carry at most 123 bytes of reason.
const MAX_CLOSE_REASON = 120;

function decodeRaw(raw: RawData): string {
  if (Buffer.isBuffer(raw)) return raw.toString('utf8');
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf8');
  return Buffer.from(raw).toString('utf8');
}

/**
 * Per-connection outbox. Messages leave in FIFO order with one write in flight.
 * A reload waits until the client is ready, has acked the previous reload and
 * the transport has drained; a newer reload replaces a waiting one.
 */
export class ClientSession {
  readonly id = nanoid(12);
  readonly connectedAt: number;
  phase: 'handshake' | 'open' | 'closed' = 'handshake';
  ready = false;
  awaitingAck: number | null = null;
  lastPongAt: number;
  lastReport: StateSnapshot | undefined;
  private outbox: ServerMessage[] = [];
  private writing = false;

  constructor(
    private readonly conn: ClientConnection,
    private readonly log: Logger,
    now: number,
    private readonly onWriteError: (session: ClientSession, err: Error) => void
  ) {
    this.connectedAt = now;
    this.lastPongAt = now;
  }

  info(): ClientInfo {
    return {
      id: this.id,
      ready: this.ready,
      awaitingAck: this.awaitingAck,
      queued: this.outbox.length,
      connectedAt: this.connectedAt
    };
  }

  enqueue(message: ServerMessage): void {
    if (this.phase === 'closed') return;
    if (message.type === 'reload') {
      const superseded = this.outbox.filter((m) => m.type === 'reload').length;
      if (superseded > 0) {
        this.outbox = this.outbox.filter((m) => m.type !== 'reload');
        this.log.debug({ clientId: this.id, superseded, revision: message.revision }, 'Superseded pending reload');
      }
    }
    this.outbox.push(message);
    this.pump();
  }

  markReady(): void {
    this.ready = true;
    this.pump();
  }

  acknowledge(): void {
    this.awaitingAck = null;
    this.pump();
  }

  /** Pings skip the outbox so a client busy applying a reload still answers liveness checks. */
  ping(seq: number): void {
    if (this.phase !== 'open') return;
    this.conn.send(encodeServerMessage({ type: 'ping', seq }), (err) => {
      if (err) this.onWriteError(this, err);
    });
  }

  close(code: number, reason: string): void {
    if (this.phase === 'closed') return;
    this.phase = 'closed';
    this.outbox = [];
    this.conn.close(code, Buffer.from(reason).subarray(0, MAX_CLOSE_REASON).toString('utf8'));
  }

  private pump(): void {
    if (this.writing || this.phase !== 'open') return;
    const head = this.outbox[0];
    if (!head) return;
    if (head.type === 'reload' && (!this.ready || this.awaitingAck !== null)) return;

    this.outbox.shift();
    if (head.type === 'reload') this.awaitingAck = head.revision;
    this.writing = true;
    this.conn.send(encodeServerMessage(head), (err) => {
      this.writing = false;
      if (err) {
        this.onWriteError(this, err);
        return;
      }
      this.pump();
    });
  }
}

/**
 * Push server for live clients: versioned handshake, heartbeats, and reload
 * broadcast with per-connection ack tracking.
 */
export class DevServer {
  private sessions = new Map<string, ClientSession>();
  private latestReload: ReloadMessage | null = null;
  private heartbeat: ReturnType<typeof setInterval> | null = null;
  private pingSeq = 0;
  private app: FastifyInstance | null = null;

  constructor(
    private readonly opts: DevServerOptions,
    private readonly bus: EventBus,
    private readonly log: Logger,
    private readonly now: () => number = Date.now
  ) {}

  get clientCount(): number {
    let n = 0;
    for (const s of this.sessions.values()) if (s.phase === 'open') n++;
    return n;
  }

  get port(): number | undefined {
    const addr = this.app?.server.address();
    return addr && typeof addr === 'object' ? addr.port : undefined;
  }

  clients(): ClientInfo[] {
    return [...this.sessions.values()].filter((s) => s.phase === 'open').map((s) => s.info());
  }

  /** Listens for WebSocket clients on `/`; `register` adds HTTP routes to the same instance first. */
  async start(register?: (app: FastifyInstance) => Promise<void>): Promise<string> {
    const logger: FastifyBaseLogger = this.log;
    const app = Fastify({ logger, disableRequestLogging: true });
    await app.register(helmet, { global: true });
    await app.register(rateLimit, { max: this.opts.rateLimitPerMinute ?? 600, timeWindow: '1 minute' });
    await app.register(websocket);

    app.get('/', { websocket: true }, (socket) => {
      const session = this.accept({
        send: (data, done) => socket.send(data, done),
        close: (code, reason) => socket.close(code, reason)
      });
      socket.on('message', (raw: RawData) => this.receive(session, decodeRaw(raw)));
      socket.on('close', (code: number, reason: Buffer) => this.disconnect(session, reason.toString() || `code ${code}`));
      socket.on('error', (err: Error) => this.log.warn({ err, clientId: session.id }, 'Socket error'));
    });

    if (register) await register(app);

    const addr = await app.listen({ port: this.opts.port, host: this.opts.host });
    this.app = app;
    this.startHeartbeat();
    this.log.info({ addr }, 'Dev server listening');
    return addr;
  }

  startHeartbeat(): void {
    if (this.heartbeat) return;
    this.heartbeat = setInterval(() => this.tick(), this.opts.heartbeatIntervalMs);
  }

  accept(conn: ClientConnection): ClientSession {
    const session = new ClientSession(conn, this.log, this.now(), (s, err) => {
      this.log.warn({ err, clientId: s.id }, 'Write failed');
      this.drop(s, CLOSE_PROTOCOL_ERROR, 'write failed');
    });
    this.sessions.set(session.id, session);
    return session;
  }

  receive(session: ClientSession, raw: string): void {
    if (session.phase === 'closed') return;
    const decoded = decodeClientMessage(raw);
    if (!decoded.ok) {
      this.reject(session, 'malformed', CLOSE_PROTOCOL_ERROR, `malformed message: ${decoded.error}`);
      return;
    }
    const msg = decoded.message;

    if (session.phase === 'handshake') {
      this.handshake(session, msg);
      return;
    }

    switch (msg.type) {
      case 'hello':
        this.reject(session, 'unexpected', CLOSE_PROTOCOL_ERROR, 'duplicate hello');
        return;
      case 'ready':
        session.markReady();
        return;
      case 'ack':
        if (!msg.applied) {
          this.log.warn({ clientId: session.id, revision: msg.revision, error: msg.error }, 'Client could not apply reload');
        }
        session.acknowledge();
        return;
      case 'pong':
        session.lastPongAt = this.now();
        return;
      case 'stateReport': {
        const snapshot = toSnapshot(msg.snapshot);
        session.lastReport = snapshot;
        this.opts.onStateReport?.(snapshot, session.id);
        return;
      }
    }
  }

  /** Called when the transport closed on its own. */
  disconnect(session: ClientSession, reason: string): void {
    if (!this.sessions.delete(session.id)) return;
    const wasOpen = session.phase === 'open';
    session.phase = 'closed';
    if (wasOpen) this.bus.emit({ type: 'client.disconnected', clientId: session.id, reason, ts: this.now() });
  }

  broadcastReload(program: ProgramIr, stateDiff: StateDiff | null): number {
    const message: ReloadMessage = { type: 'reload', revision: program.revision, program, stateDiff };
    this.latestReload = message;
    return this.broadcast(message);
  }

  broadcastCompileError(diagnostics: Diagnostic[]): number {
    return this.broadcast({ type: 'compileError', diagnostics });
  }

  tick(): void {
    const t = this.now();
    for (const session of [...this.sessions.values()]) {
      const silentFor = t - (session.phase === 'handshake' ? session.connectedAt : session.lastPongAt);
      if (silentFor < this.opts.heartbeatTimeoutMs) {
        session.ping(++this.pingSeq);
        continue;
      }
      if (session.phase === 'handshake') {
        this.reject(session, 'unexpected', CLOSE_PROTOCOL_ERROR, 'handshake timeout');
      } else {
        this.reject(session, 'heartbeat-timeout', CLOSE_HEARTBEAT_TIMEOUT, 'heartbeat timeout');
      }
    }
  }

  async stop(reason: string): Promise<void> {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
    for (const session of [...this.sessions.values()]) this.drop(session, CLOSE_GOING_AWAY, reason);
    const app = this.app;
    this.app = null;
    if (app) await app.close();
  }

  private handshake(session: ClientSession, msg: ClientMessage): void {
    if (msg.type !== 'hello') {
      this.reject(session, 'unexpected', CLOSE_PROTOCOL_ERROR, `expected hello, got ${msg.type}`);
      return;
    }
    if (msg.protocolVersion !== this.opts.protocolVersion) {
      this.reject(
        session,
        'version-mismatch',
        CLOSE_VERSION_MISMATCH,
        `protocol version mismatch: server ${this.opts.protocolVersion}, client ${msg.protocolVersion}`
      );
      return;
    }
    session.phase = 'open';
    session.lastPongAt = this.now();
    session.enqueue({ type: 'welcome', protocolVersion: this.opts.protocolVersion, clientId: session.id });
    if (this.latestReload) session.enqueue(this.latestReload);
    this.bus.emit({ type: 'client.connected', clientId: session.id, ts: this.now() });
    this.log.info({ clientId: session.id }, 'Client connected');
  }

  private broadcast(message: ServerMessage): number {
    let n = 0;
    for (const session of this.sessions.values()) {
      if (session.phase !== 'open') continue;
      session.enqueue(message);
      n++;
    }
    return n;
  }

  private reject(session: ClientSession, reason: ProtocolErrorReason, code: number, detail: string): void {
    const err = new ProtocolError(reason, detail);
    this.log.warn({ err, clientId: session.id, reason }, 'protocol.error');
    this.bus.emit({ type: 'protocol.error', clientId: session.id, reason: detail, ts: this.now() });
    this.drop(session, code, detail);
  }

  private drop(session: ClientSession, code: number, reason: string): void {
    const wasOpen = session.phase === 'open';
    session.close(code, reason);
    this.sessions.delete(session.id);
    if (wasOpen) this.bus.emit({ type: 'client.disconnected', clientId: session.id, reason, ts: this.now() });
  }
}
