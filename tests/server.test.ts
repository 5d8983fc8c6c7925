import { describe, it, expect, vi, afterEach } from 'vitest';
import pino from 'pino';
import { EventBus } from '../src/core/events.js';
import { DevServer, type ClientConnection, type DevServerOptions } from '../src/infra/server.js';
import type { ClientSession } from '../src/infra/server.js';
import type { HotReloadEvent, ProgramIr, StateSnapshot } from '../src/core/types.js';

const log = pino({ level: 'silent' });

type Sent = { type: string; [key: string]: unknown };

class FakeConnection implements ClientConnection {
  sent: Sent[] = [];
  closed: { code: number; reason: string } | null = null;
  autoFlush = true;
  failWrites = false;
  private inFlight: Array<() => void> = [];

  send(data: string, done: (err?: Error) => void): void {
    this.sent.push(JSON.parse(data));
    if (this.failWrites) done(new Error('socket reset'));
    else if (this.autoFlush) done();
    else this.inFlight.push(() => done());
  }

  close(code: number, reason: string): void {
    this.closed = { code, reason };
  }

  flush(): void {
    for (const done of this.inFlight.splice(0)) done();
  }

  types(): string[] {
    return this.sent.map((m) => m.type);
  }
}

const options: DevServerOptions = {
  port: 0,
  host: '127.0.0.1',
  protocolVersion: 1,
  heartbeatIntervalMs: 1000,
  heartbeatTimeoutMs: 2000
};

function program(revision: number): ProgramIr {
  return { revision, units: [{ path: 'a.ui', ir: revision }] };
}

function setup(overrides: Partial<DevServerOptions> = {}) {
  const clock = { now: 0 };
  const bus = new EventBus(log);
  const events = bus.subscribe();
  const server = new DevServer({ ...options, ...overrides }, bus, log, () => clock.now);

  const connect = (ready = true): { conn: FakeConnection; session: ClientSession } => {
    const conn = new FakeConnection();
    const session = server.accept(conn);
    server.receive(session, JSON.stringify({ type: 'hello', protocolVersion: 1 }));
    if (ready) server.receive(session, JSON.stringify({ type: 'ready' }));
    return { conn, session };
  };

  const eventTypes = async (count: number): Promise<HotReloadEvent['type'][]> => {
    await vi.waitFor(() => expect(events.size).toBe(count));
    return events.drain().map((e) => e.type);
  };

  return { clock, bus, server, connect, eventTypes };
}

describe('DevServer', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('welcomes a client with a matching protocol version', async () => {
    const { server, connect, eventTypes } = setup();
    const { conn, session } = connect(false);

    expect(conn.sent).toEqual([{ type: 'welcome', protocolVersion: 1, clientId: session.id }]);
    expect(server.clientCount).toBe(1);
    expect(await eventTypes(1)).toEqual(['client.connected']);
  });

  it('closes a client with another protocol version before sending anything', async () => {
    const { server, eventTypes } = setup();
    const conn = new FakeConnection();
    const session = server.accept(conn);

    server.receive(session, JSON.stringify({ type: 'hello', protocolVersion: 2 }));
    server.broadcastReload(program(1), null);
    server.broadcastCompileError([{ path: 'a.ui', message: 'bad', severity: 'error' }]);
    server.tick();

    expect(conn.sent).toEqual([]);
    expect(conn.closed).toEqual({ code: 4001, reason: 'protocol version mismatch: server 1, client 2' });
    expect(server.clientCount).toBe(0);
    expect(await eventTypes(1)).toEqual(['protocol.error']);
  });

  it('holds a reload until the client is ready', () => {
    const { server, connect } = setup();
    const { conn, session } = connect(false);

    server.broadcastReload(program(1), null);
    expect(conn.types()).toEqual(['welcome']);

    server.receive(session, JSON.stringify({ type: 'ready' }));
    expect(conn.types()).toEqual(['welcome', 'reload']);
    expect(conn.sent[1]).toEqual({ type: 'reload', revision: 1, program: program(1), stateDiff: null });
  });

  it('sends a slow client only the newest reload', () => {
    const { server, connect } = setup();
    const one = connect();
    const two = new FakeConnection();
    two.autoFlush = false;
    const twoSession = server.accept(two);
    server.receive(twoSession, JSON.stringify({ type: 'hello', protocolVersion: 1 }));
    server.receive(twoSession, JSON.stringify({ type: 'ready' }));

    server.broadcastReload(program(1), null);
    server.receive(one.session, JSON.stringify({ type: 'ack', applied: true, revision: 1 }));
    server.broadcastReload(program(2), null);
    two.flush();

    expect(one.conn.sent.filter((m) => m.type === 'reload').map((m) => m.revision)).toEqual([1, 2]);
    expect(two.sent.filter((m) => m.type === 'reload').map((m) => m.revision)).toEqual([2]);
  });

  it('waits for the ack before sending the next reload', () => {
    const { server, connect } = setup();
    const { conn, session } = connect();

    server.broadcastReload(program(1), null);
    server.broadcastReload(program(2), null);
    server.broadcastReload(program(3), null);
    expect(conn.sent.filter((m) => m.type === 'reload').map((m) => m.revision)).toEqual([1]);

    server.receive(session, JSON.stringify({ type: 'ack', applied: false, error: 'render failed' }));
    expect(conn.sent.filter((m) => m.type === 'reload').map((m) => m.revision)).toEqual([1, 3]);
  });

  it('replays the latest reload to a client that joins later', () => {
    const { server, connect } = setup();
    server.broadcastReload(program(4), null);

    const { conn } = connect();

    expect(conn.types()).toEqual(['welcome', 'reload']);
    expect(conn.sent[1]?.revision).toBe(4);
  });

  it('pings open clients and closes one that stops answering', async () => {
    const { clock, server, connect, eventTypes } = setup();
    const { conn, session } = connect();
    await eventTypes(1);

    clock.now = 1000;
    server.tick();
    expect(conn.sent[1]).toEqual({ type: 'ping', seq: 1 });

    clock.now = 1500;
    server.receive(session, JSON.stringify({ type: 'pong', seq: 1 }));
    clock.now = 3000;
    server.tick();
    expect(conn.sent[2]).toEqual({ type: 'ping', seq: 2 });
    expect(conn.closed).toBeNull();

    clock.now = 3500;
    server.tick();
    expect(conn.closed).toEqual({ code: 4003, reason: 'heartbeat timeout' });
    expect(await eventTypes(2)).toEqual(['protocol.error', 'client.disconnected']);
  });

  it('runs the heartbeat on its interval', async () => {
    vi.useFakeTimers();
    const bus = new EventBus(log);
    const server = new DevServer(options, bus, log);
    const conn = new FakeConnection();
    server.receive(server.accept(conn), JSON.stringify({ type: 'hello', protocolVersion: 1 }));

    server.startHeartbeat();
    vi.advanceTimersByTime(1000);
    expect(conn.types()).toEqual(['welcome', 'ping']);

    vi.advanceTimersByTime(1000);
    expect(conn.closed).toEqual({ code: 4003, reason: 'heartbeat timeout' });

    await server.stop('done');
  });

  it('closes a connection that never says hello', () => {
    const { clock, server } = setup();
    const conn = new FakeConnection();
    server.accept(conn);

    clock.now = 2000;
    server.tick();

    expect(conn.closed).toEqual({ code: 4002, reason: 'handshake timeout' });
  });

  it('closes only the connection that sent a malformed message', async () => {
    const { server, connect, eventTypes } = setup();
    const bad = connect();
    const good = connect();
    await eventTypes(2);

    server.receive(bad.session, 'not json');

    expect(bad.conn.closed).toEqual({ code: 4002, reason: 'malformed message: invalid JSON' });
    expect(good.conn.closed).toBeNull();
    expect(server.clientCount).toBe(1);
    expect(await eventTypes(2)).toEqual(['protocol.error', 'client.disconnected']);
  });

  it('rejects messages out of order', () => {
    const { server, connect } = setup();
    const early = new FakeConnection();
    server.receive(server.accept(early), JSON.stringify({ type: 'ready' }));
    expect(early.closed).toEqual({ code: 4002, reason: 'expected hello, got ready' });

    const { conn, session } = connect();
    server.receive(session, JSON.stringify({ type: 'hello', protocolVersion: 1 }));
    expect(conn.closed).toEqual({ code: 4002, reason: 'duplicate hello' });
  });

  it('passes state reports on', () => {
    const reports: Array<{ snapshot: StateSnapshot; clientId: string }> = [];
    const { server, connect } = setup({ onStateReport: (snapshot, clientId) => reports.push({ snapshot, clientId }) });
    const { session } = connect();
    const snapshot = { id: 's1', capturedAt: 10, nodes: [{ id: 'counter', type: 'number', value: 2, version: 1 }] };

    server.receive(session, JSON.stringify({ type: 'stateReport', snapshot }));

    expect(reports).toEqual([{ snapshot, clientId: session.id }]);
    expect(session.lastReport).toEqual(snapshot);
    expect(Object.isFrozen(session.lastReport)).toBe(true);
  });

  it('drops a client whose socket write fails', async () => {
    const { server, connect, eventTypes } = setup();
    const { conn } = connect();
    await eventTypes(1);

    conn.failWrites = true;
    server.broadcastCompileError([{ path: 'a.ui', message: 'bad', severity: 'error' }]);

    expect(conn.closed).toEqual({ code: 4002, reason: 'write failed' });
    expect(server.clientCount).toBe(0);
    expect(await eventTypes(1)).toEqual(['client.disconnected']);
  });

  it('says goodbye to every client on stop', async () => {
    const { server, connect } = setup();
    const a = connect();
    const b = connect();

    await server.stop('server shutting down');

    expect(a.conn.closed).toEqual({ code: 1001, reason: 'server shutting down' });
    expect(b.conn.closed).toEqual({ code: 1001, reason: 'server shutting down' });
    expect(server.clientCount).toBe(0);
  });
});
