import { describe, it, expect, vi, afterEach } from 'vitest';
import { once } from 'node:events';
import pino from 'pino';
import WebSocket from 'ws';
import { EventBus } from '../src/core/events.js';
import { DevServer } from '../src/infra/server.js';

const log = pino({ level: 'silent' });

describe('DevServer over WebSocket', () => {
  let server: DevServer | null = null;

  afterEach(async () => {
    await server?.stop('test over');
    server = null;
  });

  async function listen(): Promise<DevServer> {
    const s = new DevServer(
      { port: 0, host: '127.0.0.1', protocolVersion: 1, heartbeatIntervalMs: 60_000, heartbeatTimeoutMs: 120_000 },
      new EventBus(log),
      log
    );
    await s.start();
    server = s;
    return s;
  }

  function connect(port: number | undefined) {
    const ws = new WebSocket(`ws://127.0.0.1:${port}/`);
    const messages: unknown[] = [];
    ws.on('message', (data: WebSocket.RawData) => messages.push(JSON.parse(data.toString())));
    return { ws, messages };
  }

  it('handshakes, delivers a reload and says goodbye on stop', async () => {
    const s = await listen();
    const { ws, messages } = connect(s.port);
    await once(ws, 'open');

    ws.send(JSON.stringify({ type: 'hello', protocolVersion: 1 }));
    await vi.waitFor(() => expect(messages).toHaveLength(1));
    expect(messages[0]).toMatchObject({ type: 'welcome', protocolVersion: 1 });

    ws.send(JSON.stringify({ type: 'ready' }));
    await vi.waitFor(() => expect(s.clients()[0]?.ready).toBe(true));

    s.broadcastReload({ revision: 1, units: [] }, null);
    await vi.waitFor(() => expect(messages).toHaveLength(2));
    expect(messages[1]).toEqual({ type: 'reload', revision: 1, program: { revision: 1, units: [] }, stateDiff: null });

    const closed = once(ws, 'close');
    await s.stop('server shutting down');
    server = null;
    const [code, reason] = await closed;
    expect(code).toBe(1001);
    expect(String(reason)).toBe('server shutting down');
  });

  it('closes with 4001 on a protocol version mismatch', async () => {
    const s = await listen();
    const { ws, messages } = connect(s.port);
    await once(ws, 'open');

    const closed = once(ws, 'close');
    ws.send(JSON.stringify({ type: 'hello', protocolVersion: 7 }));
    const [code] = await closed;

    expect(code).toBe(4001);
    expect(messages).toEqual([]);
  });
});
