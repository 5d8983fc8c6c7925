import { describe, it, expect, vi } from 'vitest';
import type { EventEmitter } from 'node:events';
import os from 'node:os';
import pino from 'pino';
import { FileWatcher } from '../src/infra/watcher.js';
import type { ChangeBatch } from '../src/core/types.js';

const created = vi.hoisted((): EventEmitter[] => []);

vi.mock('chokidar', async () => {
  const { EventEmitter } = await import('node:events');
  class FakeFSWatcher extends EventEmitter {
    async close(): Promise<void> {
      this.removeAllListeners();
    }
  }
  return {
    watch: () => {
      const watcher = new FakeFSWatcher();
      created.push(watcher);
      setImmediate(() => watcher.emit('ready'));
      return watcher;
    }
  };
});

const log = pino({ level: 'silent' });

describe('FileWatcher notification errors', () => {
  it('reports a transient error and keeps batching', async () => {
    const batches: ChangeBatch[] = [];
    const errors: string[] = [];
    const watcher = new FileWatcher(
      {
        roots: [os.tmpdir()],
        debounceMs: 10,
        onBatch: (b) => batches.push(b),
        onError: (err) => errors.push(err.message)
      },
      log
    );
    await watcher.start();
    const chokidar = created[0];
    expect(chokidar).toBeDefined();

    chokidar?.emit('error', new Error('EMFILE: too many open files'));
    chokidar?.emit('all', 'change', '/proj/a.ui');

    await vi.waitFor(() => expect(batches).toHaveLength(1));
    expect(errors).toEqual(['EMFILE: too many open files']);
    expect(batches[0]?.get('/proj/a.ui')?.kind).toBe('modified');
    await watcher.close();
  });
});
