import fs from 'node:fs/promises';
import path from 'node:path';
import { watch, type FSWatcher } from 'chokidar';
import type { Logger } from 'pino';
import { WatchError, errorMessage } from '../core/errors.js';
import type { ChangeBatch, WatchEvent, WatchEventKind } from '../core/types.js';

export interface FileWatcherOptions {
  roots: readonly string[];
  debounceMs: number;
  /** Empty means every file. */
  extensions?: readonly string[];
  /** Directory names skipped anywhere below a root. */
  ignore?: readonly string[];
  onBatch: (batch: ChangeBatch) => void;
  onError?: (err: Error, path?: string) => void;
}

const CHOKIDAR_KINDS: Record<string, WatchEventKind> = {
  add: 'created',
  change: 'modified',
  unlink: 'removed'
};

/**
 * Recursive watcher that coalesces notifications into one batch per quiet
 * window. Only one window is ever open; each new event pushes its close out
 * by `debounceMs`.
 */
export class FileWatcher {
  private watcher: FSWatcher | null = null;
  private pending = new Map<string, WatchEvent>();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private closed = false;
  private readonly extensions: Set<string>;
  private readonly ignore: Set<string>;
  private readonly roots: string[];

  constructor(
    private readonly opts: FileWatcherOptions,
    private readonly log: Logger
  ) {
    this.extensions = new Set((opts.extensions ?? []).map((e) => (e.startsWith('.') ? e : `.${e}`)));
    this.ignore = new Set(opts.ignore ?? []);
    this.roots = opts.roots.map((r) => path.resolve(r));
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Establishes the OS watches. Any root that cannot be watched rejects with WatchError. */
  async start(): Promise<void> {
    const roots = this.roots;
    for (const root of roots) {
      try {
        await fs.stat(root);
      } catch (err) {
        throw new WatchError(root, errorMessage(err), { cause: err });
      }
    }

    const watcher = watch(roots, {
      persistent: true,
      ignoreInitial: false,
      ignored: (p: string) => this.isIgnored(p)
    });

    // Initial adds arrive before 'ready' and make up the first batch.
    watcher.on('all', (eventName: string, filePath: string) => {
      const kind = CHOKIDAR_KINDS[eventName];
      if (kind) this.notify(filePath, kind);
    });

    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (err: Error) => reject(new WatchError(roots.join(', '), err.message, { cause: err }));
        watcher.once('error', onError);
        watcher.once('ready', () => {
          watcher.off('error', onError);
          resolve();
        });
      });
    } catch (err) {
      this.flush();
      await watcher.close();
      throw err;
    }
    watcher.on('error', (err: Error) => {
      this.log.warn({ err }, 'watch.error');
      this.opts.onError?.(err);
    });

    this.watcher = watcher;
    this.log.debug({ roots }, 'Watching');
  }

  /** Feeds one raw notification into the current window. */
  notify(filePath: string, kind: WatchEventKind, timestamp = Date.now()): void {
    if (this.closed || this.isIgnored(filePath) || !this.matchesExtension(filePath)) return;

    this.pending.set(filePath, { path: filePath, kind, timestamp });

    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      const batch = this.flush();
      if (!batch) return;
      try {
        this.opts.onBatch(batch);
      } catch (err) {
        this.log.error({ err }, 'Batch handler failed');
      }
    }, this.opts.debounceMs);
  }

  /** Closes the open window now and returns its batch, if any. */
  flush(): ChangeBatch | undefined {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.pending.size === 0) return undefined;
    const batch: ChangeBatch = this.pending;
    this.pending = new Map();
    return batch;
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.pending.clear();
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) await watcher.close();
  }

  /** Only segments below the containing root count; a root may itself sit inside `dist`. */
  private isIgnored(p: string): boolean {
    if (this.ignore.size === 0) return false;
    return this.withinRoot(p)
      .split(/[\\/]/)
      .some((segment) => this.ignore.has(segment));
  }

  /** Path relative to the innermost root containing it, or absolute when outside every root. */
  private withinRoot(p: string): string {
    const abs = path.resolve(p);
    let best: string | undefined;
    for (const root of this.roots) {
      const rel = path.relative(root, abs);
      if (rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) continue;
      if (best === undefined || rel.length < best.length) best = rel;
    }
    return best ?? abs;
  }

  private matchesExtension(p: string): boolean {
    return this.extensions.size === 0 || this.extensions.has(path.extname(p));
  }
}
