import fs from 'node:fs';
import type { Logger } from 'pino';
import { registerRoutes, type RuntimeView } from '../api/routes.js';
import { DevServer, type DevServerOptions } from '../infra/server.js';
import { FileWatcher } from '../infra/watcher.js';
import { IncrementalCompiler } from './compiler.js';
import type { HotReloadConfig } from './config.js';
import { CompileError, RuntimeStateError } from './errors.js';
import { EventBus, EventRing, type SubscribeOptions, type Subscription } from './events.js';
import type { CycleOutcome, CycleRecord, ReloadHistory } from './history.js';
import { ErrorOverlay, type OverlayModel } from './overlay.js';
import { StateManager } from './state.js';
import type {
  ChangeBatch,
  CompileFn,
  Diagnostic,
  HotReloadEvent,
  JsonValue,
  ProgramIr,
  RuntimePhase,
  RuntimeStatus,
  SnapshotProvider,
  StateDiff,
  WatchEvent
} from './types.js';

const RECENT_EVENTS = 500;
const HISTORY_KEEP = 1000;

export interface RuntimeDeps<TIr extends JsonValue = JsonValue> {
  compile: CompileFn<TIr>;
  logger: Logger;
  /** Without a provider, reloads carry no state diff. */
  snapshots?: SnapshotProvider<TIr>;
  history?: ReloadHistory;
  /** Source text for overlay snippets. Defaults to reading the file. */
  readSource?: (path: string) => string | undefined;
  onStateReport?: DevServerOptions['onStateReport'];
  now?: () => number;
}

/** Control surface returned by `start()`; shares the runtime's lifecycle. */
export interface HotReloadHandle {
  reload(): Promise<void>;
  stop(reason?: string): Promise<void>;
  status(): RuntimeStatus;
  subscribe(options?: SubscribeOptions): Subscription<HotReloadEvent>;
  overlay(): OverlayModel;
  readonly port: number | undefined;
}

type Lifecycle = 'created' | 'started' | 'stopped';

/**
 * Owns the watcher, compiler, state manager, overlay and server, and runs the
 * compile → apply → broadcast pipeline one batch at a time. Batches that
 * arrive while a cycle runs are merged and run right after it.
 */
export class HotReloadRuntime<TIr extends JsonValue = JsonValue> implements RuntimeView {
  readonly bus: EventBus;
  readonly compiler: IncrementalCompiler<TIr>;
  readonly overlay: ErrorOverlay;
  readonly server: DevServer;
  readonly state: StateManager<TIr> | null;
  private readonly watcher: FileWatcher;
  private readonly recent = new EventRing(RECENT_EVENTS);
  private readonly log: Logger;
  private readonly now: () => number;
  private lifecycle: Lifecycle = 'created';
  private phase: RuntimePhase = 'idle';
  private pending = new Map<string, WatchEvent>();
  private pipeline: Promise<void> | null = null;
  private readonly abort = new AbortController();

  constructor(
    private readonly config: HotReloadConfig,
    private readonly deps: RuntimeDeps<TIr>
  ) {
    this.log = deps.logger;
    this.now = deps.now ?? Date.now;
    this.bus = new EventBus(this.log, { capacity: config.busCapacity, policy: 'drop-oldest' });
    this.bus.on((evt) => this.recent.push(evt), { name: 'recent-events', capacity: config.busCapacity });
    this.compiler = new IncrementalCompiler(deps.compile, this.log, this.now);
    this.overlay = new ErrorOverlay();
    this.state = deps.snapshots
      ? new StateManager(deps.snapshots, this.log, { preserve: config.statePreservation })
      : null;
    this.server = new DevServer(
      {
        port: config.wsPort,
        host: config.host,
        protocolVersion: config.protocolVersion,
        heartbeatIntervalMs: config.heartbeatIntervalMs,
        heartbeatTimeoutMs: config.heartbeatTimeoutMs,
        onStateReport: deps.onStateReport
      },
      this.bus,
      this.log,
      this.now
    );
    this.watcher = new FileWatcher(
      {
        roots: config.watchRoots,
        debounceMs: config.debounceMs,
        extensions: config.extensions,
        ignore: config.ignore,
        onBatch: (batch) => this.enqueue(batch),
        onError: (err, path) => this.bus.emit({ type: 'watch.error', path, message: err.message, ts: this.now() })
      },
      this.log
    );
  }

  /** Starts watching, then serving. A root that cannot be watched fails the start. */
  async start(): Promise<HotReloadHandle> {
    if (this.lifecycle !== 'created') {
      throw new RuntimeStateError(`Cannot start a runtime that is ${this.lifecycle}`);
    }
    this.lifecycle = 'started';

    try {
      await this.watcher.start();
    } catch (err) {
      this.lifecycle = 'stopped';
      this.bus.close();
      throw err;
    }

    try {
      await this.server.start((app) => registerRoutes(app, this));
    } catch (err) {
      this.lifecycle = 'stopped';
      this.abort.abort();
      await this.watcher.close();
      this.bus.close();
      throw err;
    }

    this.log.info({ roots: this.config.watchRoots, port: this.server.port }, 'Hot reload runtime started');
    return this.handle();
  }

  handle(): HotReloadHandle {
    const server = this.server;
    return {
      reload: () => this.reload(),
      stop: (reason?: string) => this.stop(reason),
      status: () => this.status(),
      subscribe: (options?: SubscribeOptions) => this.bus.subscribe(options),
      overlay: () => this.overlayModel(),
      get port() {
        return server.port;
      }
    };
  }

  /** Queues a batch and resolves once the pipeline has gone idle. */
  submit(batch: ChangeBatch): Promise<void> {
    this.enqueue(batch);
    return this.idle();
  }

  /** Recompiles every known unit. */
  reload(): Promise<void> {
    if (this.lifecycle === 'stopped') {
      return Promise.reject(new RuntimeStateError('Cannot reload a stopped runtime'));
    }
    const ts = this.now();
    const batch = new Map<string, WatchEvent>();
    for (const path of this.compiler.paths()) batch.set(path, { path, kind: 'modified', timestamp: ts });
    return this.submit(batch);
  }

  async idle(): Promise<void> {
    while (this.pipeline) await this.pipeline;
  }

  async stop(reason = 'runtime stopped'): Promise<void> {
    if (this.lifecycle === 'stopped') return;
    this.lifecycle = 'stopped';
    this.abort.abort();
    this.pending = new Map();
    await this.watcher.close();
    await this.idle();
    await this.server.stop(reason);
    this.bus.close();
    this.log.info({ reason }, 'Hot reload runtime stopped');
  }

  status(): RuntimeStatus {
    return {
      phase: this.lifecycle === 'stopped' ? 'stopped' : this.phase,
      revision: this.compiler.activeProgram.revision,
      errors: this.overlay.errorCount,
      clients: this.server.clientCount,
      pendingPaths: this.pending.size,
      units: this.compiler.stats().units
    };
  }

  recentEvents(): HotReloadEvent[] {
    return this.recent.toArray();
  }

  overlayModel(): OverlayModel {
    return this.overlay.model();
  }

  recentCycles(limit: number): CycleRecord[] {
    return this.deps.history?.listCycles(limit) ?? [];
  }

  private enqueue(batch: ChangeBatch): void {
    if (this.lifecycle === 'stopped') return;
    for (const event of batch.values()) {
      this.pending.set(event.path, event);
      this.bus.emit({ type: 'file.changed', path: event.path, kind: event.kind, ts: event.timestamp });
    }
    this.kick();
  }

  private kick(): void {
    if (this.pipeline || this.pending.size === 0) return;
    this.pipeline = this.drain()
      .catch((err: unknown) => this.log.error({ err }, 'Reload pipeline failed'))
      .finally(() => {
        this.pipeline = null;
        if (!this.abort.signal.aborted) this.kick();
      });
  }

  private async drain(): Promise<void> {
    while (this.pending.size > 0 && !this.abort.signal.aborted) {
      const batch: ChangeBatch = this.pending;
      this.pending = new Map();
      await this.runCycle(batch);
    }
  }

  private async runCycle(batch: ChangeBatch): Promise<void> {
    const paths = [...batch.keys()].sort();
    const started = this.now();
    this.phase = 'compiling';
    this.bus.emit({ type: 'compile.started', paths, ts: started });

    try {
      const result = await this.compiler.compile(batch, { signal: this.abort.signal });
      const durationMs = this.now() - started;

      if (result.kind === 'aborted') return;

      if (result.kind === 'failure') {
        this.fail(result.diagnostics, paths, result.recompiled.length, durationMs);
        return;
      }

      if (result.recompiled.length === 0 && result.removed.length === 0) {
        this.log.debug({ paths }, 'Nothing to recompile');
        return;
      }

      this.succeed(result.program, paths, result.recompiled, durationMs);
    } catch (err) {
      this.log.error({ err, paths }, 'Reload cycle failed');
    } finally {
      this.phase = 'idle';
    }
  }

  private fail(diagnostics: Diagnostic[], paths: string[], recompiled: number, durationMs: number): void {
    this.overlay.report(diagnostics, this.sourcesFor(diagnostics));
    const clients = this.server.broadcastCompileError(diagnostics);
    this.bus.emit({ type: 'compile.failed', diagnostics, durationMs, ts: this.now() });
    this.record('failure', null, paths, recompiled, durationMs, diagnostics);
    this.log.warn({ err: new CompileError(diagnostics), clients, durationMs }, 'compile.failed');
  }

  private succeed(program: ProgramIr<TIr>, paths: string[], recompiled: string[], durationMs: number): void {
    this.overlay.clear();
    this.bus.emit({
      type: 'compile.succeeded',
      revision: program.revision,
      recompiled,
      durationMs,
      ts: this.now()
    });

    const stateDiff = this.carryState(program);

    this.phase = 'broadcasting';
    const clients = this.server.broadcastReload(program, stateDiff);
    this.record('success', program.revision, paths, recompiled.length, durationMs, []);
    this.log.info({ revision: program.revision, recompiled: recompiled.length, clients, durationMs }, 'Reloaded');
  }

  /** State problems cost continuity only; the reload is broadcast regardless. */
  private carryState(program: ProgramIr<TIr>): StateDiff | null {
    if (!this.state) return null;
    try {
      const outcome = this.state.reload(program);
      this.bus.emit({
        type: 'state.applied',
        preserved: outcome.diff.preserved.length,
        reset: outcome.diff.reset.length,
        added: outcome.diff.added.length,
        failed: outcome.failed,
        ts: this.now()
      });
      return outcome.diff;
    } catch (err) {
      this.log.warn({ err, revision: program.revision }, 'State carry-over failed; reloading without it');
      return null;
    }
  }

  private sourcesFor(diagnostics: Diagnostic[]): Map<string, string> {
    const read = this.deps.readSource ?? ((path: string) => this.readFile(path));
    const sources = new Map<string, string>();
    for (const d of diagnostics) {
      if (!d.span || sources.has(d.path)) continue;
      const text = read(d.path);
      if (text !== undefined) sources.set(d.path, text);
    }
    return sources;
  }

  private readFile(path: string): string | undefined {
    try {
      return fs.readFileSync(path, 'utf8');
    } catch (err) {
      this.log.debug({ err, path }, 'Source unavailable for overlay');
      return undefined;
    }
  }

  private record(
    outcome: CycleOutcome,
    revision: number | null,
    paths: string[],
    recompiled: number,
    durationMs: number,
    diagnostics: Diagnostic[]
  ): void {
    const history = this.deps.history;
    if (!history) return;
    try {
      history.record({ revision, outcome, paths, recompiled, durationMs, diagnostics });
      history.prune(HISTORY_KEEP);
    } catch (err) {
      this.log.warn({ err }, 'Could not record reload cycle');
    }
  }
}
