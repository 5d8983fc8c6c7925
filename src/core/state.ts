import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { StateApplyError, errorMessage } from './errors.js';
import type {
  ApplyResult,
  JsonValue,
  ProgramIr,
  SnapshotProvider,
  StateDiff,
  StateNode,
  StateSchema,
  StateSchemaNode,
  StateSnapshot
} from './types.js';

const DEFAULT_HISTORY = 10;

export interface ReconcileOutcome {
  diff: StateDiff;
  /** Ids whose preserved value the application rejected; reset to defaults. */
  failed: string[];
}

function now() {
  return Date.now();
}

function parentOf(id: string): string | undefined {
  const i = id.lastIndexOf('/');
  return i > 0 ? id.slice(0, i) : undefined;
}

function isWithin(id: string, roots: ReadonlySet<string>): boolean {
  for (let cur: string | undefined = id; cur !== undefined; cur = parentOf(cur)) {
    if (roots.has(cur)) return true;
  }
  return false;
}

export function createSnapshot(nodes: Iterable<StateNode>, id: string = nanoid(12)): StateSnapshot {
  return Object.freeze({
    id,
    capturedAt: now(),
    nodes: Object.freeze([...nodes].map((n) => Object.freeze({ ...n })))
  });
}

/**
 * Compares a captured snapshot with the state schema of the newly installed
 * program. Node ids are `/`-separated paths: a type change on a node resets
 * its whole subtree even where descendants kept their id and type.
 */
export function diffState(snapshot: StateSnapshot, schema: StateSchema): StateDiff {
  const old = new Map(snapshot.nodes.map((n) => [n.id, n]));
  const next = new Map(schema.map((n) => [n.id, n]));

  const typeChanged = new Set<string>();
  for (const node of schema) {
    const prev = old.get(node.id);
    if (prev && prev.type !== node.type) typeChanged.add(node.id);
  }

  const diff: StateDiff = { preserved: [], reset: [], added: [] };
  for (const node of snapshot.nodes) {
    if (!next.has(node.id) || isWithin(node.id, typeChanged)) diff.reset.push(node.id);
    else diff.preserved.push(node.id);
  }
  for (const node of schema) {
    if (!old.has(node.id)) diff.added.push(node.id);
  }
  return diff;
}

/**
 * Carries live state across a reload: capture from the running program,
 * install the new one, then re-apply the subset whose identity and type survived.
 */
export class StateManager<TIr = JsonValue> {
  private snapshots: StateSnapshot[] = [];

  constructor(
    private readonly provider: SnapshotProvider<TIr>,
    private readonly log: Logger,
    private readonly options: { preserve: boolean; historySize?: number } = { preserve: true }
  ) {}

  history(): StateSnapshot[] {
    return [...this.snapshots];
  }

  latest(): StateSnapshot | undefined {
    return this.snapshots[this.snapshots.length - 1];
  }

  capture(): StateSnapshot {
    const snapshot = this.provider.capture();
    const limit = this.options.historySize ?? DEFAULT_HISTORY;
    this.snapshots.push(snapshot);
    if (this.snapshots.length > limit) this.snapshots.splice(0, this.snapshots.length - limit);
    this.log.debug({ snapshotId: snapshot.id, nodes: snapshot.nodes.length }, 'Captured state');
    return snapshot;
  }

  /**
   * Runs one capture → install → apply cycle for a program that compiled
   * successfully. A provider that throws costs state, never the reload: a
   * failed capture starts every node from its default, a failed install resets
   * everything captured.
   */
  reload(program: ProgramIr<TIr>): ReconcileOutcome {
    const before = this.options.preserve ? this.safeCapture() : undefined;
    const schema = this.safeInstall(program);
    if (!schema) {
      return { diff: { preserved: [], reset: before ? before.nodes.map((n) => n.id) : [], added: [] }, failed: [] };
    }
    if (!before) {
      return { diff: { preserved: [], reset: [], added: schema.map((n) => n.id) }, failed: [] };
    }
    return this.restore(before, schema);
  }

  /** Applies the preserved part of `before` to the state described by `schema`. */
  restore(before: StateSnapshot, schema: StateSchema): ReconcileOutcome {
    const diff = diffState(before, schema);
    if (diff.preserved.length === 0) return { diff, failed: [] };

    const preservedIds = new Set(diff.preserved);
    const carried = createSnapshot(before.nodes.filter((n) => preservedIds.has(n.id)));
    const result = this.safeApply(carried);
    if (result.ok) {
      this.log.debug({ preserved: diff.preserved.length, reset: diff.reset.length }, 'State applied');
      return { diff, failed: [] };
    }

    const failedRoots = new Set(result.failed.map((f) => f.id));
    this.log.warn({ err: new StateApplyError(result.failed) }, 'State apply failed; resetting affected subtrees');

    const failed = diff.preserved.filter((id) => isWithin(id, failedRoots));
    const failedSet = new Set(failed);
    const adjusted: StateDiff = {
      preserved: diff.preserved.filter((id) => !failedSet.has(id)),
      reset: [...diff.reset, ...failed],
      added: diff.added
    };

    const defaults = schema.filter((n) => failedSet.has(n.id));
    if (defaults.length > 0) {
      const fallback = this.safeApply(createSnapshot(defaults.map(toDefaultNode)));
      if (!fallback.ok) this.log.warn({ failed: fallback.failed }, 'Default state could not be applied');
    }
    return { diff: adjusted, failed };
  }

  private safeCapture(): StateSnapshot | undefined {
    try {
      return this.capture();
    } catch (err) {
      this.log.warn({ err: new StateApplyError([], 'capture', { cause: err }) }, 'State capture failed; using defaults');
      return undefined;
    }
  }

  private safeInstall(program: ProgramIr<TIr>): StateSchema | undefined {
    try {
      return this.provider.install(program);
    } catch (err) {
      this.log.warn({ err: new StateApplyError([], 'install', { cause: err }) }, 'State install failed');
      return undefined;
    }
  }

  private safeApply(snapshot: StateSnapshot): ApplyResult {
    try {
      return this.provider.apply(snapshot);
    } catch (err) {
      this.log.warn({ err }, 'State provider threw during apply');
      return { ok: false, failed: snapshot.nodes.map((n) => ({ id: n.id, reason: errorMessage(err) })) };
    }
  }
}

function toDefaultNode(node: StateSchemaNode): StateNode {
  return { id: node.id, type: node.type, value: node.defaultValue, version: 0 };
}

/**
 * Provider for applications that live in connected clients: the latest
 * `stateReport` stands in for a capture, and the schema of a new program is
 * taken to be the reported one (clients reconcile against their own defaults).
 */
export class ReportedStateProvider implements SnapshotProvider {
  private reported: StateSnapshot = createSnapshot([], 'empty');
  private lastApplied: StateSnapshot | undefined;

  report(snapshot: StateSnapshot): void {
    this.reported = snapshot;
  }

  get applied(): StateSnapshot | undefined {
    return this.lastApplied;
  }

  capture(): StateSnapshot {
    return this.reported;
  }

  install(_program: ProgramIr): StateSchema {
    return this.reported.nodes.map((n) => ({ id: n.id, type: n.type, defaultValue: null }));
  }

  apply(snapshot: StateSnapshot): ApplyResult {
    this.lastApplied = snapshot;
    return { ok: true };
  }
}
