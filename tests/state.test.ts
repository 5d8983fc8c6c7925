import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { ReportedStateProvider, StateManager, createSnapshot, diffState } from '../src/core/state.js';
import type { ApplyResult, SnapshotProvider, StateNode, StateSchema, StateSnapshot } from '../src/core/types.js';

const log = pino({ level: 'silent' });

class FakeProvider implements SnapshotProvider {
  applied: StateSnapshot[] = [];
  captures = 0;
  results: Array<ApplyResult | Error> = [];
  captureError: Error | undefined;
  installError: Error | undefined;

  constructor(
    public nodes: StateNode[],
    public schema: StateSchema
  ) {}

  capture(): StateSnapshot {
    this.captures++;
    if (this.captureError) throw this.captureError;
    return createSnapshot(this.nodes, `snap-${this.captures}`);
  }

  install(): StateSchema {
    if (this.installError) throw this.installError;
    return this.schema;
  }

  apply(snapshot: StateSnapshot): ApplyResult {
    this.applied.push(snapshot);
    const next = this.results.shift() ?? { ok: true };
    if (next instanceof Error) throw next;
    return next;
  }
}

const oldNodes: StateNode[] = [
  { id: 'counter', type: 'number', value: 5, version: 3 },
  { id: 'form', type: 'form', value: { open: true }, version: 1 },
  { id: 'form/name', type: 'string', value: 'Ada', version: 2 },
  { id: 'gone', type: 'flag', value: true, version: 1 }
];

describe('diffState', () => {
  it('resets a type-changed node together with its subtree', () => {
    const schema: StateSchema = [
      { id: 'counter', type: 'number', defaultValue: 0 },
      { id: 'form', type: 'wizard', defaultValue: {} },
      { id: 'form/name', type: 'string', defaultValue: '' },
      { id: 'fresh', type: 'flag', defaultValue: false }
    ];

    expect(diffState(createSnapshot(oldNodes), schema)).toEqual({
      preserved: ['counter'],
      reset: ['form', 'form/name', 'gone'],
      added: ['fresh']
    });
  });
});

describe('StateManager', () => {
  it('carries preserved nodes across a reload with their old values', () => {
    const provider = new FakeProvider(oldNodes, [
      { id: 'counter', type: 'number', defaultValue: 0 },
      { id: 'form', type: 'wizard', defaultValue: {} }
    ]);
    const manager = new StateManager(provider, log);

    const outcome = manager.reload({ revision: 2, units: [] });

    expect(outcome).toEqual({
      diff: { preserved: ['counter'], reset: ['form', 'form/name', 'gone'], added: [] },
      failed: []
    });
    expect(provider.applied).toHaveLength(1);
    expect(provider.applied[0]?.nodes).toEqual([{ id: 'counter', type: 'number', value: 5, version: 3 }]);
    expect(manager.latest()?.id).toBe('snap-1');
  });

  it('resets a subtree the application refuses and applies its defaults', () => {
    const provider = new FakeProvider(oldNodes.slice(0, 3), [
      { id: 'counter', type: 'number', defaultValue: 0 },
      { id: 'form', type: 'form', defaultValue: { open: false } },
      { id: 'form/name', type: 'string', defaultValue: '' }
    ]);
    provider.results = [{ ok: false, failed: [{ id: 'form', reason: 'shape changed' }] }];
    const manager = new StateManager(provider, log);

    const outcome = manager.reload({ revision: 2, units: [] });

    expect(outcome).toEqual({
      diff: { preserved: ['counter'], reset: ['form', 'form/name'], added: [] },
      failed: ['form', 'form/name']
    });
    expect(provider.applied).toHaveLength(2);
    expect(provider.applied[1]?.nodes).toEqual([
      { id: 'form', type: 'form', value: { open: false }, version: 0 },
      { id: 'form/name', type: 'string', value: '', version: 0 }
    ]);
  });

  it('treats a throwing apply as a failure of every carried node', () => {
    const provider = new FakeProvider(oldNodes.slice(0, 1), [{ id: 'counter', type: 'number', defaultValue: 0 }]);
    provider.results = [new Error('renderer gone')];
    const manager = new StateManager(provider, log);

    const outcome = manager.reload({ revision: 2, units: [] });

    expect(outcome).toEqual({
      diff: { preserved: [], reset: ['counter'], added: [] },
      failed: ['counter']
    });
  });

  it('starts every node from its default when capture throws', () => {
    const provider = new FakeProvider(oldNodes, [
      { id: 'counter', type: 'number', defaultValue: 0 },
      { id: 'fresh', type: 'flag', defaultValue: false }
    ]);
    provider.captureError = new Error('renderer busy');
    const manager = new StateManager(provider, log);

    const outcome = manager.reload({ revision: 2, units: [] });

    expect(outcome).toEqual({ diff: { preserved: [], reset: [], added: ['counter', 'fresh'] }, failed: [] });
    expect(provider.applied).toEqual([]);
    expect(manager.history()).toEqual([]);
  });

  it('resets everything captured when install throws', () => {
    const provider = new FakeProvider(oldNodes.slice(0, 2), []);
    provider.installError = new Error('module init failed');
    const manager = new StateManager(provider, log);

    const outcome = manager.reload({ revision: 2, units: [] });

    expect(outcome).toEqual({ diff: { preserved: [], reset: ['counter', 'form'], added: [] }, failed: [] });
    expect(provider.applied).toEqual([]);
  });

  it('installs without capturing when preservation is off', () => {
    const provider = new FakeProvider(oldNodes, [
      { id: 'counter', type: 'number', defaultValue: 0 },
      { id: 'fresh', type: 'flag', defaultValue: false }
    ]);
    const manager = new StateManager(provider, log, { preserve: false });

    const outcome = manager.reload({ revision: 2, units: [] });

    expect(outcome).toEqual({ diff: { preserved: [], reset: [], added: ['counter', 'fresh'] }, failed: [] });
    expect(provider.captures).toBe(0);
    expect(provider.applied).toEqual([]);
  });

  it('keeps a bounded snapshot history', () => {
    const provider = new FakeProvider(oldNodes, []);
    const manager = new StateManager(provider, log, { preserve: true, historySize: 2 });

    manager.capture();
    manager.capture();
    manager.capture();

    expect(manager.history().map((s) => s.id)).toEqual(['snap-2', 'snap-3']);
  });

  it('freezes captured snapshots', () => {
    const snapshot = createSnapshot(oldNodes, 'frozen');
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.nodes[0])).toBe(true);
  });
});

describe('ReportedStateProvider', () => {
  it('captures the last reported snapshot and echoes its schema', () => {
    const provider = new ReportedStateProvider();
    expect(provider.capture().nodes).toEqual([]);

    const reported = createSnapshot(oldNodes.slice(0, 1), 'client-1');
    provider.report(reported);

    expect(provider.capture()).toBe(reported);
    expect(provider.install({ revision: 1, units: [] })).toEqual([{ id: 'counter', type: 'number', defaultValue: null }]);
    expect(provider.apply(reported)).toEqual({ ok: true });
    expect(provider.applied).toBe(reported);
  });
});
