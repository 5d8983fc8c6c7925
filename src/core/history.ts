import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { HistoryDb } from '../infra/db.js';
import type { Diagnostic } from './types.js';

const MAX_STORED_DIAGNOSTICS = 200;

export type CycleOutcome = 'success' | 'failure';

export interface CycleRecord {
  id: string;
  revision: number | null;
  outcome: CycleOutcome;
  paths: string[];
  recompiled: number;
  durationMs: number;
  diagnostics: Diagnostic[];
  createdAt: number;
}

interface CycleRow {
  id: string;
  revision: number | null;
  outcome: CycleOutcome;
  paths_json: string;
  recompiled: number;
  duration_ms: number;
  diagnostics_json: string;
  created_at: number;
}

interface CountRow {
  n: number;
}

function now() {
  return Date.now();
}

function toRecord(r: CycleRow): CycleRecord {
  return {
    id: r.id,
    revision: r.revision,
    outcome: r.outcome,
    paths: JSON.parse(r.paths_json) as string[],
    recompiled: r.recompiled,
    durationMs: r.duration_ms,
    diagnostics: JSON.parse(r.diagnostics_json) as Diagnostic[],
    createdAt: r.created_at
  };
}

const COLUMNS = 'id, revision, outcome, paths_json, recompiled, duration_ms, diagnostics_json, created_at';

/** Journal of compile cycles, one row per batch the runtime ran. */
export class ReloadHistory {
  constructor(private db: HistoryDb, private log: Logger) {}

  record(input: Omit<CycleRecord, 'id' | 'createdAt'>): CycleRecord {
    const cycle: CycleRecord = {
      ...input,
      diagnostics: input.diagnostics.slice(0, MAX_STORED_DIAGNOSTICS),
      id: nanoid(12),
      createdAt: now()
    };
    this.db
      .prepare(`INSERT INTO cycles (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`)
      .run(
        cycle.id,
        cycle.revision,
        cycle.outcome,
        JSON.stringify(cycle.paths),
        cycle.recompiled,
        Math.round(cycle.durationMs),
        JSON.stringify(cycle.diagnostics),
        cycle.createdAt
      );
    if (input.diagnostics.length > MAX_STORED_DIAGNOSTICS) {
      this.log.debug({ cycleId: cycle.id, dropped: input.diagnostics.length - MAX_STORED_DIAGNOSTICS }, 'Clipped stored diagnostics');
    }
    return cycle;
  }

  getCycle(id: string): CycleRecord | null {
    const row = this.db.prepare(`SELECT ${COLUMNS} FROM cycles WHERE id = ?`).get(id) as CycleRow | undefined;
    return row ? toRecord(row) : null;
  }

  listCycles(limit = 50, outcome?: CycleOutcome): CycleRecord[] {
    const rows = outcome
      ? (this.db
          .prepare(`SELECT ${COLUMNS} FROM cycles WHERE outcome = ? ORDER BY created_at DESC, rowid DESC LIMIT ?`)
          .all(outcome, limit) as CycleRow[])
      : (this.db
          .prepare(`SELECT ${COLUMNS} FROM cycles ORDER BY created_at DESC, rowid DESC LIMIT ?`)
          .all(limit) as CycleRow[]);
    return rows.map(toRecord);
  }

  status() {
    const count = (sql: string) => (this.db.prepare(sql).get() as CountRow | undefined)?.n ?? 0;
    const last = this.db
      .prepare("SELECT MAX(revision) AS n FROM cycles WHERE outcome = 'success'")
      .get() as { n: number | null } | undefined;
    return {
      cycles: count('SELECT COUNT(1) AS n FROM cycles'),
      failures: count("SELECT COUNT(1) AS n FROM cycles WHERE outcome = 'failure'"),
      lastRevision: last?.n ?? null,
      now: now()
    };
  }

  prune(keep: number): number {
    const info = this.db
      .prepare('DELETE FROM cycles WHERE id NOT IN (SELECT id FROM cycles ORDER BY created_at DESC, rowid DESC LIMIT ?)')
      .run(keep);
    if (info.changes > 0) this.log.debug({ changes: info.changes }, 'Pruned cycle history');
    return info.changes;
  }
}
