export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type WatchEventKind = 'created' | 'modified' | 'removed' | 'renamed';

export interface WatchEvent {
  path: string;
  kind: WatchEventKind;
  timestamp: number;
}

/** One entry per path, latest kind wins. */
export type ChangeBatch = ReadonlyMap<string, WatchEvent>;

export type Severity = 'error' | 'warning' | 'info';

export interface SourceSpan {
  line: number;
  column: number;
  endLine?: number;
  endColumn?: number;
}

export interface Diagnostic {
  path: string;
  message: string;
  severity: Severity;
  code?: string;
  span?: SourceSpan;
}

export interface UnitOutput<TIr = JsonValue> {
  ir: TIr;
  dependencies: readonly string[];
  diagnostics: readonly Diagnostic[];
}

/** The external compile-one-file capability. */
export type CompileFn<TIr = JsonValue> = (path: string) => UnitOutput<TIr> | Promise<UnitOutput<TIr>>;

export interface CompiledUnit<TIr = JsonValue> {
  readonly path: string;
  readonly ir: TIr;
  readonly dependencies: readonly string[];
  readonly compiledAt: number;
}

export interface ProgramIr<TIr = JsonValue> {
  readonly revision: number;
  readonly units: ReadonlyArray<{ readonly path: string; readonly ir: TIr }>;
}

export type CompileResult<TIr = JsonValue> =
  | { kind: 'success'; program: ProgramIr<TIr>; recompiled: string[]; removed: string[] }
  | { kind: 'failure'; diagnostics: Diagnostic[]; recompiled: string[] }
  | { kind: 'aborted'; completed: string[] };

export interface StateNode {
  readonly id: string;
  readonly type: string;
  readonly value: JsonValue;
  readonly version: number;
}

export interface StateSnapshot {
  readonly id: string;
  readonly capturedAt: number;
  readonly nodes: readonly StateNode[];
}

export interface StateSchemaNode {
  id: string;
  type: string;
  defaultValue: JsonValue;
}

export type StateSchema = readonly StateSchemaNode[];

export interface StateDiff {
  preserved: string[];
  reset: string[];
  added: string[];
}

export type ApplyResult = { ok: true } | { ok: false; failed: Array<{ id: string; reason: string }> };

/** Implemented by the live application. Called synchronously around a reload. */
export interface SnapshotProvider<TIr = JsonValue> {
  capture(): StateSnapshot;
  /** Constructs the new program and returns the state schema it expects. */
  install(program: ProgramIr<TIr>): StateSchema;
  apply(snapshot: StateSnapshot): ApplyResult;
}

export type RuntimePhase = 'idle' | 'compiling' | 'broadcasting' | 'stopped';

export interface RuntimeStatus {
  phase: RuntimePhase;
  revision: number;
  errors: number;
  clients: number;
  pendingPaths: number;
  units: number;
}

export type HotReloadEvent =
  | { type: 'file.changed'; path: string; kind: WatchEventKind; ts: number }
  | { type: 'compile.started'; paths: string[]; ts: number }
  | { type: 'compile.succeeded'; revision: number; recompiled: string[]; durationMs: number; ts: number }
  | { type: 'compile.failed'; diagnostics: Diagnostic[]; durationMs: number; ts: number }
  | { type: 'state.applied'; preserved: number; reset: number; added: number; failed: string[]; ts: number }
  | { type: 'client.connected'; clientId: string; ts: number }
  | { type: 'client.disconnected'; clientId: string; reason: string; ts: number }
  | { type: 'watch.error'; path?: string; message: string; ts: number }
  | { type: 'protocol.error'; clientId: string; reason: string; ts: number };
