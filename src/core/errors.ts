import type { Diagnostic } from './types.js';

export type HotReloadErrorCode =
  | 'WATCH_FAILED'
  | 'COMPILE_FAILED'
  | 'PROTOCOL_VIOLATION'
  | 'STATE_APPLY_FAILED'
  | 'INVALID_STATE';

export class HotReloadError extends Error {
  constructor(
    readonly code: HotReloadErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class WatchError extends HotReloadError {
  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('WATCH_FAILED', `Cannot watch ${path}: ${message}`, options);
  }
}

export class CompileError extends HotReloadError {
  constructor(readonly diagnostics: Diagnostic[]) {
    super('COMPILE_FAILED', `${diagnostics.length} file(s) failed to compile`);
  }
}

export type ProtocolErrorReason = 'version-mismatch' | 'malformed' | 'unexpected' | 'heartbeat-timeout';

export class ProtocolError extends HotReloadError {
  constructor(
    readonly reason: ProtocolErrorReason,
    message: string
  ) {
    super('PROTOCOL_VIOLATION', message);
  }
}

export type StateStage = 'capture' | 'install' | 'apply';

export class StateApplyError extends HotReloadError {
  constructor(
    readonly failed: Array<{ id: string; reason: string }>,
    readonly stage: StateStage = 'apply',
    options?: { cause?: unknown }
  ) {
    super(
      'STATE_APPLY_FAILED',
      stage === 'apply'
        ? `State could not be applied to ${failed.map((f) => f.id).join(', ')}`
        : `State ${stage} failed: ${errorMessage(options?.cause)}`,
      options
    );
  }
}

export class RuntimeStateError extends HotReloadError {
  constructor(message: string) {
    super('INVALID_STATE', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
