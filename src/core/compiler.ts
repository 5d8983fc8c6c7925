import type { Logger } from 'pino';
import { errorMessage } from './errors.js';
import type {
  ChangeBatch,
  CompileFn,
  CompileResult,
  CompiledUnit,
  Diagnostic,
  JsonValue,
  ProgramIr,
  WatchEvent
} from './types.js';

export interface CompileOptions {
  /** Checked between files only; a file that started compiling always finishes. */
  signal?: AbortSignal;
}

export interface CompilerStats {
  units: number;
  edges: number;
  revision: number;
}

/**
 * Dependency-aware recompilation over a unit cache.
 *
 * The cache is an arena of units keyed by path plus a reverse index from a
 * dependency to the units that read it. A batch either commits completely or
 * leaves both the cache and the active program exactly as they were.
 */
export class IncrementalCompiler<TIr = JsonValue> {
  private units = new Map<string, CompiledUnit<TIr>>();
  private dependents = new Map<string, Set<string>>();
  private program: ProgramIr<TIr> = { revision: 0, units: [] };
  /** Changes from failed batches; replayed into every compile until one commits. */
  private dirty = new Map<string, WatchEvent>();

  constructor(
    private readonly compileFile: CompileFn<TIr>,
    private readonly log: Logger,
    private readonly now: () => number = Date.now
  ) {}

  get activeProgram(): ProgramIr<TIr> {
    return this.program;
  }

  unit(path: string): CompiledUnit<TIr> | undefined {
    return this.units.get(path);
  }

  paths(): string[] {
    return [...this.units.keys()].sort();
  }

  /** Paths changed by failed batches that have not been committed yet. */
  dirtyPaths(): string[] {
    return [...this.dirty.keys()].sort();
  }

  dependentsOf(path: string): string[] {
    return [...(this.dependents.get(path) ?? [])].sort();
  }

  stats(): CompilerStats {
    let edges = 0;
    for (const set of this.dependents.values()) edges += set.size;
    return { units: this.units.size, edges, revision: this.program.revision };
  }

  reset(): void {
    this.units.clear();
    this.dependents.clear();
    this.dirty.clear();
    this.program = { revision: this.program.revision, units: [] };
  }

  /** Every path whose unit must be rebuilt when `seeds` change, seeds included. */
  closure(seeds: Iterable<string>): Set<string> {
    const visited = new Set<string>();
    const queue = [...seeds];
    while (queue.length > 0) {
      const next = queue.pop();
      if (next === undefined || visited.has(next)) continue;
      visited.add(next);
      for (const dependent of this.dependents.get(next) ?? []) {
        if (!visited.has(dependent)) queue.push(dependent);
      }
    }
    return visited;
  }

  async compile(batch: ChangeBatch, options: CompileOptions = {}): Promise<CompileResult<TIr>> {
    const changes = new Map(this.dirty);
    for (const event of batch.values()) changes.set(event.path, event);

    const removed = new Set<string>();
    for (const event of changes.values()) {
      if (event.kind === 'removed') removed.add(event.path);
    }

    const targets = [...this.closure(changes.keys())].filter((p) => !removed.has(p)).sort();
    const staged = new Map<string, CompiledUnit<TIr>>();
    const diagnostics: Diagnostic[] = [];
    const failed: string[] = [];

    for (const path of targets) {
      if (options.signal?.aborted) {
        const completed = [...staged.keys(), ...failed].sort();
        this.dirty = changes;
        this.log.info({ completed: completed.length, total: targets.length }, 'Compile aborted');
        return { kind: 'aborted', completed };
      }
      try {
        const out = await this.compileFile(path);
        const errors = out.diagnostics.filter((d) => d.severity === 'error');
        diagnostics.push(...out.diagnostics);
        if (errors.length > 0) {
          failed.push(path);
          continue;
        }
        staged.set(
          path,
          Object.freeze({
            path,
            ir: out.ir,
            dependencies: Object.freeze([...new Set(out.dependencies)]),
            compiledAt: this.now()
          })
        );
      } catch (err) {
        failed.push(path);
        diagnostics.push({ path, message: errorMessage(err), severity: 'error', code: 'compiler-crash' });
      }
    }

    if (failed.length > 0) {
      this.dirty = changes;
      this.log.debug({ failed, dirty: changes.size }, 'Compile failed; cache untouched');
      return { kind: 'failure', diagnostics, recompiled: targets };
    }

    this.dirty = new Map();
    const removedUnits = [...removed].filter((p) => this.units.has(p)).sort();
    if (staged.size === 0 && removedUnits.length === 0) {
      return { kind: 'success', program: this.program, recompiled: [], removed: [] };
    }

    this.commit(staged, removed);
    this.log.debug({ recompiled: targets.length, reused: this.units.size - staged.size }, 'Compile committed');
    return { kind: 'success', program: this.program, recompiled: targets, removed: removedUnits };
  }

  private commit(staged: Map<string, CompiledUnit<TIr>>, removed: Set<string>): void {
    for (const path of removed) {
      const old = this.units.get(path);
      if (old) this.unlink(old);
      this.units.delete(path);
    }
    for (const [path, unit] of staged) {
      const old = this.units.get(path);
      if (old) this.unlink(old);
      this.units.set(path, unit);
      for (const dep of unit.dependencies) {
        let set = this.dependents.get(dep);
        if (!set) {
          set = new Set();
          this.dependents.set(dep, set);
        }
        set.add(path);
      }
    }
    this.program = Object.freeze({
      revision: this.program.revision + 1,
      units: Object.freeze(this.paths().map((path) => this.unitIr(path)))
    });
  }

  private unitIr(path: string): { readonly path: string; readonly ir: TIr } {
    const unit = this.units.get(path);
    if (!unit) throw new Error(`Unit missing from cache: ${path}`);
    return Object.freeze({ path, ir: unit.ir });
  }

  private unlink(unit: CompiledUnit<TIr>): void {
    for (const dep of unit.dependencies) {
      const set = this.dependents.get(dep);
      if (!set) continue;
      set.delete(unit.path);
      if (set.size === 0) this.dependents.delete(dep);
    }
  }
}
