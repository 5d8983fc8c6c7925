import type { Diagnostic, Severity, SourceSpan } from './types.js';

export interface SnippetLine {
  number: number;
  content: string;
  isErrorLine: boolean;
}

export interface SourceSnippet {
  lines: SnippetLine[];
  highlightIndex: number;
  highlightColumns: [number, number];
}

export interface OverlayEntry {
  path: string;
  message: string;
  severity: Severity;
  code?: string;
  span?: SourceSpan;
  snippet?: SourceSnippet;
}

export interface OverlayModel {
  visible: boolean;
  errorCount: number;
  warningCount: number;
  /** Diagnostics left out by `maxEntries`. */
  truncated: number;
  entries: OverlayEntry[];
}

export interface OverlayOptions {
  maxEntries?: number;
  showWarnings?: boolean;
  contextLines?: number;
  /** Source text by path, used for snippets. */
  sources?: ReadonlyMap<string, string>;
}

const SEVERITY_RANK: Record<Severity, number> = { error: 0, warning: 1, info: 2 };

export function sourceSnippet(source: string, line: number, column: number, contextLines = 2): SourceSnippet {
  const lines = source.split(/\r?\n/);
  const errorIndex = Math.min(Math.max(line - 1, 0), Math.max(lines.length - 1, 0));
  const start = Math.max(errorIndex - contextLines, 0);
  const end = Math.min(errorIndex + contextLines + 1, lines.length);

  return {
    lines: lines.slice(start, end).map((content, i) => ({
      number: start + i + 1,
      content,
      isErrorLine: start + i === errorIndex
    })),
    highlightIndex: errorIndex - start,
    highlightColumns: [column, column + 1]
  };
}

export function buildOverlayModel(diagnostics: readonly Diagnostic[], options: OverlayOptions = {}): OverlayModel {
  const { maxEntries = 10, showWarnings = true, contextLines = 2, sources } = options;

  const shown = diagnostics
    .filter((d) => d.severity === 'error' || (showWarnings && d.severity === 'warning'))
    .map((d, i) => ({ d, i }))
    .sort((a, b) => SEVERITY_RANK[a.d.severity] - SEVERITY_RANK[b.d.severity] || a.i - b.i)
    .map(({ d }) => d);

  const entries = shown.slice(0, maxEntries).map((d): OverlayEntry => {
    const entry: OverlayEntry = { path: d.path, message: d.message, severity: d.severity };
    if (d.code) entry.code = d.code;
    if (d.span) {
      entry.span = d.span;
      const source = sources?.get(d.path);
      if (source !== undefined) entry.snippet = sourceSnippet(source, d.span.line, d.span.column, contextLines);
    }
    return entry;
  });

  const errorCount = diagnostics.filter((d) => d.severity === 'error').length;
  return {
    visible: errorCount > 0,
    errorCount,
    warningCount: diagnostics.filter((d) => d.severity === 'warning').length,
    truncated: shown.length - entries.length,
    entries
  };
}

/** Holds the diagnostics of the last failed compile until a compile succeeds. */
export class ErrorOverlay {
  private current: Diagnostic[] = [];
  private sources = new Map<string, string>();

  constructor(private readonly options: Omit<OverlayOptions, 'sources'> = {}) {}

  get errorCount(): number {
    return this.current.filter((d) => d.severity === 'error').length;
  }

  report(diagnostics: readonly Diagnostic[], sources?: ReadonlyMap<string, string>): OverlayModel {
    this.current = [...diagnostics];
    this.sources = new Map(sources ?? []);
    return this.model();
  }

  clear(): void {
    this.current = [];
    this.sources.clear();
  }

  diagnostics(): Diagnostic[] {
    return [...this.current];
  }

  model(): OverlayModel {
    return buildOverlayModel(this.current, { ...this.options, sources: this.sources });
  }
}
