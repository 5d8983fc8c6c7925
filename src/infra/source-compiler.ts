import { createHash } from 'node:crypto';
import { existsSync } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import { errorMessage } from '../core/errors.js';
import type { CompileFn, Diagnostic, SourceSpan, UnitOutput } from '../core/types.js';

export type SourceIr = {
  hash: string;
  size: number;
  text: string;
};

const SPECIFIER_PATTERNS = [
  /(?:import|export)\s[^'"]*?from\s*['"]([^'"]+)['"]/g,
  /import\s*['"]([^'"]+)['"]/g,
  /import\s*\(\s*['"]([^'"]+)['"]\s*\)/g,
  /require\s*\(\s*['"]([^'"]+)['"]\s*\)/g,
  /@import\s+(?:url\()?\s*['"]([^'"]+)['"]/g
];

const RESOLVE_EXTENSIONS = ['.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs', '.json', '.css'];

export function hashSource(text: string): string {
  return createHash('sha256').update(text).digest('hex').substring(0, 16);
}

/** Relative specifiers named by import, export-from, require, dynamic import and CSS @import. */
export function extractSpecifiers(text: string): string[] {
  const found = new Set<string>();
  for (const pattern of SPECIFIER_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const spec = match[1];
      if (spec && (spec.startsWith('./') || spec.startsWith('../'))) found.add(spec);
    }
  }
  return [...found];
}

/** Resolves a relative specifier to a file, trying extensions and index files. */
export function resolveSpecifier(fromFile: string, specifier: string): string | undefined {
  const base = path.resolve(path.dirname(fromFile), specifier);
  const candidates = [
    base,
    ...RESOLVE_EXTENSIONS.map((ext) => base + ext),
    // `./x.js` written for a `./x.ts` source
    ...(path.extname(base) === '.js' ? ['.ts', '.tsx'].map((ext) => base.slice(0, -3) + ext) : []),
    ...RESOLVE_EXTENSIONS.map((ext) => path.join(base, `index${ext}`))
  ];
  return candidates.find((c) => existsSync(c) && path.extname(c) !== '');
}

function jsonErrorSpan(text: string, message: string): SourceSpan | undefined {
  const m = /position (\d+)/.exec(message);
  if (!m) return undefined;
  const offset = Math.min(Number(m[1]), text.length);
  const before = text.slice(0, offset).split(/\r?\n/);
  return { line: before.length, column: (before[before.length - 1] ?? '').length + 1 };
}

/**
 * The bundled per-file compiler: the IR is the file's content hash and text,
 * dependencies are its relative imports. JSON files must parse.
 */
export function createSourceCompiler(log: Logger): CompileFn<SourceIr> {
  return async (filePath: string): Promise<UnitOutput<SourceIr>> => {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf8');
    } catch (err) {
      log.debug({ err, path: filePath }, 'Source read failed');
      return {
        ir: { hash: '', size: 0, text: '' },
        dependencies: [],
        diagnostics: [{ path: filePath, message: `Cannot read file: ${errorMessage(err)}`, severity: 'error', code: 'read-failed' }]
      };
    }

    const diagnostics: Diagnostic[] = [];
    if (path.extname(filePath) === '.json') {
      try {
        JSON.parse(text);
      } catch (err) {
        const message = errorMessage(err);
        const span = jsonErrorSpan(text, message);
        diagnostics.push({ path: filePath, message, severity: 'error', code: 'invalid-json', ...(span ? { span } : {}) });
      }
    }

    const dependencies: string[] = [];
    for (const spec of extractSpecifiers(text)) {
      const resolved = resolveSpecifier(filePath, spec);
      if (resolved) {
        dependencies.push(resolved);
      } else {
        diagnostics.push({ path: filePath, message: `Cannot resolve '${spec}'`, severity: 'warning', code: 'unresolved-import' });
      }
    }

    return {
      ir: { hash: hashSource(text), size: Buffer.byteLength(text), text },
      dependencies,
      diagnostics
    };
  };
}
