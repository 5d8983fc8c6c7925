import { z } from 'zod';

export const PROTOCOL_VERSION = 1;

const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const ConfigSchema = z
  .object({
    watchRoots: z.array(z.string().min(1)).min(1),
    debounceMs: z.number().int().nonnegative().default(150),
    wsPort: z.number().int().min(0).max(65535).default(9876),
    host: z.string().default('127.0.0.1'),
    heartbeatIntervalMs: z.number().int().positive().default(5000),
    heartbeatTimeoutMs: z.number().int().positive().optional(),
    statePreservation: z.boolean().default(true),
    protocolVersion: z.number().int().positive().default(PROTOCOL_VERSION),
    extensions: z.array(z.string()).default([]),
    ignore: z.array(z.string()).default(['node_modules', '.git', 'dist']),
    busCapacity: z.number().int().positive().default(256),
    historyPath: z.string().default('.hotloop/history.sqlite'),
    logLevel: LogLevel.default('info')
  })
  .transform((c) => ({ ...c, heartbeatTimeoutMs: c.heartbeatTimeoutMs ?? c.heartbeatIntervalMs * 2 }));

export type HotReloadConfigInput = z.input<typeof ConfigSchema>;
type ConfigShape = z.output<typeof ConfigSchema>;
export type HotReloadConfig = Readonly<Omit<ConfigShape, 'watchRoots' | 'extensions' | 'ignore'>> & {
  readonly watchRoots: readonly string[];
  readonly extensions: readonly string[];
  readonly ignore: readonly string[];
};

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
}

export function resolveConfig(input: HotReloadConfigInput): HotReloadConfig {
  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid configuration:\n${formatIssues(parsed.error)}`);
  }
  const cfg = parsed.data;
  return Object.freeze({
    ...cfg,
    watchRoots: Object.freeze([...cfg.watchRoots]),
    extensions: Object.freeze([...cfg.extensions]),
    ignore: Object.freeze([...cfg.ignore])
  });
}

const csv = z
  .string()
  .transform((s) => s.split(',').map((p) => p.trim()).filter((p) => p.length > 0));

const EnvSchema = z.object({
  HOTLOOP_WATCH_ROOTS: csv.default('src'),
  HOTLOOP_DEBOUNCE_MS: z.coerce.number().int().nonnegative().optional(),
  HOTLOOP_WS_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  HOTLOOP_BIND: z.string().optional(),
  HOTLOOP_HEARTBEAT_INTERVAL_MS: z.coerce.number().int().positive().optional(),
  HOTLOOP_STATE_PRESERVATION: z.enum(['true', 'false', '1', '0']).optional(),
  HOTLOOP_EXTENSIONS: csv.optional(),
  HOTLOOP_DB_PATH: z.string().optional(),
  HOTLOOP_LOG_LEVEL: LogLevel.optional()
});

export function loadConfig(env: NodeJS.ProcessEnv): HotReloadConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration:\n${formatIssues(parsed.error)}`);
  }
  const e = parsed.data;
  return resolveConfig({
    watchRoots: e.HOTLOOP_WATCH_ROOTS,
    debounceMs: e.HOTLOOP_DEBOUNCE_MS,
    wsPort: e.HOTLOOP_WS_PORT,
    host: e.HOTLOOP_BIND,
    heartbeatIntervalMs: e.HOTLOOP_HEARTBEAT_INTERVAL_MS,
    statePreservation:
      e.HOTLOOP_STATE_PRESERVATION === undefined ? undefined : ['true', '1'].includes(e.HOTLOOP_STATE_PRESERVATION),
    extensions: e.HOTLOOP_EXTENSIONS,
    historyPath: e.HOTLOOP_DB_PATH,
    logLevel: e.HOTLOOP_LOG_LEVEL
  });
}
