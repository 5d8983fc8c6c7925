import pino from 'pino';
import type { HotReloadConfig } from './config.js';

export function createLogger(cfg: Pick<HotReloadConfig, 'logLevel'>) {
  return pino({
    level: cfg.logLevel,
    base: { svc: 'hotloop' },
    redact: {
      paths: ['req.headers.authorization', 'req.headers.cookie'],
      remove: true
    }
  });
}
