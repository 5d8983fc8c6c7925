#!/usr/bin/env node
import { loadConfig } from './core/config.js';
import { createLogger } from './core/logger.js';
import { openDb } from './infra/db.js';
import { ReloadHistory } from './core/history.js';
import { HotReloadRuntime } from './core/runtime.js';
import { ReportedStateProvider } from './core/state.js';
import { createSourceCompiler } from './infra/source-compiler.js';

async function main() {
  const cfg = loadConfig(process.env);
  const log = createLogger(cfg);

  const db = openDb(cfg.historyPath);
  const history = new ReloadHistory(db, log);

  // Clients own the live state; their latest report is what gets carried over.
  const reported = new ReportedStateProvider();

  const runtime = new HotReloadRuntime(cfg, {
    compile: createSourceCompiler(log),
    snapshots: reported,
    logger: log,
    history,
    onStateReport: (snapshot, clientId) => {
      reported.report(snapshot);
      log.debug({ clientId, nodes: snapshot.nodes.length }, 'State reported');
    }
  });

  const running = await runtime.start().catch((err: unknown) => {
    db.close();
    throw err;
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    log.info({ signal }, 'Shutting down...');
    await running.stop(`server shutting down (${signal})`);
    db.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      log.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  log.info({ port: running.port, roots: cfg.watchRoots }, 'hotloop ready');
}

main().catch((err) => {
  console.error('Failed to start hotloop:', err);
  process.exit(1);
});
