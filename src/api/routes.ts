import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { CycleRecord } from '../core/history.js';
import type { OverlayModel } from '../core/overlay.js';
import type { HotReloadEvent, RuntimeStatus } from '../core/types.js';

/** What the HTTP surface needs from the runtime. */
export interface RuntimeView {
  status(): RuntimeStatus;
  recentEvents(): HotReloadEvent[];
  overlayModel(): OverlayModel;
  recentCycles(limit: number): CycleRecord[];
  reload(): Promise<void>;
}

const HistoryQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50)
});

export async function registerRoutes(app: FastifyInstance, runtime: RuntimeView): Promise<void> {
  app.get('/api/status', async () => ({ ok: true, data: runtime.status() }));

  app.get('/api/events', async () => ({ ok: true, data: runtime.recentEvents() }));

  app.get('/api/overlay', async () => ({ ok: true, data: runtime.overlayModel() }));

  app.get('/api/history', async (req, reply) => {
    const parsed = HistoryQuery.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ ok: false, error: parsed.error.issues.map((i) => i.message).join('; ') });
    }
    return { ok: true, data: runtime.recentCycles(parsed.data.limit) };
  });

  app.post('/api/reload', async (req, reply) => {
    runtime.reload().catch((err: unknown) => req.log.error({ err }, 'Manual reload failed'));
    return reply.code(202).send({ ok: true, data: runtime.status() });
  });
}
