import { z } from 'zod';
import type { Diagnostic, JsonValue, ProgramIr, StateDiff, StateSnapshot } from './types.js';

export const CLOSE_GOING_AWAY = 1001;
export const CLOSE_VERSION_MISMATCH = 4001;
export const CLOSE_PROTOCOL_ERROR = 4002;
export const CLOSE_HEARTBEAT_TIMEOUT = 4003;

export type ServerMessage =
  | { type: 'welcome'; protocolVersion: number; clientId: string }
  | { type: 'reload'; revision: number; program: ProgramIr; stateDiff: StateDiff | null }
  | { type: 'compileError'; diagnostics: Diagnostic[] }
  | { type: 'ping'; seq: number };

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

const SnapshotSchema = z.object({
  id: z.string().min(1),
  capturedAt: z.number(),
  nodes: z.array(
    z.object({
      id: z.string().min(1),
      type: z.string().min(1),
      value: JsonValueSchema,
      version: z.number().int().nonnegative()
    })
  )
});

export const HelloSchema = z.object({ type: z.literal('hello'), protocolVersion: z.number().int() });

export const ClientMessageSchema = z.discriminatedUnion('type', [
  HelloSchema,
  z.object({ type: z.literal('ready') }),
  z.object({
    type: z.literal('ack'),
    applied: z.boolean(),
    revision: z.number().int().optional(),
    error: z.string().max(4000).optional()
  }),
  z.object({ type: z.literal('pong'), seq: z.number().int() }),
  z.object({ type: z.literal('stateReport'), snapshot: SnapshotSchema })
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export type DecodeResult = { ok: true; message: ClientMessage } | { ok: false; error: string };

export function decodeClientMessage(raw: string): DecodeResult {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, error: 'invalid JSON' };
  }
  const parsed = ClientMessageSchema.safeParse(data);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => `${i.path.join('.') || 'message'}: ${i.message}`).join('; ') };
  }
  return { ok: true, message: parsed.data };
}

export function encodeServerMessage(message: ServerMessage): string {
  return JSON.stringify(message);
}

export function toSnapshot(report: z.infer<typeof SnapshotSchema>): StateSnapshot {
  return Object.freeze({ ...report, nodes: Object.freeze(report.nodes.map((n) => Object.freeze({ ...n }))) });
}
