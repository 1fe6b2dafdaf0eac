import { z } from 'zod';

export const MESSAGE_TYPES = [
  'auth',
  'auth_success',
  'auth_failed',
  'chat',
  'join',
  'leave',
  'members',
  'srt_port',
  'error',
  'heartbeat',
] as const;

export const envelopeSchema = z
  .object({
    type: z.string(),
  })
  .passthrough();

export const memberRoleSchema = z.enum(['sender', 'receiver']);

export const memberSchema = z.object({
  nickname: z.string(),
  role: memberRoleSchema,
});

const authSchema = z.object({
  type: z.literal('auth'),
  code: z.string().trim().min(1).max(32),
  nickname: z.string().trim().min(1).max(32),
});

const heartbeatSchema = z.object({
  type: z.literal('heartbeat'),
});

/** Messages a viewer may send to the coordinator. */
export const clientMessageSchema = z.discriminatedUnion('type', [
  authSchema,
  z.object({
    type: z.literal('chat'),
    message: z.string().min(1).max(1000),
    nickname: z.string().optional(),
  }),
  heartbeatSchema,
]);

/** Messages the coordinator sends to viewers. */
export const serverMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('auth_success'),
    nickname: z.string(),
    srt_port: z.number().int().min(1).max(65535),
    server_ip: z.string(),
  }),
  z.object({
    type: z.literal('auth_failed'),
    message: z.string(),
  }),
  z.object({
    type: z.literal('chat'),
    nickname: z.string(),
    message: z.string(),
    timestamp: z.string(),
  }),
  z.object({
    type: z.literal('join'),
    nickname: z.string(),
    message: z.string(),
  }),
  z.object({
    type: z.literal('leave'),
    nickname: z.string(),
    message: z.string(),
  }),
  z.object({
    type: z.literal('members'),
    members: z.array(memberSchema),
  }),
  z.object({
    type: z.literal('srt_port'),
    srt_port: z.number().int().min(1).max(65535),
  }),
  z.object({
    type: z.literal('error'),
    message: z.string(),
  }),
  heartbeatSchema,
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;
export type ServerMessage = z.infer<typeof serverMessageSchema>;
export type Member = z.infer<typeof memberSchema>;
export type MemberRole = z.infer<typeof memberRoleSchema>;

export type ParseResult<T> =
  | { ok: true; message: T }
  | { ok: false; reason: 'invalid_json' | 'unknown_type' | 'invalid_payload'; type?: string };

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string): ParseResult<T> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, reason: 'invalid_json' };
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) {
    return { ok: false, reason: 'invalid_payload' };
  }
  const { type } = envelope.data;
  if (!MESSAGE_TYPES.some((known) => known === type)) {
    return { ok: false, reason: 'unknown_type', type };
  }

  const data = schema.safeParse(json);
  if (!data.success) {
    return { ok: false, reason: 'invalid_payload', type };
  }
  return { ok: true, message: data.data };
}

export function parseClientMessage(raw: string): ParseResult<ClientMessage> {
  return parseWith(clientMessageSchema, raw);
}

export function parseServerMessage(raw: string): ParseResult<ServerMessage> {
  return parseWith(serverMessageSchema, raw);
}
