import { z } from 'zod';

import type { ClientMsg } from './types.js';

const Id = z.string().min(1).max(128);
const RoundNo = z.number().int().positive();

export const AuthSchema = z.object({
  t: z.literal('auth'),
  uid: Id
});

export const ChallengeSchema = z.object({
  t: z.literal('challenge'),
  opponent: Id,
  clientSeed: z.string().min(1).max(64).optional()
});

export const LockStyleSchema = z.object({
  t: z.literal('lock_style'),
  reqId: Id,
  matchId: Id,
  roundNo: RoundNo,
  style: z.string().min(1).max(64)
});

export const SwingSchema = z.object({
  t: z.literal('swing'),
  reqId: Id,
  matchId: Id,
  roundNo: RoundNo
});

export const StopSchema = z.object({
  t: z.literal('stop'),
  reqId: Id,
  matchId: Id,
  roundNo: RoundNo
});

export const StateSchema = z.object({
  t: z.literal('state'),
  reqId: Id,
  matchId: Id,
  roundNo: RoundNo
});

export const MatchesSchema = z.object({
  t: z.literal('matches'),
  reqId: Id
});

export const PingSchema = z.object({
  t: z.literal('ping')
});

export const ClientMsgSchema = z.discriminatedUnion('t', [
  AuthSchema,
  ChallengeSchema,
  LockStyleSchema,
  SwingSchema,
  StopSchema,
  StateSchema,
  MatchesSchema,
  PingSchema
]);

type AssertClientMsg = z.infer<typeof ClientMsgSchema> extends ClientMsg ? true : never;
type AssertClientMsgReverse = ClientMsg extends z.infer<typeof ClientMsgSchema> ? true : never;

const _assertClientMsg: AssertClientMsg = true;
const _assertClientMsgReverse: AssertClientMsgReverse = true;
void [_assertClientMsg, _assertClientMsgReverse];

export function parseClientMsg(raw: string): ClientMsg | undefined {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const parsed = ClientMsgSchema.safeParse(data);
  return parsed.success ? parsed.data : undefined;
}
