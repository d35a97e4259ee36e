import { z } from 'zod';

const base64 = z.string().min(1);

export const clientHelloSchema = z.object({
  type: z.literal('hello'),
  version: z.number().int(),
  ephemeralKey: base64,
  identityKey: base64,
  name: z.string().max(128).optional(),
});

export const agentHelloSchema = z.object({
  type: z.literal('hello'),
  version: z.number().int(),
  sessionId: z.string(),
  ephemeralKey: base64,
});

export const confirmSchema = z.object({
  type: z.literal('confirm'),
  sessionId: z.string(),
  accepted: z.boolean(),
  nonce: base64.optional(),
  payload: base64.optional(),
});

export const pairingFailureReasonSchema = z.enum([
  'mismatch',
  'rejected',
  'timeout',
  'aborted',
  'blocked',
  'busy',
  'protocol',
]);

export const resultSchema = z.object({
  type: z.literal('result'),
  sessionId: z.string(),
  status: z.enum(['paired', 'failed']),
  identity: z.string().optional(),
  reason: pairingFailureReasonSchema.optional(),
  message: z.string().optional(),
});

export type ClientHello = z.infer<typeof clientHelloSchema>;
export type AgentHello = z.infer<typeof agentHelloSchema>;
export type ConfirmMessage = z.infer<typeof confirmSchema>;
export type ResultMessage = z.infer<typeof resultSchema>;
