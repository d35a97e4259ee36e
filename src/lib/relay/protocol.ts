import { z } from 'zod';

export const PROTOCOL_VERSION = 1;

export const RELAY_DEFAULTS = {
  HANDSHAKE_TIMEOUT_MS: 10000,
  /** Outbound bytes a client may leave undrained before it is dropped */
  MAX_PENDING_BYTES: 1024 * 1024,
  NONCE_LENGTH: 32,
} as const;

const playerSelectionSchema = z.union([
  z.literal('*'),
  z.array(z.string().min(1)).max(256),
]);

export const playerCommandSchema = z.union([
  z.object({ action: z.enum(['play', 'pause', 'stop', 'next', 'previous']) }),
  z.object({ action: z.literal('seek'), position: z.number().finite() }),
  z.object({ action: z.literal('set-rate'), rate: z.number().finite() }),
]);

export const authMessageSchema = z.object({
  type: z.literal('auth'),
  version: z.number().int(),
  identity: z.string().regex(/^[0-9a-f]{64}$/),
  proof: z.string().min(1),
});

export const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('subscribe'),
    requestId: z.string().optional(),
    players: playerSelectionSchema,
  }),
  z.object({
    type: z.literal('unsubscribe'),
    requestId: z.string().optional(),
    players: playerSelectionSchema,
  }),
  z.object({
    type: z.literal('command'),
    requestId: z.string(),
    playerId: z.string().min(1),
    command: playerCommandSchema,
  }),
  z.object({
    type: z.literal('ping'),
    requestId: z.string().optional(),
  }),
]);

const capabilitySchema = z.enum([
  'play',
  'pause',
  'stop',
  'next',
  'previous',
  'seek',
  'set-rate',
]);

export const playerSnapshotSchema = z.object({
  id: z.string(),
  name: z.string(),
  playbackState: z.enum(['playing', 'paused', 'stopped']),
  metadata: z.object({
    title: z.string().optional(),
    artist: z.string().optional(),
    album: z.string().optional(),
    length: z.number().optional(),
    trackId: z.string().optional(),
    artUrl: z.string().optional(),
  }),
  position: z.number(),
  rate: z.number(),
  capabilities: z.array(capabilitySchema),
  status: z.enum(['ok', 'degraded']),
  facade: z.enum(['mpris', 'chromium', 'vlc']),
});

export const playerEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('player-appeared'), player: playerSnapshotSchema }),
  z.object({ type: z.literal('player-disappeared'), playerId: z.string() }),
  z.object({ type: z.literal('state-changed'), player: playerSnapshotSchema }),
]);

export const errorCodeSchema = z.enum([
  'authentication-failed',
  'protocol-violation',
  'slow-consumer',
  'shutting-down',
]);

export const serverMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('challenge'),
    version: z.number().int(),
    nonce: z.string(),
  }),
  z.object({ type: z.literal('authenticated'), identity: z.string() }),
  z.object({
    type: z.literal('snapshot'),
    requestId: z.string().optional(),
    players: z.array(playerSnapshotSchema),
  }),
  z.object({
    type: z.literal('unsubscribed'),
    requestId: z.string().optional(),
    players: z.array(z.string()),
  }),
  z.object({ type: z.literal('event'), event: playerEventSchema }),
  z.object({
    type: z.literal('command-result'),
    requestId: z.string(),
    playerId: z.string(),
  }),
  z.object({
    type: z.literal('command-rejected'),
    requestId: z.string(),
    playerId: z.string(),
    reason: z.enum(['not-found', 'unsupported', 'player-busy', 'failed']),
    message: z.string(),
  }),
  z.object({ type: z.literal('pong'), requestId: z.string().optional() }),
  z.object({
    type: z.literal('error'),
    code: errorCodeSchema,
    message: z.string(),
  }),
]);

export type PlayerSelection = z.infer<typeof playerSelectionSchema>;
export type AuthMessage = z.infer<typeof authMessageSchema>;
export type ClientMessage = z.infer<typeof clientMessageSchema>;
export type ServerMessage = z.infer<typeof serverMessageSchema>;
export type RelayErrorCode = z.infer<typeof errorCodeSchema>;
