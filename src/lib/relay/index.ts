export { ClientSession, type ClientSessionOptions } from './client-session.js';
export {
  PROTOCOL_VERSION,
  RELAY_DEFAULTS,
  authMessageSchema,
  clientMessageSchema,
  playerCommandSchema,
  playerEventSchema,
  playerSnapshotSchema,
  serverMessageSchema,
  type AuthMessage,
  type ClientMessage,
  type PlayerSelection,
  type RelayErrorCode,
  type ServerMessage,
} from './protocol.js';
export { RelayServer, type RelayServerOptions } from './relay-server.js';
