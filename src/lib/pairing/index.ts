export {
  CONFIRMATION_NONCE_LENGTH,
  PAIRING_DEFAULTS,
  PAIRING_PROTOCOL_VERSION,
} from './constants.js';
export {
  agentHelloSchema,
  clientHelloSchema,
  confirmSchema,
  resultSchema,
  type AgentHello,
  type ClientHello,
  type ConfirmMessage,
  type ResultMessage,
} from './messages.js';
export { PairingServer } from './pairing-server.js';
export { PairingSession, type ExchangedKeys } from './pairing-session.js';
export type {
  Notifier,
  PairingFailure,
  PairingServerOptions,
  PairingState,
  PairingVerifier,
  TerminalFailureState,
  VerificationDecision,
  VerificationRequest,
} from './types.js';
