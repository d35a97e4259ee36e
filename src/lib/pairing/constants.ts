export const PAIRING_PROTOCOL_VERSION = 1;

export const PAIRING_DEFAULTS = {
  /** Bound on the operator decision and the remote confirmation together */
  CONFIRMATION_TIMEOUT_MS: 60000,
  /** Time allowed for the client's opening hello */
  HANDSHAKE_TIMEOUT_MS: 10000,
  MAX_PENDING_SESSIONS: 4,
} as const;

export const CONFIRMATION_NONCE_LENGTH = 12;
