import type { PairingFailureReason } from '../errors.js';

export type PairingState =
  | 'INIT'
  | 'KEY_EXCHANGE'
  | 'AWAITING_CONFIRMATION'
  | 'ESTABLISHED'
  | 'ABORTED'
  | 'REJECTED'
  | 'TIMED_OUT';

export type TerminalFailureState = Extract<
  PairingState,
  'ABORTED' | 'REJECTED' | 'TIMED_OUT'
>;

/**
 * Operator answer for a pending pairing:
 * `mismatch` when the displayed codes differ, `block` for an unsolicited
 * request whose address should be refused from now on
 */
export type VerificationDecision = 'accept' | 'mismatch' | 'reject' | 'block';

export interface VerificationRequest {
  sessionId: string;
  remoteAddress: string;
  identity: string;
  name?: string;
  sas: string;
}

/** Asks the local operator whether the remote party shows the same code */
export interface PairingVerifier {
  verify(
    request: VerificationRequest,
    signal: AbortSignal,
  ): Promise<VerificationDecision>;
}

/** Fire-and-forget desktop notification */
export interface Notifier {
  notify(title: string, body: string): void;
}

export interface PairingFailure {
  sessionId: string;
  remoteAddress: string;
  state: TerminalFailureState;
  reason: PairingFailureReason;
  message: string;
}

export interface PairingServerOptions {
  host?: string;
  port?: number;
  confirmationTimeoutMs?: number;
  handshakeTimeoutMs?: number;
  maxPendingSessions?: number;
}
