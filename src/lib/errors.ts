// Base error class for all agent errors
export class MediaRelayError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MediaRelayError';
  }
}

// Invalid or inconsistent configuration values
export class ConfigurationError extends MediaRelayError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// Reading, writing or parsing the trust record document failed
export class CredentialStoreError extends MediaRelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CredentialStoreError';
  }
}

export type PairingFailureReason =
  | 'mismatch'
  | 'rejected'
  | 'timeout'
  | 'aborted'
  | 'blocked'
  | 'busy'
  | 'protocol';

// A pairing attempt ended without a trust record
export class PairingError extends MediaRelayError {
  constructor(
    message: string,
    public readonly reason: PairingFailureReason,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'PairingError';
  }
}

// A relay connection presented an unknown identity or a bad proof
export class AuthenticationError extends MediaRelayError {
  constructor(message: string) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

// Represents an error related to network communication
export class NetworkError extends MediaRelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

// The peer sent a frame or message that does not follow the protocol
export class ProtocolError extends MediaRelayError {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

// Represents an error occurring during cryptographic operations
export class CryptographyError extends MediaRelayError {
  constructor(message: string) {
    super(message);
    this.name = 'CryptographyError';
  }
}

export type CommandRejectionReason =
  | 'not-found'
  | 'unsupported'
  | 'player-busy'
  | 'failed';

// A command could not be applied to its target player
export class CommandRejectedError extends MediaRelayError {
  constructor(
    message: string,
    public readonly reason: CommandRejectionReason,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'CommandRejectedError';
  }
}

// Reading a player's properties over the bus failed
export class PlayerProbeError extends MediaRelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PlayerProbeError';
  }
}

// A player left a bus call unanswered
export class PlayerTimeoutError extends MediaRelayError {
  constructor(message: string) {
    super(message);
    this.name = 'PlayerTimeoutError';
  }
}

// The session bus could not be reached
export class BusUnavailableError extends MediaRelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BusUnavailableError';
  }
}

// A relay client stopped draining its outbound stream
export class SlowConsumerError extends MediaRelayError {
  constructor(message: string) {
    super(message);
    this.name = 'SlowConsumerError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
