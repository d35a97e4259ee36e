import { randomUUID } from 'node:crypto';

import {
  ED25519_PUBLIC_KEY_LENGTH,
  EPHEMERAL_KEY_LENGTH,
  type EphemeralKeyPair,
  decryptChaCha20Poly1305,
  deriveConfirmationKey,
  deriveSharedSecret,
  deriveShortAuthString,
  deriveTrustToken,
  generateEphemeralKeyPair,
  identityFromPublicKey,
  pairingSignaturePayload,
  verifyEd25519Signature,
} from '../crypto/index.js';
import {
  CryptographyError,
  PairingError,
  type PairingFailureReason,
} from '../errors.js';
import { CONFIRMATION_NONCE_LENGTH } from './constants.js';
import type { ClientHello, ConfirmMessage } from './messages.js';
import type { PairingState, TerminalFailureState } from './types.js';

const TRANSITIONS: Record<PairingState, readonly PairingState[]> = {
  INIT: ['KEY_EXCHANGE', 'ABORTED'],
  KEY_EXCHANGE: ['AWAITING_CONFIRMATION', 'ABORTED'],
  AWAITING_CONFIRMATION: ['ESTABLISHED', 'ABORTED', 'REJECTED', 'TIMED_OUT'],
  ESTABLISHED: [],
  ABORTED: [],
  REJECTED: [],
  TIMED_OUT: [],
};

export interface ExchangedKeys {
  identity: string;
  sas: string;
}

/** State of one pairing handshake, from the opening hello to a terminal state */
export class PairingSession {
  readonly id = randomUUID();
  private _state: PairingState = 'INIT';
  private readonly localKeys: EphemeralKeyPair = generateEphemeralKeyPair();
  private remoteEphemeralKey: Buffer | null = null;
  private identityKey: Buffer | null = null;
  private sharedSecret: Buffer | null = null;
  private _identity: string | null = null;
  private _sas: string | null = null;
  private _name: string | undefined;
  private _failureReason: PairingFailureReason | null = null;

  constructor(readonly remoteAddress: string) {}

  get state(): PairingState {
    return this._state;
  }

  get identity(): string | null {
    return this._identity;
  }

  get name(): string | undefined {
    return this._name;
  }

  get sas(): string | null {
    return this._sas;
  }

  get failureReason(): PairingFailureReason | null {
    return this._failureReason;
  }

  get localEphemeralKey(): Buffer {
    return this.localKeys.publicKey;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this._state].length === 0;
  }

  /**
   * Derives the shared secret and the short authentication string
   * @throws PairingError with reason `protocol` on malformed keys
   */
  exchangeKeys(hello: ClientHello): ExchangedKeys {
    this.transition('KEY_EXCHANGE');

    const remoteEphemeralKey = Buffer.from(hello.ephemeralKey, 'base64');
    const identityKey = Buffer.from(hello.identityKey, 'base64');
    if (remoteEphemeralKey.length !== EPHEMERAL_KEY_LENGTH) {
      throw new PairingError('Invalid ephemeral key length', 'protocol');
    }
    if (identityKey.length !== ED25519_PUBLIC_KEY_LENGTH) {
      throw new PairingError('Invalid identity key length', 'protocol');
    }

    let sharedSecret: Buffer;
    try {
      sharedSecret = deriveSharedSecret(
        this.localKeys.privateKey,
        remoteEphemeralKey,
      );
    } catch (error) {
      throw new PairingError('Key agreement failed', 'protocol', {
        cause: error,
      });
    }

    this.remoteEphemeralKey = remoteEphemeralKey;
    this.identityKey = identityKey;
    this.sharedSecret = sharedSecret;
    this._identity = identityFromPublicKey(identityKey);
    this._name = hello.name;
    this._sas = deriveShortAuthString(
      sharedSecret,
      this.localKeys.publicKey,
      remoteEphemeralKey,
    );
    return { identity: this._identity, sas: this._sas };
  }

  awaitConfirmation(): void {
    this.transition('AWAITING_CONFIRMATION');
  }

  /**
   * Checks the remote confirmation. Returns false when the remote
   * operator reported that the codes differ.
   * @throws PairingError with reason `protocol` when the message does not
   * belong to this session or its signature does not verify
   */
  checkConfirmation(confirm: ConfirmMessage): boolean {
    if (confirm.sessionId !== this.id) {
      throw new PairingError(
        `Confirmation names unknown session ${confirm.sessionId}`,
        'protocol',
      );
    }
    if (!confirm.accepted) {
      return false;
    }

    const { sharedSecret, remoteEphemeralKey, identityKey } = this.material();
    if (!confirm.nonce || !confirm.payload) {
      throw new PairingError('Confirmation is missing its payload', 'protocol');
    }
    const nonce = Buffer.from(confirm.nonce, 'base64');
    if (nonce.length !== CONFIRMATION_NONCE_LENGTH) {
      throw new PairingError('Invalid confirmation nonce', 'protocol');
    }

    let signature: Buffer;
    try {
      signature = decryptChaCha20Poly1305(
        Buffer.from(confirm.payload, 'base64'),
        {
          key: deriveConfirmationKey(sharedSecret, this.id),
          nonce,
          aad: Buffer.from(this.id, 'utf8'),
        },
      );
    } catch (error) {
      if (error instanceof CryptographyError) {
        throw new PairingError('Confirmation could not be decrypted', 'protocol', {
          cause: error,
        });
      }
      throw error;
    }

    const signed = pairingSignaturePayload(
      this.localKeys.publicKey,
      remoteEphemeralKey,
      identityKey,
    );
    if (!verifyEd25519Signature(signed, signature, identityKey)) {
      throw new PairingError('Identity signature does not verify', 'protocol');
    }
    return true;
  }

  /** Material for the trust record; the session stays open until establish() */
  trustMaterial(): { identity: string; publicKey: Buffer; token: Buffer } {
    const { sharedSecret, identityKey } = this.material();
    const identity = identityFromPublicKey(identityKey);
    return {
      identity,
      publicKey: Buffer.from(identityKey),
      token: deriveTrustToken(sharedSecret, identity),
    };
  }

  establish(): void {
    this.transition('ESTABLISHED');
  }

  fail(state: TerminalFailureState, reason: PairingFailureReason): void {
    if (this.isTerminal) {
      return;
    }
    this.transition(state);
    this._failureReason = reason;
  }

  /** Zeroes secret material; the session is unusable afterwards */
  destroy(): void {
    this.sharedSecret?.fill(0);
    this.sharedSecret = null;
    this.remoteEphemeralKey = null;
    this.identityKey = null;
  }

  private material(): {
    sharedSecret: Buffer;
    remoteEphemeralKey: Buffer;
    identityKey: Buffer;
  } {
    const { sharedSecret, remoteEphemeralKey, identityKey } = this;
    if (!sharedSecret || !remoteEphemeralKey || !identityKey) {
      throw new PairingError('Key exchange has not completed', 'protocol');
    }
    return { sharedSecret, remoteEphemeralKey, identityKey };
  }

  private transition(next: PairingState): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new PairingError(
        `Invalid pairing transition ${this._state} -> ${next}`,
        'protocol',
      );
    }
    this._state = next;
  }
}
