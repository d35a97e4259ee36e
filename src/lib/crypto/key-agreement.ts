import {
  type KeyObject,
  createPublicKey,
  diffieHellman,
  generateKeyPairSync,
} from 'node:crypto';

import { CryptographyError, errorMessage } from '../errors.js';

export const EPHEMERAL_KEY_LENGTH = 32;

// DER header of an X25519 SubjectPublicKeyInfo; the raw key follows it
const SPKI_HEADER = Buffer.from('302a300506032b656e032100', 'hex');

/** One-time key pair of a pairing attempt; the public half travels raw */
export interface EphemeralKeyPair {
  publicKey: Buffer;
  privateKey: KeyObject;
}

export function generateEphemeralKeyPair(): EphemeralKeyPair {
  const { publicKey, privateKey } = generateKeyPairSync('x25519');
  return {
    publicKey: publicKey
      .export({ type: 'spki', format: 'der' })
      .subarray(SPKI_HEADER.length),
    privateKey,
  };
}

/**
 * X25519 agreement with the peer's raw public key
 * @throws CryptographyError on a key of the wrong size or a degenerate result
 */
export function deriveSharedSecret(
  privateKey: KeyObject,
  peerPublicKey: Buffer,
): Buffer {
  if (peerPublicKey.length !== EPHEMERAL_KEY_LENGTH) {
    throw new CryptographyError(
      `Peer public key must be ${EPHEMERAL_KEY_LENGTH} bytes`,
    );
  }
  try {
    return diffieHellman({
      privateKey,
      publicKey: createPublicKey({
        key: Buffer.concat([SPKI_HEADER, peerPublicKey]),
        format: 'der',
        type: 'spki',
      }),
    });
  } catch (error) {
    throw new CryptographyError(`Key agreement failed: ${errorMessage(error)}`);
  }
}
