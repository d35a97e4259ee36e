import { createHmac, timingSafeEqual } from 'node:crypto';

import { hkdf } from './hkdf.js';

export const TRUST_TOKEN_LENGTH = 32;
const TRUST_TOKEN_INFO = Buffer.from('media-relay/trust-token/v1', 'utf8');
const CONFIRM_KEY_INFO = Buffer.from('media-relay/pair-confirm/v1', 'utf8');
const RELAY_AUTH_CONTEXT = Buffer.from('media-relay/relay-auth/v1', 'utf8');
const PAIRING_SIGNATURE_CONTEXT = Buffer.from(
  'media-relay/pair-signature/v1',
  'utf8',
);

/** Token both ends derive after a confirmed pairing; it never crosses the wire */
export function deriveTrustToken(sharedSecret: Buffer, identity: string): Buffer {
  return hkdf({
    ikm: sharedSecret,
    salt: Buffer.from(identity, 'utf8'),
    info: TRUST_TOKEN_INFO,
    length: TRUST_TOKEN_LENGTH,
  });
}

/** Key for the client's encrypted confirmation message */
export function deriveConfirmationKey(
  sharedSecret: Buffer,
  sessionId: string,
): Buffer {
  return hkdf({
    ikm: sharedSecret,
    salt: Buffer.from(sessionId, 'utf8'),
    info: CONFIRM_KEY_INFO,
    length: 32,
  });
}

/** Bytes the client signs with its identity key to bind it to the exchange */
export function pairingSignaturePayload(
  agentEphemeralKey: Buffer,
  clientEphemeralKey: Buffer,
  identityKey: Buffer,
): Buffer {
  return Buffer.concat([
    PAIRING_SIGNATURE_CONTEXT,
    agentEphemeralKey,
    clientEphemeralKey,
    identityKey,
  ]);
}

export function computeRelayProof(
  token: Buffer,
  nonce: Buffer,
  identity: string,
): Buffer {
  return createHmac('sha256', token)
    .update(RELAY_AUTH_CONTEXT)
    .update(nonce)
    .update(Buffer.from(identity, 'utf8'))
    .digest();
}

export function verifyRelayProof(
  token: Buffer,
  nonce: Buffer,
  identity: string,
  proof: Buffer,
): boolean {
  const expected = computeRelayProof(token, nonce, identity);
  return proof.length === expected.length && timingSafeEqual(proof, expected);
}
