import {
  type KeyObject,
  createHash,
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  sign,
  verify,
} from 'node:crypto';

import { CryptographyError, errorMessage } from '../errors.js';

export const ED25519_PUBLIC_KEY_LENGTH = 32;
const ED25519_SPKI_PREFIX = Buffer.from([
  0x30, 0x2a, 0x30, 0x05, 0x06, 0x03, 0x2b, 0x65, 0x70, 0x03, 0x21, 0x00,
]);

/** Long-term key pair a remote party pairs with */
export interface IdentityKeyPair {
  publicKey: Buffer;
  privateKey: KeyObject;
}

export function generateIdentityKeyPair(): IdentityKeyPair {
  const { publicKey, privateKey } = generateKeyPairSync('ed25519');
  const publicKeyDer = publicKey.export({ type: 'spki', format: 'der' });
  return {
    publicKey: publicKeyDer.subarray(-ED25519_PUBLIC_KEY_LENGTH),
    privateKey,
  };
}

/** Imports an identity key pair exported with `exportIdentityPrivateKey` */
export function importIdentityKeyPair(privateKeyPem: string): IdentityKeyPair {
  try {
    const privateKey = createPrivateKey(privateKeyPem);
    const publicKeyDer = createPublicKey(privateKey).export({
      type: 'spki',
      format: 'der',
    });
    return {
      publicKey: publicKeyDer.subarray(-ED25519_PUBLIC_KEY_LENGTH),
      privateKey,
    };
  } catch (error) {
    throw new CryptographyError(
      `Failed to import identity key: ${errorMessage(error)}`,
    );
  }
}

export function exportIdentityPrivateKey(keyPair: IdentityKeyPair): string {
  return keyPair.privateKey.export({ type: 'pkcs8', format: 'pem' }).toString();
}

/** Identity is the lowercase hex SHA-256 of the raw Ed25519 public key */
export function identityFromPublicKey(publicKey: Buffer): string {
  if (publicKey.length !== ED25519_PUBLIC_KEY_LENGTH) {
    throw new CryptographyError(
      `Identity key must be ${ED25519_PUBLIC_KEY_LENGTH} bytes`,
    );
  }
  return createHash('sha256').update(publicKey).digest('hex');
}

export function createEd25519Signature(
  data: Buffer,
  privateKey: KeyObject,
): Buffer {
  try {
    return sign(null, data, privateKey);
  } catch (error) {
    throw new CryptographyError(
      `Failed to create Ed25519 signature: ${errorMessage(error)}`,
    );
  }
}

export function verifyEd25519Signature(
  data: Buffer,
  signature: Buffer,
  publicKey: Buffer,
): boolean {
  if (publicKey.length !== ED25519_PUBLIC_KEY_LENGTH) {
    return false;
  }
  try {
    const publicKeyObject = createPublicKey({
      key: Buffer.concat([ED25519_SPKI_PREFIX, publicKey]),
      format: 'der',
      type: 'spki',
    });
    return verify(null, data, publicKeyObject, signature);
  } catch {
    return false;
  }
}
