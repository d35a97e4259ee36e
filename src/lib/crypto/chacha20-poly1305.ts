import {
  type CipherGCM,
  type DecipherGCM,
  createCipheriv,
  createDecipheriv,
} from 'node:crypto';

import { CryptographyError, errorMessage } from '../errors.js';

const KEY_LENGTH = 32;
const NONCE_LENGTH = 12;
const TAG_LENGTH = 16;

export interface ChaCha20Poly1305Params {
  key: Buffer;
  nonce: Buffer;
  aad?: Buffer;
}

function validateParams({ key, nonce }: ChaCha20Poly1305Params): void {
  if (key.length !== KEY_LENGTH) {
    throw new CryptographyError(`Key must be ${KEY_LENGTH} bytes`);
  }
  if (nonce.length !== NONCE_LENGTH) {
    throw new CryptographyError(`Nonce must be ${NONCE_LENGTH} bytes`);
  }
}

/**
 * Encrypts data using ChaCha20-Poly1305 AEAD cipher
 * @returns encrypted data concatenated with the 16-byte authentication tag
 */
export function encryptChaCha20Poly1305(
  plaintext: Buffer,
  params: ChaCha20Poly1305Params,
): Buffer {
  validateParams(params);
  const { key, nonce, aad } = params;

  try {
    // AEAD methods are typed on the GCM cipher interface only
    const cipher = createCipheriv('chacha20-poly1305', key, nonce, {
      authTagLength: TAG_LENGTH,
    }) as CipherGCM;
    if (aad) {
      cipher.setAAD(aad, { plaintextLength: plaintext.length });
    }

    const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return Buffer.concat([encrypted, cipher.getAuthTag()]);
  } catch (error) {
    throw new CryptographyError(
      `ChaCha20-Poly1305 encryption failed: ${errorMessage(error)}`,
    );
  }
}

/**
 * Decrypts data produced by `encryptChaCha20Poly1305`
 * @throws CryptographyError when the tag does not authenticate
 */
export function decryptChaCha20Poly1305(
  ciphertext: Buffer,
  params: ChaCha20Poly1305Params,
): Buffer {
  validateParams(params);
  const { key, nonce, aad } = params;

  if (ciphertext.length < TAG_LENGTH) {
    throw new CryptographyError(
      'Ciphertext too short to contain authentication tag',
    );
  }

  const encrypted = ciphertext.subarray(0, ciphertext.length - TAG_LENGTH);
  const authTag = ciphertext.subarray(ciphertext.length - TAG_LENGTH);

  try {
    const decipher = createDecipheriv('chacha20-poly1305', key, nonce, {
      authTagLength: TAG_LENGTH,
    }) as DecipherGCM;
    decipher.setAuthTag(authTag);
    if (aad) {
      decipher.setAAD(aad, { plaintextLength: encrypted.length });
    }

    return Buffer.concat([decipher.update(encrypted), decipher.final()]);
  } catch {
    throw new CryptographyError(
      'ChaCha20-Poly1305 decryption failed: invalid ciphertext or authentication tag',
    );
  }
}
