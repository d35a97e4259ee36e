import { hkdfSync } from 'node:crypto';

export interface HkdfParams {
  ikm: Buffer;
  salt: Buffer;
  info: Buffer;
  length: number;
}

/** HKDF-SHA256 */
export function hkdf({ ikm, salt, info, length }: HkdfParams): Buffer {
  return Buffer.from(hkdfSync('sha256', ikm, salt, info, length));
}
