import { hkdf } from './hkdf.js';

export const SAS_DIGITS = 6;
const SAS_INFO = Buffer.from('media-relay/sas/v1', 'utf8');

/**
 * Derives the short authentication string both operators compare.
 *
 * The agent's ephemeral key always comes first in the salt so that both
 * sides feed identical input.
 */
export function deriveShortAuthString(
  sharedSecret: Buffer,
  agentEphemeralKey: Buffer,
  clientEphemeralKey: Buffer,
  digits: number = SAS_DIGITS,
): string {
  const okm = hkdf({
    ikm: sharedSecret,
    salt: Buffer.concat([agentEphemeralKey, clientEphemeralKey]),
    info: SAS_INFO,
    length: 4,
  });
  const value = okm.readUInt32BE(0) % 10 ** digits;
  return value.toString().padStart(digits, '0');
}

/** Groups a code for display, e.g. `482 193` */
export function formatShortAuthString(sas: string): string {
  return sas.replace(/(\d{3})(?=\d)/g, '$1 ');
}
