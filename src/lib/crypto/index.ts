export {
  decryptChaCha20Poly1305,
  encryptChaCha20Poly1305,
  type ChaCha20Poly1305Params,
} from './chacha20-poly1305.js';
export {
  ED25519_PUBLIC_KEY_LENGTH,
  createEd25519Signature,
  exportIdentityPrivateKey,
  generateIdentityKeyPair,
  identityFromPublicKey,
  importIdentityKeyPair,
  verifyEd25519Signature,
  type IdentityKeyPair,
} from './ed25519.js';
export { hkdf, type HkdfParams } from './hkdf.js';
export {
  EPHEMERAL_KEY_LENGTH,
  deriveSharedSecret,
  generateEphemeralKeyPair,
  type EphemeralKeyPair,
} from './key-agreement.js';
export {
  SAS_DIGITS,
  deriveShortAuthString,
  formatShortAuthString,
} from './sas.js';
export {
  TRUST_TOKEN_LENGTH,
  computeRelayProof,
  deriveConfirmationKey,
  deriveTrustToken,
  pairingSignaturePayload,
  verifyRelayProof,
} from './trust-token.js';
