export {
  CredentialStore,
  defaultCredentialsDirectory,
} from './credential-store.js';
export type {
  CredentialStoreInterface,
  CredentialStoreOptions,
  TrustMaterial,
  TrustRecord,
} from './types.js';
