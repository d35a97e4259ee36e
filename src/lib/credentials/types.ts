/** Durable proof that a remote identity completed pairing */
export interface TrustRecord {
  /** Lowercase hex SHA-256 of the remote Ed25519 public key */
  identity: string;
  /** Raw 32-byte Ed25519 public key */
  publicKey: Buffer;
  /** Shared token the remote party proves knowledge of when connecting to the relay */
  token: Buffer;
  /** Name the remote party announced while pairing */
  name?: string;
  /** ISO 8601 timestamp */
  createdAt: string;
}

export interface TrustMaterial {
  publicKey: Buffer;
  token: Buffer;
  name?: string;
}

export interface CredentialStoreInterface {
  open(): Promise<void>;
  put(identity: string, material: TrustMaterial): Promise<TrustRecord>;
  get(identity: string): TrustRecord | null;
  list(): TrustRecord[];
  revoke(identity: string): Promise<boolean>;
  clear(): Promise<number>;
  close(): Promise<void>;
}

export interface CredentialStoreOptions {
  /** Directory holding the records document; the strongbox container when unset */
  directory?: string;
}
