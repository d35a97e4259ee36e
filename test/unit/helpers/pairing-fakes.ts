import type {
  CredentialStoreInterface,
  TrustMaterial,
  TrustRecord,
} from '../../../src/lib/credentials/index.js';
import { CredentialStoreError } from '../../../src/lib/errors.js';
import type {
  Notifier,
  PairingVerifier,
  VerificationDecision,
  VerificationRequest,
} from '../../../src/lib/pairing/index.js';

/** Credential store kept in memory */
export class MemoryCredentialStore implements CredentialStoreInterface {
  readonly records = new Map<string, TrustRecord>();
  failWrites = false;

  async open(): Promise<void> {}

  async put(identity: string, material: TrustMaterial): Promise<TrustRecord> {
    if (this.failWrites) {
      throw new CredentialStoreError('Disk full');
    }
    const record: TrustRecord = {
      identity,
      publicKey: Buffer.from(material.publicKey),
      token: Buffer.from(material.token),
      name: material.name,
      createdAt: new Date().toISOString(),
    };
    this.records.set(identity, record);
    return record;
  }

  get(identity: string): TrustRecord | null {
    return this.records.get(identity) ?? null;
  }

  list(): TrustRecord[] {
    return [...this.records.values()];
  }

  async revoke(identity: string): Promise<boolean> {
    return this.records.delete(identity);
  }

  async clear(): Promise<number> {
    const count = this.records.size;
    this.records.clear();
    return count;
  }

  async close(): Promise<void> {}
}

/**
 * Answers every request with a fixed decision, or never when the decision
 * is `null`, in which case only the abort signal ends the wait.
 */
export class ScriptedVerifier implements PairingVerifier {
  readonly requests: VerificationRequest[] = [];
  aborted = 0;

  constructor(public decision: VerificationDecision | null) {}

  verify(
    request: VerificationRequest,
    signal: AbortSignal,
  ): Promise<VerificationDecision> {
    this.requests.push(request);
    const decision = this.decision;
    if (decision) {
      return Promise.resolve(decision);
    }
    return new Promise((_, reject) => {
      signal.addEventListener(
        'abort',
        () => {
          this.aborted++;
          reject(new Error('withdrawn'));
        },
        { once: true },
      );
    });
  }
}

export class RecordingNotifier implements Notifier {
  readonly notifications: Array<{ title: string; body: string }> = [];

  notify(title: string, body: string): void {
    this.notifications.push({ title, body });
  }
}
