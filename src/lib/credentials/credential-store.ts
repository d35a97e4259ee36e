import { strongbox } from '@appium/strongbox';
import { randomBytes } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

import { STRONGBOX_CONTAINER_NAME, TRUST_RECORDS_FILE } from '../../constants.js';
import {
  CredentialStoreError,
  errorMessage,
  isErrnoException,
} from '../errors.js';
import { getLogger } from '../logger.js';
import type {
  CredentialStoreInterface,
  CredentialStoreOptions,
  TrustMaterial,
  TrustRecord,
} from './types.js';

const DOCUMENT_VERSION = 1;
const FILE_MODE = 0o600;
const DIRECTORY_MODE = 0o700;

const storedRecordSchema = z.object({
  publicKey: z.string().min(1),
  token: z.string().min(1),
  name: z.string().optional(),
  createdAt: z.string(),
});

const documentSchema = z.object({
  version: z.literal(DOCUMENT_VERSION),
  records: z.record(storedRecordSchema),
});

type StoredRecord = z.infer<typeof storedRecordSchema>;

/** Default location of the records document */
export function defaultCredentialsDirectory(): string {
  return strongbox(STRONGBOX_CONTAINER_NAME).container;
}

/**
 * Identity to TrustRecord map persisted as a single JSON document.
 *
 * Mutations are applied one at a time; each replaces the document with a
 * temp-file-and-rename and only then becomes visible to readers.
 */
export class CredentialStore implements CredentialStoreInterface {
  private readonly log = getLogger('CredentialStore');
  private readonly directory: string;
  private records: ReadonlyMap<string, TrustRecord> | null = null;
  private writeChain: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(options: CredentialStoreOptions = {}) {
    this.directory = options.directory ?? defaultCredentialsDirectory();
  }

  get filePath(): string {
    return join(this.directory, TRUST_RECORDS_FILE);
  }

  /**
   * Loads the committed document. A missing file is an empty store.
   * @throws CredentialStoreError when the document cannot be read or parsed
   */
  async open(): Promise<void> {
    this.ensureNotClosed();
    if (this.records) {
      return;
    }

    let content: string;
    try {
      content = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.log.debug(`No trust records at ${this.filePath} yet`);
        this.records = new Map();
        return;
      }
      throw new CredentialStoreError(
        `Failed to read ${this.filePath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    this.records = parseDocument(content, this.filePath);
    this.log.debug(
      `Loaded ${this.records.size} trust record(s) from ${this.filePath}`,
    );
  }

  async put(identity: string, material: TrustMaterial): Promise<TrustRecord> {
    const record: TrustRecord = {
      identity,
      publicKey: Buffer.from(material.publicKey),
      token: Buffer.from(material.token),
      name: material.name,
      createdAt: new Date().toISOString(),
    };

    await this.mutate((records) => {
      if (records.has(identity)) {
        this.log.info(`Replacing trust record for ${identity}`);
      }
      records.set(identity, record);
    });
    return record;
  }

  get(identity: string): TrustRecord | null {
    return this.committed().get(identity) ?? null;
  }

  list(): TrustRecord[] {
    return [...this.committed().values()].sort((a, b) =>
      a.createdAt.localeCompare(b.createdAt),
    );
  }

  async revoke(identity: string): Promise<boolean> {
    let removed = false;
    await this.mutate((records) => {
      removed = records.delete(identity);
    });
    if (removed) {
      this.log.info(`Revoked trust record for ${identity}`);
    }
    return removed;
  }

  /** Removes every trust record; resolves with the number removed */
  async clear(): Promise<number> {
    let count = 0;
    await this.mutate((records) => {
      count = records.size;
      records.clear();
    });
    this.log.info(`Cleared ${count} trust record(s)`);
    return count;
  }

  /** Waits for pending writes; later operations throw */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.writeChain;
  }

  private committed(): ReadonlyMap<string, TrustRecord> {
    this.ensureNotClosed();
    if (!this.records) {
      throw new CredentialStoreError('Credential store is not open');
    }
    return this.records;
  }

  private mutate(change: (records: Map<string, TrustRecord>) => void): Promise<void> {
    const opened = this.committed();

    const run = this.writeChain.then(async () => {
      // writes queued before close() still complete
      const next = new Map(this.records ?? opened);
      change(next);
      await this.persist(next);
      this.records = next;
    });
    // failures reach the caller through `run`; the chain itself keeps going
    this.writeChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async persist(records: ReadonlyMap<string, TrustRecord>): Promise<void> {
    const document = {
      version: DOCUMENT_VERSION,
      records: Object.fromEntries(
        [...records.values()].map((record) => [record.identity, toStored(record)]),
      ),
    };
    const tempPath = `${this.filePath}.${randomBytes(6).toString('hex')}.tmp`;

    try {
      await mkdir(this.directory, { recursive: true, mode: DIRECTORY_MODE });
      await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, {
        mode: FILE_MODE,
      });
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.log.warn(
          `Failed to remove ${tempPath}: ${errorMessage(cleanupError)}`,
        );
      });
      this.log.error('Failed to write trust records:', error);
      throw new CredentialStoreError(
        `Failed to write ${this.filePath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private ensureNotClosed(): void {
    if (this.closed) {
      throw new CredentialStoreError('Credential store is closed');
    }
  }
}

function toStored(record: TrustRecord): StoredRecord {
  return {
    publicKey: record.publicKey.toString('base64'),
    token: record.token.toString('base64'),
    name: record.name,
    createdAt: record.createdAt,
  };
}

function parseDocument(
  content: string,
  filePath: string,
): Map<string, TrustRecord> {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new CredentialStoreError(
      `Trust records at ${filePath} are not valid JSON: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  const parsed = documentSchema.safeParse(json);
  if (!parsed.success) {
    throw new CredentialStoreError(
      `Trust records at ${filePath} are malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
    );
  }

  return new Map(
    Object.entries(parsed.data.records).map(([identity, stored]) => [
      identity,
      {
        identity,
        publicKey: Buffer.from(stored.publicKey, 'base64'),
        token: Buffer.from(stored.token, 'base64'),
        name: stored.name,
        createdAt: stored.createdAt,
      },
    ]),
  );
}
