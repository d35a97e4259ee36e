import { expect } from 'chai';
import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { TRUST_RECORDS_FILE } from '../../../src/constants.js';
import { CredentialStore } from '../../../src/lib/credentials/index.js';
import { CredentialStoreError } from '../../../src/lib/errors.js';
import { rejectionOf } from '../helpers/async.js';

const ALICE = 'a'.repeat(64);
const BOB = 'b'.repeat(64);

function material(seed: number, name?: string) {
  return {
    publicKey: Buffer.alloc(32, seed),
    token: Buffer.alloc(32, seed + 100),
    name,
  };
}

describe('CredentialStore', function () {
  let directory: string;
  let store: CredentialStore;

  beforeEach(async function () {
    directory = await mkdtemp(join(tmpdir(), 'media-relay-store-'));
    store = new CredentialStore({ directory });
    await store.open();
  });

  afterEach(async function () {
    await store.close();
    await rm(directory, { recursive: true, force: true });
  });

  async function reopen(): Promise<CredentialStore> {
    const reopened = new CredentialStore({ directory });
    await reopened.open();
    return reopened;
  }

  it('should start empty when no document exists', function () {
    expect(store.list()).to.deep.equal([]);
    expect(store.get(ALICE)).to.be.null;
  });

  it('should persist records across instances', async function () {
    await store.put(ALICE, material(1, 'Kitchen tablet'));

    const reopened = await reopen();
    const record = reopened.get(ALICE);
    expect(record?.identity).to.equal(ALICE);
    expect(record?.name).to.equal('Kitchen tablet');
    expect(record?.publicKey.equals(Buffer.alloc(32, 1))).to.be.true;
    expect(record?.token.equals(Buffer.alloc(32, 101))).to.be.true;
    await reopened.close();
  });

  it('should write the document readable by the owner only', async function () {
    await store.put(ALICE, material(1));
    const { mode } = await stat(join(directory, TRUST_RECORDS_FILE));
    expect(mode & 0o777).to.equal(0o600);
  });

  it('should store keys and tokens as base64', async function () {
    await store.put(ALICE, material(1));
    const document = JSON.parse(
      await readFile(join(directory, TRUST_RECORDS_FILE), 'utf8'),
    );
    expect(document.version).to.equal(1);
    expect(document.records[ALICE].token).to.equal(
      Buffer.alloc(32, 101).toString('base64'),
    );
  });

  it('should replace the record of an identity that pairs again', async function () {
    await store.put(ALICE, material(1));
    await store.put(ALICE, material(2));
    expect(store.list()).to.have.lengthOf(1);
    expect(store.get(ALICE)?.token.equals(Buffer.alloc(32, 102))).to.be.true;
  });

  it('should list records oldest first', async function () {
    await store.put(ALICE, material(1));
    await store.put(BOB, material(2));
    expect(store.list().map(({ identity }) => identity)).to.deep.equal([ALICE, BOB]);
  });

  it('should revoke a single identity', async function () {
    await store.put(ALICE, material(1));
    await store.put(BOB, material(2));

    expect(await store.revoke(ALICE)).to.be.true;
    expect(await store.revoke(ALICE)).to.be.false;

    const reopened = await reopen();
    expect(reopened.list().map(({ identity }) => identity)).to.deep.equal([BOB]);
    await reopened.close();
  });

  it('should clear every record', async function () {
    await store.put(ALICE, material(1));
    await store.put(BOB, material(2));
    expect(await store.clear()).to.equal(2);
    expect(store.list()).to.deep.equal([]);
  });

  it('should apply concurrent writes one after another', async function () {
    await Promise.all(
      Array.from({ length: 5 }, (_, index) =>
        store.put(String(index).repeat(64), material(index)),
      ),
    );
    const reopened = await reopen();
    expect(reopened.list()).to.have.lengthOf(5);
    await reopened.close();
  });

  it('should keep the committed state when a write fails', async function () {
    await store.put(ALICE, material(1));
    await rm(directory, { recursive: true, force: true });
    await writeFile(directory, 'not a directory');

    const error = await rejectionOf(store.put(BOB, material(2)));
    expect(error).to.be.instanceOf(CredentialStoreError);
    expect(store.get(BOB)).to.be.null;
    expect(store.get(ALICE)).to.not.be.null;
  });

  it('should refuse a malformed document', async function () {
    await writeFile(join(directory, TRUST_RECORDS_FILE), '{"version":2,"records":{}}');
    const error = await rejectionOf(new CredentialStore({ directory }).open());
    expect(error).to.be.instanceOf(CredentialStoreError);
    expect(error.message).to.include('malformed');
  });

  it('should refuse a document that is not JSON', async function () {
    await writeFile(join(directory, TRUST_RECORDS_FILE), 'trust me');
    const error = await rejectionOf(new CredentialStore({ directory }).open());
    expect(error.message).to.include('not valid JSON');
  });

  it('should refuse reads before open and after close', async function () {
    const unopened = new CredentialStore({ directory });
    expect(() => unopened.list()).to.throw(
      CredentialStoreError,
      'Credential store is not open',
    );

    await store.close();
    expect(() => store.get(ALICE)).to.throw(
      CredentialStoreError,
      'Credential store is closed',
    );
  });
});
