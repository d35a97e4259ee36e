import { expect } from 'chai';

import { PairingClient } from '../../../src/lib/client/index.js';
import type { TrustRecord } from '../../../src/lib/credentials/index.js';
import {
  generateIdentityKeyPair,
  generateEphemeralKeyPair,
  identityFromPublicKey,
  type IdentityKeyPair,
} from '../../../src/lib/crypto/index.js';
import { PairingError } from '../../../src/lib/errors.js';
import { JsonSocket } from '../../../src/lib/framing/index.js';
import {
  PAIRING_PROTOCOL_VERSION,
  PairingServer,
  type PairingFailure,
  type PairingServerOptions,
} from '../../../src/lib/pairing/index.js';
import { rejectionOf, waitFor } from '../helpers/async.js';
import {
  MemoryCredentialStore,
  RecordingNotifier,
  ScriptedVerifier,
} from '../helpers/pairing-fakes.js';

const HOST = '127.0.0.1';

describe('PairingServer', function () {
  let store: MemoryCredentialStore;
  let verifier: ScriptedVerifier;
  let notifier: RecordingNotifier;
  let server: PairingServer;
  let failures: PairingFailure[];

  async function startServer(
    decision: ScriptedVerifier['decision'],
    options: PairingServerOptions = {},
  ): Promise<void> {
    verifier = new ScriptedVerifier(decision);
    server = new PairingServer(store, verifier, notifier, {
      host: HOST,
      port: 0,
      confirmationTimeoutMs: 200,
      ...options,
    });
    server.on('pairing-failed', (failure) => failures.push(failure));
    await server.start();
  }

  function pair(
    confirm: (sas: string) => Promise<boolean> = async () => true,
    identity: IdentityKeyPair = generateIdentityKeyPair(),
  ) {
    return new PairingClient().pair({
      host: HOST,
      port: server.port,
      identity,
      name: 'Test phone',
      confirm,
      timeoutMs: 1000,
    });
  }

  beforeEach(function () {
    store = new MemoryCredentialStore();
    notifier = new RecordingNotifier();
    failures = [];
  });

  afterEach(async function () {
    await server.stop();
  });

  it('should mint a trust record when both operators confirm', async function () {
    await startServer('accept');
    const identity = generateIdentityKeyPair();
    const paired = new Promise<TrustRecord>((resolve) => server.once('paired', resolve));
    let shownCode = '';

    const result = await pair(async (sas) => {
      shownCode = sas;
      return true;
    }, identity);

    expect(result.identity).to.equal(identityFromPublicKey(identity.publicKey));
    expect(result.sas).to.equal(shownCode);
    expect(verifier.requests[0]?.sas).to.equal(shownCode);
    expect(verifier.requests[0]?.name).to.equal('Test phone');

    const record = store.get(result.identity);
    expect(record?.token.equals(result.token)).to.be.true;
    expect(record?.publicKey.equals(identity.publicKey)).to.be.true;
    expect(record?.name).to.equal('Test phone');
    expect((await paired).identity).to.equal(result.identity);
    expect(notifier.notifications).to.have.lengthOf(1);
    expect(notifier.notifications[0]?.title).to.equal('Media relay pairing request');
  });

  it('should refuse when the local operator sees a different code', async function () {
    await startServer('mismatch');
    const error = await rejectionOf(pair());

    expect(error).to.be.instanceOf(PairingError);
    expect(error).to.have.property('reason', 'mismatch');
    expect(store.records.size).to.equal(0);
    await waitFor(() => failures.length === 1);
    expect(failures[0]?.state).to.equal('REJECTED');
  });

  it('should refuse when the remote operator sees a different code', async function () {
    await startServer(null);
    const error = await rejectionOf(pair(async () => false));

    expect(error).to.have.property('reason', 'mismatch');
    expect(verifier.aborted).to.equal(1);
    expect(store.records.size).to.equal(0);
  });

  it('should refuse a rejected request without blocking the address', async function () {
    await startServer('reject');
    const error = await rejectionOf(pair());

    expect(error).to.have.property('reason', 'rejected');
    expect(server.isBlocked(HOST)).to.be.false;
  });

  it('should refuse every later request from a blocked address', async function () {
    await startServer('block');
    expect(await rejectionOf(pair())).to.have.property('reason', 'rejected');
    expect(server.isBlocked(HOST)).to.be.true;

    const error = await rejectionOf(pair());
    expect(error).to.have.property('reason', 'blocked');
    expect(verifier.requests).to.have.lengthOf(1);
  });

  it('should time out when the local operator never answers', async function () {
    await startServer(null);
    const error = await rejectionOf(pair());

    expect(error).to.have.property('reason', 'timeout');
    expect(verifier.aborted).to.equal(1);
    await waitFor(() => failures.length === 1);
    expect(failures[0]?.state).to.equal('TIMED_OUT');
  });

  it('should turn requests away while too many are pending', async function () {
    await startServer(null, { maxPendingSessions: 1, confirmationTimeoutMs: 5000 });
    const first = rejectionOf(pair());
    await waitFor(() => server.pendingSessions === 1);

    const error = await rejectionOf(pair());
    expect(error).to.have.property('reason', 'busy');

    await server.stop();
    expect(await first).to.have.property('reason', 'aborted');
  });

  it('should report a failed write of the trust record', async function () {
    await startServer('accept');
    store.failWrites = true;

    const error = await rejectionOf(pair());
    expect(error).to.have.property('reason', 'aborted');
    expect(error.message).to.equal('Trust record could not be stored');
    await waitFor(() => failures.length === 1);
    expect(failures[0]).to.include({
      state: 'ABORTED',
      reason: 'aborted',
      message: 'Trust record could not be stored',
    });
  });

  it('should abort when the confirmation names another session', async function () {
    await startServer('accept');
    const socket = await JsonSocket.connect(HOST, server.port);
    await socket.send({
      type: 'hello',
      version: PAIRING_PROTOCOL_VERSION,
      ephemeralKey: generateEphemeralKeyPair().publicKey.toString('base64'),
      identityKey: generateIdentityKeyPair().publicKey.toString('base64'),
    });
    const hello = await socket.receive(1000);
    if (
      typeof hello !== 'object' ||
      hello === null ||
      !('sessionId' in hello) ||
      typeof hello.sessionId !== 'string'
    ) {
      expect.fail('Expected the agent hello');
    }

    await socket.send({ type: 'confirm', sessionId: `${hello.sessionId}-forged`, accepted: true });
    const result = await socket.receive(1000);
    socket.destroy();

    expect(result).to.deep.include({
      type: 'result',
      sessionId: hello.sessionId,
      status: 'failed',
      reason: 'protocol',
    });
    await waitFor(() => failures.length === 1);
    expect(failures[0]).to.include({ state: 'ABORTED', reason: 'protocol' });
    expect(store.list()).to.be.empty;
  });

  it('should refuse an unknown protocol version', async function () {
    await startServer('accept');
    const socket = await JsonSocket.connect(HOST, server.port);
    await socket.send({
      type: 'hello',
      version: PAIRING_PROTOCOL_VERSION + 1,
      ephemeralKey: generateEphemeralKeyPair().publicKey.toString('base64'),
      identityKey: generateIdentityKeyPair().publicKey.toString('base64'),
    });

    const result = await socket.receive(1000);
    socket.destroy();
    expect(result).to.deep.include({ type: 'result', status: 'failed', reason: 'protocol' });
    expect(verifier.requests).to.be.empty;
  });

  it('should abandon the request when the remote party disconnects', async function () {
    await startServer(null, { confirmationTimeoutMs: 5000 });
    const socket = await JsonSocket.connect(HOST, server.port);
    await socket.send({
      type: 'hello',
      version: PAIRING_PROTOCOL_VERSION,
      ephemeralKey: generateEphemeralKeyPair().publicKey.toString('base64'),
      identityKey: generateIdentityKeyPair().publicKey.toString('base64'),
    });
    expect(await socket.receive(1000)).to.include({ type: 'hello' });
    await waitFor(() => verifier.requests.length === 1);

    socket.destroy();
    await waitFor(() => failures.length === 1);

    expect(failures[0]).to.include({ state: 'ABORTED', reason: 'aborted' });
    expect(verifier.aborted).to.equal(1);
    expect(server.pendingSessions).to.equal(0);
  });
});
