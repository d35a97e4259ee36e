import { expect } from 'chai';
import { PassThrough } from 'node:stream';

import { PairingError } from '../../../src/lib/errors.js';
import { ConsoleVerifier, parseDecision } from '../../../src/lib/operator/index.js';
import type { VerificationRequest } from '../../../src/lib/pairing/index.js';
import { rejectionOf, waitFor } from '../helpers/async.js';

function request(sessionId: string, name?: string): VerificationRequest {
  return {
    sessionId,
    remoteAddress: '192.0.2.10',
    identity: 'c'.repeat(64),
    name,
    sas: '482193',
  };
}

function occurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

describe('parseDecision', function () {
  it('should map the short and long answers', function () {
    expect(parseDecision('y')).to.equal('accept');
    expect(parseDecision(' YES ')).to.equal('accept');
    expect(parseDecision('n')).to.equal('mismatch');
    expect(parseDecision('reject')).to.equal('reject');
    expect(parseDecision('b')).to.equal('block');
  });

  it('should not guess at anything else', function () {
    expect(parseDecision('')).to.be.null;
    expect(parseDecision('maybe')).to.be.null;
  });
});

describe('ConsoleVerifier', function () {
  let input: PassThrough;
  let output: PassThrough;
  let printed: string;
  let verifier: ConsoleVerifier;

  beforeEach(function () {
    input = new PassThrough();
    output = new PassThrough();
    printed = '';
    output.on('data', (chunk: Buffer) => {
      printed += chunk.toString('utf8');
    });
    verifier = new ConsoleVerifier({ input, output });
  });

  it('should show the request and return the answer', async function () {
    const decision = verifier.verify(request('s1', 'Phone'), new AbortController().signal);
    await waitFor(() => printed.includes('[b]lock'));

    expect(printed).to.include('Pairing request from Phone (192.0.2.10)');
    expect(printed).to.include('Code:     482 193');
    input.write('y\n');
    expect(await decision).to.equal('accept');
  });

  it('should ask again after an unknown answer', async function () {
    const decision = verifier.verify(request('s1'), new AbortController().signal);
    await waitFor(() => printed.includes('[b]lock'));

    input.write('maybe\n');
    await waitFor(() => occurrences(printed, '[b]lock') === 2);
    input.write('b\n');

    expect(await decision).to.equal('block');
  });

  it('should answer requests one at a time', async function () {
    const first = verifier.verify(request('s1', 'Phone'), new AbortController().signal);
    const second = verifier.verify(request('s2', 'Tablet'), new AbortController().signal);
    await waitFor(() => printed.includes('[b]lock'));
    expect(printed).to.not.include('Tablet');

    input.write('n\n');
    expect(await first).to.equal('mismatch');
    await waitFor(() => printed.includes('Tablet'));
    input.write('r\n');
    expect(await second).to.equal('reject');
  });

  it('should withdraw the prompt when the pairing is abandoned', async function () {
    const controller = new AbortController();
    const decision = verifier.verify(request('s1'), controller.signal);
    await waitFor(() => printed.includes('[b]lock'));

    controller.abort();
    const error = await rejectionOf(decision);
    expect(error).to.be.instanceOf(PairingError);
    expect(error).to.have.property('reason', 'aborted');
    expect(printed).to.include('Request withdrawn.');
  });

  it('should give up when the operator input ends', async function () {
    const decision = verifier.verify(request('s1'), new AbortController().signal);
    await waitFor(() => printed.includes('[b]lock'));

    input.end();
    const error = await rejectionOf(decision);
    expect(error).to.have.property('reason', 'aborted');
  });
});
