import { expect } from 'chai';
import * as net from 'node:net';

import { ProtocolError } from '../../../src/lib/errors.js';
import {
  FRAMING_CONSTANTS,
  FrameDecoder,
  JsonSocket,
  encodeFrame,
} from '../../../src/lib/framing/index.js';
import { waitFor } from '../helpers/async.js';
import { type Loopback, jsonSocketPair, listenLoopback } from '../helpers/loopback.js';

function header(length: number, magic: string = FRAMING_CONSTANTS.MAGIC): Buffer {
  const buffer = Buffer.alloc(FRAMING_CONSTANTS.HEADER_LENGTH);
  buffer.write(magic, 0, 'ascii');
  buffer.writeUInt32BE(length, FRAMING_CONSTANTS.MAGIC_LENGTH);
  return buffer;
}

describe('encodeFrame', function () {
  it('should prefix the JSON body with magic and length', function () {
    const frame = encodeFrame({ type: 'ping' });

    expect(frame.subarray(0, 4).toString('ascii')).to.equal('MRLY');
    expect(frame.readUInt32BE(4)).to.equal(15);
    expect(frame.subarray(8).toString('utf8')).to.equal('{"type":"ping"}');
  });

  it('should count the body length in bytes', function () {
    const frame = encodeFrame('é');
    expect(frame.readUInt32BE(4)).to.equal(4);
  });

  it('should refuse bodies above the limit', function () {
    const body = 'x'.repeat(FRAMING_CONSTANTS.MAX_BODY_LENGTH);
    expect(() => encodeFrame(body)).to.throw(ProtocolError, 'exceeds');
  });
});

describe('FrameDecoder', function () {
  let decoder: FrameDecoder;

  beforeEach(function () {
    decoder = new FrameDecoder();
  });

  it('should reassemble a frame split across chunks', function () {
    const frame = encodeFrame({ type: 'hello', version: 1 });

    expect(decoder.push(frame.subarray(0, 3))).to.deep.equal([]);
    expect(decoder.push(frame.subarray(3, 10))).to.deep.equal([]);
    expect(decoder.push(frame.subarray(10))).to.deep.equal([
      { type: 'hello', version: 1 },
    ]);
    expect(decoder.bufferedBytes).to.equal(0);
  });

  it('should return every frame contained in one chunk', function () {
    const chunk = Buffer.concat([
      encodeFrame({ n: 1 }),
      encodeFrame({ n: 2 }),
      encodeFrame({ n: 3 }).subarray(0, 5),
    ]);

    expect(decoder.push(chunk)).to.deep.equal([{ n: 1 }, { n: 2 }]);
    expect(decoder.bufferedBytes).to.equal(5);
  });

  it('should reject a wrong magic', function () {
    expect(() => decoder.push(header(2, 'XXXX'))).to.throw(
      ProtocolError,
      "Invalid protocol magic: expected 'MRLY', got 'XXXX'",
    );
  });

  it('should reject an oversized length before the body arrives', function () {
    expect(() =>
      decoder.push(header(FRAMING_CONSTANTS.MAX_BODY_LENGTH + 1)),
    ).to.throw(ProtocolError, 'exceeds');
  });

  it('should reject a body that is not JSON', function () {
    const body = Buffer.from('{nope', 'utf8');
    expect(() => decoder.push(Buffer.concat([header(body.length), body]))).to.throw(
      ProtocolError,
      'Failed to parse frame body',
    );
  });
});

describe('JsonSocket', function () {
  let loopback: Loopback;
  const sockets: JsonSocket[] = [];

  beforeEach(async function () {
    loopback = await listenLoopback();
  });

  afterEach(async function () {
    for (const socket of sockets.splice(0)) {
      socket.destroy();
    }
    await loopback.close();
  });

  async function pair(): Promise<{ client: JsonSocket; server: JsonSocket }> {
    const ends = await jsonSocketPair(loopback);
    sockets.push(ends.client, ends.server);
    return ends;
  }

  it('should deliver messages in order to receive()', async function () {
    const { client, server } = await pair();

    await client.send({ n: 1 });
    client.write({ n: 2 });

    expect(await server.receive(1000)).to.deep.equal({ n: 1 });
    expect(await server.receive(1000)).to.deep.equal({ n: 2 });
  });

  it('should time out a receive without traffic', async function () {
    const { server } = await pair();
    let message = '';
    try {
      await server.receive(20);
    } catch (error) {
      message = error instanceof Error ? error.message : '';
    }
    expect(message).to.equal('Response timeout after 20ms');
  });

  it('should hand queued messages to a listener', async function () {
    const { client, server } = await pair();
    await client.send({ n: 1 });
    // let the frame land in the inbox
    await new Promise((resolve) => setTimeout(resolve, 20));

    const received: unknown[] = [];
    server.listen((message) => received.push(message));
    await client.send({ n: 2 });

    await waitFor(() => received.length === 2);
    expect(received).to.deep.equal([{ n: 1 }, { n: 2 }]);
  });

  it('should reject pending receives when the peer goes away', async function () {
    const { client, server } = await pair();
    const pending = server.receive();
    client.close();

    let message = '';
    try {
      await pending;
    } catch (error) {
      message = error instanceof Error ? error.message : '';
    }
    expect(message).to.equal('Connection closed');
    expect(server.isClosed).to.be.true;
  });

  it('should report garbage as a protocol error and close', async function () {
    const accepted = new Promise<net.Socket>((resolve) =>
      loopback.server.once('connection', resolve),
    );
    const raw = net.connect(loopback.port, '127.0.0.1');
    raw.on('error', () => undefined);
    const server = new JsonSocket(await accepted);
    sockets.push(server);

    const errors: ProtocolError[] = [];
    server.on('protocol-error', (error) => errors.push(error));
    raw.write('GET / HTTP/1.1\r\n\r\n');

    await waitFor(() => server.isClosed);
    raw.destroy();
    expect(errors).to.have.lengthOf(1);
    expect(errors[0]?.message).to.equal(
      "Invalid protocol magic: expected 'MRLY', got 'GET '",
    );
  });
});
