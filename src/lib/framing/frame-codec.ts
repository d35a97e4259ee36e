import { ProtocolError, errorMessage } from '../errors.js';
import { FRAMING_CONSTANTS } from './constants.js';

/**
 * Encodes a message as `MAGIC | uint32 BE length | UTF-8 JSON body`
 */
export function encodeFrame(message: unknown): Buffer {
  const bodyBytes = Buffer.from(JSON.stringify(message), 'utf8');
  if (bodyBytes.length > FRAMING_CONSTANTS.MAX_BODY_LENGTH) {
    throw new ProtocolError(
      `Frame body of ${bodyBytes.length} bytes exceeds ${FRAMING_CONSTANTS.MAX_BODY_LENGTH}`,
    );
  }
  const magic = Buffer.from(FRAMING_CONSTANTS.MAGIC, 'ascii');
  const length = Buffer.alloc(FRAMING_CONSTANTS.LENGTH_FIELD_SIZE);
  length.writeUInt32BE(bodyBytes.length, 0);
  return Buffer.concat([magic, length, bodyBytes]);
}

/** Reassembles frames from arbitrarily split socket chunks */
export class FrameDecoder {
  private buffer = Buffer.alloc(0);

  /**
   * Appends a chunk and returns every message completed by it
   * @throws ProtocolError on bad magic, oversized bodies or invalid JSON
   */
  push(chunk: Buffer): unknown[] {
    this.buffer = Buffer.concat([this.buffer, chunk]);
    const messages: unknown[] = [];

    while (this.buffer.length >= FRAMING_CONSTANTS.HEADER_LENGTH) {
      const magic = this.buffer
        .subarray(0, FRAMING_CONSTANTS.MAGIC_LENGTH)
        .toString('ascii');
      if (magic !== FRAMING_CONSTANTS.MAGIC) {
        throw new ProtocolError(
          `Invalid protocol magic: expected '${FRAMING_CONSTANTS.MAGIC}', got '${magic}'`,
        );
      }

      const expectedLength = this.buffer.readUInt32BE(
        FRAMING_CONSTANTS.MAGIC_LENGTH,
      );
      if (expectedLength > FRAMING_CONSTANTS.MAX_BODY_LENGTH) {
        throw new ProtocolError(
          `Frame body of ${expectedLength} bytes exceeds ${FRAMING_CONSTANTS.MAX_BODY_LENGTH}`,
        );
      }

      const frameLength = FRAMING_CONSTANTS.HEADER_LENGTH + expectedLength;
      if (this.buffer.length < frameLength) {
        break;
      }

      const body = this.buffer.subarray(
        FRAMING_CONSTANTS.HEADER_LENGTH,
        frameLength,
      );
      this.buffer = this.buffer.subarray(frameLength);

      try {
        messages.push(JSON.parse(body.toString('utf8')));
      } catch (error) {
        throw new ProtocolError(
          `Failed to parse frame body: ${errorMessage(error)}`,
        );
      }
    }

    return messages;
  }

  get bufferedBytes(): number {
    return this.buffer.length;
  }
}
