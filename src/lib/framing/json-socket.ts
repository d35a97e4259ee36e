import { EventEmitter } from 'node:events';
import * as net from 'node:net';

import { NetworkError, ProtocolError, errorMessage } from '../errors.js';
import { getLogger } from '../logger.js';
import { FrameDecoder, encodeFrame } from './frame-codec.js';

const log = getLogger('JsonSocket');

interface PendingReceive {
  resolve: (message: unknown) => void;
  reject: (error: Error) => void;
  timeoutId: NodeJS.Timeout | null;
}

export interface JsonSocket {
  on(event: 'message', listener: (message: unknown) => void): this;
  on(event: 'protocol-error', listener: (error: ProtocolError) => void): this;
  on(event: 'close', listener: () => void): this;
  once(event: 'close', listener: () => void): this;
  emit(event: 'message', message: unknown): boolean;
  emit(event: 'protocol-error', error: ProtocolError): boolean;
  emit(event: 'close'): boolean;
}

/**
 * Framed JSON message channel over a TCP socket.
 *
 * Incoming messages go to a pending `receive()` call first, then to `message`
 * listeners, and are queued when neither is present.
 */
export class JsonSocket extends EventEmitter {
  private readonly decoder = new FrameDecoder();
  private readonly inbox: unknown[] = [];
  private readonly waiters: PendingReceive[] = [];
  private closed = false;
  private failed = false;

  constructor(private readonly socket: net.Socket) {
    super();
    socket.on('data', (chunk: Buffer) => this.onData(chunk));
    socket.on('error', (error) => {
      log.debug(`Socket error from ${this.remoteAddress}: ${error.message}`);
    });
    socket.once('close', () => this.onClose());
  }

  /**
   * Opens a client connection
   * @param timeoutMs - connection attempt timeout
   */
  static connect(
    host: string,
    port: number,
    timeoutMs = 10000,
  ): Promise<JsonSocket> {
    return new Promise((resolve, reject) => {
      const socket = new net.Socket();
      const timeoutId = setTimeout(() => {
        socket.destroy();
        reject(new NetworkError(`Connection timeout after ${timeoutMs}ms`));
      }, timeoutMs);

      socket.once('connect', () => {
        clearTimeout(timeoutId);
        socket.removeAllListeners('error');
        resolve(new JsonSocket(socket));
      });
      socket.once('error', (error) => {
        clearTimeout(timeoutId);
        reject(new NetworkError(`Connection failed: ${error.message}`));
      });

      socket.connect(port, host);
    });
  }

  get remoteAddress(): string {
    return this.socket.remoteAddress ?? 'unknown';
  }

  get remoteEndpoint(): string {
    return `${this.remoteAddress}:${this.socket.remotePort ?? 0}`;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Bytes queued for writing that the peer has not drained yet */
  get pendingBytes(): number {
    return this.socket.writableLength;
  }

  /** Queues a message without waiting for it to be flushed */
  write(message: unknown): boolean {
    if (this.closed) {
      return false;
    }
    return this.socket.write(encodeFrame(message));
  }

  async send(message: unknown): Promise<void> {
    if (this.closed) {
      throw new NetworkError('Socket not connected');
    }
    const packet = encodeFrame(message);

    return new Promise((resolve, reject) => {
      this.socket.write(packet, (error) => {
        if (error) {
          reject(new NetworkError(`Failed to send message: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Waits for the next message
   * @param timeoutMs - omit to wait indefinitely
   */
  receive(timeoutMs?: number): Promise<unknown> {
    if (this.inbox.length > 0) {
      return Promise.resolve(this.inbox.shift());
    }
    if (this.closed) {
      return Promise.reject(new NetworkError('Connection closed'));
    }

    return new Promise((resolve, reject) => {
      const waiter: PendingReceive = { resolve, reject, timeoutId: null };
      if (hasTimeout(timeoutMs)) {
        waiter.timeoutId = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
          }
          reject(new NetworkError(`Response timeout after ${timeoutMs}ms`));
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Delivers every message, queued ones first, to the listener from now on
   * instead of to `receive()`
   */
  listen(listener: (message: unknown) => void): void {
    this.on('message', listener);
    for (const message of this.inbox.splice(0)) {
      listener(message);
    }
  }

  /** Half-closes after flushing queued frames */
  close(): void {
    if (!this.closed) {
      this.socket.end();
    }
  }

  destroy(): void {
    this.socket.destroy();
  }

  private onData(chunk: Buffer): void {
    if (this.failed) {
      return;
    }
    let messages: unknown[];
    try {
      messages = this.decoder.push(chunk);
    } catch (error) {
      const protocolError =
        error instanceof ProtocolError
          ? error
          : new ProtocolError(errorMessage(error));
      log.warn(
        `Dropping connection from ${this.remoteEndpoint}: ${protocolError.message}`,
      );
      this.failed = true;
      this.emit('protocol-error', protocolError);
      this.socket.end(() => this.socket.destroy());
      return;
    }

    for (const message of messages) {
      const waiter = this.waiters.shift();
      if (waiter) {
        if (waiter.timeoutId) {
          clearTimeout(waiter.timeoutId);
        }
        waiter.resolve(message);
      } else if (this.listenerCount('message') > 0) {
        this.emit('message', message);
      } else {
        this.inbox.push(message);
      }
    }
  }

  private onClose(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      if (waiter.timeoutId) {
        clearTimeout(waiter.timeoutId);
      }
      waiter.reject(new NetworkError('Connection closed'));
    }
    this.emit('close');
  }
}

function hasTimeout(timeoutMs: number | undefined): timeoutMs is number {
  return timeoutMs !== undefined && Number.isFinite(timeoutMs);
}
