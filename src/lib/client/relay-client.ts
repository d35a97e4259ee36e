import { EventEmitter } from 'node:events';

import { computeRelayProof } from '../crypto/index.js';
import {
  AuthenticationError,
  CommandRejectedError,
  NetworkError,
  ProtocolError,
} from '../errors.js';
import { JsonSocket } from '../framing/index.js';
import { getLogger } from '../logger.js';
import type {
  PlayerCommand,
  PlayerEvent,
  PlayerSnapshot,
} from '../players/types.js';
import {
  PROTOCOL_VERSION,
  RELAY_DEFAULTS,
  type PlayerSelection,
  type RelayErrorCode,
  type ServerMessage,
  serverMessageSchema,
} from '../relay/protocol.js';

const log = getLogger('RelayClient');

const REQUEST_TIMEOUT_MS = 30000;

export interface RelayClientOptions {
  host: string;
  port: number;
  identity: string;
  token: Buffer;
  timeoutMs?: number;
}

type Reply = Exclude<
  ServerMessage,
  { type: 'challenge' | 'authenticated' | 'event' | 'error' }
>;

interface PendingRequest {
  resolve: (reply: Reply) => void;
  reject: (error: Error) => void;
  timeoutId: NodeJS.Timeout;
}

export interface RelayServerError {
  code: RelayErrorCode;
  message: string;
}

export interface RelayClient {
  on(event: 'event', listener: (event: PlayerEvent) => void): this;
  on(event: 'snapshot', listener: (players: PlayerSnapshot[]) => void): this;
  on(event: 'server-error', listener: (error: RelayServerError) => void): this;
  on(event: 'close', listener: () => void): this;
  once(event: 'close', listener: () => void): this;
  emit(event: 'event', payload: PlayerEvent): boolean;
  emit(event: 'snapshot', players: PlayerSnapshot[]): boolean;
  emit(event: 'server-error', error: RelayServerError): boolean;
  emit(event: 'close'): boolean;
}

/** Remote side of the relay protocol, authenticated with a paired token */
export class RelayClient extends EventEmitter {
  private readonly pending = new Map<string, PendingRequest>();
  private nextRequestId = 1;

  private constructor(
    private readonly socket: JsonSocket,
    private readonly timeoutMs: number,
  ) {
    super();
    socket.listen((message) => this.dispatch(message));
    socket.once('close', () => {
      this.rejectAll(new NetworkError('Relay connection closed'));
      this.emit('close');
    });
  }

  /**
   * Connects and answers the agent's challenge
   * @throws AuthenticationError when the agent refuses the identity or proof
   */
  static async connect(options: RelayClientOptions): Promise<RelayClient> {
    const timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    const socket = await JsonSocket.connect(options.host, options.port, timeoutMs);

    try {
      const challenge = parseServerMessage(
        await socket.receive(RELAY_DEFAULTS.HANDSHAKE_TIMEOUT_MS),
      );
      if (challenge.type !== 'challenge') {
        throw new ProtocolError(`Expected a challenge, got ${challenge.type}`);
      }
      if (challenge.version !== PROTOCOL_VERSION) {
        throw new ProtocolError(`Agent speaks protocol ${challenge.version}`);
      }

      const proof = computeRelayProof(
        options.token,
        Buffer.from(challenge.nonce, 'base64'),
        options.identity,
      );
      await socket.send({
        type: 'auth',
        version: PROTOCOL_VERSION,
        identity: options.identity,
        proof: proof.toString('base64'),
      });

      const reply = parseServerMessage(
        await socket.receive(RELAY_DEFAULTS.HANDSHAKE_TIMEOUT_MS),
      );
      if (reply.type === 'error') {
        throw new AuthenticationError(`${reply.code}: ${reply.message}`);
      }
      if (reply.type !== 'authenticated') {
        throw new ProtocolError(`Expected authentication, got ${reply.type}`);
      }
      log.debug(`Authenticated as ${reply.identity}`);
    } catch (error) {
      socket.destroy();
      throw error;
    }

    return new RelayClient(socket, timeoutMs);
  }

  /** Resolves with snapshots of the players the selection newly covers */
  async subscribe(players: PlayerSelection = '*'): Promise<PlayerSnapshot[]> {
    const reply = await this.request({ type: 'subscribe', players });
    if (reply.type !== 'snapshot') {
      throw new ProtocolError(`Unexpected reply ${reply.type} to subscribe`);
    }
    return reply.players;
  }

  /** Resolves with the ids of players no longer covered */
  async unsubscribe(players: PlayerSelection = '*'): Promise<string[]> {
    const reply = await this.request({ type: 'unsubscribe', players });
    if (reply.type !== 'unsubscribed') {
      throw new ProtocolError(`Unexpected reply ${reply.type} to unsubscribe`);
    }
    return reply.players;
  }

  /** @throws CommandRejectedError with the reason the agent reported */
  async command(playerId: string, command: PlayerCommand): Promise<void> {
    const reply = await this.request({ type: 'command', playerId, command });
    if (reply.type === 'command-rejected') {
      throw new CommandRejectedError(reply.message, reply.reason);
    }
    if (reply.type !== 'command-result') {
      throw new ProtocolError(`Unexpected reply ${reply.type} to command`);
    }
  }

  async ping(): Promise<void> {
    await this.request({ type: 'ping' });
  }

  close(): void {
    this.socket.close();
  }

  private request(message: Record<string, unknown>): Promise<Reply> {
    if (this.socket.isClosed) {
      return Promise.reject(new NetworkError('Relay connection closed'));
    }
    const requestId = String(this.nextRequestId++);
    return new Promise((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new NetworkError(`No reply to request ${requestId} within ${this.timeoutMs}ms`));
      }, this.timeoutMs);
      this.pending.set(requestId, { resolve, reject, timeoutId });
      this.socket.send({ ...message, requestId }).catch((error: unknown) => {
        const pending = this.pending.get(requestId);
        if (pending) {
          clearTimeout(pending.timeoutId);
          this.pending.delete(requestId);
          pending.reject(
            error instanceof Error ? error : new NetworkError(String(error)),
          );
        }
      });
    });
  }

  private dispatch(raw: unknown): void {
    let message: ServerMessage;
    try {
      message = parseServerMessage(raw);
    } catch (error) {
      log.warn(`Ignoring unexpected message from the agent: ${String(error)}`);
      return;
    }

    switch (message.type) {
      case 'event':
        this.emit('event', message.event);
        return;
      case 'error':
        this.emit('server-error', { code: message.code, message: message.message });
        this.rejectAll(new NetworkError(`${message.code}: ${message.message}`));
        return;
      case 'challenge':
      case 'authenticated':
        return;
      case 'snapshot':
        this.emit('snapshot', message.players);
        break;
    }

    const requestId = message.requestId;
    const pending = requestId === undefined ? undefined : this.pending.get(requestId);
    if (!requestId || !pending) {
      return;
    }
    clearTimeout(pending.timeoutId);
    this.pending.delete(requestId);
    pending.resolve(message);
  }

  private rejectAll(error: Error): void {
    for (const pending of this.pending.values()) {
      clearTimeout(pending.timeoutId);
      pending.reject(error);
    }
    this.pending.clear();
  }
}

function parseServerMessage(message: unknown): ServerMessage {
  const parsed = serverMessageSchema.safeParse(message);
  if (!parsed.success) {
    throw new ProtocolError('Malformed message from the agent');
  }
  return parsed.data;
}
