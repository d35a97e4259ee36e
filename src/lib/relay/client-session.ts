import { randomBytes } from 'node:crypto';

import type { CredentialStoreInterface } from '../credentials/index.js';
import { verifyRelayProof } from '../crypto/index.js';
import {
  AuthenticationError,
  CommandRejectedError,
  SlowConsumerError,
  errorMessage,
} from '../errors.js';
import type { JsonSocket } from '../framing/index.js';
import { getLogger } from '../logger.js';
import type { PlayerMonitor } from '../players/player-monitor.js';
import type { PlayerEvent, PlayerSnapshot } from '../players/types.js';
import {
  type ClientMessage,
  PROTOCOL_VERSION,
  type PlayerSelection,
  type RelayErrorCode,
  type ServerMessage,
  authMessageSchema,
  clientMessageSchema,
} from './protocol.js';

const log = getLogger('ClientSession');

export interface ClientSessionOptions {
  handshakeTimeoutMs: number;
  maxPendingBytes: number;
}

/**
 * One authenticated relay connection: inbound requests are read in
 * arrival order while monitor events are pushed independently.
 */
export class ClientSession {
  private _identity: string | null = null;
  private subscriptions: 'all' | Set<string> = new Set();
  /** Players this client has been told about and not yet told are gone */
  private readonly announced = new Set<string>();
  private readonly onMonitorEvent = (event: PlayerEvent): void =>
    this.deliver(event);
  private ended = false;

  constructor(
    private readonly socket: JsonSocket,
    private readonly monitor: PlayerMonitor,
    private readonly store: CredentialStoreInterface,
    private readonly options: ClientSessionOptions,
  ) {}

  get identity(): string | null {
    return this._identity;
  }

  get remoteEndpoint(): string {
    return this.socket.remoteEndpoint;
  }

  /** Resolves once the connection is over */
  async run(): Promise<void> {
    this.socket.on('protocol-error', (error) => {
      this.socket.write({
        type: 'error',
        code: 'protocol-violation',
        message: error.message,
      } satisfies ServerMessage);
    });

    try {
      this._identity = await this.authenticate();
    } catch (error) {
      log.warn(
        `Rejected relay connection from ${this.remoteEndpoint}: ${errorMessage(error)}`,
      );
      this.terminate('authentication-failed', 'Authentication failed');
      return;
    }

    log.info(`Relay client ${this._identity} connected from ${this.remoteEndpoint}`);
    this.send({ type: 'authenticated', identity: this._identity });
    this.monitor.on('event', this.onMonitorEvent);

    try {
      while (!this.ended) {
        const message = await this.socket.receive();
        const parsed = clientMessageSchema.safeParse(message);
        if (!parsed.success) {
          this.terminate('protocol-violation', 'Malformed message');
          break;
        }
        this.handle(parsed.data);
      }
    } catch (error) {
      log.debug(`Relay client ${this._identity} gone: ${errorMessage(error)}`);
    } finally {
      this.monitor.off('event', this.onMonitorEvent);
      this.ended = true;
      log.info(`Relay client ${this._identity} disconnected`);
    }
  }

  close(code: RelayErrorCode = 'shutting-down', message = 'Agent is stopping'): void {
    this.terminate(code, message);
    this.socket.destroy();
  }

  private async authenticate(): Promise<string> {
    const nonce = randomBytes(32);
    this.send({
      type: 'challenge',
      version: PROTOCOL_VERSION,
      nonce: nonce.toString('base64'),
    });

    const message = await this.socket.receive(this.options.handshakeTimeoutMs);
    const parsed = authMessageSchema.safeParse(message);
    if (!parsed.success) {
      throw new AuthenticationError('Expected an auth message');
    }
    const { version, identity, proof } = parsed.data;
    if (version !== PROTOCOL_VERSION) {
      throw new AuthenticationError(`Unsupported protocol version ${version}`);
    }
    const record = this.store.get(identity);
    if (!record) {
      throw new AuthenticationError(`Unknown identity ${identity}`);
    }
    if (!verifyRelayProof(record.token, nonce, identity, Buffer.from(proof, 'base64'))) {
      throw new AuthenticationError(`Invalid proof for ${identity}`);
    }
    return identity;
  }

  private handle(message: ClientMessage): void {
    switch (message.type) {
      case 'subscribe':
        this.send({
          type: 'snapshot',
          requestId: message.requestId,
          players: this.subscribe(message.players),
        });
        break;
      case 'unsubscribe':
        this.send({
          type: 'unsubscribed',
          requestId: message.requestId,
          players: this.unsubscribe(message.players),
        });
        break;
      case 'command':
        this.runCommand(message).catch((error: unknown) => {
          log.error(`Command ${message.requestId} failed:`, error);
        });
        break;
      case 'ping':
        this.send({ type: 'pong', requestId: message.requestId });
        break;
    }
  }

  /**
   * Answers once the player has. Commands queue per player, so a slow
   * player holds up neither the read loop nor the others.
   */
  private async runCommand(
    message: Extract<ClientMessage, { type: 'command' }>,
  ): Promise<void> {
    try {
      await this.monitor.execute(message.playerId, message.command);
      this.send({
        type: 'command-result',
        requestId: message.requestId,
        playerId: message.playerId,
      });
    } catch (error) {
      const reason =
        error instanceof CommandRejectedError ? error.reason : 'failed';
      log.debug(
        `Command ${message.command.action} on ${message.playerId} rejected (${reason})`,
      );
      this.send({
        type: 'command-rejected',
        requestId: message.requestId,
        playerId: message.playerId,
        reason,
        message: errorMessage(error),
      });
    }
  }

  /** Returns snapshots of the players this selection newly covers */
  private subscribe(selection: PlayerSelection): PlayerSnapshot[] {
    const players = this.monitor.players();
    const before = players.filter((player) => this.covers(player));

    if (selection === '*') {
      this.subscriptions = 'all';
    } else if (this.subscriptions !== 'all') {
      for (const requested of selection) {
        this.subscriptions.add(requested);
      }
    }

    const alreadyCovered = new Set(before.map((player) => player.id));
    const fresh = players.filter(
      (player) =>
        this.covers(player) &&
        !alreadyCovered.has(player.id) &&
        !this.announced.has(player.id),
    );
    for (const player of fresh) {
      this.announced.add(player.id);
    }
    return fresh;
  }

  /** Returns the ids of players no longer covered */
  private unsubscribe(selection: PlayerSelection): string[] {
    const players = this.monitor.players();
    if (selection === '*') {
      this.subscriptions = new Set();
    } else {
      if (this.subscriptions === 'all') {
        this.subscriptions = new Set(players.map((player) => player.id));
      }
      for (const requested of selection) {
        this.subscriptions.delete(requested);
        const player = players.find((candidate) => candidate.name === requested);
        if (player) {
          this.subscriptions.delete(player.id);
        }
      }
    }

    const dropped: string[] = [];
    for (const id of [...this.announced]) {
      const player = players.find((candidate) => candidate.id === id);
      if (!player || !this.covers(player)) {
        this.announced.delete(id);
        dropped.push(id);
      }
    }
    return dropped;
  }

  private covers(player: PlayerSnapshot): boolean {
    return (
      this.subscriptions === 'all' ||
      this.subscriptions.has(player.id) ||
      this.subscriptions.has(player.name)
    );
  }

  private deliver(event: PlayerEvent): void {
    if (this.ended) {
      return;
    }
    if (event.type === 'player-disappeared') {
      if (!this.announced.delete(event.playerId)) {
        return;
      }
    } else {
      if (!this.covers(event.player)) {
        return;
      }
      this.announced.add(event.player.id);
    }

    if (this.socket.pendingBytes > this.options.maxPendingBytes) {
      const error = new SlowConsumerError(
        `Relay client ${this._identity} has ${this.socket.pendingBytes} bytes undelivered`,
      );
      log.warn(`${error.message}; disconnecting`);
      this.monitor.off('event', this.onMonitorEvent);
      this.ended = true;
      this.socket.destroy();
      return;
    }
    this.send({ type: 'event', event });
  }

  private send(message: ServerMessage): void {
    this.socket.write(message);
  }

  private terminate(code: RelayErrorCode, message: string): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.monitor.off('event', this.onMonitorEvent);
    this.send({ type: 'error', code, message });
    this.socket.close();
  }
}
