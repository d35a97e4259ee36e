import * as net from 'node:net';

import type { CredentialStoreInterface } from '../credentials/index.js';
import { NetworkError } from '../errors.js';
import { JsonSocket } from '../framing/index.js';
import { getLogger } from '../logger.js';
import type { PlayerMonitor } from '../players/player-monitor.js';
import { ClientSession } from './client-session.js';
import { RELAY_DEFAULTS } from './protocol.js';

export interface RelayServerOptions {
  host?: string;
  port?: number;
  handshakeTimeoutMs?: number;
  maxPendingBytes?: number;
}

/** Streams player events to, and takes commands from, paired clients */
export class RelayServer {
  private readonly log = getLogger('RelayServer');
  private server: net.Server | undefined;
  private readonly sessions = new Set<ClientSession>();
  private readonly host: string;
  private readonly requestedPort: number;
  private readonly handshakeTimeoutMs: number;
  private readonly maxPendingBytes: number;

  constructor(
    private readonly monitor: PlayerMonitor,
    private readonly store: CredentialStoreInterface,
    options: RelayServerOptions = {},
  ) {
    this.host = options.host ?? '0.0.0.0';
    this.requestedPort = options.port ?? 0;
    this.handshakeTimeoutMs =
      options.handshakeTimeoutMs ?? RELAY_DEFAULTS.HANDSHAKE_TIMEOUT_MS;
    this.maxPendingBytes =
      options.maxPendingBytes ?? RELAY_DEFAULTS.MAX_PENDING_BYTES;
  }

  get port(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : 0;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  async start(): Promise<void> {
    if (this.server) {
      throw new NetworkError('Relay server already started');
    }
    const server = net.createServer((socket) => this.accept(socket));

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.requestedPort, this.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', (error) => {
      this.log.error('Relay listener error:', error);
    });

    this.server = server;
    this.log.info(`Relay server listening on ${this.host}:${this.port}`);
  }

  /** Closes every session and the listener */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;

    for (const session of this.sessions) {
      session.close();
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    this.log.info('Relay server stopped');
  }

  /**
   * Ends the sessions authenticated as `identity`, or every session when it
   * is omitted
   * @returns the number of sessions closed
   */
  disconnect(identity?: string): number {
    let closed = 0;
    for (const session of this.sessions) {
      if (identity === undefined || session.identity === identity) {
        session.close('authentication-failed', 'Pairing revoked');
        closed++;
      }
    }
    return closed;
  }

  private accept(socket: net.Socket): void {
    socket.setNoDelay(true);
    const session = new ClientSession(
      new JsonSocket(socket),
      this.monitor,
      this.store,
      {
        handshakeTimeoutMs: this.handshakeTimeoutMs,
        maxPendingBytes: this.maxPendingBytes,
      },
    );
    this.sessions.add(session);

    session
      .run()
      .catch((error: unknown) => {
        this.log.error(`Relay session from ${session.remoteEndpoint} failed:`, error);
      })
      .finally(() => {
        this.sessions.delete(session);
      });
  }
}
