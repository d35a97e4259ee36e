import { hostname } from 'node:os';

import { ServiceAdvertiser } from './advertising/index.js';
import type { AgentConfig } from './config.js';
import { CredentialStore } from './credentials/index.js';
import { BusUnavailableError } from './errors.js';
import { getLogger } from './logger.js';
import { CommandNotifier, ConsoleVerifier } from './operator/index.js';
import { PairingServer } from './pairing/index.js';
import type { Notifier, PairingVerifier } from './pairing/index.js';
import { PlayerMonitor } from './players/index.js';
import type { MediaBusFactory } from './players/index.js';
import { RelayServer } from './relay/index.js';

const log = getLogger('Agent');

export interface AgentOptions {
  config: AgentConfig;
  verifier?: PairingVerifier;
  notifier?: Notifier;
  busFactory?: MediaBusFactory;
  /** Publish the relay over mDNS; on by default */
  advertise?: boolean;
  serviceName?: string;
}

/** Wires the credential store, player monitor and both listeners together */
export class Agent {
  readonly store: CredentialStore;
  readonly monitor: PlayerMonitor;
  readonly pairingServer: PairingServer;
  readonly relayServer: RelayServer;
  private advertiser: ServiceAdvertiser | null = null;
  private started = false;

  constructor(private readonly options: AgentOptions) {
    const { config } = options;
    this.store = new CredentialStore({ directory: config.credentialsDir });
    this.monitor = new PlayerMonitor({ busFactory: options.busFactory });
    this.relayServer = new RelayServer(this.monitor, this.store, {
      host: config.bindAddress,
      port: config.relayPort,
    });
    this.pairingServer = new PairingServer(
      this.store,
      options.verifier ?? new ConsoleVerifier(),
      options.notifier ?? new CommandNotifier(),
      { host: config.bindAddress, port: config.pairingPort },
    );
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;

    await this.store.open();
    log.info(`Using trust records at ${this.store.filePath}`);

    try {
      await this.monitor.start();
    } catch (error) {
      if (!(error instanceof BusUnavailableError)) {
        throw error;
      }
      log.error(`Continuing without players: ${error.message}`);
    }

    await this.relayServer.start();
    await this.pairingServer.start();

    if (this.options.advertise ?? true) {
      this.advertiser = new ServiceAdvertiser({
        name: this.options.serviceName ?? hostname(),
        relayPort: this.relayServer.port,
        pairingPort: this.pairingServer.port,
      });
      this.advertiser.start();
    }
    log.info('Agent started');
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;

    this.advertiser?.stop();
    this.advertiser = null;
    await this.relayServer.stop();
    await this.pairingServer.stop();
    this.monitor.stop();
    await this.store.close();
    log.info('Agent stopped');
  }

  /** Forgets every paired client and drops their live relay sessions */
  async resetPairings(): Promise<number> {
    const removed = await this.store.clear();
    const dropped = this.relayServer.disconnect();
    log.info(`Reset pairings: ${removed} record(s) removed, ${dropped} session(s) closed`);
    return removed;
  }

  async revoke(identity: string): Promise<boolean> {
    const removed = await this.store.revoke(identity);
    if (removed) {
      this.relayServer.disconnect(identity);
    }
    return removed;
  }
}
