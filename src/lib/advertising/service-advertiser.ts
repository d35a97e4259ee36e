import { spawn } from 'node:child_process';

import { MDNS_SERVICE_TYPE } from '../../constants.js';
import { getLogger } from '../logger.js';

const log = getLogger('ServiceAdvertiser');

const PUBLISH_COMMAND = 'avahi-publish-service';
const RESTART_DELAY_MS = 5000;

/** The part of a child process the advertiser relies on */
export interface PublisherProcess {
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'error', listener: (error: NodeJS.ErrnoException) => void): unknown;
  once(
    event: 'exit',
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): unknown;
}

export type SpawnPublisher = (command: string, args: string[]) => PublisherProcess;

export interface AdvertisementOptions {
  name: string;
  relayPort: number;
  pairingPort: number;
}

export interface ServiceAdvertiserOptions {
  command?: string;
  restartDelayMs?: number;
  spawnPublisher?: SpawnPublisher;
}

export function buildPublishArgs({
  name,
  relayPort,
  pairingPort,
}: AdvertisementOptions): string[] {
  return [
    name,
    MDNS_SERVICE_TYPE,
    String(relayPort),
    `pairing_port=${pairingPort}`,
  ];
}

const spawnDetachedFromStdio: SpawnPublisher = (command, args) =>
  spawn(command, args, { stdio: 'ignore' });

/**
 * Publishes the relay over mDNS by keeping the platform publisher running.
 * A missing publisher only disables advertisement.
 */
export class ServiceAdvertiser {
  private readonly command: string;
  private readonly restartDelayMs: number;
  private readonly spawnPublisher: SpawnPublisher;
  private child: PublisherProcess | null = null;
  private restartTimer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly advertisement: AdvertisementOptions,
    options: ServiceAdvertiserOptions = {},
  ) {
    this.command = options.command ?? PUBLISH_COMMAND;
    this.restartDelayMs = options.restartDelayMs ?? RESTART_DELAY_MS;
    this.spawnPublisher = options.spawnPublisher ?? spawnDetachedFromStdio;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.launch();
  }

  stop(): void {
    this.running = false;
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
    const child = this.child;
    this.child = null;
    child?.kill('SIGTERM');
  }

  private launch(): void {
    const args = buildPublishArgs(this.advertisement);
    log.debug(`Running ${this.command} ${args.join(' ')}`);
    const child = this.spawnPublisher(this.command, args);
    this.child = child;

    child.once('error', (error) => {
      if (this.child !== child) {
        return;
      }
      this.child = null;
      if (error.code === 'ENOENT') {
        log.warn(`${this.command} not found; the service will not be advertised`);
        this.running = false;
        return;
      }
      log.error(`Failed to run ${this.command}:`, error);
      this.scheduleRestart();
    });
    child.once('exit', (code, signal) => {
      if (this.child !== child) {
        return;
      }
      this.child = null;
      log.warn(
        `${this.command} exited (${signal ?? `code ${code}`}); restarting in ${this.restartDelayMs}ms`,
      );
      this.scheduleRestart();
    });

    log.info(
      `Advertising '${this.advertisement.name}' as ${MDNS_SERVICE_TYPE} on port ${this.advertisement.relayPort}`,
    );
  }

  private scheduleRestart(): void {
    if (!this.running || this.restartTimer) {
      return;
    }
    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      if (this.running) {
        this.launch();
      }
    }, this.restartDelayMs);
  }
}
