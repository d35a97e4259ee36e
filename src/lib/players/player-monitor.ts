import { EventEmitter } from 'node:events';

import { MPRIS_BUS_PREFIX } from '../../constants.js';
import {
  BusUnavailableError,
  CommandRejectedError,
  errorMessage,
} from '../errors.js';
import { getLogger } from '../logger.js';
import { retryWithBackoff, withTimeout } from '../retry.js';
import type { MediaBus, MediaBusFactory } from './bus.js';
import { DbusMediaBus } from './dbus-media-bus.js';
import {
  type PlayerFacade,
  type PlayerFacadeOptions,
  createFacade,
} from './facades/index.js';
import type { PlayerCommand, PlayerEvent, PlayerSnapshot } from './types.js';

const log = getLogger('PlayerMonitor');

export const PLAYER_MONITOR_DEFAULTS = {
  CONNECT_ATTEMPTS: 5,
  CONNECT_INITIAL_DELAY_MS: 250,
  RECONNECT_MAX_DELAY_MS: 30000,
  PROBE_ATTEMPTS: 3,
  PROBE_INITIAL_DELAY_MS: 100,
  HEARTBEAT_INTERVAL_MS: 10000,
  HEARTBEAT_TIMEOUT_MS: 5000,
} as const;

export interface PlayerMonitorOptions extends PlayerFacadeOptions {
  busFactory?: MediaBusFactory;
  connectAttempts?: number;
  connectInitialDelayMs?: number;
  reconnectMaxDelayMs?: number;
  probeAttempts?: number;
  probeInitialDelayMs?: number;
  /** A bus that fails to answer a ping within the timeout counts as lost */
  heartbeatIntervalMs?: number;
  heartbeatTimeoutMs?: number;
}

export function isMprisName(name: string): boolean {
  return name.startsWith(MPRIS_BUS_PREFIX);
}

export interface PlayerMonitor {
  on(event: 'event', listener: (event: PlayerEvent) => void): this;
  off(event: 'event', listener: (event: PlayerEvent) => void): this;
  emit(event: 'event', payload: PlayerEvent): boolean;
}

/**
 * Tracks MPRIS players on the session bus and reports them as one ordered
 * stream of `event`s.
 *
 * A player is announced only once its first probe finished, its state changes
 * are reported only while it is present, and nothing follows its
 * disappearance.
 */
export class PlayerMonitor extends EventEmitter {
  private readonly busFactory: MediaBusFactory;
  private readonly connectAttempts: number;
  private readonly connectInitialDelayMs: number;
  private readonly reconnectMaxDelayMs: number;
  private readonly probeAttempts: number;
  private readonly probeInitialDelayMs: number;
  private readonly heartbeatIntervalMs: number;
  private readonly heartbeatTimeoutMs: number;
  private readonly facadeOptions: PlayerFacadeOptions;

  private bus: MediaBus | null = null;
  private readonly present = new Map<string, PlayerFacade>();
  private readonly probing = new Map<string, PlayerFacade>();
  private readonly changeListeners = new Map<
    string,
    (snapshot: PlayerSnapshot) => void
  >();
  private running = false;
  private reconnectController: AbortController | null = null;
  private heartbeat: NodeJS.Timeout | null = null;

  constructor(options: PlayerMonitorOptions = {}) {
    super();
    // one listener per relay session
    this.setMaxListeners(0);
    this.busFactory = options.busFactory ?? (() => DbusMediaBus.connect());
    this.connectAttempts =
      options.connectAttempts ?? PLAYER_MONITOR_DEFAULTS.CONNECT_ATTEMPTS;
    this.connectInitialDelayMs =
      options.connectInitialDelayMs ??
      PLAYER_MONITOR_DEFAULTS.CONNECT_INITIAL_DELAY_MS;
    this.reconnectMaxDelayMs =
      options.reconnectMaxDelayMs ??
      PLAYER_MONITOR_DEFAULTS.RECONNECT_MAX_DELAY_MS;
    this.probeAttempts =
      options.probeAttempts ?? PLAYER_MONITOR_DEFAULTS.PROBE_ATTEMPTS;
    this.probeInitialDelayMs =
      options.probeInitialDelayMs ??
      PLAYER_MONITOR_DEFAULTS.PROBE_INITIAL_DELAY_MS;
    this.heartbeatIntervalMs =
      options.heartbeatIntervalMs ??
      PLAYER_MONITOR_DEFAULTS.HEARTBEAT_INTERVAL_MS;
    this.heartbeatTimeoutMs =
      options.heartbeatTimeoutMs ?? PLAYER_MONITOR_DEFAULTS.HEARTBEAT_TIMEOUT_MS;
    this.facadeOptions = {
      callTimeoutMs: options.callTimeoutMs,
      refreshDelayMs: options.refreshDelayMs,
    };
  }

  get isConnected(): boolean {
    return this.bus !== null;
  }

  /**
   * Connects to the bus and starts discovery
   * @throws BusUnavailableError once every connection attempt failed
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    try {
      await this.connect(this.connectAttempts);
    } catch (error) {
      this.running = false;
      if (error instanceof BusUnavailableError) {
        throw error;
      }
      throw new BusUnavailableError(
        `Session bus unavailable: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.reconnectController?.abort();
    this.reconnectController = null;
    this.stopHeartbeat();

    for (const facade of this.probing.values()) {
      facade.dispose();
    }
    this.probing.clear();
    for (const [id, facade] of this.present) {
      this.detach(id, facade);
    }
    this.present.clear();

    const bus = this.bus;
    this.bus = null;
    bus?.disconnect();
    log.info('Player monitor stopped');
  }

  /** Snapshots of every present player */
  players(): PlayerSnapshot[] {
    return [...this.present.values()].map((facade) => facade.snapshot());
  }

  /** Looks a player up by bus name first, then by display name */
  find(idOrName: string): PlayerSnapshot | null {
    return this.lookup(idOrName)?.snapshot() ?? null;
  }

  /** @throws CommandRejectedError */
  async execute(idOrName: string, command: PlayerCommand): Promise<void> {
    const facade = this.lookup(idOrName);
    if (!facade) {
      throw new CommandRejectedError(`No player named ${idOrName}`, 'not-found');
    }
    await facade.execute(command);
  }

  private lookup(idOrName: string): PlayerFacade | undefined {
    const byId = this.present.get(idOrName);
    if (byId) {
      return byId;
    }
    for (const facade of this.present.values()) {
      if (facade.name === idOrName) {
        return facade;
      }
    }
    return undefined;
  }

  private async connect(attempts: number, signal?: AbortSignal): Promise<void> {
    const { bus, names } = await retryWithBackoff(() => this.openBus(), {
      attempts,
      initialDelayMs: this.connectInitialDelayMs,
      maxDelayMs: this.reconnectMaxDelayMs,
      signal,
      onRetry: (error, attempt, delayMs) => {
        log.warn(
          `Session bus attempt ${attempt} failed (${errorMessage(error)}); retrying in ${delayMs}ms`,
        );
      },
    });

    if (!this.running) {
      bus.disconnect();
      return;
    }
    this.bus = bus;
    this.startHeartbeat(bus);
    const players = names.filter(isMprisName);
    log.info(`Connected to the session bus, ${players.length} player(s) found`);
    for (const name of players) {
      this.addPlayer(bus, name);
    }
  }

  private async openBus(): Promise<{ bus: MediaBus; names: string[] }> {
    const bus = await this.busFactory();
    bus.onDisconnect((error) => this.handleBusLost(bus, error));
    bus.onNameOwnerChanged((name, oldOwner, newOwner) => {
      if (this.bus !== bus || !isMprisName(name)) {
        return;
      }
      if (oldOwner) {
        this.removePlayer(name);
      }
      if (newOwner) {
        this.addPlayer(bus, name);
      }
    });

    try {
      return { bus, names: await bus.listNames() };
    } catch (error) {
      bus.disconnect();
      throw error;
    }
  }

  private addPlayer(bus: MediaBus, name: string): void {
    if (this.present.has(name) || this.probing.has(name)) {
      return;
    }
    const facade = createFacade(name, bus, this.facadeOptions);
    this.probing.set(name, facade);
    log.debug(`Probing ${name} as ${facade.kind}`);

    this.discover(bus, facade).catch((error: unknown) => {
      log.error(`Discovery of ${name} failed:`, error);
    });
  }

  private async discover(bus: MediaBus, facade: PlayerFacade): Promise<void> {
    let degradedReason: string | null = null;
    try {
      await retryWithBackoff(() => facade.probe(), {
        attempts: this.probeAttempts,
        initialDelayMs: this.probeInitialDelayMs,
        onRetry: (error, attempt) => {
          log.debug(
            `Probe ${attempt} of ${facade.id} failed: ${errorMessage(error)}`,
          );
        },
      });
    } catch (error) {
      degradedReason = errorMessage(error);
    }

    if (this.probing.get(facade.id) !== facade || this.bus !== bus) {
      facade.dispose();
      return;
    }
    this.probing.delete(facade.id);

    if (degradedReason !== null) {
      facade.markDegraded(degradedReason);
    }
    facade.assignName(this.uniqueName(facade.identity));

    const onChange = (snapshot: PlayerSnapshot): void => {
      this.emit('event', { type: 'state-changed', player: snapshot });
    };
    facade.on('change', onChange);
    this.changeListeners.set(facade.id, onChange);
    this.present.set(facade.id, facade);

    log.info(`Player appeared: ${facade.name} (${facade.id})`);
    const snapshot = facade.snapshot();
    this.emit('event', { type: 'player-appeared', player: snapshot });
    this.emit('event', { type: 'state-changed', player: snapshot });
  }

  private removePlayer(name: string): void {
    const probing = this.probing.get(name);
    if (probing) {
      this.probing.delete(name);
      probing.dispose();
      log.debug(`${name} vanished while being probed`);
      return;
    }

    const facade = this.present.get(name);
    if (!facade) {
      return;
    }
    this.present.delete(name);
    this.detach(name, facade);
    log.info(`Player disappeared: ${facade.name} (${name})`);
    this.emit('event', { type: 'player-disappeared', playerId: name });
  }

  private detach(id: string, facade: PlayerFacade): void {
    const listener = this.changeListeners.get(id);
    if (listener) {
      facade.off('change', listener);
      this.changeListeners.delete(id);
    }
    facade.dispose();
  }

  /** Display name not used by any present player: `Name`, `Name (2)`, ... */
  private uniqueName(identity: string): string {
    const taken = new Set([...this.present.values()].map((facade) => facade.name));
    if (!taken.has(identity)) {
      return identity;
    }
    for (let count = 2; ; count++) {
      const candidate = `${identity} (${count})`;
      if (!taken.has(candidate)) {
        return candidate;
      }
    }
  }

  private startHeartbeat(bus: MediaBus): void {
    this.stopHeartbeat();
    let answering = false;
    this.heartbeat = setInterval(() => {
      if (answering) {
        return;
      }
      answering = true;
      this.checkBus(bus)
        .catch((error: unknown) => {
          log.error('Session bus check failed:', error);
        })
        .finally(() => {
          answering = false;
        });
    }, this.heartbeatIntervalMs);
    this.heartbeat.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
  }

  /** The daemon going away without an error is only noticed this way */
  private async checkBus(bus: MediaBus): Promise<void> {
    try {
      await withTimeout(
        bus.ping(),
        this.heartbeatTimeoutMs,
        () =>
          new BusUnavailableError(
            `Session bus silent for ${this.heartbeatTimeoutMs}ms`,
          ),
      );
    } catch (error) {
      this.handleBusLost(
        bus,
        error instanceof Error ? error : new BusUnavailableError(String(error)),
      );
    }
  }

  private handleBusLost(bus: MediaBus, error?: Error): void {
    if (this.bus !== bus || !this.running) {
      return;
    }
    log.warn(
      `Lost the session bus${error ? `: ${error.message}` : ''}; reporting all players gone`,
    );
    this.bus = null;
    this.stopHeartbeat();

    for (const facade of this.probing.values()) {
      facade.dispose();
    }
    this.probing.clear();
    for (const id of [...this.present.keys()]) {
      this.removePlayer(id);
    }
    bus.disconnect();

    const controller = new AbortController();
    this.reconnectController = controller;
    this.connect(Number.POSITIVE_INFINITY, controller.signal)
      .then(() => {
        if (this.reconnectController === controller) {
          this.reconnectController = null;
        }
      })
      .catch((reconnectError: unknown) => {
        if (!controller.signal.aborted) {
          log.error('Reconnecting to the session bus failed:', reconnectError);
        }
      });
  }
}
