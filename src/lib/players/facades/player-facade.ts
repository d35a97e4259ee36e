import { EventEmitter } from 'node:events';
import { isDeepStrictEqual } from 'node:util';

import {
  MPRIS_BUS_PREFIX,
  MPRIS_PLAYER_INTERFACE,
  MPRIS_ROOT_INTERFACE,
} from '../../../constants.js';
import {
  CommandRejectedError,
  PlayerProbeError,
  PlayerTimeoutError,
  errorMessage,
} from '../../errors.js';
import { getLogger } from '../../logger.js';
import { withTimeout } from '../../retry.js';
import type { BusPlayerObject, MediaBus, PropertiesChange } from '../bus.js';
import {
  applyPropertiesChange,
  microsecondsToSeconds,
  normalizeMetadata,
  normalizePlaybackStatus,
  secondsToMicroseconds,
  toNumber,
} from '../normalize.js';
import {
  CAPABILITIES,
  type Capability,
  type FacadeKind,
  type PlayerCommand,
  type PlayerSnapshot,
  type PlayerStatus,
  type TrackMetadata,
} from '../types.js';

const log = getLogger('PlayerFacade');

/** Commands a façade accepts before answering `player-busy`, the running one included */
export const MAX_PENDING_COMMANDS = 8;

export const PLAYER_FACADE_DEFAULTS = {
  /** Longest wait for any single answer from the player */
  CALL_TIMEOUT_MS: 5000,
  /**
   * Delay of the full re-read that follows every change notification. Some
   * players (VLC among them) leave capability changes out of those.
   */
  REFRESH_DELAY_MS: 50,
} as const;

export interface PlayerFacadeOptions {
  callTimeoutMs?: number;
  refreshDelayMs?: number;
}

const METHODS = {
  play: 'Play',
  pause: 'Pause',
  stop: 'Stop',
  next: 'Next',
  previous: 'Previous',
} as const;

function identityFrom(root: Record<string, unknown>, busName: string): string {
  for (const candidate of [root.Identity, root.DesktopEntry]) {
    if (typeof candidate === 'string' && candidate.trim()) {
      return candidate.trim();
    }
  }
  return busName.startsWith(MPRIS_BUS_PREFIX)
    ? busName.slice(MPRIS_BUS_PREFIX.length)
    : busName;
}

export interface PlayerFacade {
  on(event: 'change', listener: (snapshot: PlayerSnapshot) => void): this;
  off(event: 'change', listener: (snapshot: PlayerSnapshot) => void): this;
  emit(event: 'change', snapshot: PlayerSnapshot): boolean;
}

/**
 * Canonical view of one player on the bus. The façade is the only writer of
 * its state and emits `change` whenever the snapshot differs from the last.
 */
export abstract class PlayerFacade extends EventEmitter {
  abstract readonly kind: FacadeKind;

  private object: BusPlayerObject | null = null;
  private properties: Record<string, unknown> = {};
  private _identity: string;
  private displayName: string | null = null;
  private status: PlayerStatus = 'ok';
  private current: PlayerSnapshot | null = null;
  private disposed = false;
  private commandChain: Promise<void> = Promise.resolve();
  private pendingCommands = 0;
  private refreshTimer: NodeJS.Timeout | null = null;
  private readonly callTimeoutMs: number;
  private readonly refreshDelayMs: number;

  constructor(
    readonly id: string,
    private readonly bus: MediaBus,
    options: PlayerFacadeOptions = {},
  ) {
    super();
    this._identity = identityFrom({}, id);
    this.callTimeoutMs =
      options.callTimeoutMs ?? PLAYER_FACADE_DEFAULTS.CALL_TIMEOUT_MS;
    this.refreshDelayMs =
      options.refreshDelayMs ?? PLAYER_FACADE_DEFAULTS.REFRESH_DELAY_MS;
  }

  /** Name the player reports for itself */
  get identity(): string {
    return this._identity;
  }

  get name(): string {
    return this.displayName ?? this._identity;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Document handed to the bus instead of the player's own introspection */
  protected introspectionXml(): string | undefined {
    return undefined;
  }

  protected supportsRateControl(properties: Record<string, unknown>): boolean {
    const minimum = toNumber(properties.MinimumRate);
    const maximum = toNumber(properties.MaximumRate);
    return (
      properties.CanControl === true &&
      minimum !== undefined &&
      maximum !== undefined &&
      maximum > minimum
    );
  }

  /** Track id usable with SetPosition, if the player reports a real one */
  protected seekTrackId(metadata: TrackMetadata): string | undefined {
    return metadata.trackId;
  }

  /**
   * Reads all properties of the player
   * @throws PlayerProbeError when the player does not answer
   */
  async probe(): Promise<void> {
    if (this.disposed) {
      throw new PlayerProbeError(`Player ${this.id} is gone`);
    }

    try {
      let object = this.object;
      if (!object) {
        object = await this.answer(
          'introspection',
          this.bus.getPlayerObject(this.id, this.introspectionXml()),
        );
        if (this.disposed) {
          object.dispose();
          throw new PlayerProbeError(`Player ${this.id} is gone`);
        }
        this.attach(object);
        this.object = object;
      }

      const [root, player] = await this.answer(
        'GetAll',
        Promise.all([
          object.getAll(MPRIS_ROOT_INTERFACE),
          object.getAll(MPRIS_PLAYER_INTERFACE),
        ]),
      );
      this._identity = identityFrom(root, this.id);
      this.properties = player;
      this.status = 'ok';
    } catch (error) {
      if (error instanceof PlayerProbeError) {
        throw error;
      }
      throw new PlayerProbeError(
        `Failed to probe ${this.id}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    this.update();
  }

  snapshot(): PlayerSnapshot {
    if (!this.current) {
      this.current = this.buildSnapshot();
    }
    return this.current;
  }

  /** Sets the display name, e.g. `VLC media player (2)` */
  assignName(name: string): void {
    this.displayName = name;
    this.update();
  }

  markDegraded(reason: string): void {
    log.warn(`Player ${this.id} is degraded: ${reason}`);
    this.status = 'degraded';
    this.update();
  }

  /**
   * Queues a command behind the ones already accepted
   * @throws CommandRejectedError
   */
  execute(command: PlayerCommand): Promise<void> {
    if (this.disposed) {
      return Promise.reject(
        new CommandRejectedError(`Player ${this.id} is gone`, 'not-found'),
      );
    }
    if (this.pendingCommands >= MAX_PENDING_COMMANDS) {
      return Promise.reject(
        new CommandRejectedError(
          `Player ${this.id} has ${this.pendingCommands} commands pending`,
          'player-busy',
        ),
      );
    }

    this.pendingCommands++;
    const run = this.commandChain
      .then(() => this.apply(command))
      .finally(() => {
        this.pendingCommands--;
      });
    // callers observe failures through `run`
    this.commandChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    if (this.refreshTimer) {
      clearTimeout(this.refreshTimer);
      this.refreshTimer = null;
    }
    this.object?.dispose();
    this.object = null;
  }

  protected handlePropertiesChanged(change: PropertiesChange): void {
    if (change.interfaceName !== MPRIS_PLAYER_INTERFACE) {
      return;
    }
    this.properties = applyPropertiesChange(
      this.properties,
      change.changed,
      change.invalidated,
    );
    this.update();
    this.scheduleRefresh();
  }

  private scheduleRefresh(): void {
    if (this.refreshTimer) {
      clearTimeout(this.refreshTimer);
    }
    this.refreshTimer = setTimeout(() => {
      this.refreshTimer = null;
      this.refresh().catch((error: unknown) => {
        log.debug(`Refresh of ${this.id} failed: ${errorMessage(error)}`);
      });
    }, this.refreshDelayMs);
  }

  /** Re-reads every player property */
  private async refresh(): Promise<void> {
    const object = this.object;
    if (!object || this.disposed) {
      return;
    }
    const properties = await this.answer(
      'GetAll',
      object.getAll(MPRIS_PLAYER_INTERFACE),
    );
    if (!this.disposed) {
      this.properties = properties;
      this.update();
    }
  }

  /** @throws PlayerTimeoutError when the player stays silent */
  private answer<T>(what: string, pending: Promise<T>): Promise<T> {
    return withTimeout(
      pending,
      this.callTimeoutMs,
      () =>
        new PlayerTimeoutError(
          `${this.id} did not answer ${what} within ${this.callTimeoutMs}ms`,
        ),
    );
  }

  private attach(object: BusPlayerObject): void {
    object.onPropertiesChanged((change) => this.handlePropertiesChanged(change));
    object.onSignal(MPRIS_PLAYER_INTERFACE, 'Seeked', (position) => {
      if (toNumber(position) !== undefined) {
        this.properties = { ...this.properties, Position: position };
        this.update();
      }
    });
  }

  private async apply(command: PlayerCommand): Promise<void> {
    const object = this.object;
    if (this.disposed || !object) {
      throw new CommandRejectedError(`Player ${this.id} is gone`, 'not-found');
    }
    if (!this.snapshot().capabilities.includes(command.action)) {
      throw new CommandRejectedError(
        `${this.name} does not support ${command.action}`,
        'unsupported',
      );
    }

    try {
      switch (command.action) {
        case 'seek':
          await this.seek(object, command.position);
          break;
        case 'set-rate':
          await this.setRate(object, command.rate);
          break;
        default:
          await this.answer(
            METHODS[command.action],
            object.call(MPRIS_PLAYER_INTERFACE, METHODS[command.action]),
          );
      }
    } catch (error) {
      if (error instanceof CommandRejectedError) {
        throw error;
      }
      throw new CommandRejectedError(
        `${command.action} failed on ${this.id}: ${errorMessage(error)}`,
        'failed',
        { cause: error },
      );
    }
  }

  private async seek(object: BusPlayerObject, position: number): Promise<void> {
    const metadata = normalizeMetadata(this.properties.Metadata);
    const target = Math.max(
      0,
      metadata.length !== undefined ? Math.min(position, metadata.length) : position,
    );
    const trackId = this.seekTrackId(metadata);

    if (trackId !== undefined) {
      await this.answer(
        'SetPosition',
        object.call(
          MPRIS_PLAYER_INTERFACE,
          'SetPosition',
          trackId,
          secondsToMicroseconds(target),
        ),
      );
    } else {
      const current =
        microsecondsToSeconds(
          await this.answer(
            'Position',
            object.getProperty(MPRIS_PLAYER_INTERFACE, 'Position'),
          ),
        ) ?? 0;
      await this.answer(
        'Seek',
        object.call(
          MPRIS_PLAYER_INTERFACE,
          'Seek',
          secondsToMicroseconds(target - current),
        ),
      );
    }
    this.properties = {
      ...this.properties,
      Position: secondsToMicroseconds(target),
    };
    this.update();
  }

  private async setRate(object: BusPlayerObject, rate: number): Promise<void> {
    const minimum = toNumber(this.properties.MinimumRate) ?? 1;
    const maximum = toNumber(this.properties.MaximumRate) ?? 1;
    if (rate < minimum || rate > maximum) {
      throw new CommandRejectedError(
        `Rate ${rate} is outside [${minimum}, ${maximum}] for ${this.name}`,
        'unsupported',
      );
    }
    await this.answer(
      'Rate',
      object.setProperty(MPRIS_PLAYER_INTERFACE, 'Rate', 'd', rate),
    );
    this.properties = { ...this.properties, Rate: rate };
    this.update();
  }

  private capabilities(): Capability[] {
    const properties = this.properties;
    if (this.status === 'degraded' || properties.CanControl === false) {
      return [];
    }
    const offered: Record<Capability, boolean> = {
      play: properties.CanPlay === true,
      pause: properties.CanPause === true,
      stop: properties.CanControl === true,
      next: properties.CanGoNext === true,
      previous: properties.CanGoPrevious === true,
      seek: properties.CanSeek === true,
      'set-rate': this.supportsRateControl(properties),
    };
    return CAPABILITIES.filter((capability) => offered[capability]);
  }

  private buildSnapshot(): PlayerSnapshot {
    const properties = this.properties;
    return {
      id: this.id,
      name: this.name,
      playbackState: normalizePlaybackStatus(properties.PlaybackStatus),
      metadata: normalizeMetadata(properties.Metadata),
      position: Math.max(0, microsecondsToSeconds(properties.Position) ?? 0),
      rate: toNumber(properties.Rate) ?? 1,
      capabilities: this.capabilities(),
      status: this.status,
      facade: this.kind,
    };
  }

  private update(): void {
    const next = this.buildSnapshot();
    if (this.current && isDeepStrictEqual(this.current, next)) {
      return;
    }
    this.current = next;
    if (!this.disposed) {
      this.emit('change', next);
    }
  }
}
