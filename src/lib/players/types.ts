export type PlaybackState = 'playing' | 'paused' | 'stopped';

export type Capability =
  | 'play'
  | 'pause'
  | 'stop'
  | 'next'
  | 'previous'
  | 'seek'
  | 'set-rate';

/** Stable order in which capabilities are reported */
export const CAPABILITIES: readonly Capability[] = [
  'play',
  'pause',
  'stop',
  'next',
  'previous',
  'seek',
  'set-rate',
];

export type FacadeKind = 'mpris' | 'chromium' | 'vlc';

export type PlayerStatus = 'ok' | 'degraded';

export interface TrackMetadata {
  title?: string;
  artist?: string;
  album?: string;
  /** Seconds */
  length?: number;
  trackId?: string;
  artUrl?: string;
}

export interface PlayerSnapshot {
  /** Well-known bus name of the player */
  id: string;
  /** Display name, unique among present players */
  name: string;
  playbackState: PlaybackState;
  metadata: TrackMetadata;
  /** Seconds */
  position: number;
  rate: number;
  capabilities: Capability[];
  status: PlayerStatus;
  facade: FacadeKind;
}

export type PlayerCommand =
  | { action: 'play' | 'pause' | 'stop' | 'next' | 'previous' }
  | { action: 'seek'; position: number }
  | { action: 'set-rate'; rate: number };

export type PlayerEvent =
  | { type: 'player-appeared'; player: PlayerSnapshot }
  | { type: 'player-disappeared'; playerId: string }
  | { type: 'state-changed'; player: PlayerSnapshot };
