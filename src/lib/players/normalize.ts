import type { PlaybackState, TrackMetadata } from './types.js';

const MICROSECONDS_PER_SECOND = 1_000_000;

/** Capability flags read as false once the player invalidates them */
export const CAN_PROPERTIES = [
  'CanControl',
  'CanPause',
  'CanPlay',
  'CanSeek',
  'CanGoNext',
  'CanGoPrevious',
] as const;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Accepts the number or bigint a 64-bit bus integer may arrive as */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return undefined;
}

export function microsecondsToSeconds(value: unknown): number | undefined {
  const micros = toNumber(value);
  return micros === undefined ? undefined : micros / MICROSECONDS_PER_SECOND;
}

export function secondsToMicroseconds(seconds: number): bigint {
  return BigInt(Math.round(seconds * MICROSECONDS_PER_SECOND));
}

export function normalizePlaybackStatus(value: unknown): PlaybackState {
  switch (value) {
    case 'Playing':
      return 'playing';
    case 'Paused':
      return 'paused';
    default:
      return 'stopped';
  }
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function joinNames(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    const names = value.filter(
      (name): name is string => typeof name === 'string' && name.length > 0,
    );
    return names.length > 0 ? names.join(', ') : undefined;
  }
  return nonEmptyString(value);
}

export function normalizeMetadata(value: unknown): TrackMetadata {
  if (!isRecord(value)) {
    return {};
  }
  const metadata: TrackMetadata = {};
  const title = nonEmptyString(value['xesam:title']);
  const artist = joinNames(value['xesam:artist']);
  const album = nonEmptyString(value['xesam:album']);
  const length = microsecondsToSeconds(value['mpris:length']);
  const trackId = nonEmptyString(value['mpris:trackid']);
  const artUrl = nonEmptyString(value['mpris:artUrl']);

  if (title !== undefined) {
    metadata.title = title;
  }
  if (artist !== undefined) {
    metadata.artist = artist;
  }
  if (album !== undefined) {
    metadata.album = album;
  }
  if (length !== undefined && length > 0) {
    metadata.length = length;
  }
  if (trackId !== undefined) {
    metadata.trackId = trackId;
  }
  if (artUrl !== undefined) {
    metadata.artUrl = artUrl;
  }
  return metadata;
}

/**
 * Applies a PropertiesChanged notification to the known player properties.
 * Invalidated values fall back to what a stopped, incapable player reports.
 */
export function applyPropertiesChange(
  properties: Record<string, unknown>,
  changed: Record<string, unknown>,
  invalidated: readonly string[],
): Record<string, unknown> {
  const next: Record<string, unknown> = { ...properties, ...changed };
  for (const name of invalidated) {
    if (name in changed) {
      continue;
    }
    if (name === 'PlaybackStatus') {
      next[name] = 'Stopped';
    } else if (name === 'Metadata') {
      next[name] = {};
    } else if (CAN_PROPERTIES.some((can) => can === name)) {
      next[name] = false;
    } else {
      delete next[name];
    }
  }
  return next;
}
