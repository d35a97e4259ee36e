import { mprisIntrospectionXml } from '../introspection.js';
import type { TrackMetadata } from '../types.js';
import { PlayerFacade } from './player-facade.js';

const NO_TRACK_SUFFIX = '/NoTrack';

/**
 * Chromium-based browsers publish no introspection data and expose a rate
 * they do not honour.
 */
export class ChromiumFacade extends PlayerFacade {
  readonly kind = 'chromium';

  protected introspectionXml(): string {
    return mprisIntrospectionXml();
  }

  protected supportsRateControl(): boolean {
    return false;
  }

  protected seekTrackId(metadata: TrackMetadata): string | undefined {
    const trackId = metadata.trackId;
    return trackId && !trackId.endsWith(NO_TRACK_SUFFIX) ? trackId : undefined;
  }
}
