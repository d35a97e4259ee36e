import { mprisIntrospectionXml } from '../introspection.js';
import { PlayerFacade } from './player-facade.js';

/** VLC emits `Seeked` and a track list without declaring them */
export class VlcFacade extends PlayerFacade {
  readonly kind = 'vlc';

  protected introspectionXml(): string {
    return mprisIntrospectionXml({ trackList: true });
  }
}
