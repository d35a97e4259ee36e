import { MPRIS_BUS_PREFIX } from '../../../constants.js';
import type { MediaBus } from '../bus.js';
import type { FacadeKind } from '../types.js';
import { ChromiumFacade } from './chromium-facade.js';
import { MprisFacade } from './mpris-facade.js';
import type { PlayerFacade, PlayerFacadeOptions } from './player-facade.js';
import { VlcFacade } from './vlc-facade.js';

const CHROMIUM_PREFIXES = ['chromium', 'chrome', 'brave'];
const VLC_PREFIXES = ['vlc'];

/** Picks the façade variant for a bus name; the choice never changes afterwards */
export function selectFacade(busName: string): FacadeKind {
  if (!busName.startsWith(MPRIS_BUS_PREFIX)) {
    return 'mpris';
  }
  const suffix = busName.slice(MPRIS_BUS_PREFIX.length).toLowerCase();
  if (CHROMIUM_PREFIXES.some((prefix) => suffix.startsWith(prefix))) {
    return 'chromium';
  }
  if (VLC_PREFIXES.some((prefix) => suffix.startsWith(prefix))) {
    return 'vlc';
  }
  return 'mpris';
}

export function createFacade(
  busName: string,
  bus: MediaBus,
  options: PlayerFacadeOptions = {},
): PlayerFacade {
  switch (selectFacade(busName)) {
    case 'chromium':
      return new ChromiumFacade(busName, bus, options);
    case 'vlc':
      return new VlcFacade(busName, bus, options);
    case 'mpris':
      return new MprisFacade(busName, bus, options);
  }
}

export { ChromiumFacade } from './chromium-facade.js';
export { MprisFacade } from './mpris-facade.js';
export {
  MAX_PENDING_COMMANDS,
  PLAYER_FACADE_DEFAULTS,
  PlayerFacade,
  type PlayerFacadeOptions,
} from './player-facade.js';
export { VlcFacade } from './vlc-facade.js';
