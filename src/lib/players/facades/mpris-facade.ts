import { PlayerFacade } from './player-facade.js';

/** Player that follows the MPRIS interface as published */
export class MprisFacade extends PlayerFacade {
  readonly kind = 'mpris';
}
