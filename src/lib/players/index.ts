export type {
  BusArgument,
  BusPlayerObject,
  MediaBus,
  MediaBusFactory,
  NameOwnerChangedListener,
  PropertiesChange,
} from './bus.js';
export { DbusMediaBus, unwrapVariant } from './dbus-media-bus.js';
export {
  ChromiumFacade,
  MAX_PENDING_COMMANDS,
  MprisFacade,
  PLAYER_FACADE_DEFAULTS,
  PlayerFacade,
  VlcFacade,
  createFacade,
  selectFacade,
  type PlayerFacadeOptions,
} from './facades/index.js';
export { mprisIntrospectionXml } from './introspection.js';
export {
  PLAYER_MONITOR_DEFAULTS,
  PlayerMonitor,
  isMprisName,
  type PlayerMonitorOptions,
} from './player-monitor.js';
export {
  CAPABILITIES,
  type Capability,
  type FacadeKind,
  type PlaybackState,
  type PlayerCommand,
  type PlayerEvent,
  type PlayerSnapshot,
  type PlayerStatus,
  type TrackMetadata,
} from './types.js';
