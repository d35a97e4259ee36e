/** Name of the per-user strongbox container holding agent state */
export const STRONGBOX_CONTAINER_NAME = 'media-relay-agent';

export const TRUST_RECORDS_FILE = 'trust-records.json';

export const DEFAULT_BIND_ADDRESS = '0.0.0.0';
export const DEFAULT_RELAY_PORT = 40051;
export const DEFAULT_PAIRING_PORT = 40052;

export const MPRIS_BUS_PREFIX = 'org.mpris.MediaPlayer2.';
export const MPRIS_OBJECT_PATH = '/org/mpris/MediaPlayer2';
export const MPRIS_ROOT_INTERFACE = 'org.mpris.MediaPlayer2';
export const MPRIS_PLAYER_INTERFACE = 'org.mpris.MediaPlayer2.Player';
export const DBUS_PROPERTIES_INTERFACE = 'org.freedesktop.DBus.Properties';

export const MDNS_SERVICE_TYPE = '_mediarelay._tcp';
