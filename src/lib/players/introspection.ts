const DOCTYPE =
  '<!DOCTYPE node PUBLIC "-//freedesktop//DTD D-BUS Object Introspection 1.0//EN"\n' +
  '"http://www.freedesktop.org/standards/dbus/1.0/introspect.dtd">';

const PROPERTIES_INTERFACE = `  <interface name="org.freedesktop.DBus.Properties">
    <method name="Get">
      <arg direction="in" type="s"/>
      <arg direction="in" type="s"/>
      <arg direction="out" type="v"/>
    </method>
    <method name="Set">
      <arg direction="in" type="s"/>
      <arg direction="in" type="s"/>
      <arg direction="in" type="v"/>
    </method>
    <method name="GetAll">
      <arg direction="in" type="s"/>
      <arg direction="out" type="a{sv}"/>
    </method>
    <signal name="PropertiesChanged">
      <arg type="s"/>
      <arg type="a{sv}"/>
      <arg type="as"/>
    </signal>
  </interface>`;

const ROOT_INTERFACE = `  <interface name="org.mpris.MediaPlayer2">
    <property name="Identity" type="s" access="read"/>
    <property name="DesktopEntry" type="s" access="read"/>
    <property name="SupportedMimeTypes" type="as" access="read"/>
    <property name="SupportedUriSchemes" type="as" access="read"/>
    <property name="HasTrackList" type="b" access="read"/>
    <property name="CanQuit" type="b" access="read"/>
    <property name="CanRaise" type="b" access="read"/>
    <method name="Quit"/>
    <method name="Raise"/>
  </interface>`;

const PLAYER_INTERFACE = `  <interface name="org.mpris.MediaPlayer2.Player">
    <property name="Metadata" type="a{sv}" access="read"/>
    <property name="PlaybackStatus" type="s" access="read"/>
    <property name="LoopStatus" type="s" access="readwrite"/>
    <property name="Volume" type="d" access="readwrite"/>
    <property name="Shuffle" type="b" access="readwrite"/>
    <property name="Position" type="x" access="read"/>
    <property name="Rate" type="d" access="readwrite"/>
    <property name="MinimumRate" type="d" access="read"/>
    <property name="MaximumRate" type="d" access="read"/>
    <property name="CanControl" type="b" access="read"/>
    <property name="CanPlay" type="b" access="read"/>
    <property name="CanPause" type="b" access="read"/>
    <property name="CanSeek" type="b" access="read"/>
    <property name="CanGoNext" type="b" access="read"/>
    <property name="CanGoPrevious" type="b" access="read"/>
    <method name="Next"/>
    <method name="Previous"/>
    <method name="Pause"/>
    <method name="PlayPause"/>
    <method name="Stop"/>
    <method name="Play"/>
    <method name="Seek">
      <arg type="x" direction="in"/>
    </method>
    <method name="SetPosition">
      <arg type="o" direction="in"/>
      <arg type="x" direction="in"/>
    </method>
    <method name="OpenUri">
      <arg type="s" direction="in"/>
    </method>
    <signal name="Seeked">
      <arg type="x"/>
    </signal>
  </interface>`;

const TRACK_LIST_INTERFACE = `  <interface name="org.mpris.MediaPlayer2.TrackList">
    <property name="Tracks" type="ao" access="read"/>
    <property name="CanEditTracks" type="b" access="read"/>
    <method name="GetTracksMetadata">
      <arg type="ao" direction="in"/>
      <arg type="aa{sv}" direction="out"/>
    </method>
    <method name="GoTo">
      <arg type="o" direction="in"/>
    </method>
    <signal name="TrackListReplaced">
      <arg type="ao"/>
      <arg type="o"/>
    </signal>
  </interface>`;

export interface IntrospectionOptions {
  trackList?: boolean;
}

/**
 * Introspection document of a complete MPRIS player, `Seeked` included,
 * handed to the bus for players that publish none or an incomplete one
 */
export function mprisIntrospectionXml(options: IntrospectionOptions = {}): string {
  const interfaces = [PROPERTIES_INTERFACE, ROOT_INTERFACE, PLAYER_INTERFACE];
  if (options.trackList) {
    interfaces.push(TRACK_LIST_INTERFACE);
  }
  return `${DOCTYPE}\n<node>\n${interfaces.join('\n')}\n</node>\n`;
}
