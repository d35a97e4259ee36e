/** Value passed as a method argument; 64-bit integers travel as bigint */
export type BusArgument = string | number | bigint | boolean;

export interface PropertiesChange {
  interfaceName: string;
  /** Changed values with variants already unwrapped */
  changed: Record<string, unknown>;
  invalidated: string[];
}

/** The object a player exports at the MPRIS object path */
export interface BusPlayerObject {
  getAll(interfaceName: string): Promise<Record<string, unknown>>;
  getProperty(interfaceName: string, name: string): Promise<unknown>;
  setProperty(
    interfaceName: string,
    name: string,
    signature: string,
    value: BusArgument,
  ): Promise<void>;
  call(
    interfaceName: string,
    method: string,
    ...args: BusArgument[]
  ): Promise<unknown>;
  onPropertiesChanged(listener: (change: PropertiesChange) => void): void;
  onSignal(
    interfaceName: string,
    signal: string,
    listener: (...args: unknown[]) => void,
  ): void;
  /** Detaches every listener registered through this object */
  dispose(): void;
}

export type NameOwnerChangedListener = (
  name: string,
  oldOwner: string,
  newOwner: string,
) => void;

/** Session bus operations the player layer depends on */
export interface MediaBus {
  listNames(): Promise<string[]>;
  getNameOwner(name: string): Promise<string | null>;
  onNameOwnerChanged(listener: NameOwnerChangedListener): void;
  onDisconnect(listener: (error?: Error) => void): void;
  /** Round trip to the bus daemon */
  ping(): Promise<void>;
  /**
   * @param introspectionXml - document used instead of asking the player,
   * for players that publish an incomplete one
   */
  getPlayerObject(
    busName: string,
    introspectionXml?: string,
  ): Promise<BusPlayerObject>;
  disconnect(): void;
}

export type MediaBusFactory = () => Promise<MediaBus>;
