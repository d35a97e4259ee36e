import type { ClientInterface, MessageBus, ProxyObject } from 'dbus-next';
import dbus from 'dbus-next';

import {
  DBUS_PROPERTIES_INTERFACE,
  MPRIS_OBJECT_PATH,
} from '../../constants.js';
import { BusUnavailableError, MediaRelayError, errorMessage } from '../errors.js';
import { getLogger } from '../logger.js';
import { withTimeout } from '../retry.js';
import type {
  BusArgument,
  BusPlayerObject,
  MediaBus,
  NameOwnerChangedListener,
  PropertiesChange,
} from './bus.js';
import { isRecord } from './normalize.js';

const log = getLogger('DbusMediaBus');

const DBUS_SERVICE = 'org.freedesktop.DBus';
const DBUS_PATH = '/org/freedesktop/DBus';
const CONNECT_TIMEOUT_MS = 5000;

/** Replaces variants, however deeply nested, by their values */
export function unwrapVariant(value: unknown): unknown {
  if (value instanceof dbus.Variant) {
    return unwrapVariant(value.value);
  }
  if (Array.isArray(value)) {
    return value.map(unwrapVariant);
  }
  if (isRecord(value) && !Buffer.isBuffer(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, unwrapVariant(item)]),
    );
  }
  return value;
}

async function invoke(
  iface: ClientInterface,
  method: string,
  args: unknown[],
): Promise<unknown> {
  const member: unknown = Reflect.get(iface, method);
  if (typeof member !== 'function') {
    throw new MediaRelayError(`Method ${method} is not available`);
  }
  const result: unknown = await Reflect.apply(member, iface, args);
  return result;
}

interface Subscription {
  iface: ClientInterface;
  event: string;
  handler: (...args: unknown[]) => void;
}

class DbusPlayerObject implements BusPlayerObject {
  private readonly subscriptions: Subscription[] = [];

  constructor(private readonly proxy: ProxyObject) {}

  async getAll(interfaceName: string): Promise<Record<string, unknown>> {
    const result = unwrapVariant(
      await invoke(this.iface(DBUS_PROPERTIES_INTERFACE), 'GetAll', [
        interfaceName,
      ]),
    );
    return isRecord(result) ? result : {};
  }

  async getProperty(interfaceName: string, name: string): Promise<unknown> {
    return unwrapVariant(
      await invoke(this.iface(DBUS_PROPERTIES_INTERFACE), 'Get', [
        interfaceName,
        name,
      ]),
    );
  }

  async setProperty(
    interfaceName: string,
    name: string,
    signature: string,
    value: BusArgument,
  ): Promise<void> {
    await invoke(this.iface(DBUS_PROPERTIES_INTERFACE), 'Set', [
      interfaceName,
      name,
      new dbus.Variant(signature, value),
    ]);
  }

  call(
    interfaceName: string,
    method: string,
    ...args: BusArgument[]
  ): Promise<unknown> {
    return invoke(this.iface(interfaceName), method, args);
  }

  onPropertiesChanged(listener: (change: PropertiesChange) => void): void {
    this.subscribe(
      this.iface(DBUS_PROPERTIES_INTERFACE),
      'PropertiesChanged',
      (interfaceName, changed, invalidated) => {
        const values = unwrapVariant(changed);
        listener({
          interfaceName: String(interfaceName),
          changed: isRecord(values) ? values : {},
          invalidated: Array.isArray(invalidated)
            ? invalidated.filter((name): name is string => typeof name === 'string')
            : [],
        });
      },
    );
  }

  onSignal(
    interfaceName: string,
    signal: string,
    listener: (...args: unknown[]) => void,
  ): void {
    this.subscribe(this.iface(interfaceName), signal, (...args) => {
      listener(...args.map(unwrapVariant));
    });
  }

  dispose(): void {
    for (const { iface, event, handler } of this.subscriptions.splice(0)) {
      iface.removeListener(event, handler);
    }
  }

  private subscribe(
    iface: ClientInterface,
    event: string,
    handler: (...args: unknown[]) => void,
  ): void {
    iface.on(event, handler);
    this.subscriptions.push({ iface, event, handler });
  }

  private iface(name: string): ClientInterface {
    const iface: ClientInterface | undefined = this.proxy.interfaces[name];
    if (!iface) {
      throw new MediaRelayError(`${this.proxy.name} does not export ${name}`);
    }
    return iface;
  }
}

/** `MediaBus` over the user's D-Bus session bus */
export class DbusMediaBus implements MediaBus {
  private readonly disconnectListeners: Array<(error?: Error) => void> = [];
  private disconnected = false;

  private constructor(
    private readonly bus: MessageBus,
    private readonly daemon: ClientInterface,
  ) {}

  /** @throws BusUnavailableError when the session bus cannot be reached */
  static async connect(): Promise<DbusMediaBus> {
    let bus: MessageBus;
    try {
      bus = dbus.sessionBus();
    } catch (error) {
      throw new BusUnavailableError(
        `Cannot open the session bus: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    let connectError: Error | null = null;
    const onEarlyError = (error: Error): void => {
      connectError = error;
    };
    bus.on('error', onEarlyError);

    try {
      const proxy = await withTimeout(
        bus.getProxyObject(DBUS_SERVICE, DBUS_PATH),
        CONNECT_TIMEOUT_MS,
        () =>
          new BusUnavailableError(
            connectError
              ? `Session bus connection failed: ${connectError.message}`
              : `No session bus answer within ${CONNECT_TIMEOUT_MS}ms`,
          ),
      );
      const mediaBus = new DbusMediaBus(bus, proxy.getInterface(DBUS_SERVICE));
      bus.removeListener('error', onEarlyError);
      bus.on('error', (error: Error) => mediaBus.handleDisconnect(error));
      return mediaBus;
    } catch (error) {
      bus.removeListener('error', onEarlyError);
      bus.on('error', (lateError: Error) => {
        log.debug(`Ignoring error on abandoned bus: ${lateError.message}`);
      });
      bus.disconnect();
      if (error instanceof BusUnavailableError) {
        throw error;
      }
      throw new BusUnavailableError(
        `Cannot reach the session bus: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  async listNames(): Promise<string[]> {
    const names = await invoke(this.daemon, 'ListNames', []);
    return Array.isArray(names)
      ? names.filter((name): name is string => typeof name === 'string')
      : [];
  }

  async getNameOwner(name: string): Promise<string | null> {
    try {
      const owner = await invoke(this.daemon, 'GetNameOwner', [name]);
      return typeof owner === 'string' ? owner : null;
    } catch (error) {
      if (error instanceof dbus.DBusError) {
        return null;
      }
      throw error;
    }
  }

  onNameOwnerChanged(listener: NameOwnerChangedListener): void {
    this.daemon.on(
      'NameOwnerChanged',
      (name: unknown, oldOwner: unknown, newOwner: unknown) => {
        if (
          typeof name === 'string' &&
          typeof oldOwner === 'string' &&
          typeof newOwner === 'string'
        ) {
          listener(name, oldOwner, newOwner);
        }
      },
    );
  }

  onDisconnect(listener: (error?: Error) => void): void {
    this.disconnectListeners.push(listener);
  }

  async ping(): Promise<void> {
    await invoke(this.daemon, 'GetId', []);
  }

  async getPlayerObject(
    busName: string,
    introspectionXml?: string,
  ): Promise<BusPlayerObject> {
    const proxy = await this.bus.getProxyObject(
      busName,
      MPRIS_OBJECT_PATH,
      introspectionXml,
    );
    return new DbusPlayerObject(proxy);
  }

  disconnect(): void {
    if (this.disconnected) {
      return;
    }
    this.disconnected = true;
    this.daemon.removeAllListeners('NameOwnerChanged');
    this.bus.disconnect();
  }

  private handleDisconnect(error: Error): void {
    if (this.disconnected) {
      return;
    }
    log.warn(`Session bus connection lost: ${error.message}`);
    this.disconnected = true;
    for (const listener of this.disconnectListeners) {
      listener(error);
    }
  }
}
