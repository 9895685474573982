/**
 * D-Bus adapter
 *
 * Exports org.freedesktop.Notifications on the session bus and forwards
 * calls to the NotificationServer. Everything protocol-level lives in the
 * server; this file only converts wire types and errors.
 */

import * as dbus from 'dbus-next';
import { StartupError, getErrorMessage, isNotifluxError } from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';
import { decodeHints } from './hint-codec.js';
import type { NotificationServer, ServerSignal } from './notification-server.js';

export const NOTIFICATIONS_BUS_NAME = 'org.freedesktop.Notifications';
export const NOTIFICATIONS_OBJECT_PATH = '/org/freedesktop/Notifications';
export const INVALID_ARGS_ERROR = 'org.freedesktop.DBus.Error.InvalidArgs';
export const FAILED_ERROR = 'org.freedesktop.DBus.Error.Failed';

/** The slice of a dbus-next MessageBus this adapter uses. */
export interface NotificationBus {
  export(path: string, iface: dbus.interface.Interface): void;
  unexport(path: string, iface?: dbus.interface.Interface): void;
  requestName(name: string, flags: number): Promise<number>;
  releaseName(name: string): Promise<number>;
  disconnect(): void;
}

function toDBusError(err: unknown): dbus.DBusError {
  if (isNotifluxError(err) && err.code === 'protocol') {
    return new dbus.DBusError(INVALID_ARGS_ERROR, err.message);
  }
  return new dbus.DBusError(FAILED_ERROR, getErrorMessage(err));
}

// ============================================================
// Interface
// ============================================================

export class NotificationsInterface extends dbus.interface.Interface {
  private server: NotificationServer;
  private logger: Logger;

  constructor(server: NotificationServer, logger: Logger) {
    super(NOTIFICATIONS_BUS_NAME);
    this.server = server;
    this.logger = logger;
  }

  Notify(
    appName: string,
    replacesId: number,
    appIcon: string,
    summary: string,
    body: string,
    actions: string[],
    rawHints: unknown,
    expireTimeout: number,
  ): number {
    const { hints, dropped } = decodeHints(rawHints);
    if (dropped.length > 0) {
      this.logger.debug(`Dropped undecodable hints from ${appName}: ${dropped.join(', ')}`);
    }
    try {
      return this.server.notify({ appName, replacesId, appIcon, summary, body, actions, hints, expireTimeout });
    } catch (err) {
      throw toDBusError(err);
    }
  }

  CloseNotification(id: number): void {
    try {
      this.server.closeNotification(id);
    } catch (err) {
      throw toDBusError(err);
    }
  }

  GetCapabilities(): string[] {
    return this.server.getCapabilities();
  }

  GetServerInformation(): string[] {
    const info = this.server.getServerInformation();
    return [info.name, info.vendor, info.version, info.specVersion];
  }

  // Signals: the return value is what goes on the wire.

  NotificationClosed(id: number, reason: number): number[] {
    return [id, reason];
  }

  ActionInvoked(id: number, actionKey: string): Array<number | string> {
    return [id, actionKey];
  }
}

NotificationsInterface.configureMembers({
  methods: {
    Notify: { inSignature: 'susssasa{sv}i', outSignature: 'u' },
    CloseNotification: { inSignature: 'u', outSignature: '' },
    GetCapabilities: { inSignature: '', outSignature: 'as' },
    GetServerInformation: { inSignature: '', outSignature: 'ssss' },
  },
  signals: {
    NotificationClosed: { signature: 'uu' },
    ActionInvoked: { signature: 'us' },
  },
});

// ============================================================
// Service
// ============================================================

export interface DbusServiceConfig {
  server: NotificationServer;
  /** Defaults to a session bus connection. */
  connect?: () => NotificationBus;
  logger?: Logger;
}

export class DbusService {
  readonly iface: NotificationsInterface;
  private connect: () => NotificationBus;
  private bus: NotificationBus | null = null;
  private logger: Logger;

  constructor(config: DbusServiceConfig) {
    this.logger = config.logger ?? createLogger({ silent: true });
    this.connect = config.connect ?? (() => dbus.sessionBus());
    this.iface = new NotificationsInterface(config.server, this.logger);
  }

  private get log() { return this.logger.log.bind(this.logger); }

  /**
   * Connect, export the interface and take the well-known name.
   * @throws StartupError when the bus is unreachable or the name is taken
   */
  async start(): Promise<void> {
    let bus: NotificationBus;
    try {
      bus = this.connect();
    } catch (err) {
      throw new StartupError(`cannot connect to the session bus: ${getErrorMessage(err)}`, { cause: err });
    }
    bus.export(NOTIFICATIONS_OBJECT_PATH, this.iface);

    let reply: number;
    try {
      reply = await bus.requestName(NOTIFICATIONS_BUS_NAME, dbus.NameFlag.DO_NOT_QUEUE);
    } catch (err) {
      bus.disconnect();
      throw new StartupError(`cannot request ${NOTIFICATIONS_BUS_NAME}: ${getErrorMessage(err)}`, { cause: err });
    }
    if (reply !== dbus.RequestNameReply.PRIMARY_OWNER && reply !== dbus.RequestNameReply.ALREADY_OWNER) {
      bus.disconnect();
      throw new StartupError(`${NOTIFICATIONS_BUS_NAME} is owned by another notification daemon`);
    }
    this.bus = bus;
    this.log(`Owning ${NOTIFICATIONS_BUS_NAME} on the session bus`);
  }

  /** Forward a server signal onto the bus. Non-protocol signals are ignored. */
  emit(signal: ServerSignal): void {
    if (!this.bus) return;
    switch (signal.type) {
      case 'notification_closed':
        this.iface.NotificationClosed(signal.id, signal.reason);
        break;
      case 'action_invoked':
        this.iface.ActionInvoked(signal.id, signal.actionKey);
        break;
      case 'notification_added':
        break;
    }
  }

  async stop(): Promise<void> {
    const bus = this.bus;
    if (!bus) return;
    this.bus = null;
    try {
      await bus.releaseName(NOTIFICATIONS_BUS_NAME);
    } catch (err) {
      this.logger.warn(`Failed to release ${NOTIFICATIONS_BUS_NAME}: ${getErrorMessage(err)}`);
    }
    bus.unexport(NOTIFICATIONS_OBJECT_PATH, this.iface);
    bus.disconnect();
  }
}
