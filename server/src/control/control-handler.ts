/**
 * Control Handler
 *
 * Executes parsed control commands against the daemon's owners. Transport
 * agnostic: the socket server feeds it lines and writes back whatever
 * response this produces.
 */

import {
  getErrorMessage,
  isNotifluxError,
  parseControlRequest,
  toNotificationView,
} from '@notiflux/core';
import type {
  ControlCommand,
  ControlResponse,
  ControlResult,
  ControlState,
  DndStatus,
  Notification,
} from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';
import type { NotificationServer } from '../protocol/notification-server.js';
import type { PanelState } from '../panel/panel-state.js';

export interface DndControl {
  status(): DndStatus;
  toggleManual(): DndStatus;
  setManual(enabled: boolean): DndStatus;
}

export interface ControlHandlerConfig {
  server: NotificationServer;
  dnd: DndControl;
  panel: PanelState;
  configVersion: () => number;
  logger?: Logger;
}

const ACK: ControlResult = { kind: 'ack' };

export class ControlHandler {
  private server: NotificationServer;
  private dnd: DndControl;
  private panel: PanelState;
  private configVersion: () => number;
  private logger: Logger;

  constructor(config: ControlHandlerConfig) {
    this.server = config.server;
    this.dnd = config.dnd;
    this.panel = config.panel;
    this.configVersion = config.configVersion;
    this.logger = config.logger ?? createLogger({ silent: true });
  }

  private get debug() { return this.logger.debug.bind(this.logger); }

  /** Parse and execute one request line. Never throws. */
  handleLine(line: string): ControlResponse {
    let command: ControlCommand;
    try {
      command = parseControlRequest(line);
    } catch (err) {
      return this.failure(err);
    }
    return this.handle(command);
  }

  handle(command: ControlCommand): ControlResponse {
    this.debug(`Control: ${command.command}`);
    try {
      return { ok: true, result: this.execute(command) };
    } catch (err) {
      // Unknown ids are not an error for the caller.
      if (isNotifluxError(err) && err.code === 'not-found') {
        this.debug(`Control ${command.command}: ${err.message}`);
        return { ok: true, result: ACK };
      }
      return this.failure(err);
    }
  }

  getState(): ControlState {
    return {
      dnd: this.dnd.status(),
      counts: this.server.history.counts(),
      panelVisible: this.panel.isVisible(),
      configVersion: this.configVersion(),
    };
  }

  private execute(command: ControlCommand): ControlResult {
    switch (command.command) {
      case 'open-panel':
        this.panel.request('open');
        return ACK;
      case 'close-panel':
        this.panel.request('close');
        return ACK;
      case 'toggle-panel':
        this.panel.request('toggle');
        return ACK;
      case 'set-panel-visible':
        this.panel.setVisible(command.visible);
        return ACK;
      case 'toggle-dnd':
        return { kind: 'dnd', status: this.dnd.toggleManual() };
      case 'set-dnd':
        return { kind: 'dnd', status: this.dnd.setManual(command.enabled) };
      case 'clear-history':
        this.server.clearAll();
        return ACK;
      case 'list-active':
        return this.views(this.server.history.list({ state: 'active' }), command.full);
      case 'list-history':
        return this.views(this.server.history.list({ limit: command.limit }), command.full);
      case 'dismiss':
        this.server.dismiss(command.id);
        return ACK;
      case 'invoke-action':
        this.server.invokeAction(command.id, command.action);
        return ACK;
      case 'get-state':
        return { kind: 'state', state: this.getState() };
    }
  }

  private views(entries: Notification[], full: boolean): ControlResult {
    return {
      kind: 'notifications',
      notifications: entries.map((entry) => toNotificationView(entry, { includeBody: full })),
    };
  }

  private failure(err: unknown): ControlResponse {
    const code = isNotifluxError(err) ? err.code : 'internal';
    if (code === 'internal') {
      this.logger.error(`Control command failed: ${getErrorMessage(err)}`);
    }
    return { ok: false, error: { code, message: getErrorMessage(err) } };
  }
}
