/**
 * Panel State
 *
 * The daemon does not draw the panel; it tracks whether the UI reports it
 * as visible and forwards open/close requests to the UI. Visibility drives
 * the watchers (they only run while the panel is up) and read state.
 */

import type { PanelRequest } from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';

export interface PanelStateConfig {
  /** Called on every visibility transition. */
  onVisibilityChange?: (visible: boolean) => void;
  /** Called with the resolved request so the UI can act on it. */
  onRequest?: (request: Exclude<PanelRequest, 'toggle'>) => void;
  logger?: Logger;
}

export class PanelState {
  private visible = false;
  private onVisibilityChange?: (visible: boolean) => void;
  private onRequest?: (request: Exclude<PanelRequest, 'toggle'>) => void;
  private logger: Logger;

  constructor(config: PanelStateConfig = {}) {
    this.onVisibilityChange = config.onVisibilityChange;
    this.onRequest = config.onRequest;
    this.logger = config.logger ?? createLogger({ silent: true });
  }

  isVisible(): boolean {
    return this.visible;
  }

  /**
   * Ask the UI to open or close the panel. Visibility is updated right away;
   * the UI confirms later through `setVisible`.
   */
  request(request: PanelRequest): boolean {
    const resolved = request === 'toggle' ? (this.visible ? 'close' : 'open') : request;
    this.onRequest?.(resolved);
    this.setVisible(resolved === 'open');
    return this.visible;
  }

  /** Visibility as reported by the UI. */
  setVisible(visible: boolean): void {
    if (visible === this.visible) return;
    this.visible = visible;
    this.logger.debug(`Panel ${visible ? 'shown' : 'hidden'}`);
    this.onVisibilityChange?.(visible);
  }
}
