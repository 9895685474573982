/**
 * State events published to UI clients.
 *
 * The daemon batches these per tick and sends them over the state socket.
 */

import type { CloseReasonName, HistoryCounts, NotificationView } from '../notifications/types.js';

export type DndMode = 'off' | 'manual-on' | 'scheduled-on';

export interface DndStatus {
  mode: DndMode;
  active: boolean;
  manual: boolean;
  /** A configured window currently covers this moment. */
  scheduled: boolean;
}

export type WatcherValue =
  | { kind: 'text'; text: string }
  | { kind: 'toggle'; on: boolean }
  | { kind: 'percent'; percent: number; muted: boolean }
  | { kind: 'json'; data: unknown };

export interface WatcherResultView {
  id: string;
  value: WatcherValue | null;
  raw: string;
  updatedAt: number | null;
  stale: boolean;
  error: string | null;
}

export type HistoryChangeKind = 'added' | 'replaced' | 'repeated' | 'closed' | 'removed' | 'cleared' | 'evicted' | 'seen';

export type PanelRequest = 'open' | 'close' | 'toggle';

export type StateEvent =
  | { type: 'history_changed'; kinds: HistoryChangeKind[]; ids: number[]; counts: HistoryCounts }
  | { type: 'notification_added'; notification: NotificationView }
  | { type: 'notification_closed'; id: number; reason: CloseReasonName }
  | { type: 'action_invoked'; id: number; actionKey: string }
  | { type: 'dnd_changed'; status: DndStatus }
  | { type: 'watcher_updated'; results: WatcherResultView[] }
  | { type: 'config_reloaded'; version: number }
  | { type: 'config_reload_failed'; error: string }
  | { type: 'theme_reloaded'; assets: string[] }
  | { type: 'panel_requested'; request: PanelRequest };

export type StateEventType = StateEvent['type'];

export interface InitialState {
  history: NotificationView[];
  counts: HistoryCounts;
  dnd: DndStatus;
  watchers: WatcherResultView[];
  panelVisible: boolean;
  configVersion: number;
}

/** Messages sent from the daemon over the state socket. */
export type StateServerMessage =
  | { type: 'initial_state'; state: InitialState }
  | { type: 'state_events'; events: StateEvent[] }
  | { type: 'history'; history: NotificationView[] }
  | { type: 'watchers'; watchers: WatcherResultView[] }
  | { type: 'icon'; id: number; size: number; icon: IconPayload | null }
  | { type: 'theme'; assets: ThemeAssetPayload[]; errors: ThemeErrorPayload[] }
  | { type: 'error'; message: string };

/** Decoded notification icon; `rgba` is base64 of width*height*4 bytes. */
export interface IconPayload {
  width: number;
  height: number;
  rgba: string;
}

export interface ThemeAssetPayload {
  name: string;
  css: string;
}

export interface ThemeErrorPayload {
  name: string;
  path: string;
  error: string;
}

/** Messages UI clients may send over the state socket. */
export type StateClientMessage =
  | { type: 'get_history'; full?: boolean }
  | { type: 'get_watchers' }
  | { type: 'get_icon'; id: number; size?: number }
  | { type: 'get_theme' }
  | { type: 'panel_visibility'; visible: boolean };
