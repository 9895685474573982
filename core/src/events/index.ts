/**
 * @notiflux/core/events — barrel export
 */

export type {
  DndMode,
  DndStatus,
  WatcherValue,
  WatcherResultView,
  HistoryChangeKind,
  PanelRequest,
  StateEvent,
  StateEventType,
  InitialState,
  StateServerMessage,
  StateClientMessage,
  IconPayload,
  ThemeAssetPayload,
  ThemeErrorPayload,
} from './types.js';
