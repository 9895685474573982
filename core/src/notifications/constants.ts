/**
 * Notification constants shared by the daemon and clients.
 */

import { CloseReason } from './types.js';
import type { CloseReasonName } from './types.js';

/** Protocol version reported by GetServerInformation. */
export const PROTOCOL_VERSION = '1.2';

export const SERVER_NAME = 'notiflux';
export const SERVER_VENDOR = 'notiflux';

/** Capabilities advertised regardless of config. */
export const BASE_CAPABILITIES: readonly string[] = [
  'actions',
  'body',
  'body-markup',
  'icon-static',
  'persistence',
];

export const SOUND_CAPABILITY = 'sound';

/** Fallback app name for senders that leave it empty. */
export const UNKNOWN_APP_NAME = 'Unknown';

/** Inline images larger than this in either dimension are ignored. */
export const MAX_IMAGE_DIMENSION = 512;

/** Inline images whose pixel buffer exceeds this are ignored. */
export const MAX_IMAGE_BYTES = 1024 * 1024;

/** Vendor hint that lets a sender through do-not-disturb. */
export const DND_BYPASS_HINT = 'x-notiflux-bypass-dnd';

/** The default action key the protocol reserves for clicking the body. */
export const DEFAULT_ACTION_KEY = 'default';

export const CLOSE_REASON_NAMES: Record<CloseReason, CloseReasonName> = {
  [CloseReason.Expired]: 'expired',
  [CloseReason.Dismissed]: 'dismissed',
  [CloseReason.ClosedByCall]: 'closed',
  [CloseReason.Undefined]: 'undefined',
};
