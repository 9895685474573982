/**
 * @notiflux/core/notifications — barrel export
 *
 * Single source of truth for the notification model, hint parsing and views.
 */

export { Urgency, CloseReason } from './types.js';
export type {
  UrgencyName,
  CloseReasonName,
  ImageData,
  HintValue,
  HintBag,
  NotificationImage,
  NotificationAction,
  NotifyRequest,
  Notification,
  NotificationView,
  HistoryCounts,
} from './types.js';

export {
  PROTOCOL_VERSION,
  SERVER_NAME,
  SERVER_VENDOR,
  BASE_CAPABILITIES,
  SOUND_CAPABILITY,
  UNKNOWN_APP_NAME,
  MAX_IMAGE_DIMENSION,
  MAX_IMAGE_BYTES,
  DND_BYPASS_HINT,
  DEFAULT_ACTION_KEY,
  CLOSE_REASON_NAMES,
} from './constants.js';

export {
  hintString,
  hintNumber,
  hintBool,
  isUrgency,
  urgencyFromHints,
  urgencyName,
  parseUrgency,
  parseActions,
  stripDesktopSuffix,
  isImageData,
  normalizeImageData,
  isImageDataUsable,
  imageFromHints,
  imageForHistory,
} from './hints.js';

export { buildNotification, toNotificationView } from './utils.js';
