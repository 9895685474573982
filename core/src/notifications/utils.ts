/**
 * Notification utility functions.
 *
 * Shared between the daemon and control clients.
 */

import { CLOSE_REASON_NAMES, UNKNOWN_APP_NAME } from './constants.js';
import {
  hintBool,
  hintString,
  imageFromHints,
  parseActions,
  urgencyFromHints,
} from './hints.js';
import type { Notification, NotificationView, NotifyRequest } from './types.js';

/**
 * Build a fresh record from a decoded Notify call. The id is assigned
 * by the store, so the record starts with id 0.
 */
export function buildNotification(request: NotifyRequest, now: number = Date.now()): Notification {
  const appName = request.appName.trim() === '' ? UNKNOWN_APP_NAME : request.appName;
  return {
    id: 0,
    appName,
    appIcon: request.appIcon,
    summary: request.summary,
    body: request.body,
    actions: parseActions(request.actions),
    hints: request.hints,
    urgency: urgencyFromHints(request.hints),
    category: hintString(request.hints, 'category'),
    transient: hintBool(request.hints, 'transient'),
    resident: hintBool(request.hints, 'resident'),
    image: imageFromHints(appName, request.appIcon, request.hints),
    expireTimeout: request.expireTimeout,
    receivedAt: now,
    updatedAt: now,
    closed: false,
    closeReason: null,
    repeatCount: 1,
    unread: true,
    suppressPopup: false,
    suppressSound: false,
    dndExempt: false,
  };
}

/**
 * Project a record into its client-facing shape. Bodies are left out
 * unless asked for, so summary listings stay small.
 */
export function toNotificationView(
  notification: Notification,
  options: { includeBody?: boolean } = {},
): NotificationView {
  const { imageData, imagePath, iconName } = notification.image;
  const view: NotificationView = {
    id: notification.id,
    appName: notification.appName,
    summary: notification.summary,
    actions: notification.actions.map((action) => ({ ...action })),
    urgency: notification.urgency,
    category: notification.category,
    transient: notification.transient,
    resident: notification.resident,
    receivedAt: notification.receivedAt,
    updatedAt: notification.updatedAt,
    closed: notification.closed,
    closeReason: notification.closeReason === null ? null : CLOSE_REASON_NAMES[notification.closeReason],
    repeatCount: notification.repeatCount,
    unread: notification.unread,
    suppressPopup: notification.suppressPopup,
    image: imageData
      ? { hasImageData: true, width: imageData.width, height: imageData.height, imagePath, iconName }
      : { hasImageData: false, imagePath, iconName },
  };
  if (options.includeBody) {
    view.body = notification.body;
  }
  return view;
}
