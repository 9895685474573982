/**
 * Shared builders for daemon tests.
 */

import { buildNotification } from '@notiflux/core';
import type { HintBag, Notification, NotifyRequest } from '@notiflux/core';

export function makeRequest(overrides: Partial<NotifyRequest> = {}): NotifyRequest {
  return {
    appName: 'mail',
    replacesId: 0,
    appIcon: '',
    summary: 'New message',
    body: 'Hello there',
    actions: [],
    hints: {},
    expireTimeout: -1,
    ...overrides,
  };
}

export function makeNotification(
  overrides: Partial<NotifyRequest> & { hints?: HintBag } = {},
  now = 0,
): Notification {
  return buildNotification(makeRequest(overrides), now);
}
