/**
 * Notification utility tests
 */

import { describe, it, expect } from '@jest/globals';
import { CloseReason, Urgency, buildNotification, toNotificationView } from './index.js';
import type { NotifyRequest } from './index.js';

const request: NotifyRequest = {
  appName: '',
  replacesId: 0,
  appIcon: 'chat',
  summary: 'Hello',
  body: 'Body text',
  actions: ['default', 'Open'],
  hints: { urgency: 2, category: 'im.received', transient: true },
  expireTimeout: -1,
};

describe('buildNotification', () => {
  it('fills defaults from the request and hints', () => {
    const notification = buildNotification(request, 1000);
    expect(notification.appName).toBe('Unknown');
    expect(notification.urgency).toBe(Urgency.Critical);
    expect(notification.category).toBe('im.received');
    expect(notification.transient).toBe(true);
    expect(notification.resident).toBe(false);
    expect(notification.actions).toEqual([{ key: 'default', label: 'Open' }]);
    expect(notification.receivedAt).toBe(1000);
    expect(notification.repeatCount).toBe(1);
    expect(notification.closed).toBe(false);
  });
});

describe('toNotificationView', () => {
  it('omits the body by default', () => {
    const view = toNotificationView({ ...buildNotification(request, 0), id: 3 });
    expect(view.id).toBe(3);
    expect(view.body).toBeUndefined();
    expect(view.image).toEqual({ hasImageData: false, imagePath: '', iconName: 'chat' });
  });

  it('includes the body and close reason name when asked', () => {
    const closed = {
      ...buildNotification(request, 0),
      closed: true,
      closeReason: CloseReason.Expired,
    };
    const view = toNotificationView(closed, { includeBody: true });
    expect(view.body).toBe('Body text');
    expect(view.closeReason).toBe('expired');
  });
});
