/**
 * Notification model shared by the daemon and its clients.
 *
 * Mirrors the Freedesktop notification protocol (version 1.2) with the
 * bookkeeping the daemon adds on top: close state, repeat counts and
 * the per-notification rule outcome.
 */

// ============================================================
// Enumerations
// ============================================================

export const Urgency = {
  Low: 0,
  Normal: 1,
  Critical: 2,
} as const;

export type Urgency = (typeof Urgency)[keyof typeof Urgency];

export type UrgencyName = 'low' | 'normal' | 'critical';

/** Reason codes carried by the NotificationClosed signal. */
export const CloseReason = {
  Expired: 1,
  Dismissed: 2,
  ClosedByCall: 3,
  Undefined: 4,
} as const;

export type CloseReason = (typeof CloseReason)[keyof typeof CloseReason];

export type CloseReasonName = 'expired' | 'dismissed' | 'closed' | 'undefined';

// ============================================================
// Hints and images
// ============================================================

/**
 * Raw or normalized `(iiibiiay)` image structure.
 * After normalization 8-bit data is always 4-channel RGBA.
 */
export interface ImageData {
  width: number;
  height: number;
  rowstride: number;
  hasAlpha: boolean;
  bitsPerSample: number;
  channels: number;
  data: Uint8Array;
}

export type HintValue =
  | string
  | number
  | boolean
  | bigint
  | Uint8Array
  | ImageData
  | readonly HintValue[];

export type HintBag = Readonly<Record<string, HintValue>>;

/**
 * Image reference derived from hints and app_icon.
 * Precedence: imageData, then imagePath, then iconName.
 */
export interface NotificationImage {
  imageData?: ImageData;
  imagePath: string;
  iconName: string;
}

export interface NotificationAction {
  key: string;
  label: string;
}

// ============================================================
// Requests and records
// ============================================================

/** Arguments of a Notify call, already decoded from the wire. */
export interface NotifyRequest {
  appName: string;
  replacesId: number;
  appIcon: string;
  summary: string;
  body: string;
  /** Flat key/label list as sent on the wire. */
  actions: readonly string[];
  hints: HintBag;
  /** -1 = server default, 0 = never, >0 = milliseconds. */
  expireTimeout: number;
}

export interface Notification {
  id: number;
  appName: string;
  appIcon: string;
  summary: string;
  body: string;
  actions: NotificationAction[];
  hints: HintBag;
  urgency: Urgency;
  category: string | null;
  transient: boolean;
  resident: boolean;
  image: NotificationImage;
  expireTimeout: number;
  /** Unix ms of the first arrival. */
  receivedAt: number;
  /** Unix ms of the latest replace or repeat. */
  updatedAt: number;
  closed: boolean;
  closeReason: CloseReason | null;
  repeatCount: number;
  /** Not yet seen in an open panel. */
  unread: boolean;
  suppressPopup: boolean;
  suppressSound: boolean;
  dndExempt: boolean;
}

/**
 * JSON-safe view published to clients. Pixel data is never included;
 * `hasImageData` tells the UI to ask for the decoded icon.
 */
export interface NotificationView {
  id: number;
  appName: string;
  summary: string;
  body?: string;
  actions: NotificationAction[];
  urgency: Urgency;
  category: string | null;
  transient: boolean;
  resident: boolean;
  receivedAt: number;
  updatedAt: number;
  closed: boolean;
  closeReason: CloseReasonName | null;
  repeatCount: number;
  unread: boolean;
  suppressPopup: boolean;
  image: {
    hasImageData: boolean;
    width?: number;
    height?: number;
    imagePath: string;
    iconName: string;
  };
}

export interface HistoryCounts {
  total: number;
  active: number;
  unread: number;
  criticalActive: number;
}
