/**
 * DND time windows.
 *
 * A window is a local-time range on selected weekdays. When `end` is not
 * after `start` the window runs past midnight and belongs to the day it
 * starts on: a Friday 22:00–07:00 window covers Saturday 06:00.
 */

import { WEEKDAYS } from '@notiflux/core';
import type { DndWindowConfig, Weekday } from '@notiflux/core';

export function parseClockTime(value: string): number {
  const [hours, minutes] = value.split(':').map((part) => Number.parseInt(part, 10));
  return hours * 60 + minutes;
}

function weekdayOf(date: Date, offsetDays = 0): Weekday {
  const index = (date.getDay() + 7 + offsetDays) % 7;
  return WEEKDAYS[index];
}

export function isWithinWindow(date: Date, window: DndWindowConfig): boolean {
  const start = parseClockTime(window.start);
  const end = parseClockTime(window.end);
  const minute = date.getHours() * 60 + date.getMinutes();

  if (start < end) {
    return window.days.includes(weekdayOf(date)) && minute >= start && minute < end;
  }
  // Overnight (or full-day when start === end).
  if (minute >= start) {
    return window.days.includes(weekdayOf(date));
  }
  if (minute < end) {
    return window.days.includes(weekdayOf(date, -1));
  }
  return false;
}

export function isWithinAnyWindow(date: Date, windows: readonly DndWindowConfig[]): boolean {
  return windows.some((window) => isWithinWindow(date, window));
}
