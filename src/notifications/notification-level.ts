import { createEnum } from '../utils/create-enum.js';

const notificationLevel = createEnum(['debug', 'info', 'success', 'highlight', 'warning', 'error'] as const);

export const NotificationLevel = notificationLevel.object;

export type NotificationLevel = typeof notificationLevel.type;

/**
 * Level priorities for filtering (lower = less severe)
 */
export const LEVEL_PRIORITIES = {
  debug: 0,
  info: 1,
  success: 2,
  highlight: 3,
  warning: 4,
  error: 5,
} as const satisfies Record<NotificationLevel, number>;

/**
 * Minimum console level for a `-v` count: summary and problems only, then
 * per-episode progress, then debug detail
 */
export function levelForVerbosity(verbosity: number): NotificationLevel {
  if (verbosity >= 2) return NotificationLevel.DEBUG;
  if (verbosity === 1) return NotificationLevel.INFO;
  return NotificationLevel.HIGHLIGHT;
}
