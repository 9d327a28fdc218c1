import type { NotificationLevel } from './notification-level.js';

export { NotificationLevel } from './notification-level.js';

/**
 * Notifier interface for sending notifications
 */
export type Notifier = {
  /**
   * Send a notification
   * @param level - Notification level
   * @param message - Message to send
   */
  notify(level: NotificationLevel, message: string): void;
};
