import { Logger, LogLevel, logger as defaultLogger } from '../utils/logger.js';
import { LEVEL_PRIORITIES, NotificationLevel } from './notification-level.js';
import type { Notifier } from './notifier.js';

/**
 * Console notifier for terminal output with configurable minimum level
 */
export class ConsoleNotifier implements Notifier {
  private minLevel: NotificationLevel;
  private logger: Logger;

  constructor(minLevel: NotificationLevel = NotificationLevel.INFO, logger: Logger = defaultLogger) {
    this.minLevel = minLevel;
    this.logger = logger;
    if (minLevel === NotificationLevel.DEBUG) {
      this.logger.setLevel(LogLevel.DEBUG);
    }
  }

  /**
   * Check if notification should be sent based on level priority
   */
  private shouldNotify(level: NotificationLevel): boolean {
    return LEVEL_PRIORITIES[level] >= LEVEL_PRIORITIES[this.minLevel];
  }

  notify(level: NotificationLevel, message: string): void {
    // Skip if level is below minimum
    if (!this.shouldNotify(level)) {
      return;
    }

    switch (level) {
      case NotificationLevel.DEBUG:
        this.logger.debug(message);
        break;
      case NotificationLevel.INFO:
        this.logger.info(message);
        break;
      case NotificationLevel.SUCCESS:
        this.logger.success(message);
        break;
      case NotificationLevel.WARNING:
        this.logger.warning(message);
        break;
      case NotificationLevel.ERROR:
        this.logger.error(message);
        break;
      case NotificationLevel.HIGHLIGHT:
        this.logger.highlight(message);
        break;
    }
  }

  getMinLevel(): NotificationLevel {
    return this.minLevel;
  }
}
