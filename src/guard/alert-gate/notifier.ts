/**
 * Notification delivery collaborators
 */

import { logError, logWarn } from '../../logger.js';

export type NotificationSeverity = 'warning' | 'critical';

export interface NotificationRequest {
  title: string;
  body: string;
  severity: NotificationSeverity;
}

export interface Notifier {
  notify(request: NotificationRequest): void | Promise<void>;
}

/**
 * Writes notifications to the process log. Used when the host supplies no
 * delivery mechanism of its own.
 */
export class ConsoleNotifier implements Notifier {
  notify(request: NotificationRequest): void {
    const message = `guard/alerts: ${request.title} - ${request.body}`;
    if (request.severity === 'critical') {
      logError(message);
    } else {
      logWarn(message);
    }
  }
}
