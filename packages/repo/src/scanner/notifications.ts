import type { Logger } from '@promptctx/shared';
import type { NotificationSink, Project } from './types';

/**
 * Sink that forwards notifications to the logger, for hosts without a
 * notification area of their own.
 */
export class LoggerNotificationSink implements NotificationSink {
  constructor(private readonly logger: Logger) {}

  notify(project: Project, message: string): void {
    void this.logger.info(`[${project.name}] ${message}`);
  }
}

/**
 * Keeps every notification in memory; handy for embedding hosts and tests.
 */
export class CollectingNotificationSink implements NotificationSink {
  readonly messages: Array<{ project: string; message: string }> = [];

  notify(project: Project, message: string): void {
    this.messages.push({ project: project.name, message });
  }
}
