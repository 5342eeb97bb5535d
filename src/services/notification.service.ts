import { Queue } from 'bullmq';
import { NotificationJobData } from '../config/queue';
import { NotificationDispatcher, NotificationTemplate } from '../types/capabilities';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type NotificationQueue = Pick<Queue<NotificationJobData>, 'add'>;

/** Hands confirmations to the notification worker. Reports enqueue failures as `false`. */
export class NotificationService implements NotificationDispatcher {
  constructor(private readonly queue: NotificationQueue) {}

  async notify(recipient: string, template: NotificationTemplate, data: Record<string, unknown>): Promise<boolean> {
    try {
      const job = await this.queue.add(template, { recipient, template, data });
      logger.info('Notification job queued', { template, recipient, jobId: job.id });
      return true;
    } catch (error) {
      logger.error('Failed to queue notification job', { template, recipient, error: errorMessage(error) });
      return false;
    }
  }
}
