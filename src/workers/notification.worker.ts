import { Job, Worker } from 'bullmq';
import { connection, NotificationJobData, QUEUE_NAMES } from '../config/queue';
import { EmailSender } from '../services/email/sendgrid.adapter';
import { SmsSender } from '../services/twilio.service';
import { renderNotification } from '../utils/templates';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface NotificationChannels {
  email: EmailSender;
  sms: SmsSender | null;
}

export interface DeliveryResult {
  email: boolean;
  sms: boolean;
}

/** Email failures throw so BullMQ retries the job; SMS is a courtesy and never fails it. */
export async function processNotification(
  job: Pick<Job<NotificationJobData>, 'id' | 'data' | 'attemptsMade'>,
  channels: NotificationChannels
): Promise<DeliveryResult> {
  const { recipient, template, data } = job.data;
  logger.info('Processing notification', { jobId: job.id, template, recipient, attempt: job.attemptsMade + 1 });

  const rendered = renderNotification(template, data);
  const email = await channels.email.sendEmail(recipient, rendered.subject, rendered.text);

  let sms = false;
  const phone = typeof data.phone === 'string' ? data.phone : undefined;
  if (channels.sms && phone) {
    try {
      await channels.sms.sendSMS(phone, rendered.sms);
      sms = true;
    } catch (error) {
      logger.warn('Failed to send confirmation SMS', { jobId: job.id, error: errorMessage(error) });
    }
  }

  if (!email && !sms) {
    logger.warn('Notification not delivered on any channel', { jobId: job.id, template, recipient });
  }

  return { email, sms };
}

export function startNotificationWorker(channels: NotificationChannels): Worker<NotificationJobData, DeliveryResult> {
  const worker = new Worker<NotificationJobData, DeliveryResult>(
    QUEUE_NAMES.NOTIFICATION,
    (job) => processNotification(job, channels),
    {
      connection,
      concurrency: 10,
      limiter: { max: 20, duration: 1000 },
    }
  );

  worker.on('completed', (job) => {
    logger.info('Notification job completed', { jobId: job.id, template: job.data.template });
  });

  worker.on('failed', (job, err) => {
    logger.error('Notification job failed', {
      jobId: job?.id,
      template: job?.data.template,
      error: err.message,
      attempts: job?.attemptsMade,
    });
  });

  logger.info('Notification worker started');
  return worker;
}
