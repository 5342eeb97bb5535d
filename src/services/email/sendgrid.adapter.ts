import sgMail from '@sendgrid/mail';
import { logger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';

export interface EmailSender {
  sendEmail(to: string, subject: string, text: string, html?: string): Promise<boolean>;
}

export class SendGridAdapter implements EmailSender {
  constructor(
    private readonly apiKey?: string,
    private readonly fromEmail?: string
  ) {
    if (apiKey) {
      sgMail.setApiKey(apiKey);
    }
  }

  /** False when SendGrid is not configured; delivery errors propagate so the job is retried. */
  async sendEmail(to: string, subject: string, text: string, html?: string): Promise<boolean> {
    if (!this.apiKey || !this.fromEmail) {
      logger.warn('SendGrid not configured, skipping email', { to, subject });
      return false;
    }

    try {
      await sgMail.send({
        to,
        from: this.fromEmail,
        subject,
        text,
        html: html || text,
      });

      logger.info('Email sent', { to, subject });
      return true;
    } catch (error) {
      logger.error('SendGrid email failed', { to, subject, error: errorMessage(error) });
      throw error;
    }
  }
}
