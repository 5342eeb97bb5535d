import { NotificationTemplate } from '../types/capabilities';

export interface RenderedNotification {
  subject: string;
  text: string;
  sms: string;
}

const SUBJECTS: Record<NotificationTemplate, string> = {
  order_confirmation: 'Your vehicle order',
  appointment_confirmation: 'Your service appointment',
  listing_confirmation: 'Your vehicle listing',
};

const INTROS: Record<NotificationTemplate, string> = {
  order_confirmation: 'Thank you for your order. Here is a summary of your reservation.',
  appointment_confirmation: 'Your service appointment is booked. Here are the details.',
  listing_confirmation: 'Your vehicle listing has been created. Here are the details.',
};

function stringField(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function stringList(data: Record<string, unknown>, key: string): string[] {
  const value = data[key];
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

export function renderNotification(template: NotificationTemplate, data: Record<string, unknown>): RenderedNotification {
  const recordId = stringField(data, 'recordId') ?? 'pending';
  const name = stringField(data, 'name');
  const summary = stringList(data, 'summary');

  const text = [
    name ? `Hello ${name},` : 'Hello,',
    '',
    INTROS[template],
    '',
    `Reference: ${recordId}`,
    ...summary,
    '',
    'Reply to this email if anything needs changing.',
  ].join('\n');

  return {
    subject: `${SUBJECTS[template]} (${recordId})`,
    text,
    sms: `${SUBJECTS[template]} confirmed. Reference ${recordId}.`,
  };
}
