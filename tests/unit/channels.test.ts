const mockCreate = jest.fn();

jest.mock('twilio', () => jest.fn(() => ({ messages: { create: mockCreate } })));

jest.mock('@sendgrid/mail', () => ({
  setApiKey: jest.fn(),
  send: jest.fn(),
}));

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { TwilioService } from '../../src/services/twilio.service';
import { SendGridAdapter } from '../../src/services/email/sendgrid.adapter';
import { ServiceError } from '../../src/utils/errors';

const sendGrid: { setApiKey: jest.Mock; send: jest.Mock } = jest.requireMock('@sendgrid/mail');

describe('TwilioService', () => {
  const options = { accountSid: 'AC-test', authToken: 'test-secret', fromNumber: '+440000000000', retryDelayMs: 0 };

  beforeEach(() => {
    mockCreate.mockReset();
  });

  it('should send and return the message sid', async () => {
    mockCreate.mockResolvedValueOnce({ sid: 'SM-1' });

    await expect(new TwilioService(options).sendSMS('+447000000000', 'hello')).resolves.toBe('SM-1');
    expect(mockCreate).toHaveBeenCalledWith({ to: '+447000000000', from: '+440000000000', body: 'hello' });
  });

  it('should retry transient failures', async () => {
    mockCreate.mockRejectedValueOnce(new Error('socket hang up')).mockResolvedValueOnce({ sid: 'SM-2' });

    await expect(new TwilioService(options).sendSMS('+447000000000', 'hello')).resolves.toBe('SM-2');
    expect(mockCreate).toHaveBeenCalledTimes(2);
  });

  it('should not retry an invalid number', async () => {
    mockCreate.mockRejectedValueOnce(Object.assign(new Error('invalid number'), { code: 21211 }));

    const failure = new TwilioService(options).sendSMS('123', 'hello');
    await expect(failure).rejects.toBeInstanceOf(ServiceError);
    await expect(failure).rejects.toMatchObject({ retryable: false });
    expect(mockCreate).toHaveBeenCalledTimes(1);
  });

  it('should give up after three attempts', async () => {
    mockCreate.mockRejectedValue(new Error('socket hang up'));

    await expect(new TwilioService(options).sendSMS('+447000000000', 'hello')).rejects.toThrow(
      'Twilio.sendSMS failed: socket hang up'
    );
    expect(mockCreate).toHaveBeenCalledTimes(3);
  });
});

describe('SendGridAdapter', () => {
  beforeEach(() => {
    sendGrid.send.mockReset();
  });

  it('should skip sending when not configured', async () => {
    await expect(new SendGridAdapter().sendEmail('john@x.com', 'Subject', 'Body')).resolves.toBe(false);
    expect(sendGrid.send).not.toHaveBeenCalled();
  });

  it('should send plain text as html when no html is given', async () => {
    sendGrid.send.mockResolvedValueOnce([{ statusCode: 202 }]);
    const adapter = new SendGridAdapter('test-secret', 'hello@example.com');

    await expect(adapter.sendEmail('john@x.com', 'Subject', 'Body')).resolves.toBe(true);
    expect(sendGrid.setApiKey).toHaveBeenCalledWith('test-secret');
    expect(sendGrid.send).toHaveBeenCalledWith({
      to: 'john@x.com',
      from: 'hello@example.com',
      subject: 'Subject',
      text: 'Body',
      html: 'Body',
    });
  });

  it('should rethrow delivery errors', async () => {
    sendGrid.send.mockRejectedValueOnce(new Error('unauthorised'));

    await expect(new SendGridAdapter('test-secret', 'hello@example.com').sendEmail('john@x.com', 'S', 'B')).rejects.toThrow(
      'unauthorised'
    );
  });
});
