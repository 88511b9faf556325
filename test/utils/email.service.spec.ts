import { describe, it, expect } from 'vitest';
import { SendMailOptions } from 'nodemailer';
import { TokenService } from '../../src/modules/auth/token.service';
import { confirmationLink, MailTransport, NodemailerConfirmationMailer } from '../../src/utils/email.service';

class RecordingTransport implements MailTransport {
  readonly sent: SendMailOptions[] = [];

  async sendMail(options: SendMailOptions): Promise<unknown> {
    this.sent.push(options);
    return { messageId: 'test-message' };
  }
}

describe('confirmationLink', () => {
  it('joins the base URL and the token with a single slash', () => {
    expect(confirmationLink('http://contacts.test', 'abc')).toBe('http://contacts.test/api/auth/confirmed_email/abc');
    expect(confirmationLink('http://contacts.test/', 'abc')).toBe('http://contacts.test/api/auth/confirmed_email/abc');
  });
});

describe('NodemailerConfirmationMailer', () => {
  const tokens = new TokenService({ secret: 'test-secret', algorithm: 'HS256' });

  it('mails a confirmation link carrying an email token', async () => {
    const transport = new RecordingTransport();
    const mailer = new NodemailerConfirmationMailer(transport, tokens, true);

    await mailer.sendConfirmation({ email: 'alice@example.com', username: '<b>alice</b>' }, 'http://contacts.test/');

    expect(transport.sent).toHaveLength(1);
    const [message] = transport.sent;
    expect(message.to).toBe('alice@example.com');
    expect(message.subject).toBe('Confirm your email');

    const html = typeof message.html === 'string' ? message.html : '';
    expect(html).toContain('Hi <strong>&lt;b&gt;alice&lt;/b&gt;</strong>,');
    const token = /confirmed_email\/([^"]+)"/.exec(html)?.[1] ?? '';
    expect(tokens.decodeEmailToken(token)).toBe('alice@example.com');
  });

  it('skips sending when mail is not configured', async () => {
    const transport = new RecordingTransport();

    await new NodemailerConfirmationMailer(transport, tokens, false).sendConfirmation(
      { email: 'alice@example.com', username: 'alice' },
      'http://contacts.test/'
    );

    expect(transport.sent).toEqual([]);
  });
});
