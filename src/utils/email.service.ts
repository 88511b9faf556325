import nodemailer, { SendMailOptions, Transporter } from 'nodemailer';
import { emailConfig } from '../connections/config/app.config';
import { TokenService } from '../modules/auth/token.service';
import { logger } from './logging';

export interface ConfirmationRecipient {
  email: string;
  username: string;
}

export interface ConfirmationMailer {
  sendConfirmation(recipient: ConfirmationRecipient, baseUrl: string): Promise<void>;
}

export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>;
}

export const createMailTransport = (): Transporter =>
  nodemailer.createTransport({
    host: emailConfig.host,
    port: emailConfig.port,
    secure: emailConfig.secure,
    auth: {
      user: emailConfig.user,
      pass: emailConfig.pass,
    },
  });

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

export const confirmationLink = (baseUrl: string, token: string): string =>
  `${baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`}api/auth/confirmed_email/${token}`;

export const renderConfirmationEmail = (username: string, link: string): string => `
    <div style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto; padding: 20px;">
      <h2 style="color: #333; border-bottom: 2px solid #667eea; padding-bottom: 10px;">
        Confirm your email
      </h2>

      <p>Hi <strong>${escapeHtml(username)}</strong>,</p>
      <p>Thanks for registering. Please confirm your email address to activate your account.</p>

      <div style="text-align: center; margin: 30px 0;">
        <a href="${link}" style="background: #667eea; color: white; padding: 12px 24px; border-radius: 5px; text-decoration: none;">
          Confirm email
        </a>
      </div>

      <p style="color: #999; font-size: 12px; margin-top: 30px;">
        The link expires in 24 hours. If you did not create an account, ignore this message.
      </p>
    </div>
  `;

export class NodemailerConfirmationMailer implements ConfirmationMailer {
  constructor(
    private readonly transport: MailTransport,
    private readonly tokens: TokenService,
    private readonly enabled: boolean = Boolean(emailConfig.user && emailConfig.pass)
  ) {}

  async sendConfirmation({ email, username }: ConfirmationRecipient, baseUrl: string): Promise<void> {
    if (!this.enabled) {
      logger.warn('Email not configured, skipping confirmation email', { email });
      return;
    }

    const token = this.tokens.createEmailToken({ sub: email });

    await this.transport.sendMail({
      from: `"${emailConfig.fromName}" <${emailConfig.from}>`,
      to: email,
      subject: 'Confirm your email',
      html: renderConfirmationEmail(username, confirmationLink(baseUrl, token)),
    });
    logger.info('Confirmation email sent', { email });
  }
}
