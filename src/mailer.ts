import nodemailer, { Transporter } from 'nodemailer';
import { AppConfig } from './config';
import { safeLogger } from './security/safeLogger';

export type MailMessage = {
  to: string;
  subject: string;
  text: string;
  html?: string;
};

export interface Mailer {
  send(message: MailMessage): Promise<void>;
}

export class SmtpMailer implements Mailer {
  constructor(private readonly transporter: Transporter, private readonly from: string) {}

  async send(message: MailMessage): Promise<void> {
    const info = await this.transporter.sendMail({ from: this.from, ...message });
    safeLogger.info('mail.sent', { messageId: info.messageId, subject: message.subject });
  }
}

/** Used when SMTP is not configured. Keeps what it was asked to send. */
export class NoopMailer implements Mailer {
  readonly outbox: MailMessage[] = [];

  async send(message: MailMessage): Promise<void> {
    this.outbox.push(message);
    safeLogger.info('mail.skipped', { subject: message.subject });
  }
}

export function createMailer(mail: AppConfig['mail']): Mailer {
  if (!mail.smtp) return new NoopMailer();
  const { host, port, user, pass } = mail.smtp;
  const transporter = nodemailer.createTransport({
    host,
    port,
    // 465 is implicit TLS; everything else upgrades with STARTTLS
    secure: port === 465,
    auth: user ? { user, pass } : undefined,
    connectionTimeout: 30_000,
    greetingTimeout: 30_000,
    socketTimeout: 30_000,
  });
  return new SmtpMailer(transporter, mail.from);
}

export function activationMail(to: string, appUrl: string, token: string): MailMessage {
  const link = `${appUrl}/activate?token=${encodeURIComponent(token)}`;
  return {
    to,
    subject: 'Activate your Medicate account',
    text: `Welcome to Medicate. Activate your account by opening this link:\n\n${link}\n`,
    html: `<p>Welcome to Medicate.</p><p><a href="${link}">Activate your account</a></p>`,
  };
}

export function passwordResetMail(to: string, appUrl: string, token: string): MailMessage {
  const link = `${appUrl}/reset-password?token=${encodeURIComponent(token)}`;
  return {
    to,
    subject: 'Reset your Medicate password',
    text: `A password reset was requested for your account. Choose a new password here:\n\n${link}\n\nIgnore this mail if you did not ask for it.`,
    html: `<p>A password reset was requested for your account.</p><p><a href="${link}">Choose a new password</a></p>`,
  };
}
