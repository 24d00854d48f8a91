import nodemailer, { Transporter } from 'nodemailer';
import { AppConfig, getConfig } from '../config';
import { ExternalServiceError } from '../errors';
import { logger } from '../logger';

export interface Notifier {
  sendAccessCode(email: string, code: string): Promise<void>;
}

export interface AccessCodeMessage {
  subject: string;
  text: string;
}

export function buildAccessCodeMessage(code: string, appUrl: string): AccessCodeMessage {
  return {
    subject: 'Your SignalScore Pro Access Code',
    text: [
      'Thank you for purchasing SignalScore Pro!',
      '',
      `Your access code is: ${code}`,
      '',
      `Enter this code at ${appUrl} to unlock the full analysis.`,
      'The code can be used once.',
    ].join('\n'),
  };
}

export class SmtpNotifier implements Notifier {
  private transporter: Transporter | null = null;

  constructor(private readonly config: AppConfig) {}

  private getTransporter(): Transporter {
    const { SMTP_HOST, SMTP_PORT, SMTP_USER, SMTP_PASSWORD } = this.config;
    if (!SMTP_USER || !SMTP_PASSWORD) {
      throw new ExternalServiceError('email', 'Email delivery is not configured');
    }
    if (!this.transporter) {
      this.transporter = nodemailer.createTransport({
        host: SMTP_HOST,
        port: SMTP_PORT,
        secure: SMTP_PORT === 465,
        auth: { user: SMTP_USER, pass: SMTP_PASSWORD },
      });
    }
    return this.transporter;
  }

  async sendAccessCode(email: string, code: string): Promise<void> {
    const transporter = this.getTransporter();
    const message = buildAccessCodeMessage(code, this.config.APP_URL);
    try {
      await transporter.sendMail({
        from: this.config.EMAIL_SENDER ?? this.config.SMTP_USER,
        to: email,
        subject: message.subject,
        text: message.text,
      });
    } catch (error) {
      throw new ExternalServiceError('email', `Could not send access code to ${email}`, error);
    }
    logger.info('email', `Sent access code to ${email}`);
  }
}

export function getNotifier(): Notifier {
  return new SmtpNotifier(getConfig());
}
