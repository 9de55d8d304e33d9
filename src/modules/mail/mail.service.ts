import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { I18nService } from 'nestjs-i18n';
import * as nodemailer from 'nodemailer';
import { Transporter } from 'nodemailer';

@Injectable()
export class MailService implements OnModuleInit {
  private readonly logger = new Logger(MailService.name);
  private transporter: Transporter | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly i18n: I18nService,
  ) {}

  onModuleInit(): void {
    const host = this.configService.get<string>('mail.host');
    const port = this.configService.get<number>('mail.port');
    const user = this.configService.get<string>('mail.user');
    const password = this.configService.get<string>('mail.password');
    const timeout = this.configService.get<number>('mail.timeout', 10_000);

    if (!host || !port || !user || !password) {
      this.logger.warn(
        'Email configuration is incomplete. Email service will be disabled.',
      );
      return;
    }

    this.transporter = nodemailer.createTransport({
      host,
      port,
      secure: port === 465,
      auth: {
        user,
        pass: password,
      },
      connectionTimeout: timeout,
      greetingTimeout: timeout,
      socketTimeout: timeout,
    });

    this.logger.log('Email service initialized');
  }

  async sendVerificationCode(
    email: string,
    code: string,
    lang?: string,
  ): Promise<void> {
    const minutes = Math.floor(
      this.configService.get<number>('auth.signupSessionTtl', 900) / 60,
    );
    const t = (key: string, args?: Record<string, string | number>): string =>
      this.i18n.translate<string, string>(`mail.verification_code.${key}`, {
        lang,
        args,
      });

    await this.sendEmail({
      to: email,
      subject: t('subject', {
        app: this.configService.get<string>('app.name', 'Muzee'),
      }),
      html: `
        <div style="font-family: sans-serif; max-width: 600px; margin: 0 auto;">
          <h2>${t('heading')}</h2>
          <p>${t('instruction')}</p>
          <div style="background-color: #f5f5f5; padding: 20px; text-align: center;
                      font-size: 32px; font-weight: bold; letter-spacing: 8px;">
            ${code}
          </div>
          <p style="color: #666; font-size: 14px;">
            ${t('expiry', { minutes })}<br>
            ${t('ignore')}
          </p>
        </div>
      `,
    });
  }

  async sendEmail(options: {
    to: string;
    subject: string;
    html: string;
    from?: string;
  }): Promise<void> {
    if (!this.transporter) {
      this.logger.warn(
        `Email transporter not initialized, dropping mail to ${options.to}`,
      );
      return;
    }

    const fromEmail =
      options.from ??
      this.configService.get<string>('mail.from') ??
      'noreply@example.com';

    try {
      await this.transporter.sendMail({
        from: fromEmail,
        to: options.to,
        subject: options.subject,
        html: options.html,
      });
      this.logger.log(`Email sent to ${options.to}`);
    } catch (error) {
      this.logger.error(`Failed to send email to ${options.to}:`, error);
      throw error;
    }
  }

  isConfigured(): boolean {
    return this.transporter !== null;
  }
}
