import { createConfigService, testConfig } from '@/testing/test-config';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { I18nService } from 'nestjs-i18n';
import * as nodemailer from 'nodemailer';
import { MailService } from './mail.service';

const mockSendMail = jest.fn();

jest.mock('nodemailer', () => ({
  createTransport: jest.fn(() => ({ sendMail: mockSendMail })),
}));

describe('MailService', () => {
  const smtp = {
    ...testConfig().mail,
    host: 'smtp.example.com',
    port: 587,
    user: 'mailer',
    password: 'test-password',
  };

  const build = async (config: ConfigService): Promise<MailService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MailService,
        { provide: ConfigService, useValue: config },
        {
          provide: I18nService,
          useValue: { translate: jest.fn((key: string) => key) },
        },
      ],
    }).compile();

    const service = module.get<MailService>(MailService);
    service.onModuleInit();
    return service;
  };

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('stays disabled without SMTP settings', async () => {
    const service = await build(createConfigService());

    await service.sendEmail({ to: 'a@example.com', subject: 's', html: 'h' });

    expect(service.isConfigured()).toBe(false);
    expect(nodemailer.createTransport).not.toHaveBeenCalled();
    expect(mockSendMail).not.toHaveBeenCalled();
  });

  it('configures the transport with timeouts', async () => {
    await build(createConfigService({ mail: smtp }));

    expect(nodemailer.createTransport).toHaveBeenCalledWith({
      host: 'smtp.example.com',
      port: 587,
      secure: false,
      auth: { user: 'mailer', pass: 'test-password' },
      connectionTimeout: 10_000,
      greetingTimeout: 10_000,
      socketTimeout: 10_000,
    });
  });

  it('sends the verification code', async () => {
    mockSendMail.mockResolvedValue({});
    const service = await build(createConfigService({ mail: smtp }));

    await service.sendVerificationCode('a@example.com', '042917', 'ja');

    expect(mockSendMail).toHaveBeenCalledWith({
      from: '"Muzee" <no-reply@example.com>',
      to: 'a@example.com',
      subject: 'mail.verification_code.subject',
      html: expect.stringContaining('042917'),
    });
  });

  it('rethrows transport failures', async () => {
    mockSendMail.mockRejectedValue(new Error('connection refused'));
    const service = await build(createConfigService({ mail: smtp }));

    await expect(
      service.sendEmail({ to: 'a@example.com', subject: 's', html: 'h' }),
    ).rejects.toThrow('connection refused');
  });
});
