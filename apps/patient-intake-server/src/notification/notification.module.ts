import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { createTransport } from 'nodemailer';
import { parseBoolean, parseNumber } from '../shared/config-values';
import {
  MAIL_TRANSPORT,
  MailTransport,
  NOTIFICATION_SENDER,
  SMTP_NOTIFICATION_CONFIG,
  SmtpNotificationConfig,
} from './notification.types';
import { SmtpNotificationSenderService } from './smtp-notification-sender.service';

const DEFAULT_TIMEOUT_MS = 10_000;

const createMailTransport = (config: SmtpNotificationConfig): MailTransport => {
  const timeout = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  return createTransport({
    host: config.host,
    port: config.port ?? 587,
    secure: config.secure ?? false,
    auth: config.user ? { user: config.user, pass: config.password } : undefined,
    connectionTimeout: timeout,
    greetingTimeout: timeout,
    socketTimeout: timeout,
  });
};

const senderProviders = [
  {
    provide: MAIL_TRANSPORT,
    inject: [SMTP_NOTIFICATION_CONFIG],
    useFactory: createMailTransport,
  },
  SmtpNotificationSenderService,
  { provide: NOTIFICATION_SENDER, useExisting: SmtpNotificationSenderService },
];

@Module({})
export class NotificationModule {
  static register(config: SmtpNotificationConfig): DynamicModule {
    return {
      module: NotificationModule,
      providers: [{ provide: SMTP_NOTIFICATION_CONFIG, useValue: config }, ...senderProviders],
      exports: [NOTIFICATION_SENDER],
    };
  }

  static registerAsync(): DynamicModule {
    return {
      module: NotificationModule,
      imports: [ConfigModule],
      providers: [
        {
          provide: SMTP_NOTIFICATION_CONFIG,
          inject: [ConfigService],
          useFactory: (configService: ConfigService): SmtpNotificationConfig => ({
            host: configService.get<string>('SMTP_HOST'),
            port: parseNumber(configService.get<string>('SMTP_PORT')),
            secure: parseBoolean(configService.get<string>('SMTP_SECURE')),
            user: configService.get<string>('SMTP_USER'),
            password: configService.get<string>('SMTP_PASSWORD'),
            timeoutMs: parseNumber(configService.get<string>('NOTIFICATION_TIMEOUT_MS')),
            fromEmail: configService.get<string>('NOTIFICATION_FROM_EMAIL'),
            fromName: configService.get<string>('NOTIFICATION_FROM_NAME'),
            officeEmail: configService.get<string>('NOTIFICATION_OFFICE_EMAIL'),
            officePhone: configService.get<string>('NOTIFICATION_OFFICE_PHONE'),
          }),
        },
        ...senderProviders,
      ],
      exports: [NOTIFICATION_SENDER],
    };
  }
}
