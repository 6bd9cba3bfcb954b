import { Inject, Injectable, Logger } from '@nestjs/common';
import { renderAppointmentConfirmation } from './appointment-confirmation.template';
import {
  AppointmentSummary,
  MAIL_TRANSPORT,
  MailTransport,
  NotificationRecipient,
  NotificationSender,
  SMTP_NOTIFICATION_CONFIG,
  SmtpNotificationConfig,
} from './notification.types';

const DEFAULT_PRACTICE_NAME = 'Patient Intake Office';

@Injectable()
export class SmtpNotificationSenderService implements NotificationSender {
  private readonly logger = new Logger(SmtpNotificationSenderService.name);

  constructor(
    @Inject(MAIL_TRANSPORT) private readonly transport: MailTransport,
    @Inject(SMTP_NOTIFICATION_CONFIG) private readonly config: SmtpNotificationConfig,
  ) {}

  async send(recipient: NotificationRecipient, summary: AppointmentSummary): Promise<boolean> {
    const recipients = [this.config.officeEmail, recipient.email].filter(
      (address): address is string => Boolean(address),
    );
    if (recipients.length === 0) {
      this.logger.warn('No recipients configured for the appointment confirmation');
      return false;
    }
    if (!this.config.fromEmail) {
      this.logger.warn('NOTIFICATION_FROM_EMAIL is not set; confirmation not sent');
      return false;
    }

    const practiceName = this.config.fromName ?? DEFAULT_PRACTICE_NAME;
    const email = renderAppointmentConfirmation(summary, {
      name: practiceName,
      phone: this.config.officePhone,
      email: this.config.officeEmail,
    });

    try {
      const info = await this.transport.sendMail({
        from: { name: practiceName, address: this.config.fromEmail },
        to: recipients,
        subject: email.subject,
        html: email.html,
        text: email.text,
      });
      this.logger.log(`Appointment confirmation sent (${info.messageId}) to ${recipients.length} recipient(s)`);
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Appointment confirmation failed: ${message}`);
      return false;
    }
  }
}
