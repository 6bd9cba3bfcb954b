import type { SendMailOptions } from 'nodemailer';

export type NotificationRecipient = {
  name?: string;
  email?: string;
};

export type AppointmentSummary = {
  patientName: string;
  dateOfBirth: string;
  appointmentTime: string;
  address: string;
  phoneNumber: string;
  insurance: string;
  referral: string;
  chiefComplaint: string;
};

/** Delivers the booking confirmation. Resolves false on failure; never rejects. */
export interface NotificationSender {
  send(recipient: NotificationRecipient, summary: AppointmentSummary): Promise<boolean>;
}

export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<{ messageId: string }>;
}

export type SmtpNotificationConfig = {
  host?: string;
  port?: number;
  secure?: boolean;
  user?: string;
  password?: string;
  timeoutMs?: number;
  fromEmail?: string;
  fromName?: string;
  officeEmail?: string;
  officePhone?: string;
};

export const NOTIFICATION_SENDER = Symbol('NOTIFICATION_SENDER');
export const MAIL_TRANSPORT = Symbol('MAIL_TRANSPORT');
export const SMTP_NOTIFICATION_CONFIG = Symbol('SMTP_NOTIFICATION_CONFIG');
