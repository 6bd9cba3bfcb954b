import { AppointmentSummary } from './notification.types';

export type PracticeContact = {
  name: string;
  phone?: string;
  email?: string;
};

export type RenderedEmail = {
  subject: string;
  html: string;
  text: string;
};

const REMINDERS = [
  'Please arrive 15 minutes early for check-in',
  'Bring a valid photo ID and insurance card',
  'Bring a list of current medications',
  'If you need to cancel or reschedule, please call us at least 24 hours in advance',
];

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

const detailRows = (summary: AppointmentSummary): Array<[string, string]> => [
  ['Patient', summary.patientName],
  ['Date of Birth', summary.dateOfBirth],
  ['Appointment Time', summary.appointmentTime],
  ['Address', summary.address],
  ['Phone', summary.phoneNumber],
  ['Insurance', summary.insurance],
  ['Referral', summary.referral],
  ['Reason for Visit', summary.chiefComplaint],
];

export const renderAppointmentConfirmation = (
  summary: AppointmentSummary,
  practice: PracticeContact,
): RenderedEmail => {
  const rows = detailRows(summary);
  const contactLines = [
    practice.phone ? `Phone: ${practice.phone}` : undefined,
    practice.email ? `Email: ${practice.email}` : undefined,
  ].filter((line): line is string => line !== undefined);

  const html = [
    '<html><body style="font-family: Arial, sans-serif; line-height: 1.6; color: #333;">',
    '<div style="max-width: 600px; margin: 0 auto; padding: 20px;">',
    '<h2 style="color: #2c5aa0;">Appointment Confirmation</h2>',
    `<p>Dear <strong>${escapeHtml(summary.patientName)}</strong>,</p>`,
    `<p>Thank you for scheduling your appointment with ${escapeHtml(practice.name)}.</p>`,
    '<table style="width: 100%; border-collapse: collapse;">',
    ...rows.map(
      ([label, value]) =>
        `<tr><td style="padding: 8px 0;"><strong>${label}:</strong></td><td style="padding: 8px 0;">${escapeHtml(value)}</td></tr>`,
    ),
    '</table>',
    '<h4>Important Reminders:</h4>',
    '<ul>',
    ...REMINDERS.map((reminder) => `<li>${reminder}</li>`),
    '</ul>',
    `<p><strong>${escapeHtml(practice.name)}</strong></p>`,
    ...contactLines.map((line) => `<p style="margin: 5px 0;">${escapeHtml(line)}</p>`),
    '<p style="font-size: 12px; color: #666;">This is an automated message. Please do not reply to this email.</p>',
    '</div></body></html>',
  ].join('\n');

  const text = [
    `Dear ${summary.patientName},`,
    '',
    `Thank you for scheduling your appointment with ${practice.name}.`,
    '',
    'APPOINTMENT CONFIRMATION',
    '========================',
    '',
    ...rows.map(([label, value]) => `${label}: ${value}`),
    '',
    'IMPORTANT REMINDERS:',
    ...REMINDERS.map((reminder) => `- ${reminder}`),
    '',
    'Best regards,',
    practice.name,
    ...contactLines,
    '',
    'This is an automated message. Please do not reply to this email.',
  ].join('\n');

  return {
    subject: `Appointment Confirmation - ${practice.name}`,
    html,
    text,
  };
};
