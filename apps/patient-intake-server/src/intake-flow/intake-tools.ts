import { Logger } from '@nestjs/common';
import { z } from 'zod';
import type { AddressValidationResult } from '../address-validation/address-validator.types';
import { ToolDefinition, defineTool } from '../flow/tool-definition';
import type { NodeTool } from '../flow/flow.types';
import type { AppointmentSummary } from '../notification/notification.types';
import type { IntakeState } from '../shared/intake-state.interface';
import { classifyAppointmentChoice } from './appointment-choice';
import { IntakeFlowContext, IntakeServices } from './intake-flow.types';

const logger = new Logger('IntakeTools');

const intakeTool = <TShape extends z.ZodRawShape>(
  definition: ToolDefinition<IntakeFlowContext, TShape>,
): NodeTool<IntakeFlowContext> => defineTool(definition);

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const collectName = intakeTool({
  name: 'collect_name',
  description: "Record customer's name",
  parameters: { name: z.string().describe("The patient's full name") },
  handler: async ({ name }, { state, nodes }) => {
    logger.debug(`collect_name: ${name}`);
    state.set('name', name);
    return { result: { name }, next: nodes.dateOfBirth() };
  },
});

export const collectDateOfBirth = intakeTool({
  name: 'collect_date_of_birth',
  description: 'Record date of birth',
  parameters: { date_of_birth: z.string().describe('Date of birth as the caller said it') },
  handler: async ({ date_of_birth }, { state, nodes }) => {
    logger.debug(`collect_date_of_birth: ${date_of_birth}`);
    state.set('dateOfBirth', date_of_birth);
    return { result: { date_of_birth }, next: nodes.insurance() };
  },
});

export const collectInsurance = intakeTool({
  name: 'collect_insurance',
  description: 'Record insurance information',
  parameters: {
    payer_name: z.string().describe('Insurance company name'),
    payID: z.string().describe('Payer or member ID'),
  },
  handler: async ({ payer_name, payID }, { state, nodes }) => {
    logger.debug(`collect_insurance: ${payer_name}, ${payID}`);
    state.patch({ payerName: payer_name, payerId: payID });
    return { result: { payer_name, payID }, next: nodes.referral() };
  },
});

export const collectReferral = intakeTool({
  name: 'collect_referral',
  description: 'Record referral information',
  parameters: { referral_name: z.string().describe('Name of the referring doctor') },
  handler: async ({ referral_name }, { state, nodes }) => {
    logger.debug(`collect_referral: ${referral_name}`);
    state.set('referralDoctor', referral_name);
    return { result: { referral_doctor: referral_name }, next: nodes.chiefComplaint() };
  },
});

export const collectChiefComplaint = intakeTool({
  name: 'collect_chief_complaint',
  description: "Record the patient's chief complaint or reason for visit",
  parameters: { chief_complaint: z.string() },
  handler: async ({ chief_complaint }, { state, nodes }) => {
    logger.debug(`collect_chief_complaint: ${chief_complaint}`);
    state.set('chiefComplaint', chief_complaint);
    return { result: { chief_complaint }, next: nodes.address() };
  },
});

export const collectAddress = intakeTool({
  name: 'collect_address',
  description: "Record the patient's address",
  parameters: { address: z.string().describe('Street number, street, city, state and zip code') },
  handler: async ({ address }, { state, nodes, services }) => {
    logger.debug(`collect_address: ${address}`);

    let verdict: AddressValidationResult;
    try {
      verdict = await services.addressValidator.validate(address);
    } catch (error) {
      // an outage never blocks the call: keep what the caller said
      logger.error(`Address validation service error: ${errorMessage(error)}`);
      state.set('address', address);
      return { result: { address }, next: nodes.contactInfo() };
    }

    if (!verdict.valid) {
      logger.warn(`Address validation failed: ${verdict.errorReason}`);
      state.set('addressValidationError', verdict.errorReason);
      return { result: { address: '' }, next: nodes.addressRetry(verdict.errorReason) };
    }

    logger.log(`Address validated: ${verdict.canonicalAddress}`);
    state.patch({ address: verdict.canonicalAddress, addressDetails: verdict.details });
    return { result: { address: verdict.canonicalAddress }, next: nodes.contactInfo() };
  },
});

export const collectContactInfo = intakeTool({
  name: 'collect_contact_info',
  description: "Record the patient's contact information",
  parameters: {
    phone_number: z.string(),
    email: z.string().optional(),
  },
  handler: async ({ phone_number, email }, { state, nodes }) => {
    logger.debug(`collect_contact_info: ${phone_number}, ${email ?? ''}`);
    state.patch({ phoneNumber: phone_number, email: email ?? '' });
    return { result: { phone_number, email: email ?? '' }, next: nodes.appointmentScheduling() };
  },
});

export const scheduleAppointment = intakeTool({
  name: 'schedule_appointment',
  description: 'Schedule an appointment based on patient preference',
  parameters: {
    appointment_choice: z.string().describe("The caller's answer to the offered times"),
    custom_time: z.string().optional().describe('When the caller is available, if none of the offered times work'),
  },
  handler: async ({ appointment_choice, custom_time }, { state, nodes, services }) => {
    const choice = classifyAppointmentChoice(appointment_choice, custom_time);
    logger.debug(`schedule_appointment: "${appointment_choice}" matched ${choice.rule} -> ${choice.appointment}`);

    const converted = convertAppointment(services, choice.appointment);
    state.patch({
      selectedAppointment: choice.appointment,
      convertedAppointment: converted,
      customTime: custom_time ?? '',
    });

    const confirmationSent = await sendConfirmation(services, state.snapshot(), converted);
    state.set('confirmationSent', confirmationSent);

    return {
      result: {
        selected_appointment: choice.appointment,
        converted_appointment: converted,
        custom_time: custom_time ?? '',
      },
      next: nodes.end({ appointment: converted, confirmationSent }),
    };
  },
});

export const endQuote = intakeTool({
  name: 'end_quote',
  description: 'Complete the quote process',
  parameters: {},
  handler: async (_args, { nodes }) => {
    logger.debug('end_quote');
    return { result: { status: 'completed' }, next: nodes.end() };
  },
});

const convertAppointment = (services: IntakeServices, appointment: string): string => {
  try {
    const converted = services.dateConverter.toAbsolute(appointment);
    logger.log(`Converted appointment "${appointment}" to "${converted}"`);
    return converted;
  } catch (error) {
    logger.error(`Appointment date conversion failed: ${errorMessage(error)}`);
    return appointment;
  }
};

export const buildAppointmentSummary = (
  state: Readonly<Partial<IntakeState>>,
  appointmentTime: string,
): AppointmentSummary => ({
  patientName: state.name ?? 'Unknown',
  dateOfBirth: state.dateOfBirth ?? 'Not provided',
  appointmentTime,
  address: state.address ?? 'Not provided',
  phoneNumber: state.phoneNumber ?? 'Not provided',
  insurance: state.payerName
    ? `${state.payerName}${state.payerId ? ` (ID: ${state.payerId})` : ''}`
    : 'Not provided',
  referral: state.referralDoctor ?? 'None',
  chiefComplaint: state.chiefComplaint ?? 'Not provided',
});

const sendConfirmation = async (
  services: IntakeServices,
  state: Readonly<Partial<IntakeState>>,
  appointmentTime: string,
): Promise<boolean> => {
  try {
    const sent = await services.notifier.send(
      { name: state.name, email: state.email || undefined },
      buildAppointmentSummary(state, appointmentTime),
    );
    if (sent) {
      logger.log('Appointment confirmation sent');
    } else {
      logger.warn('Appointment confirmation was not delivered');
    }
    return sent;
  } catch (error) {
    logger.error(`Appointment confirmation failed: ${errorMessage(error)}`);
    return false;
  }
};
