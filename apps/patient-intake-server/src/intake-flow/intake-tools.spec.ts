import { AddressValidationServiceError } from '../address-validation/address-validator.types';
import { DateConverterService } from '../date-conversion/date-converter.service';
import { SessionStateStore } from '../flow/session-state.store';
import type { IntakeState } from '../shared/intake-state.interface';
import {
  MONDAY_MORNING,
  RecordingNotifier,
  ScriptedAddressValidator,
  fixedClock,
  invalidAddress,
  validAddress,
} from '../testing/intake-fakes';
import type { IntakeFlowContext, IntakeServices } from './intake-flow.types';
import { intakeNodes } from './intake-nodes';
import {
  buildAppointmentSummary,
  collectAddress,
  collectContactInfo,
  collectInsurance,
  collectName,
  collectReferral,
  endQuote,
  scheduleAppointment,
} from './intake-tools';

const CANONICAL = '12 Elm St, Springfield, IL 62704, USA';

const contextFor = (
  services: Partial<IntakeServices> = {},
  initial: Partial<IntakeState> = {},
): IntakeFlowContext => ({
  sessionId: 'call-test',
  state: new SessionStateStore<IntakeState>(initial),
  nodes: intakeNodes,
  services: {
    addressValidator: services.addressValidator ?? new ScriptedAddressValidator(),
    dateConverter: services.dateConverter ?? new DateConverterService(fixedClock(MONDAY_MORNING)),
    notifier: services.notifier ?? new RecordingNotifier(),
  },
});

const collected: Partial<IntakeState> = {
  name: 'Ada Lovelace',
  dateOfBirth: 'December 10, 1985',
  payerName: 'Acme Health',
  payerId: 'AH-1',
  chiefComplaint: 'Knee pain',
  address: CANONICAL,
  phoneNumber: '555-0100',
  email: 'ada@example.com',
};

describe('intake tools', () => {
  describe('collect_name', () => {
    it('records the name and asks for the date of birth', async () => {
      const context = contextFor();
      const { result, next } = await collectName.run({ name: 'Ada Lovelace' }, context);

      expect(result).toEqual({ name: 'Ada Lovelace' });
      expect(next.name).toBe('date_of_birth');
      expect(context.state.get('name')).toBe('Ada Lovelace');
    });
  });

  describe('collect_insurance', () => {
    it('records payer and id', async () => {
      const context = contextFor();
      const { next } = await collectInsurance.run({ payer_name: 'Acme Health', payID: 'AH-1' }, context);

      expect(next.name).toBe('referral');
      expect(context.state.snapshot()).toEqual({ payerName: 'Acme Health', payerId: 'AH-1' });
    });
  });

  describe('collect_referral', () => {
    it('records the referring doctor and moves to the chief complaint', async () => {
      const context = contextFor();
      const { result, next } = await collectReferral.run({ referral_name: 'Dr. Jones' }, context);

      expect(result).toEqual({ referral_doctor: 'Dr. Jones' });
      expect(next.name).toBe('chief_complaint');
      expect(context.state.get('referralDoctor')).toBe('Dr. Jones');
    });
  });

  describe('collect_address', () => {
    it('stores the canonical address when it validates', async () => {
      const validator = new ScriptedAddressValidator([validAddress(CANONICAL)]);
      const context = contextFor({ addressValidator: validator });

      const { result, next } = await collectAddress.run({ address: '12 elm street springfield' }, context);

      expect(validator.received).toEqual(['12 elm street springfield']);
      expect(result).toEqual({ address: CANONICAL });
      expect(next.name).toBe('contact_info');
      expect(context.state.get('address')).toBe(CANONICAL);
      expect(context.state.get('addressDetails')).toMatchObject({ formattedAddress: CANONICAL });
    });

    it('loops back through a retry node when the address is invalid', async () => {
      const reason = 'Address not found. Please provide a more specific address.';
      const context = contextFor({ addressValidator: new ScriptedAddressValidator([invalidAddress(reason)]) });

      const { result, next } = await collectAddress.run({ address: 'somewhere' }, context);

      expect(result).toEqual({ address: '' });
      expect(next.name).toBe('address_retry');
      expect(next.tools.map((tool) => tool.schema.name)).toEqual(['collect_address']);
      expect(next.taskMessages[0].content).toContain(reason);
      expect(context.state.has('address')).toBe(false);
      expect(context.state.get('addressValidationError')).toBe(reason);
    });

    it('keeps the raw address when the validator is down', async () => {
      const validator = new ScriptedAddressValidator([new AddressValidationServiceError('Geocoding request failed')]);
      const context = contextFor({ addressValidator: validator });

      const { result, next } = await collectAddress.run({ address: '12 Elm Street' }, context);

      expect(result).toEqual({ address: '12 Elm Street' });
      expect(next.name).toBe('contact_info');
      expect(context.state.get('address')).toBe('12 Elm Street');
    });
  });

  describe('collect_contact_info', () => {
    it('records an empty email when none is given', async () => {
      const context = contextFor();
      const { result, next } = await collectContactInfo.run({ phone_number: '555-0100' }, context);

      expect(result).toEqual({ phone_number: '555-0100', email: '' });
      expect(next.name).toBe('appointment_scheduling');
      expect(context.state.snapshot()).toEqual({ phoneNumber: '555-0100', email: '' });
    });
  });

  describe('schedule_appointment', () => {
    it('books the first mentioned slot and confirms it', async () => {
      const notifier = new RecordingNotifier();
      const context = contextFor({ notifier }, collected);

      const { result, next } = await scheduleAppointment.run(
        { appointment_choice: 'Tomorrow or Monday works' },
        context,
      );

      expect(result).toEqual({
        selected_appointment: 'tomorrow at 3pm',
        converted_appointment: 'October 20, 2026 at 3:00 PM',
        custom_time: '',
      });
      expect(next.name).toBe('end');
      expect(next.taskMessages[0].content).toContain('October 20, 2026 at 3:00 PM');
      expect(notifier.sent).toEqual([
        {
          recipient: { name: 'Ada Lovelace', email: 'ada@example.com' },
          summary: {
            patientName: 'Ada Lovelace',
            dateOfBirth: 'December 10, 1985',
            appointmentTime: 'October 20, 2026 at 3:00 PM',
            address: CANONICAL,
            phoneNumber: '555-0100',
            insurance: 'Acme Health (ID: AH-1)',
            referral: 'None',
            chiefComplaint: 'Knee pain',
          },
        },
      ]);
      expect(context.state.get('selectedAppointment')).toBe('tomorrow at 3pm');
      expect(context.state.get('convertedAppointment')).toBe('October 20, 2026 at 3:00 PM');
      expect(context.state.get('confirmationSent')).toBe(true);
    });

    it('converts a custom time when none of the slots work', async () => {
      const context = contextFor({}, collected);

      const { result } = await scheduleAppointment.run(
        { appointment_choice: 'nothing works', custom_time: 'Friday at 2pm' },
        context,
      );

      expect(result).toEqual({
        selected_appointment: 'Friday at 2pm',
        converted_appointment: 'October 23, 2026 at 2:00 PM',
        custom_time: 'Friday at 2pm',
      });
      expect(context.state.get('customTime')).toBe('Friday at 2pm');
    });

    it('keeps the relative slot when conversion throws', async () => {
      const dateConverter = {
        toAbsolute: (): string => {
          throw new Error('calendar offline');
        },
      };
      const context = contextFor({ dateConverter }, collected);

      const { result, next } = await scheduleAppointment.run({ appointment_choice: 'monday' }, context);

      expect(result).toMatchObject({
        selected_appointment: 'next Monday at 10am',
        converted_appointment: 'next Monday at 10am',
      });
      expect(next.name).toBe('end');
    });

    it('still ends the call when the confirmation is not delivered', async () => {
      const context = contextFor({ notifier: new RecordingNotifier(false) }, collected);

      const { next } = await scheduleAppointment.run({ appointment_choice: 'wednesday' }, context);

      expect(next.name).toBe('end');
      expect(next.taskMessages[0].content).not.toContain('email');
      expect(context.state.get('confirmationSent')).toBe(false);
    });

    it('still ends the call when the notifier throws', async () => {
      const context = contextFor({ notifier: new RecordingNotifier(new Error('smtp down')) }, collected);

      const { next } = await scheduleAppointment.run({ appointment_choice: 'anything works' }, context);

      expect(next.name).toBe('end');
      expect(context.state.get('confirmationSent')).toBe(false);
    });

    it('requires an appointment choice', async () => {
      await expect(scheduleAppointment.run({}, contextFor())).rejects.toMatchObject({ code: 'invalid_arguments' });
    });
  });

  describe('end_quote', () => {
    it('goes straight to the end without booking', async () => {
      const notifier = new RecordingNotifier();
      const context = contextFor({ notifier });

      const { result, next } = await endQuote.run({}, context);

      expect(result).toEqual({ status: 'completed' });
      expect(next.name).toBe('end');
      expect(notifier.sent).toEqual([]);
      expect(context.state.snapshot()).toEqual({});
    });
  });
});

describe('buildAppointmentSummary', () => {
  it('fills the gaps in a partial intake', () => {
    expect(buildAppointmentSummary({ name: 'Ada Lovelace', referralDoctor: 'Dr. Jones' }, 'tomorrow at 3pm')).toEqual({
      patientName: 'Ada Lovelace',
      dateOfBirth: 'Not provided',
      appointmentTime: 'tomorrow at 3pm',
      address: 'Not provided',
      phoneNumber: 'Not provided',
      insurance: 'Not provided',
      referral: 'Dr. Jones',
      chiefComplaint: 'Not provided',
    });
  });
});
