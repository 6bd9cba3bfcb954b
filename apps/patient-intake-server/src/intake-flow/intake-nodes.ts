import type { FlowMessage } from '../flow/flow.types';
import { OFFERED_SLOTS } from './appointment-choice';
import { ClosingDetails, IntakeNodeConfig, IntakeNodes } from './intake-flow.types';
import { IntakeNode } from './intake-node.enum';
import {
  collectAddress,
  collectChiefComplaint,
  collectContactInfo,
  collectDateOfBirth,
  collectInsurance,
  collectName,
  collectReferral,
  endQuote,
  scheduleAppointment,
} from './intake-tools';

const PRACTITIONER = 'Dr. Smith';

const system = (content: string): FlowMessage => ({ role: 'system', content });

export const createInitialNode = (): IntakeNodeConfig => ({
  name: IntakeNode.Initial,
  roleMessages: [
    system(
      'You are a friendly medical agent. Your responses will be converted to audio, so avoid special characters. ' +
        'Always use the available functions to progress the conversation naturally. ' +
        `Introduce yourself as ${PRACTITIONER}'s medical AI assistant, that's it. Do not ask for the patient's name yet.`,
    ),
  ],
  taskMessages: [
    system(
      'Do not introduce yourself twice. Start by asking how they are doing today, wait for them to respond, then ask for their name.',
    ),
  ],
  tools: [collectName],
});

export const createDateOfBirthNode = (): IntakeNodeConfig => ({
  name: IntakeNode.DateOfBirth,
  taskMessages: [system("Ask about the customer's date of birth.")],
  tools: [collectDateOfBirth],
});

export const createInsuranceNode = (): IntakeNodeConfig => ({
  name: IntakeNode.Insurance,
  taskMessages: [system("Ask about the customer's insurance information: the payer name and the payer ID.")],
  tools: [collectInsurance],
});

// the one branch: a caller without a referral goes straight to the chief complaint
export const createReferralNode = (): IntakeNodeConfig => ({
  name: IntakeNode.Referral,
  taskMessages: [
    system(
      "Ask about the customer's referral information. Wait for the customer to answer whether they have a referral or not. " +
        'Record the referral name if they have one. If they say they do not have a referral, ask about their chief complaint.',
    ),
  ],
  tools: [collectReferral, collectChiefComplaint],
});

export const createChiefComplaintNode = (): IntakeNodeConfig => ({
  name: IntakeNode.ChiefComplaint,
  taskMessages: [
    system('Ask about the reason the customer is calling in today, their chief complaint or main concern.'),
  ],
  tools: [collectChiefComplaint],
});

export const createAddressNode = (): IntakeNodeConfig => ({
  name: IntakeNode.Address,
  taskMessages: [
    system(
      "Ask for the customer's address, including street number, street name, city, state and zip code. " +
        'Ask for clarification if it seems incomplete.',
    ),
  ],
  tools: [collectAddress],
});

export const createAddressRetryNode = (errorReason: string): IntakeNodeConfig => ({
  name: IntakeNode.AddressRetry,
  taskMessages: [
    system(
      `The address provided could not be validated. ${errorReason} ` +
        'Please ask the customer to provide their complete address again, including street number, street name, city, state, and zip code.',
    ),
  ],
  tools: [collectAddress],
});

export const createContactInfoNode = (): IntakeNodeConfig => ({
  name: IntakeNode.ContactInfo,
  taskMessages: [
    system(
      "Ask for the customer's contact information. Phone number is required, but email is optional. " +
        'Make sure to get a valid phone number format.',
    ),
  ],
  tools: [collectContactInfo],
});

export const createAppointmentSchedulingNode = (): IntakeNodeConfig => {
  const [tomorrow, monday, wednesday] = OFFERED_SLOTS;
  return {
    name: IntakeNode.AppointmentScheduling,
    taskMessages: [
      system(
        `Offer the patient available appointment times with ${PRACTITIONER}: ${tomorrow}, ${monday}, or ${wednesday}. ` +
          'Ask which time works best for them. If they say nothing works, ask when they are available. ' +
          `If they say anything works, offer ${tomorrow}. If they give multiple options, pick the first one mentioned.`,
      ),
    ],
    tools: [scheduleAppointment, endQuote],
  };
};

export const createEndNode = (closing: ClosingDetails = {}): IntakeNodeConfig => {
  const details = [
    closing.appointment ? `The appointment is booked for ${closing.appointment}; mention the date and time.` : '',
    closing.confirmationSent ? 'Mention that an email has been sent to confirm their appointment.' : '',
  ].filter(Boolean);
  return {
    name: IntakeNode.End,
    taskMessages: [system(['Thank the customer for their time and end the conversation.', ...details].join(' '))],
    tools: [],
    postActions: [{ type: 'end_conversation' }],
  };
};

export const intakeNodes: IntakeNodes = {
  initial: createInitialNode,
  dateOfBirth: createDateOfBirthNode,
  insurance: createInsuranceNode,
  referral: createReferralNode,
  chiefComplaint: createChiefComplaintNode,
  address: createAddressNode,
  addressRetry: createAddressRetryNode,
  contactInfo: createContactInfoNode,
  appointmentScheduling: createAppointmentSchedulingNode,
  end: createEndNode,
};
