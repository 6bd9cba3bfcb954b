import type { AddressDetails } from '../address-validation/address-validator.types';

/** Everything learned from the caller during one intake call. Each field is written once it is collected. */
export interface IntakeState {
  name: string;
  dateOfBirth: string;
  payerName: string;
  payerId: string;
  referralDoctor: string;
  chiefComplaint: string;
  address: string;
  addressDetails: AddressDetails;
  addressValidationError: string;
  phoneNumber: string;
  email: string;
  selectedAppointment: string;
  convertedAppointment: string;
  customTime: string;
  confirmationSent: boolean;
}
