export enum IntakeNode {
  Initial = 'initial',
  DateOfBirth = 'date_of_birth',
  Insurance = 'insurance',
  Referral = 'referral',
  ChiefComplaint = 'chief_complaint',
  Address = 'address',
  AddressRetry = 'address_retry',
  ContactInfo = 'contact_info',
  AppointmentScheduling = 'appointment_scheduling',
  End = 'end',
}
