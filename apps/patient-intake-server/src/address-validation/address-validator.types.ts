export type AddressComponent = {
  longName: string;
  shortName: string;
  types: string[];
};

export type AddressDetails = {
  formattedAddress: string;
  components: AddressComponent[];
  location?: { lat: number; lng: number };
  locationType?: string;
  placeId?: string;
  hasStreetNumber: boolean;
  hasRoute: boolean;
  hasLocality: boolean;
};

/**
 * Verdict on a caller-supplied address. An invalid verdict is a normal outcome;
 * a validator that cannot reach a verdict throws {@link AddressValidationServiceError}.
 */
export type AddressValidationResult =
  | { valid: true; canonicalAddress: string; details: AddressDetails }
  | { valid: false; errorReason: string; canonicalAddress?: string };

export interface AddressValidator {
  validate(address: string): Promise<AddressValidationResult>;
}

export class AddressValidationServiceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AddressValidationServiceError';
  }
}

export type GoogleMapsAddressValidatorConfig = {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
};

export const ADDRESS_VALIDATOR = Symbol('ADDRESS_VALIDATOR');
export const GOOGLE_MAPS_ADDRESS_VALIDATOR_CONFIG = Symbol('GOOGLE_MAPS_ADDRESS_VALIDATOR_CONFIG');
