import { HttpService } from '@nestjs/axios';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { firstValueFrom } from 'rxjs';
import { z } from 'zod';
import {
  AddressComponent,
  AddressDetails,
  AddressValidationResult,
  AddressValidationServiceError,
  AddressValidator,
  GOOGLE_MAPS_ADDRESS_VALIDATOR_CONFIG,
  GoogleMapsAddressValidatorConfig,
} from './address-validator.types';

const GeocodeResultSchema = z.object({
  formatted_address: z.string().default(''),
  place_id: z.string().optional(),
  address_components: z
    .array(
      z.object({
        long_name: z.string(),
        short_name: z.string(),
        types: z.array(z.string()).default([]),
      }),
    )
    .default([]),
  geometry: z
    .object({
      location: z.object({ lat: z.number(), lng: z.number() }).optional(),
      location_type: z.string().optional(),
    })
    .optional(),
});

const GeocodeResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z.array(GeocodeResultSchema).default([]),
});

type GeocodeResult = z.infer<typeof GeocodeResultSchema>;

const PRECISE_LOCATION_TYPES = new Set(['ROOFTOP', 'RANGE_INTERPOLATED']);

export const ADDRESS_NOT_FOUND = 'Address not found. Please provide a more specific address.';
export const ADDRESS_MISSING_PARTS = 'Please provide a complete address with street, city, and state.';
export const ADDRESS_MISSING_NUMBER =
  'The address seems incomplete. Please provide the full street address including house number.';

@Injectable()
export class GoogleMapsAddressValidatorService implements AddressValidator {
  private readonly logger = new Logger(GoogleMapsAddressValidatorService.name);

  constructor(
    private readonly httpService: HttpService,
    @Inject(GOOGLE_MAPS_ADDRESS_VALIDATOR_CONFIG) private readonly config: GoogleMapsAddressValidatorConfig,
  ) {}

  async validate(address: string): Promise<AddressValidationResult> {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      throw new AddressValidationServiceError('GOOGLE_MAPS_API_KEY is not set');
    }
    const baseUrl = this.config.baseUrl ?? 'https://maps.googleapis.com/maps/api';

    let body: unknown;
    try {
      const response$ = this.httpService.get<unknown>(`${baseUrl}/geocode/json`, {
        params: { address, key: apiKey },
        timeout: this.config.timeoutMs ?? 10_000,
      });
      const response = await firstValueFrom(response$);
      body = response.data;
    } catch (error) {
      throw new AddressValidationServiceError(
        `Geocoding request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    const parsed = GeocodeResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AddressValidationServiceError(`Unexpected geocoding response: ${parsed.error.message}`);
    }

    const { status, results, error_message: errorMessage } = parsed.data;
    if (status === 'ZERO_RESULTS' || (status === 'OK' && results.length === 0)) {
      return { valid: false, errorReason: ADDRESS_NOT_FOUND };
    }
    if (status !== 'OK') {
      throw new AddressValidationServiceError(
        `Geocoding API returned ${status}${errorMessage ? `: ${errorMessage}` : ''}`,
      );
    }

    const verdict = this.evaluate(results[0]);
    this.logger.debug(`Geocoded "${address}" -> valid=${verdict.valid}`);
    return verdict;
  }

  private evaluate(result: GeocodeResult): AddressValidationResult {
    const components: AddressComponent[] = result.address_components.map((component) => ({
      longName: component.long_name,
      shortName: component.short_name,
      types: component.types,
    }));
    const hasType = (...types: string[]) =>
      components.some((component) => types.some((type) => component.types.includes(type)));

    const hasStreetNumber = hasType('street_number');
    const hasRoute = hasType('route');
    const hasLocality = hasType('locality', 'administrative_area_level_1');
    const locationType = result.geometry?.location_type;
    const isPrecise = locationType !== undefined && PRECISE_LOCATION_TYPES.has(locationType);

    if (!hasRoute || !hasLocality) {
      return { valid: false, errorReason: ADDRESS_MISSING_PARTS };
    }
    if (!isPrecise && !hasStreetNumber) {
      return { valid: false, errorReason: ADDRESS_MISSING_NUMBER, canonicalAddress: result.formatted_address };
    }

    const details: AddressDetails = {
      formattedAddress: result.formatted_address,
      components,
      location: result.geometry?.location,
      locationType,
      placeId: result.place_id,
      hasStreetNumber,
      hasRoute,
      hasLocality,
    };
    return { valid: true, canonicalAddress: result.formatted_address, details };
  }
}
