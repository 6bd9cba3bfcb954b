import { HttpModule } from '@nestjs/axios';
import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { parseNumber } from '../shared/config-values';
import {
  ADDRESS_VALIDATOR,
  GOOGLE_MAPS_ADDRESS_VALIDATOR_CONFIG,
  GoogleMapsAddressValidatorConfig,
} from './address-validator.types';
import { GoogleMapsAddressValidatorService } from './google-maps-address-validator.service';

@Module({})
export class AddressValidationModule {
  static register(config: GoogleMapsAddressValidatorConfig): DynamicModule {
    return {
      module: AddressValidationModule,
      imports: [HttpModule],
      providers: [
        { provide: GOOGLE_MAPS_ADDRESS_VALIDATOR_CONFIG, useValue: config },
        GoogleMapsAddressValidatorService,
        { provide: ADDRESS_VALIDATOR, useExisting: GoogleMapsAddressValidatorService },
      ],
      exports: [ADDRESS_VALIDATOR],
    };
  }

  static registerAsync(overrides?: Partial<GoogleMapsAddressValidatorConfig>): DynamicModule {
    return {
      module: AddressValidationModule,
      imports: [ConfigModule, HttpModule],
      providers: [
        {
          provide: GOOGLE_MAPS_ADDRESS_VALIDATOR_CONFIG,
          inject: [ConfigService],
          useFactory: (configService: ConfigService): GoogleMapsAddressValidatorConfig => ({
            apiKey: overrides?.apiKey ?? configService.get<string>('GOOGLE_MAPS_API_KEY'),
            baseUrl: overrides?.baseUrl ?? configService.get<string>('GOOGLE_MAPS_BASE_URL'),
            timeoutMs: overrides?.timeoutMs ?? parseNumber(configService.get<string>('ADDRESS_VALIDATION_TIMEOUT_MS')),
          }),
        },
        GoogleMapsAddressValidatorService,
        { provide: ADDRESS_VALIDATOR, useExisting: GoogleMapsAddressValidatorService },
      ],
      exports: [ADDRESS_VALIDATOR],
    };
  }
}
