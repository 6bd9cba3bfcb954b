import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import twilio from 'twilio';
import { getRequired } from '../shared/config-values';
import { CALL_FORWARDER, CallsClient, TWILIO_CLIENT, TWILIO_CONFIG, TwilioConfig } from './telephony.types';
import { TwilioCallForwardingService } from './twilio-call-forwarding.service';

// credentials are checked on the first forward, not at boot
const createTwilioClient = (config: TwilioConfig): CallsClient => {
  let client: CallsClient | undefined;
  return {
    calls: (callSid: string) => {
      if (!client) {
        client = twilio(
          getRequired(config.accountSid, 'TWILIO_ACCOUNT_SID'),
          getRequired(config.authToken, 'TWILIO_AUTH_TOKEN'),
        );
      }
      return client.calls(callSid);
    },
  };
};

const forwardingProviders = [
  { provide: TWILIO_CLIENT, inject: [TWILIO_CONFIG], useFactory: createTwilioClient },
  TwilioCallForwardingService,
  { provide: CALL_FORWARDER, useExisting: TwilioCallForwardingService },
];

@Module({})
export class TelephonyModule {
  static register(config: TwilioConfig): DynamicModule {
    return {
      module: TelephonyModule,
      providers: [{ provide: TWILIO_CONFIG, useValue: config }, ...forwardingProviders],
      exports: [CALL_FORWARDER],
    };
  }

  static registerAsync(): DynamicModule {
    return {
      module: TelephonyModule,
      imports: [ConfigModule],
      providers: [
        {
          provide: TWILIO_CONFIG,
          inject: [ConfigService],
          useFactory: (configService: ConfigService): TwilioConfig => ({
            accountSid: configService.get<string>('TWILIO_ACCOUNT_SID'),
            authToken: configService.get<string>('TWILIO_AUTH_TOKEN'),
          }),
        },
        ...forwardingProviders,
      ],
      exports: [CALL_FORWARDER],
    };
  }
}
