import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ConversationModule } from '../conversation/conversation.module';
import { IntakeFlowModule } from '../intake-flow/intake-flow.module';
import { parseNumber } from '../shared/config-values';
import { StateModule } from '../state/state.module';
import { TelephonyModule } from '../telephony/telephony.module';
import { CallSessionController } from './call-session.controller';
import { CallSessionService } from './call-session.service';
import { CALL_SESSION_CONFIG, CallSessionConfig } from './call-session.types';

@Module({
  imports: [ConfigModule, IntakeFlowModule, ConversationModule, StateModule, TelephonyModule.registerAsync()],
  controllers: [CallSessionController],
  providers: [
    {
      provide: CALL_SESSION_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): CallSessionConfig => ({
        ttlSeconds: parseNumber(configService.get<string>('CALL_SESSION_TTL_SECONDS')),
      }),
    },
    CallSessionService,
  ],
})
export class CallSessionModule {}
