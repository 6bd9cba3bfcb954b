import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import type { CallSession } from '../call-session/call-session.types';
import { MemoryStateStoreService } from './memory-state-store.service';
import { CALL_SESSION_STORE, StateStore } from './state-store.interface';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: CALL_SESSION_STORE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): StateStore<CallSession> => {
        const backend = configService.get<string>('CALL_SESSION_STORE');
        if (!backend) {
          throw new Error('CALL_SESSION_STORE is not set');
        }
        if (backend === 'memory') {
          return new MemoryStateStoreService<CallSession>();
        }
        throw new Error(`Unsupported CALL_SESSION_STORE: ${backend}`);
      },
    },
  ],
  exports: [CALL_SESSION_STORE],
})
export class StateModule {}
