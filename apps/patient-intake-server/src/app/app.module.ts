import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CallSessionModule } from '../call-session/call-session.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: 'apps/patient-intake-server/.env',
    }),
    CallSessionModule,
  ],
})
export class AppModule {}
