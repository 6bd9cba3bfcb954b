import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { OpenAiChatModelModule } from '../open-ai-chat-model/open-ai-chat-model.module';
import { parseNumber } from '../shared/config-values';
import { ConversationRunnerService } from './conversation-runner.service';
import { CONVERSATION_RUNNER_CONFIG, ConversationRunnerConfig } from './conversation.types';

@Module({
  imports: [ConfigModule, OpenAiChatModelModule.registerAsync()],
  providers: [
    {
      provide: CONVERSATION_RUNNER_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): ConversationRunnerConfig => ({
        maxModelCalls: parseNumber(configService.get<string>('CONVERSATION_MAX_MODEL_CALLS')),
      }),
    },
    ConversationRunnerService,
  ],
  exports: [ConversationRunnerService],
})
export class ConversationModule {}
