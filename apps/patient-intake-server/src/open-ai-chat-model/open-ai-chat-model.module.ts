import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CHAT_MODEL } from '../conversation/conversation.types';
import { parseBoolean } from '../shared/config-values';
import { OpenAiChatModelService } from './open-ai-chat-model.service';
import { OPEN_AI_CHAT_MODEL_CONFIG, OpenAiChatModelConfig } from './open-ai-chat-model.types';

@Module({})
export class OpenAiChatModelModule {
  static register(config: OpenAiChatModelConfig): DynamicModule {
    return {
      module: OpenAiChatModelModule,
      providers: [
        { provide: OPEN_AI_CHAT_MODEL_CONFIG, useValue: config },
        OpenAiChatModelService,
        { provide: CHAT_MODEL, useExisting: OpenAiChatModelService },
      ],
      exports: [CHAT_MODEL],
    };
  }

  static registerAsync(overrides?: Partial<OpenAiChatModelConfig>): DynamicModule {
    return {
      module: OpenAiChatModelModule,
      imports: [ConfigModule],
      providers: [
        {
          provide: OPEN_AI_CHAT_MODEL_CONFIG,
          inject: [ConfigService],
          useFactory: (configService: ConfigService): OpenAiChatModelConfig => ({
            apiKey: overrides?.apiKey ?? configService.get<string>('OPENAI_API_KEY'),
            model: overrides?.model ?? configService.get<string>('OPENAI_MODEL'),
            baseUrl: overrides?.baseUrl ?? configService.get<string>('OPENAI_BASE_URL'),
            logRequests: overrides?.logRequests ?? parseBoolean(configService.get<string>('OPENAI_LOG_REQUESTS')),
          }),
        },
        OpenAiChatModelService,
        { provide: CHAT_MODEL, useExisting: OpenAiChatModelService },
      ],
      exports: [CHAT_MODEL],
    };
  }
}
