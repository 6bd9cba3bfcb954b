import { Inject, Injectable, Logger } from '@nestjs/common';
import OpenAI from 'openai';
import type { ChatModel, ChatModelReply, ChatModelRequest } from '../conversation/conversation.types';
import { fromChatCompletion, toChatCompletionMessages, toChatCompletionTools } from './open-ai-chat-model.mapping';
import { OPEN_AI_CHAT_MODEL_CONFIG, OpenAiChatModelConfig } from './open-ai-chat-model.types';

@Injectable()
export class OpenAiChatModelService implements ChatModel {
  private readonly logger = new Logger(OpenAiChatModelService.name);
  private client?: OpenAI;

  constructor(@Inject(OPEN_AI_CHAT_MODEL_CONFIG) private readonly config: OpenAiChatModelConfig) {}

  async complete(request: ChatModelRequest): Promise<ChatModelReply> {
    const model = this.config.model;
    if (!model) {
      throw new Error('OPENAI_MODEL is not set');
    }

    const messages = toChatCompletionMessages(request.messages);
    const tools = toChatCompletionTools(request.tools);

    if (this.config.logRequests) {
      this.logger.debug(
        `OpenAI request payload: ${JSON.stringify({ model, messages, tools: tools.map((tool) => tool.function.name) })}`,
      );
    }

    const completion = await this.getClient().chat.completions.create(
      {
        model,
        messages,
        ...(tools.length > 0 ? { tools } : {}),
      },
      { signal: request.signal },
    );
    return fromChatCompletion(completion);
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new Error('OPENAI_API_KEY is not set');
      }
      this.client = new OpenAI({ apiKey: this.config.apiKey, baseURL: this.config.baseUrl });
    }
    return this.client;
  }
}
