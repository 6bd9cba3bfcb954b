export type OpenAiChatModelConfig = {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  logRequests?: boolean;
};

export const OPEN_AI_CHAT_MODEL_CONFIG = Symbol('OPEN_AI_CHAT_MODEL_CONFIG');
