import { OpenAiChatModelService } from './open-ai-chat-model.service';

const request = { messages: [{ role: 'user' as const, content: 'hello' }], tools: [] };

describe('OpenAiChatModelService', () => {
  it('requires a model name', async () => {
    const service = new OpenAiChatModelService({ apiKey: 'test-secret' });

    await expect(service.complete(request)).rejects.toThrow('OPENAI_MODEL is not set');
  });

  it('requires an API key before the first request', async () => {
    const service = new OpenAiChatModelService({ model: 'test-model' });

    await expect(service.complete(request)).rejects.toThrow('OPENAI_API_KEY is not set');
  });
});
