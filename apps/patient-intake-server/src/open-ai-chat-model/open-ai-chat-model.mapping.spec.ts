import type { ChatCompletion } from 'openai/resources/chat/completions';
import type { ToolSchema } from '../flow/flow.types';
import { fromChatCompletion, toChatCompletionMessages, toChatCompletionTools } from './open-ai-chat-model.mapping';

const completionWith = (content: string | null, toolCalls?: Array<{ id: string; name: string; arguments: string }>) => {
  const message = {
    role: 'assistant' as const,
    content,
    refusal: null,
    ...(toolCalls
      ? {
          tool_calls: toolCalls.map((call) => ({
            id: call.id,
            type: 'function' as const,
            function: { name: call.name, arguments: call.arguments },
          })),
        }
      : {}),
  };
  const choice = { index: 0, finish_reason: 'stop' as const, logprobs: null, message };
  const completion: ChatCompletion = {
    id: 'chatcmpl-1',
    object: 'chat.completion',
    created: 0,
    model: 'test-model',
    choices: [choice],
  };
  return completion;
};

describe('toChatCompletionMessages', () => {
  it('maps every role to its chat completion shape', () => {
    expect(
      toChatCompletionMessages([
        { role: 'system', content: 'Ask for a name.' },
        { role: 'user', content: 'I am Ada' },
        { role: 'assistant', toolCalls: [{ id: 'call-1', name: 'collect_name', arguments: '{"name":"Ada"}' }] },
        { role: 'tool', toolCallId: 'call-1', content: '{"name":"Ada"}' },
        { role: 'assistant', content: 'Thanks Ada.' },
      ]),
    ).toEqual([
      { role: 'system', content: 'Ask for a name.' },
      { role: 'user', content: 'I am Ada' },
      {
        role: 'assistant',
        content: null,
        tool_calls: [
          { id: 'call-1', type: 'function', function: { name: 'collect_name', arguments: '{"name":"Ada"}' } },
        ],
      },
      { role: 'tool', tool_call_id: 'call-1', content: '{"name":"Ada"}' },
      { role: 'assistant', content: 'Thanks Ada.' },
    ]);
  });
});

describe('toChatCompletionTools', () => {
  it('describes each tool as a function with a JSON schema', () => {
    const schema: ToolSchema = {
      name: 'collect_contact_info',
      description: 'Record contact details',
      parameters: {
        phone_number: { type: 'string', required: true, description: 'Phone number' },
        email: { type: 'string', required: false },
      },
    };

    expect(toChatCompletionTools([schema])).toEqual([
      {
        type: 'function',
        function: {
          name: 'collect_contact_info',
          description: 'Record contact details',
          parameters: {
            type: 'object',
            properties: {
              phone_number: { type: 'string', description: 'Phone number' },
              email: { type: 'string' },
            },
            required: ['phone_number'],
            additionalProperties: false,
          },
        },
      },
    ]);
  });
});

describe('fromChatCompletion', () => {
  it('reads a spoken reply', () => {
    expect(fromChatCompletion(completionWith('How are you today?'))).toEqual({
      text: 'How are you today?',
      toolCalls: [],
    });
  });

  it('reads tool calls', () => {
    const completion = completionWith(null, [{ id: 'call-7', name: 'end_quote', arguments: '{}' }]);

    expect(fromChatCompletion(completion)).toEqual({
      text: undefined,
      toolCalls: [{ id: 'call-7', name: 'end_quote', arguments: '{}' }],
    });
  });
});
