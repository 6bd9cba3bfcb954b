import type {
  ChatCompletion,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import type { ChatMessage, ChatModelReply } from '../conversation/conversation.types';
import type { ToolSchema } from '../flow/flow.types';
import { toParametersJsonSchema } from '../flow/tool-definition';

export const toChatCompletionMessages = (messages: readonly ChatMessage[]): ChatCompletionMessageParam[] =>
  messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
      case 'tool':
        return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
      case 'assistant':
        return {
          role: 'assistant',
          content: message.content ?? null,
          ...(message.toolCalls && message.toolCalls.length > 0
            ? {
                tool_calls: message.toolCalls.map((call) => ({
                  id: call.id,
                  type: 'function' as const,
                  function: { name: call.name, arguments: call.arguments },
                })),
              }
            : {}),
        };
    }
  });

export const toChatCompletionTools = (tools: readonly ToolSchema[]): ChatCompletionTool[] =>
  tools.map((tool): ChatCompletionTool => ({
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: toParametersJsonSchema(tool),
    },
  }));

export const fromChatCompletion = (completion: ChatCompletion): ChatModelReply => {
  const message = completion.choices[0]?.message;
  return {
    text: message?.content ?? undefined,
    toolCalls: (message?.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments,
    })),
  };
};
