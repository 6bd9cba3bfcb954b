import type { ModelContext } from '../flow/flow.types';
import { ChatMessage, ChatToolCall } from './conversation.types';

/**
 * The message history sent to the model for one call. Role messages are added
 * once; every node entry appends that node's task messages.
 */
export class ConversationTranscript {
  private readonly entries: ChatMessage[] = [];
  private rolePresented = false;

  get messages(): readonly ChatMessage[] {
    return this.entries;
  }

  enterNode(context: ModelContext): void {
    if (!this.rolePresented) {
      this.entries.push(...context.roleMessages);
      this.rolePresented = true;
    }
    this.entries.push(...context.taskMessages);
  }

  addUser(content: string): void {
    this.entries.push({ role: 'user', content });
  }

  addAssistant(content: string | undefined, toolCalls: ChatToolCall[] = []): void {
    this.entries.push({
      role: 'assistant',
      ...(content ? { content } : {}),
      ...(toolCalls.length > 0 ? { toolCalls } : {}),
    });
  }

  addToolResult(toolCallId: string, output: unknown): void {
    this.entries.push({ role: 'tool', toolCallId, content: JSON.stringify(output) });
  }
}
