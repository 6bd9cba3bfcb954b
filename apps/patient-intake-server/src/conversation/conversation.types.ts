import type { ToolResultPayload, ToolSchema } from '../flow/flow.types';

export type ChatToolCall = {
  id: string;
  name: string;
  arguments: string;
};

export type ChatMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content?: string; toolCalls?: ChatToolCall[] }
  | { role: 'tool'; toolCallId: string; content: string };

export type ChatModelRequest = {
  messages: readonly ChatMessage[];
  tools: readonly ToolSchema[];
  signal?: AbortSignal;
};

export type ChatModelReply = {
  text?: string;
  toolCalls: ChatToolCall[];
};

/** A language model that answers with spoken text or with calls to the offered tools. */
export interface ChatModel {
  complete(request: ChatModelRequest): Promise<ChatModelReply>;
}

export const CHAT_MODEL = Symbol('CHAT_MODEL');

export type ConversationRunnerConfig = {
  maxModelCalls?: number;
};

export const CONVERSATION_RUNNER_CONFIG = Symbol('CONVERSATION_RUNNER_CONFIG');

export type ConversationStep = {
  action: 'model-call' | 'call-tool' | 'reply';
  node: string;
  tool?: string;
  args?: unknown;
  result?: ToolResultPayload;
  error?: string;
};

export type ConversationTurn = {
  /** What the assistant says to the caller; absent when the model-call allowance ran out. */
  reply?: string;
  node: string;
  ended: boolean;
  steps: ConversationStep[];
};
