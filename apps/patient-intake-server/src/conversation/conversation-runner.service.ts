import { Inject, Injectable, Logger } from '@nestjs/common';
import { FlowError, isContractViolation } from '../flow/flow-error';
import type { FlowManager } from '../flow/flow-manager';
import type { NodeConfig, FlowContext } from '../flow/flow.types';
import { ConversationTranscript } from './conversation-transcript';
import {
  CHAT_MODEL,
  CONVERSATION_RUNNER_CONFIG,
  ChatModel,
  ChatToolCall,
  ConversationRunnerConfig,
  ConversationStep,
  ConversationTurn,
} from './conversation.types';

const DEFAULT_MAX_MODEL_CALLS = 6;

export const parseToolArguments = (call: ChatToolCall): unknown => {
  if (!call.arguments.trim()) {
    return {};
  }
  try {
    return JSON.parse(call.arguments);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FlowError('invalid_arguments', `Arguments for ${call.name} are not valid JSON: ${reason}`);
  }
};

/**
 * The model-invocation loop. Presents the current node's prompt and tools to the
 * chat model, routes tool calls through the flow manager and feeds the results
 * back until the model answers the caller.
 */
@Injectable()
export class ConversationRunnerService {
  private readonly logger = new Logger(ConversationRunnerService.name);

  constructor(
    @Inject(CHAT_MODEL) private readonly chatModel: ChatModel,
    @Inject(CONVERSATION_RUNNER_CONFIG) private readonly config: ConversationRunnerConfig,
  ) {}

  async start<TState extends object, TDeps extends object>(
    flow: FlowManager<TState, TDeps>,
    transcript: ConversationTranscript,
    entry: NodeConfig<FlowContext<TState, TDeps>>,
  ): Promise<ConversationTurn> {
    transcript.enterNode(flow.initialize(entry));
    return this.runModelLoop(flow, transcript);
  }

  async respond<TState extends object, TDeps extends object>(
    flow: FlowManager<TState, TDeps>,
    transcript: ConversationTranscript,
    utterance: string,
  ): Promise<ConversationTurn> {
    transcript.addUser(utterance);
    return this.runModelLoop(flow, transcript);
  }

  private async runModelLoop<TState extends object, TDeps extends object>(
    flow: FlowManager<TState, TDeps>,
    transcript: ConversationTranscript,
  ): Promise<ConversationTurn> {
    const steps: ConversationStep[] = [];
    let remainingCalls = this.config.maxModelCalls ?? DEFAULT_MAX_MODEL_CALLS;

    while (remainingCalls > 0) {
      flow.signal.throwIfAborted();
      const context = flow.getModelContext();
      const reply = await this.chatModel.complete({
        messages: transcript.messages,
        tools: context.tools,
        signal: flow.signal,
      });
      remainingCalls -= 1;
      steps.push({ action: 'model-call', node: context.node });

      if (reply.toolCalls.length === 0) {
        const text = reply.text ?? '';
        transcript.addAssistant(text);
        steps.push({ action: 'reply', node: context.node });
        const ended = await flow.runPostActions();
        return { reply: text, node: context.node, ended, steps };
      }

      transcript.addAssistant(reply.text, reply.toolCalls);
      const batch: ConversationStep[] = [];
      for (const call of reply.toolCalls) {
        batch.push(await this.callTool(flow, transcript, call));
      }
      steps.push(...batch);
      // tool results must directly follow their assistant message; the next node is presented after the batch
      if (batch.some((step) => step.error === undefined)) {
        transcript.enterNode(flow.getModelContext());
      }
    }

    this.logger.warn(`Flow ${flow.sessionId}: no reply after ${this.config.maxModelCalls ?? DEFAULT_MAX_MODEL_CALLS} model calls`);
    return { node: flow.current.name, ended: false, steps };
  }

  private async callTool<TState extends object, TDeps extends object>(
    flow: FlowManager<TState, TDeps>,
    transcript: ConversationTranscript,
    call: ChatToolCall,
  ): Promise<ConversationStep> {
    const node = flow.current.name;
    let args: unknown;
    try {
      args = parseToolArguments(call);
      const outcome = await flow.handleToolCall(call.name, args);
      transcript.addToolResult(call.id, outcome.result);
      return { action: 'call-tool', node, tool: call.name, args, result: outcome.result };
    } catch (error) {
      if (!isContractViolation(error)) {
        throw error;
      }
      // rejected calls leave the node in place; the model sees why and tries again
      this.logger.warn(`Flow ${flow.sessionId}: rejected ${call.name} in ${node}: ${error.message}`);
      transcript.addToolResult(call.id, { error: error.message });
      return { action: 'call-tool', node, tool: call.name, args, error: error.message };
    }
  }
}
