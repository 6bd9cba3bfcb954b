import type { SessionStateStore } from './session-state.store';

export type FlowRole = 'system' | 'user' | 'assistant';

export type FlowMessage = {
  role: FlowRole;
  content: string;
};

export type ToolParameterType = 'string' | 'number' | 'boolean';

export type ToolParameter = {
  type: ToolParameterType;
  required: boolean;
  description?: string;
};

export type ToolSchema = {
  name: string;
  description: string;
  parameters: Readonly<Record<string, ToolParameter>>;
};

export type FlowPostAction = { type: 'end_conversation' };

export type ToolResultPayload = Record<string, unknown>;

/**
 * Everything a handler can reach while it runs: the session state (a draft that
 * is committed only when the transition is applied) plus the dependencies the
 * flow was constructed with.
 */
export type FlowContext<TState extends object, TDeps extends object> = TDeps & {
  sessionId: string;
  state: SessionStateStore<TState>;
};

export type ToolInvocationResult<TContext> = {
  result: ToolResultPayload;
  next: NodeConfig<TContext>;
};

export interface NodeTool<TContext> {
  readonly schema: ToolSchema;
  run(rawArgs: unknown, context: TContext): Promise<ToolInvocationResult<TContext>>;
}

export type NodeConfig<TContext> = {
  name: string;
  roleMessages?: readonly FlowMessage[];
  taskMessages: readonly FlowMessage[];
  tools: readonly NodeTool<TContext>[];
  postActions?: readonly FlowPostAction[];
};

export type FlowStatus = 'idle' | 'active' | 'ended' | 'cancelled';

export type ModelContext = {
  node: string;
  roleMessages: readonly FlowMessage[];
  taskMessages: readonly FlowMessage[];
  tools: readonly ToolSchema[];
};

export type ToolCallOutcome = {
  tool: string;
  result: ToolResultPayload;
  previousNode: string;
  node: string;
  terminal: boolean;
};

export const isTerminalNode = <TContext>(node: NodeConfig<TContext>): boolean =>
  (node.postActions ?? []).some((action) => action.type === 'end_conversation');
