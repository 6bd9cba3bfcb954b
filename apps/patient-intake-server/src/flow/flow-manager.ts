import { Logger } from '@nestjs/common';
import { FlowError } from './flow-error';
import {
  FlowContext,
  FlowStatus,
  ModelContext,
  NodeConfig,
  ToolCallOutcome,
  isTerminalNode,
} from './flow.types';
import { SessionStateStore } from './session-state.store';

export type FlowManagerOptions<TState extends object, TDeps extends object> = {
  sessionId: string;
  deps: TDeps;
  initialState?: Partial<TState>;
  onConversationEnd?: (state: Readonly<Partial<TState>>) => void | Promise<void>;
};

/**
 * Drives one conversation through a node graph. Holds the current node and the
 * session state, exposes only the current node's tools to the model loop, and
 * applies the node returned by each handler.
 */
export class FlowManager<TState extends object, TDeps extends object> {
  private readonly logger = new Logger(FlowManager.name);
  private readonly stateStore: SessionStateStore<TState>;
  private readonly abortController = new AbortController();
  private readonly visited: string[] = [];
  private currentNode?: NodeConfig<FlowContext<TState, TDeps>>;
  private status: FlowStatus = 'idle';
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly options: FlowManagerOptions<TState, TDeps>) {
    this.stateStore = new SessionStateStore<TState>(options.initialState);
  }

  get sessionId(): string {
    return this.options.sessionId;
  }

  get state(): SessionStateStore<TState> {
    return this.stateStore;
  }

  get flowStatus(): FlowStatus {
    return this.status;
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get history(): readonly string[] {
    return [...this.visited];
  }

  get current(): NodeConfig<FlowContext<TState, TDeps>> {
    if (!this.currentNode) {
      throw new FlowError('not_initialized', `Flow ${this.sessionId} has not been initialized`);
    }
    return this.currentNode;
  }

  initialize(entry: NodeConfig<FlowContext<TState, TDeps>>): ModelContext {
    if (this.status !== 'idle') {
      throw new FlowError('already_initialized', `Flow ${this.sessionId} is already ${this.status}`);
    }
    assertValidNode(entry);
    this.status = 'active';
    this.enter(entry);
    this.logger.log(`Flow ${this.sessionId} initialized at node ${entry.name}`);
    return this.getModelContext();
  }

  getModelContext(): ModelContext {
    const node = this.current;
    return {
      node: node.name,
      roleMessages: node.roleMessages ?? [],
      taskMessages: node.taskMessages,
      tools: node.tools.map((tool) => tool.schema),
    };
  }

  /**
   * Dispatches one tool call against the current node. Calls are processed one
   * at a time in arrival order; a rejected call leaves node and state untouched.
   */
  handleToolCall(name: string, args: unknown): Promise<ToolCallOutcome> {
    const run = this.queue.then(() => this.dispatch(name, args));
    // errors surface through `run`; the queue only tracks ordering
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Runs the current node's post-actions. Returns true when the conversation ended. */
  async runPostActions(): Promise<boolean> {
    const node = this.current;
    if (this.status !== 'active' || !isTerminalNode(node)) {
      return false;
    }
    this.status = 'ended';
    this.logger.log(`Flow ${this.sessionId} ended at node ${node.name}`);
    await this.options.onConversationEnd?.(this.stateStore.snapshot());
    return true;
  }

  /** Stops the flow for good: pending model work is aborted and the state is discarded. */
  cancel(reason: string): void {
    if (this.status === 'cancelled') {
      return;
    }
    this.status = 'cancelled';
    this.stateStore.clear();
    this.abortController.abort(new FlowError('cancelled', `Flow ${this.sessionId} cancelled: ${reason}`));
    this.logger.log(`Flow ${this.sessionId} cancelled: ${reason}`);
  }

  private async dispatch(name: string, args: unknown): Promise<ToolCallOutcome> {
    this.assertActive();
    const node = this.current;
    const tool = node.tools.find((candidate) => candidate.schema.name === name);
    if (!tool) {
      throw new FlowError('unknown_tool', `Tool ${name} is not available in node ${node.name}`, {
        available: node.tools.map((candidate) => candidate.schema.name),
      });
    }

    const draft = this.stateStore.fork();
    const context: FlowContext<TState, TDeps> = {
      ...this.options.deps,
      sessionId: this.sessionId,
      state: draft,
    };
    const { result, next } = await tool.run(args, context);

    // the call may have been torn down while the handler was waiting on a collaborator
    this.assertActive();
    assertValidNode(next);
    this.stateStore.commit(draft);
    this.enter(next);
    this.logger.log(`Flow ${this.sessionId}: ${name} moved ${node.name} -> ${next.name}`);

    return {
      tool: name,
      result,
      previousNode: node.name,
      node: next.name,
      terminal: isTerminalNode(next),
    };
  }

  private enter(node: NodeConfig<FlowContext<TState, TDeps>>): void {
    assertValidNode(node);
    this.currentNode = node;
    this.visited.push(node.name);
  }

  private assertActive(): void {
    if (this.status === 'idle') {
      throw new FlowError('not_initialized', `Flow ${this.sessionId} has not been initialized`);
    }
    if (this.status === 'cancelled') {
      throw new FlowError('cancelled', `Flow ${this.sessionId} was cancelled`);
    }
    if (this.status === 'ended') {
      throw new FlowError('ended', `Flow ${this.sessionId} has already ended`);
    }
  }
}

const assertValidNode = <TContext>(node: NodeConfig<TContext>): void => {
  const names = node.tools.map((tool) => tool.schema.name);
  const duplicates = names.filter((name, index) => names.indexOf(name) !== index);
  if (duplicates.length > 0) {
    throw new FlowError('invalid_node', `Node ${node.name} declares duplicate tools: ${duplicates.join(', ')}`);
  }
  if (isTerminalNode(node) && node.tools.length > 0) {
    throw new FlowError('invalid_node', `Terminal node ${node.name} must not declare tools`);
  }
};
