export type FlowContractViolationCode = 'unknown_tool' | 'invalid_arguments';

export type FlowErrorCode =
  | FlowContractViolationCode
  | 'not_initialized'
  | 'already_initialized'
  | 'ended'
  | 'cancelled'
  | 'invalid_node';

export class FlowError extends Error {
  constructor(
    readonly code: FlowErrorCode,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = 'FlowError';
  }
}

const CONTRACT_VIOLATIONS: ReadonlySet<FlowErrorCode> = new Set<FlowErrorCode>(['unknown_tool', 'invalid_arguments']);

export const isContractViolation = (error: unknown): error is FlowError & { code: FlowContractViolationCode } =>
  error instanceof FlowError && CONTRACT_VIOLATIONS.has(error.code);
