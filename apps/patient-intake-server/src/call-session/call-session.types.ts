import type { ConversationTurn } from '../conversation/conversation.types';
import type { ConversationTranscript } from '../conversation/conversation-transcript';
import type { IntakeFlowManager } from '../intake-flow/intake-flow.types';
import type { IntakeState } from '../shared/intake-state.interface';

export type CallSession = {
  callId: string;
  sipUri: string;
  flow: IntakeFlowManager;
  transcript: ConversationTranscript;
  startedAtUtc: string;
};

export type CallSessionConfig = {
  ttlSeconds?: number;
};

export const CALL_SESSION_CONFIG = Symbol('CALL_SESSION_CONFIG');

export type CallSessionView = {
  callId: string;
  node?: string;
  status: string;
  startedAtUtc: string;
};

export type CallReport = {
  callId: string;
  nodesVisited: readonly string[];
  patient: Pick<Partial<IntakeState>, 'name' | 'dateOfBirth' | 'phoneNumber' | 'email' | 'address'>;
  insurance: { payerName?: string; payerId?: string };
  referralDoctor?: string;
  chiefComplaint?: string;
  appointment: { selected?: string; converted?: string; customTime?: string };
  confirmationSent: boolean;
};

export type CallTurn = ConversationTurn & {
  report?: CallReport;
};
